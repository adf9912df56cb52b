export * from './cancellation.js';
export * from './executor.js';
export * from './options.js';
export * from './results.js';
export * from './runner.js';
export * from './writer.js';
