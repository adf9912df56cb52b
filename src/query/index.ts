export * from './builder.js';
export * from './dialect.js';
