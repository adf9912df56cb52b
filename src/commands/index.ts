export * from './survey.js';
export * from './profiles.js';
