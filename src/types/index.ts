export * from './survey.js';
export * from './credentials.js';
