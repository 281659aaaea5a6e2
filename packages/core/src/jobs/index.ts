export * from './sanitize.js';
export * from './targets.js';
export * from './job-labeler.js';
