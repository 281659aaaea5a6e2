export * from './label-tool.js';
export * from './expression-labeler.js';
