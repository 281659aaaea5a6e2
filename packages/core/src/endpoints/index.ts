export * from './validation.js';
export * from './rules-path.js';
export * from './provider.js';
export * from './rules-provider.js';
export * from './consumer.js';
