export * from './transitions.js';
export * from './aggregate-document.js';
export * from './metrics-endpoint-aggregator.js';
