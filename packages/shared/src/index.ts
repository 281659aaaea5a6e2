/**
 * @scrapelink/shared
 * Wire types, configuration, logging and errors shared across scrapelink
 */

export * from './types/index.js';
export * from './config/index.js';
export * from './logger/index.js';
export * from './errors/index.js';
export * from './json/index.js';
