/**
 * Wire types shared by every scrapelink package
 */

export * from './scrape.js';
export * from './alerts.js';
export * from './topology.js';
export * from './relation.js';
