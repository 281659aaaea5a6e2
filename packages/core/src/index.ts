/**
 * @scrapelink/core
 * Topology labeling, rule aggregation and scrape config merging
 */

// Topology
export * from './topology/index.js';

// Alert rule files
export * from './rules/index.js';

// Label matcher injection
export * from './promql/index.js';

// Scrape job labeling
export * from './jobs/index.js';

// Aggregate merge engine
export * from './aggregator/index.js';

// Relation endpoints
export * from './endpoints/index.js';
