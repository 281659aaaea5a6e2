/**
 * Configuration management for scrapelink
 */

import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'node:path';
import { DEFAULT_ALERT_RULES_RELATIVE_PATH, DEFAULT_RELATION_NAME } from '../types/relation.js';

// Load environment variables from the working directory, if present
dotenvConfig({ path: resolve(process.cwd(), '.env') });

// "false"/"0" must read as false, which z.coerce.boolean does not do
const booleanFromEnv = z
  .union([z.boolean(), z.string()])
  .transform((value) => (typeof value === 'boolean' ? value : !['false', '0', 'no', ''].includes(value.toLowerCase())));

// Configuration schema
const configSchema = z.object({
  // Application
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

  // Relation endpoint names
  relations: z.object({
    metricsEndpoint: z.string().min(1).default(DEFAULT_RELATION_NAME),
    prometheus: z.string().min(1).default('prometheus'),
    scrapeTarget: z.string().min(1).default('prometheus-target'),
    alertRules: z.string().min(1).default('prometheus-rules'),
  }),

  // Alert rule files shipped with the workload
  alertRules: z.object({
    path: z.string().min(1).default(DEFAULT_ALERT_RULES_RELATIVE_PATH),
    recursive: booleanFromEnv.default(true),
  }),

  // External label-matcher tool (promql-transform)
  labelTool: z.object({
    /** Explicit path to the tool; wins over resourceDir */
    path: z.string().optional(),
    /** Directory holding per-architecture builds named promql-transform-<arch> */
    resourceDir: z.string().optional(),
    timeoutMs: z.coerce.number().int().positive().default(5000),
  }),

  // Aggregator behaviour
  aggregator: z.object({
    relabelInstance: booleanFromEnv.default(true),
  }),
});

export type Config = z.infer<typeof configSchema>;

// Parse and validate configuration
function loadConfig(): Config {
  const rawConfig = {
    nodeEnv: process.env.NODE_ENV,
    logLevel: process.env.LOG_LEVEL,

    relations: {
      metricsEndpoint: process.env.METRICS_RELATION_NAME,
      prometheus: process.env.AGGREGATOR_PROMETHEUS_RELATION,
      scrapeTarget: process.env.AGGREGATOR_TARGET_RELATION,
      alertRules: process.env.AGGREGATOR_RULES_RELATION,
    },

    alertRules: {
      path: process.env.ALERT_RULES_PATH,
      recursive: process.env.ALERT_RULES_RECURSIVE,
    },

    labelTool: {
      path: process.env.PROMQL_TRANSFORM_PATH,
      resourceDir: process.env.PROMQL_TRANSFORM_DIR,
      timeoutMs: process.env.PROMQL_TRANSFORM_TIMEOUT_MS,
    },

    aggregator: {
      relabelInstance: process.env.AGGREGATOR_RELABEL_INSTANCE,
    },
  };

  return configSchema.parse(rawConfig);
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

// For testing - reset config
export function resetConfig(): void {
  configInstance = null;
}
