/**
 * Scrape job wire types
 *
 * Shapes follow the Prometheus `scrape_config` section, restricted to the
 * fields a peer is allowed to contribute over relation data.
 */

import { z } from 'zod';

export const labelSetSchema = z.record(z.coerce.string());

export type LabelSet = z.infer<typeof labelSetSchema>;

export const staticConfigSchema = z.object({
  targets: z.array(z.string()).default([]),
  labels: labelSetSchema.optional(),
});

export type StaticConfig = z.infer<typeof staticConfigSchema>;

// Relabel rules carry many optional knobs; unknown ones are kept as-is
export const relabelConfigSchema = z
  .object({
    source_labels: z.array(z.string()).optional(),
    separator: z.string().optional(),
    target_label: z.string().optional(),
    regex: z.string().optional(),
    replacement: z.string().optional(),
    action: z.string().optional(),
    modulus: z.number().optional(),
  })
  .passthrough();

export type RelabelConfig = z.infer<typeof relabelConfigSchema>;

/**
 * Fields a peer may set on a scrape job. Anything else is dropped.
 */
export const ALLOWED_JOB_KEYS = [
  'job_name',
  'metrics_path',
  'static_configs',
  'scrape_interval',
  'scrape_timeout',
  'proxy_url',
  'relabel_configs',
  'metrics_relabel_configs',
  'sample_limit',
  'label_limit',
  'label_name_length_limit',
  'label_value_length_limit',
] as const;

export type AllowedJobKey = (typeof ALLOWED_JOB_KEYS)[number];

// Older providers publish this misspelling of label_value_length_limit
export const LEGACY_JOB_KEY_ALIASES: Readonly<Record<string, AllowedJobKey>> = Object.freeze({
  label_value_lenght_limit: 'label_value_length_limit',
});

// z.object strips unknown keys, which is the allow-list
export const scrapeJobSchema = z.object({
  job_name: z.string().optional(),
  metrics_path: z.string().optional(),
  static_configs: z.array(staticConfigSchema).optional(),
  scrape_interval: z.string().optional(),
  scrape_timeout: z.string().optional(),
  proxy_url: z.string().optional(),
  relabel_configs: z.array(relabelConfigSchema).optional(),
  metrics_relabel_configs: z.array(relabelConfigSchema).optional(),
  sample_limit: z.number().int().nonnegative().optional(),
  label_limit: z.number().int().nonnegative().optional(),
  label_name_length_limit: z.number().int().nonnegative().optional(),
  label_value_length_limit: z.number().int().nonnegative().optional(),
});

export type ScrapeJob = z.infer<typeof scrapeJobSchema>;

/**
 * A job after sanitization: the default fills whatever the peer left out.
 */
export type SanitizedScrapeJob = ScrapeJob & {
  metrics_path: string;
  static_configs: StaticConfig[];
};

/**
 * A job ready to be handed to the monitoring side.
 */
export type LabeledScrapeJob = ScrapeJob & {
  job_name: string;
  static_configs: StaticConfig[];
  relabel_configs: RelabelConfig[];
};

export const DEFAULT_METRICS_PATH = '/metrics';

// Frozen at the top level only; callers clone before handing it out
export const DEFAULT_JOB: Readonly<SanitizedScrapeJob> = Object.freeze({
  metrics_path: DEFAULT_METRICS_PATH,
  static_configs: [{ targets: ['*:80'] }],
});

/**
 * A labeled job as read back from published relation data
 */
export const labeledScrapeJobSchema = scrapeJobSchema.extend({
  job_name: z.string().min(1),
  static_configs: z.array(staticConfigSchema).default([]),
  relabel_configs: z.array(relabelConfigSchema).default([]),
});
