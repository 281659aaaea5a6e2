/**
 * Scrape job sanitization
 */

import {
  DEFAULT_JOB,
  LEGACY_JOB_KEY_ALIASES,
  scrapeJobSchema,
  type SanitizedScrapeJob,
  type ScrapeJob,
} from '@scrapelink/shared';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Rename legacy keys to their current spelling. The current spelling wins
 * when both are present.
 */
function applyLegacyAliases(job: Record<string, unknown>): Record<string, unknown> {
  const renamed: Record<string, unknown> = { ...job };
  for (const [legacy, current] of Object.entries(LEGACY_JOB_KEY_ALIASES)) {
    if (legacy in renamed) {
      if (!(current in renamed)) {
        renamed[current] = renamed[legacy];
      }
      delete renamed[legacy];
    }
  }
  return renamed;
}

/**
 * Restrict a job to the allow-listed fields, filling whatever it leaves out
 * from the default job. `undefined` and `{}` both yield the default.
 *
 * Throws a ZodError when an allowed field has the wrong type.
 */
export function sanitizeScrapeJob(job?: unknown): SanitizedScrapeJob {
  const defaults = structuredClone(DEFAULT_JOB);
  if (!isRecord(job)) {
    return defaults;
  }

  const allowed: ScrapeJob = scrapeJobSchema.parse(applyLegacyAliases(job));
  const sanitized: SanitizedScrapeJob = { ...defaults };
  for (const [key, value] of Object.entries(allowed)) {
    if (value !== undefined) {
      Object.assign(sanitized, { [key]: value });
    }
  }
  return sanitized;
}

export function sanitizeScrapeJobs(jobs: readonly unknown[]): SanitizedScrapeJob[] {
  return jobs.length === 0 ? [sanitizeScrapeJob()] : jobs.map((job) => sanitizeScrapeJob(job));
}
