/**
 * Aggregate Document
 *
 * The merged scrape jobs and alert rule groups an aggregator publishes
 * toward the monitoring side, keyed by name so that a fragment is replaced
 * in place instead of appended twice.
 */

import {
  RELATION_KEYS,
  TOPOLOGY_LABELS,
  alertRulesDocumentSchema,
  createLogger,
  labeledScrapeJobSchema,
  logFragmentSkipped,
  toSortedJson,
  type AlertRuleGroup,
  type AlertRulesPayload,
  type LabeledScrapeJob,
} from '@scrapelink/shared';

const logger = createLogger('AggregateDocument');

export type AggregateWire = {
  [RELATION_KEYS.SCRAPE_JOBS]: string;
  [RELATION_KEYS.ALERT_RULES]: string;
};

export type FragmentChange = 'unchanged' | 'updated' | 'removed';

export interface UnitRemoval {
  job: FragmentChange;
  group: FragmentChange;
}

export class AggregateDocument {
  private readonly jobMap = new Map<string, LabeledScrapeJob>();
  private readonly groupMap = new Map<string, AlertRuleGroup>();

  get jobs(): LabeledScrapeJob[] {
    return [...this.jobMap.values()];
  }

  get groups(): AlertRuleGroup[] {
    return [...this.groupMap.values()];
  }

  get isEmpty(): boolean {
    return this.jobMap.size === 0 && this.groupMap.size === 0;
  }

  getJob(name: string): LabeledScrapeJob | undefined {
    return this.jobMap.get(name);
  }

  getGroup(name: string): AlertRuleGroup | undefined {
    return this.groupMap.get(name);
  }

  upsertJob(job: LabeledScrapeJob): void {
    this.jobMap.set(job.job_name, job);
  }

  upsertGroup(group: AlertRuleGroup): void {
    this.groupMap.set(group.name, group);
  }

  removeJob(name: string): boolean {
    return this.jobMap.delete(name);
  }

  removeGroup(name: string): boolean {
    return this.groupMap.delete(name);
  }

  /**
   * Drop what belongs to one unit: its static config groups from the named
   * job and its rules from the named group. A fragment left empty is
   * dropped.
   */
  removeUnit(unit: string, fragments: { job?: string; group?: string }): UnitRemoval {
    return {
      job: fragments.job === undefined ? 'unchanged' : this.removeUnitFromJob(fragments.job, unit),
      group: fragments.group === undefined ? 'unchanged' : this.removeUnitFromGroup(fragments.group, unit),
    };
  }

  toWire(): AggregateWire {
    const groups = this.groups;
    const alertRules: AlertRulesPayload = groups.length > 0 ? { groups } : {};
    return {
      [RELATION_KEYS.SCRAPE_JOBS]: toSortedJson(this.jobs),
      [RELATION_KEYS.ALERT_RULES]: toSortedJson(alertRules),
    };
  }

  equals(other: AggregateDocument): boolean {
    const mine = this.toWire();
    const theirs = other.toWire();
    return (
      mine[RELATION_KEYS.SCRAPE_JOBS] === theirs[RELATION_KEYS.SCRAPE_JOBS] &&
      mine[RELATION_KEYS.ALERT_RULES] === theirs[RELATION_KEYS.ALERT_RULES]
    );
  }

  /**
   * Decode previously published data. A side that does not decode is
   * treated as empty; single entries that do not decode are skipped.
   */
  static fromWire(data: Readonly<Partial<Record<string, string>>>): AggregateDocument {
    const document = new AggregateDocument();

    for (const job of decodeJobs(data[RELATION_KEYS.SCRAPE_JOBS])) {
      document.upsertJob(job);
    }
    for (const group of decodeGroups(data[RELATION_KEYS.ALERT_RULES])) {
      document.upsertGroup(group);
    }
    return document;
  }

  private removeUnitFromJob(name: string, unit: string): FragmentChange {
    const job = this.jobMap.get(name);
    if (!job) {
      return 'unchanged';
    }

    const kept = job.static_configs.filter((config) => config.labels?.[TOPOLOGY_LABELS.UNIT] !== unit);
    if (kept.length === job.static_configs.length) {
      return 'unchanged';
    }
    if (kept.length === 0) {
      this.jobMap.delete(name);
      return 'removed';
    }
    this.jobMap.set(name, { ...job, static_configs: kept });
    return 'updated';
  }

  private removeUnitFromGroup(name: string, unit: string): FragmentChange {
    const group = this.groupMap.get(name);
    if (!group) {
      return 'unchanged';
    }

    const kept = group.rules.filter((rule) => rule.labels?.[TOPOLOGY_LABELS.UNIT] !== unit);
    if (kept.length === group.rules.length) {
      return 'unchanged';
    }
    if (kept.length === 0) {
      this.groupMap.delete(name);
      return 'removed';
    }
    this.groupMap.set(name, { ...group, rules: kept });
    return 'updated';
  }
}

function parseJson(raw: string | undefined, key: string): unknown {
  if (!raw) {
    return undefined;
  }
  try {
    return JSON.parse(raw);
  } catch (error) {
    logFragmentSkipped(logger, `${key} is not valid JSON`, { key, error });
    return undefined;
  }
}

function decodeJobs(raw: string | undefined): LabeledScrapeJob[] {
  const decoded = parseJson(raw, RELATION_KEYS.SCRAPE_JOBS);
  if (decoded === undefined) {
    return [];
  }
  if (!Array.isArray(decoded)) {
    logFragmentSkipped(logger, 'scrape_jobs is not a list', { key: RELATION_KEYS.SCRAPE_JOBS });
    return [];
  }

  const jobs: LabeledScrapeJob[] = [];
  for (const entry of decoded) {
    const parsed = labeledScrapeJobSchema.safeParse(entry);
    if (parsed.success) {
      jobs.push(parsed.data);
    } else {
      logFragmentSkipped(logger, 'malformed scrape job', { error: parsed.error.message });
    }
  }
  return jobs;
}

function decodeGroups(raw: string | undefined): AlertRuleGroup[] {
  const decoded = parseJson(raw, RELATION_KEYS.ALERT_RULES);
  if (decoded === undefined || (typeof decoded === 'object' && decoded !== null && !('groups' in decoded))) {
    return [];
  }

  const parsed = alertRulesDocumentSchema.safeParse(decoded);
  if (!parsed.success) {
    logFragmentSkipped(logger, 'malformed alert rules', { error: parsed.error.message });
    return [];
  }
  return parsed.data.groups;
}
