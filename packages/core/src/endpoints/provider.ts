/**
 * Metrics Endpoint Provider
 *
 * Monitored-workload side of the relation. Every unit publishes where it
 * can be scraped; the leader publishes the application's topology, scrape
 * jobs and alert rules.
 */

import { ZodError } from 'zod';
import {
  ConfigurationError,
  RELATION_KEYS,
  createChildLogger,
  getConfig,
  hasRuleGroups,
  type SanitizedScrapeJob,
} from '@scrapelink/shared';
import {
  isRelationEvent,
  type HostEvent,
  type HostEventHandler,
  type LocalUnitContext,
  type RelationDataStore,
} from '@scrapelink/relation';
import { Topology } from '../topology/index.js';
import { sanitizeScrapeJobs } from '../jobs/index.js';
import { AlertRules, LocalRuleFileSource, type RuleFileSource } from '../rules/index.js';
import { validateRelationEndpoint } from './validation.js';
import { resolveAlertRulesDirOrRaw } from './rules-path.js';

export interface MetricsEndpointProviderOptions {
  store: RelationDataStore;
  unit: LocalUnitContext;
  relationName?: string;
  /** Scrape jobs in `scrape_config` form; the default job when empty */
  jobs?: readonly unknown[];
  /** Relative to the unit's source directory */
  alertRulesPath?: string;
  source?: RuleFileSource;
}

export class MetricsEndpointProvider implements HostEventHandler {
  readonly topology: Topology;
  readonly relationName: string;
  private readonly store: RelationDataStore;
  private readonly unit: LocalUnitContext;
  private readonly source: RuleFileSource;
  private jobs: SanitizedScrapeJob[] = [];
  private alertRulesPath: string;
  private logger = createChildLogger({ component: 'MetricsEndpointProvider' });

  constructor(options: MetricsEndpointProviderOptions) {
    const config = getConfig();
    this.relationName = options.relationName ?? config.relations.metricsEndpoint;
    validateRelationEndpoint(options.unit.endpoints, this.relationName, 'provides');

    this.store = options.store;
    this.unit = options.unit;
    this.source = options.source ?? new LocalRuleFileSource();
    this.topology = Topology.fromUnit(options.unit);
    this.alertRulesPath = options.alertRulesPath ?? config.alertRules.path;
    this.setJobs(options.jobs ?? []);
  }

  /**
   * Replace the published jobs. Fields outside the allow-list are dropped.
   */
  setJobs(jobs: readonly unknown[]): void {
    try {
      this.jobs = sanitizeScrapeJobs(jobs);
    } catch (error) {
      if (error instanceof ZodError) {
        throw new ConfigurationError('Invalid scrape job', {
          issues: error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        });
      }
      throw error;
    }
  }

  get scrapeJobs(): readonly SanitizedScrapeJob[] {
    return this.jobs;
  }

  setAlertRulesPath(path: string): void {
    this.alertRulesPath = path;
  }

  async handle(event: HostEvent): Promise<void> {
    if (isRelationEvent(event)) {
      if (event.relationName === this.relationName && (event.kind === 'joined' || event.kind === 'changed')) {
        await this.publish();
      }
      return;
    }

    if (event.kind === 'upgrade') {
      await this.publish();
    } else if (event.kind === 'workload-ready') {
      await this.publishUnitAddress();
    }
  }

  /**
   * Publish unit data everywhere and, on the leader, application data.
   */
  async publish(): Promise<void> {
    await this.publishUnitAddress();

    if (!this.unit.isLeader()) {
      return;
    }

    const rulesDir = await resolveAlertRulesDirOrRaw(
      this.unit.sourceDir,
      this.alertRulesPath,
      this.source,
      this.logger
    );
    // Group names must not change with the publishing unit
    const alertRules = new AlertRules(this.topology.applicationScope(), this.source);
    await alertRules.addPath(rulesDir, { recursive: true });
    const payload = alertRules.finalize();

    const metadata = JSON.stringify(this.topology.asDict());
    const jobs = JSON.stringify(this.jobs);

    for (const relation of await this.store.relations(this.relationName)) {
      await this.store.set(relation.id, this.unit.application, RELATION_KEYS.SCRAPE_METADATA, metadata);
      await this.store.set(relation.id, this.unit.application, RELATION_KEYS.SCRAPE_JOBS, jobs);
      if (hasRuleGroups(payload)) {
        await this.store.set(relation.id, this.unit.application, RELATION_KEYS.ALERT_RULES, JSON.stringify(payload));
      }
    }

    this.logger.debug(
      { relationName: this.relationName, jobs: this.jobs.length, groups: hasRuleGroups(payload) ? payload.groups.length : 0 },
      'Published scrape jobs'
    );
  }

  private async publishUnitAddress(): Promise<void> {
    for (const relation of await this.store.relations(this.relationName)) {
      const address = this.unit.bindAddress(relation);
      if (address) {
        await this.store.set(relation.id, this.unit.unit, RELATION_KEYS.UNIT_ADDRESS, address);
      }
      await this.store.set(relation.id, this.unit.unit, RELATION_KEYS.UNIT_NAME, this.unit.unit);
    }
  }
}
