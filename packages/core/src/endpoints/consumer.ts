/**
 * Metrics Endpoint Consumer
 *
 * Monitoring side of the relation: turns what every related provider
 * published into labeled scrape jobs and per-application rule files.
 */

import { EventEmitter } from 'eventemitter3';
import {
  RELATION_KEYS,
  TOPOLOGY_LABELS,
  alertRulesDocumentSchema,
  createChildLogger,
  getConfig,
  hasRuleGroups,
  logFragmentSkipped,
  scrapeJobSchema,
  type AlertRulesDocument,
  type ScrapeJob,
} from '@scrapelink/shared';
import {
  isRelationEvent,
  type HostEvent,
  type HostEventHandler,
  type LocalUnitContext,
  type RelationBucket,
  type RelationDataStore,
  type RelationRecord,
} from '@scrapelink/relation';
import { Topology } from '../topology/index.js';
import { labelJob, sanitizeScrapeJob, type UnitAddresses } from '../jobs/index.js';
import { createExpressionLabelerFromConfig, type ExpressionLabeler } from '../promql/index.js';
import { validateRelationEndpoint } from './validation.js';

export interface MetricsEndpointConsumerOptions {
  store: RelationDataStore;
  unit: LocalUnitContext;
  relationName?: string;
  labeler?: ExpressionLabeler;
}

export interface MetricsEndpointConsumerEvents {
  'targets:changed': (relationId: number) => void;
}

export class MetricsEndpointConsumer
  extends EventEmitter<MetricsEndpointConsumerEvents>
  implements HostEventHandler
{
  readonly relationName: string;
  private readonly store: RelationDataStore;
  private readonly labeler: ExpressionLabeler;
  private logger = createChildLogger({ component: 'MetricsEndpointConsumer' });

  constructor(options: MetricsEndpointConsumerOptions) {
    super();
    this.relationName = options.relationName ?? getConfig().relations.metricsEndpoint;
    validateRelationEndpoint(options.unit.endpoints, this.relationName, 'requires');

    this.store = options.store;
    this.labeler = options.labeler ?? createExpressionLabelerFromConfig();
  }

  async handle(event: HostEvent): Promise<void> {
    if (!isRelationEvent(event) || event.relationName !== this.relationName) {
      return;
    }
    if (event.kind === 'changed' || event.kind === 'departed') {
      this.emit('targets:changed', event.relationId);
    }
  }

  /**
   * Scrape jobs of every related provider that has units
   */
  async jobs(): Promise<ScrapeJob[]> {
    const jobs: ScrapeJob[] = [];
    for (const relation of await this.store.relations(this.relationName)) {
      if (relation.units.length === 0) {
        continue;
      }
      jobs.push(...(await this.relationJobs(relation)));
    }
    return jobs;
  }

  /**
   * Alert rules per provider application, keyed by its topology identifier
   */
  async alerts(): Promise<Record<string, AlertRulesDocument>> {
    const alerts: Record<string, AlertRulesDocument> = {};

    for (const relation of await this.store.relations(this.relationName)) {
      if (relation.units.length === 0) {
        continue;
      }

      const data = await this.store.bucket(relation.id, relation.app);
      const rules = this.decodeAlertRules(relation, data);
      if (!rules) {
        continue;
      }

      const topology = this.decodeTopology(relation, data);
      if (topology) {
        const labeled = await this.labeler.apply(rules);
        alerts[topology.applicationScope().identifier] = hasRuleGroups(labeled) ? labeled : rules;
        continue;
      }

      const identifier = identifierFromRules(rules);
      if (!identifier) {
        this.logger.error(
          { relationId: relation.id },
          'Alert rules were found but no usable group or identifier was present'
        );
        continue;
      }
      alerts[identifier] = rules;
    }

    return alerts;
  }

  private async relationJobs(relation: RelationRecord): Promise<ScrapeJob[]> {
    const data = await this.store.bucket(relation.id, relation.app);
    const published = this.parseJsonField(relation, data, RELATION_KEYS.SCRAPE_JOBS);
    if (published === undefined) {
      return [];
    }
    if (!Array.isArray(published)) {
      logFragmentSkipped(this.logger, 'scrape_jobs is not a list', {
        relationId: relation.id,
        app: relation.app,
      });
      return [];
    }
    if (published.length === 0) {
      return [];
    }

    const topology = this.decodeTopology(relation, data);
    if (!topology) {
      return published.flatMap((job: unknown) => {
        const parsed = scrapeJobSchema.safeParse(job);
        return parsed.success ? [parsed.data] : [];
      });
    }

    const hosts = await this.relationHosts(relation);
    const prefix = topology.scrapeIdentifier;
    const labeled: ScrapeJob[] = [];
    for (const job of published) {
      try {
        labeled.push(labelJob(sanitizeScrapeJob(job), prefix, hosts, topology));
      } catch (error) {
        logFragmentSkipped(this.logger, 'malformed scrape job', {
          relationId: relation.id,
          app: relation.app,
          error,
        });
      }
    }
    return labeled;
  }

  /**
   * unit name -> address, from what each provider unit published
   */
  private async relationHosts(relation: RelationRecord): Promise<UnitAddresses> {
    const hosts: Record<string, string> = {};
    for (const unit of relation.units) {
      const data = await this.store.bucket(relation.id, unit);
      const name = data[RELATION_KEYS.UNIT_NAME] || unit;
      const address = data[RELATION_KEYS.UNIT_ADDRESS] || data[RELATION_KEYS.LEGACY_UNIT_HOST];
      if (name && address) {
        hosts[name] = address;
      }
    }
    return hosts;
  }

  private decodeTopology(relation: RelationRecord, data: RelationBucket): Topology | null {
    const raw = data[RELATION_KEYS.SCRAPE_METADATA];
    if (!raw) {
      this.logger.debug({ relationId: relation.id }, 'Relation has no scrape_metadata');
      return null;
    }
    try {
      return Topology.fromRelationData(raw);
    } catch (error) {
      logFragmentSkipped(this.logger, 'malformed scrape_metadata', {
        relationId: relation.id,
        app: relation.app,
        error,
      });
      return null;
    }
  }

  private decodeAlertRules(relation: RelationRecord, data: RelationBucket): AlertRulesDocument | null {
    const decoded = this.parseJsonField(relation, data, RELATION_KEYS.ALERT_RULES);
    if (decoded === undefined || isEmptyObject(decoded)) {
      return null;
    }

    const parsed = alertRulesDocumentSchema.safeParse(decoded);
    if (!parsed.success) {
      logFragmentSkipped(this.logger, 'malformed alert rules', {
        relationId: relation.id,
        app: relation.app,
        error: parsed.error.message,
      });
      return null;
    }
    return parsed.data;
  }

  /**
   * Decoded value of one application data key; undefined when absent or
   * not valid JSON
   */
  private parseJsonField(relation: RelationRecord, data: RelationBucket, key: string): unknown {
    const raw = data[key];
    if (!raw) {
      return undefined;
    }
    try {
      return JSON.parse(raw);
    } catch (error) {
      logFragmentSkipped(this.logger, `${key} is not valid JSON`, { relationId: relation.id, app: relation.app, error });
      return undefined;
    }
  }
}

function isEmptyObject(value: unknown): boolean {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && Object.keys(value).length === 0;
}

/**
 * Identifier for rules that arrived without metadata: the topology labels
 * of the first labeled rule, else the first group name.
 */
export function identifierFromRules(rules: AlertRulesDocument): string | null {
  for (const group of rules.groups) {
    const labels = group.rules[0]?.labels;
    const model = labels?.[TOPOLOGY_LABELS.MODEL];
    const modelUuid = labels?.[TOPOLOGY_LABELS.MODEL_UUID];
    const application = labels?.[TOPOLOGY_LABELS.APPLICATION];
    if (model && modelUuid && application) {
      return `${model}_${modelUuid}_${application}`;
    }
  }
  return rules.groups[0]?.name ?? null;
}
