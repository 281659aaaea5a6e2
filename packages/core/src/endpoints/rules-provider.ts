/**
 * Prometheus Rules Provider
 *
 * Forwards a directory of rules that apply across every workload, so no
 * topology is attached to them.
 */

import { RELATION_KEYS, createChildLogger, getConfig, toSortedJson } from '@scrapelink/shared';
import {
  isRelationEvent,
  type HostEvent,
  type HostEventHandler,
  type LocalUnitContext,
  type RelationDataStore,
} from '@scrapelink/relation';
import { AlertRules, LocalRuleFileSource, type RuleFileSource } from '../rules/index.js';
import { resolveAlertRulesDirOrRaw } from './rules-path.js';

export interface PrometheusRulesProviderOptions {
  store: RelationDataStore;
  unit: LocalUnitContext;
  relationName?: string;
  /** Root of the rule files, relative to the unit's source directory */
  dirPath?: string;
  recursive?: boolean;
  source?: RuleFileSource;
}

export class PrometheusRulesProvider implements HostEventHandler {
  readonly relationName: string;
  private readonly store: RelationDataStore;
  private readonly unit: LocalUnitContext;
  private readonly dirPath: string;
  private readonly recursive: boolean;
  private readonly source: RuleFileSource;
  private logger = createChildLogger({ component: 'PrometheusRulesProvider' });

  constructor(options: PrometheusRulesProviderOptions) {
    const config = getConfig();
    this.relationName = options.relationName ?? config.relations.metricsEndpoint;
    this.store = options.store;
    this.unit = options.unit;
    this.dirPath = options.dirPath ?? config.alertRules.path;
    this.recursive = options.recursive ?? config.alertRules.recursive;
    this.source = options.source ?? new LocalRuleFileSource();
  }

  async handle(event: HostEvent): Promise<void> {
    if (isRelationEvent(event)) {
      if (event.relationName === this.relationName && (event.kind === 'joined' || event.kind === 'changed')) {
        await this.publish();
      }
      return;
    }

    if (event.kind === 'leader-elected' || event.kind === 'upgrade') {
      await this.publish();
    }
  }

  /**
   * Re-read the rule files and publish them on every relation. An empty
   * directory publishes `{}`, clearing what was there.
   */
  async publish(): Promise<void> {
    if (!this.unit.isLeader()) {
      return;
    }

    const dir = await resolveAlertRulesDirOrRaw(this.unit.sourceDir, this.dirPath, this.source, this.logger);
    const rules = new AlertRules(undefined, this.source);
    await rules.addPath(dir, { recursive: this.recursive });
    // Identical rules must publish identical bytes
    const payload = toSortedJson(rules.finalize());

    this.logger.info({ relationName: this.relationName, groups: rules.groupCount }, 'Updating relation data with rule files');
    for (const relation of await this.store.relations(this.relationName)) {
      await this.store.set(relation.id, this.unit.application, RELATION_KEYS.ALERT_RULES, payload);
    }
  }
}
