/**
 * Metrics Endpoint Aggregator
 *
 * Collects scrape targets and alert rules from applications that cannot
 * publish a full scrape job themselves, and merges them into one document
 * published on every monitoring relation. Each notification is about one
 * peer; only that peer's fragment is rebuilt and folded in by name.
 */

import { EventEmitter } from 'eventemitter3';
import { parse as parseYaml } from 'yaml';
import {
  RELATION_KEYS,
  createChildLogger,
  getConfig,
  hasRuleGroups,
  logFragmentSkipped,
  unitAlertRulesSchema,
  type AlertRule,
  type AlertRuleGroup,
  type LabeledScrapeJob,
  type RelabelConfig,
} from '@scrapelink/shared';
import {
  isRelationEvent,
  type HostEvent,
  type HostEventHandler,
  type LocalUnitContext,
  type RelationDataStore,
  type RelationEvent,
  type RelationRecord,
} from '@scrapelink/relation';
import { Topology } from '../topology/index.js';
import { buildAggregatorJob, type AggregatorTarget } from '../jobs/index.js';
import type { ExpressionLabeler } from '../promql/index.js';
import { AggregateDocument } from './aggregate-document.js';
import { PEER_STATES, peerTransitionValidator, type PeerState } from './transitions.js';

export const DEFAULT_TARGET_PORT = '80';

export interface AggregatorRelationNames {
  /** Monitoring side the aggregate is published on */
  prometheus: string;
  /** Applications publishing `hostname`/`port` per unit */
  scrapeTarget: string;
  /** Applications publishing `groups` per unit */
  alertRules: string;
}

export interface MetricsEndpointAggregatorOptions {
  store: RelationDataStore;
  unit: LocalUnitContext;
  relations?: Partial<AggregatorRelationNames>;
  relabelInstance?: boolean;
  /** Extra relabel rules appended to every collected job */
  relabelConfigs?: RelabelConfig[];
  /** Optional label matcher injection for collected rules */
  labeler?: ExpressionLabeler;
}

export interface PeerStateChange {
  relationName: string;
  relationId: number;
  app: string;
  from: PeerState;
  to: PeerState;
}

/**
 * Fragment events describe what was published; a non-leader, or a leader
 * with no monitoring relation, emits none of them.
 */
export interface MetricsEndpointAggregatorEvents {
  'job:merged': (job: LabeledScrapeJob) => void;
  'job:removed': (jobName: string) => void;
  'group:merged': (group: AlertRuleGroup) => void;
  'group:removed': (groupName: string) => void;
  'peer:state': (change: PeerStateChange) => void;
}

type FragmentKind = 'job' | 'group';

export class MetricsEndpointAggregator
  extends EventEmitter<MetricsEndpointAggregatorEvents>
  implements HostEventHandler
{
  private readonly store: RelationDataStore;
  private readonly unit: LocalUnitContext;
  private readonly relationNames: AggregatorRelationNames;
  private readonly relabelInstance: boolean;
  private readonly relabelConfigs: RelabelConfig[];
  private readonly labeler: ExpressionLabeler | undefined;
  private readonly peers = new Map<string, PeerState>();
  private logger = createChildLogger({ component: 'MetricsEndpointAggregator' });

  constructor(options: MetricsEndpointAggregatorOptions) {
    super();
    const config = getConfig();
    this.store = options.store;
    this.unit = options.unit;
    this.relationNames = { ...config.relations, ...options.relations };
    this.relabelInstance = options.relabelInstance ?? config.aggregator.relabelInstance;
    this.relabelConfigs = options.relabelConfigs ?? [];
    this.labeler = options.labeler;
  }

  /**
   * Current state of the peer on the given relation
   */
  peerState(relationName: string, relationId: number): PeerState {
    return this.peers.get(peerKey(relationName, relationId)) ?? PEER_STATES.ABSENT;
  }

  async handle(event: HostEvent): Promise<void> {
    if (!isRelationEvent(event)) {
      return;
    }

    const { prometheus, scrapeTarget, alertRules } = this.relationNames;
    switch (event.relationName) {
      case prometheus:
        if (event.kind === 'joined') {
          await this.resync(event.relationId);
        }
        return;
      case scrapeTarget:
        return this.handlePeerEvent(event, 'job');
      case alertRules:
        return this.handlePeerEvent(event, 'group');
      default:
        return;
    }
  }

  /**
   * Rebuild the whole aggregate from every peer and publish it on one
   * monitoring relation.
   */
  async resync(relationId: number): Promise<AggregateDocument> {
    const document = new AggregateDocument();

    for (const relation of await this.store.relations(this.relationNames.scrapeTarget)) {
      const job = await this.buildJob(relation);
      if (job) {
        document.upsertJob(job);
      }
    }
    for (const relation of await this.store.relations(this.relationNames.alertRules)) {
      const group = await this.buildGroup(relation);
      if (group) {
        document.upsertGroup(group);
      }
    }

    await this.publish(relationId, document);
    this.logger.info(
      { relationId, jobs: document.jobs.length, groups: document.groups.length },
      'Published full aggregate to monitoring relation'
    );
    return document;
  }

  // ===========================================
  // Peer notifications
  // ===========================================

  private async handlePeerEvent(event: RelationEvent, kind: FragmentKind): Promise<void> {
    switch (event.kind) {
      case 'joined':
        this.ensureJoined(event);
        return;
      case 'changed':
        return this.updatePeer(event, kind);
      case 'departed':
        return this.removeDepartedUnit(event, kind);
      case 'broken':
        return this.removePeer(event, kind);
    }
  }

  private async updatePeer(event: RelationEvent, kind: FragmentKind): Promise<void> {
    this.ensureJoined(event);

    const relation = await this.store.relation(event.relationName, event.relationId);
    if (!relation) {
      this.logger.warn({ relationId: event.relationId, relationName: event.relationName }, 'Relation not found');
      return;
    }

    if (kind === 'job') {
      const job = await this.buildJob(relation);
      if (!job) {
        this.logger.debug({ relationId: relation.id, app: relation.app }, 'No scrape targets published yet');
        return;
      }
      const published = await this.foldIntoMonitoring((document) => document.upsertJob(job));
      if (published.length > 0) {
        this.emit('job:merged', job);
      }
    } else {
      const group = await this.buildGroup(relation);
      if (!group) {
        this.logger.debug({ relationId: relation.id, app: relation.app }, 'No alert rules published yet');
        return;
      }
      const published = await this.foldIntoMonitoring((document) => document.upsertGroup(group));
      if (published.length > 0) {
        this.emit('group:merged', group);
      }
    }

    this.transition(event, PEER_STATES.ACTIVE);
  }

  private async removeDepartedUnit(event: RelationEvent, kind: FragmentKind): Promise<void> {
    const unit = event.unit;
    if (!unit) {
      this.logger.warn({ relationId: event.relationId }, 'Departed notification without a unit');
      return;
    }

    const name = this.fragmentName(event.app, kind);
    const fragments = kind === 'job' ? { job: name } : { group: name };
    const results = await this.foldIntoMonitoring((document) => {
      const removal = document.removeUnit(unit, fragments);
      return { change: kind === 'job' ? removal.job : removal.group, document };
    });

    const updated = results.find((result) => result.change === 'updated')?.document;
    const removed = results.some((result) => result.change === 'removed');
    if (kind === 'job') {
      const job = updated?.getJob(name);
      if (job) {
        this.emit('job:merged', job);
      }
      if (removed) {
        this.emit('job:removed', name);
      }
    } else {
      const group = updated?.getGroup(name);
      if (group) {
        this.emit('group:merged', group);
      }
      if (removed) {
        this.emit('group:removed', name);
      }
    }

    const relation = await this.store.relation(event.relationName, event.relationId);
    if (!relation || relation.units.length === 0) {
      this.transition(event, PEER_STATES.DEPARTED);
    }
  }

  private async removePeer(event: RelationEvent, kind: FragmentKind): Promise<void> {
    const name = this.fragmentName(event.app, kind);
    const results = await this.foldIntoMonitoring((document) =>
      kind === 'job' ? document.removeJob(name) : document.removeGroup(name)
    );

    if (results.some(Boolean)) {
      this.emit(kind === 'job' ? 'job:removed' : 'group:removed', name);
    }
    if (this.peerState(event.relationName, event.relationId) !== PEER_STATES.DEPARTED) {
      this.transition(event, PEER_STATES.DEPARTED);
    }
    // A broken relation id is never reused
    this.peers.delete(peerKey(event.relationName, event.relationId));
  }

  // ===========================================
  // Fragments
  // ===========================================

  private fragmentName(app: string, kind: FragmentKind): string {
    const topology = this.peerTopology(app);
    return kind === 'job' ? topology.scrapeIdentifier : topology.ruleGroupIdentifier;
  }

  private peerTopology(app: string, unit?: string): Topology {
    return Topology.aggregator({
      model: this.unit.model,
      modelUuid: this.unit.modelUuid,
      application: app,
      unit,
    });
  }

  private async buildJob(relation: RelationRecord): Promise<LabeledScrapeJob | null> {
    const targets: Record<string, AggregatorTarget> = {};
    for (const unit of relation.units) {
      const hostname = await this.store.get(relation.id, unit, RELATION_KEYS.TARGET_HOSTNAME);
      if (!hostname) {
        continue;
      }
      const port = (await this.store.get(relation.id, unit, RELATION_KEYS.TARGET_PORT)) || DEFAULT_TARGET_PORT;
      targets[unit] = { hostname, port };
    }

    if (Object.keys(targets).length === 0) {
      return null;
    }

    return buildAggregatorJob(targets, this.peerTopology(relation.app), {
      relabelInstance: this.relabelInstance,
      relabelConfigs: this.relabelConfigs,
    });
  }

  private async buildGroup(relation: RelationRecord): Promise<AlertRuleGroup | null> {
    const rules: AlertRule[] = [];
    for (const unit of [...relation.units].sort()) {
      const unitRules = await this.readUnitRules(relation, unit);
      const labels = this.peerTopology(relation.app, unit).labelSet();
      for (const rule of unitRules) {
        rules.push({ ...rule, labels: { ...rule.labels, ...labels } });
      }
    }

    if (rules.length === 0) {
      return null;
    }

    const group: AlertRuleGroup = { name: this.peerTopology(relation.app).ruleGroupIdentifier, rules };
    if (!this.labeler) {
      return group;
    }

    const labeled = await this.labeler.apply({ groups: [group] });
    return hasRuleGroups(labeled) ? (labeled.groups[0] ?? group) : group;
  }

  private async readUnitRules(relation: RelationRecord, unit: string): Promise<AlertRule[]> {
    const raw = await this.store.get(relation.id, unit, RELATION_KEYS.UNIT_RULE_GROUPS);
    if (!raw) {
      return [];
    }

    let decoded: unknown;
    try {
      decoded = parseYaml(raw);
    } catch (error) {
      logFragmentSkipped(this.logger, 'unit alert rules are not valid YAML', {
        relationId: relation.id,
        unit,
        error,
      });
      return [];
    }
    if (decoded === null || decoded === undefined) {
      return [];
    }

    const parsed = unitAlertRulesSchema.safeParse(decoded);
    if (!parsed.success) {
      logFragmentSkipped(this.logger, 'unit alert rules are not a list of rules', {
        relationId: relation.id,
        unit,
        error: parsed.error.message,
      });
      return [];
    }
    return parsed.data;
  }

  // ===========================================
  // Publishing
  // ===========================================

  /**
   * Apply one change to the document published on every monitoring
   * relation, starting from what is published there now. Returns one
   * result per relation written; none on a non-leader.
   */
  private async foldIntoMonitoring<T>(change: (document: AggregateDocument) => T): Promise<T[]> {
    const results: T[] = [];
    if (!this.unit.isLeader()) {
      this.logger.debug('Not the leader, leaving application data alone');
      return results;
    }
    for (const relation of await this.store.relations(this.relationNames.prometheus)) {
      const document = AggregateDocument.fromWire(await this.store.bucket(relation.id, this.unit.application));
      results.push(change(document));
      await this.publish(relation.id, document);
    }
    return results;
  }

  private async publish(relationId: number, document: AggregateDocument): Promise<void> {
    if (!this.unit.isLeader()) {
      this.logger.debug({ relationId }, 'Not the leader, leaving application data alone');
      return;
    }

    const wire = document.toWire();
    await this.store.set(relationId, this.unit.application, RELATION_KEYS.SCRAPE_JOBS, wire.scrape_jobs);
    await this.store.set(relationId, this.unit.application, RELATION_KEYS.ALERT_RULES, wire.alert_rules);
  }

  // ===========================================
  // Peer state
  // ===========================================

  private ensureJoined(event: RelationEvent): void {
    const state = this.peerState(event.relationName, event.relationId);
    if (state === PEER_STATES.ABSENT || state === PEER_STATES.DEPARTED) {
      this.transition(event, PEER_STATES.JOINED);
    }
  }

  private transition(event: RelationEvent, to: PeerState): boolean {
    const key = peerKey(event.relationName, event.relationId);
    const from = this.peers.get(key) ?? PEER_STATES.ABSENT;

    if (!peerTransitionValidator.isValidTransition(from, to)) {
      this.logger.warn(
        { relationId: event.relationId, relationName: event.relationName, app: event.app, from, to },
        'Ignoring invalid peer state transition'
      );
      return false;
    }

    this.peers.set(key, to);
    if (from !== to) {
      this.logger.debug(
        {
          relationId: event.relationId,
          app: event.app,
          from,
          to,
          condition: peerTransitionValidator.getTransitionCondition(from, to),
        },
        'Peer state changed'
      );
      this.emit('peer:state', {
        relationName: event.relationName,
        relationId: event.relationId,
        app: event.app,
        from,
        to,
      });
    }
    return true;
  }
}

function peerKey(relationName: string, relationId: number): string {
  return `${relationName}:${relationId}`;
}
