/**
 * MetricsEndpointAggregator Tests
 */
import { describe, it, expect, beforeEach, vi } from 'vitest';
import { InMemoryRelationStore, StaticLocalUnit, type RelationEvent } from '@scrapelink/relation';
import { AggregateDocument } from './aggregate-document.js';
import { MetricsEndpointAggregator, type PeerStateChange } from './metrics-endpoint-aggregator.js';
import { ExpressionLabeler } from '../promql/index.js';

const JOB_NAME = 'juju_lma_12de4fa_node_prometheus_scrape';
const GROUP_NAME = 'juju_lma_12de4fa_node_alert_rules';

const NODE_RULES = `- alert: NodeDown
  expr: up == 0
  labels:
    severity: critical
`;

const targetLabels = (unit: string, host: string) => ({
  juju_model: 'lma',
  juju_model_uuid: '12de4fae-06cc',
  juju_application: 'node',
  juju_unit: unit,
  host,
});

describe('MetricsEndpointAggregator', () => {
  let store: InMemoryRelationStore;
  let unit: StaticLocalUnit;
  let aggregator: MetricsEndpointAggregator;
  let prometheusId: number;

  const published = async (relationId = prometheusId) =>
    AggregateDocument.fromWire(await store.bucket(relationId, 'agg'));

  const targetEvent = (kind: RelationEvent['kind'], relationId: number, unitName?: string): RelationEvent => ({
    kind,
    relationName: 'prometheus-target',
    relationId,
    app: 'node',
    unit: unitName,
  });

  const addTargets = async () => {
    const relation = store.addRelation('prometheus-target', 'node', ['node/0', 'node/1']);
    await store.set(relation.id, 'node/0', 'hostname', '10.1.0.1');
    await store.set(relation.id, 'node/0', 'port', '9100');
    await store.set(relation.id, 'node/1', 'hostname', '10.1.0.2');
    return relation.id;
  };

  beforeEach(() => {
    store = new InMemoryRelationStore();
    unit = new StaticLocalUnit({
      model: 'lma',
      modelUuid: '12de4fae-06cc',
      application: 'agg',
      unit: 'agg/0',
      charmName: 'aggregator',
      leader: true,
    });
    aggregator = new MetricsEndpointAggregator({
      store,
      unit,
      relations: { prometheus: 'prometheus', scrapeTarget: 'prometheus-target', alertRules: 'prometheus-rules' },
      relabelInstance: true,
    });
    prometheusId = store.addRelation('prometheus', 'prom', ['prom/0']).id;
  });

  describe('scrape targets', () => {
    it('should fold a peer job into the monitoring relation', async () => {
      const relationId = await addTargets();
      const merged = vi.fn();
      aggregator.on('job:merged', merged);

      await aggregator.handle(targetEvent('changed', relationId, 'node/0'));

      const document = await published();
      expect(document.jobs).toEqual([
        {
          job_name: JOB_NAME,
          static_configs: [
            { targets: ['10.1.0.1:9100'], labels: targetLabels('node/0', '10.1.0.1') },
            { targets: ['10.1.0.2:80'], labels: targetLabels('node/1', '10.1.0.2') },
          ],
          relabel_configs: [
            {
              source_labels: ['juju_model', 'juju_model_uuid', 'juju_application', 'juju_unit'],
              separator: '_',
              target_label: 'instance',
              regex: '(.*)',
            },
          ],
        },
      ]);
      expect(merged).toHaveBeenCalledTimes(1);
      expect(aggregator.peerState('prometheus-target', relationId)).toBe('active');
    });

    it('should publish byte-identical data when the same change is handled twice', async () => {
      const relationId = await addTargets();

      await aggregator.handle(targetEvent('changed', relationId, 'node/0'));
      const first = await store.bucket(prometheusId, 'agg');
      await aggregator.handle(targetEvent('changed', relationId, 'node/1'));
      const second = await store.bucket(prometheusId, 'agg');

      expect(second).toEqual(first);
      expect((await published()).jobs).toHaveLength(1);
    });

    it('should wait in joined until a target is published', async () => {
      const relation = store.addRelation('prometheus-target', 'node', ['node/0']);

      await aggregator.handle(targetEvent('joined', relation.id, 'node/0'));
      await aggregator.handle(targetEvent('changed', relation.id, 'node/0'));

      expect(await store.bucket(prometheusId, 'agg')).toEqual({});
      expect(aggregator.peerState('prometheus-target', relation.id)).toBe('joined');
    });

    it('should keep the remaining units when one departs and drop the job with the last', async () => {
      const relationId = await addTargets();
      const removed = vi.fn();
      aggregator.on('job:removed', removed);
      await aggregator.handle(targetEvent('changed', relationId, 'node/0'));

      store.removeUnit(relationId, 'node/0');
      await aggregator.handle(targetEvent('departed', relationId, 'node/0'));

      expect((await published()).getJob(JOB_NAME)?.static_configs).toEqual([
        { targets: ['10.1.0.2:80'], labels: targetLabels('node/1', '10.1.0.2') },
      ]);
      expect(aggregator.peerState('prometheus-target', relationId)).toBe('active');

      store.removeUnit(relationId, 'node/1');
      await aggregator.handle(targetEvent('departed', relationId, 'node/1'));

      expect(await store.get(prometheusId, 'agg', 'scrape_jobs')).toBe('[]');
      expect(removed).toHaveBeenCalledWith(JOB_NAME);
      expect(aggregator.peerState('prometheus-target', relationId)).toBe('departed');
    });

    it('should drop the job and forget the peer when the relation is broken', async () => {
      const relationId = await addTargets();
      const changes: PeerStateChange[] = [];
      aggregator.on('peer:state', (change) => changes.push(change));
      await aggregator.handle(targetEvent('changed', relationId, 'node/0'));

      await aggregator.handle(targetEvent('broken', relationId));

      expect((await published()).jobs).toEqual([]);
      expect(changes.at(-1)?.to).toBe('departed');
      expect(aggregator.peerState('prometheus-target', relationId)).toBe('absent');
    });

    it('should walk the peer through joined and active in order', async () => {
      const relationId = await addTargets();
      const changes: PeerStateChange[] = [];
      aggregator.on('peer:state', (change) => changes.push(change));

      await aggregator.handle(targetEvent('changed', relationId, 'node/0'));
      await aggregator.handle(targetEvent('broken', relationId));
      await aggregator.handle(targetEvent('joined', relationId, 'node/0'));

      expect(changes.map((change) => `${change.from}->${change.to}`)).toEqual([
        'absent->joined',
        'joined->active',
        'active->departed',
        'absent->joined',
      ]);
    });

    it('should ignore a departure from a peer it never saw', async () => {
      const relation = store.addRelation('prometheus-target', 'node');

      await aggregator.handle(targetEvent('departed', relation.id, 'node/0'));

      expect(aggregator.peerState('prometheus-target', relation.id)).toBe('absent');
    });

    it('should leave application data alone on a non-leader', async () => {
      unit.setLeader(false);
      const relationId = await addTargets();
      const merged = vi.fn();
      const removed = vi.fn();
      aggregator.on('job:merged', merged);
      aggregator.on('job:removed', removed);

      await aggregator.handle(targetEvent('changed', relationId, 'node/0'));
      await aggregator.handle(targetEvent('broken', relationId));

      expect(await store.bucket(prometheusId, 'agg')).toEqual({});
      expect(merged).not.toHaveBeenCalled();
      expect(removed).not.toHaveBeenCalled();
    });
  });

  describe('alert rules', () => {
    const rulesEvent = (kind: RelationEvent['kind'], relationId: number, unitName?: string): RelationEvent => ({
      kind,
      relationName: 'prometheus-rules',
      relationId,
      app: 'node',
      unit: unitName,
    });

    it('should label each unit rule and skip units with malformed rules', async () => {
      const relation = store.addRelation('prometheus-rules', 'node', ['node/0', 'node/1']);
      await store.set(relation.id, 'node/0', 'groups', NODE_RULES);
      await store.set(relation.id, 'node/1', 'groups', 'just a string');

      await aggregator.handle(rulesEvent('changed', relation.id, 'node/0'));

      expect((await published()).groups).toEqual([
        {
          name: GROUP_NAME,
          rules: [
            {
              alert: 'NodeDown',
              expr: 'up == 0',
              labels: {
                severity: 'critical',
                juju_model: 'lma',
                juju_model_uuid: '12de4fa',
                juju_application: 'node',
                juju_unit: 'node/0',
              },
            },
          ],
        },
      ]);
    });

    it('should remove only the departing unit rules', async () => {
      const relation = store.addRelation('prometheus-rules', 'node', ['node/0', 'node/1']);
      await store.set(relation.id, 'node/0', 'groups', NODE_RULES);
      await store.set(relation.id, 'node/1', 'groups', NODE_RULES);
      await aggregator.handle(rulesEvent('changed', relation.id, 'node/0'));

      store.removeUnit(relation.id, 'node/1');
      await aggregator.handle(rulesEvent('departed', relation.id, 'node/1'));

      const rules = (await published()).getGroup(GROUP_NAME)?.rules ?? [];
      expect(rules.map((rule) => rule.labels?.juju_unit)).toEqual(['node/0']);
    });

    it('should pass collected rules through the expression labeler', async () => {
      aggregator = new MetricsEndpointAggregator({
        store,
        unit,
        relations: { prometheus: 'prometheus', scrapeTarget: 'prometheus-target', alertRules: 'prometheus-rules' },
        labeler: new ExpressionLabeler(
          { locate: async () => '/opt/tools/promql-transform-amd64' },
          { execute: async (_path, args) => `${args[args.length - 1] ?? ''} labeled` }
        ),
      });
      const relation = store.addRelation('prometheus-rules', 'node', ['node/0']);
      await store.set(relation.id, 'node/0', 'groups', NODE_RULES);

      await aggregator.handle(rulesEvent('changed', relation.id, 'node/0'));

      expect((await published()).getGroup(GROUP_NAME)?.rules[0]?.expr).toBe('up == 0 labeled');
    });
  });

  describe('monitoring relation joined', () => {
    it('should rebuild the whole aggregate for the new relation', async () => {
      await addTargets();
      const rules = store.addRelation('prometheus-rules', 'node', ['node/0']);
      await store.set(rules.id, 'node/0', 'groups', NODE_RULES);
      const second = store.addRelation('prometheus', 'prom2', ['prom2/0']);
      await store.set(
        second.id,
        'agg',
        'scrape_jobs',
        JSON.stringify([{ job_name: 'ghost', static_configs: [], relabel_configs: [] }])
      );

      await aggregator.handle({ kind: 'joined', relationName: 'prometheus', relationId: second.id, app: 'prom2' });

      const document = await published(second.id);
      expect(document.jobs.map((job) => job.job_name)).toEqual([JOB_NAME]);
      expect(document.groups.map((group) => group.name)).toEqual([GROUP_NAME]);
    });

    it('should ignore lifecycle notifications', async () => {
      await expect(aggregator.handle({ kind: 'leader-elected' })).resolves.toBeUndefined();
      expect(await store.bucket(prometheusId, 'agg')).toEqual({});
    });
  });
});
