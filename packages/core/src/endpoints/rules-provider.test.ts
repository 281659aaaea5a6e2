/**
 * PrometheusRulesProvider Tests
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { InMemoryRelationStore, StaticLocalUnit } from '@scrapelink/relation';
import { PrometheusRulesProvider } from './rules-provider.js';

describe('PrometheusRulesProvider', () => {
  let root: string;
  let store: InMemoryRelationStore;
  let unit: StaticLocalUnit;
  let provider: PrometheusRulesProvider;
  let relationId: number;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'rules-provider-'));
    await mkdir(join(root, 'rules'));
    store = new InMemoryRelationStore();
    unit = new StaticLocalUnit({
      model: 'lma',
      modelUuid: 'abcd1234-0000',
      application: 'cos-config',
      unit: 'cos-config/0',
      charmName: 'cos-config',
      sourceDir: root,
      leader: true,
    });
    provider = new PrometheusRulesProvider({ store, unit, relationName: 'metrics-endpoint', dirPath: 'rules' });
    relationId = store.addRelation('metrics-endpoint', 'prom', ['prom/0']).id;
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should publish the rule files as sorted JSON without topology', async () => {
    await writeFile(join(root, 'rules', 'up.rule'), 'expr: up == 0\nalert: TargetDown\n');

    await provider.handle({ kind: 'joined', relationName: 'metrics-endpoint', relationId, app: 'prom' });

    expect(await store.get(relationId, 'cos-config', 'alert_rules')).toBe(
      '{"groups":[{"name":"up_alerts","rules":[{"alert":"TargetDown","expr":"up == 0","labels":{}}]}]}'
    );
  });

  it('should publish an empty object when there are no rules', async () => {
    await provider.handle({ kind: 'leader-elected' });

    expect(await store.get(relationId, 'cos-config', 'alert_rules')).toBe('{}');
  });

  it('should publish nothing from a non-leader', async () => {
    unit.setLeader(false);
    await writeFile(join(root, 'rules', 'up.rule'), 'alert: TargetDown\nexpr: up == 0\n');

    await provider.publish();

    expect(await store.bucket(relationId, 'cos-config')).toEqual({});
  });

  it('should ignore events on other relations', async () => {
    await provider.handle({ kind: 'changed', relationName: 'ingress', relationId, app: 'prom' });

    expect(await store.bucket(relationId, 'cos-config')).toEqual({});
  });
});
