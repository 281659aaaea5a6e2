/**
 * AggregateDocument Tests
 */
import { describe, it, expect } from 'vitest';
import type { AlertRuleGroup, LabeledScrapeJob } from '@scrapelink/shared';
import { AggregateDocument } from './aggregate-document.js';

const unitGroup = (unit: string, address: string) => ({
  targets: [`${address}:9100`],
  labels: { juju_model: 'lma', juju_application: 'node', juju_unit: unit },
});

const job = (name: string, units: Array<[string, string]>): LabeledScrapeJob => ({
  job_name: name,
  static_configs: units.map(([unit, address]) => unitGroup(unit, address)),
  relabel_configs: [],
});

const group = (name: string, units: string[]): AlertRuleGroup => ({
  name,
  rules: units.map((unit) => ({ alert: 'NodeDown', expr: 'up == 0', labels: { juju_unit: unit } })),
});

describe('AggregateDocument', () => {
  describe('upsertJob() / upsertGroup()', () => {
    it('should replace a fragment with the same name in place', () => {
      const document = new AggregateDocument();
      document.upsertJob(job('a', [['node/0', '10.0.0.1']]));
      document.upsertJob(job('b', [['web/0', '10.0.0.9']]));
      document.upsertJob(job('a', [['node/1', '10.0.0.2']]));

      expect(document.jobs.map((entry) => entry.job_name)).toEqual(['a', 'b']);
      expect(document.getJob('a')?.static_configs).toEqual([unitGroup('node/1', '10.0.0.2')]);
    });

    it('should keep one group per name', () => {
      const document = new AggregateDocument();
      document.upsertGroup(group('g', ['node/0']));
      document.upsertGroup(group('g', ['node/0', 'node/1']));

      expect(document.groups).toHaveLength(1);
      expect(document.getGroup('g')?.rules).toHaveLength(2);
    });
  });

  describe('removeUnit()', () => {
    it('should keep the other units of the peer', () => {
      const document = new AggregateDocument();
      document.upsertJob(
        job('a', [
          ['node/0', '10.0.0.1'],
          ['node/1', '10.0.0.2'],
        ])
      );
      document.upsertGroup(group('g', ['node/0', 'node/1']));

      const result = document.removeUnit('node/0', { job: 'a', group: 'g' });

      expect(result).toEqual({ job: 'updated', group: 'updated' });
      expect(document.getJob('a')?.static_configs).toEqual([unitGroup('node/1', '10.0.0.2')]);
      expect(document.getGroup('g')?.rules.map((rule) => rule.labels?.juju_unit)).toEqual(['node/1']);
    });

    it('should drop a fragment once its last unit leaves', () => {
      const document = new AggregateDocument();
      document.upsertJob(job('a', [['node/0', '10.0.0.1']]));
      document.upsertGroup(group('g', ['node/0']));

      const result = document.removeUnit('node/0', { job: 'a', group: 'g' });

      expect(result).toEqual({ job: 'removed', group: 'removed' });
      expect(document.isEmpty).toBe(true);
    });

    it('should only touch the named fragments', () => {
      const document = new AggregateDocument();
      document.upsertJob(job('a', [['node/0', '10.0.0.1']]));
      document.upsertGroup(group('g', ['node/0']));

      const result = document.removeUnit('node/0', { job: 'a' });

      expect(result).toEqual({ job: 'removed', group: 'unchanged' });
      expect(document.getGroup('g')?.rules).toHaveLength(1);
    });

    it('should report unchanged for an unknown unit or fragment', () => {
      const document = new AggregateDocument();
      document.upsertJob(job('a', [['node/0', '10.0.0.1']]));

      expect(document.removeUnit('node/7', { job: 'a', group: 'missing' })).toEqual({
        job: 'unchanged',
        group: 'unchanged',
      });
    });
  });

  describe('toWire() / fromWire()', () => {
    it('should publish an empty aggregate as an empty list and an empty object', () => {
      expect(new AggregateDocument().toWire()).toEqual({ scrape_jobs: '[]', alert_rules: '{}' });
    });

    it('should serialize with sorted keys', () => {
      const document = new AggregateDocument();
      document.upsertGroup({ name: 'g', rules: [{ expr: 'up == 0', alert: 'NodeDown' }] });

      expect(document.toWire().alert_rules).toBe(
        '{"groups":[{"name":"g","rules":[{"alert":"NodeDown","expr":"up == 0"}]}]}'
      );
    });

    it('should read back what it published', () => {
      const document = new AggregateDocument();
      document.upsertJob(job('a', [['node/0', '10.0.0.1']]));
      document.upsertGroup(group('g', ['node/0']));

      const decoded = AggregateDocument.fromWire(document.toWire());

      expect(decoded.equals(document)).toBe(true);
      expect(decoded.toWire()).toEqual(document.toWire());
    });

    it('should treat a side that is not valid JSON as empty', () => {
      const decoded = AggregateDocument.fromWire({
        scrape_jobs: '[{"job_name": "a"',
        alert_rules: '{"groups":[{"name":"g","rules":[{"expr":"up"}]}]}',
      });

      expect(decoded.jobs).toEqual([]);
      expect(decoded.groups).toEqual([{ name: 'g', rules: [{ expr: 'up' }] }]);
    });

    it('should skip single entries that do not decode', () => {
      const decoded = AggregateDocument.fromWire({
        scrape_jobs: JSON.stringify([{ static_configs: [] }, { job_name: 'a' }]),
      });

      expect(decoded.jobs).toEqual([{ job_name: 'a', static_configs: [], relabel_configs: [] }]);
      expect(decoded.groups).toEqual([]);
    });
  });
});
