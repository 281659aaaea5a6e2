/**
 * Topology Tests
 */
import { describe, it, expect } from 'vitest';
import { MalformedFragmentError } from '@scrapelink/shared';
import { Topology } from './topology.js';

const UUID = '12de4fae-06cc-4ceb-9089-567be09fec78';

describe('Topology', () => {
  const provider = Topology.provider({
    model: 'lma',
    modelUuid: UUID,
    application: 'api',
    unit: 'api/1',
    charmName: 'api-k8s',
  });

  describe('identifier', () => {
    it('should join present fields in fixed order and fold path separators', () => {
      expect(provider.identifier).toBe(`lma_${UUID}_api_api_1_api-k8s`);
    });

    it('should omit absent fields instead of leaving empty parts', () => {
      const topology = Topology.provider({ model: 'lma', modelUuid: UUID, application: 'api', unit: '' });

      expect(topology.identifier).toBe(`lma_${UUID}_api`);
    });

    it('should be stable across calls and equal instances', () => {
      const again = Topology.provider({
        model: 'lma',
        modelUuid: UUID,
        application: 'api',
        unit: 'api/1',
        charmName: 'api-k8s',
      });

      expect(provider.identifier).toBe(provider.identifier);
      expect(again.identifier).toBe(provider.identifier);
      expect(again.equals(provider)).toBe(true);
    });

    it('should not collide across distinct model/uuid/application/unit tuples', () => {
      const tuples: Array<[string, string, string, string | undefined]> = [
        ['lma', UUID, 'api', undefined],
        ['lma', UUID, 'api', 'api/0'],
        ['lma', UUID, 'api', 'api/1'],
        ['lma', UUID, 'web', 'web/0'],
        ['cos', UUID, 'api', 'api/0'],
        ['lma', '00000000-0000-4000-8000-000000000000', 'api', 'api/0'],
      ];

      const identifiers = tuples.map(
        ([model, modelUuid, application, unit]) =>
          Topology.provider({ model, modelUuid, application, unit }).identifier
      );

      expect(new Set(identifiers).size).toBe(tuples.length);
    });
  });

  describe('labelSet()', () => {
    it('should leave the unit out of rule labels', () => {
      expect(provider.labelSet('rule')).toEqual({
        juju_model: 'lma',
        juju_model_uuid: UUID,
        juju_application: 'api',
        juju_charm: 'api-k8s',
      });
    });

    it('should include the unit in target labels', () => {
      expect(provider.labelSet('target')).toEqual({
        juju_model: 'lma',
        juju_model_uuid: UUID,
        juju_application: 'api',
        juju_charm: 'api-k8s',
        juju_unit: 'api/1',
      });
    });

    it('should never emit empty labels for absent fields', () => {
      const topology = Topology.provider({ model: 'lma', modelUuid: UUID, application: 'api' });

      expect(Object.keys(topology.labelSet('target'))).toEqual([
        'juju_model',
        'juju_model_uuid',
        'juju_application',
      ]);
    });

    it('should memoize and freeze label sets', () => {
      const labels = provider.labelSet('rule');

      expect(provider.labelSet('rule')).toBe(labels);
      expect(Object.isFrozen(labels)).toBe(true);
    });

    it('should truncate the model uuid for the aggregator variant only', () => {
      const aggregator = Topology.aggregator({
        model: 'lma',
        modelUuid: UUID,
        application: 'node',
        unit: 'node/0',
      });

      expect(aggregator.labelSet()).toEqual({
        juju_model: 'lma',
        juju_model_uuid: '12de4fa',
        juju_application: 'node',
        juju_unit: 'node/0',
      });
      // identifier still carries the full uuid
      expect(aggregator.identifier).toBe(`lma_${UUID}_node_node_0`);
      expect(aggregator.shortIdentifier).toBe('lma_12de4fa_node');
    });
  });

  describe('names', () => {
    it('should derive the provider scrape prefix without the unit', () => {
      expect(provider.scrapeIdentifier).toBe(`juju_lma_${UUID}_api_api-k8s_prometheus_scrape`);
    });

    it('should derive aggregator job and group names from the short identity', () => {
      const aggregator = Topology.aggregator({ model: 'lma', modelUuid: UUID, application: 'node' });

      expect(aggregator.scrapeIdentifier).toBe('juju_lma_12de4fa_node_prometheus_scrape');
      expect(aggregator.ruleGroupIdentifier).toBe('juju_lma_12de4fa_node_alert_rules');
    });
  });

  describe('render()', () => {
    it('should substitute every placeholder with the rule label matchers', () => {
      const topology = Topology.provider({ model: 'lma', modelUuid: 'abc', application: 'api' });

      expect(topology.render('up{%%juju_topology%%} < 1 or absent(up{%%juju_topology%%})')).toBe(
        'up{juju_model="lma", juju_model_uuid="abc", juju_application="api"} < 1 or ' +
          'absent(up{juju_model="lma", juju_model_uuid="abc", juju_application="api"})'
      );
    });

    it('should leave templates without the placeholder untouched', () => {
      expect(provider.render('up < 1')).toBe('up < 1');
    });
  });

  describe('fromRelationData()', () => {
    it('should read scrape_metadata JSON and treat empty fields as absent', () => {
      const topology = Topology.fromRelationData(
        JSON.stringify({ model: 'lma', model_uuid: UUID, application: 'api', unit: '', charm_name: '' })
      );

      expect(topology.asDict()).toEqual({ model: 'lma', model_uuid: UUID, application: 'api' });
      expect(topology.variant).toBe('provider');
    });

    it('should round-trip through asDict()', () => {
      expect(Topology.fromRelationData(provider.asDict()).identifier).toBe(provider.identifier);
    });

    it('should reject metadata without required fields', () => {
      expect(() => Topology.fromRelationData({ model: 'lma', application: 'api' })).toThrow(
        MalformedFragmentError
      );
      expect(() => Topology.fromRelationData('{not json')).toThrow(MalformedFragmentError);
    });
  });
});
