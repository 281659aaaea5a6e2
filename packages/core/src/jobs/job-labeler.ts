/**
 * Job Labeler
 *
 * Turns the scrape jobs a peer published into jobs the monitoring side can
 * use as-is: names namespaced by the peer's topology, wildcard targets
 * expanded per unit, every target group labeled, and an `instance` label
 * derived from topology instead of the unit's network address.
 */

import {
  TOPOLOGY_LABELS,
  TargetFormatError,
  createLogger,
  logFragmentSkipped,
  type LabelSet,
  type LabeledScrapeJob,
  type RelabelConfig,
  type SanitizedScrapeJob,
  type ScrapeJob,
  type StaticConfig,
} from '@scrapelink/shared';
import type { Topology } from '../topology/index.js';
import { formatTarget, parseTarget } from './targets.js';

const logger = createLogger('JobLabeler');

/** unit name -> address */
export type UnitAddresses = Readonly<Record<string, string>>;

export interface LabelJobOptions {
  /** Called once per target that is not of the form host:port */
  onTargetRejected?: (target: string, error: TargetFormatError) => void;
}

export interface AggregatorTarget {
  hostname: string;
  port: string | number;
}

export interface AggregatorJobOptions {
  /** Append the topology-derived instance relabel rule (default true) */
  relabelInstance?: boolean;
  /** Extra relabel rules, after the instance rule */
  relabelConfigs?: RelabelConfig[];
  /** Job fields merged in last */
  updates?: Partial<ScrapeJob>;
}

export function jobName(prefix: string, suffix?: string): string {
  return suffix ? `${prefix}_${suffix}` : prefix;
}

/**
 * `instance` relabel rule over the topology labels, unit last when present.
 */
export function instanceRelabelConfig(withUnit: boolean): RelabelConfig {
  const sourceLabels: string[] = [TOPOLOGY_LABELS.MODEL, TOPOLOGY_LABELS.MODEL_UUID, TOPOLOGY_LABELS.APPLICATION];
  if (withUnit) {
    sourceLabels.push(TOPOLOGY_LABELS.UNIT);
  }
  return {
    source_labels: sourceLabels,
    separator: '_',
    target_label: 'instance',
    regex: '(.*)',
  };
}

function byUnitName<T>(entries: Array<[string, T]>): Array<[string, T]> {
  return entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Label one sanitized job published by a monitored peer.
 *
 * Fixed-host targets of a static config become one group with the
 * application's labels. Wildcard targets (`*:PORT`) become one group per
 * known unit, `address:port` for every wildcard port, with the unit's
 * labels. A static config with no targets at all gets one group per unit
 * targeting the bare address. User labels never override topology labels.
 */
export function labelJob(
  job: SanitizedScrapeJob,
  prefix: string,
  unitAddresses: UnitAddresses,
  topology: Topology,
  options: LabelJobOptions = {}
): LabeledScrapeJob {
  const applicationLabels = topology.labelSet('rule');
  const units = byUnitName(Object.entries(unitAddresses));
  const staticConfigs: StaticConfig[] = [];
  let perUnitGroups = false;

  for (const staticConfig of job.static_configs) {
    const userLabels: LabelSet = staticConfig.labels ?? {};
    const ports: string[] = [];
    const fixedTargets: string[] = [];

    for (const target of staticConfig.targets) {
      try {
        const parsed = parseTarget(target);
        if (parsed.wildcard) {
          ports.push(parsed.port);
        } else {
          fixedTargets.push(target);
        }
      } catch (error) {
        if (!(error instanceof TargetFormatError)) {
          throw error;
        }
        logFragmentSkipped(logger, 'malformed scrape target', { target, jobName: prefix, error });
        options.onTargetRejected?.(target, error);
      }
    }

    if (fixedTargets.length > 0) {
      staticConfigs.push({ targets: fixedTargets, labels: { ...userLabels, ...applicationLabels } });
    }

    if (ports.length === 0 && staticConfig.targets.length > 0) {
      continue;
    }

    for (const [unit, address] of units) {
      staticConfigs.push({
        targets: ports.length > 0 ? ports.map((port) => formatTarget(address, port)) : [address],
        labels: { ...userLabels, ...topology.withUnit(unit).labelSet('target') },
      });
      perUnitGroups = true;
    }
  }

  return {
    ...job,
    job_name: jobName(prefix, job.job_name),
    static_configs: staticConfigs,
    // Must stay last so user relabel rules run first
    relabel_configs: [...(job.relabel_configs ?? []), instanceRelabelConfig(perUnitGroups)],
  };
}

/**
 * Static job for everything one application exposes to an aggregator: one
 * group per unit. Labels carry the full model uuid; only the job name uses
 * the short form.
 */
export function buildAggregatorJob(
  targets: Readonly<Record<string, AggregatorTarget>>,
  topology: Topology,
  options: AggregatorJobOptions = {}
): LabeledScrapeJob {
  const staticConfigs: StaticConfig[] = byUnitName(Object.entries(targets)).map(([unit, target]) => ({
    targets: [formatTarget(target.hostname, target.port)],
    labels: {
      [TOPOLOGY_LABELS.MODEL]: topology.model,
      [TOPOLOGY_LABELS.MODEL_UUID]: topology.modelUuid,
      [TOPOLOGY_LABELS.APPLICATION]: topology.application,
      [TOPOLOGY_LABELS.UNIT]: unit,
      host: target.hostname,
    },
  }));

  const relabelConfigs: RelabelConfig[] = [
    ...(options.relabelInstance === false ? [] : [instanceRelabelConfig(true)]),
    ...(options.relabelConfigs ?? []),
  ];

  return {
    job_name: topology.applicationScope().scrapeIdentifier,
    static_configs: staticConfigs,
    relabel_configs: relabelConfigs,
    ...options.updates,
  };
}
