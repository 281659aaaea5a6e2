/**
 * Topology
 *
 * Stable identity of a publishing unit/application/model. Used to name
 * scrape jobs and alert rule groups so that fragments from peers that never
 * coordinate cannot collide, and to label them so they can be traced back
 * to where they came from.
 *
 * Two variants exist, built only through the named builders:
 * - provider: what a monitored workload publishes about itself
 * - aggregator: what an aggregator stamps on targets it collects. Its label
 *   set carries only the first 7 characters of the model uuid, so it is
 *   weaker than the provider identity; keep the two apart.
 */

import {
  AGGREGATOR_MODEL_UUID_LENGTH,
  MalformedFragmentError,
  TOPOLOGY_LABELS,
  TOPOLOGY_TEMPLATE_STUB,
  scrapeMetadataSchema,
  type LabelSet,
  type ScrapeMetadata,
  type TopologyFields,
} from '@scrapelink/shared';

export type TopologyVariant = 'provider' | 'aggregator';

/**
 * - rule: scopes alert evaluation to the application (no unit for providers)
 * - target: labels one scrape target group (unit included when known)
 */
export type LabelScope = 'rule' | 'target';

export class Topology {
  private readonly labelCache = new Map<LabelScope, Readonly<LabelSet>>();

  private constructor(
    readonly variant: TopologyVariant,
    readonly model: string,
    readonly modelUuid: string,
    readonly application: string,
    readonly unit?: string,
    readonly charmName?: string
  ) {}

  // ===========================================
  // Builders
  // ===========================================

  static provider(fields: TopologyFields): Topology {
    const normalized = normalizeFields(fields);
    return new Topology(
      'provider',
      normalized.model,
      normalized.modelUuid,
      normalized.application,
      normalized.unit,
      normalized.charmName
    );
  }

  static aggregator(fields: Omit<TopologyFields, 'charmName'>): Topology {
    const normalized = normalizeFields(fields);
    return new Topology(
      'aggregator',
      normalized.model,
      normalized.modelUuid,
      normalized.application,
      normalized.unit
    );
  }

  /**
   * Build a provider topology from `scrape_metadata`, either the raw JSON
   * string or an already decoded object.
   */
  static fromRelationData(data: unknown): Topology {
    let decoded = data;
    if (typeof data === 'string') {
      try {
        decoded = JSON.parse(data);
      } catch (error) {
        throw new MalformedFragmentError('scrape_metadata is not valid JSON', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    const parsed = scrapeMetadataSchema.safeParse(decoded);
    if (!parsed.success) {
      throw new MalformedFragmentError('scrape_metadata is missing topology fields', {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }

    return Topology.provider({
      model: parsed.data.model,
      modelUuid: parsed.data.model_uuid,
      application: parsed.data.application,
      unit: parsed.data.unit,
      charmName: parsed.data.charm_name,
    });
  }

  static fromUnit(context: {
    model: string;
    modelUuid: string;
    application: string;
    unit: string;
    charmName: string;
  }): Topology {
    return Topology.provider(context);
  }

  // ===========================================
  // Derived values
  // ===========================================

  /**
   * Every present field, in fixed order, joined with `_`. Path separators
   * (unit names contain `/`) are folded into `_` as well.
   */
  get identifier(): string {
    return joinIdentifier([this.model, this.modelUuid, this.application, this.unit, this.charmName]);
  }

  /** model, truncated uuid and application only */
  get shortIdentifier(): string {
    return joinIdentifier([this.model, this.shortModelUuid, this.application]);
  }

  get shortModelUuid(): string {
    return this.modelUuid.slice(0, AGGREGATOR_MODEL_UUID_LENGTH);
  }

  /**
   * Prefix for scrape job names. Never includes the unit, so the name does
   * not change when a different unit publishes.
   */
  get scrapeIdentifier(): string {
    const stem = this.variant === 'aggregator' ? this.shortIdentifier : this.applicationScope().identifier;
    return `juju_${stem}_prometheus_scrape`;
  }

  /** Name of the single rule group an aggregator publishes per application */
  get ruleGroupIdentifier(): string {
    return `juju_${this.shortIdentifier}_alert_rules`;
  }

  /**
   * Same topology without the unit
   */
  applicationScope(): Topology {
    if (this.unit === undefined) {
      return this;
    }
    return new Topology(this.variant, this.model, this.modelUuid, this.application, undefined, this.charmName);
  }

  withUnit(unit: string): Topology {
    return new Topology(this.variant, this.model, this.modelUuid, this.application, unit || undefined, this.charmName);
  }

  /**
   * Wire form published as `scrape_metadata`
   */
  asDict(): ScrapeMetadata {
    const dict: ScrapeMetadata = {
      model: this.model,
      model_uuid: this.modelUuid,
      application: this.application,
    };
    if (this.unit) {
      dict.unit = this.unit;
    }
    if (this.charmName) {
      dict.charm_name = this.charmName;
    }
    return dict;
  }

  labelSet(scope: LabelScope = 'rule'): Readonly<LabelSet> {
    const cached = this.labelCache.get(scope);
    if (cached) {
      return cached;
    }

    const labels = Object.freeze(this.buildLabelSet(scope));
    this.labelCache.set(scope, labels);
    return labels;
  }

  /**
   * Rule label set as PromQL matchers: `juju_model="m", juju_model_uuid="u", ...`
   */
  get promqlLabels(): string {
    return Object.entries(this.labelSet('rule'))
      .map(([key, value]) => `${key}="${value}"`)
      .join(', ');
  }

  /**
   * Replace the topology placeholder in a template with the label matchers
   */
  render(template: string): string {
    return template.split(TOPOLOGY_TEMPLATE_STUB).join(this.promqlLabels);
  }

  equals(other: Topology): boolean {
    return this.variant === other.variant && this.identifier === other.identifier;
  }

  private buildLabelSet(scope: LabelScope): LabelSet {
    if (this.variant === 'aggregator') {
      // Aggregated rules and targets are per unit, whatever the scope
      const labels: LabelSet = {
        [TOPOLOGY_LABELS.MODEL]: this.model,
        [TOPOLOGY_LABELS.MODEL_UUID]: this.shortModelUuid,
        [TOPOLOGY_LABELS.APPLICATION]: this.application,
      };
      if (this.unit) {
        labels[TOPOLOGY_LABELS.UNIT] = this.unit;
      }
      return labels;
    }

    const labels: LabelSet = {
      [TOPOLOGY_LABELS.MODEL]: this.model,
      [TOPOLOGY_LABELS.MODEL_UUID]: this.modelUuid,
      [TOPOLOGY_LABELS.APPLICATION]: this.application,
    };
    if (this.charmName) {
      labels[TOPOLOGY_LABELS.CHARM] = this.charmName;
    }
    if (scope === 'target' && this.unit) {
      labels[TOPOLOGY_LABELS.UNIT] = this.unit;
    }
    return labels;
  }
}

function normalizeFields(fields: TopologyFields): TopologyFields {
  const { model, modelUuid, application } = fields;
  if (!model || !modelUuid || !application) {
    throw new MalformedFragmentError('Topology requires model, model uuid and application', {
      model,
      modelUuid,
      application,
    });
  }
  return {
    model,
    modelUuid,
    application,
    unit: fields.unit || undefined,
    charmName: fields.charmName || undefined,
  };
}

function joinIdentifier(parts: Array<string | undefined>): string {
  return parts
    .filter((part): part is string => Boolean(part))
    .join('_')
    .replace(/[\\/]/g, '_');
}
