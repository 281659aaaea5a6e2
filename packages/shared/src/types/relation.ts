/**
 * Relation wire constants
 */

export const RELATION_INTERFACE_NAME = 'prometheus_scrape';

export const DEFAULT_RELATION_NAME = 'metrics-endpoint';

export const DEFAULT_ALERT_RULES_RELATIVE_PATH = './src/prometheus_alert_rules';

export const RELATION_KEYS = {
  // application data, provider -> monitoring side
  SCRAPE_METADATA: 'scrape_metadata',
  SCRAPE_JOBS: 'scrape_jobs',
  ALERT_RULES: 'alert_rules',
  // unit data, provider -> monitoring side
  UNIT_ADDRESS: 'prometheus_scrape_unit_address',
  UNIT_NAME: 'prometheus_scrape_unit_name',
  LEGACY_UNIT_HOST: 'prometheus_scrape_host',
  // unit data, scrape target -> aggregator
  TARGET_HOSTNAME: 'hostname',
  TARGET_PORT: 'port',
  UNIT_RULE_GROUPS: 'groups',
} as const;

export type RelationKey = (typeof RELATION_KEYS)[keyof typeof RELATION_KEYS];

export type RelationRole = 'provides' | 'requires';

/**
 * A relation endpoint as declared in the local unit's metadata
 */
export interface RelationEndpointSpec {
  name: string;
  interface: string;
  role: RelationRole;
}
