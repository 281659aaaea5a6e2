/**
 * Topology metadata as exchanged over relation data (`scrape_metadata`)
 */

import { z } from 'zod';

export const scrapeMetadataSchema = z.object({
  model: z.string().min(1),
  model_uuid: z.string().min(1),
  application: z.string().min(1),
  // Empty strings mean "absent" for older publishers
  unit: z
    .string()
    .optional()
    .transform((value) => (value ? value : undefined)),
  charm_name: z
    .string()
    .optional()
    .transform((value) => (value ? value : undefined)),
});

export type ScrapeMetadata = z.infer<typeof scrapeMetadataSchema>;

export interface TopologyFields {
  model: string;
  modelUuid: string;
  application: string;
  unit?: string;
  charmName?: string;
}

/** Placeholder replaced by topology label matchers in rule expressions */
export const TOPOLOGY_TEMPLATE_STUB = '%%juju_topology%%';

export const TOPOLOGY_LABELS = {
  MODEL: 'juju_model',
  MODEL_UUID: 'juju_model_uuid',
  APPLICATION: 'juju_application',
  UNIT: 'juju_unit',
  CHARM: 'juju_charm',
} as const;

export type TopologyLabel = (typeof TOPOLOGY_LABELS)[keyof typeof TOPOLOGY_LABELS];

/** Length the aggregator variant cuts the model uuid down to */
export const AGGREGATOR_MODEL_UUID_LENGTH = 7;
