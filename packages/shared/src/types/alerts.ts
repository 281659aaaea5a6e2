/**
 * Alert rule wire types
 *
 * An alert rules document is the content of a Prometheus rules file:
 * a list of groups, each holding a list of rules.
 */

import { z } from 'zod';
import { labelSetSchema } from './scrape.js';

const expressionSchema = z.union([z.string(), z.number()]).transform((value) => String(value));

export const alertRuleSchema = z
  .object({
    alert: z.string().optional(),
    record: z.string().optional(),
    expr: expressionSchema,
    for: z.string().optional(),
    labels: labelSetSchema.optional(),
    annotations: labelSetSchema.optional(),
  })
  .passthrough();

export type AlertRule = z.infer<typeof alertRuleSchema>;

export const alertRuleGroupSchema = z
  .object({
    name: z.string().min(1),
    interval: z.string().optional(),
    rules: z.array(alertRuleSchema),
  })
  .passthrough();

export type AlertRuleGroup = z.infer<typeof alertRuleGroupSchema>;

export const alertRulesDocumentSchema = z.object({
  groups: z.array(alertRuleGroupSchema),
});

export type AlertRulesDocument = z.infer<typeof alertRulesDocumentSchema>;

/**
 * What gets published for alert rules: a document, or `{}` when there
 * are none. Writers must not publish an empty `groups` list.
 */
export type AlertRulesPayload = AlertRulesDocument | Record<string, never>;

export function hasRuleGroups(payload: AlertRulesPayload): payload is AlertRulesDocument {
  return 'groups' in payload && Array.isArray(payload.groups) && payload.groups.length > 0;
}

/**
 * Rules for a single unit as published by aggregator scrape targets:
 * a bare list of rules, no groups.
 */
export const unitAlertRulesSchema = z.array(alertRuleSchema);
