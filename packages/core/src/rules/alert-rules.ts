/**
 * Alert Rule Aggregator
 *
 * Collects alert rules from rule files (or from peer-supplied documents),
 * namespaces every group with topology and stamps every rule with
 * topology labels, producing a single rules document.
 *
 * Two file shapes are understood:
 * - official: `{ groups: [{ name, rules: [...] }] }`
 * - single rule: `{ alert, expr, ... }`, one rule per file, grouped under
 *   the file name
 *
 * A broken file is logged and skipped; it never stops the others.
 */

import { basename, dirname, extname, relative, sep } from 'node:path';
import { parse as parseYaml } from 'yaml';
import {
  alertRuleSchema,
  alertRulesDocumentSchema,
  createChildLogger,
  logFragmentSkipped,
  type AlertRule,
  type AlertRuleGroup,
  type AlertRulesPayload,
} from '@scrapelink/shared';
import type { Topology } from '../topology/index.js';
import { LocalRuleFileSource, isRuleFile, type RuleFileSource } from './rule-source.js';

const logger = createChildLogger({ component: 'AlertRules' });

export interface AddPathOptions {
  /** Descend into sub-directories (no effect when the path is a file) */
  recursive?: boolean;
}

export interface AddRulesOptions {
  /** Group name used when the document is a single rule */
  sourceName: string;
  /** Relative location folded into the group name */
  relativePath?: string;
}

export function isOfficialRuleFormat(value: unknown): value is { groups: unknown } {
  return isRecord(value) && 'groups' in value;
}

export function isSingleRuleFormat(value: unknown): value is { alert: unknown; expr: unknown } {
  return isRecord(value) && 'alert' in value && 'expr' in value;
}

export class AlertRules {
  // keyed by final group name; groups landing on the same name are combined
  private readonly groups = new Map<string, AlertRuleGroup>();

  constructor(
    private readonly topology?: Topology,
    private readonly source: RuleFileSource = new LocalRuleFileSource()
  ) {}

  /**
   * Add a rule file, or every rule file of a directory
   */
  async addPath(path: string, options: AddPathOptions = {}): Promise<void> {
    const kind = await this.source.kind(path);

    if (kind === 'directory') {
      const files = (await this.source.listFiles(path, options.recursive ?? false)).filter(isRuleFile);
      for (const file of files) {
        await this.addFile(path, file);
      }
      return;
    }

    if (kind === 'file') {
      await this.addFile(dirname(path), path);
      return;
    }

    logger.warn({ path }, 'Alert rules path does not exist');
  }

  /**
   * Add an already decoded rules document, e.g. one received from a peer.
   * Returns the number of groups taken in.
   */
  addRules(document: unknown, options: AddRulesOptions): number {
    const groups = this.toGroups(document, options.sourceName);
    if (!groups) {
      logFragmentSkipped(logger, 'unsupported rules document', { source: options.sourceName });
      return 0;
    }

    for (const group of groups) {
      this.addGroup(group, options.relativePath ?? '');
    }
    return groups.length;
  }

  /**
   * The collected rules, or `{}` when there are none
   */
  finalize(): AlertRulesPayload {
    if (this.groups.size === 0) {
      return {};
    }
    return { groups: [...this.groups.values()] };
  }

  get groupCount(): number {
    return this.groups.size;
  }

  private async addFile(rootDir: string, filePath: string): Promise<void> {
    let content: string;
    try {
      content = await this.source.read(filePath);
    } catch (error) {
      logFragmentSkipped(logger, 'unreadable rule file', { file: filePath, error });
      return;
    }

    let document: unknown;
    try {
      document = parseYaml(content);
    } catch (error) {
      logger.error(
        { file: basename(filePath), error: error instanceof Error ? error.message : String(error) },
        'Failed to read alert rules'
      );
      return;
    }

    const stem = basename(filePath, extname(filePath));
    const groups = this.toGroups(document, stem);
    if (!groups) {
      logger.error({ file: basename(filePath) }, 'Invalid rules file');
      return;
    }

    logger.debug({ file: filePath, groups: groups.length }, 'Reading alert rules');
    const relativeDir = relative(rootDir, dirname(filePath));
    for (const group of groups) {
      this.addGroup(group, relativeDir);
    }
  }

  private toGroups(document: unknown, singleRuleGroupName: string): AlertRuleGroup[] | null {
    if (isOfficialRuleFormat(document)) {
      const parsed = alertRulesDocumentSchema.safeParse(document);
      return parsed.success ? parsed.data.groups : null;
    }

    if (isSingleRuleFormat(document)) {
      const parsed = alertRuleSchema.safeParse(document);
      return parsed.success ? [{ name: singleRuleGroupName, rules: [parsed.data] }] : null;
    }

    return null;
  }

  private addGroup(group: AlertRuleGroup, relativeDir: string): void {
    const name = this.groupName(relativeDir, group.name);
    const rules = group.rules.map((rule) => this.labelRule(rule));

    const existing = this.groups.get(name);
    if (existing) {
      existing.rules.push(...rules);
      return;
    }
    this.groups.set(name, { ...group, name, rules });
  }

  /**
   * topology identifier + relative directory + original name + "alerts",
   * empty parts dropped
   */
  private groupName(relativeDir: string, groupName: string): string {
    const relativePart =
      relativeDir === '' || relativeDir === '.' ? '' : relativeDir.split(sep).join('_').replace(/\//g, '_');
    return [this.topology?.identifier, relativePart, groupName, 'alerts']
      .filter((part): part is string => Boolean(part))
      .join('_');
  }

  private labelRule(rule: AlertRule): AlertRule {
    if (!this.topology) {
      return { ...rule, labels: { ...rule.labels } };
    }
    return {
      ...rule,
      // topology wins over user labels
      labels: { ...rule.labels, ...this.topology.labelSet('rule') },
      expr: this.topology.render(rule.expr),
    };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
