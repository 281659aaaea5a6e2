/**
 * Expression Labeler
 *
 * Injects topology label matchers into every alert rule expression through
 * the external promql-transform tool. The tool is optional: when it cannot
 * be found the labeler passes documents through untouched, and stays that
 * way for the rest of its life.
 */

import {
  TOPOLOGY_LABELS,
  ToolUnavailableError,
  createLogger,
  getConfig,
  hasRuleGroups,
  type AlertRule,
  type AlertRuleGroup,
  type AlertRulesPayload,
  type Config,
  type LabelSet,
} from '@scrapelink/shared';
import {
  PlatformToolLocator,
  runLabelTool,
  type ToolExecutor,
  type ToolLocator,
} from './label-tool.js';

const logger = createLogger('ExpressionLabeler');

export type LabelerState = 'unresolved' | 'available' | 'unavailable';

// Order the tool receives matchers in
export const MATCHER_LABEL_ORDER = [
  TOPOLOGY_LABELS.MODEL,
  TOPOLOGY_LABELS.MODEL_UUID,
  TOPOLOGY_LABELS.APPLICATION,
  TOPOLOGY_LABELS.CHARM,
  TOPOLOGY_LABELS.UNIT,
] as const;

export interface ExpressionLabelerOptions {
  execute?: ToolExecutor;
  timeoutMs?: number;
}

export class ExpressionLabeler {
  private state: LabelerState = 'unresolved';
  private toolPath: string | null = null;
  private resolving: Promise<string | null> | null = null;
  private readonly execute: ToolExecutor;
  private readonly timeoutMs: number;

  constructor(
    private readonly locator: ToolLocator,
    options: ExpressionLabelerOptions = {}
  ) {
    this.execute = options.execute ?? runLabelTool;
    this.timeoutMs = options.timeoutMs ?? 5000;
  }

  get status(): LabelerState {
    return this.state;
  }

  /**
   * Rewrite the expression of every rule in every group. Returns a new
   * document; the input is left as it was.
   */
  async apply(payload: AlertRulesPayload): Promise<AlertRulesPayload> {
    if (!hasRuleGroups(payload)) {
      return payload;
    }

    if (!(await this.resolveTool())) {
      return payload;
    }

    const groups: AlertRuleGroup[] = [];
    for (const group of payload.groups) {
      const rules: AlertRule[] = [];
      for (const rule of group.rules) {
        rules.push({ ...rule, expr: await this.labelExpression(rule.expr, rule.labels ?? {}) });
      }
      groups.push({ ...group, rules });
    }
    return { ...payload, groups };
  }

  /**
   * Matcher arguments for one rule, taken from its own topology labels
   */
  static matcherArgs(labels: LabelSet): string[] {
    return MATCHER_LABEL_ORDER.filter((label) => labels[label] !== undefined).map(
      (label) => `--label-matcher=${label}=${labels[label]}`
    );
  }

  private async labelExpression(expression: string, labels: LabelSet): Promise<string> {
    const matchers = ExpressionLabeler.matcherArgs(labels);
    if (!this.toolPath || matchers.length === 0) {
      return expression;
    }

    try {
      return await this.execute(this.toolPath, [...matchers, expression], this.timeoutMs);
    } catch (error) {
      if (error instanceof ToolUnavailableError) {
        logger.warn({ toolPath: this.toolPath }, 'Label-matcher tool can no longer be run, passing expressions through');
        this.toolPath = null;
        this.state = 'unavailable';
        return expression;
      }
      logger.debug(
        { expression, error: error instanceof Error ? error.message : String(error) },
        'Applying label matchers failed, keeping the original expression'
      );
      return expression;
    }
  }

  private async resolveTool(): Promise<string | null> {
    if (this.state !== 'unresolved') {
      return this.toolPath;
    }
    if (!this.resolving) {
      this.resolving = this.locateOnce();
    }
    return this.resolving;
  }

  private async locateOnce(): Promise<string | null> {
    try {
      this.toolPath = await this.locator.locate();
    } catch (error) {
      logger.debug({ error: error instanceof Error ? error.message : String(error) }, 'Tool lookup failed');
      this.toolPath = null;
    }

    this.state = this.toolPath ? 'available' : 'unavailable';
    if (this.toolPath) {
      logger.info({ toolPath: this.toolPath }, 'Label-matcher tool found');
    } else {
      logger.debug('Skipping injection of topology label matchers, no tool for this platform');
    }
    return this.toolPath;
  }
}

export function createExpressionLabelerFromConfig(config: Config = getConfig()): ExpressionLabeler {
  return new ExpressionLabeler(
    new PlatformToolLocator({
      path: config.labelTool.path,
      resourceDir: config.labelTool.resourceDir,
    }),
    { timeoutMs: config.labelTool.timeoutMs }
  );
}
