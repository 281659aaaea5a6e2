/**
 * Alert rules directory lookup
 */

import { isAbsolute, resolve } from 'node:path';
import { InvalidAlertRulePathError, type Logger } from '@scrapelink/shared';
import type { RuleFileSource } from '../rules/index.js';

/**
 * Resolve `path` against the workload's source directory and require a
 * directory there.
 */
export async function resolveAlertRulesDir(
  sourceDir: string,
  path: string,
  source: RuleFileSource
): Promise<string> {
  const absolute = isAbsolute(path) ? path : resolve(sourceDir, path);
  const kind = await source.kind(absolute);
  if (kind === 'missing') {
    throw new InvalidAlertRulePathError(absolute, 'directory does not exist');
  }
  if (kind !== 'directory') {
    throw new InvalidAlertRulePathError(absolute, 'is not a directory');
  }
  return absolute;
}

/**
 * As resolveAlertRulesDir, but an invalid path is logged and handed back
 * unchanged.
 */
export async function resolveAlertRulesDirOrRaw(
  sourceDir: string,
  path: string,
  source: RuleFileSource,
  logger: Logger
): Promise<string> {
  try {
    return await resolveAlertRulesDir(sourceDir, path, source);
  } catch (error) {
    if (!(error instanceof InvalidAlertRulePathError)) {
      throw error;
    }
    logger.warn({ path: error.path, reason: error.context.reason }, 'Invalid alert rules folder');
    return path;
  }
}
