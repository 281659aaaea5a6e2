/**
 * Read-only access to a tree of rule files
 */

import { readdir, readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';

export type RulePathKind = 'file' | 'directory' | 'missing';

export interface RuleFileSource {
  kind(path: string): Promise<RulePathKind>;
  /** Files directly under `dir`, or anywhere below it when recursive; sorted */
  listFiles(dir: string, recursive: boolean): Promise<string[]>;
  read(path: string): Promise<string>;
}

export const RULE_FILE_SUFFIXES: readonly string[] = ['.rule', '.rules'];

export function isRuleFile(path: string): boolean {
  return RULE_FILE_SUFFIXES.some((suffix) => path.endsWith(suffix));
}

/**
 * Rule files on the local filesystem
 */
export class LocalRuleFileSource implements RuleFileSource {
  async kind(path: string): Promise<RulePathKind> {
    try {
      const stats = await stat(path);
      if (stats.isDirectory()) {
        return 'directory';
      }
      return stats.isFile() ? 'file' : 'missing';
    } catch (error) {
      if (isNotFound(error)) {
        return 'missing';
      }
      throw error;
    }
  }

  async listFiles(dir: string, recursive: boolean): Promise<string[]> {
    const files: string[] = [];
    const entries = await readdir(dir, { withFileTypes: true });

    for (const entry of entries) {
      const fullPath = join(dir, entry.name);
      if (entry.isDirectory()) {
        if (recursive) {
          files.push(...(await this.listFiles(fullPath, true)));
        }
      } else if (entry.isFile()) {
        files.push(fullPath);
      }
    }

    return files.sort();
  }

  async read(path: string): Promise<string> {
    return readFile(path, 'utf-8');
  }
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}
