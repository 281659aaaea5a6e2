/**
 * Alert rules directory lookup Tests
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { InvalidAlertRulePathError, createLogger } from '@scrapelink/shared';
import { LocalRuleFileSource } from '../rules/index.js';
import { resolveAlertRulesDir, resolveAlertRulesDirOrRaw } from './rules-path.js';

describe('resolveAlertRulesDir', () => {
  const source = new LocalRuleFileSource();
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'rules-path-'));
    await mkdir(join(root, 'rules'));
    await writeFile(join(root, 'notes.txt'), 'not a directory');
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should resolve a relative path against the source directory', async () => {
    await expect(resolveAlertRulesDir(root, './rules', source)).resolves.toBe(join(root, 'rules'));
  });

  it('should keep an absolute path', async () => {
    await expect(resolveAlertRulesDir('/elsewhere', join(root, 'rules'), source)).resolves.toBe(join(root, 'rules'));
  });

  it('should reject a missing directory or a file', async () => {
    await expect(resolveAlertRulesDir(root, 'missing', source)).rejects.toThrow('directory does not exist');
    await expect(resolveAlertRulesDir(root, 'notes.txt', source)).rejects.toBeInstanceOf(InvalidAlertRulePathError);
  });

  it('should log and hand back the raw path when invalid', async () => {
    const logger = createLogger('RulesPathTest');
    const warn = vi.spyOn(logger, 'warn');

    await expect(resolveAlertRulesDirOrRaw(root, 'missing', source, logger)).resolves.toBe('missing');
    expect(warn).toHaveBeenCalledWith(
      { path: join(root, 'missing'), reason: 'directory does not exist' },
      'Invalid alert rules folder'
    );
  });
});
