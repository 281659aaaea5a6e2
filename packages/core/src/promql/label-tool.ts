/**
 * Label-matcher tool (promql-transform) lookup and invocation
 */

import { spawn } from 'node:child_process';
import { access, constants } from 'node:fs/promises';
import { join } from 'node:path';
import { ToolFailureError, ToolUnavailableError } from '@scrapelink/shared';

export const LABEL_TOOL_NAME = 'promql-transform';

/**
 * Finds the tool for the current platform. Resolves to null when there is
 * none.
 */
export interface ToolLocator {
  locate(): Promise<string | null>;
}

/**
 * Runs the tool and resolves to its trimmed stdout. Must reject on
 * failure, including when `timeoutMs` elapses.
 */
export type ToolExecutor = (toolPath: string, args: string[], timeoutMs: number) => Promise<string>;

const ARCH_ALIASES: Readonly<Record<string, string>> = Object.freeze({
  x64: 'amd64',
  x86_64: 'amd64',
  ia32: '386',
  arm: 'armhf',
});

export function toolArchitecture(arch: string = process.arch): string {
  return ARCH_ALIASES[arch] ?? arch;
}

export interface PlatformToolLocatorOptions {
  /** Explicit tool path, checked first */
  path?: string;
  /** Directory of per-architecture builds */
  resourceDir?: string;
  arch?: string;
}

export class PlatformToolLocator implements ToolLocator {
  constructor(private readonly options: PlatformToolLocatorOptions = {}) {}

  async locate(): Promise<string | null> {
    const candidates: string[] = [];
    if (this.options.path) {
      candidates.push(this.options.path);
    }
    if (this.options.resourceDir) {
      candidates.push(
        join(this.options.resourceDir, `${LABEL_TOOL_NAME}-${toolArchitecture(this.options.arch)}`)
      );
    }

    for (const candidate of candidates) {
      if (await isExecutable(candidate)) {
        return candidate;
      }
    }
    return null;
  }
}

async function isExecutable(path: string): Promise<boolean> {
  try {
    await access(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Spawn the tool with a hard deadline; the child is killed when it passes.
 */
export const runLabelTool: ToolExecutor = (toolPath, args, timeoutMs) =>
  new Promise((resolve, reject) => {
    const child = spawn(toolPath, args);

    let stdout = '';
    let stderr = '';
    let settled = false;

    const settle = (outcome: () => void): void => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      outcome();
    };

    const timer = setTimeout(() => {
      settle(() => {
        child.kill('SIGKILL');
        reject(new ToolFailureError(`${LABEL_TOOL_NAME} timed out after ${timeoutMs}ms`, { timedOut: true }));
      });
    }, timeoutMs);

    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('error', (error) => {
      settle(() => {
        const code = errorCode(error);
        if (code === 'ENOENT' || code === 'EACCES') {
          reject(new ToolUnavailableError(`${LABEL_TOOL_NAME} cannot be run`, { toolPath, code }));
          return;
        }
        reject(new ToolFailureError(error.message, { toolPath }));
      });
    });

    child.on('close', (exitCode) => {
      settle(() => {
        const output = stdout.trim();
        if (exitCode === 0 && output) {
          resolve(output);
          return;
        }
        reject(
          new ToolFailureError(`${LABEL_TOOL_NAME} exited with code ${exitCode ?? 'null'}`, {
            toolPath,
            stderr: stderr.trim(),
          })
        );
      });
    });
  });

function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}
