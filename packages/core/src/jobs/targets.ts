/**
 * Scrape target parsing
 */

import { TargetFormatError } from '@scrapelink/shared';

export const WILDCARD_HOST = '*';

export interface ParsedTarget {
  host: string;
  port: string;
  wildcard: boolean;
}

/**
 * Split `host:port`. Anything without exactly one `:` is rejected, which
 * includes bare IPv6 addresses.
 */
export function parseTarget(target: string): ParsedTarget {
  const parts = target.split(':');
  if (parts.length !== 2) {
    throw new TargetFormatError(target);
  }

  const host = (parts[0] ?? '').trim();
  const port = (parts[1] ?? '').trim();
  if (!host || !port) {
    throw new TargetFormatError(target);
  }

  return { host, port, wildcard: host === WILDCARD_HOST };
}

export function formatTarget(host: string, port: string | number): string {
  return `${host}:${port}`;
}
