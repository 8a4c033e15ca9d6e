/**
 * Deterministic hashing for reproducible runs
 */

import { createHash } from 'crypto';

export function deterministicHash(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

export function contentHash(content: unknown): string {
  const normalized = stableStringify(content);
  return deterministicHash(normalized);
}

export function shortHash(content: unknown, length: number = 8): string {
  return contentHash(content).substring(0, length);
}

function stableStringify(obj: unknown): string {
  if (obj === null || typeof obj !== 'object') {
    return JSON.stringify(obj) ?? 'null';
  }

  if (Array.isArray(obj)) {
    return '[' + obj.map(stableStringify).join(',') + ']';
  }

  const entries: Array<[string, unknown]> = Object.entries(obj);
  const pairs = entries
    .filter(([, value]) => value !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, value]) => JSON.stringify(key) + ':' + stableStringify(value));
  return '{' + pairs.join(',') + '}';
}
