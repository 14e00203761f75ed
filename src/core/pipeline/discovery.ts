/**
 * @module pipeline/discovery
 *
 * Finds the pipeline steps in a directory: every entry named
 * `<integer>-<rest>`, ordered by that integer.
 */

import { ValidationError } from '../../errors.js';
import type { DirectoryReader, OrderedFile } from '../kernel/contracts.js';

// The head never contains a hyphen, so only `+` can appear as a sign.
const INTEGER_PATTERN = /^\s*\+?\d+\s*$/;

/**
 * Returns the integer prefix of a filename, or `undefined` when the file is
 * not a pipeline step.
 *
 * Examples:
 *   parsePrefix('1-fetch.sh')   → 1n
 *   parsePrefix('010-model.py') → 10n
 *   parsePrefix('a-notes.txt')  → undefined
 *   parsePrefix('README.md')    → undefined
 */
export function parsePrefix(fileName: string): bigint | undefined {
  const hyphen = fileName.indexOf('-');
  if (hyphen === -1) {
    return undefined;
  }
  const head = fileName.slice(0, hyphen);
  if (!INTEGER_PATTERN.test(head)) {
    return undefined;
  }
  // Exact for any length; prefixes past 2^53 must not collide.
  return BigInt(head.trim());
}

/**
 * Orders a listing of names by prefix. Throws {@link ValidationError} when
 * two names share a prefix; nothing is returned in that case.
 */
export function orderFiles(names: readonly string[]): OrderedFile[] {
  const byOrder = new Map<bigint, string[]>();
  for (const name of names) {
    const order = parsePrefix(name);
    if (order === undefined) {
      continue;
    }
    const existing = byOrder.get(order);
    if (existing) {
      existing.push(name);
    } else {
      byOrder.set(order, [name]);
    }
  }

  const duplicates: Record<string, string[]> = {};
  for (const [order, group] of byOrder) {
    if (group.length > 1) {
      duplicates[order.toString()] = [...group].sort();
    }
  }
  const collisions = Object.entries(duplicates);
  if (collisions.length > 0) {
    const detail = collisions
      .map(([order, group]) => `${order}: ${group.join(', ')}`)
      .join('; ');
    throw new ValidationError(`One or more files have the same integer prefix (${detail})`, duplicates);
  }

  return [...byOrder.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([order, group]) => Object.freeze({ order, name: group[0] }));
}

/** Lists `directory` once through `reader` and orders its pipeline steps. */
export async function discover(directory: string, reader: DirectoryReader): Promise<OrderedFile[]> {
  const names = await reader.list(directory);
  return orderFiles(names);
}
