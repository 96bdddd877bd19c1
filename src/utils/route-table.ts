import type { RouteEntry, RouteMatch } from '../types/index.js';
import { ConfigurationError } from './errors.js';

/**
 * Longest-prefix first, then lexicographic on the prefix for equal lengths
 */
function compareRoutes(a: RouteEntry, b: RouteEntry): number {
  if (a.prefix.length !== b.prefix.length) {
    return b.prefix.length - a.prefix.length;
  }
  if (a.prefix === b.prefix) {
    return 0;
  }
  return a.prefix < b.prefix ? -1 : 1;
}

function validateEntry(entry: RouteEntry, seen: Set<string>): void {
  if (!entry.prefix.startsWith('/')) {
    throw new ConfigurationError(`Route prefix must start with "/": "${entry.prefix}"`, 'routes');
  }
  if (seen.has(entry.prefix)) {
    throw new ConfigurationError(`Duplicate route prefix: "${entry.prefix}"`, 'routes');
  }

  let base: URL;
  try {
    base = new URL(entry.targetBase);
  } catch (error) {
    throw new ConfigurationError(
      `Route ${entry.prefix} has an invalid target "${entry.targetBase}": ${String(error)}`,
      'routes'
    );
  }
  if (base.protocol !== 'http:' && base.protocol !== 'https:') {
    throw new ConfigurationError(`Route ${entry.prefix} must target http or https`, 'routes');
  }
}

/**
 * Immutable prefix → upstream table. Ranking happens once, at construction.
 */
export class RouteTable {
  private readonly configured: readonly RouteEntry[];
  private readonly ranked: readonly RouteEntry[];

  constructor(entries: readonly RouteEntry[]) {
    const seen = new Set<string>();
    const copies: RouteEntry[] = [];

    for (const entry of entries) {
      validateEntry(entry, seen);
      seen.add(entry.prefix);
      copies.push(Object.freeze({ prefix: entry.prefix, targetBase: entry.targetBase }));
    }

    this.configured = Object.freeze(copies);
    this.ranked = Object.freeze([...copies].sort(compareRoutes));
  }

  /**
   * Entries in configuration order
   */
  get entries(): readonly RouteEntry[] {
    return this.configured;
  }

  get size(): number {
    return this.configured.length;
  }

  resolve(path: string): RouteMatch | null {
    for (const entry of this.ranked) {
      if (path.startsWith(entry.prefix)) {
        return {
          prefix: entry.prefix,
          targetBase: entry.targetBase,
          remainder: path.slice(entry.prefix.length),
        };
      }
    }
    return null;
  }
}
