import type { HeaderPair } from '../types/index.js';

const HTTP_HEADER_NAME_REGEX = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;
// HTAB, visible ASCII and obs-text; anything else cannot be written on an HTTP/1.1 connection
const HTTP_HEADER_VALUE_REGEX = /^[\t\x20-\x7e\x80-\xff]*$/;

export function isValidHeaderName(name: string): boolean {
  return HTTP_HEADER_NAME_REGEX.test(name);
}

export function isValidHeaderValue(value: string): boolean {
  return HTTP_HEADER_VALUE_REGEX.test(value);
}

/**
 * Case-insensitive set of header names permitted to reach the upstream
 */
export class HeaderAllowlist {
  private readonly names: ReadonlySet<string>;

  constructor(names: Iterable<string>) {
    const normalized = new Set<string>();
    for (const name of names) {
      normalized.add(name.trim().toLowerCase());
    }
    this.names = normalized;
  }

  has(name: string): boolean {
    return this.names.has(name.toLowerCase());
  }

  list(): string[] {
    return [...this.names];
  }

  /**
   * Project inbound headers onto the allowed subset. Values are kept verbatim;
   * headers that cannot be re-encoded are dropped.
   */
  filter(headers: Headers | Iterable<HeaderPair>): HeaderPair[] {
    const forwarded: HeaderPair[] = [];

    for (const [name, value] of headers) {
      const normalizedName = name.toLowerCase();
      if (!this.has(normalizedName)) {
        continue;
      }
      if (!isValidHeaderValue(value)) {
        continue;
      }
      forwarded.push([normalizedName, value]);
    }

    return forwarded;
  }
}
