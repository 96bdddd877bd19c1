import { ProxyError } from './errors.js';

/**
 * Resolve a path remainder (with optional query) against an upstream base.
 *
 * One leading "/" is dropped and, when a path is left, it is resolved as
 * "./<path>" against the base with a trailing "/". The dot segment keeps a
 * colon in the first segment from reading as a scheme and a leading "/" from
 * resetting to the host root. The result must stay under the base path.
 */
export function buildTargetUrl(targetBase: string, remainder: string): URL {
  let base: URL;
  try {
    base = new URL(targetBase);
  } catch (error) {
    throw new ProxyError('InvalidURL', error);
  }

  const reference = remainder.startsWith('/') ? remainder.slice(1) : remainder;
  const hasPath = reference.length > 0 && !reference.startsWith('?') && !reference.startsWith('#');

  if (hasPath && !base.pathname.endsWith('/')) {
    base.pathname = `${base.pathname}/`;
  }

  let target: URL;
  try {
    target = new URL(hasPath ? `./${reference}` : reference, base);
  } catch (error) {
    throw new ProxyError('InvalidURL', error);
  }

  if (target.origin !== base.origin) {
    throw new ProxyError('InvalidURL', new Error(`Remainder escapes ${base.origin}`));
  }
  if (hasPath && !target.pathname.startsWith(base.pathname)) {
    throw new ProxyError('InvalidURL', new Error(`Remainder escapes ${base.href}`));
  }

  return target;
}
