import type { Context } from 'hono';

export const ROBOTS_TXT = 'User-agent: *\nDisallow: /';

export function robots(c: Context): Response {
  return c.text(ROBOTS_TXT, 200);
}
