import type { Context, Handler } from 'hono';
import { html, raw } from 'hono/html';
import type { RouteEntry } from '../types/index.js';

const STYLES = `
  body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; max-width: 1200px; margin: 0 auto; padding: 20px; line-height: 1.6; background: #f5f5f5; }
  .container { background: white; border-radius: 8px; padding: 30px; box-shadow: 0 2px 10px rgba(0,0,0,0.1); }
  h1 { color: #333; border-bottom: 2px solid #007acc; padding-bottom: 10px; margin-top: 0; }
  ul { list-style-type: none; padding: 0; display: grid; grid-template-columns: repeat(auto-fill, minmax(300px, 1fr)); gap: 10px; }
  li { margin: 5px 0; padding: 15px; background: #f8f9fa; border-radius: 5px; border-left: 4px solid #007acc; }
  a { text-decoration: none; color: #007acc; font-weight: bold; }
  .url { color: #666; font-size: 0.9em; display: block; margin-top: 5px; }
  footer { margin-top: 30px; text-align: center; color: #666; font-size: 0.9em; }
  @media (max-width: 768px) { ul { grid-template-columns: 1fr; } }
`;

/**
 * Render the informational page listing every prefix and its upstream
 */
export function renderIndexPage(entries: readonly RouteEntry[]): ReturnType<typeof html> {
  const items = entries.map(
    (entry) => html`<li><a href="${entry.prefix}">${entry.prefix}</a><span class="url">${entry.targetBase}</span></li>`
  );

  return html`<!DOCTYPE html>
<html>
<head>
  <title>API Proxy Service</title>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <style>${raw(STYLES)}</style>
</head>
<body>
  <div class="container">
    <h1>API Proxy Service</h1>
    <p>Available API endpoints:</p>
    <ul>
      ${items}
    </ul>
    <footer><p><small>Requests to any prefix below are relayed to its upstream.</small></p></footer>
  </div>
</body>
</html>`;
}

/**
 * The page is rendered once; the route table never changes after startup
 */
export function createHomeHandler(entries: readonly RouteEntry[]): Handler {
  const page = renderIndexPage(entries);
  return (c: Context) => c.html(page);
}
