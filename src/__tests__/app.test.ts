import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { pino } from 'pino';

import { createApp } from '../app.js';
import { ALLOWED_REQUEST_HEADERS } from '../config/proxy.js';
import { RouteTable } from '../utils/route-table.js';
import { HeaderAllowlist } from '../utils/headers.js';
import { Forwarder } from '../utils/forwarder.js';
import { closedOrigin, startUpstream, type TestUpstream } from './helpers/upstream.js';

const logger = pino({ level: 'silent' });

describe('proxy app', () => {
  let upstream: TestUpstream;
  let app: ReturnType<typeof createApp>;
  const forwarder = new Forwarder({
    connectTimeoutMs: 1_000,
    requestTimeoutMs: 300,
    keepAliveTimeoutMs: 1_000,
    maxConnectionsPerHost: 4,
  });

  beforeAll(async () => {
    upstream = await startUpstream((req, res, body) => {
      if (req.url?.startsWith('/hang')) {
        return;
      }
      res.writeHead(201, {
        'content-type': 'application/octet-stream',
        'x-frame-options': 'SAMEORIGIN',
        'x-echo-path': req.url ?? '',
      });
      res.end(body);
    });

    const down = await closedOrigin();

    app = createApp({
      logger,
      maxBodySizeBytes: 64,
      routes: new RouteTable([
        { prefix: '/upstream', targetBase: upstream.origin },
        { prefix: '/upstream/v2', targetBase: `${upstream.origin}/second` },
        { prefix: '/down', targetBase: down },
      ]),
      allowedHeaders: new HeaderAllowlist(ALLOWED_REQUEST_HEADERS),
      forwarder,
    });
  });

  afterAll(async () => {
    await upstream.close();
    await forwarder.close();
  });

  it('relays request and response bytes unmodified', async () => {
    const requestBody = new Uint8Array([0, 1, 2, 253, 254, 255, 13, 10]);

    const response = await app.request('/upstream/v1/echo?x=1', {
      method: 'POST',
      headers: {
        'X-Custom': 'secret',
        Authorization: 'Bearer abc',
        'Content-Type': 'application/octet-stream',
      },
      body: requestBody,
    });

    const recorded = upstream.requests.at(-1);
    expect(recorded?.method).toBe('POST');
    expect(recorded?.url).toBe('/v1/echo?x=1');
    expect(recorded?.headers.authorization).toBe('Bearer abc');
    expect(recorded?.headers['x-custom']).toBeUndefined();
    expect(new Uint8Array(recorded?.body ?? [])).toEqual(requestBody);

    expect(response.status).toBe(201);
    expect(response.headers.get('content-type')).toBe('application/octet-stream');
    expect(response.headers.get('x-frame-options')).toBe('DENY');
    expect(response.headers.get('x-content-type-options')).toBe('nosniff');
    expect(new Uint8Array(await response.arrayBuffer())).toEqual(requestBody);
  });

  it('routes to the longest matching prefix', async () => {
    const response = await app.request('/upstream/v2/models');

    expect(response.status).toBe(201);
    expect(response.headers.get('x-echo-path')).toBe('/second/models');
  });

  it('answers unmapped paths with 404', async () => {
    const response = await app.request('/unknown');

    expect(response.status).toBe(404);
    expect(response.headers.get('content-type')).toBe('application/json');
    expect(await response.text()).toBe('{"error":"No route matches the request path","code":404}');
  });

  it('rejects methods outside the allowed set', async () => {
    const response = await app.request('/upstream/v1/models', { method: 'PROPFIND' });

    expect(response.status).toBe(405);
    expect(await response.json()).toEqual({ error: 'Method not allowed', code: 405 });
  });

  it('keeps a doubled slash under the route base', async () => {
    const response = await app.request('/upstream/v2//models');

    expect(response.status).toBe(201);
    expect(response.headers.get('x-echo-path')).toBe('/second//models');
  });

  it('forwards paths with a colon in their first segment', async () => {
    const response = await app.request('/upstream/bot123456:ABC-DEF/getMe');

    expect(response.status).toBe(201);
    expect(response.headers.get('x-echo-path')).toBe('/bot123456:ABC-DEF/getMe');
  });

  it('maps a refused connection to 502', async () => {
    const response = await app.request('/down/v1/models');

    expect(response.status).toBe(502);
    expect(await response.json()).toEqual({ error: 'Failed to connect to upstream', code: 502 });
  });

  it('maps an exceeded deadline to 504', async () => {
    const response = await app.request('/upstream/hang');

    expect(response.status).toBe(504);
    expect(await response.json()).toEqual({ error: 'Upstream request timed out', code: 504 });
  });

  it('rejects bodies over the configured limit', async () => {
    const response = await app.request('/upstream/v1/upload', {
      method: 'POST',
      headers: { 'Content-Length': '128' },
      body: new Uint8Array(128),
    });

    expect(response.status).toBe(413);
    expect(await response.json()).toEqual({ error: 'Request body too large', code: 413 });
  });
});

describe('reserved paths', () => {
  const forwarder = new Forwarder({
    connectTimeoutMs: 1_000,
    requestTimeoutMs: 1_000,
    keepAliveTimeoutMs: 1_000,
    maxConnectionsPerHost: 1,
  });
  const app = createApp({
    logger,
    maxBodySizeBytes: 1024,
    routes: new RouteTable([
      { prefix: '/openai', targetBase: 'https://api.openai.com' },
      { prefix: '/a<b', targetBase: 'https://example.com/?q="x"' },
    ]),
    allowedHeaders: new HeaderAllowlist(ALLOWED_REQUEST_HEADERS),
    forwarder,
  });

  afterAll(async () => {
    await forwarder.close();
  });

  it('serves the health payload', async () => {
    const response = await app.request('/health');

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: 'healthy', service: 'api-proxy' });
  });

  it('serves robots.txt', async () => {
    const response = await app.request('/robots.txt');

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toMatch(/^text\/plain/);
    expect(await response.text()).toBe('User-agent: *\nDisallow: /');
  });

  it('lists the routes on the index page', async () => {
    const response = await app.request('/');
    const page = await response.text();

    expect(response.headers.get('content-type')).toMatch(/^text\/html/);
    expect(page).toContain('<li><a href="/openai">/openai</a><span class="url">https://api.openai.com</span></li>');
    expect(page).toContain('<a href="/a&lt;b">/a&lt;b</a><span class="url">https://example.com/?q=&quot;x&quot;</span>');
  });

  it('serves the same page at /index.html', async () => {
    const [root, index] = await Promise.all([app.request('/'), app.request('/index.html')]);

    expect(await index.text()).toBe(await root.text());
  });

  it('sends non-GET requests on reserved paths through the proxy', async () => {
    const response = await app.request('/health', { method: 'POST' });

    expect(response.status).toBe(404);
  });
});
