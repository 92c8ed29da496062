import { describe, it, expect, afterEach } from 'vitest';
import express, { type RequestHandler } from 'express';
import { createServer, type Server } from 'node:http';
import { RateLimiter } from '@campaigncrew/orchestrator';
import {
  createApiKeyMiddleware,
  createRateLimitMiddleware,
  deriveClientKey,
  safeEqual,
} from '../src/middleware/rate-limit.js';

let server: Server | undefined;

async function serve(middleware: RequestHandler): Promise<string> {
  const app = express();
  app.use(middleware);
  app.get('/', (_req, res) => {
    res.json({ ok: true });
  });
  const listening = createServer(app);
  server = listening;
  await new Promise<void>((resolve) => listening.listen(0, '127.0.0.1', () => resolve()));
  const address = listening.address();
  if (address === null || typeof address === 'string') throw new Error('not bound to a TCP port');
  return `http://127.0.0.1:${address.port}/`;
}

afterEach(async () => {
  const current = server;
  server = undefined;
  if (!current) return;
  await new Promise<void>((resolve, reject) => {
    current.close((err) => (err ? reject(err) : resolve()));
    current.closeAllConnections();
  });
});

describe('deriveClientKey', () => {
  it('ignores X-Forwarded-For unless trusted', () => {
    const req = { headers: { 'x-forwarded-for': '203.0.113.9, 10.0.0.1' }, socket: { remoteAddress: '10.0.0.1' } };

    expect(deriveClientKey(req, false)).toBe('10.0.0.1');
    expect(deriveClientKey(req, true)).toBe('203.0.113.9');
  });

  it('falls back to the socket address, then to unknown', () => {
    expect(deriveClientKey({ headers: { 'x-forwarded-for': '' }, socket: { remoteAddress: '10.0.0.2' } }, true)).toBe('10.0.0.2');
    expect(deriveClientKey({ headers: {}, socket: {} }, false)).toBe('unknown');
  });
});

describe('createRateLimitMiddleware', () => {
  it('sets quota headers and answers 429 with Retry-After', async () => {
    let clock = 1_000_000;
    const now = () => clock;
    const limiter = new RateLimiter({ capacity: 2, windowMs: 60_000, now });
    const url = await serve(createRateLimitMiddleware(limiter, { trustForwardedFor: false, now }));

    const first = await fetch(url);
    expect(first.status).toBe(200);
    expect(first.headers.get('x-ratelimit-limit')).toBe('2');
    expect(first.headers.get('x-ratelimit-remaining')).toBe('1');

    clock += 15_500;
    expect((await fetch(url)).status).toBe(200);
    const denied = await fetch(url);

    expect(denied.status).toBe(429);
    expect(denied.headers.get('retry-after')).toBe('45');
    expect(JSON.parse(await denied.text())).toEqual({ error: 'Rate limit exceeded', retry_after: 45 });
  });

  it('keys clients by forwarded address only when trusted', async () => {
    const limiter = new RateLimiter({ capacity: 1, windowMs: 60_000 });
    const url = await serve(createRateLimitMiddleware(limiter, { trustForwardedFor: true }));
    const from = (address: string) => fetch(url, { headers: { 'x-forwarded-for': address } });

    expect((await from('198.51.100.1')).status).toBe(200);
    expect((await from('198.51.100.2')).status).toBe(200);
    expect((await from('198.51.100.1')).status).toBe(429);
  });

  it('shares one key behind an untrusted proxy', async () => {
    const limiter = new RateLimiter({ capacity: 1, windowMs: 60_000 });
    const url = await serve(createRateLimitMiddleware(limiter, { trustForwardedFor: false }));
    const from = (address: string) => fetch(url, { headers: { 'x-forwarded-for': address } });

    expect((await from('198.51.100.1')).status).toBe(200);
    expect((await from('198.51.100.2')).status).toBe(429);
  });
});

describe('createApiKeyMiddleware', () => {
  it('is a no-op without a configured key', async () => {
    const url = await serve(createApiKeyMiddleware(undefined));
    expect((await fetch(url)).status).toBe(200);
  });

  it('compares the X-API-Key header', async () => {
    const url = await serve(createApiKeyMiddleware('test-key'));

    expect((await fetch(url, { headers: { 'x-api-key': 'test-key' } })).status).toBe(200);

    const wrong = await fetch(url, { headers: { 'x-api-key': 'test-kez' } });
    expect(wrong.status).toBe(401);
    expect(JSON.parse(await wrong.text())).toEqual({ error: 'Unauthorized' });

    expect((await fetch(url)).status).toBe(401);
  });

  it('rejects keys of a different length', () => {
    expect(safeEqual('test-key', 'test-key')).toBe(true);
    expect(safeEqual('test-key', 'test-key-2')).toBe(false);
  });
});
