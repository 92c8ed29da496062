/**
 * Request admission: per-client rate limiting and the optional API key.
 */

import { timingSafeEqual } from 'node:crypto';
import type { IncomingHttpHeaders } from 'node:http';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { RateLimiter } from '@campaigncrew/orchestrator';
import { createLogger } from '../logger.js';

const logger = createLogger('admission');

export const API_KEY_HEADER = 'x-api-key';

/** The parts of an HTTP request (express or a raw upgrade) that identify the client. */
export interface ClientRequestLike {
  headers: IncomingHttpHeaders;
  socket: { remoteAddress?: string };
}

/**
 * Rate-limit identity. X-Forwarded-For is only believed behind a trusted proxy,
 * and then only its first hop.
 */
export function deriveClientKey(req: ClientRequestLike, trustForwardedFor: boolean): string {
  if (trustForwardedFor) {
    const header = req.headers['x-forwarded-for'];
    const raw = Array.isArray(header) ? header[0] : header;
    const first = raw?.split(',')[0]?.trim();
    if (first) return first;
  }
  return req.socket.remoteAddress ?? 'unknown';
}

export interface RateLimitMiddlewareOptions {
  trustForwardedFor: boolean;
  now?: () => number;
}

/**
 * 429 with Retry-After (seconds) once the client's window is full.
 */
export function createRateLimitMiddleware(limiter: RateLimiter, options: RateLimitMiddlewareOptions): RequestHandler {
  const now = options.now ?? Date.now;
  return (req: Request, res: Response, next: NextFunction) => {
    const key = deriveClientKey(req, options.trustForwardedFor);
    const result = limiter.consume(key);

    res.setHeader('X-RateLimit-Limit', String(result.limit));
    res.setHeader('X-RateLimit-Remaining', String(result.remaining));

    if (!result.allowed) {
      const retryAfter = Math.max(1, Math.ceil((Date.parse(result.reset_at) - now()) / 1000));
      logger.warn({ client: key, path: req.path }, 'Request rate limited');
      res.setHeader('Retry-After', String(retryAfter));
      res.status(429).json({ error: 'Rate limit exceeded', retry_after: retryAfter });
      return;
    }
    next();
  };
}

export function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  if (left.length !== right.length) return false;
  return timingSafeEqual(left, right);
}

/**
 * Require X-API-Key when a key is configured; a no-op otherwise.
 */
export function createApiKeyMiddleware(apiKey: string | undefined): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!apiKey) {
      next();
      return;
    }
    const header = req.headers[API_KEY_HEADER];
    const provided = Array.isArray(header) ? header[0] : header;
    if (!provided || !safeEqual(provided, apiKey)) {
      res.status(401).json({ error: 'Unauthorized' });
      return;
    }
    next();
  };
}
