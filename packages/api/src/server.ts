/**
 * Campaign Crew API Server
 *
 * REST API for campaign runs and stored artifacts, plus the WebSocket chat
 * channel at /ws/chat/:sessionId.
 */

import express, {
  type Request,
  type Response,
  type NextFunction,
  type RequestHandler,
  type ErrorRequestHandler,
} from 'express';
import cors from 'cors';
import { createServer, STATUS_CODES, type IncomingMessage, type Server as HttpServer } from 'node:http';
import type { AddressInfo } from 'node:net';
import type { Duplex } from 'node:stream';
import { WebSocketServer } from 'ws';
import { z } from 'zod';
import {
  SessionRegistry,
  RateLimiter,
  ONE_MINUTE_MS,
  createContentRequest,
  InvalidRequestError,
  InvariantViolationError,
  errorMessage,
} from '@campaigncrew/orchestrator';
import type { Orchestrator, RunResult } from '@campaigncrew/orchestrator';
import { createLogger } from './logger.js';
import type { ServerConfig } from './config.js';
import { ChatChannel } from './chat/channel.js';
import { attachSocket } from './chat/ws-connection.js';
import {
  API_KEY_HEADER,
  createApiKeyMiddleware,
  createRateLimitMiddleware,
  deriveClientKey,
  safeEqual,
} from './middleware/rate-limit.js';

const logger = createLogger('api-server');

const CHAT_PATH = /^\/ws\/chat\/([A-Za-z0-9_-]{1,128})$/;

// ─── Types ──────────────────────────────────────────────────────────────────

export interface ApiServerOptions {
  config: ServerConfig;
  orchestrator: Orchestrator;
  /** Defaults to a registry sized from the orchestrator's session settings. */
  registry?: SessionRegistry;
  now?: () => number;
}

const ConfigRecord = z.record(z.unknown());

const RunBodySchema = z.object({ config: ConfigRecord.optional() });

const FromTextBodySchema = z.object({
  brand: z.string().min(1, 'brand is required'),
  text: z.string(),
  max_retries: z.number().int().min(0).max(10).optional(),
  style_ref_present: z.boolean().optional(),
  campaign_id: z.string().optional(),
  config: ConfigRecord.optional(),
});

function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`);
    throw new InvalidRequestError(`Invalid request body: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

/** The response shape for a finished run. */
export function summarizeRun(result: RunResult) {
  return {
    run_id: result.run_id,
    status: result.status,
    sequence: result.plan.sequence,
    mode: result.plan.mode,
    reason: result.plan.reason,
    cost_usd: result.cost_usd,
    duration_ms: result.duration_ms,
    qa: result.qa,
    outputs: result.outputs,
    artifact: result.artifact,
    input_translation: result.input_translation,
  };
}

/** Status carried by body-parser and http-errors style errors. */
function clientStatusOf(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('status' in err)) return undefined;
  const { status } = err;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

function route(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

function rejectUpgrade(socket: Duplex, status: number): void {
  socket.write(`HTTP/1.1 ${status} ${STATUS_CODES[status] ?? ''}\r\nConnection: close\r\n\r\n`);
  socket.destroy();
}

// ─── API Server ─────────────────────────────────────────────────────────────

export class ApiServer {
  private app: express.Application;
  private httpServer: HttpServer;
  private wss: WebSocketServer;
  private registry: SessionRegistry;
  private channel: ChatChannel;
  private requestLimiter: RateLimiter;
  private pruneTimer?: NodeJS.Timeout;
  private trustForwardedFor: boolean;
  private orchestrator: Orchestrator;
  private config: ServerConfig;
  private now: () => number;

  constructor(options: ApiServerOptions) {
    this.config = options.config;
    this.orchestrator = options.orchestrator;
    const now = options.now ?? Date.now;
    this.now = now;
    const settings = this.orchestrator.getSettings();

    this.trustForwardedFor = this.config.trustForwardedFor ?? settings.rate_limits.trust_forwarded_for;
    this.requestLimiter = new RateLimiter({
      capacity: this.config.requestsPerMinute ?? settings.rate_limits.requests_per_minute,
      windowMs: ONE_MINUTE_MS,
      now,
      name: 'http-requests',
    });
    this.registry =
      options.registry ??
      new SessionRegistry({
        capacity: settings.sessions.capacity,
        historyLimit: settings.sessions.history_limit,
        maxConnectionsPerSession: settings.sessions.max_connections_per_session,
        graceMs: settings.sessions.grace_ms,
        keepAliveIntervalMs: settings.sessions.keepalive_interval_ms,
        keepAliveTimeoutMs: settings.sessions.keepalive_timeout_ms,
        messagesPerMinute: this.config.messagesPerMinute ?? settings.rate_limits.messages_per_minute,
        now,
      });
    this.channel = new ChatChannel({
      registry: this.registry,
      runner: this.orchestrator,
      keywords: this.orchestrator.getIntentKeywords(),
      now,
    });

    this.app = express();
    this.app.disable('x-powered-by');
    this.app.use(cors({ origin: this.config.corsOrigins }));
    this.app.use(express.json({ limit: '1mb' }));

    this.httpServer = createServer(this.app);
    this.wss = new WebSocketServer({ noServer: true });
    this.httpServer.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      this.handleUpgrade(req, socket, head);
    });

    this.setupRoutes();
  }

  /**
   * Start listening. Resolves with the bound address.
   */
  async start(): Promise<AddressInfo> {
    const { port, host } = this.config;
    this.registry.start();
    this.pruneTimer = setInterval(() => this.requestLimiter.prune(), ONE_MINUTE_MS);
    this.pruneTimer.unref();

    await new Promise<void>((resolve, reject) => {
      this.httpServer.once('error', reject);
      this.httpServer.listen(port, host, () => {
        this.httpServer.off('error', reject);
        resolve();
      });
    });

    const address = this.address();
    if (!address) throw new Error('HTTP server is not bound to a TCP address');
    logger.info({ port: address.port, host: address.address }, 'API server started');
    return address;
  }

  /**
   * Stop the server, closing every chat session.
   */
  async stop(): Promise<void> {
    if (this.pruneTimer) {
      clearInterval(this.pruneTimer);
      this.pruneTimer = undefined;
    }
    this.registry.stop();
    for (const client of this.wss.clients) client.terminate();
    await new Promise<void>((resolve) => this.wss.close(() => resolve()));
    await new Promise<void>((resolve, reject) => {
      this.httpServer.close((err) => (err ? reject(err) : resolve()));
      this.httpServer.closeAllConnections();
    });
    logger.info('API server stopped');
  }

  address(): AddressInfo | undefined {
    const address = this.httpServer.address();
    return address !== null && typeof address === 'object' ? address : undefined;
  }

  /**
   * Get the Express app for testing or middleware injection.
   */
  getApp(): express.Application {
    return this.app;
  }

  getSessionRegistry(): SessionRegistry {
    return this.registry;
  }

  // ─── WebSocket ──────────────────────────────────────────────────────────

  private handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): void {
    const url = new URL(req.url ?? '/', 'http://localhost');
    const match = CHAT_PATH.exec(url.pathname);
    if (!match) {
      rejectUpgrade(socket, 404);
      return;
    }

    if (this.config.apiKey) {
      const header = req.headers[API_KEY_HEADER];
      const provided = (Array.isArray(header) ? header[0] : header) ?? url.searchParams.get('api_key') ?? '';
      if (!safeEqual(provided, this.config.apiKey)) {
        rejectUpgrade(socket, 401);
        return;
      }
    }

    const client = deriveClientKey(req, this.trustForwardedFor);
    if (!this.requestLimiter.consume(client).allowed) {
      logger.warn({ client }, 'WebSocket upgrade rate limited');
      rejectUpgrade(socket, 429);
      return;
    }

    const sessionId = match[1];
    this.wss.handleUpgrade(req, socket, head, (ws) => {
      attachSocket(this.channel, sessionId, ws);
    });
  }

  // ─── Routes ─────────────────────────────────────────────────────────────

  private setupRoutes(): void {
    const store = this.orchestrator.getArtifactStore();

    this.app.use('/api', createRateLimitMiddleware(this.requestLimiter, { trustForwardedFor: this.trustForwardedFor, now: this.now }));

    // ── Health ──
    this.app.get('/api/health', (_req, res) => {
      res.json({
        ...this.orchestrator.getHealth(),
        sessions: this.registry.stats(),
        uptime_s: Math.round(process.uptime()),
      });
    });

    this.app.use('/api', createApiKeyMiddleware(this.config.apiKey));

    // ── Campaigns ──
    this.app.post('/api/campaigns/run', route(async (req, res) => {
      const { config } = parseBody(RunBodySchema, req.body);
      const request = createContentRequest(req.body);
      const result = await this.orchestrator.runCampaign(request, { config });
      res.json(summarizeRun(result));
    }));

    this.app.post('/api/campaigns/plan', route(async (req, res) => {
      const plan = await this.orchestrator.previewPlan(createContentRequest(req.body));
      res.json(plan);
    }));

    this.app.post('/api/campaigns/from-text', route(async (req, res) => {
      const body = parseBody(FromTextBodySchema, req.body);
      const result = await this.orchestrator.runFromUserInput(body.brand, body.text, {
        maxRetries: body.max_retries,
        styleRefPresent: body.style_ref_present,
        campaignId: body.campaign_id,
        config: body.config,
      });
      res.json(summarizeRun(result));
    }));

    // ── Runs ──
    this.app.get('/api/runs', route(async (_req, res) => {
      res.json({ runs: await store.list() });
    }));

    this.app.get('/api/runs/:id', route(async (req, res) => {
      const artifact = await store.read(String(req.params.id));
      if (!artifact) { res.status(404).json({ error: 'Run not found' }); return; }
      res.json(artifact);
    }));

    // ── Chat history ──
    this.app.get('/api/chat/history/:sessionId', (req, res) => {
      const sessionId = String(req.params.sessionId);
      if (!this.registry.has(sessionId)) { res.status(404).json({ error: 'Session not found' }); return; }
      res.json({ session_id: sessionId, messages: this.registry.history(sessionId) });
    });

    this.app.delete('/api/chat/history/:sessionId', (req, res) => {
      const sessionId = String(req.params.sessionId);
      if (!this.registry.clearHistory(sessionId)) { res.status(404).json({ error: 'Session not found' }); return; }
      res.json({ session_id: sessionId, cleared: true });
    });

    this.app.use('/api', (_req, res) => {
      res.status(404).json({ error: 'Not found' });
    });

    this.app.use(this.errorHandler);
  }

  private errorHandler: ErrorRequestHandler = (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof InvalidRequestError) {
      res.status(400).json({ error: err.message, issues: err.issues });
      return;
    }
    if (err instanceof InvariantViolationError) {
      res.status(409).json({ error: err.message });
      return;
    }
    const status = clientStatusOf(err);
    if (status !== undefined) {
      res.status(status).json({ error: errorMessage(err) });
      return;
    }
    logger.error({ err, method: req.method, path: req.path }, 'Request failed');
    res.status(500).json({ error: 'Internal server error' });
  };
}
