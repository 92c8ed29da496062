/**
 * Real-time chat channel.
 *
 * Inbound envelopes are `{ type, data }` JSON. A chat message that is not a
 * build confirmation becomes the session's pending request; a confirmation
 * (or an explicit build_orchestrator message) runs the pending request
 * through the orchestrator and streams build events back to the session.
 */

import { z } from 'zod';
import {
  CapacityExceededError,
  CLOSE_TRY_AGAIN_LATER,
  isBuildConfirmation,
  isSafeSlug,
  errorMessage,
} from '@campaigncrew/orchestrator';
import type {
  ChatRole,
  ConnectionHandle,
  IntentKeywords,
  Orchestrator,
  SessionConnection,
  SessionRegistry,
} from '@campaigncrew/orchestrator';
import { createLogger } from '../logger.js';

const logger = createLogger('chat-channel');

/** WebSocket close code for a policy violation. */
export const CLOSE_POLICY_VIOLATION = 1008;

export const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

const BRAND = 'brand';
const PENDING_REQUEST = 'pending_request';
const RUNNING = 'running';

const EnvelopeSchema = z.object({
  type: z.string().default('chat'),
  data: z.unknown().optional(),
});

const ChatDataSchema = z.object({
  content: z.string().default(''),
  brand: z.string().optional(),
});

const BuildDataSchema = z.object({
  brand: z.string().optional(),
  request: z.string().optional(),
});

const isString = (value: unknown): value is string => typeof value === 'string';
const isTrue = (value: unknown): value is true => value === true;

export type ChannelRunner = Pick<Orchestrator, 'runFromUserInput'>;

export interface ChatChannelOptions {
  registry: SessionRegistry;
  runner: ChannelRunner;
  keywords: IntentKeywords;
  /** QA retry budget for runs started from chat. */
  maxRetries?: number;
  now?: () => number;
}

// ─── Chat Channel ───────────────────────────────────────────────────────────

export class ChatChannel {
  private registry: SessionRegistry;
  private runner: ChannelRunner;
  private keywords: IntentKeywords;
  private maxRetries: number;
  private now: () => number;

  constructor(options: ChatChannelOptions) {
    this.registry = options.registry;
    this.runner = options.runner;
    this.keywords = options.keywords;
    this.maxRetries = options.maxRetries ?? 1;
    this.now = options.now ?? Date.now;
  }

  /**
   * Admit a connection. Returns undefined (and closes the connection) when
   * the id is malformed or the session is full.
   */
  connect(sessionId: string, connection: SessionConnection): ConnectionHandle | undefined {
    if (!SESSION_ID_PATTERN.test(sessionId)) {
      connection.close(CLOSE_POLICY_VIOLATION, 'invalid session id');
      return undefined;
    }
    try {
      return this.registry.admit(sessionId, connection);
    } catch (err) {
      if (!(err instanceof CapacityExceededError)) throw err;
      logger.warn({ sessionId, resource: err.resource, limit: err.limit }, 'Connection rejected');
      connection.close(CLOSE_TRY_AGAIN_LATER, 'session at capacity');
      return undefined;
    }
  }

  disconnect(handle: ConnectionHandle): void {
    this.registry.closeConnection(handle);
  }

  /** Keep-alive pong or other transport-level activity. */
  touch(handle: ConnectionHandle): void {
    this.registry.touch(handle);
  }

  /**
   * Handle one inbound frame. Never rejects: problems go back as error events.
   * Resolves once any build the message started has finished.
   */
  async handleMessage(handle: ConnectionHandle, raw: string): Promise<void> {
    const { sessionId } = handle;
    this.registry.touch(handle);

    if (!this.registry.allowMessage(handle)) {
      this.registry.send(handle, { type: 'error', data: { message: 'Rate limit exceeded, slow down' } });
      return;
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch {
      this.sendError(sessionId, 'Invalid JSON message');
      return;
    }

    const envelope = EnvelopeSchema.safeParse(decoded);
    if (!envelope.success) {
      this.sendError(sessionId, 'Invalid message envelope');
      return;
    }

    switch (envelope.data.type) {
      case 'ping':
        this.registry.broadcast(sessionId, { type: 'pong' });
        return;
      case 'chat':
        return this.handleChat(sessionId, envelope.data.data);
      case 'build_orchestrator':
        return this.handleBuild(sessionId, envelope.data.data);
      default:
        this.sendError(sessionId, `Unknown message type: ${envelope.data.type}`);
    }
  }

  // ─── Message types ─────────────────────────────────────────────────────

  private async handleChat(sessionId: string, data: unknown): Promise<void> {
    const parsed = ChatDataSchema.safeParse(data ?? {});
    if (!parsed.success) {
      this.sendError(sessionId, 'Invalid chat message');
      return;
    }

    const { brand } = parsed.data;
    if (brand !== undefined) {
      if (!isSafeSlug(brand)) {
        this.sendError(sessionId, `Invalid brand: ${brand}`);
        return;
      }
      this.registry.setAttribute(sessionId, BRAND, brand);
    }

    const content = parsed.data.content.trim();
    if (!content) {
      this.sendError(sessionId, 'Empty message');
      return;
    }
    this.remember(sessionId, 'user', content);

    const activeBrand = this.registry.getAttribute(sessionId, BRAND, isString);

    if (isBuildConfirmation(content, this.keywords)) {
      const pending = this.registry.getAttribute(sessionId, PENDING_REQUEST, isString);
      if (!activeBrand) {
        this.sendError(sessionId, 'A brand is required to build');
        return;
      }
      if (!pending) {
        this.sendError(sessionId, 'Nothing to build yet: send a campaign request first');
        return;
      }
      await this.startRun(sessionId, activeBrand, pending);
      return;
    }

    this.registry.setAttribute(sessionId, PENDING_REQUEST, content);
    const reply = activeBrand
      ? `Noted for ${activeBrand}. Send "/build" to run it.`
      : 'Noted. Pick a brand, then send "/build" to run it.';
    this.remember(sessionId, 'assistant', reply);
    this.registry.broadcast(sessionId, { type: 'chat', data: { role: 'assistant', content: reply } });
  }

  private async handleBuild(sessionId: string, data: unknown): Promise<void> {
    const parsed = BuildDataSchema.safeParse(data ?? {});
    if (!parsed.success) {
      this.sendError(sessionId, 'Invalid build_orchestrator message');
      return;
    }

    const brand = parsed.data.brand ?? this.registry.getAttribute(sessionId, BRAND, isString);
    const request = parsed.data.request?.trim() || this.registry.getAttribute(sessionId, PENDING_REQUEST, isString);

    if (!brand) {
      this.sendError(sessionId, 'A brand is required to build');
      return;
    }
    if (!isSafeSlug(brand)) {
      this.sendError(sessionId, `Invalid brand: ${brand}`);
      return;
    }
    if (!request) {
      this.sendError(sessionId, 'Nothing to build yet: send a campaign request first');
      return;
    }
    await this.startRun(sessionId, brand, request);
  }

  // ─── Builds ────────────────────────────────────────────────────────────

  private async startRun(sessionId: string, brand: string, text: string): Promise<void> {
    if (this.registry.getAttribute(sessionId, RUNNING, isTrue)) {
      this.sendError(sessionId, 'A build is already running for this session');
      return;
    }
    this.registry.setAttribute(sessionId, RUNNING, true);
    this.registry.broadcast(sessionId, { type: 'build_started', data: { brand, request: text } });

    try {
      const result = await this.runner.runFromUserInput(brand, text, {
        signal: this.registry.signal(sessionId),
        maxRetries: this.maxRetries,
      });
      const message = `Build ${result.status}. Workers: ${result.plan.sequence.join(', ') || 'none'}.`;
      this.remember(sessionId, 'assistant', message);
      this.registry.broadcast(sessionId, {
        type: 'build_completed',
        data: {
          message,
          run_id: result.run_id,
          status: result.status,
          sequence: result.plan.sequence,
          mode: result.plan.mode,
          cost_usd: result.cost_usd,
          qa: result.qa,
          artifact_dir: result.artifact.dir,
        },
      });
    } catch (err) {
      logger.error({ err, sessionId, brand }, 'Build from chat failed');
      this.sendError(sessionId, `Build failed: ${errorMessage(err)}`);
    } finally {
      this.registry.setAttribute(sessionId, RUNNING, false);
    }
  }

  private remember(sessionId: string, role: ChatRole, content: string): void {
    this.registry.record(sessionId, { role, content, timestamp: new Date(this.now()).toISOString() });
  }

  private sendError(sessionId: string, message: string): void {
    this.registry.broadcast(sessionId, { type: 'error', data: { message } });
  }
}
