/**
 * Live real-time session registry.
 *
 * One session id may back several simultaneous connections. The registry
 * bounds the number of sessions (least-recently-active evicted first), bounds
 * each session's history, rate-limits each connection and reclaims sessions
 * whose connections have gone quiet.
 *
 * Every mutation below runs synchronously, so the capacity check, the eviction
 * and the insert of admit() form one critical section on the event loop.
 * Sessions are kept in a Map ordered by activity: the first entry is always
 * the least recently active one.
 */

import { v4 as uuid } from 'uuid';
import { createLogger } from '../logger.js';
import { CapacityExceededError } from '../errors.js';
import { RateLimiter, MESSAGES_PER_MINUTE, ONE_MINUTE_MS } from '../scaling/rate-limiter.js';
import type { ChannelEvent, ChatMessage } from '../types.js';

const logger = createLogger('session-registry');

// ─── Types ──────────────────────────────────────────────────────────────────

/** Transport-agnostic view of one connection (a WebSocket in production). */
export interface SessionConnection {
  /** Deliver a serialized event. Throws when the transport is gone. */
  send(payload: string): void;
  /** Send a keep-alive probe. */
  ping(): void;
  close(code?: number, reason?: string): void;
  isOpen(): boolean;
}

export interface ConnectionHandle {
  readonly sessionId: string;
  readonly connectionId: string;
}

export type SessionState = 'created' | 'active' | 'idle' | 'evicted' | 'closed';

export interface SessionSnapshot {
  id: string;
  state: SessionState;
  connections: number;
  history_length: number;
  last_activity: string;
  created_at: string;
}

export interface RegistryStats {
  sessions: number;
  connections: number;
  capacity: number;
  history_limit: number;
}

export type SessionEventName = 'session:created' | 'session:evicted' | 'session:closed';

export type SessionEventHandler = (event: SessionEventName, sessionId: string, detail?: Record<string, unknown>) => void;

export interface SessionRegistryOptions {
  capacity?: number;
  historyLimit?: number;
  maxConnectionsPerSession?: number;
  /** How long a session with no connections stays addressable. */
  graceMs?: number;
  keepAliveIntervalMs?: number;
  /** Connections silent for longer than this are considered dead. */
  keepAliveTimeoutMs?: number;
  messagesPerMinute?: number;
  now?: () => number;
}

interface ConnectionEntry {
  id: string;
  connection: SessionConnection;
  lastSeen: number;
}

interface Session {
  id: string;
  state: SessionState;
  history: ChatMessage[];
  connections: Map<string, ConnectionEntry>;
  lastActivity: number;
  createdAt: number;
  detachedAt?: number;
  /** Per-session scratch state owned by the channel (brand, pending request, ...). */
  attributes: Map<string, unknown>;
  /** Aborted when the session goes away, cancelling any run it owns. */
  controller: AbortController;
}

export const DEFAULT_SESSION_CAPACITY = 500;
export const DEFAULT_HISTORY_LIMIT = 80;

/** WebSocket close code for "try again later". */
export const CLOSE_TRY_AGAIN_LATER = 1013;
export const CLOSE_GOING_AWAY = 1001;

// ─── Session Registry ───────────────────────────────────────────────────────

export class SessionRegistry {
  private sessions: Map<string, Session> = new Map();
  private eventHandlers: SessionEventHandler[] = [];
  private messageLimiter: RateLimiter;
  private sweepTimer?: NodeJS.Timeout;

  private readonly capacity: number;
  private readonly historyLimit: number;
  private readonly maxConnectionsPerSession: number;
  private readonly graceMs: number;
  private readonly keepAliveIntervalMs: number;
  private readonly keepAliveTimeoutMs: number;
  private readonly now: () => number;

  constructor(options: SessionRegistryOptions = {}) {
    this.capacity = options.capacity ?? DEFAULT_SESSION_CAPACITY;
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
    this.maxConnectionsPerSession = options.maxConnectionsPerSession ?? 8;
    this.graceMs = options.graceMs ?? 30_000;
    this.keepAliveIntervalMs = options.keepAliveIntervalMs ?? 25_000;
    this.keepAliveTimeoutMs = options.keepAliveTimeoutMs ?? 60_000;
    this.now = options.now ?? Date.now;
    this.messageLimiter = new RateLimiter({
      capacity: options.messagesPerMinute ?? MESSAGES_PER_MINUTE,
      windowMs: ONE_MINUTE_MS,
      now: this.now,
      name: 'realtime-messages',
    });
  }

  /**
   * Subscribe to session lifecycle events.
   */
  onEvent(handler: SessionEventHandler): void {
    this.eventHandlers.push(handler);
  }

  /**
   * Start the keep-alive / grace sweep.
   */
  start(): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => this.sweep(), this.keepAliveIntervalMs);
    this.sweepTimer.unref();
    logger.info({ capacity: this.capacity, interval_ms: this.keepAliveIntervalMs }, 'Session registry started');
  }

  /**
   * Stop the sweep and close every session.
   */
  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
    for (const id of Array.from(this.sessions.keys())) {
      this.close(id, CLOSE_GOING_AWAY, 'server shutting down');
    }
    logger.info('Session registry stopped');
  }

  /**
   * Attach a connection to a session, creating the session on first use.
   * At capacity, a new session id evicts the least recently active session.
   */
  admit(sessionId: string, connection: SessionConnection): ConnectionHandle {
    const now = this.now();
    let session = this.sessions.get(sessionId);

    if (session && session.connections.size >= this.maxConnectionsPerSession) {
      throw new CapacityExceededError(
        `Session ${sessionId} already has ${session.connections.size} connections`,
        'connections_per_session',
        this.maxConnectionsPerSession,
      );
    }

    if (!session) {
      while (this.sessions.size >= this.capacity) {
        const lru = this.sessions.keys().next();
        if (lru.done) break;
        this.evict(lru.value, 'capacity');
      }
      session = {
        id: sessionId,
        state: 'created',
        history: [],
        connections: new Map(),
        lastActivity: now,
        createdAt: now,
        attributes: new Map(),
        controller: new AbortController(),
      };
      this.sessions.set(sessionId, session);
      this.emit('session:created', sessionId);
    }

    const entry: ConnectionEntry = { id: uuid(), connection, lastSeen: now };
    session.connections.set(entry.id, entry);
    session.detachedAt = undefined;
    this.markActive(session, now);

    logger.info({ sessionId, connectionId: entry.id, connections: session.connections.size, sessions: this.sessions.size }, 'Connection admitted');
    return { sessionId, connectionId: entry.id };
  }

  /**
   * Per-connection admission for inbound real-time messages.
   */
  allowMessage(handle: ConnectionHandle): boolean {
    const allowed = this.messageLimiter.check(`${handle.sessionId}:${handle.connectionId}`);
    if (!allowed) {
      logger.warn({ sessionId: handle.sessionId, connectionId: handle.connectionId }, 'Connection rate limited');
    }
    return allowed;
  }

  /**
   * Register activity (an inbound message or a pong) on a connection.
   */
  touch(handle: ConnectionHandle): void {
    const session = this.sessions.get(handle.sessionId);
    const entry = session?.connections.get(handle.connectionId);
    if (!session || !entry) return;
    const now = this.now();
    entry.lastSeen = now;
    this.markActive(session, now);
  }

  /**
   * Append to the session history, dropping the oldest entries over the cap.
   * Returns false when the session is unknown.
   */
  record(sessionId: string, message: ChatMessage): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) return false;
    session.history.push(message);
    if (session.history.length > this.historyLimit) {
      session.history.splice(0, session.history.length - this.historyLimit);
    }
    this.markActive(session, this.now());
    return true;
  }

  history(sessionId: string): ChatMessage[] {
    return [...(this.sessions.get(sessionId)?.history ?? [])];
  }

  clearHistory(sessionId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) return false;
    session.history = [];
    return true;
  }

  /**
   * Deliver an event to every live connection of a session.
   * Connections that fail on write are dropped. Returns the delivery count.
   */
  broadcast(sessionId: string, event: ChannelEvent): number {
    const session = this.sessions.get(sessionId);
    if (!session) {
      logger.warn({ sessionId, type: event.type }, 'No session for broadcast');
      return 0;
    }

    const payload = this.serialize(event);
    let delivered = 0;
    for (const entry of Array.from(session.connections.values())) {
      if (this.deliver(session, entry, payload)) delivered++;
    }

    if (delivered > 0) this.markActive(session, this.now());
    return delivered;
  }

  /**
   * Deliver an event to one connection only. Does not count as session activity.
   */
  send(handle: ConnectionHandle, event: ChannelEvent): boolean {
    const session = this.sessions.get(handle.sessionId);
    const entry = session?.connections.get(handle.connectionId);
    if (!session || !entry) return false;
    return this.deliver(session, entry, this.serialize(event));
  }

  /**
   * Tear down a single connection. The session stays addressable for the grace window.
   */
  closeConnection(handle: ConnectionHandle, code?: number, reason?: string): void {
    const session = this.sessions.get(handle.sessionId);
    const entry = session?.connections.get(handle.connectionId);
    if (!session || !entry) return;
    this.detach(session, entry.id);
    safeClose(entry.connection, code, reason);
  }

  /**
   * Close a session and all of its connections.
   */
  close(sessionId: string, code?: number, reason?: string): boolean {
    return this.remove(sessionId, 'closed', code, reason);
  }

  /**
   * Keep-alive and grace handling. Called on an interval once started.
   */
  sweep(): void {
    const now = this.now();
    for (const session of Array.from(this.sessions.values())) {
      for (const entry of Array.from(session.connections.values())) {
        if (!entry.connection.isOpen() || now - entry.lastSeen > this.keepAliveTimeoutMs) {
          logger.info({ sessionId: session.id, connectionId: entry.id }, 'Connection timed out');
          this.detach(session, entry.id);
          safeClose(entry.connection, CLOSE_GOING_AWAY, 'keep-alive timeout');
          continue;
        }
        try {
          entry.connection.ping();
        } catch (err) {
          logger.warn({ err, sessionId: session.id, connectionId: entry.id }, 'Ping failed');
          this.detach(session, entry.id);
        }
      }

      if (session.connections.size === 0 && session.detachedAt !== undefined && now - session.detachedAt >= this.graceMs) {
        this.evict(session.id, 'grace_expired');
      }
    }
    this.messageLimiter.prune();
  }

  // ─── Session-scoped state ──────────────────────────────────────────────

  getAttribute<T>(sessionId: string, key: string, guard: (value: unknown) => value is T): T | undefined {
    const value = this.sessions.get(sessionId)?.attributes.get(key);
    return guard(value) ? value : undefined;
  }

  setAttribute(sessionId: string, key: string, value: unknown): void {
    this.sessions.get(sessionId)?.attributes.set(key, value);
  }

  /**
   * Abort signal that fires when the session is closed or evicted.
   */
  signal(sessionId: string): AbortSignal | undefined {
    return this.sessions.get(sessionId)?.controller.signal;
  }

  // ─── Introspection ─────────────────────────────────────────────────────

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }

  connectionCount(sessionId?: string): number {
    if (sessionId) return this.sessions.get(sessionId)?.connections.size ?? 0;
    let total = 0;
    for (const session of this.sessions.values()) total += session.connections.size;
    return total;
  }

  snapshot(sessionId: string): SessionSnapshot | undefined {
    const session = this.sessions.get(sessionId);
    if (!session) return undefined;
    return {
      id: session.id,
      state: session.state,
      connections: session.connections.size,
      history_length: session.history.length,
      last_activity: new Date(session.lastActivity).toISOString(),
      created_at: new Date(session.createdAt).toISOString(),
    };
  }

  stats(): RegistryStats {
    return {
      sessions: this.sessions.size,
      connections: this.connectionCount(),
      capacity: this.capacity,
      history_limit: this.historyLimit,
    };
  }

  /** Session ids from least to most recently active. */
  listSessions(): string[] {
    return Array.from(this.sessions.keys());
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  private markActive(session: Session, now: number): void {
    session.lastActivity = now;
    session.state = session.connections.size > 0 ? 'active' : 'idle';
    // Re-insert to move the session to the most-recent end.
    this.sessions.delete(session.id);
    this.sessions.set(session.id, session);
  }

  private detach(session: Session, connectionId: string): void {
    if (!session.connections.delete(connectionId)) return;
    this.messageLimiter.reset(`${session.id}:${connectionId}`);
    if (session.connections.size === 0) {
      session.state = 'idle';
      session.detachedAt = this.now();
      logger.info({ sessionId: session.id, grace_ms: this.graceMs }, 'Session idle, awaiting reconnect');
    }
  }

  private evict(sessionId: string, cause: 'capacity' | 'grace_expired'): void {
    this.remove(sessionId, 'evicted', CLOSE_TRY_AGAIN_LATER, `session evicted (${cause})`, cause);
  }

  private remove(sessionId: string, state: 'evicted' | 'closed', code?: number, reason?: string, cause?: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) return false;
    this.sessions.delete(sessionId);
    session.state = state;
    session.controller.abort();

    for (const entry of session.connections.values()) {
      this.messageLimiter.reset(`${sessionId}:${entry.id}`);
      safeClose(entry.connection, code, reason);
    }
    const closedConnections = session.connections.size;
    session.connections.clear();

    logger.info({ sessionId, state, cause, closedConnections }, state === 'evicted' ? 'Session evicted' : 'Session closed');
    this.emit(state === 'evicted' ? 'session:evicted' : 'session:closed', sessionId, { cause, closed_connections: closedConnections });
    return true;
  }

  private serialize(event: ChannelEvent): string {
    return JSON.stringify({ ...event, timestamp: event.timestamp ?? new Date(this.now()).toISOString() });
  }

  private deliver(session: Session, entry: ConnectionEntry, payload: string): boolean {
    try {
      if (!entry.connection.isOpen()) throw new Error('connection not open');
      entry.connection.send(payload);
      return true;
    } catch (err) {
      logger.warn({ err, sessionId: session.id, connectionId: entry.id }, 'Dropping connection after failed write');
      this.detach(session, entry.id);
      return false;
    }
  }

  private emit(event: SessionEventName, sessionId: string, detail?: Record<string, unknown>): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event, sessionId, detail);
      } catch (err) {
        logger.error({ err, event }, 'Session event handler error');
      }
    }
  }
}

function safeClose(connection: SessionConnection, code?: number, reason?: string): void {
  try {
    connection.close(code, reason);
  } catch (err) {
    logger.debug({ err }, 'Connection already closed');
  }
}
