/**
 * ws transport for the chat channel.
 */

import { WebSocket, type RawData } from 'ws';
import type { SessionConnection } from '@campaigncrew/orchestrator';
import { createLogger } from '../logger.js';
import type { ChatChannel } from './channel.js';

const logger = createLogger('ws-connection');

export class WebSocketConnection implements SessionConnection {
  constructor(private socket: WebSocket) {}

  send(payload: string): void {
    if (this.socket.readyState !== WebSocket.OPEN) {
      throw new Error(`socket not open (state ${this.socket.readyState})`);
    }
    this.socket.send(payload);
  }

  ping(): void {
    this.socket.ping();
  }

  close(code?: number, reason?: string): void {
    this.socket.close(code, reason);
  }

  isOpen(): boolean {
    return this.socket.readyState === WebSocket.OPEN;
  }
}

export function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf-8');
  return data.toString('utf-8');
}

/**
 * Admit a socket into the channel and route its frames. Returns false when
 * the channel refused it (the socket is already closed).
 */
export function attachSocket(channel: ChatChannel, sessionId: string, socket: WebSocket): boolean {
  const handle = channel.connect(sessionId, new WebSocketConnection(socket));
  if (!handle) return false;

  socket.on('pong', () => channel.touch(handle));

  socket.on('message', (data) => {
    channel.handleMessage(handle, rawDataToString(data)).catch((err: unknown) => {
      logger.error({ err, sessionId }, 'Chat message handling failed');
    });
  });

  socket.on('close', (code) => {
    logger.debug({ sessionId, code }, 'Socket closed');
    channel.disconnect(handle);
  });

  socket.on('error', (err) => {
    logger.warn({ err, sessionId }, 'Socket error');
  });

  return true;
}
