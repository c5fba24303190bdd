/**
 * WebSocket Manager
 * Accepts WebSocket upgrades and gives each connection its own multiplexer
 */

import { WebSocketServer } from 'ws';
import type { WebSocket } from 'ws';
import type { Server as HTTPServer, IncomingMessage } from 'node:http';
import { logger } from '../../lib/logger/structured-logger.js';
import type { ConnectionHub } from '../hub/connection-hub.js';
import type { CancelHandler } from './connection-multiplexer.js';
import { DEFAULT_OUTBOUND_CAPACITY } from './connection-multiplexer.js';
import { setupConnection, executeHeartbeat } from './connection-handler.js';
import type { TrackedConnection } from './connection-handler.js';
import { wsClose, getCloseParams, CloseSource } from './ws-close-reasons.js';

export interface WebSocketManagerConfig {
  path: string;
  heartbeatIntervalMs: number;
  idleTimeoutMs: number;
  maxPayloadBytes: number;
  outboundQueueCapacity: number;
}

export interface WebSocketManagerDeps {
  hub: ConnectionHub;
  onCancel?: CancelHandler;
}

const DEFAULT_CONFIG: WebSocketManagerConfig = {
  path: '/ws',
  heartbeatIntervalMs: 30_000,
  idleTimeoutMs: 15 * 60 * 1000,
  maxPayloadBytes: 1024 * 1024,
  outboundQueueCapacity: DEFAULT_OUTBOUND_CAPACITY
};

export class WebSocketManager {
  private readonly wss: WebSocketServer;
  private readonly config: WebSocketManagerConfig;
  private readonly deps: WebSocketManagerDeps;
  private readonly connections = new Map<string, TrackedConnection>();
  private heartbeatInterval: NodeJS.Timeout | undefined;
  private shuttingDown: Promise<void> | undefined;

  constructor(server: HTTPServer, deps: WebSocketManagerDeps, config?: Partial<WebSocketManagerConfig>) {
    this.deps = deps;
    this.config = { ...DEFAULT_CONFIG, ...config };

    this.wss = new WebSocketServer({
      server,
      path: this.config.path,
      maxPayload: this.config.maxPayloadBytes
    });

    this.wss.on('connection', (ws: WebSocket, req: IncomingMessage) => this.handleConnection(ws, req));
    this.wss.on('error', (err: Error) => {
      logger.error({ error: err.message }, 'WebSocketServer error');
    });
    this.startHeartbeat();

    logger.info({
      path: this.config.path,
      heartbeatIntervalMs: this.config.heartbeatIntervalMs,
      idleTimeoutMs: this.config.idleTimeoutMs,
      maxPayloadBytes: this.config.maxPayloadBytes
    }, 'WebSocketManager: Initialized');
  }

  private handleConnection(ws: WebSocket, req: IncomingMessage): void {
    if (this.shuttingDown) {
      wsClose(ws, {
        ...getCloseParams(CloseSource.SERVER_SHUTDOWN),
        closeSource: CloseSource.SERVER_SHUTDOWN
      });
      return;
    }

    const connection = setupConnection(ws, req, {
      hub: this.deps.hub,
      idleTimeoutMs: this.config.idleTimeoutMs,
      outboundQueueCapacity: this.config.outboundQueueCapacity,
      ...(this.deps.onCancel && { onCancel: this.deps.onCancel }),
      onClosed: (closed) => {
        this.connections.delete(closed.connectionId);
      }
    });
    this.connections.set(connection.connectionId, connection);
  }

  private startHeartbeat(): void {
    this.heartbeatInterval = setInterval(() => {
      executeHeartbeat(this.connections.values());
    }, this.config.heartbeatIntervalMs);
    this.heartbeatInterval.unref();
  }

  getStats(): { connections: number; forwarders: number; framesSent: number; framesReceived: number } {
    let forwarders = 0;
    let framesSent = 0;
    let framesReceived = 0;
    for (const { multiplexer } of this.connections.values()) {
      const stats = multiplexer.getStats();
      forwarders += stats.forwarders;
      framesSent += stats.framesSent;
      framesReceived += stats.framesReceived;
    }
    return { connections: this.connections.size, forwarders, framesSent, framesReceived };
  }

  /**
   * Close every connection with SERVER_SHUTDOWN and wait for their
   * multiplexers to stop. Idempotent.
   */
  shutdown(): Promise<void> {
    if (!this.shuttingDown) {
      this.shuttingDown = this.doShutdown();
    }
    return this.shuttingDown;
  }

  private async doShutdown(): Promise<void> {
    if (this.heartbeatInterval) {
      clearInterval(this.heartbeatInterval);
      this.heartbeatInterval = undefined;
    }

    const open = Array.from(this.connections.values());
    for (const connection of open) {
      wsClose(connection.socket, {
        ...getCloseParams(CloseSource.SERVER_SHUTDOWN),
        closeSource: CloseSource.SERVER_SHUTDOWN,
        connectionId: connection.connectionId
      });
    }
    await Promise.all(open.map(connection => connection.multiplexer.close('server_shutdown')));

    await new Promise<void>((resolve) => {
      this.wss.close(() => resolve());
    });
    this.connections.clear();

    logger.info({ closedConnections: open.length }, 'WebSocketManager shutdown');
  }
}
