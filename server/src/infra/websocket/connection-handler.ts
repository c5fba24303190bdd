/**
 * WebSocket Connection Handler
 * Manages connection lifecycle: connect, disconnect, error, heartbeat
 */

import type { IncomingMessage } from 'node:http';
import type { WebSocket, RawData } from 'ws';
import { logger } from '../../lib/logger/structured-logger.js';
import type { ConnectionHub } from '../hub/connection-hub.js';
import { ConnectionMultiplexer } from './connection-multiplexer.js';
import type { CancelHandler } from './connection-multiplexer.js';
import { WebSocketTransport } from './ws-transport.js';
import { wsClose, getCloseTag, getCloseParams, CloseSource, CLOSE_REASONS } from './ws-close-reasons.js';
import { v4 as uuidv4 } from 'uuid';

export interface TrackedConnection {
  connectionId: string;
  socket: WebSocket;
  multiplexer: ConnectionMultiplexer;
  isAlive: boolean;
  connectedAt: number;
}

export interface ConnectionSetupOptions {
  hub: ConnectionHub;
  idleTimeoutMs: number;
  outboundQueueCapacity: number;
  onCancel?: CancelHandler;
  onClosed: (connection: TrackedConnection) => void;
}

/**
 * Wire a freshly accepted socket to its own multiplexer
 */
export function setupConnection(
  ws: WebSocket,
  req: IncomingMessage,
  options: ConnectionSetupOptions
): TrackedConnection {
  const connectionId = uuidv4();
  const multiplexer = new ConnectionMultiplexer({
    hub: options.hub,
    transport: new WebSocketTransport(ws, connectionId),
    connectionId,
    outboundCapacity: options.outboundQueueCapacity,
    ...(options.onCancel && { onCancel: options.onCancel })
  });

  const connection: TrackedConnection = {
    connectionId,
    socket: ws,
    multiplexer,
    isAlive: true,
    connectedAt: Date.now()
  };

  // Prefer XFF (behind a proxy), fallback to socket remoteAddress
  const forwardedFor = req.headers['x-forwarded-for'];
  const ip =
    (typeof forwardedFor === 'string' ? forwardedFor.split(',')[0]?.trim() : undefined) ||
    req.socket.remoteAddress;

  logger.info({ connectionId, ip, event: 'ws_connected' }, 'WebSocket connected');

  ws.on('pong', () => {
    connection.isAlive = true;
  });

  let idleTimer: NodeJS.Timeout | undefined;
  const armIdle = (): void => {
    if (idleTimer) clearTimeout(idleTimer);
    idleTimer = setTimeout(() => {
      wsClose(ws, {
        ...getCloseParams(CloseSource.IDLE_TIMEOUT),
        closeSource: CloseSource.IDLE_TIMEOUT,
        connectionId
      });
    }, options.idleTimeoutMs);
  };
  armIdle();

  ws.on('message', (data: RawData, isBinary: boolean) => {
    armIdle();
    if (isBinary) {
      logger.debug({ connectionId, event: 'ws_binary_ignored' }, 'Ignoring binary frame');
      return;
    }
    multiplexer.receive(rawDataToString(data)).catch((err: unknown) => {
      logger.error({
        connectionId,
        error: err instanceof Error ? err.message : String(err)
      }, 'WebSocket frame dispatch failed');
    });
  });

  ws.on('close', (code: number, reason: Buffer) => {
    if (idleTimer) clearTimeout(idleTimer);
    handleClose(connection, code, reason)
      .catch((err: unknown) => {
        logger.error({
          connectionId,
          error: err instanceof Error ? err.message : String(err)
        }, 'WebSocket close cleanup failed');
      })
      .finally(() => options.onClosed(connection));
  });

  ws.on('error', (err: Error) => {
    logger.error({ connectionId, error: err.message }, 'WebSocket error');
  });

  return connection;
}

/**
 * Stop the multiplexer and log why the socket went away
 */
export async function handleClose(
  connection: TrackedConnection,
  code: number,
  reasonBuffer: Buffer
): Promise<void> {
  const tag = getCloseTag(connection.socket);
  const reason = reasonBuffer.toString().trim() || tag.reason || 'none';

  await connection.multiplexer.close(tag.closeSource === CloseSource.CLIENT_CLOSE ? 'client_closed' : reason);

  logger.info({
    connectionId: connection.connectionId,
    code,
    reason,
    closeSource: tag.closeSource,
    wasClean: code === 1000 || code === 1001,
    durationMs: Date.now() - connection.connectedAt,
    event: 'websocket_disconnected'
  }, `WebSocket disconnected: ${tag.closeSource}`);
}

/**
 * Execute heartbeat: ping all connections, terminate dead ones
 */
export function executeHeartbeat(connections: Iterable<TrackedConnection>): void {
  let activeCount = 0;
  let terminatedCount = 0;

  for (const connection of connections) {
    if (!connection.isAlive) {
      wsClose(connection.socket, {
        ...getCloseParams(CloseSource.IDLE_TIMEOUT, CLOSE_REASONS.HEARTBEAT_TIMEOUT),
        closeSource: CloseSource.IDLE_TIMEOUT,
        connectionId: connection.connectionId
      });
      connection.socket.terminate();
      terminatedCount++;

      logger.info({
        connectionId: connection.connectionId,
        reason: 'heartbeat_timeout'
      }, 'WebSocket heartbeat: terminating unresponsive connection');
      continue;
    }

    connection.isAlive = false;
    connection.socket.ping();
    activeCount++;
  }

  if (terminatedCount > 0) {
    logger.debug({
      terminated: terminatedCount,
      active: activeCount
    }, 'WebSocket heartbeat: terminated dead connections');
  }
}

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8');
  }
  return data.toString('utf8');
}
