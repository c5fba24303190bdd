/**
 * WebSocket Close Codes and Reasons
 * Centralized taxonomy for all WS disconnections
 *
 * Standard WebSocket close codes:
 * - 1000: Normal closure
 * - 1001: Going away (server shutdown, idle timeout)
 * - 1008: Policy violation
 * - 1011: Unexpected condition (errors)
 */

import type { WebSocket } from 'ws';
import { logger } from '../../lib/logger/structured-logger.js';

/**
 * Close Source Taxonomy
 * Tags every close with its originating cause
 */
export enum CloseSource {
  IDLE_TIMEOUT = 'IDLE_TIMEOUT',           // No inbound frames for WS_IDLE_TIMEOUT_MS
  SERVER_SHUTDOWN = 'SERVER_SHUTDOWN',     // Graceful server shutdown
  CLIENT_CLOSE = 'CLIENT_CLOSE',           // Client initiated close
  POLICY = 'POLICY',                       // Protocol violation
  ERROR = 'ERROR',                         // Transport failure
}

export const CLOSE_REASONS = {
  SERVER_SHUTDOWN: 'SERVER_SHUTDOWN',
  IDLE_TIMEOUT: 'IDLE_TIMEOUT',
  HEARTBEAT_TIMEOUT: 'HEARTBEAT_TIMEOUT',
  SEND_FAILED: 'SEND_FAILED',
  INBOUND_BACKLOG: 'INBOUND_BACKLOG',
} as const;

export interface WSCloseOptions {
  code: number;
  reason: string;
  closeSource: CloseSource;
  connectionId?: string;
}

/**
 * Why each socket was closed by us, read back when the close event fires
 */
const closeTags = new WeakMap<WebSocket, { closeSource: CloseSource; reason: string }>();

/**
 * Centralized WebSocket close helper
 * SINGLE SOURCE OF TRUTH for all server-initiated closes
 *
 * Ensures:
 * - Code 1001 only for IDLE_TIMEOUT/SERVER_SHUTDOWN
 * - All closes have non-empty reason
 * - closeSource is always tagged
 */
export function wsClose(ws: WebSocket, options: WSCloseOptions): void {
  const { code, reason, closeSource, connectionId } = options;
  const finalReason = reason.trim() || 'UNKNOWN';

  if (code === 1001 && closeSource !== CloseSource.IDLE_TIMEOUT && closeSource !== CloseSource.SERVER_SHUTDOWN) {
    logger.warn({
      connectionId,
      code,
      reason: finalReason,
      closeSource,
      event: 'ws_close_code_mismatch'
    }, '[WS] Code 1001 used with non-IDLE/SHUTDOWN source - should use different code');
  }

  closeTags.set(ws, { closeSource, reason: finalReason });

  try {
    ws.close(code, finalReason);
  } catch (err) {
    // Socket may already be gone; the close event still runs cleanup
    logger.debug({
      connectionId,
      error: err instanceof Error ? err.message : String(err)
    }, '[WS] close() threw');
  }
}

/**
 * Close source recorded by wsClose(), CLIENT_CLOSE when we did not initiate it
 */
export function getCloseTag(ws: WebSocket): { closeSource: CloseSource; reason?: string } {
  return closeTags.get(ws) ?? { closeSource: CloseSource.CLIENT_CLOSE };
}

/**
 * Get appropriate close code and reason for a closeSource
 */
export function getCloseParams(closeSource: CloseSource, reason?: string): Pick<WSCloseOptions, 'code' | 'reason'> {
  switch (closeSource) {
    case CloseSource.IDLE_TIMEOUT:
      return { code: 1001, reason: reason || CLOSE_REASONS.IDLE_TIMEOUT };

    case CloseSource.SERVER_SHUTDOWN:
      return { code: 1001, reason: reason || CLOSE_REASONS.SERVER_SHUTDOWN };

    case CloseSource.CLIENT_CLOSE:
      return { code: 1000, reason: reason || 'CLIENT_CLOSE' };

    case CloseSource.POLICY:
      return { code: 1008, reason: reason || 'POLICY_VIOLATION' };

    case CloseSource.ERROR:
      return { code: 1011, reason: reason || 'UNEXPECTED_ERROR' };
  }
}
