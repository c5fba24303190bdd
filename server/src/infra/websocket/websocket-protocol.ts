/**
 * WebSocket Message Protocol
 * Defines client→server commands and server→client events
 *
 * Every frame is one JSON object tagged by `type` (snake_case).
 */

import { z } from 'zod';

// ============================================================================
// Shared value types
// ============================================================================

export const OUTPUT_STREAMS = ['stdout', 'stderr'] as const;

/** stdout is the primary stream, stderr the error stream */
export type OutputStream = (typeof OUTPUT_STREAMS)[number];

export const SESSION_STATUSES = ['idle', 'running', 'completed', 'error', 'cancelled'] as const;

export type SessionStatus = (typeof SESSION_STATUSES)[number];

// Hyphenated or bare 32-hex form, any case
const SESSION_ID_PATTERN =
  /^(?:[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}|[0-9a-f]{32})$/i;

/**
 * Every spelling of a session id maps to one key: lowercase, hyphenated
 */
export function canonicalSessionId(raw: string): string {
  const hex = raw.replace(/-/g, '').toLowerCase();
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}

export const SessionIdSchema = z.string()
  .regex(SESSION_ID_PATTERN, 'Invalid uuid')
  .transform(canonicalSessionId);

export const OutputStreamSchema = z.enum(OUTPUT_STREAMS);

export const SessionStatusSchema = z.enum(SESSION_STATUSES);

// ============================================================================
// Client → Server Messages
// ============================================================================

export const ClientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('subscribe'), session_id: SessionIdSchema }),
  z.object({ type: z.literal('unsubscribe'), session_id: SessionIdSchema }),
  z.object({ type: z.literal('cancel'), session_id: SessionIdSchema }),
  z.object({ type: z.literal('ping') }),
]);

export type ClientMessage = z.infer<typeof ClientMessageSchema>;

// ============================================================================
// Server → Client Messages
// ============================================================================

export interface WSServerSubscribed {
  type: 'subscribed';
  session_id: string;
}

export interface WSServerUnsubscribed {
  type: 'unsubscribed';
  session_id: string;
}

/**
 * One line of session output
 */
export interface WSServerOutput {
  type: 'output';
  session_id: string;
  stream: OutputStream;
  content: string;
}

/**
 * Session lifecycle transition
 */
export interface WSServerStatus {
  type: 'status';
  session_id: string;
  status: SessionStatus;
}

/**
 * Non-fatal failure: malformed input or a failed operation
 */
export interface WSServerError {
  type: 'error';
  message: string;
}

export interface WSServerPong {
  type: 'pong';
}

export type ServerMessage =
  | WSServerSubscribed
  | WSServerUnsubscribed
  | WSServerOutput
  | WSServerStatus
  | WSServerError
  | WSServerPong;

/**
 * Events a producer may publish into a session topic
 */
export type SessionEvent = WSServerOutput | WSServerStatus;

/**
 * Server frames as a client sees them, used to read frames back in clients and tests
 */
export const ServerMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('subscribed'), session_id: z.string() }),
  z.object({ type: z.literal('unsubscribed'), session_id: z.string() }),
  z.object({
    type: z.literal('output'),
    session_id: z.string(),
    stream: OutputStreamSchema,
    content: z.string(),
  }),
  z.object({ type: z.literal('status'), session_id: z.string(), status: SessionStatusSchema }),
  z.object({ type: z.literal('error'), message: z.string() }),
  z.object({ type: z.literal('pong') }),
]);
