/**
 * Message Codec
 * Parses and validates inbound frames, serializes outbound envelopes.
 * PURE codec logic - no WebSocket lifecycle management
 */

import type { ZodError } from 'zod';
import { ClientMessageSchema, ServerMessageSchema } from './websocket-protocol.js';
import type { ClientMessage, ServerMessage } from './websocket-protocol.js';

export const DECODE_ERROR_PREFIX = 'Invalid message format';

export type DecodeResult<T> =
  | { ok: true; message: T }
  | { ok: false; reason: 'parse_error' | 'invalid_format'; error: string };

function describeIssues(error: ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : 'message'}: ${issue.message}`)
    .join('; ');
}

function decodeWith<T>(
  raw: string,
  parse: (value: unknown) => { success: true; data: T } | { success: false; error: ZodError }
): DecodeResult<T> {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (err) {
    const detail = err instanceof Error ? err.message : 'unparseable JSON';
    return { ok: false, reason: 'parse_error', error: `${DECODE_ERROR_PREFIX}: ${detail}` };
  }

  const result = parse(value);
  if (!result.success) {
    return {
      ok: false,
      reason: 'invalid_format',
      error: `${DECODE_ERROR_PREFIX}: ${describeIssues(result.error)}`,
    };
  }

  return { ok: true, message: result.data };
}

/**
 * Decode one client frame into a command envelope
 */
export function decodeClientMessage(raw: string): DecodeResult<ClientMessage> {
  return decodeWith<ClientMessage>(raw, value => ClientMessageSchema.safeParse(value));
}

/**
 * Decode one server frame (client side of the wire)
 */
export function decodeServerMessage(raw: string): DecodeResult<ServerMessage> {
  return decodeWith<ServerMessage>(raw, value => ServerMessageSchema.safeParse(value));
}

export function encodeServerMessage(message: ServerMessage): string {
  return JSON.stringify(message);
}

export function encodeClientMessage(message: ClientMessage): string {
  return JSON.stringify(message);
}
