/**
 * Session Publisher
 * Producer-facing handle for one session.
 *
 * Bound to the session id rather than to a topic instance, so it keeps
 * working after the hub reclaims an orphaned topic and creates a new one.
 */

import type { OutputStream, SessionEvent, SessionStatus } from '../websocket/websocket-protocol.js';

/**
 * What an external producer may call on the hub
 */
export interface SessionEventSink {
  /** Fire-and-forget; returns how many subscribers the event was handed to */
  publish(sessionId: string, event: SessionEvent): number;
  /** Advisory: lets a producer skip output nobody is watching */
  hasSubscribers(sessionId: string): boolean;
}

export class SessionPublisher {
  constructor(
    private readonly sink: SessionEventSink,
    readonly sessionId: string
  ) { }

  output(stream: OutputStream, content: string): number {
    return this.sink.publish(this.sessionId, {
      type: 'output',
      session_id: this.sessionId,
      stream,
      content,
    });
  }

  status(status: SessionStatus): number {
    return this.sink.publish(this.sessionId, {
      type: 'status',
      session_id: this.sessionId,
      status,
    });
  }

  hasSubscribers(): boolean {
    return this.sink.hasSubscribers(this.sessionId);
  }
}
