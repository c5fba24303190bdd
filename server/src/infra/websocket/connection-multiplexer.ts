/**
 * Connection Multiplexer
 * Owns one physical connection's command and event streams.
 *
 * Fan-in: direct acks and one forwarding task per subscribed session all
 * push into a single bounded outbound queue; one writer drains it to the
 * transport, so frames leave in one order and never interleave.
 * Fan-out: inbound frames are decoded and dispatched to the hub strictly
 * one after another.
 *
 * States: open → closing → closed. Malformed input never leaves `open`;
 * a failed send or a closed transport does.
 */

import { v4 as uuidv4 } from 'uuid';
import { logger } from '../../lib/logger/structured-logger.js';
import type { Logger } from '../../lib/logger/structured-logger.js';
import { BoundedQueue } from '../../lib/concurrency/bounded-queue.js';
import type { ConnectionHub } from '../hub/connection-hub.js';
import type { TopicReceiver } from '../hub/topic.js';
import { decodeClientMessage, encodeServerMessage } from './message-codec.js';
import type { ClientMessage, ServerMessage, SessionEvent } from './websocket-protocol.js';
import { CLOSE_REASONS, CloseSource } from './ws-close-reasons.js';

export const DEFAULT_OUTBOUND_CAPACITY = 256;

/** Inbound frames accepted but not yet dispatched before the peer is cut off */
export const DEFAULT_MAX_PENDING_FRAMES = 64;

/**
 * Write side of a connection
 */
export interface OutboundTransport {
  /** Resolves when the frame is written; rejects when the transport can no longer write */
  send(data: string): Promise<void>;
  /** Server-initiated close: a fatal send error or a peer breaking policy */
  close(source: CloseSource.ERROR | CloseSource.POLICY, reason: string): void;
}

/**
 * Hook into the producer collaborator that actually stops a session
 */
export type CancelHandler = (sessionId: string) => void | Promise<void>;

export type MultiplexerState = 'open' | 'closing' | 'closed';

export interface ConnectionMultiplexerOptions {
  hub: ConnectionHub;
  transport: OutboundTransport;
  connectionId?: string;
  outboundCapacity?: number;
  maxPendingFrames?: number;
  onCancel?: CancelHandler;
}

interface ForwardingTask {
  controller: AbortController;
  done: Promise<void>;
}

export class ConnectionMultiplexer {
  readonly connectionId: string;
  private readonly hub: ConnectionHub;
  private readonly transport: OutboundTransport;
  private readonly onCancel: CancelHandler | undefined;
  private readonly maxPendingFrames: number;
  private readonly outbound: BoundedQueue<ServerMessage>;
  // sessionId -> the one forwarding task for it on this connection
  private readonly forwarders = new Map<string, ForwardingTask>();
  private readonly log: Logger;
  private readonly writer: Promise<void>;
  private inbound: Promise<void> = Promise.resolve();
  private closing: Promise<void> | undefined;
  private state: MultiplexerState = 'open';
  private framesSent = 0;
  private framesReceived = 0;
  private pendingFrames = 0;

  constructor(options: ConnectionMultiplexerOptions) {
    this.connectionId = options.connectionId ?? uuidv4();
    this.hub = options.hub;
    this.transport = options.transport;
    this.onCancel = options.onCancel;
    this.maxPendingFrames = options.maxPendingFrames ?? DEFAULT_MAX_PENDING_FRAMES;
    this.outbound = new BoundedQueue<ServerMessage>(options.outboundCapacity ?? DEFAULT_OUTBOUND_CAPACITY);
    this.log = logger.child({ connectionId: this.connectionId });

    this.hub.register(this.connectionId);
    this.writer = this.runWriter();
  }

  getState(): MultiplexerState {
    return this.state;
  }

  /** Sessions with a live forwarding task */
  activeSubscriptions(): string[] {
    return Array.from(this.forwarders.keys());
  }

  getStats(): { framesSent: number; framesReceived: number; forwarders: number; queued: number } {
    return {
      framesSent: this.framesSent,
      framesReceived: this.framesReceived,
      forwarders: this.forwarders.size,
      queued: this.outbound.size
    };
  }

  /**
   * Accept one inbound text frame. Frames are handled in arrival order;
   * the promise settles when this one has been dispatched. A peer that
   * keeps writing while too many frames wait is closed with a policy error.
   */
  receive(frame: string): Promise<void> {
    this.framesReceived++;

    if (this.pendingFrames >= this.maxPendingFrames) {
      if (this.state === 'open') {
        this.log.warn({
          pendingFrames: this.pendingFrames,
          event: 'ws_inbound_backlog'
        }, 'Too many inbound frames pending; closing connection');
        this.transport.close(CloseSource.POLICY, CLOSE_REASONS.INBOUND_BACKLOG);
      }
      return this.close('inbound_backlog');
    }

    this.pendingFrames++;
    const next = this.inbound
      .then(() => this.dispatchFrame(frame))
      .finally(() => {
        this.pendingFrames--;
      });
    this.inbound = next;
    return next;
  }

  /**
   * Transport ended or failed: stop every forwarding task, then unregister.
   * Idempotent; every caller gets the same promise.
   */
  close(reason: string = 'transport_closed'): Promise<void> {
    if (!this.closing) {
      this.closing = this.shutdown(reason);
    }
    return this.closing;
  }

  /**
   * Settles once the writer has stopped (after close)
   */
  drained(): Promise<void> {
    return this.writer;
  }

  private async shutdown(reason: string): Promise<void> {
    this.state = 'closing';
    this.outbound.close();

    const tasks = Array.from(this.forwarders.values());
    this.forwarders.clear();
    for (const task of tasks) {
      task.controller.abort();
    }
    await Promise.all(tasks.map(task => task.done));

    this.hub.unregister(this.connectionId);
    this.state = 'closed';

    this.log.info({
      reason,
      framesSent: this.framesSent,
      framesReceived: this.framesReceived,
      forwardersStopped: tasks.length,
      event: 'ws_connection_closed'
    }, 'Connection multiplexer closed');
  }

  private async dispatchFrame(frame: string): Promise<void> {
    if (this.state !== 'open') {
      return;
    }

    const decoded = decodeClientMessage(frame);
    if (!decoded.ok) {
      this.log.warn({
        reason: decoded.reason,
        error: decoded.error,
        event: 'ws_decode_failed'
      }, 'Malformed client frame');
      await this.emit({ type: 'error', message: decoded.error });
      return;
    }

    try {
      await this.dispatch(decoded.message);
    } catch (err) {
      this.log.error({
        type: decoded.message.type,
        error: err instanceof Error ? err.message : String(err),
        event: 'ws_command_failed'
      }, 'Command handler threw');
      await this.emit({ type: 'error', message: `Failed to process ${decoded.message.type} command` });
    }
  }

  private async dispatch(message: ClientMessage): Promise<void> {
    switch (message.type) {
      case 'subscribe':
        return this.handleSubscribe(message.session_id);
      case 'unsubscribe':
        return this.handleUnsubscribe(message.session_id);
      case 'cancel':
        return this.handleCancel(message.session_id);
      case 'ping':
        await this.emit({ type: 'pong' });
        return;
    }
  }

  private async handleSubscribe(sessionId: string): Promise<void> {
    if (this.forwarders.has(sessionId)) {
      this.log.debug({ sessionId, event: 'ws_subscribe_duplicate' }, 'Already forwarding session');
    } else {
      const receiver = this.hub.subscribe(this.connectionId, sessionId);
      this.startForwarding(sessionId, receiver);
      this.log.info({ sessionId, event: 'ws_subscribed' }, 'Subscribed to session');
    }

    // Not a delivery barrier: events may already be queued ahead of it
    await this.emit({ type: 'subscribed', session_id: sessionId });
  }

  /**
   * Stops the forwarding task cooperatively: an event it already took off
   * the topic is still delivered, possibly after the ack.
   */
  private async handleUnsubscribe(sessionId: string): Promise<void> {
    this.hub.unsubscribe(this.connectionId, sessionId);

    const task = this.forwarders.get(sessionId);
    if (task) {
      this.forwarders.delete(sessionId);
      task.controller.abort();
    }

    this.log.info({ sessionId, hadForwarder: Boolean(task), event: 'ws_unsubscribed' }, 'Unsubscribed from session');
    await this.emit({ type: 'unsubscribed', session_id: sessionId });
  }

  private async handleCancel(sessionId: string): Promise<void> {
    const delivered = this.hub.publish(sessionId, {
      type: 'status',
      session_id: sessionId,
      status: 'cancelled'
    });
    this.log.info({ sessionId, delivered, event: 'ws_cancel_requested' }, 'Cancel broadcast');

    if (!this.onCancel) {
      return;
    }

    try {
      await this.onCancel(sessionId);
    } catch (err) {
      this.log.warn({
        sessionId,
        error: err instanceof Error ? err.message : String(err),
        event: 'ws_cancel_failed'
      }, 'Cancel handler failed');
      await this.emit({ type: 'error', message: `Failed to cancel session ${sessionId}` });
    }
  }

  private startForwarding(sessionId: string, receiver: TopicReceiver<SessionEvent>): void {
    const controller = new AbortController();
    controller.signal.addEventListener('abort', () => receiver.close(), { once: true });

    const done = this.forward(sessionId, receiver, controller.signal).finally(() => {
      receiver.close();
      if (this.forwarders.get(sessionId)?.controller === controller) {
        this.forwarders.delete(sessionId);
      }
      this.hub.reclaim(sessionId);
    });

    this.forwarders.set(sessionId, { controller, done });
  }

  private async forward(
    sessionId: string,
    receiver: TopicReceiver<SessionEvent>,
    signal: AbortSignal
  ): Promise<void> {
    let forwarded = 0;
    let skipped = 0;

    try {
      while (!signal.aborted) {
        const result = await receiver.recv();
        if (result.kind === 'closed') {
          break;
        }
        if (result.kind === 'lagged') {
          skipped += result.skipped;
          this.log.warn({
            sessionId,
            skipped: result.skipped,
            event: 'ws_subscriber_lagged'
          }, 'Subscriber fell behind; oldest events dropped');
          continue;
        }
        if (!(await this.outbound.push(result.event))) {
          break;
        }
        forwarded++;
      }
    } catch (err) {
      this.log.error({
        sessionId,
        error: err instanceof Error ? err.message : String(err),
        event: 'ws_forwarding_failed'
      }, 'Forwarding task failed');
    }

    this.log.debug({ sessionId, forwarded, skipped }, 'Forwarding task stopped');
  }

  private async emit(message: ServerMessage): Promise<void> {
    const accepted = await this.outbound.push(message);
    if (!accepted) {
      this.log.debug({ type: message.type }, 'Dropped outbound message: connection closing');
    }
  }

  private async runWriter(): Promise<void> {
    for (;;) {
      const message = await this.outbound.shift();
      if (message === undefined) {
        return;
      }

      let frame: string;
      try {
        frame = encodeServerMessage(message);
      } catch (err) {
        this.log.error({
          type: message.type,
          error: err instanceof Error ? err.message : String(err)
        }, 'Failed to encode outbound message');
        // Sent in place of the frame; the writer cannot queue behind itself
        frame = encodeServerMessage({ type: 'error', message: `Failed to encode ${message.type} message` });
      }

      try {
        await this.transport.send(frame);
        this.framesSent++;
      } catch (err) {
        this.log.warn({
          error: err instanceof Error ? err.message : String(err),
          event: 'ws_send_failed'
        }, 'Outbound send failed; closing connection');
        this.transport.close(CloseSource.ERROR, CLOSE_REASONS.SEND_FAILED);
        await this.close('send_failed');
        return;
      }
    }
  }
}
