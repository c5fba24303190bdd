/**
 * Adapts a `ws` socket to the multiplexer's outbound transport
 */

import { WebSocket } from 'ws';
import type { OutboundTransport } from './connection-multiplexer.js';
import { wsClose, getCloseParams, CloseSource } from './ws-close-reasons.js';

export class WebSocketTransport implements OutboundTransport {
  constructor(
    private readonly ws: WebSocket,
    private readonly connectionId: string
  ) { }

  /**
   * Resolves once `ws` has flushed the frame to the socket, so a
   * write-blocked peer suspends only this connection's writer
   */
  send(data: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.ws.readyState !== WebSocket.OPEN) {
        reject(new Error(`WebSocket is not open (readyState=${this.ws.readyState})`));
        return;
      }
      this.ws.send(data, (err) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }

  close(source: CloseSource.ERROR | CloseSource.POLICY, reason: string): void {
    wsClose(this.ws, {
      ...getCloseParams(source, reason),
      closeSource: source,
      connectionId: this.connectionId
    });
  }
}
