/**
 * ClientConnection adapter over a `ws` socket.
 */

import { WebSocket } from 'ws';
import type { ServerEvent } from '@scanlink/shared';
import type { ClientConnection, ConnectionId } from '../sessions/types.js';

export class WsConnection implements ClientConnection {
  constructor(
    readonly id: ConnectionId,
    private readonly ws: WebSocket,
  ) {}

  send(event: ServerEvent): Promise<void> {
    if (this.ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new Error(`Connection ${this.id} is not open`));
    }
    return new Promise<void>((resolve, reject) => {
      this.ws.send(JSON.stringify(event), (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  close(code?: number, reason?: string): void {
    this.ws.close(code, reason);
  }
}
