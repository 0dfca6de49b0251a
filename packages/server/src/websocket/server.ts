/**
 * WebSocket server factory.
 *
 * Each socket gets a ConnectionSession that runs the register-first
 * protocol. The session outlives nothing: closing the socket unregisters
 * it from its identity context.
 */

import type { Server } from 'http';
import { WebSocketServer, type WebSocket } from 'ws';
import { generateConnectionId } from '../sessions/types.js';
import { ConnectionSession, type ConnectionSessionDeps } from './connection-session.js';
import { WsConnection } from './ws-connection.js';

export const WEBSOCKET_PATH = '/ws';

export function createWebSocketServer(httpServer: Server, deps: ConnectionSessionDeps): WebSocketServer {
  const wss = new WebSocketServer({ server: httpServer, path: WEBSOCKET_PATH });

  wss.on('connection', (ws: WebSocket) => {
    const connection = new WsConnection(generateConnectionId(), ws);
    const session = new ConnectionSession(connection, deps);
    console.log(`WebSocket client connected: ${connection.id}`);

    ws.on('message', (data, isBinary) => {
      if (isBinary) {
        console.warn(`[WebSocket] Binary frame from ${connection.id} ignored`);
        return;
      }
      void session.handleMessage(data.toString());
    });

    ws.on('close', () => {
      console.log(`WebSocket client disconnected: ${connection.id}`);
      void session.handleClose();
    });

    ws.on('error', (err) => {
      console.error(`WebSocket error on ${connection.id}:`, err);
    });
  });

  return wss;
}
