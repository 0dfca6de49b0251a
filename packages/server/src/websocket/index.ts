export { createWebSocketServer, WEBSOCKET_PATH } from './server.js';
export { ConnectionSession, type ConnectionSessionDeps } from './connection-session.js';
export { WsConnection } from './ws-connection.js';
export {
  decodeFrame,
  frameType,
  parseRegistration,
  parsePairingRequest,
  type Registration,
  type PairingRequest,
} from './protocol.js';
