/**
 * scanlink server entry point.
 *
 * One HTTP server carries the health endpoint and the WebSocket endpoint
 * that scanners and dashboards connect to.
 */

import { HOST, PORT, SHUTDOWN_TIMEOUT_MS } from './config.js';
import { createApp, type App } from './app.js';
import { WEBSOCKET_PATH } from './websocket/index.js';

let app: App | null = null;

async function startup() {
  const created = await createApp();
  app = created;
  created.httpServer.listen(PORT, HOST, () => {
    console.log(`scanlink server running at http://${HOST}:${PORT}`);
    console.log(`WebSocket endpoint: ws://${HOST}:${PORT}${WEBSOCKET_PATH}`);
  });
}

startup().catch((err) => {
  console.error('Startup failed:', err);
  process.exit(1);
});

// Graceful shutdown
async function shutdown() {
  console.log('\nShutting down...');

  // Force exit if graceful shutdown hangs
  setTimeout(() => process.exit(0), SHUTDOWN_TIMEOUT_MS).unref();

  if (app) await app.close();
  process.exit(0);
}

// Wrap shutdown for signal handlers
function handleShutdown() {
  shutdown().catch((err) => {
    console.error('Shutdown error:', err);
    process.exit(1);
  });
}

process.on('SIGINT', handleShutdown);
process.on('SIGTERM', handleShutdown);
