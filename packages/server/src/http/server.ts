/**
 * HTTP server factory. Serves the health endpoint; the WebSocket endpoint
 * attaches to the same server.
 */

import { createServer, type Server, type ServerResponse } from 'http';
import type { ReconciliationSupervisor } from '../reconciliation/supervisor.js';
import type { SessionRegistry } from '../sessions/session-registry.js';
import type { PairingStore } from '../storage/types.js';

export interface HttpServerDeps {
  registry: Pick<SessionRegistry, 'getStats'>;
  store: Pick<PairingStore, 'ping'>;
  reconciliation: Pick<ReconciliationSupervisor, 'getStats'>;
}

export interface HealthReport {
  status: 'ok' | 'degraded';
  identities: number;
  connections: number;
  reconciliation: ReturnType<ReconciliationSupervisor['getStats']>;
}

/** Degraded means the store did not answer; sessions keep running either way. */
export async function buildHealthReport(deps: HttpServerDeps): Promise<HealthReport> {
  const storeOk = await deps.store.ping();
  const { identityCount, connectionCount } = deps.registry.getStats();
  return {
    status: storeOk ? 'ok' : 'degraded',
    identities: identityCount,
    connections: connectionCount,
    reconciliation: deps.reconciliation.getStats(),
  };
}

function writeJson(res: ServerResponse, status: number, body: HealthReport | { error: string }): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

export function createHttpServer(deps: HttpServerDeps): Server {
  return createServer(async (req, res) => {
    const url = new URL(req.url ?? '/', 'http://localhost');

    if (req.method === 'GET' && url.pathname === '/health') {
      const report = await buildHealthReport(deps);
      writeJson(res, report.status === 'ok' ? 200 : 503, report);
      return;
    }

    writeJson(res, 404, { error: 'Not found' });
  });
}
