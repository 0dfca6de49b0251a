/**
 * Application wiring: builds the object graph and owns its lifetime.
 */

import type { Server } from 'http';
import type { WebSocketServer } from 'ws';
import { getDatabasePath, getLegacySimulationConfig, JWT_SECRET } from './config.js';
import { createHttpServer } from './http/index.js';
import { JwtIdentityResolver, type IdentityResolver } from './identity/index.js';
import { SimulatedLegacySystem, type LegacyDirectory, type LegacySink } from './legacy/index.js';
import { PairingCoordinator } from './pairing/index.js';
import { ReconciliationSupervisor } from './reconciliation/index.js';
import { Broadcaster, SessionRegistry } from './sessions/index.js';
import { SqlitePairingStore, type PairingStore } from './storage/index.js';
import { createWebSocketServer } from './websocket/index.js';

export interface AppOptions {
  store?: PairingStore;
  legacy?: LegacyDirectory & LegacySink;
  resolver?: IdentityResolver;
  jwtSecret?: string;
}

export interface App {
  store: PairingStore;
  registry: SessionRegistry;
  broadcaster: Broadcaster;
  reconciliation: ReconciliationSupervisor;
  coordinator: PairingCoordinator;
  resolver: IdentityResolver;
  httpServer: Server;
  wss: WebSocketServer;
  /** Close sockets, abandon reconciliation, close the store. */
  close(): Promise<void>;
}

export async function createApp(options: AppOptions = {}): Promise<App> {
  const store = options.store ?? (await SqlitePairingStore.open(getDatabasePath()));
  const legacy = options.legacy ?? new SimulatedLegacySystem(getLegacySimulationConfig());
  const resolver = options.resolver ?? new JwtIdentityResolver(options.jwtSecret ?? JWT_SECRET, legacy);

  const broadcaster = new Broadcaster();
  const registry = new SessionRegistry(broadcaster, store);
  const reconciliation = new ReconciliationSupervisor(store, legacy);
  const coordinator = new PairingCoordinator({ registry, broadcaster, store, reconciliation });

  const httpServer = createHttpServer({ registry, store, reconciliation });
  const wss = createWebSocketServer(httpServer, { registry, broadcaster, coordinator, resolver });

  async function close(): Promise<void> {
    for (const client of wss.clients) {
      client.terminate();
    }
    await new Promise<void>((resolve) => wss.close(() => resolve()));
    await new Promise<void>((resolve) => {
      if (!httpServer.listening) {
        resolve();
        return;
      }
      httpServer.close(() => resolve());
    });
    reconciliation.abandon();
    registry.clear();
    await store.close();
  }

  return { store, registry, broadcaster, reconciliation, coordinator, resolver, httpServer, wss, close };
}
