/**
 * Server configuration: environment-driven constants and paths.
 */

import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Project root directory.
 * 3 levels up from src/ (packages/server/src → project root).
 */
export const PROJECT_ROOT = join(__dirname, '..', '..', '..');

export const PORT = parseInt(process.env.PORT ?? '8000', 10);

export const HOST = process.env.HOST ?? '0.0.0.0';

/**
 * Get the SQLite database path.
 * - Environment variable override (":memory:" is accepted)
 * - Otherwise: PROJECT_ROOT/data/scanlink.db
 */
export function getDatabasePath(): string {
  if (process.env.SCANLINK_DB) {
    return process.env.SCANLINK_DB;
  }
  return join(PROJECT_ROOT, 'data', 'scanlink.db');
}

/**
 * HMAC secret for HS256 bearer tokens.
 * The fallback is only suitable for local development.
 */
export const JWT_SECRET = process.env.JWT_SECRET ?? 'dev-secret-change-me';

function readNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    console.warn(`[config] Ignoring non-numeric ${name}=${raw}, using ${fallback}`);
    return fallback;
  }
  return value;
}

export interface LegacySimulationConfig {
  minDelayMs: number;
  maxDelayMs: number;
  /** Probability in [0, 1] that a save is rejected. */
  failureRate: number;
}

export function getLegacySimulationConfig(): LegacySimulationConfig {
  const minDelayMs = Math.max(0, readNumber('LEGACY_MIN_DELAY_MS', 2000));
  const maxDelayMs = Math.max(minDelayMs, readNumber('LEGACY_MAX_DELAY_MS', 10000));
  const failureRate = Math.min(1, Math.max(0, readNumber('LEGACY_FAILURE_RATE', 0.5)));
  return { minDelayMs, maxDelayMs, failureRate };
}

/** Grace period before a hung shutdown is forced. */
export const SHUTDOWN_TIMEOUT_MS = 2000;
