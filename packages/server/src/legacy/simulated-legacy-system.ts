/**
 * Stand-in for the legacy system of record.
 *
 * Every login is known to the directory. Saves take a random time inside
 * the configured window and are rejected with the configured probability.
 */

import type { LegacySimulationConfig } from '../config.js';
import type { LegacyDirectory, LegacySink, LegacyUser } from './types.js';

export interface SimulatedLegacySystemOptions extends LegacySimulationConfig {
  /** Injectable for tests; defaults to Math.random. */
  random?: () => number;
}

export class SimulatedLegacySystem implements LegacyDirectory, LegacySink {
  private readonly random: () => number;

  constructor(private readonly options: SimulatedLegacySystemOptions) {
    this.random = options.random ?? Math.random;
    console.log(
      `[LegacySystem] Simulation ready (delay ${options.minDelayMs}-${options.maxDelayMs}ms, failure rate ${options.failureRate})`,
    );
  }

  async findUser(login: string): Promise<LegacyUser | null> {
    if (login.trim() === '') return null;
    return { id: 1, login, fullName: login };
  }

  async attemptSave(platform: number, product: number): Promise<boolean> {
    console.log(`[LegacySystem] Saving ${platform}-${product}`);
    const { minDelayMs, maxDelayMs, failureRate } = this.options;
    const delay = minDelayMs + this.random() * (maxDelayMs - minDelayMs);
    await new Promise<void>((resolve) => setTimeout(resolve, delay));

    if (this.random() < failureRate) {
      console.error(`[LegacySystem] Save rejected for ${platform}-${product}`);
      return false;
    }
    console.log(`[LegacySystem] Saved ${platform}-${product}`);
    return true;
  }
}
