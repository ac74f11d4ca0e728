import type { Logger } from '../types.js';

/**
 * Options shared by every step factory.
 */
export interface StepOptions {
  /**
   * Simulated processing time in milliseconds, awaited after the step's
   * checks pass.
   * @default 0
   */
  latencyMs?: number;
  logger?: Logger;
}

/** Resolve after `ms` milliseconds; resolves immediately for `0`. */
export async function simulateLatency(ms: number | undefined): Promise<void> {
  if (!ms || ms <= 0) {
    return;
  }
  await new Promise<void>((resolve) => setTimeout(resolve, ms));
}
