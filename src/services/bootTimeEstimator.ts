import type { ServerEntry } from '../types';
import { logger } from '../utils/logger';

export const BOOT_HISTORY_LIMIT = 10;

/**
 * Returns a new history with `seconds` appended, keeping only the newest `limit` samples.
 */
export function appendBootSample(
  history: readonly number[],
  seconds: number,
  limit: number = BOOT_HISTORY_LIMIT
): number[] {
  return [...history, seconds].slice(-limit);
}

export function averageBootTime(history: readonly number[]): number | null {
  if (history.length === 0) {
    return null;
  }

  const total = history.reduce((sum, sample) => sum + sample, 0);
  return Math.floor(total / history.length);
}

export interface BootTimeEstimator {
  recordSample(serverId: number, seconds: number): Promise<boolean>;
  estimate(serverId: number): number | null;
}

/**
 * Registry methods the estimator reads and writes history through.
 */
export interface BootHistoryStore {
  get(id: number): ServerEntry | undefined;
  appendBootSample(id: number, seconds: number): Promise<boolean>;
}

/**
 * Estimates boot time from the samples persisted alongside each server entry.
 */
export class RegistryBootTimeEstimator implements BootTimeEstimator {
  constructor(private readonly store: BootHistoryStore) {}

  async recordSample(serverId: number, seconds: number): Promise<boolean> {
    const rounded = Math.round(seconds);
    if (!Number.isFinite(rounded) || rounded <= 0) {
      logger.debug('Ignoring boot time sample', { serverId, seconds });
      return false;
    }

    const recorded = await this.store.appendBootSample(serverId, rounded);
    if (recorded) {
      logger.info('Recorded boot time sample', { serverId, seconds: rounded });
    }
    return recorded;
  }

  estimate(serverId: number): number | null {
    const entry = this.store.get(serverId);
    return entry ? averageBootTime(entry.bootHistory) : null;
  }
}
