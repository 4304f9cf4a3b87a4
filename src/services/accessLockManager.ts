import type { ServerEntry, UnlockRecords, UnlockState } from '../types';
import { logger } from '../utils/logger';

export const DEFAULT_UNLOCK_TTL_MS = 24 * 60 * 60 * 1000;

export interface AccessLockManagerOptions {
  ttlMs?: number;
  now?: () => number;
}

/**
 * Access Lock Manager
 * PIN gate for locked servers. Unlocks are stored per session as serverId -> timestamp
 * and expire after the TTL; an expired record is removed when it is next checked.
 */
export class AccessLockManager {
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: AccessLockManagerOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_UNLOCK_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  requiresPin(entry: ServerEntry): boolean {
    return entry.locked && entry.pin !== '';
  }

  verifyPin(entry: ServerEntry, submitted: string | undefined): boolean {
    return submitted !== undefined && submitted === entry.pin;
  }

  isUnlocked(state: UnlockState, serverId: number): boolean {
    const records = state.unlockedServers;
    const key = String(serverId);
    if (!records || !Object.prototype.hasOwnProperty.call(records, key)) {
      return false;
    }

    const unlockedAt = records[key];
    if (this.now() - unlockedAt > this.ttlMs) {
      const remaining: UnlockRecords = { ...records };
      delete remaining[key];
      state.unlockedServers = remaining;
      logger.debug('Expired server unlock removed from session', { serverId });
      return false;
    }

    return true;
  }

  unlock(state: UnlockState, serverId: number): void {
    state.unlockedServers = {
      ...(state.unlockedServers ?? {}),
      [String(serverId)]: this.now(),
    };
  }

  /**
   * Gate check used by the wake and status handlers.
   */
  canAccess(state: UnlockState, entry: ServerEntry): boolean {
    return !this.requiresPin(entry) || this.isUnlocked(state, entry.id);
  }
}
