/**
 * RegistrationRegistry - ephemeral, RAM-only registration store
 *
 * Maps a requesting user to their pending or fulfilled registration.
 * Nothing here outlives the TTL: expired entries are evicted on the next
 * read of their key, and the sweep job removes the ones nobody reads again.
 *
 * All operations are synchronous. Each one runs to completion inside a
 * single event-loop turn, so mutations on the same key never interleave.
 * Callers must not hold an entry across an await and expect it to still
 * be live; read it again instead.
 *
 * @module services/RegistrationRegistry
 */

import type { GroupId, RegistrationEntry, RegistrationState, SubjectId } from '../types/index.js';
import { monotonicClock, type Clock } from '../utils/clock.js';
import type { SecureLogger } from './SecureLogger.js';

/** Default TTL (5 minutes) */
export const DEFAULT_REGISTRATION_TTL_MS = 5 * 60 * 1000;

/**
 * Registry configuration
 */
export interface RegistryConfig {
  /** Entry lifetime in ms */
  ttlMs?: number;
  /** Time source for createdAt/expiresAt */
  clock?: Clock;
  /** Event sink */
  logger: SecureLogger;
}

export class RegistrationRegistry {
  private readonly entries = new Map<string, RegistrationEntry>();
  private readonly ttlMs: number;
  private readonly clock: Clock;
  private readonly logger: SecureLogger;

  constructor(config: RegistryConfig) {
    const ttlMs = config.ttlMs ?? DEFAULT_REGISTRATION_TTL_MS;
    if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
      throw new Error('Invalid RegistryConfig: ttlMs must be > 0');
    }
    this.ttlMs = ttlMs;
    this.clock = config.clock ?? monotonicClock;
    this.logger = config.logger;
  }

  /**
   * Insert or replace the entry for a subject with a fresh lifetime.
   *
   * A live entry already bound to a different group is cleared first, so a
   * group id is never rewritten in place.
   */
  put(subjectId: SubjectId, state: RegistrationState, groupId?: GroupId): RegistrationEntry {
    const key = keyOf(subjectId);
    const existing = this.live(key);

    if (
      existing?.groupId !== undefined &&
      groupId !== undefined &&
      keyOf(existing.groupId) !== keyOf(groupId)
    ) {
      this.entries.delete(key);
      this.logger.record(
        'registry.entry_replaced',
        { subjectId, previousState: existing.state },
        'debug'
      );
    }

    const createdAt = this.clock.now();
    const entry: RegistrationEntry = Object.freeze({
      subjectId,
      state,
      ...(groupId !== undefined ? { groupId } : {}),
      createdAt,
      expiresAt: createdAt + this.ttlMs,
    });
    this.entries.set(key, entry);

    this.logger.record('registry.entry_stored', {
      subjectId,
      state,
      refreshed: existing !== null,
    });

    return entry;
  }

  /**
   * Live entry for a subject, or null when absent or expired
   */
  get(subjectId: SubjectId): RegistrationEntry | null {
    return this.live(keyOf(subjectId));
  }

  /**
   * Read and remove in one step; an entry can be taken at most once
   */
  take(subjectId: SubjectId): RegistrationEntry | null {
    const key = keyOf(subjectId);
    const entry = this.live(key);
    if (!entry) {
      return null;
    }

    this.entries.delete(key);
    this.logger.record('registry.entry_taken', { subjectId, state: entry.state }, 'debug');
    return entry;
  }

  /**
   * Remove every entry whose expiresAt has passed
   *
   * @returns Number of entries removed
   */
  sweep(now: number = this.clock.now()): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }

    if (removed > 0) {
      this.logger.record('registry.swept', { removed, remaining: this.entries.size });
    }
    return removed;
  }

  /**
   * Number of unexpired entries
   */
  size(): number {
    const now = this.clock.now();
    let count = 0;
    for (const entry of this.entries.values()) {
      if (entry.expiresAt > now) {
        count++;
      }
    }
    return count;
  }

  /**
   * Drop everything
   *
   * @returns Number of entries dropped
   */
  clear(): number {
    const count = this.entries.size;
    this.entries.clear();
    return count;
  }

  /**
   * Entry for a key, evicting it when its lifetime is over
   */
  private live(key: string): RegistrationEntry | null {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }

    if (this.clock.now() >= entry.expiresAt) {
      this.entries.delete(key);
      this.logger.record('registry.entry_expired', { subjectId: entry.subjectId }, 'debug');
      return null;
    }

    return entry;
  }
}

/**
 * Telegram ids arrive as numbers from updates and may arrive as strings
 * elsewhere; both forms must land on the same key.
 */
function keyOf(id: SubjectId | GroupId): string {
  return String(id);
}
