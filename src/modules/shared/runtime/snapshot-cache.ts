/**
 * SNAPSHOT CACHE
 * ==============
 *
 * Read-through cache of computed lists, one slot per scope.
 *
 * Slot states:
 * - COLD   no snapshot yet
 * - WARM   snapshot younger than the TTL
 * - STALE  snapshot at or past the TTL, or marked stale
 *
 * A slot refreshes through a single gate: concurrent readers of a stale slot
 * wait for the one running computation instead of starting their own. A failed
 * refresh rejects only the caller that ran it; waiters fall back to the last
 * good snapshot when there is one.
 *
 * Each slot carries a generation bumped by `markStale`. A refresh that was
 * already running when the slot was marked stores its result as stale.
 */

import { systemClock, type Clock } from '../../../common/clock.js';
import { errorMessage } from '../../../common/errors.js';
import type { Logger } from '../../../common/logger.js';

export type SnapshotState = 'COLD' | 'WARM' | 'STALE';

export interface SnapshotEntry<T> {
  readonly items: readonly T[];
  readonly generatedAt: Date;
  readonly ttlMs: number;
  readonly stale: boolean;
}

interface Slot<T> {
  entry: SnapshotEntry<T> | null;
  refreshing: Promise<SnapshotEntry<T>> | null;
  generation: number;
}

export interface SnapshotCacheOptions {
  ttlMs: number;
  clock?: Clock;
  logger?: Logger;
}

export class SnapshotCache<T> {
  private readonly slots = new Map<string, Slot<T>>();
  private readonly clock: Clock;
  private hits = 0;
  private refreshes = 0;
  private failures = 0;

  constructor(private readonly options: SnapshotCacheOptions) {
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Returns a copy of the scope's snapshot, computing it when cold or stale.
   */
  async get(scope: string, compute: () => Promise<T[]>): Promise<T[]> {
    const slot = this.slot(scope);

    for (;;) {
      if (slot.entry && this.isWarm(slot.entry)) {
        this.hits++;
        return copyItems(slot.entry.items);
      }

      if (!slot.refreshing) {
        return this.refresh(scope, slot, compute);
      }

      try {
        await slot.refreshing;
      } catch (err) {
        if (slot.entry) {
          this.options.logger?.warn({ scope, error: errorMessage(err) }, 'Serving stale snapshot after failed refresh');
          return copyItems(slot.entry.items);
        }
      }
    }
  }

  state(scope: string): SnapshotState {
    const entry = this.slots.get(scope)?.entry;
    if (!entry) return 'COLD';
    return this.isWarm(entry) ? 'WARM' : 'STALE';
  }

  /** Copy of the current entry, for inspection */
  peek(scope: string): SnapshotEntry<T> | null {
    const entry = this.slots.get(scope)?.entry;
    if (!entry) return null;
    return Object.freeze({
      ...entry,
      items: Object.freeze(copyItems(entry.items)),
      generatedAt: new Date(entry.generatedAt.getTime()),
    });
  }

  /**
   * Forces the next read of a scope (or every scope) to recompute. The old
   * snapshot is kept for serving under fault.
   */
  markStale(scope?: string): void {
    const targets = scope === undefined ? [...this.slots.values()] : [this.slots.get(scope)];
    for (const slot of targets) {
      if (!slot) continue;
      slot.generation++;
      if (slot.entry) {
        slot.entry = Object.freeze({ ...slot.entry, stale: true });
      }
    }
  }

  stats() {
    return {
      scopes: this.slots.size,
      hits: this.hits,
      refreshes: this.refreshes,
      failures: this.failures,
    };
  }

  private slot(scope: string): Slot<T> {
    let slot = this.slots.get(scope);
    if (!slot) {
      slot = { entry: null, refreshing: null, generation: 0 };
      this.slots.set(scope, slot);
    }
    return slot;
  }

  private isWarm(entry: SnapshotEntry<T>): boolean {
    return !entry.stale && this.clock.now() - entry.generatedAt.getTime() < entry.ttlMs;
  }

  private async refresh(scope: string, slot: Slot<T>, compute: () => Promise<T[]>): Promise<T[]> {
    this.refreshes++;
    const startedAt = this.clock.now();
    const generation = slot.generation;

    const pending = compute().then((items): SnapshotEntry<T> => {
      const entry = Object.freeze({
        items: Object.freeze(copyItems(items)),
        generatedAt: new Date(this.clock.now()),
        ttlMs: this.options.ttlMs,
        // Marked stale while computing: the result may predate the change
        stale: slot.generation !== generation,
      });
      slot.entry = entry;
      return entry;
    });
    slot.refreshing = pending;

    try {
      const entry = await pending;
      this.options.logger?.info(
        { scope, items: entry.items.length, stale: entry.stale, durationMs: this.clock.now() - startedAt },
        'Snapshot refreshed'
      );
      return copyItems(entry.items);
    } catch (err) {
      this.failures++;
      this.options.logger?.error({ scope, error: errorMessage(err) }, 'Snapshot refresh failed');
      throw err;
    } finally {
      slot.refreshing = null;
    }
  }
}

function copyItems<T>(items: readonly T[]): T[] {
  return items.map((item) => structuredClone(item));
}
