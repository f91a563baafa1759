import type { HealthSnapshot, ItemHealth, MonitorState, MonitorStats, TrackedItem } from '../types.js';

/**
 * Single-writer, multi-reader holder for the latest snapshot. Published
 * values are frozen and swapped by reference.
 */
export class SnapshotCell<T> {
  private current: Readonly<T>;

  constructor(initial: T) {
    this.current = Object.freeze(initial);
  }

  read(): Readonly<T> {
    return this.current;
  }

  publish(next: T): void {
    this.current = Object.freeze(next);
  }
}

export type HealthCell = SnapshotCell<HealthSnapshot>;

export function toItemHealth(itemId: string, state: MonitorState | null): ItemHealth {
  return Object.freeze({
    itemId,
    lastCheck: state?.lastCheckAt ?? null,
    lastOutcome: state?.lastOutcome ?? null,
    lastPrice: state?.lastKnown?.price ?? null,
    currency: state?.lastKnown?.currency ?? null,
    consecutiveFailures: state?.consecutiveFailures ?? 0,
    lastErrorKind: state?.lastErrorKind ?? null,
  });
}

/**
 * Degraded once any item has failed more than `degradedAfterFailures` times
 * in a row. Top-level `lastCheck`/`lastPrice` describe the most recently
 * checked item.
 */
export function buildHealthSnapshot(
  startedAt: string,
  items: ItemHealth[],
  degradedAfterFailures: number,
  stats: MonitorStats = { cycles: 0, alertsSent: 0, alertsFailed: 0 }
): HealthSnapshot {
  const latest = items.reduce<ItemHealth | null>((newest, item) => {
    if (item.lastCheck === null) return newest;
    if (!newest || item.lastCheck > (newest.lastCheck ?? '')) return item;
    return newest;
  }, null);

  const worstFailures = items.reduce((max, item) => Math.max(max, item.consecutiveFailures), 0);

  return {
    status: worstFailures > degradedAfterFailures ? 'degraded' : 'ok',
    startedAt,
    lastCheck: latest?.lastCheck ?? null,
    lastOutcome: latest?.lastOutcome ?? null,
    lastPrice: latest?.lastPrice ?? null,
    consecutiveFailures: worstFailures,
    items: [...items],
    stats: { ...stats },
  };
}

export function createHealthCell(
  items: TrackedItem[],
  startedAt: string,
  degradedAfterFailures: number,
  restored: MonitorState[] = []
): HealthCell {
  const byId = new Map(restored.map(state => [state.itemId, state]));
  const initial = items.map(item => toItemHealth(item.id, byId.get(item.id) ?? null));
  return new SnapshotCell(buildHealthSnapshot(startedAt, initial, degradedAfterFailures));
}
