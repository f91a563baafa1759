import { describe, it, expect } from 'vitest';
import {
  SnapshotCell,
  buildHealthSnapshot,
  createHealthCell,
  toItemHealth,
} from '../../src/monitors/health-cell.js';
import { createSample } from '../../src/utils/sample.js';
import type { ItemHealth, MonitorState } from '../../src/types.js';

const STARTED_AT = '2026-01-01T00:00:00.000Z';

const createState = (itemId: string, overrides: Partial<MonitorState> = {}): MonitorState => ({
  itemId,
  lastKnown: createSample(itemId, 100, 'GBP', '2026-01-01T00:05:00.000Z', { provider: 'serper' }),
  lastCheckAt: '2026-01-01T00:05:00.000Z',
  lastOutcome: 'success',
  consecutiveFailures: 0,
  lastErrorKind: null,
  inTargetRange: false,
  ...overrides,
});

const itemHealth = (itemId: string, overrides: Partial<ItemHealth> = {}): ItemHealth => ({
  ...toItemHealth(itemId, createState(itemId)),
  ...overrides,
});

describe('SnapshotCell', () => {
  it('returns the last published value frozen', () => {
    const cell = new SnapshotCell({ count: 1 });
    cell.publish({ count: 2 });

    const value = cell.read();
    expect(value).toEqual({ count: 2 });
    expect(Object.isFrozen(value)).toBe(true);
  });

  it('does not affect snapshots already handed to readers', () => {
    const cell = new SnapshotCell({ count: 1 });
    const before = cell.read();
    cell.publish({ count: 2 });

    expect(before.count).toBe(1);
  });
});

describe('toItemHealth', () => {
  it('describes an item that was never checked', () => {
    expect(toItemHealth('xm5', null)).toEqual({
      itemId: 'xm5',
      lastCheck: null,
      lastOutcome: null,
      lastPrice: null,
      currency: null,
      consecutiveFailures: 0,
      lastErrorKind: null,
    });
  });

  it('keeps the last price through failures', () => {
    const health = toItemHealth(
      'xm5',
      createState('xm5', { lastOutcome: 'failure', consecutiveFailures: 2, lastErrorKind: 'ParseError' })
    );

    expect(health.lastPrice).toBe(100);
    expect(health.currency).toBe('GBP');
    expect(health.consecutiveFailures).toBe(2);
    expect(health.lastErrorKind).toBe('ParseError');
  });
});

describe('buildHealthSnapshot', () => {
  it('is ok when failures stay at the threshold', () => {
    const snapshot = buildHealthSnapshot(STARTED_AT, [itemHealth('xm5', { consecutiveFailures: 3 })], 3);

    expect(snapshot.status).toBe('ok');
    expect(snapshot.consecutiveFailures).toBe(3);
  });

  it('is degraded when any item exceeds the threshold', () => {
    const snapshot = buildHealthSnapshot(
      STARTED_AT,
      [itemHealth('xm5'), itemHealth('airpods', { consecutiveFailures: 4 })],
      3
    );

    expect(snapshot.status).toBe('degraded');
    expect(snapshot.consecutiveFailures).toBe(4);
  });

  it('takes the top-level fields from the most recently checked item', () => {
    const snapshot = buildHealthSnapshot(
      STARTED_AT,
      [
        itemHealth('xm5', { lastCheck: '2026-01-01T00:10:00.000Z', lastPrice: 249 }),
        itemHealth('airpods', { lastCheck: '2026-01-01T00:11:00.000Z', lastPrice: 199, lastOutcome: 'failure' }),
        toItemHealth('unchecked', null),
      ],
      3
    );

    expect(snapshot.lastCheck).toBe('2026-01-01T00:11:00.000Z');
    expect(snapshot.lastPrice).toBe(199);
    expect(snapshot.lastOutcome).toBe('failure');
  });

  it('has no top-level check before any item ran', () => {
    const snapshot = buildHealthSnapshot(STARTED_AT, [toItemHealth('xm5', null)], 3);

    expect(snapshot.lastCheck).toBeNull();
    expect(snapshot.lastPrice).toBeNull();
    expect(snapshot.stats).toEqual({ cycles: 0, alertsSent: 0, alertsFailed: 0 });
  });
});

describe('createHealthCell', () => {
  it('seeds item health from restored state', () => {
    const cell = createHealthCell(
      [
        { id: 'xm5', query: 'Sony WH-1000XM5' },
        { id: 'airpods', query: 'AirPods Pro' },
      ],
      STARTED_AT,
      3,
      [createState('xm5'), createState('removed-item')]
    );

    const snapshot = cell.read();
    expect(snapshot.startedAt).toBe(STARTED_AT);
    expect(snapshot.items.map(item => item.itemId)).toEqual(['xm5', 'airpods']);
    expect(snapshot.items[0]?.lastPrice).toBe(100);
    expect(snapshot.items[1]?.lastCheck).toBeNull();
    expect(snapshot.lastPrice).toBe(100);
  });
});
