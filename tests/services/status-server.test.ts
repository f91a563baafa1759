import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Server } from 'node:http';
import {
  closeServer,
  createStatusApp,
  startStatusServer,
  statusCodeFor,
  toHealthBody,
} from '../../src/services/status-server.js';
import { buildHealthSnapshot, createHealthCell, toItemHealth } from '../../src/monitors/health-cell.js';
import type { HealthCell } from '../../src/monitors/health-cell.js';
import { PollScheduler } from '../../src/monitors/scheduler.js';
import { Database } from '../../src/services/database.js';
import { LogNotifier } from '../../src/services/notifier.js';
import type { PriceSource } from '../../src/services/price-source.js';
import { createSample } from '../../src/utils/sample.js';
import type { MonitorState, PriceSample, TrackedItem } from '../../src/types.js';

const STARTED_AT = '2026-01-01T00:00:00.000Z';
const ITEM: TrackedItem = { id: 'xm5', query: 'Sony WH-1000XM5' };

const createState = (overrides: Partial<MonitorState> = {}): MonitorState => ({
  itemId: 'xm5',
  lastKnown: createSample('xm5', 249.99, 'GBP', '2026-01-01T00:01:00.000Z', { provider: 'serper' }),
  lastCheckAt: '2026-01-01T00:01:00.000Z',
  lastOutcome: 'success',
  consecutiveFailures: 0,
  lastErrorKind: null,
  inTargetRange: false,
  ...overrides,
});

const baseUrl = (server: Server): string => {
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Server is not listening on a TCP port');
  }
  return `http://127.0.0.1:${address.port}`;
};

describe('status server', () => {
  let health: HealthCell;
  let server: Server;
  let url: string;

  beforeEach(async () => {
    health = createHealthCell([ITEM], STARTED_AT, 3);
    const app = createStatusApp(health, { clock: () => new Date('2026-01-01T00:01:30.000Z') });
    server = await new Promise<Server>(resolve => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    url = baseUrl(server);
  });

  afterEach(async () => {
    await closeServer(server);
  });

  it('reports ok with no checks yet', async () => {
    const response = await fetch(`${url}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: 'ok', lastCheck: null, lastPrice: null });
  });

  it('serves the same body at the root path', async () => {
    health.publish(buildHealthSnapshot(STARTED_AT, [toItemHealth('xm5', createState())], 3));

    const response = await fetch(`${url}/`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      status: 'ok',
      lastCheck: '2026-01-01T00:01:00.000Z',
      lastPrice: 249.99,
    });
  });

  it('answers 503 once degraded', async () => {
    const failing = createState({
      lastOutcome: 'failure',
      consecutiveFailures: 4,
      lastErrorKind: 'SourceUnavailable',
    });
    health.publish(buildHealthSnapshot(STARTED_AT, [toItemHealth('xm5', failing)], 3));

    const response = await fetch(`${url}/health`);

    expect(response.status).toBe(503);
    expect(await response.json()).toEqual({
      status: 'degraded',
      lastCheck: '2026-01-01T00:01:00.000Z',
      lastPrice: 249.99,
    });
  });

  it('exposes per-item detail and uptime on /api/status', async () => {
    health.publish(
      buildHealthSnapshot(STARTED_AT, [toItemHealth('xm5', createState())], 3, {
        cycles: 1,
        alertsSent: 0,
        alertsFailed: 0,
      })
    );

    const response = await fetch(`${url}/api/status`);
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body).toEqual({
      status: 'ok',
      startedAt: STARTED_AT,
      lastCheck: '2026-01-01T00:01:00.000Z',
      lastOutcome: 'success',
      lastPrice: 249.99,
      consecutiveFailures: 0,
      items: [
        {
          itemId: 'xm5',
          lastCheck: '2026-01-01T00:01:00.000Z',
          lastOutcome: 'success',
          lastPrice: 249.99,
          currency: 'GBP',
          consecutiveFailures: 0,
          lastErrorKind: null,
        },
      ],
      stats: { cycles: 1, alertsSent: 0, alertsFailed: 0 },
      uptimeSeconds: 90,
    });
  });

  it('returns JSON 404 for unknown paths', async () => {
    const response = await fetch(`${url}/metrics`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'Not found' });
  });

  it('rejects non-GET requests to the health route', async () => {
    const response = await fetch(`${url}/health`, { method: 'POST' });

    expect(response.status).toBe(404);
  });
});

describe('status server during a poll cycle', () => {
  it('answers from the last published snapshot while a fetch is pending', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const db = new Database(':memory:');
    const health = createHealthCell([ITEM], STARTED_AT, 3, [createState()]);
    let release: (sample: PriceSample) => void = () => {};
    const pending: PriceSource = {
      name: 'pending',
      fetch: () =>
        new Promise<PriceSample>(resolve => {
          release = resolve;
        }),
    };
    const scheduler = new PollScheduler({
      items: [ITEM],
      source: pending,
      store: db,
      notifier: new LogNotifier(),
      health,
      policy: { minAbsoluteDelta: 0, minPercentDelta: 5, direction: 'any' },
      pollIntervalMs: 60_000,
      fetchTimeoutMs: 5000,
      notifyTimeoutMs: 1000,
      degradedAfterFailures: 3,
    });
    const app = createStatusApp(health);
    const server = await new Promise<Server>(resolve => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });

    try {
      scheduler.start();
      expect(scheduler.phase).toBe('fetching');

      const during = await fetch(`${baseUrl(server)}/health`);
      expect(during.status).toBe(200);
      expect(await during.json()).toEqual({
        status: 'ok',
        lastCheck: '2026-01-01T00:01:00.000Z',
        lastPrice: 249.99,
      });
      expect(scheduler.phase).toBe('fetching');

      release(createSample('xm5', 239.99, 'GBP', '2026-01-01T00:02:00.000Z', { provider: 'serper' }));
      await scheduler.stop();

      const after = await fetch(`${baseUrl(server)}/health`);
      const body = await after.json();
      expect(body).toMatchObject({ status: 'ok', lastPrice: 239.99 });
    } finally {
      await closeServer(server);
      db.close();
      vi.restoreAllMocks();
    }
  });
});

describe('startStatusServer', () => {
  it('listens on the requested port and closes', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const health = createHealthCell([ITEM], STARTED_AT, 3);

    const server = await startStatusServer(health, 0);
    const response = await fetch(`${baseUrl(server)}/health`);
    await closeServer(server);

    expect(response.status).toBe(200);
    expect(server.listening).toBe(false);
    vi.restoreAllMocks();
  });
});

describe('toHealthBody / statusCodeFor', () => {
  it('keeps only the public health fields', () => {
    const snapshot = buildHealthSnapshot(STARTED_AT, [toItemHealth('xm5', createState())], 3);

    expect(toHealthBody(snapshot)).toEqual({
      status: 'ok',
      lastCheck: '2026-01-01T00:01:00.000Z',
      lastPrice: 249.99,
    });
    expect(statusCodeFor(snapshot)).toBe(200);
  });
});
