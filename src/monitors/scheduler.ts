import { NotifyError, ParseError, describeError, isMonitorError } from '../errors.js';
import type { MonitorErrorKind } from '../errors.js';
import {
  evaluateChange,
  evaluateTargetRange,
  isInTargetRange,
  resolvePolicy,
} from '../services/change-detector.js';
import type { StateStore } from '../services/database.js';
import type { Notifier, NotifyResult } from '../services/notifier.js';
import { alertItemId } from '../services/notifier.js';
import type { PriceSource } from '../services/price-source.js';
import { describeAlert } from '../utils/embed.js';
import { createLogger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import { buildHealthSnapshot, toItemHealth } from './health-cell.js';
import type { HealthCell } from './health-cell.js';
import type {
  Alert,
  ChangeEvent,
  ChangePolicy,
  CheckOutcome,
  Clock,
  ItemHealth,
  MonitorState,
  MonitorStats,
  PriceSample,
  TargetRangeHit,
  TrackedItem,
} from '../types.js';

export type SchedulerPhase = 'idle' | 'fetching' | 'evaluating' | 'notifying';

export interface ItemCycleResult {
  itemId: string;
  outcome: CheckOutcome;
  event: ChangeEvent | null;
  targetRange: TargetRangeHit | null;
  /** null when nothing was sent; false when any alert failed to deliver. */
  notified: boolean | null;
  errorKind: MonitorErrorKind | null;
}

export interface PollSchedulerOptions {
  items: TrackedItem[];
  source: PriceSource;
  store: StateStore;
  notifier: Notifier;
  health: HealthCell;
  policy: ChangePolicy;
  pollIntervalMs: number;
  fetchTimeoutMs: number;
  notifyTimeoutMs: number;
  degradedAfterFailures: number;
  clock?: Clock;
}

const logger = createLogger('Monitor');

/**
 * Drives idle → fetching → evaluating → (notifying) → idle for every tracked
 * item. Cycles never overlap: the next one is armed only after the current
 * one has finished.
 */
export class PollScheduler {
  private options: PollSchedulerOptions;
  private clock: Clock;
  private currentPhase: SchedulerPhase = 'idle';
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private running = false;
  private itemHealth = new Map<string, ItemHealth>();
  private stats: MonitorStats = { cycles: 0, alertsSent: 0, alertsFailed: 0 };
  // Items whose current failure streak has already raised an error alert.
  private errorAlerted = new Set<string>();

  constructor(options: PollSchedulerOptions) {
    this.options = options;
    this.clock = options.clock ?? (() => new Date());

    const current = options.health.read();
    for (const item of current.items) {
      this.itemHealth.set(item.itemId, item);
    }
    this.stats = { ...current.stats };
  }

  get phase(): SchedulerPhase {
    return this.currentPhase;
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) return;
    if (this.inFlight) {
      logger.warn('A cycle from the previous run is still finishing; start() ignored');
      return;
    }
    this.running = true;

    logger.info(
      `Starting price monitor (interval: ${this.options.pollIntervalMs}ms, items: ${this.options.items.length})`
    );
    this.tick();
  }

  /** Cancels the next cycle and waits for the one in flight, if any. */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      logger.info('Waiting for the in-flight cycle to finish...');
      await this.inFlight;
    }
    logger.info('Stopped price monitor');
  }

  async runCycle(): Promise<ItemCycleResult[]> {
    logger.info('Running price check...');
    const results: ItemCycleResult[] = [];

    for (const item of this.options.items) {
      results.push(await this.runItemCycle(item));
    }

    this.stats = { ...this.stats, cycles: this.stats.cycles + 1 };
    this.publishHealth();

    const failures = results.filter(r => r.outcome === 'failure').length;
    const alerts = results.filter(r => r.notified === true).length;
    logger.info(`Check complete. ${results.length - failures} ok, ${failures} failed, ${alerts} alerts sent.`);
    return results;
  }

  async runItemCycle(item: TrackedItem): Promise<ItemCycleResult> {
    const cycleAt = this.clock().toISOString();
    this.transition('fetching');

    let previous: MonitorState | null;
    try {
      previous = this.options.store.load(item.id);
    } catch (error) {
      await this.handleStoreFailure(item, cycleAt, error);
      return {
        itemId: item.id,
        outcome: 'failure',
        event: null,
        targetRange: null,
        notified: null,
        errorKind: 'StoreUnavailable',
      };
    }

    let sample: PriceSample;
    try {
      sample = await withTimeout(this.options.source.fetch(item), this.options.fetchTimeoutMs, `Fetch for ${item.id}`);
      if (sample.itemId !== item.id) {
        throw new ParseError(`Source returned a sample for ${sample.itemId} while fetching ${item.id}`, {
          itemId: item.id,
        });
      }
    } catch (error) {
      const kind: MonitorErrorKind = isMonitorError(error) && error.kind === 'ParseError' ? 'ParseError' : 'SourceUnavailable';
      const failures = (previous?.consecutiveFailures ?? 0) + 1;
      const message = describeError(error);
      logger.warn(`Fetch failed for ${item.id} at ${cycleAt} [${kind}] (${failures} in a row): ${message}`);

      const result = await this.finish(
        item,
        cycleAt,
        {
          itemId: item.id,
          lastKnown: previous?.lastKnown ?? null,
          lastCheckAt: cycleAt,
          lastOutcome: 'failure',
          consecutiveFailures: failures,
          lastErrorKind: kind,
          inTargetRange: previous?.inTargetRange ?? false,
        },
        { itemId: item.id, outcome: 'failure', event: null, targetRange: null, notified: null, errorKind: kind }
      );
      if (result.errorKind === kind && failures > this.options.degradedAfterFailures) {
        await this.raiseErrorAlert(item, cycleAt, kind, message, failures);
      }
      return result;
    }

    this.transition('evaluating');
    const lastKnown = previous?.lastKnown ?? null;
    const wasInRange = previous?.inTargetRange ?? false;
    const isStale = lastKnown !== null && Date.parse(sample.timestamp) <= Date.parse(lastKnown.timestamp);
    let event: ChangeEvent | null = null;
    let rangeHit: TargetRangeHit | null = null;
    let inTargetRange = wasInRange;

    if (isStale && lastKnown) {
      logger.warn(
        `Ignoring sample for ${item.id} stamped ${sample.timestamp}; last known is ${lastKnown.timestamp}`
      );
    } else {
      const policy = resolvePolicy(this.options.policy, item);
      event = evaluateChange(lastKnown, sample, policy);
      rangeHit = evaluateTargetRange(wasInRange, sample, policy.targetRange);
      inTargetRange = isInTargetRange(sample.price, policy.targetRange);
      if (!lastKnown) {
        logger.info(`Baseline for ${item.id}: ${sample.price.toFixed(2)} ${sample.currency}`);
      }
    }

    const alerts: Alert[] = [];
    if (event) alerts.push({ type: 'change', event });
    if (rangeHit) alerts.push({ type: 'targetRange', hit: rangeHit });

    let notified: boolean | null = null;
    let errorKind: MonitorErrorKind | null = null;
    if (alerts.length > 0) {
      this.transition('notifying');
      notified = true;
      for (const alert of alerts) {
        const result = await this.deliver(alert);
        if (!result.ok) {
          notified = false;
          errorKind = result.error.kind;
          logger.error(`Alert delivery failed for ${item.id} at ${cycleAt} [${result.error.kind}]: ${result.error.message}`);
        }
      }
    }

    // Persisted whatever the notifier reported, so an undelivered alert is not raised again next cycle.
    return this.finish(
      item,
      cycleAt,
      {
        itemId: item.id,
        lastKnown: isStale ? lastKnown : sample,
        lastCheckAt: cycleAt,
        lastOutcome: 'success',
        consecutiveFailures: 0,
        lastErrorKind: null,
        inTargetRange,
      },
      { itemId: item.id, outcome: 'success', event, targetRange: rangeHit, notified, errorKind }
    );
  }

  private tick(): void {
    this.inFlight = this.runCycle()
      .then(() => undefined)
      .catch((error: unknown) => {
        logger.error('Unexpected error during price check:', error);
      })
      .finally(() => {
        this.inFlight = null;
        this.arm();
      });
  }

  private arm(): void {
    if (!this.running) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.tick();
    }, this.options.pollIntervalMs);
  }

  private async deliver(alert: Alert): Promise<NotifyResult> {
    logger.info(`Raising ${alert.type} alert: ${describeAlert(alert)}`);
    const itemId = alertItemId(alert);
    let result: NotifyResult;
    try {
      result = await withTimeout(
        this.options.notifier.notify(alert),
        this.options.notifyTimeoutMs,
        `Notify for ${itemId}`
      );
    } catch (error) {
      result = { ok: false, error: new NotifyError(describeError(error), { itemId, cause: error }) };
    }

    this.stats = result.ok
      ? { ...this.stats, alertsSent: this.stats.alertsSent + 1 }
      : { ...this.stats, alertsFailed: this.stats.alertsFailed + 1 };
    return result;
  }

  private async finish(
    item: TrackedItem,
    cycleAt: string,
    state: MonitorState,
    result: ItemCycleResult
  ): Promise<ItemCycleResult> {
    try {
      this.options.store.save(state);
    } catch (error) {
      await this.handleStoreFailure(item, cycleAt, error);
      return { ...result, outcome: 'failure', errorKind: 'StoreUnavailable' };
    }

    if (state.lastOutcome === 'success') {
      this.errorAlerted.delete(item.id);
    }
    this.itemHealth.set(item.id, toItemHealth(item.id, state));
    this.publishHealth();
    this.transition('idle');
    return result;
  }

  /**
   * The store cannot record the failure, so it is counted in memory only.
   * The next successful save replaces the count with the persisted one.
   */
  private async handleStoreFailure(item: TrackedItem, cycleAt: string, error: unknown): Promise<void> {
    const message = describeError(error);
    logger.error(`State store unavailable for ${item.id} at ${cycleAt} [StoreUnavailable]: ${message}`);

    const known = this.itemHealth.get(item.id) ?? toItemHealth(item.id, null);
    const failures = known.consecutiveFailures + 1;
    this.itemHealth.set(item.id, {
      ...known,
      lastCheck: cycleAt,
      lastOutcome: 'failure',
      consecutiveFailures: failures,
      lastErrorKind: 'StoreUnavailable',
    });
    this.publishHealth();

    await this.raiseErrorAlert(item, cycleAt, 'StoreUnavailable', message, failures);
    this.transition('idle');
  }

  /** At most one error alert per item until its next successful cycle. */
  private async raiseErrorAlert(
    item: TrackedItem,
    cycleAt: string,
    kind: MonitorErrorKind,
    message: string,
    failures: number
  ): Promise<void> {
    if (this.errorAlerted.has(item.id)) return;
    this.errorAlerted.add(item.id);

    this.transition('notifying');
    const result = await this.deliver({
      type: 'error',
      report: { itemId: item.id, kind, message, consecutiveFailures: failures, timestamp: cycleAt },
    });
    if (!result.ok) {
      logger.error(`Error alert delivery failed for ${item.id}: ${result.error.message}`);
    }
    this.transition('idle');
  }

  private publishHealth(): void {
    const items = this.options.items.map(
      item => this.itemHealth.get(item.id) ?? toItemHealth(item.id, null)
    );
    const startedAt = this.options.health.read().startedAt;
    this.options.health.publish(
      buildHealthSnapshot(startedAt, items, this.options.degradedAfterFailures, this.stats)
    );
  }

  private transition(next: SchedulerPhase): void {
    logger.debug(`${this.currentPhase} -> ${next}`);
    this.currentPhase = next;
  }
}
