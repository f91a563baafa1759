export type AlertDirection = 'any' | 'decreaseOnly' | 'increaseOnly';

export interface PriceRange {
  min: number;
  max: number;
}

export interface ChangePolicy {
  minAbsoluteDelta: number;
  minPercentDelta: number;
  direction: AlertDirection;
  /** Alert when the price enters this inclusive band. */
  targetRange?: PriceRange;
}

export interface TrackedItem {
  id: string;
  query: string;
  currency?: string;
  policy?: Partial<ChangePolicy>;
}

export interface SampleSource {
  provider: string;
  retailer?: string;
  link?: string;
  title?: string;
  resultCount?: number;
}

export interface PriceSample {
  readonly itemId: string;
  readonly price: number;
  readonly currency: string;
  readonly timestamp: string;
  readonly source: Readonly<SampleSource>;
}

export type CheckOutcome = 'success' | 'failure';

export interface MonitorState {
  itemId: string;
  lastKnown: PriceSample | null;
  lastCheckAt: string;
  lastOutcome: CheckOutcome;
  consecutiveFailures: number;
  lastErrorKind: string | null;
  inTargetRange: boolean;
}

export interface ChangeEvent {
  itemId: string;
  previous: PriceSample;
  current: PriceSample;
  delta: number;
  deltaPercent: number;
  direction: 'increase' | 'decrease';
}

export interface TargetRangeHit {
  itemId: string;
  sample: PriceSample;
  range: PriceRange;
}

export interface ErrorReport {
  itemId: string;
  kind: string;
  message: string;
  consecutiveFailures: number;
  timestamp: string;
}

export type Alert =
  | { type: 'change'; event: ChangeEvent }
  | { type: 'targetRange'; hit: TargetRangeHit }
  | { type: 'error'; report: ErrorReport };

export type HealthStatus = 'ok' | 'degraded';

export interface ItemHealth {
  itemId: string;
  lastCheck: string | null;
  lastOutcome: CheckOutcome | null;
  lastPrice: number | null;
  currency: string | null;
  consecutiveFailures: number;
  lastErrorKind: string | null;
}

export interface MonitorStats {
  cycles: number;
  alertsSent: number;
  alertsFailed: number;
}

export interface HealthSnapshot {
  status: HealthStatus;
  startedAt: string;
  lastCheck: string | null;
  lastOutcome: CheckOutcome | null;
  lastPrice: number | null;
  consecutiveFailures: number;
  items: ItemHealth[];
  stats: MonitorStats;
}

export type Clock = () => Date;

export type SourceKind = 'serper' | 'json';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Config {
  items: TrackedItem[];
  source: {
    kind: SourceKind;
    fetchTimeoutMs: number;
    defaultCurrency: string;
    serper: {
      apiKey?: string;
      endpoint: string;
      country: string;
      language: string;
      location: string;
      excludedRetailers: string[];
      resultLimit: number;
    };
    jsonUrl?: string;
  };
  monitoring: {
    pollIntervalMs: number;
    policy: ChangePolicy;
    degradedAfterFailures: number;
  };
  notifier: {
    discordWebhookUrl?: string;
    timeoutMs: number;
  };
  dbPath: string;
  port: number;
  logLevel: LogLevel;
}
