export type MonitorErrorKind =
  | 'SourceUnavailable'
  | 'ParseError'
  | 'StoreUnavailable'
  | 'NotifyError';

export interface MonitorErrorOptions {
  itemId?: string;
  statusCode?: number;
  cause?: unknown;
}

export abstract class MonitorError extends Error {
  abstract readonly kind: MonitorErrorKind;
  readonly itemId?: string;
  readonly statusCode?: number;

  constructor(message: string, options: MonitorErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.itemId = options.itemId;
    this.statusCode = options.statusCode;
  }
}

/** Upstream could not be reached: network failure, timeout or a non-2xx status. */
export class SourceUnavailableError extends MonitorError {
  readonly kind = 'SourceUnavailable';
}

/** A response arrived but held no usable price. */
export class ParseError extends MonitorError {
  readonly kind = 'ParseError';
}

export class StoreUnavailableError extends MonitorError {
  readonly kind = 'StoreUnavailable';
}

export class NotifyError extends MonitorError {
  readonly kind = 'NotifyError';
}

export function isMonitorError(error: unknown): error is MonitorError {
  return error instanceof MonitorError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
