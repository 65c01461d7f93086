/**
 * Error taxonomy for ingestion.
 *
 * Every error raised on purpose by the engine or its collaborators extends
 * IngestionError, so per-symbol failure reports can carry the symbol,
 * operation and date range needed to retry by hand.
 */

export type IngestionOperation = 'roll' | 'backfill' | 'fill' | 'load' | 'rescan' | 'config';

export interface DateRange {
  /** Inclusive YYYY-MM-DD */
  start: string;
  /** Exclusive YYYY-MM-DD */
  end: string;
}

export interface IngestionErrorContext {
  symbol?: string;
  operation?: IngestionOperation;
  range?: DateRange;
  cause?: unknown;
}

export class IngestionError extends Error {
  readonly code: string;
  readonly symbol?: string;
  readonly operation?: IngestionOperation;
  readonly range?: DateRange;

  constructor(code: string, message: string, context: IngestionErrorContext = {}) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.name = 'IngestionError';
    this.code = code;
    this.symbol = context.symbol;
    this.operation = context.operation;
    this.range = context.range;
  }
}

/** Watchlist or environment is unusable. Never retried. */
export class ConfigError extends IngestionError {
  constructor(message: string, context: IngestionErrorContext = {}) {
    super('CONFIG', message, context);
    this.name = 'ConfigError';
  }
}

export interface ProviderErrorContext extends IngestionErrorContext {
  httpStatus?: number;
  retryable?: boolean;
  rateLimited?: boolean;
  timedOut?: boolean;
}

/** Network, timeout or HTTP failure while talking to the market-data provider. */
export class ProviderError extends IngestionError {
  readonly httpStatus?: number;
  readonly retryable: boolean;
  readonly rateLimited: boolean;
  readonly timedOut: boolean;

  constructor(message: string, context: ProviderErrorContext = {}) {
    super('PROVIDER', message, context);
    this.name = 'ProviderError';
    this.httpStatus = context.httpStatus;
    this.rateLimited = context.rateLimited === true || context.httpStatus === 429;
    this.timedOut = context.timedOut === true;
    this.retryable =
      context.retryable ?? (this.rateLimited || this.timedOut || (context.httpStatus ?? 0) >= 500);
  }
}

/** Backfill walked every window and the provider returned no bars at all. */
export class EmptyIngestionError extends IngestionError {
  constructor(symbol: string, range: DateRange) {
    super('EMPTY_INGESTION', `No 1m bars returned for ${symbol} between ${range.start} and ${range.end}`, {
      symbol,
      operation: 'backfill',
      range,
    });
    this.name = 'EmptyIngestionError';
  }
}

/** A coverage update would leave earliest_date after latest_date. */
export class CoverageInvariantError extends IngestionError {
  constructor(symbol: string, earliestDate: string, latestDate: string) {
    super('COVERAGE_INVARIANT', `Coverage for ${symbol} would have earliest_date ${earliestDate} > latest_date ${latestDate}`, {
      symbol,
    });
    this.name = 'CoverageInvariantError';
  }
}

/** The aggregate metadata document exists but cannot be read. Fatal for the process. */
export class StoreCorruptionError extends IngestionError {
  readonly path: string;

  constructor(path: string, detail: string, cause?: unknown) {
    super('STORE_CORRUPTION', `Metadata document ${path} is corrupt: ${detail}`, { operation: 'load', cause });
    this.name = 'StoreCorruptionError';
    this.path = path;
  }
}

/**
 * Returns true if `err` represents a request-abort signal: an AbortError by
 * name, an HTTP 499 status, or an error message containing "aborted".
 */
export function isAbortError(err: unknown): boolean {
  if (!err || typeof err !== 'object') return false;
  const name = 'name' in err ? String(err.name) : '';
  const message = 'message' in err ? String(err.message) : '';
  const status = err instanceof ProviderError ? err.httpStatus : undefined;
  return name === 'AbortError' || status === 499 || /aborted|aborterror/i.test(message);
}

export function isRetryableProviderError(err: unknown): boolean {
  return err instanceof ProviderError && err.retryable;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
