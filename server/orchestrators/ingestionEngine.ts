/**
 * Ingestion engine. Decides per symbol between a bounded backfill, an
 * incremental one-day roll and a single-date gap fill, and keeps coverage
 * metadata consistent so every operation is safe to repeat.
 *
 * Symbols are processed independently: a failure is recorded in the run
 * report and the batch moves on to the next symbol.
 */

import type pino from 'pino';

import { addDays, dateKeyInTimeZone, DEFAULT_TIME_ZONE, isDateKey, maxDateKey, minDateKey } from '../lib/dateUtils.js';
import {
  ConfigError,
  describeError,
  EmptyIngestionError,
  IngestionError,
  isRetryableProviderError,
  ProviderError,
  type DateRange,
} from '../lib/errors.js';
import { exchangeTimeZone } from '../lib/exchanges.js';
import {
  IntervalRateLimiter,
  retryWithBackoff,
  sleepWithAbort,
  type BackoffPolicy,
  type RateLimiter,
  type SleepFn,
} from '../lib/rateLimiter.js';
import { providerRequestsTotal, slicesWrittenTotal, symbolOutcomesTotal } from '../metrics.js';
import type { CoverageStore } from '../services/coverageStore.js';
import type { DataStore, SliceKey } from '../services/dataStore.js';
import {
  barsForSymbol,
  dropEmptyBars,
  partitionBarsByDate,
  type BarsBySymbol,
  type MarketDataProvider,
  type OhlcvBar,
  type SymbolBars,
} from '../services/marketData.js';
import type { TradingCalendarService } from '../services/tradingCalendar.js';
import { requireExchange, type Watchlist, type WatchlistEntry } from '../services/watchlist.js';

export type EngineOperation = 'roll' | 'backfill' | 'fill';
export type SymbolStatus = 'updated' | 'backfilled' | 'filled' | 'skipped' | 'failed';
export type SkipReason = 'market-closed' | 'no-data' | 'out-of-range' | 'slice-exists';

export interface SymbolOutcome {
  symbol: string;
  category: string;
  operation: EngineOperation;
  status: SymbolStatus;
  reason?: SkipReason;
  range?: DateRange;
  /** Dates written by this outcome */
  dates?: string[];
  error?: { name: string; code?: string; message: string };
}

export interface IngestionReport {
  operation: EngineOperation;
  runId?: string;
  startedAt: string;
  finishedAt: string;
  /** roll: the session being appended; fill: the requested date */
  targetDate?: string;
  outcomes: SymbolOutcome[];
}

export interface BackfillResult {
  symbol: string;
  category: string;
  windows: DateRange[];
  dates: string[];
  earliestDate: string;
  latestDate: string;
}

export interface BackfillWindowOptions {
  /** Days of 1m history the provider keeps */
  retentionDays: number;
  /** Gap kept between the first window and the retention edge */
  safetyMarginDays: number;
  /** Maximum days per request */
  spanDays: number;
  /** Windows fetched after the first one */
  additionalWindows: number;
}

export const DEFAULT_BACKFILL_WINDOWS: BackfillWindowOptions = {
  retentionDays: 30,
  safetyMarginDays: 2,
  spanDays: 7,
  additionalWindows: 3,
};

export const DEFAULT_RETRY_POLICY: BackoffPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1_500,
  maxDelayMs: 30_000,
  shouldRetry: isRetryableProviderError,
};

export interface IngestionEngineDeps {
  watchlist: Watchlist;
  coverage: CoverageStore;
  provider: MarketDataProvider;
  calendar: TradingCalendarService;
  dataStore: DataStore;
  logger: pino.Logger;
  rateLimiter?: RateLimiter;
  retryPolicy?: Partial<BackoffPolicy>;
  windows?: Partial<BackfillWindowOptions>;
  /** Sleep used between retries */
  sleep?: SleepFn;
  now?: () => Date;
  /** Zone that defines "today"; defaults to New York */
  timeZone?: string;
  runId?: string;
}

function errorSummary(err: unknown): NonNullable<SymbolOutcome['error']> {
  if (err instanceof IngestionError) return { name: err.name, code: err.code, message: err.message };
  if (err instanceof Error) return { name: err.name, message: err.message };
  return { name: 'Error', message: String(err) };
}

export function countOutcomes(report: IngestionReport): Record<SymbolStatus, number> {
  const counts: Record<SymbolStatus, number> = { updated: 0, backfilled: 0, filled: 0, skipped: 0, failed: 0 };
  for (const outcome of report.outcomes) counts[outcome.status] += 1;
  return counts;
}

export class IngestionEngine {
  private readonly watchlist: Watchlist;
  private readonly coverage: CoverageStore;
  private readonly provider: MarketDataProvider;
  private readonly calendar: TradingCalendarService;
  private readonly dataStore: DataStore;
  private readonly log: pino.Logger;
  private readonly rateLimiter: RateLimiter;
  private readonly retryPolicy: BackoffPolicy;
  private readonly windows: BackfillWindowOptions;
  private readonly sleep: SleepFn;
  private readonly now: () => Date;
  private readonly timeZone: string;
  private readonly runId?: string;

  constructor(deps: IngestionEngineDeps) {
    this.watchlist = deps.watchlist;
    this.coverage = deps.coverage;
    this.provider = deps.provider;
    this.calendar = deps.calendar;
    this.dataStore = deps.dataStore;
    this.log = deps.logger.child({ module: 'ingestionEngine' });
    this.rateLimiter = deps.rateLimiter ?? new IntervalRateLimiter({ minIntervalMs: 2_000 });
    this.retryPolicy = { ...DEFAULT_RETRY_POLICY, ...deps.retryPolicy };
    this.windows = { ...DEFAULT_BACKFILL_WINDOWS, ...deps.windows };
    this.sleep = deps.sleep ?? sleepWithAbort;
    this.now = deps.now ?? (() => new Date());
    this.timeZone = deps.timeZone ?? DEFAULT_TIME_ZONE;
    this.runId = deps.runId;

    if (this.windows.safetyMarginDays >= this.windows.retentionDays) {
      throw new ConfigError(
        `Safety margin (${this.windows.safetyMarginDays}d) must be smaller than retention (${this.windows.retentionDays}d)`,
        { operation: 'config' },
      );
    }
  }

  today(): string {
    return dateKeyInTimeZone(this.now(), this.timeZone);
  }

  // -------------------------------------------------------------------------
  // roll
  // -------------------------------------------------------------------------

  /** Appends yesterday's session for every covered symbol in one batched fetch; backfills the rest. */
  async roll(): Promise<IngestionReport> {
    const report = this.startReport('roll');
    const fresh: WatchlistEntry[] = [];
    const existing: Array<{ entry: WatchlistEntry; latestDate?: string }> = [];

    for (const entry of this.watchlist.entries()) {
      try {
        const record = await this.coverage.get(entry.symbol);
        if (record) {
          existing.push({ entry, latestDate: record.latest_date });
        } else {
          fresh.push(entry);
        }
      } catch (err: unknown) {
        this.recordFailure(report, entry, 'roll', err);
      }
    }

    for (const entry of fresh) {
      this.log.info(`${entry.symbol}: no coverage yet, backfilling`);
      await this.backfillEntry(entry, report);
    }

    if (existing.length === 0) {
      this.log.info('No symbols with existing coverage to roll');
      return this.finishReport(report);
    }

    const targetDate = addDays(this.today(), -1);
    const range: DateRange = { start: targetDate, end: addDays(targetDate, 1) };
    report.targetDate = targetDate;

    const eligible: typeof existing = [];
    for (const item of existing) {
      try {
        const exchange = requireExchange(item.entry);
        if (!this.calendar.isTradingDay(exchange, targetDate)) {
          this.log.info(`${item.entry.symbol}: ${exchange} had no session on ${targetDate}, skipping`);
          this.recordOutcome(report, { ...this.baseOutcome(item.entry, 'roll'), status: 'skipped', reason: 'market-closed', range });
          continue;
        }
        eligible.push(item);
      } catch (err: unknown) {
        this.recordFailure(report, item.entry, 'roll', err, range);
      }
    }

    if (eligible.length === 0) {
      return this.finishReport(report);
    }

    const bars = await this.fetchBars(
      'roll',
      eligible.map((item) => item.entry.symbol),
      range,
    );

    for (const { entry, latestDate } of eligible) {
      try {
        const rows = this.rowsForDate(entry, barsForSymbol(bars, entry.symbol), targetDate);
        if (rows.length === 0) {
          this.log.debug(`${entry.symbol}: no 1m bars for ${targetDate}, skipping`);
          this.recordOutcome(report, { ...this.baseOutcome(entry, 'roll'), status: 'skipped', reason: 'no-data', range });
          continue;
        }
        await this.writeSlice('roll', { category: entry.category, symbol: entry.symbol, date: targetDate }, rows);
        await this.coverage.update(entry.symbol, { latest_date: maxDateKey(latestDate, targetDate) });
        this.recordOutcome(report, { ...this.baseOutcome(entry, 'roll'), status: 'updated', range, dates: [targetDate] });
      } catch (err: unknown) {
        this.recordFailure(report, entry, 'roll', err, range);
      }
    }

    return this.finishReport(report);
  }

  // -------------------------------------------------------------------------
  // backfill
  // -------------------------------------------------------------------------

  /**
   * Pulls the provider's whole retained 1m history for one symbol in
   * fixed-span windows and records its coverage. Throws on failure,
   * including EmptyIngestionError when no window returned any bars.
   */
  async backfill(symbol: string): Promise<BackfillResult> {
    const entry = this.watchlist.get(symbol);
    if (!entry) {
      throw new ConfigError(`Symbol ${symbol} is not in the watchlist`, { symbol, operation: 'backfill' });
    }
    return this.runBackfill(entry);
  }

  /** Backfills the given symbols (default: the whole watchlist), isolating failures per symbol. */
  async backfillMany(symbols?: readonly string[]): Promise<IngestionReport> {
    const report = this.startReport('backfill');
    const entries: WatchlistEntry[] = [];
    for (const symbol of symbols ?? this.watchlist.entries().map((entry) => entry.symbol)) {
      const entry = this.watchlist.get(symbol);
      if (entry) {
        entries.push(entry);
      } else {
        this.recordFailure(
          report,
          { symbol, category: '', attributes: {} },
          'backfill',
          new ConfigError(`Symbol ${symbol} is not in the watchlist`, { symbol, operation: 'backfill' }),
        );
      }
    }
    for (const entry of entries) {
      await this.backfillEntry(entry, report);
    }
    return this.finishReport(report);
  }

  private async backfillEntry(entry: WatchlistEntry, report: IngestionReport): Promise<void> {
    try {
      const result = await this.runBackfill(entry);
      this.recordOutcome(report, {
        ...this.baseOutcome(entry, 'backfill'),
        status: 'backfilled',
        range: { start: result.earliestDate, end: addDays(result.latestDate, 1) },
        dates: result.dates,
      });
    } catch (err: unknown) {
      this.recordFailure(report, entry, 'backfill', err, err instanceof IngestionError ? err.range : undefined);
    }
  }

  private async runBackfill(entry: WatchlistEntry): Promise<BackfillResult> {
    const exchange = requireExchange(entry);
    const { retentionDays, safetyMarginDays, spanDays, additionalWindows } = this.windows;

    // Windows stop at today (exclusive): the current session is still trading.
    const today = this.today();
    const windows: DateRange[] = [];
    let windowStart = addDays(today, -(retentionDays - safetyMarginDays));
    for (let i = 0; i <= additionalWindows && windowStart < today; i++) {
      const windowEnd = minDateKey(addDays(windowStart, spanDays), today) ?? today;
      windows.push({ start: windowStart, end: windowEnd });
      windowStart = windowEnd;
    }
    const overall: DateRange = { start: windows[0].start, end: windows[windows.length - 1].end };

    const collected: OhlcvBar[] = [];
    for (const window of windows) {
      const bars = await this.fetchBars('backfill', [entry.symbol], window);
      collected.push(...barsForSymbol(bars, entry.symbol));
    }

    const byDate = partitionBarsByDate(dropEmptyBars(collected), exchangeTimeZone(exchange));
    if (byDate.size === 0) {
      throw new EmptyIngestionError(entry.symbol, overall);
    }

    // A full backfill is authoritative: existing slices are overwritten.
    for (const [date, rows] of byDate) {
      await this.writeSlice('backfill', { category: entry.category, symbol: entry.symbol, date }, rows);
    }

    const dates = [...byDate.keys()];
    const prior = await this.coverage.get(entry.symbol);
    const earliestDate = minDateKey(dates[0], prior?.earliest_date) ?? dates[0];
    const latestDate = maxDateKey(dates[dates.length - 1], prior?.latest_date) ?? dates[dates.length - 1];

    await this.coverage.update(entry.symbol, {
      ...entry.attributes,
      earliest_date: earliestDate,
      latest_date: latestDate,
    });
    this.log.info(`${entry.symbol}: backfilled ${dates.length} sessions, coverage ${earliestDate} → ${latestDate}`);

    return { symbol: entry.symbol, category: entry.category, windows, dates, earliestDate, latestDate };
  }

  // -------------------------------------------------------------------------
  // fillDate
  // -------------------------------------------------------------------------

  /** Fills one missing date inside each symbol's coverage; never overwrites and never moves bounds. */
  async fillDate(date: string): Promise<IngestionReport> {
    if (!isDateKey(date)) {
      throw new ConfigError(`Invalid fill date ${JSON.stringify(date)}; expected YYYY-MM-DD`, { operation: 'fill' });
    }
    const report = this.startReport('fill');
    report.targetDate = date;
    const range: DateRange = { start: date, end: addDays(date, 1) };

    for (const entry of this.watchlist.entries()) {
      try {
        const record = await this.coverage.get(entry.symbol);
        if (!record) {
          this.log.info(`${entry.symbol}: no coverage yet, backfilling instead of filling ${date}`);
          await this.backfillEntry(entry, report);
          continue;
        }

        const { earliest_date: earliest, latest_date: latest } = record;
        if (!earliest || !latest || date < earliest || date > latest) {
          this.log.info(`${entry.symbol}: ${date} is outside coverage ${earliest ?? '?'} → ${latest ?? '?'}, skipping`);
          this.recordOutcome(report, { ...this.baseOutcome(entry, 'fill'), status: 'skipped', reason: 'out-of-range', range });
          continue;
        }

        const key: SliceKey = { category: entry.category, symbol: entry.symbol, date };
        if (await this.dataStore.exists(key)) {
          this.recordOutcome(report, { ...this.baseOutcome(entry, 'fill'), status: 'skipped', reason: 'slice-exists', range });
          continue;
        }

        const exchange = requireExchange(entry);
        if (!this.calendar.isTradingDay(exchange, date)) {
          this.log.info(`${entry.symbol}: ${exchange} had no session on ${date}, skipping`);
          this.recordOutcome(report, { ...this.baseOutcome(entry, 'fill'), status: 'skipped', reason: 'market-closed', range });
          continue;
        }

        const bars = await this.fetchBars('fill', [entry.symbol], range);
        const rows = this.rowsForDate(entry, barsForSymbol(bars, entry.symbol), date);
        if (rows.length === 0) {
          this.log.warn(`${entry.symbol}: calendar reports a session on ${date} but the provider returned no bars`);
          this.recordOutcome(report, { ...this.baseOutcome(entry, 'fill'), status: 'skipped', reason: 'no-data', range });
          continue;
        }

        await this.writeSlice('fill', key, rows);
        this.recordOutcome(report, { ...this.baseOutcome(entry, 'fill'), status: 'filled', range, dates: [date] });
      } catch (err: unknown) {
        this.recordFailure(report, entry, 'fill', err, range);
      }
    }

    return this.finishReport(report);
  }

  // -------------------------------------------------------------------------
  // Shared plumbing
  // -------------------------------------------------------------------------

  /**
   * One batched provider call with per-symbol retry. Symbols whose own fetch
   * failed with a retryable error are asked for again; the rest keep their
   * first answer. Never throws: every symbol ends up with bars or an error.
   */
  private async fetchBars(operation: EngineOperation, symbols: string[], range: DateRange): Promise<BarsBySymbol> {
    const results: BarsBySymbol = new Map();
    let pending = symbols;
    try {
      await retryWithBackoff(
        async () => {
          let answered: BarsBySymbol;
          try {
            answered = await this.requestBars(operation, pending, range);
          } catch (err: unknown) {
            for (const symbol of pending) results.set(symbol, { ok: false, error: err });
            throw err;
          }
          const retry: string[] = [];
          let retryError: unknown = null;
          for (const symbol of pending) {
            const answer: SymbolBars = answered.get(symbol) ?? { ok: true, bars: [] };
            const result: SymbolBars = answer.ok
              ? answer
              : { ok: false, error: this.toProviderError(answer.error, operation, range, symbol) };
            results.set(symbol, result);
            if (!result.ok && this.retryPolicy.shouldRetry(result.error)) {
              retry.push(symbol);
              if (retryError === null) retryError = result.error;
            }
          }
          pending = retry;
          if (retryError !== null) throw retryError;
        },
        this.retryPolicy,
        {
          sleep: this.sleep,
          onRetry: (err, attempt, delayMs) => {
            this.log.warn(
              `${operation} fetch ${pending.join(',')} ${range.start}..${range.end} failed (attempt ${attempt}/${this.retryPolicy.maxAttempts}), retrying in ${delayMs}ms: ${describeError(err)}`,
            );
          },
        },
      );
    } catch (err: unknown) {
      // Exhausted or non-retryable: each pending symbol already holds its last error.
      for (const symbol of pending) {
        if (!results.has(symbol)) results.set(symbol, { ok: false, error: err });
      }
    }
    return results;
  }

  private async requestBars(operation: EngineOperation, symbols: string[], range: DateRange): Promise<BarsBySymbol> {
    await this.rateLimiter.acquire();
    let answered: BarsBySymbol;
    try {
      answered = await this.provider.fetchBars({ symbols, start: range.start, end: range.end, interval: '1m' });
    } catch (err: unknown) {
      providerRequestsTotal.inc({ operation, outcome: 'error' });
      throw this.toProviderError(err, operation, range, symbols.length === 1 ? symbols[0] : undefined);
    }
    const failed = [...answered.values()].some((answer) => !answer.ok);
    providerRequestsTotal.inc({ operation, outcome: failed ? 'partial' : 'ok' });
    return answered;
  }

  private toProviderError(err: unknown, operation: EngineOperation, range: DateRange, symbol?: string): IngestionError {
    if (err instanceof IngestionError) return err;
    return new ProviderError(`Provider fetch failed: ${describeError(err)}`, {
      symbol,
      operation,
      range,
      retryable: false,
      cause: err,
    });
  }

  /** Non-empty bars of `bars` that fall on `date` in the symbol's exchange time zone. */
  private rowsForDate(entry: WatchlistEntry, bars: readonly OhlcvBar[], date: string): OhlcvBar[] {
    const timeZone = exchangeTimeZone(requireExchange(entry));
    return partitionBarsByDate(dropEmptyBars(bars), timeZone).get(date) ?? [];
  }

  private async writeSlice(operation: EngineOperation, key: SliceKey, rows: readonly OhlcvBar[]): Promise<void> {
    await this.dataStore.writeSlice(key, rows);
    slicesWrittenTotal.inc({ operation });
  }

  private baseOutcome(entry: WatchlistEntry, operation: EngineOperation): Pick<SymbolOutcome, 'symbol' | 'category' | 'operation'> {
    return { symbol: entry.symbol, category: entry.category, operation };
  }

  private recordOutcome(report: IngestionReport, outcome: SymbolOutcome): void {
    report.outcomes.push(outcome);
    symbolOutcomesTotal.inc({ operation: outcome.operation, status: outcome.status });
  }

  private recordFailure(
    report: IngestionReport,
    entry: WatchlistEntry,
    operation: EngineOperation,
    err: unknown,
    range?: DateRange,
  ): void {
    const error = errorSummary(err);
    const where = range ? ` ${range.start}..${range.end}` : '';
    this.log.error({ symbol: entry.symbol, operation, range, code: error.code }, `${operation} ${entry.symbol}${where} failed: ${error.message}`);
    this.recordOutcome(report, { ...this.baseOutcome(entry, operation), status: 'failed', range, error });
  }

  private startReport(operation: EngineOperation): IngestionReport {
    return {
      operation,
      runId: this.runId,
      startedAt: this.now().toISOString(),
      finishedAt: '',
      outcomes: [],
    };
  }

  /** Rescan + save the aggregate, then stamp the report. */
  private async finishReport(report: IngestionReport): Promise<IngestionReport> {
    await this.coverage.flush();
    report.finishedAt = this.now().toISOString();
    const counts = countOutcomes(report);
    this.log.info(
      { ...counts },
      `${report.operation} finished: ${report.outcomes.length} outcomes, ${counts.failed} failed`,
    );
    return report;
  }
}
