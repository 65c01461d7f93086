import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import pino from 'pino';

import { dateKeysBetween, isWeekday } from '../server/lib/dateUtils.js';
import type { CircuitBreaker } from '../server/lib/circuitBreaker.js';
import type { RateLimiter } from '../server/lib/rateLimiter.js';
import { IngestionEngine, type IngestionEngineDeps } from '../server/orchestrators/ingestionEngine.js';
import { CoverageStore } from '../server/services/coverageStore.js';
import { DataApiClient } from '../server/services/dataApi.js';
import { CsvDataStore, type SliceKey } from '../server/services/dataStore.js';
import type { BarsBySymbol, FetchBarsRequest, MarketDataProvider, OhlcvBar } from '../server/services/marketData.js';
import type { TradingCalendarService } from '../server/services/tradingCalendar.js';
import { Watchlist, type WatchlistConfig } from '../server/services/watchlist.js';

export const silentLogger = pino({ level: 'silent' });

/** 2026-03-12 11:00 New York (a Thursday). */
export const FIXED_NOW = new Date('2026-03-12T15:00:00Z');

export async function makeTempDir(t: { after: (fn: () => Promise<void>) => void }): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), 'intraday-ingest-'));
  t.after(() => rm(dir, { recursive: true, force: true }));
  return dir;
}

/** `count` one-minute bars starting 14:30 UTC on `date`, which is the same calendar day in New York. */
export function barsForDate(date: string, count = 3): OhlcvBar[] {
  const start = Date.parse(`${date}T14:30:00Z`);
  return Array.from({ length: count }, (_, i) => ({
    timestamp: start + i * 60_000,
    open: 100 + i,
    high: 101 + i,
    low: 99 + i,
    close: 100.5 + i,
    volume: 1_000 * (i + 1),
  }));
}

export const PRESIDENTS_DAY_2026 = '2026-02-16';

export class StubCalendar implements TradingCalendarService {
  readonly calls: Array<{ exchange: string; date: string }> = [];

  constructor(
    private readonly holidays: ReadonlySet<string> = new Set([PRESIDENTS_DAY_2026]),
    private readonly closedExchanges: ReadonlySet<string> = new Set(),
  ) {}

  isTradingDay(exchangeId: string, date: string): boolean {
    this.calls.push({ exchange: exchangeId, date });
    if (this.closedExchanges.has(exchangeId)) return false;
    return isWeekday(date) && !this.holidays.has(date);
  }
}

export type BarsFor = (symbol: string, date: string) => OhlcvBar[];

/** Bars for every weekday that is not a 2026 Presidents Day. */
export const sessionBars: BarsFor = (_symbol, date) =>
  isWeekday(date) && date !== PRESIDENTS_DAY_2026 ? barsForDate(date) : [];

export class StubProvider implements MarketDataProvider {
  readonly requests: FetchBarsRequest[] = [];
  /** Called before answering; throw from it to fail the whole call. */
  beforeFetch: ((request: FetchBarsRequest, callIndex: number) => void) | null = null;
  /** Return an error to fail just that symbol in a call. */
  failSymbol: ((symbol: string, callIndex: number) => unknown) | null = null;

  constructor(private readonly barsFor: BarsFor = sessionBars) {}

  async fetchBars(request: FetchBarsRequest): Promise<BarsBySymbol> {
    const callIndex = this.requests.length;
    this.requests.push({ ...request, symbols: [...request.symbols] });
    this.beforeFetch?.(request, callIndex);
    const result: BarsBySymbol = new Map();
    for (const symbol of request.symbols) {
      const error = this.failSymbol?.(symbol, callIndex);
      if (error !== undefined && error !== null) {
        result.set(symbol, { ok: false, error });
        continue;
      }
      const bars: OhlcvBar[] = [];
      for (const date of dateKeysBetween(request.start, request.end)) {
        bars.push(...this.barsFor(symbol, date));
      }
      result.set(symbol, { ok: true, bars });
    }
    return result;
  }
}

export class RecordingDataStore extends CsvDataStore {
  readonly writes: SliceKey[] = [];

  override async writeSlice(key: SliceKey, bars: readonly OhlcvBar[]): Promise<void> {
    this.writes.push({ ...key });
    await super.writeSlice(key, bars);
  }
}

export class CountingRateLimiter implements RateLimiter {
  acquisitions = 0;

  async acquire(): Promise<void> {
    this.acquisitions += 1;
  }
}

export interface Harness {
  root: string;
  watchlist: Watchlist;
  coverage: CoverageStore;
  provider: StubProvider;
  calendar: StubCalendar;
  dataStore: RecordingDataStore;
  limiter: CountingRateLimiter;
  sleeps: number[];
  engine: IngestionEngine;
}

export interface HarnessOptions {
  watchlist?: WatchlistConfig;
  provider?: StubProvider;
  calendar?: StubCalendar;
  now?: Date;
  engine?: Partial<IngestionEngineDeps>;
}

export async function createHarness(root: string, options: HarnessOptions = {}): Promise<Harness> {
  const now = options.now ?? FIXED_NOW;
  const clock = () => new Date(now);
  const watchlist = Watchlist.fromConfig(options.watchlist ?? { stocks: { AAPL: { exchange: 'NYSE' } } });
  const coverage = new CoverageStore({ root, watchlist, logger: silentLogger, now: clock });
  await coverage.load();
  const provider = options.provider ?? new StubProvider();
  const calendar = options.calendar ?? new StubCalendar();
  const dataStore = new RecordingDataStore(root);
  const limiter = new CountingRateLimiter();
  const sleeps: number[] = [];
  const engine = new IngestionEngine({
    watchlist,
    coverage,
    provider,
    calendar,
    dataStore,
    logger: silentLogger,
    rateLimiter: limiter,
    sleep: async (ms: number) => {
      sleeps.push(ms);
    },
    now: clock,
    ...options.engine,
  });
  return { root, watchlist, coverage, provider, calendar, dataStore, limiter, sleeps, engine };
}

// ---------------------------------------------------------------------------
// HTTP
// ---------------------------------------------------------------------------

export const BASE_URL = 'https://api.example.test';

export type Reply = { status?: number; body: unknown };

/** fetch stand-in that answers from a queue and records every requested URL; an empty queue fails like a dropped connection. */
export function fakeFetch(replies: Reply[]) {
  const urls: string[] = [];
  const impl = async (input: string | URL | Request): Promise<Response> => {
    urls.push(String(input));
    const reply = replies.shift();
    if (!reply) throw new TypeError('fetch failed');
    const text = typeof reply.body === 'string' ? reply.body : JSON.stringify(reply.body);
    return new Response(text, { status: reply.status ?? 200 });
  };
  return { urls, impl };
}

export function makeClient(
  fetchImpl: typeof fetch,
  options: { apiKey?: string; circuitBreaker?: CircuitBreaker } = {},
): DataApiClient {
  return new DataApiClient({
    apiKey: options.apiKey ?? 'test-secret',
    baseUrl: BASE_URL,
    timeoutMs: 1_000,
    rateLimiter: { acquire: async () => {} },
    circuitBreaker: options.circuitBreaker,
    fetchImpl,
    logger: silentLogger,
  });
}
