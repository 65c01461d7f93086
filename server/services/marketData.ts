/**
 * Market-data contracts shared by the provider, the slice store and the
 * ingestion engine.
 */

import { dateKeyInTimeZone, DEFAULT_TIME_ZONE } from '../lib/dateUtils.js';

export type BarInterval = '1m';

/** One bar. Price and volume fields are null where the provider left a gap. */
export interface OhlcvBar {
  /** Bar open time, ms since epoch */
  timestamp: number;
  open: number | null;
  high: number | null;
  low: number | null;
  close: number | null;
  volume: number | null;
}

export interface FetchBarsRequest {
  symbols: string[];
  /** Inclusive YYYY-MM-DD */
  start: string;
  /** Exclusive YYYY-MM-DD */
  end: string;
  interval?: BarInterval;
}

/** One symbol's share of a batched fetch. */
export type SymbolBars = { ok: true; bars: OhlcvBar[] } | { ok: false; error: unknown };

/** Keyed by symbol; every requested symbol is present, possibly with an empty array or its own error. */
export type BarsBySymbol = Map<string, SymbolBars>;

/**
 * A provider rejects the whole call only for failures that concern every
 * symbol (bad request, abort). A failure scoped to one symbol is returned in
 * that symbol's entry.
 */
export interface MarketDataProvider {
  fetchBars(request: FetchBarsRequest, options?: { signal?: AbortSignal | null }): Promise<BarsBySymbol>;
}

/** Bars for `symbol`, rethrowing its fetch error. A symbol the provider left out has no bars. */
export function barsForSymbol(results: BarsBySymbol, symbol: string): OhlcvBar[] {
  const result = results.get(symbol);
  if (!result) return [];
  if (!result.ok) throw result.error;
  return result.bars;
}

function isMissing(value: number | null): boolean {
  return value === null || !Number.isFinite(value);
}

export function isEmptyBar(bar: OhlcvBar): boolean {
  return (
    isMissing(bar.open) && isMissing(bar.high) && isMissing(bar.low) && isMissing(bar.close) && isMissing(bar.volume)
  );
}

/** Drops bars whose OHLCV fields are all missing or whose timestamp is unusable. */
export function dropEmptyBars(bars: readonly OhlcvBar[]): OhlcvBar[] {
  return bars.filter((bar) => Number.isFinite(bar.timestamp) && !isEmptyBar(bar));
}

/** Groups bars by their calendar date in `timeZone`, each group sorted by time. */
export function partitionBarsByDate(bars: readonly OhlcvBar[], timeZone: string = DEFAULT_TIME_ZONE): Map<string, OhlcvBar[]> {
  const byDate = new Map<string, OhlcvBar[]>();
  for (const bar of bars) {
    const date = dateKeyInTimeZone(bar.timestamp, timeZone);
    const bucket = byDate.get(date);
    if (bucket) {
      bucket.push(bar);
    } else {
      byDate.set(date, [bar]);
    }
  }
  for (const bucket of byDate.values()) {
    bucket.sort((a, b) => a.timestamp - b.timestamp);
  }
  return new Map([...byDate.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}
