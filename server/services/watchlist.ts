/**
 * Watchlist: the categorized symbol set to ingest, loaded from the JSON
 * ingestion config. A single-category watchlist is just a map with one key.
 */

import { readFile } from 'fs/promises';

import { IngestionConfigFileSchema, validatePayload, type SymbolAttributes } from '../lib/apiSchemas.js';
import { ConfigError } from '../lib/errors.js';

export interface WatchlistEntry {
  symbol: string;
  category: string;
  attributes: SymbolAttributes;
}

export type WatchlistConfig = Record<string, Record<string, SymbolAttributes>>;

export function normalizeTickerSymbol(rawSymbol: unknown): string {
  return String(rawSymbol || '')
    .trim()
    .toUpperCase();
}

// Both names become directory names under the storage root.
function assertSafePathSegment(kind: string, value: string): void {
  if (!value || value === '.' || value === '..' || /[\\/\0]/.test(value)) {
    throw new ConfigError(`Invalid ${kind} name ${JSON.stringify(value)} in watchlist`, { operation: 'config' });
  }
}

export class Watchlist {
  private readonly bySymbol: Map<string, WatchlistEntry>;

  private constructor(entries: WatchlistEntry[]) {
    this.bySymbol = new Map(entries.map((entry) => [entry.symbol, entry]));
  }

  static fromConfig(config: WatchlistConfig): Watchlist {
    const entries: WatchlistEntry[] = [];
    const seen = new Map<string, string>();
    for (const [rawCategory, symbols] of Object.entries(config)) {
      const category = rawCategory.trim();
      assertSafePathSegment('category', category);
      for (const [rawSymbol, attributes] of Object.entries(symbols)) {
        const symbol = normalizeTickerSymbol(rawSymbol);
        assertSafePathSegment('symbol', symbol);
        const existing = seen.get(symbol);
        if (existing !== undefined) {
          throw new ConfigError(`Symbol ${symbol} is listed under both "${existing}" and "${category}"`, {
            symbol,
            operation: 'config',
          });
        }
        seen.set(symbol, category);
        entries.push({ symbol, category, attributes: { ...attributes } });
      }
    }
    return new Watchlist(entries);
  }

  get size(): number {
    return this.bySymbol.size;
  }

  entries(): WatchlistEntry[] {
    return [...this.bySymbol.values()];
  }

  get(symbol: string): WatchlistEntry | undefined {
    return this.bySymbol.get(normalizeTickerSymbol(symbol));
  }
}

/** The symbol's exchange identifier; a symbol without one cannot be calendar-gated. */
export function requireExchange(entry: WatchlistEntry): string {
  const exchange = typeof entry.attributes.exchange === 'string' ? entry.attributes.exchange.trim() : '';
  if (!exchange) {
    throw new ConfigError(`Symbol ${entry.symbol} in category "${entry.category}" has no exchange attribute`, {
      symbol: entry.symbol,
      operation: 'config',
    });
  }
  return exchange.toUpperCase();
}

export interface IngestionConfig {
  watchlist: Watchlist;
  /** Storage root from the config file, when it names one. */
  storageRoot?: string;
}

export function parseIngestionConfig(payload: unknown, source = 'ingestion config'): IngestionConfig {
  const result = validatePayload(IngestionConfigFileSchema, payload);
  if (!result.ok) {
    throw new ConfigError(`${source} is invalid: ${result.issues}`, { operation: 'config' });
  }
  return {
    watchlist: Watchlist.fromConfig(result.data.watchlist),
    storageRoot: result.data.storage?.path,
  };
}

export async function loadIngestionConfig(path: string): Promise<IngestionConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err: unknown) {
    throw new ConfigError(`Cannot read ingestion config ${path}: ${err instanceof Error ? err.message : String(err)}`, {
      operation: 'config',
      cause: err,
    });
  }
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (err: unknown) {
    throw new ConfigError(`Ingestion config ${path} is not valid JSON`, { operation: 'config', cause: err });
  }
  return parseIngestionConfig(payload, path);
}
