/**
 * Daily slice storage: one CSV file of 1-minute bars per (symbol, date),
 * laid out as `{root}/{category}/{symbol}/{date}_1m_ohlcv.csv`.
 */

import { access, mkdir, readFile, rename, writeFile } from 'fs/promises';
import { join } from 'path';
import Papa from 'papaparse';

import type { OhlcvBar } from './marketData.js';

export interface SliceKey {
  category: string;
  symbol: string;
  date: string;
}

export interface DataStore {
  /** Writes (or overwrites) the slice. */
  writeSlice(key: SliceKey, bars: readonly OhlcvBar[]): Promise<void>;
  readSlice(key: SliceKey): Promise<OhlcvBar[] | null>;
  exists(key: SliceKey): Promise<boolean>;
}

const SLICE_SUFFIX = '_1m_ohlcv.csv';
const CSV_COLUMNS = ['timestamp', 'open', 'high', 'low', 'close', 'volume'] as const;

type CsvRow = Record<(typeof CSV_COLUMNS)[number], string | number>;

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

function cell(value: number | null): string | number {
  return value === null ? '' : value;
}

function parseCell(value: string | undefined): number | null {
  if (value === undefined || value.trim() === '') return null;
  const num = Number(value);
  return Number.isFinite(num) ? num : null;
}

export function serializeBars(bars: readonly OhlcvBar[]): string {
  const rows: CsvRow[] = bars.map((bar) => ({
    timestamp: new Date(bar.timestamp).toISOString(),
    open: cell(bar.open),
    high: cell(bar.high),
    low: cell(bar.low),
    close: cell(bar.close),
    volume: cell(bar.volume),
  }));
  return `${Papa.unparse(rows, { columns: [...CSV_COLUMNS], header: true, newline: '\n' })}\n`;
}

export function parseBars(text: string): OhlcvBar[] {
  const parsed = Papa.parse<Record<string, string>>(text, { header: true, skipEmptyLines: true });
  const bars: OhlcvBar[] = [];
  for (const row of parsed.data) {
    const timestamp = Date.parse(row.timestamp ?? '');
    if (!Number.isFinite(timestamp)) continue;
    bars.push({
      timestamp,
      open: parseCell(row.open),
      high: parseCell(row.high),
      low: parseCell(row.low),
      close: parseCell(row.close),
      volume: parseCell(row.volume),
    });
  }
  return bars;
}

export class CsvDataStore implements DataStore {
  constructor(readonly root: string) {}

  symbolDir(category: string, symbol: string): string {
    return join(this.root, category, symbol);
  }

  slicePath(key: SliceKey): string {
    return join(this.symbolDir(key.category, key.symbol), `${key.date}${SLICE_SUFFIX}`);
  }

  async writeSlice(key: SliceKey, bars: readonly OhlcvBar[]): Promise<void> {
    const path = this.slicePath(key);
    await mkdir(this.symbolDir(key.category, key.symbol), { recursive: true });
    const tempPath = `${path}.tmp`;
    await writeFile(tempPath, serializeBars(bars), 'utf-8');
    await rename(tempPath, path);
  }

  async readSlice(key: SliceKey): Promise<OhlcvBar[] | null> {
    try {
      return parseBars(await readFile(this.slicePath(key), 'utf-8'));
    } catch (err: unknown) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  async exists(key: SliceKey): Promise<boolean> {
    try {
      await access(this.slicePath(key));
      return true;
    } catch (err: unknown) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }
}
