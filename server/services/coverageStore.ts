/**
 * Coverage store: per-symbol coverage records plus the aggregate
 * StorageMeta document derived from them.
 *
 * Per-symbol records (`{root}/{category}/{symbol}/meta.json`) are the source
 * of truth. The aggregate (`{root}/meta.json`) is a cache rebuilt by
 * rescan(); it is only trustworthy right after a rescan. The engine is the
 * single writer of the aggregate.
 */

import { mkdir, readdir } from 'fs/promises';
import { join } from 'path';
import type pino from 'pino';

import { CoverageRecordSchema, StorageMetaSchema, type CoverageRecord, type StorageMeta } from '../lib/apiSchemas.js';
import { ConfigError, CoverageInvariantError, StoreCorruptionError } from '../lib/errors.js';
import { readJsonDocument, writeJsonDocument } from '../lib/jsonDocument.js';
import type { Watchlist } from './watchlist.js';

export type { CoverageRecord, StorageMeta };

/** Fields to merge into a record. Keys left out keep their stored value. */
export interface CoverageUpdate {
  earliest_date?: string;
  latest_date?: string;
  [attribute: string]: unknown;
}

const META_FILE = 'meta.json';
// Stamped by the store itself; callers cannot override them.
const RESERVED_KEYS = new Set(['symbol', 'last_updated']);

export interface CoverageStoreOptions {
  root: string;
  watchlist: Watchlist;
  logger: pino.Logger;
  now?: () => Date;
}

export class CoverageStore {
  readonly root: string;
  private readonly watchlist: Watchlist;
  private readonly log: pino.Logger;
  private readonly now: () => Date;
  private meta: StorageMeta | null = null;

  constructor(options: CoverageStoreOptions) {
    this.root = options.root;
    this.watchlist = options.watchlist;
    this.log = options.logger.child({ module: 'coverageStore' });
    this.now = options.now ?? (() => new Date());
  }

  get metaPath(): string {
    return join(this.root, META_FILE);
  }

  recordPath(category: string, symbol: string): string {
    return join(this.root, category, symbol, META_FILE);
  }

  /**
   * Reads the aggregate document, or starts a fresh one, then rescans.
   * A present but unreadable aggregate is fatal.
   */
  async load(): Promise<StorageMeta> {
    await mkdir(this.root, { recursive: true });
    const result = await readJsonDocument(this.metaPath, StorageMetaSchema);
    if (result.status === 'invalid') {
      throw new StoreCorruptionError(this.metaPath, result.detail);
    }
    if (result.status === 'ok') {
      this.meta = result.data;
    } else {
      const stamp = this.now().toISOString();
      this.meta = { created_at: stamp, last_updated: stamp, categories: {} };
      this.log.info(`No aggregate metadata at ${this.metaPath}; starting empty`);
    }
    return this.rescan();
  }

  /** Rebuilds the aggregate's category → symbol map from the per-symbol records on disk. */
  async rescan(): Promise<StorageMeta> {
    const meta = this.requireLoaded();
    const categories: StorageMeta['categories'] = {};

    for (const category of await this.listDirectories(this.root)) {
      for (const symbol of await this.listDirectories(join(this.root, category))) {
        const path = this.recordPath(category, symbol);
        const result = await readJsonDocument(path, CoverageRecordSchema);
        if (result.status === 'missing') continue;
        if (result.status === 'invalid') {
          this.log.error(`Skipping corrupt coverage record ${path}: ${result.detail}`);
          continue;
        }
        (categories[category] ??= {})[symbol] = result.data;
      }
    }

    meta.categories = categories;
    return meta;
  }

  async get(symbol: string): Promise<CoverageRecord | undefined> {
    const entry = this.watchlist.get(symbol);
    if (!entry) return undefined;
    const path = this.recordPath(entry.category, entry.symbol);
    const result = await readJsonDocument(path, CoverageRecordSchema);
    if (result.status === 'invalid') {
      throw new StoreCorruptionError(path, result.detail);
    }
    return result.status === 'ok' ? result.data : undefined;
  }

  /**
   * Shallow-merges `fields` into the symbol's record (last write wins per key,
   * keys not named keep their value), stamps last_updated and persists it.
   */
  async update(symbol: string, fields: CoverageUpdate): Promise<CoverageRecord> {
    this.requireLoaded();
    const entry = this.watchlist.get(symbol);
    if (!entry) {
      throw new ConfigError(`Symbol ${symbol} is not mapped to any watchlist category`, { symbol });
    }

    const existing = await this.get(entry.symbol);
    const merged: CoverageRecord = { ...(existing ?? {}), symbol: entry.symbol, last_updated: '' };
    for (const [key, value] of Object.entries(fields)) {
      if (value === undefined || RESERVED_KEYS.has(key)) continue;
      merged[key] = value;
    }
    merged.last_updated = this.now().toISOString();

    const validated = CoverageRecordSchema.safeParse(merged);
    if (!validated.success) {
      throw new ConfigError(`Coverage update for ${entry.symbol} is invalid: ${validated.error.issues[0]?.message ?? 'unknown'}`, {
        symbol: entry.symbol,
      });
    }
    const record = validated.data;
    if (record.earliest_date && record.latest_date && record.earliest_date > record.latest_date) {
      throw new CoverageInvariantError(entry.symbol, record.earliest_date, record.latest_date);
    }

    await writeJsonDocument(this.recordPath(entry.category, entry.symbol), record);
    return record;
  }

  async save(): Promise<void> {
    const meta = this.requireLoaded();
    meta.last_updated = this.now().toISOString();
    await writeJsonDocument(this.metaPath, meta);
  }

  /** Rescan, then persist the aggregate. */
  async flush(): Promise<StorageMeta> {
    const meta = await this.rescan();
    await this.save();
    return meta;
  }

  snapshot(): StorageMeta {
    return structuredClone(this.requireLoaded());
  }

  private requireLoaded(): StorageMeta {
    if (!this.meta) {
      throw new Error('CoverageStore used before load()');
    }
    return this.meta;
  }

  private async listDirectories(path: string): Promise<string[]> {
    try {
      const entries = await readdir(path, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isDirectory())
        .map((entry) => entry.name)
        .sort();
    } catch (err: unknown) {
      if (typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT') return [];
      throw err;
    }
  }
}
