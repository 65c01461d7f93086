/**
 * Zod schemas for everything that crosses the process boundary: provider
 * payloads, the ingestion config file, and the coverage documents on disk.
 */

import { z } from 'zod';

import { isDateKey } from './dateUtils.js';

export const DateKeySchema = z.string().refine(isDateKey, { message: 'Expected a YYYY-MM-DD date' });

// ---------------------------------------------------------------------------
// Aggregate bars  (v2/aggs/ticker/…)
// ---------------------------------------------------------------------------

/** A single bar as returned by the aggregate endpoint; any field may be absent or null. */
const AggBarSchema = z
  .object({
    t: z.number().nullish(), // timestamp (ms epoch)
    o: z.number().nullish(),
    h: z.number().nullish(),
    l: z.number().nullish(),
    c: z.number().nullish(),
    v: z.number().nullish(),
  })
  .passthrough();

export type AggBar = z.infer<typeof AggBarSchema>;

export const AggregateResponseSchema = z
  .object({
    status: z.string().optional(),
    ticker: z.string().optional(),
    resultsCount: z.number().optional(),
    results: z.array(AggBarSchema).optional(),
    next_url: z.string().optional(),
  })
  .passthrough();

// ---------------------------------------------------------------------------
// Market status  (v1/marketstatus/upcoming)
// ---------------------------------------------------------------------------

export const UpcomingMarketStatusSchema = z.array(
  z
    .object({
      exchange: z.string().optional(),
      date: z.string(),
      status: z.string(),
    })
    .passthrough(),
);

// ---------------------------------------------------------------------------
// Ingestion config file
// ---------------------------------------------------------------------------

/** Static per-symbol attributes; `exchange` is checked per symbol by the engine. */
export const SymbolAttributesSchema = z
  .object({
    exchange: z.string().trim().min(1).optional(),
  })
  .passthrough();

export type SymbolAttributes = z.infer<typeof SymbolAttributesSchema>;

export const WatchlistSchema = z.record(z.string(), z.record(z.string(), SymbolAttributesSchema));

export const IngestionConfigFileSchema = z.object({
  watchlist: WatchlistSchema,
  storage: z
    .object({
      path: z.string().min(1),
    })
    .optional(),
});

// ---------------------------------------------------------------------------
// Coverage documents
// ---------------------------------------------------------------------------

export const CoverageRecordSchema = z
  .object({
    symbol: z.string().min(1),
    earliest_date: DateKeySchema.optional(),
    latest_date: DateKeySchema.optional(),
    last_updated: z.string(),
  })
  .passthrough();

export type CoverageRecord = z.infer<typeof CoverageRecordSchema>;

export const StorageMetaSchema = z.object({
  created_at: z.string(),
  last_updated: z.string(),
  categories: z.record(z.string(), z.record(z.string(), CoverageRecordSchema)),
});

export type StorageMeta = z.infer<typeof StorageMetaSchema>;

// ---------------------------------------------------------------------------
// Validation helper
// ---------------------------------------------------------------------------

export type ValidationResult<T> = { ok: true; data: T } | { ok: false; issues: string };

/** Validate a parsed payload, flattening the first few issues into one line. */
export function validatePayload<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown): ValidationResult<T> {
  const result = schema.safeParse(payload);
  if (result.success) return { ok: true, data: result.data };
  const issues = result.error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    .join('; ');
  return { ok: false, issues };
}
