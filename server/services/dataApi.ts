/**
 * Data API HTTP client (URL construction, pacing, timeouts, error
 * classification, circuit breaker) and the 1-minute aggregates provider
 * built on it.
 *
 * All outbound calls to the market-data vendor go through DataApiClient.
 */

import type pino from 'pino';

import { AggregateResponseSchema, validatePayload, type AggBar } from '../lib/apiSchemas.js';
import { CircuitBreaker, CircuitOpenError } from '../lib/circuitBreaker.js';
import { addDays } from '../lib/dateUtils.js';
import { ConfigError, describeError, isAbortError, ProviderError, type DateRange } from '../lib/errors.js';
import { TokenBucketRateLimiter, type RateLimiter } from '../lib/rateLimiter.js';
import type { BarsBySymbol, FetchBarsRequest, MarketDataProvider, OhlcvBar } from './marketData.js';

export type QueryParams = Record<string, string | number | boolean | undefined | null>;

// ---------------------------------------------------------------------------
// URL helpers
// ---------------------------------------------------------------------------

export function buildDataApiUrl(baseUrl: string, path: string, params: QueryParams = {}): string {
  const normalizedBase = baseUrl.replace(/\/+$/, '');
  const normalizedPath = String(path || '').replace(/^\/+/, '');
  const url = new URL(`${normalizedBase}/${normalizedPath}`);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined && value !== null && value !== '') {
      url.searchParams.set(key, String(value));
    }
  }
  return url.toString();
}

export function sanitizeDataApiUrl(url: string): string {
  try {
    const parsed = new URL(url);
    for (const key of ['apiKey', 'apikey']) {
      if (parsed.searchParams.has(key)) parsed.searchParams.set(key, '***');
    }
    return parsed.toString();
  } catch {
    return url;
  }
}

function parseJsonSafe(text: string): unknown {
  if (!text.trim()) return null;
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

function extractDataApiError(payload: unknown): string | null {
  if (!payload || typeof payload !== 'object' || Array.isArray(payload)) return null;
  const status = 'status' in payload ? payload.status : undefined;
  const error = 'error' in payload ? payload.error : undefined;
  const message = 'message' in payload ? payload.message : undefined;
  if (String(status || '').toUpperCase() === 'ERROR') {
    return String(error || message || 'DataAPI returned ERROR status').trim();
  }
  for (const value of [error, message]) {
    if (typeof value === 'string' && value.trim()) return value.trim();
  }
  return null;
}

/** Transport-level failures that say the vendor is unreachable rather than unwilling. */
export function isInfrastructureError(err: unknown): boolean {
  if (isAbortError(err)) return false;
  if (err instanceof ProviderError) {
    if (err.rateLimited) return false;
    return err.timedOut || (err.httpStatus ?? 0) >= 500 || (err.httpStatus === undefined && err.retryable);
  }
  return true;
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export interface DataApiClientOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  rateLimiter?: RateLimiter;
  maxRequestsPerSecond?: number;
  circuitBreaker?: CircuitBreaker;
  /** Settings for the default breaker; ignored when `circuitBreaker` is given. */
  breakerFailureThreshold?: number;
  breakerCooldownMs?: number;
  fetchImpl?: typeof fetch;
  logger: pino.Logger;
}

export interface DataApiRequestContext {
  label: string;
  symbol?: string;
  range?: DateRange;
  signal?: AbortSignal | null;
}

export class DataApiClient {
  readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly rateLimiter: RateLimiter;
  private readonly circuitBreaker: CircuitBreaker;
  private readonly fetchImpl: typeof fetch;
  private readonly log: pino.Logger;

  constructor(options: DataApiClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl;
    this.timeoutMs = options.timeoutMs;
    this.rateLimiter =
      options.rateLimiter ?? new TokenBucketRateLimiter({ maxRequestsPerSecond: options.maxRequestsPerSecond ?? 5 });
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.log = options.logger.child({ module: 'dataApi' });
    this.circuitBreaker =
      options.circuitBreaker ??
      new CircuitBreaker({
        failureThreshold: options.breakerFailureThreshold ?? 5,
        cooldownMs: options.breakerCooldownMs ?? 30_000,
        isInfraError: isInfrastructureError,
        onStateChange: (from, to) => {
          if (to === 'OPEN') {
            this.log.error(`[circuit-breaker] data-api: ${from} → OPEN, provider calls blocked`);
          } else if (to === 'HALF_OPEN') {
            this.log.warn('[circuit-breaker] data-api: OPEN → HALF_OPEN, probing recovery');
          } else {
            this.log.info(`[circuit-breaker] data-api: ${from} → CLOSED, provider calls resumed`);
          }
        },
      });
  }

  get isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  getCircuitBreakerInfo() {
    return this.circuitBreaker.getInfo();
  }

  buildUrl(path: string, params: QueryParams = {}): string {
    return buildDataApiUrl(this.baseUrl, path, params);
  }

  /** GET a JSON payload. Throws ProviderError for every transport, HTTP or API-level failure. */
  async fetchJson(url: string, context: DataApiRequestContext): Promise<unknown> {
    if (!this.isConfigured) {
      throw new ConfigError('DATA_API_KEY is not configured', { operation: 'config' });
    }
    return this.circuitBreaker.call(() => this.fetchJsonOnce(url, context));
  }

  private async fetchJsonOnce(url: string, context: DataApiRequestContext): Promise<unknown> {
    const { label, symbol, range } = context;
    const externalSignal = context.signal ?? null;
    await this.rateLimiter.acquire(externalSignal);

    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const forwardAbort = () => controller.abort();
    if (externalSignal) {
      if (externalSignal.aborted) {
        forwardAbort();
      } else {
        externalSignal.addEventListener('abort', forwardAbort, { once: true });
      }
    }

    try {
      const requestUrl = new URL(url);
      requestUrl.searchParams.set('apiKey', this.apiKey);
      const resp = await this.fetchImpl(requestUrl.toString(), { signal: controller.signal });
      const text = await resp.text();
      const payload = parseJsonSafe(text);
      const apiError = extractDataApiError(payload);

      if (!resp.ok) {
        const details = apiError || text.trim().slice(0, 180) || `HTTP ${resp.status}`;
        throw new ProviderError(`${label} request failed (${resp.status}): ${details}`, {
          httpStatus: resp.status,
          symbol,
          range,
        });
      }
      if (apiError) {
        const rateLimited = /Limit Reach|Too Many Requests|rate limit/i.test(apiError);
        throw new ProviderError(`${label} API error: ${apiError}`, {
          httpStatus: rateLimited ? 429 : undefined,
          retryable: rateLimited,
          symbol,
          range,
        });
      }
      return payload;
    } catch (err: unknown) {
      if (err instanceof ProviderError) throw err;
      if (isAbortError(err)) {
        if (timedOut) {
          throw new ProviderError(`${label} request timed out after ${this.timeoutMs}ms`, {
            httpStatus: 504,
            timedOut: true,
            symbol,
            range,
            cause: err,
          });
        }
        throw new ProviderError(`${label} request aborted`, { httpStatus: 499, retryable: false, symbol, range, cause: err });
      }
      this.log.error({ url: sanitizeDataApiUrl(url) }, `${label} fetch failed: ${err instanceof Error ? err.message : String(err)}`);
      throw new ProviderError(`${label} request failed: ${err instanceof Error ? err.message : String(err)}`, {
        retryable: true,
        symbol,
        range,
        cause: err,
      });
    } finally {
      clearTimeout(timeout);
      if (externalSignal) {
        externalSignal.removeEventListener('abort', forwardAbort);
      }
    }
  }
}

// ---------------------------------------------------------------------------
// Bars
// ---------------------------------------------------------------------------

export function getDataApiSymbolCandidates(rawSymbol: string): string[] {
  const symbol = rawSymbol.trim().toUpperCase();
  const candidates: string[] = [];
  const pushUnique = (value: string): void => {
    if (!value || candidates.includes(value)) return;
    candidates.push(value);
  };

  pushUnique(symbol);
  if (symbol.includes('.')) pushUnique(symbol.replace(/\./g, '-'));
  if (symbol.includes('-')) pushUnique(symbol.replace(/-/g, '.'));
  return candidates;
}

function toNumberOrNull(value: unknown): number | null {
  if (value === null || value === undefined) return null;
  const num = Number(value);
  return Number.isFinite(num) ? num : null;
}

export function normalizeAggBar(row: AggBar): OhlcvBar | null {
  const timestamp = toNumberOrNull(row.t);
  if (timestamp === null) return null;
  return {
    // Seconds-resolution timestamps show up from some mirrors of the endpoint.
    timestamp: timestamp < 1e11 ? timestamp * 1000 : timestamp,
    open: toNumberOrNull(row.o),
    high: toNumberOrNull(row.h),
    low: toNumberOrNull(row.l),
    close: toNumberOrNull(row.c),
    volume: toNumberOrNull(row.v),
  };
}

const MAX_PAGES_PER_REQUEST = 20;

/**
 * Aggregates-endpoint provider. The vendor takes one ticker per request, so a
 * multi-symbol fetch is served by one request per symbol behind a single
 * fetchBars call; the client's rate limiter paces them.
 */
export class DataApiMarketDataProvider implements MarketDataProvider {
  private readonly log: pino.Logger;

  constructor(
    private readonly client: DataApiClient,
    logger: pino.Logger,
  ) {
    this.log = logger.child({ module: 'dataApiProvider' });
  }

  buildMinuteAggregatesUrl(symbol: string, start: string, endExclusive: string): string {
    // The wire range is inclusive on both ends.
    const to = addDays(endExclusive, -1);
    return this.client.buildUrl(`/v2/aggs/ticker/${encodeURIComponent(symbol)}/range/1/minute/${start}/${to}`, {
      adjusted: 'true',
      sort: 'asc',
      limit: 50000,
    });
  }

  async fetchBars(request: FetchBarsRequest, options: { signal?: AbortSignal | null } = {}): Promise<BarsBySymbol> {
    const interval = request.interval ?? '1m';
    if (interval !== '1m') {
      throw new ProviderError(`Unsupported interval ${String(interval)}`, { retryable: false });
    }
    const signal = options.signal ?? null;
    const result: BarsBySymbol = new Map();
    for (const symbol of request.symbols) {
      try {
        result.set(symbol, { ok: true, bars: await this.fetchSymbolBars(symbol, request.start, request.end, signal) });
      } catch (err: unknown) {
        if (isAbortError(err)) throw err;
        result.set(symbol, { ok: false, error: err });
      }
    }
    return result;
  }

  /**
   * Tries each spelling of the symbol until one returns bars. A failed
   * spelling falls through to the next; rate limits, an open circuit and
   * aborts stop the walk.
   */
  private async fetchSymbolBars(
    symbol: string,
    start: string,
    end: string,
    signal: AbortSignal | null,
  ): Promise<OhlcvBar[]> {
    const range = { start, end };
    let lastError: unknown = null;
    for (const candidate of getDataApiSymbolCandidates(symbol)) {
      try {
        const bars = await this.fetchPaged(candidate, symbol, range, signal);
        if (bars.length > 0) {
          if (candidate !== symbol) this.log.info(`DataAPI symbol fallback: ${symbol} -> ${candidate}`);
          return bars;
        }
      } catch (err: unknown) {
        lastError = err;
        if (isAbortError(err) || err instanceof CircuitOpenError || (err instanceof ProviderError && err.rateLimited)) {
          throw err;
        }
        this.log.warn(`DataAPI 1m failed for ${candidate} (requested ${symbol}): ${describeError(err)}`);
      }
    }
    if (lastError) throw lastError;
    return [];
  }

  private async fetchPaged(candidate: string, symbol: string, range: DateRange, signal: AbortSignal | null): Promise<OhlcvBar[]> {
    const label = `DataAPI 1m ${candidate} ${range.start}..${range.end}`;
    const bars: OhlcvBar[] = [];
    let url: string | undefined = this.buildMinuteAggregatesUrl(candidate, range.start, range.end);

    for (let page = 0; url && page < MAX_PAGES_PER_REQUEST; page++) {
      const payload = await this.client.fetchJson(url, { label, symbol, range, signal });
      const validated = validatePayload(AggregateResponseSchema, payload);
      if (!validated.ok) {
        throw new ProviderError(`${label} returned unexpected payload shape: ${validated.issues}`, {
          retryable: false,
          symbol,
          range,
        });
      }
      for (const row of validated.data.results ?? []) {
        const bar = normalizeAggBar(row);
        if (bar) bars.push(bar);
      }
      url = validated.data.next_url;
    }
    if (url) {
      this.log.warn(`${label}: stopped after ${MAX_PAGES_PER_REQUEST} pages`);
    }
    return bars;
  }
}
