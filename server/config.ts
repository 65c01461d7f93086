import 'dotenv/config';

import { ConfigError } from './lib/errors.js';

// --- Storage / watchlist ---
export const STORAGE_ROOT = String(process.env.STORAGE_ROOT || '').trim();
export const INGEST_CONFIG_PATH = String(process.env.INGEST_CONFIG_PATH || './config/ingest.json').trim();

// --- Market-data provider ---
export const DATA_API_KEY = String(process.env.DATA_API_KEY || '').trim();
export const DATA_API_BASE_URL = String(process.env.DATA_API_BASE_URL || 'https://api.massive.com').trim();
export const DATA_API_TIMEOUT_MS = Math.max(1_000, Number(process.env.DATA_API_TIMEOUT_MS) || 15_000);
export const DATA_API_MAX_REQUESTS_PER_SECOND = Math.max(1, Number(process.env.DATA_API_MAX_REQUESTS_PER_SECOND) || 5);

// --- Backfill windowing ---
/** How many days of 1m history the provider retains. */
export const INGEST_RETENTION_DAYS = Math.max(1, Number(process.env.INGEST_RETENTION_DAYS) || 30);
/** Days kept clear of the retention edge so the first window is never already expired. */
export const INGEST_SAFETY_MARGIN_DAYS = Math.max(0, Number(process.env.INGEST_SAFETY_MARGIN_DAYS ?? 2) || 0);
/** Maximum span of a single 1m request. */
export const INGEST_SPAN_DAYS = Math.max(1, Number(process.env.INGEST_SPAN_DAYS) || 7);
export const INGEST_ADDITIONAL_WINDOWS = Math.max(0, Math.floor(Number(process.env.INGEST_ADDITIONAL_WINDOWS ?? 3) || 0));

// --- Pacing / retry ---
export const INGEST_MIN_REQUEST_INTERVAL_MS = Math.max(0, Number(process.env.INGEST_MIN_REQUEST_INTERVAL_MS ?? 2_000) || 0);
export const INGEST_RETRY_MAX_ATTEMPTS = Math.max(1, Math.floor(Number(process.env.INGEST_RETRY_MAX_ATTEMPTS) || 3));
export const INGEST_RETRY_BASE_MS = Math.max(100, Number(process.env.INGEST_RETRY_BASE_MS) || 1_500);
export const INGEST_RETRY_MAX_MS = 30_000;

// --- Circuit breaker ---
export const DATA_API_BREAKER_FAILURE_THRESHOLD = 5;
export const DATA_API_BREAKER_COOLDOWN_MS = 30_000;

// --- Metrics ---
export const METRICS_TEXTFILE_PATH = String(process.env.METRICS_TEXTFILE_PATH || '').trim();

// --- Startup validation ---
export interface StartupValidation {
  errors: string[];
  warnings: string[];
}

export function collectStartupEnvironmentIssues(env: NodeJS.ProcessEnv = process.env): StartupValidation {
  const errors: string[] = [];
  const warnings: string[] = [];
  const checkNumber = (name: string, min: number) => {
    const raw = env[name];
    if (raw === undefined || raw === '') return;
    const numeric = Number(raw);
    if (!Number.isFinite(numeric) || numeric < min) {
      warnings.push(`${name} should be a number >= ${min} (received: ${String(raw)})`);
    }
  };

  if (!String(env.DATA_API_KEY || '').trim()) {
    warnings.push('DATA_API_KEY is not set; provider requests will fail and the calendar stays weekday-only');
  }

  checkNumber('DATA_API_TIMEOUT_MS', 1_000);
  checkNumber('DATA_API_MAX_REQUESTS_PER_SECOND', 1);
  checkNumber('INGEST_RETENTION_DAYS', 1);
  checkNumber('INGEST_SAFETY_MARGIN_DAYS', 0);
  checkNumber('INGEST_SPAN_DAYS', 1);
  checkNumber('INGEST_ADDITIONAL_WINDOWS', 0);
  checkNumber('INGEST_MIN_REQUEST_INTERVAL_MS', 0);
  checkNumber('INGEST_RETRY_MAX_ATTEMPTS', 1);

  const retention = Number(env.INGEST_RETENTION_DAYS) || INGEST_RETENTION_DAYS;
  const margin = Number(env.INGEST_SAFETY_MARGIN_DAYS ?? INGEST_SAFETY_MARGIN_DAYS) || 0;
  if (margin >= retention) {
    errors.push(`INGEST_SAFETY_MARGIN_DAYS (${margin}) must be smaller than INGEST_RETENTION_DAYS (${retention})`);
  }

  return { errors, warnings };
}

export function validateStartupEnvironment(log: { warn: (msg: string) => void; error: (msg: string) => void }): void {
  const { errors, warnings } = collectStartupEnvironmentIssues();
  for (const warning of warnings) {
    log.warn(`[startup-env] ${warning}`);
  }
  for (const error of errors) {
    log.error(`[startup-env] ${error}`);
  }
  if (errors.length > 0) {
    throw new ConfigError('Startup environment validation failed', { operation: 'config' });
  }
}
