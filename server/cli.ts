/**
 * Command-line surface: argument parsing, collaborator wiring and output.
 */

import { resolve } from 'path';
import type pino from 'pino';
import { parseArgs } from 'util';
import { v4 as uuidv4 } from 'uuid';

import * as config from './config.js';
import { isDateKey } from './lib/dateUtils.js';
import { ConfigError, describeError, StoreCorruptionError } from './lib/errors.js';
import { IntervalRateLimiter } from './lib/rateLimiter.js';
import { runDurationSeconds, writeMetricsTextfile } from './metrics.js';
import { countOutcomes, IngestionEngine, type IngestionReport } from './orchestrators/ingestionEngine.js';
import { CoverageStore, type StorageMeta } from './services/coverageStore.js';
import { DataApiClient, DataApiMarketDataProvider } from './services/dataApi.js';
import { CsvDataStore } from './services/dataStore.js';
import { ExchangeTradingCalendar, WeekdayTradingCalendar, type TradingCalendarService } from './services/tradingCalendar.js';
import { loadIngestionConfig, type Watchlist } from './services/watchlist.js';

export const EXIT_OK = 0;
export const EXIT_SYMBOL_FAILURES = 1;
export const EXIT_FATAL = 2;
export const EXIT_USAGE = 64;

export type CliCommand =
  | { name: 'roll' }
  | { name: 'backfill'; symbols: string[] }
  | { name: 'fill'; date: string }
  | { name: 'rescan' }
  | { name: 'status' };

export interface CliOptions {
  command: CliCommand;
  configPath: string;
  storageRoot?: string;
}

export const USAGE = `Usage: intraday-ingest <command> [options]

Commands:
  roll                     Append yesterday's session; backfill symbols with no coverage
  backfill [SYMBOL...]     Pull the provider's retained 1m history (default: whole watchlist)
  fill --date YYYY-MM-DD   Fill one missing date inside existing coverage
  rescan                   Rebuild the aggregate metadata from per-symbol records
  status                   Print coverage per category

Options:
  --config PATH            Ingestion config JSON (default: $INGEST_CONFIG_PATH or ./config/ingest.json)
  --storage PATH           Storage root (overrides the config file and $STORAGE_ROOT)
  --date YYYY-MM-DD        Date for "fill"
`;

function readArgv(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        config: { type: 'string' },
        storage: { type: 'string' },
        date: { type: 'string' },
      },
    });
  } catch (err: unknown) {
    throw new ConfigError(describeError(err), { operation: 'config' });
  }
}

export function parseCommand(argv: string[]): CliOptions {
  const parsed = readArgv(argv);
  const [name, ...rest] = parsed.positionals;
  const configPath = parsed.values.config ?? config.INGEST_CONFIG_PATH;
  const storageRoot = parsed.values.storage;
  const base = { configPath, storageRoot };

  switch (name) {
    case 'roll':
    case 'rescan':
    case 'status':
      if (rest.length > 0) {
        throw new ConfigError(`"${name}" takes no arguments`, { operation: 'config' });
      }
      return { ...base, command: { name } };
    case 'backfill':
      return { ...base, command: { name, symbols: rest } };
    case 'fill': {
      const date = parsed.values.date ?? rest[0];
      if (!date || !isDateKey(date)) {
        throw new ConfigError('"fill" needs --date YYYY-MM-DD', { operation: 'config' });
      }
      return { ...base, command: { name, date } };
    }
    default:
      throw new ConfigError(name ? `Unknown command "${name}"` : 'No command given', { operation: 'config' });
  }
}

/** One line per symbol: category, symbol, earliest → latest, last update. */
export function formatCoverageStatus(meta: StorageMeta): string {
  const lines = [`created ${meta.created_at}, updated ${meta.last_updated}`];
  const categories = Object.keys(meta.categories).sort();
  if (categories.length === 0) {
    lines.push('(no coverage recorded)');
  }
  for (const category of categories) {
    const symbols = meta.categories[category];
    lines.push(`${category} (${Object.keys(symbols).length})`);
    for (const symbol of Object.keys(symbols).sort()) {
      const record = symbols[symbol];
      lines.push(
        `  ${symbol.padEnd(10)} ${record.earliest_date ?? '—'} → ${record.latest_date ?? '—'}  (updated ${record.last_updated})`,
      );
    }
  }
  return `${lines.join('\n')}\n`;
}

export function exitCodeFor(report: IngestionReport): number {
  return countOutcomes(report).failed > 0 ? EXIT_SYMBOL_FAILURES : EXIT_OK;
}

async function buildCalendar(watchlist: Watchlist, client: DataApiClient, log: pino.Logger): Promise<TradingCalendarService> {
  if (!client.isConfigured) {
    log.warn('DATA_API_KEY is not set; trading calendar falls back to weekdays');
    return new WeekdayTradingCalendar();
  }
  const exchanges = new Set<string>();
  // Symbols without an exchange are reported per symbol when the engine reaches them.
  for (const entry of watchlist.entries()) {
    const exchange = entry.attributes.exchange?.trim();
    if (exchange) exchanges.add(exchange.toUpperCase());
  }
  const calendar = new ExchangeTradingCalendar({ client, logger: log });
  await calendar.init(exchanges);
  return calendar;
}

export async function runCli(argv: string[], log: pino.Logger): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCommand(argv);
  } catch (err: unknown) {
    process.stderr.write(`${describeError(err)}\n\n${USAGE}`);
    return EXIT_USAGE;
  }

  const runId = uuidv4();
  const runLog = log.child({ runId, command: options.command.name });
  const stopTimer = runDurationSeconds.startTimer({ operation: options.command.name });

  try {
    config.validateStartupEnvironment(runLog);
    const ingestConfig = await loadIngestionConfig(options.configPath);
    const storageRoot = resolve(options.storageRoot || config.STORAGE_ROOT || ingestConfig.storageRoot || './data');
    runLog.info(`Storage root ${storageRoot}, ${ingestConfig.watchlist.size} symbols`);

    const coverage = new CoverageStore({ root: storageRoot, watchlist: ingestConfig.watchlist, logger: runLog });
    await coverage.load();

    if (options.command.name === 'rescan') {
      await coverage.flush();
      runLog.info(`Aggregate rebuilt at ${coverage.metaPath}`);
      return EXIT_OK;
    }
    if (options.command.name === 'status') {
      process.stdout.write(formatCoverageStatus(coverage.snapshot()));
      return EXIT_OK;
    }

    const client = new DataApiClient({
      apiKey: config.DATA_API_KEY,
      baseUrl: config.DATA_API_BASE_URL,
      timeoutMs: config.DATA_API_TIMEOUT_MS,
      maxRequestsPerSecond: config.DATA_API_MAX_REQUESTS_PER_SECOND,
      breakerFailureThreshold: config.DATA_API_BREAKER_FAILURE_THRESHOLD,
      breakerCooldownMs: config.DATA_API_BREAKER_COOLDOWN_MS,
      logger: runLog,
    });
    const engine = new IngestionEngine({
      watchlist: ingestConfig.watchlist,
      coverage,
      provider: new DataApiMarketDataProvider(client, runLog),
      calendar: await buildCalendar(ingestConfig.watchlist, client, runLog),
      dataStore: new CsvDataStore(storageRoot),
      logger: runLog,
      rateLimiter: new IntervalRateLimiter({ minIntervalMs: config.INGEST_MIN_REQUEST_INTERVAL_MS }),
      retryPolicy: {
        maxAttempts: config.INGEST_RETRY_MAX_ATTEMPTS,
        baseDelayMs: config.INGEST_RETRY_BASE_MS,
        maxDelayMs: config.INGEST_RETRY_MAX_MS,
      },
      windows: {
        retentionDays: config.INGEST_RETENTION_DAYS,
        safetyMarginDays: config.INGEST_SAFETY_MARGIN_DAYS,
        spanDays: config.INGEST_SPAN_DAYS,
        additionalWindows: config.INGEST_ADDITIONAL_WINDOWS,
      },
      runId,
    });

    const command = options.command;
    let report: IngestionReport;
    if (command.name === 'roll') {
      report = await engine.roll();
    } else if (command.name === 'backfill') {
      report = await engine.backfillMany(command.symbols.length > 0 ? command.symbols : undefined);
    } else {
      report = await engine.fillDate(command.date);
    }

    for (const outcome of report.outcomes.filter((o) => o.status === 'failed')) {
      const range = outcome.range ? ` ${outcome.range.start}..${outcome.range.end}` : '';
      process.stderr.write(`FAILED ${outcome.operation} ${outcome.symbol}${range}: ${outcome.error?.message ?? 'unknown error'}\n`);
    }
    return exitCodeFor(report);
  } catch (err: unknown) {
    if (err instanceof StoreCorruptionError || err instanceof ConfigError) {
      runLog.fatal({ code: err.code }, err.message);
    } else {
      runLog.fatal({ err }, `Unexpected failure: ${describeError(err)}`);
    }
    return EXIT_FATAL;
  } finally {
    stopTimer();
    if (config.METRICS_TEXTFILE_PATH) {
      try {
        await writeMetricsTextfile(config.METRICS_TEXTFILE_PATH);
      } catch (err: unknown) {
        runLog.warn(`Could not write metrics textfile: ${describeError(err)}`);
      }
    }
  }
}
