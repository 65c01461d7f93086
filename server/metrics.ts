import { mkdir, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import client from 'prom-client';

export const metricsRegistry = new client.Registry();
metricsRegistry.setDefaultLabels({ app: 'intraday-ingest' });

export const providerRequestsTotal = new client.Counter({
  name: 'ingest_provider_requests_total',
  help: 'Market-data provider requests issued by the ingestion engine (outcome: ok, partial, error)',
  labelNames: ['operation', 'outcome'],
  registers: [metricsRegistry],
});

export const slicesWrittenTotal = new client.Counter({
  name: 'ingest_slices_written_total',
  help: 'Daily 1m OHLCV slices written to storage',
  labelNames: ['operation'],
  registers: [metricsRegistry],
});

export const symbolOutcomesTotal = new client.Counter({
  name: 'ingest_symbol_outcomes_total',
  help: 'Per-symbol results of ingestion operations',
  labelNames: ['operation', 'status'],
  registers: [metricsRegistry],
});

export const runDurationSeconds = new client.Histogram({
  name: 'ingest_run_duration_seconds',
  help: 'Wall-clock duration of one ingestion command',
  labelNames: ['operation'],
  buckets: [1, 5, 15, 30, 60, 120, 300, 600, 1800],
  registers: [metricsRegistry],
});

/**
 * Dump the registry in Prometheus text format for a node_exporter textfile
 * collector. The write is atomic so the collector never reads a partial file.
 */
export async function writeMetricsTextfile(path: string): Promise<void> {
  const body = await metricsRegistry.metrics();
  await mkdir(dirname(path), { recursive: true });
  const tempPath = `${path}.tmp`;
  await writeFile(tempPath, body, 'utf-8');
  await rename(tempPath, path);
}
