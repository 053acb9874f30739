import { Registry, Counter, Histogram } from 'prom-client';
export const registry = new Registry();

export const fetchAttempts = new Counter({
  name: 'candle_fetch_attempts_total',
  help: 'Candle page requests by outcome',
  labelNames: ['status'] as const,
  registers: [registry],
});
export const fetchDuration = new Histogram({
  name: 'candle_fetch_duration_seconds',
  help: 'Candle page request latency',
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});
export const candlesSaved = new Counter({
  name: 'candles_saved_total',
  help: 'Candle rows inserted',
  labelNames: ['market'] as const,
  registers: [registry],
});

/**
 * Flattens counters into `{ "name{label=value}": n }` for a log line, plus the
 * fetch latency histogram's `_count` and `_sum`.
 */
export async function metricsSummary(): Promise<Record<string, number>> {
  const out: Record<string, number> = {};
  for (const counter of [fetchAttempts, candlesSaved]) {
    const metric = await counter.get();
    for (const v of metric.values) {
      const labels = Object.entries(v.labels)
        .map(([k, val]) => `${k}=${String(val)}`)
        .join(',');
      out[labels ? `${metric.name}{${labels}}` : metric.name] = v.value;
    }
  }
  const duration = await fetchDuration.get();
  for (const v of duration.values) {
    if (v.metricName === `${duration.name}_count` || v.metricName === `${duration.name}_sum`) {
      out[v.metricName] = v.value;
    }
  }
  return out;
}
