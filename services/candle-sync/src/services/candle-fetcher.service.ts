import { z } from 'zod';
import { FetchFailedError, MalformedResponseError, isRetryable } from '../errors.js';
import { fetchAttempts, fetchDuration } from '../metrics/metrics.js';
import type { ProductId } from '../products.js';
import type { Candle, CandleSource } from '../types/domain.js';
import type { Logger } from '../utils/logger.js';
import type { RateLimiter } from '../utils/rate-limiter.js';

const CandlesPayload = z.array(z.array(z.unknown()));
const num = z.number().finite();
const CandleRow = z.tuple([num, num, num, num, num, num]);

export type FetchResult =
  | { ok: true; candles: Candle[] }
  | { ok: false; error: FetchFailedError };

/** Maps raw `[time, low, high, open, close, volume]` rows to ascending candles. */
export function toCandles(product: ProductId, payload: unknown, logger?: Logger): Candle[] {
  const parsed = CandlesPayload.safeParse(payload);
  if (!parsed.success) {
    throw new MalformedResponseError(`unexpected candles payload: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }

  const out: Candle[] = [];
  for (const raw of parsed.data) {
    // the api has been seen returning extra values and null fields
    const row = CandleRow.safeParse(raw);
    if (!row.success) {
      logger?.warn({ product, row: raw }, 'candle row is not six numbers; skipped');
      continue;
    }
    const [time, low, high, open, close, volume] = row.data;
    if (low > high || low > Math.min(open, close) || high < Math.max(open, close)) {
      logger?.debug({ product, time }, 'candle has inconsistent ohlc; stored as received');
    }
    out.push({ market: product, time, open, high, low, close, volume });
  }
  return out.sort((a, b) => a.time - b.time);
}

export class CandleFetcher {
  constructor(
    private readonly source: CandleSource,
    private readonly limiter: RateLimiter,
    private readonly attempts: number,
    private readonly logger: Logger,
  ) {}

  async fetch(product: ProductId, start: number, end: number, granularity: number): Promise<FetchResult> {
    let lastError: unknown;
    let attempt = 0;

    while (attempt < this.attempts) {
      attempt++;
      await this.limiter.acquire();
      const endTimer = fetchDuration.startTimer();
      try {
        const payload = await this.source.getCandles({ product, start, end, granularity });
        const candles = toCandles(product, payload, this.logger);
        fetchAttempts.inc({ status: 'ok' });
        return { ok: true, candles };
      } catch (e) {
        lastError = e;
        fetchAttempts.inc({ status: e instanceof Error && 'code' in e ? String(e.code) : 'error' });
        if (!isRetryable(e)) break;
        if (attempt < this.attempts) {
          this.logger.warn({ err: e, product, start, end, attempt }, 'candle fetch failed; re-trying');
        }
      } finally {
        endTimer();
      }
    }

    return { ok: false, error: new FetchFailedError({ product, start, end }, attempt, lastError) };
  }
}
