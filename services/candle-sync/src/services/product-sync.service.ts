import { FetchFailedError, PersistenceError } from '../errors.js';
import { earliestTradingTime, type ProductId } from '../products.js';
import type { CandleStore } from '../types/domain.js';
import type { Logger } from '../utils/logger.js';
import { dayKey, formatTimestamp } from '../utils/time.js';
import type { FetchResult } from './candle-fetcher.service.js';

export type SyncState = 'initializing' | 'catching-up' | 'done' | 'failed' | 'interrupted';

export type ProductOutcome = {
  product: ProductId;
  status: 'done' | 'failed' | 'interrupted';
  startedFrom: number | null;
  windowEnd: number;
  pages: number;
  saved: number;
  watermark: number | null;
  error?: FetchFailedError | PersistenceError;
};

export interface PageFetcher {
  fetch(product: ProductId, start: number, end: number, granularity: number): Promise<FetchResult>;
}

export type SyncEngineDeps = {
  fetcher: PageFetcher;
  store: CandleStore;
  logger: Logger;
  granularity: number;
  pageSize: number;
};

export type SyncOptions = {
  windowEnd: number;
  startOverride?: number;
  logPrefix?: string;
  /** Checked between pages; the page in flight is still committed. */
  signal?: AbortSignal;
};

/**
 * Catches one product up to `windowEnd`, one page at a time, committing each
 * page before asking for the next. The cursor lives only for the duration of
 * `sync`; the stored rows are the source of truth on the next run.
 */
export class ProductSyncEngine {
  private state: SyncState = 'initializing';

  constructor(private readonly deps: SyncEngineDeps) {}

  get currentState(): SyncState {
    return this.state;
  }

  /**
   * Just after the stored watermark, or the product's first trading day on an
   * empty table. An override only ever moves the start later.
   */
  async resolveStart(product: ProductId, startOverride?: number): Promise<{ start: number; watermark: number | null }> {
    const watermark = await this.deps.store.latestTime(product);
    const base = watermark === null ? earliestTradingTime(product) : watermark + this.deps.granularity;
    const start = startOverride !== undefined && startOverride > base ? startOverride : base;
    return { start, watermark };
  }

  async sync(product: ProductId, opts: SyncOptions): Promise<ProductOutcome> {
    const { fetcher, store, granularity, pageSize } = this.deps;
    const log = this.deps.logger.child({ product });
    const prefix = opts.logPrefix ?? `${product} | `;
    const windowEnd = opts.windowEnd;

    this.state = 'initializing';
    const outcome: ProductOutcome = {
      product, status: 'done', startedFrom: null, windowEnd, pages: 0, saved: 0, watermark: null,
    };

    let cursor: number;
    try {
      const resolved = await this.resolveStart(product, opts.startOverride);
      cursor = resolved.start;
      outcome.watermark = resolved.watermark;
    } catch (e) {
      return this.fail(outcome, e, log);
    }
    outcome.startedFrom = cursor;

    if (outcome.watermark === null) log.info('no previous data found; importing full history');
    else log.info({ watermark: outcome.watermark }, `resuming after ${formatTimestamp(outcome.watermark)}`);
    log.info(`${prefix}starting from ${formatTimestamp(cursor)}`);

    this.state = 'catching-up';
    let previousDay = dayKey(cursor);

    while (cursor < windowEnd) {
      if (opts.signal?.aborted) {
        this.state = 'interrupted';
        log.warn({ pages: outcome.pages, watermark: outcome.watermark }, `${prefix}interrupted`);
        return { ...outcome, status: 'interrupted' };
      }
      const pageEnd = Math.min(cursor + pageSize * granularity, windowEnd);

      // info level only shows day-by-day progress
      const day = dayKey(cursor);
      if (day !== previousDay) {
        log.info(`${product} | importing ${day}`);
        previousDay = day;
      }
      log.debug({ start: cursor, end: pageEnd }, `${product} | ${formatTimestamp(cursor)} -> ${formatTimestamp(pageEnd)}`);

      const res = await fetcher.fetch(product, cursor, pageEnd, granularity);
      if (!res.ok) return this.fail(outcome, res.error, log);

      const candles = res.candles;
      log.debug(`${prefix}fetched ${candles.length} candles`);
      if (!candles.length) {
        if (pageEnd < windowEnd) {
          // the exchange has no rows here; later data, if any, stays out of reach
          log.warn(
            { start: cursor, end: pageEnd, windowEnd },
            `${prefix}empty page before the window end; stopping at ${formatTimestamp(cursor)}`,
          );
        }
        break;
      }

      try {
        outcome.saved += await store.save(candles);
      } catch (e) {
        return this.fail(outcome, e, log, { start: cursor, end: pageEnd });
      }
      outcome.pages++;

      const newest = candles[candles.length - 1].time;
      outcome.watermark = outcome.watermark === null ? newest : Math.max(outcome.watermark, newest);

      const next = newest + granularity;
      if (next <= cursor) {
        log.warn({ start: cursor, newest }, 'page did not advance past the cursor; stopping');
        break;
      }
      cursor = next;
    }

    this.state = 'done';
    log.info({ pages: outcome.pages, saved: outcome.saved, watermark: outcome.watermark }, `${prefix}done`);
    return outcome;
  }

  private fail(
    outcome: ProductOutcome,
    err: unknown,
    log: Logger,
    window?: { start: number; end: number },
  ): ProductOutcome {
    // anything else is a bug; let it reach the top
    if (!(err instanceof FetchFailedError) && !(err instanceof PersistenceError)) throw err;
    this.state = 'failed';
    const where = err instanceof FetchFailedError ? err.window : window;
    log.error(
      { err, start: where?.start, end: where?.end, pages: outcome.pages, watermark: outcome.watermark },
      err instanceof FetchFailedError
        ? 'unable to fetch candles (max retries exceeded); next run resumes from the watermark'
        : 'unable to persist candles; next run resumes from the watermark',
    );
    return { ...outcome, status: 'failed', error: err };
  }
}
