import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SqliteDatabase } from '../../src/db/sqlite.js';
import { ConfigurationError, TransientFetchError } from '../../src/errors.js';
import { PRODUCT_IDS } from '../../src/products.js';
import { CandlesRepo } from '../../src/repositories/candles.repo.js';
import { CandleFetcher } from '../../src/services/candle-fetcher.service.js';
import { ProductSyncEngine } from '../../src/services/product-sync.service.js';
import { EXIT_CODES, RunOrchestrator, exitCodeFor, resolveProducts } from '../../src/services/run.service.js';
import { RateLimiter } from '../../src/utils/rate-limiter.js';
import { MINUTE, StubSource, captureLogger, rawRows, silentLogger, utc } from './helpers.js';

const NOW = utc('2024-01-01T00:00:00Z');
const ETH_START = utc('2016-05-18T00:00:00Z');
const BTC_START = utc('2015-01-08T00:00:00Z');

describe('resolveProducts', () => {
  it('returns the full configured set without a filter', () => {
    expect(resolveProducts()).toEqual([...PRODUCT_IDS]);
    expect(resolveProducts()).toHaveLength(12);
  });

  it('restricts to one known product', () => {
    expect(resolveProducts('LTC-EUR')).toEqual(['LTC-EUR']);
  });

  it('rejects an unknown product', () => {
    expect(() => resolveProducts('DOGE-USD')).toThrow(ConfigurationError);
  });
});

describe('RunOrchestrator', () => {
  let db: SqliteDatabase;
  let repo: CandlesRepo;

  beforeEach(async () => {
    db = await SqliteDatabase.open(':memory:');
    repo = new CandlesRepo(db);
    await repo.ensureSchema();
  });

  afterEach(async () => {
    await db.close();
  });

  function orchestrator(source: StubSource, opts: { settleSec?: number; now?: () => number } = {}) {
    const { logger, lines } = captureLogger();
    const engine = new ProductSyncEngine({
      fetcher: new CandleFetcher(source, new RateLimiter(0), 3, silentLogger()),
      store: repo,
      logger,
      granularity: MINUTE,
      pageSize: 300,
    });
    const run = new RunOrchestrator(engine, logger, {
      granularity: MINUTE,
      settleSec: opts.settleSec ?? 0,
      now: opts.now ?? (() => NOW + 59),
    });
    return { run, lines };
  }

  it('keeps going after a failed product and reports it', async () => {
    const fail = () => new TransientFetchError('network error');
    const source = new StubSource([rawRows(ETH_START, 5), [], fail(), fail(), fail(), rawRows(ETH_START, 3), []]);
    const { run } = orchestrator(source);

    const report = await run.run(['ETH-USD', 'BTC-USD', 'ETH-BTC']);

    expect(report.outcomes.map((o) => [o.product, o.status])).toEqual([
      ['ETH-USD', 'done'],
      ['BTC-USD', 'failed'],
      ['ETH-BTC', 'done'],
    ]);
    expect(report.failed).toBe(1);
    expect(exitCodeFor(report)).toBe(EXIT_CODES.productFailed);
    expect(await repo.countRows('ETH-USD')).toBe(5);
    expect(await repo.countRows('BTC-USD')).toBe(0);
    expect(await repo.countRows('ETH-BTC')).toBe(3);
  });

  it('exits 0 when every product is done', async () => {
    const { run } = orchestrator(new StubSource([]));
    const report = await run.run(['LTC-USD']);
    expect(report.failed).toBe(0);
    expect(exitCodeFor(report)).toBe(EXIT_CODES.ok);
  });

  it('logs a numbered line per product', async () => {
    const { run, lines } = orchestrator(new StubSource([]));

    await run.run(['ETH-USD', 'BTC-USD']);

    const messages = lines.map((l) => l.msg);
    expect(messages).toContain('1/2 | ETH-USD | starting from 2016-05-18 00:00:00');
    expect(messages).toContain('2/2 | BTC-USD | starting from 2015-01-08 00:00:00');
  });

  it('fixes one minute-aligned window end for the whole run', async () => {
    const source = new StubSource([]);
    const { run } = orchestrator(source);

    const report = await run.run(['ETH-USD', 'BTC-USD']);

    expect(report.windowEnd).toBe(NOW);
    expect(report.outcomes.every((o) => o.windowEnd === NOW)).toBe(true);
    expect(source.calls.map((c) => c.start)).toEqual([ETH_START, BTC_START]);
  });

  it('holds back the settle lag from the window end', async () => {
    const { run } = orchestrator(new StubSource([]), { settleSec: 5 * MINUTE });
    const report = await run.run(['ETH-USD']);
    expect(report.windowEnd).toBe(NOW - 5 * MINUTE);
  });

  it('passes the start-date override to every product', async () => {
    const source = new StubSource([]);
    const { run } = orchestrator(source);
    const override = utc('2016-01-01T00:00:00Z');

    await run.run(['ETH-USD', 'BTC-USD'], override);

    // later than BTC-USD's first day, earlier than ETH-USD's
    expect(source.calls.map((c) => c.start)).toEqual([ETH_START, override]);
  });
  it('does not start the next product once interrupted and exits 130', async () => {
    const ac = new AbortController();
    const source = new StubSource([rawRows(ETH_START, 5), []]);
    const { run, lines } = orchestrator(source);
    const sync = run.run(['ETH-USD', 'BTC-USD'], undefined, ac.signal);
    ac.abort('SIGTERM');

    const report = await sync;

    expect(report.interrupted).toBe(true);
    expect(exitCodeFor(report)).toBe(EXIT_CODES.interrupted);
    expect(report.outcomes.map((o) => o.product)).not.toContain('BTC-USD');
    expect(source.calls.every((c) => c.product === 'ETH-USD')).toBe(true);
    expect(lines.find((l) => l.msg === 'run interrupted; next run resumes from the stored candles')).toMatchObject({
      remaining: 2 - report.outcomes.length,
    });
  });

  it('runs nothing when the signal is already aborted', async () => {
    const ac = new AbortController();
    ac.abort('SIGINT');
    const source = new StubSource([]);
    const { run } = orchestrator(source);

    const report = await run.run(['ETH-USD'], undefined, ac.signal);

    expect(report).toMatchObject({ outcomes: [], failed: 0, interrupted: true });
    expect(source.calls).toHaveLength(0);
  });
});
