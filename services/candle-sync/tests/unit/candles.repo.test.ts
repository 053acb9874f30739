import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SqliteDatabase } from '../../src/db/sqlite.js';
import { PersistenceError } from '../../src/errors.js';
import { CandlesRepo } from '../../src/repositories/candles.repo.js';
import type { Candle } from '../../src/types/domain.js';
import { MINUTE, utc } from './helpers.js';

const T0 = utc('2018-03-01T00:00:00Z');

function candle(time: number, market: Candle['market'] = 'BTC-USD', close = 100): Candle {
  return { market, time, open: 100, high: 110, low: 90, close, volume: 2.5 };
}

describe('CandlesRepo', () => {
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

  it('creates the schema idempotently', async () => {
    await repo.ensureSchema();
    await repo.ensureSchema();
    expect(await repo.countRows('BTC-USD')).toBe(0);
  });

  it('has no watermark on an empty table', async () => {
    expect(await repo.latestTime('BTC-USD')).toBeNull();
  });

  it('reads the watermark per market', async () => {
    await repo.save([candle(T0), candle(T0 + MINUTE), candle(T0 + 5 * MINUTE, 'ETH-USD')]);

    expect(await repo.latestTime('BTC-USD')).toBe(T0 + MINUTE);
    expect(await repo.latestTime('ETH-USD')).toBe(T0 + 5 * MINUTE);
    expect(await repo.latestTime('LTC-USD')).toBeNull();
  });

  it('skips rows whose (market, time) already exist and keeps the first content', async () => {
    expect(await repo.save([candle(T0), candle(T0 + MINUTE)])).toBe(2);
    expect(await repo.save([candle(T0, 'BTC-USD', 555), candle(T0 + 2 * MINUTE)])).toBe(1);

    expect(await repo.countRows('BTC-USD')).toBe(3);
    const row = await db.get('SELECT close FROM candles WHERE market = ? AND time = ?', ['BTC-USD', T0]);
    expect(row).toEqual({ close: 100 });
  });

  it('saving the same page twice is a no-op the second time', async () => {
    const page = [candle(T0), candle(T0 + MINUTE), candle(T0 + 2 * MINUTE)];
    await repo.save(page);
    const before = await db.get('SELECT SUM(close) AS s, COUNT(*) AS n FROM candles');

    expect(await repo.save(page)).toBe(0);
    expect(await db.get('SELECT SUM(close) AS s, COUNT(*) AS n FROM candles')).toEqual(before);
  });

  it('stores the same time for different markets', async () => {
    await repo.save([candle(T0, 'BTC-USD'), candle(T0, 'BTC-EUR')]);
    expect(await repo.countRows('BTC-USD')).toBe(1);
    expect(await repo.countRows('BTC-EUR')).toBe(1);
  });

  it('writes a page atomically: a failing row rolls back the whole page', async () => {
    await db.exec(`
      CREATE TRIGGER reject_row BEFORE INSERT ON candles
      WHEN NEW.time = ${T0 + 2 * MINUTE}
      BEGIN SELECT RAISE(ABORT, 'rejected'); END;
    `);

    await expect(repo.save([candle(T0), candle(T0 + MINUTE), candle(T0 + 2 * MINUTE)])).rejects.toBeInstanceOf(
      PersistenceError,
    );
    expect(await repo.countRows('BTC-USD')).toBe(0);
    expect(await repo.latestTime('BTC-USD')).toBeNull();

    // connection is usable after the rollback
    expect(await repo.save([candle(T0)])).toBe(1);
  });

  it('returns 0 for an empty page without touching the database', async () => {
    expect(await repo.save([])).toBe(0);
  });
});
