import type { SqliteDatabase } from '../db/sqlite.js';
import { SQL } from '../db/sql.js';
import { PersistenceError } from '../errors.js';
import { candlesSaved } from '../metrics/metrics.js';
import type { ProductId } from '../products.js';
import type { Candle, CandleStore } from '../types/domain.js';

function numericColumn(row: unknown, column: string): number | null {
  if (typeof row !== 'object' || row === null || !(column in row)) return null;
  const value: unknown = Reflect.get(row, column);
  return typeof value === 'number' ? value : null;
}

export class CandlesRepo implements CandleStore {
  constructor(private readonly db: SqliteDatabase) {}

  async ensureSchema(): Promise<void> {
    try {
      await this.db.exec(SQL.schema.createCandles);
    } catch (e) {
      throw new PersistenceError('unable to create candles table', { cause: e });
    }
  }

  async latestTime(product: ProductId): Promise<number | null> {
    try {
      const row = await this.db.get(SQL.candles.latestTime, [product]);
      return numericColumn(row, 'latest');
    } catch (e) {
      throw new PersistenceError(`unable to read watermark for ${product}`, { cause: e });
    }
  }

  async countRows(product: ProductId): Promise<number> {
    const row = await this.db.get(SQL.candles.countByMarket, [product]);
    return numericColumn(row, 'n') ?? 0;
  }

  /** All-or-nothing per call; returns how many rows were new. */
  async save(candles: Candle[]): Promise<number> {
    if (!candles.length) return 0;
    let inserted = 0;
    try {
      await this.db.transaction(async () => {
        for (const c of candles) {
          inserted += await this.db.run(SQL.candles.insertOrIgnore, [
            c.market, c.time, c.open, c.high, c.low, c.close, c.volume,
          ]);
        }
      });
    } catch (e) {
      throw new PersistenceError(`unable to save ${candles.length} candles for ${candles[0].market}`, { cause: e });
    }
    candlesSaved.inc({ market: candles[0].market }, inserted);
    return inserted;
  }
}
