import type { ProductId } from '../products.js';

export type Candle = {
  market: ProductId;
  time: number;      // epoch seconds, minute aligned
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
};

// half-open [start, end), epoch seconds
export type CandleRequest = {
  product: ProductId;
  start: number;
  end: number;
  granularity: number;
};

/** Anything that returns the exchange's raw candle payload for a window. */
export interface CandleSource {
  getCandles(req: CandleRequest): Promise<unknown>;
}

export interface CandleStore {
  latestTime(product: ProductId): Promise<number | null>;
  save(candles: Candle[]): Promise<number>;
}
