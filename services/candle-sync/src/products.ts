import { dateToEpochSec } from './utils/time.js';

export const PRODUCT_IDS = [
  'BCH-BTC',
  'BCH-USD',
  'BCH-EUR',
  'BTC-EUR',
  'BTC-USD',
  'BTC-GBP',
  'ETH-BTC',
  'ETH-EUR',
  'ETH-USD',
  'LTC-BTC',
  'LTC-USD',
  'LTC-EUR',
] as const;

export type ProductId = (typeof PRODUCT_IDS)[number];

// The exchange does not expose listing dates; these were collected by hand (UTC).
export const EARLIEST_TRADING_DATE: Readonly<Record<ProductId, string>> = Object.freeze({
  'BCH-BTC': '2018-01-17',
  'BCH-USD': '2017-12-20',
  'BCH-EUR': '2018-01-24',

  'BTC-EUR': '2015-04-23',
  'BTC-USD': '2015-01-08',
  'BTC-GBP': '2015-04-21',

  'ETH-BTC': '2016-05-18',
  'ETH-EUR': '2017-05-23',
  'ETH-USD': '2016-05-18',

  'LTC-BTC': '2016-08-17',
  'LTC-USD': '2016-08-17',
  'LTC-EUR': '2017-05-22',
});

export function isProductId(value: string): value is ProductId {
  return (PRODUCT_IDS as readonly string[]).includes(value);
}

export function earliestTradingTime(product: ProductId): number {
  return dateToEpochSec(EARLIEST_TRADING_DATE[product]);
}
