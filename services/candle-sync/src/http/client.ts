import { fetch, type Response } from 'undici';
import type { AppConfig } from '../config/index.js';
import { MalformedResponseError, RejectedRequestError, TransientFetchError } from '../errors.js';
import type { CandleRequest, CandleSource } from '../types/domain.js';
import { toIso } from '../utils/time.js';

/**
 * Public candle-history endpoint of the exchange.
 * Rows come back as `[time, low, high, open, close, volume]`, newest first.
 */
export class ExchangeClient implements CandleSource {
  constructor(private readonly api: AppConfig['api']) {}

  buildUrl(req: CandleRequest): string {
    const params = new URLSearchParams({
      start: toIso(req.start),
      // the endpoint treats `end` as inclusive
      end: toIso(req.end - 1),
      granularity: String(req.granularity),
    });
    return `${this.api.baseUrl}/products/${encodeURIComponent(req.product)}/candles?${params.toString()}`;
  }

  async getCandles(req: CandleRequest): Promise<unknown> {
    const url = this.buildUrl(req);
    const ac = new AbortController();
    const to = setTimeout(() => ac.abort(), this.api.timeoutMs);

    try {
      const res = await this.send(url, ac.signal);

      if (!res.ok) {
        // 429 is the rate limit; the only 4xx worth repeating
        if (res.status === 429 || res.status >= 500) {
          throw new TransientFetchError(`http ${res.status} from ${url}`, res.status);
        }
        throw new RejectedRequestError(`http ${res.status} from ${url}`, res.status);
      }

      try {
        return await res.json();
      } catch (e) {
        // the abort also rejects a body still being read
        if (ac.signal.aborted) {
          throw new TransientFetchError(`timed out after ${this.api.timeoutMs}ms: ${url}`, null, { cause: e });
        }
        throw new MalformedResponseError(`response body is not json: ${url}`, { cause: e });
      }
    } finally {
      clearTimeout(to);
    }
  }

  private async send(url: string, signal: AbortSignal): Promise<Response> {
    try {
      return await fetch(url, {
        method: 'GET',
        headers: {
          accept: 'application/json',
          'user-agent': this.api.userAgent,
        },
        signal,
      });
    } catch (e) {
      // network/abort → retry
      const reason = signal.aborted ? `timed out after ${this.api.timeoutMs}ms` : 'network error';
      throw new TransientFetchError(`${reason}: ${url}`, null, { cause: e });
    }
  }
}
