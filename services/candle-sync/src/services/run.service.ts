import { ConfigurationError } from '../errors.js';
import { PRODUCT_IDS, isProductId, type ProductId } from '../products.js';
import type { Logger } from '../utils/logger.js';
import { alignDown, formatTimestamp, nowSec } from '../utils/time.js';
import type { ProductOutcome, ProductSyncEngine } from './product-sync.service.js';

export type RunReport = {
  windowEnd: number;
  outcomes: ProductOutcome[];
  failed: number;
  interrupted: boolean;
};

export const EXIT_CODES = {
  ok: 0,
  productFailed: 1,
  configuration: 2,
  fatal: 3,
  interrupted: 130,
} as const;

export function resolveProducts(filter?: string): ProductId[] {
  if (filter === undefined) return [...PRODUCT_IDS];
  if (!isProductId(filter)) {
    throw new ConfigurationError(`unknown product "${filter}"; expected one of ${PRODUCT_IDS.join(', ')}`);
  }
  return [filter];
}

export function exitCodeFor(report: RunReport): number {
  if (report.interrupted) return EXIT_CODES.interrupted;
  return report.failed > 0 ? EXIT_CODES.productFailed : EXIT_CODES.ok;
}

export class RunOrchestrator {
  constructor(
    private readonly engine: ProductSyncEngine,
    private readonly logger: Logger,
    private readonly opts: { granularity: number; settleSec: number; now?: () => number },
  ) {}

  /**
   * "Now" is read once: every product catches up to the same fixed end, so a
   * long run never chases candles that keep arriving.
   */
  async run(products: readonly ProductId[], startDateOverride?: number, signal?: AbortSignal): Promise<RunReport> {
    const now = (this.opts.now ?? nowSec)();
    const windowEnd = alignDown(now, this.opts.granularity) - this.opts.settleSec;
    const outcomes: ProductOutcome[] = [];

    this.logger.info({ products, windowEnd: formatTimestamp(windowEnd) }, `updating ${products.join(', ')}`);

    for (const [i, product] of products.entries()) {
      if (signal?.aborted) break;
      const outcome = await this.engine.sync(product, {
        windowEnd,
        startOverride: startDateOverride,
        logPrefix: `${i + 1}/${products.length} | ${product} | `,
        signal,
      });
      outcomes.push(outcome);
    }

    const failed = outcomes.filter((o) => o.status === 'failed').length;
    const interrupted = signal?.aborted ?? false;
    const summary = outcomes.map((o) => ({ product: o.product, status: o.status, saved: o.saved }));
    if (interrupted) {
      const remaining = products.length - outcomes.length;
      this.logger.warn({ summary, remaining }, 'run interrupted; next run resumes from the stored candles');
    } else if (failed) {
      this.logger.warn({ failed, summary }, `run finished with ${failed} failed product(s)`);
    } else {
      this.logger.info({ summary }, 'run finished');
    }

    return { windowEnd, outcomes, failed, interrupted };
  }
}
