import path from 'node:path';
import { parseCliArgs, type CliOptions } from './cli.js';
import { loadConfig, type AppConfig } from './config/index.js';
import { SqliteDatabase } from './db/sqlite.js';
import { ConfigurationError } from './errors.js';
import { ExchangeClient } from './http/client.js';
import { metricsSummary } from './metrics/metrics.js';
import type { ProductId } from './products.js';
import { CandlesRepo } from './repositories/candles.repo.js';
import { CandleFetcher } from './services/candle-fetcher.service.js';
import { ProductSyncEngine } from './services/product-sync.service.js';
import { EXIT_CODES, RunOrchestrator, exitCodeFor, resolveProducts } from './services/run.service.js';
import type { CandleSource } from './types/domain.js';
import { createLogger, type Logger } from './utils/logger.js';
import { RateLimiter } from './utils/rate-limiter.js';

export type SyncApp = {
  orchestrator: RunOrchestrator;
  repo: CandlesRepo;
};

/** Wires one run: a single limiter and a single store shared by every product. */
export function buildApp(deps: {
  config: AppConfig;
  logger: Logger;
  db: SqliteDatabase;
  source?: CandleSource;
  limiter?: RateLimiter;
  now?: () => number;
}): SyncApp {
  const { config, logger, db } = deps;
  const source = deps.source ?? new ExchangeClient(config.api);
  const limiter = deps.limiter ?? new RateLimiter(config.rateLimitIntervalMs);
  const repo = new CandlesRepo(db);

  const fetcher = new CandleFetcher(source, limiter, config.fetchAttempts, logger.child({ component: 'fetcher' }));
  const engine = new ProductSyncEngine({
    fetcher,
    store: repo,
    logger: logger.child({ component: 'sync' }),
    granularity: config.granularitySec,
    pageSize: config.api.pageSize,
  });
  const orchestrator = new RunOrchestrator(engine, logger, {
    granularity: config.granularitySec,
    settleSec: config.settleSec,
    now: deps.now,
  });
  return { orchestrator, repo };
}

export type RunHooks = {
  source?: CandleSource;
  logger?: Logger;
  now?: () => number;
  /** Aborted on SIGINT/SIGTERM; the run stops after the page in flight. */
  signal?: AbortSignal;
};

/** Full CLI run; resolves with the process exit code. */
export async function runCli(argv: string[], env: NodeJS.ProcessEnv, hooks: RunHooks = {}): Promise<number> {
  let config: AppConfig;
  let products: ProductId[];
  let cli: CliOptions;
  try {
    cli = parseCliArgs(argv);
    config = loadConfig(env);
    products = resolveProducts(cli.product);
  } catch (e) {
    if (!(e instanceof ConfigurationError)) throw e;
    const fallback = hooks.logger ?? createLogger({ level: 'error', pretty: false });
    fallback.error({ code: e.code }, e.message);
    return EXIT_CODES.configuration;
  }

  const logger = hooks.logger ?? createLogger({ level: cli.logLevel ?? config.logLevel, pretty: config.logPretty });
  const dbPath = cli.dbFile === ':memory:' ? cli.dbFile : path.resolve(cli.dbFile);
  logger.debug({ database: dbPath }, 'opening database');

  const onAbort = () => logger.warn({ signal: String(hooks.signal?.reason) }, 'stop requested; finishing the current page');
  if (hooks.signal?.aborted) onAbort();
  else hooks.signal?.addEventListener('abort', onAbort, { once: true });

  const db = await SqliteDatabase.open(dbPath);
  try {
    const app = buildApp({ config, logger, db, source: hooks.source, now: hooks.now });
    await app.repo.ensureSchema();
    const report = await app.orchestrator.run(products, cli.startDate, hooks.signal);
    logger.debug({ metrics: await metricsSummary() }, 'run metrics');
    return exitCodeFor(report);
  } finally {
    hooks.signal?.removeEventListener('abort', onAbort);
    await db.close();
    logger.debug({ database: dbPath }, 'database closed');
  }
}
