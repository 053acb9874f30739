import { Command, CommanderError } from 'commander';
import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from './config/index.js';
import { ConfigurationError } from './errors.js';
import { PRODUCT_IDS, type ProductId } from './products.js';
import { parseDate } from './utils/time.js';

export type CliOptions = {
  dbFile: string;
  startDate?: number;
  product?: ProductId;
  logLevel?: LogLevel;
};

// classic level names map onto pino's
const LEVEL_ALIASES: Record<string, LogLevel> = { warning: 'warn', critical: 'fatal' };

const LogLevelArg = z
  .string()
  .transform((s) => s.toLowerCase())
  .transform((s) => LEVEL_ALIASES[s] ?? s)
  .pipe(z.enum(LOG_LEVELS));

const CliArgs = z.object({
  dbFile: z.string().min(1),
  startDate: z
    .string()
    .optional()
    .transform((s, ctx) => {
      if (s === undefined) return undefined;
      const sec = parseDate(s);
      if (sec === null) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `start date "${s}" is not in YYYY-MM-DD format` });
        return z.NEVER;
      }
      return sec;
    }),
  product: z
    .enum(PRODUCT_IDS, { errorMap: () => ({ message: `product must be one of ${PRODUCT_IDS.join(', ')}` }) })
    .optional(),
  logLevel: LogLevelArg.optional(),
});

export function buildProgram(): Command {
  return new Command()
    .name('candle-sync')
    .description('Incrementally fetch 1-minute candles into a sqlite file')
    .argument('<db_file>', 'sqlite3 db file path')
    .option('-s, --start-date <date>', 'process candles since given date, YYYY-MM-DD')
    .option('-p, --product <symbol>', 'which product to update')
    .option('-l, --loglevel <level>', 'DEBUG|INFO|WARNING|ERROR|CRITICAL')
    .exitOverride()
    .configureOutput({ writeErr: () => undefined });
}

/** `argv` without the node binary and script path. */
export function parseCliArgs(argv: string[]): CliOptions {
  const program = buildProgram();
  try {
    program.parse(argv, { from: 'user' });
  } catch (e) {
    // --help exits with 0 and is not a configuration problem
    if (e instanceof CommanderError && e.exitCode !== 0) throw new ConfigurationError(e.message);
    throw e;
  }

  const opts = program.opts<{ startDate?: string; product?: string; loglevel?: string }>();
  const parsed = CliArgs.safeParse({
    dbFile: program.args[0],
    startDate: opts.startDate,
    product: opts.product,
    logLevel: opts.loglevel,
  });
  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.issues.map((i) => i.message).join('; '));
  }
  return parsed.data;
}
