import { createLogger, type Logger } from '../../src/utils/logger.js';
import type { CandleRequest, CandleSource } from '../../src/types/domain.js';

export const MINUTE = 60;

export const utc = (iso: string) => Math.floor(Date.parse(iso) / 1000);

/** `n` raw exchange rows from `start`, one per minute, newest first like the api. */
export function rawRows(start: number, n: number): number[][] {
  const rows: number[][] = [];
  for (let i = 0; i < n; i++) {
    const t = start + i * MINUTE;
    // [time, low, high, open, close, volume]
    rows.push([t, 99 + i, 102 + i, 100 + i, 101 + i, 1.5]);
  }
  return rows.reverse();
}

export const silentLogger = (): Logger => createLogger({ level: 'silent', pretty: false });

export type LogLine = { level: number; msg: string } & Record<string, unknown>;

/** Logger whose json lines land in `lines`. */
export function captureLogger(level: 'debug' | 'info' = 'info'): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger = createLogger(
    { level, pretty: false },
    { write: (msg: string) => void lines.push(JSON.parse(msg)) },
  );
  return { logger, lines };
}

/**
 * Answers calls from a queue of replies; a reply that is an Error is thrown.
 * Once the queue is drained every call returns `[]`.
 */
export class StubSource implements CandleSource {
  readonly calls: CandleRequest[] = [];

  constructor(private readonly replies: unknown[] = []) {}

  async getCandles(req: CandleRequest): Promise<unknown> {
    this.calls.push(req);
    const next = this.replies.shift();
    if (next instanceof Error) throw next;
    return next ?? [];
  }
}
