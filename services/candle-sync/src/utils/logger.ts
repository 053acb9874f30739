import pino, { type DestinationStream, type Logger } from 'pino';
import type { LogLevel } from '../config/index.js';

export type { Logger };

export function createLogger(opts: { level: LogLevel; pretty: boolean }, stream?: DestinationStream): Logger {
  if (stream) return pino({ level: opts.level }, stream);
  return pino(
    opts.pretty
      ? { level: opts.level, transport: { target: 'pino-pretty', options: { colorize: true } } }
      : { level: opts.level }
  );
}
