import { pino, destination } from 'pino';
import type { Logger } from 'pino';

export interface LoggerOptions {
  level: string;
  /** Human-readable output through pino-pretty */
  pretty: boolean;
}

/**
 * Root logger. Writes to stderr so command output on stdout stays clean.
 */
export function createLogger(options: LoggerOptions): Logger {
  if (options.pretty) {
    return pino({
      name: 'sample-share',
      level: options.level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          destination: 2,
        },
      },
    });
  }

  return pino({ name: 'sample-share', level: options.level }, destination(2));
}
