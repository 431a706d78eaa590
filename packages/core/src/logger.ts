import { pino, type Logger as PinoLogger } from 'pino';

export interface LogFn {
  (msg: string): void;
  (obj: object, msg?: string): void;
}

/**
 * Subset of the pino API the library classes log through. A pino logger (or a
 * Fastify request/app logger) satisfies it, and so does a bag of jest mocks.
 */
export interface Logger {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

export interface LoggerOptions {
  level?: string;
}

export function createLogger(
  name: string,
  options: LoggerOptions = {},
): PinoLogger {
  return pino({
    name,
    level: options.level ?? process.env['LOG_LEVEL'] ?? 'info',
  });
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
