import pino from 'pino';
import { Logger } from '@shared/ports/Logger';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

/** stdout carries the report, so logs go to stderr. */
const STDERR = 2;

export function createPinoInstance(level: LogLevel, pretty: boolean): pino.Logger {
  if (pretty) {
    return pino({
      level,
      transport: { target: 'pino-pretty', options: { colorize: true, destination: STDERR } },
    });
  }
  return pino({ level }, pino.destination(STDERR));
}

export class PinoLogger implements Logger {
  constructor(private readonly instance: pino.Logger) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.instance.debug(context ?? {}, message);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.instance.info(context ?? {}, message);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.instance.warn(context ?? {}, message);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.instance.error(context ?? {}, message);
  }
}
