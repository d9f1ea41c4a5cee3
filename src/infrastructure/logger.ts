import pino from 'pino';
import type { Logger } from 'pino';
import type { HookwireConfig } from './config.js';

export type LogLevel = HookwireConfig['logging']['level'];

export interface LoggerOptions {
  readonly level?: LogLevel;
  readonly name?: string;
}

/** JSON logger; the `err` key goes through pino's error serializer. */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'hookwire',
    level: options.level ?? 'info',
    serializers: { err: pino.stdSerializers.err },
  });
}

/** Logger for library consumers that did not pass their own. */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
