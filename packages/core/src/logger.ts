import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger };

export interface LoggerSettings {
  level?: string;
  name?: string;
}

export function createLogger(settings: LoggerSettings = {}, destination?: pino.DestinationStream): Logger {
  const opts: LoggerOptions = {
    name: settings.name ?? 'shadowsql',
    level: settings.level ?? 'info',
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: ['*.api_key', '*.password', 'llm.api_key'], censor: '***' }
  };
  return destination ? pino(opts, destination) : pino(opts);
}

/** Logger that drops everything; default for library callers and tests. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
