import pino from 'pino';
import type { Logger, TransportTargetOptions } from 'pino';

export type LoggerOptions = {
  level: string;
  logFile?: string;
};

export function createLogger(options: LoggerOptions): Logger {
  if (options.level === 'silent') {
    return pino({ level: 'silent' });
  }
  const targets: TransportTargetOptions[] = [
    { target: 'pino-pretty', level: options.level, options: { colorize: true } }
  ];
  if (options.logFile) {
    targets.push({
      target: 'pino/file',
      level: options.level,
      options: { destination: options.logFile, mkdir: true }
    });
  }
  return pino({
    level: options.level,
    transport: { targets }
  });
}

export let logger: Logger = createLogger({ level: process.env.LOG_LEVEL || 'info' });

/** Replace the shared logger, e.g. once the daemon knows its log file. */
export function configureLogger(options: LoggerOptions): Logger {
  logger = createLogger(options);
  return logger;
}
