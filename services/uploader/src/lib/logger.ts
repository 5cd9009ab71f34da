import pino from 'pino';
import { loadConfig, type LogLevel } from './config.js';

let loggerInstance: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (loggerInstance) {
    return loggerInstance;
  }

  const config = loadConfig();

  // stdout stays free; stdin carries the payload and logs go to stderr
  loggerInstance =
    config.nodeEnv === 'test'
      ? pino({ level: 'silent' })
      : pino({
          level: config.logLevel,
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
              destination: 2,
            },
          },
        });

  return loggerInstance;
}

export function setLogLevel(level: LogLevel): void {
  const logger = getLogger();
  if (logger.level !== 'silent') {
    logger.level = level;
  }
}
