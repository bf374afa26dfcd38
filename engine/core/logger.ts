import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';
import { engineConfig } from './config.js';

export type { Logger };

export function createLogger(level: string, destination?: DestinationStream): Logger {
  const options: LoggerOptions = {
    level,
    base: {
      service: 'sheetgrid-engine',
    },
  };

  return destination ? pino(options, destination) : pino(options);
}

export const logger = createLogger(engineConfig.logLevel);
