import { pino, type DestinationStream, type Logger } from 'pino';
import type { AppConfig } from './config.js';

export function createLogger(
  config: Pick<AppConfig, 'logLevel' | 'nodeEnv'>,
  destination?: DestinationStream
): Logger {
  const options = {
    level: config.logLevel,
    base: { env: config.nodeEnv },
  };
  return destination ? pino(options, destination) : pino(options);
}
