import pino from 'pino';
import { config } from '../config/index.js';

const rootLogger = pino({
  level: config.logLevel,
});

export function createLogger(service: string): pino.Logger {
  return rootLogger.child({ service });
}
