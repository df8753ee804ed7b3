import pino from 'pino';
import { env, LOG_LEVEL } from '../config';

export const logger = pino({
  level: LOG_LEVEL,
  transport:
    env.NODE_ENV === 'development'
      ? { target: 'pino/file', options: { destination: 1 } }
      : undefined,
  base: { service: 'shop-etl' },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = pino.Logger;

/** Create a child logger scoped to a pipeline component. */
export function workerLogger(workerName: string): Logger {
  return logger.child({ worker: workerName });
}
