/**
 * Structured Logger (Pino)
 * Layer: Core
 *
 * One JSON object per line in production; in development the stream goes
 * through `pino-pretty` for colours and readable timestamps. The ETL worker
 * thread imports this same module, so ingestion logs share the format.
 *
 * The exported `Logger` type lets services declare a logger dependency without
 * naming Pino, which keeps test doubles simple.
 */
import pino from 'pino';
import { config } from './config';

export const logger = pino({
  level: config.log.level,
  transport: config.isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
});

export type Logger = pino.Logger;
