/**
 * Service logger: pino to stdout, or to a file through the `pino/file`
 * transport when one is configured.
 */

import { type Logger, pino } from 'pino';

import type { ServiceConfig } from '../schemas/config.js';

export function createLogger(log: ServiceConfig['log']): Logger {
  return pino({
    level: log.level,
    ...(log.file
      ? {
          transport: {
            target: 'pino/file',
            options: { destination: log.file, mkdir: true },
          },
        }
      : {}),
  });
}
