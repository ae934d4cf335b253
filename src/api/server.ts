/**
 * Fastify HTTP server. Creates the instance with its own pino logger and
 * registers the pipeline and warehouse routes; listening is left to the caller.
 */

import Fastify, { type FastifyInstance } from 'fastify';

import type { ServiceConfig } from '../schemas/config.js';
import { registerRoutes, type RouteDeps } from './routes.js';
import {
  registerWarehouseRoutes,
  type WarehouseRouteDeps,
} from './warehouse-routes.js';

/** Server dependencies. */
export type ServerDeps = RouteDeps & WarehouseRouteDeps;

/**
 * Create and configure the Fastify server. Routes are registered but the
 * server is not started.
 */
export function createServer(
  config: Pick<ServiceConfig, 'log'>,
  deps: ServerDeps,
): FastifyInstance {
  const app = Fastify({
    logger: {
      level: config.log.level,
      ...(config.log.file
        ? {
            transport: {
              target: 'pino/file',
              options: { destination: config.log.file, mkdir: true },
            },
          }
        : {}),
    },
  });

  registerRoutes(app, deps);
  registerWarehouseRoutes(app, deps);

  return app;
}
