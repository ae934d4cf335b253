/**
 * Read API over the analytical warehouse: per-channel daily activity and
 * message search.
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import type { WarehouseRepository } from '../warehouse/repository.js';

export interface WarehouseRouteDeps {
  warehouse: WarehouseRepository;
  /** Configured channel usernames, accepted in place of surrogate ids. */
  channels: readonly string[];
}

/** Numeric query values; anything unparseable falls back to the default. */
const optionalInt = z
  .string()
  .optional()
  .transform((value) => {
    if (value === undefined) return undefined;
    const parsed = Number.parseInt(value, 10);
    return Number.isNaN(parsed) ? undefined : parsed;
  });

const searchQuerySchema = z.object({
  query: z.string({ required_error: 'query is required' }).min(1, 'query is required'),
  limit: optionalInt,
  offset: optionalInt,
});

export function registerWarehouseRoutes(
  app: FastifyInstance,
  deps: WarehouseRouteDeps,
): void {
  const { warehouse, channels } = deps;

  /** GET /channels/:id/activity: Message counts per day, oldest first. */
  app.get<{ Params: { id: string } }>(
    '/channels/:id/activity',
    (request, reply) => {
      try {
        const id = warehouse.resolveChannel(request.params.id, channels);
        if (!id) {
          reply.code(404);
          return { error: 'Channel not found' };
        }
        return warehouse.getChannelActivity(id);
      } catch (err) {
        request.log.error({ err }, 'Channel activity query failed');
        reply.code(500);
        return { error: 'Error fetching channel activity' };
      }
    },
  );

  /** GET /search/messages: Substring search over message text. */
  app.get<{ Querystring: Record<string, string | undefined> }>(
    '/search/messages',
    (request, reply) => {
      const parsed = searchQuerySchema.safeParse(request.query);
      if (!parsed.success) {
        reply.code(400);
        return { error: parsed.error.issues[0]?.message ?? 'Invalid query' };
      }

      const { query, limit, offset } = parsed.data;
      try {
        const page = warehouse.searchMessages(query, limit, offset);
        return { success: true, count: page.count, results: page.results, query };
      } catch (err) {
        request.log.error({ err, query }, 'Message search failed');
        reply.code(500);
        return { error: 'Error searching messages' };
      }
    },
  );
}
