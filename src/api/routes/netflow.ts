import { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { CONSTANTS } from '../../config/constants';
import { createLogger } from '../../utils/logger';
import type { NetflowStore } from '../../services/NetflowStore';
import { serializeSnapshot, serializeTransfer } from './serializers';

const logger = createLogger('API:Netflow');

const paramsSchema = z.object({
  exchange: z
    .string()
    .trim()
    .min(1)
    .max(64)
    .regex(/^[A-Za-z0-9_.-]+$/)
    .transform(value => value.toLowerCase()),
});

const querySchema = z.object({
  limit: z.coerce
    .number()
    .int()
    .min(1)
    .max(CONSTANTS.API.MAX_PAGE_SIZE)
    .default(CONSTANTS.API.DEFAULT_PAGE_SIZE),
});

export interface NetflowRouteOptions {
  store: NetflowStore;
}

export const netflowRoutes: FastifyPluginAsync<NetflowRouteOptions> = async (fastify, { store }) => {
  /**
   * GET /netflow
   * Latest snapshot of whichever exchange was updated last
   */
  fastify.get('/', async (_request, reply) => {
    try {
      const snapshot = await store.latestAny();
      if (!snapshot) {
        return reply.status(404).send({ error: 'No netflow recorded' });
      }
      return reply.send(serializeSnapshot(snapshot));
    } catch (error) {
      logger.error({ err: error }, 'Error fetching latest netflow');
      return reply.status(500).send({ error: 'Failed to fetch netflow' });
    }
  });

  /**
   * GET /netflow/:exchange
   * Current cumulative netflow of one exchange
   */
  fastify.get('/:exchange', async (request, reply) => {
    const params = paramsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'Invalid parameters', details: params.error.issues });
    }
    const { exchange } = params.data;

    try {
      const snapshot = await store.latest(exchange);
      if (!snapshot) {
        return reply.status(404).send({ error: 'No netflow recorded', exchange });
      }
      return reply.send(serializeSnapshot(snapshot));
    } catch (error) {
      logger.error({ err: error, exchange }, 'Error fetching netflow');
      return reply.status(500).send({ error: 'Failed to fetch netflow' });
    }
  });

  /**
   * GET /netflow/:exchange/history
   * Snapshot series, newest first
   */
  fastify.get('/:exchange/history', async (request, reply) => {
    const params = paramsSchema.safeParse(request.params);
    const query = querySchema.safeParse(request.query);
    if (!params.success || !query.success) {
      const issues = [...(params.error?.issues ?? []), ...(query.error?.issues ?? [])];
      return reply.status(400).send({ error: 'Invalid parameters', details: issues });
    }
    const { exchange } = params.data;
    const { limit } = query.data;

    try {
      const snapshots = await store.history(exchange, limit);
      return reply.send({
        exchange,
        snapshots: snapshots.map(serializeSnapshot),
        pagination: { limit },
      });
    } catch (error) {
      logger.error({ err: error, exchange }, 'Error fetching netflow history');
      return reply.status(500).send({ error: 'Failed to fetch netflow' });
    }
  });

  /**
   * GET /netflow/:exchange/transfers
   * Ledger entries that moved the exchange's netflow, newest first
   */
  fastify.get('/:exchange/transfers', async (request, reply) => {
    const params = paramsSchema.safeParse(request.params);
    const query = querySchema.safeParse(request.query);
    if (!params.success || !query.success) {
      const issues = [...(params.error?.issues ?? []), ...(query.error?.issues ?? [])];
      return reply.status(400).send({ error: 'Invalid parameters', details: issues });
    }
    const { exchange } = params.data;
    const { limit } = query.data;

    try {
      const transfers = await store.transfers(exchange, limit);
      return reply.send({
        exchange,
        transfers: transfers.map(serializeTransfer),
        pagination: { limit },
      });
    } catch (error) {
      logger.error({ err: error, exchange }, 'Error fetching transfers');
      return reply.status(500).send({ error: 'Failed to fetch netflow' });
    }
  });
};
