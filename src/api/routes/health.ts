import { FastifyPluginAsync } from 'fastify';
import type { NetflowStore } from '../../services/NetflowStore';
import type { SupervisorStatus } from '../../services/IngestionSupervisor';

export interface HealthRouteOptions {
  store: NetflowStore;
  ingestionStatus?: () => SupervisorStatus;
}

export const healthRoutes: FastifyPluginAsync<HealthRouteOptions> = async (fastify, { store, ingestionStatus }) => {
  /**
   * GET /health
   * Returns service health status
   */
  fastify.get('/', async (_request, reply) => {
    const dbHealthy = await store.ping();
    const ingestion = ingestionStatus ? ingestionStatus() : null;

    if (!dbHealthy) {
      return reply.status(503).send({
        status: 'unhealthy',
        timestamp: new Date(),
        database: 'disconnected',
        ingestion,
      });
    }

    return reply.status(200).send({
      status: 'healthy',
      timestamp: new Date(),
      database: 'connected',
      service: 'exchange-netflow-monitor',
      ingestion,
    });
  });

  /**
   * GET /health/live
   * Returns liveness status
   */
  fastify.get('/live', async (_request, reply) => {
    return reply.send({ alive: true });
  });
};
