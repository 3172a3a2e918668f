import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import { CONSTANTS } from '../config/constants';
import { createLogger } from '../utils/logger';
import type { NetflowStore } from '../services/NetflowStore';
import type { SupervisorStatus } from '../services/IngestionSupervisor';
import { netflowRoutes } from './routes/netflow';
import { healthRoutes } from './routes/health';

const logger = createLogger('API');

export interface ServerOptions {
  store: NetflowStore;
  ingestionStatus?: () => SupervisorStatus;
  rateLimit?: number;
}

export async function createServer({ store, ingestionStatus, rateLimit: max }: ServerOptions): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: false, // We use our own logger
    trustProxy: true,
  });

  // Register plugins
  await fastify.register(cors, {
    origin: true,
    credentials: true,
  });

  await fastify.register(helmet, {
    contentSecurityPolicy: false,
  });

  await fastify.register(rateLimit, {
    max: max ?? CONSTANTS.API.RATE_LIMIT,
    timeWindow: CONSTANTS.API.RATE_LIMIT_WINDOW,
  });

  // Register routes under /api/v1
  await fastify.register(netflowRoutes, { prefix: '/api/v1/netflow', store });
  await fastify.register(healthRoutes, { prefix: '/api/v1/health', store, ingestionStatus });

  // Error handler
  fastify.setErrorHandler((error, _request, reply) => {
    logger.error({ err: error }, 'Request error');
    const statusCode = error.statusCode ?? 500;
    reply.status(statusCode).send({
      error: statusCode >= 500 ? 'Internal Server Error' : error.message,
    });
  });

  return fastify;
}

export async function startServer(fastify: FastifyInstance, host: string, port: number): Promise<void> {
  await fastify.listen({ port, host });
  logger.info(`Server listening on ${host}:${port}`);
}
