import type { FastifyInstance } from 'fastify';
import { CONSTANTS } from './config/constants';
import { loadConfig, type Config } from './config';
import { getChain } from './config/chains';
import { buildKnexConfig } from './knexfile';
import { getDb, closeDb, testConnection } from './db/connection';
import { runMigrations } from './db/migrationSource';
import { createServer, startServer } from './api/server';
import { AddressRegistry, buildRegistries } from './indexer/AddressRegistry';
import { ChainLogSource } from './indexer/ChainLogSource';
import { NetflowSubscriber } from './indexer/NetflowSubscriber';
import { KnexNetflowStore } from './services/NetflowStore';
import { IngestionSupervisor } from './services/IngestionSupervisor';
import { createClient, isWebSocketUrl } from './utils/createClient';
import { createLogger } from './utils/logger';
import { withRetry } from './utils/retryUtils';
import { ConfigurationError } from './utils/errors';

const logger = createLogger('Main');

function loadStartupConfig(): { config: Config; registries: AddressRegistry[] } {
  try {
    const config = loadConfig();
    return { config, registries: buildRegistries(config.exchanges) };
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.fatal({ err: error }, `Configuration error: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}

async function main(): Promise<void> {
  logger.info('Starting exchange netflow monitor');

  const { config, registries } = loadStartupConfig();
  for (const registry of registries) {
    logger.info(`Loaded ${registry.size} ${registry.label()} addresses`);
  }

  const db = getDb(buildKnexConfig(config.database));

  let server: FastifyInstance;
  let supervisor: IngestionSupervisor;

  try {
    logger.info('Testing database connection...');
    await withRetry(
      async () => {
        if (!(await testConnection(db))) {
          throw new Error('Database unreachable');
        }
      },
      { maxRetries: CONSTANTS.MAX_DB_CONNECT_RETRIES, operation: 'Database connection' }
    );

    logger.info('Running database migrations...');
    const applied = await runMigrations(db);
    logger.info(applied.length > 0 ? `Applied migrations: ${applied.join(', ')}` : 'Database schema is up to date');

    const store = new KnexNetflowStore(db);
    const chain = getChain(config.rpc.chain);
    const source = new ChainLogSource(() =>
      createClient({ rpcUrl: config.rpc.url, chain, pollingIntervalMs: config.rpc.pollingIntervalMs })
    );

    logger.info(
      `Watching ${config.token.address} on ${chain.name} via ${isWebSocketUrl(config.rpc.url) ? 'subscription' : 'polling'}`
    );

    const ingestionSupervisor = new IngestionSupervisor(
      () =>
        new NetflowSubscriber({
          tokenAddress: config.token.address,
          registries,
          source,
          store,
        })
    );
    supervisor = ingestionSupervisor;

    logger.info('Starting API server...');
    server = await createServer({
      store,
      ingestionStatus: () => ingestionSupervisor.getStatus(),
      rateLimit: config.api.rateLimit,
    });
    await startServer(server, config.api.host, config.api.port);
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start application');
    await closeDb();
    process.exit(1);
  }

  const ingestion = supervisor.start();
  let shuttingDown = false;

  const gracefulShutdown = async (exitCode: number): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down gracefully...');
    try {
      supervisor.stop();
      await ingestion.catch((error: unknown) => logger.error({ err: error }, 'Ingestion ended with an error'));
      await server.close();
      await closeDb();
      logger.info('All services stopped');
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      exitCode = 1;
    }
    process.exit(exitCode);
  };

  process.on('SIGINT', () => void gracefulShutdown(0));
  process.on('SIGTERM', () => void gracefulShutdown(0));
  process.on('unhandledRejection', (reason) => {
    logger.error({ err: reason }, 'Unhandled rejection');
    void gracefulShutdown(1);
  });

  logger.info('=====================================');
  logger.info('Netflow monitor is fully operational');
  logger.info(`API server: http://${config.api.host}:${config.api.port}/api/v1/netflow`);
  logger.info('=====================================');

  try {
    await ingestion;
  } catch (error) {
    logger.fatal({ err: error }, 'Ingestion stopped on a configuration error');
    await gracefulShutdown(1);
  }
}

export { main };

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.fatal({ err: error }, 'Fatal error starting application');
    process.exit(1);
  });
}
