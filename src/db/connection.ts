import knex, { Knex } from 'knex';
import { createLogger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

const logger = createLogger('Database');

let db: Knex | null = null;

/**
 * Opens the shared connection pool on first use. Later calls return the same
 * pool and ignore their argument.
 */
export function getDb(config?: Knex.Config): Knex {
  if (!db) {
    if (!config) {
      throw new Error('Database has not been initialised');
    }

    logger.info(
      {
        client: config.client,
        connectionType: typeof config.connection,
      },
      'Opening database connection pool'
    );

    db = knex(config);
  }
  return db;
}

export async function closeDb(): Promise<void> {
  if (db) {
    await db.destroy();
    db = null;
  }
}

export async function testConnection(connection: Knex): Promise<boolean> {
  try {
    await connection.raw('SELECT 1');
    return true;
  } catch (error) {
    logger.error({ message: errorMessage(error) }, 'Database connection failed');
    return false;
  }
}
