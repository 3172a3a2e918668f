import type { Knex } from 'knex';
import { CONSTANTS } from './config/constants';
import type { Config } from './config';
import { NetflowMigrationSource } from './db/migrationSource';

type DatabaseConfig = Config['database'];

function connectionFor(database: DatabaseConfig, ssl: boolean): Knex.StaticConnectionConfig | string {
  if (database.url) {
    return ssl
      ? { connectionString: database.url, ssl: { rejectUnauthorized: false } }
      : database.url;
  }
  return {
    host: database.host,
    port: database.port,
    database: database.name,
    user: database.user,
    password: database.password,
  };
}

export function buildKnexConfig(
  database: DatabaseConfig,
  environment: string = process.env.NODE_ENV || 'development'
): Knex.Config {
  return {
    client: 'pg',
    connection: connectionFor(database, environment === 'production'),
    pool: {
      min: CONSTANTS.DATABASE.POOL_MIN,
      max: CONSTANTS.DATABASE.POOL_MAX,
    },
    acquireConnectionTimeout: CONSTANTS.DATABASE.ACQUIRE_CONNECTION_TIMEOUT,
    migrations: {
      migrationSource: new NetflowMigrationSource(),
    },
  };
}
