import dotenv from 'dotenv';

dotenv.config();

/*************************************************
 * SETTINGS
 * Configurable values that may need adjustment
 *************************************************/

export const CONSTANTS = {

  /** Subscription reconnect backoff */
  RETRY_DELAY_MS: 1000, // Base delay before the first reconnect
  RETRY_BACKOFF_MULTIPLIER: 2, // Exponential backoff multiplier
  MAX_RETRY_DELAY_SECONDS: 30, // Maximum delay between retries in seconds
  RETRY_JITTER_RATIO: 0.2, // Up to 20% of the delay is added as jitter

  /** Startup database connection attempts */
  MAX_DB_CONNECT_RETRIES: 5,

  /** Supervisor restart delay after the subscriber dies unexpectedly */
  SUBSCRIBER_RESTART_DELAY_MS: 30000,

  /** Queued logs at which the subscriber warns that it is falling behind */
  LOG_BACKLOG_WARNING: 1000,

  /** Database configuration defaults */
  DATABASE: {
    HOST: 'localhost',
    PORT: 5432,
    NAME: 'netflow',
    USER: 'netflow',
    POOL_MIN: 2,
    POOL_MAX: 10,
    ACQUIRE_CONNECTION_TIMEOUT: 60000,
  },

  /** API server configuration */
  API: {
    PORT: 3030,
    HOST: '0.0.0.0',
    RATE_LIMIT: 100,
    RATE_LIMIT_WINDOW: '1 minute',
    DEFAULT_PAGE_SIZE: 50,
    MAX_PAGE_SIZE: 500,
  },

  /** Log subscription configuration */
  INDEXER: {
    CHAIN: 'polygon',
    POLLING_INTERVAL_MS: 4000,
    EXCHANGES_FILE: 'config/exchanges.json',
  },
} as const;
