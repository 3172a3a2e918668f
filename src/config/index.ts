import { readFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import type { Address } from 'viem';
import { CONSTANTS } from './constants';
import { CHAIN_NAMES } from './chains';
import { ConfigurationError, errorMessage } from '../utils/errors';

const addressSchema = z
  .string()
  .trim()
  .regex(/^0x[a-fA-F0-9]{40}$/, 'must be a 0x-prefixed 20-byte hex address')
  .transform((value): Address => `0x${value.slice(2).toLowerCase()}`);

const portSchema = z.coerce.number().int().min(1).max(65535);

const loggingSchema = z.object({
  LOG_LEVEL: z.enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
  LOG_PRETTY: z
    .enum(['true', 'false'])
    .default('false')
    .transform(value => value === 'true'),
});

export interface LoggingConfig {
  level: z.infer<typeof loggingSchema>['LOG_LEVEL'];
  pretty: boolean;
}

const envSchema = z.object({
  RPC_URL: z
    .string()
    .url()
    .refine(url => /^(https?|wss?):\/\//.test(url), 'must use http(s):// or ws(s)://'),
  CHAIN: z.enum(CHAIN_NAMES).default(CONSTANTS.INDEXER.CHAIN),
  TOKEN_ADDRESS: addressSchema,
  EXCHANGES_FILE: z.string().min(1).default(CONSTANTS.INDEXER.EXCHANGES_FILE),
  POLLING_INTERVAL_MS: z.coerce.number().int().positive().default(CONSTANTS.INDEXER.POLLING_INTERVAL_MS),

  DATABASE_URL: z.string().min(1).optional(),
  DB_HOST: z.string().min(1).default(CONSTANTS.DATABASE.HOST),
  DB_PORT: portSchema.default(CONSTANTS.DATABASE.PORT),
  DB_NAME: z.string().min(1).default(CONSTANTS.DATABASE.NAME),
  DB_USER: z.string().min(1).default(CONSTANTS.DATABASE.USER),
  DB_PASSWORD: z.string().default(''),

  API_HOST: z.string().min(1).default(CONSTANTS.API.HOST),
  API_PORT: portSchema.default(CONSTANTS.API.PORT),
}).merge(loggingSchema);

const exchangesFileSchema = z.object({
  exchanges: z
    .record(z.string().trim().min(1), z.array(z.string()).min(1, 'needs at least one address'))
    .refine(exchanges => Object.keys(exchanges).length > 0, 'at least one exchange is required'),
});

export type ExchangeAddresses = z.infer<typeof exchangesFileSchema>['exchanges'];

export interface Config {
  rpc: {
    url: string;
    chain: (typeof CHAIN_NAMES)[number];
    pollingIntervalMs: number;
  };
  token: {
    address: Address;
  };
  exchanges: ExchangeAddresses;
  database: {
    url?: string;
    host: string;
    port: number;
    name: string;
    user: string;
    password: string;
  };
  api: {
    host: string;
    port: number;
    rateLimit: number;
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Reads the exchange address lists. Address format is checked later, when
 * the registries are built.
 */
export function readExchangesFile(filePath: string): ExchangeAddresses {
  let raw: string;
  try {
    raw = readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read exchanges file ${filePath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Exchanges file ${filePath} is not valid JSON: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const parsed = exchangesFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid exchanges file ${filePath}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data.exchanges;
}

/**
 * Logger settings only. Read when the logger module loads, before the rest of
 * the environment has been validated.
 */
export function loadLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const parsed = loggingSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid logging environment: ${formatIssues(parsed.error)}`);
  }
  return { level: parsed.data.LOG_LEVEL, pretty: parsed.data.LOG_PRETTY };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid environment: ${formatIssues(parsed.error)}`);
  }
  const vars = parsed.data;

  const config: Config = {
    rpc: {
      url: vars.RPC_URL,
      chain: vars.CHAIN,
      pollingIntervalMs: vars.POLLING_INTERVAL_MS,
    },
    token: {
      address: vars.TOKEN_ADDRESS,
    },
    exchanges: readExchangesFile(path.resolve(cwd, vars.EXCHANGES_FILE)),
    database: {
      url: vars.DATABASE_URL,
      host: vars.DB_HOST,
      port: vars.DB_PORT,
      name: vars.DB_NAME,
      user: vars.DB_USER,
      password: vars.DB_PASSWORD,
    },
    api: {
      host: vars.API_HOST,
      port: vars.API_PORT,
      rateLimit: CONSTANTS.API.RATE_LIMIT,
    },
  };

  return Object.freeze(config);
}
