import knex, { type Knex } from 'knex';
import type { Address, Hex } from 'viem';
import { TRANSFER_TOPIC } from '../config/abis/erc20';
import { runMigrations } from '../db/migrationSource';
import { LogChannel } from '../utils/LogChannel';
import { ConnectionError } from '../utils/errors';
import type { LogFilter, LogSource, LogSubscription, RawLog, TransferEvent } from '../types';

export const TOKEN: Address = '0x0000000000000000000000000000000000001010';
export const BINANCE_HOT: Address = '0xaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaaa';
export const COINBASE_HOT: Address = '0xdddddddddddddddddddddddddddddddddddddddd';
export const OUTSIDER_B: Address = '0xbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbbb';
export const OUTSIDER_C: Address = '0xcccccccccccccccccccccccccccccccccccccccc';

export const TX_HASH: Hex = '0x1111111111111111111111111111111111111111111111111111111111111111';
export const FIXED_TIME = new Date('2024-05-01T00:00:00.000Z');

export function addressTopic(address: Address, padding = '0'.repeat(24)): Hex {
  return `0x${padding}${address.slice(2)}`;
}

export function amountData(amount: bigint): Hex {
  return `0x${amount.toString(16).padStart(64, '0')}`;
}

interface TransferLogInput {
  from: Address;
  to: Address;
  amount: bigint;
  blockNumber?: bigint;
  transactionHash?: Hex;
  logIndex?: number;
}

export function transferLog({
  from,
  to,
  amount,
  blockNumber = 100n,
  transactionHash = TX_HASH,
  logIndex = 0,
}: TransferLogInput): RawLog {
  return {
    topics: [TRANSFER_TOPIC, addressTopic(from), addressTopic(to)],
    data: amountData(amount),
    blockNumber,
    transactionHash,
    logIndex,
  };
}

export function transferEvent({
  from,
  to,
  amount,
  blockNumber = 100n,
  transactionHash = TX_HASH,
  logIndex = 0,
}: TransferLogInput): TransferEvent {
  return {
    fromAddress: from,
    toAddress: to,
    amount,
    blockNumber,
    transactionHash,
    logIndex,
    observedAt: FIXED_TIME,
  };
}

/** knex over in-memory SQLite with the production migrations applied. */
export async function createTestDb(): Promise<Knex> {
  const db = knex({
    client: 'better-sqlite3',
    connection: { filename: ':memory:' },
    useNullAsDefault: true,
  });
  await runMigrations(db);
  return db;
}

export async function countRows(db: Knex, table: string): Promise<number> {
  const row = await db(table).count({ n: '*' }).first();
  return Number(row?.n ?? 0);
}

/**
 * In-process log source. The first `failuresBeforeSuccess` subscribe calls
 * reject with a ConnectionError; later calls open a channel the test feeds.
 */
export class FakeLogSource implements LogSource {
  attempts = 0;
  readonly filters: LogFilter[] = [];
  readonly channels: LogChannel<RawLog>[] = [];

  constructor(private readonly failuresBeforeSuccess = 0, private readonly failure: Error = new ConnectionError('connection refused')) {}

  async subscribe(filter: LogFilter): Promise<LogSubscription> {
    this.attempts++;
    this.filters.push(filter);
    if (this.attempts <= this.failuresBeforeSuccess) {
      throw this.failure;
    }

    const channel = new LogChannel<RawLog>();
    this.channels.push(channel);
    return {
      pending: () => channel.size,
      close: () => channel.close(),
      [Symbol.asyncIterator]: () => channel[Symbol.asyncIterator](),
    };
  }

  latest(): LogChannel<RawLog> {
    const channel = this.channels[this.channels.length - 1];
    if (!channel) {
      throw new Error('No subscription has been opened');
    }
    return channel;
  }
}
