import type { Knex } from 'knex';
import { isAddress, isHex } from 'viem';
import { createLogger } from '../utils/logger';
import { StoreError, errorMessage } from '../utils/errors';
import { testConnection } from '../db/connection';
import type { NetflowSnapshot, TransferEvent, TransferRecord } from '../types';

const logger = createLogger('NetflowStore');

interface TransferRow {
  id: number;
  exchange: string;
  block_number: string | number;
  tx_hash: string;
  log_index: number;
  from_address: string;
  to_address: string;
  amount: string;
  observed_at: Date | string;
  inserted_at: Date | string;
}

interface NetflowRow {
  id: number;
  exchange: string;
  inflow: string;
  outflow: string;
  cumulative_netflow: string;
  last_updated: Date | string;
}

/**
 * Durable ledger and netflow series.
 * The ingestion loop is the only writer; request handlers only read.
 */
export interface NetflowStore {
  /**
   * Appends the transfer to the ledger and a new snapshot whose cumulative
   * netflow extends the previous one, as a single transaction.
   * Rejects with StoreError and leaves nothing behind on failure.
   */
  record(exchange: string, transfer: TransferEvent, inflow: bigint, outflow: bigint): Promise<NetflowSnapshot>;
  latest(exchange: string): Promise<NetflowSnapshot | null>;
  latestAny(): Promise<NetflowSnapshot | null>;
  history(exchange: string, limit: number): Promise<NetflowSnapshot[]>;
  transfers(exchange: string, limit: number): Promise<TransferRecord[]>;
  ping(): Promise<boolean>;
}

function toDate(value: Date | string, column: string): Date {
  const date = value instanceof Date ? value : new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new StoreError(`Column ${column} holds an invalid timestamp: ${String(value)}`);
  }
  return date;
}

function toSnapshot(row: NetflowRow): NetflowSnapshot {
  return {
    id: row.id,
    exchange: row.exchange,
    inflow: BigInt(row.inflow),
    outflow: BigInt(row.outflow),
    cumulativeNetflow: BigInt(row.cumulative_netflow),
    lastUpdated: toDate(row.last_updated, 'last_updated'),
  };
}

function toTransferRecord(row: TransferRow): TransferRecord {
  const { from_address: fromAddress, to_address: toAddress, tx_hash: transactionHash } = row;
  if (!isAddress(fromAddress, { strict: false }) || !isAddress(toAddress, { strict: false })) {
    throw new StoreError(`Transfer ${row.id} holds a malformed address`);
  }
  if (!isHex(transactionHash, { strict: true })) {
    throw new StoreError(`Transfer ${row.id} holds a malformed transaction hash`);
  }

  return {
    id: row.id,
    exchange: row.exchange,
    fromAddress,
    toAddress,
    amount: BigInt(row.amount),
    blockNumber: BigInt(row.block_number),
    transactionHash,
    logIndex: row.log_index,
    observedAt: toDate(row.observed_at, 'observed_at'),
    insertedAt: toDate(row.inserted_at, 'inserted_at'),
  };
}

export class KnexNetflowStore implements NetflowStore {
  constructor(
    private readonly db: Knex,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async record(exchange: string, transfer: TransferEvent, inflow: bigint, outflow: bigint): Promise<NetflowSnapshot> {
    if (inflow < 0n || outflow < 0n) {
      throw new StoreError(`Flow amounts must be non-negative (inflow ${inflow}, outflow ${outflow})`);
    }

    const now = this.clock().toISOString();

    try {
      return await this.db.transaction(async (trx) => {
        await trx<TransferRow>('transfers').insert({
          exchange,
          block_number: transfer.blockNumber.toString(),
          tx_hash: transfer.transactionHash,
          log_index: transfer.logIndex,
          from_address: transfer.fromAddress,
          to_address: transfer.toAddress,
          amount: transfer.amount.toString(),
          observed_at: transfer.observedAt.toISOString(),
          inserted_at: now,
        });

        const prior = await this.latestRow(trx, exchange);
        const priorCumulative = prior ? BigInt(prior.cumulative_netflow) : 0n;

        await trx<NetflowRow>('netflows').insert({
          exchange,
          inflow: inflow.toString(),
          outflow: outflow.toString(),
          cumulative_netflow: (priorCumulative + inflow - outflow).toString(),
          last_updated: now,
        });

        const inserted = await this.latestRow(trx, exchange);
        if (!inserted) {
          throw new StoreError(`Snapshot for ${exchange} missing after insert`);
        }
        return toSnapshot(inserted);
      });
    } catch (error) {
      logger.debug({ exchange, tx: transfer.transactionHash, err: error }, 'Netflow transaction rolled back');
      if (error instanceof StoreError) throw error;
      throw new StoreError(
        `Failed to record transfer ${transfer.transactionHash} for ${exchange}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  async latest(exchange: string): Promise<NetflowSnapshot | null> {
    const row = await this.read(`latest netflow for ${exchange}`, () => this.latestRow(this.db, exchange));
    return row ? toSnapshot(row) : null;
  }

  async latestAny(): Promise<NetflowSnapshot | null> {
    const row = await this.read('latest netflow', () =>
      this.db<NetflowRow>('netflows').orderBy('id', 'desc').first()
    );
    return row ? toSnapshot(row) : null;
  }

  async history(exchange: string, limit: number): Promise<NetflowSnapshot[]> {
    const rows = await this.read(`netflow history for ${exchange}`, () =>
      this.db<NetflowRow>('netflows').where({ exchange }).orderBy('id', 'desc').limit(limit)
    );
    return rows.map(toSnapshot);
  }

  async transfers(exchange: string, limit: number): Promise<TransferRecord[]> {
    const rows = await this.read(`transfers for ${exchange}`, () =>
      this.db<TransferRow>('transfers').where({ exchange }).orderBy('id', 'desc').limit(limit)
    );
    return rows.map(toTransferRecord);
  }

  async ping(): Promise<boolean> {
    return testConnection(this.db);
  }

  private async latestRow(connection: Knex, exchange: string): Promise<NetflowRow | undefined> {
    return connection<NetflowRow>('netflows').where({ exchange }).orderBy('id', 'desc').first();
  }

  private async read<T>(what: string, query: () => PromiseLike<T>): Promise<T> {
    try {
      return await query();
    } catch (error) {
      throw new StoreError(`Failed to read ${what}: ${errorMessage(error)}`, { cause: error });
    }
  }
}
