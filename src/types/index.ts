import type { Address, Hex } from 'viem';

/** A log as delivered by the chain subscription, before decoding. */
export interface RawLog {
  topics: readonly Hex[];
  data: Hex;
  blockNumber: bigint | null;
  transactionHash: Hex | null;
  logIndex: number | null;
}

export type TransferEvent = Readonly<{
  fromAddress: Address;
  toAddress: Address;
  /** Raw token units; 256-bit values are kept exact. */
  amount: bigint;
  blockNumber: bigint;
  transactionHash: Hex;
  logIndex: number;
  observedAt: Date;
}>;

export interface ClassifiedFlow {
  exchangeLabel: string;
  inflowAmount: bigint;
  outflowAmount: bigint;
}

export interface TransferRecord extends TransferEvent {
  id: number;
  exchange: string;
  insertedAt: Date;
}

export interface NetflowSnapshot {
  id: number;
  exchange: string;
  inflow: bigint;
  outflow: bigint;
  cumulativeNetflow: bigint;
  lastUpdated: Date;
}

export interface LogFilter {
  address: Address;
  eventSignature: Hex;
}

export interface LogSubscription extends AsyncIterable<RawLog> {
  /** Logs received but not yet consumed. */
  pending(): number;
  close(): void;
}

/** Opens filtered log subscriptions against a chain endpoint. */
export interface LogSource {
  subscribe(filter: LogFilter): Promise<LogSubscription>;
}
