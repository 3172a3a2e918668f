import type { NetflowSnapshot, TransferRecord } from '../../types';

export interface NetflowResponse {
  exchange: string;
  inflow: string;
  outflow: string;
  cumulative_netflow: string;
  last_updated: string;
}

export interface TransferResponse {
  id: number;
  exchange: string;
  block_number: string;
  tx_hash: string;
  log_index: number;
  from_address: string;
  to_address: string;
  amount: string;
  observed_at: string;
  inserted_at: string;
}

// Amounts go out as decimal strings; JSON numbers would lose precision.
export function serializeSnapshot(snapshot: NetflowSnapshot): NetflowResponse {
  return {
    exchange: snapshot.exchange,
    inflow: snapshot.inflow.toString(),
    outflow: snapshot.outflow.toString(),
    cumulative_netflow: snapshot.cumulativeNetflow.toString(),
    last_updated: snapshot.lastUpdated.toISOString(),
  };
}

export function serializeTransfer(record: TransferRecord): TransferResponse {
  return {
    id: record.id,
    exchange: record.exchange,
    block_number: record.blockNumber.toString(),
    tx_hash: record.transactionHash,
    log_index: record.logIndex,
    from_address: record.fromAddress,
    to_address: record.toAddress,
    amount: record.amount.toString(),
    observed_at: record.observedAt.toISOString(),
    inserted_at: record.insertedAt.toISOString(),
  };
}
