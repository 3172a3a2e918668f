import type { Address, Hex } from 'viem';
import { TRANSFER_TOPIC } from '../config/abis/erc20';
import { DecodeError } from '../utils/errors';
import type { RawLog, TransferEvent } from '../types';

export type DecodeResult =
  | { ok: true; event: TransferEvent }
  | { ok: false; error: DecodeError };

const WORD_PATTERN = /^0x[0-9a-fA-F]{64}$/;
const QUANTITY_PATTERN = /^0x[0-9a-fA-F]+$/;

function fail(reason: string): DecodeResult {
  return { ok: false, error: new DecodeError(reason) };
}

/**
 * Indexed address topics are left-padded to 32 bytes; only the low 20 bytes
 * carry the address. The padding is ignored.
 */
function topicToAddress(topic: Hex): Address {
  return `0x${topic.slice(26).toLowerCase()}`;
}

/**
 * Decodes an ERC-20 Transfer(address indexed from, address indexed to, uint256 value) log.
 * Never throws: anything that is not a well-formed transfer comes back as a DecodeError.
 */
export function decodeTransferLog(log: RawLog, observedAt: Date): DecodeResult {
  if (log.topics.length < 3) {
    return fail(`expected at least 3 topics, got ${log.topics.length}`);
  }

  const [signature, fromTopic, toTopic] = log.topics;
  if (signature.toLowerCase() !== TRANSFER_TOPIC) {
    return fail(`unexpected event signature ${signature}`);
  }
  if (!WORD_PATTERN.test(fromTopic) || !WORD_PATTERN.test(toTopic)) {
    return fail('address topics must be 32-byte words');
  }
  if (!QUANTITY_PATTERN.test(log.data)) {
    return fail(`data payload is not an integer: "${log.data}"`);
  }
  if (log.blockNumber === null || log.transactionHash === null || log.logIndex === null) {
    return fail('log is still pending');
  }

  return {
    ok: true,
    event: {
      fromAddress: topicToAddress(fromTopic),
      toAddress: topicToAddress(toTopic),
      amount: BigInt(log.data),
      blockNumber: log.blockNumber,
      transactionHash: log.transactionHash,
      logIndex: log.logIndex,
      observedAt,
    },
  };
}
