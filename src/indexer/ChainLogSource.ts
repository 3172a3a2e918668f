import type { PublicClient } from 'viem';
import { TRANSFER_EVENT, TRANSFER_TOPIC } from '../config/abis/erc20';
import { createLogger } from '../utils/logger';
import { LogChannel } from '../utils/LogChannel';
import { ConfigurationError, ConnectionError, errorMessage } from '../utils/errors';
import type { LogFilter, LogSource, LogSubscription, RawLog } from '../types';

const logger = createLogger('ChainLogSource');

class WatchSubscription implements LogSubscription {
  readonly channel = new LogChannel<RawLog>();
  private unwatch: (() => void) | null = null;

  attach(unwatch: () => void): void {
    if (this.channel.isClosed) {
      unwatch();
      return;
    }
    this.unwatch = unwatch;
  }

  pending(): number {
    return this.channel.size;
  }

  close(): void {
    this.unwatch?.();
    this.unwatch = null;
    this.channel.close();
  }

  [Symbol.asyncIterator](): AsyncIterator<RawLog> {
    return this.channel[Symbol.asyncIterator]();
  }
}

/**
 * Live Transfer logs of one token contract, read through viem's watchEvent.
 * A fresh client is created for every subscription so that a dead socket is
 * never reused.
 */
export class ChainLogSource implements LogSource {
  constructor(private readonly clientFactory: () => PublicClient) {}

  async subscribe(filter: LogFilter): Promise<LogSubscription> {
    if (filter.eventSignature.toLowerCase() !== TRANSFER_TOPIC) {
      throw new ConfigurationError(`Unsupported event signature ${filter.eventSignature}`);
    }

    const client = this.clientFactory();

    let head: bigint;
    try {
      head = await client.getBlockNumber();
    } catch (error) {
      throw new ConnectionError(`RPC endpoint unreachable: ${errorMessage(error)}`, { cause: error });
    }

    logger.debug({ address: filter.address, head: head.toString() }, 'Opening Transfer log subscription');

    const subscription = new WatchSubscription();
    const unwatch = client.watchEvent({
      address: filter.address,
      event: TRANSFER_EVENT,
      onLogs: logs => {
        for (const log of logs) {
          subscription.channel.push({
            topics: log.topics,
            data: log.data,
            blockNumber: log.blockNumber,
            transactionHash: log.transactionHash,
            logIndex: log.logIndex,
          });
        }
      },
      onError: error => {
        subscription.channel.fail(
          new ConnectionError(`Log subscription failed: ${errorMessage(error)}`, { cause: error })
        );
      },
    });
    subscription.attach(unwatch);

    return subscription;
  }
}
