import EventEmitter from 'events';
import type { Address } from 'viem';
import { TRANSFER_TOPIC } from '../config/abis/erc20';
import { CONSTANTS } from '../config/constants';
import { createLogger } from '../utils/logger';
import { ConfigurationError, errorMessage } from '../utils/errors';
import { computeBackoffDelay, DEFAULT_BACKOFF, sleep, type BackoffOptions, type Sleep } from '../utils/retryUtils';
import type { NetflowStore } from '../services/NetflowStore';
import type { LogSource, LogSubscription, NetflowSnapshot, RawLog } from '../types';
import type { AddressRegistry } from './AddressRegistry';
import { decodeTransferLog } from './TransferDecoder';
import { classifyAcrossRegistries } from './NetflowClassifier';

const logger = createLogger('NetflowSubscriber');

export interface SubscriberMetrics {
  logsReceived: number;
  transfersDecoded: number;
  decodeErrors: number;
  irrelevantTransfers: number;
  recordsWritten: number;
  storeErrors: number;
  lastStoreError: { message: string; at: Date } | null;
  subscribeAttempts: number;
  subscriptionsOpened: number;
  connectionFailures: number;
  lastLogAt: Date | null;
  lastBlockNumber: string | null;
  /** Logs delivered by the source but not yet processed. */
  queueDepth: number;
}

export interface NetflowSubscriberOptions {
  tokenAddress: Address;
  registries: readonly AddressRegistry[];
  source: LogSource;
  store: NetflowStore;
  backoff?: Partial<BackoffOptions>;
  sleep?: Sleep;
  random?: () => number;
  clock?: () => Date;
}

/**
 * Follows the token's Transfer logs and turns every transfer that touches a
 * monitored exchange into a ledger row plus netflow snapshot.
 *
 * Logs are handled one at a time in delivery order, so each snapshot is
 * computed from the one committed before it. Failures never leave the loop:
 * bad logs and failed writes are counted and skipped, and a dropped
 * subscription is reopened with exponential backoff for as long as the
 * subscriber runs. Transfers emitted while disconnected are not replayed.
 *
 * Events: 'subscribed', 'recorded' (NetflowSnapshot), 'store:failed'.
 */
export class NetflowSubscriber extends EventEmitter {
  private readonly tokenAddress: Address;
  private readonly registries: readonly AddressRegistry[];
  private readonly source: LogSource;
  private readonly store: NetflowStore;
  private readonly backoff: BackoffOptions;
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private readonly clock: () => Date;

  private isRunning = false;
  private abortController: AbortController | null = null;
  private subscription: LogSubscription | null = null;
  private backlogWarned = false;
  private metrics: Omit<SubscriberMetrics, 'queueDepth'> = {
    logsReceived: 0,
    transfersDecoded: 0,
    decodeErrors: 0,
    irrelevantTransfers: 0,
    recordsWritten: 0,
    storeErrors: 0,
    lastStoreError: null,
    subscribeAttempts: 0,
    subscriptionsOpened: 0,
    connectionFailures: 0,
    lastLogAt: null,
    lastBlockNumber: null,
  };

  constructor(options: NetflowSubscriberOptions) {
    super();
    this.tokenAddress = options.tokenAddress;
    this.registries = options.registries;
    this.source = options.source;
    this.store = options.store;
    this.backoff = { ...DEFAULT_BACKOFF, ...options.backoff };
    this.sleep = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Runs until stop() is called. Only a ConfigurationError escapes.
   */
  async start(): Promise<void> {
    if (this.isRunning) {
      logger.warn('Subscriber is already running');
      return;
    }

    this.isRunning = true;
    this.abortController = new AbortController();
    const signal = this.abortController.signal;

    logger.info(
      { token: this.tokenAddress, exchanges: this.registries.map(r => r.label()) },
      'Starting netflow subscriber'
    );

    let failures = 0;

    while (this.isRunning) {
      if (failures > 0) {
        const delayMs = computeBackoffDelay(failures, this.backoff, this.random);
        logger.info(`Reconnecting in ${delayMs}ms (consecutive failures: ${failures})`);
        await this.sleep(delayMs, signal);
        if (!this.isRunning) break;
      }

      const subscription = await this.openSubscription();
      if (!subscription) {
        failures++;
        continue;
      }

      failures = 0;
      await this.consume(subscription);
      if (this.isRunning) {
        failures = 1;
      }
    }

    logger.info('Netflow subscriber stopped');
  }

  stop(): void {
    if (!this.isRunning) return;
    logger.info('Stopping netflow subscriber');
    this.isRunning = false;
    this.abortController?.abort();
    this.subscription?.close();
  }

  get running(): boolean {
    return this.isRunning;
  }

  getMetrics(): SubscriberMetrics {
    return { ...this.metrics, queueDepth: this.subscription?.pending() ?? 0 };
  }

  private async openSubscription(): Promise<LogSubscription | null> {
    this.metrics.subscribeAttempts++;
    const attempt = this.metrics.subscribeAttempts;

    try {
      const subscription = await this.source.subscribe({
        address: this.tokenAddress,
        eventSignature: TRANSFER_TOPIC,
      });

      if (!this.isRunning) {
        subscription.close();
        return null;
      }

      this.subscription = subscription;
      this.metrics.subscriptionsOpened++;
      logger.info({ attempt }, 'Subscribed to Transfer logs');
      this.notify('subscribed', attempt);
      return subscription;
    } catch (error) {
      if (error instanceof ConfigurationError) {
        this.isRunning = false;
        throw error;
      }

      this.metrics.connectionFailures++;
      logger.warn({ attempt, err: error }, `Subscription attempt failed: ${errorMessage(error)}`);
      return null;
    }
  }

  private async consume(subscription: LogSubscription): Promise<void> {
    try {
      if (!this.isRunning) return;
      for await (const log of subscription) {
        await this.processLog(log);
        if (!this.isRunning) break;
        this.checkBacklog(subscription);
      }
      if (this.isRunning) {
        logger.warn('Log stream ended');
      }
    } catch (error) {
      if (this.isRunning) {
        this.metrics.connectionFailures++;
        logger.warn({ err: error }, `Log stream failed: ${errorMessage(error)}`);
      }
    } finally {
      subscription.close();
      this.subscription = null;
      this.backlogWarned = false;
    }
  }

  private checkBacklog(subscription: LogSubscription): void {
    const depth = subscription.pending();
    if (depth >= CONSTANTS.LOG_BACKLOG_WARNING && !this.backlogWarned) {
      this.backlogWarned = true;
      logger.warn({ queueDepth: depth }, 'Log backlog is growing faster than transfers are recorded');
    } else if (depth < CONSTANTS.LOG_BACKLOG_WARNING / 2) {
      this.backlogWarned = false;
    }
  }

  /** Listener failures are logged and never counted against the store or the connection. */
  private notify(event: 'subscribed' | 'recorded' | 'store:failed', payload: unknown): void {
    try {
      this.emit(event, payload);
    } catch (error) {
      logger.error({ err: error, event }, 'Event listener threw');
    }
  }

  private async processLog(log: RawLog): Promise<void> {
    this.metrics.logsReceived++;
    this.metrics.lastLogAt = this.clock();

    const decoded = decodeTransferLog(log, this.metrics.lastLogAt);
    if (!decoded.ok) {
      this.metrics.decodeErrors++;
      logger.warn(
        { tx: log.transactionHash, reason: decoded.error.reason },
        'Skipping log that is not a valid transfer'
      );
      return;
    }

    const event = decoded.event;
    this.metrics.transfersDecoded++;
    this.metrics.lastBlockNumber = event.blockNumber.toString();

    const flows = classifyAcrossRegistries(event, this.registries);
    if (flows.length === 0) {
      this.metrics.irrelevantTransfers++;
      return;
    }

    for (const flow of flows) {
      let snapshot: NetflowSnapshot;
      try {
        snapshot = await this.store.record(flow.exchangeLabel, event, flow.inflowAmount, flow.outflowAmount);
      } catch (error) {
        this.metrics.storeErrors++;
        this.metrics.lastStoreError = { message: errorMessage(error), at: this.clock() };
        logger.error(
          { exchange: flow.exchangeLabel, tx: event.transactionHash, err: error },
          'Failed to record transfer'
        );
        this.notify('store:failed', { exchange: flow.exchangeLabel, transactionHash: event.transactionHash, error });
        continue;
      }

      this.metrics.recordsWritten++;
      logger.info(
        {
          exchange: snapshot.exchange,
          tx: event.transactionHash,
          inflow: snapshot.inflow.toString(),
          outflow: snapshot.outflow.toString(),
          cumulative: snapshot.cumulativeNetflow.toString(),
        },
        'Netflow updated'
      );
      this.notify('recorded', snapshot);
    }
  }
}
