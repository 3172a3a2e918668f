/**
 * Ingestion Supervisor
 * Keeps one netflow subscriber alive and replaces it if it dies unexpectedly
 */

import EventEmitter from 'events';
import { CONSTANTS } from '../config/constants';
import { createLogger } from '../utils/logger';
import { ConfigurationError, errorMessage } from '../utils/errors';
import { sleep, type Sleep } from '../utils/retryUtils';
import type { NetflowSubscriber, SubscriberMetrics } from '../indexer/NetflowSubscriber';

const logger = createLogger('IngestionSupervisor');

export interface SupervisorStatus {
  running: boolean;
  startTime: Date;
  restarts: number;
  lastError: string | null;
  subscriber: SubscriberMetrics | null;
}

export interface IngestionSupervisorOptions {
  restartDelayMs?: number;
  sleep?: Sleep;
}

export class IngestionSupervisor extends EventEmitter {
  private readonly restartDelayMs: number;
  private readonly sleep: Sleep;
  private subscriber: NetflowSubscriber | null = null;
  private startTime: Date = new Date();
  private isRunning = false;
  private restarts = 0;
  private lastError: string | null = null;
  private abortController: AbortController | null = null;

  constructor(
    private readonly createSubscriber: () => NetflowSubscriber,
    options: IngestionSupervisorOptions = {}
  ) {
    super();
    this.restartDelayMs = options.restartDelayMs ?? CONSTANTS.SUBSCRIBER_RESTART_DELAY_MS;
    this.sleep = options.sleep ?? sleep;
  }

  /**
   * Runs the subscriber until stop(). Rejects only with a ConfigurationError,
   * which no restart can fix.
   */
  async start(): Promise<void> {
    if (this.isRunning) {
      logger.warn('Supervisor already running');
      return;
    }

    this.isRunning = true;
    this.startTime = new Date();
    this.abortController = new AbortController();
    const signal = this.abortController.signal;

    while (this.isRunning) {
      const subscriber = this.createSubscriber();
      this.subscriber = subscriber;
      this.emit('started', subscriber);

      try {
        await subscriber.start();
        if (!this.isRunning) break;
        this.lastError = 'subscriber exited while still supervised';
        logger.error('Subscriber exited while still supervised');
      } catch (error) {
        if (error instanceof ConfigurationError) {
          this.isRunning = false;
          logger.fatal({ err: error }, 'Subscriber configuration is invalid');
          throw error;
        }
        this.lastError = errorMessage(error);
        logger.error({ err: error }, 'Subscriber crashed');
      }

      if (!this.isRunning) break;

      this.restarts++;
      this.emit('restarting', this.restarts);
      logger.info(`Restarting subscriber in ${this.restartDelayMs}ms (restart #${this.restarts})`);
      await this.sleep(this.restartDelayMs, signal);
    }

    logger.info('Supervisor stopped');
  }

  stop(): void {
    if (!this.isRunning) return;
    this.isRunning = false;
    this.abortController?.abort();
    this.subscriber?.stop();
  }

  getStatus(): SupervisorStatus {
    return {
      running: this.isRunning,
      startTime: this.startTime,
      restarts: this.restarts,
      lastError: this.lastError,
      subscriber: this.subscriber ? this.subscriber.getMetrics() : null,
    };
  }
}
