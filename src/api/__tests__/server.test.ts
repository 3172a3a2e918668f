import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import type { FastifyInstance } from 'fastify';
import type { Knex } from 'knex';
import { createServer } from '../server';
import { KnexNetflowStore, type NetflowStore } from '../../services/NetflowStore';
import type { SupervisorStatus } from '../../services/IngestionSupervisor';
import { StoreError } from '../../utils/errors';
import {
  BINANCE_HOT,
  FIXED_TIME,
  OUTSIDER_B,
  OUTSIDER_C,
  TX_HASH,
  createTestDb,
  transferEvent,
} from '../../__tests__/fixtures';

const brokenStore: NetflowStore = {
  record: () => Promise.reject(new StoreError('database offline')),
  latest: () => Promise.reject(new StoreError('database offline')),
  latestAny: () => Promise.reject(new StoreError('database offline')),
  history: () => Promise.reject(new StoreError('database offline')),
  transfers: () => Promise.reject(new StoreError('database offline')),
  ping: async () => false,
};

describe('netflow API', () => {
  let db: Knex;
  let store: KnexNetflowStore;
  let server: FastifyInstance;

  beforeEach(async () => {
    db = await createTestDb();
    store = new KnexNetflowStore(db, () => FIXED_TIME);
    server = await createServer({ store });
  });

  afterEach(async () => {
    await server.close();
    await db.destroy();
  });

  async function seed(): Promise<void> {
    await store.record('binance', transferEvent({ from: OUTSIDER_B, to: BINANCE_HOT, amount: 1000n }), 1000n, 0n);
    await store.record(
      'binance',
      transferEvent({ from: BINANCE_HOT, to: OUTSIDER_C, amount: 1200n, logIndex: 1 }),
      0n,
      1200n
    );
  }

  describe('GET /api/v1/netflow/:exchange', () => {
    it('returns the latest snapshot with amounts as decimal strings', async () => {
      await seed();

      const response = await server.inject({ method: 'GET', url: '/api/v1/netflow/binance' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        exchange: 'binance',
        inflow: '0',
        outflow: '1200',
        cumulative_netflow: '-200',
        last_updated: '2024-05-01T00:00:00.000Z',
      });
    });

    it('matches the exchange label case-insensitively', async () => {
      await seed();

      const response = await server.inject({ method: 'GET', url: '/api/v1/netflow/Binance' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ exchange: 'binance' });
    });

    it('returns 404 when the exchange has no netflow yet', async () => {
      const response = await server.inject({ method: 'GET', url: '/api/v1/netflow/okx' });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({ error: 'No netflow recorded', exchange: 'okx' });
    });

    it('returns 400 for a malformed exchange label', async () => {
      const response = await server.inject({ method: 'GET', url: '/api/v1/netflow/bin$ance' });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ error: 'Invalid parameters' });
    });
  });

  describe('GET /api/v1/netflow', () => {
    it('returns 404 before anything is recorded', async () => {
      const response = await server.inject({ method: 'GET', url: '/api/v1/netflow' });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({ error: 'No netflow recorded' });
    });

    it('returns the most recently updated exchange', async () => {
      await seed();
      await store.record('coinbase', transferEvent({ from: OUTSIDER_B, to: OUTSIDER_C, amount: 7n }), 7n, 0n);

      const response = await server.inject({ method: 'GET', url: '/api/v1/netflow' });

      expect(response.json()).toMatchObject({ exchange: 'coinbase', cumulative_netflow: '7' });
    });
  });

  describe('GET /api/v1/netflow/:exchange/history', () => {
    it('lists snapshots newest first', async () => {
      await seed();

      const response = await server.inject({ method: 'GET', url: '/api/v1/netflow/binance/history?limit=1' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        exchange: 'binance',
        snapshots: [
          {
            exchange: 'binance',
            inflow: '0',
            outflow: '1200',
            cumulative_netflow: '-200',
            last_updated: '2024-05-01T00:00:00.000Z',
          },
        ],
        pagination: { limit: 1 },
      });
    });

    it('defaults the page size', async () => {
      const response = await server.inject({ method: 'GET', url: '/api/v1/netflow/binance/history' });

      expect(response.json()).toEqual({ exchange: 'binance', snapshots: [], pagination: { limit: 50 } });
    });

    it('rejects a limit outside 1..500', async () => {
      const zero = await server.inject({ method: 'GET', url: '/api/v1/netflow/binance/history?limit=0' });
      const tooMany = await server.inject({ method: 'GET', url: '/api/v1/netflow/binance/history?limit=501' });

      expect(zero.statusCode).toBe(400);
      expect(tooMany.statusCode).toBe(400);
    });
  });

  describe('GET /api/v1/netflow/:exchange/transfers', () => {
    it('lists ledger entries newest first', async () => {
      await seed();

      const response = await server.inject({ method: 'GET', url: '/api/v1/netflow/binance/transfers?limit=5' });
      const body = response.json();

      expect(response.statusCode).toBe(200);
      expect(body.pagination).toEqual({ limit: 5 });
      expect(body.transfers).toHaveLength(2);
      expect(body.transfers[1]).toEqual({
        id: 1,
        exchange: 'binance',
        block_number: '100',
        tx_hash: TX_HASH,
        log_index: 0,
        from_address: OUTSIDER_B,
        to_address: BINANCE_HOT,
        amount: '1000',
        observed_at: '2024-05-01T00:00:00.000Z',
        inserted_at: '2024-05-01T00:00:00.000Z',
      });
    });
  });

  describe('GET /api/v1/health', () => {
    it('reports a healthy service with ingestion status', async () => {
      await server.close();
      const status: SupervisorStatus = {
        running: true,
        startTime: FIXED_TIME,
        restarts: 2,
        lastError: 'socket closed',
        subscriber: null,
      };
      server = await createServer({ store, ingestionStatus: () => status });

      const response = await server.inject({ method: 'GET', url: '/api/v1/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({
        status: 'healthy',
        database: 'connected',
        service: 'exchange-netflow-monitor',
        ingestion: { running: true, restarts: 2, lastError: 'socket closed' },
      });
    });

    it('answers liveness probes', async () => {
      const response = await server.inject({ method: 'GET', url: '/api/v1/health/live' });

      expect(response.json()).toEqual({ alive: true });
    });
  });
});

describe('netflow API with a failing store', () => {
  let server: FastifyInstance;

  beforeEach(async () => {
    server = await createServer({ store: brokenStore });
  });

  afterEach(async () => {
    await server.close();
  });

  it('returns 500 without leaking the cause', async () => {
    const response = await server.inject({ method: 'GET', url: '/api/v1/netflow/binance' });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({ error: 'Failed to fetch netflow' });
  });

  it('returns 500 for history reads', async () => {
    const response = await server.inject({ method: 'GET', url: '/api/v1/netflow/binance/history' });

    expect(response.statusCode).toBe(500);
  });

  it('reports the database as disconnected', async () => {
    const response = await server.inject({ method: 'GET', url: '/api/v1/health' });

    expect(response.statusCode).toBe(503);
    expect(response.json()).toMatchObject({ status: 'unhealthy', database: 'disconnected', ingestion: null });
  });
});
