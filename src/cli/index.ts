#!/usr/bin/env node

/**
 * Netflow monitor CLI
 * Operator commands for running the monitor and inspecting recorded netflow
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import Table from 'cli-table3';
import type { Knex } from 'knex';
import { loadConfig } from '../config';
import { CONSTANTS } from '../config/constants';
import { buildKnexConfig } from '../knexfile';
import { getDb, closeDb } from '../db/connection';
import { runMigrations } from '../db/migrationSource';
import { buildRegistries } from '../indexer/AddressRegistry';
import { KnexNetflowStore } from '../services/NetflowStore';
import { serializeSnapshot, serializeTransfer } from '../api/routes/serializers';
import { errorMessage } from '../utils/errors';
import { main } from '../index';

const program = new Command();

program
  .name('netflow-monitor')
  .description('Exchange token netflow monitor')
  .version('1.0.0');

function parseLimit(value: string): number {
  const limit = Number.parseInt(value, 10);
  if (!Number.isInteger(limit) || limit < 1 || limit > CONSTANTS.API.MAX_PAGE_SIZE) {
    throw new InvalidArgumentError(`limit must be between 1 and ${CONSTANTS.API.MAX_PAGE_SIZE}`);
  }
  return limit;
}

async function withDatabase<T>(fn: (db: Knex) => Promise<T>): Promise<T> {
  const config = loadConfig();
  const db = getDb(buildKnexConfig(config.database));
  try {
    return await fn(db);
  } finally {
    await closeDb();
  }
}

function fail(message: string, error: unknown): never {
  console.error(chalk.red(message), errorMessage(error));
  process.exit(1);
}

function colorSigned(value: string): string {
  return value.startsWith('-') ? chalk.red(value) : chalk.green(value);
}

program
  .command('start')
  .description('Run the monitor: migrations, API server and log ingestion')
  .action(async () => {
    await main();
  });

program
  .command('migrate')
  .description('Apply pending database migrations')
  .action(async () => {
    try {
      const applied = await withDatabase(db => runMigrations(db));
      if (applied.length === 0) {
        console.log(chalk.gray('Database schema is up to date'));
      } else {
        console.log(chalk.green(`✅ Applied ${applied.length} migration(s): ${applied.join(', ')}`));
      }
    } catch (error) {
      fail('Migration failed:', error);
    }
  });

program
  .command('check-config')
  .description('Validate configuration and list monitored exchanges')
  .action(() => {
    try {
      const config = loadConfig();
      const registries = buildRegistries(config.exchanges);

      console.log(chalk.cyan('\n📋 Configuration'));
      console.log(chalk.gray(`Chain: ${config.rpc.chain}`));
      console.log(chalk.gray(`Token: ${config.token.address}`));

      const table = new Table({ head: ['Exchange', 'Addresses'] });
      for (const registry of registries) {
        table.push([registry.label(), registry.size]);
      }
      console.log(table.toString());
    } catch (error) {
      fail('Invalid configuration:', error);
    }
  });

program
  .command('latest <exchange>')
  .description('Show the current cumulative netflow of an exchange')
  .action(async (exchange: string) => {
    try {
      const snapshot = await withDatabase(db => new KnexNetflowStore(db).latest(exchange.toLowerCase()));
      if (!snapshot) {
        console.log(chalk.yellow(`⚠️  No netflow recorded for ${exchange}`));
        return;
      }

      const row = serializeSnapshot(snapshot);
      const table = new Table({ head: ['Exchange', 'Inflow', 'Outflow', 'Cumulative', 'Updated'] });
      table.push([row.exchange, row.inflow, row.outflow, colorSigned(row.cumulative_netflow), row.last_updated]);
      console.log(table.toString());
    } catch (error) {
      fail('Failed to read netflow:', error);
    }
  });

program
  .command('history <exchange>')
  .description('Show recent netflow snapshots, newest first')
  .option('-l, --limit <n>', 'number of snapshots', parseLimit, CONSTANTS.API.DEFAULT_PAGE_SIZE)
  .action(async (exchange: string, options: { limit: number }) => {
    try {
      const snapshots = await withDatabase(db =>
        new KnexNetflowStore(db).history(exchange.toLowerCase(), options.limit)
      );

      const table = new Table({ head: ['ID', 'Inflow', 'Outflow', 'Cumulative', 'Updated'] });
      for (const snapshot of snapshots) {
        const row = serializeSnapshot(snapshot);
        table.push([snapshot.id, row.inflow, row.outflow, colorSigned(row.cumulative_netflow), row.last_updated]);
      }
      console.log(table.toString());
    } catch (error) {
      fail('Failed to read netflow history:', error);
    }
  });

program
  .command('transfers <exchange>')
  .description('Show recent ledger entries for an exchange, newest first')
  .option('-l, --limit <n>', 'number of transfers', parseLimit, CONSTANTS.API.DEFAULT_PAGE_SIZE)
  .action(async (exchange: string, options: { limit: number }) => {
    try {
      const transfers = await withDatabase(db =>
        new KnexNetflowStore(db).transfers(exchange.toLowerCase(), options.limit)
      );

      const table = new Table({ head: ['Block', 'Tx', 'From', 'To', 'Amount'] });
      for (const transfer of transfers) {
        const row = serializeTransfer(transfer);
        table.push([row.block_number, row.tx_hash, row.from_address, row.to_address, row.amount]);
      }
      console.log(table.toString());
    } catch (error) {
      fail('Failed to read transfers:', error);
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  fail('Command failed:', error);
});
