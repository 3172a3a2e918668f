import type { Knex } from 'knex';

/**
 * Append-only transfer ledger and netflow snapshot series.
 * Amounts are kept as decimal text so that 256-bit values round-trip exactly.
 */
export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('transfers', (table) => {
    table.increments('id').primary();
    table.string('exchange', 64).notNullable();
    table.bigInteger('block_number').notNullable();
    table.string('tx_hash', 66).notNullable();
    table.integer('log_index').notNullable();
    table.string('from_address', 42).notNullable();
    table.string('to_address', 42).notNullable();
    table.string('amount', 78).notNullable();
    table.timestamp('observed_at').notNullable();
    table.timestamp('inserted_at').notNullable();

    table.index(['exchange', 'id']);
    table.index(['tx_hash']);
  });

  await knex.schema.createTable('netflows', (table) => {
    table.increments('id').primary();
    table.string('exchange', 64).notNullable();
    table.string('inflow', 78).notNullable();
    table.string('outflow', 78).notNullable();
    table.string('cumulative_netflow', 80).notNullable(); // signed
    table.timestamp('last_updated').notNullable();

    table.index(['exchange', 'id']);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('netflows');
  await knex.schema.dropTableIfExists('transfers');
}
