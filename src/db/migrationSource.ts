import type { Knex } from 'knex';
import * as netflowSchema from './migrations/001_netflow_schema';

const MIGRATIONS: Record<string, Knex.Migration> = {
  '001_netflow_schema': netflowSchema,
};

/**
 * Migrations are bundled with the code instead of being discovered on disk,
 * so the same list runs from ts sources, compiled output and tests.
 */
export class NetflowMigrationSource implements Knex.MigrationSource<string> {
  async getMigrations(): Promise<string[]> {
    return Object.keys(MIGRATIONS).sort();
  }

  getMigrationName(migration: string): string {
    return migration;
  }

  async getMigration(migration: string): Promise<Knex.Migration> {
    const migrationModule = MIGRATIONS[migration];
    if (!migrationModule) {
      throw new Error(`Unknown migration ${migration}`);
    }
    return migrationModule;
  }
}

export async function runMigrations(db: Knex): Promise<string[]> {
  const [, applied] = await db.migrate.latest({ migrationSource: new NetflowMigrationSource() });
  return applied;
}
