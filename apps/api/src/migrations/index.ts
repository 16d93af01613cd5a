import type { Knex } from 'knex';
import { db } from '../db';
import { ensureDefaultSettings } from '../repositories/settingsRepository';
import * as initialSchema from './001_initial_schema';

interface NamedMigration extends Knex.Migration {
  name: string;
}

const migrations: NamedMigration[] = [{ name: '001_initial_schema', ...initialSchema }];

// Migrations are bundled with the code so the compiled output and the tsx loader see the same list.
export const migrationSource: Knex.MigrationSource<NamedMigration> = {
  async getMigrations() {
    return migrations;
  },
  getMigrationName(migration) {
    return migration.name;
  },
  async getMigration(migration) {
    return migration;
  }
};

export async function migrateLatest(): Promise<void> {
  await db.migrate.latest({ migrationSource });
  await ensureDefaultSettings();
}
