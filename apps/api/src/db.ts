import knex, { Knex } from 'knex';
import { config } from './config';

interface SqliteConnection {
  pragma(source: string): unknown;
}

// SQLite leaves foreign keys off unless every connection opts in.
function enableForeignKeys(
  connection: SqliteConnection,
  done: (error: Error | null, connection: SqliteConnection) => void
) {
  try {
    connection.pragma('foreign_keys = ON');
    done(null, connection);
  } catch (error) {
    done(error instanceof Error ? error : new Error(String(error)), connection);
  }
}

function buildKnexConfig(): Knex.Config {
  if (config.database.client === 'pg') {
    return {
      client: 'pg',
      connection: config.database.url,
      pool: {
        min: 1,
        max: 10
      }
    };
  }

  return {
    client: 'better-sqlite3',
    connection: { filename: config.database.filename },
    useNullAsDefault: true,
    pool: {
      min: 1,
      max: 1,
      afterCreate: enableForeignKeys
    }
  };
}

export const db: Knex = knex(buildKnexConfig());
