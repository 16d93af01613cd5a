import { db } from '../db';
import { logError, logInfo } from '../logger';
import { migrateLatest } from '../migrations';

async function main() {
  try {
    await migrateLatest();
    logInfo('Database schema is up to date');
  } catch (error) {
    logError('Migration failed', { error });
    process.exitCode = 1;
  } finally {
    await db.destroy();
  }
}

main();
