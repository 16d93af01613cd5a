import { config } from './config';
import { createApp } from './app';
import { db } from './db';
import { logError, logInfo } from './logger';
import { migrateLatest } from './migrations';
import { DispatchEngine } from './services/dispatchEngine';
import { FetchTransport } from './services/httpTransport';
import { PromptImprover } from './services/promptImprover';
import { createEnvSecretResolver } from './services/secrets';

async function main() {
  await migrateLatest();

  const transport = new FetchTransport();
  const secrets = createEnvSecretResolver();
  const engine = new DispatchEngine({ secrets, transport });
  const improver = new PromptImprover({ secrets, transport });
  const app = createApp({ engine, improver });

  const server = app.listen(config.port, () => {
    logInfo('API server started', { port: config.port, database: config.database.client });
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logInfo('Shutting down', { signal });
    server.close(() => {
      Promise.all([transport.close(), db.destroy()])
        .catch((error) => {
          logError('Shutdown failed', { error });
          process.exitCode = 1;
        })
        .finally(() => process.exit());
    });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch(async (error) => {
  logError('API server failed to start', { error });
  process.exitCode = 1;
  await db.destroy();
});
