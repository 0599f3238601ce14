import Fastify from 'fastify';
import cors from '@fastify/cors';
import { loadConfig } from './utils/config.js';
import { CouchDBClient } from './core/couchdb-client.js';
import { registerRoutes } from './api/routes.js';
import { RemoteNoteRepository } from './repositories/remote-note-repository.js';
import { RepositorySwitchboard } from './services/repository-switchboard.js';
import { LocalNoteStore } from './storage/local-note-store.js';
import logger from './utils/logger.js';

async function main() {
  // Load configuration
  const config = loadConfig();

  const store = await LocalNoteStore.fromConfig(config.localStore);

  const switchboard = new RepositorySwitchboard(
    store,
    (account) =>
      new RemoteNoteRepository(
        new CouchDBClient({ ...config.couchdb, username: account.username, password: account.password }),
        { zone: config.couchdb.zone }
      )
  );

  if (config.useRemoteSync) {
    const account = { username: config.couchdb.username, password: config.couchdb.password };
    const status = await switchboard.checkRemoteStatus(account);
    if (status === 'available') {
      try {
        await switchboard.switchToRemote(account);
      } catch (error) {
        logger.warn({ error }, 'Remote store unavailable, staying on local store');
      }
    } else {
      logger.warn({ status }, 'Remote account not available, staying on local store');
    }
  }

  // Initialize Fastify server
  const app = Fastify({
    logger: false, // Using pino logger directly
  });

  await app.register(cors, {
    origin: true,
  });

  await registerRoutes(app, switchboard, config);

  try {
    await app.listen({
      port: config.server.port,
      host: config.server.host,
    });
    logger.info(
      { port: config.server.port, host: config.server.host, store: switchboard.activeKind },
      'Server started successfully'
    );
  } catch (error) {
    logger.error({ error }, 'Failed to start server');
    process.exit(1);
  }

  // Graceful shutdown
  const shutdown = async () => {
    logger.info('Shutting down...');
    await app.close();
    switchboard.dispose();
    store.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error) => {
      logger.error({ error }, 'Shutdown failed');
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((error) => {
  logger.error({ error }, 'Fatal error');
  process.exit(1);
});
