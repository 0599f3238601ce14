import dotenv from 'dotenv';
import { AppConfig } from '../types/index.js';

dotenv.config();

function parseInteger(raw: string | undefined, fallback: number): number {
  const parsed = parseInt(raw || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/**
 * Name of the per-user private database CouchDB creates with couch_peruser.
 */
export function privateDatabaseName(username: string): string {
  return `userdb-${Buffer.from(username, 'utf-8').toString('hex')}`;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const username = env.COUCHDB_USERNAME || 'admin';

  return {
    localStore: {
      path: env.LOCAL_STORE_PATH || './data/notes.json',
      inMemory: env.LOCAL_STORE_IN_MEMORY === 'true',
      resetOnLaunch: env.LOCAL_STORE_RESET_ON_LAUNCH === 'true',
    },
    couchdb: {
      url: env.COUCHDB_URL || 'http://localhost:5984',
      username,
      password: env.COUCHDB_PASSWORD || 'password',
      database: env.COUCHDB_DATABASE || privateDatabaseName(username),
      zone: env.COUCHDB_ZONE || 'notes',
      pageSize: parseInteger(env.COUCHDB_PAGE_SIZE, 50),
    },
    useRemoteSync: env.USE_REMOTE_SYNC === 'true',
    server: {
      port: parseInteger(env.PORT, 3000),
      host: env.HOST || '0.0.0.0',
    },
  };
}
