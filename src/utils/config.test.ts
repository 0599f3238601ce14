import { describe, it, expect } from 'vitest';
import { loadConfig, privateDatabaseName } from './config.js';

describe('privateDatabaseName', () => {
  it('hex-encodes the username', () => {
    expect(privateDatabaseName('alice')).toBe('userdb-616c696365');
  });
});

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      localStore: { path: './data/notes.json', inMemory: false, resetOnLaunch: false },
      couchdb: {
        url: 'http://localhost:5984',
        username: 'admin',
        password: 'password',
        database: 'userdb-61646d696e',
        zone: 'notes',
        pageSize: 50,
      },
      useRemoteSync: false,
      server: { port: 3000, host: '0.0.0.0' },
    });
  });

  it('reads every setting from the environment', () => {
    const config = loadConfig({
      LOCAL_STORE_PATH: '/tmp/notes.json',
      LOCAL_STORE_IN_MEMORY: 'true',
      LOCAL_STORE_RESET_ON_LAUNCH: 'true',
      COUCHDB_URL: 'https://couch.example.test',
      COUCHDB_USERNAME: 'alice',
      COUCHDB_PASSWORD: 'test-secret',
      COUCHDB_DATABASE: 'shared-notes',
      COUCHDB_ZONE: 'journal',
      COUCHDB_PAGE_SIZE: '10',
      USE_REMOTE_SYNC: 'true',
      PORT: '8080',
      HOST: '127.0.0.1',
    });

    expect(config.localStore).toEqual({ path: '/tmp/notes.json', inMemory: true, resetOnLaunch: true });
    expect(config.couchdb).toEqual({
      url: 'https://couch.example.test',
      username: 'alice',
      password: 'test-secret',
      database: 'shared-notes',
      zone: 'journal',
      pageSize: 10,
    });
    expect(config.useRemoteSync).toBe(true);
    expect(config.server).toEqual({ port: 8080, host: '127.0.0.1' });
  });

  it('derives the private database from the username', () => {
    expect(loadConfig({ COUCHDB_USERNAME: 'alice' }).couchdb.database).toBe('userdb-616c696365');
  });

  it('falls back to defaults for unparsable integers', () => {
    const config = loadConfig({ COUCHDB_PAGE_SIZE: 'many', PORT: 'http' });

    expect(config.couchdb.pageSize).toBe(50);
    expect(config.server.port).toBe(3000);
  });
});
