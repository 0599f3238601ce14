/**
 * Core type definitions for notes-sync
 */

export interface LocalStoreConfig {
  path: string;
  inMemory: boolean;
  resetOnLaunch: boolean;
}

export interface CouchDBConfig {
  url: string;
  username: string;
  password: string;
  database: string;
  zone: string;
  pageSize: number;
}

export interface AppConfig {
  localStore: LocalStoreConfig;
  couchdb: CouchDBConfig;
  useRemoteSync: boolean;
  server: {
    port: number;
    host: string;
  };
}

/**
 * A single note. Values are frozen; an edit always produces a new value.
 */
export interface Note {
  readonly id: string;
  readonly title: string;
  readonly content: string;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface NoteStatistics {
  totalNotes: number;
  notesWithContent: number;
  notesWithoutContent: number;
  averageTitleLength: number;
  averageContentLength: number;
}

/**
 * Remote note record as stored in CouchDB.
 *
 * The document `_id` is the store-native record identifier (`<zone>:<uuid>`);
 * `id` is the domain id and the only identity exposed to callers.
 * Timestamps are ISO-8601 strings so Mango can sort them lexically.
 */
export interface NoteRecordFields {
  zone: string;
  id: string;
  title: string;
  content: string;
  createdAt: string;
  updatedAt: string;
}

export interface NoteRecordDraft extends NoteRecordFields {
  _id?: string;
  _rev?: string;
}

/**
 * A record as read back from the server. Fields other than `_id`/`_rev`
 * are not trusted until decoded.
 */
export type StoredNoteRecord = Partial<NoteRecordFields> & {
  _id: string;
  _rev: string;
};

export type AccountStatus =
  | 'available'
  | 'noAccount'
  | 'restricted'
  | 'couldNotDetermine'
  | 'temporarilyUnavailable';

export interface RemoteAccount {
  username: string;
  password: string;
}

export interface RemoteSession {
  name: string | null;
  roles: string[];
}

export type StoreKind = 'local' | 'remote';
