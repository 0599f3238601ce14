/**
 * Core interfaces for remote record storage
 * These interfaces keep the remote adapter independent of the CouchDB client
 */

import { NoteRecordDraft, RemoteSession, StoredNoteRecord } from '../types/index.js';
import { RecordQuery } from './predicate.js';

/**
 * Primitive operations of the remote record store
 *
 * Records live in a zone (partition) of the account's private database.
 * The store is eventually consistent: a completed save is not guaranteed to be
 * visible to the next query.
 */
export interface INoteRecordStore {
  /**
   * Prepare the zone (database and indexes). Safe to call repeatedly.
   */
  ensureZone(zone: string): Promise<void>;

  /**
   * Run a query inside a zone, calling `onRecord` for every matched record.
   * Resolves once the query has completed.
   */
  query(
    zone: string,
    query: RecordQuery,
    onRecord: (record: StoredNoteRecord) => void
  ): Promise<void>;

  /**
   * Insert a record, or update it when `_id` and `_rev` are given.
   * Resolves with the saved record including its new revision.
   */
  save(record: NoteRecordDraft): Promise<StoredNoteRecord>;

  /**
   * Delete a record by its store-native identifier.
   */
  remove(recordId: string, rev: string): Promise<void>;

  /**
   * Read the authenticated account of the current session.
   */
  getSession(): Promise<RemoteSession>;
}
