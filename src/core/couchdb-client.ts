import { randomUUID } from 'node:crypto';

import Nano from 'nano';

import {
  CouchDBConfig,
  NoteRecordDraft,
  NoteRecordFields,
  RemoteSession,
  StoredNoteRecord,
} from '../types/index.js';
import { statusCodeOf } from './errors.js';
import { INoteRecordStore } from './interfaces.js';
import { MangoSelectorFragment, RecordQuery, toMangoSelector } from './predicate.js';
import logger from '../utils/logger.js';

type NoteDocument = Partial<NoteRecordFields>;

/**
 * Mango indexes backing zone queries: sorted listing and point lookup by domain id.
 */
export function zoneIndexes(zone: string): Nano.CreateIndexRequest[] {
  const ddoc = `${zone}-indexes`;
  return [
    { index: { fields: ['zone', 'updatedAt'] }, ddoc, name: `${zone}-by-updated-at` },
    { index: { fields: ['zone', 'id'] }, ddoc, name: `${zone}-by-id` },
  ];
}

/**
 * Selector restricting a predicate to one zone. Sorted queries also constrain
 * `updatedAt` so Mango can serve the sort from the zone+updatedAt index.
 */
export function zoneSelector(zone: string, query: RecordQuery): MangoSelectorFragment {
  return {
    zone: { $eq: zone },
    ...(query.sort ? { updatedAt: { $gt: null } } : {}),
    ...toMangoSelector(query.predicate),
  };
}

/**
 * CouchDB client for note records
 * Implements INoteRecordStore on top of nano
 */
export class CouchDBClient implements INoteRecordStore {
  private nano: Nano.ServerScope;
  private db: Nano.DocumentScope<NoteDocument>;
  private readonly database: string;
  private readonly pageSize: number;

  constructor(config: CouchDBConfig) {
    const auth = `${encodeURIComponent(config.username)}:${encodeURIComponent(config.password)}`;
    const url = config.url.replace('://', `://${auth}@`);

    this.nano = Nano(url);
    this.database = config.database;
    this.db = this.nano.db.use<NoteDocument>(config.database);
    this.pageSize = Math.max(1, config.pageSize);
  }

  /**
   * Create the database when missing, then the zone's indexes
   */
  async ensureZone(zone: string): Promise<void> {
    try {
      await this.nano.db.get(this.database);
    } catch (error) {
      if (statusCodeOf(error) !== 404) {
        logger.error({ error, database: this.database }, 'Failed to read database info');
        throw error;
      }
      await this.createDatabase();
    }

    for (const index of zoneIndexes(zone)) {
      try {
        const result = await this.db.createIndex(index);
        logger.debug({ zone, index: result.name, result: result.result }, 'Zone index ready');
      } catch (error) {
        logger.error({ error, zone, index: index.name }, 'Failed to create zone index');
        throw error;
      }
    }

    logger.info({ database: this.database, zone }, 'Zone ready');
  }

  /**
   * Run a Mango query page by page, handing every matched record to `onRecord`
   */
  async query(
    zone: string,
    query: RecordQuery,
    onRecord: (record: StoredNoteRecord) => void
  ): Promise<void> {
    const selector = zoneSelector(zone, query);
    const direction = query.sort?.descending ? 'desc' : 'asc';
    const sort: Nano.SortOrder[] | undefined = query.sort
      ? [{ zone: direction }, { [query.sort.field]: direction }]
      : undefined;

    let bookmark: string | undefined;
    let delivered = 0;

    try {
      for (;;) {
        const limit =
          query.limit === undefined ? this.pageSize : Math.min(this.pageSize, query.limit - delivered);
        if (limit <= 0) {
          break;
        }

        const response = await this.db.find({
          selector,
          limit,
          ...(sort ? { sort } : {}),
          ...(bookmark ? { bookmark } : {}),
        });

        for (const doc of response.docs) {
          onRecord(doc);
          delivered++;
        }

        if (response.docs.length < limit || !response.bookmark) {
          break;
        }
        bookmark = response.bookmark;
      }
      logger.debug({ zone, delivered }, 'Query completed');
    } catch (error) {
      logger.error({ error, zone, delivered }, 'Query failed');
      throw error;
    }
  }

  /**
   * Insert or update a record. New records get a native id of `<zone>:<uuid>`
   */
  async save(record: NoteRecordDraft): Promise<StoredNoteRecord> {
    const document: NoteRecordDraft = record._id
      ? record
      : { ...record, _id: `${record.zone}:${randomUUID()}` };

    try {
      const response = await this.db.insert(document);
      logger.debug({ recordId: response.id, rev: response.rev }, 'Record saved');
      return { ...document, _id: response.id, _rev: response.rev };
    } catch (error) {
      logger.error({ error, recordId: document._id }, 'Failed to save record');
      throw error;
    }
  }

  async remove(recordId: string, rev: string): Promise<void> {
    try {
      await this.db.destroy(recordId, rev);
      logger.debug({ recordId }, 'Record deleted');
    } catch (error) {
      logger.error({ error, recordId }, 'Failed to delete record');
      throw error;
    }
  }

  async getSession(): Promise<RemoteSession> {
    try {
      const session = await this.nano.session();
      return {
        name: session.userCtx.name || null,
        roles: session.userCtx.roles ?? [],
      };
    } catch (error) {
      logger.error({ error }, 'Failed to read session');
      throw error;
    }
  }

  private async createDatabase(): Promise<void> {
    try {
      await this.nano.db.create(this.database);
      logger.info({ database: this.database }, 'Database created');
    } catch (error) {
      // 412: created concurrently by someone else
      if (statusCodeOf(error) === 412) {
        return;
      }
      logger.error({ error, database: this.database }, 'Failed to create database');
      throw error;
    }
  }
}
