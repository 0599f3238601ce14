import { errorCodeOf, RepositoryError, RepositoryErrorKind, statusCodeOf, toRepositoryError } from '../core/errors.js';
import { OperationScope } from '../core/execution.js';
import { INoteRecordStore } from '../core/interfaces.js';
import { makeNote } from '../core/note.js';
import {
  equals,
  matchAll,
  RecordQuery,
  titleOrContentContains,
  UPDATED_AT_DESC,
} from '../core/predicate.js';
import {
  AccountStatus,
  Note,
  NoteRecordDraft,
  NoteRecordFields,
  StoredNoteRecord,
} from '../types/index.js';
import logger from '../utils/logger.js';
import type { DisposableNoteRepository } from './note-repository.js';

export const DEFAULT_NOTES_ZONE = 'notes';

const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
]);

export function noteToRecord(note: Note, zone: string): NoteRecordFields {
  return {
    zone,
    id: note.id,
    title: note.title,
    content: note.content,
    createdAt: note.createdAt.toISOString(),
    updatedAt: note.updatedAt.toISOString(),
  };
}

/**
 * Decode a record read from the server. Returns undefined for records that
 * are missing fields or carry unparsable timestamps.
 */
export function recordToNote(record: StoredNoteRecord): Note | undefined {
  const { id, title, content, createdAt, updatedAt } = record;
  if (
    typeof id !== 'string' ||
    typeof title !== 'string' ||
    typeof content !== 'string' ||
    typeof createdAt !== 'string' ||
    typeof updatedAt !== 'string'
  ) {
    return undefined;
  }

  const created = new Date(createdAt);
  const updated = new Date(updatedAt);
  if (Number.isNaN(created.getTime()) || Number.isNaN(updated.getTime())) {
    return undefined;
  }

  return makeNote({ id, title, content, createdAt: created, updatedAt: updated });
}

/**
 * Map a failed session read to an account availability.
 */
export function accountStatusFromError(error: unknown): AccountStatus {
  const statusCode = statusCodeOf(error);
  if (statusCode === 401) {
    return 'noAccount';
  }
  if (statusCode === 403) {
    return 'restricted';
  }
  if (statusCode !== undefined && (statusCode === 429 || statusCode >= 500)) {
    return 'temporarilyUnavailable';
  }

  const cause = error instanceof Error ? error.cause : undefined;
  const code = errorCodeOf(error) ?? errorCodeOf(cause);
  if (code !== undefined && TRANSIENT_NETWORK_CODES.has(code)) {
    return 'temporarilyUnavailable';
  }
  return 'couldNotDetermine';
}

/**
 * NoteRepository backed by a remote record store.
 *
 * Notes are records inside one zone of the account's private database. The
 * domain id is a plain record field; lookups go through a query on that field
 * and writes address the record by its native id. No retries happen here.
 */
export class RemoteNoteRepository implements DisposableNoteRepository {
  readonly zone: string;
  private readonly scope = new OperationScope();

  constructor(
    private readonly records: INoteRecordStore,
    options: { zone?: string } = {}
  ) {
    this.zone = options.zone ?? DEFAULT_NOTES_ZONE;
  }

  /**
   * Create the zone used for note records. Must succeed once per account
   * before the other operations are relied upon.
   */
  setup(): Promise<void> {
    return this.perform('SaveFailed', 'setup', () => this.records.ensureZone(this.zone));
  }

  /**
   * Availability of the backing account. Only rejects when the repository has
   * been disposed.
   */
  checkAccountStatus(): Promise<AccountStatus> {
    return this.scope.run(async () => {
      try {
        const session = await this.records.getSession();
        return session.name ? 'available' : 'noAccount';
      } catch (error) {
        const status = accountStatusFromError(error);
        logger.warn({ error, status }, 'Remote account status check failed');
        return status;
      }
    });
  }

  fetchAll(): Promise<Note[]> {
    return this.perform('FetchFailed', 'fetchAll', () =>
      this.collect({ predicate: matchAll, sort: UPDATED_AT_DESC })
    );
  }

  create(note: Note): Promise<Note> {
    return this.perform('SaveFailed', 'create', async () => {
      const saved = await this.records.save(noteToRecord(note, this.zone));
      return this.decodeSaved(saved);
    });
  }

  update(note: Note): Promise<Note> {
    return this.perform('SaveFailed', 'update', async () => {
      const record = await this.findRecord(note.id);
      if (!record) {
        throw RepositoryError.notFound(note.id);
      }

      const draft: NoteRecordDraft = {
        _id: record._id,
        _rev: record._rev,
        zone: this.zone,
        id: note.id,
        title: note.title,
        content: note.content,
        createdAt: record.createdAt ?? note.createdAt.toISOString(),
        updatedAt: note.updatedAt.toISOString(),
      };
      const saved = await this.records.save(draft);
      return this.decodeSaved(saved);
    });
  }

  delete(note: Note): Promise<void> {
    return this.perform('DeleteFailed', 'delete', async () => {
      const record = await this.findRecord(note.id);
      if (!record) {
        throw RepositoryError.notFound(note.id);
      }
      await this.records.remove(record._id, record._rev);
    });
  }

  search(query: string): Promise<Note[]> {
    return this.perform('SearchFailed', 'search', () =>
      this.collect({ predicate: titleOrContentContains(query), sort: UPDATED_AT_DESC })
    );
  }

  getById(id: string): Promise<Note | undefined> {
    return this.perform('FetchFailed', 'getById', async () => {
      const record = await this.findRecord(id);
      return record ? recordToNote(record) : undefined;
    });
  }

  dispose(): void {
    if (!this.scope.isClosed) {
      logger.debug({ zone: this.zone, pending: this.scope.pendingCount }, 'Remote note repository disposed');
      this.scope.close();
    }
  }

  private async collect(query: RecordQuery): Promise<Note[]> {
    const notes: Note[] = [];
    await this.records.query(this.zone, query, (record) => {
      const note = recordToNote(record);
      if (note) {
        notes.push(note);
      } else {
        logger.warn({ recordId: record._id }, 'Skipping undecodable note record');
      }
    });
    return notes;
  }

  private async findRecord(id: string): Promise<StoredNoteRecord | undefined> {
    const matches: StoredNoteRecord[] = [];
    await this.records.query(this.zone, { predicate: equals('id', id), limit: 1 }, (record) => {
      matches.push(record);
    });
    return matches[0];
  }

  private decodeSaved(saved: StoredNoteRecord): Note {
    const note = recordToNote(saved);
    if (!note) {
      throw new Error(`Saved record ${saved._id} could not be decoded`);
    }
    return note;
  }

  private async perform<T>(
    kind: RepositoryErrorKind,
    operation: string,
    work: () => Promise<T>
  ): Promise<T> {
    try {
      return await this.scope.run(work);
    } catch (error) {
      const wrapped = toRepositoryError(kind, error);
      if (wrapped.kind !== 'NotFound') {
        logger.error({ error, operation, kind: wrapped.kind, zone: this.zone }, 'Remote note operation failed');
      }
      throw wrapped;
    }
  }
}
