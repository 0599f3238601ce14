import { RepositoryError, RepositoryErrorKind, toRepositoryError } from '../core/errors.js';
import { clampToCreation, makeNote } from '../core/note.js';
import { equals, matchAll, titleOrContentContains, UPDATED_AT_DESC } from '../core/predicate.js';
import type { LocalNoteRecord, LocalNoteStore, StoreTransaction } from '../storage/local-note-store.js';
import { Note } from '../types/index.js';
import logger from '../utils/logger.js';
import type { DisposableNoteRepository } from './note-repository.js';

function toNote(record: LocalNoteRecord): Note {
  return makeNote({
    id: record.id,
    title: record.title,
    content: record.content,
    createdAt: record.createdAt,
    updatedAt: record.updatedAt,
  });
}

/**
 * NoteRepository over a LocalNoteStore.
 * Every call is one unit of work on the store's execution context; several
 * repositories may share one store.
 *
 * Disposing rejects work that has not reached the store yet. A unit of work
 * the store has already started runs to completion and reports its outcome.
 */
export class LocalNoteRepository implements DisposableNoteRepository {
  private disposed = false;
  private readonly clock: () => Date;

  constructor(
    private readonly store: LocalNoteStore,
    options: { clock?: () => Date } = {}
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  fetchAll(): Promise<Note[]> {
    return this.perform('FetchFailed', 'fetchAll', (transaction) =>
      transaction.fetch({ predicate: matchAll, sort: UPDATED_AT_DESC }).map(toNote)
    );
  }

  /**
   * Stores the note as given, including the caller's `updatedAt`.
   */
  create(note: Note): Promise<Note> {
    return this.perform('SaveFailed', 'create', (transaction) =>
      toNote(
        transaction.insert({
          id: note.id,
          title: note.title,
          content: note.content,
          createdAt: note.createdAt,
          updatedAt: note.updatedAt,
        })
      )
    );
  }

  /**
   * Overwrites title and content; `updatedAt` comes from the store clock.
   */
  update(note: Note): Promise<Note> {
    return this.perform('SaveFailed', 'update', (transaction) => {
      const existing = this.lookup(transaction, note.id);
      const stored = transaction.update(existing.pk, {
        title: note.title,
        content: note.content,
        updatedAt: clampToCreation(this.clock(), existing.createdAt),
      });
      return toNote(stored);
    });
  }

  delete(note: Note): Promise<void> {
    return this.perform('DeleteFailed', 'delete', (transaction) => {
      const existing = this.lookup(transaction, note.id);
      transaction.delete(existing.pk);
    });
  }

  search(query: string): Promise<Note[]> {
    return this.perform('SearchFailed', 'search', (transaction) =>
      transaction
        .fetch({ predicate: titleOrContentContains(query), sort: UPDATED_AT_DESC })
        .map(toNote)
    );
  }

  getById(id: string): Promise<Note | undefined> {
    return this.perform('FetchFailed', 'getById', (transaction) => {
      const [record] = transaction.fetch({ predicate: equals('id', id), limit: 1 });
      return record ? toNote(record) : undefined;
    });
  }

  dispose(): void {
    this.disposed = true;
  }

  private lookup(transaction: StoreTransaction, id: string): LocalNoteRecord {
    const [record] = transaction.fetch({ predicate: equals('id', id), limit: 1 });
    if (!record) {
      throw RepositoryError.notFound(id);
    }
    return record;
  }

  private async perform<T>(
    kind: RepositoryErrorKind,
    operation: string,
    work: (transaction: StoreTransaction) => T
  ): Promise<T> {
    try {
      if (this.disposed) {
        throw RepositoryError.contextUnavailable();
      }
      return await this.store.perform((transaction) => {
        if (this.disposed) {
          throw RepositoryError.contextUnavailable();
        }
        return work(transaction);
      });
    } catch (error) {
      const wrapped = toRepositoryError(kind, error);
      if (wrapped.kind !== 'NotFound') {
        logger.error({ error, operation, kind: wrapped.kind }, 'Local note operation failed');
      }
      throw wrapped;
    }
  }
}
