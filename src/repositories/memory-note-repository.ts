import { RepositoryError } from '../core/errors.js';
import { makeNote } from '../core/note.js';
import { evaluatePredicate, titleOrContentContains } from '../core/predicate.js';
import { Note } from '../types/index.js';
import { NoteRepository } from './note-repository.js';

/**
 * In-memory NoteRepository implementation.
 * Keeps insertion order and never sorts, so callers cannot lean on adapter
 * ordering. `failWith` makes every later call reject until cleared.
 */
export class MemoryNoteRepository implements NoteRepository {
  private notes = new Map<string, Note>();
  private failure?: RepositoryError;

  constructor(initial: Note[] = []) {
    for (const note of initial) {
      this.notes.set(note.id, note);
    }
  }

  failWith(error?: RepositoryError): void {
    this.failure = error;
  }

  async fetchAll(): Promise<Note[]> {
    this.throwIfFailing();
    return Array.from(this.notes.values());
  }

  async create(note: Note): Promise<Note> {
    this.throwIfFailing();
    if (this.notes.has(note.id)) {
      throw new RepositoryError('SaveFailed', { detail: `duplicate id ${note.id}` });
    }
    const stored = makeNote(note);
    this.notes.set(stored.id, stored);
    return stored;
  }

  async update(note: Note): Promise<Note> {
    this.throwIfFailing();
    const existing = this.notes.get(note.id);
    if (!existing) {
      throw RepositoryError.notFound(note.id);
    }
    const stored = makeNote({ ...note, createdAt: existing.createdAt });
    this.notes.set(stored.id, stored);
    return stored;
  }

  async delete(note: Note): Promise<void> {
    this.throwIfFailing();
    if (!this.notes.delete(note.id)) {
      throw RepositoryError.notFound(note.id);
    }
  }

  async search(query: string): Promise<Note[]> {
    this.throwIfFailing();
    const predicate = titleOrContentContains(query);
    return Array.from(this.notes.values()).filter((note) => evaluatePredicate(predicate, note));
  }

  async getById(id: string): Promise<Note | undefined> {
    this.throwIfFailing();
    return this.notes.get(id);
  }

  private throwIfFailing(): void {
    if (this.failure) {
      throw this.failure;
    }
  }
}
