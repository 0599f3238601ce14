import { Note } from '../types/index.js';

/**
 * Storage abstraction for notes.
 *
 * Every operation resolves with its value or rejects with a RepositoryError.
 * Implementations give no ordering guarantee; ordering belongs to NotesService.
 */
export interface NoteRepository {
  /**
   * List all notes.
   */
  fetchAll(): Promise<Note[]>;

  /**
   * Persist a new note verbatim, id included, and return the stored value.
   */
  create(note: Note): Promise<Note>;

  /**
   * Overwrite title/content of the note with the same id and refresh its
   * `updatedAt`. Rejects with NotFound when no such note exists.
   */
  update(note: Note): Promise<Note>;

  /**
   * Remove the note with the same id. Rejects with NotFound when absent.
   */
  delete(note: Note): Promise<void>;

  /**
   * Case-insensitive substring search on title OR content.
   */
  search(query: string): Promise<Note[]>;

  /**
   * Return a single note by id, or undefined when it does not exist.
   */
  getById(id: string): Promise<Note | undefined>;
}

/**
 * A repository whose pending and future operations can be abandoned.
 * After `dispose()` every operation rejects with ContextUnavailable.
 */
export interface DisposableNoteRepository extends NoteRepository {
  dispose(): void;
}
