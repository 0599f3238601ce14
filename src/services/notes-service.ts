import { randomUUID } from 'node:crypto';

import { RepositoryError } from '../core/errors.js';
import { compareByUpdatedAtDesc, draftNote, reviseNote } from '../core/note.js';
import type { NoteRepository } from '../repositories/note-repository.js';
import { Note, NoteStatistics } from '../types/index.js';
import logger from '../utils/logger.js';

export interface NotesServiceOptions {
  clock?: () => Date;
  generateId?: () => string;
}

const graphemes = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

/**
 * Length as a reader sees it: one per grapheme cluster, so a combining accent
 * or a flag counts once.
 */
export function characterCount(text: string): number {
  return Array.from(graphemes.segment(text)).length;
}

function average(values: number[]): number {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function sortByUpdatedAtDesc(notes: Note[]): Note[] {
  return [...notes].sort(compareByUpdatedAtDesc);
}

/**
 * Business rules on top of any NoteRepository: validation, trimming,
 * ordering and statistics. Repository errors reach callers untouched.
 */
export class NotesService {
  private readonly repository: NoteRepository;
  private readonly clock: () => Date;
  private readonly generateId: () => string;

  constructor(repository: NoteRepository, options: NotesServiceOptions = {}) {
    this.repository = repository;
    this.clock = options.clock ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * All notes, most recently updated first regardless of adapter ordering.
   */
  async getAllNotes(): Promise<Note[]> {
    const notes = await this.repository.fetchAll();
    return sortByUpdatedAtDesc(notes);
  }

  async getNote(id: string): Promise<Note | undefined> {
    return this.repository.getById(id);
  }

  async createNote(title: string, content: string): Promise<Note> {
    const trimmedTitle = this.requireTitle(title);
    const note = draftNote(trimmedTitle, content.trim(), {
      now: this.clock(),
      id: this.generateId(),
    });

    const created = await this.repository.create(note);
    logger.debug({ id: created.id }, 'Note created');
    return created;
  }

  async updateNote(note: Note, title: string, content: string): Promise<Note> {
    const trimmedTitle = this.requireTitle(title);
    const revised = reviseNote(note, { title: trimmedTitle, content: content.trim() }, this.clock());

    const updated = await this.repository.update(revised);
    logger.debug({ id: updated.id }, 'Note updated');
    return updated;
  }

  /**
   * A blank query lists every note instead of reaching the adapter's search.
   */
  async searchNotes(query: string): Promise<Note[]> {
    const trimmed = query.trim();
    const notes = trimmed ? await this.repository.search(trimmed) : await this.repository.fetchAll();
    return sortByUpdatedAtDesc(notes);
  }

  async deleteNote(note: Note): Promise<void> {
    await this.repository.delete(note);
    logger.debug({ id: note.id }, 'Note deleted');
  }

  async getNoteStatistics(): Promise<NoteStatistics> {
    const notes = await this.repository.fetchAll();
    const withContent = notes.filter((note) => note.content.length > 0).length;

    return {
      totalNotes: notes.length,
      notesWithContent: withContent,
      notesWithoutContent: notes.length - withContent,
      averageTitleLength: average(notes.map((note) => characterCount(note.title))),
      averageContentLength: average(notes.map((note) => characterCount(note.content))),
    };
  }

  private requireTitle(title: string): string {
    const trimmed = title.trim();
    if (!trimmed) {
      throw RepositoryError.invalidData('title must not be empty');
    }
    return trimmed;
  }
}
