import { randomUUID } from 'node:crypto';

import type { Note } from '../types/index.js';

export function makeNote(fields: Note): Note {
  return Object.freeze({
    id: fields.id,
    title: fields.title,
    content: fields.content,
    createdAt: new Date(fields.createdAt.getTime()),
    updatedAt: new Date(fields.updatedAt.getTime()),
  });
}

/**
 * Build a brand new note with a fresh id and matching timestamps.
 */
export function draftNote(
  title: string,
  content: string,
  options: { now?: Date; id?: string } = {}
): Note {
  const now = options.now ?? new Date();
  return makeNote({
    id: options.id ?? randomUUID(),
    title,
    content,
    createdAt: now,
    updatedAt: now,
  });
}

/**
 * Produce the edited version of a note. `id` and `createdAt` carry over and
 * `updatedAt` never falls behind `createdAt`.
 */
export function reviseNote(
  note: Note,
  changes: { title: string; content: string },
  now: Date = new Date()
): Note {
  return makeNote({
    ...note,
    title: changes.title,
    content: changes.content,
    updatedAt: clampToCreation(now, note.createdAt),
  });
}

export function clampToCreation(timestamp: Date, createdAt: Date): Date {
  return timestamp.getTime() < createdAt.getTime() ? createdAt : timestamp;
}

export function compareByUpdatedAtDesc(a: Note, b: Note): number {
  return b.updatedAt.getTime() - a.updatedAt.getTime();
}
