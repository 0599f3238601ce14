import { describe, it, expect } from 'vitest';
import { clampToCreation, compareByUpdatedAtDesc, draftNote, makeNote, reviseNote } from './note.js';

const created = new Date('2024-03-01T10:00:00.000Z');

describe('draftNote', () => {
  it('uses one timestamp for creation and update', () => {
    const note = draftNote('Title', 'Body', { now: created, id: 'n1' });

    expect(note).toEqual({ id: 'n1', title: 'Title', content: 'Body', createdAt: created, updatedAt: created });
  });

  it('generates a UUID when no id is given', () => {
    const note = draftNote('Title', '');

    expect(note.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });

  it('produces frozen values', () => {
    const note = draftNote('Title', 'Body', { now: created, id: 'n1' });

    expect(Object.isFrozen(note)).toBe(true);
  });
});

describe('makeNote', () => {
  it('copies dates so later mutation of the input is not observed', () => {
    const updatedAt = new Date('2024-03-02T10:00:00.000Z');
    const note = makeNote({ id: 'n1', title: 't', content: 'c', createdAt: created, updatedAt });

    updatedAt.setFullYear(2030);

    expect(note.updatedAt.toISOString()).toBe('2024-03-02T10:00:00.000Z');
  });
});

describe('reviseNote', () => {
  it('keeps id and createdAt and moves updatedAt', () => {
    const note = draftNote('Old', 'old body', { now: created, id: 'n1' });
    const later = new Date('2024-03-05T08:30:00.000Z');

    const revised = reviseNote(note, { title: 'New', content: 'new body' }, later);

    expect(revised).toEqual({ id: 'n1', title: 'New', content: 'new body', createdAt: created, updatedAt: later });
    expect(note.title).toBe('Old');
  });

  it('never moves updatedAt before createdAt', () => {
    const note = draftNote('Old', '', { now: created, id: 'n1' });

    const revised = reviseNote(note, { title: 'New', content: '' }, new Date('2020-01-01T00:00:00.000Z'));

    expect(revised.updatedAt.getTime()).toBe(created.getTime());
  });
});

describe('clampToCreation', () => {
  it('returns the later of the two timestamps', () => {
    const later = new Date('2024-03-02T00:00:00.000Z');

    expect(clampToCreation(later, created)).toBe(later);
    expect(clampToCreation(new Date(0), created)).toBe(created);
  });
});

describe('compareByUpdatedAtDesc', () => {
  it('orders the most recently updated first', () => {
    const older = draftNote('a', '', { now: new Date('2024-01-01T00:00:00.000Z'), id: 'a' });
    const newer = draftNote('b', '', { now: new Date('2024-02-01T00:00:00.000Z'), id: 'b' });

    expect([older, newer].sort(compareByUpdatedAtDesc).map((note) => note.id)).toEqual(['b', 'a']);
  });
});
