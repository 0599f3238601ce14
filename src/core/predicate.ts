/**
 * Store-agnostic record predicates.
 *
 * Both stores accept the same small predicate language: the local store
 * evaluates it in process, the CouchDB client compiles it to a Mango selector.
 */

export type RecordField = 'id' | 'title' | 'content';

export type RecordPredicate =
  | { type: 'all' }
  | { type: 'equals'; field: RecordField; value: string }
  | { type: 'contains'; field: RecordField; value: string }
  | { type: 'or'; predicates: RecordPredicate[] };

export interface SortDescriptor {
  field: 'updatedAt';
  descending: boolean;
}

export interface RecordQuery {
  predicate: RecordPredicate;
  sort?: SortDescriptor;
  limit?: number;
}

export type PredicateSubject = Record<RecordField, string>;

export type MangoValue = string | number | boolean | null | MangoSelectorFragment | MangoSelectorFragment[];

/** Mango selector fragment; structurally compatible with nano's MangoSelector. */
export interface MangoSelectorFragment {
  [key: string]: MangoValue;
}

export const matchAll: RecordPredicate = { type: 'all' };

export const UPDATED_AT_DESC: SortDescriptor = { field: 'updatedAt', descending: true };

export function equals(field: RecordField, value: string): RecordPredicate {
  return { type: 'equals', field, value };
}

/** Substring match ignoring case and diacritics. */
export function contains(field: RecordField, value: string): RecordPredicate {
  return { type: 'contains', field, value };
}

export function or(...predicates: RecordPredicate[]): RecordPredicate {
  return { type: 'or', predicates };
}

/**
 * Predicate used by full-text search: query in title OR content.
 */
export function titleOrContentContains(query: string): RecordPredicate {
  return or(contains('title', query), contains('content', query));
}

/**
 * Lowercases and strips combining marks, so "Café" and "cafe" compare equal.
 */
export function foldForSearch(text: string): string {
  return text.normalize('NFD').replace(/\p{M}/gu, '').toLowerCase();
}

export function evaluatePredicate(predicate: RecordPredicate, subject: PredicateSubject): boolean {
  switch (predicate.type) {
    case 'all':
      return true;
    case 'equals':
      return subject[predicate.field] === predicate.value;
    case 'contains':
      return foldForSearch(subject[predicate.field]).includes(foldForSearch(predicate.value));
    case 'or':
      return predicate.predicates.some((inner) => evaluatePredicate(inner, subject));
  }
}

export function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Mango regexes only ignore case; diacritics still have to match on the
 * remote store.
 */
export function toMangoSelector(predicate: RecordPredicate): MangoSelectorFragment {
  switch (predicate.type) {
    case 'all':
      return {};
    case 'equals':
      return { [predicate.field]: { $eq: predicate.value } };
    case 'contains':
      return { [predicate.field]: { $regex: `(?i)${escapeRegex(predicate.value)}` } };
    case 'or':
      return { $or: predicate.predicates.map((inner) => toMangoSelector(inner)) };
  }
}
