import { promises as fs } from 'fs';
import path from 'path';

import { errorCodeOf } from '../core/errors.js';
import logger from '../utils/logger.js';

export const STORE_FILE_VERSION = 1;

export interface SerializedNoteRecord {
  pk: number;
  id: string;
  title: string;
  content: string;
  createdAt: string;
  updatedAt: string;
}

export interface StoreSnapshot {
  version: number;
  nextPk: number;
  records: SerializedNoteRecord[];
}

function isString(value: unknown): value is string {
  return typeof value === 'string';
}

function isTimestamp(value: unknown): value is string {
  return isString(value) && !Number.isNaN(new Date(value).getTime());
}

function isRecordObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseRecord(raw: unknown, index: number): SerializedNoteRecord {
  if (
    !isRecordObject(raw) ||
    typeof raw.pk !== 'number' ||
    !isString(raw.id) ||
    !isString(raw.title) ||
    !isString(raw.content) ||
    !isTimestamp(raw.createdAt) ||
    !isTimestamp(raw.updatedAt)
  ) {
    throw new Error(`Malformed note record at index ${index}`);
  }
  return {
    pk: raw.pk,
    id: raw.id,
    title: raw.title,
    content: raw.content,
    createdAt: raw.createdAt,
    updatedAt: raw.updatedAt,
  };
}

export function parseSnapshot(json: string): StoreSnapshot {
  const parsed: unknown = JSON.parse(json);
  if (!isRecordObject(parsed) || parsed.version !== STORE_FILE_VERSION) {
    throw new Error('Unsupported store file format');
  }
  if (typeof parsed.nextPk !== 'number' || !Array.isArray(parsed.records)) {
    throw new Error('Malformed store file');
  }
  return {
    version: STORE_FILE_VERSION,
    nextPk: parsed.nextPk,
    records: parsed.records.map((record, index) => parseRecord(record, index)),
  };
}

/**
 * JSON file holding a local store snapshot.
 * Writes go to a sibling temp file which is then renamed over the target,
 * so readers only ever see a complete snapshot.
 */
export class StoreFile {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  async load(): Promise<StoreSnapshot | undefined> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (errorCodeOf(error) === 'ENOENT') {
        logger.debug({ filePath: this.filePath }, 'Store file not found, starting empty');
        return undefined;
      }
      logger.error({ error, filePath: this.filePath }, 'Failed to read store file');
      throw error;
    }

    try {
      const snapshot = parseSnapshot(content);
      logger.debug({ filePath: this.filePath, records: snapshot.records.length }, 'Store file loaded');
      return snapshot;
    } catch (error) {
      logger.error({ error, filePath: this.filePath }, 'Failed to parse store file');
      throw error;
    }
  }

  async save(snapshot: StoreSnapshot): Promise<void> {
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tempPath, JSON.stringify(snapshot, null, 2), 'utf-8');
      await fs.rename(tempPath, this.filePath);
      logger.debug({ filePath: this.filePath, records: snapshot.records.length }, 'Store file saved');
    } catch (error) {
      logger.error({ error, filePath: this.filePath }, 'Failed to save store file');
      await fs.rm(tempPath, { force: true });
      throw error;
    }
  }
}
