import { SerialExecutor } from '../core/execution.js';
import { evaluatePredicate, matchAll, RecordQuery } from '../core/predicate.js';
import type { LocalStoreConfig } from '../types/index.js';
import logger from '../utils/logger.js';
import { STORE_FILE_VERSION, StoreFile, StoreSnapshot } from './store-file.js';

/**
 * A note row inside the local store. `pk` is the store-assigned key and is
 * never exposed past the local adapter.
 */
export interface LocalNoteRecord {
  readonly pk: number;
  readonly id: string;
  readonly title: string;
  readonly content: string;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export type LocalNoteValues = Omit<LocalNoteRecord, 'pk'>;

export type LocalNoteChanges = Partial<Pick<LocalNoteRecord, 'title' | 'content' | 'updatedAt'>>;

export class DuplicateNoteIdError extends Error {
  constructor(id: string) {
    super(`A note with id ${id} already exists`);
    this.name = 'DuplicateNoteIdError';
  }
}

function freezeRecord(record: LocalNoteRecord): LocalNoteRecord {
  return Object.freeze({ ...record });
}

/**
 * Unit of work handed to `LocalNoteStore.perform`.
 * Mutations are staged on a private copy of the store and only become
 * visible once the whole unit has been persisted.
 */
export class StoreTransaction {
  private changed = false;
  private active = true;

  constructor(
    private readonly records: Map<number, LocalNoteRecord>,
    private nextPk: number
  ) {}

  get hasChanges(): boolean {
    return this.changed;
  }

  fetch(request: RecordQuery = { predicate: matchAll }): LocalNoteRecord[] {
    this.assertActive();
    const matched = Array.from(this.records.values()).filter((record) =>
      evaluatePredicate(request.predicate, record)
    );
    const sort = request.sort;
    if (sort) {
      const direction = sort.descending ? -1 : 1;
      matched.sort((a, b) => direction * (a[sort.field].getTime() - b[sort.field].getTime()));
    }
    return request.limit === undefined ? matched : matched.slice(0, request.limit);
  }

  insert(values: LocalNoteValues): LocalNoteRecord {
    this.assertActive();
    for (const existing of this.records.values()) {
      if (existing.id === values.id) {
        throw new DuplicateNoteIdError(values.id);
      }
    }
    const record = freezeRecord({ ...values, pk: this.nextPk++ });
    this.records.set(record.pk, record);
    this.changed = true;
    return record;
  }

  update(pk: number, changes: LocalNoteChanges): LocalNoteRecord {
    this.assertActive();
    const existing = this.records.get(pk);
    if (!existing) {
      throw new Error(`No record with key ${pk}`);
    }
    const record = freezeRecord({ ...existing, ...changes });
    this.records.set(pk, record);
    this.changed = true;
    return record;
  }

  delete(pk: number): void {
    this.deleteMany([pk]);
  }

  /**
   * Batch delete. Always marks the transaction dirty so the resulting state
   * is written even when nothing matched.
   */
  deleteMany(pks: number[]): void {
    this.assertActive();
    for (const pk of pks) {
      this.records.delete(pk);
    }
    this.changed = true;
  }

  get staged(): { records: Map<number, LocalNoteRecord>; nextPk: number } {
    return { records: this.records, nextPk: this.nextPk };
  }

  finish(): void {
    this.active = false;
  }

  private assertActive(): void {
    if (!this.active) {
      throw new Error('Transaction already finished');
    }
  }
}

/**
 * Process-local note store.
 *
 * All access is funnelled through one serial executor, so concurrent callers
 * never interleave inside a unit of work. Durable stores persist every
 * committed unit to a JSON snapshot; volatile stores keep state in memory only.
 */
export class LocalNoteStore {
  private records = new Map<number, LocalNoteRecord>();
  private nextPk = 1;
  private readonly executor = new SerialExecutor();

  private constructor(private readonly file?: StoreFile) {}

  static async open(filePath: string): Promise<LocalNoteStore> {
    const file = new StoreFile(filePath);
    const store = new LocalNoteStore(file);
    const snapshot = await file.load();
    if (snapshot) {
      store.restore(snapshot);
    }
    logger.info({ filePath: file.filePath, records: store.records.size }, 'Local note store opened');
    return store;
  }

  /**
   * The store described by the configuration, emptied first when
   * `resetOnLaunch` is set.
   */
  static async fromConfig(config: LocalStoreConfig): Promise<LocalNoteStore> {
    const store = config.inMemory ? LocalNoteStore.inMemory() : await LocalNoteStore.open(config.path);
    if (config.resetOnLaunch) {
      await store.reset();
    }
    return store;
  }

  static inMemory(): LocalNoteStore {
    logger.debug('Volatile local note store created');
    return new LocalNoteStore();
  }

  get isVolatile(): boolean {
    return this.file === undefined;
  }

  get isClosed(): boolean {
    return this.executor.isClosed;
  }

  /**
   * Run `work` as one unit on the store's execution context.
   * Throwing from `work` discards every staged change.
   */
  perform<T>(work: (transaction: StoreTransaction) => T | Promise<T>): Promise<T> {
    return this.executor.run(async () => {
      const transaction = new StoreTransaction(new Map(this.records), this.nextPk);
      let result: T;
      try {
        result = await work(transaction);
      } finally {
        transaction.finish();
      }

      if (transaction.hasChanges) {
        const { records, nextPk } = transaction.staged;
        if (this.file) {
          await this.file.save(this.toSnapshot(records, nextPk));
        }
        this.records = records;
        this.nextPk = nextPk;
      }
      return result;
    });
  }

  /**
   * Delete every note and persist the empty state. Test setup only.
   */
  async reset(): Promise<number> {
    const removed = await this.perform((transaction) => {
      const all = transaction.fetch();
      transaction.deleteMany(all.map((record) => record.pk));
      return all.length;
    });
    logger.info({ removed, volatile: this.isVolatile }, 'Local note store reset');
    return removed;
  }

  close(): void {
    if (!this.executor.isClosed) {
      this.executor.close();
      logger.info({ volatile: this.isVolatile }, 'Local note store closed');
    }
  }

  private restore(snapshot: StoreSnapshot): void {
    const records = new Map<number, LocalNoteRecord>();
    let highest = 0;
    for (const raw of snapshot.records) {
      records.set(
        raw.pk,
        freezeRecord({
          pk: raw.pk,
          id: raw.id,
          title: raw.title,
          content: raw.content,
          createdAt: new Date(raw.createdAt),
          updatedAt: new Date(raw.updatedAt),
        })
      );
      highest = Math.max(highest, raw.pk);
    }
    this.records = records;
    this.nextPk = Math.max(snapshot.nextPk, highest + 1);
  }

  private toSnapshot(records: Map<number, LocalNoteRecord>, nextPk: number): StoreSnapshot {
    return {
      version: STORE_FILE_VERSION,
      nextPk,
      records: Array.from(records.values()).map((record) => ({
        pk: record.pk,
        id: record.id,
        title: record.title,
        content: record.content,
        createdAt: record.createdAt.toISOString(),
        updatedAt: record.updatedAt.toISOString(),
      })),
    };
  }
}
