import { RepositoryError } from './errors.js';

/**
 * Tracks in-flight operations of an adapter or store.
 *
 * Closing the scope settles every pending operation with ContextUnavailable;
 * the underlying work may still finish but its result is discarded.
 */
export class OperationScope {
  private closed = false;
  private readonly pending = new Set<(error: RepositoryError) => void>();

  get isClosed(): boolean {
    return this.closed;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  run<T>(task: () => Promise<T> | T): Promise<T> {
    if (this.closed) {
      return Promise.reject(RepositoryError.contextUnavailable());
    }
    return this.track(Promise.resolve().then(task));
  }

  track<T>(operation: Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      if (this.closed) {
        void operation.catch(() => undefined);
        reject(RepositoryError.contextUnavailable());
        return;
      }

      const abandon = (error: RepositoryError) => reject(error);
      this.pending.add(abandon);
      void operation
        .then(resolve, reject)
        .finally(() => this.pending.delete(abandon));
    });
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    const abandoned = Array.from(this.pending);
    this.pending.clear();
    for (const abandon of abandoned) {
      abandon(RepositoryError.contextUnavailable());
    }
  }
}

/**
 * Single-lane executor: tasks run one at a time in submission order.
 */
export class SerialExecutor {
  private tail: Promise<unknown> = Promise.resolve();
  private readonly scope = new OperationScope();

  get isClosed(): boolean {
    return this.scope.isClosed;
  }

  run<T>(task: () => Promise<T> | T): Promise<T> {
    if (this.scope.isClosed) {
      return Promise.reject(RepositoryError.contextUnavailable());
    }

    const queued = this.tail.then(() => {
      if (this.scope.isClosed) {
        throw RepositoryError.contextUnavailable();
      }
      return task();
    });
    this.tail = queued.catch(() => undefined);
    return this.scope.track(queued);
  }

  close(): void {
    this.scope.close();
  }
}
