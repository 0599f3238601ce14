import { SerialExecutor } from '../core/execution.js';
import { LocalNoteRepository } from '../repositories/local-note-repository.js';
import type { NoteRepository } from '../repositories/note-repository.js';
import type { RemoteNoteRepository } from '../repositories/remote-note-repository.js';
import type { LocalNoteStore } from '../storage/local-note-store.js';
import { AccountStatus, RemoteAccount, StoreKind } from '../types/index.js';
import logger from '../utils/logger.js';
import { NotesService } from './notes-service.js';

export type RemoteRepositoryFactory = (account: RemoteAccount) => RemoteNoteRepository;

export type ActiveRepository =
  | { kind: 'local'; repository: LocalNoteRepository }
  | { kind: 'remote'; repository: RemoteNoteRepository };

export interface RepositorySwitchboardOptions {
  clock?: () => Date;
}

/**
 * Owns the active note repository and the NotesService built over it.
 *
 * Starts on the local store. Switching to the remote store only takes effect
 * once the remote zone is set up; until then the local adapter stays active.
 * Transitions run one at a time.
 */
export class RepositorySwitchboard {
  private active: ActiveRepository;
  private currentService: NotesService;
  private readonly transitions = new SerialExecutor();
  private readonly clock?: () => Date;

  constructor(
    private readonly localStore: LocalNoteStore,
    private readonly createRemote: RemoteRepositoryFactory,
    options: RepositorySwitchboardOptions = {}
  ) {
    this.clock = options.clock;
    this.active = { kind: 'local', repository: this.createLocal() };
    this.currentService = this.buildService(this.active.repository);
  }

  get activeKind(): StoreKind {
    return this.active.kind;
  }

  get repository(): NoteRepository {
    return this.active.repository;
  }

  get service(): NotesService {
    return this.currentService;
  }

  switchToRemote(account: RemoteAccount): Promise<void> {
    return this.transitions.run(async () => {
      if (this.active.kind === 'remote') {
        logger.debug('Remote store already active');
        return;
      }

      const candidate = this.createRemote(account);
      try {
        await candidate.setup();
      } catch (error) {
        candidate.dispose();
        logger.error({ error, username: account.username }, 'Switch to remote store failed');
        throw error;
      }

      this.activate({ kind: 'remote', repository: candidate });
    });
  }

  switchToLocal(): Promise<void> {
    return this.transitions.run(() => {
      this.activate({ kind: 'local', repository: this.createLocal() });
    });
  }

  /**
   * Availability of a remote account, checked with a throwaway adapter so the
   * active repository is left alone.
   */
  async checkRemoteStatus(account: RemoteAccount): Promise<AccountStatus> {
    const probe = this.createRemote(account);
    try {
      return await probe.checkAccountStatus();
    } finally {
      probe.dispose();
    }
  }

  dispose(): void {
    this.transitions.close();
    this.active.repository.dispose();
  }

  /**
   * A replaced local adapter still finishes the unit of work its store has
   * started. A replaced remote adapter abandons its pending requests.
   */
  private activate(next: ActiveRepository): void {
    const previous = this.active;
    this.active = next;
    this.currentService = this.buildService(next.repository);
    previous.repository.dispose();

    logger.info({ from: previous.kind, to: next.kind }, 'Note store switched');
  }

  private createLocal(): LocalNoteRepository {
    return new LocalNoteRepository(this.localStore, { clock: this.clock });
  }

  private buildService(repository: NoteRepository): NotesService {
    return new NotesService(repository, { clock: this.clock });
  }
}
