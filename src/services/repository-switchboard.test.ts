import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Mock } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';

import { isRepositoryError } from '../core/errors.js';
import { LocalNoteRepository } from '../repositories/local-note-repository.js';
import { RemoteNoteRepository } from '../repositories/remote-note-repository.js';
import { LocalNoteStore } from '../storage/local-note-store.js';
import { FakeRecordStore, httpError } from '../testing/fake-record-store.js';
import { RemoteAccount } from '../types/index.js';
import { RepositorySwitchboard } from './repository-switchboard.js';

const account: RemoteAccount = { username: 'alice', password: 'test-secret' };

describe('RepositorySwitchboard', () => {
  let store: LocalNoteStore;
  let records: FakeRecordStore;
  let createRemote: Mock<(account: RemoteAccount) => RemoteNoteRepository>;
  let switchboard: RepositorySwitchboard;

  beforeEach(() => {
    store = LocalNoteStore.inMemory();
    records = new FakeRecordStore();
    createRemote = vi.fn((_account: RemoteAccount) => new RemoteNoteRepository(records));
    switchboard = new RepositorySwitchboard(store, createRemote);
  });

  it('starts on the local store', async () => {
    expect(switchboard.activeKind).toBe('local');

    await switchboard.service.createNote('Local', '');

    await expect(store.perform((tx) => tx.fetch())).resolves.toHaveLength(1);
  });

  it('switches to the remote store after setting up its zone', async () => {
    await switchboard.switchToRemote(account);

    expect(createRemote).toHaveBeenCalledWith(account);
    expect(records.zones.has('notes')).toBe(true);
    expect(switchboard.activeKind).toBe('remote');

    await switchboard.service.createNote('Remote', '');
    expect(records.records.map((record) => record.title)).toEqual(['Remote']);
  });

  it('keeps local notes across a round trip through the remote store', async () => {
    await switchboard.service.createNote('Local note', '');

    await switchboard.switchToRemote(account);
    await expect(switchboard.service.getAllNotes()).resolves.toEqual([]);

    await switchboard.switchToLocal();
    const notes = await switchboard.service.getAllNotes();

    expect(switchboard.activeKind).toBe('local');
    expect(notes.map((note) => note.title)).toEqual(['Local note']);
  });

  it('stays local when the remote setup fails', async () => {
    records.failNext('ensureZone', httpError(401, 'Name or password is incorrect.'));
    const localRepository = switchboard.repository;

    await expect(switchboard.switchToRemote(account)).rejects.toSatisfy((error) =>
      isRepositoryError(error, 'SaveFailed')
    );

    expect(switchboard.activeKind).toBe('local');
    expect(switchboard.repository).toBe(localRepository);
    await expect(switchboard.service.createNote('Still local', '')).resolves.toMatchObject({ title: 'Still local' });
  });

  it('treats a second switch to remote as a no-op', async () => {
    await switchboard.switchToRemote(account);
    const remote = switchboard.repository;

    await switchboard.switchToRemote(account);

    expect(createRemote).toHaveBeenCalledTimes(1);
    expect(switchboard.repository).toBe(remote);
  });

  it('disposes the adapter it replaces', async () => {
    const localRepository = switchboard.repository;

    await switchboard.switchToRemote(account);

    await expect(localRepository.fetchAll()).rejects.toSatisfy((error) =>
      isRepositoryError(error, 'ContextUnavailable')
    );
  });

  it('runs transitions one at a time in call order', async () => {
    const toRemote = switchboard.switchToRemote(account);
    const toLocal = switchboard.switchToLocal();

    await Promise.all([toRemote, toLocal]);

    expect(switchboard.activeKind).toBe('local');
    expect(createRemote).toHaveBeenCalledTimes(1);
    const [remote] = createRemote.mock.results;
    if (remote?.type !== 'return') {
      throw new Error('remote adapter was not created');
    }
    await expect(remote.value.fetchAll()).rejects.toSatisfy((error) =>
      isRepositoryError(error, 'ContextUnavailable')
    );
  });

  it('checks remote availability without switching', async () => {
    await expect(switchboard.checkRemoteStatus(account)).resolves.toBe('available');

    records.sessionError = httpError(401, 'unauthorized');
    await expect(switchboard.checkRemoteStatus(account)).resolves.toBe('noAccount');

    expect(switchboard.activeKind).toBe('local');
    expect(records.zones.size).toBe(0);
  });

  it('rejects work and transitions after dispose', async () => {
    const service = switchboard.service;

    switchboard.dispose();

    await expect(service.getAllNotes()).rejects.toSatisfy((error) =>
      isRepositoryError(error, 'ContextUnavailable')
    );
    await expect(switchboard.switchToLocal()).rejects.toSatisfy((error) =>
      isRepositoryError(error, 'ContextUnavailable')
    );
  });
});

describe('RepositorySwitchboard over a file-backed store', () => {
  let testDir: string;
  let filePath: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'notes-switchboard-'));
    filePath = path.join(testDir, 'notes.json');
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('completes a create that was already writing when the store is switched', async () => {
    const store = await LocalNoteStore.open(filePath);
    const titles: string[] = [];

    for (const ticks of [0, 5, 20, 40]) {
      const switchboard = new RepositorySwitchboard(store, () => new RemoteNoteRepository(new FakeRecordStore()));
      const title = `Racing ${ticks}`;
      titles.push(title);

      const creating = switchboard.service.createNote(title, '');
      for (let tick = 0; tick < ticks; tick += 1) {
        await Promise.resolve();
      }
      await switchboard.switchToLocal();

      await expect(creating).resolves.toMatchObject({ title });
      await expect(switchboard.service.searchNotes(title)).resolves.toHaveLength(1);
    }
    store.close();

    const reopened = await LocalNoteStore.open(filePath);
    const stored = await new LocalNoteRepository(reopened).fetchAll();
    expect(stored.map((note) => note.title).sort()).toEqual([...titles].sort());
  });
});
