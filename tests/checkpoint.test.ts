import { CheckpointController } from '../server/checkpoint/checkpoint-controller';
import { SqliteCheckpointStore } from '../server/checkpoint/sqlite-checkpoint-store';
import { CheckpointWriteError } from '../server/utils/error-types';
import { FlakyStore, makeRecord } from './helpers/records';

const options = { flushEvery: 3, flushRetryAttempts: 3, flushRetryDelayMs: 1 };

describe('SqliteCheckpointStore', () => {
  let store: SqliteCheckpointStore;

  beforeEach(() => {
    store = SqliteCheckpointStore.open(':memory:', 'test-run');
  });

  afterEach(async () => {
    await store.close();
  });

  it('starts fresh at position -1', async () => {
    expect(await store.load()).toEqual({ lastCompletedIndex: -1, total: null, finishedAt: null });
    expect(await store.listRecords()).toEqual([]);
  });

  it('reproduces the last commit and orders records by position', async () => {
    await store.commit({
      lastCompletedIndex: 1,
      records: [
        { position: 1, record: makeRecord('b') },
        { position: 0, record: makeRecord('a') },
      ],
    });

    expect((await store.load()).lastCompletedIndex).toBe(1);
    expect((await store.listRecords()).map((record) => record.objectId)).toEqual(['a', 'b']);
  });

  it('replaces a record committed twice for the same object', async () => {
    await store.commit({ lastCompletedIndex: 0, records: [{ position: 0, record: makeRecord('a') }] });
    await store.commit({
      lastCompletedIndex: 0,
      records: [{ position: 0, record: makeRecord('a', { status: 'partial', notes: ['no_images'] }) }],
    });

    const records = await store.listRecords();
    expect(records).toHaveLength(1);
    expect(records[0].status).toBe('partial');
    expect(records[0].notes).toEqual(['no_images']);
    expect(await store.countRecords()).toBe(1);
  });

  it('marks the run finished', async () => {
    await store.markFinished(12);

    const state = await store.load();
    expect(state.total).toBe(12);
    expect(state.finishedAt).not.toBeNull();
  });
});

describe('CheckpointController', () => {
  let store: SqliteCheckpointStore;

  beforeEach(() => {
    store = SqliteCheckpointStore.open(':memory:');
  });

  afterEach(async () => {
    await store.close();
  });

  it('skips positions at or below the restored index', async () => {
    await store.commit({ lastCompletedIndex: 4, records: [] });
    const controller = await CheckpointController.open(store, options);

    expect(controller.getLastCompletedIndex()).toBe(4);
    expect(controller.shouldProcess('x', 4)).toBe(false);
    expect(controller.shouldProcess('y', 5)).toBe(true);
  });

  it('writes only once the buffer reaches the flush cadence', async () => {
    const controller = await CheckpointController.open(store, options);

    controller.record('a', 0, makeRecord('a'));
    controller.record('b', 1, makeRecord('b'));
    expect(await controller.flush()).toBe(false);
    expect(await store.countRecords()).toBe(0);

    controller.record('c', 2, makeRecord('c'));
    expect(await controller.flush()).toBe(true);
    expect(controller.getPendingCount()).toBe(0);
    expect(controller.getPersistedIndex()).toBe(2);
    expect((await store.load()).lastCompletedIndex).toBe(2);
    expect(await store.countRecords()).toBe(3);
  });

  it('flushes a short buffer when forced and does nothing when there is nothing new', async () => {
    const controller = await CheckpointController.open(store, options);
    controller.record('a', 0, makeRecord('a'));

    expect(await controller.flush(true)).toBe(true);
    expect(await controller.flush(true)).toBe(false);
  });

  it('ignores a second record for a pending object', async () => {
    const controller = await CheckpointController.open(store, options);
    controller.record('a', 0, makeRecord('a'));
    controller.record('a', 1, makeRecord('a'));

    expect(controller.getPendingCount()).toBe(1);
    expect(controller.getLastCompletedIndex()).toBe(0);
  });

  it('retries a failed write', async () => {
    const flaky = new FlakyStore(store, 2);
    const controller = await CheckpointController.open(flaky, options);
    controller.record('a', 0, makeRecord('a'));

    expect(await controller.flush(true)).toBe(true);
    expect(flaky.commitCalls).toBe(3);
    expect(await store.countRecords()).toBe(1);
  });

  it('raises CheckpointWriteError and keeps the buffer when every attempt fails', async () => {
    const flaky = new FlakyStore(store, 10);
    const controller = await CheckpointController.open(flaky, options);
    controller.record('a', 0, makeRecord('a'));

    const failure = controller.flush(true);
    await expect(failure).rejects.toBeInstanceOf(CheckpointWriteError);
    await expect(failure).rejects.toMatchObject({ attempts: 3 });
    expect(flaky.commitCalls).toBe(3);
    expect(controller.getPendingCount()).toBe(1);
    expect(controller.getPersistedIndex()).toBe(-1);

    flaky.failures = 0;
    expect(await controller.flush(true)).toBe(true);
    expect(await store.countRecords()).toBe(1);
  });

  it('retire flushes the remainder and marks the run finished', async () => {
    const controller = await CheckpointController.open(store, options);
    controller.record('a', 0, makeRecord('a'));

    await controller.retire(1);

    const state = await store.load();
    expect(state.lastCompletedIndex).toBe(0);
    expect(state.total).toBe(1);
    expect(state.finishedAt).not.toBeNull();
  });
});
