import fs from 'fs';
import os from 'os';
import path from 'path';
import { CheckpointController } from '../server/checkpoint/checkpoint-controller';
import { SqliteCheckpointStore } from '../server/checkpoint/sqlite-checkpoint-store';
import { BatchOrchestrator } from '../server/orchestrator';
import type { ObjectProcessor, PipelineOutcome, PipelineResult } from '../server/types';
import { CheckpointWriteError } from '../server/utils/error-types';
import { FailedObjectsLogger } from '../server/utils/failed-objects-logger';
import { FlakyStore, makeRecord } from './helpers/records';

class ScriptedProcessor implements ObjectProcessor {
  calls: string[] = [];

  constructor(
    private readonly crashOn?: string,
    private readonly outcomes: Record<string, PipelineOutcome> = {},
  ) {}

  async process(objectId: string): Promise<PipelineResult> {
    this.calls.push(objectId);
    if (objectId === this.crashOn) {
      throw new Error('simulated crash');
    }
    const outcome = this.outcomes[objectId] ?? 'complete';
    const status = outcome === 'complete' ? 'complete' : outcome === 'degraded' ? 'partial' : 'extraction_error';
    return {
      outcome,
      record: makeRecord(objectId, {
        status,
        notes: outcome === 'degraded' ? ['no_images'] : [],
        error: outcome === 'error' ? 'boom' : null,
      }),
    };
  }
}

const IDS = ['1', '2', '3', '4', '5', '6', '7', '8', '9', '10'];
const options = { flushEvery: 7, flushRetryAttempts: 2, flushRetryDelayMs: 1 };

describe('BatchOrchestrator', () => {
  let store: SqliteCheckpointStore;

  beforeEach(() => {
    store = SqliteCheckpointStore.open(':memory:');
  });

  afterEach(async () => {
    await store.close();
  });

  it('resumes at object 8 after an interruption following the flush of object 7', async () => {
    const crashing = new ScriptedProcessor('8');
    const first = new BatchOrchestrator({
      pipeline: crashing,
      controller: await CheckpointController.open(store, options),
    });
    await expect(first.run(IDS)).rejects.toThrow('simulated crash');
    expect((await store.load()).lastCompletedIndex).toBe(6);

    const resumed = new ScriptedProcessor();
    const second = new BatchOrchestrator({
      pipeline: resumed,
      controller: await CheckpointController.open(store, options),
    });
    const summary = await second.run(IDS);

    expect(resumed.calls).toEqual(['8', '9', '10']);
    expect(summary).toEqual({
      processed: 3,
      skipped: 7,
      complete: 3,
      degraded: 0,
      errors: 0,
      lastCompletedIndex: 9,
      interrupted: false,
    });
    expect((await store.listRecords()).map((record) => record.objectId)).toEqual(IDS);
  });

  it('honours the start offset and limit', async () => {
    const processor = new ScriptedProcessor();
    const orchestrator = new BatchOrchestrator({
      pipeline: processor,
      controller: await CheckpointController.open(store, options),
    });

    const summary = await orchestrator.run(IDS, { startOffset: 2, limit: 3 });

    expect(processor.calls).toEqual(['3', '4', '5']);
    expect(summary.lastCompletedIndex).toBe(4);
    expect((await store.load()).finishedAt).toBeNull();
  });

  it('clamps an offset past the end', async () => {
    const processor = new ScriptedProcessor();
    const orchestrator = new BatchOrchestrator({
      pipeline: processor,
      controller: await CheckpointController.open(store, options),
    });

    const summary = await orchestrator.run(IDS, { startOffset: 50 });

    expect(processor.calls).toEqual([]);
    expect(summary.processed).toBe(0);
  });

  it('stops before the next object once aborted and keeps what was done', async () => {
    const abort = new AbortController();
    const processor: ObjectProcessor = {
      async process(objectId) {
        if (objectId === '2') abort.abort();
        return { outcome: 'complete', record: makeRecord(objectId) };
      },
    };
    const orchestrator = new BatchOrchestrator({
      pipeline: processor,
      controller: await CheckpointController.open(store, options),
    });

    const summary = await orchestrator.run(IDS, { signal: abort.signal });

    expect(summary.interrupted).toBe(true);
    expect(summary.processed).toBe(2);
    expect((await store.listRecords()).map((record) => record.objectId)).toEqual(['1', '2']);
    expect((await store.load()).lastCompletedIndex).toBe(1);
  });

  it('counts outcomes and logs degraded objects', async () => {
    const logDir = fs.mkdtempSync(path.join(os.tmpdir(), 'failed-'));
    try {
      const orchestrator = new BatchOrchestrator({
        pipeline: new ScriptedProcessor(undefined, { '2': 'degraded', '3': 'error' }),
        controller: await CheckpointController.open(store, options),
        runName: 'swords',
        failedObjects: new FailedObjectsLogger(logDir),
      });

      const summary = await orchestrator.run(['1', '2', '3']);

      expect(summary).toMatchObject({ processed: 3, complete: 1, degraded: 1, errors: 1 });
      const log = fs.readFileSync(path.join(logDir, 'failed-objects.txt'), 'utf-8');
      expect(log).toContain('RUN: swords');
      expect(log).toContain('[1/2] Object ID: 2');
      expect(log).toContain('Reasons: no_images');
      expect(log).toContain('[2/2] Object ID: 3');
      expect(log).toContain('Reasons: boom');
    } finally {
      fs.rmSync(logDir, { recursive: true, force: true });
    }
  });

  it('halts when the checkpoint cannot be written', async () => {
    const processor = new ScriptedProcessor();
    const orchestrator = new BatchOrchestrator({
      pipeline: processor,
      controller: await CheckpointController.open(new FlakyStore(store, 100), { ...options, flushEvery: 2 }),
    });

    await expect(orchestrator.run(IDS)).rejects.toBeInstanceOf(CheckpointWriteError);
    expect(processor.calls).toEqual(['1', '2']);
  });
});
