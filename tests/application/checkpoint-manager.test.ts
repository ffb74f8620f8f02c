import { describe, it, expect, beforeEach } from 'vitest';
import type { MergeReceipt } from '../../src/domain/index.js';
import { CheckpointCommitError, CheckpointOrderError } from '../../src/domain/index.js';
import { CheckpointManager } from '../../src/application/index.js';
import { InMemoryCheckpointStore } from '../../src/infrastructure/memory/index.js';
import { FAST_RETRY, FIXED_NOW, fakeLogger, noSleep, silentLogger } from '../helpers.js';

function receipt(batch_id: number): MergeReceipt {
  return {
    batch_id,
    merge_version: batch_id,
    rows_inserted: 1,
    rows_updated: 0,
    rows_unchanged: 0,
    attempts: 1,
    committed: true,
    committed_at: new Date(FIXED_NOW),
  };
}

function managerFor(store: InMemoryCheckpointStore, log = silentLogger()): CheckpointManager {
  return new CheckpointManager(store, log, {
    pipelineId: 'test-pipeline',
    retry: FAST_RETRY,
    sleep: noSleep,
    now: () => FIXED_NOW,
  });
}

describe('CheckpointManager', () => {
  let store: InMemoryCheckpointStore;
  let manager: CheckpointManager;

  beforeEach(async () => {
    store = new InMemoryCheckpointStore();
    manager = managerFor(store);
    await manager.recover();
  });

  it('starts from the initial checkpoint', () => {
    expect(manager.current()).toEqual({ offsets: {}, batch_id: 0, committed_at: null });
    expect(manager.nextBatchId()).toBe(1);
  });

  it('commits the next batch and persists it', async () => {
    const checkpoint = await manager.commit(receipt(1), { 'events:0': '3-0' });

    expect(checkpoint).toEqual({
      offsets: { 'events:0': '3-0' },
      batch_id: 1,
      committed_at: new Date(FIXED_NOW),
    });
    expect(await store.load('test-pipeline')).toEqual(checkpoint);
    expect(manager.nextBatchId()).toBe(2);
  });

  it('rejects a receipt that is not for the next batch', async () => {
    await expect(manager.commit(receipt(2), {})).rejects.toBeInstanceOf(CheckpointOrderError);
    await manager.commit(receipt(1), {});
    await expect(manager.commit(receipt(1), {})).rejects.toMatchObject({ expected: 2, received: 1 });
    expect(store.saveCount()).toBe(1);
  });

  it('never moves a partition offset backwards', async () => {
    await manager.commit(receipt(1), { 'events:0': '10-0', 'events:1': '2-0' });
    const second = await manager.commit(receipt(2), { 'events:0': '9-0', 'events:1': '5-0' });

    expect(second.offsets).toEqual({ 'events:0': '10-0', 'events:1': '5-0' });
  });

  it('retries a failed save', async () => {
    store.failNext(new Error('connection reset'));

    await manager.commit(receipt(1), { 'events:0': '1-0' });

    expect(store.saveCount()).toBe(2);
    expect((await store.load('test-pipeline'))?.batch_id).toBe(1);
  });

  it('throws CheckpointCommitError and keeps the previous checkpoint when saving keeps failing', async () => {
    await manager.commit(receipt(1), { 'events:0': '1-0' });
    store.failNext(new Error('down'), new Error('down'), new Error('down'));

    await expect(manager.commit(receipt(2), { 'events:0': '2-0' }))
      .rejects.toBeInstanceOf(CheckpointCommitError);

    expect(manager.current().batch_id).toBe(1);
    expect(manager.current().offsets).toEqual({ 'events:0': '1-0' });
  });

  it('recovers the stored checkpoint after a restart', async () => {
    await manager.commit(receipt(1), { 'events:1': '4-0' });

    const restarted = managerFor(store);
    const recovered = await restarted.recover();

    expect(recovered.batch_id).toBe(1);
    expect(recovered.offsets).toEqual({ 'events:1': '4-0' });
    expect(restarted.nextBatchId()).toBe(2);
  });

  it('warns when the store already holds this batch', async () => {
    await manager.commit(receipt(1), {});
    const log = fakeLogger();
    const stale = managerFor(store, log);

    await stale.commit(receipt(1), {});

    expect(log.warn).toHaveBeenCalledWith(
      { pipeline_id: 'test-pipeline', batch_id: 1 },
      'Stored checkpoint is already at or past this batch',
    );
  });
});
