import { randomUUID } from 'node:crypto';
import type { ParkedBatch, ParkedBatchStore } from '../../application/ports.js';
import type { Database } from './client.js';
import { parkedBatches } from './schema.js';

/** Stores a batch for manual intervention. Returns the generated parked_id. */
export async function insertParkedBatch(db: Database, batch: ParkedBatch): Promise<string> {
  const parkedId = randomUUID();

  await db.insert(parkedBatches).values({
    parked_id: parkedId,
    pipeline_id: batch.pipeline_id,
    batch_id: batch.batch_id,
    reason: batch.reason,
    error: batch.error.slice(0, 4096),
    attempts: batch.attempts,
    offsets: batch.offsets,
    events: [...batch.events],
  });

  return parkedId;
}

export function createPostgresParkedBatchStore(db: Database): ParkedBatchStore {
  return {
    park: async (batch) => {
      await insertParkedBatch(db, batch);
    },
  };
}
