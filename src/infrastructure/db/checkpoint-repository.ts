import { eq, sql } from 'drizzle-orm';
import type { Checkpoint } from '../../domain/index.js';
import type { CheckpointStore } from '../../application/ports.js';
import type { Database } from './client.js';
import { pipelineCheckpoints } from './schema.js';

export async function loadCheckpoint(db: Database, pipelineId: string): Promise<Checkpoint | null> {
  const [row] = await db
    .select()
    .from(pipelineCheckpoints)
    .where(eq(pipelineCheckpoints.pipeline_id, pipelineId))
    .limit(1);

  if (!row) return null;
  return {
    offsets: row.offsets,
    batch_id: row.batch_id,
    committed_at: row.committed_at,
  };
}

/**
 * Upserts the pipeline's checkpoint row.
 *
 * The update only applies when the stored batch_id is lower, so a stale
 * writer can never move progress backwards. Returns false in that case.
 */
export async function saveCheckpoint(
  db: Database,
  pipelineId: string,
  checkpoint: Checkpoint,
): Promise<boolean> {
  const result = await db
    .insert(pipelineCheckpoints)
    .values({
      pipeline_id: pipelineId,
      offsets: checkpoint.offsets,
      batch_id: checkpoint.batch_id,
      committed_at: checkpoint.committed_at ?? new Date(),
    })
    .onConflictDoUpdate({
      target: pipelineCheckpoints.pipeline_id,
      set: {
        offsets: sql`excluded.offsets`,
        batch_id: sql`excluded.batch_id`,
        committed_at: sql`excluded.committed_at`,
      },
      setWhere: sql`${pipelineCheckpoints.batch_id} < excluded.batch_id`,
    });

  return result.count > 0;
}

export function createPostgresCheckpointStore(db: Database): CheckpointStore {
  return {
    load: (pipelineId) => loadCheckpoint(db, pipelineId),
    save: (pipelineId, checkpoint) => saveCheckpoint(db, pipelineId, checkpoint),
  };
}
