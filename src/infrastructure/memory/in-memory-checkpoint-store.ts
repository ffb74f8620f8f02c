import type { Checkpoint } from '../../domain/index.js';
import type { CheckpointStore } from '../../application/ports.js';

/** Checkpoints kept in a map; survives "restarts" that reuse the instance. */
export class InMemoryCheckpointStore implements CheckpointStore {
  private readonly checkpoints = new Map<string, Checkpoint>();
  private readonly scripted: Error[] = [];
  private saves = 0;

  failNext(...errors: Error[]): void {
    this.scripted.push(...errors);
  }

  async load(pipelineId: string): Promise<Checkpoint | null> {
    return this.checkpoints.get(pipelineId) ?? null;
  }

  async save(pipelineId: string, checkpoint: Checkpoint): Promise<boolean> {
    this.saves++;
    const failure = this.scripted.shift();
    if (failure) throw failure;

    const stored = this.checkpoints.get(pipelineId);
    if (stored && stored.batch_id >= checkpoint.batch_id) return false;
    this.checkpoints.set(pipelineId, { ...checkpoint, offsets: { ...checkpoint.offsets } });
    return true;
  }

  saveCount(): number {
    return this.saves;
  }
}
