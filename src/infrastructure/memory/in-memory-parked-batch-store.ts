import type { ParkedBatch, ParkedBatchStore } from '../../application/ports.js';

export class InMemoryParkedBatchStore implements ParkedBatchStore {
  private readonly parked: ParkedBatch[] = [];

  async park(batch: ParkedBatch): Promise<void> {
    this.parked.push(batch);
  }

  all(): readonly ParkedBatch[] {
    return this.parked;
  }
}
