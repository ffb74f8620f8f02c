import type { Offsets } from '../../domain/index.js';
import { compareOffsets } from '../../domain/index.js';
import type { PipelineSource } from '../../application/pipeline.js';
import type { SourceRecord } from '../../application/ports.js';

interface LogEntry {
  offset: string;
  fields: Record<string, unknown>;
}

/**
 * Partitioned at-least-once log held in memory.
 *
 * Offsets use the stream entry ID form (`<n>-0`) so they order exactly
 * like the Redis source's. A window is the last offset per partition at
 * the moment it was closed.
 */
export class InMemoryEventLog implements PipelineSource<Offsets> {
  private readonly partitions = new Map<string, LogEntry[]>();
  private cursor: Offsets = {};

  constructor(partitionIds: readonly string[]) {
    for (const id of partitionIds) {
      this.partitions.set(id, []);
    }
  }

  /** Appends to a partition and returns the assigned offset. */
  append(partition: string, fields: Record<string, unknown>): string {
    const entries = this.partitions.get(partition);
    if (!entries) throw new RangeError(`Unknown partition "${partition}"`);
    const offset = `${entries.length + 1}-0`;
    entries.push({ offset, fields });
    return offset;
  }

  seek(offsets: Offsets): void {
    this.cursor = { ...offsets };
  }

  async closeWindow(): Promise<Offsets> {
    const end: Offsets = {};
    for (const [partition, entries] of this.partitions) {
      const last = entries.at(-1);
      if (last) end[partition] = last.offset;
    }
    return end;
  }

  async nextSlice(window: Offsets, limit: number): Promise<SourceRecord[]> {
    const slice: SourceRecord[] = [];

    for (const [partition, entries] of this.partitions) {
      const end = window[partition];
      if (end === undefined) continue;
      const from = this.cursor[partition];

      for (const entry of entries) {
        if (slice.length >= limit) return slice;
        if (from !== undefined && compareOffsets(entry.offset, from) <= 0) continue;
        if (compareOffsets(entry.offset, end) > 0) break;
        slice.push({ partition, offset: entry.offset, fields: entry.fields });
        this.cursor[partition] = entry.offset;
      }
    }

    return slice;
  }
}
