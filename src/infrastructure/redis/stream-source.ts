import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { Offsets } from '../../domain/index.js';
import { compareOffsets } from '../../domain/index.js';
import type { PipelineSource } from '../../application/pipeline.js';
import type { SourceRecord } from '../../application/ports.js';

const CONTRACT_FIELDS = ['principal_id', 'event_type', 'event_timestamp', 'sequence'] as const;

/** Stream keys for `count` partitions: `<prefix>:0` … `<prefix>:<count-1>`. */
export function partitionKeys(prefix: string, count: number): string[] {
  return Array.from({ length: count }, (_, i) => `${prefix}:${i}`);
}

/**
 * Parses a raw Redis Stream entry into the record handed to validation.
 * Stream entries arrive as flat [field, value, field, value, ...] arrays.
 *
 * `payload` is JSON-decoded; when it is not valid JSON the raw string is
 * kept so that schema validation rejects it as a non-object payload.
 */
export function parseStreamEntry(fields: readonly string[]): Record<string, unknown> {
  const map = new Map<string, string>();
  for (let i = 0; i < fields.length; i += 2) {
    const key = fields[i];
    const value = fields[i + 1];
    if (key !== undefined && value !== undefined) {
      map.set(key, value);
    }
  }

  const record: Record<string, unknown> = {};
  for (const name of CONTRACT_FIELDS) {
    const value = map.get(name);
    if (value !== undefined) record[name] = value;
  }

  const payload = map.get('payload');
  if (payload !== undefined) {
    record['payload'] = decodeJson(payload);
  }

  return record;
}

function decodeJson(raw: string): unknown {
  try {
    return JSON.parse(raw) as unknown;
  } catch {
    return raw;
  }
}

/**
 * Partitioned at-least-once log on Redis Streams, one stream per partition.
 *
 * Offsets are stream entry IDs. The read cursor lives here and is only
 * ever positioned from a committed checkpoint (`seek`) or moved forward
 * by `nextSlice`; durable progress belongs to the checkpoint manager, so
 * no consumer group or XACK is involved.
 *
 * Requires Redis >= 6.2 for exclusive XRANGE starts.
 */
export class RedisStreamSource implements PipelineSource<Offsets> {
  private cursor: Offsets = {};

  constructor(
    private readonly redis: Redis,
    private readonly partitions: readonly string[],
    private readonly log: Logger,
  ) {}

  seek(offsets: Offsets): void {
    this.cursor = { ...offsets };
    this.log.debug({ offsets }, 'Stream source positioned');
  }

  /** Latest entry ID per partition; empty partitions are left out. */
  async closeWindow(): Promise<Offsets> {
    const end: Offsets = {};
    for (const key of this.partitions) {
      const latest = await this.redis.xrevrange(key, '+', '-', 'COUNT', 1);
      const id = latest[0]?.[0];
      if (id !== undefined) end[key] = id;
    }
    return end;
  }

  /** Reads up to `limit` entries after the cursor and up to the window end, partition by partition. */
  async nextSlice(window: Offsets, limit: number): Promise<SourceRecord[]> {
    const slice: SourceRecord[] = [];

    for (const key of this.partitions) {
      const remaining = limit - slice.length;
      if (remaining <= 0) break;

      const end = window[key];
      if (end === undefined) continue;

      const from = this.cursor[key];
      if (from !== undefined && compareOffsets(from, end) >= 0) continue;

      const entries = await this.redis.xrange(
        key,
        from === undefined ? '-' : `(${from}`,
        end,
        'COUNT',
        remaining,
      );

      for (const [id, fields] of entries) {
        slice.push({ partition: key, offset: id, fields: parseStreamEntry(fields) });
        this.cursor[key] = id;
      }
    }

    return slice;
  }
}
