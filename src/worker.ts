import { Redis } from 'ioredis';
import type { FastifyInstance } from 'fastify';
import { pino } from 'pino';
import { loadConfig, toPipelineSettings } from './config.js';
import { Pipeline } from './application/index.js';
import type { PipelineContext } from './application/index.js';
import type { Offsets } from './domain/index.js';
import {
  createDbClient,
  ensureSchema,
  createPostgresMergeStore,
  createPostgresAnalyticalStore,
  createPostgresCheckpointStore,
  createPostgresParkedBatchStore,
  RedisStreamSource,
  partitionKeys,
  createAlertDispatcher,
} from './infrastructure/index.js';
import { buildOpsServer } from './interfaces/http/index.js';

/**
 * Standalone ingestion worker.
 *
 * Reads the partitioned Redis Streams log, merges each micro-batch into
 * PostgreSQL and checkpoints progress. Exactly one worker per PIPELINE_ID
 * may run; merges are additionally serialized by an advisory lock.
 */
const config = loadConfig();
const log = pino({ level: config.LOG_LEVEL });

const redis = new Redis(config.REDIS_URL, {
  maxRetriesPerRequest: null,
  enableReadyCheck: true,
  lazyConnect: true,
});

const { sql, db } = createDbClient(config.DATABASE_URL, log);

const partitions = partitionKeys(config.STREAM_PREFIX, config.PARTITIONS);

const ctx: PipelineContext<Offsets> = {
  pipelineId: config.PIPELINE_ID,
  source: new RedisStreamSource(redis, partitions, log),
  mergeStore: createPostgresMergeStore(db),
  analyticalStore: createPostgresAnalyticalStore(db),
  checkpointStore: createPostgresCheckpointStore(db),
  parkedStore: createPostgresParkedBatchStore(db),
  alert: createAlertDispatcher(
    { slack: { enabled: config.SLACK_WEBHOOK_URL !== undefined, webhook_url: config.SLACK_WEBHOOK_URL ?? '' } },
    log,
  ),
  log,
  close: async () => {
    await redis.quit();
    await sql.end();
    log.info('Redis and database disconnected');
  },
};

const pipeline = new Pipeline(ctx, toPipelineSettings(config));

let ops: FastifyInstance | null = null;
let shuttingDown = false;

async function main(): Promise<void> {
  await redis.connect();
  log.info('Redis connected');

  await ensureSchema(sql, log);

  const checkpoint = await pipeline.open();
  log.info({ partitions, batch_id: checkpoint.batch_id }, 'Pipeline opened');

  ops = await buildOpsServer(pipeline, { logLevel: config.LOG_LEVEL });
  await ops.listen({ host: config.OPS_HOST, port: config.OPS_PORT });

  const status = await pipeline.run();

  // A halted pipeline keeps the ops server up so operators can inspect it.
  if (status === 'halted') {
    log.fatal('Pipeline halted; waiting for SIGTERM after operator intervention');
  }
}

// Graceful shutdown on SIGINT / SIGTERM: the in-flight merge always finishes first.
async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info({ signal }, 'Shutting down worker...');

  try {
    const status = await pipeline.stop();
    await ops?.close();
    await pipeline.close();
    log.info({ status }, 'Worker stopped');
    process.exit(0);
  } catch (err: unknown) {
    log.fatal({ err }, 'Worker failed to shut down cleanly');
    process.exit(1);
  }
}

process.on('SIGINT', () => { void shutdown('SIGINT'); });
process.on('SIGTERM', () => { void shutdown('SIGTERM'); });

main().catch((err: unknown) => {
  log.fatal({ err }, 'Worker crashed');
  process.exit(1);
});
