export { mergedEvents, analyticalEvents, pipelineCheckpoints, parkedBatches } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, SqlClient } from './client.js';
export { ensureSchema } from './migrate.js';
export { classifyStorageError, errorCode } from './storage-errors.js';
export { mergeEventRows, createPostgresMergeStore } from './merge-repository.js';
export { appendAnalyticalRows, createPostgresAnalyticalStore } from './analytical-repository.js';
export { loadCheckpoint, saveCheckpoint, createPostgresCheckpointStore } from './checkpoint-repository.js';
export { insertParkedBatch, createPostgresParkedBatchStore } from './parked-batch-repository.js';
