export { InMemoryMergeStore } from './in-memory-merge-store.js';
export { InMemoryAnalyticalStore } from './in-memory-analytical-store.js';
export { InMemoryCheckpointStore } from './in-memory-checkpoint-store.js';
export { InMemoryParkedBatchStore } from './in-memory-parked-batch-store.js';
export { InMemoryEventLog } from './in-memory-event-log.js';
