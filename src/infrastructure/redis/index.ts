export { RedisStreamSource, parseStreamEntry, partitionKeys } from './stream-source.js';
