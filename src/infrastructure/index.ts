export * from './db/index.js';
export * from './redis/index.js';
export * from './notifications/index.js';
export * from './memory/index.js';
