export { BatchProcessor } from './utils/batch-processor';
export { ConcurrentPool } from './utils/concurrent-pool';
export { hashFile } from './utils/content-hash';
export {
  ExpiringCache,
  type ExpiringCacheOptions,
} from './utils/expiring-cache';
export {
  spawnAsync,
  type SpawnAsyncOptions,
  type SpawnResult,
} from './utils/spawn-utils';
