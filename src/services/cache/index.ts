/**
 * gsq cache system
 */

export { FileCache } from './file-cache.js';
export type {
  CacheProvider,
  CacheLookup,
  CacheEntryInfo,
  LayerStats,
} from './types.js';
