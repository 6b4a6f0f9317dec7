export { TtlCache } from './ttl-cache.js';
export type { CacheStats } from './ttl-cache.js';
