export { createResponseCache, buildCacheKey } from './response-cache.js';
export type { CacheStore, ResponseCache, ResponseCacheOptions } from './response-cache.js';
