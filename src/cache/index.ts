export { ResponseCache, cacheKey, type CacheStats } from './response-cache.js';
