/**
 * Cache Module
 *
 * TTL caching utilities
 */

export { CacheManager } from './CacheManager';

export type { CacheEntry, CacheStats } from './CacheManager';
