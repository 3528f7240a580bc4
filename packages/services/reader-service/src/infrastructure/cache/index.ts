export { LRUCache, type LRUCacheConfig, type LRUCacheStats } from './LRUCache';
export { BookCache, DEFAULT_BOOK_CACHE_CAPACITY } from './BookCache';
