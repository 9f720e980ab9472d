/**
 * LRU cache with per-entry TTL
 */

import { LRUCache } from 'lru-cache';
import type { CacheEntry } from './types.js';

/**
 * Cache manager for DNS answers
 */
export class CacheManager<T extends object> {
  private cache: LRUCache<string, CacheEntry<T>>;
  private defaultTTL: number;

  /**
   * @param maxSize Maximum number of entries
   * @param ttl Time-to-live in milliseconds
   */
  constructor(maxSize = 1000, ttl = 300000) {
    this.defaultTTL = ttl;
    this.cache = new LRUCache<string, CacheEntry<T>>({
      max: maxSize,
      ttl,
      updateAgeOnGet: false,
    });
  }

  get(key: string): T | undefined {
    const entry = this.cache.get(key);
    if (!entry) {
      return undefined;
    }

    if (Date.now() > entry.expiresAt) {
      this.cache.delete(key);
      return undefined;
    }

    return entry.value;
  }

  set(key: string, value: T, ttl?: number): void {
    const lifetime = ttl ?? this.defaultTTL;
    this.cache.set(key, { value, expiresAt: Date.now() + lifetime }, { ttl: lifetime });
  }
}
