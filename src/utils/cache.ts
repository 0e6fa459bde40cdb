import { LRUCache } from "lru-cache";

export const createCache = <V extends {}>(max = 500, ttl = 1000 * 60 * 10): LRUCache<string, V> =>
  new LRUCache<string, V>({
    max,  // max number of cached items
    ttl,  // 10 minutes TTL by default
  });
