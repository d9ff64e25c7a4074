/**
 * Anything that counts hits and misses of a process-local reply cache, such
 * as the store package's `RedisNearCache`. Counts are cumulative.
 */
export interface NearCacheStatsSource {
  stats(): { readonly hitCount: number; readonly missCount: number }
}
