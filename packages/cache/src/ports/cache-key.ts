/**
 * Key of a cache entry. Adapters may prepend a keyspace prefix.
 */
export type CacheKey = string
