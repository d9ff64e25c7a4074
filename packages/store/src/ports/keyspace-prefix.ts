/**
 * A prefix that scopes an adapter instance to a partition of a shared keyspace
 * (e.g. a Redis cluster).
 *
 * @remarks
 * Several caches may share one Redis deployment by using distinct prefixes:
 *
 * - `app:prod:sessions:`
 * - `app:prod:profiles:`
 *
 * Adapters treat the value as an opaque string and prepend it to every key.
 */
export type KeyspacePrefix = string
