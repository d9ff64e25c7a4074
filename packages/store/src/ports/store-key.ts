/**
 * Key of an entry in the backing store.
 *
 * @remarks
 * Keys are opaque to adapters, which only prepend their keyspace prefix.
 */
export type StoreKey = string
