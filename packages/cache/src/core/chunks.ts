/**
 * Contiguous slices of at most `size` items. `0` yields everything in one slice.
 */
export function* chunks<T>(items: readonly T[], size: number): Generator<readonly T[]> {
  if (size === 0) {
    if (items.length > 0) yield items
    return
  }

  for (let i = 0; i < items.length; i += size) {
    yield items.slice(i, i + size)
  }
}

export function assertBatchSize(size: number): void {
  if (!Number.isInteger(size) || size < 0) {
    throw new RangeError(`batchSize must be a non-negative integer (got ${size})`)
  }
}
