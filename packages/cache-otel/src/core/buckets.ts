/**
 * `count` boundaries starting at `start`, each `factor` times the previous one.
 */
export function exponentialBuckets(start: number, factor: number, count: number): number[] {
  if (!Number.isInteger(count) || count < 1) {
    throw new RangeError(`count must be a positive integer (got ${count})`)
  }
  if (!(start > 0)) {
    throw new RangeError(`start must be > 0 (got ${start})`)
  }
  if (!(factor > 1)) {
    throw new RangeError(`factor must be > 1 (got ${factor})`)
  }

  return Array.from({ length: count }, (_, i) => start * factor ** i)
}
