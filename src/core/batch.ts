/**
 * Batch splitter: keeps submissions under the seller API's per-request item limits.
 */

import { InvalidArgumentError } from './errors'

/**
 * Split `items` into contiguous slices of `size`, the last one possibly shorter.
 * The returned iterable is lazy and can be iterated more than once.
 */
export function chunk<T>(items: readonly T[], size: number): Iterable<T[]> {
  if (!Number.isInteger(size) || size <= 0) {
    throw new InvalidArgumentError(`Batch size must be a positive integer, got ${size}`)
  }

  return {
    *[Symbol.iterator]() {
      for (let i = 0; i < items.length; i += size) {
        yield items.slice(i, i + size)
      }
    },
  }
}
