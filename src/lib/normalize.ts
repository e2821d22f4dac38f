/**
 * Field normalization for supplier spreadsheet values.
 * Maps the supplier's quantity buckets and price strings to what the seller API takes.
 */

import { MalformedPriceError, MalformedQuantityError } from '../core/errors'

/** Supplier quantity sentinels */
const QUANTITY_MAP = new Map<string, number>([
  ['>10', 100],
  ['1', 0],
])

/** Parse a supplier quantity into a stock count */
export function normalizeStock(raw: string, code?: string): number {
  const key = raw.trim()
  const mapped = QUANTITY_MAP.get(key)
  if (mapped !== undefined) return mapped
  if (!/^\d+$/.test(key)) throw new MalformedQuantityError(raw, code)
  return parseInt(key, 10)
}

/** Reduce a price string to its integer digits: "5'990.00 руб." -> "5990" */
export function normalizePrice(raw: string, code?: string): string {
  const digits = raw.split('.')[0].replace(/[^0-9]/g, '')
  if (!digits) throw new MalformedPriceError(raw, code)
  return digits
}
