/**
 * Reconciliation: maps supplier rows onto the seller catalog.
 *
 * Pure functions: no I/O, and the caller's catalog collection is never mutated.
 */

import { normalizePrice, normalizeStock } from '../lib/normalize'
import type { OfferId, PriceUpdate, StockUpdate, SupplierRecord } from '../schema/seller-catalog'

/**
 * Stock update for every catalog offer: supplier-covered offers first in feed
 * order, then the rest of the catalog (in catalog order) zeroed out.
 */
export function buildStockUpdates(
  feed: Iterable<SupplierRecord>,
  knownOfferIds: Iterable<OfferId>
): StockUpdate[] {
  // Private working copy; Set keeps catalog insertion order for the leftovers
  const pending = new Set(knownOfferIds)
  const stocks: StockUpdate[] = []

  for (const record of feed) {
    if (!pending.has(record.code)) continue
    stocks.push({ offer_id: record.code, stock: normalizeStock(record.quantity, record.code) })
    pending.delete(record.code)
  }

  for (const offerId of pending) {
    stocks.push({ offer_id: offerId, stock: 0 })
  }

  return stocks
}

/** Price update for each feed row whose code is in the catalog. No defaults for missing offers. */
export function buildPriceUpdates(
  feed: Iterable<SupplierRecord>,
  knownOfferIds: Iterable<OfferId>
): PriceUpdate[] {
  const known: ReadonlySet<OfferId> = new Set(knownOfferIds)
  const prices: PriceUpdate[] = []

  for (const record of feed) {
    if (!known.has(record.code)) continue
    prices.push({
      auto_action_enabled: 'UNKNOWN',
      currency_code: 'RUB',
      offer_id: record.code,
      old_price: '0',
      price: normalizePrice(record.price, record.code),
    })
  }

  return prices
}
