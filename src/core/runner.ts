/**
 * Core runner. Orchestrates: fetch catalog → load supplier feed → reconcile →
 * batch → submit.
 *
 * runSync() is the failure boundary; everything else lets errors propagate.
 */

import type {
  CatalogClient,
  PriceUpdate,
  StockUpdate,
  SupplierFeedLoader,
  SupplierRecord,
} from '../schema/seller-catalog'
import { chunk } from './batch'
import { classifyFailure, type FailureKind } from './errors'
import { buildPriceUpdates, buildStockUpdates } from './reconcile'
import { buildSummary, type Summary } from './summary'

export const STOCK_BATCH_SIZE = 100
/** Scheduled run; the on-demand path submits prices in batches of 1000 */
export const SCHEDULED_PRICE_BATCH_SIZE = 900
export const ON_DEMAND_PRICE_BATCH_SIZE = 1000

export interface SyncDeps {
  client: CatalogClient
  loadFeed: SupplierFeedLoader
}

export interface SyncResult {
  stocks: StockUpdate[]
  prices: PriceUpdate[]
  summary: Summary
}

export interface StockUploadResult {
  /** Entries with a non-zero stock */
  notEmpty: StockUpdate[]
  stocks: StockUpdate[]
}

export interface RunResult<T> {
  value: T | null
  durationMs: number
  error: string | null
  failureKind: FailureKind | null
}

/** Submit `items` in sequential batches; the first failure aborts the rest */
async function submitBatches<T>(
  label: string,
  items: T[],
  size: number,
  submit: (batch: T[]) => Promise<unknown>
): Promise<number> {
  let sent = 0
  for (const batch of chunk(items, size)) {
    await submit(batch)
    sent++
    console.log(`[sync] ${label} batch ${sent}: ${batch.length} items`)
  }
  return sent
}

/** Scheduled full sync: stocks in batches of 100, then prices in batches of 900 */
export async function syncAll(deps: SyncDeps): Promise<SyncResult> {
  const offerIds = await deps.client.listOfferIds()
  const feed = await deps.loadFeed()

  const stocks = buildStockUpdates(feed, offerIds)
  console.log(`[sync] Built ${stocks.length} stock updates`)
  const stockBatches = await submitBatches('stocks', stocks, STOCK_BATCH_SIZE, batch =>
    deps.client.submitStockUpdates(batch)
  )

  const prices = buildPriceUpdates(feed, offerIds)
  console.log(`[sync] Built ${prices.length} price updates`)
  const priceBatches = await submitBatches('prices', prices, SCHEDULED_PRICE_BATCH_SIZE, batch =>
    deps.client.submitPriceUpdates(batch)
  )

  return {
    stocks,
    prices,
    summary: buildSummary({
      catalogSize: offerIds.length,
      stocks,
      prices,
      stockBatches,
      priceBatches,
    }),
  }
}

/** On-demand stock upload for an already loaded feed */
export async function uploadStocks(
  feed: SupplierRecord[],
  client: CatalogClient
): Promise<StockUploadResult> {
  const offerIds = await client.listOfferIds()
  const stocks = buildStockUpdates(feed, offerIds)
  await submitBatches('stocks', stocks, STOCK_BATCH_SIZE, batch => client.submitStockUpdates(batch))
  return {
    notEmpty: stocks.filter(s => s.stock !== 0),
    stocks,
  }
}

/** On-demand price upload for an already loaded feed */
export async function uploadPrices(
  feed: SupplierRecord[],
  client: CatalogClient
): Promise<PriceUpdate[]> {
  const offerIds = await client.listOfferIds()
  const prices = buildPriceUpdates(feed, offerIds)
  await submitBatches('prices', prices, ON_DEMAND_PRICE_BATCH_SIZE, batch =>
    client.submitPriceUpdates(batch)
  )
  return prices
}

/**
 * Run a task and report any failure as timeout / connection / other.
 * Never retries and never rethrows.
 */
export async function runSync<T>(label: string, task: () => Promise<T>): Promise<RunResult<T>> {
  const startTime = Date.now()

  try {
    const value = await task()
    const durationMs = Date.now() - startTime
    console.log(`[sync] ${label} finished in ${(durationMs / 1000).toFixed(1)}s`)
    return { value, durationMs, error: null, failureKind: null }
  } catch (err) {
    const errorMsg = err instanceof Error ? err.message : String(err)
    const failureKind = classifyFailure(err)

    switch (failureKind) {
      case 'timeout':
        console.error(`[sync] ${label} timed out: ${errorMsg}`)
        break
      case 'connection':
        console.error(`[sync] ${label} connection error: ${errorMsg}`)
        break
      default:
        console.error(`[sync] ${label} failed: ${errorMsg}`)
    }

    return { value: null, durationMs: Date.now() - startTime, error: errorMsg, failureKind }
  }
}
