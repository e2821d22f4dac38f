#!/usr/bin/env node
/**
 * CLI runner for the seller stock sync.
 *
 * Usage:
 *   npx tsx src/cli.ts sync [--feed <path>] [--summary <path>]
 *   npx tsx src/cli.ts stocks [--feed <path>]
 *   npx tsx src/cli.ts prices [--feed <path>]
 */

import 'dotenv/config'

import { loadConfig, type SyncConfig } from './lib/env'
import { SellerApiClient } from './platforms/seller-api'
import { downloadSupplierFeed, loadSupplierFeedFile } from './feeds/supplier-feed'
import { runSync, syncAll, uploadPrices, uploadStocks } from './core/runner'
import { writeSummary } from './core/summary'
import type { SupplierFeedLoader } from './schema/seller-catalog'

const args = process.argv.slice(2)
const command = args[0]

function getFlag(name: string): string | undefined {
  const idx = args.indexOf(`--${name}`)
  return idx >= 0 ? args[idx + 1] : undefined
}

function feedLoader(config: SyncConfig): SupplierFeedLoader {
  const feedPath = getFlag('feed')
  const options = { headerRow: config.feedHeaderRow, timeoutMs: config.requestTimeoutMs }
  return feedPath
    ? () => loadSupplierFeedFile(feedPath, options)
    : () => downloadSupplierFeed(config.supplierFeedUrl, options)
}

async function main() {
  if (!command || !['sync', 'stocks', 'prices'].includes(command)) {
    if (command) console.error(`Unknown command: ${command}`)
    printUsage()
    process.exit(1)
  }

  let config: SyncConfig
  try {
    config = loadConfig()
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err))
    process.exit(1)
  }

  const client = new SellerApiClient({
    baseUrl: config.sellerApiUrl,
    credentials: { clientId: config.clientId, apiKey: config.sellerToken },
    timeoutMs: config.requestTimeoutMs,
  })
  const loadFeed = feedLoader(config)

  if (command === 'sync') {
    const result = await runSync('sync', () => syncAll({ client, loadFeed }))
    if (result.value) {
      const { summary } = result.value
      console.log(`  Catalog offers: ${summary.catalogSize}`)
      console.log(`  Stocks: ${summary.stockUpdates} (${summary.inStock} in stock, ${summary.outOfStock} zeroed) in ${summary.stockBatches} batches`)
      console.log(`  Prices: ${summary.priceUpdates} in ${summary.priceBatches} batches`)

      const summaryPath = getFlag('summary')
      if (summaryPath) {
        writeSummary(summary, summaryPath)
        console.log(`  Summary written to ${summaryPath}`)
      }
    }
    return
  }

  if (command === 'stocks') {
    const result = await runSync('stock upload', async () => uploadStocks(await loadFeed(), client))
    if (result.value) {
      console.log(`  Stocks: ${result.value.stocks.length} (${result.value.notEmpty.length} in stock)`)
    }
    return
  }

  const result = await runSync('price upload', async () => uploadPrices(await loadFeed(), client))
  if (result.value) {
    console.log(`  Prices: ${result.value.length}`)
  }
}

function printUsage() {
  console.log(`
Usage:
  npx tsx src/cli.ts sync [--feed <path>] [--summary <path>]   Full sync (stocks, then prices)
  npx tsx src/cli.ts stocks [--feed <path>]                    Upload stocks only
  npx tsx src/cli.ts prices [--feed <path>]                    Upload prices only

--feed takes a local .zip archive or .xls/.xlsx workbook instead of downloading the supplier feed.
`)
}

main().catch(err => {
  console.error('Fatal error:', err)
  process.exit(1)
})
