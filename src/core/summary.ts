/**
 * Summary builder: generates summary.json for one sync run.
 */

import { writeFileSync } from 'node:fs'
import type { PriceUpdate, StockUpdate } from '../schema/seller-catalog'

export interface Summary {
  catalogSize: number
  stockUpdates: number
  inStock: number
  outOfStock: number
  totalStock: number
  priceUpdates: number
  stockBatches: number
  priceBatches: number
  priceStats: {
    min: number | null
    max: number | null
    avg: number | null
  }
  generatedAt: string
}

export interface SummaryInput {
  catalogSize: number
  stocks: StockUpdate[]
  prices: PriceUpdate[]
  stockBatches: number
  priceBatches: number
}

export function buildSummary(input: SummaryInput): Summary {
  const inStock = input.stocks.filter(s => s.stock > 0)
  const prices = input.prices.map(p => Number(p.price))

  return {
    catalogSize: input.catalogSize,
    stockUpdates: input.stocks.length,
    inStock: inStock.length,
    outOfStock: input.stocks.length - inStock.length,
    totalStock: inStock.reduce((sum, s) => sum + s.stock, 0),
    priceUpdates: input.prices.length,
    stockBatches: input.stockBatches,
    priceBatches: input.priceBatches,
    priceStats: {
      min: prices.length ? prices.reduce((a, b) => Math.min(a, b)) : null,
      max: prices.length ? prices.reduce((a, b) => Math.max(a, b)) : null,
      avg: prices.length ? Math.round(prices.reduce((s, p) => s + p, 0) / prices.length) : null,
    },
    generatedAt: new Date().toISOString(),
  }
}

export function writeSummary(summary: Summary, outputPath: string): void {
  writeFileSync(outputPath, JSON.stringify(summary, null, 2) + '\n', 'utf-8')
}
