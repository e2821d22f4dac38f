/**
 * Seller API client.
 *
 * Paginates POST /v2/product/list with a last_id cursor (limit 1000) until the
 * reported total is reached, and pushes stock / price batches to the import
 * endpoints. Every call sends Client-Id + Api-Key headers. No retries.
 */

import { z } from 'zod'
import { ApiError } from '../core/errors'
import { fetchWithTimeout } from '../core/fetch-with-timeout'
import type {
  CatalogClient,
  OfferId,
  PriceUpdate,
  SellerCredentials,
  StockUpdate,
} from '../schema/seller-catalog'

export const PRODUCT_LIST_LIMIT = 1000

const productListSchema = z.object({
  result: z.object({
    items: z.array(z.object({ offer_id: z.string() }).passthrough()),
    total: z.number().int().nonnegative(),
    last_id: z.string(),
  }),
})

export type ProductListPage = z.infer<typeof productListSchema>['result']

export interface SellerApiOptions {
  baseUrl: string
  credentials: SellerCredentials
  timeoutMs?: number
}

export class SellerApiClient implements CatalogClient {
  private readonly baseUrl: string

  constructor(private readonly options: SellerApiOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
  }

  /** Fetch one page of the product list */
  async getProductList(lastId: string): Promise<ProductListPage> {
    const url = `${this.baseUrl}/v2/product/list`
    const body = await this.post(url, {
      filter: { visibility: 'ALL' },
      last_id: lastId,
      limit: PRODUCT_LIST_LIMIT,
    })

    const parsed = productListSchema.safeParse(body)
    if (!parsed.success) {
      throw new ApiError(
        `Unexpected product list response: ${parsed.error.issues[0]?.message ?? 'invalid body'}`,
        'protocol',
        url
      )
    }
    return parsed.data.result
  }

  /** All offer IDs in the seller catalog, in API order */
  async listOfferIds(): Promise<OfferId[]> {
    const offerIds: OfferId[] = []
    let lastId = ''
    let pages = 0

    while (true) {
      const page = await this.getProductList(lastId)
      pages++

      for (const item of page.items) offerIds.push(item.offer_id)
      if (offerIds.length >= page.total) break

      // A cursor that stops yielding items would otherwise spin forever
      if (page.items.length === 0) {
        throw new ApiError(
          `Product list stalled at ${offerIds.length}/${page.total} items (last_id "${page.last_id}")`,
          'protocol',
          `${this.baseUrl}/v2/product/list`
        )
      }

      lastId = page.last_id
    }

    console.log(`[seller-api] Fetched ${offerIds.length} offer IDs across ${pages} pages`)
    return offerIds
  }

  async submitPriceUpdates(batch: PriceUpdate[]): Promise<unknown> {
    return this.post(`${this.baseUrl}/v1/product/import/prices`, { prices: batch })
  }

  async submitStockUpdates(batch: StockUpdate[]): Promise<unknown> {
    return this.post(`${this.baseUrl}/v1/product/import/stocks`, { stocks: batch })
  }

  private async post(url: string, payload: unknown): Promise<unknown> {
    return fetchWithTimeout(
      url,
      async res => {
        try {
          return await res.json()
        } catch (err) {
          const reason = err instanceof Error ? err.message : String(err)
          throw new ApiError(`Invalid JSON from ${url}: ${reason}`, 'protocol', url, res.status)
        }
      },
      {
        method: 'POST',
        headers: {
          'Client-Id': this.options.credentials.clientId,
          'Api-Key': this.options.credentials.apiKey,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(payload),
        timeoutMs: this.options.timeoutMs,
      }
    )
  }
}
