import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { SellerApiClient } from '../seller-api'
import { ApiError } from '../../core/errors'

const mockFetch = vi.fn()

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  })
}

function page(offerIds: string[], total: number, lastId: string) {
  return jsonResponse({
    result: {
      items: offerIds.map((offer_id, i) => ({ product_id: i + 1, offer_id })),
      total,
      last_id: lastId,
    },
  })
}

function requestBody(callIndex: number): unknown {
  return JSON.parse(mockFetch.mock.calls[callIndex][1].body)
}

describe('SellerApiClient', () => {
  let client: SellerApiClient

  beforeEach(() => {
    vi.stubGlobal('fetch', mockFetch)
    vi.spyOn(console, 'log').mockImplementation(() => {})
    client = new SellerApiClient({
      baseUrl: 'https://seller.test/',
      credentials: { clientId: 'test-client', apiKey: 'test-key' },
      timeoutMs: 1000,
    })
  })

  afterEach(() => {
    mockFetch.mockReset()
    vi.unstubAllGlobals()
    vi.restoreAllMocks()
  })

  describe('listOfferIds', () => {
    it('follows the cursor until the reported total is reached', async () => {
      mockFetch
        .mockResolvedValueOnce(page(['A', 'B'], 3, 'cursor-1'))
        .mockResolvedValueOnce(page(['C'], 3, 'cursor-2'))

      const ids = await client.listOfferIds()

      expect(ids).toEqual(['A', 'B', 'C'])
      expect(mockFetch).toHaveBeenCalledTimes(2)
      expect(mockFetch.mock.calls[0][0]).toBe('https://seller.test/v2/product/list')
      expect(requestBody(0)).toEqual({ filter: { visibility: 'ALL' }, last_id: '', limit: 1000 })
      expect(requestBody(1)).toEqual({ filter: { visibility: 'ALL' }, last_id: 'cursor-1', limit: 1000 })
    })

    it('sends the seller credentials', async () => {
      mockFetch.mockResolvedValueOnce(page(['A'], 1, 'cursor-1'))

      await client.listOfferIds()

      const init = mockFetch.mock.calls[0][1]
      expect(init.method).toBe('POST')
      expect(init.headers).toMatchObject({ 'Client-Id': 'test-client', 'Api-Key': 'test-key' })
    })

    it('returns an empty list for an empty catalog', async () => {
      mockFetch.mockResolvedValueOnce(page([], 0, ''))

      await expect(client.listOfferIds()).resolves.toEqual([])
      expect(mockFetch).toHaveBeenCalledTimes(1)
    })

    it('fails on a page that adds nothing before the total is reached', async () => {
      mockFetch
        .mockResolvedValueOnce(page(['A'], 5, 'cursor-1'))
        .mockResolvedValueOnce(page([], 5, 'cursor-1'))

      await expect(client.listOfferIds()).rejects.toMatchObject({
        name: 'ApiError',
        kind: 'protocol',
        message: 'Product list stalled at 1/5 items (last_id "cursor-1")',
      })
      expect(mockFetch).toHaveBeenCalledTimes(2)
    })

    it('surfaces HTTP errors as ApiError', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ message: 'forbidden' }, 403))

      const err = await client.listOfferIds().catch((e: unknown) => e)

      expect(err).toBeInstanceOf(ApiError)
      expect(err).toMatchObject({ kind: 'http', statusCode: 403 })
    })

    it('rejects a response without a result', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ items: [] }))

      await expect(client.listOfferIds()).rejects.toMatchObject({ kind: 'protocol' })
    })

    it('maps transport failures to connection errors', async () => {
      mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'))

      await expect(client.listOfferIds()).rejects.toMatchObject({
        kind: 'connection',
        message: 'Request to https://seller.test/v2/product/list failed: fetch failed',
      })
    })

    it('maps an aborted request to a timeout', async () => {
      mockFetch.mockImplementationOnce(
        (_url: string, init: RequestInit) =>
          new Promise((_resolve, reject) => {
            init.signal?.addEventListener('abort', () => reject(new Error('aborted')))
          })
      )
      const slowClient = new SellerApiClient({
        baseUrl: 'https://seller.test',
        credentials: { clientId: 'test-client', apiKey: 'test-key' },
        timeoutMs: 5,
      })

      await expect(slowClient.listOfferIds()).rejects.toMatchObject({ kind: 'timeout' })
    })
  })

  describe('response body', () => {
    it('counts a stalled body against the timeout', async () => {
      mockFetch.mockImplementationOnce(
        async (_url: string, init: RequestInit) =>
          new Response(
            new ReadableStream<Uint8Array>({
              start(controller) {
                init.signal?.addEventListener('abort', () => controller.error(new Error('aborted')))
              },
            }),
            { status: 200, headers: { 'Content-Type': 'application/json' } }
          )
      )
      const slowClient = new SellerApiClient({
        baseUrl: 'https://seller.test',
        credentials: { clientId: 'test-client', apiKey: 'test-key' },
        timeoutMs: 20,
      })

      await expect(slowClient.submitStockUpdates([{ offer_id: 'A', stock: 1 }])).rejects.toMatchObject({
        kind: 'timeout',
        message: 'Request to https://seller.test/v1/product/import/stocks timed out after 20ms',
      })
    })

    it('rejects a body that is not JSON', async () => {
      mockFetch.mockResolvedValueOnce(new Response('<html>ok</html>', { status: 200 }))

      await expect(client.submitStockUpdates([])).rejects.toMatchObject({ kind: 'protocol', statusCode: 200 })
    })
  })

  describe('submitStockUpdates', () => {
    it('posts the batch under "stocks"', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ result: [{ offer_id: 'A', updated: true }] }))

      const ack = await client.submitStockUpdates([{ offer_id: 'A', stock: 100 }])

      expect(ack).toEqual({ result: [{ offer_id: 'A', updated: true }] })
      expect(mockFetch.mock.calls[0][0]).toBe('https://seller.test/v1/product/import/stocks')
      expect(requestBody(0)).toEqual({ stocks: [{ offer_id: 'A', stock: 100 }] })
    })
  })

  describe('submitPriceUpdates', () => {
    it('posts the batch under "prices"', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ result: [] }))
      const price = {
        offer_id: 'A',
        price: '5990',
        currency_code: 'RUB',
        old_price: '0',
        auto_action_enabled: 'UNKNOWN',
      } as const

      await client.submitPriceUpdates([price])

      expect(mockFetch.mock.calls[0][0]).toBe('https://seller.test/v1/product/import/prices')
      expect(requestBody(0)).toEqual({ prices: [price] })
    })

    it('surfaces a server error', async () => {
      mockFetch.mockResolvedValueOnce(new Response('bad gateway', { status: 502 }))

      await expect(client.submitPriceUpdates([])).rejects.toMatchObject({
        kind: 'http',
        statusCode: 502,
        message: 'HTTP 502 from https://seller.test/v1/product/import/prices: bad gateway',
      })
    })
  })
})
