/**
 * Shared seller catalog schema: the supplier feed and the marketplace client
 * both speak in these shapes.
 */

/** Seller-scoped product identifier in the marketplace catalog */
export type OfferId = string

/** One row of the supplier stock spreadsheet, already reduced to the three columns we use */
export interface SupplierRecord {
  readonly code: string
  /** Exact integer, or one of the sentinels ">10" and "1" */
  readonly quantity: string
  /** Locale-formatted, e.g. "5'990.00 руб." */
  readonly price: string
}

export interface StockUpdate {
  offer_id: OfferId
  stock: number
}

export interface PriceUpdate {
  offer_id: OfferId
  price: string
  currency_code: 'RUB'
  old_price: '0'
  auto_action_enabled: 'UNKNOWN'
}

export interface SellerCredentials {
  clientId: string
  apiKey: string
}

/** Marketplace operations the sync needs, implemented by SellerApiClient */
export interface CatalogClient {
  listOfferIds(): Promise<OfferId[]>
  submitStockUpdates(batch: StockUpdate[]): Promise<unknown>
  submitPriceUpdates(batch: PriceUpdate[]): Promise<unknown>
}

/** Produces the supplier rows for one run */
export type SupplierFeedLoader = () => Promise<SupplierRecord[]>
