import { z } from 'zod'
import { ConfigError } from '../core/errors'

const envSchema = z.object({
  CLIENT_ID: z.string().trim().min(1, 'CLIENT_ID is required'),
  SELLER_TOKEN: z.string().trim().min(1, 'SELLER_TOKEN is required'),
  SELLER_API_URL: z.string().url().default('https://api-seller.ozon.ru'),
  SUPPLIER_FEED_URL: z.string().url().default('https://timeworld.ru/upload/files/ostatki.zip'),
  FEED_HEADER_ROW: z.coerce.number().int().nonnegative().default(17),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
})

export interface SyncConfig {
  clientId: string
  sellerToken: string
  sellerApiUrl: string
  supplierFeedUrl: string
  /** 0-based row holding the spreadsheet column names */
  feedHeaderRow: number
  requestTimeoutMs: number
}

/** Validate sync settings from the environment (call after dotenv has loaded) */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SyncConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const problems = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`)
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`)
  }

  const e = parsed.data
  return {
    clientId: e.CLIENT_ID,
    sellerToken: e.SELLER_TOKEN,
    sellerApiUrl: e.SELLER_API_URL.replace(/\/+$/, ''),
    supplierFeedUrl: e.SUPPLIER_FEED_URL,
    feedHeaderRow: e.FEED_HEADER_ROW,
    requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
  }
}
