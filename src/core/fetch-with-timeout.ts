/**
 * Fetch wrapper with a timeout. Failures come back as ApiError with a kind the
 * runner can classify; nothing here retries.
 */

import { ApiError } from './errors'

export interface FetchOptions extends RequestInit {
  timeoutMs?: number
}

/**
 * Fetch `url` and consume the body with `read`. The timeout covers the whole
 * exchange, body included.
 */
export async function fetchWithTimeout<T>(
  url: string,
  read: (res: Response) => Promise<T>,
  options: FetchOptions = {}
): Promise<T> {
  const { timeoutMs = 30_000, ...fetchOpts } = options

  const controller = new AbortController()
  const timer = setTimeout(() => controller.abort(), timeoutMs)
  const timeoutError = () =>
    new ApiError(`Request to ${url} timed out after ${timeoutMs}ms`, 'timeout', url)

  try {
    let res: Response
    try {
      res = await fetch(url, {
        ...fetchOpts,
        signal: controller.signal,
      })
    } catch (err) {
      if (controller.signal.aborted) throw timeoutError()
      const reason = err instanceof Error ? err.message : String(err)
      throw new ApiError(`Request to ${url} failed: ${reason}`, 'connection', url)
    }

    if (!res.ok) {
      const body = await res.text().catch(() => '')
      throw new ApiError(
        `HTTP ${res.status} from ${url}${body ? `: ${body.slice(0, 200)}` : ''}`,
        'http',
        url,
        res.status
      )
    }

    try {
      return await read(res)
    } catch (err) {
      if (controller.signal.aborted) throw timeoutError()
      throw err
    }
  } finally {
    clearTimeout(timer)
  }
}
