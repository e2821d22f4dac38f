/**
 * Supplier stock feed: a zip archive holding one Excel workbook.
 *
 * Downloads the archive, unpacks it in memory, reads the first sheet with the
 * column header on a fixed row and reduces each row to a SupplierRecord.
 */

import { readFile } from 'node:fs/promises'
import { extname, posix } from 'node:path'
import JSZip from 'jszip'
import * as XLSX from 'xlsx'
import { fetchWithTimeout } from '../core/fetch-with-timeout'
import type { SupplierRecord } from '../schema/seller-catalog'

/** Spreadsheet column names → SupplierRecord fields */
export const FEED_COLUMNS = {
  code: 'Код',
  quantity: 'Количество',
  price: 'Цена',
} as const

export interface SupplierFeedOptions {
  /** 0-based row holding the column names */
  headerRow: number
  timeoutMs?: number
}

const WORKBOOK_EXT = /\.xlsx?$/i
/** Name the supplier publishes the workbook under */
const SUPPLIER_WORKBOOK = /^ostatki\.xlsx?$/i

function cellText(val: unknown): string {
  return val == null ? '' : String(val)
}

/** Reduce raw sheet rows to supplier records, dropping rows without a code */
export function mapSupplierRows(rows: Record<string, unknown>[]): SupplierRecord[] {
  return rows
    .map(row => ({
      // matched against offer IDs as-is
      code: cellText(row[FEED_COLUMNS.code]),
      quantity: cellText(row[FEED_COLUMNS.quantity]).trim(),
      price: cellText(row[FEED_COLUMNS.price]).trim(),
    }))
    .filter(record => record.code.trim())
}

/** Parse the first sheet of a workbook */
export function parseSupplierWorkbook(data: Uint8Array, headerRow: number): SupplierRecord[] {
  const workbook = XLSX.read(data, { type: 'array' })
  const sheetName = workbook.SheetNames[0]
  if (!sheetName) throw new Error('Supplier workbook has no sheets')

  const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(workbook.Sheets[sheetName], {
    range: headerRow,
    raw: false,
    defval: '',
  })
  return mapSupplierRows(rows)
}

/** Unpack the archive and parse the workbook inside it */
export async function parseSupplierArchive(
  data: Uint8Array,
  headerRow: number
): Promise<SupplierRecord[]> {
  const zip = await JSZip.loadAsync(data)
  // macOS archivers add __MACOSX/._<name> resource forks with the same extension
  const workbooks = zip
    .file(WORKBOOK_EXT)
    .filter(f => !f.name.startsWith('__MACOSX/') && !posix.basename(f.name).startsWith('._'))
  const entry = workbooks.find(f => SUPPLIER_WORKBOOK.test(posix.basename(f.name))) ?? workbooks[0]
  if (!entry) {
    throw new Error(`Supplier archive holds no workbook (entries: ${Object.keys(zip.files).join(', ') || 'none'})`)
  }

  console.log(`[feed] Reading ${entry.name} from archive`)
  const workbook = await entry.async('uint8array')
  return parseSupplierWorkbook(workbook, headerRow)
}

export async function downloadSupplierFeed(
  url: string,
  options: SupplierFeedOptions
): Promise<SupplierRecord[]> {
  console.log(`[feed] Downloading ${url}...`)
  const data = await fetchWithTimeout(
    url,
    async res => new Uint8Array(await res.arrayBuffer()),
    { timeoutMs: options.timeoutMs }
  )

  const records = await parseSupplierArchive(data, options.headerRow)
  console.log(`[feed] Loaded ${records.length} supplier rows`)
  return records
}

/** Load a local archive (.zip) or workbook (.xls / .xlsx) */
export async function loadSupplierFeedFile(
  path: string,
  options: SupplierFeedOptions
): Promise<SupplierRecord[]> {
  const data = new Uint8Array(await readFile(path))
  const records = WORKBOOK_EXT.test(extname(path))
    ? parseSupplierWorkbook(data, options.headerRow)
    : await parseSupplierArchive(data, options.headerRow)

  console.log(`[feed] Loaded ${records.length} supplier rows from ${path}`)
  return records
}
