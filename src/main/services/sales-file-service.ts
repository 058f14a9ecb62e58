import { existsSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import { parse } from 'csv-parse/sync'
import iconv from 'iconv-lite'
import jschardet from 'jschardet'
import type { ParseResult, Transaction } from '../types'

export const FIELD_DELIMITER = '|'
export const FIELD_COUNT = 8
export const DEFAULT_ENCODINGS = ['utf-8', 'latin1', 'cp1252'] as const

const REPLACEMENT_CHAR = '\uFFFD'
const INTEGER_PATTERN = /^[+-]?\d+$/
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/

export class SalesFileNotFoundError extends Error {
  readonly filePath: string

  constructor(filePath: string) {
    super(`The file '${filePath}' was not found.`)
    this.name = 'SalesFileNotFoundError'
    this.filePath = filePath
  }
}

export class SalesDecodeError extends Error {
  readonly filePath: string
  readonly encodings: string[]

  constructor(filePath: string, encodings: string[]) {
    super(`Unable to decode '${filePath}' using supported encodings (${encodings.join(', ')}).`)
    this.name = 'SalesDecodeError'
    this.filePath = filePath
    this.encodings = encodings
  }
}

export interface ReadSalesOptions {
  encodings?: readonly string[]
  detectEncoding?: boolean
}

export interface SalesFileReadResult {
  lines: string[]
  encoding: string
}

const normalizeEncoding = (encoding: string): string => {
  const lowered = encoding.toLowerCase()
  return lowered === 'ascii'
    ? 'utf-8'
    : lowered === 'gb2312'
      ? 'gb18030'
      : lowered === 'windows-1252'
        ? 'utf-8'
        : lowered
}

const detectEncoding = (buffer: Buffer): string | null => {
  if (buffer.length === 0) {
    return null
  }
  const detected = jschardet.detect(buffer)
  return detected.encoding ? normalizeEncoding(detected.encoding) : null
}

const buildEncodingCandidates = (buffer: Buffer, options?: ReadSalesOptions): string[] => {
  const configured = options?.encodings ?? DEFAULT_ENCODINGS
  const detected = options?.detectEncoding === false ? null : detectEncoding(buffer)
  const ordered = detected ? [detected, ...configured] : [...configured]

  const seen = new Set<string>()
  const candidates: string[] = []
  for (const encoding of ordered) {
    const key = encoding.toLowerCase()
    if (seen.has(key)) {
      continue
    }
    seen.add(key)
    candidates.push(encoding)
  }
  return candidates
}

const decodeStrict = (buffer: Buffer, encoding: string): string | null => {
  if (!iconv.encodingExists(encoding)) {
    return null
  }
  const text = iconv.decode(buffer, encoding)
  return text.includes(REPLACEMENT_CHAR) ? null : text
}

const toDataLines = (text: string): string[] => {
  return text
    .replace(/^\uFEFF/, '')
    .split(/\r\n|\r|\n/)
    .slice(1)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
}

/**
 * Reads the sales log, trying each candidate encoding in priority order.
 * The header line is dropped and blank lines are removed.
 */
export const readSalesData = async (
  filePath: string,
  options?: ReadSalesOptions
): Promise<SalesFileReadResult> => {
  if (!existsSync(filePath)) {
    throw new SalesFileNotFoundError(filePath)
  }

  const buffer = await readFile(filePath)
  const candidates = buildEncodingCandidates(buffer, options)

  for (const encoding of candidates) {
    const text = decodeStrict(buffer, encoding)
    if (text !== null) {
      return { lines: toDataLines(text), encoding }
    }
  }

  throw new SalesDecodeError(filePath, candidates)
}

const cleanNumericText = (value: string): string => value.replace(/,/g, '').trim()

const parseQuantity = (value: string): number | null => {
  const cleaned = cleanNumericText(value)
  return INTEGER_PATTERN.test(cleaned) ? Number(cleaned) : null
}

const parseUnitPrice = (value: string): number | null => {
  const cleaned = cleanNumericText(value)
  if (!DECIMAL_PATTERN.test(cleaned)) {
    return null
  }
  const num = Number(cleaned)
  return Number.isFinite(num) ? num : null
}

const toTransaction = (fields: string[]): Transaction | null => {
  if (fields.length !== FIELD_COUNT) {
    return null
  }

  const [transactionId, date, productId, productName, quantityRaw, unitPriceRaw, customerId, region] = fields

  const quantity = parseQuantity(quantityRaw)
  const unitPrice = parseUnitPrice(unitPriceRaw)
  if (quantity === null || unitPrice === null) {
    return null
  }

  return {
    transactionId: transactionId.trim(),
    date: date.trim(),
    productId: productId.trim(),
    productName: productName.replace(/,/g, ' ').trim(),
    quantity,
    unitPrice,
    customerId: customerId.trim(),
    region: region.trim()
  }
}

const splitLines = (rawLines: readonly string[]): string[][] => {
  if (rawLines.length === 0) {
    return []
  }

  return parse(rawLines.join('\n'), {
    delimiter: FIELD_DELIMITER,
    quote: false,
    relax_column_count: true,
    skip_empty_lines: true,
    trim: false
  })
}

/**
 * Turns raw `|` delimited lines into transactions. Lines with the wrong
 * field count or unconvertible numbers are dropped and counted.
 */
export const parseTransactions = (rawLines: readonly string[]): ParseResult => {
  const transactions: Transaction[] = []

  for (const fields of splitLines(rawLines)) {
    const transaction = toTransaction(fields)
    if (transaction) {
      transactions.push(transaction)
    }
  }

  return {
    transactions,
    droppedLines: rawLines.length - transactions.length
  }
}

export const __internal__ = {
  normalizeEncoding,
  buildEncodingCandidates,
  decodeStrict,
  toDataLines,
  parseQuantity,
  parseUnitPrice
}
