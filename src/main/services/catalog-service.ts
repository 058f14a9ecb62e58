import { writeFile } from 'node:fs/promises'
import axios from 'axios'
import { stringify } from 'csv-stringify/sync'
import { z } from 'zod'
import type {
  CatalogProduct,
  EnrichedTransaction,
  EnrichmentSummary,
  ValidTransaction,
  WriteResult
} from '../types'

export const CATALOG_PAGE_LIMIT = 100
export const CATALOG_TIMEOUT_MS = 10_000

export const ENRICHED_COLUMNS = [
  { key: 'transactionId', header: 'TransactionID' },
  { key: 'date', header: 'Date' },
  { key: 'productId', header: 'ProductID' },
  { key: 'productName', header: 'ProductName' },
  { key: 'quantity', header: 'Quantity' },
  { key: 'unitPrice', header: 'UnitPrice' },
  { key: 'customerId', header: 'CustomerID' },
  { key: 'region', header: 'Region' },
  { key: 'apiCategory', header: 'API_Category' },
  { key: 'apiBrand', header: 'API_Brand' },
  { key: 'apiRating', header: 'API_Rating' },
  { key: 'apiMatch', header: 'API_Match' }
] as const satisfies ReadonlyArray<{ key: keyof EnrichedTransaction; header: string }>

// Only the id is required; a product with unreadable details still matches.
const CatalogProductSchema = z.object({
  id: z.number().int(),
  title: z.string().nullable().catch(null),
  category: z.string().nullable().catch(null),
  brand: z.string().catch('N/A'),
  price: z.number().nullable().catch(null),
  rating: z.number().nullable().catch(null)
})

const CatalogResponseSchema = z.object({
  products: z.array(z.unknown()).default([])
})

export interface CatalogHttpClient {
  get(url: string, config?: { params?: Record<string, unknown>; timeout?: number }): Promise<{ data: unknown }>
}

export interface CatalogFetchOptions {
  url: string
  client?: CatalogHttpClient
}

export interface CatalogFetchResult {
  success: boolean
  products: CatalogProduct[]
  message?: string
}

/**
 * Fetches one page of the product catalog. Failures come back as
 * `success: false` with an empty product list.
 */
export const fetchAllProducts = async (options: CatalogFetchOptions): Promise<CatalogFetchResult> => {
  const client: CatalogHttpClient = options.client ?? axios
  try {
    const response = await client.get(options.url, {
      params: { limit: CATALOG_PAGE_LIMIT },
      timeout: CATALOG_TIMEOUT_MS
    })

    const parsed = CatalogResponseSchema.safeParse(response.data)
    if (!parsed.success) {
      return {
        success: false,
        products: [],
        message: `Unexpected catalog response: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`
      }
    }

    const products: CatalogProduct[] = []
    for (const item of parsed.data.products) {
      const product = CatalogProductSchema.safeParse(item)
      if (product.success) {
        products.push(product.data)
      }
    }
    return { success: true, products }
  } catch (error) {
    return {
      success: false,
      products: [],
      message: error instanceof Error ? error.message : 'Catalog request failed'
    }
  }
}

export const createProductMapping = (products: readonly CatalogProduct[]): Map<number, CatalogProduct> => {
  const mapping = new Map<number, CatalogProduct>()
  for (const product of products) {
    if (!Number.isInteger(product.id)) {
      continue
    }
    mapping.set(product.id, product)
  }
  return mapping
}

/** `P101` → 101; ids without digits yield null. */
export const extractNumericProductId = (productId: string): number | null => {
  const digits = productId.replace(/\D/g, '')
  return digits ? Number(digits) : null
}

const toEnriched = (txn: ValidTransaction, product: CatalogProduct | undefined): EnrichedTransaction => {
  if (!product) {
    return { ...txn, apiCategory: null, apiBrand: null, apiRating: null, apiMatch: false }
  }
  return {
    ...txn,
    apiCategory: product.category,
    apiBrand: product.brand,
    apiRating: product.rating,
    apiMatch: true
  }
}

export const enrichSalesData = (
  transactions: readonly ValidTransaction[],
  mapping: ReadonlyMap<number, CatalogProduct>
): EnrichedTransaction[] => {
  return transactions.map((txn) => {
    const numericId = extractNumericProductId(txn.productId)
    return toEnriched(txn, numericId === null ? undefined : mapping.get(numericId))
  })
}

export const summarizeEnrichment = (enriched: EnrichedTransaction[]): EnrichmentSummary => {
  const unmatched = new Set<string>()
  let matchedCount = 0
  for (const txn of enriched) {
    if (txn.apiMatch) {
      matchedCount += 1
    } else {
      unmatched.add(txn.productId)
    }
  }
  return {
    enriched,
    matchedCount,
    unmatchedProductIds: [...unmatched].sort()
  }
}

export const formatEnrichedData = (enriched: readonly EnrichedTransaction[]): string => {
  return stringify(
    [...enriched],
    {
      header: true,
      delimiter: '|',
      quote: '',
      columns: ENRICHED_COLUMNS.map((column) => ({ key: column.key, header: column.header })),
      cast: {
        boolean: (value) => (value ? 'True' : 'False')
      }
    }
  )
}

export const saveEnrichedData = async (
  enriched: readonly EnrichedTransaction[],
  outputPath: string
): Promise<WriteResult> => {
  try {
    await writeFile(outputPath, formatEnrichedData(enriched), 'utf-8')
    return { success: true, outputPath }
  } catch (error) {
    return {
      success: false,
      outputPath,
      errorCode: 'WRITE_FAILED',
      message: error instanceof Error ? error.message : 'Failed to save enriched data'
    }
  }
}
