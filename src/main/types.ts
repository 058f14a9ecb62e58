export const TRANSACTION_FIELDS = [
  'transactionId',
  'date',
  'productId',
  'productName',
  'quantity',
  'unitPrice',
  'customerId',
  'region'
] as const

export type TransactionField = (typeof TRANSACTION_FIELDS)[number]

export interface Transaction {
  transactionId: string
  /** ISO-like `YYYY-MM-DD`, compared as a plain string. */
  date: string
  productId: string
  productName: string
  quantity: number
  unitPrice: number
  customerId: string
  region: string
}

export interface ValidTransaction extends Transaction {
  transactionAmount: number
}

export interface EnrichedTransaction extends ValidTransaction {
  apiCategory: string | null
  apiBrand: string | null
  apiRating: number | null
  apiMatch: boolean
}

export interface ParseResult {
  transactions: Transaction[]
  droppedLines: number
}

export interface AmountRange {
  min: number
  max: number
}

export interface FilterOptions {
  regions: string[]
  amountRange: AmountRange | null
}

export interface TransactionFilters {
  region?: string | null
  minAmount?: number | null
  maxAmount?: number | null
}

export interface FilterSummary {
  totalInput: number
  invalid: number
  filteredByRegion: number
  filteredByAmount: number
  finalCount: number
}

export interface ValidationOutcome {
  transactions: ValidTransaction[]
  invalidCount: number
  summary: FilterSummary
  options: FilterOptions
}

export interface RegionSales {
  region: string
  totalSales: number
  transactionCount: number
  percentage: number
}

export interface ProductSales {
  productName: string
  totalQuantity: number
  totalRevenue: number
}

export interface CustomerStats {
  customerId: string
  totalSpent: number
  purchaseCount: number
  avgOrderValue: number
  productsBought: string[]
}

export interface DailySales {
  date: string
  revenue: number
  transactionCount: number
  uniqueCustomers: number
}

export interface PeakSalesDay {
  date: string
  revenue: number
  transactionCount: number
}

export interface SalesAnalysis {
  totalRevenue: number
  transactionCount: number
  regionSales: RegionSales[]
  topProducts: ProductSales[]
  lowPerformers: ProductSales[]
  customers: CustomerStats[]
  dailyTrend: DailySales[]
  peakDay: PeakSalesDay | null
}

export interface CatalogProduct {
  id: number
  title: string | null
  category: string | null
  brand: string
  price: number | null
  rating: number | null
}

export interface EnrichmentSummary {
  enriched: EnrichedTransaction[]
  matchedCount: number
  unmatchedProductIds: string[]
}

export interface WriteResult {
  success: boolean
  outputPath: string
  errorCode?: 'WRITE_FAILED'
  message?: string
}
