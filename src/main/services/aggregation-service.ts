import type {
  CustomerStats,
  DailySales,
  PeakSalesDay,
  ProductSales,
  RegionSales,
  SalesAnalysis,
  ValidTransaction
} from '../types'

export const DEFAULT_TOP_N = 5
export const DEFAULT_LOW_THRESHOLD = 10

export class AggregationContractError extends Error {
  constructor(field: string, transactionId: string | undefined) {
    super(`Transaction ${transactionId ?? '(unknown)'} reached aggregation without a valid '${field}'.`)
    this.name = 'AggregationContractError'
  }
}

interface ProductBucket {
  productName: string
  totalQuantity: number
  totalRevenue: number
}

interface CustomerBucket {
  customerId: string
  totalSpent: number
  purchaseCount: number
  productsBought: Set<string>
}

interface DailyBucket {
  date: string
  revenue: number
  transactionCount: number
  customers: Set<string>
}

export const roundMoney = (value: number): number => Number(value.toFixed(2))

const compareText = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0)

const requireText = (txn: ValidTransaction, field: 'region' | 'productName' | 'customerId' | 'date'): string => {
  const value: unknown = txn[field]
  if (typeof value !== 'string') {
    throw new AggregationContractError(field, txn.transactionId)
  }
  return value
}

const requireNumber = (txn: ValidTransaction, field: 'quantity' | 'transactionAmount'): number => {
  const value: unknown = txn[field]
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new AggregationContractError(field, txn.transactionId)
  }
  return value
}

export const calculateTotalRevenue = (transactions: readonly ValidTransaction[]): number => {
  let total = 0
  for (const txn of transactions) {
    total += requireNumber(txn, 'transactionAmount')
  }
  return roundMoney(total)
}

export const regionWiseSales = (transactions: readonly ValidTransaction[]): RegionSales[] => {
  const groups = new Map<string, ValidTransaction[]>()
  for (const txn of transactions) {
    const region = requireText(txn, 'region')
    const list = groups.get(region) ?? []
    list.push(txn)
    groups.set(region, list)
  }

  const grandTotal = calculateTotalRevenue(transactions)

  return [...groups.entries()]
    .map(([region, txns]) => {
      const totalSales = calculateTotalRevenue(txns)
      return {
        region,
        totalSales,
        transactionCount: txns.length,
        percentage: grandTotal > 0 ? roundMoney((totalSales / grandTotal) * 100) : 0
      }
    })
    .sort((a, b) => b.totalSales - a.totalSales)
}

const aggregateByProduct = (transactions: readonly ValidTransaction[]): ProductSales[] => {
  const buckets = new Map<string, ProductBucket>()
  for (const txn of transactions) {
    const productName = requireText(txn, 'productName')
    const bucket = buckets.get(productName) ?? { productName, totalQuantity: 0, totalRevenue: 0 }
    bucket.totalQuantity += requireNumber(txn, 'quantity')
    bucket.totalRevenue += requireNumber(txn, 'transactionAmount')
    buckets.set(productName, bucket)
  }

  return [...buckets.values()].map((bucket) => ({
    productName: bucket.productName,
    totalQuantity: bucket.totalQuantity,
    totalRevenue: roundMoney(bucket.totalRevenue)
  }))
}

export const topSellingProducts = (
  transactions: readonly ValidTransaction[],
  n: number = DEFAULT_TOP_N
): ProductSales[] => {
  return aggregateByProduct(transactions)
    .sort((a, b) => b.totalQuantity - a.totalQuantity)
    .slice(0, Math.max(0, n))
}

export const lowPerformingProducts = (
  transactions: readonly ValidTransaction[],
  threshold: number = DEFAULT_LOW_THRESHOLD
): ProductSales[] => {
  return aggregateByProduct(transactions)
    .filter((product) => product.totalQuantity < threshold)
    .sort((a, b) => a.totalQuantity - b.totalQuantity)
}

export const customerAnalysis = (transactions: readonly ValidTransaction[]): CustomerStats[] => {
  const buckets = new Map<string, CustomerBucket>()
  for (const txn of transactions) {
    const customerId = requireText(txn, 'customerId')
    const bucket = buckets.get(customerId) ?? {
      customerId,
      totalSpent: 0,
      purchaseCount: 0,
      productsBought: new Set<string>()
    }
    bucket.totalSpent += requireNumber(txn, 'transactionAmount')
    bucket.purchaseCount += 1
    bucket.productsBought.add(requireText(txn, 'productName'))
    buckets.set(customerId, bucket)
  }

  return [...buckets.values()]
    .map((bucket) => ({
      customerId: bucket.customerId,
      totalSpent: roundMoney(bucket.totalSpent),
      purchaseCount: bucket.purchaseCount,
      avgOrderValue: roundMoney(bucket.totalSpent / bucket.purchaseCount),
      productsBought: [...bucket.productsBought].sort(compareText)
    }))
    .sort((a, b) => b.totalSpent - a.totalSpent)
}

/**
 * Date based analysis. The per-date grouping is built on first use and
 * reused by every later call on the same instance.
 */
export class SalesDateAnalyzer {
  private readonly transactions: readonly ValidTransaction[]
  private dailyData: Map<string, DailyBucket> | null = null

  constructor(transactions: readonly ValidTransaction[]) {
    this.transactions = transactions
  }

  private aggregateByDate(): Map<string, DailyBucket> {
    if (this.dailyData !== null) {
      return this.dailyData
    }

    const buckets = new Map<string, DailyBucket>()
    for (const txn of this.transactions) {
      const date = requireText(txn, 'date')
      const bucket = buckets.get(date) ?? {
        date,
        revenue: 0,
        transactionCount: 0,
        customers: new Set<string>()
      }
      bucket.revenue += requireNumber(txn, 'transactionAmount')
      bucket.transactionCount += 1
      bucket.customers.add(requireText(txn, 'customerId'))
      buckets.set(date, bucket)
    }

    this.dailyData = buckets
    return buckets
  }

  dailySalesTrend(): DailySales[] {
    return [...this.aggregateByDate().values()]
      .sort((a, b) => compareText(a.date, b.date))
      .map((bucket) => ({
        date: bucket.date,
        revenue: roundMoney(bucket.revenue),
        transactionCount: bucket.transactionCount,
        uniqueCustomers: bucket.customers.size
      }))
  }

  findPeakSalesDay(): PeakSalesDay | null {
    let peak: DailyBucket | null = null
    for (const bucket of this.aggregateByDate().values()) {
      if (peak === null || bucket.revenue > peak.revenue) {
        peak = bucket
      }
    }

    if (peak === null) {
      return null
    }

    return {
      date: peak.date,
      revenue: roundMoney(peak.revenue),
      transactionCount: peak.transactionCount
    }
  }
}

export interface AnalysisSettings {
  topN?: number
  lowThreshold?: number
}

export const analyzeSales = (
  transactions: readonly ValidTransaction[],
  settings?: AnalysisSettings
): SalesAnalysis => {
  const dateAnalyzer = new SalesDateAnalyzer(transactions)

  return {
    totalRevenue: calculateTotalRevenue(transactions),
    transactionCount: transactions.length,
    regionSales: regionWiseSales(transactions),
    topProducts: topSellingProducts(transactions, settings?.topN ?? DEFAULT_TOP_N),
    lowPerformers: lowPerformingProducts(transactions, settings?.lowThreshold ?? DEFAULT_LOW_THRESHOLD),
    customers: customerAnalysis(transactions),
    dailyTrend: dateAnalyzer.dailySalesTrend(),
    peakDay: dateAnalyzer.findPeakSalesDay()
  }
}
