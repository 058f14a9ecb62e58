import { describe, expect, it } from 'vitest'
import type { ValidTransaction } from '../types'
import {
  AggregationContractError,
  analyzeSales,
  calculateTotalRevenue,
  customerAnalysis,
  lowPerformingProducts,
  regionWiseSales,
  roundMoney,
  SalesDateAnalyzer,
  topSellingProducts
} from './aggregation-service'

let sequence = 0

const txn = (
  date: string,
  productName: string,
  quantity: number,
  unitPrice: number,
  customerId: string,
  region: string
): ValidTransaction => {
  sequence += 1
  return {
    transactionId: `T${sequence}`,
    date,
    productId: `P${sequence}`,
    productName,
    quantity,
    unitPrice,
    customerId,
    region,
    transactionAmount: quantity * unitPrice
  }
}

const storeSales = (): ValidTransaction[] => [
  txn('2024-12-02', 'Laptop', 2, 45000, 'C1', 'North'),
  txn('2024-12-01', 'Mouse', 10, 500, 'C1', 'South'),
  txn('2024-12-02', 'Keyboard', 5, 800, 'C2', 'North'),
  txn('2024-12-03', 'Monitor', 3, 12000, 'C3', 'East'),
  txn('2024-12-01', 'Webcam', 1, 2000, 'C2', 'South'),
  txn('2024-12-03', 'Cable', 20, 100, 'C3', 'East'),
  txn('2024-12-01', 'Laptop', 1, 45000, 'C2', 'North')
]

const northSouth = (): ValidTransaction[] => [
  txn('2024-12-01', 'Laptop', 1, 100, 'C1', 'North'),
  txn('2024-12-02', 'Laptop', 2, 100, 'C2', 'North'),
  txn('2024-12-01', 'Mouse', 1, 50, 'C3', 'South')
]

describe('calculateTotalRevenue', () => {
  it('sums transaction amounts', () => {
    expect(calculateTotalRevenue(northSouth())).toBe(350)
    expect(calculateTotalRevenue(storeSales())).toBe(184000)
  })

  it('returns zero for no transactions', () => {
    expect(calculateTotalRevenue([])).toBe(0)
  })

  it('rounds to two decimals', () => {
    expect(calculateTotalRevenue([txn('2024-12-01', 'Pen', 1, 0.1, 'C1', 'North'), txn('2024-12-01', 'Pen', 1, 0.2, 'C1', 'North')])).toBe(0.3)
    expect(roundMoney(10.004)).toBe(10)
    expect(roundMoney(0.125)).toBe(0.13)
    expect(roundMoney(1.005)).toBe(1)
  })

  it('fails loudly on a record without an amount', () => {
    const broken = { ...northSouth()[0], transactionAmount: undefined } as unknown as ValidTransaction
    expect(() => calculateTotalRevenue([broken])).toThrow(AggregationContractError)
  })
})

describe('regionWiseSales', () => {
  it('computes totals, counts and percentages', () => {
    expect(regionWiseSales(northSouth())).toEqual([
      { region: 'North', totalSales: 300, transactionCount: 2, percentage: 85.71 },
      { region: 'South', totalSales: 50, transactionCount: 1, percentage: 14.29 }
    ])
  })

  it('orders regions by sales descending', () => {
    expect(regionWiseSales(storeSales())).toEqual([
      { region: 'North', totalSales: 139000, transactionCount: 3, percentage: 75.54 },
      { region: 'East', totalSales: 38000, transactionCount: 2, percentage: 20.65 },
      { region: 'South', totalSales: 7000, transactionCount: 2, percentage: 3.8 }
    ])
  })

  it('keeps first occurrence order for equal totals', () => {
    const regions = regionWiseSales([
      txn('2024-12-01', 'Pen', 1, 100, 'C1', 'West'),
      txn('2024-12-01', 'Pen', 1, 100, 'C1', 'East')
    ]).map((item) => item.region)
    expect(regions).toEqual(['West', 'East'])
  })

  it('agrees with the overall total', () => {
    const sales = storeSales()
    const regions = regionWiseSales(sales)
    const regionSum = regions.reduce((sum, item) => sum + item.totalSales, 0)
    const percentSum = regions.reduce((sum, item) => sum + item.percentage, 0)

    expect(Math.abs(regionSum - calculateTotalRevenue(sales))).toBeLessThanOrEqual(0.01)
    expect(percentSum).toBeCloseTo(100, 1)
  })

  it('returns nothing for no transactions', () => {
    expect(regionWiseSales([])).toEqual([])
  })
})

describe('topSellingProducts', () => {
  it('returns the best sellers by quantity', () => {
    expect(topSellingProducts(storeSales(), 3)).toEqual([
      { productName: 'Cable', totalQuantity: 20, totalRevenue: 2000 },
      { productName: 'Mouse', totalQuantity: 10, totalRevenue: 5000 },
      { productName: 'Keyboard', totalQuantity: 5, totalRevenue: 4000 }
    ])
  })

  it('defaults to five entries and keeps encounter order on ties', () => {
    const names = topSellingProducts(storeSales()).map((item) => item.productName)
    expect(names).toEqual(['Cable', 'Mouse', 'Keyboard', 'Laptop', 'Monitor'])
  })

  it('groups quantity and revenue by product name', () => {
    const laptop = topSellingProducts(storeSales(), 10).find((item) => item.productName === 'Laptop')
    expect(laptop).toEqual({ productName: 'Laptop', totalQuantity: 3, totalRevenue: 135000 })
  })
})

describe('lowPerformingProducts', () => {
  it('returns products under the threshold in ascending order', () => {
    expect(lowPerformingProducts(storeSales())).toEqual([
      { productName: 'Webcam', totalQuantity: 1, totalRevenue: 2000 },
      { productName: 'Laptop', totalQuantity: 3, totalRevenue: 135000 },
      { productName: 'Monitor', totalQuantity: 3, totalRevenue: 36000 },
      { productName: 'Keyboard', totalQuantity: 5, totalRevenue: 4000 }
    ])
  })

  it('uses a strict threshold', () => {
    expect(lowPerformingProducts(storeSales(), 0)).toEqual([])
    expect(lowPerformingProducts(storeSales(), 10).map((item) => item.productName)).not.toContain('Mouse')
    expect(lowPerformingProducts(storeSales(), 100)).toHaveLength(6)
  })
})

describe('customerAnalysis', () => {
  it('summarizes spend per customer', () => {
    expect(customerAnalysis(storeSales())).toEqual([
      {
        customerId: 'C1',
        totalSpent: 95000,
        purchaseCount: 2,
        avgOrderValue: 47500,
        productsBought: ['Laptop', 'Mouse']
      },
      {
        customerId: 'C2',
        totalSpent: 51000,
        purchaseCount: 3,
        avgOrderValue: 17000,
        productsBought: ['Keyboard', 'Laptop', 'Webcam']
      },
      {
        customerId: 'C3',
        totalSpent: 38000,
        purchaseCount: 2,
        avgOrderValue: 19000,
        productsBought: ['Cable', 'Monitor']
      }
    ])
  })

  it('lists each product once', () => {
    const [customer] = customerAnalysis([
      txn('2024-12-01', 'Pen', 1, 10, 'C9', 'North'),
      txn('2024-12-02', 'Pen', 2, 10, 'C9', 'North')
    ])
    expect(customer?.productsBought).toEqual(['Pen'])
    expect(customer?.avgOrderValue).toBe(15)
  })
})

describe('SalesDateAnalyzer', () => {
  it('builds the daily trend in date order', () => {
    expect(new SalesDateAnalyzer(storeSales()).dailySalesTrend()).toEqual([
      { date: '2024-12-01', revenue: 52000, transactionCount: 3, uniqueCustomers: 2 },
      { date: '2024-12-02', revenue: 94000, transactionCount: 2, uniqueCustomers: 2 },
      { date: '2024-12-03', revenue: 38000, transactionCount: 2, uniqueCustomers: 1 }
    ])
  })

  it('finds the peak sales day', () => {
    expect(new SalesDateAnalyzer(storeSales()).findPeakSalesDay()).toEqual({
      date: '2024-12-02',
      revenue: 94000,
      transactionCount: 2
    })
  })

  it('returns the first encountered date on a revenue tie', () => {
    const analyzer = new SalesDateAnalyzer([
      txn('2024-12-05', 'Pen', 1, 100, 'C1', 'North'),
      txn('2024-12-04', 'Pen', 1, 100, 'C2', 'North')
    ])
    expect(analyzer.findPeakSalesDay()?.date).toBe('2024-12-05')
  })

  it('handles an empty dataset', () => {
    const analyzer = new SalesDateAnalyzer([])
    expect(analyzer.dailySalesTrend()).toEqual([])
    expect(analyzer.findPeakSalesDay()).toBeNull()
  })

  it('gives the same answers as a fresh analyzer regardless of call order', () => {
    const sales = storeSales()
    const reused = new SalesDateAnalyzer(sales)

    const peakFirst = reused.findPeakSalesDay()
    const trendSecond = reused.dailySalesTrend()
    const trendAgain = reused.dailySalesTrend()
    const peakAgain = reused.findPeakSalesDay()

    const fresh = new SalesDateAnalyzer(sales)
    expect(trendSecond).toEqual(fresh.dailySalesTrend())
    expect(trendAgain).toEqual(trendSecond)
    expect(peakFirst).toEqual(new SalesDateAnalyzer(sales).findPeakSalesDay())
    expect(peakAgain).toEqual(peakFirst)
  })
})

describe('analyzeSales', () => {
  it('bundles every aggregation', () => {
    const analysis = analyzeSales(northSouth(), { topN: 1, lowThreshold: 2 })

    expect(analysis.totalRevenue).toBe(350)
    expect(analysis.transactionCount).toBe(3)
    expect(analysis.topProducts).toEqual([{ productName: 'Laptop', totalQuantity: 3, totalRevenue: 300 }])
    expect(analysis.lowPerformers).toEqual([{ productName: 'Mouse', totalQuantity: 1, totalRevenue: 50 }])
    expect(analysis.peakDay).toEqual({ date: '2024-12-02', revenue: 200, transactionCount: 1 })
    expect(analysis.dailyTrend.map((day) => day.date)).toEqual(['2024-12-01', '2024-12-02'])
  })
})
