import { writeFile } from 'node:fs/promises'
import { extname } from 'node:path'
import dayjs from 'dayjs'
import ExcelJS from 'exceljs'
import type { EnrichmentSummary, FilterSummary, SalesAnalysis, WriteResult } from '../types'

export interface ReportInput {
  analysis: SalesAnalysis
  summary: FilterSummary
  enrichment: EnrichmentSummary | null
  generatedAt: Date
}

const RULE = '='.repeat(60)
const SECTION_RULE = '-'.repeat(60)
const REPORT_CUSTOMER_LIMIT = 5
const HEADER_FONT_NAME = 'Calibri'

const formatMoney = (value: number): string => {
  return value.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 })
}

const formatPercent = (value: number): string => `${value.toFixed(2)}%`

const formatRow = (cells: string[], widths: number[]): string => {
  return cells
    .map((cell, index) => (index < cells.length - 1 ? cell.padEnd(widths[index] ?? 0) : cell))
    .join('')
}

const section = (title: string, body: string[]): string[] => [title, SECTION_RULE, ...body, '']

const averageOrderValue = (analysis: SalesAnalysis): number => {
  return analysis.transactionCount > 0
    ? Number((analysis.totalRevenue / analysis.transactionCount).toFixed(2))
    : 0
}

const dateRange = (analysis: SalesAnalysis): string => {
  const first = analysis.dailyTrend[0]
  const last = analysis.dailyTrend[analysis.dailyTrend.length - 1]
  return first && last ? `${first.date} to ${last.date}` : 'N/A'
}

const renderHeader = (input: ReportInput): string[] => [
  RULE,
  'SALES ANALYTICS REPORT',
  `Generated: ${dayjs(input.generatedAt).format('YYYY-MM-DD HH:mm:ss')}`,
  `Records Processed: ${input.analysis.transactionCount}`,
  RULE,
  ''
]

const renderOverview = ({ analysis, summary }: ReportInput): string[] =>
  section('OVERALL SUMMARY', [
    formatRow(['Total Revenue:', formatMoney(analysis.totalRevenue)], [22]),
    formatRow(['Total Transactions:', String(analysis.transactionCount)], [22]),
    formatRow(['Average Order Value:', formatMoney(averageOrderValue(analysis))], [22]),
    formatRow(['Date Range:', dateRange(analysis)], [22]),
    formatRow(['Invalid Records:', String(summary.invalid)], [22]),
    formatRow(['Filtered Out:', String(summary.filteredByRegion + summary.filteredByAmount)], [22])
  ])

const renderRegions = ({ analysis }: ReportInput): string[] => {
  const widths = [14, 18, 14]
  return section('REGION-WISE PERFORMANCE', [
    formatRow(['Region', 'Sales', '% of Total', 'Transactions'], widths),
    ...analysis.regionSales.map((item) =>
      formatRow(
        [item.region, formatMoney(item.totalSales), formatPercent(item.percentage), String(item.transactionCount)],
        widths
      )
    )
  ])
}

const renderTopProducts = ({ analysis }: ReportInput): string[] => {
  const widths = [6, 24, 10]
  return section(`TOP ${analysis.topProducts.length} PRODUCTS`, [
    formatRow(['Rank', 'Product Name', 'Quantity', 'Revenue'], widths),
    ...analysis.topProducts.map((item, index) =>
      formatRow(
        [String(index + 1), item.productName, String(item.totalQuantity), formatMoney(item.totalRevenue)],
        widths
      )
    )
  ])
}

const renderCustomers = ({ analysis }: ReportInput): string[] => {
  const widths = [6, 14, 18]
  const customers = analysis.customers.slice(0, REPORT_CUSTOMER_LIMIT)
  return section(`TOP ${customers.length} CUSTOMERS`, [
    formatRow(['Rank', 'Customer ID', 'Total Spent', 'Orders'], widths),
    ...customers.map((item, index) =>
      formatRow([String(index + 1), item.customerId, formatMoney(item.totalSpent), String(item.purchaseCount)], widths)
    )
  ])
}

const renderDailyTrend = ({ analysis }: ReportInput): string[] => {
  const widths = [14, 18, 14]
  return section('DAILY SALES TREND', [
    formatRow(['Date', 'Revenue', 'Transactions', 'Unique Customers'], widths),
    ...analysis.dailyTrend.map((item) =>
      formatRow(
        [item.date, formatMoney(item.revenue), String(item.transactionCount), String(item.uniqueCustomers)],
        widths
      )
    )
  ])
}

const renderPerformance = ({ analysis }: ReportInput): string[] => {
  const peak = analysis.peakDay
  const lines = [
    peak
      ? `Best Selling Day: ${peak.date} (Revenue: ${formatMoney(peak.revenue)}, Transactions: ${peak.transactionCount})`
      : 'Best Selling Day: N/A'
  ]

  if (analysis.lowPerformers.length === 0) {
    lines.push('Low Performing Products: None')
  } else {
    lines.push('Low Performing Products:')
    for (const item of analysis.lowPerformers) {
      lines.push(`  ${item.productName}: ${item.totalQuantity} units, ${formatMoney(item.totalRevenue)}`)
    }
  }

  return section('PRODUCT PERFORMANCE ANALYSIS', lines)
}

const renderEnrichment = ({ enrichment }: ReportInput): string[] => {
  if (!enrichment) {
    return section('API ENRICHMENT SUMMARY', ['Enrichment skipped'])
  }

  const total = enrichment.enriched.length
  const rate = total > 0 ? (enrichment.matchedCount / total) * 100 : 0
  return section('API ENRICHMENT SUMMARY', [
    `Total Products Enriched: ${enrichment.matchedCount} / ${total}`,
    `Success Rate: ${formatPercent(rate)}`,
    `Products Not Enriched: ${enrichment.unmatchedProductIds.length > 0 ? enrichment.unmatchedProductIds.join(', ') : 'None'}`
  ])
}

export const renderTextReport = (input: ReportInput): string => {
  return [
    ...renderHeader(input),
    ...renderOverview(input),
    ...renderRegions(input),
    ...renderTopProducts(input),
    ...renderCustomers(input),
    ...renderDailyTrend(input),
    ...renderPerformance(input),
    ...renderEnrichment(input)
  ].join('\n')
}

const styleSheet = (worksheet: ExcelJS.Worksheet, widths: number[]): void => {
  worksheet.views = [{ state: 'frozen', ySplit: 1 }]
  worksheet.columns = widths.map((width) => ({ width }))

  worksheet.eachRow((row, rowNumber) => {
    row.alignment = { vertical: 'middle' }
    if (rowNumber === 1) {
      row.font = { name: HEADER_FONT_NAME, size: 11, bold: true }
    }
  })
}

const addSheet = (
  workbook: ExcelJS.Workbook,
  name: string,
  header: string[],
  rows: Array<Array<string | number>>,
  widths: number[]
): void => {
  const worksheet = workbook.addWorksheet(name)
  worksheet.addRow(header)
  for (const row of rows) {
    worksheet.addRow(row)
  }
  styleSheet(worksheet, widths)
}

export const buildReportWorkbook = (input: ReportInput): ExcelJS.Workbook => {
  const { analysis, enrichment } = input
  const workbook = new ExcelJS.Workbook()
  workbook.created = input.generatedAt

  addSheet(
    workbook,
    'Summary',
    ['Metric', 'Value'],
    [
      ['Total Revenue', analysis.totalRevenue],
      ['Total Transactions', analysis.transactionCount],
      ['Average Order Value', averageOrderValue(analysis)],
      ['Date Range', dateRange(analysis)],
      ['Peak Day', analysis.peakDay?.date ?? 'N/A'],
      ['Enriched', enrichment ? `${enrichment.matchedCount} / ${enrichment.enriched.length}` : 'skipped']
    ],
    [22, 24]
  )
  addSheet(
    workbook,
    'Regions',
    ['Region', 'Sales', '% of Total', 'Transactions'],
    analysis.regionSales.map((item) => [item.region, item.totalSales, item.percentage, item.transactionCount]),
    [14, 16, 12, 14]
  )
  addSheet(
    workbook,
    'Top Products',
    ['Product Name', 'Quantity', 'Revenue'],
    analysis.topProducts.map((item) => [item.productName, item.totalQuantity, item.totalRevenue]),
    [24, 10, 16]
  )
  addSheet(
    workbook,
    'Customers',
    ['Customer ID', 'Total Spent', 'Orders', 'Avg Order Value', 'Products'],
    analysis.customers.map((item) => [
      item.customerId,
      item.totalSpent,
      item.purchaseCount,
      item.avgOrderValue,
      item.productsBought.join(', ')
    ]),
    [14, 16, 10, 16, 40]
  )
  addSheet(
    workbook,
    'Daily Trend',
    ['Date', 'Revenue', 'Transactions', 'Unique Customers'],
    analysis.dailyTrend.map((item) => [item.date, item.revenue, item.transactionCount, item.uniqueCustomers]),
    [13, 16, 14, 18]
  )
  addSheet(
    workbook,
    'Low Performers',
    ['Product Name', 'Quantity', 'Revenue'],
    analysis.lowPerformers.map((item) => [item.productName, item.totalQuantity, item.totalRevenue]),
    [24, 10, 16]
  )

  return workbook
}

const isXlsxPath = (filePath: string): boolean => {
  return extname(filePath).toLowerCase() === '.xlsx'
}

/**
 * Writes the report as text, or as a workbook when the path ends in `.xlsx`.
 * Write failures are returned, not thrown.
 */
export const generateSalesReport = async (input: ReportInput, outputPath: string): Promise<WriteResult> => {
  try {
    if (isXlsxPath(outputPath)) {
      await buildReportWorkbook(input).xlsx.writeFile(outputPath)
    } else {
      await writeFile(outputPath, `${renderTextReport(input)}\n`, 'utf-8')
    }
    return { success: true, outputPath }
  } catch (error) {
    return {
      success: false,
      outputPath,
      errorCode: 'WRITE_FAILED',
      message: error instanceof Error ? error.message : 'Failed to write report'
    }
  }
}

export const __internal__ = {
  formatMoney,
  formatRow
}
