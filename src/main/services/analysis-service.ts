import { resolveAnalysisOptions, type AnalysisOptions, type AnalysisOptionsInput } from '../config'
import type {
  EnrichmentSummary,
  FilterOptions,
  FilterSummary,
  SalesAnalysis,
  Transaction,
  ValidTransaction
} from '../types'
import { analyzeSales } from './aggregation-service'
import {
  createProductMapping,
  enrichSalesData,
  fetchAllProducts,
  saveEnrichedData,
  summarizeEnrichment,
  type CatalogHttpClient
} from './catalog-service'
import { generateSalesReport } from './report-service'
import {
  parseTransactions,
  readSalesData,
  SalesDecodeError,
  SalesFileNotFoundError
} from './sales-file-service'
import { getFilterOptions, validateAndFilter } from './validation-service'

export type AnalysisErrorCode = 'FILE_NOT_FOUND' | 'DECODE_FAILED' | 'INVALID_OPTIONS' | 'UNKNOWN'

export type PipelineStatus =
  | { stage: 'reading'; message: string; filePath: string }
  | { stage: 'parsing'; message: string; lineCount: number }
  | { stage: 'validating'; message: string; recordCount: number }
  | { stage: 'analyzing'; message: string; transactionCount: number }
  | { stage: 'enriching'; message: string }
  | { stage: 'reporting'; message: string; outputPath: string }
  | { stage: 'done'; message: string }
  | { stage: 'error'; message: string }

export type StatusListener = (status: PipelineStatus) => void

export interface PreviewResult {
  success: boolean
  encoding?: string
  readLines: number
  parseDropped: number
  parsedRecords: number
  filterOptions?: FilterOptions
  errorCode?: AnalysisErrorCode
  message?: string
}

export interface AnalysisRunResult {
  success: boolean
  encoding?: string
  readLines: number
  parseDropped: number
  summary?: FilterSummary
  analysis?: SalesAnalysis
  enrichment?: EnrichmentSummary | null
  reportPath?: string
  enrichedPath?: string
  warnings: string[]
  errorCode?: AnalysisErrorCode
  message?: string
}

export interface RunDependencies {
  catalogClient?: CatalogHttpClient
  now?: () => Date
}

interface LoadedRecords {
  encoding: string
  readLines: number
  parseDropped: number
  transactions: Transaction[]
}

const toFailure = (error: unknown): { errorCode: AnalysisErrorCode; message: string } => {
  if (error instanceof SalesFileNotFoundError) {
    return { errorCode: 'FILE_NOT_FOUND', message: error.message }
  }
  if (error instanceof SalesDecodeError) {
    return { errorCode: 'DECODE_FAILED', message: error.message }
  }
  return {
    errorCode: 'UNKNOWN',
    message: error instanceof Error ? error.message : 'Unexpected error'
  }
}

const loadRecords = async (options: AnalysisOptions, emit: StatusListener): Promise<LoadedRecords> => {
  emit({ stage: 'reading', message: `Reading ${options.inputPath}`, filePath: options.inputPath })
  const { lines, encoding } = await readSalesData(options.inputPath, {
    encodings: options.encodings,
    detectEncoding: options.detectEncoding
  })

  emit({ stage: 'parsing', message: `Parsing ${lines.length} lines`, lineCount: lines.length })
  const { transactions, droppedLines } = parseTransactions(lines)

  return { encoding, readLines: lines.length, parseDropped: droppedLines, transactions }
}

export const previewSalesFile = async (input: AnalysisOptionsInput = {}): Promise<PreviewResult> => {
  const resolved = resolveAnalysisOptions(input)
  if (!resolved.success) {
    return {
      success: false,
      readLines: 0,
      parseDropped: 0,
      parsedRecords: 0,
      errorCode: 'INVALID_OPTIONS',
      message: resolved.message
    }
  }

  try {
    const loaded = await loadRecords(resolved.options, () => undefined)
    return {
      success: true,
      encoding: loaded.encoding,
      readLines: loaded.readLines,
      parseDropped: loaded.parseDropped,
      parsedRecords: loaded.transactions.length,
      filterOptions: getFilterOptions(loaded.transactions)
    }
  } catch (error) {
    return { success: false, readLines: 0, parseDropped: 0, parsedRecords: 0, ...toFailure(error) }
  }
}

const runEnrichment = async (
  transactions: readonly ValidTransaction[],
  options: AnalysisOptions,
  deps: RunDependencies,
  warnings: string[]
): Promise<{ enrichment: EnrichmentSummary | null; enrichedPath?: string }> => {
  const fetched = await fetchAllProducts({ url: options.catalogUrl, client: deps.catalogClient })
  if (!fetched.success) {
    warnings.push(`Product catalog unavailable: ${fetched.message ?? 'unknown reason'}`)
    return { enrichment: null }
  }

  const enrichment = summarizeEnrichment(enrichSalesData(transactions, createProductMapping(fetched.products)))
  const saved = await saveEnrichedData(enrichment.enriched, options.enrichedPath)
  if (!saved.success) {
    warnings.push(`Failed to save enriched data to ${saved.outputPath}: ${saved.message ?? 'unknown reason'}`)
    return { enrichment }
  }
  return { enrichment, enrichedPath: saved.outputPath }
}

/**
 * Runs read → parse → validate/filter → aggregate → enrich → report.
 * Input errors stop the run; enrichment and output problems become warnings.
 */
export const runSalesAnalysis = async (
  input: AnalysisOptionsInput = {},
  onStatus?: StatusListener,
  deps: RunDependencies = {}
): Promise<AnalysisRunResult> => {
  const emit: StatusListener = onStatus ?? (() => undefined)
  const warnings: string[] = []

  const resolved = resolveAnalysisOptions(input)
  if (!resolved.success) {
    emit({ stage: 'error', message: resolved.message })
    return {
      success: false,
      readLines: 0,
      parseDropped: 0,
      warnings,
      errorCode: 'INVALID_OPTIONS',
      message: resolved.message
    }
  }
  const options = resolved.options

  try {
    const loaded = await loadRecords(options, emit)

    emit({
      stage: 'validating',
      message: `Validating ${loaded.transactions.length} records`,
      recordCount: loaded.transactions.length
    })
    const validation = validateAndFilter(loaded.transactions, {
      region: options.region,
      minAmount: options.minAmount,
      maxAmount: options.maxAmount
    })

    emit({
      stage: 'analyzing',
      message: `Analyzing ${validation.transactions.length} transactions`,
      transactionCount: validation.transactions.length
    })
    const analysis = analyzeSales(validation.transactions, {
      topN: options.topN,
      lowThreshold: options.lowThreshold
    })

    let enrichment: EnrichmentSummary | null = null
    let enrichedPath: string | undefined
    if (options.enrich) {
      emit({ stage: 'enriching', message: `Fetching product catalog from ${options.catalogUrl}` })
      const enriched = await runEnrichment(validation.transactions, options, deps, warnings)
      enrichment = enriched.enrichment
      enrichedPath = enriched.enrichedPath
    }

    emit({ stage: 'reporting', message: `Writing report to ${options.reportPath}`, outputPath: options.reportPath })
    const report = await generateSalesReport(
      {
        analysis,
        summary: validation.summary,
        enrichment,
        generatedAt: (deps.now ?? (() => new Date()))()
      },
      options.reportPath
    )
    if (!report.success) {
      warnings.push(`Failed to write report to ${report.outputPath}: ${report.message ?? 'unknown reason'}`)
    }

    emit({ stage: 'done', message: 'Process complete' })

    return {
      success: true,
      encoding: loaded.encoding,
      readLines: loaded.readLines,
      parseDropped: loaded.parseDropped,
      summary: validation.summary,
      analysis,
      enrichment,
      reportPath: report.success ? report.outputPath : undefined,
      enrichedPath,
      warnings
    }
  } catch (error) {
    const failure = toFailure(error)
    emit({ stage: 'error', message: failure.message })
    return { success: false, readLines: 0, parseDropped: 0, warnings, ...failure }
  }
}
