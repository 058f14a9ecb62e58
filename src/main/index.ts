import { stdin as input, stdout as output } from 'node:process'
import { createInterface } from 'node:readline/promises'
import yargs from 'yargs'
import { hideBin } from 'yargs/helpers'
import { DEFAULT_ANALYSIS_OPTIONS, parseAmountFilters, type AnalysisOptionsInput } from './config'
import {
  previewSalesFile,
  runSalesAnalysis,
  type AnalysisRunResult,
  type PipelineStatus
} from './services/analysis-service'
import type { FilterOptions } from './types'

interface FilterChoice {
  region: string | null
  minAmount: number | null
  maxAmount: number | null
}

const RULE = '='.repeat(40)

const printStatus = (status: PipelineStatus): void => {
  if (status.stage === 'error') {
    console.error(`Error: ${status.message}`)
    return
  }
  console.log(`[${status.stage}] ${status.message}`)
}

const printFilterOptions = (options: FilterOptions): void => {
  if (options.regions.length > 0) {
    console.log(`Available Regions: ${options.regions.join(', ')}`)
  }
  if (options.amountRange) {
    console.log(`Transaction Amount Range: ${options.amountRange.min} to ${options.amountRange.max}`)
  }
}

const promptFilters = async (options: FilterOptions): Promise<FilterChoice | null> => {
  const rl = createInterface({ input, output })
  try {
    printFilterOptions(options)
    const choice = (await rl.question('Do you want to filter data? (y/n): ')).trim().toLowerCase()
    if (choice !== 'y') {
      return null
    }

    const region = (await rl.question('Enter region to filter (or press Enter to skip): ')).trim()
    const minRaw = await rl.question('Enter minimum transaction amount (or press Enter to skip): ')
    const maxRaw = await rl.question('Enter maximum transaction amount (or press Enter to skip): ')

    const amounts = parseAmountFilters(minRaw, maxRaw)
    if (amounts.warning) {
      console.log(amounts.warning)
    }

    return { region: region || null, minAmount: amounts.minAmount, maxAmount: amounts.maxAmount }
  } finally {
    rl.close()
  }
}

const printResult = (result: AnalysisRunResult): void => {
  if (!result.success) {
    console.error(`Analysis failed (${result.errorCode ?? 'UNKNOWN'}): ${result.message ?? 'unknown error'}`)
    return
  }

  if (result.summary) {
    console.log(
      `Valid: ${result.summary.finalCount} | Invalid: ${result.summary.invalid} | Dropped while parsing: ${result.parseDropped}`
    )
  }
  if (result.analysis) {
    console.log(`Total revenue: ${result.analysis.totalRevenue.toFixed(2)}`)
  }
  for (const warning of result.warnings) {
    console.warn(`Warning: ${warning}`)
  }
  if (result.enrichedPath) {
    console.log(`Enriched data saved to: ${result.enrichedPath}`)
  }
  if (result.reportPath) {
    console.log(`Report saved to: ${result.reportPath}`)
  }
}

const parseArgs = async () => {
  return await yargs(hideBin(process.argv))
    .scriptName('sales-analytics')
    .options({
      file: { type: 'string', default: DEFAULT_ANALYSIS_OPTIONS.inputPath, describe: 'Pipe-delimited sales file' },
      region: { type: 'string', describe: 'Keep only this region' },
      'min-amount': { type: 'string', describe: 'Minimum transaction amount (inclusive)' },
      'max-amount': { type: 'string', describe: 'Maximum transaction amount (inclusive)' },
      'top-n': { type: 'number', default: DEFAULT_ANALYSIS_OPTIONS.topN, describe: 'Number of top products' },
      'low-threshold': {
        type: 'number',
        default: DEFAULT_ANALYSIS_OPTIONS.lowThreshold,
        describe: 'Quantity below which a product is low performing'
      },
      report: { type: 'string', default: DEFAULT_ANALYSIS_OPTIONS.reportPath, describe: 'Report path (.txt or .xlsx)' },
      'enriched-output': {
        type: 'string',
        default: DEFAULT_ANALYSIS_OPTIONS.enrichedPath,
        describe: 'Enriched data output path'
      },
      'catalog-url': { type: 'string', describe: 'Product catalog endpoint' },
      enrich: { type: 'boolean', default: true, describe: 'Enrich records from the product catalog' },
      interactive: { type: 'boolean', default: Boolean(process.stdin.isTTY), describe: 'Prompt for filters' }
    })
    .strict()
    .help()
    .parseAsync()
}

const main = async (): Promise<number> => {
  const argv = await parseArgs()

  console.log(RULE)
  console.log('SALES ANALYTICS SYSTEM')
  console.log(RULE)

  const amounts = parseAmountFilters(argv['min-amount'], argv['max-amount'])
  if (amounts.warning) {
    console.log(amounts.warning)
  }

  const options: AnalysisOptionsInput = {
    inputPath: argv.file,
    reportPath: argv.report,
    enrichedPath: argv['enriched-output'],
    catalogUrl: argv['catalog-url'],
    enrich: argv.enrich,
    topN: argv['top-n'],
    lowThreshold: argv['low-threshold'],
    region: argv.region ?? null,
    minAmount: amounts.minAmount,
    maxAmount: amounts.maxAmount
  }

  if (argv.interactive) {
    const preview = await previewSalesFile(options)
    if (!preview.success) {
      console.error(`File error: ${preview.message ?? 'unable to read input'}`)
      return 1
    }
    console.log(`Read ${preview.readLines} lines, parsed ${preview.parsedRecords} records`)

    const chosen = await promptFilters(preview.filterOptions ?? { regions: [], amountRange: null })
    if (chosen) {
      Object.assign(options, chosen)
    }
  }

  const result = await runSalesAnalysis(options, printStatus)
  printResult(result)
  return result.success ? 0 : 1
}

main()
  .then((code) => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    console.error(`Unexpected error: ${error instanceof Error ? error.message : String(error)}`)
    process.exitCode = 1
  })
