import { z } from 'zod'
import { DEFAULT_LOW_THRESHOLD, DEFAULT_TOP_N } from './services/aggregation-service'
import { DEFAULT_ENCODINGS } from './services/sales-file-service'

export const DEFAULT_CATALOG_URL = 'https://dummyjson.com/products'

const optionalBound = z.number().finite().nullable().default(null)

export const AnalysisOptionsSchema = z
  .object({
    inputPath: z.string().min(1).default('data/sales_data.txt'),
    reportPath: z.string().min(1).default('output/sales_report.txt'),
    enrichedPath: z.string().min(1).default('data/enriched_sales_data.txt'),
    catalogUrl: z.string().url().default(DEFAULT_CATALOG_URL),
    enrich: z.boolean().default(true),
    encodings: z.array(z.string().min(1)).min(1).default([...DEFAULT_ENCODINGS]),
    detectEncoding: z.boolean().default(true),
    /** Number of best sellers to report. */
    topN: z.number().int().positive().default(DEFAULT_TOP_N),
    /** Products selling strictly fewer units than this are low performers. */
    lowThreshold: z.number().nonnegative().default(DEFAULT_LOW_THRESHOLD),
    region: z
      .string()
      .nullable()
      .default(null)
      .transform((value) => (value && value.trim() ? value.trim() : null)),
    minAmount: optionalBound,
    maxAmount: optionalBound
  })
  .strict()

export type AnalysisOptionsInput = z.input<typeof AnalysisOptionsSchema>
export type AnalysisOptions = z.output<typeof AnalysisOptionsSchema>

export const DEFAULT_ANALYSIS_OPTIONS: AnalysisOptions = AnalysisOptionsSchema.parse({})

export type ResolvedOptions =
  | { success: true; options: AnalysisOptions }
  | { success: false; message: string }

const formatIssues = (error: z.ZodError): string => {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
}

/**
 * Applies defaults and validation. `SALES_CATALOG_URL` overrides the
 * catalog endpoint unless the caller passes one.
 */
export const resolveAnalysisOptions = (
  input: AnalysisOptionsInput = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedOptions => {
  const envCatalogUrl = env.SALES_CATALOG_URL?.trim()
  const parsed = AnalysisOptionsSchema.safeParse({
    ...input,
    catalogUrl: input.catalogUrl ?? (envCatalogUrl || undefined)
  })

  if (!parsed.success) {
    return { success: false, message: formatIssues(parsed.error) }
  }
  return { success: true, options: parsed.data }
}

export interface AmountFilterInput {
  minAmount: number | null
  maxAmount: number | null
  warning?: string
}

const parseAmountText = (value: string | undefined): number | null | 'invalid' => {
  const cleaned = (value ?? '').replace(/,/g, '').trim()
  if (!cleaned) {
    return null
  }
  const num = Number(cleaned)
  return Number.isFinite(num) ? num : 'invalid'
}

/**
 * Converts user-entered bounds. Blank input means no bound; any unreadable
 * value disables both amount filters.
 */
export const parseAmountFilters = (minRaw?: string, maxRaw?: string): AmountFilterInput => {
  const minAmount = parseAmountText(minRaw)
  const maxAmount = parseAmountText(maxRaw)

  if (minAmount === 'invalid' || maxAmount === 'invalid') {
    return {
      minAmount: null,
      maxAmount: null,
      warning: 'Invalid amount entered. Skipping amount filters.'
    }
  }

  return { minAmount, maxAmount }
}
