import {
  TRANSACTION_FIELDS,
  type FilterOptions,
  type Transaction,
  type TransactionFilters,
  type ValidTransaction,
  type ValidationOutcome
} from '../types'

export const ID_PREFIXES = {
  transactionId: 'T',
  productId: 'P',
  customerId: 'C'
} as const

type CandidateRecord = Partial<Transaction>

const NUMERIC_FIELDS = new Set<keyof Transaction>(['quantity', 'unitPrice'])

const hasRequiredFields = (record: CandidateRecord): record is Transaction => {
  return TRANSACTION_FIELDS.every((field) => {
    const value = record[field]
    return NUMERIC_FIELDS.has(field) ? typeof value === 'number' : typeof value === 'string'
  })
}

const hasValidIds = (record: Transaction): boolean => {
  return (
    record.transactionId.startsWith(ID_PREFIXES.transactionId) &&
    record.productId.startsWith(ID_PREFIXES.productId) &&
    record.customerId.startsWith(ID_PREFIXES.customerId)
  )
}

const hasPositiveNumbers = (record: Transaction): boolean => {
  return record.quantity > 0 && record.unitPrice > 0
}

export const isValidTransaction = (record: CandidateRecord): record is Transaction => {
  return hasRequiredFields(record) && hasValidIds(record) && hasPositiveNumbers(record)
}

const toBound = (value: number | null | undefined): number | null => {
  return typeof value === 'number' && Number.isFinite(value) ? value : null
}

const collectFilterOptions = (transactions: readonly ValidTransaction[]): FilterOptions => {
  const regions = new Set<string>()
  let min = Number.POSITIVE_INFINITY
  let max = Number.NEGATIVE_INFINITY

  for (const txn of transactions) {
    regions.add(txn.region)
    min = Math.min(min, txn.transactionAmount)
    max = Math.max(max, txn.transactionAmount)
  }

  return {
    regions: [...regions].sort(),
    amountRange: transactions.length > 0 ? { min, max } : null
  }
}

/**
 * Validates parsed records, attaches `transactionAmount`, then applies the
 * region filter followed by the inclusive amount filter.
 */
export const validateAndFilter = (
  records: readonly CandidateRecord[],
  filters?: TransactionFilters
): ValidationOutcome => {
  let invalidCount = 0
  const valid: ValidTransaction[] = []

  for (const record of records) {
    if (!isValidTransaction(record)) {
      invalidCount += 1
      continue
    }
    valid.push({ ...record, transactionAmount: record.quantity * record.unitPrice })
  }

  const options = collectFilterOptions(valid)

  let transactions = valid
  let filteredByRegion = 0
  const region = filters?.region
  if (region) {
    const before = transactions.length
    transactions = transactions.filter((txn) => txn.region === region)
    filteredByRegion = before - transactions.length
  }

  let filteredByAmount = 0
  const minAmount = toBound(filters?.minAmount)
  const maxAmount = toBound(filters?.maxAmount)
  if (minAmount !== null || maxAmount !== null) {
    const before = transactions.length
    transactions = transactions.filter(
      (txn) =>
        (minAmount === null || txn.transactionAmount >= minAmount) &&
        (maxAmount === null || txn.transactionAmount <= maxAmount)
    )
    filteredByAmount = before - transactions.length
  }

  return {
    transactions,
    invalidCount,
    summary: {
      totalInput: records.length,
      invalid: invalidCount,
      filteredByRegion,
      filteredByAmount,
      finalCount: transactions.length
    },
    options
  }
}

export const getFilterOptions = (records: readonly CandidateRecord[]): FilterOptions => {
  return validateAndFilter(records).options
}
