import { max, mean, min } from 'simple-statistics'
import type { CanonicalType, CellValue, Column } from '../types'
import { createStats, type Stats } from './pmm'
import { isNullValue } from './table'

function uniqueKey(v: CellValue): string {
  if (v instanceof Date) return `date:${v.getTime()}`
  return `${typeof v}:${String(v)}`
}

function lexicalBounds(values: string[]): { min: string; max: string } | undefined {
  if (values.length === 0) return undefined
  const sorted = [...values].sort()
  return { min: sorted[0], max: sorted[sorted.length - 1] }
}

/**
 * Summary statistics for one column, read as `type`. Numeric columns get
 * bounds and a mean over their finite values; dates are reported as
 * ISO-8601 strings; empty columns get counts only.
 */
export function computeFieldStats(column: Column, type: CanonicalType): Stats {
  const present = column.values.filter((v) => !isNullValue(v))
  const named: Record<string, unknown> = {
    nnulls: column.values.length - present.length,
    nuniques: new Set(present.map(uniqueKey)).size,
  }

  if (type === 'integer' || type === 'real') {
    // infinities count as values but stay out of the bounds and mean
    const nums = present.filter((v): v is number => typeof v === 'number' && Number.isFinite(v))
    if (nums.length > 0) {
      named.min = min(nums)
      named.max = max(nums)
      named.mean = mean(nums)
    }
  } else if (type === 'boolean') {
    const bools = present.filter((v): v is boolean => typeof v === 'boolean')
    if (bools.length > 0) {
      named.min = bools.every(Boolean)
      named.max = bools.some(Boolean)
    }
  } else if (type === 'datestamp') {
    const times = present.filter((v): v is Date => v instanceof Date).map((d) => d.getTime())
    if (times.length > 0) {
      named.min = new Date(min(times)).toISOString()
      named.max = new Date(max(times)).toISOString()
    }
  } else {
    const bounds = lexicalBounds(present.map(String))
    if (bounds) {
      named.min = bounds.min
      named.max = bounds.max
    }
  }
  return createStats(named)
}
