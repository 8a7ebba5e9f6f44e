/**
 * Maps a column's storage type onto one of the five canonical types, and
 * builds vanilla Field / Metadata records for a table that has no sidecar.
 */

import { isCanonicalType, type CanonicalType, type Column, type Table } from '../types'
import { ErrorCode, PmmError } from './errors'
import { createField, createMetadata, type Field, type Metadata } from './pmm'
import { isNullValue } from './table'

export function inferCanonicalType(column: Column, override?: string): CanonicalType {
  if (override) {
    if (!isCanonicalType(override)) {
      throw new PmmError(ErrorCode.UNKNOWN_TYPE, `Unknown PMM type: ${override}`, { column: column.name, type: override })
    }
    return override
  }
  const s = column.storage
  if (s === 'bool') return 'boolean'
  if (/^u?int/.test(s)) return 'integer'
  if (s.startsWith('float')) return 'real'
  if (s === 'object') {
    // untyped column: decided by its first non-null value
    const first = column.values.find((v) => !isNullValue(v))
    return typeof first === 'boolean' ? 'boolean' : 'string'
  }
  if (s.startsWith('date')) return 'datestamp'
  throw new PmmError(ErrorCode.UNKNOWN_STORAGE_TYPE, `Unknown storage type: ${s}`, { column: column.name, storage: s })
}

export function inferField(column: Column, override?: string): Field {
  return createField(column.name, inferCanonicalType(column, override))
}

export function inferMetadata(table: Table, name: string): Metadata {
  return createMetadata(name, table.rowCount, table.columns.map((c) => inferField(c)))
}
