/** Logical column type recorded in the sidecar, independent of how the table stores it */
export type CanonicalType = 'boolean' | 'integer' | 'real' | 'string' | 'datestamp'

export const CANONICAL_TYPES: readonly CanonicalType[] = ['boolean', 'integer', 'real', 'string', 'datestamp']

/** Role of a field in a predictive model */
export const ROLES = [
  'independent', // predictor
  'dependent', // outcome
  'treatment', // which treatment, if any
  'weight',
  'auxiliary', // e.g. a value field
  'validation', // cross-validation partition
  'ignore',
  '', // unspecified
] as const

export type Role = (typeof ROLES)[number]

/** Well-known tag names */
export const TAG = {
  CATEGORICAL: 'categorical',
  ORDINAL: 'ordinal',
  UNIQUE: 'unique',
  MAXIMIZE: 'maximize',
  MINIMIZE: 'minimize',
} as const

/** Value of a tag, a stats bound or a sample value */
export type AnyValue = null | boolean | number | string | Date | AnyValue[] | { [key: string]: AnyValue }

/**
 * Tag name -> value. Integer-like names enumerate first in a plain object,
 * so in memory the order is not sorted; the sidecar text always is.
 */
export type Tags = { [key: string]: AnyValue }

export function isCanonicalType(value: string): value is CanonicalType {
  return CANONICAL_TYPES.some((t) => t === value)
}

/**
 * Storage type tag reported by the table store, e.g. 'bool', 'int64', 'uint8',
 * 'float64', 'datetime64[ns]' or 'object' (untyped / heterogeneous).
 */
export type StorageType = string

/** One cell; NaN numbers count as null */
export type CellValue = null | boolean | number | string | Date

export interface Column {
  name: string
  storage: StorageType
  values: CellValue[]
}

/** A table as seen through the table store: ordered, named, typed columns */
export interface Table {
  rowCount: number
  columns: Column[]
}

/** The physical columnar file reader/writer. A write that throws has failed. */
export interface TableStore {
  read(path: string): Table
  write(table: Table, path: string): void
}
