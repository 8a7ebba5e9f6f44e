/**
 * Columnar storage rejects (or corrupts) all-null string columns and
 * zero-row boolean columns. Before a write such a column is swapped for an
 * all-NaN float column named `<name>_∅<t>`, where t is b (boolean),
 * s (string) or u (other declared type); after a read the swap is undone.
 */

import type { Column, Table } from '../types'
import type { Logger } from './config'
import { getField, type Metadata } from './pmm'
import { columnNames, isNullValue, nonNullCount } from './table'

export const NULL_MARKER = '∅'
export const NULL_SUFFIX = `_${NULL_MARKER}`

const STRING_STORAGE = 'object'
const BOOL_STORAGE = 'bool'
const FLOAT_STORAGE = 'float64'

function typeChar(md: Metadata, name: string): string {
  const type = getField(md, name)?.type
  if (type === 'boolean') return 'b'
  if (type === 'string') return 's'
  return 'u'
}

/** Copy of `table` with unwritable all-null columns replaced by NaN placeholders */
export function encodeNullSentinels(table: Table, md: Metadata, logger?: Logger): Table {
  const names = columnNames(table)
  const columns = table.columns.map((column): Column => {
    if (column.storage !== STRING_STORAGE && column.storage !== BOOL_STORAGE) return column
    if (nonNullCount(column) > 0) return column
    // an all-null bool column with rows cannot arise; only the empty table needs it
    if (column.storage === BOOL_STORAGE && table.rowCount > 0) return column
    const altName = column.name + NULL_SUFFIX + typeChar(md, column.name)
    if (names.includes(altName)) {
      logger?.warn(`Column ${altName} already exists; writing ${column.name} unchanged`)
      return column
    }
    return { name: altName, storage: FLOAT_STORAGE, values: new Array<number>(table.rowCount).fill(NaN) }
  })
  return { rowCount: table.rowCount, columns }
}

/** Copy of `table` with NaN placeholders turned back into the all-null columns they stand for */
export function decodeNullSentinels(table: Table, logger?: Logger): Table {
  const names = columnNames(table)
  const suffixLength = NULL_SUFFIX.length + 1
  const columns = table.columns.map((column): Column => {
    const { name } = column
    if (name.length < suffixLength || !name.slice(0, -1).endsWith(NULL_SUFFIX)) return column
    if (!column.storage.startsWith('float') || !column.values.every(isNullValue)) return column
    const trueName = name.slice(0, -suffixLength)
    if (names.includes(trueName)) {
      // placeholder beside its real column: kept under its own name
      logger?.warn(`Both ${trueName} and ${name} present; leaving ${name} as it is`)
      return column
    }
    const storage = name.endsWith('b') && table.rowCount === 0 ? BOOL_STORAGE : STRING_STORAGE
    return { name: trueName, storage, values: new Array<null>(table.rowCount).fill(null) }
  })
  return { rowCount: table.rowCount, columns }
}
