import type { CellValue, Column, Table } from '../types'

/** null, or a NaN number */
export function isNullValue(value: CellValue): boolean {
  return value === null || (typeof value === 'number' && Number.isNaN(value))
}

export function nonNullCount(column: Column): number {
  return column.values.reduce<number>((n, v) => (isNullValue(v) ? n : n + 1), 0)
}

export function columnNames(table: Table): string[] {
  return table.columns.map((c) => c.name)
}

export function getColumn(table: Table, name: string): Column | undefined {
  return table.columns.find((c) => c.name === name)
}

/** Table whose row count is taken from its columns (0 when there are none) */
export function createTable(columns: Column[], rowCount: number = columns[0]?.values.length ?? 0): Table {
  return { rowCount, columns }
}

/** Replace the same-named column in place, or append */
export function setColumn(table: Table, column: Column): void {
  const i = table.columns.findIndex((c) => c.name === column.name)
  if (i >= 0) table.columns[i] = column
  else table.columns.push(column)
  if (table.columns.length === 1) table.rowCount = column.values.length
}
