/**
 * Keeps the metadata's field list in step with the table: same names, same
 * order, same count. Existing field types and tags are never rewritten here.
 */

import type { Table } from '../types'
import type { Metadata } from './pmm'
import { columnNames } from './table'
import { inferField } from './typeInference'

export interface Reconcilable {
  table: Table
  metadata: Metadata
}

export function reconcileFields({ table, metadata: md }: Reconcilable): void {
  const tableNames = columnNames(table)
  const mdNames = new Set(md.fields.map((f) => f.name))
  const tableNameSet = new Set(tableNames)

  // columns without metadata get an inferred field
  for (const column of table.columns) {
    if (!mdNames.has(column.name)) md.fields.push(inferField(column))
  }
  // metadata never describes a column that does not exist
  md.fields = md.fields.filter((f) => tableNameSet.has(f.name))

  const inOrder = md.fields.every((f, i) => f.name === tableNames[i])
  if (!inOrder) {
    const byName = new Map(md.fields.map((f) => [f.name, f]))
    md.fields = tableNames.flatMap((name) => byName.get(name) ?? [])
  }
  md.fieldcount = md.fields.length
  md.recordcount = table.rowCount
}

/** Append (copies of) fields only `other` declares. No consistency checking. */
export function addMetadataFromOther(md: Metadata, other: Metadata): void {
  const names = new Set(md.fields.map((f) => f.name))
  for (const f of other.fields) {
    if (!names.has(f.name)) md.fields.push(structuredClone(f))
  }
  md.fieldcount = md.fields.length
}

export interface MergeOptions {
  /** Fields the other metadata replaces even though the primary declares them */
  override?: readonly string[]
}

/**
 * Bring in field metadata from `other` after its columns were merged into
 * the table. Fields the primary already declares are kept unless listed in
 * `override`; then the whole set is reconciled against the table.
 */
export function mergeMetadata(target: Reconcilable, other: Metadata, options: MergeOptions = {}): void {
  const override = new Set(options.override ?? [])
  const otherNames = new Set(other.fields.map((f) => f.name))
  target.metadata.fields = target.metadata.fields.filter((f) => !(override.has(f.name) && otherNames.has(f.name)))
  addMetadataFromOther(target.metadata, other)
  reconcileFields(target)
}

