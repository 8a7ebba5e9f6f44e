/**
 * A table paired with its metadata.
 *
 * The metadata records intended types where storage forces a promotion
 * (integers with nulls held as floats, booleans with nulls held as objects)
 * and carries tags and descriptions for the dataset and its fields.
 */

import type { AnyValue, Column, Table } from '../types'
import { ErrorCode, PmmError } from './errors'
import { computeFieldStats } from './fieldStats'
import { addField, setFieldTag, setTag, type Metadata } from './pmm'
import { mergeMetadata, reconcileFields, type MergeOptions } from './reconcile'
import { getColumn, nonNullCount, setColumn } from './table'
import { inferField, inferMetadata } from './typeInference'

export class Dataset {
  table: Table
  metadata: Metadata

  /** Without metadata, one is inferred from the table under `name` */
  constructor(table: Table, metadata?: Metadata, name = '') {
    this.table = table
    this.metadata = metadata ?? inferMetadata(table, name)
  }

  /**
   * Add (or replace) a column and declare its field. `type`, when given,
   * must be one of boolean, integer, real, string, datestamp; otherwise it
   * is inferred from the column's storage.
   */
  addField(column: Column, type?: string): void {
    setColumn(this.table, column)
    this.declareField(column.name, type)
  }

  /** Declare the type of a column that is already in the table */
  declareField(name: string, type?: string): void {
    const column = getColumn(this.table, name)
    if (!column) throw new PmmError(ErrorCode.UNKNOWN_FIELD, `No column ${name} in table`, { field: name })
    if (nonNullCount(column) === 0) {
      // all null or no records: storage can follow the declared type
      if (type === 'string') column.storage = 'object'
      else if (type === 'datestamp') column.storage = 'datetime64[ns]'
    }
    addField(this.metadata, inferField(column, type))
  }

  tagField(fieldName: string, tagName: string, value: AnyValue = null): void {
    setFieldTag(this.metadata, fieldName, tagName, value)
  }

  tagDataset(tagName: string, value: AnyValue = null): void {
    setTag(this.metadata, tagName, value)
  }

  /**
   * Every column gets a field (inferred when new), fields without a column
   * are dropped and the field order follows the table. Existing field types
   * are not changed.
   */
  updateMetadata(): void {
    reconcileFields(this)
  }

  /** Pull in field metadata from a dataset whose columns were merged into this table */
  mergeMetadata(other: Dataset | Metadata, options: MergeOptions = {}): void {
    mergeMetadata(this, other instanceof Dataset ? other.metadata : other, options)
  }

  /** Recompute every field's stats from the table */
  updateStats(): void {
    this.updateMetadata()
    for (const field of this.metadata.fields) {
      const column = getColumn(this.table, field.name)
      if (column) field.stats = computeFieldStats(column, field.type)
    }
  }
}
