/**
 * Import a delimited text file as a Dataset, recording where it came from
 * (file name and format) in the metadata's data section.
 */

import Papa from 'papaparse'
import { readFileSync } from 'node:fs'
import { basename, extname } from 'node:path'
import type { CanonicalType, CellValue, Column } from '../types'
import { Dataset } from './dataset'
import { parseDateTag } from './dateTags'
import { ErrorCode, PmmError } from './errors'
import { FLAT_FILE_FORMAT, createField, createMetadata, type FlatFileFormat } from './pmm'
import { construct } from './record'
import { createTable } from './table'

interface ParsedColumn {
  column: Column
  type: CanonicalType
}

const ENCODINGS: Record<string, BufferEncoding> = {
  'utf-8': 'utf8',
  utf8: 'utf8',
  latin1: 'latin1',
  'iso-8859-1': 'latin1',
  ascii: 'ascii',
  'us-ascii': 'ascii',
  'utf-16le': 'utf16le',
  utf16le: 'utf16le',
}

function classify(name: string, raw: (string | null)[], dateformat?: string): ParsedColumn {
  const present = raw.filter((v): v is string => v !== null)
  const hasNull = present.length < raw.length
  const map = (fn: (v: string) => CellValue, nullValue: CellValue = null): CellValue[] =>
    raw.map((v) => (v === null ? nullValue : fn(v)))

  if (present.length === 0) {
    return { column: { name, storage: 'object', values: map(String) }, type: 'string' }
  }
  if (present.every((v) => /^(true|false)$/i.test(v))) {
    // booleans with nulls can only be held untyped
    const values = map((v) => v.toLowerCase() === 'true')
    return { column: { name, storage: hasNull ? 'object' : 'bool', values }, type: 'boolean' }
  }
  if (present.every((v) => /^[+-]?\d+$/.test(v))) {
    // integers with nulls are held as floats
    const values = map(Number, hasNull ? NaN : null)
    return { column: { name, storage: hasNull ? 'float64' : 'int64', values }, type: 'integer' }
  }
  if (present.every((v) => v.trim() !== '' && Number.isFinite(Number(v)))) {
    return { column: { name, storage: 'float64', values: map(Number, NaN) }, type: 'real' }
  }
  if (dateformat && present.every((v) => parseDateTag(v, dateformat) !== undefined)) {
    const values = map((v) => parseDateTag(v, dateformat) ?? null)
    return { column: { name, storage: 'datetime64[ns]', values }, type: 'datestamp' }
  }
  return { column: { name, storage: 'object', values: map(String) }, type: 'string' }
}

/**
 * Parse delimited text under `format` (separator, quote, escape, null
 * marker, header rows, date format). Columns are stored the way a
 * dataframe would hold them; the declared field types keep the intent.
 */
export function parseFlatFile(
  text: string,
  fileName: string,
  format: Partial<FlatFileFormat> = {},
  datasetName: string = basename(fileName, extname(fileName))
): Dataset {
  const fmt = construct(FLAT_FILE_FORMAT, [], format)
  const parsed = Papa.parse<string[]>(text, {
    delimiter: fmt.separator,
    quoteChar: fmt.quote,
    escapeChar: fmt.escape,
    skipEmptyLines: true,
  })
  const rows = parsed.data
  const headerRows = rows.slice(0, fmt.headerrowcount)
  const dataRows = rows.slice(fmt.headerrowcount)
  const width = Math.max(0, ...rows.map((r) => r.length))
  const header = headerRows[0] ?? []
  const names = Array.from({ length: width }, (_, j) => header[j]?.trim() || `Column_${j + 1}`)

  const parsedColumns = names.map((name, j) => {
    const raw = dataRows.map((row) => {
      const cell = row[j] ?? fmt.nullmarker
      return cell === fmt.nullmarker ? null : cell
    })
    return classify(name, raw, fmt.dateformat)
  })

  const table = createTable(
    parsedColumns.map((p) => p.column),
    dataRows.length
  )
  const fields = parsedColumns.map((p) => createField(p.column.name, p.type))
  const metadata = createMetadata(datasetName, dataRows.length, fields, {
    data: { flatfile: { name: basename(fileName), format: fmt } },
  })
  return new Dataset(table, metadata)
}

export function readFlatFile(path: string, format: Partial<FlatFileFormat> = {}): Dataset {
  const declared = format.encoding ?? 'UTF-8'
  const encoding = ENCODINGS[declared.toLowerCase()]
  if (!encoding) {
    throw new PmmError(ErrorCode.UNSUPPORTED_ENCODING, `Unsupported encoding ${declared}`, { encoding: declared })
  }
  return parseFlatFile(readFileSync(path, encoding), path, format)
}
