/**
 * Canonical serialization: records become ordered key-value structures
 * (declared attribute order, tag keys sorted) and then text with fixed
 * indentation, so logically equal metadata is byte-identical on disk.
 */

import { readFileSync, writeFileSync } from 'node:fs'
import type { AnyValue } from '../types'
import { convertDateTags, interpretDateTags, DEFAULT_DATE_TAG_FORMAT } from './dateTags'
import { ErrorCode, PmmError } from './errors'
import { METADATA, buildMetadata, validateMetadata, type Metadata } from './pmm'
import { isPlainObject, type RecordLayout } from './record'

export type Serialized = { [key: string]: AnyValue }

const INDENT = '    '

function copyValue(value: unknown, path: string): AnyValue {
  if (value === null || typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string') {
    return value
  }
  if (value instanceof Date) return new Date(value.getTime())
  if (Array.isArray(value)) return value.map((v, i) => copyValue(v, `${path}[${i}]`))
  if (isPlainObject(value)) {
    const out: Serialized = {}
    for (const [k, v] of Object.entries(value)) out[k] = copyValue(v, `${path}.${k}`)
    return out
  }
  throw new PmmError(ErrorCode.TYPE_MISMATCH, `Cannot serialize value at ${path}`, { path })
}

function serializeValue(value: unknown, nested: RecordLayout | undefined, path: string): AnyValue {
  if (nested && Array.isArray(value)) return value.map((v, i) => serializeValue(v, nested, `${path}[${i}]`))
  if (nested && isPlainObject(value)) return serializable(nested, value, path)
  return copyValue(value, path)
}

/**
 * Ordered plain structure for a record: required, then defaulted, then
 * optional attributes, skipping those not set. Passing the result back to
 * `construct` rebuilds an equal record.
 */
export function serializable(layout: RecordLayout, record: object, path: string = layout.name): Serialized {
  const out: Serialized = {}
  for (const attr of layout.attributes) {
    const value: unknown = Reflect.get(record, attr.name)
    if (value === undefined) continue
    out[attr.name] = serializeValue(value, attr.nested, `${path}.${attr.name}`)
  }
  return out
}

function escapeString(s: string): string {
  return JSON.stringify(s).replace(/[\u007f-\uffff]/g, (c) => `\\u${c.charCodeAt(0).toString(16).padStart(4, '0')}`)
}

function emitNumber(n: number): string {
  if (!Number.isFinite(n)) throw new PmmError(ErrorCode.TYPE_MISMATCH, `Cannot write non-finite number ${n}`)
  return String(n)
}

function emitBlock(open: string, close: string, items: string[], level: number): string {
  if (items.length === 0) return open + close
  const pad = INDENT.repeat(level + 1)
  return `${open}\n${items.map((item) => pad + item).join(',\n')}\n${INDENT.repeat(level)}${close}`
}

/** Generic values: plain-object keys are written sorted */
function emitValue(value: AnyValue, level: number): string {
  if (value === null) return 'null'
  if (typeof value === 'boolean') return value ? 'true' : 'false'
  if (typeof value === 'number') return emitNumber(value)
  if (typeof value === 'string') return escapeString(value)
  if (value instanceof Date) {
    throw new PmmError(ErrorCode.TYPE_MISMATCH, 'Dates are only written as converted tag values')
  }
  if (Array.isArray(value)) return emitBlock('[', ']', value.map((v) => emitValue(v, level + 1)), level)
  const keys = Object.keys(value).sort()
  return emitBlock('{', '}', keys.map((k) => `${escapeString(k)}: ${emitValue(value[k], level + 1)}`), level)
}

/** Records: keys in declared attribute order */
function emitRecord(layout: RecordLayout, record: Serialized, level: number): string {
  const items: string[] = []
  for (const attr of layout.attributes) {
    const value = record[attr.name]
    if (value === undefined) continue
    items.push(`${escapeString(attr.name)}: ${emitAttribute(value, attr.nested, level + 1)}`)
  }
  return emitBlock('{', '}', items, level)
}

function emitAttribute(value: AnyValue, nested: RecordLayout | undefined, level: number): string {
  if (nested && Array.isArray(value)) {
    return emitBlock('[', ']', value.map((v) => emitAttribute(v, nested, level + 1)), level)
  }
  if (nested && isPlainObject(value)) return emitRecord(nested, value, level)
  return emitValue(value, level)
}

/** Canonical JSON text for any record, trailing whitespace stripped per line */
export function toCanonicalJson(layout: RecordLayout, record: object): string {
  return emitRecord(layout, serializable(layout, record), 0)
    .split('\n')
    .map((line) => line.trimEnd())
    .join('\n')
}

/** Sidecar text for `md`; date tags are written with the date tag format */
export function toCanonicalText(md: Metadata, defaultDateTagFormat: string = DEFAULT_DATE_TAG_FORMAT): string {
  return toCanonicalJson(METADATA, convertDateTags(md, defaultDateTagFormat))
}

/** Parse sidecar text into validated Metadata with date tags restored */
export function loadsMetadata(text: string): Metadata {
  let wire: unknown
  try {
    wire = JSON.parse(text)
  } catch (e) {
    throw new PmmError(ErrorCode.TYPE_MISMATCH, `Sidecar is not valid JSON: ${e instanceof Error ? e.message : String(e)}`)
  }
  if (!isPlainObject(wire)) throw new PmmError(ErrorCode.TYPE_MISMATCH, 'Sidecar must hold a JSON object')
  const md = buildMetadata([], wire)
  validateMetadata(md)
  interpretDateTags(md)
  return md
}

export function loadMetadata(path: string): Metadata {
  return loadsMetadata(readFileSync(path, 'utf8'))
}

export function saveMetadata(md: Metadata, path: string, defaultDateTagFormat?: string): void {
  writeFileSync(path, toCanonicalText(md, defaultDateTagFormat), 'utf8')
}
