/**
 * Date-valued tags travel as formatted strings. The format is written in
 * strftime notation (so sidecars stay readable by other PMM tools) and
 * translated to a date-fns pattern here.
 */

import { format, isValid, parse } from 'date-fns'
import type { AnyValue, Tags } from '../types'
import type { Metadata } from './pmm'
import { isPlainObject } from './record'

export const DEFAULT_DATE_TAG_FORMAT = '%Y-%m-%d %H:%M:%S'

const DIRECTIVES: Record<string, string> = {
  Y: 'yyyy',
  y: 'yy',
  m: 'MM',
  d: 'dd',
  H: 'HH',
  I: 'hh',
  M: 'mm',
  S: 'ss',
  f: "SSS'000'", // microseconds; Date only carries milliseconds
  p: 'a',
  b: 'MMM',
  B: 'MMMM',
  a: 'EEE',
  A: 'EEEE',
  j: 'DDD',
  z: 'xx',
}

const PATTERN_OPTIONS = { useAdditionalDayOfYearTokens: true }

function quoteLiteral(text: string): string {
  if (!/[A-Za-z']/.test(text)) return text
  return `'${text.replace(/'/g, "''")}'`
}

/** '%Y-%m-%d %H:%M:%S' -> 'yyyy-MM-dd HH:mm:ss' */
export function toDatePattern(strftime: string): string {
  let out = ''
  let literal = ''
  for (let i = 0; i < strftime.length; i++) {
    const c = strftime[i]
    const next = strftime[i + 1]
    if (c === '%' && next !== undefined) {
      i++
      if (next === '%') {
        literal += '%'
        continue
      }
      const token = DIRECTIVES[next]
      if (token === undefined) {
        literal += `%${next}`
        continue
      }
      out += quoteLiteral(literal) + token
      literal = ''
    } else {
      literal += c
    }
  }
  return out + quoteLiteral(literal)
}

export function formatDateTag(date: Date, strftime: string): string {
  return format(date, toDatePattern(strftime), PATTERN_OPTIONS)
}

/** The date a string encodes, or undefined when it does not match */
export function parseDateTag(text: string, strftime: string): Date | undefined {
  const date = parse(text, toDatePattern(strftime), new Date(0), PATTERN_OPTIONS)
  return isValid(date) ? date : undefined
}

function mapTagValue(value: AnyValue, leaf: (v: AnyValue) => AnyValue): AnyValue {
  if (Array.isArray(value)) return value.map((v) => mapTagValue(v, leaf))
  if (isPlainObject(value)) return mapTags(value, leaf)
  return leaf(value)
}

function mapTags(tags: Tags, leaf: (v: AnyValue) => AnyValue): Tags {
  const out: Tags = {}
  for (const [key, value] of Object.entries(tags)) out[key] = mapTagValue(value, leaf)
  return out
}

/**
 * Copy of `md` with every date tag (dataset or field, at any depth) turned
 * into a string. The live tags are left alone; when any date was found the
 * format used is recorded on `md` so a later load can reverse it.
 */
export function convertDateTags(md: Metadata, defaultFormat: string = DEFAULT_DATE_TAG_FORMAT): Metadata {
  const fmt = md.datetagformat ?? defaultFormat
  let converted = 0
  const leaf = (v: AnyValue): AnyValue => {
    if (!(v instanceof Date)) return v
    converted++
    return formatDateTag(v, fmt)
  }
  const tags = mapTags(md.tags, leaf)
  const fields = md.fields.map((f) => ({ ...f, tags: mapTags(f.tags, leaf) }))
  if (converted > 0) md.datetagformat = fmt
  return { ...md, tags, fields }
}

/**
 * After a load: string tags that parse under the recorded format become
 * dates again; anything that does not parse stays a string. Without a
 * recorded format no dates were written, so nothing is touched.
 */
export function interpretDateTags(md: Metadata): void {
  const fmt = md.datetagformat
  if (!fmt) return
  const leaf = (v: AnyValue): AnyValue => (typeof v === 'string' ? parseDateTag(v, fmt) ?? v : v)
  md.tags = mapTags(md.tags, leaf)
  for (const f of md.fields) f.tags = mapTags(f.tags, leaf)
}
