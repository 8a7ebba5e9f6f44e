/**
 * Predictive Modelling Metadata entities and the operations that keep a
 * Metadata record consistent while it is edited.
 */

import { z } from 'zod'
import { ROLES, isCanonicalType, type AnyValue, type CanonicalType, type Role } from '../types'
import { ErrorCode, PmmError } from './errors'
import {
  anything,
  construct,
  defaulted,
  defineRecord,
  int,
  listOf,
  optional,
  real,
  required,
  str,
  tags,
  type RecordOf,
} from './record'

export const PMM_VERSION = '0.1'

const canonicalType = () =>
  z.string().refine((v): v is CanonicalType => isCanonicalType(v), (v) => ({
    message: `Unknown type ${v}`,
    params: { code: ErrorCode.UNKNOWN_CANONICAL_TYPE },
  }))

const role = () => z.enum(ROLES)

export const FLAT_FILE_FORMAT = defineRecord('FlatFileFormat', {
  required: {},
  defaulted: {
    encoding: defaulted(str(), 'UTF-8'),
    separator: defaulted(str(), ','),
    quote: defaulted(str(), '"'),
    escape: defaulted(str(), '\\'),
    nullmarker: defaulted(str(), ''),
    headerrowcount: defaulted(int(), 1),
    dateformat: optional(str()),
  },
  optional: {},
})

export const FLAT_FILE = defineRecord('FlatFile', {
  required: {
    name: required(str()),
    format: required(FLAT_FILE_FORMAT.schema),
  },
  defaulted: {},
  optional: {},
})

export const DATA = defineRecord('Data', {
  required: {
    flatfile: required(FLAT_FILE.schema),
  },
  defaulted: {},
  optional: {},
})

export const STATS = defineRecord('Stats', {
  required: {},
  defaulted: {},
  optional: {
    nnulls: optional(int()),
    nuniques: optional(int()),
    min: optional(anything()),
    max: optional(anything()),
    mean: optional(real()),
  },
})

export const FIELD = defineRecord('Field', {
  required: {
    name: required(str()),
    type: required(canonicalType()),
    role: required(role()),
    tags: required(tags()),
    stats: required(STATS.schema),
  },
  defaulted: {},
  optional: {
    values: optional(listOf(anything())),
    longname: optional(str()),
    description: optional(str()),
  },
})

export const METADATA = defineRecord('Metadata', {
  required: {
    pmmversion: required(str()),
    name: required(str()),
    recordcount: required(int()),
    fieldcount: required(int()),
    fields: required(listOf(FIELD.schema)),
    tags: required(tags()),
  },
  defaulted: {},
  optional: {
    data: optional(DATA.schema),
    description: optional(str()),
    creator: optional(str()),
    contributor: optional(str()),
    permissions: optional(str()),
    datetagformat: optional(str()),
  },
})

export type FlatFileFormat = RecordOf<typeof FLAT_FILE_FORMAT>
export type FlatFile = RecordOf<typeof FLAT_FILE>
export type Data = RecordOf<typeof DATA>
export type Stats = RecordOf<typeof STATS>
export type Field = RecordOf<typeof FIELD>
export type Metadata = RecordOf<typeof METADATA>

function checkFieldCount(md: Metadata): void {
  if (md.fieldcount !== md.fields.length) {
    throw new PmmError(
      ErrorCode.FIELD_COUNT_MISMATCH,
      `Metadata fieldcount ${md.fieldcount} <> number of fields ${md.fields.length}`,
      { fieldcount: md.fieldcount, fields: md.fields.length }
    )
  }
}

function checkVersion(md: Metadata): void {
  if (Number(md.pmmversion) !== Number(PMM_VERSION)) {
    throw new PmmError(
      ErrorCode.UNSUPPORTED_FORMAT_VERSION,
      `Can't handle pmmversion ${md.pmmversion} (vs ${PMM_VERSION})`,
      { pmmversion: md.pmmversion }
    )
  }
}

/** Generic construction plus the Metadata-level invariants */
export function buildMetadata(positional: readonly unknown[] = [], named: Readonly<Record<string, unknown>> = {}): Metadata {
  const md = construct(METADATA, positional, named)
  checkFieldCount(md)
  checkVersion(md)
  return md
}

/** Direct construction: pmmversion and fieldcount are filled in */
export function createMetadata(
  name: string,
  recordcount: number,
  fields: readonly unknown[],
  named: Readonly<Record<string, unknown>> = {}
): Metadata {
  return buildMetadata([PMM_VERSION, name, recordcount, fields.length, fields], { tags: {}, ...named })
}

export function createField(
  name: string,
  type: CanonicalType,
  named: Readonly<Record<string, unknown>> = {}
): Field {
  const unspecified: Role = ''
  return construct(FIELD, [name, type, unspecified, {}, {}], named)
}

export function createStats(named: Readonly<Record<string, unknown>> = {}): Stats {
  return construct(STATS, [], named)
}

/**
 * Field names unique and every type canonical. Also re-checks the
 * fieldcount and version, which edits after construction can break.
 */
export function validateMetadata(md: Metadata): void {
  checkFieldCount(md)
  checkVersion(md)
  const seen = new Map<string, number>()
  md.fields.forEach((f) => {
    if (!isCanonicalType(f.type)) {
      throw new PmmError(ErrorCode.UNKNOWN_CANONICAL_TYPE, `Unknown type ${f.type} for field ${f.name}`, {
        field: f.name,
        type: f.type,
      })
    }
    seen.set(f.name, (seen.get(f.name) ?? 0) + 1)
  })
  const duplicates = Array.from(seen.entries())
    .filter(([, n]) => n > 1)
    .map(([name]) => name)
  if (duplicates.length > 0) {
    throw new PmmError(ErrorCode.DUPLICATE_FIELD_NAME, `Not all field names are unique: ${duplicates.join(' ')}`, {
      duplicates,
    })
  }
}

export function getField(md: Metadata, name: string): Field | undefined {
  return md.fields.find((f) => f.name === name)
}

export function requireField(md: Metadata, name: string): Field {
  const field = getField(md, name)
  if (!field) throw new PmmError(ErrorCode.UNKNOWN_FIELD, `No field ${name} in ${md.name}`, { field: name })
  return field
}

/** Replace the same-named field in place, or append */
export function addField(md: Metadata, field: Field): void {
  const i = md.fields.findIndex((f) => f.name === field.name)
  if (i >= 0) md.fields[i] = field
  else md.fields.push(field)
  md.fieldcount = md.fields.length
}

export function setFieldTag(md: Metadata, fieldName: string, tagName: string, value: AnyValue = null): void {
  requireField(md, fieldName).tags[tagName] = value
}

export function setTag(md: Metadata, tagName: string, value: AnyValue = null): void {
  md.tags[tagName] = value
}
