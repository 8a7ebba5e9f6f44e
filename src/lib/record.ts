/**
 * Typed record model: every metadata entity declares its required, defaulted
 * and optional attributes once, and a single builder constructs, coerces and
 * checks instances from positional and named arguments.
 *
 *   const FIELD = defineRecord('Field', {
 *     required: { name: required(str()), ... },
 *     defaulted: {},
 *     optional: { longname: optional(str()) },
 *   })
 *   const field = construct(FIELD, ['age', 'real', '', {}, {}], { longname: 'Age' })
 *
 * Attribute order across the three groups is the wire order.
 */

import { z } from 'zod'
import type { AnyValue } from '../types'
import { ErrorCode, PmmError } from './errors'

export type AttributeGroup = 'required' | 'defaulted' | 'optional'

export interface Attribute {
  readonly name: string
  readonly group: AttributeGroup
  /** Layout of a record-typed (or list-of-record) attribute */
  readonly nested?: RecordLayout
}

export interface RecordLayout {
  readonly name: string
  readonly attributes: readonly Attribute[]
}

export interface RecordDef<S extends z.ZodRawShape> extends RecordLayout {
  /** Names that positional arguments fill, in order: required then defaulted */
  readonly positional: readonly string[]
  readonly schema: z.ZodObject<S, 'strict'>
}

export type RecordOf<D extends { schema: z.ZodTypeAny }> = z.output<D['schema']>

// record schema (and wrappers around it) -> layout of the record it builds
const layouts = new WeakMap<z.ZodTypeAny, RecordLayout>()

function keepLayout<T extends z.ZodTypeAny>(from: z.ZodTypeAny, to: T): T {
  const layout = layouts.get(from)
  if (layout) layouts.set(to, layout)
  return to
}

function dropNull(value: unknown): unknown {
  return value === null ? undefined : value
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

// ----- attribute types -----

export const anyValue: z.ZodType<AnyValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.string(),
    z.date(),
    z.array(anyValue),
    z.record(z.string(), anyValue),
  ])
)

function toStringValue(value: unknown): unknown {
  return typeof value === 'number' || typeof value === 'boolean' ? String(value) : value
}

function toInteger(value: unknown): unknown {
  if (typeof value === 'number' && Number.isFinite(value)) return Math.trunc(value)
  if (typeof value === 'boolean') return value ? 1 : 0
  if (typeof value === 'string' && /^\s*[+-]?\d+\s*$/.test(value)) return Number.parseInt(value, 10)
  return value
}

function toReal(value: unknown): unknown {
  if (typeof value === 'boolean') return value ? 1 : 0
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value)
    if (!Number.isNaN(n)) return n
  }
  return value
}

export const str = () => z.preprocess(toStringValue, z.string())
export const int = () => z.preprocess(toInteger, z.number().int())
export const real = () => z.preprocess(toReal, z.number())
export const anything = () => anyValue
export const tags = () => z.record(z.string(), anyValue)

/** Sequence whose elements are each coerced to `item` */
export function listOf<T extends z.ZodTypeAny>(item: T) {
  return keepLayout(item, z.array(item))
}

// ----- attribute groups -----

/** Must be supplied; `null` counts as not supplied */
export function required<T extends z.ZodTypeAny>(type: T) {
  return keepLayout(type, z.preprocess(dropNull, type))
}

/** Takes `value` when not supplied (or supplied as `null`) */
export function defaulted<T extends z.ZodTypeAny>(type: T, value: z.output<T>) {
  return keepLayout(
    type,
    z.preprocess((v) => (v === null || v === undefined ? value : v), type)
  )
}

export function optional<T extends z.ZodTypeAny>(type: T) {
  return keepLayout(type, z.preprocess(dropNull, type.optional()))
}

// ----- definition and construction -----

export function defineRecord<R extends z.ZodRawShape, D extends z.ZodRawShape, O extends z.ZodRawShape>(
  name: string,
  groups: { required: R; defaulted: D; optional: O }
): RecordDef<R & D & O> {
  const attributes: Attribute[] = []
  const collect = (group: AttributeGroup, shape: z.ZodRawShape) => {
    for (const [attr, type] of Object.entries(shape)) {
      attributes.push({ name: attr, group, nested: layouts.get(type) })
    }
  }
  collect('required', groups.required)
  collect('defaulted', groups.defaulted)
  collect('optional', groups.optional)

  const schema = z.object({ ...groups.required, ...groups.defaulted, ...groups.optional }).strict()
  const def: RecordDef<R & D & O> = {
    name,
    attributes,
    positional: [...Object.keys(groups.required), ...Object.keys(groups.defaulted)],
    schema,
  }
  layouts.set(schema, def)
  return def
}

function issueError(recordName: string, issues: z.ZodIssue[]): PmmError {
  const issue = issues.find((i) => i.code === 'unrecognized_keys') ?? issues[0]
  const path = issue.path.join('.')
  const where = path ? ` (at ${path})` : ''

  if (issue.code === 'unrecognized_keys') {
    const attribute = issue.keys[0]
    return new PmmError(ErrorCode.UNKNOWN_ATTRIBUTE, `Unknown attribute ${attribute} for ${recordName}${where}`, {
      record: recordName,
      attribute,
      path,
    })
  }
  if (issue.code === 'invalid_type' && issue.received === 'undefined') {
    return new PmmError(ErrorCode.MISSING_REQUIRED_ATTRIBUTE, `${recordName} is missing required attribute ${path}`, {
      record: recordName,
      path,
    })
  }
  if (issue.code === 'custom' && issue.params?.code === ErrorCode.UNKNOWN_CANONICAL_TYPE) {
    return new PmmError(ErrorCode.UNKNOWN_CANONICAL_TYPE, `${issue.message}${where}`, { record: recordName, path })
  }
  return new PmmError(ErrorCode.TYPE_MISMATCH, `Bad value for ${recordName}${where}: ${issue.message}`, {
    record: recordName,
    path,
  })
}

/**
 * Build a record. Positional arguments fill required then defaulted
 * attributes in declaration order; a named argument wins over a positional
 * one for the same attribute.
 */
export function construct<S extends z.ZodRawShape>(
  def: RecordDef<S>,
  positional: readonly unknown[] = [],
  named: Readonly<Record<string, unknown>> = {}
) {
  if (positional.length > def.positional.length) {
    throw new PmmError(
      ErrorCode.TOO_MANY_ARGUMENTS,
      `${def.name} takes at most ${def.positional.length} positional arguments, ${positional.length} given`,
      { record: def.name }
    )
  }
  const input: Record<string, unknown> = {}
  positional.forEach((value, i) => {
    input[def.positional[i]] = value
  })
  for (const [key, value] of Object.entries(named)) {
    if (!def.attributes.some((a) => a.name === key)) {
      throw new PmmError(ErrorCode.UNKNOWN_ATTRIBUTE, `Unknown attribute ${key} for ${def.name}`, {
        record: def.name,
        attribute: key,
      })
    }
    if (value !== undefined) input[key] = value
  }

  const parsed = def.schema.safeParse(input)
  if (!parsed.success) throw issueError(def.name, parsed.error.issues)
  return parsed.data
}
