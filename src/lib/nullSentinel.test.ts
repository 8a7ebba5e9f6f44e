import { describe, it, expect } from 'vitest'
import { NULL_SUFFIX, decodeNullSentinels, encodeNullSentinels } from './nullSentinel'
import { createField, createMetadata } from './pmm'
import { columnNames, createTable, getColumn } from './table'
import { inferMetadata } from './typeInference'
import { recordingLogger } from '../test/helpers'

function withNotes() {
  return createTable([
    { name: 'id', storage: 'int64', values: [1, 2] },
    { name: 'notes', storage: 'object', values: [null, null] },
    { name: 'flag', storage: 'bool', values: [true, false] },
  ])
}

describe('nullSentinel', () => {
  it('uses the empty-set marker', () => {
    expect(NULL_SUFFIX).toBe('_∅')
  })

  describe('encodeNullSentinels', () => {
    it('replaces an all-null string column with a NaN placeholder', () => {
      const table = withNotes()
      const out = encodeNullSentinels(table, inferMetadata(table, 't'))
      expect(columnNames(out)).toEqual(['id', 'notes_∅s', 'flag'])
      const placeholder = getColumn(out, 'notes_∅s')
      expect(placeholder?.storage).toBe('float64')
      expect(placeholder?.values).toEqual([NaN, NaN])
      expect(columnNames(table)).toEqual(['id', 'notes', 'flag'])
    })

    it('replaces boolean columns only when the table has no rows', () => {
      const table = createTable([{ name: 'ok', storage: 'bool', values: [] }], 0)
      const out = encodeNullSentinels(table, inferMetadata(table, 't'))
      expect(out.columns).toEqual([{ name: 'ok_∅b', storage: 'float64', values: [] }])
    })

    it('marks other declared types with u', () => {
      const table = createTable([{ name: 'when', storage: 'object', values: [null] }])
      const md = createMetadata('t', 1, [createField('when', 'datestamp')])
      expect(columnNames(encodeNullSentinels(table, md))).toEqual(['when_∅u'])
    })

    it('leaves columns with values alone', () => {
      const table = createTable([{ name: 'city', storage: 'object', values: [null, 'York'] }])
      expect(encodeNullSentinels(table, inferMetadata(table, 't')).columns).toEqual(table.columns)
    })

    it('warns and writes the column as it is when the placeholder name is taken', () => {
      const table = createTable([
        { name: 'notes', storage: 'object', values: [null] },
        { name: 'notes_∅s', storage: 'float64', values: [1] },
      ])
      const logger = recordingLogger()
      const out = encodeNullSentinels(table, inferMetadata(table, 't'), logger)
      expect(columnNames(out)).toEqual(['notes', 'notes_∅s'])
      expect(logger.warnings).toEqual(['Column notes_∅s already exists; writing notes unchanged'])
    })
  })

  describe('decodeNullSentinels', () => {
    it('restores the all-null column', () => {
      const table = withNotes()
      const out = decodeNullSentinels(encodeNullSentinels(table, inferMetadata(table, 't')))
      expect(out.columns).toEqual(table.columns)
    })

    it('restores an empty boolean column as boolean storage', () => {
      const table = createTable([{ name: 'ok_∅b', storage: 'float64', values: [] }], 0)
      expect(decodeNullSentinels(table).columns).toEqual([{ name: 'ok', storage: 'bool', values: [] }])
    })

    it('ignores placeholder-like columns that hold values', () => {
      const table = createTable([{ name: 'x_∅s', storage: 'float64', values: [1, NaN] }])
      expect(decodeNullSentinels(table).columns).toEqual(table.columns)
    })

    it('only decodes float placeholders', () => {
      const table = createTable([{ name: 'x_∅s', storage: 'object', values: [null, null] }])
      expect(decodeNullSentinels(table).columns).toEqual(table.columns)
    })

    it('warns when the real column is also present', () => {
      const table = createTable([
        { name: 'notes', storage: 'object', values: ['a'] },
        { name: 'notes_∅s', storage: 'float64', values: [NaN] },
      ])
      const logger = recordingLogger()
      expect(columnNames(decodeNullSentinels(table, logger))).toEqual(['notes', 'notes_∅s'])
      expect(logger.warnings).toEqual(['Both notes and notes_∅s present; leaving notes_∅s as it is'])
    })
  })
})
