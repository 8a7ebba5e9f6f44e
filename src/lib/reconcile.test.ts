import { describe, it, expect } from 'vitest'
import { createField, createMetadata, getField } from './pmm'
import { addMetadataFromOther, mergeMetadata, reconcileFields } from './reconcile'
import { createTable, setColumn } from './table'

function people() {
  const table = createTable([
    { name: 'id', storage: 'int64', values: [1, 2, 3] },
    { name: 'city', storage: 'object', values: ['Leeds', 'York', null] },
  ])
  const metadata = createMetadata('people', 0, [
    createField('city', 'string', { description: 'Home town' }),
    createField('gone', 'real'),
  ])
  return { table, metadata }
}

describe('reconcile', () => {
  describe('reconcileFields', () => {
    it('adds missing fields, drops stale ones and follows the table order', () => {
      const ds = people()
      reconcileFields(ds)
      expect(ds.metadata.fields.map((f) => [f.name, f.type])).toEqual([
        ['id', 'integer'],
        ['city', 'string'],
      ])
      expect(ds.metadata.fields[1].description).toBe('Home town')
      expect(ds.metadata.fieldcount).toBe(2)
      expect(ds.metadata.recordcount).toBe(3)
    })

    it('never changes a declared type', () => {
      const ds = people()
      ds.metadata.fields.push(createField('id', 'real'))
      reconcileFields(ds)
      expect(getField(ds.metadata, 'id')?.type).toBe('real')
    })

    it('is idempotent', () => {
      const ds = people()
      reconcileFields(ds)
      const once = structuredClone(ds.metadata)
      reconcileFields(ds)
      expect(ds.metadata).toEqual(once)
    })
  })

  describe('addMetadataFromOther', () => {
    it('appends copies of fields only the other declares', () => {
      const md = createMetadata('a', 0, [createField('x', 'real')])
      const other = createMetadata('b', 0, [createField('x', 'string'), createField('y', 'integer', { tags: { unique: null } })])
      addMetadataFromOther(md, other)
      expect(md.fields.map((f) => [f.name, f.type])).toEqual([
        ['x', 'real'],
        ['y', 'integer'],
      ])
      expect(md.fieldcount).toBe(2)
      md.fields[1].tags.changed = true
      expect(other.fields[1].tags).toEqual({ unique: null })
    })
  })

  describe('mergeMetadata', () => {
    function merged() {
      const ds = people()
      reconcileFields(ds)
      setColumn(ds.table, { name: 'bonus', storage: 'float64', values: [0.5, 1, 0] })
      const other = createMetadata('pay', 3, [
        createField('id', 'string', { description: 'Payroll id' }),
        createField('bonus', 'real', { tags: { maximize: null } }),
        createField('grade', 'string'),
      ])
      return { ds, other }
    }

    it('keeps the primary fields and brings in new ones', () => {
      const { ds, other } = merged()
      mergeMetadata(ds, other)
      expect(ds.metadata.fields.map((f) => [f.name, f.type])).toEqual([
        ['id', 'integer'],
        ['city', 'string'],
        ['bonus', 'real'],
      ])
      expect(getField(ds.metadata, 'bonus')?.tags).toEqual({ maximize: null })
      expect(ds.metadata.fieldcount).toBe(3)
    })

    it('lets the other metadata replace overridden fields', () => {
      const { ds, other } = merged()
      mergeMetadata(ds, other, { override: ['id'] })
      expect(ds.metadata.fields.map((f) => f.name)).toEqual(['id', 'city', 'bonus'])
      expect(getField(ds.metadata, 'id')?.type).toBe('string')
      expect(getField(ds.metadata, 'id')?.description).toBe('Payroll id')
    })

    it('keeps an overridden field the other does not declare', () => {
      const { ds, other } = merged()
      mergeMetadata(ds, other, { override: ['city'] })
      expect(getField(ds.metadata, 'city')?.description).toBe('Home town')
    })
  })
})
