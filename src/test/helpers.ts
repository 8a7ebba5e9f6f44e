import { mkdtempSync, readFileSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { z } from 'zod'
import type { CellValue, Table, TableStore } from '../types'
import { isPmmError, type ErrorCode } from '../lib/errors'

/** Code of the PmmError `fn` throws; fails when it throws anything else or nothing */
export function codeOf(fn: () => unknown): ErrorCode {
  try {
    fn()
  } catch (e) {
    if (isPmmError(e)) return e.code
    throw e
  }
  throw new Error('expected a PmmError')
}

export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'pmm-'))
}

const storedTable = z.object({
  rowCount: z.number(),
  columns: z.array(
    z.object({
      name: z.string(),
      storage: z.string(),
      values: z.array(z.union([z.null(), z.boolean(), z.number(), z.string()])),
    })
  ),
})

function restoreCell(storage: string, value: CellValue): CellValue {
  if (storage.startsWith('float') && value === null) return NaN
  if (storage.startsWith('date') && typeof value === 'string') return new Date(value)
  return value
}

/**
 * Table store that keeps tables as JSON. NaN is written as null and read
 * back as NaN in float columns; dates travel as ISO strings.
 */
export function jsonTableStore(options: { failWrite?: boolean } = {}): TableStore & { writes: Table[] } {
  const writes: Table[] = []
  return {
    writes,
    read(path: string): Table {
      const stored = storedTable.parse(JSON.parse(readFileSync(path, 'utf8')))
      return {
        rowCount: stored.rowCount,
        columns: stored.columns.map((c) => ({
          name: c.name,
          storage: c.storage,
          values: c.values.map((v) => restoreCell(c.storage, v)),
        })),
      }
    },
    write(table: Table, path: string): void {
      writes.push(table)
      writeFileSync(path, JSON.stringify(table), 'utf8')
      if (options.failWrite) throw new Error('disk full')
    },
  }
}

/** Logger that records what it is given */
export function recordingLogger() {
  const warnings: string[] = []
  const errors: string[] = []
  return {
    warnings,
    errors,
    warn: (message: string) => {
      warnings.push(message)
    },
    error: (message: string) => {
      errors.push(message)
    },
  }
}
