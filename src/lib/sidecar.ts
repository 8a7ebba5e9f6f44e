/**
 * Reading and writing a table file together with its sidecar. For
 * /path/to/foo.feather the sidecar is /path/to/foo.pmm.
 */

import { existsSync, rmSync } from 'node:fs'
import { basename, extname } from 'node:path'
import type { TableStore } from '../types'
import { loadMetadata, saveMetadata } from './canonical'
import { resolveConfig, type SidecarConfig } from './config'
import { Dataset } from './dataset'
import { ErrorCode, PmmError } from './errors'
import { decodeNullSentinels, encodeNullSentinels } from './nullSentinel'
import { reconcileFields } from './reconcile'
import { inferMetadata } from './typeInference'

export interface SidecarPaths {
  sidecarPath: string
  datasetName: string
}

/** Sidecar path and default dataset name for a table path */
export function sidecarPaths(tablePath: string, tableExtension = '.feather'): SidecarPaths {
  const ext = extname(tablePath)
  const body = tablePath.slice(0, tablePath.length - ext.length)
  const sidecarPath = ext.startsWith(tableExtension)
    ? `${body}.pmm${ext.slice(tableExtension.length)}`
    : `${body}.pmm`
  return { sidecarPath, datasetName: basename(body) }
}

function requireStore(config: SidecarConfig): TableStore {
  if (!config.tableStore) throw new PmmError(ErrorCode.TABLE_UNAVAILABLE, 'No table store is configured')
  return config.tableStore
}

/**
 * Read a table and its sidecar. Without a sidecar the metadata is inferred
 * from the decoded table. The result is reconciled; nothing is written.
 */
export function readDataset(tablePath: string, overrides: Partial<SidecarConfig> = {}): Dataset {
  const config = resolveConfig(overrides)
  const store = requireStore(config)
  const table = decodeNullSentinels(store.read(tablePath), config.logger)
  const { sidecarPath, datasetName } = sidecarPaths(tablePath, config.tableExtension)
  const metadata = existsSync(sidecarPath) ? loadMetadata(sidecarPath) : inferMetadata(table, datasetName)
  const dataset = new Dataset(table, metadata)
  reconcileFields(dataset)
  return dataset
}

/**
 * Write the table, then its sidecar. The metadata is first reconciled with
 * the table. If either write fails both files are removed and the error is
 * rethrown.
 */
export function writeDataset(dataset: Dataset, tablePath: string, overrides: Partial<SidecarConfig> = {}): void {
  const config = resolveConfig(overrides)
  const store = requireStore(config)
  const { sidecarPath } = sidecarPaths(tablePath, config.tableExtension)

  reconcileFields(dataset)
  const table = encodeNullSentinels(dataset.table, dataset.metadata, config.logger)
  try {
    store.write(table, tablePath)
    saveMetadata(dataset.metadata, sidecarPath, config.dateTagFormat)
  } catch (e) {
    config.logger.error(`Failed to write ${tablePath}; removing ${tablePath} and ${sidecarPath}`)
    rmSync(tablePath, { force: true })
    rmSync(sidecarPath, { force: true })
    throw e
  }
}
