import type { TableStore } from '../types'
import { DEFAULT_DATE_TAG_FORMAT } from './dateTags'

export type Logger = Pick<Console, 'warn' | 'error'>

export interface SidecarConfig {
  /** Reader/writer for the table file; reads and writes fail without one */
  tableStore?: TableStore
  /** Table file extension whose sidecar is `<base>.pmm<rest>` */
  tableExtension: string
  /** strftime format for date tags when the metadata declares none */
  dateTagFormat: string
  logger: Logger
}

export const DEFAULT_CONFIG: SidecarConfig = {
  tableExtension: '.feather',
  dateTagFormat: DEFAULT_DATE_TAG_FORMAT,
  logger: console,
}

export function resolveConfig(overrides: Partial<SidecarConfig> = {}): SidecarConfig {
  return { ...DEFAULT_CONFIG, ...overrides }
}
