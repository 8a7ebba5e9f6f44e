export * from './types'
export { ErrorCode, PmmError, isPmmError } from './lib/errors'
export {
  construct,
  defineRecord,
  required,
  defaulted,
  optional,
  str,
  int,
  real,
  anything,
  tags,
  listOf,
  type Attribute,
  type AttributeGroup,
  type RecordDef,
  type RecordLayout,
  type RecordOf,
} from './lib/record'
export {
  PMM_VERSION,
  FLAT_FILE_FORMAT,
  FLAT_FILE,
  DATA,
  STATS,
  FIELD,
  METADATA,
  buildMetadata,
  createMetadata,
  createField,
  createStats,
  validateMetadata,
  getField,
  requireField,
  addField,
  setFieldTag,
  setTag,
  type FlatFileFormat,
  type FlatFile,
  type Data,
  type Stats,
  type Field,
  type Metadata,
} from './lib/pmm'
export {
  serializable,
  toCanonicalJson,
  toCanonicalText,
  loadsMetadata,
  loadMetadata,
  saveMetadata,
  type Serialized,
} from './lib/canonical'
export {
  DEFAULT_DATE_TAG_FORMAT,
  toDatePattern,
  formatDateTag,
  parseDateTag,
  convertDateTags,
  interpretDateTags,
} from './lib/dateTags'
export { inferCanonicalType, inferField, inferMetadata } from './lib/typeInference'
export { reconcileFields, addMetadataFromOther, mergeMetadata, type MergeOptions, type Reconcilable } from './lib/reconcile'
export { NULL_MARKER, NULL_SUFFIX, encodeNullSentinels, decodeNullSentinels } from './lib/nullSentinel'
export { isNullValue, nonNullCount, columnNames, getColumn, createTable, setColumn } from './lib/table'
export { Dataset } from './lib/dataset'
export { computeFieldStats } from './lib/fieldStats'
export { parseFlatFile, readFlatFile } from './lib/flatFile'
export { DEFAULT_CONFIG, resolveConfig, type Logger, type SidecarConfig } from './lib/config'
export { sidecarPaths, readDataset, writeDataset, type SidecarPaths } from './lib/sidecar'
