// ─── Types ────────────────────────────────────────────────────────────────────
export type {
  PyVarRecord,
  RecordInit,
  DumpKind,
  DumpField,
  SourceFormat,
  ConversionPlan,
} from './types';

// ─── Constants ────────────────────────────────────────────────────────────────
export {
  PYVAR_MAGIC,
  MAGIC_SIZE,
  INFO_SIZE,
  VARIABLE_NAME_SIZE,
  MAX_FILENAME_SIZE,
  MIN_CONTAINER_SIZE,
  OFFSET_INFO,
  OFFSET_DATA_SIZE,
  OFFSET_FLAGS,
  OFFSET_PAYLOAD_SIZE_A,
  OFFSET_TYPE_ID,
  OFFSET_VARIABLE_NAME,
  OFFSET_PAYLOAD_SIZE_B,
  OFFSET_PAYLOAD_SIZE_C,
  OFFSET_FORMAT_TAG,
  OFFSET_FILENAME_LEN,
  OFFSET_SOH,
  OFFSET_FILENAME,
  CHECKSUM_START,
  TYPE_ID_PYTHON_APPVAR,
  FORMAT_TAG,
  DEFAULT_VARIABLE_NAME,
  computeDataSize,
  computePayloadSize,
} from './constants';

// ─── Errors ───────────────────────────────────────────────────────────────────
export {
  PyVarError,
  InvalidFormatError,
  ChecksumMismatchError,
  MalformedLengthError,
  SourceTooLargeError,
  FilenameTooLongError,
  UnknownFormatError,
  UnsupportedConversionError,
} from './errors';
export type { PyVarErrorCode } from './errors';

// ─── Bytes ────────────────────────────────────────────────────────────────────
export {
  readU16LE,
  writeU16LE,
  checksum16,
  packFixed,
  ByteSink,
} from './bytes';

// ─── Codec ────────────────────────────────────────────────────────────────────
export { serializePyVar, parsePyVar, isPyVar } from './codec';

// ─── Records ──────────────────────────────────────────────────────────────────
export {
  createRecord,
  checkFramingBudget,
  framingOverhead,
  maxSourceLength,
  fieldText,
  recordText,
} from './record';

// ─── Dump ─────────────────────────────────────────────────────────────────────
export { dumpPyVar, formatDump } from './dump';

// ─── Formats ──────────────────────────────────────────────────────────────────
export {
  parseFormatName,
  inferFormat,
  targetFor,
  inferOutputPath,
  planConversion,
  convertBytes,
} from './formats';
export type { PlanOptions } from './formats';
