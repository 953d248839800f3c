/**
 * pyvar — record construction and framing budget
 */

import {
  INFO_SIZE,
  VARIABLE_NAME_SIZE,
  MAX_FILENAME_SIZE,
  MAX_U16,
  PAYLOAD_FIXED_SIZE,
  DEFAULT_VARIABLE_NAME,
  computeDataSize,
  filenameBlockSize,
} from './constants';
import { isAllZero, nulTerminatedLength, packFixed } from './bytes';
import { FilenameTooLongError, SourceTooLargeError } from './errors';
import type { PyVarRecord, RecordInit } from './types';

// Shared across calls; encode() and decode() keep no state.
const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder();

export function toBytes(value: string | Uint8Array): Uint8Array {
  return typeof value === 'string' ? utf8Encoder.encode(value) : value.slice();
}

// ─── Framing budget ───────────────────────────────────────────────────────────

/** Bytes the payload adds around the source: 5, plus 2 + length for a long filename. */
export function framingOverhead(longFilename?: Uint8Array): number {
  return PAYLOAD_FIXED_SIZE + filenameBlockSize(longFilename?.length ?? 0);
}

/** Largest source that still fits the u16 size fields alongside `longFilename`. */
export function maxSourceLength(longFilename?: Uint8Array): number {
  return MAX_U16 - computeDataSize(0, longFilename?.length ?? 0);
}

/**
 * Throw SourceTooLargeError when data_size, the largest of the derived size
 * fields, would not fit in 16 bits.
 */
export function checkFramingBudget(record: PyVarRecord): void {
  const filenameLength = record.longFilename?.length ?? 0;
  if (filenameLength > MAX_FILENAME_SIZE) {
    throw new FilenameTooLongError(filenameLength);
  }

  const dataSize = computeDataSize(record.source.length, filenameLength);
  if (dataSize > MAX_U16) {
    throw new SourceTooLargeError(
      `Source is ${record.source.length} bytes; with ${framingOverhead(record.longFilename)} bytes of payload ` +
      `framing the container would need data_size=${dataSize}, over the u16 limit of ${MAX_U16}. ` +
      `The largest source that fits is ${maxSourceLength(record.longFilename)} bytes.`,
    );
  }
}

// ─── createRecord ─────────────────────────────────────────────────────────────

/**
 * Build a validated PyVarRecord from caller values.
 *
 * variableName and info are truncated or zero-padded to 8 and 42 bytes; a
 * missing, empty or all-zero variableName becomes DEFAULT_VARIABLE_NAME. An empty long
 * filename is dropped. Throws FilenameTooLongError or SourceTooLargeError.
 */
export function createRecord(init: RecordInit): PyVarRecord {
  const nameBytes = init.variableName === undefined ? undefined : toBytes(init.variableName);
  const variableName = packFixed(
    nameBytes === undefined || isAllZero(nameBytes)
      ? utf8Encoder.encode(DEFAULT_VARIABLE_NAME)
      : nameBytes,
    VARIABLE_NAME_SIZE,
  );

  const info = packFixed(init.info === undefined ? undefined : toBytes(init.info), INFO_SIZE);

  const filename = init.longFilename === undefined ? undefined : toBytes(init.longFilename);
  const record: PyVarRecord = filename !== undefined && filename.length > 0
    ? { source: toBytes(init.source), variableName, info, longFilename: filename }
    : { source: toBytes(init.source), variableName, info };

  checkFramingBudget(record);
  return record;
}

// ─── Text views ───────────────────────────────────────────────────────────────

/** Decode a fixed-width field (variableName, info) up to its first NUL. */
export function fieldText(bytes: Uint8Array): string {
  return utf8Decoder.decode(bytes.subarray(0, nulTerminatedLength(bytes)));
}

/** The program text of a record, decoded as UTF-8. */
export function recordText(record: PyVarRecord): string {
  return utf8Decoder.decode(record.source);
}
