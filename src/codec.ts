/**
 * pyvar — container codec
 *
 * serializePyVar()  PyVarRecord → .8xv bytes.
 * parsePyVar()      .8xv bytes → PyVarRecord; validates magic, lengths and
 *                     checksum, throws a PyVarError subclass on failure.
 * isPyVar()         magic-only probe for format sniffing.
 *
 * Both directions are whole-buffer and synchronous: the format needs random
 * access to fixed offsets and a trailing checksum, so it cannot be decoded
 * from a stream.
 */

import {
  PYVAR_MAGIC,
  MAGIC_SIZE,
  INFO_SIZE,
  VARIABLE_NAME_SIZE,
  MAX_FILENAME_SIZE,
  MIN_CONTAINER_SIZE,
  OFFSET_INFO,
  OFFSET_VARIABLE_NAME,
  OFFSET_PAYLOAD_SIZE_C,
  OFFSET_FILENAME_LEN,
  OFFSET_SOH,
  OFFSET_FILENAME,
  CHECKSUM_START,
  FLAGS_BYTES,
  TYPE_ID_PYTHON_APPVAR,
  FORMAT_TAG,
  SOH,
  NUL,
  DEFAULT_VARIABLE_NAME,
  PAYLOAD_FIXED_SIZE,
  FILENAME_FRAMING_SIZE,
  computeDataSize,
  filenameBlockSize,
} from './constants';
import { ByteSink, checksum16, isAllZero, packFixed, readU16LE } from './bytes';
import {
  ChecksumMismatchError,
  FilenameTooLongError,
  InvalidFormatError,
  MalformedLengthError,
} from './errors';
import type { PyVarRecord } from './types';

const DEFAULT_NAME_BYTES = new TextEncoder().encode(DEFAULT_VARIABLE_NAME);

// ─── isPyVar ──────────────────────────────────────────────────────────────────

/**
 * True when `bytes` starts with the full 11-byte container signature.
 * Nothing past the magic is inspected.
 */
export function isPyVar(bytes: Uint8Array): boolean {
  if (bytes.length < MAGIC_SIZE) return false;
  for (let i = 0; i < MAGIC_SIZE; i++) {
    if (bytes[i] !== PYVAR_MAGIC[i]) return false;
  }
  return true;
}

// ─── serializePyVar ───────────────────────────────────────────────────────────

/**
 * Encode a record as a complete .8xv container.
 *
 * Fixed-width fields are truncated or zero-padded; an all-zero variable name
 * is replaced by DEFAULT_VARIABLE_NAME, any other is written as given. Size fields are written modulo 2^16, so
 * callers must keep the source inside the framing budget (createRecord and
 * checkFramingBudget enforce it). Throws FilenameTooLongError when the long
 * filename cannot be described by its one-byte length.
 */
export function serializePyVar(record: PyVarRecord): Uint8Array {
  const filename = record.longFilename !== undefined && record.longFilename.length > 0
    ? record.longFilename
    : undefined;
  const filenameLength = filename?.length ?? 0;
  if (filenameLength > MAX_FILENAME_SIZE) {
    throw new FilenameTooLongError(filenameLength);
  }

  // ── Payload ────────────────────────────────────────────────────────────────
  //
  // Built first so its measured length drives all three payload size fields.
  // Without a long filename the zero length byte doubles as the terminator.

  const payload = new ByteSink(
    PAYLOAD_FIXED_SIZE + filenameBlockSize(filenameLength) + record.source.length,
  );
  payload.writeBytes(FORMAT_TAG).writeByte(filenameLength);
  if (filename !== undefined) {
    payload.writeByte(SOH).writeBytes(filename).writeByte(NUL);
  }
  payload.writeBytes(record.source);

  // Entry length: payload plus the u16 length word that precedes it.
  const payloadSize = payload.length + 2;

  // ── Container ──────────────────────────────────────────────────────────────

  const variableName = isAllZero(record.variableName)
    ? DEFAULT_NAME_BYTES
    : record.variableName;

  const out = new ByteSink(MIN_CONTAINER_SIZE);
  out
    .writeBytes(PYVAR_MAGIC)
    .writeBytes(packFixed(record.info, INFO_SIZE))
    .writeU16(computeDataSize(record.source.length, filenameLength))
    .writeBytes(FLAGS_BYTES)
    .writeU16(payloadSize)                   // payload_size_a
    .writeByte(TYPE_ID_PYTHON_APPVAR)
    .writeBytes(packFixed(variableName, VARIABLE_NAME_SIZE))
    .writeU16(0)                             // pad
    .writeU16(payloadSize)                   // payload_size_b
    .writeU16(payloadSize - 2)               // payload_size_c
    .writeBytes(payload.view());

  out.writeU16(checksum16(out.view(), CHECKSUM_START));
  return out.finish();
}

// ─── parsePyVar ───────────────────────────────────────────────────────────────

/**
 * Decode and validate a complete .8xv container.
 *
 * Throws:
 *   InvalidFormatError     magic mismatch, truncated buffer, or a checksummed
 *                          buffer whose long filename lacks its SOH or NUL
 *   MalformedLengthError   payload_size_c too small for the framing it declares
 *   ChecksumMismatchError  stored checksum disagrees with the bytes
 *
 * Validation order: magic → minimum size → lengths → bounds → checksum →
 * filename markers.
 * Every returned buffer is a copy; the record never aliases `bytes`.
 */
export function parsePyVar(bytes: Uint8Array): PyVarRecord {
  if (!isPyVar(bytes)) {
    throw new InvalidFormatError(
      `Not a Python AppVar container: the first ${MAGIC_SIZE} bytes do not match the '**TI83F*' signature.`,
    );
  }

  if (bytes.length < MIN_CONTAINER_SIZE) {
    throw new InvalidFormatError(
      `Container is ${bytes.length} bytes; a valid one has at least ${MIN_CONTAINER_SIZE}.`,
    );
  }

  // ── Fixed fields ───────────────────────────────────────────────────────────

  const info         = bytes.slice(OFFSET_INFO, OFFSET_INFO + INFO_SIZE);
  const variableName = bytes.slice(OFFSET_VARIABLE_NAME, OFFSET_VARIABLE_NAME + VARIABLE_NAME_SIZE);

  // ── Payload length ─────────────────────────────────────────────────────────
  //
  // payload_size_c counts 'PYCD', the filename_len byte, the optional
  // filename block and the source. The other two size copies are not checked.

  const declared = readU16LE(bytes, OFFSET_PAYLOAD_SIZE_C);
  let sourceLength = declared - PAYLOAD_FIXED_SIZE;
  if (sourceLength < 0) {
    throw new MalformedLengthError(
      `payload_size_c is ${declared}; it must be at least ${PAYLOAD_FIXED_SIZE} ('PYCD' + filename length byte).`,
    );
  }

  // ── Long filename ──────────────────────────────────────────────────────────
  //
  // The block is SOH + name + NUL. Its marker bytes sit inside the checksummed
  // range, so they are checked only once the checksum holds.

  const filenameLength = bytes[OFFSET_FILENAME_LEN] ?? 0;
  let sourceStart = OFFSET_SOH;
  const terminator = OFFSET_FILENAME + filenameLength;

  if (filenameLength !== 0) {
    sourceLength -= FILENAME_FRAMING_SIZE + filenameLength;
    if (sourceLength < 0) {
      throw new MalformedLengthError(
        `payload_size_c is ${declared}, too small for a ${filenameLength}-byte long filename.`,
      );
    }
    sourceStart = terminator + 1;
  }

  // ── Source + checksum ──────────────────────────────────────────────────────

  const sourceEnd = sourceStart + sourceLength;
  if (sourceEnd + 2 > bytes.length) {
    throw new InvalidFormatError(
      `Container is truncated: declared payload ends at byte ${sourceEnd + 2}, ` +
      `but the buffer holds ${bytes.length}.`,
    );
  }

  const stored   = readU16LE(bytes, sourceEnd);
  const computed = checksum16(bytes, CHECKSUM_START, sourceEnd);
  if (stored !== computed) {
    throw new ChecksumMismatchError(stored, computed);
  }

  let longFilename: Uint8Array | undefined;
  if (filenameLength !== 0) {
    if (bytes[OFFSET_SOH] !== SOH) {
      throw new InvalidFormatError(
        `Expected SOH (0x01) at 0x${OFFSET_SOH.toString(16)} before the long filename; ` +
        `got 0x${(bytes[OFFSET_SOH] ?? 0).toString(16).padStart(2, '0')}.`,
      );
    }
    if (bytes[terminator] !== NUL) {
      throw new InvalidFormatError(
        `Long filename is not NUL-terminated at 0x${terminator.toString(16)}.`,
      );
    }
    longFilename = bytes.slice(OFFSET_FILENAME, terminator);
  }

  const record: PyVarRecord = {
    source: bytes.slice(sourceStart, sourceEnd),
    variableName,
    info,
  };
  if (longFilename !== undefined) {
    return { ...record, longFilename };
  }
  return record;
}
