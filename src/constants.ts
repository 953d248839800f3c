/**
 * pyvar — layout constants
 *
 * These constants define the binary contract of the Python AppVar container
 * (.8xv) loaded by the TI-83 Premium CE / TI-84 Plus CE Python app. Offsets
 * are absolute from the start of the file; every u16 is little-endian.
 *
 *   ── File header (not covered by the checksum) ───────────────────────────
 *   [0x00..0x0A]  magic            11 bytes = '**TI83F*' 1A 0A 00
 *   [0x0B..0x34]  info             42 bytes, free-form
 *   [0x35..0x36]  data_size        u16 = bytes from 0x37 to end of source
 *
 *   ── Variable entry (checksummed from here) ──────────────────────────────
 *   [0x37..0x38]  flags            0D 00
 *   [0x39..0x3A]  payload_size_a   u16
 *   [0x3B]        type_id          u8  = 0x15 (AppVar)
 *   [0x3C..0x43]  variable_name    8 bytes, NUL padded
 *   [0x44..0x45]  pad              00 00
 *   [0x46..0x47]  payload_size_b   u16 = payload_size_a
 *   [0x48..0x49]  payload_size_c   u16 = payload_size_b - 2
 *
 *   ── Payload ─────────────────────────────────────────────────────────────
 *   [0x4A..0x4D]  format_tag       'PYCD'
 *   [0x4E]        filename_len     u8, 0 when there is no long filename
 *   [0x4F]        soh              0x01            ┐
 *   [0x50..]      long_filename    filename_len    │ only when filename_len ≠ 0
 *   [..]          nul              0x00            ┘
 *   [..]          source           source.length
 *   [..]          checksum         u16 = Σ bytes [0x37, end of source) mod 2^16
 */

// ─── Magic ────────────────────────────────────────────────────────────────────

/** '**TI83F*' followed by 1A 0A 00. Compared in full on every parse. */
export const PYVAR_MAGIC: Uint8Array = Uint8Array.of(
  0x2a, 0x2a, 0x54, 0x49, 0x38, 0x33, 0x46, 0x2a, 0x1a, 0x0a, 0x00,
);

// ─── Field widths ─────────────────────────────────────────────────────────────

export const MAGIC_SIZE         = 11;
export const INFO_SIZE          = 42;
export const VARIABLE_NAME_SIZE = 8;
export const MAX_FILENAME_SIZE  = 0xff; // stored in a single byte

/** Smallest valid container: empty source, no long filename. */
export const MIN_CONTAINER_SIZE = 81;

// ─── Offsets ──────────────────────────────────────────────────────────────────

export const OFFSET_MAGIC          = 0x00;
export const OFFSET_INFO           = 0x0b;
export const OFFSET_DATA_SIZE      = 0x35; // u16
export const OFFSET_FLAGS          = 0x37; // checksum range starts here
export const OFFSET_PAYLOAD_SIZE_A = 0x39; // u16
export const OFFSET_TYPE_ID        = 0x3b; // u8
export const OFFSET_VARIABLE_NAME  = 0x3c;
export const OFFSET_PAD            = 0x44;
export const OFFSET_PAYLOAD_SIZE_B = 0x46; // u16
export const OFFSET_PAYLOAD_SIZE_C = 0x48; // u16
export const OFFSET_FORMAT_TAG     = 0x4a;
export const OFFSET_FILENAME_LEN   = 0x4e; // u8
export const OFFSET_SOH            = 0x4f;
export const OFFSET_FILENAME       = 0x50;

/** First checksummed byte. Magic, info and data_size are excluded. */
export const CHECKSUM_START = OFFSET_FLAGS;

// ─── Constant field values ────────────────────────────────────────────────────

export const FLAGS_BYTES: Uint8Array = Uint8Array.of(0x0d, 0x00);

/** Variable type for AppVars, which is how the Python app stores scripts. */
export const TYPE_ID_PYTHON_APPVAR = 0x15;

/** 'PYCD': marks the AppVar payload as Python source. */
export const FORMAT_TAG: Uint8Array = Uint8Array.of(0x50, 0x59, 0x43, 0x44);

export const SOH = 0x01;
export const NUL = 0x00;

/** Substituted when a record carries no variable name. */
export const DEFAULT_VARIABLE_NAME = 'TIPYFILE';

// ─── Size arithmetic ──────────────────────────────────────────────────────────
//
// data_size counts the 19-byte variable entry header (0x37..0x49) plus the
// payload; the payload is 'PYCD' + filename_len byte + source, and the long
// filename block adds SOH + name + NUL on top of that.

/** Variable entry header bytes (0x37..0x49) counted by data_size. */
export const ENTRY_HEADER_SIZE = OFFSET_FORMAT_TAG - OFFSET_FLAGS; // 19

/** 'PYCD' + the filename_len byte, present even without a long filename. */
export const PAYLOAD_FIXED_SIZE = FORMAT_TAG.length + 1; // 5

/** SOH marker + NUL terminator wrapped around a long filename. */
export const FILENAME_FRAMING_SIZE = 2;

/** Largest value any u16 size field can hold. */
export const MAX_U16 = 0xffff;

/** Byte length of a long filename block, including its SOH and NUL bytes. */
export function filenameBlockSize(filenameLength: number): number {
  return filenameLength > 0 ? FILENAME_FRAMING_SIZE + filenameLength : 0;
}

/** Value of data_size (0x35) for the given source and long filename lengths. */
export function computeDataSize(sourceLength: number, filenameLength: number): number {
  return ENTRY_HEADER_SIZE + PAYLOAD_FIXED_SIZE + filenameBlockSize(filenameLength) + sourceLength;
}

/** Value of payload_size_a and payload_size_b (0x39, 0x46). */
export function computePayloadSize(sourceLength: number, filenameLength: number): number {
  return PAYLOAD_FIXED_SIZE + filenameBlockSize(filenameLength) + sourceLength + 2;
}
