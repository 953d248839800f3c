/**
 * pyvar — error taxonomy
 *
 * Parse failures are always recoverable: no partial record escapes a throw.
 * Allocation failure is not modelled here; it surfaces as the runtime's own
 * RangeError and is treated as fatal.
 */

export type PyVarErrorCode =
  | 'INVALID_FORMAT'
  | 'CHECKSUM_MISMATCH'
  | 'MALFORMED_LENGTH'
  | 'SOURCE_TOO_LARGE'
  | 'FILENAME_TOO_LONG'
  | 'UNKNOWN_FORMAT'
  | 'UNSUPPORTED_CONVERSION';

export class PyVarError extends Error {
  readonly code: PyVarErrorCode;

  constructor(code: PyVarErrorCode, message: string) {
    super(message);
    this.name = 'PyVarError';
    this.code = code;
  }
}

/** Not a .8xv container, or too short to hold its mandatory fields. */
export class InvalidFormatError extends PyVarError {
  constructor(message: string) {
    super('INVALID_FORMAT', message);
    this.name = 'InvalidFormatError';
  }
}

/** Structurally valid container whose payload bytes were corrupted. */
export class ChecksumMismatchError extends PyVarError {
  readonly stored:   number;
  readonly computed: number;

  constructor(stored: number, computed: number) {
    super(
      'CHECKSUM_MISMATCH',
      `Checksum mismatch: stored 0x${hex16(stored)}, computed 0x${hex16(computed)}.`,
    );
    this.name     = 'ChecksumMismatchError';
    this.stored   = stored;
    this.computed = computed;
  }
}

/** A declared length underflows once the fixed framing is subtracted. */
export class MalformedLengthError extends PyVarError {
  constructor(message: string) {
    super('MALFORMED_LENGTH', message);
    this.name = 'MalformedLengthError';
  }
}

/** Source plus framing does not fit the u16 size fields. */
export class SourceTooLargeError extends PyVarError {
  constructor(message: string) {
    super('SOURCE_TOO_LARGE', message);
    this.name = 'SourceTooLargeError';
  }
}

/** Long filename longer than its single length byte can describe. */
export class FilenameTooLongError extends PyVarError {
  constructor(length: number) {
    super('FILENAME_TOO_LONG', `Long filename is ${length} bytes; the maximum is 255.`);
    this.name = 'FilenameTooLongError';
  }
}

export class UnknownFormatError extends PyVarError {
  constructor(message: string) {
    super('UNKNOWN_FORMAT', message);
    this.name = 'UnknownFormatError';
  }
}

export class UnsupportedConversionError extends PyVarError {
  constructor(message: string) {
    super('UNSUPPORTED_CONVERSION', message);
    this.name = 'UnsupportedConversionError';
  }
}

function hex16(n: number): string {
  return n.toString(16).toUpperCase().padStart(4, '0');
}
