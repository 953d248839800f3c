/**
 * pyvar — type definitions
 *
 * A PyVarRecord is the decoded form of one .8xv file. Every field is raw
 * bytes: the calculator stores names and info as fixed-width byte arrays with
 * no guaranteed NUL terminator, so they are never modelled as strings here.
 */

// ─── Record ───────────────────────────────────────────────────────────────────

export interface PyVarRecord {
  /** Program text. 0–65535 bytes, further bounded by the u16 framing budget. */
  readonly source: Uint8Array;

  /** In-device identifier. Always exactly VARIABLE_NAME_SIZE (8) bytes. */
  readonly variableName: Uint8Array;

  /** Free-form header comment. Always exactly INFO_SIZE (42) bytes. */
  readonly info: Uint8Array;

  /**
   * Display name embedded in the payload, 1–255 bytes.
   * Absent (not empty) when the file carries no long filename.
   */
  readonly longFilename?: Uint8Array;
}

/**
 * Caller-facing input to createRecord(). Strings are UTF-8 encoded; byte
 * arrays are taken as-is. Fixed-width fields are truncated or zero-padded.
 */
export interface RecordInit {
  readonly source:        string | Uint8Array;
  readonly variableName?: string | Uint8Array;
  readonly info?:         string | Uint8Array;
  readonly longFilename?: string | Uint8Array;
}

// ─── Dump ─────────────────────────────────────────────────────────────────────

/**
 * How a dumped field's value is rendered.
 *
 * hex   Raw bytes, grouped into 2-byte words.
 * text  Bytes decoded as UTF-8 up to the first NUL.
 * u16   Little-endian unsigned 16-bit integer.
 * u8    Single unsigned byte.
 */
export type DumpKind = 'hex' | 'text' | 'u16' | 'u8';

export interface DumpField {
  readonly name:   string;
  readonly offset: number;
  readonly length: number;
  readonly kind:   DumpKind;
  readonly bytes:  Uint8Array;
  readonly value:  string | number;
}

// ─── Conversion ───────────────────────────────────────────────────────────────

/** pyvar = binary .8xv container; text = plain Python source. */
export type SourceFormat = 'pyvar' | 'text';

export interface ConversionPlan {
  readonly inputPath:    string;
  readonly outputPath:   string;
  readonly inputFormat:  SourceFormat;
  readonly outputFormat: SourceFormat;
  /** Only consulted for text → pyvar. */
  readonly record: Omit<RecordInit, 'source'>;
}
