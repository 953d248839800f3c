/**
 * pyvar — field dumper
 *
 * Walks the container layout and reports every field with its offset, raw
 * bytes and decoded value. Meant for inspecting broken files, so it never
 * checks the checksum or the SOH/NUL markers: lengths are taken from the
 * file as declared and clamped to the bytes actually present.
 */

import {
  MAGIC_SIZE,
  INFO_SIZE,
  VARIABLE_NAME_SIZE,
  MIN_CONTAINER_SIZE,
  OFFSET_MAGIC,
  OFFSET_INFO,
  OFFSET_DATA_SIZE,
  OFFSET_FLAGS,
  OFFSET_PAYLOAD_SIZE_A,
  OFFSET_TYPE_ID,
  OFFSET_VARIABLE_NAME,
  OFFSET_PAD,
  OFFSET_PAYLOAD_SIZE_B,
  OFFSET_PAYLOAD_SIZE_C,
  OFFSET_FORMAT_TAG,
  OFFSET_FILENAME_LEN,
  OFFSET_SOH,
  OFFSET_FILENAME,
  FORMAT_TAG,
  PAYLOAD_FIXED_SIZE,
  filenameBlockSize,
} from './constants';
import { readU16LE } from './bytes';
import { InvalidFormatError } from './errors';
import { fieldText } from './record';
import type { DumpField, DumpKind } from './types';

function hexWords(bytes: Uint8Array): string {
  const words: string[] = [];
  for (let i = 0; i < bytes.length; i += 2) {
    words.push(
      Array.from(bytes.subarray(i, i + 2), b => b.toString(16).padStart(2, '0')).join(''),
    );
  }
  return words.join(' ');
}

function decodeValue(kind: DumpKind, bytes: Uint8Array): string | number {
  switch (kind) {
    case 'hex':  return hexWords(bytes);
    case 'text': return fieldText(bytes);
    case 'u8':   return bytes[0] ?? 0;
    case 'u16':  return bytes.length >= 2 ? readU16LE(bytes, 0) : bytes[0] ?? 0;
  }
}

/**
 * List every field of a container in file order.
 * Throws InvalidFormatError only when the buffer is shorter than the fixed
 * 81-byte frame; a wrong magic is reported, not rejected.
 */
export function dumpPyVar(bytes: Uint8Array): DumpField[] {
  if (bytes.length < MIN_CONTAINER_SIZE) {
    throw new InvalidFormatError(
      `Cannot dump a ${bytes.length}-byte buffer; the fixed frame alone is ${MIN_CONTAINER_SIZE} bytes.`,
    );
  }

  const fields: DumpField[] = [];
  const take = (name: string, offset: number, length: number, kind: DumpKind): void => {
    const start = Math.min(offset, bytes.length);
    const end   = Math.min(offset + Math.max(0, length), bytes.length);
    const slice = bytes.slice(start, end);
    fields.push({ name, offset, length: slice.length, kind, bytes: slice, value: decodeValue(kind, slice) });
  };

  take('magic',          OFFSET_MAGIC,          MAGIC_SIZE,         'hex');
  take('info',           OFFSET_INFO,           INFO_SIZE,          'text');
  take('data_size',      OFFSET_DATA_SIZE,      2,                  'u16');
  take('flags',          OFFSET_FLAGS,          2,                  'hex');
  take('payload_size_a', OFFSET_PAYLOAD_SIZE_A, 2,                  'u16');
  take('type_id',        OFFSET_TYPE_ID,        1,                  'u8');
  take('variable_name',  OFFSET_VARIABLE_NAME,  VARIABLE_NAME_SIZE, 'text');
  take('pad',            OFFSET_PAD,            2,                  'hex');
  take('payload_size_b', OFFSET_PAYLOAD_SIZE_B, 2,                  'u16');
  take('payload_size_c', OFFSET_PAYLOAD_SIZE_C, 2,                  'u16');
  take('format_tag',     OFFSET_FORMAT_TAG,     FORMAT_TAG.length,  'text');
  take('filename_len',   OFFSET_FILENAME_LEN,   1,                  'u8');

  const filenameLength = bytes[OFFSET_FILENAME_LEN] ?? 0;
  let sourceStart = OFFSET_SOH;
  if (filenameLength !== 0) {
    take('soh',           OFFSET_SOH,                       1,              'hex');
    take('long_filename', OFFSET_FILENAME,                  filenameLength, 'text');
    take('nul',           OFFSET_FILENAME + filenameLength, 1,              'hex');
    sourceStart = OFFSET_FILENAME + filenameLength + 1;
  }

  const declared     = readU16LE(bytes, OFFSET_PAYLOAD_SIZE_C);
  const sourceLength = Math.max(0, declared - PAYLOAD_FIXED_SIZE - filenameBlockSize(filenameLength));
  take('source',   sourceStart,                sourceLength,                              'text');
  take('checksum', sourceStart + sourceLength, bytes.length - sourceStart - sourceLength, 'hex');

  return fields;
}

/**
 * Render dumped fields one per line as `name @0xOO: value`. Text values are
 * JSON-quoted so embedded newlines stay on one line. `label` styles the
 * `name @0xOO` part (the CLI passes chalk.bold).
 */
export function formatDump(
  fields: readonly DumpField[],
  label: (text: string) => string = text => text,
): string[] {
  return fields.map(f => {
    const value = f.kind === 'text' ? JSON.stringify(f.value) : String(f.value);
    return `${label(`${f.name} @0x${f.offset.toString(16).padStart(2, '0')}`)}: ${value}`;
  });
}
