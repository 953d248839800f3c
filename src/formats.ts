/**
 * pyvar — format and output-path inference
 *
 * Decides which direction a conversion runs and where its result goes. The
 * order of precedence for the input format is: explicit --format, then the
 * file extension, then the magic bytes of the file contents.
 */

import * as path from 'node:path';
import { isPyVar, parsePyVar, serializePyVar } from './codec';
import { UnknownFormatError, UnsupportedConversionError } from './errors';
import { createRecord } from './record';
import type { ConversionPlan, RecordInit, SourceFormat } from './types';

const FORMAT_NAMES: Readonly<Record<string, SourceFormat>> = {
  '8xv':    'pyvar',
  'pyvar':  'pyvar',
  'py':     'text',
  'python': 'text',
  'txt':    'text',
  'text':   'text',
};

const EXTENSIONS: Readonly<Record<SourceFormat, string>> = {
  pyvar: '.8xv',
  text:  '.py',
};

/** Map a user-facing format name (case-insensitive) to a SourceFormat. */
export function parseFormatName(name: string): SourceFormat {
  const format = FORMAT_NAMES[name.trim().toLowerCase()];
  if (format === undefined) {
    throw new UnknownFormatError(
      `Unknown format '${name}'. Expected one of: ${Object.keys(FORMAT_NAMES).join(', ')}.`,
    );
  }
  return format;
}

/**
 * Resolve the format of `filePath`.
 *
 * @param explicit  Format name given by the user; wins when present.
 * @param contents  File bytes, consulted only when the extension is unknown.
 */
export function inferFormat(filePath: string, explicit?: string, contents?: Uint8Array): SourceFormat {
  if (explicit !== undefined) return parseFormatName(explicit);

  const ext = path.extname(filePath).slice(1).toLowerCase();
  if (ext === '8xv') return 'pyvar';
  if (ext === 'py' || ext === 'txt') return 'text';

  if (contents !== undefined && isPyVar(contents)) return 'pyvar';

  throw new UnknownFormatError(
    `Cannot infer the format of '${filePath}' from its extension; pass --format.`,
  );
}

/** The format a file of `format` converts into by default. */
export function targetFor(format: SourceFormat): SourceFormat {
  return format === 'pyvar' ? 'text' : 'pyvar';
}

/** `input` with its extension replaced by the one for `target` (appended if none). */
export function inferOutputPath(input: string, target: SourceFormat): string {
  const ext  = path.extname(input);
  const stem = ext.length > 0 ? input.slice(0, -ext.length) : input;
  return stem + EXTENSIONS[target];
}

export interface PlanOptions {
  readonly outfile?:      string;
  readonly format?:       string;
  readonly targetFormat?: string;
  readonly varname?:      string;
  readonly filename?:     string;
  readonly info?:         string;
}

/**
 * Resolve formats and output path for one conversion.
 * Throws UnknownFormatError or UnsupportedConversionError.
 */
export function planConversion(
  inputPath: string,
  options: PlanOptions,
  contents?: Uint8Array,
): ConversionPlan {
  const inputFormat  = inferFormat(inputPath, options.format, contents);
  const outputFormat = options.targetFormat !== undefined
    ? parseFormatName(options.targetFormat)
    : targetFor(inputFormat);

  if (inputFormat === outputFormat) {
    throw new UnsupportedConversionError(
      `Input and target format are both '${inputFormat}'; nothing to convert.`,
    );
  }

  const record: Omit<RecordInit, 'source'> = {
    ...(options.varname  !== undefined ? { variableName: options.varname }  : {}),
    ...(options.filename !== undefined ? { longFilename: options.filename } : {}),
    ...(options.info     !== undefined ? { info: options.info }             : {}),
  };

  return {
    inputPath,
    outputPath: options.outfile ?? inferOutputPath(inputPath, outputFormat),
    inputFormat,
    outputFormat,
    record,
  };
}

/** Run the conversion described by `plan` on in-memory file contents. */
export function convertBytes(input: Uint8Array, plan: ConversionPlan): Uint8Array {
  if (plan.inputFormat === 'text') {
    return serializePyVar(createRecord({ ...plan.record, source: input }));
  }
  return parsePyVar(input).source;
}
