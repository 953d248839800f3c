/**
 * pyvar — format and path inference
 *
 * Explicit names, extensions and magic sniffing in inferFormat(), derived
 * output paths, and conversion plans run through convertBytes().
 */

import { describe, it, expect } from 'vitest';
import {
  parseFormatName,
  inferFormat,
  targetFor,
  inferOutputPath,
  planConversion,
  convertBytes,
  parsePyVar,
  serializePyVar,
  createRecord,
  fieldText,
  recordText,
  PYVAR_MAGIC,
  UnknownFormatError,
  UnsupportedConversionError,
} from '../src/index';

const text = new TextEncoder();

describe('parseFormatName', () => {
  it('maps container and text aliases, ignoring case', () => {
    expect(parseFormatName('8XV')).toBe('pyvar');
    expect(parseFormatName('pyvar')).toBe('pyvar');
    expect(parseFormatName('py')).toBe('text');
    expect(parseFormatName(' txt ')).toBe('text');
  });

  it('rejects anything else', () => {
    expect(() => parseFormatName('zip')).toThrow(UnknownFormatError);
  });
});

describe('inferFormat', () => {
  it('reads the extension', () => {
    expect(inferFormat('games/SNAKE.8xv')).toBe('pyvar');
    expect(inferFormat('snake.PY')).toBe('text');
    expect(inferFormat('notes.txt')).toBe('text');
  });

  it('prefers an explicit format over the extension', () => {
    expect(inferFormat('snake.py', '8xv')).toBe('pyvar');
  });

  it('falls back to the magic bytes for unknown extensions', () => {
    const contents = new Uint8Array(20);
    contents.set(PYVAR_MAGIC);
    expect(inferFormat('download.bin', undefined, contents)).toBe('pyvar');
  });

  it('gives up on an unknown extension without a signature', () => {
    expect(() => inferFormat('download.bin', undefined, text.encode('print(1)')))
      .toThrow(UnknownFormatError);
    expect(() => inferFormat('README')).toThrow(/pass --format/);
  });
});

describe('targetFor / inferOutputPath', () => {
  it('converts to the other format', () => {
    expect(targetFor('pyvar')).toBe('text');
    expect(targetFor('text')).toBe('pyvar');
  });

  it('swaps the extension', () => {
    expect(inferOutputPath('dir/prog.py', 'pyvar')).toBe('dir/prog.8xv');
    expect(inferOutputPath('dir/PROG.8xv', 'text')).toBe('dir/PROG.py');
  });

  it('appends an extension when there is none', () => {
    expect(inferOutputPath('PROG', 'text')).toBe('PROG.py');
    expect(inferOutputPath('a.b/c', 'pyvar')).toBe('a.b/c.8xv');
  });
});

describe('planConversion', () => {
  it('infers direction and output path', () => {
    const plan = planConversion('snake.py', {});
    expect(plan).toEqual({
      inputPath:    'snake.py',
      outputPath:   'snake.8xv',
      inputFormat:  'text',
      outputFormat: 'pyvar',
      record:       {},
    });
  });

  it('honours outfile and record metadata', () => {
    const plan = planConversion('snake.py', {
      outfile:  'out/SNAKE.8xv',
      varname:  'SNAKE',
      filename: 'snake.py',
      info:     'built by hand',
    });
    expect(plan.outputPath).toBe('out/SNAKE.8xv');
    expect(plan.record).toEqual({
      variableName: 'SNAKE',
      longFilename: 'snake.py',
      info:         'built by hand',
    });
  });

  it('refuses a same-format conversion', () => {
    expect(() => planConversion('snake.py', { targetFormat: 'txt' }))
      .toThrow(UnsupportedConversionError);
  });
});

describe('convertBytes', () => {
  it('packs source text into a container', () => {
    const plan = planConversion('snake.py', { varname: 'SNAKE', filename: 'snake.py' });
    const out  = convertBytes(text.encode('while True: pass\n'), plan);
    const rec  = parsePyVar(out);
    expect(recordText(rec)).toBe('while True: pass\n');
    expect(fieldText(rec.variableName)).toBe('SNAKE');
    expect(fieldText(rec.longFilename ?? new Uint8Array(0))).toBe('snake.py');
  });

  it('unpacks a container to its source bytes', () => {
    const container = serializePyVar(createRecord({ source: 'print(2)' }));
    const out = convertBytes(container, planConversion('P.8xv', {}));
    expect(new TextDecoder().decode(out)).toBe('print(2)');
  });
});
