/**
 * pyvar — record construction
 */

import { describe, it, expect } from 'vitest';
import {
  createRecord,
  checkFramingBudget,
  framingOverhead,
  maxSourceLength,
  computeDataSize,
  computePayloadSize,
  fieldText,
  recordText,
  serializePyVar,
  parsePyVar,
  DEFAULT_VARIABLE_NAME,
  SourceTooLargeError,
  FilenameTooLongError,
} from '../src/index';

const text = new TextEncoder();

describe('createRecord', () => {
  it('pads the variable name to 8 bytes and info to 42', () => {
    const record = createRecord({ source: 'x', variableName: 'AB', info: 'hi' });
    expect(Array.from(record.variableName)).toEqual([0x41, 0x42, 0, 0, 0, 0, 0, 0]);
    expect(record.info.length).toBe(42);
    expect(fieldText(record.info)).toBe('hi');
  });

  it('uses the default variable name when none is given', () => {
    expect(fieldText(createRecord({ source: '' }).variableName)).toBe(DEFAULT_VARIABLE_NAME);
  });

  it('uses the default variable name for an empty one', () => {
    expect(fieldText(createRecord({ source: '', variableName: '' }).variableName)).toBe('TIPYFILE');
  });

  it('keeps a byte variable name with a leading NUL', () => {
    const record = createRecord({ source: '', variableName: Uint8Array.of(0x00, 0x42) });
    expect(Array.from(record.variableName)).toEqual([0x00, 0x42, 0, 0, 0, 0, 0, 0]);
  });

  it('truncates by bytes, not characters', () => {
    // 'é' is two UTF-8 bytes; five of them are ten bytes.
    const record = createRecord({ source: '', variableName: 'ééééé' });
    expect(Array.from(record.variableName)).toEqual(
      Array.from(text.encode('éééé')),
    );
  });

  it('drops an empty long filename', () => {
    expect(createRecord({ source: 'x', longFilename: '' }).longFilename).toBeUndefined();
  });

  it('copies byte inputs', () => {
    const source = text.encode('abc');
    const record = createRecord({ source });
    source[0] = 0x7a;
    expect(recordText(record)).toBe('abc');
  });

  it('rejects a long filename over 255 bytes', () => {
    expect(() => createRecord({ source: '', longFilename: 'f'.repeat(256) }))
      .toThrow(FilenameTooLongError);
  });

  it('accepts the largest source that fits', () => {
    const record = createRecord({ source: new Uint8Array(65511) });
    expect(serializePyVar(record).length).toBe(81 + 65511);
  });

  it('rejects a source one byte over the budget', () => {
    expect(() => createRecord({ source: new Uint8Array(65512) })).toThrow(SourceTooLargeError);
  });

  it('round-trips UTF-8 text through the container', () => {
    const record = createRecord({ source: 'print("π ≈ 3.14")', longFilename: 'maths.py' });
    const parsed = parsePyVar(serializePyVar(record));
    expect(recordText(parsed)).toBe('print("π ≈ 3.14")');
    expect(fieldText(parsed.longFilename ?? new Uint8Array(0))).toBe('maths.py');
  });
});

describe('framing budget', () => {
  it('derives the size fields from source and filename lengths', () => {
    expect(computeDataSize(8, 0)).toBe(32);
    expect(computePayloadSize(8, 0)).toBe(15);
    expect(computeDataSize(8, 8)).toBe(42);
    expect(computePayloadSize(8, 8)).toBe(25);
  });

  it('is 5 bytes without a long filename', () => {
    expect(framingOverhead()).toBe(5);
  });

  it('adds SOH, NUL and the name for a long filename', () => {
    expect(framingOverhead(new Uint8Array(10))).toBe(17);
  });

  it('leaves 65511 source bytes without a long filename', () => {
    expect(maxSourceLength()).toBe(65511);
  });

  it('shrinks by the filename block', () => {
    // 65535 − (24 + 2 + 10)
    expect(maxSourceLength(new Uint8Array(10))).toBe(65499);
  });

  it('checkFramingBudget accounts for the long filename', () => {
    const record = {
      source:       new Uint8Array(65500),
      variableName: new Uint8Array(8),
      info:         new Uint8Array(42),
      longFilename: new Uint8Array(10),
    };
    expect(() => checkFramingBudget(record)).toThrow(SourceTooLargeError);
    expect(() => checkFramingBudget({ ...record, source: new Uint8Array(65499) })).not.toThrow();
  });

  it('names the limit in its message', () => {
    expect(() => createRecord({ source: new Uint8Array(70000) })).toThrow(
      /largest source that fits is 65511 bytes/,
    );
  });
});
