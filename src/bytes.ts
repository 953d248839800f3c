/**
 * pyvar — byte-level helpers
 *
 * Little-endian u16 packing, the additive 16-bit checksum, fixed-width field
 * packing and a small growable byte sink used by the serializer.
 */

import { MAX_U16 } from './constants';

// ─── u16 little-endian ────────────────────────────────────────────────────────

/** Write `value` (masked to 16 bits) at `offset`, low byte first. */
export function writeU16LE(target: Uint8Array, offset: number, value: number): void {
  const v = value & MAX_U16;
  target[offset]     = v & 0xff;
  target[offset + 1] = v >>> 8;
}

/**
 * Read a little-endian u16. Throws RangeError when the two bytes are not
 * both inside `source`.
 */
export function readU16LE(source: Uint8Array, offset: number): number {
  const view = new DataView(source.buffer, source.byteOffset, source.byteLength);
  return view.getUint16(offset, /* littleEndian */ true);
}

// ─── Checksum ─────────────────────────────────────────────────────────────────

/** Sum of `bytes[start..end)` modulo 2^16. */
export function checksum16(bytes: Uint8Array, start = 0, end = bytes.length): number {
  let sum = 0;
  for (let i = start; i < end; i++) {
    sum = (sum + (bytes[i] ?? 0)) & MAX_U16;
  }
  return sum;
}

// ─── Fixed-width fields ───────────────────────────────────────────────────────

/**
 * Copy `value` into a fresh `width`-byte array: truncated when longer,
 * zero-padded when shorter. An absent value yields all zeros.
 */
export function packFixed(value: Uint8Array | undefined, width: number): Uint8Array {
  const out = new Uint8Array(width);
  if (value !== undefined) {
    out.set(value.length > width ? value.subarray(0, width) : value);
  }
  return out;
}

/** Length of `bytes` up to (not including) the first NUL. */
export function nulTerminatedLength(bytes: Uint8Array): number {
  const nul = bytes.indexOf(0);
  return nul === -1 ? bytes.length : nul;
}

/** True when every byte is zero, including for an empty buffer. */
export function isAllZero(bytes: Uint8Array): boolean {
  return bytes.every(b => b === 0);
}

// ─── ByteSink ─────────────────────────────────────────────────────────────────

/**
 * Append-only byte buffer that doubles its backing store on demand.
 * finish() returns an exact-length copy; the sink can keep growing after.
 */
export class ByteSink {
  private buf: Uint8Array;
  private len = 0;

  constructor(initialCapacity = 64) {
    this.buf = new Uint8Array(Math.max(1, initialCapacity));
  }

  get length(): number {
    return this.len;
  }

  /** Live view of the bytes written so far. Invalidated by the next write. */
  view(): Uint8Array {
    return this.buf.subarray(0, this.len);
  }

  writeByte(value: number): this {
    this.reserve(1);
    this.buf[this.len++] = value & 0xff;
    return this;
  }

  writeBytes(bytes: Uint8Array): this {
    this.reserve(bytes.length);
    this.buf.set(bytes, this.len);
    this.len += bytes.length;
    return this;
  }

  writeU16(value: number): this {
    this.reserve(2);
    writeU16LE(this.buf, this.len, value);
    this.len += 2;
    return this;
  }

  finish(): Uint8Array {
    return this.buf.slice(0, this.len);
  }

  private reserve(extra: number): void {
    const needed = this.len + extra;
    if (needed <= this.buf.length) return;

    let capacity = this.buf.length;
    while (capacity < needed) capacity *= 2;

    const next = new Uint8Array(capacity);
    next.set(this.buf.subarray(0, this.len));
    this.buf = next;
  }
}
