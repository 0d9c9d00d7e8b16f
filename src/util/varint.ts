/**
 * LEB128 varint encoding and decoding for the protobuf wire format.
 */

/** Write a varint for a non-negative JS number (no BigInt overhead). */
export function writeIntVarint(buf: Uint8Array, offset: number, value: number): number {
  let i = offset;
  while (value > 0x7f) {
    buf[i++] = (value & 0x7f) | 0x80;
    value >>>= 7;
  }
  buf[i++] = value;
  return i - offset;
}

/** Byte length of a non-negative JS number varint. */
export function intVarintSize(n: number): number {
  if (n < 0x80) return 1;
  if (n < 0x4000) return 2;
  if (n < 0x200000) return 3;
  if (n < 0x10000000) return 4;
  return 5; // up to ~4 GB, sufficient for proto field sizes
}

/**
 * Write a varint into a pre-allocated buffer at the given offset.
 * Negative values are written as 64-bit two's complement (10 bytes).
 * Returns the number of bytes written.
 */
export function writeVarint(buf: Uint8Array, offset: number, value: bigint): number {
  if (value < 0n) {
    value = BigInt.asUintN(64, value);
  }
  let i = offset;
  do {
    let byte = Number(value & 0x7fn);
    value >>= 7n;
    if (value !== 0n) {
      byte |= 0x80;
    }
    buf[i++] = byte;
  } while (value !== 0n);
  return i - offset;
}

/**
 * Calculate the byte length of a varint encoding without allocating.
 */
export function varintSize(value: bigint): number {
  if (value < 0n) value = BigInt.asUintN(64, value);
  if (value === 0n) return 1;
  let size = 0;
  while (value > 0n) {
    size++;
    value >>= 7n;
  }
  return size;
}

// ─── Decoding ───────────────────────────────────────────────────────────────

/** Result of a varint read: decoded value and the offset just past it. */
export interface VarintRead<T> {
  value: T;
  next: number;
}

/** Thrown when a varint runs past the buffer or exceeds 10 bytes. */
export class VarintError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'VarintError';
  }
}

const MAX_VARINT_BYTES = 10;

/**
 * Read an unsigned varint as a JS number. Only for tags and lengths:
 * values above 2^53 lose precision, so callers bound them against the buffer.
 */
export function readIntVarint(buf: Uint8Array, offset: number): VarintRead<number> {
  let value = 0;
  let scale = 1;
  for (let i = 0; i < MAX_VARINT_BYTES; i++) {
    const pos = offset + i;
    if (pos >= buf.length) throw new VarintError(`truncated varint at offset ${offset}`);
    const byte = buf[pos] ?? 0;
    value += (byte & 0x7f) * scale;
    if ((byte & 0x80) === 0) return { value, next: pos + 1 };
    scale *= 128;
  }
  throw new VarintError(`varint longer than ${MAX_VARINT_BYTES} bytes at offset ${offset}`);
}

/** Read a varint as a signed 64-bit integer (protobuf int64). */
export function readVarint64(buf: Uint8Array, offset: number): VarintRead<bigint> {
  let value = 0n;
  let shift = 0n;
  for (let i = 0; i < MAX_VARINT_BYTES; i++) {
    const pos = offset + i;
    if (pos >= buf.length) throw new VarintError(`truncated varint at offset ${offset}`);
    const byte = buf[pos] ?? 0;
    value |= BigInt(byte & 0x7f) << shift;
    if ((byte & 0x80) === 0) return { value: BigInt.asIntN(64, value), next: pos + 1 };
    shift += 7n;
  }
  throw new VarintError(`varint longer than ${MAX_VARINT_BYTES} bytes at offset ${offset}`);
}
