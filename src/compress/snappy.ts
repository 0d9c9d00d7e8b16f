import { compressSync, uncompressSync } from 'snappy';
import { DecompressionError, errorMessage } from '../core/errors.ts';

/** Snappy block format (varint length prefix, no framing), as remote-write uses. */
export function snappyCompress(data: Uint8Array): Uint8Array {
  return compressSync(Buffer.from(data.buffer, data.byteOffset, data.byteLength));
}

export function snappyUncompress(data: Uint8Array): Uint8Array {
  let out: string | Buffer;
  try {
    out = uncompressSync(Buffer.from(data.buffer, data.byteOffset, data.byteLength), {
      asBuffer: true,
    });
  } catch (err) {
    throw new DecompressionError(`invalid snappy payload: ${errorMessage(err)}`, { cause: err });
  }
  if (typeof out === 'string') {
    throw new DecompressionError('invalid snappy payload: decoder returned text');
  }
  return out;
}
