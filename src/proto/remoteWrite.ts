/**
 * Remote-write body codec: snappy block compression around a protobuf WriteRequest.
 */

import type { WriteRequest } from '../types/prometheus.ts';
import { snappyCompress, snappyUncompress } from '../compress/snappy.ts';
import { decodeWriteRequest, encodeWriteRequest } from './writeRequest.ts';

/**
 * Decompress and decode an HTTP request body.
 * Throws DecompressionError or DeserializationError; both are client errors.
 */
export function decodeRemoteWriteBody(body: Uint8Array): WriteRequest {
  return decodeWriteRequest(snappyUncompress(body));
}

export function encodeRemoteWriteBody(req: WriteRequest): Uint8Array {
  return snappyCompress(encodeWriteRequest(req));
}
