/**
 * Protobuf codec for the Prometheus remote-write WriteRequest.
 *
 * Decoding walks the buffer once with (offset, end) windows into the original
 * Uint8Array; no sub-buffers are copied, only label strings are materialized.
 * Fields this codec does not model (WriteRequest.metadata, TimeSeries.exemplars,
 * TimeSeries.histograms, ...) are skipped by wire type.
 *
 * Encoding is two-pass: sizes first with integer math and Buffer.byteLength,
 * then one allocation written in place.
 *
 * Proto schema:
 *   message Label       { string name = 1; string value = 2; }
 *   message Sample      { double value = 1; int64 timestamp = 2; }
 *   message TimeSeries  { repeated Label labels = 1; repeated Sample samples = 2; }
 *   message WriteRequest { repeated TimeSeries timeseries = 1; }
 */

import type { WriteRequest, TimeSeries, Label, Sample } from '../types/prometheus.ts';
import {
  writeIntVarint,
  intVarintSize,
  writeVarint,
  varintSize,
  readIntVarint,
  readVarint64,
} from '../util/varint.ts';
import { DeserializationError, errorMessage } from '../core/errors.ts';

const ENC = new TextEncoder();
const DEC = new TextDecoder();

const UINT32_MAX = 0xffff_ffffn;

const WIRE_VARINT = 0;
const WIRE_I64 = 1;
const WIRE_LEN = 2;
const WIRE_I32 = 5;

// ─── Decoding ───────────────────────────────────────────────────────────────

class WireError extends Error {}

interface Tag {
  field: number;
  wireType: number;
  next: number;
}

interface Span {
  start: number;
  stop: number;
}

function readTag(buf: Uint8Array, off: number, end: number): Tag {
  const { value, next } = readIntVarint(buf, off);
  if (next > end) throw new WireError(`truncated tag at offset ${off}`);
  const field = Math.floor(value / 8);
  if (field === 0) throw new WireError(`invalid field number 0 at offset ${off}`);
  return { field, wireType: value % 8, next };
}

function readSpan(buf: Uint8Array, off: number, end: number): Span {
  const { value, next } = readIntVarint(buf, off);
  if (next > end || value > end - next) {
    throw new WireError(`length-delimited field at offset ${off} runs past its message`);
  }
  return { start: next, stop: next + value };
}

function skipField(buf: Uint8Array, wireType: number, off: number, end: number): number {
  switch (wireType) {
    case WIRE_VARINT: {
      const { next } = readIntVarint(buf, off);
      if (next > end) throw new WireError(`truncated varint at offset ${off}`);
      return next;
    }
    case WIRE_I64:
      if (off + 8 > end) throw new WireError(`truncated fixed64 at offset ${off}`);
      return off + 8;
    case WIRE_LEN:
      return readSpan(buf, off, end).stop;
    case WIRE_I32:
      if (off + 4 > end) throw new WireError(`truncated fixed32 at offset ${off}`);
      return off + 4;
    default:
      throw new WireError(`unsupported wire type ${wireType} at offset ${off}`);
  }
}

function expectWireType(tag: Tag, wireType: number, message: string): void {
  if (tag.wireType !== wireType) {
    throw new WireError(
      `${message} field ${tag.field}: expected wire type ${wireType}, got ${tag.wireType}`
    );
  }
}

function decodeLabel(buf: Uint8Array, start: number, end: number): Label {
  const label: Label = { name: '', value: '' };
  let off = start;
  while (off < end) {
    const tag = readTag(buf, off, end);
    off = tag.next;
    if (tag.field === 1 || tag.field === 2) {
      expectWireType(tag, WIRE_LEN, 'Label');
      const span = readSpan(buf, off, end);
      const text = DEC.decode(buf.subarray(span.start, span.stop));
      if (tag.field === 1) label.name = text;
      else label.value = text;
      off = span.stop;
    } else {
      off = skipField(buf, tag.wireType, off, end);
    }
  }
  return label;
}

function decodeSample(buf: Uint8Array, view: DataView, start: number, end: number): Sample {
  const sample: Sample = { value: 0, timestamp: 0n };
  let off = start;
  while (off < end) {
    const tag = readTag(buf, off, end);
    off = tag.next;
    if (tag.field === 1) {
      expectWireType(tag, WIRE_I64, 'Sample');
      if (off + 8 > end) throw new WireError(`truncated double at offset ${off}`);
      sample.value = view.getFloat64(off, true /* LE */);
      off += 8;
    } else if (tag.field === 2) {
      expectWireType(tag, WIRE_VARINT, 'Sample');
      const ts = readVarint64(buf, off);
      if (ts.next > end) throw new WireError(`truncated timestamp at offset ${off}`);
      sample.timestamp = ts.value;
      off = ts.next;
    } else {
      off = skipField(buf, tag.wireType, off, end);
    }
  }
  return sample;
}

function decodeTimeSeries(buf: Uint8Array, view: DataView, start: number, end: number): TimeSeries {
  const ts: TimeSeries = { labels: [], samples: [] };
  let off = start;
  while (off < end) {
    const tag = readTag(buf, off, end);
    off = tag.next;
    if (tag.field === 1) {
      expectWireType(tag, WIRE_LEN, 'TimeSeries');
      const span = readSpan(buf, off, end);
      ts.labels.push(decodeLabel(buf, span.start, span.stop));
      off = span.stop;
    } else if (tag.field === 2) {
      expectWireType(tag, WIRE_LEN, 'TimeSeries');
      const span = readSpan(buf, off, end);
      ts.samples.push(decodeSample(buf, view, span.start, span.stop));
      off = span.stop;
    } else {
      off = skipField(buf, tag.wireType, off, end);
    }
  }
  return ts;
}

/**
 * Decode protobuf bytes into a WriteRequest.
 * Throws DeserializationError on malformed input; values are not validated.
 */
export function decodeWriteRequest(buf: Uint8Array): WriteRequest {
  const view = new DataView(buf.buffer, buf.byteOffset, buf.byteLength);
  const req: WriteRequest = { timeseries: [] };
  try {
    let off = 0;
    const end = buf.length;
    while (off < end) {
      const tag = readTag(buf, off, end);
      off = tag.next;
      if (tag.field === 1) {
        expectWireType(tag, WIRE_LEN, 'WriteRequest');
        const span = readSpan(buf, off, end);
        req.timeseries.push(decodeTimeSeries(buf, view, span.start, span.stop));
        off = span.stop;
      } else {
        off = skipField(buf, tag.wireType, off, end);
      }
    }
  } catch (err) {
    throw new DeserializationError(`invalid WriteRequest: ${errorMessage(err)}`, { cause: err });
  }
  return req;
}

// ─── Size calculation (encode pass 1) ───────────────────────────────────────

function tsSize(ts: bigint): number {
  // Number fast path only while `>>>` in writeIntVarint stays exact (uint32)
  return ts >= 0n && ts <= UINT32_MAX ? intVarintSize(Number(ts)) : varintSize(ts);
}

function labelMsgSize(l: Label): number {
  const nl = Buffer.byteLength(l.name);
  const vl = Buffer.byteLength(l.value);
  // tag(1) + varint(nl) + nl  +  tag(1) + varint(vl) + vl
  return 1 + intVarintSize(nl) + nl + 1 + intVarintSize(vl) + vl;
}

function sampleMsgSize(s: Sample): number {
  // field1 double: tag(1) + 8 bytes
  // field2 timestamp: tag(1) + varint(ts)
  return 9 + 1 + tsSize(s.timestamp);
}

function timeSeriesMsgSize(ts: TimeSeries): number {
  let size = 0;
  for (const l of ts.labels) {
    const lms = labelMsgSize(l);
    size += 1 + intVarintSize(lms) + lms;
  }
  for (const s of ts.samples) {
    const sms = sampleMsgSize(s);
    size += 1 + intVarintSize(sms) + sms;
  }
  return size;
}

function computeTotalSize(req: WriteRequest): number {
  let size = 0;
  for (const ts of req.timeseries) {
    const tsms = timeSeriesMsgSize(ts);
    size += 1 + intVarintSize(tsms) + tsms;
  }
  return size;
}

// ─── Write pass (encode pass 2) ─────────────────────────────────────────────

function writeLabel(buf: Uint8Array, off: number, l: Label): number {
  buf[off++] = 0x0a; // field 1 (name), LEN
  const nl = Buffer.byteLength(l.name);
  off += writeIntVarint(buf, off, nl);
  ENC.encodeInto(l.name, buf.subarray(off));
  off += nl;

  buf[off++] = 0x12; // field 2 (value), LEN
  const vl = Buffer.byteLength(l.value);
  off += writeIntVarint(buf, off, vl);
  ENC.encodeInto(l.value, buf.subarray(off));
  off += vl;

  return off;
}

function writeSample(buf: Uint8Array, view: DataView, off: number, s: Sample): number {
  buf[off++] = 0x09; // field 1 (value), 64-bit fixed
  view.setFloat64(off, s.value, true /* LE */);
  off += 8;

  buf[off++] = 0x10; // field 2 (timestamp), varint
  const ts = s.timestamp;
  if (ts >= 0n && ts <= UINT32_MAX) {
    off += writeIntVarint(buf, off, Number(ts));
  } else {
    off += writeVarint(buf, off, ts);
  }
  return off;
}

function writeTimeSeries(buf: Uint8Array, view: DataView, off: number, ts: TimeSeries): number {
  for (const l of ts.labels) {
    buf[off++] = 0x0a; // field 1 (labels), LEN
    const lms = labelMsgSize(l);
    off += writeIntVarint(buf, off, lms);
    off = writeLabel(buf, off, l);
  }
  for (const s of ts.samples) {
    buf[off++] = 0x12; // field 2 (samples), LEN
    const sms = sampleMsgSize(s);
    off += writeIntVarint(buf, off, sms);
    off = writeSample(buf, view, off, s);
  }
  return off;
}

export function encodeWriteRequest(req: WriteRequest): Uint8Array {
  if (req.timeseries.length === 0) return new Uint8Array(0);

  const totalSize = computeTotalSize(req);
  const buf = new Uint8Array(totalSize);
  const view = new DataView(buf.buffer); // one DataView for the entire buffer

  let off = 0;
  for (const ts of req.timeseries) {
    buf[off++] = 0x0a; // field 1 (timeseries), LEN
    const tsms = timeSeriesMsgSize(ts);
    off += writeIntVarint(buf, off, tsms);
    off = writeTimeSeries(buf, view, off, ts);
  }

  return buf;
}
