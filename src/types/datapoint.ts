/**
 * Generic datapoint model handed to the downstream sink.
 */

/** Kinds the metric-name classifier can infer. */
export type ClassifiedKind = 'counter' | 'gauge';

/** `cumulative_counter` is only used for the gate's own self-observability counters. */
export type MetricKind = ClassifiedKind | 'cumulative_counter';

export type DatapointValue =
  | { readonly type: 'int'; readonly value: bigint }
  | { readonly type: 'float'; readonly value: number };

export type Dimensions = Readonly<Record<string, string>>;

export interface Datapoint {
  readonly metric: string;
  readonly dimensions: Dimensions;
  readonly value: DatapointValue;
  readonly kind: MetricKind;
  /** Nanoseconds since epoch. */
  readonly timestampNs: bigint;
}

export function intValue(value: bigint): DatapointValue {
  return { type: 'int', value };
}

export function floatValue(value: number): DatapointValue {
  return { type: 'float', value };
}

export function newDatapoint(
  metric: string,
  dimensions: Dimensions,
  value: DatapointValue,
  kind: MetricKind,
  timestampNs: bigint
): Datapoint {
  return Object.freeze({ metric, dimensions, value: Object.freeze(value), kind, timestampNs });
}

const INT64_LIMIT = 2 ** 63;

/**
 * Integer-valued numbers inside the int64 range become int values, everything
 * else (fractions, out-of-range magnitudes, ±Infinity) stays float.
 */
export function numericValue(v: number): DatapointValue {
  if (Number.isInteger(v) && v >= -INT64_LIMIT && v < INT64_LIMIT) {
    return intValue(BigInt(v));
  }
  return floatValue(v);
}

export function msToNs(ms: bigint): bigint {
  return ms * 1_000_000n;
}
