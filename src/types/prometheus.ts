/**
 * Prometheus remote-write data structures.
 * These map directly to the protobuf WriteRequest schema.
 */

export interface Label {
  name: string;
  value: string;
}

export interface Sample {
  value: number;
  timestamp: bigint; // milliseconds since epoch
}

export interface TimeSeries {
  labels: Label[]; // order as received; names are not guaranteed unique
  samples: Sample[];
}

export interface WriteRequest {
  timeseries: TimeSeries[];
}

/** Reserved label carrying the metric name. */
export const METRIC_NAME_LABEL = '__name__';
