/**
 * Self-observability counters for one gate instance.
 *
 * Every mutation is synchronous, so increments from concurrently handled
 * requests never interleave on the event loop.
 */

import type { Datapoint } from '../types/datapoint.ts';
import { newDatapoint, numericValue, intValue, msToNs } from '../types/datapoint.ts';

export interface DistributionSnapshot {
  /** Observations since creation. */
  count: number;
  /** Sum of all observations since creation. */
  sum: number;
  /** Window statistics; 0 when the window is empty. */
  min: number;
  max: number;
  p50: number;
  p90: number;
  p99: number;
}

export interface RollingDistributionOptions {
  /** Observations older than this are evicted from the window. */
  windowMs?: number;
  /** Hard cap on window size; oldest observations go first. */
  maxSamples?: number;
  now?: () => number;
}

const DEFAULT_WINDOW_MS = 10_000;
const DEFAULT_MAX_SAMPLES = 1000;

function percentile(sorted: number[], p: number): number {
  if (sorted.length === 0) return 0;
  const idx = Math.ceil((p / 100) * sorted.length) - 1;
  return sorted[Math.max(0, idx)] ?? 0;
}

export class RollingDistribution {
  private count = 0;
  private sum = 0;
  private readonly times: number[] = [];
  private readonly values: number[] = [];
  private readonly windowMs: number;
  private readonly maxSamples: number;
  private readonly now: () => number;

  constructor(
    readonly name: string,
    options: RollingDistributionOptions = {}
  ) {
    this.windowMs = options.windowMs ?? DEFAULT_WINDOW_MS;
    this.maxSamples = options.maxSamples ?? DEFAULT_MAX_SAMPLES;
    this.now = options.now ?? Date.now;
  }

  add(value: number): void {
    this.count++;
    this.sum += value;
    this.times.push(this.now());
    this.values.push(value);
    if (this.values.length > this.maxSamples) {
      this.times.shift();
      this.values.shift();
    }
  }

  snapshot(): DistributionSnapshot {
    this.evictExpired();
    const sorted = [...this.values].sort((a, b) => a - b);
    return {
      count: this.count,
      sum: this.sum,
      min: sorted[0] ?? 0,
      max: sorted[sorted.length - 1] ?? 0,
      p50: percentile(sorted, 50),
      p90: percentile(sorted, 90),
      p99: percentile(sorted, 99),
    };
  }

  datapoints(timestampNs: bigint): Datapoint[] {
    const s = this.snapshot();
    const gauge = (stat: string, v: number): Datapoint =>
      newDatapoint(`${this.name}.${stat}`, {}, numericValue(v), 'gauge', timestampNs);
    return [
      newDatapoint(`${this.name}.count`, {}, intValue(BigInt(s.count)), 'cumulative_counter', timestampNs),
      newDatapoint(`${this.name}.sum`, {}, numericValue(s.sum), 'cumulative_counter', timestampNs),
      gauge('min', s.min),
      gauge('max', s.max),
      gauge('p50', s.p50),
      gauge('p90', s.p90),
      gauge('p99', s.p99),
    ];
  }

  private evictExpired(): void {
    const cutoff = this.now() - this.windowMs;
    for (;;) {
      const t = this.times[0];
      if (t === undefined || t >= cutoff) return;
      this.times.shift();
      this.values.shift();
    }
  }
}

export const REQUEST_TIME_METRIC = 'prometheus.request_time.ns';
export const DRAIN_SIZE_METRIC = 'prometheus.drain_size';
export const INVALID_REQUESTS_METRIC = 'prometheus.invalid_requests';
export const NAN_SAMPLES_METRIC = 'prometheus.total_NAN_samples';
export const BAD_DATAPOINTS_METRIC = 'prometheus.total_bad_datapoints';

export interface CounterTotals {
  errors: number;
  nans: number;
  badDatapoints: number;
}

export class IngestCounters {
  /** Per-request processing latency, nanoseconds. */
  readonly requestTime: RollingDistribution;
  /** Datapoints produced per request. */
  readonly drainSize: RollingDistribution;

  private errors = 0;
  private nans = 0;
  private badDatapoints = 0;
  private readonly now: () => number;

  constructor(options: RollingDistributionOptions = {}) {
    this.now = options.now ?? Date.now;
    this.requestTime = new RollingDistribution(REQUEST_TIME_METRIC, options);
    this.drainSize = new RollingDistribution(DRAIN_SIZE_METRIC, options);
  }

  recordError(): void {
    this.errors++;
  }

  recordNaN(): void {
    this.nans++;
  }

  recordBadDatapoints(n: number): void {
    this.badDatapoints += n;
  }

  totals(): CounterTotals {
    return { errors: this.errors, nans: this.nans, badDatapoints: this.badDatapoints };
  }

  /** Current values as datapoints: both distributions, then the three cumulative counters. */
  datapoints(): Datapoint[] {
    const ts = msToNs(BigInt(Math.trunc(this.now())));
    const cumulative = (name: string, v: number): Datapoint =>
      newDatapoint(name, {}, intValue(BigInt(v)), 'cumulative_counter', ts);
    return [
      ...this.requestTime.datapoints(ts),
      ...this.drainSize.datapoints(ts),
      cumulative(INVALID_REQUESTS_METRIC, this.errors),
      cumulative(NAN_SAMPLES_METRIC, this.nans),
      cumulative(BAD_DATAPOINTS_METRIC, this.badDatapoints),
    ];
  }
}
