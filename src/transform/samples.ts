/**
 * Sample → Datapoint conversion.
 *
 * NaN samples are dropped and counted. The numeric type follows the value
 * alone (42 → int, 42.5 → float), never the metric kind. Timestamps are
 * scaled ms → ns exactly, with no clock substitution for odd values.
 */

import type { Sample, TimeSeries } from '../types/prometheus.ts';
import type { ClassifiedKind, Datapoint, Dimensions } from '../types/datapoint.ts';
import { newDatapoint, numericValue, msToNs } from '../types/datapoint.ts';
import { mapLabels } from './labels.ts';
import { classifyMetric } from './metricKind.ts';

/**
 * What to do with ±Infinity samples.
 * - 'forward' (default): emit them as float datapoints
 * - 'drop': discard them and count them with the NaN samples
 */
export type NonFinitePolicy = 'forward' | 'drop';

export interface ConvertOptions {
  nonFinite?: NonFinitePolicy;
}

/** The counters conversion reports to. */
export interface ConversionCounters {
  recordNaN(): void;
  recordBadDatapoints(n: number): void;
}

export interface SeriesContext {
  metric: string;
  dimensions: Dimensions;
  kind: ClassifiedKind;
}

export function convertSample(
  sample: Sample,
  series: SeriesContext,
  counters: ConversionCounters,
  options: ConvertOptions = {}
): Datapoint | undefined {
  const v = sample.value;
  if (Number.isNaN(v) || (options.nonFinite === 'drop' && !Number.isFinite(v))) {
    counters.recordNaN();
    return undefined;
  }
  return newDatapoint(
    series.metric,
    series.dimensions,
    numericValue(v),
    series.kind,
    msToNs(sample.timestamp)
  );
}

/**
 * Convert every sample of a series. A series without a usable `__name__`
 * (absent or empty) is dropped whole and counts once per sample.
 */
export function seriesToDatapoints(
  ts: TimeSeries,
  counters: ConversionCounters,
  options: ConvertOptions = {}
): Datapoint[] {
  const { name, dimensions } = mapLabels(ts.labels);
  if (name === undefined || name === '') {
    counters.recordBadDatapoints(ts.samples.length);
    return [];
  }

  const series: SeriesContext = { metric: name, dimensions, kind: classifyMetric(name) };
  const out: Datapoint[] = [];
  for (const sample of ts.samples) {
    const dp = convertSample(sample, series, counters, options);
    if (dp !== undefined) out.push(dp);
  }
  return out;
}
