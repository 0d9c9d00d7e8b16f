/**
 * Label list → metric name + dimensions.
 *
 * Remote-write does not forbid repeated label names within a series. They are
 * resolved here with an explicit policy: the last occurrence in wire order wins.
 */

import type { Label } from '../types/prometheus.ts';
import { METRIC_NAME_LABEL } from '../types/prometheus.ts';
import type { Dimensions } from '../types/datapoint.ts';

export interface MappedLabels {
  /** undefined when the series carries no `__name__` label at all. */
  name: string | undefined;
  /** Every other label; frozen, safe to share between datapoints. */
  dimensions: Dimensions;
}

export function labelsToMap(labels: readonly Label[]): Map<string, string> {
  const map = new Map<string, string>();
  for (const l of labels) map.set(l.name, l.value);
  return map;
}

export function mapLabels(labels: readonly Label[]): MappedLabels {
  const map = labelsToMap(labels);
  const name = map.get(METRIC_NAME_LABEL);
  map.delete(METRIC_NAME_LABEL);
  return { name, dimensions: Object.freeze(Object.fromEntries(map)) };
}
