/**
 * Metric kind inference from Prometheus naming conventions.
 * https://prometheus.io/docs/practices/naming/
 *
 * Rules are evaluated in order, first match wins. `_sum` is deliberately
 * absent: a histogram/summary sum may go down with negative observations, so
 * it falls through to gauge.
 */

import type { ClassifiedKind } from '../types/datapoint.ts';

export type SuffixRule = readonly [suffix: string, kind: ClassifiedKind];

export const METRIC_KIND_RULES: readonly SuffixRule[] = [
  ['_total', 'counter'],
  ['_bucket', 'counter'],
  ['_count', 'counter'],
];

export const DEFAULT_METRIC_KIND: ClassifiedKind = 'gauge';

export function classifyMetric(
  name: string,
  rules: readonly SuffixRule[] = METRIC_KIND_RULES
): ClassifiedKind {
  for (const [suffix, kind] of rules) {
    if (name.endsWith(suffix)) return kind;
  }
  return DEFAULT_METRIC_KIND;
}
