/**
 * Downstream sinks. The pipeline only ever calls addDatapoints once per
 * request with the whole batch; delivery and retry belong to the sink.
 */

import type { Datapoint } from '../types/datapoint.ts';
import { abortable, linkSignal } from '../util/abort.ts';

export interface DatapointSink {
  addDatapoints(batch: readonly Datapoint[], signal: AbortSignal): Promise<void>;
}

/** Hands every batch to a function. */
export class CallbackSink implements DatapointSink {
  constructor(
    private readonly fn: (batch: readonly Datapoint[], signal: AbortSignal) => void | Promise<void>
  ) {}

  async addDatapoints(batch: readonly Datapoint[], signal: AbortSignal): Promise<void> {
    await this.fn(batch, signal);
  }
}

export interface FetchSinkConfig {
  url: string;
  timeout: number; // milliseconds
  headers?: Record<string, string>;
}

export interface JsonDatapoint {
  metric: string;
  dimensions: Record<string, string>;
  kind: Datapoint['kind'];
  type: Datapoint['value']['type'];
  /** int64 values and non-finite floats travel as strings. */
  value: number | string;
  /** Nanoseconds since epoch, as a decimal string. */
  timestamp: string;
}

export function datapointToJson(dp: Datapoint): JsonDatapoint {
  const v = dp.value;
  const value = v.type === 'int' ? v.value.toString() : Number.isFinite(v.value) ? v.value : String(v.value);
  return {
    metric: dp.metric,
    dimensions: { ...dp.dimensions },
    kind: dp.kind,
    type: v.type,
    value,
    timestamp: dp.timestampNs.toString(),
  };
}

/** POSTs each batch as a JSON array. Non-2xx answers reject. */
export class FetchSink implements DatapointSink {
  constructor(private readonly config: FetchSinkConfig) {}

  async addDatapoints(batch: readonly Datapoint[], signal: AbortSignal): Promise<void> {
    const linked = linkSignal(signal, this.config.timeout);
    try {
      const response = await abortable(
        fetch(this.config.url, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            ...this.config.headers,
          },
          body: JSON.stringify(batch.map(datapointToJson)),
          signal: linked.signal,
        }),
        linked.signal
      );
      if (!response.ok) {
        const body = await response.text().catch(() => '');
        throw new Error(`sink answered HTTP ${response.status} ${body}`.trim().slice(0, 500));
      }
    } finally {
      linked.dispose();
    }
  }
}
