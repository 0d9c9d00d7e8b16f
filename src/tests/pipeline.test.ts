import { describe, it, expect, vi } from 'vitest';
import pino from 'pino';
import { Pipeline } from '../core/Pipeline.ts';
import type { PipelineOptions } from '../core/Pipeline.ts';
import { IngestCounters } from '../core/Counters.ts';
import type { DatapointSink } from '../core/Sink.ts';
import { encodeRemoteWriteBody } from '../proto/remoteWrite.ts';
import { snappyCompress } from '../compress/snappy.ts';
import type { Datapoint } from '../types/datapoint.ts';
import type { TimeSeries, WriteRequest } from '../types/prometheus.ts';

function bodyOf(...timeseries: TimeSeries[]): () => Promise<Uint8Array> {
  const req: WriteRequest = { timeseries };
  const bytes = encodeRemoteWriteBody(req);
  return async () => bytes;
}

function makeSink(impl?: (batch: readonly Datapoint[], signal: AbortSignal) => Promise<void>) {
  const batches: Datapoint[][] = [];
  const addDatapoints = vi.fn<(batch: readonly Datapoint[], signal: AbortSignal) => Promise<void>>(
    impl ??
      (async (batch: readonly Datapoint[]) => {
        batches.push([...batch]);
      })
  );
  const sink: DatapointSink = { addDatapoints };
  return { sink, addDatapoints, batches };
}

function makePipeline(sink: DatapointSink, options: PipelineOptions = {}) {
  const counters = new IngestCounters();
  return { pipeline: new Pipeline(sink, counters, options), counters };
}

const requestsTotal: TimeSeries = {
  labels: [
    { name: '__name__', value: 'http_requests_total' },
    { name: 'method', value: 'GET' },
  ],
  samples: [{ value: 5.0, timestamp: 1000n }],
};

describe('Pipeline', () => {
  it('converts a counter sample to an int datapoint', async () => {
    const { sink, batches } = makeSink();
    const { pipeline } = makePipeline(sink);

    const result = await pipeline.process(bodyOf(requestsTotal));

    expect(result).toEqual({ status: 200, message: 'OK', datapoints: 1 });
    expect(batches).toEqual([
      [
        {
          metric: 'http_requests_total',
          dimensions: { method: 'GET' },
          value: { type: 'int', value: 5n },
          kind: 'counter',
          timestampNs: 1_000_000_000n,
        },
      ],
    ]);
  });

  it('converts a fractional sample to a float datapoint', async () => {
    const { sink, batches } = makeSink();
    const { pipeline } = makePipeline(sink);

    await pipeline.process(bodyOf({ ...requestsTotal, samples: [{ value: 5.5, timestamp: 1000n }] }));

    expect(batches[0]?.[0]).toEqual({
      metric: 'http_requests_total',
      dimensions: { method: 'GET' },
      value: { type: 'float', value: 5.5 },
      kind: 'counter',
      timestampNs: 1_000_000_000n,
    });
  });

  it('drops a NaN sample without failing the request', async () => {
    const { sink, addDatapoints } = makeSink();
    const { pipeline, counters } = makePipeline(sink);

    const result = await pipeline.process(
      bodyOf({ ...requestsTotal, samples: [{ value: NaN, timestamp: 1000n }] })
    );

    expect(result.status).toBe(200);
    expect(result.datapoints).toBe(0);
    expect(addDatapoints).not.toHaveBeenCalled();
    expect(counters.totals()).toEqual({ errors: 0, nans: 1, badDatapoints: 0 });
  });

  it('drops a nameless series and counts all of its samples', async () => {
    const { sink, addDatapoints } = makeSink();
    const { pipeline, counters } = makePipeline(sink);

    const result = await pipeline.process(
      bodyOf({
        labels: [{ name: 'job', value: 'node' }],
        samples: [
          { value: 1, timestamp: 1n },
          { value: 2, timestamp: 2n },
          { value: 3, timestamp: 3n },
        ],
      })
    );

    expect(result.status).toBe(200);
    expect(addDatapoints).not.toHaveBeenCalled();
    expect(counters.totals()).toEqual({ errors: 0, nans: 0, badDatapoints: 3 });
  });

  it('answers 400 for a body that is not snappy data', async () => {
    const { sink, addDatapoints } = makeSink();
    const { pipeline, counters } = makePipeline(sink);

    const result = await pipeline.process(async () => new TextEncoder().encode('definitely not snappy'));

    expect(result.status).toBe(400);
    expect(result.datapoints).toBe(0);
    expect(addDatapoints).not.toHaveBeenCalled();
    expect(counters.totals().errors).toBe(1);
  });

  it('answers 500 when the sink fails and still records the batch size', async () => {
    const { sink } = makeSink(async () => {
      throw new Error('connection refused');
    });
    const { pipeline, counters } = makePipeline(sink);

    const result = await pipeline.process(
      bodyOf({
        ...requestsTotal,
        samples: [
          { value: 1, timestamp: 1n },
          { value: 2, timestamp: 2n },
        ],
      })
    );

    expect(result.status).toBe(500);
    expect(result.message).toBe('failed to forward 2 datapoints: connection refused');
    expect(counters.totals().errors).toBe(1);
    expect(counters.drainSize.snapshot()).toMatchObject({ count: 1, sum: 2 });
  });

  it('answers 500 when the body cannot be read', async () => {
    const { sink } = makeSink();
    const { pipeline, counters } = makePipeline(sink);

    const result = await pipeline.process(async () => {
      throw new Error('socket hang up');
    });

    expect(result).toEqual({
      status: 500,
      message: 'failed to read request body: socket hang up',
      datapoints: 0,
    });
    expect(counters.totals().errors).toBe(1);
  });

  it('answers 400 for snappy data that is not a WriteRequest', async () => {
    const { sink } = makeSink();
    const { pipeline } = makePipeline(sink);
    const bytes = snappyCompress(new Uint8Array([0x0a, 0x7f]));

    const result = await pipeline.process(async () => bytes);

    expect(result.status).toBe(400);
    expect(result.message).toMatch(/^invalid WriteRequest: /);
  });

  it('answers 200 without calling the sink for an empty request', async () => {
    const { sink, addDatapoints } = makeSink();
    const { pipeline, counters } = makePipeline(sink);

    const result = await pipeline.process(bodyOf());

    expect(result).toEqual({ status: 200, message: 'OK', datapoints: 0 });
    expect(addDatapoints).not.toHaveBeenCalled();
    expect(counters.drainSize.snapshot()).toMatchObject({ count: 1, sum: 0 });
  });

  it('forwards samples minus NaNs minus nameless series, in one batch', async () => {
    const { sink, addDatapoints, batches } = makeSink();
    const { pipeline, counters } = makePipeline(sink);

    const result = await pipeline.process(
      bodyOf(
        {
          labels: [{ name: '__name__', value: 'a_total' }],
          samples: [
            { value: 1, timestamp: 1n },
            { value: NaN, timestamp: 2n },
            { value: 3, timestamp: 3n },
          ],
        },
        {
          labels: [{ name: 'orphan', value: 'yes' }],
          samples: [
            { value: 1, timestamp: 1n },
            { value: 2, timestamp: 2n },
          ],
        },
        {
          labels: [{ name: '__name__', value: 'b' }],
          samples: [
            { value: 0.5, timestamp: 1n },
            { value: NaN, timestamp: 2n },
          ],
        }
      )
    );

    // 7 samples - 2 NaN - 2 from the nameless series
    expect(result.datapoints).toBe(3);
    expect(addDatapoints).toHaveBeenCalledTimes(1);
    expect(batches[0]?.map((dp) => dp.metric)).toEqual(['a_total', 'a_total', 'b']);
    expect(counters.totals()).toEqual({ errors: 0, nans: 2, badDatapoints: 2 });
  });

  it('records latency for every outcome', async () => {
    const { sink } = makeSink();
    const { pipeline, counters } = makePipeline(sink);

    await pipeline.process(bodyOf(requestsTotal));
    await pipeline.process(async () => new Uint8Array([0xff]));
    await pipeline.process(async () => {
      throw new Error('boom');
    });

    const latency = counters.requestTime.snapshot();
    expect(latency.count).toBe(3);
    expect(latency.min).toBeGreaterThanOrEqual(0);
    expect(counters.totals().errors).toBe(2);
  });

  it('keeps counters consistent across concurrent requests', async () => {
    const { sink, addDatapoints } = makeSink(async () => {
      await new Promise((resolve) => setTimeout(resolve, 1));
    });
    const { pipeline, counters } = makePipeline(sink);
    const good = bodyOf({
      ...requestsTotal,
      samples: [
        { value: NaN, timestamp: 1n },
        { value: 1, timestamp: 2n },
      ],
    });
    const bad = async () => new Uint8Array([0xff]);

    const results = await Promise.all(
      Array.from({ length: 20 }, (_, i) => pipeline.process(i % 4 === 0 ? bad : good))
    );

    expect(results.filter((r) => r.status === 200)).toHaveLength(15);
    expect(results.filter((r) => r.status === 400)).toHaveLength(5);
    expect(addDatapoints).toHaveBeenCalledTimes(15);
    expect(counters.totals()).toEqual({ errors: 5, nans: 15, badDatapoints: 0 });
    expect(counters.requestTime.snapshot().count).toBe(20);
  });

  it('discards the batch when the caller already cancelled', async () => {
    const { sink, addDatapoints } = makeSink();
    const { pipeline, counters } = makePipeline(sink);
    const controller = new AbortController();
    controller.abort(new Error('client went away'));

    const result = await pipeline.process(bodyOf(requestsTotal), { signal: controller.signal });

    expect(result.status).toBe(500);
    expect(result.message).toBe('failed to forward 1 datapoints: client went away');
    expect(addDatapoints).not.toHaveBeenCalled();
    expect(counters.totals().errors).toBe(1);
  });

  it('abandons an in-flight forward when the caller cancels', async () => {
    const controller = new AbortController();
    let seen: AbortSignal | undefined;
    const { sink } = makeSink((_batch, signal) => {
      seen = signal;
      controller.abort(new Error('client went away'));
      return new Promise<void>(() => {});
    });
    const { pipeline } = makePipeline(sink);

    const result = await pipeline.process(bodyOf(requestsTotal), { signal: controller.signal });

    expect(result.status).toBe(500);
    expect(result.message).toContain('client went away');
    expect(seen?.aborted).toBe(true);
  });

  it('gives up on a sink that outlives the timeout', async () => {
    const { sink } = makeSink(() => new Promise<void>(() => {}));
    const { pipeline, counters } = makePipeline(sink, { timeout: 20 });

    const result = await pipeline.process(bodyOf(requestsTotal));

    expect(result.status).toBe(500);
    expect(result.message).toBe('failed to forward 1 datapoints: timed out after 20ms');
    expect(counters.totals().errors).toBe(1);
  });

  it('drops infinities under the drop policy', async () => {
    const { sink, batches } = makeSink();
    const { pipeline, counters } = makePipeline(sink, { nonFinite: 'drop' });

    await pipeline.process(
      bodyOf({
        ...requestsTotal,
        samples: [
          { value: Infinity, timestamp: 1n },
          { value: 2, timestamp: 2n },
        ],
      })
    );

    expect(batches[0]?.map((dp) => dp.value)).toEqual([{ type: 'int', value: 2n }]);
    expect(counters.totals().nans).toBe(1);
  });

  it('logs each failed request once with its status', async () => {
    const lines: string[] = [];
    const logger = pino({ level: 'info' }, { write: (line: string) => lines.push(line) });
    const { sink } = makeSink();
    const { pipeline } = makePipeline(sink, { logger });

    await pipeline.process(async () => new Uint8Array([0xff]));

    expect(lines).toHaveLength(1);
    const entry = JSON.parse(lines[0] ?? '{}') as { msg?: string; status?: number; err?: { type?: string } };
    expect(entry.msg).toBe('remote-write request failed');
    expect(entry.status).toBe(400);
    expect(entry.err?.type).toBe('DecompressionError');
  });

  it('exposes self-observability datapoints', async () => {
    const { sink } = makeSink();
    const { pipeline } = makePipeline(sink);

    await pipeline.process(async () => new Uint8Array([0xff]));

    const invalid = pipeline.datapoints().find((dp) => dp.metric === 'prometheus.invalid_requests');
    expect(invalid?.value).toEqual({ type: 'int', value: 1n });
  });
});
