import { bench, group, run } from 'mitata';
import { encodeWriteRequest, decodeWriteRequest } from './src/proto/writeRequest.ts';
import { snappyCompress, snappyUncompress } from './src/compress/snappy.ts';
import { seriesToDatapoints } from './src/transform/samples.ts';
import { classifyMetric } from './src/transform/metricKind.ts';
import { IngestCounters } from './src/core/Counters.ts';
import { CallbackSink } from './src/core/Sink.ts';
import { Pipeline } from './src/core/Pipeline.ts';
import type { TimeSeries, WriteRequest } from './src/types/prometheus.ts';

// ─── Fixtures ──────────────────────────────────────────────────────────────

function makeWriteRequest(seriesCount: number, samplesPerSeries: number): WriteRequest {
  const suffixes = ['_total', '_bucket', '_count', '_sum', ''];
  const timeseries: TimeSeries[] = Array.from({ length: seriesCount }, (_, si) => ({
    labels: [
      { name: '__name__', value: `metric_${si}${suffixes[si % suffixes.length] ?? ''}` },
      { name: 'env', value: 'prod' },
      { name: 'host', value: `host-${si % 16}` },
      { name: 'region', value: 'us-east-1' },
    ],
    samples: Array.from({ length: samplesPerSeries }, (_, i) => ({
      value: i % 2 === 0 ? i : i + 0.5,
      timestamp: 1_700_000_000_000n + BigInt(i * 15_000),
    })),
  }));
  return { timeseries };
}

const medReq = makeWriteRequest(50, 5);      // 250 samples
const largeReq = makeWriteRequest(500, 10);  // 5000 samples

const medProto = encodeWriteRequest(medReq);
const largeProto = encodeWriteRequest(largeReq);
const medBody = snappyCompress(medProto);
const largeBody = snappyCompress(largeProto);

const counters = new IngestCounters();
const pipeline = new Pipeline(new CallbackSink(() => undefined), counters);

// ─── Benchmarks ────────────────────────────────────────────────────────────

group('classify', () => {
  bench('counter suffix', () => classifyMetric('http_requests_total'));
  bench('gauge fallthrough', () => classifyMetric('process_resident_memory_bytes'));
});

group('protobuf decode', () => {
  bench(`${medProto.length}B (50 series)`, () => decodeWriteRequest(medProto));
  bench(`${largeProto.length}B (500 series)`, () => decodeWriteRequest(largeProto));
});

group('snappy uncompress', () => {
  bench(`${medBody.length}B (50 series)`, () => snappyUncompress(medBody));
  bench(`${largeBody.length}B (500 series)`, () => snappyUncompress(largeBody));
});

group('series → datapoints', () => {
  bench('50 series × 5 samples', () => medReq.timeseries.map((ts) => seriesToDatapoints(ts, counters)));
  bench('500 series × 10 samples', () => largeReq.timeseries.map((ts) => seriesToDatapoints(ts, counters)));
});

group('pipeline end-to-end (callback sink)', () => {
  bench('medium body (50 series)', () => pipeline.process(async () => medBody));
  bench('large body (500 series)', () => pipeline.process(async () => largeBody));
});

await run({ format: 'mitata', colors: true });
