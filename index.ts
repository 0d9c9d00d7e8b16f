// prwgate — Prometheus remote-write → datapoint ingestion gateway

// Core builder
export { PrwGate, BuiltPrwGate } from './src/core/PrwGate.ts';

// Pipeline (for advanced/testing use)
export { Pipeline } from './src/core/Pipeline.ts';
export type { PipelineResult, PipelineOptions, ProcessOptions, BodyReader } from './src/core/Pipeline.ts';
export { IngestCounters, RollingDistribution } from './src/core/Counters.ts';
export type { DistributionSnapshot, RollingDistributionOptions, CounterTotals } from './src/core/Counters.ts';
export { createCompatHandler, createIngestSession, IngestSession } from './src/core/Compat.ts';
export type { CompatHandler, CompatRequestLike, IngestInput, IngestOptions } from './src/core/Compat.ts';

// Sinks
export { CallbackSink, FetchSink, datapointToJson } from './src/core/Sink.ts';
export type { DatapointSink, FetchSinkConfig, JsonDatapoint } from './src/core/Sink.ts';

// Configuration
export { parseGateConfig, loadGateConfigFromEnv, gateConfigSchema } from './src/core/GateConfig.ts';
export type { GateConfig } from './src/core/GateConfig.ts';

// Errors
export {
  IngestError,
  ReadError,
  DecompressionError,
  DeserializationError,
  SinkForwardError,
  UnexpectedIngestError,
  ConfigError,
} from './src/core/errors.ts';

// Adapters
export { fetchHandler, fetchRouteHandler, routeMacro } from './src/adapters/fetch.ts';
export type { RouteMacro } from './src/adapters/fetch.ts';
export { nodeHandler, GateServer } from './src/adapters/node.ts';
export type { NodeRequestHandler, ListenAddress } from './src/adapters/node.ts';

// Types
export type { TimeSeries, Label, Sample, WriteRequest } from './src/types/prometheus.ts';
export type {
  Datapoint,
  DatapointValue,
  Dimensions,
  MetricKind,
  ClassifiedKind,
} from './src/types/datapoint.ts';

// Transform utilities (for advanced use)
export { mapLabels } from './src/transform/labels.ts';
export { classifyMetric, METRIC_KIND_RULES } from './src/transform/metricKind.ts';
export { convertSample, seriesToDatapoints } from './src/transform/samples.ts';
export type { NonFinitePolicy } from './src/transform/samples.ts';

// Wire codec (for advanced use)
export { decodeRemoteWriteBody, encodeRemoteWriteBody } from './src/proto/remoteWrite.ts';
export { decodeWriteRequest, encodeWriteRequest } from './src/proto/writeRequest.ts';
export { snappyCompress, snappyUncompress } from './src/compress/snappy.ts';

// Logging
export { createLogger } from './src/logging/logger.ts';
export type { Logger } from './src/logging/logger.ts';
