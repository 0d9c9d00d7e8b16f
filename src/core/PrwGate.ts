// PrwGate fluent builder and built instance.
//
// Usage:
//   const gate = new PrwGate()
//     .sink(new FetchSink({ url: 'http://collector:8080/datapoints', timeout: 5_000 }))
//     .config({ listenAddress: '0.0.0.0:1234', listenPath: '/write' })
//     .build();
//
//   const server = await gate.listen();
//   app.post('/write', gate.fetchRouteHandler());

import type { Logger } from 'pino';
import type { Datapoint } from '../types/datapoint.ts';
import type { DatapointSink } from './Sink.ts';
import type { GateConfig } from './GateConfig.ts';
import type { NonFinitePolicy } from '../transform/samples.ts';
import type { RouteMacro } from '../adapters/fetch.ts';
import type { NodeRequestHandler } from '../adapters/node.ts';
import type { CompatHandler, IngestInput, IngestOptions, IngestSession } from './Compat.ts';
import type { RollingDistributionOptions } from './Counters.ts';
import { parseGateConfig } from './GateConfig.ts';
import { IngestCounters } from './Counters.ts';
import { Pipeline } from './Pipeline.ts';
import { ConfigError } from './errors.ts';
import { createLogger } from '../logging/logger.ts';
import { fetchHandler, fetchRouteHandler, routeMacro } from '../adapters/fetch.ts';
import { GateServer, nodeHandler } from '../adapters/node.ts';
import { createCompatHandler, createIngestSession } from './Compat.ts';

/** PrwGate fluent builder. */
export class PrwGate {
  private _sink?: DatapointSink;
  private _config: Partial<GateConfig> = {};
  private _logger?: Logger;
  private _nonFinite: NonFinitePolicy = 'forward';
  private _distribution: RollingDistributionOptions = {};

  /** Where converted batches go. Required. */
  sink(sink: DatapointSink): this {
    this._sink = sink;
    return this;
  }

  /** Listen address, listen path and request timeout (ms). Merged over earlier calls. */
  config(config: Partial<GateConfig>): this {
    this._config = { ...this._config, ...config };
    return this;
  }

  logger(logger: Logger): this {
    this._logger = logger;
    return this;
  }

  /**
   * Handling of ±Infinity samples.
   * - 'forward' (default): emitted as float datapoints
   * - 'drop': discarded and counted with the NaN samples
   */
  nonFinite(policy: NonFinitePolicy): this {
    this._nonFinite = policy;
    return this;
  }

  /** Window and capacity of the latency / batch-size distributions. */
  distributions(options: RollingDistributionOptions): this {
    this._distribution = { ...this._distribution, ...options };
    return this;
  }

  /** Build the gate. Throws ConfigError without a sink or on invalid config. */
  build(): BuiltPrwGate {
    if (!this._sink) {
      throw new ConfigError('PrwGate: sink() must be called before build()');
    }
    const config = parseGateConfig(this._config);
    const logger = this._logger ?? createLogger();
    const pipeline = new Pipeline(this._sink, new IngestCounters(this._distribution), {
      timeout: config.timeout,
      nonFinite: this._nonFinite,
      logger,
    });
    return new BuiltPrwGate(pipeline, config, logger);
  }
}

/** A configured gate ready to handle requests. */
export class BuiltPrwGate {
  constructor(
    private readonly pipeline: Pipeline,
    readonly config: GateConfig,
    private readonly log: Logger
  ) {}

  /**
   * Fetch-API handler for a route that only receives POSTs.
   *
   * Usage: app.post('/write', (c) => gate.fetchRouteHandler()(c.req.raw))
   */
  fetchRouteHandler(): (req: Request) => Promise<Response> {
    return fetchRouteHandler(this.pipeline);
  }

  /** Fetch-API handler: POST on the configured path; 404 / 405 otherwise. */
  fetchHandler(path = this.config.listenPath): (req: Request) => Promise<Response> {
    return fetchHandler(this.pipeline, path);
  }

  /** `{ method: 'POST', path, handler }` for table-driven routers. */
  routeMacro(path = this.config.listenPath): RouteMacro {
    return routeMacro(this.pipeline, path);
  }

  /**
   * node:http request listener. The returned promise only rejects on bugs:
   *   createServer((req, res) => { handler(req, res).catch(onError); })
   */
  nodeHandler(path = this.config.listenPath): NodeRequestHandler {
    return nodeHandler(this.pipeline, path);
  }

  /**
   * Framework-agnostic adapter.
   * Usage: const result = await gate.compat()(req).push();
   */
  compat(): CompatHandler {
    return createCompatHandler(this.pipeline);
  }

  /**
   * One isolated ingest, from a Request, a request-like object or raw body bytes.
   *
   * Usage: await gate.ingest(compressedBody).push();
   */
  ingest(input: IngestInput, options?: IngestOptions): IngestSession {
    return createIngestSession(this.pipeline, input, options);
  }

  /** Start a node:http listener on the configured address and path. */
  listen(): Promise<GateServer> {
    return GateServer.start(this.pipeline, this.config, this.log);
  }

  /** Self-observability: latency and batch-size distributions plus the error/NaN/bad-datapoint counters. */
  datapoints(): Datapoint[] {
    return this.pipeline.datapoints();
  }

  /** Direct access to the pipeline for advanced use cases or testing. */
  get rawPipeline(): Pipeline {
    return this.pipeline;
  }
}
