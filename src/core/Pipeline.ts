/**
 * Stateless per-request pipeline: process(read) → PipelineResult
 *
 * Steps:
 *  1. Start the latency clock
 *  2. Read the body                      (ReadError → 500)
 *  3. Snappy-decompress, protobuf-decode (DecompressionError / DeserializationError → 400)
 *  4. Convert every series to datapoints (missing names and NaNs are counted, not errors)
 *  5. Record the batch size
 *  6. Forward a non-empty batch to the sink in one call (SinkForwardError → 500)
 *  7. Record latency, whatever the outcome
 *
 * A failed request bumps the error counter once and is logged once.
 * The counters are the only state shared between requests.
 */

import { performance } from 'node:perf_hooks';
import type { Logger } from 'pino';
import type { Datapoint } from '../types/datapoint.ts';
import type { DatapointSink } from './Sink.ts';
import type { IngestCounters } from './Counters.ts';
import type { ConvertOptions, NonFinitePolicy } from '../transform/samples.ts';
import { seriesToDatapoints } from '../transform/samples.ts';
import { decodeRemoteWriteBody } from '../proto/remoteWrite.ts';
import { ReadError, SinkForwardError, errorMessage, toIngestError } from './errors.ts';
import { abortable, linkSignal } from '../util/abort.ts';
import { createSilentLogger } from '../logging/logger.ts';

export interface PipelineResult {
  status: number;
  message: string;
  /** Datapoints handed to the sink; 0 on any failure. */
  datapoints: number;
}

/** Reads the whole request body. */
export type BodyReader = () => Promise<Uint8Array>;

export interface PipelineOptions {
  /** Budget for the sink call in milliseconds; 0 disables. */
  timeout?: number;
  nonFinite?: NonFinitePolicy;
  logger?: Logger;
}

export interface ProcessOptions {
  /** Caller cancellation, e.g. the client went away. */
  signal?: AbortSignal;
}

export class Pipeline {
  private readonly timeout: number;
  private readonly convertOptions: ConvertOptions;
  private readonly logger: Logger;

  constructor(
    private readonly sink: DatapointSink,
    readonly counters: IngestCounters,
    options: PipelineOptions = {}
  ) {
    this.timeout = options.timeout ?? 0;
    this.convertOptions = { nonFinite: options.nonFinite ?? 'forward' };
    this.logger = options.logger ?? createSilentLogger();
  }

  async process(read: BodyReader, options: ProcessOptions = {}): Promise<PipelineResult> {
    const start = performance.now();
    try {
      const datapoints = await this.ingest(read, options.signal);
      return { status: 200, message: 'OK', datapoints };
    } catch (err) {
      const failure = toIngestError(err);
      this.counters.recordError();
      this.logger.error({ err: failure, status: failure.status }, 'remote-write request failed');
      return { status: failure.status, message: failure.message, datapoints: 0 };
    } finally {
      this.counters.requestTime.add((performance.now() - start) * 1e6);
    }
  }

  /** Self-observability datapoints for this pipeline's counters. */
  datapoints(): Datapoint[] {
    return this.counters.datapoints();
  }

  private async ingest(read: BodyReader, signal: AbortSignal | undefined): Promise<number> {
    let body: Uint8Array;
    try {
      body = await read();
    } catch (err) {
      throw new ReadError(`failed to read request body: ${errorMessage(err)}`, { cause: err });
    }

    const req = decodeRemoteWriteBody(body);

    const batch: Datapoint[] = [];
    for (const ts of req.timeseries) {
      for (const dp of seriesToDatapoints(ts, this.counters, this.convertOptions)) {
        batch.push(dp);
      }
    }
    this.logger.debug(
      { series: req.timeseries.length, datapoints: batch.length },
      'decoded write request'
    );

    this.counters.drainSize.add(batch.length);
    if (batch.length > 0) {
      await this.forward(batch, signal);
    }
    return batch.length;
  }

  private async forward(batch: Datapoint[], callerSignal: AbortSignal | undefined): Promise<void> {
    const linked = linkSignal(callerSignal, this.timeout);
    try {
      // Cancelled before forwarding: the batch is discarded, never partially sent.
      linked.signal.throwIfAborted();
      await abortable(this.sink.addDatapoints(batch, linked.signal), linked.signal);
    } catch (err) {
      throw new SinkForwardError(
        `failed to forward ${batch.length} datapoints: ${errorMessage(err)}`,
        { cause: err }
      );
    } finally {
      linked.dispose();
    }
  }
}
