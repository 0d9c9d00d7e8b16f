import type { Pipeline, PipelineResult, BodyReader } from './Pipeline.ts';

export interface CompatRequestLike {
  method?: string;
  body?: unknown;
  arrayBuffer?: () => Promise<ArrayBuffer>;
  signal?: AbortSignal;
}

export interface IngestOptions {
  method?: string;
  signal?: AbortSignal;
}

export type IngestInput = Request | CompatRequestLike | Uint8Array | ArrayBuffer;

/** One request's trip through the pipeline. Holds no state beyond that request. */
export class IngestSession {
  private signal: AbortSignal | undefined;

  constructor(
    private readonly pipeline: Pipeline,
    private readonly req: Request | CompatRequestLike
  ) {
    this.signal = req.signal ?? undefined;
  }

  /** Abandon the forward when this signal aborts. Replaces the request's own signal. */
  withSignal(signal: AbortSignal): this {
    this.signal = signal;
    return this;
  }

  async push(): Promise<PipelineResult> {
    const method = this.req.method?.toUpperCase();
    if (method !== undefined && method !== 'POST') {
      return { status: 405, message: 'Method Not Allowed', datapoints: 0 };
    }
    return this.pipeline.process(bodyReader(this.req), { signal: this.signal });
  }
}

export type CompatHandler = (req: Request | CompatRequestLike) => IngestSession;

export function createCompatHandler(pipeline: Pipeline): CompatHandler {
  return (req: Request | CompatRequestLike) => new IngestSession(pipeline, req);
}

export function createIngestSession(
  pipeline: Pipeline,
  input: IngestInput,
  options?: IngestOptions
): IngestSession {
  if (input instanceof Uint8Array || input instanceof ArrayBuffer) {
    return new IngestSession(pipeline, {
      method: options?.method ?? 'POST',
      body: input,
      signal: options?.signal,
    });
  }
  const session = new IngestSession(pipeline, input);
  return options?.signal ? session.withSignal(options.signal) : session;
}

export function bodyReader(req: Request | CompatRequestLike): BodyReader {
  if (req instanceof Request) {
    return async () => new Uint8Array(await req.arrayBuffer());
  }
  const arrayBuffer = req.arrayBuffer;
  if (typeof arrayBuffer === 'function') {
    return async () => new Uint8Array(await arrayBuffer.call(req));
  }
  return async () => bodyToBytes(req.body);
}

function bodyToBytes(body: unknown): Uint8Array {
  if (body instanceof Uint8Array) return body;
  if (body instanceof ArrayBuffer) return new Uint8Array(body);
  if (body === undefined || body === null) return new Uint8Array(0);
  if (typeof body === 'string') return new TextEncoder().encode(body);
  throw new TypeError(`unsupported request body type: ${typeof body}`);
}
