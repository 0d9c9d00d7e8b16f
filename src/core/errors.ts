/**
 * Request-level failures. Each carries the HTTP status the adapters answer with:
 * 400 for payloads the client got wrong, 500 for failures on our side.
 */
export abstract class IngestError extends Error {
  abstract readonly status: number;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** I/O failure while reading the request body. */
export class ReadError extends IngestError {
  readonly status = 500;
}

/** Body is not valid snappy block-compressed data. */
export class DecompressionError extends IngestError {
  readonly status = 400;
}

/** Decompressed bytes do not parse as a remote-write WriteRequest. */
export class DeserializationError extends IngestError {
  readonly status = 400;
}

/** The downstream sink rejected the batch, or the forward was aborted. */
export class SinkForwardError extends IngestError {
  readonly status = 500;
}

/** Invalid gate configuration. */
export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Anything thrown during ingest that is not one of the above. */
export class UnexpectedIngestError extends IngestError {
  readonly status = 500;
}

export function toIngestError(err: unknown): IngestError {
  if (err instanceof IngestError) return err;
  return new UnexpectedIngestError(errorMessage(err), { cause: err });
}
