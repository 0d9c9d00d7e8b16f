/**
 * node:http adapter and a minimal listener around it.
 */

import { createServer } from 'node:http';
import type { IncomingMessage, Server, ServerResponse } from 'node:http';
import type { Logger } from 'pino';
import type { Pipeline } from '../core/Pipeline.ts';
import type { GateConfig } from '../core/GateConfig.ts';
import { splitListenAddress } from '../core/GateConfig.ts';

export type NodeRequestHandler = (req: IncomingMessage, res: ServerResponse) => Promise<void>;

function send(res: ServerResponse, status: number, message: string): void {
  res.statusCode = status;
  if (message !== '') {
    res.setHeader('Content-Type', 'text/plain; charset=utf-8');
  }
  res.end(message);
}

/** Buffer the whole request body. Rejects if the client goes away mid-body. */
export function readIncoming(req: IncomingMessage): Promise<Uint8Array> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => resolve(Buffer.concat(chunks)));
    req.on('error', reject);
    req.on('close', () => {
      if (!req.complete) reject(new Error('request closed before the body was complete'));
    });
  });
}

/**
 * Handles POST to `path`; 404 elsewhere, 405 for other methods.
 * The forward is abandoned if the client disconnects first.
 */
export function nodeHandler(pipeline: Pipeline, path: string): NodeRequestHandler {
  return async (req, res) => {
    const url = new URL(req.url ?? '/', 'http://localhost');
    if (url.pathname !== path) {
      send(res, 404, 'Not Found');
      return;
    }
    if (req.method !== 'POST') {
      res.setHeader('Allow', 'POST');
      send(res, 405, 'Method Not Allowed');
      return;
    }

    const controller = new AbortController();
    const onClose = (): void => {
      if (!res.writableEnded) controller.abort(new Error('client closed the connection'));
    };
    res.on('close', onClose);
    try {
      const result = await pipeline.process(() => readIncoming(req), { signal: controller.signal });
      send(res, result.status, result.status === 200 ? '' : result.message);
    } finally {
      res.off('close', onClose);
    }
  };
}

export interface ListenAddress {
  host: string;
  port: number;
}

/** A started HTTP listener. */
export class GateServer {
  private constructor(
    private readonly server: Server,
    private readonly logger: Logger
  ) {}

  static async start(pipeline: Pipeline, config: GateConfig, logger: Logger): Promise<GateServer> {
    const handler = nodeHandler(pipeline, config.listenPath);
    const server = createServer((req, res) => {
      handler(req, res).catch((err: unknown) => {
        logger.error({ err }, 'unhandled error in request handler');
        if (res.headersSent) res.destroy();
        else send(res, 500, 'Internal Server Error');
      });
    });
    server.requestTimeout = config.timeout;

    const { host, port } = splitListenAddress(config.listenAddress);
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, host === '' ? undefined : host, () => {
        server.off('error', reject);
        resolve();
      });
    });

    const gate = new GateServer(server, logger);
    const bound = gate.address;
    logger.info({ host: bound.host, port: bound.port, path: config.listenPath }, 'listening for remote-write');
    return gate;
  }

  get address(): ListenAddress {
    const addr = this.server.address();
    if (addr === null || typeof addr === 'string') {
      throw new Error('server is not listening on a TCP socket');
    }
    return { host: addr.address, port: addr.port };
  }

  async close(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      this.server.close((err) => (err ? reject(err) : resolve()));
      this.server.closeAllConnections();
    });
    this.logger.info('remote-write listener closed');
  }
}
