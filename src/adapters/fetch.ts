/**
 * Web-standard (Request → Response) adapter helpers.
 * Runs on anything that speaks the Fetch API: Node 20+, Hono, Next route handlers, ...
 */

import type { Pipeline } from '../core/Pipeline.ts';
import { bodyReader } from '../core/Compat.ts';

export interface RouteMacro {
  method: 'POST';
  path: string;
  handler: (req: Request) => Promise<Response>;
}

/** Map pipeline status codes to HTTP responses. */
export function pipelineResultToResponse(status: number, message: string): Response {
  if (status === 200) return new Response(null, { status: 200 });
  return new Response(message, {
    status,
    headers: { 'Content-Type': 'text/plain; charset=utf-8' },
  });
}

/**
 * Returns a handler for a route that only receives POSTs
 * (method checking done by the host router).
 */
export function fetchRouteHandler(pipeline: Pipeline): (req: Request) => Promise<Response> {
  return async (req: Request): Promise<Response> => {
    const result = await pipeline.process(bodyReader(req), { signal: req.signal });
    return pipelineResultToResponse(result.status, result.message);
  };
}

/**
 * Returns a fetch handler that handles POST to the specified path.
 * Returns 405 for wrong method, 404 for unmatched paths.
 */
export function fetchHandler(
  pipeline: Pipeline,
  path: string
): (req: Request) => Promise<Response> {
  const route = fetchRouteHandler(pipeline);
  return async (req: Request): Promise<Response> => {
    const url = new URL(req.url);
    if (url.pathname !== path) {
      return new Response('Not Found', { status: 404 });
    }
    if (req.method !== 'POST') {
      return new Response('Method Not Allowed', {
        status: 405,
        headers: { Allow: 'POST' },
      });
    }
    return route(req);
  };
}

/**
 * Framework-agnostic route macro descriptor:
 * `{ method, path, handler }`
 */
export function routeMacro(pipeline: Pipeline, path: string): RouteMacro {
  return {
    method: 'POST',
    path,
    handler: fetchRouteHandler(pipeline),
  };
}
