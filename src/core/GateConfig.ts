/**
 * Listener configuration: where the gate accepts remote-write traffic and
 * how long one request may take. Not used by the decode path itself.
 */

import { z } from 'zod';
import { ConfigError } from './errors.ts';

export const DEFAULT_LISTEN_ADDRESS = '127.0.0.1:1234';
export const DEFAULT_LISTEN_PATH = '/write';
export const DEFAULT_TIMEOUT_MS = 30_000;

const listenAddress = z
  .string()
  .regex(/^(\[[0-9a-fA-F:.]+\]|[^:\s]*):\d{1,5}$/, 'expected host:port')
  .refine((addr) => !(Number(addr.slice(addr.lastIndexOf(':') + 1)) > 65535), 'port out of range');

export const gateConfigSchema = z.object({
  listenAddress: listenAddress.default(DEFAULT_LISTEN_ADDRESS),
  listenPath: z.string().startsWith('/', 'must start with "/"').default(DEFAULT_LISTEN_PATH),
  timeout: z.coerce.number().int().nonnegative().default(DEFAULT_TIMEOUT_MS),
});

export type GateConfig = z.infer<typeof gateConfigSchema>;

export function parseGateConfig(input: unknown = {}): GateConfig {
  const result = gateConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join('.') || 'config'}: ${i.message}`)
      .join('; ');
    throw new ConfigError(`invalid gate config: ${issues}`, { cause: result.error });
  }
  return result.data;
}

/**
 * Reads PRWGATE_LISTEN_ADDRESS, PRWGATE_LISTEN_PATH and PRWGATE_TIMEOUT_MS.
 * Unset or empty variables fall back to the defaults.
 */
export function loadGateConfigFromEnv(env: NodeJS.ProcessEnv = process.env): GateConfig {
  const pick = (key: string): string | undefined => {
    const v = env[key];
    return v === undefined || v === '' ? undefined : v;
  };
  return parseGateConfig({
    listenAddress: pick('PRWGATE_LISTEN_ADDRESS'),
    listenPath: pick('PRWGATE_LISTEN_PATH'),
    timeout: pick('PRWGATE_TIMEOUT_MS'),
  });
}

export function splitListenAddress(address: string): { host: string; port: number } {
  const idx = address.lastIndexOf(':');
  const host = address.slice(0, idx).replace(/^\[(.*)\]$/, '$1');
  return { host, port: Number(address.slice(idx + 1)) };
}
