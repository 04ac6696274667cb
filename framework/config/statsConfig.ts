import { z } from 'zod';

import { MetricsConfigError } from '../errors/MetricsError';
import { detectRuntimeEnvironment, type RuntimeEnvironment } from './runtimeEnvironment';

export interface EnvProvider {
  get(key: string): string | undefined;
}

export const processEnvProvider: EnvProvider = {
  get: (key) => process.env[key],
};

export const statsClientOptionsSchema = z
  .object({
    host: z.string().min(1).optional(),
    port: z.number().int().min(1).max(65535).optional(),
    prefix: z.string().optional(),
    suffix: z.string().optional(),
    protocol: z.enum(['udp', 'tcp', 'uds']).optional(),
    mock: z.boolean().optional(),
    maxBufferSize: z.number().int().nonnegative().optional(),
    bufferFlushInterval: z.number().int().positive().optional(),
  })
  .strict();

/**
 * Transport options handed to the underlying StatsD client.
 * Tags are not part of this shape; the registry strips them off first.
 */
export type StatsClientOptions = z.infer<typeof statsClientOptionsSchema>;

export function parseStatsClientOptions(raw: unknown): StatsClientOptions {
  const result = statsClientOptionsSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new MetricsConfigError(`Invalid StatsD client options: ${details}`, {
      cause: result.error,
    });
  }
  return result.data;
}

const readPort = (provider: EnvProvider): number | undefined => {
  const raw = provider.get('STATSD_PORT');
  return raw ? Number(raw) : undefined;
};

/**
 * Reads STATSD_* variables into client options. Test runtimes get hot-shots'
 * mock mode so nothing leaves the process.
 */
export const buildStatsClientOptions = (
  provider: EnvProvider = processEnvProvider,
  runtime: RuntimeEnvironment = detectRuntimeEnvironment(),
): StatsClientOptions => {
  const candidate: Record<string, unknown> = {
    host: provider.get('STATSD_HOST'),
    port: readPort(provider),
    prefix: provider.get('STATSD_PREFIX'),
    protocol: provider.get('STATSD_PROTOCOL'),
    mock: runtime === 'test' ? true : undefined,
  };

  const defined = Object.fromEntries(
    Object.entries(candidate).filter(([, value]) => value !== undefined),
  );
  return parseStatsClientOptions(defined);
};
