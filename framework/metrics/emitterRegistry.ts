import { createHash } from 'node:crypto';

import { buildStatsClientOptions, type StatsClientOptions } from '../config/statsConfig';
import type { StructuredLogger } from '../logging/structuredLogger';
import { mergeTags, toTagSet, type TagInput } from './metricName';
import { createHotShotsClient, type StatsClientFactory } from './statsClient';
import { TaggedEmitter, type Clock } from './taggedEmitter';

export type EmitterOptions = StatsClientOptions & { tags?: TagInput };

export interface EmitterRegistryOptions {
  clientFactory?: StatsClientFactory;
  /** Transport options applied under every caller's own options. */
  defaults?: () => StatsClientOptions;
  logger?: Pick<StructuredLogger, 'debug' | 'error'>;
  clock?: Clock;
}

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value)
        .filter(([, entry]) => entry !== undefined)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, entry]) => [key, canonicalize(entry)]),
    );
  }
  return value;
}

/**
 * SHA-256 over a canonical JSON encoding. Option keys are sorted; tags are
 * kept as ordered pairs because their order shows up in metric names.
 */
export function fingerprint(service: string, module: string, options: EmitterOptions = {}): string {
  const { tags = {}, ...clientOptions } = options;
  const encoded = JSON.stringify([
    service,
    module,
    canonicalize(clientOptions),
    [...toTagSet(tags).entries()],
  ]);
  return createHash('sha256').update(encoded, 'utf8').digest('hex');
}

/**
 * Process-wide cache of tagged emitters keyed by configuration fingerprint.
 * Lookups and inserts happen synchronously, so callers racing on the same
 * configuration from different async tasks all receive one instance.
 */
export class EmitterRegistry {
  private readonly entries = new Map<string, TaggedEmitter>();
  private readonly clientFactory: StatsClientFactory;
  private readonly defaults?: () => StatsClientOptions;
  private resolvedDefaults?: StatsClientOptions;
  private readonly logger?: Pick<StructuredLogger, 'debug' | 'error'>;
  private readonly clock?: Clock;

  constructor(options: EmitterRegistryOptions = {}) {
    this.clientFactory = options.clientFactory ?? createHotShotsClient;
    this.defaults = options.defaults;
    this.logger = options.logger;
    this.clock = options.clock;
  }

  get size(): number {
    return this.entries.size;
  }

  getEmitter(service: string, module: string, options: EmitterOptions = {}): TaggedEmitter {
    const effective: EmitterOptions = { ...this.resolveDefaults(), ...options };
    const key = fingerprint(service, module, effective);

    const existing = this.entries.get(key);
    if (existing) {
      return existing;
    }

    const { tags = {}, ...clientOptions } = effective;
    // a throwing factory leaves the cache untouched
    const client = this.clientFactory(clientOptions);
    const emitter = new TaggedEmitter(client, {
      tags: mergeTags(toTagSet(tags), { module, service }),
      clock: this.clock,
    });

    this.entries.set(key, emitter);
    this.logger?.debug('Emitter created', { service, module, fingerprint: key });
    return emitter;
  }

  /** Forgets every cached emitter without closing its client. Test use only. */
  reset(): void {
    this.entries.clear();
  }

  async shutdownAll(): Promise<void> {
    const emitters = [...this.entries.entries()];
    this.entries.clear();

    const errors: Error[] = [];
    await Promise.all(
      emitters.map(([key, emitter]) =>
        emitter.close().catch((error: unknown) => {
          const normalized = error instanceof Error ? error : new Error(String(error));
          errors.push(normalized);
          this.logger?.error('Emitter close failed', { fingerprint: key, error: normalized });
        }),
      ),
    );

    if (errors.length > 0) {
      throw new AggregateError(errors, 'One or more emitters failed to close');
    }
  }

  private resolveDefaults(): StatsClientOptions {
    if (!this.defaults) return {};
    this.resolvedDefaults ??= this.defaults();
    return this.resolvedDefaults;
  }
}

export const defaultEmitterRegistry = new EmitterRegistry({
  defaults: () => buildStatsClientOptions(),
});

export function getEmitter(
  service: string,
  module: string,
  options: EmitterOptions = {},
): TaggedEmitter {
  return defaultEmitterRegistry.getEmitter(service, module, options);
}
