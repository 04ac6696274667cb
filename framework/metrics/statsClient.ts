import { StatsD } from 'hot-shots';

import { parseStatsClientOptions, type StatsClientOptions } from '../config/statsConfig';
import { createStructuredLogger } from '../logging/structuredLogger';

/**
 * The slice of a StatsD client the tagged emitter relies on. Every emission
 * takes the metric name as its first argument.
 */
export interface StatsClient {
  increment(name: string, value: number, sampleRate?: number): void;
  decrement(name: string, value: number, sampleRate?: number): void;
  gauge(name: string, value: number, sampleRate?: number): void;
  set(name: string, value: number | string, sampleRate?: number): void;
  timing(name: string, ms: number, sampleRate?: number): void;
  histogram(name: string, value: number, sampleRate?: number): void;
  close(): Promise<void>;
}

export type StatsClientFactory = (options: StatsClientOptions) => StatsClient;

const transportLogger = createStructuredLogger({ component: 'metrics.transport' });

export class HotShotsStatsClient implements StatsClient {
  private readonly statsd: StatsD;

  constructor(options: StatsClientOptions = {}) {
    this.statsd = new StatsD({
      ...options,
      errorHandler: (error) => {
        transportLogger.error('StatsD transport error', { error: error.message });
      },
    });
  }

  /** Lines recorded while the client runs in mock mode. */
  get sentMessages(): readonly string[] {
    return this.statsd.mockBuffer ?? [];
  }

  increment(name: string, value: number, sampleRate?: number): void {
    this.statsd.increment(name, value, sampleRate);
  }

  decrement(name: string, value: number, sampleRate?: number): void {
    this.statsd.decrement(name, value, sampleRate);
  }

  gauge(name: string, value: number, sampleRate?: number): void {
    this.statsd.gauge(name, value, sampleRate);
  }

  set(name: string, value: number | string, sampleRate?: number): void {
    this.statsd.set(name, value, sampleRate);
  }

  timing(name: string, ms: number, sampleRate?: number): void {
    this.statsd.timing(name, ms, sampleRate);
  }

  histogram(name: string, value: number, sampleRate?: number): void {
    this.statsd.histogram(name, value, sampleRate);
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.statsd.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }
}

/** Validates the options before any socket is opened. */
export const createHotShotsClient: StatsClientFactory = (options) =>
  new HotShotsStatsClient(parseStatsClientOptions(options));
