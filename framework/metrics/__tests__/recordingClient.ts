import type { StatsClient } from '../statsClient';

export type RecordedCall = {
  op: 'increment' | 'decrement' | 'gauge' | 'set' | 'timing' | 'histogram';
  name: string;
  value: number | string;
  sampleRate?: number;
};

export class RecordingStatsClient implements StatsClient {
  readonly calls: RecordedCall[] = [];
  closed = false;

  get names(): string[] {
    return this.calls.map((call) => call.name);
  }

  increment(name: string, value: number, sampleRate?: number): void {
    this.calls.push({ op: 'increment', name, value, sampleRate });
  }

  decrement(name: string, value: number, sampleRate?: number): void {
    this.calls.push({ op: 'decrement', name, value, sampleRate });
  }

  gauge(name: string, value: number, sampleRate?: number): void {
    this.calls.push({ op: 'gauge', name, value, sampleRate });
  }

  set(name: string, value: number | string, sampleRate?: number): void {
    this.calls.push({ op: 'set', name, value, sampleRate });
  }

  timing(name: string, ms: number, sampleRate?: number): void {
    this.calls.push({ op: 'timing', name, value: ms, sampleRate });
  }

  histogram(name: string, value: number, sampleRate?: number): void {
    this.calls.push({ op: 'histogram', name, value, sampleRate });
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
