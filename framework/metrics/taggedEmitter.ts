import { measure, type MeasureOptions, type Measurer } from './measure';
import {
  composeMetricName,
  mergeTags,
  toTagSet,
  type TagInput,
  type TagSet,
} from './metricName';
import { whenSettled } from './settle';
import type { StatsClient } from './statsClient';

/**
 * Operations whose metric name is rewritten with the tag set. The base of
 * the composed name is the operation's own name.
 */
export const EMISSION_OPERATIONS = [
  'incr',
  'decr',
  'gauge',
  'set',
  'timing',
  'histogram',
  'timer',
] as const;

export type EmissionOperation = (typeof EMISSION_OPERATIONS)[number];

export type Clock = () => number;

export interface TaggedEmitterOptions {
  tags?: TagInput;
  /** Millisecond clock used by `timer`. */
  clock?: Clock;
}

const defaultClock: Clock = () => performance.now();

/**
 * Wraps a StatsD client so every emitted metric carries this emitter's tags.
 *
 * Instances handed out by the registry are shared by every caller that asks
 * with the same arguments. `scopedExtraTags` swaps the shared tag set in and
 * out, and `measure` runs every call inside such a scope. When two async
 * scopes on one instance overlap and settle out of order, the later one
 * restores the tags it saw on entry, which still hold the earlier scope's
 * tags. That leftover stays on the instance for good and shows up in every
 * later metric from every holder. Overlapping measured async calls are
 * ordinary in a Node server (two requests in flight on one handler), so
 * derive a per-task emitter with `withExtraTags` before measuring or scoping
 * concurrent work.
 */
export class TaggedEmitter {
  private currentTags: TagSet;
  private readonly clock: Clock;

  constructor(
    readonly client: StatsClient,
    options: TaggedEmitterOptions = {},
  ) {
    this.currentTags = toTagSet(options.tags);
    this.clock = options.clock ?? defaultClock;
  }

  get tags(): ReadonlyMap<string, string> {
    return new Map(this.currentTags);
  }

  metricName(operation: EmissionOperation, name: string): string {
    return composeMetricName(operation, this.currentTags, name);
  }

  incr(name: string, count = 1, sampleRate?: number): void {
    this.client.increment(this.metricName('incr', name), count, sampleRate);
  }

  decr(name: string, count = 1, sampleRate?: number): void {
    this.client.decrement(this.metricName('decr', name), count, sampleRate);
  }

  gauge(name: string, value: number, sampleRate?: number): void {
    this.client.gauge(this.metricName('gauge', name), value, sampleRate);
  }

  set(name: string, value: number | string, sampleRate?: number): void {
    this.client.set(this.metricName('set', name), value, sampleRate);
  }

  timing(name: string, ms: number, sampleRate?: number): void {
    this.client.timing(this.metricName('timing', name), ms, sampleRate);
  }

  histogram(name: string, value: number, sampleRate?: number): void {
    this.client.histogram(this.metricName('histogram', name), value, sampleRate);
  }

  /**
   * Times `block`, awaiting it when it returns a promise. One timing sample
   * is sent whether the block succeeds or fails.
   */
  timer<T>(name: string, block: () => Promise<T>): Promise<T>;
  timer<T>(name: string, block: () => T): T;
  timer(name: string, block: () => unknown): unknown {
    const start = this.clock();
    return whenSettled(block, () => {
      this.client.timing(this.metricName('timer', name), this.clock() - start);
    });
  }

  close(): Promise<void> {
    return this.client.close();
  }

  /** A new emitter over the same client; this one keeps its tags. */
  withExtraTags(tags: TagInput): TaggedEmitter {
    const merged = mergeTags(new Map(this.currentTags), tags);
    return new TaggedEmitter(this.client, { tags: merged, clock: this.clock });
  }

  /**
   * Merges `tags` into this emitter for the duration of `block` and puts the
   * previous tag set back afterwards, including when `block` throws or its
   * promise rejects.
   */
  scopedExtraTags<T>(tags: TagInput, block: () => Promise<T>): Promise<T>;
  scopedExtraTags<T>(tags: TagInput, block: () => T): T;
  scopedExtraTags(tags: TagInput, block: () => unknown): unknown {
    const previous = new Map(this.currentTags);
    mergeTags(this.currentTags, tags);
    return whenSettled(block, () => {
      this.currentTags = previous;
    });
  }

  measure(options: MeasureOptions = {}): Measurer {
    return measure(this, options);
  }
}
