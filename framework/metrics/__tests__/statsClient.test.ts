/// <reference types="vitest" />
import { afterEach, describe, expect, it } from 'vitest';

import { MetricsConfigError } from '../../errors/MetricsError';
import { defaultEmitterRegistry, getEmitter } from '../emitterRegistry';
import { HotShotsStatsClient, createHotShotsClient } from '../statsClient';
import { TaggedEmitter } from '../taggedEmitter';

describe('HotShotsStatsClient', () => {
  it('sends the composed names as StatsD lines', () => {
    const client = new HotShotsStatsClient({ mock: true });
    const emitter = new TaggedEmitter(client, { tags: { module: 'm', service: 's' }, clock: () => 0 });

    emitter.incr('fool');
    emitter.timer('duration', () => undefined);
    emitter.gauge('queue', 4);

    expect(client.sentMessages).toEqual([
      'incr,module=m,service=s,name=fool:1|c',
      'timer,module=m,service=s,name=duration:0|ms',
      'gauge,module=m,service=s,name=queue:4|g',
    ]);
  });

  it('applies the configured prefix ahead of the composed name', () => {
    const client = new HotShotsStatsClient({ mock: true, prefix: 'checkout.' });

    new TaggedEmitter(client).incr('orders');

    expect(client.sentMessages).toEqual(['checkout.incr,name=orders:1|c']);
  });
});

describe('createHotShotsClient', () => {
  it('validates options before building the client', () => {
    expect(() => createHotShotsClient({ port: 0 })).toThrowError(MetricsConfigError);
  });
});

describe('getEmitter', () => {
  afterEach(() => {
    defaultEmitterRegistry.reset();
  });

  it('serves emitters from the process-wide registry', () => {
    const emitter = getEmitter('test', 'tests.metrics');

    expect(getEmitter('test', 'tests.metrics')).toBe(emitter);
    expect(emitter.client).toBeInstanceOf(HotShotsStatsClient);
  });
});
