import { describe, expect, test } from 'vitest';

import { MetricsConfigError } from '../../errors/MetricsError';
import type { EnvProvider } from '../statsConfig';
import { buildStatsClientOptions, parseStatsClientOptions } from '../statsConfig';

const buildProvider = (values: Record<string, string | undefined>): EnvProvider => ({
  get: (key: string) => values[key],
});

describe('buildStatsClientOptions', () => {
  test('reads STATSD_* variables through the provider', () => {
    const provider = buildProvider({
      STATSD_HOST: 'stats.internal',
      STATSD_PORT: '8125',
      STATSD_PREFIX: 'checkout.',
      STATSD_PROTOCOL: 'udp',
    });

    expect(buildStatsClientOptions(provider, 'production')).toEqual({
      host: 'stats.internal',
      port: 8125,
      prefix: 'checkout.',
      protocol: 'udp',
    });
  });

  test('turns on mock mode under a test runtime', () => {
    expect(buildStatsClientOptions(buildProvider({}), 'test')).toEqual({ mock: true });
  });

  test('returns an empty object when nothing is set outside tests', () => {
    expect(buildStatsClientOptions(buildProvider({}), 'development')).toEqual({});
  });

  test('rejects a non-numeric port with a MetricsConfigError naming the field', () => {
    const provider = buildProvider({ STATSD_PORT: 'eighty' });

    expect(() => buildStatsClientOptions(provider, 'production')).toThrowError(MetricsConfigError);
    expect(() => buildStatsClientOptions(provider, 'production')).toThrowError(/port/);
  });

  test('rejects an unknown protocol', () => {
    const provider = buildProvider({ STATSD_PROTOCOL: 'carrier-pigeon' });

    expect(() => buildStatsClientOptions(provider, 'production')).toThrowError(/protocol/);
  });
});

describe('parseStatsClientOptions', () => {
  test('rejects keys the client does not understand', () => {
    expect(() => parseStatsClientOptions({ host: 'localhost', bogus: 1 })).toThrowError(/bogus/);
  });

  test('rejects ports outside the valid range', () => {
    expect(() => parseStatsClientOptions({ port: 70000 })).toThrowError(MetricsConfigError);
  });

  test('passes valid options through unchanged', () => {
    expect(parseStatsClientOptions({ host: 'localhost', port: 9125, mock: true })).toEqual({
      host: 'localhost',
      port: 9125,
      mock: true,
    });
  });
});
