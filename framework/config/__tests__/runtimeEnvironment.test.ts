/// <reference types="vitest" />
import { describe, expect, it } from 'vitest';

import { detectRuntimeEnvironment } from '../runtimeEnvironment';

describe('detectRuntimeEnvironment', () => {
  it('returns test when the env flags a test runtime', () => {
    expect(detectRuntimeEnvironment({ env: { NODE_ENV: 'test' } })).toBe('test');
    expect(detectRuntimeEnvironment({ env: { VITEST: 'true', NODE_ENV: 'production' } })).toBe(
      'test',
    );
  });

  it('returns production only when NODE_ENV says so', () => {
    expect(detectRuntimeEnvironment({ env: { NODE_ENV: 'production' } })).toBe('production');
    expect(detectRuntimeEnvironment({ env: {} })).toBe('development');
  });

  it('honours an explicit override', () => {
    expect(
      detectRuntimeEnvironment({ override: 'production', env: { NODE_ENV: 'test' } }),
    ).toBe('production');
  });
});
