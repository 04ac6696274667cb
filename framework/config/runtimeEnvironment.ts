export type RuntimeEnvironment = 'production' | 'development' | 'test';

export interface EnvironmentDetectorOptions {
  override?: RuntimeEnvironment;
  env?: Record<string, string | undefined>;
}

export function detectRuntimeEnvironment(
  options: EnvironmentDetectorOptions = {},
): RuntimeEnvironment {
  if (options.override) {
    return options.override;
  }

  const env =
    options.env ?? (typeof process !== 'undefined' ? process.env : undefined) ?? {};

  const isTestRuntime =
    env.VITEST === 'true' || env.NODE_ENV === 'test' || env.TEST === 'true';

  if (isTestRuntime) {
    return 'test';
  }

  return env.NODE_ENV === 'production' ? 'production' : 'development';
}
