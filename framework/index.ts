export {
  EmitterRegistry,
  defaultEmitterRegistry,
  fingerprint,
  getEmitter,
  type EmitterOptions,
  type EmitterRegistryOptions,
} from './metrics/emitterRegistry';
export {
  definingClassName,
  inferClassName,
  measure,
  measureMethod,
  measurementTags,
  type ClassNaming,
  type MeasureOptions,
  type Measurer,
} from './metrics/measure';
export {
  composeMetricName,
  formatTags,
  stringifyTagValue,
  type TagInput,
  type TagSet,
} from './metrics/metricName';
export {
  HotShotsStatsClient,
  createHotShotsClient,
  type StatsClient,
  type StatsClientFactory,
} from './metrics/statsClient';
export {
  EMISSION_OPERATIONS,
  TaggedEmitter,
  type Clock,
  type EmissionOperation,
  type TaggedEmitterOptions,
} from './metrics/taggedEmitter';
export {
  getLogger,
  loggerNameFromStack,
  resolveLoggerName,
  type LoggerContext,
} from './logging/loggerName';
export {
  createStructuredLogger,
  type LogSink,
  type StructuredLogger,
} from './logging/structuredLogger';
export {
  buildStatsClientOptions,
  parseStatsClientOptions,
  processEnvProvider,
  statsClientOptionsSchema,
  type EnvProvider,
  type StatsClientOptions,
} from './config/statsConfig';
export { detectRuntimeEnvironment, type RuntimeEnvironment } from './config/runtimeEnvironment';
export { MetricsConfigError } from './errors/MetricsError';
