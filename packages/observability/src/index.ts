/**
 * @vigil/observability: observation handlers and bootstrap.
 *
 * Re-exports every handler implementation, the meter and span stores, and
 * the configuration-driven factory.
 */

export { ConsoleObservationHandler, LOG_LEVELS } from './console-handler.js';
export type { ConsoleHandlerOptions, LogLevel } from './console-handler.js';

export { AllMatchingCompositeHandler, FirstMatchingCompositeHandler } from './composite-handler.js';
export { NoopObservationHandler } from './noop-handler.js';
export { InMemoryObservationHandler } from './memory-handler.js';
export type { RecordedCallback, RecordedKind } from './memory-handler.js';

export { FileObservationHandler, DEFAULT_MAX_LOG_BYTES, defaultLogPath } from './file-handler.js';
export type { FileHandlerOptions } from './file-handler.js';
export { SqliteObservationHandler } from './sqlite-handler.js';
export type { SqliteHandlerOptions, ListOptions } from './sqlite-handler.js';
export type { ObservationRecord } from './records.js';

export { MeterRegistry, Counter, Timer, LongTaskTimer, DEFAULT_BUCKETS } from './metrics/meter-registry.js';
export type { Meter, MeterId, Tags, HistogramBucket, LongTaskSample } from './metrics/meter-registry.js';
export { MeterObservationHandler } from './metrics/meter-handler.js';

export { SpanObservationHandler } from './spans/span-handler.js';
export type { SpanHandlerOptions } from './spans/span-handler.js';
export { SpanRecorder } from './spans/span-recorder.js';
export type { FinishedSpan, SpanEvent, SpanSink } from './spans/span-recorder.js';

export {
  getDefaultConfig,
  loadConfig,
  validateConfig,
  getConfigPath,
  getVigilDir,
  HANDLER_NAMES,
} from './config.js';
export type { ObservabilityConfig, HandlerName } from './config.js';

export { createObservability } from './registry.js';
export type { ObservabilityRuntime } from './registry.js';
