/**
 * Observability bootstrap: builds a ready-to-use ObservationRegistry from
 * configuration.
 *
 * Registers one handler per configured name, a predicate for the disabled
 * observation prefixes and a filter adding the common key values. The
 * returned runtime exposes the backing stores (meters, spans, database) and
 * flushes or closes every handler it created.
 */

import { KeyValues } from '@vigil/core';
import type { IObservationHandler } from '@vigil/core';
import { ObservationRegistry } from '@vigil/observation';
import { ConsoleObservationHandler } from './console-handler.js';
import type { ObservabilityConfig } from './config.js';
import { FileObservationHandler } from './file-handler.js';
import { InMemoryObservationHandler } from './memory-handler.js';
import { MeterObservationHandler } from './metrics/meter-handler.js';
import { MeterRegistry } from './metrics/meter-registry.js';
import { SpanObservationHandler } from './spans/span-handler.js';
import { SpanRecorder } from './spans/span-recorder.js';
import { SqliteObservationHandler } from './sqlite-handler.js';

export interface ObservabilityRuntime {
  registry: ObservationRegistry;
  handlers: IObservationHandler[];
  meterRegistry?: MeterRegistry;
  spanRecorder?: SpanRecorder;
  store?: SqliteObservationHandler;
  recorder?: InMemoryObservationHandler;
  flush(): Promise<void>;
  close(): Promise<void>;
}

/**
 * Build an observation registry from configuration.
 *
 * - Unknown handler names are skipped with a warning.
 * - `noop` registers nothing; with no handlers the registry stays a no-op.
 */
export function createObservability(
  config: Pick<ObservabilityConfig, 'handlers'> & Partial<ObservabilityConfig>,
): ObservabilityRuntime {
  const registry = ObservationRegistry.create();
  const runtime: ObservabilityRuntime = {
    registry,
    handlers: [],
    flush: async () => {
      await settleAll(runtime.handlers, 'flush', (h) => h.flush?.());
    },
    close: async () => {
      await settleAll(runtime.handlers, 'close', (h) => h.close?.());
    },
  };

  const seen = new Set<string>();
  for (const name of config.handlers) {
    if (seen.has(name)) continue;
    seen.add(name);

    switch (name) {
      case 'console':
        runtime.handlers.push(new ConsoleObservationHandler(config.logLevel ?? 'info'));
        break;
      case 'metrics':
        runtime.meterRegistry = new MeterRegistry();
        runtime.handlers.push(new MeterObservationHandler(runtime.meterRegistry));
        break;
      case 'tracing':
        runtime.spanRecorder = new SpanRecorder();
        runtime.handlers.push(new SpanObservationHandler(runtime.spanRecorder));
        break;
      case 'file':
        runtime.handlers.push(
          new FileObservationHandler({ filePath: config.logPath, maxBytes: config.maxLogSize }),
        );
        break;
      case 'sqlite':
        runtime.store = new SqliteObservationHandler({ dbPath: config.dbPath ?? ':memory:' });
        runtime.handlers.push(runtime.store);
        break;
      case 'memory':
        runtime.recorder = new InMemoryObservationHandler();
        runtime.handlers.push(runtime.recorder);
        break;
      case 'noop':
        break;
      default:
        // Unknown names are skipped.
        console.warn(`[observability] unknown handler "${name}", skipping`);
        break;
    }
  }

  const observationConfig = registry.observationConfig();
  for (const handler of runtime.handlers) {
    observationConfig.observationHandler(handler);
  }

  const disabled = config.disabledObservations ?? [];
  if (disabled.length > 0) {
    observationConfig.observationPredicate(
      (name) => !disabled.some((prefix) => name.startsWith(prefix)),
    );
  }

  const common = config.commonKeyValues ?? {};
  if (Object.keys(common).length > 0) {
    const commonKeyValues = KeyValues.fromRecord(common);
    // Values set by the instrumented code take precedence.
    observationConfig.observationFilter((context) => {
      for (const keyValue of commonKeyValues) {
        if (!context.getLowCardinalityKeyValue(keyValue.key)) {
          context.addLowCardinalityKeyValue(keyValue);
        }
      }
      return context;
    });
  }

  return runtime;
}

async function settleAll(
  handlers: IObservationHandler[],
  what: string,
  fn: (handler: IObservationHandler) => Promise<void> | undefined,
): Promise<void> {
  const results = handlers.map(async (handler) => {
    try {
      await fn(handler);
    } catch (err) {
      console.error(`[observability] ${what} error in handler ${handler.id ?? '?'}:`, err);
    }
  });
  await Promise.all(results);
}
