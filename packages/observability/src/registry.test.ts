import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { vi } from 'vitest';
import { Observation } from '@vigil/observation';
import { createObservability } from './registry.js';
import { ConsoleObservationHandler } from './console-handler.js';
import { FileObservationHandler } from './file-handler.js';
import { InMemoryObservationHandler } from './memory-handler.js';
import { MeterObservationHandler } from './metrics/meter-handler.js';
import { SpanObservationHandler } from './spans/span-handler.js';
import { SqliteObservationHandler } from './sqlite-handler.js';

describe('createObservability', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns a no-op registry when no handlers are configured', () => {
    const runtime = createObservability({ handlers: [] });
    expect(runtime.registry.isNoop()).toBe(true);
    expect(runtime.handlers).toEqual([]);
    expect(Observation.start('anything', runtime.registry)).toBe(Observation.NOOP);
  });

  it('registers nothing for "noop"', () => {
    const runtime = createObservability({ handlers: ['noop'] });
    expect(runtime.registry.isNoop()).toBe(true);
  });

  it('creates one handler per name, in order', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'vigil-registry-'));
    try {
      const runtime = createObservability({
        handlers: ['console', 'metrics', 'tracing', 'file', 'sqlite', 'memory'],
        logPath: join(dir, 'obs.jsonl'),
      });
      expect(runtime.handlers.map((h) => h.constructor)).toEqual([
        ConsoleObservationHandler,
        MeterObservationHandler,
        SpanObservationHandler,
        FileObservationHandler,
        SqliteObservationHandler,
        InMemoryObservationHandler,
      ]);
      expect(runtime.registry.observationConfig().getObservationHandlers()).toEqual(runtime.handlers);
      expect(runtime.meterRegistry).toBeDefined();
      expect(runtime.spanRecorder).toBeDefined();
      expect(runtime.store).toBe(runtime.handlers[4]);
      expect(runtime.recorder).toBe(runtime.handlers[5]);
      await runtime.close();
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('ignores duplicate handler names', () => {
    const runtime = createObservability({ handlers: ['memory', 'memory'] });
    expect(runtime.handlers).toHaveLength(1);
  });

  it('warns about unknown handler names and skips them', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const runtime = createObservability({ handlers: ['unknown-handler'] });
    expect(warnSpy).toHaveBeenCalledWith('[observability] unknown handler "unknown-handler", skipping');
    expect(runtime.registry.isNoop()).toBe(true);
  });

  it('passes logLevel to the console handler', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const runtime = createObservability({ handlers: ['console'], logLevel: 'error' });
    Observation.start('quiet', runtime.registry).stop();
    expect(logSpy).not.toHaveBeenCalled();
  });

  it('records through the created handlers', () => {
    const runtime = createObservability({ handlers: ['memory', 'metrics', 'tracing'] });
    Observation.createNotStarted('job.run', runtime.registry)
      .lowCardinalityKeyValue('queue', 'default')
      .observe(() => undefined);

    expect(runtime.recorder?.kinds()).toEqual(['start', 'scope-opened', 'scope-closed', 'stop']);
    expect(runtime.meterRegistry?.find('job.run', { queue: 'default', error: 'none' })).toBeDefined();
    expect(runtime.spanRecorder?.spans().map((s) => s.name)).toEqual(['job.run']);
  });

  it('disables observations by name prefix', () => {
    const runtime = createObservability({ handlers: ['memory'], disabledObservations: ['db.'] });
    expect(Observation.start('db.query', runtime.registry)).toBe(Observation.NOOP);
    Observation.start('http.request', runtime.registry).stop();
    expect(runtime.recorder?.stoppedContexts().map((c) => c.name)).toEqual(['http.request']);
  });

  it('adds common key values without overriding values set by the caller', () => {
    const runtime = createObservability({
      handlers: ['memory'],
      commonKeyValues: { region: 'eu-west', service: 'billing' },
    });
    Observation.start('invoice.send', runtime.registry).lowCardinalityKeyValue('region', 'us-east').stop();

    const [context] = runtime.recorder?.stoppedContexts() ?? [];
    expect(context?.getLowCardinalityKeyValues().toRecord()).toEqual({
      region: 'us-east',
      service: 'billing',
    });
  });

  it('flush and close reach every handler and isolate failures', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const runtime = createObservability({ handlers: ['memory'] });
    const failing = {
      id: 'failing',
      supportsContext: () => true,
      flush: vi.fn(async () => {
        throw new Error('disk full');
      }),
      close: vi.fn(async () => undefined),
    };
    runtime.handlers.push(failing);

    await expect(runtime.flush()).resolves.toBeUndefined();
    await expect(runtime.close()).resolves.toBeUndefined();
    expect(failing.flush).toHaveBeenCalledTimes(1);
    expect(failing.close).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith('[observability] flush error in handler failing:', expect.any(Error));
  });
});
