/**
 * MeterObservationHandler: turns observations into meters.
 *
 * For an observation named `n`:
 *   - `n.active` long task timer counts observations in flight;
 *   - `n` timer records each stopped observation, tagged with its
 *     low-cardinality key values plus `error` (the error name, or "none");
 *   - `n.<event>` counter counts every event signalled on it.
 */

import { NONE_VALUE, contextKey } from '@vigil/core';
import type { IObservationHandler, ObservationContext, ObservationEvent } from '@vigil/core';
import type { LongTaskSample, MeterRegistry, Tags } from './meter-registry.js';

interface MeterSample {
  startedAt: number;
  longTask: LongTaskSample;
}

const SAMPLE = contextKey<MeterSample>('meter.sample');

export class MeterObservationHandler implements IObservationHandler {
  readonly id = 'metrics';

  constructor(private readonly meterRegistry: MeterRegistry) {}

  supportsContext(context: ObservationContext): boolean {
    return context.name !== null;
  }

  onStart(context: ObservationContext): void {
    const name = this.nameOf(context);
    const longTask = this.meterRegistry.longTaskTimer(`${name}.active`, this.tags(context)).start();
    context.put(SAMPLE, { startedAt: this.meterRegistry.clock(), longTask });
  }

  onEvent(event: ObservationEvent, context: ObservationContext): void {
    this.meterRegistry.counter(`${this.nameOf(context)}.${event.name}`, this.tags(context)).increment();
  }

  onStop(context: ObservationContext): void {
    const sample = context.get(SAMPLE);
    if (!sample) return;

    const tags: Tags = {
      ...this.tags(context),
      error: context.error ? context.error.name : NONE_VALUE,
    };
    const elapsed = this.meterRegistry.clock() - sample.startedAt;
    this.meterRegistry.timer(this.nameOf(context), tags).record(elapsed);
    sample.longTask.stop();
    context.remove(SAMPLE);
  }

  private nameOf(context: ObservationContext): string {
    return context.name ?? 'unnamed';
  }

  private tags(context: ObservationContext): Tags {
    return context.getLowCardinalityKeyValues().toRecord();
  }
}
