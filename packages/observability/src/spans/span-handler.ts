/**
 * SpanObservationHandler: records each observation as a span.
 *
 * The span joins the trace of the parent observation's span when there is
 * one and starts a new trace otherwise. Observation events become span
 * events; every key value, low and high cardinality, becomes a span tag.
 */

import { contextKey, generateId } from '@vigil/core';
import type { IObservationHandler, ObservationContext, ObservationEvent } from '@vigil/core';
import type { FinishedSpan, SpanSink } from './span-recorder.js';

export interface SpanHandlerOptions {
  /** Epoch millisecond clock; defaults to Date.now. */
  clock?: () => number;
}

type OpenSpan = Omit<FinishedSpan, 'endTime' | 'tags'>;

const SPAN = contextKey<OpenSpan>('span.open');

export class SpanObservationHandler implements IObservationHandler {
  readonly id = 'tracing';
  private readonly clock: () => number;

  constructor(
    private readonly sink: SpanSink,
    options: SpanHandlerOptions = {},
  ) {
    this.clock = options.clock ?? Date.now;
  }

  supportsContext(_context: ObservationContext): boolean {
    return true;
  }

  onStart(context: ObservationContext): void {
    const parent = context.parentObservation?.getContextView().get(SPAN);
    context.put(SPAN, {
      traceId: parent?.traceId ?? generateId(16),
      spanId: generateId(8),
      parentSpanId: parent?.spanId ?? null,
      name: context.contextualName ?? context.name ?? 'unnamed',
      startTime: this.clock(),
      events: [],
      error: null,
    });
  }

  onEvent(event: ObservationEvent, context: ObservationContext): void {
    context.get(SPAN)?.events.push({ name: event.contextualName, timestamp: event.wallTime });
  }

  onError(context: ObservationContext): void {
    const span = context.get(SPAN);
    if (span && context.error) {
      span.error = { name: context.error.name, message: context.error.message };
    }
  }

  onStop(context: ObservationContext): void {
    const span = context.get(SPAN);
    if (!span) return;
    if (!span.error && context.error) {
      span.error = { name: context.error.name, message: context.error.message };
    }

    this.sink.record({
      ...span,
      // The contextual name may have been set by a convention at stop.
      name: context.contextualName ?? span.name,
      endTime: this.clock(),
      tags: context.getAllKeyValues().toRecord(),
    });
  }

  /** Trace and span id of the span for `context`, if it has one. */
  static currentSpanIds(context: ObservationContext): { traceId: string; spanId: string } | null {
    const span = context.get(SPAN);
    return span ? { traceId: span.traceId, spanId: span.spanId } : null;
  }
}
