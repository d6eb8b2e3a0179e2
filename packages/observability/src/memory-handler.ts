/**
 * InMemoryObservationHandler: keeps every lifecycle callback in arrival
 * order, plus the contexts of stopped observations. Meant for tests and for
 * quick inspection while wiring instrumentation.
 */

import type { IObservationHandler, ObservationContext, ObservationEvent } from '@vigil/core';

export type RecordedKind =
  | 'start'
  | 'error'
  | 'event'
  | 'scope-opened'
  | 'scope-closed'
  | 'scope-reset'
  | 'stop';

export interface RecordedCallback {
  kind: RecordedKind;
  name: string | null;
  contextualName: string | null;
  keyValues: Record<string, string>;
  error?: Error;
  event?: ObservationEvent;
}

export class InMemoryObservationHandler implements IObservationHandler {
  readonly id = 'memory';
  private readonly recorded: RecordedCallback[] = [];
  private readonly stopped: ObservationContext[] = [];

  constructor(private readonly accepts: (context: ObservationContext) => boolean = () => true) {}

  supportsContext(context: ObservationContext): boolean {
    return this.accepts(context);
  }

  onStart(context: ObservationContext): void {
    this.record('start', context);
  }

  onError(context: ObservationContext): void {
    this.record('error', context);
  }

  onEvent(event: ObservationEvent, context: ObservationContext): void {
    this.record('event', context, event);
  }

  onScopeOpened(context: ObservationContext): void {
    this.record('scope-opened', context);
  }

  onScopeClosed(context: ObservationContext): void {
    this.record('scope-closed', context);
  }

  onScopeReset(context: ObservationContext): void {
    this.record('scope-reset', context);
  }

  onStop(context: ObservationContext): void {
    this.record('stop', context);
    this.stopped.push(context);
  }

  /** Every callback received so far. */
  callbacks(): readonly RecordedCallback[] {
    return this.recorded;
  }

  /** The kinds of callbacks received, e.g. `['start', 'stop']`. */
  kinds(): RecordedKind[] {
    return this.recorded.map((r) => r.kind);
  }

  stoppedContexts(): readonly ObservationContext[] {
    return this.stopped;
  }

  clear(): void {
    this.recorded.length = 0;
    this.stopped.length = 0;
  }

  private record(kind: RecordedKind, context: ObservationContext, event?: ObservationEvent): void {
    const entry: RecordedCallback = {
      kind,
      name: context.name,
      contextualName: context.contextualName,
      keyValues: context.getAllKeyValues().toRecord(),
    };
    if (context.error) entry.error = context.error;
    if (event) entry.event = event;
    this.recorded.push(entry);
  }
}
