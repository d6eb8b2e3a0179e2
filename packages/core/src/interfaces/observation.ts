/**
 * Observation contracts: handlers, conventions, predicates and filters.
 *
 * An observation notifies every handler that supports its context at each
 * lifecycle point: start, error, event, scope open/close/reset and stop.
 * Handlers do the side work (metrics, spans, logs); conventions derive the
 * name and key values from the context; predicates decide whether an
 * observation is recorded at all; filters rewrite the context before stop.
 */

import type { ContextView, ObservationContext } from '../model/context.js';
import type { KeyValues } from '../model/key-values.js';

/** What a context knows about the observation that owns it. */
export interface ObservationView {
  getContextView(): ContextView;
}

export interface ObservationEvent {
  readonly name: string;
  readonly contextualName: string;
  /** Epoch milliseconds at which the event was created. */
  readonly wallTime: number;
}

export const ObservationEvent = {
  of(name: string, contextualName: string = name): ObservationEvent {
    return { name, contextualName, wallTime: Date.now() };
  },
};

export interface IObservationHandler<C extends ObservationContext = ObservationContext> {
  /** Optional human-readable id, used in diagnostics. */
  readonly id?: string;

  supportsContext(context: ObservationContext): boolean;

  onStart?(context: C): void;
  onError?(context: C): void;
  onEvent?(event: ObservationEvent, context: C): void;
  onScopeOpened?(context: C): void;
  onScopeClosed?(context: C): void;
  onScopeReset?(context: C): void;
  onStop?(context: C): void;

  flush?(): Promise<void>;
  close?(): Promise<void>;
}

export type ObservationPredicate = (name: string, context: ContextView) => boolean;

export type ObservationFilter = (context: ObservationContext) => ObservationContext;

export interface IObservationConvention<C extends ObservationContext = ObservationContext> {
  supportsContext(context: ObservationContext): boolean;
  getName?(): string | null;
  getContextualName?(context: C): string | null;
  getLowCardinalityKeyValues?(context: C): KeyValues;
  getHighCardinalityKeyValues?(context: C): KeyValues;
}
