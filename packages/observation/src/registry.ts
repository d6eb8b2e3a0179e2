/**
 * ObservationRegistry: holds the handlers, predicates, filters and global
 * conventions that every observation created against it consults, and
 * tracks which observation is current in each async flow.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import type {
  ContextView,
  IObservationConvention,
  IObservationHandler,
  ObservationContext,
  ObservationFilter,
  ObservationPredicate,
} from '@vigil/core';
import type { Observation } from './observation.js';
import type { ObservationScope } from './scope.js';

interface ScopeHolder {
  scope: ObservationScope | null;
}

// ---------------------------------------------------------------------------
// ObservationConfig
// ---------------------------------------------------------------------------

export class ObservationConfig {
  private readonly handlers: IObservationHandler[] = [];
  private readonly predicates: ObservationPredicate[] = [];
  private readonly filters: ObservationFilter[] = [];
  private readonly conventions: IObservationConvention[] = [];

  constructor(private readonly frozen = false) {}

  observationHandler(handler: IObservationHandler): this {
    if (this.guard('handler')) this.handlers.push(handler);
    return this;
  }

  observationPredicate(predicate: ObservationPredicate): this {
    if (this.guard('predicate')) this.predicates.push(predicate);
    return this;
  }

  observationFilter(filter: ObservationFilter): this {
    if (this.guard('filter')) this.filters.push(filter);
    return this;
  }

  observationConvention(convention: IObservationConvention): this {
    if (this.guard('convention')) this.conventions.push(convention);
    return this;
  }

  getObservationHandlers(): readonly IObservationHandler[] {
    return this.handlers;
  }

  getObservationPredicates(): readonly ObservationPredicate[] {
    return this.predicates;
  }

  getObservationFilters(): readonly ObservationFilter[] {
    return this.filters;
  }

  getObservationConventions(): readonly IObservationConvention[] {
    return this.conventions;
  }

  /** True when every registered predicate accepts the observation. */
  isObservationEnabled(name: string, context: ContextView): boolean {
    return this.predicates.every((predicate) => predicate(name, context));
  }

  /**
   * First global convention supporting the context, or `fallback` when none
   * does.
   */
  getObservationConvention(
    context: ObservationContext,
    fallback: IObservationConvention | null,
  ): IObservationConvention | null {
    return this.conventions.find((c) => c.supportsContext(context)) ?? fallback;
  }

  private guard(what: string): boolean {
    if (this.frozen) {
      console.warn(`[observation] ignoring ${what} registered on the no-op registry`);
      return false;
    }
    return true;
  }
}

// ---------------------------------------------------------------------------
// ObservationRegistry
// ---------------------------------------------------------------------------

export class ObservationRegistry {
  /** Registry that never records anything; observations created on it are no-ops. */
  static readonly NOOP = new ObservationRegistry(true);

  private readonly config: ObservationConfig;
  private readonly storage = new AsyncLocalStorage<ScopeHolder>();
  private readonly rootHolder: ScopeHolder = { scope: null };

  private constructor(private readonly noop: boolean) {
    this.config = new ObservationConfig(noop);
  }

  static create(): ObservationRegistry {
    return new ObservationRegistry(false);
  }

  observationConfig(): ObservationConfig {
    return this.config;
  }

  /** A registry without handlers has nobody to notify, so it is a no-op too. */
  isNoop(): boolean {
    return this.noop || this.config.getObservationHandlers().length === 0;
  }

  getCurrentObservationScope(): ObservationScope | null {
    return this.holder().scope;
  }

  getCurrentObservation(): Observation | null {
    return this.holder().scope?.observation ?? null;
  }

  /** @internal */
  setCurrentObservationScope(scope: ObservationScope | null): void {
    this.holder().scope = scope;
  }

  /**
   * Run `fn` in a fresh async flow whose current scope is `scope`. Scope
   * changes made inside never leak into the caller's flow.
   * @internal
   */
  runInScope<T>(scope: ObservationScope, fn: () => T): T {
    return this.storage.run({ scope }, fn);
  }

  private holder(): ScopeHolder {
    return this.storage.getStore() ?? this.rootHolder;
  }
}
