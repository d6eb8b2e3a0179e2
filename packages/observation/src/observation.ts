/**
 * Observation: a named, context-carrying unit of work whose lifecycle
 * (start, error, event, scope, stop) is reported to the registry's handlers.
 *
 * ```ts
 * const observation = Observation.createNotStarted('order.checkout', registry)
 *   .lowCardinalityKeyValue('payment', 'card');
 * await observation.observeAsync(() => checkout(order));
 * ```
 */

import {
  KeyValue,
  KeyValues,
  NONE_VALUE,
  ObservationContext,
  ObservationError,
  toError,
} from '@vigil/core';
import type {
  ContextView,
  IObservationConvention,
  IObservationHandler,
  ObservationEvent,
  ObservationView,
} from '@vigil/core';
import { ObservationRegistry } from './registry.js';
import { NOOP_SCOPE_FACTORY, SimpleObservationScope } from './scope.js';
import type { ObservationScope, ScopeOwner } from './scope.js';

export type ContextSupplier<C extends ObservationContext = ObservationContext> = () => C;

export interface Observation extends ObservationView {
  contextualName(contextualName: string | null): this;
  parentObservation(parent: ObservationView | null): this;
  lowCardinalityKeyValue(key: string, value: string): this;
  lowCardinalityKeyValue(keyValue: KeyValue): this;
  lowCardinalityKeyValues(keyValues: KeyValues): this;
  highCardinalityKeyValue(key: string, value: string): this;
  highCardinalityKeyValue(keyValue: KeyValue): this;
  highCardinalityKeyValues(keyValues: KeyValues): this;
  observationConvention(convention: IObservationConvention): this;
  error(error: unknown): this;
  event(event: ObservationEvent): this;
  start(): this;
  stop(): void;
  openScope(): ObservationScope;
  observe<T>(fn: () => T): T;
  observeAsync<T>(fn: () => Promise<T>): Promise<T>;
  getContext(): ObservationContext;
  isNoop(): boolean;
}

export interface ObservationOptions {
  convention?: IObservationConvention | null;
  /** Low-cardinality keys a documented observation must carry by stop. */
  requiredLowCardinalityKeys?: readonly string[];
}

type Phase = 'created' | 'started' | 'stopped';

// ---------------------------------------------------------------------------
// SimpleObservation
// ---------------------------------------------------------------------------

export class SimpleObservation implements ScopeOwner {
  private phase: Phase = 'created';
  private handlers: IObservationHandler[] = [];
  private convention: IObservationConvention | null;
  private readonly requiredKeys: readonly string[];

  constructor(
    private readonly name: string,
    private readonly registry: ObservationRegistry,
    private context: ObservationContext,
    options: ObservationOptions = {},
  ) {
    this.context.name = name;
    this.context.parentObservation ??= registry.getCurrentObservation();
    this.convention =
      options.convention ?? registry.observationConfig().getObservationConvention(context, null);
    this.requiredKeys = options.requiredLowCardinalityKeys ?? [];
  }

  // ---- customization ------------------------------------------------------

  contextualName(contextualName: string | null): this {
    this.context.contextualName = contextualName;
    return this;
  }

  parentObservation(parent: ObservationView | null): this {
    this.context.parentObservation = parent;
    return this;
  }

  lowCardinalityKeyValue(key: string, value: string): this;
  lowCardinalityKeyValue(keyValue: KeyValue): this;
  lowCardinalityKeyValue(keyOrKeyValue: string | KeyValue, value?: string): this {
    this.context.addLowCardinalityKeyValue(asKeyValue(keyOrKeyValue, value));
    return this;
  }

  lowCardinalityKeyValues(keyValues: KeyValues): this {
    this.context.addLowCardinalityKeyValues(keyValues);
    return this;
  }

  highCardinalityKeyValue(key: string, value: string): this;
  highCardinalityKeyValue(keyValue: KeyValue): this;
  highCardinalityKeyValue(keyOrKeyValue: string | KeyValue, value?: string): this {
    this.context.addHighCardinalityKeyValue(asKeyValue(keyOrKeyValue, value));
    return this;
  }

  highCardinalityKeyValues(keyValues: KeyValues): this {
    this.context.addHighCardinalityKeyValues(keyValues);
    return this;
  }

  observationConvention(convention: IObservationConvention): this {
    if (convention.supportsContext(this.context)) {
      this.convention = convention;
    }
    return this;
  }

  // ---- lifecycle ----------------------------------------------------------

  start(): this {
    if (this.phase !== 'created') {
      console.warn(`[observation] "${this.name}" has already been started`);
      return this;
    }
    this.handlers = this.registry
      .observationConfig()
      .getObservationHandlers()
      .filter((handler) => handler.supportsContext(this.context));
    this.phase = 'started';
    this.notify('start', (h, ctx) => h.onStart?.(ctx));
    return this;
  }

  error(error: unknown): this {
    if (this.phase === 'stopped') {
      console.warn(`[observation] "${this.name}" is stopped; error ignored`);
      return this;
    }
    this.context.error = toError(error);
    if (this.phase === 'started') {
      this.notify('error', (h, ctx) => h.onError?.(ctx));
    }
    return this;
  }

  event(event: ObservationEvent): this {
    if (this.phase !== 'started') {
      console.warn(`[observation] "${this.name}" is not running; event "${event.name}" ignored`);
      return this;
    }
    this.notify('event', (h, ctx) => h.onEvent?.(event, ctx));
    return this;
  }

  stop(): void {
    if (this.phase !== 'started') {
      const reason = this.phase === 'created' ? 'was never started' : 'has already been stopped';
      console.warn(`[observation] "${this.name}" ${reason}; stop ignored`);
      return;
    }

    this.applyConvention();
    for (const filter of this.registry.observationConfig().getObservationFilters()) {
      this.context = filter(this.context);
    }
    this.checkRequiredKeys();

    this.phase = 'stopped';
    this.notify('stop', (h, ctx) => h.onStop?.(ctx), true);
  }

  openScope(): ObservationScope {
    const scope = new SimpleObservationScope(this.registry, this);
    this.notify('scope open', (h, ctx) => h.onScopeOpened?.(ctx));
    this.registry.setCurrentObservationScope(scope);
    return scope;
  }

  observe<T>(fn: () => T): T {
    this.start();
    const scope = this.openScope();
    try {
      return fn();
    } catch (err) {
      this.error(err);
      throw err;
    } finally {
      scope.close();
      this.stop();
    }
  }

  async observeAsync<T>(fn: () => Promise<T>): Promise<T> {
    this.start();
    const scope = new SimpleObservationScope(this.registry, this);
    this.notify('scope open', (h, ctx) => h.onScopeOpened?.(ctx));
    try {
      return await this.registry.runInScope(scope, fn);
    } catch (err) {
      this.error(err);
      throw err;
    } finally {
      scope.close();
      this.stop();
    }
  }

  // ---- views --------------------------------------------------------------

  getContext(): ObservationContext {
    return this.context;
  }

  getContextView(): ContextView {
    return this.context;
  }

  isNoop(): boolean {
    return false;
  }

  // ---- scope hooks --------------------------------------------------------

  /** @internal */
  notifyScopeClosed(): void {
    this.notify('scope close', (h, ctx) => h.onScopeClosed?.(ctx), true);
  }

  /** @internal */
  notifyScopeReset(): void {
    this.notify('scope reset', (h, ctx) => h.onScopeReset?.(ctx));
  }

  toString(): string {
    return `{${this.context.toString()}}`;
  }

  // ---- helpers ------------------------------------------------------------

  private applyConvention(): void {
    const convention = this.convention;
    if (!convention) return;

    const contextualName = convention.getContextualName?.(this.context);
    if (contextualName) {
      this.context.contextualName = contextualName;
    }
    const low = convention.getLowCardinalityKeyValues?.(this.context);
    if (low) this.context.addLowCardinalityKeyValues(low);
    const high = convention.getHighCardinalityKeyValues?.(this.context);
    if (high) this.context.addHighCardinalityKeyValues(high);
  }

  private checkRequiredKeys(): void {
    const missing = this.requiredKeys.filter((key) => !this.context.getLowCardinalityKeyValue(key));
    if (missing.length > 0) {
      console.warn(
        `[observation] "${this.name}" stopped without required key values: ${missing.join(', ')}`,
      );
    }
  }

  /**
   * Invoke `call` on every selected handler. A throwing handler is logged and
   * skipped so it can neither break its siblings nor the instrumented code.
   */
  private notify(
    stage: string,
    call: (handler: IObservationHandler, context: ObservationContext) => void,
    reverse = false,
  ): void {
    const handlers = reverse ? [...this.handlers].reverse() : this.handlers;
    for (const handler of handlers) {
      try {
        call(handler, this.context);
      } catch (err) {
        console.error(
          `[observation] handler ${handler.id ?? handler.constructor.name} threw on ${stage} of "${this.name}":`,
          err,
        );
      }
    }
  }
}

function asKeyValue(keyOrKeyValue: string | KeyValue, value: string | undefined): KeyValue {
  return typeof keyOrKeyValue === 'string'
    ? KeyValue.of(keyOrKeyValue, value ?? NONE_VALUE)
    : keyOrKeyValue;
}

// ---------------------------------------------------------------------------
// NoopObservation
// ---------------------------------------------------------------------------

class NoopObservation implements Observation {
  contextualName(_contextualName: string | null): this {
    return this;
  }

  parentObservation(_parent: ObservationView | null): this {
    return this;
  }

  lowCardinalityKeyValue(_keyOrKeyValue: string | KeyValue, _value?: string): this {
    return this;
  }

  lowCardinalityKeyValues(_keyValues: KeyValues): this {
    return this;
  }

  highCardinalityKeyValue(_keyOrKeyValue: string | KeyValue, _value?: string): this {
    return this;
  }

  highCardinalityKeyValues(_keyValues: KeyValues): this {
    return this;
  }

  observationConvention(_convention: IObservationConvention): this {
    return this;
  }

  error(_error: unknown): this {
    return this;
  }

  event(_event: ObservationEvent): this {
    return this;
  }

  start(): this {
    return this;
  }

  stop(): void {
    // intentionally empty
  }

  openScope(): ObservationScope {
    return NOOP_SCOPE_FACTORY.create(this);
  }

  observe<T>(fn: () => T): T {
    return fn();
  }

  observeAsync<T>(fn: () => Promise<T>): Promise<T> {
    return fn();
  }

  /** A fresh, unattached context; writes to it go nowhere. */
  getContext(): ObservationContext {
    return new ObservationContext();
  }

  getContextView(): ContextView {
    return this.getContext();
  }

  isNoop(): boolean {
    return true;
  }
}

const NOOP_OBSERVATION: Observation = new NoopObservation();

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

/**
 * Create an observation without starting it. Returns the no-op observation
 * when the registry is a no-op or one of its predicates rejects the name.
 *
 * The convention form takes its name and key values from a convention:
 * the custom one when it supports the context, else the first matching
 * global convention, else `defaultConvention`. A name already set on the
 * supplied context is used when the convention gives none.
 */
function createNotStarted(
  name: string,
  registry: ObservationRegistry,
  contextSupplier?: ContextSupplier,
): Observation;
function createNotStarted<C extends ObservationContext>(
  customConvention: IObservationConvention | null,
  defaultConvention: IObservationConvention,
  contextSupplier: ContextSupplier<C>,
  registry: ObservationRegistry,
  options?: Omit<ObservationOptions, 'convention'>,
): Observation;
function createNotStarted(
  nameOrConvention: string | IObservationConvention | null,
  registryOrDefault: ObservationRegistry | IObservationConvention,
  contextSupplier: ContextSupplier = () => new ObservationContext(),
  registry?: ObservationRegistry,
  options: Omit<ObservationOptions, 'convention'> = {},
): Observation {
  if (typeof nameOrConvention === 'string') {
    if (!(registryOrDefault instanceof ObservationRegistry)) {
      throw new ObservationError('An observation registry is required', nameOrConvention);
    }
    return createNamed(nameOrConvention, registryOrDefault, contextSupplier);
  }
  if (registryOrDefault instanceof ObservationRegistry || !registry) {
    throw new ObservationError(
      'A default convention and an observation registry are required',
      '(unnamed)',
    );
  }
  return createWithConvention(nameOrConvention, registryOrDefault, contextSupplier, registry, options);
}

function createNamed(
  name: string,
  registry: ObservationRegistry,
  contextSupplier: ContextSupplier,
): Observation {
  if (registry.isNoop()) return NOOP_OBSERVATION;
  const context = contextSupplier();
  context.name = name;
  if (!registry.observationConfig().isObservationEnabled(name, context)) {
    return NOOP_OBSERVATION;
  }
  return new SimpleObservation(name, registry, context);
}

function createWithConvention(
  customConvention: IObservationConvention | null,
  defaultConvention: IObservationConvention,
  contextSupplier: ContextSupplier,
  registry: ObservationRegistry,
  options: Omit<ObservationOptions, 'convention'>,
): Observation {
  if (registry.isNoop()) return NOOP_OBSERVATION;
  const context = contextSupplier();
  const convention =
    customConvention && customConvention.supportsContext(context)
      ? customConvention
      : registry.observationConfig().getObservationConvention(context, defaultConvention);

  const name = convention?.getName?.() ?? context.name;
  if (!name) {
    throw new ObservationError('Observation convention did not provide a name', '(unnamed)');
  }
  context.name = name;
  if (!registry.observationConfig().isObservationEnabled(name, context)) {
    return NOOP_OBSERVATION;
  }
  return new SimpleObservation(name, registry, context, { ...options, convention });
}

function start(
  name: string,
  registry: ObservationRegistry,
  contextSupplier?: ContextSupplier,
): Observation {
  return createNotStarted(name, registry, contextSupplier).start();
}

export const Observation = {
  NOOP: NOOP_OBSERVATION,
  createNotStarted,
  start,
};
