/**
 * ObservationContext: the mutable state carried by one observation.
 *
 * Handlers exchange data through typed context keys (a meter handler keeps
 * its timer sample there, a span handler its span), while the instrumented
 * code contributes key values and, on failure, the captured error.
 */

import { ObservationError } from '../errors/index.js';
import type { ObservationView } from '../interfaces/observation.js';
import { KeyValue, KeyValues } from './key-values.js';

// ---------------------------------------------------------------------------
// Typed keys
// ---------------------------------------------------------------------------

/**
 * Identity-keyed handle for a value of type `T` stored on a context.
 * Two keys with the same description are still distinct keys.
 */
export class ContextKey<T> {
  readonly description: string;
  private readonly slots = new WeakMap<object, { readonly value: T }>();

  constructor(description: string) {
    this.description = description;
  }

  /** @internal */
  slot(owner: object): { readonly value: T } | undefined {
    return this.slots.get(owner);
  }

  /** @internal */
  write(owner: object, value: T): void {
    this.slots.set(owner, { value });
  }

  /** @internal */
  erase(owner: object): boolean {
    return this.slots.delete(owner);
  }

  toString(): string {
    return `ContextKey(${this.description})`;
  }
}

export function contextKey<T>(description: string): ContextKey<T> {
  return new ContextKey<T>(description);
}

// ---------------------------------------------------------------------------
// Read-only view
// ---------------------------------------------------------------------------

export interface ContextView {
  readonly name: string | null;
  readonly contextualName: string | null;
  readonly parentObservation: ObservationView | null;
  readonly error: Error | null;
  get<T>(key: ContextKey<T>): T | undefined;
  getRequired<T>(key: ContextKey<T>): T;
  getOrDefault<T>(key: ContextKey<T>, defaultValue: T): T;
  containsKey(key: ContextKey<unknown>): boolean;
  getLowCardinalityKeyValues(): KeyValues;
  getHighCardinalityKeyValues(): KeyValues;
  getLowCardinalityKeyValue(key: string): KeyValue | undefined;
  getHighCardinalityKeyValue(key: string): KeyValue | undefined;
  getAllKeyValues(): KeyValues;
}

// ---------------------------------------------------------------------------
// ObservationContext
// ---------------------------------------------------------------------------

export class ObservationContext implements ContextView {
  name: string | null = null;
  contextualName: string | null = null;
  parentObservation: ObservationView | null = null;
  error: Error | null = null;

  private lowCardinality = KeyValues.empty();
  private highCardinality = KeyValues.empty();
  private readonly keys = new Set<ContextKey<unknown>>();

  // ---- typed values -------------------------------------------------------

  put<T>(key: ContextKey<T>, value: T): this {
    key.write(this, value);
    this.keys.add(key);
    return this;
  }

  get<T>(key: ContextKey<T>): T | undefined {
    return key.slot(this)?.value;
  }

  getRequired<T>(key: ContextKey<T>): T {
    const slot = key.slot(this);
    if (!slot) {
      throw new ObservationError(
        `Context does not contain a value for ${key.description}`,
        this.name ?? '(unnamed)',
        { key: key.description },
      );
    }
    return slot.value;
  }

  getOrDefault<T>(key: ContextKey<T>, defaultValue: T): T {
    const slot = key.slot(this);
    return slot ? slot.value : defaultValue;
  }

  computeIfAbsent<T>(key: ContextKey<T>, compute: () => T): T {
    const slot = key.slot(this);
    if (slot) return slot.value;
    const value = compute();
    this.put(key, value);
    return value;
  }

  containsKey(key: ContextKey<unknown>): boolean {
    return key.slot(this) !== undefined;
  }

  remove(key: ContextKey<unknown>): boolean {
    this.keys.delete(key);
    return key.erase(this);
  }

  clear(): void {
    for (const key of this.keys) key.erase(this);
    this.keys.clear();
  }

  // ---- key values ---------------------------------------------------------

  addLowCardinalityKeyValue(keyValue: KeyValue): this {
    this.lowCardinality = this.lowCardinality.and(keyValue);
    return this;
  }

  addLowCardinalityKeyValues(keyValues: KeyValues): this {
    this.lowCardinality = this.lowCardinality.and(keyValues);
    return this;
  }

  removeLowCardinalityKeyValue(key: string): this {
    return this.removeLowCardinalityKeyValues(key);
  }

  removeLowCardinalityKeyValues(...keys: string[]): this {
    this.lowCardinality = this.lowCardinality.without(...keys);
    return this;
  }

  addHighCardinalityKeyValue(keyValue: KeyValue): this {
    this.highCardinality = this.highCardinality.and(keyValue);
    return this;
  }

  addHighCardinalityKeyValues(keyValues: KeyValues): this {
    this.highCardinality = this.highCardinality.and(keyValues);
    return this;
  }

  removeHighCardinalityKeyValue(key: string): this {
    return this.removeHighCardinalityKeyValues(key);
  }

  removeHighCardinalityKeyValues(...keys: string[]): this {
    this.highCardinality = this.highCardinality.without(...keys);
    return this;
  }

  getLowCardinalityKeyValues(): KeyValues {
    return this.lowCardinality;
  }

  getHighCardinalityKeyValues(): KeyValues {
    return this.highCardinality;
  }

  getLowCardinalityKeyValue(key: string): KeyValue | undefined {
    return this.lowCardinality.get(key);
  }

  getHighCardinalityKeyValue(key: string): KeyValue | undefined {
    return this.highCardinality.get(key);
  }

  /** Union of both sets; a high-cardinality entry wins a key clash. */
  getAllKeyValues(): KeyValues {
    return this.lowCardinality.and(this.highCardinality);
  }

  toString(): string {
    return (
      `name='${this.name ?? ''}', contextualName='${this.contextualName ?? ''}', ` +
      `error='${this.error?.message ?? ''}', ` +
      `lowCardinalityKeyValues=${this.lowCardinality.toString()}, ` +
      `highCardinalityKeyValues=${this.highCardinality.toString()}`
    );
  }
}
