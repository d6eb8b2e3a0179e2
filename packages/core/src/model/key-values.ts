/**
 * Key values: the tags attached to an observation.
 *
 * Low-cardinality key values end up as metric dimensions, so their value set
 * must stay bounded. High-cardinality key values (user ids, URLs) only reach
 * handlers that can afford them, such as span recorders.
 */

import { KeyValueError } from '../errors/index.js';

export interface KeyValue {
  readonly key: string;
  readonly value: string;
}

export type KeyValueValidator = (value: string) => boolean;

/** Placeholder value for a key whose value is unknown. */
export const NONE_VALUE = 'none';

export const KeyValue = {
  NONE_VALUE,

  of(key: string, value: string, validator?: KeyValueValidator): KeyValue {
    if (key.length === 0) {
      throw new KeyValueError('Key value key must not be empty', { value });
    }
    if (validator && !validator(value)) {
      throw new KeyValueError(`Value "${value}" for key "${key}" was rejected by its validator`, {
        key,
        value,
      });
    }
    return { key, value };
  },
};

function isKeyValue(item: KeyValue | Readonly<Record<string, string>>): item is KeyValue {
  const keys = Object.keys(item);
  return (
    keys.length === 2 &&
    keys.includes('key') &&
    keys.includes('value') &&
    typeof item['key'] === 'string' &&
    typeof item['value'] === 'string'
  );
}

function compareKeys(a: KeyValue, b: KeyValue): number {
  if (a.key < b.key) return -1;
  if (a.key > b.key) return 1;
  return 0;
}

/**
 * Immutable, key-sorted set of key values. Adding a key that is already
 * present replaces its value.
 */
export class KeyValues implements Iterable<KeyValue> {
  private static readonly EMPTY = new KeyValues([]);

  private readonly entries: readonly KeyValue[];

  private constructor(entries: readonly KeyValue[]) {
    this.entries = entries;
  }

  static empty(): KeyValues {
    return KeyValues.EMPTY;
  }

  /**
   * `of(record)` or `of(...keyValues)`. A lone object holding exactly a
   * string `key` and a string `value` is read as one key value; use
   * {@link KeyValues.fromRecord} for a record with those two keys.
   */
  static of(record: Readonly<Record<string, string>>): KeyValues;
  static of(...keyValues: KeyValue[]): KeyValues;
  static of(...args: Array<KeyValue | Readonly<Record<string, string>>>): KeyValues {
    const [first] = args;
    if (args.length === 1 && first !== undefined && !isKeyValue(first)) {
      return KeyValues.fromRecord(first);
    }
    const keyValues = args.filter(isKeyValue);
    if (keyValues.length !== args.length) {
      throw new KeyValueError('Key values must be given as one record or as key values only');
    }
    return KeyValues.EMPTY.and(...keyValues);
  }

  static fromRecord(record: Readonly<Record<string, string>>): KeyValues {
    return KeyValues.EMPTY.and(...Object.entries(record).map(([k, v]) => KeyValue.of(k, v)));
  }

  and(...keyValues: Array<KeyValue | KeyValues>): KeyValues {
    if (keyValues.length === 0) return this;

    const merged = new Map<string, KeyValue>();
    for (const kv of this.entries) merged.set(kv.key, kv);
    for (const item of keyValues) {
      if (item instanceof KeyValues) {
        for (const kv of item) merged.set(kv.key, kv);
      } else {
        merged.set(item.key, item);
      }
    }
    return new KeyValues([...merged.values()].sort(compareKeys));
  }

  without(...keys: string[]): KeyValues {
    const drop = new Set(keys);
    const kept = this.entries.filter((kv) => !drop.has(kv.key));
    return kept.length === this.entries.length ? this : new KeyValues(kept);
  }

  get(key: string): KeyValue | undefined {
    return this.entries.find((kv) => kv.key === key);
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  get size(): number {
    return this.entries.length;
  }

  [Symbol.iterator](): Iterator<KeyValue> {
    return this.entries[Symbol.iterator]();
  }

  toArray(): KeyValue[] {
    return [...this.entries];
  }

  toRecord(): Record<string, string> {
    const out: Record<string, string> = {};
    for (const kv of this.entries) out[kv.key] = kv.value;
    return out;
  }

  toString(): string {
    return `[${this.entries.map((kv) => `${kv.key}='${kv.value}'`).join(', ')}]`;
  }
}
