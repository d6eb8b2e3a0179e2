import { ObservationError } from '../errors/index.js';
import { ObservationContext, contextKey } from './context.js';
import { KeyValue, KeyValues } from './key-values.js';

describe('ObservationContext typed values', () => {
  const USER = contextKey<string>('user');
  const ATTEMPTS = contextKey<number>('attempts');
  const OPTIONAL = contextKey<string | undefined>('optional');

  it('stores and reads values by key', () => {
    const ctx = new ObservationContext().put(USER, 'alice').put(ATTEMPTS, 3);
    expect(ctx.get(USER)).toBe('alice');
    expect(ctx.get(ATTEMPTS)).toBe(3);
  });

  it('keys with the same description are distinct', () => {
    const other = contextKey<string>('user');
    const ctx = new ObservationContext().put(USER, 'alice');
    expect(ctx.get(other)).toBeUndefined();
    expect(ctx.containsKey(other)).toBe(false);
  });

  it('values are isolated between contexts', () => {
    const a = new ObservationContext().put(USER, 'alice');
    const b = new ObservationContext();
    expect(a.get(USER)).toBe('alice');
    expect(b.get(USER)).toBeUndefined();
  });

  it('getRequired throws ObservationError when the value is absent', () => {
    const ctx = new ObservationContext();
    ctx.name = 'checkout';
    expect(() => ctx.getRequired(USER)).toThrow(ObservationError);
    expect(() => ctx.getRequired(USER)).toThrow('Context does not contain a value for user');
  });

  it('getRequired returns a stored undefined value', () => {
    const ctx = new ObservationContext().put(OPTIONAL, undefined);
    expect(ctx.containsKey(OPTIONAL)).toBe(true);
    expect(ctx.getRequired(OPTIONAL)).toBeUndefined();
  });

  it('getOrDefault falls back when absent', () => {
    const ctx = new ObservationContext();
    expect(ctx.getOrDefault(ATTEMPTS, 0)).toBe(0);
    ctx.put(ATTEMPTS, 2);
    expect(ctx.getOrDefault(ATTEMPTS, 0)).toBe(2);
  });

  it('computeIfAbsent computes once', () => {
    const ctx = new ObservationContext();
    let calls = 0;
    const compute = () => {
      calls++;
      return 7;
    };
    expect(ctx.computeIfAbsent(ATTEMPTS, compute)).toBe(7);
    expect(ctx.computeIfAbsent(ATTEMPTS, compute)).toBe(7);
    expect(calls).toBe(1);
  });

  it('remove and clear drop values', () => {
    const ctx = new ObservationContext().put(USER, 'alice').put(ATTEMPTS, 1);
    expect(ctx.remove(USER)).toBe(true);
    expect(ctx.remove(USER)).toBe(false);
    ctx.clear();
    expect(ctx.containsKey(ATTEMPTS)).toBe(false);
  });
});

describe('ObservationContext key values', () => {
  it('keeps low and high cardinality key values apart', () => {
    const ctx = new ObservationContext()
      .addLowCardinalityKeyValue(KeyValue.of('method', 'GET'))
      .addHighCardinalityKeyValue(KeyValue.of('uri', '/orders/42'));
    expect(ctx.getLowCardinalityKeyValues().toRecord()).toEqual({ method: 'GET' });
    expect(ctx.getHighCardinalityKeyValues().toRecord()).toEqual({ uri: '/orders/42' });
    expect(ctx.getLowCardinalityKeyValue('method')?.value).toBe('GET');
    expect(ctx.getHighCardinalityKeyValue('method')).toBeUndefined();
  });

  it('getAllKeyValues merges both sets with high cardinality winning', () => {
    const ctx = new ObservationContext()
      .addLowCardinalityKeyValues(KeyValues.fromRecord({ a: 'low', b: 'low' }))
      .addHighCardinalityKeyValues(KeyValues.fromRecord({ b: 'high' }));
    expect(ctx.getAllKeyValues().toRecord()).toEqual({ a: 'low', b: 'high' });
  });

  it('removes key values by key', () => {
    const ctx = new ObservationContext()
      .addLowCardinalityKeyValues(KeyValues.fromRecord({ a: '1', b: '2' }))
      .addHighCardinalityKeyValues(KeyValues.fromRecord({ c: '3' }))
      .removeLowCardinalityKeyValues('a')
      .removeHighCardinalityKeyValues('c');
    expect(ctx.getLowCardinalityKeyValues().toRecord()).toEqual({ b: '2' });
    expect(ctx.getHighCardinalityKeyValues().size).toBe(0);
  });

  it('removes a single key value', () => {
    const ctx = new ObservationContext()
      .addLowCardinalityKeyValues(KeyValues.fromRecord({ a: '1', b: '2' }))
      .addHighCardinalityKeyValues(KeyValues.fromRecord({ c: '3', d: '4' }))
      .removeLowCardinalityKeyValue('b')
      .removeHighCardinalityKeyValue('d');
    expect(ctx.getLowCardinalityKeyValues().toRecord()).toEqual({ a: '1' });
    expect(ctx.getHighCardinalityKeyValues().toRecord()).toEqual({ c: '3' });
  });

  it('toString summarizes the context', () => {
    const ctx = new ObservationContext().addLowCardinalityKeyValue(KeyValue.of('a', '1'));
    ctx.name = 'job';
    ctx.error = new Error('boom');
    expect(ctx.toString()).toBe(
      "name='job', contextualName='', error='boom', lowCardinalityKeyValues=[a='1'], highCardinalityKeyValues=[]",
    );
  });
});
