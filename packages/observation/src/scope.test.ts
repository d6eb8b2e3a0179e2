import type { IObservationHandler } from '@vigil/core';
import { Observation } from './observation.js';
import { ObservationRegistry } from './registry.js';

describe('observation scopes', () => {
  let registry: ObservationRegistry;
  let log: string[];

  beforeEach(() => {
    registry = ObservationRegistry.create();
    log = [];
    const handler: IObservationHandler = {
      supportsContext: () => true,
      onStart: (ctx) => log.push(`start:${ctx.name}`),
      onScopeOpened: (ctx) => log.push(`opened:${ctx.name}`),
      onScopeClosed: (ctx) => log.push(`closed:${ctx.name}`),
      onScopeReset: (ctx) => log.push(`reset:${ctx.name}`),
    };
    registry.observationConfig().observationHandler(handler);
  });

  it('has no current observation initially', () => {
    expect(registry.getCurrentObservation()).toBeNull();
    expect(registry.getCurrentObservationScope()).toBeNull();
  });

  it('nests scopes and restores the previous one on close', () => {
    const outer = Observation.start('outer', registry);
    const inner = Observation.start('inner', registry);

    const outerScope = outer.openScope();
    expect(registry.getCurrentObservation()).toBe(outer);

    const innerScope = inner.openScope();
    expect(registry.getCurrentObservation()).toBe(inner);
    expect(innerScope.previous).toBe(outerScope);

    innerScope.close();
    expect(registry.getCurrentObservation()).toBe(outer);

    outerScope.close();
    expect(registry.getCurrentObservation()).toBeNull();
  });

  it('closing twice notifies once', () => {
    const observation = Observation.start('work', registry);
    const scope = observation.openScope();
    scope.close();
    scope.close();
    expect(log.filter((l) => l.startsWith('closed:'))).toEqual(['closed:work']);
  });

  it('reset clears every open scope and notifies each observation', () => {
    const outer = Observation.start('outer', registry);
    const inner = Observation.start('inner', registry);
    outer.openScope();
    const innerScope = inner.openScope();

    innerScope.reset();

    expect(registry.getCurrentObservation()).toBeNull();
    expect(log.filter((l) => l.startsWith('reset:'))).toEqual(['reset:inner', 'reset:outer']);
  });

  it('a new observation created inside a scope picks the scoped one as parent', () => {
    const parent = Observation.start('parent', registry);
    const scope = parent.openScope();
    const child = Observation.createNotStarted('child', registry);
    scope.close();
    expect(child.getContext().parentObservation).toBe(parent);
  });

  it('no-op scopes do nothing', () => {
    const scope = Observation.NOOP.openScope();
    expect(scope.observation).toBe(Observation.NOOP);
    scope.close();
    scope.reset();
    expect(registry.getCurrentObservation()).toBeNull();
  });
});
