import { ObservationContext } from '@vigil/core';
import { NoopObservationHandler } from './noop-handler.js';

describe('NoopObservationHandler', () => {
  let handler: NoopObservationHandler;

  beforeEach(() => {
    handler = new NoopObservationHandler();
  });

  it('supports every context', () => {
    expect(handler.supportsContext(new ObservationContext())).toBe(true);
  });

  it('onStart does not throw', () => {
    expect(() => handler.onStart(new ObservationContext())).not.toThrow();
  });

  it('onStop does not throw', () => {
    expect(() => handler.onStop(new ObservationContext())).not.toThrow();
  });

  it('flush resolves', async () => {
    await expect(handler.flush()).resolves.toBeUndefined();
  });
});
