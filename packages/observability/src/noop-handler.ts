/**
 * NoopObservationHandler: accepts every context and discards all callbacks.
 *
 * Registering it turns a registry from no-op into a live one, which is
 * useful when only predicates, filters or scope tracking are wanted.
 */

import type { IObservationHandler, ObservationContext } from '@vigil/core';

export class NoopObservationHandler implements IObservationHandler {
  readonly id = 'noop';

  supportsContext(_context: ObservationContext): boolean {
    return true;
  }

  onStart(_context: ObservationContext): void {
    // intentionally empty
  }

  onStop(_context: ObservationContext): void {
    // intentionally empty
  }

  async flush(): Promise<void> {
    // intentionally empty
  }
}
