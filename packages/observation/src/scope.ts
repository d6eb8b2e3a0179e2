/**
 * Observation scopes: mark an observation as current for the code that runs
 * while the scope is open. Scopes nest; closing one restores its predecessor.
 */

import type { Observation } from './observation.js';
import type { ObservationRegistry } from './registry.js';

export interface ObservationScope {
  readonly observation: Observation;
  readonly previous: ObservationScope | null;
  /** Restore the previous scope and notify handlers. */
  close(): void;
  /** Drop every open scope in the current flow, notifying each observation. */
  reset(): void;
}

/** The hooks a scope needs from the observation it belongs to. */
export interface ScopeOwner extends Observation {
  notifyScopeClosed(): void;
  notifyScopeReset(): void;
}

export class SimpleObservationScope implements ObservationScope {
  readonly previous: ObservationScope | null;
  private closed = false;

  constructor(
    private readonly registry: ObservationRegistry,
    private readonly owner: ScopeOwner,
  ) {
    this.previous = registry.getCurrentObservationScope();
  }

  get observation(): Observation {
    return this.owner;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.registry.getCurrentObservationScope() === this) {
      this.registry.setCurrentObservationScope(this.previous);
    }
    this.owner.notifyScopeClosed();
  }

  reset(): void {
    let scope: ObservationScope | null = this.registry.getCurrentObservationScope();
    while (scope !== null) {
      if (scope instanceof SimpleObservationScope) {
        scope.closed = true;
        scope.owner.notifyScopeReset();
      }
      scope = scope.previous;
    }
    this.registry.setCurrentObservationScope(null);
  }
}

export const NOOP_SCOPE_FACTORY = {
  create(observation: Observation): ObservationScope {
    return {
      observation,
      previous: null,
      close: () => {},
      reset: () => {},
    };
  },
};
