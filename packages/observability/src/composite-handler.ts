/**
 * Composite handlers: group several handlers behind one registration.
 *
 * AllMatchingCompositeHandler forwards every callback to each child that
 * supports the context. FirstMatchingCompositeHandler forwards only to the
 * first such child, which lets callers register specialised handlers ahead
 * of a catch-all fallback. Errors thrown by individual children are caught
 * and logged to stderr so that one broken handler never takes down the rest.
 */

import type { IObservationHandler, ObservationContext, ObservationEvent } from '@vigil/core';

abstract class CompositeHandler implements IObservationHandler {
  abstract readonly id: string;
  protected readonly children: IObservationHandler[];

  constructor(children: IObservationHandler[]) {
    this.children = [...children];
  }

  getHandlers(): readonly IObservationHandler[] {
    return this.children;
  }

  /** Children that should receive callbacks for `context`. */
  protected abstract select(context: ObservationContext): IObservationHandler[];

  // ---- helpers ------------------------------------------------------------

  private safely(
    context: ObservationContext,
    fn: (child: IObservationHandler) => void,
    reverse = false,
  ): void {
    const selected = this.select(context);
    if (reverse) selected.reverse();
    for (const child of selected) {
      try {
        fn(child);
      } catch (err) {
        console.error(`[${this.id}] child handler threw:`, err);
      }
    }
  }

  // ---- IObservationHandler ------------------------------------------------

  supportsContext(context: ObservationContext): boolean {
    return this.children.some((child) => child.supportsContext(context));
  }

  onStart(context: ObservationContext): void {
    this.safely(context, (c) => c.onStart?.(context));
  }

  onError(context: ObservationContext): void {
    this.safely(context, (c) => c.onError?.(context));
  }

  onEvent(event: ObservationEvent, context: ObservationContext): void {
    this.safely(context, (c) => c.onEvent?.(event, context));
  }

  onScopeOpened(context: ObservationContext): void {
    this.safely(context, (c) => c.onScopeOpened?.(context));
  }

  onScopeClosed(context: ObservationContext): void {
    this.safely(context, (c) => c.onScopeClosed?.(context), true);
  }

  onScopeReset(context: ObservationContext): void {
    this.safely(context, (c) => c.onScopeReset?.(context));
  }

  onStop(context: ObservationContext): void {
    this.safely(context, (c) => c.onStop?.(context), true);
  }

  async flush(): Promise<void> {
    await this.eachChild('flush', (child) => child.flush?.());
  }

  async close(): Promise<void> {
    await this.eachChild('close', (child) => child.close?.());
  }

  private async eachChild(
    what: string,
    fn: (child: IObservationHandler) => Promise<void> | undefined,
  ): Promise<void> {
    const results = this.children.map(async (child) => {
      try {
        await fn(child);
      } catch (err) {
        console.error(`[${this.id}] ${what} error in child handler:`, err);
      }
    });
    await Promise.all(results);
  }
}

export class AllMatchingCompositeHandler extends CompositeHandler {
  readonly id = 'AllMatchingHandler';

  protected select(context: ObservationContext): IObservationHandler[] {
    return this.children.filter((child) => child.supportsContext(context));
  }
}

export class FirstMatchingCompositeHandler extends CompositeHandler {
  readonly id = 'FirstMatchingHandler';

  protected select(context: ObservationContext): IObservationHandler[] {
    const first = this.children.find((child) => child.supportsContext(context));
    return first ? [first] : [];
  }
}
