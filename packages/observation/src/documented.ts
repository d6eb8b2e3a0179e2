/**
 * Documented observations: declare an observation's name, key names and
 * events once, next to the code that owns it, and create observations from
 * that declaration everywhere else.
 *
 * ```ts
 * const METHOD = keyName('http.method', { required: true });
 * export const HttpServerObservation = defineObservation({
 *   name: 'http.server.requests',
 *   lowCardinalityKeyNames: [METHOD],
 *   events: ['first-byte'],
 * });
 *
 * HttpServerObservation.observation(registry)
 *   .lowCardinalityKeyValue(METHOD.withValue('GET'))
 *   .observe(() => handle(request));
 * ```
 */

import { KeyValue, ObservationContext, ObservationError, ObservationEvent } from '@vigil/core';
import type { IObservationConvention } from '@vigil/core';
import { Observation } from './observation.js';
import type { ContextSupplier } from './observation.js';
import type { ObservationRegistry } from './registry.js';

export interface KeyName {
  readonly name: string;
  readonly required: boolean;
  withValue(value: string): KeyValue;
}

export function keyName(name: string, options: { required?: boolean } = {}): KeyName {
  return {
    name,
    required: options.required ?? false,
    withValue: (value: string) => KeyValue.of(name, value),
  };
}

export interface ObservationDefinition {
  name?: string;
  contextualName?: string;
  lowCardinalityKeyNames?: readonly KeyName[];
  highCardinalityKeyNames?: readonly KeyName[];
  /** Used when the caller supplies no convention of its own. */
  defaultConvention?: IObservationConvention;
  events?: readonly string[];
}

export interface ObservationDocumentation {
  readonly definition: Readonly<ObservationDefinition>;
  observation(
    registry: ObservationRegistry,
    contextSupplier?: ContextSupplier,
    customConvention?: IObservationConvention | null,
  ): Observation;
  start(
    registry: ObservationRegistry,
    contextSupplier?: ContextSupplier,
    customConvention?: IObservationConvention | null,
  ): Observation;
  event(name: string): ObservationEvent;
}

export function defineObservation(definition: ObservationDefinition): ObservationDocumentation {
  const { name, contextualName, defaultConvention, events = [] } = definition;
  if (!name && !defaultConvention) {
    throw new ObservationError(
      'A documented observation needs a name or a default convention',
      '(unnamed)',
    );
  }

  const required = (definition.lowCardinalityKeyNames ?? [])
    .filter((key) => key.required)
    .map((key) => key.name);

  const fixedNameConvention: IObservationConvention = {
    supportsContext: () => true,
    getName: () => name ?? null,
  };

  const observation = (
    registry: ObservationRegistry,
    contextSupplier: ContextSupplier = () => new ObservationContext(),
    customConvention: IObservationConvention | null = null,
  ): Observation => {
    // The declared name applies whenever the convention in play gives none.
    const namedSupplier: ContextSupplier = () => {
      const context = contextSupplier();
      if (name && !context.name) context.name = name;
      return context;
    };
    const created = Observation.createNotStarted(
      customConvention,
      defaultConvention ?? fixedNameConvention,
      namedSupplier,
      registry,
      { requiredLowCardinalityKeys: required },
    );
    if (contextualName) created.contextualName(contextualName);
    return created;
  };

  return {
    definition,
    observation,
    start: (registry, contextSupplier, customConvention) =>
      observation(registry, contextSupplier, customConvention).start(),
    event(eventName: string): ObservationEvent {
      if (!events.includes(eventName)) {
        throw new ObservationError(
          `Event "${eventName}" is not declared`,
          name ?? '(convention-named)',
          { declared: [...events] },
        );
      }
      return ObservationEvent.of(eventName);
    },
  };
}
