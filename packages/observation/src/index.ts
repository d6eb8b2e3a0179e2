/**
 * @vigil/observation: observation lifecycle, registry and scopes.
 */

export { Observation, SimpleObservation } from './observation.js';
export type { ContextSupplier, ObservationOptions } from './observation.js';

export { ObservationRegistry, ObservationConfig } from './registry.js';

export type { ObservationScope } from './scope.js';

export { defineObservation, keyName } from './documented.js';
export type { KeyName, ObservationDefinition, ObservationDocumentation } from './documented.js';
