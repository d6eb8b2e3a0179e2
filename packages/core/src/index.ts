/**
 * @vigil/core: data model and contracts shared by every vigil package.
 */

export {
  VigilError,
  ObservationError,
  HandlerError,
  KeyValueError,
  ConfigError,
  StoreError,
} from './errors/index.js';

export { KeyValue, KeyValues, NONE_VALUE } from './model/key-values.js';
export type { KeyValueValidator } from './model/key-values.js';

export { ContextKey, ObservationContext, contextKey } from './model/context.js';
export type { ContextView } from './model/context.js';

export { ObservationEvent } from './interfaces/observation.js';
export type {
  ObservationView,
  IObservationHandler,
  ObservationPredicate,
  ObservationFilter,
  IObservationConvention,
} from './interfaces/observation.js';

export { generateId, toError } from './utils/id.js';
