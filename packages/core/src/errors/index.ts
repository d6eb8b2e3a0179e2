/**
 * Error hierarchy for vigil.
 *
 * Every error carries a stable `code` and an optional structured `context`
 * so callers can branch on the kind of failure without parsing messages.
 */

export class VigilError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'VigilError';
    this.code = code;
    this.context = context;
  }
}

export class ObservationError extends VigilError {
  readonly observation: string;

  constructor(message: string, observation: string, context?: Record<string, unknown>) {
    super(message, 'OBSERVATION_ERROR', { ...context, observation });
    this.name = 'ObservationError';
    this.observation = observation;
  }
}

export class HandlerError extends VigilError {
  readonly handler: string;

  constructor(message: string, handler: string, context?: Record<string, unknown>) {
    super(message, 'HANDLER_ERROR', { ...context, handler });
    this.name = 'HandlerError';
    this.handler = handler;
  }
}

export class KeyValueError extends VigilError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'KEY_VALUE_ERROR', context);
    this.name = 'KeyValueError';
  }
}

export class ConfigError extends VigilError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigError';
  }
}

export class StoreError extends VigilError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'STORE_ERROR', context);
    this.name = 'StoreError';
  }
}
