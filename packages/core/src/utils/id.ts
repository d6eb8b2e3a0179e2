import { randomBytes } from 'node:crypto';

/** Random lowercase hex id of `bytes` bytes (16 hex chars by default). */
export function generateId(bytes = 8): string {
  return randomBytes(bytes).toString('hex');
}

/** Normalize anything thrown into an Error instance. */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(String(value));
}
