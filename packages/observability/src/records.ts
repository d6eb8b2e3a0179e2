/**
 * Flat, serializable record of a stopped observation, shared by the
 * handlers that persist observations (JSONL file, SQLite).
 */

import { contextKey, generateId } from '@vigil/core';
import type { ObservationContext } from '@vigil/core';

export interface ObservationRecord {
  id: string;
  parentId: string | null;
  name: string;
  contextualName: string | null;
  /** Epoch milliseconds. */
  startTime: number;
  /** Epoch milliseconds. */
  endTime: number;
  durationMs: number;
  error: { name: string; message: string } | null;
  lowCardinality: Record<string, string>;
  highCardinality: Record<string, string>;
}

interface RecordMeta {
  id: string;
  startTime: number;
}

const RECORD_META = contextKey<RecordMeta>('record.meta');

/** Assign a record id and start time to `context`, once. */
export function markStarted(context: ObservationContext, now: number): void {
  context.computeIfAbsent(RECORD_META, () => ({ id: generateId(), startTime: now }));
}

/** Build the record for a stopped observation; null if it was never marked. */
export function toObservationRecord(context: ObservationContext, now: number): ObservationRecord | null {
  const meta = context.get(RECORD_META);
  if (!meta) return null;
  const parent = context.parentObservation?.getContextView().get(RECORD_META);
  return {
    id: meta.id,
    parentId: parent?.id ?? null,
    name: context.name ?? 'unnamed',
    contextualName: context.contextualName,
    startTime: meta.startTime,
    endTime: now,
    durationMs: now - meta.startTime,
    error: context.error ? { name: context.error.name, message: context.error.message } : null,
    lowCardinality: context.getLowCardinalityKeyValues().toRecord(),
    highCardinality: context.getHighCardinalityKeyValues().toRecord(),
  };
}
