/**
 * FileObservationHandler: appends one JSON line per stopped observation.
 *
 * When the next line would push the file past `maxBytes`, the current file
 * is renamed to `<file>.1` (replacing any earlier rotation) and a fresh file
 * is started.
 */

import { appendFileSync, existsSync, mkdirSync, renameSync, statSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { HandlerError } from '@vigil/core';
import type { IObservationHandler, ObservationContext } from '@vigil/core';
import { markStarted, toObservationRecord } from './records.js';

export interface FileHandlerOptions {
  /** JSONL file path. Default: ~/.vigil/logs/observations.jsonl */
  filePath?: string;
  /** Size limit in bytes before rotation. Default: 10 MiB. */
  maxBytes?: number;
  /** Epoch millisecond clock; defaults to Date.now. */
  clock?: () => number;
}

export const DEFAULT_MAX_LOG_BYTES = 10 * 1024 * 1024;

export function defaultLogPath(): string {
  return join(homedir(), '.vigil', 'logs', 'observations.jsonl');
}

export class FileObservationHandler implements IObservationHandler {
  readonly id = 'file';
  readonly filePath: string;
  private readonly maxBytes: number;
  private readonly clock: () => number;
  private dirReady = false;

  constructor(options: FileHandlerOptions = {}) {
    this.filePath = options.filePath ?? defaultLogPath();
    this.maxBytes = options.maxBytes ?? DEFAULT_MAX_LOG_BYTES;
    this.clock = options.clock ?? Date.now;
  }

  supportsContext(_context: ObservationContext): boolean {
    return true;
  }

  onStart(context: ObservationContext): void {
    markStarted(context, this.clock());
  }

  onStop(context: ObservationContext): void {
    const record = toObservationRecord(context, this.clock());
    if (!record) return;
    this.append(JSON.stringify(record) + '\n');
  }

  async flush(): Promise<void> {
    // Lines are written synchronously; nothing is buffered.
  }

  private append(line: string): void {
    try {
      if (!this.dirReady) {
        mkdirSync(dirname(this.filePath), { recursive: true });
        this.dirReady = true;
      }
      const size = existsSync(this.filePath) ? statSync(this.filePath).size : 0;
      if (size > 0 && size + Buffer.byteLength(line) > this.maxBytes) {
        renameSync(this.filePath, `${this.filePath}.1`);
      }
      appendFileSync(this.filePath, line, 'utf8');
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new HandlerError(`Failed to write observation log: ${message}`, this.id, {
        path: this.filePath,
      });
    }
  }
}
