/**
 * ConsoleObservationHandler: structured console logging with ANSI colour.
 *
 * Formats observation lifecycle callbacks as human-readable console lines,
 * respecting the configured log level. Starts, events and scopes log at
 * debug; stops log at info with duration, outcome and low-cardinality key
 * values; errors log at error.
 */

import { contextKey } from '@vigil/core';
import type { IObservationHandler, ObservationContext, ObservationEvent } from '@vigil/core';

// ---------------------------------------------------------------------------
// ANSI escape codes
// ---------------------------------------------------------------------------

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';

const FG = {
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

// ---------------------------------------------------------------------------
// Log-level gate
// ---------------------------------------------------------------------------

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const STARTED_AT = contextKey<number>('console.startedAt');

export interface ConsoleHandlerOptions {
  /** Monotonic millisecond clock; defaults to performance.now. */
  clock?: () => number;
}

// ---------------------------------------------------------------------------
// ConsoleObservationHandler
// ---------------------------------------------------------------------------

export class ConsoleObservationHandler implements IObservationHandler {
  readonly id = 'console';
  private readonly minLevel: number;
  private readonly clock: () => number;

  constructor(logLevel: LogLevel = 'info', options: ConsoleHandlerOptions = {}) {
    this.minLevel = LEVEL_RANK[logLevel];
    this.clock = options.clock ?? (() => performance.now());
  }

  // ---- helpers ------------------------------------------------------------

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= this.minLevel;
  }

  private timestamp(): string {
    return new Date().toISOString();
  }

  private tag(label: string, color: string): string {
    return `${color}${BOLD}[${label}]${RESET}`;
  }

  private formatDuration(ms: number): string {
    if (ms < 1000) return `${ms.toFixed(0)}ms`;
    return `${(ms / 1000).toFixed(2)}s`;
  }

  private label(context: ObservationContext): string {
    const name = context.name ?? '(unnamed)';
    return context.contextualName && context.contextualName !== name
      ? `${BOLD}${name}${RESET} ${DIM}(${context.contextualName})${RESET}`
      : `${BOLD}${name}${RESET}`;
  }

  // ---- IObservationHandler ------------------------------------------------

  supportsContext(_context: ObservationContext): boolean {
    return true;
  }

  onStart(context: ObservationContext): void {
    context.put(STARTED_AT, this.clock());
    if (!this.shouldLog('debug')) return;
    const parent = context.parentObservation?.getContextView().name;
    console.log(
      `${DIM}${this.timestamp()}${RESET} ${this.tag('OBS', FG.cyan)} ${FG.green}started${RESET}` +
        ` ${this.label(context)}` +
        (parent ? ` ${DIM}parent=${RESET}${parent}` : ''),
    );
  }

  onEvent(event: ObservationEvent, context: ObservationContext): void {
    if (!this.shouldLog('debug')) return;
    console.log(
      `${DIM}${this.timestamp()}${RESET} ${this.tag('EVENT', FG.blue)} ${this.label(context)}` +
        ` ${DIM}event=${RESET}${event.contextualName}`,
    );
  }

  onScopeOpened(context: ObservationContext): void {
    if (!this.shouldLog('debug')) return;
    console.log(
      `${DIM}${this.timestamp()}${RESET} ${this.tag('SCOPE', FG.gray)} opened ${this.label(context)}`,
    );
  }

  onScopeClosed(context: ObservationContext): void {
    if (!this.shouldLog('debug')) return;
    console.log(
      `${DIM}${this.timestamp()}${RESET} ${this.tag('SCOPE', FG.gray)} closed ${this.label(context)}`,
    );
  }

  onError(context: ObservationContext): void {
    if (!this.shouldLog('error') || !context.error) return;
    const error = context.error;
    console.error(
      `${DIM}${this.timestamp()}${RESET} ${this.tag('OBS', FG.magenta)} ${FG.red}FAIL${RESET}` +
        ` ${this.label(context)}` +
        ` ${DIM}error=${RESET}${error.name}: ${error.message}`,
    );
  }

  onStop(context: ObservationContext): void {
    if (!this.shouldLog('info')) return;
    const startedAt = context.get(STARTED_AT);
    const duration =
      startedAt !== undefined ? ` ${DIM}duration=${RESET}${this.formatDuration(this.clock() - startedAt)}` : '';
    const outcome = context.error
      ? `${FG.red}error${RESET}`
      : `${FG.green}success${RESET}`;
    const low = context.getLowCardinalityKeyValues();
    const tags = low.size > 0 ? ` ${DIM}tags=${RESET}${low.toString()}` : '';
    console.log(
      `${DIM}${this.timestamp()}${RESET} ${this.tag('OBS', FG.cyan)} ${FG.yellow}stopped${RESET}` +
        ` ${this.label(context)}` +
        duration +
        ` ${DIM}outcome=${RESET}${outcome}` +
        tags,
    );
  }

  async flush(): Promise<void> {
    // Console output is unbuffered; nothing to flush.
  }
}
