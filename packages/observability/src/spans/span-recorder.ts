/**
 * Finished-span record and an in-memory sink for them.
 */

export interface SpanEvent {
  name: string;
  /** Epoch milliseconds. */
  timestamp: number;
}

export interface FinishedSpan {
  traceId: string;
  spanId: string;
  parentSpanId: string | null;
  name: string;
  /** Epoch milliseconds. */
  startTime: number;
  /** Epoch milliseconds. */
  endTime: number;
  tags: Record<string, string>;
  events: SpanEvent[];
  error: { name: string; message: string } | null;
}

export interface SpanSink {
  record(span: FinishedSpan): void;
}

export class SpanRecorder implements SpanSink {
  private readonly finished: FinishedSpan[] = [];

  constructor(private readonly maxSpans = 10_000) {}

  record(span: FinishedSpan): void {
    this.finished.push(span);
    if (this.finished.length > this.maxSpans) {
      this.finished.shift();
    }
  }

  /** Finished spans, oldest first. */
  spans(): readonly FinishedSpan[] {
    return this.finished;
  }

  byTraceId(traceId: string): FinishedSpan[] {
    return this.finished.filter((span) => span.traceId === traceId);
  }

  clear(): void {
    this.finished.length = 0;
  }
}
