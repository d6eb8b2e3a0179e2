/**
 * MeterRegistry: in-memory counters, timers and long task timers with a
 * Prometheus text export.
 *
 * A meter is identified by its name plus its tags; asking for the same
 * name and tags again returns the same meter. Asking for an existing id as a
 * different meter type is an error.
 */

import { VigilError } from '@vigil/core';

export type Tags = Readonly<Record<string, string>>;

/** Default timer histogram buckets (milliseconds). */
export const DEFAULT_BUCKETS: readonly number[] = [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000];

export interface HistogramBucket {
  le: number;
  count: number;
}

export interface MeterId {
  readonly name: string;
  readonly tags: Tags;
}

function sortedTags(tags: Tags): Tags {
  const out: Record<string, string> = {};
  for (const key of Object.keys(tags).sort()) {
    const value = tags[key];
    if (value !== undefined) out[key] = value;
  }
  return out;
}

function idKey(name: string, tags: Tags): string {
  const parts = Object.entries(tags).map(([k, v]) => `${k}=${v}`);
  return `${name}{${parts.join(',')}}`;
}

// ---------------------------------------------------------------------------
// Meters
// ---------------------------------------------------------------------------

export class Counter {
  readonly type = 'counter';
  private value = 0;

  constructor(readonly id: MeterId) {}

  increment(amount = 1): void {
    this.value += amount;
  }

  count(): number {
    return this.value;
  }
}

export class Timer {
  readonly type = 'timer';
  private readonly buckets: HistogramBucket[];
  private total = 0;
  private samples = 0;
  private maximum = 0;

  constructor(
    readonly id: MeterId,
    bucketBounds: readonly number[] = DEFAULT_BUCKETS,
  ) {
    this.buckets = bucketBounds.map((le) => ({ le, count: 0 }));
  }

  /** Record one duration in milliseconds. Negative durations are clamped to 0. */
  record(durationMs: number): void {
    const value = Math.max(0, durationMs);
    this.total += value;
    this.samples++;
    if (value > this.maximum) this.maximum = value;
    for (const bucket of this.buckets) {
      if (value <= bucket.le) {
        bucket.count++;
      }
    }
  }

  count(): number {
    return this.samples;
  }

  totalTime(): number {
    return this.total;
  }

  max(): number {
    return this.maximum;
  }

  mean(): number {
    return this.samples === 0 ? 0 : this.total / this.samples;
  }

  histogram(): HistogramBucket[] {
    return this.buckets.map((b) => ({ ...b }));
  }
}

export interface LongTaskSample {
  /** Stop the task and return how long it ran, in milliseconds. */
  stop(): number;
}

export class LongTaskTimer {
  readonly type = 'long-task-timer';
  private readonly active = new Set<number>();
  private nextTask = 0;
  private readonly startedAt = new Map<number, number>();

  constructor(
    readonly id: MeterId,
    private readonly clock: () => number,
  ) {}

  start(): LongTaskSample {
    const task = this.nextTask++;
    this.active.add(task);
    this.startedAt.set(task, this.clock());
    return {
      stop: () => {
        const began = this.startedAt.get(task);
        this.active.delete(task);
        this.startedAt.delete(task);
        return began === undefined ? 0 : this.clock() - began;
      },
    };
  }

  activeTasks(): number {
    return this.active.size;
  }

  /** Summed running time of all active tasks, in milliseconds. */
  duration(): number {
    const now = this.clock();
    let sum = 0;
    for (const began of this.startedAt.values()) sum += now - began;
    return sum;
  }
}

export type Meter = Counter | Timer | LongTaskTimer;

// ---------------------------------------------------------------------------
// MeterRegistry
// ---------------------------------------------------------------------------

export interface MeterRegistryOptions {
  /** Monotonic millisecond clock; defaults to performance.now. */
  clock?: () => number;
  /** Timer histogram bucket bounds in milliseconds. */
  buckets?: readonly number[];
}

export class MeterRegistry {
  private readonly registered = new Map<string, Meter>();
  readonly clock: () => number;
  private readonly buckets: readonly number[];

  constructor(options: MeterRegistryOptions = {}) {
    this.clock = options.clock ?? (() => performance.now());
    this.buckets = options.buckets ?? DEFAULT_BUCKETS;
  }

  counter(name: string, tags: Tags = {}): Counter {
    const meter = this.getOrCreate(name, tags, (id) => new Counter(id));
    return this.expect(meter, 'counter', (m): m is Counter => m instanceof Counter);
  }

  timer(name: string, tags: Tags = {}): Timer {
    const meter = this.getOrCreate(name, tags, (id) => new Timer(id, this.buckets));
    return this.expect(meter, 'timer', (m): m is Timer => m instanceof Timer);
  }

  longTaskTimer(name: string, tags: Tags = {}): LongTaskTimer {
    const meter = this.getOrCreate(name, tags, (id) => new LongTaskTimer(id, this.clock));
    return this.expect(meter, 'long task timer', (m): m is LongTaskTimer => m instanceof LongTaskTimer);
  }

  /**
   * First meter named `name` whose tags include every entry of `tags`.
   * Does not create anything.
   */
  find(name: string, tags: Tags = {}): Meter | undefined {
    for (const meter of this.registered.values()) {
      if (meter.id.name !== name) continue;
      const matches = Object.entries(tags).every(([k, v]) => meter.id.tags[k] === v);
      if (matches) return meter;
    }
    return undefined;
  }

  meters(): Meter[] {
    return [...this.registered.values()];
  }

  clear(): void {
    this.registered.clear();
  }

  /**
   * Prometheus text exposition of every registered meter. Samples of one
   * metric family are written together under its `# TYPE` line, families in
   * order of first registration.
   */
  toPrometheusFormat(prefix = ''): string {
    const families = new Map<string, { type: string; samples: string[] }>();
    const family = (metric: string, type: string): string[] => {
      let entry = families.get(metric);
      if (!entry) {
        entry = { type, samples: [] };
        families.set(metric, entry);
      }
      return entry.samples;
    };

    for (const meter of this.registered.values()) {
      const base = promName(prefix ? `${prefix}_${meter.id.name}` : meter.id.name);
      switch (meter.type) {
        case 'counter':
          family(`${base}_total`, 'counter').push(
            `${base}_total${promLabels(meter.id.tags)} ${meter.count()}`,
          );
          break;
        case 'timer': {
          const metric = `${base}_milliseconds`;
          const samples = family(metric, 'histogram');
          for (const bucket of meter.histogram()) {
            samples.push(`${metric}_bucket${promLabels(meter.id.tags, { le: String(bucket.le) })} ${bucket.count}`);
          }
          samples.push(`${metric}_bucket${promLabels(meter.id.tags, { le: '+Inf' })} ${meter.count()}`);
          samples.push(`${metric}_sum${promLabels(meter.id.tags)} ${meter.totalTime()}`);
          samples.push(`${metric}_count${promLabels(meter.id.tags)} ${meter.count()}`);
          break;
        }
        case 'long-task-timer':
          family(`${base}_active_tasks`, 'gauge').push(
            `${base}_active_tasks${promLabels(meter.id.tags)} ${meter.activeTasks()}`,
          );
          break;
      }
    }

    const lines: string[] = [];
    for (const [metric, { type, samples }] of families) {
      lines.push(`# TYPE ${metric} ${type}`, ...samples);
    }
    return lines.length > 0 ? lines.join('\n') + '\n' : '';
  }

  // ---- helpers ------------------------------------------------------------

  private getOrCreate(name: string, tags: Tags, create: (id: MeterId) => Meter): Meter {
    const sorted = sortedTags(tags);
    const key = idKey(name, sorted);
    let meter = this.registered.get(key);
    if (!meter) {
      meter = create({ name, tags: sorted });
      this.registered.set(key, meter);
    }
    return meter;
  }

  private expect<M extends Meter>(meter: Meter, wanted: string, guard: (m: Meter) => m is M): M {
    if (!guard(meter)) {
      throw new VigilError(
        `Meter ${idKey(meter.id.name, meter.id.tags)} is already registered as a ${meter.type}, not a ${wanted}`,
        'METER_TYPE_CONFLICT',
        { name: meter.id.name, existing: meter.type },
      );
    }
    return meter;
  }
}

function promName(name: string): string {
  return name.replace(/[^a-zA-Z0-9_:]/g, '_');
}

function promLabels(tags: Tags, extra: Tags = {}): string {
  const entries = [...Object.entries(tags), ...Object.entries(extra)];
  if (entries.length === 0) return '';
  const escaped = entries.map(
    ([k, v]) => `${promName(k)}="${v.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n')}"`,
  );
  return `{${escaped.join(',')}}`;
}
