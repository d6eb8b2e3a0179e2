import { VigilError } from '@vigil/core';
import { Counter, LongTaskTimer, MeterRegistry, Timer } from './meter-registry.js';

describe('MeterRegistry', () => {
  let now: number;
  let registry: MeterRegistry;

  beforeEach(() => {
    now = 0;
    registry = new MeterRegistry({ clock: () => now, buckets: [10, 100] });
  });

  describe('counters', () => {
    it('increments', () => {
      const counter = registry.counter('jobs.retry');
      counter.increment();
      counter.increment(2);
      expect(counter.count()).toBe(3);
    });

    it('returns the same meter for the same name and tags regardless of tag order', () => {
      const a = registry.counter('hits', { b: '2', a: '1' });
      const b = registry.counter('hits', { a: '1', b: '2' });
      expect(a).toBe(b);
      expect(a.id.tags).toEqual({ a: '1', b: '2' });
    });

    it('distinguishes meters by tags', () => {
      registry.counter('hits', { route: '/a' }).increment();
      registry.counter('hits', { route: '/b' }).increment(5);
      expect(registry.meters()).toHaveLength(2);
    });
  });

  describe('timers', () => {
    it('tracks count, total, max and mean', () => {
      const timer = registry.timer('http.requests');
      timer.record(5);
      timer.record(50);
      timer.record(500);
      expect(timer.count()).toBe(3);
      expect(timer.totalTime()).toBe(555);
      expect(timer.max()).toBe(500);
      expect(timer.mean()).toBe(185);
    });

    it('fills cumulative histogram buckets', () => {
      const timer = registry.timer('http.requests');
      timer.record(5);
      timer.record(50);
      timer.record(500);
      expect(timer.histogram()).toEqual([
        { le: 10, count: 1 },
        { le: 100, count: 2 },
      ]);
    });

    it('clamps negative durations to zero', () => {
      const timer = registry.timer('t');
      timer.record(-3);
      expect(timer.totalTime()).toBe(0);
      expect(timer.count()).toBe(1);
    });

    it('has a zero mean when empty', () => {
      expect(registry.timer('t').mean()).toBe(0);
    });
  });

  describe('long task timers', () => {
    it('counts active tasks and their running time', () => {
      const ltt = registry.longTaskTimer('jobs.active');
      const first = ltt.start();
      now = 10;
      const second = ltt.start();
      now = 30;
      expect(ltt.activeTasks()).toBe(2);
      expect(ltt.duration()).toBe(50);
      expect(first.stop()).toBe(30);
      expect(ltt.activeTasks()).toBe(1);
      expect(second.stop()).toBe(20);
      expect(ltt.activeTasks()).toBe(0);
    });

    it('stopping twice is harmless', () => {
      const sample = registry.longTaskTimer('jobs.active').start();
      sample.stop();
      expect(sample.stop()).toBe(0);
    });
  });

  describe('find', () => {
    it('matches by name and tag subset without creating meters', () => {
      registry.timer('http', { method: 'GET', status: '200' });
      expect(registry.find('http', { method: 'GET' })).toBeInstanceOf(Timer);
      expect(registry.find('http', { method: 'POST' })).toBeUndefined();
      expect(registry.find('missing')).toBeUndefined();
      expect(registry.meters()).toHaveLength(1);
    });

    it('returns each meter type', () => {
      registry.counter('c');
      registry.longTaskTimer('l');
      expect(registry.find('c')).toBeInstanceOf(Counter);
      expect(registry.find('l')).toBeInstanceOf(LongTaskTimer);
    });
  });

  it('rejects reusing an id for a different meter type', () => {
    registry.counter('shared', { a: '1' });
    expect(() => registry.timer('shared', { a: '1' })).toThrow(VigilError);
    expect(() => registry.timer('shared', { a: '1' })).toThrow(
      'Meter shared{a=1} is already registered as a counter, not a timer',
    );
  });

  it('clear() removes all meters', () => {
    registry.counter('c');
    registry.clear();
    expect(registry.meters()).toEqual([]);
  });

  describe('toPrometheusFormat', () => {
    it('returns an empty string without meters', () => {
      expect(registry.toPrometheusFormat()).toBe('');
    });

    it('renders counters, timers and long task timers', () => {
      registry.counter('jobs.retry', { queue: 'mail' }).increment(2);
      registry.timer('http.requests', { method: 'GET' }).record(42);
      registry.longTaskTimer('jobs.active').start();

      expect(registry.toPrometheusFormat()).toBe(
        [
          '# TYPE jobs_retry_total counter',
          'jobs_retry_total{queue="mail"} 2',
          '# TYPE http_requests_milliseconds histogram',
          'http_requests_milliseconds_bucket{method="GET",le="10"} 0',
          'http_requests_milliseconds_bucket{method="GET",le="100"} 1',
          'http_requests_milliseconds_bucket{method="GET",le="+Inf"} 1',
          'http_requests_milliseconds_sum{method="GET"} 42',
          'http_requests_milliseconds_count{method="GET"} 1',
          '# TYPE jobs_active_active_tasks gauge',
          'jobs_active_active_tasks 1',
          '',
        ].join('\n'),
      );
    });

    it('applies a prefix and escapes label values', () => {
      registry.counter('hits', { path: 'a"b' }).increment();
      expect(registry.toPrometheusFormat('app')).toBe(
        '# TYPE app_hits_total counter\napp_hits_total{path="a\\"b"} 1\n',
      );
    });

    it('writes one TYPE line per metric family', () => {
      registry.counter('hits', { route: '/a' }).increment();
      registry.counter('hits', { route: '/b' }).increment();
      const typeLines = registry
        .toPrometheusFormat()
        .split('\n')
        .filter((line) => line.startsWith('# TYPE'));
      expect(typeLines).toEqual(['# TYPE hits_total counter']);
    });

    it('keeps samples of a family together when registrations interleave', () => {
      registry.counter('http.retry', { method: 'GET' }).increment();
      registry.counter('db.retry').increment();
      registry.counter('http.retry', { method: 'POST' }).increment();
      expect(registry.toPrometheusFormat()).toBe(
        [
          '# TYPE http_retry_total counter',
          'http_retry_total{method="GET"} 1',
          'http_retry_total{method="POST"} 1',
          '# TYPE db_retry_total counter',
          'db_retry_total 1',
          '',
        ].join('\n'),
      );
    });
  });
});
