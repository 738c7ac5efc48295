import { afterEach, describe, expect, it } from 'vitest';
import { getLogLevel, onLogLevelChange, setLogLevel } from '../src/logger.js';
import metrics, { MetricsRegistry } from '../src/metrics/index.js';

describe('MetricsCounters', () => {
  it('MetricsDetectors track counters and gauges', () => {
    const registry = new MetricsRegistry();

    registry.incrementDetectorCounter('controller', 'triggers');
    registry.incrementDetectorCounter('controller', 'triggers');
    registry.incrementDetectorCounter('controller', 'triggers', Number.NaN);
    registry.setDetectorGauge('controller', 'motionArea', 596);
    registry.recordDetectorError('stream', 'connection refused');

    const snapshot = registry.snapshot();
    expect(snapshot.detectors.controller?.counters).toEqual({ triggers: 2 });
    expect(snapshot.detectors.controller?.gauges).toEqual({ motionArea: 596 });
    expect(snapshot.detectors.stream?.counters).toEqual({ errors: 1 });
    expect(snapshot.detectors.stream?.lastErrorMessage).toBe('connection refused');
  });

  it('MetricsDetectors export counters as Prometheus text', () => {
    const registry = new MetricsRegistry();
    registry.incrementDetectorCounter('controller', 'triggers', 2);
    registry.setDetectorGauge('controller', 'motionArea', 596);

    expect(registry.exportDetectorCountersForPrometheus().split('\n')).toEqual([
      '# HELP scare_sentry_detector_counter_total Detector counter totals grouped by detector and counter name',
      '# TYPE scare_sentry_detector_counter_total gauge',
      'scare_sentry_detector_counter_total{counter="triggers",detector="controller"} 2',
      '# HELP scare_sentry_detector_gauge Detector gauge values grouped by detector and gauge name',
      '# TYPE scare_sentry_detector_gauge gauge',
      'scare_sentry_detector_gauge{detector="controller",gauge="motionArea"} 596'
    ]);
  });

  it('MetricsHistogram buckets observations', () => {
    const registry = new MetricsRegistry();
    registry.observeHistogram('frame.area', 0.5);
    registry.observeHistogram('frame.area', 3);
    registry.observeHistogram('frame.area', 2000);

    expect(registry.snapshot().histograms['frame.area']).toEqual({ '<1': 1, '1-5': 1, '1000+': 1 });

    const lines = registry
      .exportHistogramForPrometheus('frame.area', { metricName: 'scare_sentry_frame_area', help: 'Area' })
      .split('\n');
    expect(lines.slice(0, 4)).toEqual([
      '# HELP scare_sentry_frame_area Area',
      '# TYPE scare_sentry_frame_area histogram',
      'scare_sentry_frame_area_bucket{le="1"} 1',
      'scare_sentry_frame_area_bucket{le="5"} 2'
    ]);
    expect(lines.slice(-3)).toEqual([
      'scare_sentry_frame_area_bucket{le="+Inf"} 3',
      'scare_sentry_frame_area_sum 2003.5',
      'scare_sentry_frame_area_count 3'
    ]);
    expect(registry.exportHistogramForPrometheus('missing')).toBe('');
  });

  it('MetricsLatency records detector latency', () => {
    const registry = new MetricsRegistry();
    registry.observeDetectorLatency('controller', 3);

    const snapshot = registry.snapshot();
    expect(snapshot.detectors.controller?.latency).toEqual({
      count: 1,
      totalMs: 3,
      minMs: 3,
      maxMs: 3,
      averageMs: 3
    });
    expect(snapshot.detectors.controller?.latencyHistogram).toEqual({ '1-5': 1 });
    expect(registry.exportPrometheus()).toContain('scare_sentry_detector_controller_latency_ms_bucket{le="5"} 1\n');
  });

  it('MetricsTimer records success and failure', async () => {
    const registry = new MetricsRegistry();

    await expect(registry.time('sentry.startup.ms', () => 7)).resolves.toBe(7);
    await expect(
      registry.time('sentry.startup.ms', () => Promise.reject(new Error('boom')))
    ).rejects.toThrow('boom');

    expect(registry.snapshot().latencies['sentry.startup.ms']?.count).toBe(2);
  });

  it('MetricsLogLevels track log lines by level', () => {
    const registry = new MetricsRegistry();
    registry.incrementLogLevel('ERROR', { message: 'boom', detector: 'stream' });
    registry.incrementLogLevel('info');
    registry.recordLogLevelChange('debug', 'info');
    registry.recordLogLevelChange('warn');

    const logs = registry.snapshot().logs;
    expect(logs.byLevel).toEqual({ trace: 0, debug: 0, info: 1, warn: 0, error: 1, fatal: 0 });
    expect(logs.byDetector).toEqual({ stream: { error: 1 } });
    expect(logs.lastErrorMessage).toBe('boom');
    expect(logs.currentLevel).toBe('warn');
    expect(logs.levelChanges).toEqual({ debug: 1 });
  });

  it('MetricsReset clears state and notifies listeners', () => {
    const registry = new MetricsRegistry();
    let resets = 0;
    const detach = registry.onReset(() => {
      resets += 1;
    });
    registry.recordEvent({
      ts: 1,
      source: 'camera',
      detector: 'scare',
      severity: 'warning',
      message: 'Motion detected, scare triggered',
      meta: undefined
    });

    registry.reset();
    detach();
    registry.reset();

    expect(resets).toBe(1);
    expect(registry.snapshot().events).toEqual({ total: 0, lastEventAt: null, byDetector: {}, bySeverity: {} });
  });
});

describe('LoggerLevel', () => {
  const initial = getLogLevel();

  afterEach(() => {
    setLogLevel(initial);
  });

  it('LoggerLevel normalises and notifies on change', () => {
    const changes: Array<[string, string | null]> = [];
    const detach = onLogLevelChange((level, previous) => {
      changes.push([level, previous]);
    });

    const next = initial === 'debug' ? 'trace' : 'debug';
    expect(setLogLevel(` ${next.toUpperCase()} `)).toBe(next);
    detach();

    expect(getLogLevel()).toBe(next);
    expect(changes).toEqual([[next, initial]]);
    expect(metrics.snapshot().logs.currentLevel).toBe(next);
  });

  it('LoggerLevel rejects an unknown level', () => {
    expect(() => setLogLevel('loud')).toThrow(/^Unknown log level "loud" \(available: /);
    expect(getLogLevel()).toBe(initial);
  });
});
