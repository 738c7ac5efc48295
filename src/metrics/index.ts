import { performance } from 'node:perf_hooks';
import type { EventRecord } from '../types.js';

type CounterMap = Record<string, number>;

type LatencyStats = {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
  averageMs: number;
};

type HistogramSnapshot = Record<string, number>;

type DetectorLatencyState = {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
};

type DetectorMetricState = {
  counters: Map<string, number>;
  gauges: Map<string, number>;
  lastRunAt: number | null;
  lastErrorAt: number | null;
  lastErrorMessage: string | null;
  latency: DetectorLatencyState | null;
  latencyHistogram: Map<string, number> | null;
};

type DetectorSnapshot = {
  counters: CounterMap;
  gauges: CounterMap;
  lastRunAt: string | null;
  lastErrorAt: string | null;
  lastErrorMessage: string | null;
  latency: LatencyStats | null;
  latencyHistogram: HistogramSnapshot;
};

type MetricsSnapshot = {
  createdAt: string;
  events: {
    total: number;
    lastEventAt: string | null;
    byDetector: CounterMap;
    bySeverity: CounterMap;
  };
  logs: {
    byLevel: CounterMap;
    byDetector: Record<string, CounterMap>;
    lastErrorAt: string | null;
    lastErrorMessage: string | null;
    currentLevel: string;
    lastLevelChangeAt: string | null;
    levelChanges: CounterMap;
  };
  latencies: Record<string, LatencyStats>;
  histograms: Record<string, HistogramSnapshot>;
  detectors: Record<string, DetectorSnapshot>;
};

type HistogramConfig = {
  buckets: number[];
  format: (bucket: number, previous?: number) => string;
};

type PrometheusHistogramOptions = {
  metricName?: string;
  help?: string;
};

type GaugeSample = {
  value: number;
  labels?: Record<string, string>;
  order?: number;
};

const METRIC_PREFIX = 'scare_sentry';

const DEFAULT_HISTOGRAM: HistogramConfig = {
  buckets: [1, 5, 10, 25, 50, 100, 250, 500, 1000],
  format: (bucket, previous) => {
    if (typeof previous === 'undefined') {
      return `<${bucket}`;
    }
    return previous === bucket ? `${bucket}` : `${previous}-${bucket}`;
  }
};

const PINO_LEVEL_ORDER = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

class MetricsRegistry {
  private readonly resetListeners = new Set<() => void>();
  private readonly logLevelCounters = new Map<string, number>();
  private readonly logLevelByDetector = new Map<string, Map<string, number>>();
  private readonly logLevelChangeCounters = new Map<string, number>();
  private currentLogLevel = 'info';
  private lastLogLevelChangeAt: number | null = null;
  private lastErrorAt: number | null = null;
  private lastErrorMessage: string | null = null;
  private readonly eventsByDetector = new Map<string, number>();
  private readonly eventsBySeverity = new Map<string, number>();
  private totalEvents = 0;
  private lastEventTimestamp: number | null = null;
  private readonly latencyStats = new Map<string, DetectorLatencyState>();
  private readonly histograms = new Map<string, Map<string, number>>();
  private readonly histogramStats = new Map<string, { sum: number; count: number }>();
  private readonly histogramConfigs = new Map<string, HistogramConfig>();
  private readonly detectorMetrics = new Map<string, DetectorMetricState>();

  reset() {
    this.logLevelCounters.clear();
    this.logLevelByDetector.clear();
    this.logLevelChangeCounters.clear();
    this.currentLogLevel = 'info';
    this.lastLogLevelChangeAt = null;
    this.lastErrorAt = null;
    this.lastErrorMessage = null;
    this.eventsByDetector.clear();
    this.eventsBySeverity.clear();
    this.totalEvents = 0;
    this.lastEventTimestamp = null;
    this.latencyStats.clear();
    this.histograms.clear();
    this.histogramStats.clear();
    this.histogramConfigs.clear();
    this.detectorMetrics.clear();
    for (const listener of this.resetListeners) {
      listener();
    }
  }

  onReset(listener: () => void) {
    this.resetListeners.add(listener);
    return () => {
      this.resetListeners.delete(listener);
    };
  }

  incrementLogLevel(level: string, context?: { message?: string; detector?: string }) {
    const normalized = level.toLowerCase();
    this.logLevelCounters.set(normalized, (this.logLevelCounters.get(normalized) ?? 0) + 1);

    if (context?.detector) {
      const detectorMap = this.logLevelByDetector.get(context.detector) ?? new Map<string, number>();
      detectorMap.set(normalized, (detectorMap.get(normalized) ?? 0) + 1);
      this.logLevelByDetector.set(context.detector, detectorMap);
    }

    if (normalized === 'error' || normalized === 'fatal') {
      this.lastErrorAt = Date.now();
      if (context?.message) {
        this.lastErrorMessage = context.message;
      }
    }
  }

  recordLogLevelChange(level: string, previous?: string | null) {
    const normalized = level.toLowerCase();
    const previousNormalized = typeof previous === 'string' ? previous.toLowerCase() : null;
    this.currentLogLevel = normalized;
    if (!previousNormalized || previousNormalized === normalized) {
      return;
    }
    this.lastLogLevelChangeAt = Date.now();
    this.logLevelChangeCounters.set(
      normalized,
      (this.logLevelChangeCounters.get(normalized) ?? 0) + 1
    );
  }

  recordEvent(event: EventRecord) {
    this.totalEvents += 1;
    this.lastEventTimestamp = event.ts;
    this.eventsByDetector.set(event.detector, (this.eventsByDetector.get(event.detector) ?? 0) + 1);
    this.eventsBySeverity.set(event.severity, (this.eventsBySeverity.get(event.severity) ?? 0) + 1);
  }

  incrementDetectorCounter(detector: string, counter: string, amount = 1) {
    if (!Number.isFinite(amount)) {
      return;
    }
    const state = getDetectorMetricState(this.detectorMetrics, detector);
    state.counters.set(counter, (state.counters.get(counter) ?? 0) + amount);
    state.lastRunAt = Date.now();
  }

  setDetectorGauge(detector: string, gauge: string, value: number) {
    if (!Number.isFinite(value)) {
      return;
    }
    const state = getDetectorMetricState(this.detectorMetrics, detector);
    state.lastRunAt = Date.now();
    state.gauges.set(gauge, value);
  }

  recordDetectorError(detector: string, message: string) {
    const state = getDetectorMetricState(this.detectorMetrics, detector);
    const now = Date.now();
    state.lastRunAt = now;
    state.lastErrorAt = now;
    state.lastErrorMessage = message;
    state.counters.set('errors', (state.counters.get('errors') ?? 0) + 1);
  }

  observeLatency(metric: string, durationMs: number) {
    const current = this.latencyStats.get(metric) ?? {
      count: 0,
      totalMs: 0,
      minMs: Number.POSITIVE_INFINITY,
      maxMs: 0
    };

    this.latencyStats.set(metric, {
      count: current.count + 1,
      totalMs: current.totalMs + durationMs,
      minMs: Math.min(current.minMs, durationMs),
      maxMs: Math.max(current.maxMs, durationMs)
    });
  }

  observeHistogram(metric: string, value: number, config: HistogramConfig = DEFAULT_HISTOGRAM) {
    const histogramConfig = this.histogramConfigs.get(metric) ?? config;
    const histogram = this.ensureHistogram(metric, histogramConfig);

    if (Number.isFinite(value)) {
      const stats = this.histogramStats.get(metric);
      if (stats) {
        stats.sum += value;
        stats.count += 1;
      } else {
        this.histogramStats.set(metric, { sum: value, count: 1 });
      }
    }

    const bucketLabel = resolveHistogramBucket(value, histogramConfig);
    histogram.set(bucketLabel, (histogram.get(bucketLabel) ?? 0) + 1);
  }

  observeDetectorLatency(detector: string, durationMs: number) {
    const state = getDetectorMetricState(this.detectorMetrics, detector);
    state.lastRunAt = Date.now();
    const latency: DetectorLatencyState = state.latency ?? {
      count: 0,
      totalMs: 0,
      minMs: Number.POSITIVE_INFINITY,
      maxMs: 0
    };
    latency.count += 1;
    latency.totalMs += durationMs;
    latency.minMs = Math.min(latency.minMs, durationMs);
    latency.maxMs = Math.max(latency.maxMs, durationMs);
    state.latency = latency;
    const histogram = state.latencyHistogram ?? new Map<string, number>();
    const bucketLabel = resolveHistogramBucket(durationMs, DEFAULT_HISTOGRAM);
    histogram.set(bucketLabel, (histogram.get(bucketLabel) ?? 0) + 1);
    state.latencyHistogram = histogram;
    const metricName = `detector.${detector}.latency`;
    this.observeLatency(metricName, durationMs);
    this.observeHistogram(metricName, durationMs);
  }

  async time<T>(metric: string, fn: () => Promise<T> | T): Promise<T> {
    const start = performance.now();
    try {
      return await fn();
    } finally {
      this.observeLatency(metric, performance.now() - start);
    }
  }

  exportHistogramForPrometheus(metric: string, options: PrometheusHistogramOptions = {}): string {
    const histogram = this.histograms.get(metric);
    if (!histogram) {
      return '';
    }
    const histogramConfig = this.histogramConfigs.get(metric) ?? DEFAULT_HISTOGRAM;
    const stats = this.histogramStats.get(metric);
    return formatPrometheusHistogram(metric, histogram, histogramConfig, stats, options);
  }

  exportLogLevelMetrics() {
    return {
      byLevel: mapLogLevelCounters(this.logLevelCounters),
      byDetector: mapFromNested(this.logLevelByDetector),
      lastErrorAt: toIso(this.lastErrorAt),
      lastErrorMessage: this.lastErrorMessage,
      currentLevel: this.currentLogLevel,
      lastLevelChangeAt: toIso(this.lastLogLevelChangeAt),
      levelChanges: mapFrom(this.logLevelChangeCounters)
    };
  }

  exportLogLevelCountersForPrometheus() {
    const detectorSamples: GaugeSample[] = [];
    for (const [detector, counters] of this.logLevelByDetector.entries()) {
      for (const [level, value] of counters.entries()) {
        detectorSamples.push({ value, labels: { detector, level } });
      }
    }

    return [
      formatPrometheusGauge(
        `${METRIC_PREFIX}_log_level_total`,
        'Total log events grouped by Pino level',
        orderedLogLevelEntries(this.logLevelCounters).map(([level, value], order) => ({
          value,
          labels: { level },
          order
        }))
      ),
      formatPrometheusGauge(`${METRIC_PREFIX}_log_level_state`, 'Currently active Pino log level', [
        { value: 1, labels: { level: this.currentLogLevel } }
      ]),
      formatPrometheusGauge(
        `${METRIC_PREFIX}_log_level_detector_total`,
        'Total log events grouped by Pino level and detector',
        detectorSamples
      )
    ]
      .filter(Boolean)
      .join('\n');
  }

  exportDetectorCountersForPrometheus() {
    const counterSamples: GaugeSample[] = [];
    const gaugeSamples: GaugeSample[] = [];

    for (const [detector, state] of this.detectorMetrics.entries()) {
      for (const [counter, value] of state.counters.entries()) {
        counterSamples.push({ value, labels: { detector, counter } });
      }
      for (const [gauge, value] of state.gauges.entries()) {
        gaugeSamples.push({ value, labels: { detector, gauge } });
      }
    }

    return [
      formatPrometheusGauge(
        `${METRIC_PREFIX}_detector_counter_total`,
        'Detector counter totals grouped by detector and counter name',
        counterSamples
      ),
      formatPrometheusGauge(
        `${METRIC_PREFIX}_detector_gauge`,
        'Detector gauge values grouped by detector and gauge name',
        gaugeSamples
      )
    ]
      .filter(Boolean)
      .join('\n');
  }

  exportDetectorLatencyHistogram(detector: string) {
    return this.exportHistogramForPrometheus(`detector.${detector}.latency`, {
      metricName: `${METRIC_PREFIX}_detector_${detector}_latency_ms`,
      help: `Frame processing latency for the ${detector} detector in milliseconds`
    });
  }

  exportPrometheus(): string {
    const sections: string[] = [
      formatPrometheusGauge(`${METRIC_PREFIX}_events_total`, 'Total events published on the event bus', [
        { value: this.totalEvents }
      ]),
      this.exportLogLevelCountersForPrometheus(),
      this.exportDetectorCountersForPrometheus()
    ];
    for (const detector of Array.from(this.detectorMetrics.keys()).sort()) {
      sections.push(this.exportDetectorLatencyHistogram(detector));
    }
    return `${sections.filter(Boolean).join('\n')}\n`;
  }

  snapshot(): MetricsSnapshot {
    return {
      createdAt: new Date().toISOString(),
      events: {
        total: this.totalEvents,
        lastEventAt: toIso(this.lastEventTimestamp),
        byDetector: mapFrom(this.eventsByDetector),
        bySeverity: mapFrom(this.eventsBySeverity)
      },
      logs: this.exportLogLevelMetrics(),
      latencies: mapFromLatencies(this.latencyStats),
      histograms: mapFromHistograms(this.histograms),
      detectors: mapFromDetectors(this.detectorMetrics)
    };
  }

  private ensureHistogram(metric: string, config: HistogramConfig) {
    const histogram = this.histograms.get(metric);
    if (histogram) {
      return histogram;
    }
    const map = new Map<string, number>();
    this.histograms.set(metric, map);
    this.histogramConfigs.set(metric, config);
    return map;
  }
}

function toIso(value: number | null) {
  return value === null ? null : new Date(value).toISOString();
}

function orderedLogLevelEntries(source: Map<string, number>): Array<[string, number]> {
  const normalized = new Map(source);
  const ordered: Array<[string, number]> = [];
  for (const level of PINO_LEVEL_ORDER) {
    ordered.push([level, normalized.get(level) ?? 0]);
    normalized.delete(level);
  }
  const extras = Array.from(normalized.entries()).sort(([a], [b]) => a.localeCompare(b));
  return ordered.concat(extras);
}

function mapLogLevelCounters(source: Map<string, number>): CounterMap {
  return Object.fromEntries(orderedLogLevelEntries(source));
}

function mapFrom(source: Map<string, number>): CounterMap {
  return Object.fromEntries(Array.from(source.entries()).sort(([a], [b]) => a.localeCompare(b)));
}

function mapFromNested(source: Map<string, Map<string, number>>): Record<string, CounterMap> {
  const result: Record<string, CounterMap> = {};
  const ordered = Array.from(source.entries()).sort(([a], [b]) => a.localeCompare(b));
  for (const [key, inner] of ordered) {
    result[key] = mapFrom(inner);
  }
  return result;
}

function mapLatency(stats: DetectorLatencyState): LatencyStats {
  return {
    count: stats.count,
    totalMs: stats.totalMs,
    minMs: stats.minMs === Number.POSITIVE_INFINITY ? 0 : stats.minMs,
    maxMs: stats.maxMs,
    averageMs: stats.count === 0 ? 0 : stats.totalMs / stats.count
  };
}

function mapFromLatencies(source: Map<string, DetectorLatencyState>): Record<string, LatencyStats> {
  const result: Record<string, LatencyStats> = {};
  for (const [name, stats] of source.entries()) {
    result[name] = mapLatency(stats);
  }
  return result;
}

function mapHistogram(source: Map<string, number>): HistogramSnapshot {
  return Object.fromEntries(
    Array.from(source.entries()).sort(([a], [b]) => compareHistogramKeys(a, b))
  );
}

function mapFromHistograms(source: Map<string, Map<string, number>>): Record<string, HistogramSnapshot> {
  const result: Record<string, HistogramSnapshot> = {};
  for (const [metric, histogram] of source.entries()) {
    result[metric] = mapHistogram(histogram);
  }
  return result;
}

function mapFromDetectors(source: Map<string, DetectorMetricState>): Record<string, DetectorSnapshot> {
  const result: Record<string, DetectorSnapshot> = {};
  const ordered = Array.from(source.entries()).sort(([a], [b]) => a.localeCompare(b));
  for (const [detector, state] of ordered) {
    result[detector] = {
      counters: mapFrom(state.counters),
      gauges: mapFrom(state.gauges),
      lastRunAt: toIso(state.lastRunAt),
      lastErrorAt: toIso(state.lastErrorAt),
      lastErrorMessage: state.lastErrorMessage,
      latency: state.latency ? mapLatency(state.latency) : null,
      latencyHistogram: state.latencyHistogram ? mapHistogram(state.latencyHistogram) : {}
    };
  }
  return result;
}

function getDetectorMetricState(map: Map<string, DetectorMetricState>, detector: string): DetectorMetricState {
  const existing = map.get(detector);
  if (existing) {
    return existing;
  }
  const created: DetectorMetricState = {
    counters: new Map<string, number>(),
    gauges: new Map<string, number>(),
    lastRunAt: null,
    lastErrorAt: null,
    lastErrorMessage: null,
    latency: null,
    latencyHistogram: null
  };
  map.set(detector, created);
  return created;
}

function compareHistogramKeys(a: string, b: string) {
  const extract = (key: string) => {
    if (key.startsWith('<')) {
      return [parseFloat(key.slice(1)), -1] as const;
    }
    if (key.endsWith('+')) {
      return [parseFloat(key.slice(0, -1)), Number.POSITIVE_INFINITY] as const;
    }
    const [start, end] = key.split('-').map(Number);
    return [start, end ?? start] as const;
  };

  const [aStart, aEnd] = extract(a);
  const [bStart, bEnd] = extract(b);
  if (aStart === bStart) {
    return aEnd - bEnd;
  }
  return aStart - bStart;
}

function resolveHistogramBucket(value: number, config: HistogramConfig) {
  const { buckets, format } = config;
  let previous: number | undefined;
  for (const bucket of buckets) {
    if (value < bucket) {
      return format(bucket, previous);
    }
    previous = bucket;
  }
  return `${buckets[buckets.length - 1]}+`;
}

function formatPrometheusHistogram(
  metricKey: string,
  histogram: Map<string, number>,
  config: HistogramConfig,
  stats: { sum: number; count: number } | undefined,
  options: PrometheusHistogramOptions
): string {
  const metricName = sanitizePrometheusMetricName(options.metricName ?? `${METRIC_PREFIX}_${metricKey}`);
  const lines: string[] = [];
  if (options.help) {
    lines.push(`# HELP ${metricName} ${escapePrometheusHelp(options.help)}`);
  }
  lines.push(`# TYPE ${metricName} histogram`);

  let cumulative = 0;
  let previous: number | undefined;
  for (const bucket of config.buckets) {
    cumulative += histogram.get(config.format(bucket, previous)) ?? 0;
    lines.push(`${metricName}_bucket{le="${formatPrometheusValue(bucket)}"} ${formatPrometheusValue(cumulative)}`);
    previous = bucket;
  }

  const overflowCount = histogram.get(`${config.buckets[config.buckets.length - 1]}+`) ?? 0;
  const totalCount = Math.max(cumulative + overflowCount, stats?.count ?? 0);
  lines.push(`${metricName}_bucket{le="+Inf"} ${formatPrometheusValue(totalCount)}`);
  lines.push(`${metricName}_sum ${formatPrometheusValue(stats?.sum ?? 0)}`);
  lines.push(`${metricName}_count ${formatPrometheusValue(totalCount)}`);

  return lines.join('\n');
}

/** Empty string when there is nothing to report, so callers can filter it out. */
function formatPrometheusGauge(metricName: string, help: string, samples: GaugeSample[]): string {
  const rows = samples
    .filter(sample => Number.isFinite(sample.value))
    .map(sample => ({ ...sample, labelString: formatPrometheusLabels(sample.labels ?? {}) }));
  if (rows.length === 0) {
    return '';
  }

  rows.sort((a, b) => {
    if (typeof a.order === 'number' && typeof b.order === 'number' && a.order !== b.order) {
      return a.order - b.order;
    }
    return a.labelString.localeCompare(b.labelString);
  });

  const name = sanitizePrometheusMetricName(metricName);
  return [
    `# HELP ${name} ${escapePrometheusHelp(help)}`,
    `# TYPE ${name} gauge`,
    ...rows.map(row => `${name}${row.labelString} ${formatPrometheusValue(row.value)}`)
  ].join('\n');
}

function sanitizePrometheusMetricName(name: string): string {
  const sanitized = name.replace(/[^A-Za-z0-9_]/g, '_');
  const lower = sanitized.replace(/_{2,}/g, '_').replace(/^_+|_+$/g, '').toLowerCase();
  if (!lower) {
    return `${METRIC_PREFIX}_metric`;
  }
  if (/^[0-9]/.test(lower)) {
    return `${METRIC_PREFIX}_${lower}`;
  }
  return lower;
}

function sanitizePrometheusLabelName(name: string): string {
  const sanitized = name.replace(/[^A-Za-z0-9_]/g, '_');
  const lower = sanitized.replace(/_{2,}/g, '_').replace(/^_+|_+$/g, '').toLowerCase();
  if (!lower) {
    return 'label';
  }
  return /^[0-9]/.test(lower) ? `_${lower}` : lower;
}

function escapePrometheusLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/"/g, '\\"');
}

function escapePrometheusHelp(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, ' ');
}

function formatPrometheusLabels(labels: Record<string, string>): string {
  const entries = Object.entries(labels).map(
    ([key, value]) => [sanitizePrometheusLabelName(key), value] as const
  );
  if (entries.length === 0) {
    return '';
  }
  entries.sort(([a], [b]) => a.localeCompare(b));
  return `{${entries.map(([key, value]) => `${key}="${escapePrometheusLabelValue(value)}"`).join(',')}}`;
}

function formatPrometheusValue(value: number): string {
  if (!Number.isFinite(value) || value === 0) {
    return '0';
  }
  if (Number.isInteger(value)) {
    return value.toString();
  }
  const fixed = value.toFixed(6).replace(/0+$/, '').replace(/\.$/, '');
  return fixed.length > 0 ? fixed : '0';
}

const defaultRegistry = new MetricsRegistry();

export type { HistogramSnapshot, MetricsSnapshot, DetectorSnapshot, LatencyStats, PrometheusHistogramOptions };
export { MetricsRegistry };
export default defaultRegistry;
