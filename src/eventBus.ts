import { EventEmitter } from 'node:events';
import logger from './logger.js';
import metrics, { type MetricsRegistry } from './metrics/index.js';
import type { EventPayload, EventRecord } from './types.js';

const EVENT_CHANNEL = 'event';
const DEFAULT_HISTORY_LIMIT = 200;

type EventLog = Pick<typeof logger, 'info'>;

interface EventBusDependencies {
  log?: EventLog;
  metrics?: Pick<MetricsRegistry, 'recordEvent'>;
  historyLimit?: number;
}

/**
 * In-process fan-out for detector events. Every published event is logged,
 * counted and kept in a bounded history that the HTTP API reads back.
 */
class EventBus extends EventEmitter {
  private readonly log: EventLog;
  private readonly metrics: Pick<MetricsRegistry, 'recordEvent'>;
  private readonly historyLimit: number;
  private history: EventRecord[] = [];

  constructor(dependencies: EventBusDependencies = {}) {
    super();
    this.log = dependencies.log ?? logger;
    this.metrics = dependencies.metrics ?? metrics;
    this.historyLimit = Math.max(1, Math.floor(dependencies.historyLimit ?? DEFAULT_HISTORY_LIMIT));

    this.on(EVENT_CHANNEL, (event: EventRecord) => {
      this.remember(event);
      this.metrics.recordEvent(event);
      this.log.info(
        {
          detector: event.detector,
          source: event.source,
          severity: event.severity,
          meta: event.meta
        },
        event.message
      );
    });
  }

  emitEvent(payload: EventPayload): boolean {
    const normalized: EventRecord = {
      ts: normalizeTimestamp(payload.ts),
      source: payload.source,
      detector: payload.detector,
      severity: payload.severity,
      message: payload.message,
      meta: payload.meta
    };
    return this.emit(EVENT_CHANNEL, normalized);
  }

  /** Newest first. */
  recent(limit = 50, detector?: string): EventRecord[] {
    const size = Math.max(0, Math.floor(limit));
    const result: EventRecord[] = [];
    for (let index = this.history.length - 1; index >= 0 && result.length < size; index -= 1) {
      const event = this.history[index];
      if (!detector || event.detector === detector) {
        result.push(event);
      }
    }
    return result;
  }

  clearHistory() {
    this.history = [];
  }

  private remember(event: EventRecord) {
    this.history.push(event);
    if (this.history.length > this.historyLimit) {
      this.history.splice(0, this.history.length - this.historyLimit);
    }
  }
}

function normalizeTimestamp(ts?: number | Date): number {
  if (typeof ts === 'undefined' || ts === null) {
    return Date.now();
  }

  if (ts instanceof Date) {
    return ts.getTime();
  }

  return ts;
}

const eventBus = new EventBus();

export default eventBus;
export { EventBus };
export type { EventBusDependencies };
