import config from 'config';
import { fileURLToPath } from 'node:url';
import eventBus from './eventBus.js';
import logger from './logger.js';
import metrics, { type MetricsSnapshot } from './metrics/index.js';
import { validateConfig } from './config/index.js';

export type HealthStatus = 'ok' | 'starting' | 'stopping' | 'degraded';

export type HealthIndicatorContext = {
  service: {
    status: string;
    startedAt: number | null;
  };
  metrics?: MetricsSnapshot;
  metricsCreatedAt?: string;
};

export type HealthIndicatorResult = {
  status: HealthStatus;
  details?: Record<string, unknown>;
};

export type HealthIndicator = (context: HealthIndicatorContext) =>
  | HealthIndicatorResult
  | Promise<HealthIndicatorResult>;

export type ShutdownHookContext = {
  reason: string;
  signal?: NodeJS.Signals;
};

export type ShutdownHook = (context: ShutdownHookContext) => void | Promise<void>;

type Registered<T> = {
  name: string;
  entry: T;
};

const healthIndicators: Registered<HealthIndicator>[] = [];
const shutdownHooks: Registered<ShutdownHook>[] = [];

function register<T>(list: Registered<T>[], name: string, entry: T) {
  const existingIndex = list.findIndex(item => item.name === name);
  if (existingIndex >= 0) {
    list[existingIndex] = { name, entry };
  } else {
    list.push({ name, entry });
  }

  return () => {
    const index = list.findIndex(item => item.name === name);
    if (index >= 0) {
      list.splice(index, 1);
    }
  };
}

export function registerHealthIndicator(name: string, indicator: HealthIndicator) {
  return register(healthIndicators, name, indicator);
}

export async function collectHealthChecks(context: HealthIndicatorContext) {
  const results: Array<{ name: string; status: HealthStatus; details?: Record<string, unknown> }> = [];
  const metricsSnapshot = context.metrics ?? metrics.snapshot();
  const enrichedContext: HealthIndicatorContext = {
    ...context,
    metrics: metricsSnapshot,
    metricsCreatedAt: metricsSnapshot.createdAt
  };
  for (const { name, entry } of healthIndicators) {
    try {
      const result = await entry(enrichedContext);
      results.push({ name, status: result.status, details: result.details });
    } catch (error) {
      results.push({
        name,
        status: 'degraded',
        details: { error: error instanceof Error ? error.message : String(error) }
      });
    }
  }
  return results;
}

export function registerShutdownHook(name: string, hook: ShutdownHook) {
  return register(shutdownHooks, name, hook);
}

/** Runs hooks newest first; a failing hook does not stop the rest. */
export async function runShutdownHooks(context: ShutdownHookContext) {
  const results: Array<{ name: string; status: 'ok' | 'error'; error?: Error }> = [];
  for (const { name, entry } of [...shutdownHooks].reverse()) {
    try {
      await entry(context);
      results.push({ name, status: 'ok' });
    } catch (error) {
      results.push({
        name,
        status: 'error',
        error: error instanceof Error ? error : new Error(String(error))
      });
    }
  }
  return results;
}

export function resetAppLifecycle() {
  healthIndicators.splice(0, healthIndicators.length);
  shutdownHooks.splice(0, shutdownHooks.length);
}

export async function bootstrap() {
  logger.info('Scare sentry bootstrap starting');

  const loadedConfig: unknown = config.util.toObject(config);
  validateConfig(loadedConfig);

  eventBus.emitEvent({
    source: 'system',
    detector: 'bootstrap',
    severity: 'info',
    message: 'system up',
    meta: {
      stream: loadedConfig.stream.url,
      parameters: {
        sensitivityThreshold: loadedConfig.detection.sensitivityThreshold,
        cooldownSeconds: loadedConfig.detection.cooldownSeconds,
        minMotionArea: loadedConfig.detection.minMotionArea
      }
    }
  });

  logger.info('Bootstrap completed');
  return loadedConfig;
}

if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  bootstrap().catch(error => {
    logger.error({ err: error }, 'Bootstrap failed');
    process.exitCode = 1;
  });
}
