import process from 'node:process';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import logger, { getAvailableLogLevels, getLogLevel, setLogLevel } from './logger.js';
import metrics, { type MetricsSnapshot } from './metrics/index.js';
import {
  collectHealthChecks,
  registerHealthIndicator,
  runShutdownHooks,
  type HealthStatus
} from './app.js';
import configManager, { loadConfigFromFile } from './config/index.js';
import { SoundLibrary } from './audio/soundLibrary.js';
import type { SentryRuntime } from './run-sentry.js';

type ServiceStatus = 'idle' | 'starting' | 'running' | 'stopping' | 'stopped';

type CliIo = {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
};

type SentryHandle = Pick<SentryRuntime, 'controller' | 'stats' | 'stop'>;

type ShutdownHookSummary = {
  name: string;
  status: 'ok' | 'error';
  error?: string;
};

type HealthPayload = {
  status: HealthStatus;
  state: ServiceStatus;
  uptimeSeconds: number;
  startedAt: string | null;
  timestamp: string;
  detection: {
    state: string;
    totalDetections: number;
    lastDetectionAt: string | null;
  } | null;
  checks: Array<{
    name: string;
    status: HealthStatus;
    details?: Record<string, unknown>;
  }>;
  metrics: MetricsSnapshot;
  application: {
    shutdown: {
      lastAt: string | null;
      lastReason: string | null;
      lastSignal: NodeJS.Signals | null;
      lastError: string | null;
      hooks: ShutdownHookSummary[];
    };
  };
};

const DEFAULT_IO: CliIo = { stdout: process.stdout, stderr: process.stderr };

const HEALTH_EXIT_CODES: Record<HealthStatus, number> = {
  ok: 0,
  degraded: 1,
  starting: 2,
  stopping: 3
};

const USAGE_LINES = [
  'Scare sentry CLI',
  '',
  'Usage:',
  '  scare-sentry start                     Run the detection service until a signal arrives',
  '  scare-sentry status [--json]           Print service status summary',
  '  scare-sentry check-config [--config path]  Validate a configuration file',
  '  scare-sentry sounds [--dir path]       List playable sounds',
  '  scare-sentry log-level [get|set <level>]  Get or set the active log level',
  '  scare-sentry help                      Show this message'
];

const LOG_LEVEL_USAGE = [
  'Usage:',
  '  scare-sentry log-level get',
  '  scare-sentry log-level set <level>'
].join('\n');

const state: {
  status: ServiceStatus;
  startedAt: number | null;
  runtime: SentryHandle | null;
  stopResolver: (() => void) | null;
  shutdownPromise: Promise<void> | null;
  lastShutdownError: Error | null;
  lastShutdownHooks: ShutdownHookSummary[];
  lastShutdownAt: number | null;
  lastShutdownReason: string | null;
  lastShutdownSignal: NodeJS.Signals | null;
} = {
  status: 'idle',
  startedAt: null,
  runtime: null,
  stopResolver: null,
  shutdownPromise: null,
  lastShutdownError: null,
  lastShutdownHooks: [],
  lastShutdownAt: null,
  lastShutdownReason: null,
  lastShutdownSignal: null
};

let removeDetectionIndicator: (() => void) | null = null;

function resetServiceState() {
  removeDetectionIndicator?.();
  removeDetectionIndicator = null;
  state.status = 'idle';
  state.startedAt = null;
  state.runtime = null;
  state.stopResolver = null;
  state.shutdownPromise = null;
  state.lastShutdownError = null;
  state.lastShutdownHooks = [];
  state.lastShutdownAt = null;
  state.lastShutdownReason = null;
  state.lastShutdownSignal = null;
}

export function getServiceState() {
  return { status: state.status, startedAt: state.startedAt };
}

export async function buildHealthPayload(): Promise<HealthPayload> {
  const snapshot = metrics.snapshot();
  const errorCount = snapshot.logs.byLevel.error ?? 0;
  const fatalCount = snapshot.logs.byLevel.fatal ?? 0;

  const checks = await collectHealthChecks({
    service: { status: state.status, startedAt: state.startedAt },
    metrics: snapshot
  });

  let status: HealthStatus = 'ok';
  if (state.status === 'starting') {
    status = 'starting';
  } else if (state.status === 'stopping') {
    status = 'stopping';
  } else if (errorCount > 0 || fatalCount > 0 || checks.some(check => check.status !== 'ok')) {
    status = 'degraded';
  }

  const runtime = state.runtime;
  let detection: HealthPayload['detection'] = null;
  if (runtime) {
    const stats = runtime.stats.snapshot();
    detection = {
      state: runtime.controller.getState(),
      totalDetections: stats.totalDetections,
      lastDetectionAt:
        stats.lastDetectionTimestamp === null ? null : new Date(stats.lastDetectionTimestamp).toISOString()
    };
  }

  const now = Date.now();
  return {
    status,
    state: state.status,
    uptimeSeconds: state.startedAt ? Math.max(0, Math.round((now - state.startedAt) / 1000)) : 0,
    startedAt: state.startedAt ? new Date(state.startedAt).toISOString() : null,
    timestamp: new Date(now).toISOString(),
    detection,
    checks,
    metrics: snapshot,
    application: {
      shutdown: {
        lastAt: state.lastShutdownAt ? new Date(state.lastShutdownAt).toISOString() : null,
        lastReason: state.lastShutdownReason,
        lastSignal: state.lastShutdownSignal,
        lastError: state.lastShutdownError?.message ?? null,
        hooks: state.lastShutdownHooks.map(hook => ({ ...hook }))
      }
    }
  };
}

export async function runCli(argv = process.argv.slice(2), io: CliIo = DEFAULT_IO): Promise<number> {
  const command = argv[0] ?? 'start';

  switch (command) {
    case 'start':
      return startService(io);
    case 'status': {
      const json = argv.includes('--json') || argv.includes('-j');
      return printStatus(io, { json });
    }
    case 'check-config':
      return runCheckConfigCommand(argv.slice(1), io);
    case 'sounds':
      return runSoundsCommand(argv.slice(1), io);
    case 'log-level':
      return runLogLevelCommand(argv.slice(1), io);
    case 'help':
    case '--help':
    case '-h':
      io.stdout.write(`${USAGE_LINES.join('\n')}\n`);
      return 0;
    default:
      io.stderr.write(`Unknown command: ${command}\n`);
      io.stderr.write(`${USAGE_LINES.join('\n')}\n`);
      return 1;
  }
}

function readOption(args: string[], name: string): { value: string | null; error: string | null } {
  const index = args.indexOf(name);
  if (index === -1) {
    return { value: null, error: null };
  }
  const value = args[index + 1];
  if (!value || value.startsWith('-')) {
    return { value: null, error: `Missing value for ${name}` };
  }
  return { value, error: null };
}

async function runCheckConfigCommand(args: string[], io: CliIo): Promise<number> {
  const option = readOption(args, '--config');
  if (option.error) {
    io.stderr.write(`${option.error}\n`);
    return 1;
  }
  const filePath = option.value ?? configManager.getPath();

  try {
    const loaded = loadConfigFromFile(filePath);
    const { sensitivityThreshold, cooldownSeconds, minMotionArea } = loaded.detection;
    io.stdout.write(`Configuration OK: ${path.resolve(filePath)}\n`);
    io.stdout.write(
      `sensitivityThreshold=${sensitivityThreshold} cooldownSeconds=${cooldownSeconds} minMotionArea=${minMotionArea}\n`
    );
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`Configuration invalid: ${message}\n`);
    return 1;
  }
}

async function runSoundsCommand(args: string[], io: CliIo): Promise<number> {
  const option = readOption(args, '--dir');
  if (option.error) {
    io.stderr.write(`${option.error}\n`);
    return 1;
  }
  const directory = option.value ?? configManager.getConfig().audio.soundsDir;

  const library = new SoundLibrary(directory);
  const sounds = library.reload();
  if (sounds.length === 0) {
    io.stdout.write(`No sounds found in ${library.getDirectory()} (a generated tone will be used)\n`);
    return 0;
  }
  io.stdout.write(`${sounds.length} sound(s) in ${library.getDirectory()}\n`);
  for (const sound of sounds) {
    io.stdout.write(`  ${sound.name}\n`);
  }
  return 0;
}

async function runLogLevelCommand(args: string[], io: CliIo): Promise<number> {
  const [first, second] = args;
  const available = getAvailableLogLevels();

  if (!first || first === 'get') {
    io.stdout.write(`${getLogLevel()}\n`);
    return 0;
  }

  if (first === 'help' || first === '--help' || first === '-h') {
    io.stdout.write(`${LOG_LEVEL_USAGE}\n`);
    return 0;
  }

  if (first === 'set') {
    if (!second) {
      io.stderr.write('Missing value for log level\n');
      io.stderr.write(`${LOG_LEVEL_USAGE}\n`);
      return 1;
    }
    return applyLogLevel(second, io);
  }

  if (!available.includes(first.toLowerCase())) {
    io.stderr.write(`Unknown log level "${first}" (available: ${available.join(', ')})\n`);
    return 1;
  }

  return applyLogLevel(first, io);
}

function applyLogLevel(level: string, io: CliIo): number {
  try {
    const normalized = setLogLevel(level);
    io.stdout.write(`Log level set to ${normalized}\n`);
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    io.stderr.write(`${message}\n`);
    return 1;
  }
}

async function startService(io: CliIo): Promise<number> {
  if (state.status === 'running') {
    io.stdout.write('Scare sentry is already running\n');
    return 0;
  }

  const { startSentry } = await import('./run-sentry.js');

  state.status = 'starting';

  let runtime: SentryHandle;
  try {
    runtime = await metrics.time('sentry.startup.ms', () => startSentry());
  } catch (error) {
    state.status = 'stopped';
    state.runtime = null;
    logger.error({ err: error }, 'Scare sentry failed to start');
    io.stderr.write('Scare sentry failed to start. Check logs for details.\n');
    return 1;
  }

  state.runtime = runtime;
  state.status = 'running';
  state.startedAt = Date.now();
  removeDetectionIndicator?.();
  removeDetectionIndicator = registerHealthIndicator('detection', () => ({
    status: 'ok',
    details: { state: runtime.controller.getState() }
  }));
  logger.info({ startedAt: state.startedAt }, 'Scare sentry started');
  io.stdout.write('Scare sentry started\n');

  await new Promise<void>(resolve => {
    state.stopResolver = resolve;
    registerSignalHandlers();
  });

  return state.lastShutdownError ? 1 : 0;
}

async function printStatus(io: CliIo, options: { json?: boolean } = {}): Promise<number> {
  const payload = await buildHealthPayload();
  if (options.json) {
    io.stdout.write(`${JSON.stringify(payload)}\n`);
    return resolveHealthExitCode(payload.status);
  }

  const summary = [`Scare sentry status: ${payload.state}`, `Health: ${payload.status}`];
  if (payload.detection) {
    summary.push(`Detection: ${payload.detection.state}`);
    summary.push(`Total detections: ${payload.detection.totalDetections}`);
  }
  const lastError = payload.metrics.logs.lastErrorMessage;
  if (lastError) {
    summary.push(`Last error: ${lastError}`);
  }

  io.stdout.write(`${summary.join('\n')}\n`);
  return resolveHealthExitCode(payload.status);
}

function registerSignalHandlers() {
  const handleSignal = (signal: NodeJS.Signals) => {
    void performShutdown('signal', signal);
  };

  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT', 'SIGQUIT'];
  for (const signal of signals) {
    process.once(signal, handleSignal);
  }
}

export function resolveHealthExitCode(status: HealthStatus) {
  return HEALTH_EXIT_CODES[status] ?? 1;
}

async function performShutdown(reason: string, signal?: NodeJS.Signals): Promise<Error | null> {
  if (state.status === 'idle' || state.status === 'stopped') {
    return null;
  }

  if (state.shutdownPromise) {
    await state.shutdownPromise;
    return state.lastShutdownError;
  }

  state.status = 'stopping';
  state.lastShutdownError = null;
  state.lastShutdownHooks = [];
  state.lastShutdownReason = reason;
  state.lastShutdownSignal = signal ?? null;
  state.lastShutdownAt = Date.now();
  logger.info({ reason, signal }, 'Scare sentry shutting down');

  const shutdownTask = (async () => {
    const runtime = state.runtime;
    try {
      if (runtime) {
        await metrics.time('sentry.shutdown.ms', () => runtime.stop());
      }
    } catch (error) {
      state.lastShutdownError = error instanceof Error ? error : new Error(String(error));
      logger.error({ err: error }, 'Error during shutdown');
    } finally {
      const results = await runShutdownHooks({ reason, signal });
      state.lastShutdownHooks = results.map(result => ({
        name: result.name,
        status: result.status,
        error: result.error?.message
      }));
      const failed = results.find(result => result.error);
      if (failed?.error) {
        logger.error({ err: failed.error, hook: failed.name }, 'Shutdown hook failed');
        state.lastShutdownError ??= failed.error;
      }

      removeDetectionIndicator?.();
      removeDetectionIndicator = null;
      state.runtime = null;
      state.status = 'stopped';
      state.startedAt = null;
      state.stopResolver?.();
      state.stopResolver = null;
      state.shutdownPromise = null;
      logger.info({ reason, signal }, 'Scare sentry stopped');
    }
  })();

  state.shutdownPromise = shutdownTask;
  await shutdownTask;
  return state.lastShutdownError;
}

export const __test__ = {
  getState: () => ({ ...state }),
  reset: resetServiceState,
  shutdown: performShutdown
};

const resolvedPath = path.resolve(process.argv[1] ?? '');
const modulePath = fileURLToPath(import.meta.url);

if (resolvedPath === modulePath) {
  runCli().then(
    code => {
      process.exit(code);
    },
    error => {
      logger.error({ err: error }, 'Scare sentry CLI failed');
      process.exit(1);
    }
  );
}
