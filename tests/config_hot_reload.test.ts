import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  ConfigManager,
  loadConfigFromFile,
  parseConfig,
  validateConfig,
  type ConfigReloadEvent,
  type SentryConfig
} from '../src/config/index.js';
import { EventBus } from '../src/eventBus.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { startSentry, type SentryRuntime } from '../src/run-sentry.js';
import { FakeSource } from './helpers/frames.js';

let workdir: string;

function baseConfig(soundsDir = path.join(workdir, 'sounds')): SentryConfig {
  return {
    app: { name: 'ScareSentry' },
    logging: { level: 'silent' },
    stream: { url: 'rtsp://camera.test/stream' },
    detection: { sensitivityThreshold: 25, cooldownSeconds: 5, minMotionArea: 500 },
    audio: { soundsDir },
    http: { enabled: false, port: 0 }
  };
}

function validationError(config: unknown): string {
  try {
    validateConfig(config);
  } catch (error) {
    return error instanceof Error ? error.message : String(error);
  }
  return '';
}

function writeConfig(filePath: string, config: unknown) {
  fs.writeFileSync(filePath, JSON.stringify(config, null, 2));
}

beforeEach(() => {
  workdir = fs.mkdtempSync(path.join(os.tmpdir(), 'sentry-config-'));
});

afterEach(() => {
  fs.rmSync(workdir, { recursive: true, force: true });
});

describe('ConfigValidation', () => {
  it('ConfigDefaults ship a valid configuration', () => {
    const config = loadConfigFromFile('config/default.json');

    expect(config.detection).toMatchObject({ sensitivityThreshold: 25, cooldownSeconds: 5, minMotionArea: 500 });
    expect(config.audio.soundsDir).toBe('scary_sounds');
  });

  it('ConfigValidation reports schema errors by path', () => {
    const base = baseConfig();

    expect(validationError(base)).toBe('');
    expect(validationError({ app: base.app, logging: base.logging, stream: base.stream, detection: base.detection })).toBe(
      'config.audio is required'
    );
    expect(validationError({ ...base, stream: { url: 'cam', foo: 1 } })).toBe('config.stream.foo is not allowed');
    expect(
      validationError({ ...base, detection: { ...base.detection, sensitivityThreshold: 'high' } })
    ).toBe('config.detection.sensitivityThreshold must be a number');
    expect(validationError({ ...base, http: { port: 70000 } })).toBe('config.http.port must be <= 65535');
  });

  it('ConfigValidation applies the detection parameter bounds', () => {
    const base = baseConfig();

    expect(validationError({ ...base, detection: { ...base.detection, minMotionArea: 50 } })).toBe(
      'config.detection.minMotionArea must be between 100 and 2000'
    );
    expect(validationError({ ...base, detection: { ...base.detection, minMotionArea: 150.5 } })).toBe(
      'config.detection.minMotionArea must be an integer'
    );
    expect(
      validationError({ ...base, detection: { ...base.detection, sensitivityThreshold: 5, cooldownSeconds: 31 } })
    ).toBe(
      'config.detection.sensitivityThreshold must be between 10 and 100; config.detection.cooldownSeconds must be between 1 and 30'
    );
    expect(validationError({ ...base, detection: { ...base.detection, history: 10, warmupFrames: 20 } })).toBe(
      'config.detection.warmupFrames must not exceed config.detection.history'
    );
    expect(validationError({ ...base, stream: { url: '   ' } })).toBe('config.stream.url must not be empty');
  });

  it('ConfigParse rejects malformed JSON', () => {
    expect(() => parseConfig('{"app":')).toThrow(/^Failed to parse configuration: /);
  });
});

describe('ConfigManager', () => {
  it('ConfigManagerReload emits the previous and next configuration', () => {
    const file = path.join(workdir, 'config.json');
    writeConfig(file, baseConfig());
    const manager = new ConfigManager(file);
    const events: ConfigReloadEvent[] = [];
    manager.on('reload', (event: ConfigReloadEvent) => {
      events.push(event);
    });

    writeConfig(file, { ...baseConfig(), detection: { ...baseConfig().detection, cooldownSeconds: 9 } });
    const next = manager.reload();

    expect(manager.getPath()).toBe(file);
    expect(next.detection.cooldownSeconds).toBe(9);
    expect(manager.getConfig()).toBe(next);
    expect(events).toHaveLength(1);
    expect(events[0]?.previous.detection.cooldownSeconds).toBe(5);
    expect(events[0]?.next).toBe(next);
  });

  it('ConfigManagerWatch reloads a changed file', async () => {
    const file = path.join(workdir, 'config.json');
    writeConfig(file, baseConfig());
    const manager = new ConfigManager(file);
    const stopWatching = manager.watch();

    try {
      writeConfig(file, { ...baseConfig(), detection: { ...baseConfig().detection, minMotionArea: 800 } });

      await vi.waitFor(
        () => {
          expect(manager.getConfig().detection.minMotionArea).toBe(800);
        },
        { timeout: 2000, interval: 25 }
      );
    } finally {
      stopWatching();
    }
  });

  it('ConfigManagerWatch restores the last good file after an invalid edit', async () => {
    const file = path.join(workdir, 'config.json');
    writeConfig(file, baseConfig());
    const original = fs.readFileSync(file, 'utf-8');
    const manager = new ConfigManager(file);
    const errors: Error[] = [];
    manager.on('error', (error: Error) => {
      errors.push(error);
    });
    const stopWatching = manager.watch();

    try {
      writeConfig(file, { ...baseConfig(), detection: { ...baseConfig().detection, sensitivityThreshold: 500 } });

      await vi.waitFor(
        () => {
          expect(errors.length).toBeGreaterThan(0);
          expect(fs.readFileSync(file, 'utf-8')).toBe(original);
        },
        { timeout: 2000, interval: 25 }
      );
    } finally {
      stopWatching();
    }

    expect(errors[0]?.message).toBe('config.detection.sensitivityThreshold must be between 10 and 100');
    expect(manager.getConfig().detection.sensitivityThreshold).toBe(25);
  });
});

describe('SentryConfigReload', () => {
  let runtime: SentryRuntime | null = null;

  afterEach(async () => {
    await runtime?.stop();
    runtime = null;
  });

  function createLogger() {
    return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  }

  async function start(manager: ConfigManager, logger: ReturnType<typeof createLogger>) {
    runtime = await startSentry({
      configManager: manager,
      logger,
      bus: new EventBus({ log: { info: () => undefined }, metrics: new MetricsRegistry() }),
      createSource: () => new FakeSource(),
      http: false
    });
    return runtime;
  }

  it('SentryConfigReload updates parameters and the sound directory', async () => {
    const file = path.join(workdir, 'config.json');
    writeConfig(file, baseConfig());
    const manager = new ConfigManager(file);
    const logger = createLogger();
    const sentry = await start(manager, logger);
    const otherSounds = path.join(workdir, 'other-sounds');

    writeConfig(file, {
      ...baseConfig(otherSounds),
      detection: { sensitivityThreshold: 40, cooldownSeconds: 8, minMotionArea: 500 }
    });
    manager.reload();

    expect(sentry.parameters.snapshot()).toEqual({ sensitivityThreshold: 40, cooldownSeconds: 8, minMotionArea: 500 });
    expect(sentry.controller.parameters).toBe(sentry.parameters);
    expect(sentry.sounds.library.getDirectory()).toBe(otherSounds);
    expect(fs.existsSync(otherSounds)).toBe(true);
    expect(logger.info).toHaveBeenCalledWith(
      { sensitivityThreshold: 40, cooldownSeconds: 8, minMotionArea: 500, soundsDir: otherSounds },
      'configuration reloaded'
    );
  });

  it('SentryConfigReload applies only the detection fields an edit changed', async () => {
    const file = path.join(workdir, 'config.json');
    writeConfig(file, baseConfig());
    const manager = new ConfigManager(file);
    const sentry = await start(manager, createLogger());
    sentry.parameters.update({ sensitivityThreshold: 60, minMotionArea: 900 });

    writeConfig(file, {
      ...baseConfig(),
      stream: { url: 'rtsp://camera.test/porch' },
      detection: { ...baseConfig().detection, cooldownSeconds: 12 }
    });
    manager.reload();

    expect(sentry.parameters.snapshot()).toEqual({ sensitivityThreshold: 60, cooldownSeconds: 12, minMotionArea: 900 });
  });

  it('SentryConfigReload keeps running parameters after an invalid edit', async () => {
    const file = path.join(workdir, 'config.json');
    writeConfig(file, baseConfig());
    const manager = new ConfigManager(file);
    const logger = createLogger();
    const sentry = await start(manager, logger);

    writeConfig(file, { ...baseConfig(), detection: { ...baseConfig().detection, minMotionArea: 5 } });

    await vi.waitFor(
      () => {
        expect(logger.warn).toHaveBeenCalledWith(
          expect.objectContaining({ configPath: file, action: 'reload', restored: true }),
          'configuration reload failed'
        );
      },
      { timeout: 2000, interval: 25 }
    );
    expect(sentry.parameters.minMotionArea).toBe(500);
  });

  it('SentryConfigReload detaches from the manager on stop', async () => {
    const file = path.join(workdir, 'config.json');
    writeConfig(file, baseConfig());
    const manager = new ConfigManager(file);
    const sentry = await start(manager, createLogger());

    expect(manager.listenerCount('reload')).toBe(1);
    await sentry.stop();
    runtime = null;

    expect(manager.listenerCount('reload')).toBe(0);
    expect(manager.listenerCount('error')).toBe(0);
  });
});
