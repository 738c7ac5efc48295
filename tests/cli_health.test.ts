import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Writable } from 'node:stream';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { registerShutdownHook, resetAppLifecycle } from '../src/app.js';
import { StatsStore } from '../src/detection/statsStore.js';
import { getLogLevel, setLogLevel } from '../src/logger.js';
import metrics from '../src/metrics/index.js';

const { startSentryMock } = vi.hoisted(() => ({ startSentryMock: vi.fn() }));

vi.mock('../src/run-sentry.js', () => ({
  startSentry: startSentryMock
}));

import { __test__, buildHealthPayload, resolveHealthExitCode, runCli } from '../src/cli.js';

type TestIo = {
  io: { stdout: NodeJS.WritableStream; stderr: NodeJS.WritableStream };
  stdout: () => string;
  stderr: () => string;
};

function createTestIo(): TestIo {
  let stdout = '';
  let stderr = '';

  const makeWritable = (append: (value: string) => void) =>
    new Writable({
      write(chunk: Buffer | string, _encoding, callback) {
        append(typeof chunk === 'string' ? chunk : chunk.toString());
        callback();
      }
    });

  return {
    io: {
      stdout: makeWritable(value => {
        stdout += value;
      }),
      stderr: makeWritable(value => {
        stderr += value;
      })
    },
    stdout: () => stdout,
    stderr: () => stderr
  };
}

function validConfig(overrides: { minMotionArea?: number } = {}) {
  return {
    app: { name: 'ScareSentry' },
    logging: { level: 'silent' },
    stream: { url: 'rtsp://camera.test/stream' },
    detection: { sensitivityThreshold: 30, cooldownSeconds: 4, minMotionArea: overrides.minMotionArea ?? 600 },
    audio: { soundsDir: 'scary_sounds' }
  };
}

let workdir: string;

beforeEach(() => {
  workdir = fs.mkdtempSync(path.join(os.tmpdir(), 'sentry-cli-'));
  __test__.reset();
  resetAppLifecycle();
  metrics.reset();
  startSentryMock.mockReset();
});

afterEach(() => {
  fs.rmSync(workdir, { recursive: true, force: true });
});

describe('CliCommands', () => {
  it('CliHelp prints the usage text', async () => {
    const { io, stdout } = createTestIo();

    expect(await runCli(['help'], io)).toBe(0);
    expect(stdout().split('\n')[0]).toBe('Scare sentry CLI');
    expect(stdout()).toContain('  scare-sentry check-config [--config path]  Validate a configuration file\n');
  });

  it('CliUnknownCommand fails with usage on stderr', async () => {
    const { io, stderr } = createTestIo();

    expect(await runCli(['haunt'], io)).toBe(1);
    expect(stderr().startsWith('Unknown command: haunt\nScare sentry CLI\n')).toBe(true);
  });

  it('CliCheckConfig accepts a valid file and prints its parameters', async () => {
    const file = path.join(workdir, 'sentry.json');
    fs.writeFileSync(file, JSON.stringify(validConfig()));
    const { io, stdout } = createTestIo();

    expect(await runCli(['check-config', '--config', file], io)).toBe(0);
    expect(stdout()).toBe(
      `Configuration OK: ${file}\nsensitivityThreshold=30 cooldownSeconds=4 minMotionArea=600\n`
    );
  });

  it('CliCheckConfig reports the validation error for an invalid file', async () => {
    const file = path.join(workdir, 'sentry.json');
    fs.writeFileSync(file, JSON.stringify(validConfig({ minMotionArea: 50 })));
    const { io, stderr } = createTestIo();

    expect(await runCli(['check-config', '--config', file], io)).toBe(1);
    expect(stderr()).toBe('Configuration invalid: config.detection.minMotionArea must be between 100 and 2000\n');
  });

  it('CliCheckConfig requires a value for --config', async () => {
    const { io, stderr } = createTestIo();

    expect(await runCli(['check-config', '--config'], io)).toBe(1);
    expect(stderr()).toBe('Missing value for --config\n');
  });

  it('CliSounds lists the sound directory or announces the generated tone', async () => {
    const { io, stdout } = createTestIo();
    expect(await runCli(['sounds', '--dir', workdir], io)).toBe(0);
    expect(stdout()).toBe(`No sounds found in ${workdir} (a generated tone will be used)\n`);

    fs.writeFileSync(path.join(workdir, 'scream.wav'), 'placeholder');
    fs.writeFileSync(path.join(workdir, 'cackle.mp3'), 'placeholder');
    const second = createTestIo();
    expect(await runCli(['sounds', '--dir', workdir], second.io)).toBe(0);
    expect(second.stdout()).toBe(`2 sound(s) in ${workdir}\n  cackle.mp3\n  scream.wav\n`);
  });

  it('CliLogLevel gets and sets the runtime level', async () => {
    const initial = getLogLevel();
    try {
      const get = createTestIo();
      expect(await runCli(['log-level'], get.io)).toBe(0);
      expect(get.stdout()).toBe(`${initial}\n`);

      const set = createTestIo();
      expect(await runCli(['log-level', 'set', 'WARN'], set.io)).toBe(0);
      expect(set.stdout()).toBe('Log level set to warn\n');
      expect(getLogLevel()).toBe('warn');

      const missing = createTestIo();
      expect(await runCli(['log-level', 'set'], missing.io)).toBe(1);
      expect(missing.stderr().startsWith('Missing value for log level\n')).toBe(true);

      const unknown = createTestIo();
      expect(await runCli(['log-level', 'loud'], unknown.io)).toBe(1);
      expect(unknown.stderr().startsWith('Unknown log level "loud" (available: ')).toBe(true);
    } finally {
      setLogLevel(initial);
    }
  });
});

describe('CliService', () => {
  function createRuntime(stop: () => Promise<void> = async () => undefined) {
    const stats = new StatsStore();
    stats.recordDetection(15000);
    return {
      controller: { getState: () => 'cooldown' },
      stats,
      stop: vi.fn(stop)
    };
  }

  it('CliStatus reports an idle service', async () => {
    const { io, stdout } = createTestIo();

    expect(await runCli(['status'], io)).toBe(0);
    expect(stdout()).toBe('Scare sentry status: idle\nHealth: ok\n');
  });

  it('CliStart runs until shutdown and reports detection health', async () => {
    const runtime = createRuntime();
    startSentryMock.mockResolvedValue(runtime);
    const { io, stdout } = createTestIo();

    const running = runCli(['start'], io);
    await vi.waitFor(() => {
      expect(stdout()).toBe('Scare sentry started\n');
    });

    const payload = await buildHealthPayload();
    expect(payload.status).toBe('ok');
    expect(payload.state).toBe('running');
    expect(payload.detection).toEqual({
      state: 'cooldown',
      totalDetections: 1,
      lastDetectionAt: '1970-01-01T00:00:15.000Z'
    });
    expect(payload.checks).toEqual([{ name: 'detection', status: 'ok', details: { state: 'cooldown' } }]);

    const status = createTestIo();
    expect(await runCli(['status'], status.io)).toBe(0);
    expect(status.stdout()).toBe(
      'Scare sentry status: running\nHealth: ok\nDetection: cooldown\nTotal detections: 1\n'
    );

    await expect(__test__.shutdown('test')).resolves.toBeNull();
    await expect(running).resolves.toBe(0);
    expect(runtime.stop).toHaveBeenCalledTimes(1);
    expect(__test__.getState().status).toBe('stopped');
    expect((await buildHealthPayload()).application.shutdown).toMatchObject({
      lastReason: 'test',
      lastSignal: null,
      lastError: null,
      hooks: []
    });
  });

  it('CliStart reports a failed start', async () => {
    startSentryMock.mockRejectedValue(new Error('port in use'));
    const { io, stderr } = createTestIo();

    expect(await runCli(['start'], io)).toBe(1);
    expect(stderr()).toBe('Scare sentry failed to start. Check logs for details.\n');
    expect(__test__.getState().status).toBe('stopped');
  });

  it('CliShutdown sets a failing exit code when a hook throws', async () => {
    startSentryMock.mockResolvedValue(createRuntime());
    registerShutdownHook('flush', () => {
      throw new Error('flush failed');
    });
    const { io, stdout } = createTestIo();

    const running = runCli(['start'], io);
    await vi.waitFor(() => {
      expect(stdout()).toBe('Scare sentry started\n');
    });

    const error = await __test__.shutdown('test');
    expect(error?.message).toBe('flush failed');
    await expect(running).resolves.toBe(1);
    expect((await buildHealthPayload()).application.shutdown.hooks).toEqual([
      { name: 'flush', status: 'error', error: 'flush failed' }
    ]);
  });

  it('CliHealthExitCodes follow the health status', () => {
    expect(resolveHealthExitCode('ok')).toBe(0);
    expect(resolveHealthExitCode('degraded')).toBe(1);
    expect(resolveHealthExitCode('starting')).toBe(2);
    expect(resolveHealthExitCode('stopping')).toBe(3);
  });
});
