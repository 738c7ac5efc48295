import { spawn, type ChildProcess, type SpawnOptions } from 'node:child_process';
import logger from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import type { TriggerEvent, TriggerSink } from '../types.js';
import { resolveFfmpegBinary } from '../utils/ffmpeg.js';
import type { SoundFile, SoundLibrary } from './soundLibrary.js';

const DEFAULT_MAX_CONCURRENT = 2;
const DEFAULT_OUTPUT = { format: 'alsa', device: 'default' };
const DEFAULT_TONE_SOURCE = 'sine=frequency=200:sample_rate=22050:duration=1';
const DEFAULT_TONE_FILTER = 'tremolo=f=6:d=1';

export type Spawner = (command: string, args: string[], options: SpawnOptions) => ChildProcess;

type SinkLog = Pick<typeof logger, 'debug' | 'info' | 'warn' | 'error'>;

export type SoundPlayerSinkOptions = {
  library: SoundLibrary;
  output?: { format: string; device: string };
  maxConcurrent?: number;
  binary?: string;
  spawn?: Spawner;
  random?: () => number;
  log?: SinkLog;
  metrics?: MetricsRegistry;
};

export type PlaybackResult = {
  ok: boolean;
  sound: string;
  code: number | null;
};

/**
 * Plays a random clip from the library through ffmpeg on every trigger. With
 * an empty library a synthesised warbling tone is played instead.
 */
export class SoundPlayerSink implements TriggerSink {
  readonly name = 'sound';
  private readonly library: SoundLibrary;
  private readonly output: { format: string; device: string };
  private readonly maxConcurrent: number;
  private readonly binary: string;
  private readonly spawnProcess: Spawner;
  private readonly random: () => number;
  private readonly log: SinkLog;
  private readonly metrics: MetricsRegistry;
  private readonly active = new Set<ChildProcess>();

  constructor(options: SoundPlayerSinkOptions) {
    this.library = options.library;
    this.output = options.output ?? DEFAULT_OUTPUT;
    this.maxConcurrent = Math.max(1, Math.floor(options.maxConcurrent ?? DEFAULT_MAX_CONCURRENT));
    this.binary = options.binary ?? resolveFfmpegBinary();
    this.spawnProcess = options.spawn ?? spawn;
    this.random = options.random ?? Math.random;
    this.log = options.log ?? logger.child({ module: 'sound' });
    this.metrics = options.metrics ?? metrics;
  }

  activePlaybacks() {
    return this.active.size;
  }

  fire(event: TriggerEvent): void {
    if (this.active.size >= this.maxConcurrent) {
      this.metrics.incrementDetectorCounter('sound', 'skipped');
      this.log.warn(
        { detector: 'sound', active: this.active.size, maxConcurrent: this.maxConcurrent },
        'Skipping sound, playback limit reached'
      );
      return;
    }
    this.log.debug({ detector: 'sound', timestamp: event.timestamp }, 'Playing scare sound');
    void this.play(this.library.pick(this.random));
  }

  async testSound(): Promise<boolean> {
    const result = await this.play(this.library.pick(this.random));
    return result.ok;
  }

  /** Resolves once ffmpeg exits; never rejects. */
  play(sound: SoundFile | null): Promise<PlaybackResult> {
    const label = sound ? sound.name : 'default-tone';
    const args = buildPlaybackArgs(sound, this.output);

    return new Promise<PlaybackResult>(resolve => {
      let child: ChildProcess;
      try {
        child = this.spawnProcess(this.binary, args, { stdio: 'ignore' });
      } catch (error) {
        this.reportFailure(label, error);
        resolve({ ok: false, sound: label, code: null });
        return;
      }

      this.active.add(child);
      this.metrics.incrementDetectorCounter('sound', 'played');
      let settled = false;
      const settle = (result: PlaybackResult) => {
        if (settled) {
          return;
        }
        settled = true;
        this.active.delete(child);
        resolve(result);
      };

      child.once('error', error => {
        this.reportFailure(label, error);
        settle({ ok: false, sound: label, code: null });
      });
      child.once('exit', code => {
        if (code !== 0) {
          this.reportFailure(label, new Error(`ffmpeg exited with code ${String(code)}`));
          settle({ ok: false, sound: label, code });
          return;
        }
        settle({ ok: true, sound: label, code });
      });
    });
  }

  stopAll() {
    for (const child of this.active) {
      child.kill('SIGTERM');
    }
    this.active.clear();
  }

  private reportFailure(sound: string, error: unknown) {
    const err = error instanceof Error ? error : new Error(String(error));
    this.metrics.recordDetectorError('sound', err.message);
    this.log.error({ detector: 'sound', sound, err }, 'Sound playback failed');
  }
}

export function buildPlaybackArgs(
  sound: SoundFile | null,
  output: { format: string; device: string }
): string[] {
  const input = sound
    ? ['-i', sound.path]
    : ['-f', 'lavfi', '-i', DEFAULT_TONE_SOURCE, '-af', DEFAULT_TONE_FILTER];
  return ['-hide_banner', '-loglevel', 'error', '-nostdin', ...input, '-f', output.format, output.device];
}
