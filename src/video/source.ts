import { EventEmitter } from 'node:events';
import { performance } from 'node:perf_hooks';
import { PassThrough, type Readable } from 'node:stream';
import type { FfmpegCommand } from 'fluent-ffmpeg';
import { ConnectionError, FrameFormatError } from '../errors.js';
import metrics from '../metrics/index.js';
import type { Frame, FrameSource } from '../types.js';
import { ffmpeg } from '../utils/ffmpeg.js';
import { decodePngFrame } from './utils.js';

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
const DEFAULT_FRAMES_PER_SECOND = 30;
const DEFAULT_WIDTH = 640;
const DEFAULT_HEIGHT = 480;
const DEFAULT_START_TIMEOUT_MS = 8000;
const DEFAULT_WATCHDOG_TIMEOUT_MS = 5000;
const DEFAULT_FORCE_KILL_TIMEOUT_MS = 3000;
const DEFAULT_MAX_BUFFER_BYTES = 5 * 1024 * 1024;
const DEFAULT_INPUT_ARGS = ['-fflags', 'nobuffer', '-flags', 'low_delay'];

/** The slice of an ffmpeg process the frame source drives. */
export interface FrameCommand extends EventEmitter {
  pipe(): Readable;
  kill(signal: NodeJS.Signals): void;
}

export type CommandFactoryOptions = {
  input: string;
  framesPerSecond: number;
  width: number;
  height: number;
  inputArgs: string[];
};

export type FfmpegFrameSourceOptions = {
  framesPerSecond?: number;
  width?: number;
  height?: number;
  startTimeoutMs?: number;
  watchdogTimeoutMs?: number;
  forceKillTimeoutMs?: number;
  maxBufferBytes?: number;
  inputArgs?: string[];
  commandFactory?: (options: CommandFactoryOptions) => FrameCommand;
  decode?: (png: Buffer, ts: number) => Frame;
  clock?: () => number;
};

type PendingOpen = {
  resolve: () => void;
  reject: (error: ConnectionError) => void;
};

class FluentFrameCommand extends EventEmitter implements FrameCommand {
  constructor(private readonly command: FfmpegCommand) {
    super();
    command.on('error', (error: Error) => {
      if (this.listenerCount('error') > 0) {
        this.emit('error', error);
      }
    });
    command.on('end', () => {
      this.emit('end');
    });
  }

  pipe(): Readable {
    const output = new PassThrough();
    this.command.pipe(output, { end: true });
    return output;
  }

  kill(signal: NodeJS.Signals) {
    this.command.kill(signal);
  }
}

function createFluentCommand(options: CommandFactoryOptions): FrameCommand {
  const command = ffmpeg(options.input);
  if (options.inputArgs.length > 0) {
    command.inputOptions(options.inputArgs);
  }
  command
    .outputOptions('-vf', `fps=${options.framesPerSecond},scale=${options.width}:${options.height}`)
    .outputOptions('-f', 'image2pipe')
    .outputOptions('-vcodec', 'png');
  return new FluentFrameCommand(command);
}

/**
 * Pulls PNG frames out of an ffmpeg child. `open()` settles on the first
 * decoded frame; failures after that surface as `error` or `end` and the
 * source stays down until opened again.
 */
export class FfmpegFrameSource extends EventEmitter implements FrameSource {
  private readonly options: FfmpegFrameSourceOptions;
  private command: FrameCommand | null = null;
  private commandCleanup: (() => void) | null = null;
  private stream: Readable | null = null;
  private streamCleanup: (() => void) | null = null;
  private buffer: Buffer = Buffer.alloc(0);
  private pendingOpen: PendingOpen | null = null;
  private startTimer: NodeJS.Timeout | null = null;
  private watchdogTimer: NodeJS.Timeout | null = null;
  private closePromise: Promise<void> | null = null;
  private identifier: string | null = null;
  private live = false;

  constructor(options: FfmpegFrameSourceOptions = {}) {
    super();
    this.options = options;
  }

  isLive() {
    return this.live;
  }

  open(identifier: string): Promise<void> {
    if (this.command || this.pendingOpen) {
      return Promise.reject(
        new ConnectionError(`Frame source already open on ${this.identifier ?? identifier}`, {
          source: identifier
        })
      );
    }

    this.identifier = identifier;
    this.live = false;
    this.buffer = Buffer.alloc(0);

    return new Promise<void>((resolve, reject) => {
      this.pendingOpen = { resolve, reject };
      const timeoutMs = this.options.startTimeoutMs ?? DEFAULT_START_TIMEOUT_MS;
      this.startTimer = setTimeout(() => {
        this.startTimer = null;
        this.fail(new ConnectionError(`No frame from ${identifier} within ${timeoutMs}ms`, { source: identifier }));
      }, timeoutMs);

      let command: FrameCommand;
      try {
        command = this.createCommand(identifier);
      } catch (error) {
        this.fail(this.toConnectionError(error, 'failed to start ffmpeg'));
        return;
      }
      this.attachCommand(command);

      try {
        this.consume(command.pipe());
      } catch (error) {
        this.fail(this.toConnectionError(error, 'failed to pipe ffmpeg output'));
      }
    });
  }

  async close(): Promise<void> {
    if (this.closePromise) {
      await this.closePromise;
      return;
    }

    const pending = this.pendingOpen;
    if (pending) {
      this.pendingOpen = null;
      pending.reject(
        new ConnectionError(`Frame source ${this.identifier ?? 'unknown'} closed before the first frame`, {
          source: this.identifier
        })
      );
    }

    this.live = false;
    this.clearTimers();
    this.cleanupStream();
    const command = this.detachCommand();
    this.closePromise = this.terminate(command).finally(() => {
      this.closePromise = null;
    });
    await this.closePromise;
  }

  private createCommand(identifier: string): FrameCommand {
    const options: CommandFactoryOptions = {
      input: identifier,
      framesPerSecond: this.options.framesPerSecond ?? DEFAULT_FRAMES_PER_SECOND,
      width: this.options.width ?? DEFAULT_WIDTH,
      height: this.options.height ?? DEFAULT_HEIGHT,
      inputArgs: this.options.inputArgs ?? DEFAULT_INPUT_ARGS
    };
    return (this.options.commandFactory ?? createFluentCommand)(options);
  }

  private attachCommand(command: FrameCommand) {
    this.command = command;

    const onError = (error: Error) => {
      if (this.command !== command) {
        return;
      }
      this.fail(this.toConnectionError(error, 'ffmpeg failed'));
    };
    const onEnd = () => {
      if (this.command !== command) {
        return;
      }
      this.fail(null);
    };

    command.on('error', onError);
    command.once('end', onEnd);
    this.commandCleanup = () => {
      command.off('error', onError);
      command.off('end', onEnd);
    };
  }

  private detachCommand(): FrameCommand | null {
    const command = this.command;
    this.command = null;
    this.commandCleanup?.();
    this.commandCleanup = null;
    return command;
  }

  private consume(stream: Readable) {
    this.cleanupStream();
    this.stream = stream;

    const onData = (chunk: Buffer) => {
      this.buffer = Buffer.concat([this.buffer, chunk]);
      const { frames, remainder, corrupted } = this.extractFrames(this.buffer);
      this.buffer = remainder;

      for (const png of frames) {
        this.handlePng(png);
      }

      if (corrupted) {
        metrics.incrementDetectorCounter('ffmpeg', 'corruptFrames');
        this.emit('frame-error', new FrameFormatError('Frame buffer overflow without a PNG boundary'));
      }
    };

    const onStreamError = (error: Error) => {
      this.fail(this.toConnectionError(error, 'frame stream failed'));
    };

    stream.on('data', onData);
    stream.once('error', onStreamError);

    this.streamCleanup = () => {
      stream.off('data', onData);
      stream.off('error', onStreamError);
    };
  }

  private handlePng(png: Buffer) {
    const ts = (this.options.clock ?? defaultClock)();
    let frame: Frame;
    try {
      frame = (this.options.decode ?? decodePngFrame)(png, ts);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      metrics.incrementDetectorCounter('ffmpeg', 'corruptFrames');
      this.emit('frame-error', new FrameFormatError(`Undecodable frame: ${message}`));
      return;
    }

    metrics.incrementDetectorCounter('ffmpeg', 'frames');
    this.resetWatchdog();

    const pending = this.pendingOpen;
    if (pending) {
      this.pendingOpen = null;
      this.clearStartTimer();
      this.live = true;
      pending.resolve();
    }

    this.emit('frame', frame);
  }

  /** `null` means ffmpeg ended cleanly. */
  private fail(error: ConnectionError | null) {
    const command = this.detachCommand();
    const wasLive = this.live;
    this.live = false;
    this.clearTimers();
    this.cleanupStream();

    const pending = this.pendingOpen;
    if (pending) {
      this.pendingOpen = null;
      pending.reject(
        error ??
          new ConnectionError(`Frame source ${this.identifier ?? 'unknown'} ended before the first frame`, {
            source: this.identifier
          })
      );
    } else if (wasLive) {
      if (error) {
        metrics.recordDetectorError('ffmpeg', error.message);
        if (this.listenerCount('error') > 0) {
          this.emit('error', error);
        }
      } else {
        this.emit('end');
      }
    }

    void this.terminate(command);
  }

  private terminate(command: FrameCommand | null): Promise<void> {
    if (!command) {
      return Promise.resolve();
    }

    return new Promise<void>(resolve => {
      let killTimer: NodeJS.Timeout | null = null;
      const finish = () => {
        if (killTimer) {
          clearTimeout(killTimer);
          killTimer = null;
        }
        command.off('end', finish);
        command.off('error', finish);
        resolve();
      };

      command.once('end', finish);
      command.once('error', finish);

      const delay = this.options.forceKillTimeoutMs ?? DEFAULT_FORCE_KILL_TIMEOUT_MS;
      safeKill(command, 'SIGTERM');
      if (delay <= 0) {
        safeKill(command, 'SIGKILL');
        finish();
        return;
      }
      killTimer = setTimeout(() => {
        killTimer = null;
        safeKill(command, 'SIGKILL');
        finish();
      }, delay);
      killTimer.unref?.();
    });
  }

  private extractFrames(buffer: Buffer) {
    let working = buffer;
    const frames: Buffer[] = [];
    let corrupted = false;
    const maxBuffer = this.options.maxBufferBytes ?? DEFAULT_MAX_BUFFER_BYTES;

    while (true) {
      const pngStart = working.indexOf(PNG_SIGNATURE);

      if (pngStart === -1) {
        if (working.length > maxBuffer) {
          corrupted = true;
          working = Buffer.alloc(0);
        }
        break;
      }

      if (pngStart > 0) {
        working = working.subarray(pngStart);
      }

      const frame = slicePng(working);
      if (!frame) {
        if (working.length > maxBuffer) {
          corrupted = true;
          working = Buffer.alloc(0);
        }
        break;
      }

      frames.push(frame.png);
      working = frame.remainder;
    }

    return { frames, remainder: working, corrupted };
  }

  private resetWatchdog() {
    this.clearWatchdog();
    const timeoutMs = this.options.watchdogTimeoutMs ?? DEFAULT_WATCHDOG_TIMEOUT_MS;
    if (timeoutMs <= 0) {
      return;
    }
    this.watchdogTimer = setTimeout(() => {
      this.watchdogTimer = null;
      this.fail(
        new ConnectionError(`No frame from ${this.identifier ?? 'unknown'} for ${timeoutMs}ms`, {
          source: this.identifier
        })
      );
    }, timeoutMs);
  }

  private clearStartTimer() {
    if (this.startTimer) {
      clearTimeout(this.startTimer);
      this.startTimer = null;
    }
  }

  private clearWatchdog() {
    if (this.watchdogTimer) {
      clearTimeout(this.watchdogTimer);
      this.watchdogTimer = null;
    }
  }

  private clearTimers() {
    this.clearStartTimer();
    this.clearWatchdog();
  }

  private cleanupStream() {
    if (!this.stream) {
      return;
    }

    this.streamCleanup?.();
    this.streamCleanup = null;

    if (!this.stream.destroyed) {
      this.stream.destroy();
    }

    this.stream = null;
    this.buffer = Buffer.alloc(0);
  }

  private toConnectionError(error: unknown, context: string) {
    if (error instanceof ConnectionError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new ConnectionError(`Frame source ${this.identifier ?? 'unknown'} ${context}: ${message}`, {
      source: this.identifier,
      cause: error
    });
  }
}

function safeKill(command: FrameCommand, signal: NodeJS.Signals) {
  try {
    command.kill(signal);
  } catch (error) {
    if (!(error instanceof Error)) {
      throw error;
    }
    // Already-exited processes throw on kill; nothing left to release.
  }
}

function defaultClock() {
  return performance.timeOrigin + performance.now();
}

export type SliceResult = {
  png: Buffer;
  remainder: Buffer;
};

export function slicePng(buffer: Buffer): SliceResult | null {
  if (buffer.length < PNG_SIGNATURE.length) {
    return null;
  }

  if (!buffer.subarray(0, PNG_SIGNATURE.length).equals(PNG_SIGNATURE)) {
    return null;
  }

  let offset = PNG_SIGNATURE.length;

  while (offset + 8 <= buffer.length) {
    const length = buffer.readUInt32BE(offset);
    const chunkType = buffer.toString('ascii', offset + 4, offset + 8);
    const chunkEnd = offset + 8 + length + 4;

    if (chunkEnd > buffer.length) {
      return null;
    }

    offset = chunkEnd;

    if (chunkType === 'IEND') {
      return {
        png: buffer.subarray(0, offset),
        remainder: buffer.subarray(offset)
      };
    }
  }

  return null;
}
