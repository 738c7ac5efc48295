import { EventEmitter } from 'node:events';
import { performance } from 'node:perf_hooks';
import logger from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import {
  ConnectionError,
  FrameFormatError,
  InvalidStateTransitionError,
  ModelUnconvergedWarning
} from '../errors.js';
import type {
  DetectionParametersValues,
  DetectionState,
  Frame,
  FrameSource,
  Region,
  Statistics,
  TriggerEvent,
  TriggerSink
} from '../types.js';
import { assertFrame } from '../video/utils.js';
import { BackgroundModel, type BackgroundModelStatus } from './backgroundModel.js';
import { FrameSlot, scheduleImmediate, type DrainScheduler } from './frameSlot.js';
import { MotionExtractor } from './motionExtractor.js';
import { DetectionParameters } from './parameters.js';
import { StatsStore } from './statsStore.js';

const DETECTOR = 'motion';

type ControllerLog = Pick<typeof logger, 'debug' | 'info' | 'warn' | 'error'>;

export type SourceFactory = (identifier: string) => FrameSource;

export type DetectionControllerOptions = {
  createSource: SourceFactory;
  parameters?: DetectionParameters;
  stats?: StatsStore;
  model?: BackgroundModel;
  extractor?: MotionExtractor;
  sinks?: TriggerSink[];
  log?: ControllerLog;
  metrics?: MetricsRegistry;
  /** Runs each sink dispatch. */
  scheduler?: DrainScheduler;
  /** Runs the frame-slot drain. */
  drainScheduler?: DrainScheduler;
  clock?: () => number;
};

export type StateChangeEvent = {
  previous: DetectionState;
  next: DetectionState;
  ts: number;
};

export type SkipReason = 'malformed' | 'out-of-order' | 'error';

export type CycleOutcome =
  | { kind: 'idle' }
  | { kind: 'skipped'; reason: SkipReason; error?: Error }
  | { kind: 'paused' }
  | { kind: 'warming-up'; framesSeen: number }
  | { kind: 'cooldown'; remainingMs: number; totalMotionArea: number }
  | { kind: 'quiet' }
  | { kind: 'triggered'; event: TriggerEvent };

export type ControllerSnapshot = Statistics & {
  state: DetectionState;
  parameters: Readonly<DetectionParametersValues>;
  cooldownRemainingMs: number;
  model: BackgroundModelStatus;
  source: string | null;
  droppedFrames: number;
  skippedFrames: number;
};

type SourceBinding = {
  source: FrameSource;
  identifier: string;
  detach: () => void;
};

const defaultClock = () => performance.timeOrigin + performance.now();

/**
 * Drives the monitoring loop: frames from the source pass through a single
 * slot into processFrame(), which classifies, extracts regions and fires the
 * sinks when motion shows up outside a cooldown window.
 */
export class DetectionController extends EventEmitter {
  readonly parameters: DetectionParameters;
  readonly stats: StatsStore;
  private readonly createSource: SourceFactory;
  private readonly model: BackgroundModel;
  private readonly extractor: MotionExtractor;
  private readonly sinks: TriggerSink[];
  private readonly log: ControllerLog;
  private readonly metrics: MetricsRegistry;
  private readonly scheduler: DrainScheduler;
  private readonly clock: () => number;
  private readonly slot: FrameSlot;
  private state: DetectionState = 'idle';
  private binding: SourceBinding | null = null;
  private opening: SourceBinding | null = null;
  private attempt = 0;
  private lastFrameTs: number | null = null;
  private cooldownUntil: number | null = null;
  private warnedUnconverged = false;
  private skippedFrames = 0;

  constructor(options: DetectionControllerOptions) {
    super();
    this.createSource = options.createSource;
    this.parameters = options.parameters ?? new DetectionParameters();
    this.stats = options.stats ?? new StatsStore();
    this.model = options.model ?? new BackgroundModel();
    this.extractor = options.extractor ?? new MotionExtractor();
    this.sinks = [...(options.sinks ?? [])];
    this.log = options.log ?? logger.child({ module: 'detection' });
    this.metrics = options.metrics ?? metrics;
    this.scheduler = options.scheduler ?? scheduleImmediate;
    this.clock = options.clock ?? defaultClock;
    this.slot = new FrameSlot(frame => {
      this.processFrame(frame);
    }, options.drainScheduler ?? scheduleImmediate);
  }

  getState(): DetectionState {
    return this.state;
  }

  isStarting() {
    return this.opening !== null;
  }

  addSink(sink: TriggerSink) {
    this.sinks.push(sink);
  }

  async start(identifier: string): Promise<void> {
    if (this.opening) {
      throw new InvalidStateTransitionError('start', 'starting');
    }
    if (this.state !== 'idle') {
      throw new InvalidStateTransitionError('start', this.state);
    }

    const attempt = ++this.attempt;
    const source = this.createSource(identifier);
    const binding = this.bind(source, identifier);
    this.opening = binding;
    this.log.info({ detector: DETECTOR, source: identifier }, 'Opening frame source');

    try {
      await source.open(identifier);
    } catch (error) {
      binding.detach();
      if (this.opening === binding) {
        this.opening = null;
      }
      const connectionError =
        attempt !== this.attempt
          ? new ConnectionError(`Start of ${identifier} aborted by stop`, { source: identifier, cause: error })
          : toConnectionError(error, identifier);
      this.metrics.recordDetectorError(DETECTOR, connectionError.message);
      this.log.error({ detector: DETECTOR, source: identifier, err: connectionError }, 'Failed to open frame source');
      throw connectionError;
    }

    if (attempt !== this.attempt) {
      binding.detach();
      await this.closeSource(binding);
      throw new ConnectionError(`Start of ${identifier} aborted by stop`, { source: identifier });
    }

    this.opening = null;
    this.binding = binding;
    this.model.initialize();
    this.lastFrameTs = null;
    this.warnedUnconverged = false;
    // The cooldown deadline outlives the session.
    const now = this.clock();
    if (this.cooldownUntil !== null && now >= this.cooldownUntil) {
      this.cooldownUntil = null;
    }
    this.setState(this.cooldownUntil === null ? 'monitoring' : 'cooldown', now);
  }

  async stop(): Promise<void> {
    const pending = this.opening;
    if (pending) {
      this.opening = null;
      this.attempt += 1;
      pending.detach();
      this.log.info({ detector: DETECTOR, source: pending.identifier }, 'Aborting frame source open');
      await this.closeSource(pending);
      return;
    }

    if (this.state === 'idle') {
      throw new InvalidStateTransitionError('stop', this.state);
    }

    const binding = this.binding;
    this.binding = null;
    binding?.detach();
    this.slot.clear();
    this.setState('idle', this.clock());
    if (binding) {
      await this.closeSource(binding);
    }
  }

  pause() {
    if (this.state !== 'monitoring' && this.state !== 'cooldown') {
      throw new InvalidStateTransitionError('pause', this.opening ? 'starting' : this.state);
    }
    this.setState('paused', this.clock());
  }

  resume() {
    if (this.state !== 'paused') {
      throw new InvalidStateTransitionError('resume', this.opening ? 'starting' : this.state);
    }
    const lastTs = this.lastFrameTs ?? Number.NEGATIVE_INFINITY;
    const next = this.cooldownUntil !== null && lastTs < this.cooldownUntil ? 'cooldown' : 'monitoring';
    this.setState(next, this.clock());
  }

  /** One detection cycle. Synchronous; sinks are dispatched on the scheduler. */
  processFrame(frame: Frame): CycleOutcome {
    if (this.state === 'idle') {
      return { kind: 'idle' };
    }

    const started = performance.now();
    const params = this.parameters.snapshot();
    try {
      assertFrame(frame);
      if (this.lastFrameTs !== null && frame.ts < this.lastFrameTs) {
        return this.skip('out-of-order');
      }
      this.lastFrameTs = frame.ts;
      this.metrics.incrementDetectorCounter(DETECTOR, 'frames');

      const mask = this.model.classify(frame, { varThreshold: params.sensitivityThreshold });

      if (this.state === 'paused') {
        return { kind: 'paused' };
      }

      if (!this.model.isConverged()) {
        const { framesSeen } = this.model.status();
        this.warnUnconverged(framesSeen);
        return { kind: 'warming-up', framesSeen };
      }

      const regions = this.extractor.extract(mask, params.minMotionArea);
      const totalMotionArea = this.extractor.totalMotionArea(regions);
      this.metrics.setDetectorGauge(DETECTOR, 'motionArea', totalMotionArea);

      if (this.cooldownUntil !== null) {
        if (frame.ts < this.cooldownUntil) {
          this.setState('cooldown', frame.ts);
          return { kind: 'cooldown', remainingMs: this.cooldownUntil - frame.ts, totalMotionArea };
        }
        this.cooldownUntil = null;
        this.setState('monitoring', frame.ts);
      }

      if (regions.length === 0) {
        return { kind: 'quiet' };
      }

      return { kind: 'triggered', event: this.fire(frame.ts, totalMotionArea, regions, params) };
    } catch (error) {
      if (error instanceof FrameFormatError) {
        this.log.warn({ detector: DETECTOR, err: error }, 'Skipping malformed frame');
        return this.skip('malformed', error);
      }
      const err = error instanceof Error ? error : new Error(String(error));
      this.metrics.recordDetectorError(DETECTOR, err.message);
      this.log.error({ detector: DETECTOR, err }, 'Detection cycle failed');
      return this.skip('error', err);
    } finally {
      this.metrics.observeDetectorLatency(DETECTOR, performance.now() - started);
    }
  }

  snapshot(): ControllerSnapshot {
    const stats = this.stats.snapshot();
    return {
      state: this.state,
      totalDetections: stats.totalDetections,
      lastDetectionTimestamp: stats.lastDetectionTimestamp,
      parameters: this.parameters.snapshot(),
      cooldownRemainingMs: this.cooldownRemaining(),
      model: this.model.status(),
      source: this.binding?.identifier ?? null,
      droppedFrames: this.slot.droppedFrames(),
      skippedFrames: this.skippedFrames
    };
  }

  private fire(
    ts: number,
    totalMotionArea: number,
    regions: Region[],
    params: Readonly<DetectionParametersValues>
  ): TriggerEvent {
    this.cooldownUntil = ts + params.cooldownSeconds * 1000;
    const stats = this.stats.recordDetection(ts);
    const event: TriggerEvent = { timestamp: ts, totalMotionArea, regions };
    this.setState('cooldown', ts);
    this.metrics.incrementDetectorCounter(DETECTOR, 'triggers');
    this.log.info(
      {
        detector: DETECTOR,
        totalMotionArea,
        regions: regions.length,
        totalDetections: stats.totalDetections,
        cooldownSeconds: params.cooldownSeconds
      },
      'Motion trigger fired'
    );
    this.emit('trigger', event);
    this.dispatch(event);
    return event;
  }

  private dispatch(event: TriggerEvent) {
    for (const sink of this.sinks) {
      this.scheduler(() => {
        try {
          const result = sink.fire(event);
          if (result instanceof Promise) {
            result.catch(error => {
              this.reportSinkFailure(sink, error);
            });
          }
        } catch (error) {
          this.reportSinkFailure(sink, error);
        }
      });
    }
  }

  private reportSinkFailure(sink: TriggerSink, error: unknown) {
    const err = error instanceof Error ? error : new Error(String(error));
    this.metrics.incrementDetectorCounter(DETECTOR, 'sinkFailures');
    this.log.error({ detector: DETECTOR, sink: sink.name, err }, 'Trigger sink failed');
  }

  private warnUnconverged(framesSeen: number) {
    if (this.warnedUnconverged) {
      return;
    }
    this.warnedUnconverged = true;
    const warning = new ModelUnconvergedWarning(framesSeen, this.model.status().warmupFrames);
    this.log.warn({ detector: DETECTOR, framesSeen }, warning.message);
    this.emit('warning', warning);
  }

  private skip(reason: SkipReason, error?: Error): CycleOutcome {
    this.skippedFrames += 1;
    this.metrics.incrementDetectorCounter(DETECTOR, 'skippedFrames');
    return error ? { kind: 'skipped', reason, error } : { kind: 'skipped', reason };
  }

  private cooldownRemaining() {
    if (this.cooldownUntil === null || (this.state !== 'cooldown' && this.state !== 'paused')) {
      return 0;
    }
    const reference = this.lastFrameTs ?? this.clock();
    return Math.max(0, this.cooldownUntil - reference);
  }

  private setState(next: DetectionState, ts: number) {
    const previous = this.state;
    if (previous === next) {
      return;
    }
    this.state = next;
    this.log.info({ detector: DETECTOR, previous, next }, 'Detection state changed');
    this.emit('state', { previous, next, ts } satisfies StateChangeEvent);
  }

  private bind(source: FrameSource, identifier: string): SourceBinding {
    const onFrame = (frame: Frame) => {
      if (this.binding?.source === source && this.state !== 'idle') {
        this.slot.offer(frame);
      }
    };
    const onFrameError = (error: Error) => {
      this.skippedFrames += 1;
      this.metrics.incrementDetectorCounter(DETECTOR, 'corruptFrames');
      this.log.warn({ detector: DETECTOR, source: identifier, err: error }, 'Skipping corrupt frame');
    };
    const onError = (error: Error) => {
      this.handleConnectionLost(source, toConnectionError(error, identifier));
    };
    const onEnd = () => {
      this.handleConnectionLost(source, new ConnectionError(`Frame source ${identifier} ended`, { source: identifier }));
    };

    source.on('frame', onFrame);
    source.on('frame-error', onFrameError);
    source.on('error', onError);
    source.on('end', onEnd);

    return {
      source,
      identifier,
      detach: () => {
        source.off('frame', onFrame);
        source.off('frame-error', onFrameError);
        source.off('error', onError);
        source.off('end', onEnd);
      }
    };
  }

  private handleConnectionLost(source: FrameSource, error: ConnectionError) {
    const binding = this.binding;
    if (!binding || binding.source !== source) {
      return;
    }
    this.binding = null;
    binding.detach();
    this.slot.clear();
    this.setState('idle', this.clock());
    this.metrics.recordDetectorError(DETECTOR, error.message);
    this.log.error({ detector: DETECTOR, source: binding.identifier, err: error }, 'Frame source connection lost');
    if (this.listenerCount('error') > 0) {
      this.emit('error', error);
    }
    void this.closeSource(binding);
  }

  private async closeSource(binding: SourceBinding) {
    try {
      await binding.source.close();
    } catch (error) {
      this.log.warn({ detector: DETECTOR, source: binding.identifier, err: error }, 'Failed to close frame source');
    }
  }
}

function toConnectionError(error: unknown, identifier: string): ConnectionError {
  if (error instanceof ConnectionError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ConnectionError(`Frame source ${identifier} failed: ${message}`, { source: identifier, cause: error });
}
