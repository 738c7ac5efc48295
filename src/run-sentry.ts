import { SoundLibrary } from './audio/soundLibrary.js';
import { SoundPlayerSink, type Spawner } from './audio/soundPlayerSink.js';
import configManager, { type ConfigManager, type ConfigReloadEvent, type SentryConfig } from './config/index.js';
import { BackgroundModel } from './detection/backgroundModel.js';
import { DetectionController, type SourceFactory } from './detection/detectionController.js';
import { DetectionParameters, PARAMETER_NAMES } from './detection/parameters.js';
import { StatsStore } from './detection/statsStore.js';
import type { ConnectionError, ModelUnconvergedWarning } from './errors.js';
import type { DetectionParametersValues } from './types.js';
import defaultBus, { type EventBus } from './eventBus.js';
import loggerModule, { setLogLevel } from './logger.js';
import { startHttpServer, type HttpServerRuntime } from './server/http.js';
import { EventBusSink } from './sinks/eventBusSink.js';
import { FfmpegFrameSource } from './video/source.js';

type SentryLogger = Pick<typeof loggerModule, 'info' | 'warn' | 'error'>;

export interface SentryStartOptions {
  config?: SentryConfig;
  configManager?: ConfigManager;
  bus?: EventBus;
  logger?: SentryLogger;
  createSource?: SourceFactory;
  spawn?: Spawner;
  http?: { port?: number; host?: string } | false;
}

export type SentryRuntime = {
  controller: DetectionController;
  parameters: DetectionParameters;
  stats: StatsStore;
  sounds: { library: SoundLibrary; player: SoundPlayerSink };
  http: HttpServerRuntime | null;
  stop: () => Promise<void>;
};

export async function startSentry(options: SentryStartOptions = {}): Promise<SentryRuntime> {
  const bus = options.bus ?? defaultBus;
  const logger = options.logger ?? loggerModule;
  const manager = options.configManager ?? configManager;
  const injectedConfig = options.config;
  let activeConfig = injectedConfig ?? manager.getConfig();

  const applyConfiguredLogLevel = (value: unknown) => {
    if (typeof value !== 'string') {
      return;
    }
    try {
      setLogLevel(value);
    } catch (error) {
      logger.warn({ err: error, level: value }, 'Failed to apply configured log level');
    }
  };

  applyConfiguredLogLevel(activeConfig.logging.level);

  const detection = activeConfig.detection;
  const parameters = new DetectionParameters({
    sensitivityThreshold: detection.sensitivityThreshold,
    cooldownSeconds: detection.cooldownSeconds,
    minMotionArea: detection.minMotionArea
  });
  const stats = new StatsStore();
  const model = new BackgroundModel({
    history: detection.history,
    warmupFrames: detection.warmupFrames,
    learningRate: detection.learningRate,
    denoise: detection.denoise
  });

  const createSource: SourceFactory =
    options.createSource ??
    (() => {
      const stream = activeConfig.stream;
      return new FfmpegFrameSource({
        framesPerSecond: stream.framesPerSecond,
        width: stream.width,
        height: stream.height,
        startTimeoutMs: stream.startTimeoutMs,
        watchdogTimeoutMs: stream.watchdogTimeoutMs,
        inputArgs: stream.inputArgs
      });
    });

  const library = new SoundLibrary(activeConfig.audio.soundsDir);
  library.reload();
  const player = new SoundPlayerSink({
    library,
    output: activeConfig.audio.output,
    maxConcurrent: activeConfig.audio.maxConcurrent,
    spawn: options.spawn
  });

  const controller = new DetectionController({
    createSource,
    parameters,
    stats,
    model,
    sinks: [player, new EventBusSink({ bus, source: 'camera' })]
  });

  const handleControllerError = (error: ConnectionError) => {
    logger.error({ err: error, source: error.source }, 'Detection stopped, stream connection lost');
    bus.emitEvent({
      source: error.source ?? 'camera',
      detector: 'stream',
      severity: 'critical',
      message: error.message
    });
  };
  const handleControllerWarning = (warning: ModelUnconvergedWarning) => {
    bus.emitEvent({
      source: 'camera',
      detector: 'model',
      severity: 'info',
      message: warning.message,
      meta: { framesSeen: warning.framesSeen, warmupFrames: warning.warmupFrames }
    });
  };
  controller.on('error', handleControllerError);
  controller.on('warning', handleControllerWarning);

  let stopWatching: (() => void) | null = null;

  const handleReload = ({ previous, next }: ConfigReloadEvent) => {
    activeConfig = next;
    // Only fields the edit changed are applied; values set over the API otherwise stay.
    const edited: Partial<DetectionParametersValues> = {};
    for (const name of PARAMETER_NAMES) {
      if (previous.detection[name] !== next.detection[name]) {
        edited[name] = next.detection[name];
      }
    }
    if (Object.keys(edited).length > 0) {
      try {
        parameters.update(edited);
      } catch (error) {
        logger.warn({ err: error }, 'Rejected detection parameters from configuration');
      }
    }

    if (previous.audio.soundsDir !== next.audio.soundsDir) {
      library.setDirectory(next.audio.soundsDir);
    }

    applyConfiguredLogLevel(next.logging.level);

    logger.info(
      {
        sensitivityThreshold: parameters.sensitivityThreshold,
        cooldownSeconds: parameters.cooldownSeconds,
        minMotionArea: parameters.minMotionArea,
        soundsDir: library.getDirectory()
      },
      'configuration reloaded'
    );
  };

  const handleManagerError = (error: unknown) => {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.warn(
      { err, configPath: manager.getPath(), action: 'reload', restored: true },
      'configuration reload failed'
    );
  };

  if (!injectedConfig) {
    stopWatching = manager.watch();
    manager.on('reload', handleReload);
    manager.on('error', handleManagerError);
  }

  let http: HttpServerRuntime | null = null;
  const httpConfig = activeConfig.http;
  if (options.http !== false && httpConfig?.enabled !== false) {
    http = await startHttpServer({
      controller,
      defaultSource: () => activeConfig.stream.url,
      port: options.http?.port ?? httpConfig?.port,
      host: options.http?.host ?? httpConfig?.host,
      bus,
      sounds: { library, player }
    });
  }

  if (activeConfig.stream.autoStart) {
    const url = activeConfig.stream.url;
    void controller.start(url).catch(error => {
      logger.error({ err: error, source: url }, 'Automatic start failed, staying idle');
    });
  }

  const stop = async () => {
    if (!injectedConfig) {
      manager.off('reload', handleReload);
      manager.off('error', handleManagerError);
      stopWatching?.();
      stopWatching = null;
    }
    if (controller.isStarting() || controller.getState() !== 'idle') {
      await controller.stop();
    }
    controller.off('error', handleControllerError);
    controller.off('warning', handleControllerWarning);
    player.stopAll();
    if (http) {
      await http.close();
      http = null;
    }
  };

  return {
    controller,
    parameters,
    stats,
    sounds: { library, player },
    get http() {
      return http;
    },
    stop
  };
}
