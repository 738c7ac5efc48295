import type { IncomingMessage, ServerResponse } from 'node:http';
import type { SoundLibrary } from '../../audio/soundLibrary.js';
import type { SoundPlayerSink } from '../../audio/soundPlayerSink.js';
import type { DetectionController } from '../../detection/detectionController.js';
import { PARAMETER_NAMES, validateParameter } from '../../detection/parameters.js';
import {
  ConnectionError,
  InvalidParameterError,
  InvalidStateTransitionError
} from '../../errors.js';
import logger from '../../logger.js';
import metricsModule, { type MetricsRegistry } from '../../metrics/index.js';
import type { DetectionParametersValues } from '../../types.js';
import {
  type Handler,
  MalformedBodyError,
  isRecord,
  readJsonBody,
  sendJson,
  sendText
} from '../respond.js';

export interface ControlRouterOptions {
  controller: DetectionController;
  defaultSource: () => string;
  sounds?: { library: SoundLibrary; player: SoundPlayerSink } | null;
  metrics?: MetricsRegistry;
}

type ControlCommand = 'start' | 'stop' | 'pause' | 'resume';

const CONTROL_PATH = /^\/api\/control\/(start|stop|pause|resume)$/;

export class ControlRouter {
  private readonly controller: DetectionController;
  private readonly defaultSource: () => string;
  private readonly sounds: { library: SoundLibrary; player: SoundPlayerSink } | null;
  private readonly metrics: MetricsRegistry;
  private readonly handlers: Handler[];

  constructor(options: ControlRouterOptions) {
    this.controller = options.controller;
    this.defaultSource = options.defaultSource;
    this.sounds = options.sounds ?? null;
    this.metrics = options.metrics ?? metricsModule;
    this.handlers = [
      (req, res, url) => this.handleStatus(req, res, url),
      (req, res, url) => this.handleParameters(req, res, url),
      (req, res, url) => this.handleControl(req, res, url),
      (req, res, url) => this.handleSounds(req, res, url),
      (req, res, url) => this.handleMetrics(req, res, url)
    ];
  }

  handle(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    for (const handler of this.handlers) {
      if (handler(req, res, url)) {
        return true;
      }
    }
    return false;
  }

  private handleStatus(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/api/status') {
      return false;
    }
    sendJson(res, 200, buildStatus(this.controller));
    return true;
  }

  private handleParameters(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (url.pathname !== '/api/parameters') {
      return false;
    }
    if (req.method === 'GET') {
      sendJson(res, 200, { parameters: this.controller.parameters.snapshot() });
      return true;
    }
    if (req.method === 'PUT' || req.method === 'PATCH') {
      this.run(res, () => this.updateParameters(req, res));
      return true;
    }
    return false;
  }

  private async updateParameters(req: IncomingMessage, res: ServerResponse) {
    const body = await readJsonBody(req);
    if (!isRecord(body)) {
      sendJson(res, 400, { error: 'Parameters payload must be an object' });
      return;
    }

    const partial: Partial<DetectionParametersValues> = {};
    for (const name of PARAMETER_NAMES) {
      if (name in body) {
        partial[name] = validateParameter(name, body[name]);
      }
    }
    if (Object.keys(partial).length === 0) {
      sendJson(res, 400, { error: `Expected at least one of ${PARAMETER_NAMES.join(', ')}` });
      return;
    }

    const parameters = this.controller.parameters.update(partial);
    logger.info({ parameters }, 'Detection parameters updated over HTTP');
    sendJson(res, 200, { parameters });
  }

  private handleControl(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    const match = CONTROL_PATH.exec(url.pathname);
    if (!match || req.method !== 'POST') {
      return false;
    }
    const command = parseCommand(match[1]);
    if (!command) {
      return false;
    }
    this.run(res, () => this.executeCommand(command, req, res));
    return true;
  }

  private async executeCommand(command: ControlCommand, req: IncomingMessage, res: ServerResponse) {
    switch (command) {
      case 'start': {
        const body = await readJsonBody(req);
        const requested = isRecord(body) && typeof body.source === 'string' ? body.source.trim() : '';
        const source = requested.length > 0 ? requested : this.defaultSource();
        await this.controller.start(source);
        break;
      }
      case 'stop':
        await this.controller.stop();
        break;
      case 'pause':
        this.controller.pause();
        break;
      case 'resume':
        this.controller.resume();
        break;
    }
    sendJson(res, 200, buildStatus(this.controller));
  }

  private handleSounds(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (!url.pathname.startsWith('/api/sounds')) {
      return false;
    }
    const sounds = this.sounds;
    const route = `${req.method ?? 'GET'} ${url.pathname}`;
    if (
      route !== 'GET /api/sounds' &&
      route !== 'POST /api/sounds/reload' &&
      route !== 'POST /api/sounds/test'
    ) {
      return false;
    }
    if (!sounds) {
      sendJson(res, 503, { error: 'Sound playback is not configured' });
      return true;
    }

    if (route === 'GET /api/sounds') {
      sendJson(res, 200, { directory: sounds.library.getDirectory(), sounds: sounds.library.list() });
      return true;
    }

    if (route === 'POST /api/sounds/reload') {
      this.run(res, async () => {
        const list = sounds.library.reload();
        sendJson(res, 200, { directory: sounds.library.getDirectory(), sounds: list });
      });
      return true;
    }

    this.run(res, async () => {
      const played = await sounds.player.testSound();
      sendJson(res, played ? 200 : 500, { played });
    });
    return true;
  }

  private handleMetrics(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/api/metrics') {
      return false;
    }
    sendText(res, 200, 'text/plain; version=0.0.4', this.metrics.exportPrometheus());
    return true;
  }

  private run(res: ServerResponse, task: () => Promise<void>) {
    task().catch(error => {
      respondWithError(res, error);
    });
  }
}

function respondWithError(res: ServerResponse, error: unknown) {
  if (error instanceof InvalidParameterError) {
    sendJson(res, 400, { error: error.message, parameter: error.parameter, min: error.min, max: error.max });
    return;
  }
  if (error instanceof InvalidStateTransitionError) {
    sendJson(res, 409, { error: error.message, command: error.command, state: error.state });
    return;
  }
  if (error instanceof ConnectionError) {
    sendJson(res, 502, { error: error.message, source: error.source });
    return;
  }
  if (error instanceof MalformedBodyError) {
    sendJson(res, 400, { error: error.message });
    return;
  }
  logger.error({ err: error }, 'Control request failed');
  sendJson(res, 500, { error: 'Internal server error' });
}

function parseCommand(value: string | undefined): ControlCommand | null {
  switch (value) {
    case 'start':
    case 'stop':
    case 'pause':
    case 'resume':
      return value;
    default:
      return null;
  }
}

export function buildStatus(controller: DetectionController) {
  const snapshot = controller.snapshot();
  const last = snapshot.lastDetectionTimestamp;
  return {
    ...snapshot,
    lastDetectionAt: last === null ? null : new Date(last).toISOString(),
    lastDetectionClock: last === null ? null : formatClock(last)
  };
}

export function formatClock(timestamp: number) {
  const date = new Date(timestamp);
  return [date.getHours(), date.getMinutes(), date.getSeconds()]
    .map(part => String(part).padStart(2, '0'))
    .join(':');
}

export function createControlRouter(options: ControlRouterOptions) {
  return new ControlRouter(options);
}
