import http from 'node:http';
import { URL } from 'node:url';
import type { SoundLibrary } from '../audio/soundLibrary.js';
import type { SoundPlayerSink } from '../audio/soundPlayerSink.js';
import type { DetectionController } from '../detection/detectionController.js';
import defaultBus, { type EventBus } from '../eventBus.js';
import logger from '../logger.js';
import metrics, { type MetricsRegistry } from '../metrics/index.js';
import { sendJson } from './respond.js';
import { createControlRouter } from './routes/control.js';
import { createEventsRouter } from './routes/events.js';

export interface HttpServerOptions {
  controller: DetectionController;
  defaultSource: () => string;
  port?: number;
  host?: string;
  bus?: EventBus;
  sounds?: { library: SoundLibrary; player: SoundPlayerSink } | null;
  metrics?: MetricsRegistry;
  heartbeatMs?: number;
}

export interface HttpServerRuntime {
  server: http.Server;
  port: number;
  close: () => Promise<void>;
}

export async function startHttpServer(options: HttpServerOptions): Promise<HttpServerRuntime> {
  const port = options.port ?? 3000;
  const host = options.host ?? '0.0.0.0';
  const bus = options.bus ?? defaultBus;

  const controlRouter = createControlRouter({
    controller: options.controller,
    defaultSource: options.defaultSource,
    sounds: options.sounds,
    metrics: options.metrics ?? metrics
  });
  const eventsRouter = createEventsRouter({
    bus,
    states: options.controller,
    heartbeatMs: options.heartbeatMs
  });

  const server = http.createServer((req, res) => {
    try {
      const url = new URL(req.url ?? '/', 'http://localhost');
      if (controlRouter.handle(req, res, url) || eventsRouter.handle(req, res, url)) {
        return;
      }

      sendJson(res, 404, { error: 'Not found' });
    } catch (error) {
      logger.error({ err: error }, 'HTTP request failed');
      sendJson(res, 500, { error: 'Internal server error' });
    }
  });

  server.on('close', () => {
    eventsRouter.close();
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = server.address();
  const actualPort = typeof address === 'object' && address ? address.port : port;

  logger.info({ port: actualPort, host }, 'HTTP server listening');

  return {
    server,
    port: actualPort,
    close: () =>
      new Promise<void>((resolve, reject) => {
        eventsRouter.close();
        server.close(error => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
        server.closeAllConnections();
      })
  };
}

export default startHttpServer;
