import type { IncomingMessage, ServerResponse } from 'node:http';
import type { EventBus } from '../../eventBus.js';
import type { StateChangeEvent } from '../../detection/detectionController.js';
import type { EventRecord } from '../../types.js';
import { type Handler, sendJson } from '../respond.js';

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 500;
const DEFAULT_HEARTBEAT_MS = 15000;

interface StateSource {
  on(event: 'state', listener: (change: StateChangeEvent) => void): unknown;
  off(event: 'state', listener: (change: StateChangeEvent) => void): unknown;
}

export interface EventsRouterOptions {
  bus: EventBus;
  states?: StateSource | null;
  heartbeatMs?: number;
}

type ClientState = {
  heartbeat: NodeJS.Timeout;
};

export class EventsRouter {
  private readonly bus: EventBus;
  private readonly states: StateSource | null;
  private readonly heartbeatMs: number;
  private readonly clients = new Map<ServerResponse, ClientState>();
  private readonly handlers: Handler[];

  constructor(options: EventsRouterOptions) {
    this.bus = options.bus;
    this.states = options.states ?? null;
    this.heartbeatMs = options.heartbeatMs ?? DEFAULT_HEARTBEAT_MS;
    this.handlers = [
      (req, res, url) => this.handleList(req, res, url),
      (req, res, url) => this.handleStream(req, res, url)
    ];

    this.bus.on('event', this.handleBusEvent);
    this.states?.on('state', this.handleStateChange);
  }

  handle(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    for (const handler of this.handlers) {
      if (handler(req, res, url)) {
        return true;
      }
    }
    return false;
  }

  close() {
    this.bus.off('event', this.handleBusEvent);
    this.states?.off('state', this.handleStateChange);
    for (const [client, state] of this.clients) {
      clearInterval(state.heartbeat);
      client.end();
    }
    this.clients.clear();
  }

  private readonly handleBusEvent = (event: EventRecord) => {
    this.broadcast(event.detector === 'scare' ? 'scare' : 'event', event);
  };

  private readonly handleStateChange = (change: StateChangeEvent) => {
    this.broadcast('state', change);
  };

  private handleList(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/api/events') {
      return false;
    }

    const limit = parseLimit(url.searchParams.get('limit'));
    if (limit === null) {
      sendJson(res, 400, { error: `limit must be an integer between 1 and ${MAX_LIMIT}` });
      return true;
    }
    const detector = url.searchParams.get('detector') ?? undefined;
    sendJson(res, 200, { items: this.bus.recent(limit, detector) });
    return true;
  }

  private handleStream(req: IncomingMessage, res: ServerResponse, url: URL): boolean {
    if (req.method !== 'GET' || url.pathname !== '/api/events/stream') {
      return false;
    }

    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive'
    });
    res.write(': connected\n\n');

    const heartbeat = setInterval(() => {
      if (!writeBlock(res, 'heartbeat', { ts: Date.now() })) {
        clearInterval(heartbeat);
        this.clients.delete(res);
      }
    }, this.heartbeatMs);
    heartbeat.unref?.();

    this.clients.set(res, { heartbeat });
    req.on('close', () => {
      clearInterval(heartbeat);
      this.clients.delete(res);
    });
    return true;
  }

  private broadcast(eventName: string, payload: unknown) {
    for (const [client, state] of this.clients) {
      if (!writeBlock(client, eventName, payload)) {
        clearInterval(state.heartbeat);
        this.clients.delete(client);
      }
    }
  }
}

function writeBlock(target: ServerResponse, eventName: string, payload: unknown): boolean {
  if (target.writableEnded || target.destroyed) {
    return false;
  }
  target.write(`event: ${eventName}\n`);
  target.write(`data: ${JSON.stringify(payload)}\n\n`);
  return true;
}

function parseLimit(value: string | null): number | null {
  if (value === null || value === '') {
    return DEFAULT_LIMIT;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > MAX_LIMIT) {
    return null;
  }
  return parsed;
}

export function createEventsRouter(options: EventsRouterOptions) {
  return new EventsRouter(options);
}
