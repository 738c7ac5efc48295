import eventBus, { type EventBus } from '../eventBus.js';
import type { TriggerEvent, TriggerSink } from '../types.js';

export type EventBusSinkOptions = {
  bus?: EventBus;
  source?: string;
};

/** Republishes triggers as `scare` events for the HTTP stream and history. */
export class EventBusSink implements TriggerSink {
  readonly name = 'event-bus';
  private readonly bus: EventBus;
  private readonly source: string;

  constructor(options: EventBusSinkOptions = {}) {
    this.bus = options.bus ?? eventBus;
    this.source = options.source ?? 'camera';
  }

  fire(event: TriggerEvent): void {
    this.bus.emitEvent({
      ts: event.timestamp,
      source: this.source,
      detector: 'scare',
      severity: 'warning',
      message: 'Motion detected, scare triggered',
      meta: {
        totalMotionArea: event.totalMotionArea,
        regions: event.regions.map(region => ({ ...region }))
      }
    });
  }
}
