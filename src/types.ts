export type EventSeverity = 'info' | 'warning' | 'critical';

export interface EventPayload {
  ts?: number | Date;
  source: string;
  detector: string;
  severity: EventSeverity;
  message: string;
  meta?: Record<string, unknown>;
}

export interface EventRecord {
  ts: number;
  source: string;
  detector: string;
  severity: EventSeverity;
  message: string;
  meta: Record<string, unknown> | undefined;
}

export type FrameChannels = 1 | 3 | 4;

/**
 * Decoded video frame. `data` is row-major with `channels` bytes per pixel and
 * `ts` is milliseconds on the capture clock.
 */
export interface Frame {
  readonly width: number;
  readonly height: number;
  readonly channels: FrameChannels;
  readonly data: Uint8Array;
  readonly ts: number;
}

/** One byte per pixel, 1 for foreground and 0 for background. */
export interface ForegroundMask {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8Array;
}

export interface Region {
  x: number;
  y: number;
  width: number;
  height: number;
  area: number;
}

export type DetectionState = 'idle' | 'monitoring' | 'paused' | 'cooldown';

export interface DetectionParametersValues {
  sensitivityThreshold: number;
  cooldownSeconds: number;
  minMotionArea: number;
}

export interface Statistics {
  totalDetections: number;
  lastDetectionTimestamp: number | null;
}

export interface TriggerEvent {
  timestamp: number;
  totalMotionArea: number;
  regions: Region[];
}

export interface TriggerSink {
  readonly name: string;
  fire(event: TriggerEvent): void | Promise<unknown>;
}

export interface FrameSourceEvents {
  frame: [frame: Frame];
  'frame-error': [error: Error];
  error: [error: Error];
  end: [];
}

/**
 * Contract for anything that yields decoded frames. `open` resolves once the
 * stream is live and rejects with a ConnectionError otherwise; a failed or
 * ended source needs a fresh `open`.
 */
export interface FrameSource {
  open(identifier: string): Promise<void>;
  close(): Promise<void>;
  on<K extends keyof FrameSourceEvents>(
    event: K,
    listener: (...args: FrameSourceEvents[K]) => void
  ): unknown;
  off<K extends keyof FrameSourceEvents>(
    event: K,
    listener: (...args: FrameSourceEvents[K]) => void
  ): unknown;
}
