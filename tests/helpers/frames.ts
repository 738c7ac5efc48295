import { EventEmitter } from 'node:events';
import type { Frame, FrameSource } from '../../src/types.js';

export const FRAME_WIDTH = 64;
export const FRAME_HEIGHT = 48;
export const BACKGROUND = 20;

export type Blob = {
  x: number;
  y: number;
  width: number;
  height: number;
  value?: number;
};

/** 20x30 block at (10, 10): 600 raw pixels, 596 after the cross opening. */
export const DEFAULT_BLOB: Blob = { x: 10, y: 10, width: 20, height: 30, value: 255 };

export function grayFrame(ts: number, blob?: Blob): Frame {
  const data = new Uint8Array(FRAME_WIDTH * FRAME_HEIGHT).fill(BACKGROUND);
  if (blob) {
    for (let y = blob.y; y < blob.y + blob.height; y += 1) {
      for (let x = blob.x; x < blob.x + blob.width; x += 1) {
        data[y * FRAME_WIDTH + x] = blob.value ?? 255;
      }
    }
  }
  return { width: FRAME_WIDTH, height: FRAME_HEIGHT, channels: 1, data, ts };
}

export function staticFrames(count: number, startTs = 0, intervalMs = 100): Frame[] {
  return Array.from({ length: count }, (_, index) => grayFrame(startTs + index * intervalMs));
}

export class FakeSource extends EventEmitter implements FrameSource {
  readonly opened: string[] = [];
  closeCalls = 0;
  private pendingOpen: { resolve: () => void; reject: (error: Error) => void } | null = null;

  constructor(private readonly mode: 'resolve' | 'reject' | 'manual' = 'resolve') {
    super();
  }

  open(identifier: string): Promise<void> {
    this.opened.push(identifier);
    if (this.mode === 'reject') {
      return Promise.reject(new Error('connection refused'));
    }
    if (this.mode === 'manual') {
      return new Promise<void>((resolve, reject) => {
        this.pendingOpen = { resolve, reject };
      });
    }
    return Promise.resolve();
  }

  resolveOpen() {
    this.pendingOpen?.resolve();
    this.pendingOpen = null;
  }

  async close(): Promise<void> {
    this.closeCalls += 1;
    this.pendingOpen?.reject(new Error('closed'));
    this.pendingOpen = null;
  }

  pushFrame(frame: Frame) {
    this.emit('frame', frame);
  }
}

export const runNow = (task: () => void) => {
  task();
};
