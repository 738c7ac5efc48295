import type { Frame } from '../types.js';

export type DrainScheduler = (task: () => void) => void;

export const scheduleImmediate: DrainScheduler = task => {
  setImmediate(task);
};

/**
 * Single-slot mailbox between the frame source and the detection cycle. A
 * frame that arrives while one is still pending replaces it.
 */
export class FrameSlot {
  private pending: Frame | null = null;
  private scheduled = false;
  private generation = 0;
  private dropped = 0;

  constructor(
    private readonly handler: (frame: Frame) => void,
    private readonly schedule: DrainScheduler = scheduleImmediate
  ) {}

  offer(frame: Frame) {
    if (this.pending) {
      this.dropped += 1;
    }
    this.pending = frame;
    if (this.scheduled) {
      return;
    }
    this.scheduled = true;
    const generation = this.generation;
    this.schedule(() => {
      if (generation !== this.generation) {
        return;
      }
      this.scheduled = false;
      this.drain();
    });
  }

  /** Drops anything pending; a drain already queued becomes a no-op. */
  clear() {
    this.pending = null;
    this.scheduled = false;
    this.generation += 1;
  }

  hasPending() {
    return this.pending !== null;
  }

  droppedFrames() {
    return this.dropped;
  }

  private drain() {
    const frame = this.pending;
    this.pending = null;
    if (frame) {
      this.handler(frame);
    }
  }
}
