import type { Statistics } from '../types.js';

const INITIAL_STATISTICS: Readonly<Statistics> = Object.freeze({
  totalDetections: 0,
  lastDetectionTimestamp: null
});

/**
 * Session statistics. The pair is replaced as a whole on every detection so a
 * reader never sees a count from one trigger and a timestamp from another.
 */
export class StatsStore {
  private current: Readonly<Statistics> = INITIAL_STATISTICS;

  recordDetection(timestamp: number): Readonly<Statistics> {
    this.current = Object.freeze({
      totalDetections: this.current.totalDetections + 1,
      lastDetectionTimestamp: timestamp
    });
    return this.current;
  }

  snapshot(): Readonly<Statistics> {
    return this.current;
  }
}
