import type { ForegroundMask, Frame } from '../types.js';
import { openMask, toGrayscale } from '../video/utils.js';

const DEFAULT_HISTORY = 100;
const DEFAULT_WARMUP_FRAMES = 10;
const DEFAULT_VAR_THRESHOLD = 16;
const VARIANCE_INIT = 15;
const VARIANCE_MIN = 4;
const VARIANCE_MAX = 75;

export type BackgroundModelOptions = {
  history?: number;
  warmupFrames?: number;
  learningRate?: number;
  denoise?: boolean;
};

export type ClassifyOptions = {
  varThreshold?: number;
};

export type BackgroundModelStatus = {
  framesSeen: number;
  warmupFrames: number;
  converged: boolean;
  width: number | null;
  height: number | null;
};

/**
 * Per-pixel running Gaussian over luma. Each classify() call decides against
 * the model as it stood before the frame, then folds the frame in.
 */
export class BackgroundModel {
  private readonly history: number;
  private readonly warmupFrames: number;
  private readonly learningRate: number | null;
  private readonly denoise: boolean;
  private mean: Float32Array | null = null;
  private variance: Float32Array | null = null;
  private width: number | null = null;
  private height: number | null = null;
  private framesSeen = 0;

  constructor(options: BackgroundModelOptions = {}) {
    this.history = Math.max(1, Math.floor(options.history ?? DEFAULT_HISTORY));
    this.warmupFrames = Math.max(0, Math.floor(options.warmupFrames ?? DEFAULT_WARMUP_FRAMES));
    this.learningRate =
      typeof options.learningRate === 'number' && options.learningRate > 0 ? options.learningRate : null;
    this.denoise = options.denoise ?? true;
  }

  initialize() {
    this.mean = null;
    this.variance = null;
    this.width = null;
    this.height = null;
    this.framesSeen = 0;
  }

  isConverged() {
    return this.framesSeen >= this.warmupFrames;
  }

  status(): BackgroundModelStatus {
    return {
      framesSeen: this.framesSeen,
      warmupFrames: this.warmupFrames,
      converged: this.isConverged(),
      width: this.width,
      height: this.height
    };
  }

  classify(frame: Frame, options: ClassifyOptions = {}): ForegroundMask {
    const gray = toGrayscale(frame);
    const { width, height, data } = gray;
    const pixels = width * height;

    if (!this.mean || !this.variance || this.width !== width || this.height !== height) {
      this.seed(width, height, data);
      return { width, height, data: new Uint8Array(pixels) };
    }

    const mean = this.mean;
    const variance = this.variance;
    const threshold = options.varThreshold ?? DEFAULT_VAR_THRESHOLD;
    const alpha = this.currentAlpha();
    const raw = new Uint8Array(pixels);

    for (let i = 0; i < pixels; i += 1) {
      const delta = data[i] - mean[i];
      const squared = delta * delta;
      if (squared > threshold * variance[i]) {
        raw[i] = 1;
      }
      mean[i] += alpha * delta;
      variance[i] = clamp(variance[i] + alpha * (squared - variance[i]), VARIANCE_MIN, VARIANCE_MAX);
    }

    this.framesSeen += 1;

    const mask: ForegroundMask = { width, height, data: raw };
    return this.denoise ? openMask(mask) : mask;
  }

  private seed(width: number, height: number, data: Uint8Array) {
    const pixels = width * height;
    this.width = width;
    this.height = height;
    this.mean = Float32Array.from(data);
    this.variance = new Float32Array(pixels).fill(VARIANCE_INIT);
    this.framesSeen = 1;
  }

  private currentAlpha() {
    if (this.learningRate !== null && this.isConverged()) {
      return this.learningRate;
    }
    return 1 / Math.min(this.framesSeen + 1, this.history);
  }
}

function clamp(value: number, min: number, max: number) {
  if (value < min) {
    return min;
  }
  if (value > max) {
    return max;
  }
  return value;
}
