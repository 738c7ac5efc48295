import { describe, expect, it } from 'vitest';
import { BackgroundModel } from '../src/detection/backgroundModel.js';
import { countForeground } from '../src/video/utils.js';
import { DEFAULT_BLOB, grayFrame, staticFrames } from './helpers/frames.js';

function warmedModel(options: ConstructorParameters<typeof BackgroundModel>[0] = {}, frames = 150) {
  const model = new BackgroundModel(options);
  for (const frame of staticFrames(frames)) {
    model.classify(frame);
  }
  return model;
}

describe('BackgroundModel', () => {
  it('BackgroundModelSeed takes the first frame as the background and flags nothing', () => {
    const model = new BackgroundModel();
    const mask = model.classify(grayFrame(0, DEFAULT_BLOB));

    expect(countForeground(mask)).toBe(0);
    expect(model.status()).toEqual({
      framesSeen: 1,
      warmupFrames: 10,
      converged: false,
      width: 64,
      height: 48
    });
  });

  it('BackgroundModelWarmup converges once the warm-up window has been seen', () => {
    const model = new BackgroundModel({ warmupFrames: 10 });
    const frames = staticFrames(10);

    for (const frame of frames.slice(0, 9)) {
      model.classify(frame);
    }
    expect(model.isConverged()).toBe(false);

    model.classify(frames[9]);
    expect(model.isConverged()).toBe(true);
    expect(model.status().framesSeen).toBe(10);
  });

  it('BackgroundModelForeground flags a bright blob after a static scene', () => {
    const model = warmedModel();
    const mask = model.classify(grayFrame(15000, DEFAULT_BLOB), { varThreshold: 25 });

    expect(countForeground(mask)).toBe(596);
  });

  it('BackgroundModelDenoise keeps the raw mask when the opening is disabled', () => {
    const model = warmedModel({ denoise: false });
    const mask = model.classify(grayFrame(15000, DEFAULT_BLOB), { varThreshold: 25 });

    expect(countForeground(mask)).toBe(600);
  });

  it('BackgroundModelSensitivity gates small luma changes by threshold', () => {
    const faint = { ...DEFAULT_BLOB, value: 30 };

    const sensitive = warmedModel({ denoise: false });
    expect(countForeground(sensitive.classify(grayFrame(15000, faint), { varThreshold: 16 }))).toBe(600);

    const tolerant = warmedModel({ denoise: false });
    expect(countForeground(tolerant.classify(grayFrame(15000, faint), { varThreshold: 25 }))).toBe(0);
  });

  it('BackgroundModelAdaptation absorbs a persistent change into the background', () => {
    const model = warmedModel({ learningRate: 0.5 }, 20);
    const counts = [0, 1, 2, 3].map(step =>
      countForeground(model.classify(grayFrame(2000 + step * 100, DEFAULT_BLOB), { varThreshold: 25 }))
    );

    expect(counts).toEqual([596, 596, 596, 0]);
  });

  it('BackgroundModelResize reseeds when the frame dimensions change', () => {
    const model = warmedModel({}, 20);
    const smaller = {
      width: 32,
      height: 24,
      channels: 1 as const,
      data: new Uint8Array(32 * 24).fill(200),
      ts: 5000
    };

    const mask = model.classify(smaller);

    expect(countForeground(mask)).toBe(0);
    expect(model.status()).toMatchObject({ framesSeen: 1, width: 32, height: 24, converged: false });
  });

  it('BackgroundModelInitialize discards the learned state', () => {
    const model = warmedModel({}, 20);
    model.initialize();

    expect(model.status()).toEqual({
      framesSeen: 0,
      warmupFrames: 10,
      converged: false,
      width: null,
      height: null
    });
  });

  it('BackgroundModelColour reads colour frames as luma', () => {
    const model = new BackgroundModel({ warmupFrames: 1, denoise: false });
    const rgb = (value: number, ts: number) => ({
      width: 4,
      height: 4,
      channels: 3 as const,
      data: new Uint8Array(4 * 4 * 3).fill(value),
      ts
    });

    model.classify(rgb(20, 0));
    model.classify(rgb(20, 100));
    const mask = model.classify(rgb(255, 200), { varThreshold: 25 });

    expect(countForeground(mask)).toBe(16);
  });
});
