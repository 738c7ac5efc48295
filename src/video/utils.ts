import { PNG } from 'pngjs';
import { FrameFormatError } from '../errors.js';
import type { ForegroundMask, Frame, FrameChannels } from '../types.js';

export type GrayscaleFrame = {
  width: number;
  height: number;
  data: Uint8Array;
};

export function decodePngFrame(pngBuffer: Buffer, ts: number): Frame {
  const image = PNG.sync.read(pngBuffer);
  return {
    width: image.width,
    height: image.height,
    channels: 4,
    data: new Uint8Array(image.data.buffer, image.data.byteOffset, image.data.length),
    ts
  };
}

export function expectedFrameLength(width: number, height: number, channels: FrameChannels) {
  return width * height * channels;
}

export function assertFrame(frame: Frame): void {
  const { width, height, channels, data, ts } = frame;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new FrameFormatError(`Invalid frame dimensions ${width}x${height}`);
  }
  if (channels !== 1 && channels !== 3 && channels !== 4) {
    throw new FrameFormatError(`Unsupported channel count ${String(channels)}`);
  }
  const expected = expectedFrameLength(width, height, channels);
  if (data.length !== expected) {
    throw new FrameFormatError(
      `Frame buffer holds ${data.length} bytes, expected ${expected} for ${width}x${height}x${channels}`
    );
  }
  if (!Number.isFinite(ts)) {
    throw new FrameFormatError('Frame timestamp must be finite');
  }
}

export function toGrayscale(frame: Frame): GrayscaleFrame {
  const { width, height, channels, data } = frame;
  if (channels === 1) {
    return { width, height, data };
  }

  const pixels = width * height;
  const grayscale = new Uint8Array(pixels);
  for (let i = 0; i < pixels; i += 1) {
    const offset = i * channels;
    const r = data[offset];
    const g = data[offset + 1];
    const b = data[offset + 2];
    // Rec. 709 luma coefficients
    grayscale[i] = Math.round(0.2126 * r + 0.7152 * g + 0.0722 * b);
  }

  return { width, height, data: grayscale };
}

const CROSS_OFFSETS: ReadonlyArray<readonly [number, number]> = [
  [0, 0],
  [-1, 0],
  [1, 0],
  [0, -1],
  [0, 1]
];

/**
 * Erosion with a 3x3 cross. Neighbours outside the image are ignored, so a
 * pixel on the border only needs its in-bounds neighbours set.
 */
export function erodeMask(mask: ForegroundMask): ForegroundMask {
  return morph(mask, true);
}

export function dilateMask(mask: ForegroundMask): ForegroundMask {
  return morph(mask, false);
}

export function openMask(mask: ForegroundMask): ForegroundMask {
  return dilateMask(erodeMask(mask));
}

export function countForeground(mask: ForegroundMask): number {
  let total = 0;
  for (let i = 0; i < mask.data.length; i += 1) {
    total += mask.data[i];
  }
  return total;
}

function morph(mask: ForegroundMask, erode: boolean): ForegroundMask {
  const { width, height, data } = mask;
  const output = new Uint8Array(width * height);

  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      let result = erode ? 1 : 0;
      for (const [dx, dy] of CROSS_OFFSETS) {
        const sampleX = x + dx;
        const sampleY = y + dy;
        if (sampleX < 0 || sampleY < 0 || sampleX >= width || sampleY >= height) {
          continue;
        }
        const value = data[sampleY * width + sampleX];
        if (erode && value === 0) {
          result = 0;
          break;
        }
        if (!erode && value === 1) {
          result = 1;
          break;
        }
      }
      output[y * width + x] = result;
    }
  }

  return { width, height, data: output };
}
