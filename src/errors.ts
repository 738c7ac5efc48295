import type { DetectionState } from './types.js';

export class ConnectionError extends Error {
  readonly code = 'CONNECTION_FAILED';
  readonly source: string | null;

  constructor(message: string, options: { source?: string | null; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ConnectionError';
    this.source = options.source ?? null;
  }
}

export class InvalidParameterError extends Error {
  readonly code = 'INVALID_PARAMETER';

  constructor(
    readonly parameter: string,
    readonly value: unknown,
    readonly min: number,
    readonly max: number,
    detail?: string
  ) {
    super(
      detail ??
        `${parameter} must be between ${min} and ${max} (received ${formatValue(value)})`
    );
    this.name = 'InvalidParameterError';
  }
}

export class InvalidStateTransitionError extends Error {
  readonly code = 'INVALID_STATE_TRANSITION';

  constructor(readonly command: string, readonly state: DetectionState | 'starting') {
    super(`Cannot ${command} while ${state}`);
    this.name = 'InvalidStateTransitionError';
  }
}

export class ModelUnconvergedWarning extends Error {
  readonly code = 'MODEL_UNCONVERGED';

  constructor(readonly framesSeen: number, readonly warmupFrames: number) {
    super(`Background model warming up (${framesSeen}/${warmupFrames} frames)`);
    this.name = 'ModelUnconvergedWarning';
  }
}

export class FrameFormatError extends Error {
  readonly code = 'FRAME_FORMAT';

  constructor(message: string) {
    super(message);
    this.name = 'FrameFormatError';
  }
}

function formatValue(value: unknown) {
  if (typeof value === 'string') {
    return `"${value}"`;
  }
  return String(value);
}
