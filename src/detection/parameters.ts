import { EventEmitter } from 'node:events';
import { InvalidParameterError } from '../errors.js';
import type { DetectionParametersValues } from '../types.js';

export type ParameterName = keyof DetectionParametersValues;

type ParameterBounds = {
  min: number;
  max: number;
  integer: boolean;
};

export const PARAMETER_BOUNDS: Readonly<Record<ParameterName, ParameterBounds>> = Object.freeze({
  sensitivityThreshold: { min: 10, max: 100, integer: false },
  cooldownSeconds: { min: 1, max: 30, integer: false },
  minMotionArea: { min: 100, max: 2000, integer: true }
});

export const DEFAULT_PARAMETERS: Readonly<DetectionParametersValues> = Object.freeze({
  sensitivityThreshold: 25,
  cooldownSeconds: 5,
  minMotionArea: 500
});

export const PARAMETER_NAMES: readonly ParameterName[] = [
  'sensitivityThreshold',
  'cooldownSeconds',
  'minMotionArea'
];

export type ParametersChangeEvent = {
  previous: Readonly<DetectionParametersValues>;
  next: Readonly<DetectionParametersValues>;
};

export function validateParameter(name: ParameterName, value: unknown): number {
  const bounds = PARAMETER_BOUNDS[name];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidParameterError(name, value, bounds.min, bounds.max);
  }
  if (value < bounds.min || value > bounds.max) {
    throw new InvalidParameterError(name, value, bounds.min, bounds.max);
  }
  if (bounds.integer && !Number.isInteger(value)) {
    throw new InvalidParameterError(
      name,
      value,
      bounds.min,
      bounds.max,
      `${name} must be an integer between ${bounds.min} and ${bounds.max} (received ${value})`
    );
  }
  return value;
}

/**
 * Holds the tunable detection parameters. The current values live in one frozen
 * object that is swapped on every successful update, so a cycle that grabs
 * `snapshot()` keeps a consistent view even if an update lands mid-cycle.
 */
export class DetectionParameters extends EventEmitter {
  private current: Readonly<DetectionParametersValues>;

  constructor(initial: Partial<DetectionParametersValues> = {}) {
    super();
    this.current = DEFAULT_PARAMETERS;
    this.apply(initial, false);
  }

  snapshot(): Readonly<DetectionParametersValues> {
    return this.current;
  }

  get sensitivityThreshold() {
    return this.current.sensitivityThreshold;
  }

  set sensitivityThreshold(value: number) {
    this.update({ sensitivityThreshold: value });
  }

  get cooldownSeconds() {
    return this.current.cooldownSeconds;
  }

  set cooldownSeconds(value: number) {
    this.update({ cooldownSeconds: value });
  }

  get minMotionArea() {
    return this.current.minMotionArea;
  }

  set minMotionArea(value: number) {
    this.update({ minMotionArea: value });
  }

  /** All-or-nothing: one invalid field leaves every value untouched. */
  update(partial: Partial<DetectionParametersValues>): Readonly<DetectionParametersValues> {
    return this.apply(partial, true);
  }

  private apply(partial: Partial<DetectionParametersValues>, notify: boolean) {
    const next: DetectionParametersValues = { ...this.current };
    let changed = false;
    for (const name of PARAMETER_NAMES) {
      if (!(name in partial)) {
        continue;
      }
      const value = validateParameter(name, partial[name]);
      if (next[name] !== value) {
        next[name] = value;
        changed = true;
      }
    }

    if (!changed) {
      return this.current;
    }

    const previous = this.current;
    this.current = Object.freeze(next);
    if (notify) {
      this.emit('change', { previous, next: this.current } satisfies ParametersChangeEvent);
    }
    return this.current;
  }
}
