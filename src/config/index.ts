import fs from 'node:fs';
import path from 'node:path';
import { EventEmitter } from 'node:events';
import { PARAMETER_BOUNDS } from '../detection/parameters.js';

export type AppConfig = {
  name: string;
};

export type LoggingConfig = {
  level: string;
};

export type StreamConfig = {
  url: string;
  autoStart?: boolean;
  framesPerSecond?: number;
  width?: number;
  height?: number;
  startTimeoutMs?: number;
  watchdogTimeoutMs?: number;
  inputArgs?: string[];
};

export type DetectionConfig = {
  sensitivityThreshold: number;
  cooldownSeconds: number;
  minMotionArea: number;
  history?: number;
  warmupFrames?: number;
  learningRate?: number;
  denoise?: boolean;
};

export type AudioOutputConfig = {
  format: string;
  device: string;
};

export type AudioConfig = {
  soundsDir: string;
  maxConcurrent?: number;
  output?: AudioOutputConfig;
};

export type HttpConfig = {
  enabled?: boolean;
  host?: string;
  port: number;
};

export type SentryConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  stream: StreamConfig;
  detection: DetectionConfig;
  audio: AudioConfig;
  http?: HttpConfig;
};

type JsonType = 'object' | 'number' | 'string' | 'boolean' | 'array';

type JsonSchema = {
  type: JsonType | JsonType[];
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean | JsonSchema;
  items?: JsonSchema;
  minimum?: number;
  maximum?: number;
};

const positiveNumber: JsonSchema = { type: 'number', minimum: 1 };

const sentryConfigSchema: JsonSchema = {
  type: 'object',
  required: ['app', 'logging', 'stream', 'detection', 'audio'],
  additionalProperties: true,
  properties: {
    app: {
      type: 'object',
      required: ['name'],
      additionalProperties: false,
      properties: {
        name: { type: 'string' }
      }
    },
    logging: {
      type: 'object',
      required: ['level'],
      additionalProperties: false,
      properties: {
        level: { type: 'string' }
      }
    },
    stream: {
      type: 'object',
      required: ['url'],
      additionalProperties: false,
      properties: {
        url: { type: 'string' },
        autoStart: { type: 'boolean' },
        framesPerSecond: positiveNumber,
        width: positiveNumber,
        height: positiveNumber,
        startTimeoutMs: { type: 'number', minimum: 0 },
        watchdogTimeoutMs: { type: 'number', minimum: 0 },
        inputArgs: { type: 'array', items: { type: 'string' } }
      }
    },
    detection: {
      type: 'object',
      required: ['sensitivityThreshold', 'cooldownSeconds', 'minMotionArea'],
      additionalProperties: false,
      properties: {
        sensitivityThreshold: { type: 'number' },
        cooldownSeconds: { type: 'number' },
        minMotionArea: { type: 'number' },
        history: positiveNumber,
        warmupFrames: { type: 'number', minimum: 0 },
        learningRate: { type: 'number', minimum: 0, maximum: 1 },
        denoise: { type: 'boolean' }
      }
    },
    audio: {
      type: 'object',
      required: ['soundsDir'],
      additionalProperties: false,
      properties: {
        soundsDir: { type: 'string' },
        maxConcurrent: positiveNumber,
        output: {
          type: 'object',
          required: ['format', 'device'],
          additionalProperties: false,
          properties: {
            format: { type: 'string' },
            device: { type: 'string' }
          }
        }
      }
    },
    http: {
      type: 'object',
      required: ['port'],
      additionalProperties: false,
      properties: {
        enabled: { type: 'boolean' },
        host: { type: 'string' },
        port: { type: 'number', minimum: 0, maximum: 65535 }
      }
    }
  }
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateAgainstSchema(schema: JsonSchema, value: unknown, pathLabel: string): string[] {
  const types = Array.isArray(schema.type) ? schema.type : [schema.type];
  const results = types.map(type => validateAgainstSchemaForType(type, schema, value, pathLabel));

  if (results.some(errors => errors.length === 0)) {
    return [];
  }

  return results[0] ?? [];
}

function validateAgainstSchemaForType(
  type: JsonType,
  schema: JsonSchema,
  value: unknown,
  pathLabel: string
): string[] {
  const errors: string[] = [];

  if (type === 'object') {
    if (!isPlainObject(value)) {
      errors.push(`${pathLabel} must be an object`);
      return errors;
    }

    for (const key of schema.required ?? []) {
      if (!(key in value)) {
        errors.push(`${pathLabel}.${key} is required`);
      }
    }

    const definedProperties = new Set(Object.keys(schema.properties ?? {}));
    const additional = schema.additionalProperties;
    if (additional === false) {
      for (const key of Object.keys(value)) {
        if (!definedProperties.has(key)) {
          errors.push(`${pathLabel}.${key} is not allowed`);
        }
      }
    } else if (additional && typeof additional === 'object') {
      for (const key of Object.keys(value)) {
        if (!definedProperties.has(key)) {
          errors.push(...validateAgainstSchema(additional, value[key], `${pathLabel}.${key}`));
        }
      }
    }

    for (const [key, childSchema] of Object.entries(schema.properties ?? {})) {
      if (key in value) {
        errors.push(...validateAgainstSchema(childSchema, value[key], `${pathLabel}.${key}`));
      }
    }

    return errors;
  }

  if (type === 'array') {
    if (!Array.isArray(value)) {
      errors.push(`${pathLabel} must be an array`);
      return errors;
    }

    const itemSchema = schema.items;
    if (itemSchema) {
      value.forEach((item, index) => {
        errors.push(...validateAgainstSchema(itemSchema, item, `${pathLabel}[${index}]`));
      });
    }

    return errors;
  }

  if (type === 'number') {
    if (typeof value !== 'number' || Number.isNaN(value)) {
      errors.push(`${pathLabel} must be a number`);
      return errors;
    }

    if (typeof schema.minimum === 'number' && value < schema.minimum) {
      errors.push(`${pathLabel} must be >= ${schema.minimum}`);
    }

    if (typeof schema.maximum === 'number' && value > schema.maximum) {
      errors.push(`${pathLabel} must be <= ${schema.maximum}`);
    }

    return errors;
  }

  if (type === 'string') {
    if (typeof value !== 'string') {
      errors.push(`${pathLabel} must be a string`);
    }
    return errors;
  }

  if (type === 'boolean' && typeof value !== 'boolean') {
    errors.push(`${pathLabel} must be a boolean`);
  }

  return errors;
}

function isSentryConfig(config: unknown): config is SentryConfig {
  return validateAgainstSchema(sentryConfigSchema, config, 'config').length === 0;
}

export function validateConfig(config: unknown): asserts config is SentryConfig {
  if (!isSentryConfig(config)) {
    throw new Error(validateAgainstSchema(sentryConfigSchema, config, 'config').join('; '));
  }
  validateLogicalConfig(config);
}

export function parseConfig(contents: string): SentryConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse configuration: ${message}`);
  }

  validateConfig(parsed);
  return parsed;
}

export function loadConfigFromFile(filePath: string): SentryConfig {
  const resolvedPath = path.resolve(filePath);
  const contents = fs.readFileSync(resolvedPath, 'utf-8');
  return parseConfig(contents);
}

function validateLogicalConfig(config: SentryConfig) {
  const messages: string[] = [];

  for (const name of ['sensitivityThreshold', 'cooldownSeconds', 'minMotionArea'] as const) {
    const bounds = PARAMETER_BOUNDS[name];
    const value = config.detection[name];
    if (value < bounds.min || value > bounds.max) {
      messages.push(`config.detection.${name} must be between ${bounds.min} and ${bounds.max}`);
    } else if (bounds.integer && !Number.isInteger(value)) {
      messages.push(`config.detection.${name} must be an integer`);
    }
  }

  const { warmupFrames, history } = config.detection;
  if (typeof warmupFrames === 'number' && typeof history === 'number' && warmupFrames > history) {
    messages.push('config.detection.warmupFrames must not exceed config.detection.history');
  }

  if (config.stream.url.trim().length === 0) {
    messages.push('config.stream.url must not be empty');
  }

  if (messages.length > 0) {
    throw new Error(messages.join('; '));
  }
}

export type ConfigReloadEvent = {
  previous: SentryConfig;
  next: SentryConfig;
};

export class ConfigManager extends EventEmitter {
  private currentConfig: SentryConfig;
  private readonly filePath: string;
  private watcher: fs.FSWatcher | null = null;
  private watchRefs = 0;
  private reloadTimer: NodeJS.Timeout | null = null;
  private lastGoodRaw: string;
  private restoring = false;
  private restoreTimer: NodeJS.Timeout | null = null;

  constructor(filePath = path.resolve(process.cwd(), 'config/default.json')) {
    super();
    this.filePath = path.resolve(filePath);
    const { config, raw } = this.loadFromDisk();
    this.currentConfig = config;
    this.lastGoodRaw = raw;
  }

  getConfig(): SentryConfig {
    return this.currentConfig;
  }

  getPath(): string {
    return this.filePath;
  }

  reload(): SentryConfig {
    const { config: next, raw } = this.loadFromDisk();
    const previous = this.currentConfig;
    this.currentConfig = next;
    this.lastGoodRaw = raw;
    this.emit('reload', { previous, next } satisfies ConfigReloadEvent);
    return next;
  }

  watch(): () => void {
    if (!this.watcher) {
      this.watcher = this.createWatcher();
    }

    this.watchRefs += 1;

    return () => {
      this.watchRefs = Math.max(0, this.watchRefs - 1);
      if (this.watchRefs === 0) {
        if (this.reloadTimer) {
          clearTimeout(this.reloadTimer);
          this.reloadTimer = null;
        }
        this.closeWatcher();
      }
    };
  }

  private scheduleReload() {
    if (this.reloadTimer) {
      clearTimeout(this.reloadTimer);
    }

    this.reloadTimer = setTimeout(() => {
      this.reloadTimer = null;
      try {
        this.reload();
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        if (this.listenerCount('error') > 0) {
          this.emit('error', err);
        }
        this.restorePreviousConfig();
      }
    }, 100);
  }

  private recreateWatcher() {
    this.closeWatcher();
    this.watcher = this.createWatcher();
  }

  private closeWatcher() {
    if (this.watcher) {
      this.watcher.close();
      this.watcher = null;
    }
    if (this.restoreTimer) {
      clearTimeout(this.restoreTimer);
      this.restoreTimer = null;
    }
    this.restoring = false;
  }

  private createWatcher() {
    return fs.watch(this.filePath, { persistent: false }, eventType => {
      if (this.restoring) {
        return;
      }

      if (eventType === 'rename') {
        this.recreateWatcher();
      }
      this.scheduleReload();
    });
  }

  private loadFromDisk(): { config: SentryConfig; raw: string } {
    const contents = fs.readFileSync(this.filePath, 'utf-8');
    const config = parseConfig(contents);
    return { config, raw: contents };
  }

  private restorePreviousConfig() {
    if (!this.lastGoodRaw) {
      return;
    }

    this.restoring = true;
    try {
      fs.writeFileSync(this.filePath, this.lastGoodRaw, 'utf-8');
    } catch (error) {
      if (this.listenerCount('error') > 0) {
        const err = error instanceof Error ? error : new Error(String(error));
        this.emit('error', err);
      }
    } finally {
      if (this.restoreTimer) {
        clearTimeout(this.restoreTimer);
      }
      this.restoreTimer = setTimeout(() => {
        this.restoring = false;
        this.restoreTimer = null;
      }, 200);
    }
  }
}

const defaultManager = new ConfigManager();

export default defaultManager;
export { sentryConfigSchema };
