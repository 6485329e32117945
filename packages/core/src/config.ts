/**
 * Engine configuration: defaults, validation and loading from
 * `Engine.ini`-style text or environment variables.
 */

import { EngineConfigError } from './errors.js';
import { isLogThreshold } from './logger.js';
import type { LogThreshold } from './logger.js';

export interface EngineConfig {
  /** Pending-event queue capacity; publishes beyond it are dropped. Default: 1000. */
  maxQueueSize: number;
  /** Queued events processed per tick, 0 = unlimited. Default: 50. */
  eventsPerTick: number;
  /** Simulation steps per second. Default: 60. */
  targetFps: number;
  /** Upper bound on elapsed time consumed by one loop frame. Default: 250. */
  maxFrameDeltaMs: number;
  /** Verbose dispatch logging. Default: false. */
  debug: boolean;
  /** Default: 'info'. */
  logLevel: LogThreshold;
}

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = Object.freeze({
  maxQueueSize: 1000,
  eventsPerTick: 50,
  targetFps: 60,
  maxFrameDeltaMs: 250,
  debug: false,
  logLevel: 'info',
});

export function resolveEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  const config: EngineConfig = { ...DEFAULT_ENGINE_CONFIG, ...overrides };

  if (!Number.isInteger(config.maxQueueSize) || config.maxQueueSize < 1) {
    throw new EngineConfigError('maxQueueSize', config.maxQueueSize, 'expected an integer >= 1');
  }
  if (!Number.isInteger(config.eventsPerTick) || config.eventsPerTick < 0) {
    throw new EngineConfigError('eventsPerTick', config.eventsPerTick, 'expected an integer >= 0');
  }
  if (!Number.isFinite(config.targetFps) || config.targetFps <= 0) {
    throw new EngineConfigError('targetFps', config.targetFps, 'expected a positive number');
  }
  if (!Number.isFinite(config.maxFrameDeltaMs) || config.maxFrameDeltaMs <= 0) {
    throw new EngineConfigError('maxFrameDeltaMs', config.maxFrameDeltaMs, 'expected a positive number');
  }
  if (!isLogThreshold(config.logLevel)) {
    throw new EngineConfigError('logLevel', config.logLevel, 'expected debug, info, warn, error or silent');
  }
  return config;
}

export function parseEngineConfigText(text: string): Map<string, string> {
  const preferences = new Map<string, string>();
  for (const rawLine of text.split(/\r?\n/u)) {
    const line = rawLine.trim();
    if (!line || line.startsWith(';') || line.startsWith('#')) {
      continue;
    }

    const equalsIndex = line.indexOf('=');
    if (equalsIndex <= 0) {
      continue;
    }

    const key = line.slice(0, equalsIndex).trim();
    const value = line.slice(equalsIndex + 1).trim();
    if (!key || !value) {
      continue;
    }
    preferences.set(key, value);
  }
  return preferences;
}

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value.trim());
  return value.trim() !== '' && Number.isFinite(parsed) ? parsed : undefined;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  switch (value?.trim().toLowerCase()) {
    case 'yes':
    case 'true':
    case '1':
      return true;
    case 'no':
    case 'false':
    case '0':
      return false;
    default:
      return undefined;
  }
}

interface RawEngineSettings {
  maxQueueSize?: string;
  eventsPerTick?: string;
  targetFps?: string;
  maxFrameDeltaMs?: string;
  debug?: string;
  logLevel?: string;
}

function toPartialConfig(raw: RawEngineSettings): Partial<EngineConfig> {
  const partial: Partial<EngineConfig> = {};
  const maxQueueSize = parseNumber(raw.maxQueueSize);
  const eventsPerTick = parseNumber(raw.eventsPerTick);
  const targetFps = parseNumber(raw.targetFps);
  const maxFrameDeltaMs = parseNumber(raw.maxFrameDeltaMs);
  const debug = parseBoolean(raw.debug);
  const logLevel = raw.logLevel?.trim().toLowerCase();

  if (maxQueueSize !== undefined) partial.maxQueueSize = maxQueueSize;
  if (eventsPerTick !== undefined) partial.eventsPerTick = eventsPerTick;
  if (targetFps !== undefined) partial.targetFps = targetFps;
  if (maxFrameDeltaMs !== undefined) partial.maxFrameDeltaMs = maxFrameDeltaMs;
  if (debug !== undefined) partial.debug = debug;
  if (logLevel !== undefined && isLogThreshold(logLevel)) partial.logLevel = logLevel;
  return partial;
}

/** Maps `Engine.ini` keys to config fields; unparsable values are left out. */
export function extractEngineConfig(preferences: ReadonlyMap<string, string>): Partial<EngineConfig> {
  return toPartialConfig({
    maxQueueSize: preferences.get('MaxQueueSize'),
    eventsPerTick: preferences.get('EventsPerTick'),
    targetFps: preferences.get('TargetFps'),
    maxFrameDeltaMs: preferences.get('MaxFrameDeltaMs'),
    debug: preferences.get('Debug'),
    logLevel: preferences.get('LogLevel'),
  });
}

export function readEngineConfigFromEnv(env: Readonly<Record<string, string | undefined>>): Partial<EngineConfig> {
  return toPartialConfig({
    maxQueueSize: env.WAYFARER_MAX_QUEUE_SIZE,
    eventsPerTick: env.WAYFARER_EVENTS_PER_TICK,
    targetFps: env.WAYFARER_TARGET_FPS,
    maxFrameDeltaMs: env.WAYFARER_MAX_FRAME_DELTA_MS,
    debug: env.WAYFARER_DEBUG,
    logLevel: env.WAYFARER_LOG_LEVEL,
  });
}

export interface EngineConfigSources {
  /** `Engine.ini`-style preference text. */
  text?: string;
  /** Read for the WAYFARER_* keys, e.g. process.env. */
  env?: Readonly<Record<string, string | undefined>>;
  overrides?: Partial<EngineConfig>;
}

/** Defaults, then preference text, then environment, then overrides; validated once at the end. */
export function loadEngineConfig(sources: EngineConfigSources = {}): EngineConfig {
  return resolveEngineConfig({
    ...(sources.text === undefined ? {} : extractEngineConfig(parseEngineConfigText(sources.text))),
    ...(sources.env === undefined ? {} : readEngineConfigFromEnv(sources.env)),
    ...sources.overrides,
  });
}
