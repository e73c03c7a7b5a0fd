/**
 * Environment Settings — types, defaults and validation.
 *
 * Settings are resolved once, before an episode starts, into an immutable
 * EnvironmentSettings value that is passed to the controller. Anything
 * invalid fails fast with a ConfigurationError naming the field; nothing
 * is clamped or silently replaced.
 */

import { AsteroidSize } from './types';
import type { AsteroidSpawn, MapDimensions, ScenarioDefinition, Vec2 } from './types';
import { DEFAULT_FREQUENCY, DEFAULT_MAP, SHIP } from './constants';
import { ConfigurationError } from './errors';
import { normalizeAngle, vec2 } from './vec2';
import { SCENARIOS, findScenario } from '../scenarios/registry';
import { isRecord } from '../utils/guards';

export type RandomOr<T> = T | 'random';

export interface EnvironmentSettings {
  /** Ticks per simulated second; one tick lasts 1 / frequency seconds */
  readonly frequency: number;
  /** Episode budget in simulated seconds, or null for no limit */
  readonly timeLimit: number | null;
  readonly startingLives: number;
  readonly startingPosition: RandomOr<Vec2>;
  /** Degrees, normalized to [0, 360) */
  readonly startingAngle: RandomOr<number>;
  /** Measure wall-clock time spent inside the agent */
  readonly trackComputeCost: boolean;
  /** Seconds the ship cannot collide after a respawn */
  readonly respawnInvulnerability: number;
  /** Print crash and game-over lines to the console */
  readonly prints: boolean;
  readonly scenario: ScenarioDefinition;
}

/** Caller-facing options. Every field is optional; see DEFAULT_SETTINGS. */
export interface SettingsInput {
  frequency?: number;
  /** 0 or null disables the limit */
  timeLimit?: number | null;
  startingLives?: number;
  /** Defaults to the centre of the map */
  startingPosition?: RandomOr<Vec2>;
  startingAngle?: RandomOr<number>;
  trackComputeCost?: boolean;
  respawnInvulnerability?: number;
  prints?: boolean;
  /** Registry id or an inline definition */
  scenario?: string | ScenarioDefinition;
}

export const DEFAULT_SETTINGS = {
  frequency: DEFAULT_FREQUENCY,
  timeLimit: null,
  startingLives: 3,
  startingAngle: 0,
  trackComputeCost: false,
  respawnInvulnerability: SHIP.respawnInvulnerability,
  prints: false,
  scenario: 'default',
} as const satisfies SettingsInput;

const SETTING_KEYS: ReadonlySet<string> = new Set([
  'frequency',
  'timeLimit',
  'startingLives',
  'startingPosition',
  'startingAngle',
  'trackComputeCost',
  'respawnInvulnerability',
  'prints',
  'scenario',
]);

const SCENARIO_KEYS: ReadonlySet<string> = new Set(['name', 'map', 'asteroids', 'numAsteroids', 'asteroidSize']);
const SPAWN_KEYS: ReadonlySet<string> = new Set(['position', 'size', 'speed', 'heading']);

/** Randomly placed asteroids when a scenario names neither a list nor a count. */
const DEFAULT_NUM_ASTEROIDS = 3;

/**
 * Resolve caller options into immutable settings.
 *
 * @throws ConfigurationError naming the first invalid field
 */
export function resolveSettings(input?: SettingsInput): EnvironmentSettings;
export function resolveSettings(input: unknown): EnvironmentSettings;
export function resolveSettings(input: unknown = {}): EnvironmentSettings {
  if (!isRecord(input)) {
    throw new ConfigurationError('settings', 'expected an object');
  }
  rejectUnknownKeys(input, SETTING_KEYS, '');

  const scenario = resolveScenario(input.scenario ?? DEFAULT_SETTINGS.scenario);
  const map = scenario.map ?? DEFAULT_MAP;

  const frequency = readNumber(input.frequency ?? DEFAULT_SETTINGS.frequency, 'frequency');
  if (frequency <= 0) throw new ConfigurationError('frequency', 'must be greater than 0');

  const respawnInvulnerability = readNumber(
    input.respawnInvulnerability ?? DEFAULT_SETTINGS.respawnInvulnerability,
    'respawnInvulnerability',
  );
  if (respawnInvulnerability < 0) {
    throw new ConfigurationError('respawnInvulnerability', 'must not be negative');
  }

  return Object.freeze({
    frequency,
    timeLimit: readTimeLimit(input.timeLimit),
    startingLives: readStartingLives(input.startingLives),
    startingPosition: readStartingPosition(input.startingPosition, map),
    startingAngle: readStartingAngle(input.startingAngle),
    trackComputeCost: readBoolean(input.trackComputeCost ?? DEFAULT_SETTINGS.trackComputeCost, 'trackComputeCost'),
    respawnInvulnerability,
    prints: readBoolean(input.prints ?? DEFAULT_SETTINGS.prints, 'prints'),
    scenario,
  });
}

/** Look a scenario up by registry id, or validate an inline definition. */
export function resolveScenario(value: unknown): ScenarioDefinition {
  if (typeof value === 'string') {
    const info = findScenario(value);
    if (!info) {
      throw new ConfigurationError(
        'scenario',
        `unknown scenario "${value}". Available: ${SCENARIOS.map((s) => s.id).join(', ')}`,
      );
    }
    return info.definition;
  }
  return validateScenario(value, 'scenario');
}

// --- Field readers ---

function readTimeLimit(value: unknown): number | null {
  if (value === undefined || value === null) return DEFAULT_SETTINGS.timeLimit;
  const seconds = readNumber(value, 'timeLimit');
  if (seconds < 0) throw new ConfigurationError('timeLimit', 'must not be negative');
  return seconds === 0 ? null : seconds;
}

function readStartingLives(value: unknown): number {
  const lives = readNumber(value ?? DEFAULT_SETTINGS.startingLives, 'startingLives');
  if (!Number.isInteger(lives) || lives < 1) {
    throw new ConfigurationError('startingLives', 'must be an integer of at least 1');
  }
  return lives;
}

function readStartingPosition(value: unknown, map: MapDimensions): RandomOr<Vec2> {
  if (value === undefined) return vec2(map.width / 2, map.height / 2);
  if (value === 'random') return 'random';
  const position = readVec2(value, 'startingPosition');
  if (!insideMap(position, map)) {
    throw new ConfigurationError('startingPosition', `must lie inside the ${map.width}x${map.height} map`);
  }
  return position;
}

function readStartingAngle(value: unknown): RandomOr<number> {
  if (value === 'random') return 'random';
  return normalizeAngle(readNumber(value ?? DEFAULT_SETTINGS.startingAngle, 'startingAngle'));
}

function validateScenario(value: unknown, field: string): ScenarioDefinition {
  if (!isRecord(value)) {
    throw new ConfigurationError(field, 'expected a scenario id or definition object');
  }
  rejectUnknownKeys(value, SCENARIO_KEYS, `${field}.`);

  const name = value.name;
  if (typeof name !== 'string' || name.length === 0) {
    throw new ConfigurationError(`${field}.name`, 'expected a non-empty string');
  }

  const map = value.map === undefined ? undefined : readMap(value.map, `${field}.map`);
  const bounds = map ?? DEFAULT_MAP;

  const spawns: unknown = value.asteroids;
  if (spawns !== undefined) {
    if (!Array.isArray(spawns) || spawns.length === 0) {
      throw new ConfigurationError(`${field}.asteroids`, 'expected a non-empty array');
    }
    const asteroids = spawns.map((spawn: unknown, i: number) =>
      readSpawn(spawn, `${field}.asteroids[${i}]`, bounds),
    );
    return Object.freeze({ name, map, asteroids });
  }

  const numAsteroids = readNumber(value.numAsteroids ?? DEFAULT_NUM_ASTEROIDS, `${field}.numAsteroids`);
  if (!Number.isInteger(numAsteroids) || numAsteroids < 1) {
    throw new ConfigurationError(`${field}.numAsteroids`, 'must be an integer of at least 1');
  }
  const asteroidSize = value.asteroidSize === undefined
    ? AsteroidSize.Huge
    : readSize(value.asteroidSize, `${field}.asteroidSize`);

  return Object.freeze({ name, map, numAsteroids, asteroidSize });
}

function readSpawn(value: unknown, field: string, map: MapDimensions): AsteroidSpawn {
  if (!isRecord(value)) throw new ConfigurationError(field, 'expected an object');
  rejectUnknownKeys(value, SPAWN_KEYS, `${field}.`);

  const position = readVec2(value.position, `${field}.position`);
  if (!insideMap(position, map)) {
    throw new ConfigurationError(`${field}.position`, `must lie inside the ${map.width}x${map.height} map`);
  }
  const size = readSize(value.size, `${field}.size`);

  let speed: number | undefined;
  if (value.speed !== undefined) {
    speed = readNumber(value.speed, `${field}.speed`);
    if (speed < 0) throw new ConfigurationError(`${field}.speed`, 'must not be negative');
  }
  const heading = value.heading === undefined
    ? undefined
    : normalizeAngle(readNumber(value.heading, `${field}.heading`));

  return { position, size, speed, heading };
}

function readMap(value: unknown, field: string): MapDimensions {
  if (!isRecord(value)) throw new ConfigurationError(field, 'expected { width, height }');
  const width = readNumber(value.width, `${field}.width`);
  const height = readNumber(value.height, `${field}.height`);
  if (width <= 0) throw new ConfigurationError(`${field}.width`, 'must be greater than 0');
  if (height <= 0) throw new ConfigurationError(`${field}.height`, 'must be greater than 0');
  return { width, height };
}

const ASTEROID_SIZES: readonly AsteroidSize[] = [
  AsteroidSize.Small,
  AsteroidSize.Medium,
  AsteroidSize.Large,
  AsteroidSize.Huge,
];

function readSize(value: unknown, field: string): AsteroidSize {
  const size = ASTEROID_SIZES.find((s) => s === value);
  if (size === undefined) {
    throw new ConfigurationError(field, 'expected an asteroid size from 1 (small) to 4 (huge)');
  }
  return size;
}

// --- Primitive helpers ---

function rejectUnknownKeys(record: Record<string, unknown>, known: ReadonlySet<string>, prefix: string): void {
  for (const key of Object.keys(record)) {
    if (!known.has(key)) {
      throw new ConfigurationError(`${prefix}${key}`, 'unrecognized setting');
    }
  }
}

function readNumber(value: unknown, field: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConfigurationError(field, 'expected a finite number');
  }
  return value;
}

function readBoolean(value: unknown, field: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigurationError(field, 'expected a boolean');
  }
  return value;
}

function readVec2(value: unknown, field: string): Vec2 {
  if (!isRecord(value)) throw new ConfigurationError(field, 'expected { x, y }');
  return vec2(readNumber(value.x, `${field}.x`), readNumber(value.y, `${field}.y`));
}

function insideMap(position: Vec2, map: MapDimensions): boolean {
  return position.x >= 0 && position.x < map.width && position.y >= 0 && position.y < map.height;
}
