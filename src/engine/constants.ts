/**
 * Physics Constants and Tuning Parameters
 *
 * All game tuning lives here. The tick duration itself is not a constant:
 * it is 1 / frequency from the resolved EnvironmentSettings.
 */

import { AsteroidSize } from './types';
import type { MapDimensions } from './types';

/** Default simulation rate in ticks per second. */
export const DEFAULT_FREQUENCY = 60;

/** Default play-field size in px. */
export const DEFAULT_MAP: MapDimensions = { width: 800, height: 800 };

/** Ship body, drivetrain and gun parameters. */
export const SHIP = {
  /** Collision radius in px */
  radius: 10,
  /** Legal thrust range in px/s^2 [reverse, forward] */
  thrustRange: [-480, 480],
  /** Legal turn-rate range in deg/s [right, left] */
  turnRateRange: [-180, 180],
  /** Speed cap in px/s, both directions */
  maxSpeed: 240,
  /** Linear drag in px/s^2, always pulls speed toward zero */
  drag: 80,
  /** Shots per second */
  fireRate: 10,
  /** Default seconds of invulnerability after a respawn */
  respawnInvulnerability: 3,
} as const;

/** Bullet parameters. */
export const BULLET = {
  /** Muzzle speed in px/s */
  speed: 800,
  /** Seconds before a bullet expires */
  lifetime: 0.75,
  radius: 2,
} as const;

/** Collision radius and base speed per asteroid size class. */
export const ASTEROID_CLASSES: Record<AsteroidSize, { radius: number; speed: number }> = {
  [AsteroidSize.Small]: { radius: 8, speed: 150 },
  [AsteroidSize.Medium]: { radius: 16, speed: 120 },
  [AsteroidSize.Large]: { radius: 24, speed: 90 },
  [AsteroidSize.Huge]: { radius: 32, speed: 60 },
};

/** Children spawned when a non-smallest asteroid is destroyed. */
export const SPLIT_COUNT = 3;

/** Randomly placed asteroids keep at least this distance from the ship spawn, px. */
export const SAFE_SPAWN_DISTANCE = 150;

/** Placement attempts before a random asteroid is accepted wherever it landed. */
export const MAX_PLACEMENT_ATTEMPTS = 32;
