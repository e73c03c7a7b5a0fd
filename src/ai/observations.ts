/**
 * Observation Builder — what an agent is allowed to see.
 *
 * Exposes the ship's kinematics, lives and gun state plus the position,
 * velocity and size of every live asteroid and bullet. Entity ids, RNG
 * state, score totals and the stopping condition stay inside the
 * controller.
 */

import type { AsteroidSize, MapDimensions, Vec2, WorldState } from '../engine/types';
import { canFire, isRespawning } from '../engine/ship';

export interface ShipObservation {
  readonly position: Vec2;
  readonly velocity: Vec2;
  /** Degrees, 0 = +y, counter-clockwise */
  readonly heading: number;
  readonly speed: number;
  readonly radius: number;
  readonly lives: number;
  readonly alive: boolean;
  readonly canFire: boolean;
  readonly respawning: boolean;
}

export interface AsteroidObservation {
  readonly position: Vec2;
  readonly velocity: Vec2;
  readonly size: AsteroidSize;
  readonly radius: number;
}

export interface BulletObservation {
  readonly position: Vec2;
  readonly velocity: Vec2;
  readonly timeToLive: number;
}

export interface Observation {
  readonly frame: number;
  /** Simulated seconds elapsed */
  readonly time: number;
  readonly map: MapDimensions;
  readonly ship: ShipObservation;
  readonly asteroids: readonly AsteroidObservation[];
  readonly bullets: readonly BulletObservation[];
}

export function buildObservation(world: WorldState): Observation {
  const { ship } = world;
  return {
    frame: world.frame,
    time: world.time,
    map: world.map,
    ship: {
      position: ship.position,
      velocity: ship.velocity,
      heading: ship.heading,
      speed: ship.speed,
      radius: ship.radius,
      lives: ship.lives,
      alive: ship.alive,
      canFire: canFire(ship),
      respawning: isRespawning(ship),
    },
    asteroids: world.asteroids.map((a) => ({
      position: a.position,
      velocity: a.velocity,
      size: a.size,
      radius: a.radius,
    })),
    bullets: world.bullets.map((b) => ({
      position: b.position,
      velocity: b.velocity,
      timeToLive: b.timeToLive,
    })),
  };
}
