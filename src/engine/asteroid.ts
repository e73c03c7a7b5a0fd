/**
 * Asteroids — creation, drift and splitting.
 *
 * Asteroids drift in a straight line at constant velocity and wrap at the
 * map edges. Destroying one of size N > 1 spawns SPLIT_COUNT children of
 * size N - 1 at the parent's last position, each moving at the base speed
 * of its class in a heading drawn from the episode RNG.
 */

import type { AsteroidSpawn, AsteroidState, MapDimensions, ScenarioDefinition, Vec2 } from './types';
import { AsteroidSize, EntityKind } from './types';
import { ASTEROID_CLASSES, MAX_PLACEMENT_ATTEMPTS, SAFE_SPAWN_DISTANCE, SPLIT_COUNT } from './constants';
import { add, distanceSq, fromHeading, scale, vec2 } from './vec2';
import { wrapPosition } from './torus';
import type { SeededRng } from './rng';

const NEXT_SIZE_DOWN: Record<AsteroidSize, AsteroidSize | null> = {
  [AsteroidSize.Small]: null,
  [AsteroidSize.Medium]: AsteroidSize.Small,
  [AsteroidSize.Large]: AsteroidSize.Medium,
  [AsteroidSize.Huge]: AsteroidSize.Large,
};

/**
 * Create an asteroid.
 *
 * @param heading - Direction of travel in degrees
 * @param speed - px/s; defaults to the base speed of the size class
 */
export function createAsteroid(
  id: number,
  position: Vec2,
  size: AsteroidSize,
  heading: number,
  speed: number = ASTEROID_CLASSES[size].speed,
): AsteroidState {
  return {
    id,
    kind: EntityKind.Asteroid,
    position,
    velocity: scale(fromHeading(heading), speed),
    heading,
    radius: ASTEROID_CLASSES[size].radius,
    alive: true,
    size,
  };
}

export function stepAsteroid(asteroid: AsteroidState, dt: number, map: MapDimensions): AsteroidState {
  if (!asteroid.alive) return asteroid;
  return {
    ...asteroid,
    position: wrapPosition(add(asteroid.position, scale(asteroid.velocity, dt)), map),
  };
}

/**
 * Children produced by destroying an asteroid. Empty for the smallest size.
 *
 * @param firstId - Id for the first child; the rest count up from it
 */
export function splitAsteroid(asteroid: AsteroidState, firstId: number, rng: SeededRng): AsteroidState[] {
  const childSize = NEXT_SIZE_DOWN[asteroid.size];
  if (childSize === null) return [];

  const children: AsteroidState[] = [];
  for (let i = 0; i < SPLIT_COUNT; i++) {
    const heading = rng.nextHeading();
    children.push(createAsteroid(firstId + i, asteroid.position, childSize, heading));
  }
  return children;
}

/**
 * Most asteroids that can ever be destroyed starting from one of this size:
 * the asteroid itself plus every descendant.
 */
export function asteroidLineageSize(size: AsteroidSize): number {
  let total = 0;
  for (let generation = 0; generation < size; generation++) {
    total += SPLIT_COUNT ** generation;
  }
  return total;
}

/**
 * Build the starting asteroids of a scenario.
 *
 * Explicit spawns use their own position; missing headings are drawn from
 * the RNG. Random scenarios place each asteroid uniformly, re-drawing
 * positions that land within SAFE_SPAWN_DISTANCE of the ship start.
 */
export function createScenarioAsteroids(
  scenario: ScenarioDefinition,
  map: MapDimensions,
  shipStart: Vec2,
  firstId: number,
  rng: SeededRng,
): AsteroidState[] {
  if (scenario.asteroids) {
    return scenario.asteroids.map((spawn: AsteroidSpawn, i) =>
      createAsteroid(
        firstId + i,
        spawn.position,
        spawn.size,
        spawn.heading ?? rng.nextHeading(),
        spawn.speed,
      ),
    );
  }

  const count = scenario.numAsteroids ?? 0;
  const size = scenario.asteroidSize ?? AsteroidSize.Huge;
  const asteroids: AsteroidState[] = [];
  for (let i = 0; i < count; i++) {
    const position = placeAwayFrom(shipStart, map, rng);
    asteroids.push(createAsteroid(firstId + i, position, size, rng.nextHeading()));
  }
  return asteroids;
}

function placeAwayFrom(avoid: Vec2, map: MapDimensions, rng: SeededRng): Vec2 {
  const minDistSq = SAFE_SPAWN_DISTANCE * SAFE_SPAWN_DISTANCE;
  let position = vec2(0, 0);
  for (let attempt = 0; attempt < MAX_PLACEMENT_ATTEMPTS; attempt++) {
    position = vec2(rng.nextFloatRange(0, map.width), rng.nextFloatRange(0, map.height));
    if (distanceSq(position, avoid) >= minDistSq) break;
  }
  return position;
}
