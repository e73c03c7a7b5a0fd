/**
 * World Step Function — Simulation Orchestrator
 *
 * Wires the entity modules together into one tick.
 *
 * Step sequence per tick:
 *   1. Apply the agent's controls to the ship (and fire if asked and able)
 *   2. Advance ship, asteroids and bullets by dt, with wraparound
 *   3. Detect collisions
 *   4. Resolve collisions against an id-indexed arena
 *   5. Advance frame and time
 *
 * Stopping conditions and scoring are layered on top by the controller.
 *
 * No Math.random, no Date.now: the only randomness is the episode RNG
 * passed in, and dt is 1 / frequency, never measured from real time.
 */

import type {
  AsteroidState,
  BulletState,
  CrashRecord,
  Entity,
  EntityId,
  FrameSnapshot,
  ResolvedAction,
  ShipState,
  TickEvents,
  WorldState,
} from './types';
import { EntityKind } from './types';
import type { EnvironmentSettings } from './settings';
import type { SeededRng } from './rng';
import { DEFAULT_MAP } from './constants';
import { vec2, length } from './vec2';
import { applyControls, canFire, crashShip, createShip, fireBullet, isShipCollidable, stepShip } from './ship';
import { createScenarioAsteroids, splitAsteroid, stepAsteroid } from './asteroid';
import { stepBullet } from './bullet';
import { CollisionKind, detectCollisions } from './collision';

/** The ship is always entity 0. */
export const SHIP_ID: EntityId = 0;

export interface StepOutcome {
  world: WorldState;
  events: TickEvents;
}

// ──────────────────────────────────────────────────────────
// createWorld
// ──────────────────────────────────────────────────────────

/**
 * Build the starting world for an episode.
 *
 * RNG draw order is fixed: ship x, ship y (if random), ship angle (if
 * random), then asteroids in scenario order.
 */
export function createWorld(settings: EnvironmentSettings, rng: SeededRng): WorldState {
  const map = settings.scenario.map ?? DEFAULT_MAP;

  const position = settings.startingPosition === 'random'
    ? vec2(rng.nextFloatRange(0, map.width), rng.nextFloatRange(0, map.height))
    : settings.startingPosition;
  const heading = settings.startingAngle === 'random'
    ? rng.nextHeading()
    : settings.startingAngle;

  const ship = createShip(SHIP_ID, position, heading, settings.startingLives);
  const asteroids = createScenarioAsteroids(settings.scenario, map, position, SHIP_ID + 1, rng);

  return {
    frame: 0,
    time: 0,
    map,
    ship,
    asteroids,
    bullets: [],
    nextId: SHIP_ID + 1 + asteroids.length,
  };
}

// ──────────────────────────────────────────────────────────
// stepWorld
// ──────────────────────────────────────────────────────────

/**
 * Advance the simulation by one tick.
 *
 * Deterministic given the RNG state: the same world, action and RNG state
 * always produce the same outcome. The input world is never modified.
 *
 * @param action - Already validated action for this tick
 */
export function stepWorld(
  world: WorldState,
  action: ResolvedAction,
  settings: EnvironmentSettings,
  rng: SeededRng,
): StepOutcome {
  const dt = 1 / settings.frequency;
  const { map } = world;
  let nextId = world.nextId;

  // 1. Controls
  let ship = applyControls(world.ship, action);
  const fired: BulletState[] = [];
  if (action.fire && canFire(ship)) {
    const shot = fireBullet(ship, nextId++, map);
    ship = shot.ship;
    fired.push(shot.bullet);
  }

  // 2. Kinematics
  const controllable = isShipCollidable(ship);
  ship = stepShip(ship, dt, map);
  const distance = controllable ? length(ship.velocity) * dt : 0;
  const asteroids = world.asteroids.map((a) => stepAsteroid(a, dt, map));
  const bullets = [...world.bullets, ...fired]
    .map((b) => stepBullet(b, dt, map))
    .filter((b) => b.alive);

  // 3. Detection
  const pairs = detectCollisions([ship, ...asteroids, ...bullets]);

  // 5. Time. Computed before resolution so crash records carry the time
  //    of the tick they happen on.
  const frame = world.frame + 1;
  const time = frame / settings.frequency;

  // 4. Resolution
  const arena = new Map<EntityId, Entity>();
  for (const entity of [ship, ...asteroids, ...bullets]) arena.set(entity.id, entity);

  const crashes: CrashRecord[] = [];
  let bulletHits = 0;
  let asteroidsDestroyed = 0;
  let shipResolved = false;

  const destroyAsteroid = (asteroid: AsteroidState): void => {
    arena.set(asteroid.id, { ...asteroid, alive: false });
    for (const child of splitAsteroid(asteroid, nextId, rng)) {
      arena.set(child.id, child);
      nextId++;
    }
    asteroidsDestroyed++;
  };

  for (const pair of pairs) {
    const target = arena.get(pair.b);
    if (target?.kind !== EntityKind.Asteroid || !target.alive) continue;

    const striker = arena.get(pair.a);
    if (!striker?.alive) continue;

    if (pair.kind === CollisionKind.BulletAsteroid && striker.kind === EntityKind.Bullet) {
      arena.set(striker.id, { ...striker, alive: false });
      bulletHits++;
      destroyAsteroid(target);
    } else if (pair.kind === CollisionKind.ShipAsteroid && striker.kind === EntityKind.Ship) {
      // One crash per tick: after respawning the ship is somewhere else
      if (shipResolved) continue;
      shipResolved = true;
      const result = crashShip(striker, frame, time, settings.respawnInvulnerability);
      arena.set(striker.id, result.ship);
      crashes.push(result.crash);
      // The last life is lost without taking the asteroid along
      if (!result.crash.fatal) destroyAsteroid(target);
    }
  }

  // Arena insertion order keeps both lists ascending by id: spawned
  // children always carry ids above every pre-existing entity.
  let nextShip: ShipState = ship;
  const nextAsteroids: AsteroidState[] = [];
  const nextBullets: BulletState[] = [];
  for (const entity of arena.values()) {
    switch (entity.kind) {
      case EntityKind.Ship:
        nextShip = entity;
        break;
      case EntityKind.Asteroid:
        if (entity.alive) nextAsteroids.push(entity);
        break;
      case EntityKind.Bullet:
        if (entity.alive) nextBullets.push(entity);
        break;
    }
  }

  return {
    world: {
      frame,
      time,
      map,
      ship: nextShip,
      asteroids: nextAsteroids,
      bullets: nextBullets,
      nextId,
    },
    events: {
      bulletsFired: fired.length,
      bulletHits,
      asteroidsDestroyed,
      crashes,
      distance,
    },
  };
}

/** Read-only view of the world for renderers. */
export function toFrameSnapshot(world: WorldState): FrameSnapshot {
  return {
    frame: world.frame,
    time: world.time,
    map: world.map,
    ship: world.ship,
    asteroids: world.asteroids,
    bullets: world.bullets,
  };
}
