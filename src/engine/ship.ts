/**
 * Ship — agent-controlled entity: controls, kinematics, gun and crash lifecycle.
 *
 * Arcade kinematics: the ship carries a signed scalar speed along its
 * heading. Each tick linear drag pulls the speed toward zero, thrust is
 * added, the result is capped at SHIP.maxSpeed, and the heading turns by
 * turnRate * dt. There is no lateral slide.
 *
 * All functions are pure: (state, ...) -> newState.
 */

import type { BulletState, CrashRecord, MapDimensions, ResolvedAction, ShipState, Vec2 } from './types';
import { EntityKind } from './types';
import { SHIP } from './constants';
import { add, fromHeading, normalizeAngle, scale, vec2 } from './vec2';
import { wrapPosition } from './torus';
import { createBullet } from './bullet';

/** Timers at or below this many seconds count as expired (absorbs float drift). */
const TIMER_EPSILON = 1e-9;

/** Create a ship at rest. */
export function createShip(id: number, position: Vec2, heading: number, lives: number): ShipState {
  return {
    id,
    kind: EntityKind.Ship,
    position,
    velocity: vec2(0, 0),
    heading,
    radius: SHIP.radius,
    alive: true,
    speed: 0,
    thrust: 0,
    turnRate: 0,
    lives,
    fireCooldown: 0,
    respawnTimeLeft: 0,
    startingPosition: position,
    startingAngle: heading,
  };
}

/** Store the agent's thrust and turn rate on the ship. Takes effect in stepShip. */
export function applyControls(ship: ShipState, action: ResolvedAction): ShipState {
  if (!ship.alive) return ship;
  return { ...ship, thrust: action.thrust, turnRate: action.turnRate };
}

export function canFire(ship: ShipState): boolean {
  return ship.alive && ship.fireCooldown <= TIMER_EPSILON;
}

/** True while the ship is in its post-respawn invulnerability window. */
export function isRespawning(ship: ShipState): boolean {
  return ship.respawnTimeLeft > TIMER_EPSILON;
}

/** Alive and not invulnerable. */
export function isShipCollidable(ship: ShipState): boolean {
  return ship.alive && !isRespawning(ship);
}

/**
 * Fire one bullet from the nose. Caller checks canFire first.
 * Firing ends any remaining respawn invulnerability.
 */
export function fireBullet(
  ship: ShipState,
  bulletId: number,
  map: MapDimensions,
): { ship: ShipState; bullet: BulletState } {
  const direction = fromHeading(ship.heading);
  const muzzle = wrapPosition(add(ship.position, scale(direction, ship.radius)), map);
  return {
    ship: { ...ship, fireCooldown: 1 / SHIP.fireRate, respawnTimeLeft: 0 },
    bullet: createBullet(bulletId, muzzle, ship.heading),
  };
}

/**
 * Advance the ship by one tick.
 *
 * @param dt - Tick duration in seconds
 */
export function stepShip(ship: ShipState, dt: number, map: MapDimensions): ShipState {
  if (!ship.alive) return ship;

  // Drag toward zero, never past it
  let speed = ship.speed;
  if (speed > 0) {
    speed = Math.max(0, speed - SHIP.drag * dt);
  } else if (speed < 0) {
    speed = Math.min(0, speed + SHIP.drag * dt);
  }

  speed += ship.thrust * dt;
  speed = Math.max(-SHIP.maxSpeed, Math.min(SHIP.maxSpeed, speed));

  const heading = normalizeAngle(ship.heading + ship.turnRate * dt);
  const velocity = scale(fromHeading(heading), speed);
  const position = wrapPosition(add(ship.position, scale(velocity, dt)), map);

  return {
    ...ship,
    position,
    velocity,
    heading,
    speed,
    fireCooldown: Math.max(0, ship.fireCooldown - dt),
    respawnTimeLeft: Math.max(0, ship.respawnTimeLeft - dt),
  };
}

/**
 * Destroy the ship after an asteroid collision.
 *
 * With lives left it respawns at its starting position and angle, at rest,
 * invulnerable for `respawnInvulnerability` seconds. On the last life it
 * stays where it crashed, not alive, and never respawns.
 *
 * @returns The updated ship and the crash record for this collision
 */
export function crashShip(
  ship: ShipState,
  frame: number,
  time: number,
  respawnInvulnerability: number,
): { ship: ShipState; crash: CrashRecord } {
  const lives = Math.max(0, ship.lives - 1);
  const crash: CrashRecord = {
    frame,
    time,
    position: ship.position,
    livesRemaining: lives,
    fatal: lives === 0,
  };

  if (lives === 0) {
    return {
      ship: { ...ship, lives, alive: false, velocity: vec2(0, 0), speed: 0, thrust: 0, turnRate: 0 },
      crash,
    };
  }

  return {
    ship: {
      ...ship,
      lives,
      position: ship.startingPosition,
      heading: ship.startingAngle,
      velocity: vec2(0, 0),
      speed: 0,
      thrust: 0,
      turnRate: 0,
      respawnTimeLeft: respawnInvulnerability,
    },
    crash,
  };
}
