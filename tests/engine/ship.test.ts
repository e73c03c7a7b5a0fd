/**
 * Ship Kinematics and Lifecycle Tests
 *
 * Drag, thrust, speed cap, turning, wraparound, firing, and the crash /
 * respawn / fatal-crash lifecycle.
 */

import { describe, it, expect } from 'vitest';
import { createShip, applyControls, stepShip, fireBullet, canFire, crashShip, isShipCollidable } from '../../src/engine/ship';
import { SHIP, BULLET } from '../../src/engine/constants';
import { vec2 } from '../../src/engine/vec2';
import type { ShipState } from '../../src/engine/types';

const MAP = { width: 800, height: 800 };
const DT = 1 / 60;

function makeShip(overrides: Partial<ShipState> = {}): ShipState {
  return { ...createShip(0, vec2(400, 400), 0, 3), ...overrides };
}

// ──────────────────────────────────────────────────────────
// stepShip
// ──────────────────────────────────────────────────────────
describe('stepShip', () => {
  it('stays put with no controls', () => {
    const ship = stepShip(makeShip(), DT, MAP);
    expect(ship.position).toEqual({ x: 400, y: 400 });
    expect(ship.speed).toBe(0);
  });

  it('thrust accelerates along the heading', () => {
    const ship = stepShip(makeShip({ thrust: 480 }), DT, MAP);
    expect(ship.speed).toBeCloseTo(8, 12);
    expect(ship.velocity.x).toBeCloseTo(0, 12);
    expect(ship.velocity.y).toBeCloseTo(8, 12);
    expect(ship.position.y).toBeCloseTo(400 + 8 / 60, 12);
  });

  it('drag pulls speed toward zero without crossing it', () => {
    expect(stepShip(makeShip({ speed: 100 }), DT, MAP).speed).toBeCloseTo(100 - 80 / 60, 12);
    expect(stepShip(makeShip({ speed: -100 }), DT, MAP).speed).toBeCloseTo(-100 + 80 / 60, 12);
    expect(stepShip(makeShip({ speed: 1 }), DT, MAP).speed).toBe(0);
  });

  it('caps speed at maxSpeed in both directions', () => {
    expect(stepShip(makeShip({ speed: 240, thrust: 480 }), DT, MAP).speed).toBe(SHIP.maxSpeed);
    expect(stepShip(makeShip({ speed: -240, thrust: -480 }), DT, MAP).speed).toBe(-SHIP.maxSpeed);
  });

  it('turns counter-clockwise for a positive turn rate', () => {
    expect(stepShip(makeShip({ turnRate: 180 }), DT, MAP).heading).toBeCloseTo(3, 12);
    expect(stepShip(makeShip({ turnRate: -180 }), DT, MAP).heading).toBeCloseTo(357, 12);
  });

  it('wraps across the top edge with velocity and heading unchanged', () => {
    const before = makeShip({ position: vec2(400, 798), speed: 240 });
    const after = stepShip(before, DT, MAP);
    const speed = 240 - 80 / 60;
    expect(after.position.x).toBeCloseTo(400, 9);
    expect(after.position.y).toBeCloseTo(798 + speed / 60 - 800, 9);
    expect(after.heading).toBe(0);
    expect(after.velocity.y).toBeCloseTo(speed, 9);
  });

  it('does nothing once the ship is dead', () => {
    const dead = makeShip({ alive: false, speed: 100 });
    expect(stepShip(dead, DT, MAP)).toBe(dead);
    expect(applyControls(dead, { thrust: 480, turnRate: 0, fire: false })).toBe(dead);
  });

  it('counts timers down and stops at zero', () => {
    const ship = stepShip(makeShip({ fireCooldown: 0.01, respawnTimeLeft: 1 }), DT, MAP);
    expect(ship.fireCooldown).toBe(0);
    expect(ship.respawnTimeLeft).toBeCloseTo(1 - DT, 12);
  });
});

// ──────────────────────────────────────────────────────────
// Gun
// ──────────────────────────────────────────────────────────
describe('fireBullet', () => {
  it('spawns a bullet at the nose moving at muzzle speed', () => {
    const { bullet } = fireBullet(makeShip(), 7, MAP);
    expect(bullet.id).toBe(7);
    expect(bullet.position.x).toBeCloseTo(400, 12);
    expect(bullet.position.y).toBeCloseTo(410, 12);
    expect(bullet.velocity.y).toBeCloseTo(BULLET.speed, 12);
    expect(bullet.timeToLive).toBe(BULLET.lifetime);
  });

  it('starts the cooldown and ends respawn invulnerability', () => {
    const { ship } = fireBullet(makeShip({ respawnTimeLeft: 2 }), 1, MAP);
    expect(ship.fireCooldown).toBeCloseTo(1 / SHIP.fireRate, 12);
    expect(ship.respawnTimeLeft).toBe(0);
    expect(canFire(ship)).toBe(false);
  });
});

// ──────────────────────────────────────────────────────────
// crashShip
// ──────────────────────────────────────────────────────────
describe('crashShip', () => {
  it('respawns at the start, at rest and invulnerable', () => {
    const moving = makeShip({ position: vec2(100, 200), heading: 45, speed: 120, thrust: 480, turnRate: 90 });
    const { ship, crash } = crashShip(moving, 12, 0.2, 3);

    expect(crash).toEqual({ frame: 12, time: 0.2, position: { x: 100, y: 200 }, livesRemaining: 2, fatal: false });
    expect(ship.alive).toBe(true);
    expect(ship.lives).toBe(2);
    expect(ship.position).toEqual({ x: 400, y: 400 });
    expect(ship.heading).toBe(0);
    expect(ship.speed).toBe(0);
    expect(ship.thrust).toBe(0);
    expect(ship.respawnTimeLeft).toBe(3);
    expect(isShipCollidable(ship)).toBe(false);
  });

  it('the last life leaves the ship dead where it crashed', () => {
    const { ship, crash } = crashShip(makeShip({ lives: 1, position: vec2(50, 60), speed: 30 }), 5, 0.1, 3);
    expect(crash.fatal).toBe(true);
    expect(crash.livesRemaining).toBe(0);
    expect(ship.alive).toBe(false);
    expect(ship.position).toEqual({ x: 50, y: 60 });
    expect(ship.speed).toBe(0);
    expect(canFire(ship)).toBe(false);
  });
});
