/**
 * Baseline Agent Tests
 */

import { describe, it, expect } from 'vitest';
import { IdleAgent, SpinAgent, NearestAsteroidAgent, AGENTS } from '../../src/ai/agents';
import type { Observation, ShipObservation, AsteroidObservation } from '../../src/ai/observations';
import { AsteroidSize } from '../../src/engine/types';

// --- Helpers ---

function makeShip(overrides: Partial<ShipObservation> = {}): ShipObservation {
  return {
    position: { x: 400, y: 400 },
    velocity: { x: 0, y: 0 },
    heading: 0,
    speed: 0,
    radius: 10,
    lives: 3,
    alive: true,
    canFire: true,
    respawning: false,
    ...overrides,
  };
}

function rockAt(x: number, y: number): AsteroidObservation {
  return { position: { x, y }, velocity: { x: 0, y: 0 }, size: AsteroidSize.Small, radius: 8 };
}

function observe(ship: ShipObservation, asteroids: AsteroidObservation[]): Observation {
  return { frame: 0, time: 0, map: { width: 800, height: 800 }, ship, asteroids, bullets: [] };
}

describe('IdleAgent', () => {
  it('never acts', () => {
    expect(new IdleAgent().decide()).toEqual({});
  });
});

describe('SpinAgent', () => {
  it('turns at full rate and fires when ready', () => {
    const agent = new SpinAgent();
    expect(agent.decide(observe(makeShip(), []))).toEqual({ turnRate: 180, fire: true });
    expect(agent.decide(observe(makeShip({ canFire: false }), []))).toEqual({ turnRate: 180, fire: false });
  });

  it('takes a custom rate', () => {
    expect(new SpinAgent(-45).decide(observe(makeShip(), [])).turnRate).toBe(-45);
  });
});

describe('NearestAsteroidAgent', () => {
  it('does nothing with no asteroids', () => {
    expect(new NearestAsteroidAgent().decide(observe(makeShip(), []))).toEqual({});
  });

  it('turns toward a target off its nose without firing', () => {
    const action = new NearestAsteroidAgent().decide(observe(makeShip(), [rockAt(300, 400), rockAt(400, 100)]));
    expect(action).toEqual({ turnRate: 180, fire: false });
  });

  it('fires once lined up', () => {
    const action = new NearestAsteroidAgent().decide(observe(makeShip({ heading: 90 }), [rockAt(300, 400)]));
    expect(action.fire).toBe(true);
    expect(action.turnRate).toBeCloseTo(0, 6);
  });

  it('aims across the map seam', () => {
    const ship = makeShip({ position: { x: 10, y: 400 }, heading: 180 });
    const action = new NearestAsteroidAgent().decide(observe(ship, [rockAt(790, 400), rockAt(300, 400)]));
    // Target is 20 px to the left across the seam: heading 90, a right turn of 90 degrees
    expect(action).toEqual({ turnRate: -180, fire: false });
  });
});

describe('AGENTS', () => {
  it('builds each registered agent by id', () => {
    expect(Object.keys(AGENTS)).toEqual(['idle', 'spin', 'nearest']);
    for (const [id, create] of Object.entries(AGENTS)) {
      expect(create().name).toBe(id);
    }
  });
});
