/**
 * Baseline agents.
 *
 * Reference opponents for scoring runs and fixtures for tests. Each one is
 * a pure function of the observation, so episodes played with them are
 * reproducible under a fixed seed.
 */

import type { ControlAction } from '../engine/types';
import { SHIP } from '../engine/constants';
import { angleDelta, distanceSq, toHeading } from '../engine/vec2';
import { shortestDelta } from '../engine/torus';
import type { Agent } from './agent';
import type { AsteroidObservation, Observation } from './observations';

/** Heading error (degrees) under which the aiming agent fires. */
const ALIGN_TOLERANCE = 4;

/** Turn-rate gain of the aiming agent: deg/s per degree of heading error. */
const AIM_GAIN = 8;

/** Does nothing. The ship drifts in place until something hits it. */
export class IdleAgent implements Agent {
  readonly name = 'idle';

  decide(): ControlAction {
    return {};
  }
}

/** Turns at a constant rate and fires whenever the gun is ready. */
export class SpinAgent implements Agent {
  readonly name = 'spin';
  private readonly turnRate: number;

  constructor(turnRate: number = SHIP.turnRateRange[1]) {
    this.turnRate = turnRate;
  }

  decide(observation: Observation): ControlAction {
    return { turnRate: this.turnRate, fire: observation.ship.canFire };
  }
}

/**
 * Turns toward the closest asteroid (measured across the wrapped map) and
 * fires once roughly lined up. Never thrusts.
 */
export class NearestAsteroidAgent implements Agent {
  readonly name = 'nearest';

  decide(observation: Observation): ControlAction {
    const { ship, map } = observation;
    const target = nearestAsteroid(observation);
    if (!target) return {};

    const delta = shortestDelta(ship.position, target.position, map);
    const error = angleDelta(ship.heading, toHeading(delta));
    const [minTurn, maxTurn] = SHIP.turnRateRange;
    const turnRate = Math.max(minTurn, Math.min(maxTurn, error * AIM_GAIN));

    return {
      turnRate,
      fire: ship.canFire && Math.abs(error) < ALIGN_TOLERANCE,
    };
  }
}

function nearestAsteroid(observation: Observation): AsteroidObservation | undefined {
  const { ship, map } = observation;
  let best: AsteroidObservation | undefined;
  let bestDistSq = Infinity;
  for (const asteroid of observation.asteroids) {
    const d = distanceSq(shortestDelta(ship.position, asteroid.position, map), { x: 0, y: 0 });
    if (d < bestDistSq) {
      bestDistSq = d;
      best = asteroid;
    }
  }
  return best;
}

export const AGENTS: Record<string, () => Agent> = {
  idle: () => new IdleAgent(),
  spin: () => new SpinAgent(),
  nearest: () => new NearestAsteroidAgent(),
};
