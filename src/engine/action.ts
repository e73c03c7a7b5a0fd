/**
 * Action vocabulary validation.
 *
 * Agents may hand back anything, including values from an out-of-process
 * bridge, so the raw action is treated as unknown. Out-of-range values are
 * rejected rather than clamped.
 */

import type { ResolvedAction } from './types';
import { SHIP } from './constants';
import { InvalidAction } from './errors';
import { isRecord } from '../utils/guards';

const ACTION_KEYS: ReadonlySet<string> = new Set(['thrust', 'turnRate', 'fire']);

/** The "do nothing" action. */
export const NO_ACTION: ResolvedAction = Object.freeze({ thrust: 0, turnRate: 0, fire: false });

/**
 * Validate a raw agent action and fill in defaults.
 *
 * @throws InvalidAction if the action is outside the legal vocabulary
 */
export function validateAction(raw: unknown): ResolvedAction {
  if (!isRecord(raw)) {
    throw new InvalidAction('action must be an object { thrust?, turnRate?, fire? }');
  }
  for (const key of Object.keys(raw)) {
    if (!ACTION_KEYS.has(key)) {
      throw new InvalidAction(`unknown action field "${key}"`);
    }
  }

  return {
    thrust: readControl(raw.thrust, 'thrust', SHIP.thrustRange),
    turnRate: readControl(raw.turnRate, 'turnRate', SHIP.turnRateRange),
    fire: readFire(raw.fire),
  };
}

function readControl(value: unknown, name: string, [min, max]: readonly [number, number]): number {
  if (value === undefined) return 0;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidAction(`${name} must be a finite number`);
  }
  if (value < min || value > max) {
    throw new InvalidAction(`${name} ${value} outside [${min}, ${max}]`);
  }
  return value;
}

function readFire(value: unknown): boolean {
  if (value === undefined) return false;
  if (typeof value !== 'boolean') {
    throw new InvalidAction('fire must be a boolean');
  }
  return value;
}
