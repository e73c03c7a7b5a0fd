/**
 * StoppingCondition -- episode termination state machine.
 *
 * None is the initial and only non-terminal state. The three terminal
 * states are absorbing. When several conditions become true on the same
 * tick the fixed precedence NoLives > NoAsteroids > TimeLimitReached
 * picks the outcome.
 *
 * Numeric values and tags are part of the score report format and must
 * not be renumbered.
 */

export enum StoppingCondition {
  None = 0,
  NoAsteroids = 1,
  NoLives = 2,
  TimeLimitReached = 3,
}

export type StoppingConditionTag = 'none' | 'no_asteroids' | 'no_lives' | 'time_limit_reached';

const TAGS: Record<StoppingCondition, StoppingConditionTag> = {
  [StoppingCondition.None]: 'none',
  [StoppingCondition.NoAsteroids]: 'no_asteroids',
  [StoppingCondition.NoLives]: 'no_lives',
  [StoppingCondition.TimeLimitReached]: 'time_limit_reached',
};

/** Every variant, in code order. */
export const STOPPING_CONDITIONS: readonly StoppingCondition[] = [
  StoppingCondition.None,
  StoppingCondition.NoAsteroids,
  StoppingCondition.NoLives,
  StoppingCondition.TimeLimitReached,
];

const BY_TAG = new Map<string, StoppingCondition>(
  STOPPING_CONDITIONS.map((condition) => [TAGS[condition], condition] as const),
);

const BY_CODE = new Map<number, StoppingCondition>(
  STOPPING_CONDITIONS.map((condition) => [condition, condition] as const),
);

/** Stable text tag for a condition. */
export function serializeStoppingCondition(condition: StoppingCondition): StoppingConditionTag {
  return TAGS[condition];
}

/**
 * Parse a tag or integer code back into a condition.
 * Throws RangeError for anything that is not a known tag or code.
 */
export function deserializeStoppingCondition(value: string | number): StoppingCondition {
  const condition = typeof value === 'number' ? BY_CODE.get(value) : BY_TAG.get(value);
  if (condition === undefined) {
    throw new RangeError(`Unknown stopping condition: ${String(value)}`);
  }
  return condition;
}

export function isTerminal(condition: StoppingCondition): boolean {
  return condition !== StoppingCondition.None;
}

/** Facts the machine needs, sampled after collisions are resolved and time advanced. */
export interface StoppingInputs {
  livesRemaining: number;
  asteroidCount: number;
  /** Simulated seconds elapsed */
  time: number;
  /** Seconds, or null when the episode has no time budget */
  timeLimit: number | null;
}

/**
 * Advance the stopping state machine by one evaluation.
 *
 * @param current - State before this tick; returned unchanged if terminal
 */
export function evaluateStoppingCondition(
  current: StoppingCondition,
  inputs: StoppingInputs,
): StoppingCondition {
  if (isTerminal(current)) return current;

  if (inputs.livesRemaining <= 0) return StoppingCondition.NoLives;
  if (inputs.asteroidCount === 0) return StoppingCondition.NoAsteroids;
  if (inputs.timeLimit !== null && inputs.time >= inputs.timeLimit) {
    return StoppingCondition.TimeLimitReached;
  }
  return StoppingCondition.None;
}
