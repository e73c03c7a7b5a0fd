/**
 * Error taxonomy for the simulation.
 *
 * Nothing is retried internally. Each error aborts the operation that raised
 * it and leaves previously committed state (completed ticks, score fields)
 * untouched.
 */

import { StoppingCondition, serializeStoppingCondition } from './stopping';

export class SimulationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Bad settings or scenario at episode start. Raised before any tick runs. */
export class ConfigurationError extends SimulationError {
  /** Dotted path of the offending setting, e.g. "scenario.asteroids[2].size" */
  readonly field: string;

  constructor(field: string, reason: string) {
    super(`Invalid setting "${field}": ${reason}`);
    this.field = field;
  }
}

/** Agent action outside the legal vocabulary. The tick is not applied. */
export class InvalidAction extends SimulationError {}

/** step() called after the episode reached a terminal stopping condition. */
export class EpisodeAlreadyEnded extends SimulationError {
  readonly stoppingCondition: StoppingCondition;

  constructor(stoppingCondition: StoppingCondition) {
    super(`Episode already ended (${serializeStoppingCondition(stoppingCondition)})`);
    this.stoppingCondition = stoppingCondition;
  }
}

/** Score requested while the stopping condition is still None. */
export class EpisodeNotFinished extends SimulationError {
  constructor() {
    super('Score cannot be finalized before the episode has ended');
  }
}
