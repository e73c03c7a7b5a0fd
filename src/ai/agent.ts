import type { ControlAction } from '../engine/types';
import type { Observation } from './observations';

/**
 * External decision-maker. Called once per tick with the current
 * observation; returns the control action for that tick. Must be
 * synchronous: the episode waits for it and never times it out.
 */
export interface Agent {
  /** Optional label used in logs and reports */
  readonly name?: string;
  decide(observation: Observation): ControlAction;
}
