/**
 * Episode runner — plays one full episode of an agent against the engine.
 *
 * Loop: observe -> agent.decide -> controller.step, until the stopping
 * condition is terminal. With trackComputeCost on, every decide() call is
 * wrapped in a wall-clock measurement; the result only feeds telemetry and
 * never paces the simulation, which always advances by 1 / frequency.
 */

import { performance } from 'node:perf_hooks';
import type { ControlAction, FrameSnapshot } from '../engine/types';
import type { EnvironmentSettings } from '../engine/settings';
import { SeededRng } from '../engine/rng';
import { SimulationController } from '../engine/SimulationController';
import { StoppingCondition } from '../engine/stopping';
import type { ScoreRecord } from '../engine/score';
import type { Agent } from './agent';
import { buildObservation } from './observations';

export interface EpisodeOptions {
  /** Seed for the episode RNG (default 0) */
  seed?: number;
  /** Renderer hook, called with the initial frame and after every tick */
  onFrame?: (frame: FrameSnapshot) => void;
}

/**
 * Run one episode to completion and return its frozen score.
 *
 * Errors thrown by the agent, and InvalidAction for illegal actions,
 * propagate to the caller.
 *
 * @param settings - Output of resolveSettings
 */
export function runEpisode(
  agent: Agent,
  settings: EnvironmentSettings,
  options: EpisodeOptions = {},
): ScoreRecord {
  const controller = new SimulationController(settings, new SeededRng(options.seed ?? 0));
  options.onFrame?.(controller.snapshot());

  let condition = StoppingCondition.None;
  while (condition === StoppingCondition.None) {
    const observation = buildObservation(controller.world);

    let action: ControlAction;
    if (settings.trackComputeCost) {
      const start = performance.now();
      action = agent.decide(observation);
      controller.recordAgentCost((performance.now() - start) / 1000);
    } else {
      action = agent.decide(observation);
    }

    condition = controller.step(action);
    options.onFrame?.(controller.snapshot());
  }

  return controller.finalize();
}
