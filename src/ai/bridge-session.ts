/**
 * BridgeSession — message handling for one out-of-process agent.
 *
 * Transport-free so it can be driven directly from tests; the WebSocket
 * server owns one session per connection and only moves JSON in and out.
 *
 * Messages: reset { settings?, seed? }, step { action }, score, close.
 */

import { resolveSettings } from '../engine/settings';
import { SeededRng } from '../engine/rng';
import { SimulationController } from '../engine/SimulationController';
import { serializeStoppingCondition } from '../engine/stopping';
import { toScoreReport } from '../engine/score';
import { ConfigurationError } from '../engine/errors';
import { isRecord } from '../utils/guards';
import { buildObservation } from './observations';
import type { Observation } from './observations';
import type { ScoreReport } from '../engine/score';

export type BridgeResponse =
  | { type: 'reset_result'; observation: Observation; info: Record<string, unknown> }
  | { type: 'step_result'; observation: Observation; stoppingCondition: string; terminated: boolean; info: Record<string, unknown> }
  | { type: 'score_result'; score: ScoreReport }
  | { type: 'close_result' }
  | { type: 'error'; error: string; message: string };

export class BridgeSession {
  private controller: SimulationController | null = null;

  /** Handle a raw text frame. Never throws: failures become error responses. */
  handleText(text: string): BridgeResponse {
    try {
      return this.dispatch(JSON.parse(text));
    } catch (err) {
      return toErrorResponse(err);
    }
  }

  /**
   * Handle one decoded message.
   *
   * @throws ConfigurationError, InvalidAction, EpisodeAlreadyEnded, EpisodeNotFinished
   */
  dispatch(msg: unknown): BridgeResponse {
    if (!isRecord(msg)) {
      throw new TypeError('message must be a JSON object');
    }

    switch (msg.type) {
      case 'reset': {
        const settings = resolveSettings(msg.settings ?? {});
        const seed = readSeed(msg.seed);
        this.controller = new SimulationController(settings, new SeededRng(seed));
        const { world } = this.controller;
        return {
          type: 'reset_result',
          observation: buildObservation(world),
          info: { frame: world.frame, seed, scenario: settings.scenario.name },
        };
      }
      case 'step': {
        const controller = this.requireEpisode();
        const condition = controller.step(msg.action);
        const { world } = controller;
        return {
          type: 'step_result',
          observation: buildObservation(world),
          stoppingCondition: serializeStoppingCondition(condition),
          terminated: controller.ended,
          info: {
            frame: world.frame,
            time: world.time,
            lives: world.ship.lives,
            asteroids: world.asteroids.length,
            crashes: controller.crashLog.length,
          },
        };
      }
      case 'score': {
        const controller = this.requireEpisode();
        return { type: 'score_result', score: toScoreReport(controller.finalize()) };
      }
      case 'close': {
        this.controller = null;
        return { type: 'close_result' };
      }
      default:
        throw new TypeError(`Unknown message type: ${String(msg.type)}`);
    }
  }

  private requireEpisode(): SimulationController {
    if (!this.controller) {
      throw new TypeError('Call reset before step or score');
    }
    return this.controller;
  }
}

function readSeed(value: unknown): number {
  if (value === undefined) return 0;
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ConfigurationError('seed', 'expected an integer');
  }
  return value;
}

function toErrorResponse(err: unknown): BridgeResponse {
  if (err instanceof Error) {
    return { type: 'error', error: err.name, message: err.message };
  }
  return { type: 'error', error: 'Error', message: String(err) };
}
