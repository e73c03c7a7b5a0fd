/**
 * SimulationController — Headless Episode Owner
 *
 * Owns everything belonging to one episode: the world, the stopping state,
 * the score recorder, the crash log and the RNG. Nothing is shared across
 * episodes; build a new controller for each one.
 *
 * Per step(): validate action -> stepWorld (controls, kinematics,
 * collisions, time) -> stopping state machine -> score.
 */

import type { CrashRecord, FrameSnapshot, WorldState } from './types';
import type { EnvironmentSettings } from './settings';
import type { SeededRng } from './rng';
import { validateAction } from './action';
import { createWorld, stepWorld, toFrameSnapshot } from './world';
import { StoppingCondition, evaluateStoppingCondition, isTerminal, serializeStoppingCondition } from './stopping';
import { ScoreRecorder } from './score';
import type { ScoreRecord } from './score';
import { asteroidLineageSize } from './asteroid';
import { EpisodeAlreadyEnded } from './errors';
import { formatEpisodeTime, formatPosition } from '../utils/formatTime';

export class SimulationController {
  readonly settings: EnvironmentSettings;
  private readonly rng: SeededRng;
  private readonly recorder: ScoreRecorder;
  private readonly _crashLog: CrashRecord[] = [];
  private _world: WorldState;
  private _stoppingCondition = StoppingCondition.None;

  /**
   * @param settings - Resolved settings (see resolveSettings)
   * @param rng - Random source owned by this episode
   */
  constructor(settings: EnvironmentSettings, rng: SeededRng) {
    this.settings = settings;
    this.rng = rng;
    this._world = createWorld(settings, rng);
    this.recorder = new ScoreRecorder({
      scenario: settings.scenario.name,
      startingLives: settings.startingLives,
      maxAsteroids: this._world.asteroids.reduce((sum, a) => sum + asteroidLineageSize(a.size), 0),
      trackComputeCost: settings.trackComputeCost,
    });
  }

  get world(): WorldState { return this._world; }

  get stoppingCondition(): StoppingCondition { return this._stoppingCondition; }

  get ended(): boolean { return isTerminal(this._stoppingCondition); }

  /** Every crash so far, including a final fatal one. */
  get crashLog(): readonly CrashRecord[] { return this._crashLog; }

  snapshot(): FrameSnapshot {
    return toFrameSnapshot(this._world);
  }

  /**
   * Add the wall-clock duration of one agent call to the compute-cost
   * telemetry. Purely observational: it never changes the tick length.
   */
  recordAgentCost(seconds: number): void {
    if (this.ended) throw new EpisodeAlreadyEnded(this._stoppingCondition);
    this.recorder.recordEvaluation(seconds, this._world.asteroids.length);
  }

  /**
   * Advance the episode by one tick.
   *
   * @param action - Raw agent action; validated before anything changes
   * @returns The stopping condition after this tick (None while running)
   * @throws InvalidAction if the action is outside the vocabulary
   * @throws EpisodeAlreadyEnded if a terminal condition was already reached
   */
  step(action: unknown): StoppingCondition {
    if (this.ended) throw new EpisodeAlreadyEnded(this._stoppingCondition);

    const resolved = validateAction(action);
    const { world, events } = stepWorld(this._world, resolved, this.settings, this.rng);
    const next = evaluateStoppingCondition(this._stoppingCondition, {
      livesRemaining: world.ship.lives,
      asteroidCount: world.asteroids.length,
      time: world.time,
      timeLimit: this.settings.timeLimit,
    });

    // Commit only once the score for a terminal tick is frozen
    this.recorder.recordTick(world, events);
    if (isTerminal(next)) this.recorder.freeze(next);

    this._world = world;
    this._stoppingCondition = next;

    for (const crash of events.crashes) {
      this._crashLog.push(crash);
      this.print(
        `[sim] Crashed at ${formatPosition(crash.position)}, t=${formatEpisodeTime(crash.time)}` +
        (crash.fatal ? ' (last life)' : ` (${crash.livesRemaining} lives left)`),
      );
    }

    if (this.ended) {
      this.print(
        `[sim] Game over at ${formatEpisodeTime(world.time)} ` +
        `(${serializeStoppingCondition(next)}) | scenario: ${this.settings.scenario.name}`,
      );
    }

    return this._stoppingCondition;
  }

  /**
   * The episode's final score.
   *
   * @throws EpisodeNotFinished if the episode has not ended yet
   */
  finalize(): ScoreRecord {
    return this.recorder.finalize();
  }

  private print(message: string): void {
    if (this.settings.prints) console.log(message);
  }
}
