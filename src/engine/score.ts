/**
 * Score / Telemetry Recorder
 *
 * Created empty at episode start, updated by the controller after every
 * tick, frozen exactly once when the stopping condition turns terminal.
 * The frozen ScoreRecord converts to a plain JSON report in which the
 * stopping condition is a stable integer code plus tag.
 */

import type { CrashRecord, TickEvents, WorldState } from './types';
import { StoppingCondition, isTerminal, serializeStoppingCondition } from './stopping';
import type { StoppingConditionTag } from './stopping';
import { EpisodeAlreadyEnded, EpisodeNotFinished } from './errors';

/** Agent compute-cost statistics, in seconds. Present only when tracking is on. */
export interface ComputeCostStats {
  readonly evaluations: number;
  readonly total: number;
  readonly mean: number;
  readonly median: number;
  readonly min: number;
  readonly max: number;
  /** Duration of every agent call, in call order */
  readonly durations: readonly number[];
  /** Live asteroids at each agent call, in call order */
  readonly asteroidCounts: readonly number[];
}

export interface ScoreRecord {
  readonly scenario: string;
  /** Simulated seconds at the end of the episode */
  readonly episodeTime: number;
  readonly frameCount: number;
  readonly stoppingCondition: StoppingCondition;
  readonly livesRemaining: number;
  readonly asteroidsDestroyed: number;
  /** Asteroids destroyable in the scenario if every fragment is cleared */
  readonly maxAsteroids: number;
  readonly bulletsFired: number;
  readonly bulletHits: number;
  /** bulletHits / bulletsFired, 0 if nothing was fired */
  readonly accuracy: number;
  readonly deaths: number;
  /** px covered by the ship while controllable */
  readonly distanceTravelled: number;
  readonly crashes: readonly CrashRecord[];
  /** Summed agent wall-clock seconds; absent unless compute cost is tracked */
  readonly computeCostTotal?: number;
  readonly computeCost?: ComputeCostStats;
}

/** Plain JSON form of a ScoreRecord. */
export interface ScoreReport {
  scenario: string;
  episodeTime: number;
  frameCount: number;
  stoppingCondition: number;
  stoppingConditionTag: StoppingConditionTag;
  livesRemaining: number;
  asteroidsDestroyed: number;
  maxAsteroids: number;
  bulletsFired: number;
  bulletHits: number;
  accuracy: number;
  deaths: number;
  distanceTravelled: number;
  crashes: Array<{
    frame: number;
    time: number;
    position: [number, number];
    livesRemaining: number;
    fatal: boolean;
  }>;
  computeCostTotal?: number;
  computeCost?: {
    evaluations: number;
    total: number;
    mean: number;
    median: number;
    min: number;
    max: number;
  };
}

export interface ScoreRecorderOptions {
  scenario: string;
  startingLives: number;
  maxAsteroids: number;
  trackComputeCost: boolean;
}

export class ScoreRecorder {
  private readonly options: ScoreRecorderOptions;
  private frameCount = 0;
  private episodeTime = 0;
  private livesRemaining: number;
  private asteroidsDestroyed = 0;
  private bulletsFired = 0;
  private bulletHits = 0;
  private distanceTravelled = 0;
  private readonly crashes: CrashRecord[] = [];
  private readonly durations: number[] = [];
  private readonly asteroidCounts: number[] = [];
  private frozen: ScoreRecord | null = null;

  constructor(options: ScoreRecorderOptions) {
    this.options = options;
    this.livesRemaining = options.startingLives;
  }

  get isFrozen(): boolean {
    return this.frozen !== null;
  }

  /**
   * Record one agent evaluation. Ignored when compute cost is not tracked.
   *
   * @param seconds - Wall-clock duration of the agent call
   * @param asteroidCount - Live asteroids the agent was looking at
   */
  recordEvaluation(seconds: number, asteroidCount: number): void {
    this.assertOpen();
    if (!this.options.trackComputeCost) return;
    this.durations.push(seconds);
    this.asteroidCounts.push(asteroidCount);
  }

  /** Fold one completed tick into the running totals. */
  recordTick(world: WorldState, events: TickEvents): void {
    this.assertOpen();
    this.frameCount = world.frame;
    this.episodeTime = world.time;
    this.livesRemaining = world.ship.lives;
    this.asteroidsDestroyed += events.asteroidsDestroyed;
    this.bulletsFired += events.bulletsFired;
    this.bulletHits += events.bulletHits;
    this.distanceTravelled += events.distance;
    this.crashes.push(...events.crashes);
  }

  /** Freeze the record. Called once, by the controller, on the terminal tick. */
  freeze(condition: StoppingCondition): ScoreRecord {
    this.assertOpen();
    if (!isTerminal(condition)) {
      throw new EpisodeNotFinished();
    }

    const record: ScoreRecord = {
      scenario: this.options.scenario,
      episodeTime: this.episodeTime,
      frameCount: this.frameCount,
      stoppingCondition: condition,
      livesRemaining: this.livesRemaining,
      asteroidsDestroyed: this.asteroidsDestroyed,
      maxAsteroids: this.options.maxAsteroids,
      bulletsFired: this.bulletsFired,
      bulletHits: this.bulletHits,
      accuracy: this.bulletsFired > 0 ? this.bulletHits / this.bulletsFired : 0,
      deaths: this.crashes.length,
      distanceTravelled: this.distanceTravelled,
      crashes: Object.freeze([...this.crashes]),
      ...(this.options.trackComputeCost ? this.computeCostFields() : {}),
    };
    this.frozen = Object.freeze(record);
    return this.frozen;
  }

  /**
   * The frozen score. Repeated calls return the same object.
   *
   * @throws EpisodeNotFinished while the episode is still running
   */
  finalize(): ScoreRecord {
    if (!this.frozen) throw new EpisodeNotFinished();
    return this.frozen;
  }

  private assertOpen(): void {
    if (this.frozen) throw new EpisodeAlreadyEnded(this.frozen.stoppingCondition);
  }

  private computeCostFields(): Pick<ScoreRecord, 'computeCostTotal' | 'computeCost'> {
    const durations = [...this.durations];
    const total = durations.reduce((sum, d) => sum + d, 0);
    const evaluations = durations.length;
    return {
      computeCostTotal: total,
      computeCost: Object.freeze({
        evaluations,
        total,
        mean: evaluations > 0 ? total / evaluations : 0,
        median: median(durations),
        min: evaluations > 0 ? durations.reduce((lo, d) => (d < lo ? d : lo), Infinity) : 0,
        max: evaluations > 0 ? durations.reduce((hi, d) => (d > hi ? d : hi), -Infinity) : 0,
        durations: Object.freeze(durations),
        asteroidCounts: Object.freeze([...this.asteroidCounts]),
      }),
    };
  }
}

function median(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

/** Convert a score into plain JSON for reporting. */
export function toScoreReport(record: ScoreRecord): ScoreReport {
  const report: ScoreReport = {
    scenario: record.scenario,
    episodeTime: record.episodeTime,
    frameCount: record.frameCount,
    stoppingCondition: record.stoppingCondition,
    stoppingConditionTag: serializeStoppingCondition(record.stoppingCondition),
    livesRemaining: record.livesRemaining,
    asteroidsDestroyed: record.asteroidsDestroyed,
    maxAsteroids: record.maxAsteroids,
    bulletsFired: record.bulletsFired,
    bulletHits: record.bulletHits,
    accuracy: record.accuracy,
    deaths: record.deaths,
    distanceTravelled: record.distanceTravelled,
    crashes: record.crashes.map((c) => ({
      frame: c.frame,
      time: c.time,
      position: [c.position.x, c.position.y],
      livesRemaining: c.livesRemaining,
      fatal: c.fatal,
    })),
  };

  if (record.computeCostTotal !== undefined && record.computeCost) {
    const { evaluations, total, mean, median: mid, min, max } = record.computeCost;
    report.computeCostTotal = record.computeCostTotal;
    report.computeCost = { evaluations, total, mean, median: mid, min, max };
  }

  return report;
}
