/**
 * Score Recorder and Report Tests
 */

import { describe, it, expect } from 'vitest';
import { ScoreRecorder, toScoreReport } from '../../src/engine/score';
import type { ScoreRecord } from '../../src/engine/score';
import { StoppingCondition } from '../../src/engine/stopping';
import { EpisodeAlreadyEnded, EpisodeNotFinished } from '../../src/engine/errors';
import { createWorld } from '../../src/engine/world';
import { resolveSettings } from '../../src/engine/settings';
import { SeededRng } from '../../src/engine/rng';
import type { TickEvents, WorldState } from '../../src/engine/types';

// --- Helpers ---

const BASE_WORLD = createWorld(resolveSettings({ scenario: 'sniper' }), new SeededRng(1));

function worldAt(frame: number, lives: number): WorldState {
  return { ...BASE_WORLD, frame, time: frame / 60, ship: { ...BASE_WORLD.ship, lives } };
}

function events(overrides: Partial<TickEvents> = {}): TickEvents {
  return { bulletsFired: 0, bulletHits: 0, asteroidsDestroyed: 0, crashes: [], distance: 0, ...overrides };
}

function recorder(trackComputeCost = false): ScoreRecorder {
  return new ScoreRecorder({ scenario: 'Sniper', startingLives: 3, maxAsteroids: 1, trackComputeCost });
}

describe('ScoreRecorder', () => {
  it('accumulates tick events', () => {
    const rec = recorder();
    rec.recordTick(worldAt(1, 3), events({ bulletsFired: 1, distance: 2 }));
    rec.recordTick(worldAt(2, 3), events({ bulletsFired: 1, bulletHits: 1, asteroidsDestroyed: 1, distance: 3 }));
    const record = rec.freeze(StoppingCondition.NoAsteroids);

    expect(record.frameCount).toBe(2);
    expect(record.episodeTime).toBe(2 / 60);
    expect(record.bulletsFired).toBe(2);
    expect(record.bulletHits).toBe(1);
    expect(record.accuracy).toBe(0.5);
    expect(record.asteroidsDestroyed).toBe(1);
    expect(record.distanceTravelled).toBe(5);
    expect(record.livesRemaining).toBe(3);
  });

  it('cannot freeze on a non-terminal condition', () => {
    expect(() => recorder().freeze(StoppingCondition.None)).toThrow(EpisodeNotFinished);
  });

  it('rejects updates after freezing', () => {
    const rec = recorder(true);
    rec.freeze(StoppingCondition.TimeLimitReached);
    expect(rec.isFrozen).toBe(true);
    expect(() => rec.recordTick(worldAt(1, 3), events())).toThrow(EpisodeAlreadyEnded);
    expect(() => rec.recordEvaluation(0.1, 1)).toThrow(EpisodeAlreadyEnded);
  });

  it('reports zeroed cost statistics when the agent was never called', () => {
    const rec = recorder(true);
    const record = rec.freeze(StoppingCondition.TimeLimitReached);
    expect(record.computeCostTotal).toBe(0);
    expect(record.computeCost?.evaluations).toBe(0);
    expect(record.computeCost?.median).toBe(0);
  });

  it('summarizes a very long run of evaluations', () => {
    const rec = recorder(true);
    for (let i = 0; i < 250_000; i++) rec.recordEvaluation(i % 2 === 0 ? 0.001 : 0.003, 1);
    const record = rec.freeze(StoppingCondition.TimeLimitReached);
    expect(record.computeCost?.evaluations).toBe(250_000);
    expect(record.computeCost?.min).toBe(0.001);
    expect(record.computeCost?.max).toBe(0.003);
  });

  it('takes the mean of the middle pair for an even median', () => {
    const rec = recorder(true);
    for (const seconds of [0.4, 0.1, 0.3, 0.2]) rec.recordEvaluation(seconds, 1);
    const record = rec.freeze(StoppingCondition.TimeLimitReached);
    expect(record.computeCost?.median).toBeCloseTo(0.25, 12);
    expect(record.computeCost?.durations).toEqual([0.4, 0.1, 0.3, 0.2]);
  });
});

describe('toScoreReport', () => {
  const record: ScoreRecord = {
    scenario: 'Sniper',
    episodeTime: 0.5,
    frameCount: 30,
    stoppingCondition: StoppingCondition.NoLives,
    livesRemaining: 0,
    asteroidsDestroyed: 2,
    maxAsteroids: 13,
    bulletsFired: 4,
    bulletHits: 2,
    accuracy: 0.5,
    deaths: 1,
    distanceTravelled: 12.5,
    crashes: [{ frame: 30, time: 0.5, position: { x: 10, y: 20 }, livesRemaining: 0, fatal: true }],
  };

  it('writes the stopping condition as code and tag and crash positions as pairs', () => {
    expect(toScoreReport(record)).toEqual({
      scenario: 'Sniper',
      episodeTime: 0.5,
      frameCount: 30,
      stoppingCondition: 2,
      stoppingConditionTag: 'no_lives',
      livesRemaining: 0,
      asteroidsDestroyed: 2,
      maxAsteroids: 13,
      bulletsFired: 4,
      bulletHits: 2,
      accuracy: 0.5,
      deaths: 1,
      distanceTravelled: 12.5,
      crashes: [{ frame: 30, time: 0.5, position: [10, 20], livesRemaining: 0, fatal: true }],
    });
  });

  it('includes cost statistics without the per-call arrays', () => {
    const report = toScoreReport({
      ...record,
      computeCostTotal: 0.3,
      computeCost: {
        evaluations: 2,
        total: 0.3,
        mean: 0.15,
        median: 0.15,
        min: 0.1,
        max: 0.2,
        durations: [0.1, 0.2],
        asteroidCounts: [3, 2],
      },
    });
    expect(report.computeCostTotal).toBe(0.3);
    expect(report.computeCost).toEqual({ evaluations: 2, total: 0.3, mean: 0.15, median: 0.15, min: 0.1, max: 0.2 });
  });
});
