/**
 * Bridge Session Tests
 *
 * Drives the message handler directly; no socket is opened.
 */

import { describe, it, expect } from 'vitest';
import { BridgeSession } from '../../src/ai/bridge-session';
import type { BridgeResponse } from '../../src/ai/bridge-session';

function send(session: BridgeSession, msg: unknown): BridgeResponse {
  return session.handleText(JSON.stringify(msg));
}

describe('BridgeSession', () => {
  it('reset starts an episode and returns the first observation', () => {
    const response = send(new BridgeSession(), { type: 'reset', settings: { scenario: 'sniper' }, seed: 9 });
    expect(response.type).toBe('reset_result');
    if (response.type !== 'reset_result') return;
    expect(response.observation.frame).toBe(0);
    expect(response.observation.asteroids).toHaveLength(1);
    expect(response.info).toEqual({ frame: 0, seed: 9, scenario: 'Sniper' });
  });

  it('plays to the end and reports the score', () => {
    const session = new BridgeSession();
    send(session, { type: 'reset', settings: { scenario: 'sniper', frequency: 2, timeLimit: 1 } });

    const first = send(session, { type: 'step', action: {} });
    expect(first).toMatchObject({ type: 'step_result', stoppingCondition: 'none', terminated: false });

    const last = send(session, { type: 'step', action: { turnRate: 90 } });
    expect(last).toMatchObject({
      type: 'step_result',
      stoppingCondition: 'time_limit_reached',
      terminated: true,
      info: { frame: 2, time: 1, lives: 3, asteroids: 1, crashes: 0 },
    });

    const score = send(session, { type: 'score' });
    expect(score).toMatchObject({
      type: 'score_result',
      score: { scenario: 'Sniper', frameCount: 2, stoppingCondition: 3, stoppingConditionTag: 'time_limit_reached' },
    });

    expect(send(session, { type: 'step', action: {} })).toEqual({
      type: 'error',
      error: 'EpisodeAlreadyEnded',
      message: 'Episode already ended (time_limit_reached)',
    });
  });

  it('turns engine errors into error responses', () => {
    const session = new BridgeSession();
    expect(send(session, { type: 'step', action: {} })).toEqual({
      type: 'error',
      error: 'TypeError',
      message: 'Call reset before step or score',
    });
    expect(send(session, { type: 'reset', settings: { gravity: 1 } })).toEqual({
      type: 'error',
      error: 'ConfigurationError',
      message: 'Invalid setting "gravity": unrecognized setting',
    });

    send(session, { type: 'reset' });
    expect(send(session, { type: 'step', action: { fire: 'yes' } })).toEqual({
      type: 'error',
      error: 'InvalidAction',
      message: 'fire must be a boolean',
    });
    expect(send(session, { type: 'score' })).toEqual({
      type: 'error',
      error: 'EpisodeNotFinished',
      message: 'Score cannot be finalized before the episode has ended',
    });
  });

  it('rejects a seed that is not an integer', () => {
    const session = new BridgeSession();
    for (const seed of ['42', 1.5, null]) {
      expect(send(session, { type: 'reset', seed })).toEqual({
        type: 'error',
        error: 'ConfigurationError',
        message: 'Invalid setting "seed": expected an integer',
      });
    }
    expect(send(session, { type: 'step', action: {} })).toMatchObject({ type: 'error', error: 'TypeError' });
  });

  it('rejects malformed frames and unknown types', () => {
    const session = new BridgeSession();
    expect(session.handleText('{not json').type).toBe('error');
    expect(send(session, [1, 2])).toEqual({ type: 'error', error: 'TypeError', message: 'message must be a JSON object' });
    expect(send(session, { type: 'warp' })).toEqual({ type: 'error', error: 'TypeError', message: 'Unknown message type: warp' });
  });

  it('close drops the episode', () => {
    const session = new BridgeSession();
    send(session, { type: 'reset' });
    expect(send(session, { type: 'close' })).toEqual({ type: 'close_result' });
    expect(send(session, { type: 'score' })).toMatchObject({ type: 'error', error: 'TypeError' });
  });
});
