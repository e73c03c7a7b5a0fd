/**
 * Formatting helpers for log lines and CLI summaries.
 */

import type { Vec2 } from '../engine/types';

/** Format simulated seconds as M:SS.mmm. */
export function formatEpisodeTime(seconds: number): string {
  const totalMs = Math.floor(seconds * 1000);
  const ms  = totalMs % 1000;
  const sec = Math.floor(totalMs / 1000) % 60;
  const min = Math.floor(totalMs / 60000);
  return `${min}:${String(sec).padStart(2, '0')}.${String(ms).padStart(3, '0')}`;
}

/** Format a position with one decimal, e.g. "(400.0, 12.5)". */
export function formatPosition(position: Vec2): string {
  return `(${position.x.toFixed(1)}, ${position.y.toFixed(1)})`;
}
