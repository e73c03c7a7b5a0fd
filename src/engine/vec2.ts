/**
 * 2D Vector Math Module
 *
 * Pure functions operating on the Vec2 interface. No classes, no mutation.
 * Every function returns a new Vec2 (or scalar).
 *
 * Angles are in degrees with the arcade convention used by the ship:
 * 0 = +y, 90 = -x (counter-clockwise).
 */

import type { Vec2 } from './types';

// Re-export Vec2 type for convenience
export type { Vec2 } from './types';

const DEG_TO_RAD = Math.PI / 180;

/** Create a new Vec2 from x and y components. */
export function vec2(x: number, y: number): Vec2 {
  return { x, y };
}

/** Vector addition: a + b. */
export function add(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x + b.x, y: a.y + b.y };
}

/** Scalar multiplication: v * s. */
export function scale(v: Vec2, s: number): Vec2 {
  return { x: v.x * s, y: v.y * s };
}

/** Magnitude (length) of a vector. */
export function length(v: Vec2): number {
  return Math.sqrt(v.x * v.x + v.y * v.y);
}

/** Squared distance between two points. */
export function distanceSq(a: Vec2, b: Vec2): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return dx * dx + dy * dy;
}

/** Unit vector for a heading in degrees. 0 = +y, 90 = -x. */
export function fromHeading(degrees: number): Vec2 {
  const rad = degrees * DEG_TO_RAD;
  return { x: -Math.sin(rad), y: Math.cos(rad) };
}

/** Heading in degrees [0, 360) that points along v. Inverse of fromHeading. */
export function toHeading(v: Vec2): number {
  return normalizeAngle(Math.atan2(-v.x, v.y) / DEG_TO_RAD);
}

/** Wrap an angle in degrees into [0, 360). */
export function normalizeAngle(degrees: number): number {
  const wrapped = degrees % 360;
  if (wrapped >= 0) return wrapped;
  const shifted = wrapped + 360;
  return shifted >= 360 ? 0 : shifted;
}

/**
 * Signed shortest difference b - a between two headings, in (-180, 180].
 * Positive means b is counter-clockwise of a.
 */
export function angleDelta(a: number, b: number): number {
  let diff = normalizeAngle(b - a);
  if (diff > 180) diff -= 360;
  return diff;
}
