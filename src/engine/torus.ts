import type { MapDimensions, Vec2 } from './types';

/** Wrap a coordinate into [0, size). */
export function wrapCoordinate(value: number, size: number): number {
  const wrapped = value % size;
  if (wrapped >= 0) return wrapped;
  // A tiny negative remainder plus size can round up to size itself
  const shifted = wrapped + size;
  return shifted >= size ? 0 : shifted;
}

/** Wrap a position onto the toroidal play-field. */
export function wrapPosition(position: Vec2, map: MapDimensions): Vec2 {
  return {
    x: wrapCoordinate(position.x, map.width),
    y: wrapCoordinate(position.y, map.height),
  };
}

/**
 * Shortest delta between two points in the toroidal (wrap-around) world.
 * Used by agents for aiming; collision uses plain distance.
 */
export function shortestDelta(from: Vec2, to: Vec2, map: MapDimensions): Vec2 {
  let dx = to.x - from.x;
  let dy = to.y - from.y;

  if (dx > map.width / 2) dx -= map.width;
  if (dx < -map.width / 2) dx += map.width;
  if (dy > map.height / 2) dy -= map.height;
  if (dy < -map.height / 2) dy += map.height;

  return { x: dx, y: dy };
}
