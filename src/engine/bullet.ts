import type { BulletState, MapDimensions, Vec2 } from './types';
import { EntityKind } from './types';
import { BULLET } from './constants';
import { add, fromHeading, scale } from './vec2';
import { wrapPosition } from './torus';

export function createBullet(id: number, position: Vec2, heading: number): BulletState {
  return {
    id,
    kind: EntityKind.Bullet,
    position,
    velocity: scale(fromHeading(heading), BULLET.speed),
    heading,
    radius: BULLET.radius,
    alive: true,
    timeToLive: BULLET.lifetime,
  };
}

/** Move a bullet one tick. It dies once its time-to-live runs out. */
export function stepBullet(bullet: BulletState, dt: number, map: MapDimensions): BulletState {
  if (!bullet.alive) return bullet;
  const timeToLive = bullet.timeToLive - dt;
  return {
    ...bullet,
    position: wrapPosition(add(bullet.position, scale(bullet.velocity, dt)), map),
    timeToLive,
    alive: timeToLive > 0,
  };
}
