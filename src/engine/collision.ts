/**
 * Collision Detection
 *
 * Every entity is approximated as a circle. Two entities collide when the
 * distance between their centers is strictly less than the sum of their
 * radii (plain Euclidean distance, the torus is not consulted).
 *
 * Only entities with differing roles register collisions, and only the
 * pairings in COLLIDING_ROLES count: ship-asteroid and bullet-asteroid.
 * Results reference entities by id so that resolution can skip anything
 * already destroyed earlier in the same tick.
 */

import type { Entity, EntityId, Vec2 } from './types';
import { EntityKind } from './types';
import { distanceSq } from './vec2';
import { isShipCollidable } from './ship';

export enum CollisionKind {
  BulletAsteroid = 'bullet-asteroid',
  ShipAsteroid = 'ship-asteroid',
}

/** One colliding pair. `a` is the bullet or ship, `b` is always the asteroid. */
export interface CollisionPair {
  readonly kind: CollisionKind;
  readonly a: EntityId;
  readonly b: EntityId;
}

/** Role pairings that register a collision, keyed by the non-asteroid role. */
const COLLIDING_ROLES: ReadonlyMap<EntityKind, CollisionKind> = new Map([
  [EntityKind.Bullet, CollisionKind.BulletAsteroid],
  [EntityKind.Ship, CollisionKind.ShipAsteroid],
]);

/** Resolution order: all bullet hits first, then ship crashes. */
const KIND_ORDER: Record<CollisionKind, number> = {
  [CollisionKind.BulletAsteroid]: 0,
  [CollisionKind.ShipAsteroid]: 1,
};

/** Strict circle overlap test. Touching circles do not collide. */
export function circlesOverlap(
  a: { position: Vec2; radius: number },
  b: { position: Vec2; radius: number },
): boolean {
  const reach = a.radius + b.radius;
  return distanceSq(a.position, b.position) < reach * reach;
}

/** Whether two entity roles can collide at all. Symmetric. */
export function collisionKindFor(first: EntityKind, second: EntityKind): CollisionKind | null {
  if (first === EntityKind.Asteroid && second !== EntityKind.Asteroid) {
    return COLLIDING_ROLES.get(second) ?? null;
  }
  if (second === EntityKind.Asteroid && first !== EntityKind.Asteroid) {
    return COLLIDING_ROLES.get(first) ?? null;
  }
  return null;
}

/** Dead entities never collide; the ship also sits out its respawn window. */
export function isCollidable(entity: Entity): boolean {
  return entity.kind === EntityKind.Ship ? isShipCollidable(entity) : entity.alive;
}

/**
 * Find every colliding pair among the given entities.
 *
 * No short-circuiting: an entity touching several others appears in one
 * pair per contact. Output order is deterministic: bullet-asteroid pairs
 * by (bullet id, asteroid id), then ship-asteroid pairs by asteroid id.
 */
export function detectCollisions(entities: readonly Entity[]): CollisionPair[] {
  const candidates = entities.filter(isCollidable);
  const pairs: CollisionPair[] = [];

  for (let i = 0; i < candidates.length; i++) {
    for (let j = i + 1; j < candidates.length; j++) {
      const first = candidates[i];
      const second = candidates[j];
      const kind = collisionKindFor(first.kind, second.kind);
      if (kind === null || !circlesOverlap(first, second)) continue;

      const [other, asteroid] = first.kind === EntityKind.Asteroid ? [second, first] : [first, second];
      pairs.push({ kind, a: other.id, b: asteroid.id });
    }
  }

  return pairs.sort((p, q) => KIND_ORDER[p.kind] - KIND_ORDER[q.kind] || p.a - q.a || p.b - q.b);
}
