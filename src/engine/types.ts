/**
 * Engine Type Contracts
 *
 * All interfaces used by the simulation engine. These define the contracts
 * that ship kinematics, asteroid splitting, collision and scoring build
 * against. Entity and world types are immutable snapshots -- each tick
 * produces new objects rather than mutating the previous ones.
 */

/** 2D vector as a plain readonly object. Pure functions operate on this. */
export interface Vec2 {
  readonly x: number;
  readonly y: number;
}

/** Play-field size. The field is a torus: leaving one edge re-enters at the opposite one. */
export interface MapDimensions {
  readonly width: number;
  readonly height: number;
}

/** Stable per-episode entity identifier. Never reused within an episode. */
export type EntityId = number;

export enum EntityKind {
  Ship = 'ship',
  Asteroid = 'asteroid',
  Bullet = 'bullet',
}

/** Asteroid size class. Destroying class N spawns children of class N - 1. */
export enum AsteroidSize {
  Small = 1,
  Medium = 2,
  Large = 3,
  Huge = 4,
}

/** Capabilities shared by every simulated object. */
interface EntityBase {
  readonly id: EntityId;
  /** Center of the collision circle, always inside the map bounds */
  readonly position: Vec2;
  /** World-space velocity in px/s */
  readonly velocity: Vec2;
  /** Heading in degrees. 0 = facing +y, positive turns counter-clockwise. */
  readonly heading: number;
  /** Collision circle radius in px */
  readonly radius: number;
  readonly alive: boolean;
}

/** The agent-controlled ship. */
export interface ShipState extends EntityBase {
  readonly kind: EntityKind.Ship;
  /** Signed scalar speed along the heading (negative = reversing) */
  readonly speed: number;
  /** Thrust currently commanded by the agent, px/s^2 */
  readonly thrust: number;
  /** Turn rate currently commanded by the agent, deg/s */
  readonly turnRate: number;
  /** Lives left, including the current one. 0 means permanently destroyed. */
  readonly lives: number;
  /** Seconds until the gun may fire again */
  readonly fireCooldown: number;
  /** Seconds of post-respawn invulnerability left */
  readonly respawnTimeLeft: number;
  /** Where the ship spawns and respawns */
  readonly startingPosition: Vec2;
  /** Heading the ship spawns and respawns with, degrees */
  readonly startingAngle: number;
}

export interface AsteroidState extends EntityBase {
  readonly kind: EntityKind.Asteroid;
  readonly size: AsteroidSize;
}

export interface BulletState extends EntityBase {
  readonly kind: EntityKind.Bullet;
  /** Seconds before the bullet expires on its own */
  readonly timeToLive: number;
}

export type Entity = ShipState | AsteroidState | BulletState;

/**
 * One tick of agent control. Omitted fields mean "no input"
 * (zero thrust, zero turn, no fire).
 */
export interface ControlAction {
  /** Thrust in px/s^2, within SHIP.thrustRange */
  readonly thrust?: number;
  /** Turn rate in deg/s, within SHIP.turnRateRange. Positive turns left. */
  readonly turnRate?: number;
  /** Fire a bullet this tick if the gun is ready */
  readonly fire?: boolean;
}

/** Action after validation, with defaults applied. */
export interface ResolvedAction {
  readonly thrust: number;
  readonly turnRate: number;
  readonly fire: boolean;
}

/** Emitted every time the ship is destroyed, including the final crash. */
export interface CrashRecord {
  /** Tick on which the crash happened */
  readonly frame: number;
  /** Simulation time of the crash in seconds */
  readonly time: number;
  /** Ship position at the moment of the collision */
  readonly position: Vec2;
  /** Lives left after this crash */
  readonly livesRemaining: number;
  /** True if this crash used the last life */
  readonly fatal: boolean;
}

/** Full simulation world state at a single tick. */
export interface WorldState {
  /** Ticks simulated so far */
  readonly frame: number;
  /** Simulated seconds elapsed (frame / frequency) */
  readonly time: number;
  readonly map: MapDimensions;
  readonly ship: ShipState;
  /** Live asteroids, ascending id */
  readonly asteroids: readonly AsteroidState[];
  /** Live bullets, ascending id */
  readonly bullets: readonly BulletState[];
  /** Next id to hand out */
  readonly nextId: EntityId;
}

/** What happened during one tick, consumed by the score recorder. */
export interface TickEvents {
  readonly bulletsFired: number;
  readonly bulletHits: number;
  readonly asteroidsDestroyed: number;
  readonly crashes: readonly CrashRecord[];
  /** Distance the ship covered this tick while controllable, px */
  readonly distance: number;
}

/** Read-only frame handed to an attached renderer. */
export interface FrameSnapshot {
  readonly frame: number;
  readonly time: number;
  readonly map: MapDimensions;
  readonly ship: ShipState;
  readonly asteroids: readonly AsteroidState[];
  readonly bullets: readonly BulletState[];
}

/** One explicitly placed starting asteroid. */
export interface AsteroidSpawn {
  readonly position: Vec2;
  readonly size: AsteroidSize;
  /** px/s; defaults to the base speed of the size class */
  readonly speed?: number;
  /** Direction of travel in degrees; drawn from the episode RNG when omitted */
  readonly heading?: number;
}

/**
 * Starting layout of an episode. Either lists asteroids explicitly or asks
 * for a number of randomly placed ones.
 */
export interface ScenarioDefinition {
  readonly name: string;
  readonly map?: MapDimensions;
  readonly asteroids?: readonly AsteroidSpawn[];
  /** Randomly placed asteroids, used when `asteroids` is absent */
  readonly numAsteroids?: number;
  /** Size of randomly placed asteroids (default Huge) */
  readonly asteroidSize?: AsteroidSize;
}
