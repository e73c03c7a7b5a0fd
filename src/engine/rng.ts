/**
 * Episode random source.
 *
 * One instance per episode feeds every random draw the simulation makes:
 * a random ship spawn, random asteroid placement, and fragment headings.
 * The generator is xorshift32 over unsigned 32-bit state, so a seed maps
 * to the same sequence on every platform.
 */

/** Substituted for a zero seed, which would lock xorshift at zero forever. */
const ZERO_SEED_REPLACEMENT = 0xdeadbeef;

const UINT32_RANGE = 0x100000000;

export class SeededRng {
  private state: number;

  /** @param seed - Any integer; only its low 32 bits are used */
  constructor(seed: number) {
    this.state = (seed >>> 0) || ZERO_SEED_REPLACEMENT;
  }

  /** Current internal state, e.g. to check that a call drew nothing. */
  getState(): number {
    return this.state;
  }

  /** Advance and return the new state, an integer in [0, 2^32). */
  next(): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    return this.state;
  }

  /** Uniform in [0, 1). */
  nextFloat(): number {
    return this.next() / UINT32_RANGE;
  }

  /** Uniform in [min, max). */
  nextFloatRange(min: number, max: number): number {
    return min + this.nextFloat() * (max - min);
  }

  /** Uniform heading in degrees, [0, 360). */
  nextHeading(): number {
    return this.nextFloatRange(0, 360);
  }
}
