import crypto from "node:crypto";

/**
 * xorshift32 generator. One instance per sandbox execution so guest code can
 * reseed without disturbing anything else.
 */
export class Rng {
  private state: number;

  public constructor(seed?: number) {
    this.state = 0;
    this.seed(seed);
  }

  public seed(nextSeed?: number): void {
    const value = nextSeed === undefined ? crypto.randomBytes(4).readUInt32BE() : nextSeed >>> 0;
    // xorshift never leaves zero
    this.state = value === 0 ? 0x12345678 : value;
  }

  /** Uniform float in [0, 1). */
  public random(): number {
    let s = this.state;
    s ^= s << 13;
    s ^= s >>> 17;
    s ^= s << 5;
    this.state = s >>> 0;
    return this.state / 2 ** 32;
  }

  /** Integer in [lo, hi], both inclusive. */
  public randint(lo: number, hi: number): number {
    return lo + Math.floor(this.random() * (hi - lo + 1));
  }

  public uniform(lo: number, hi: number): number {
    return lo + (hi - lo) * this.random();
  }

  public choice<T>(items: readonly T[]): T | undefined {
    if (items.length === 0) return undefined;
    return items[Math.floor(this.random() * items.length)];
  }

  /** Fisher-Yates, in place. */
  public shuffle<T>(items: T[]): T[] {
    for (let i = items.length - 1; i > 0; i--) {
      const j = Math.floor(this.random() * (i + 1));
      const tmp = items[i];
      items[i] = items[j];
      items[j] = tmp;
    }
    return items;
  }
}
