import { randomBytes } from "crypto";

export class Rng {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  next(): number {
    let t = (this.state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  int(max: number): number {
    if (max <= 0) {
      return 0;
    }
    return Math.floor(this.next() * max);
  }

  pick<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new RangeError("Cannot pick from an empty list");
    }
    return items[this.int(items.length)];
  }

  shuffle<T>(items: readonly T[]): T[] {
    const result = [...items];
    for (let i = result.length - 1; i > 0; i -= 1) {
      const j = this.int(i + 1);
      const temp = result[i];
      result[i] = result[j];
      result[j] = temp;
    }
    return result;
  }

  sample<T>(items: readonly T[], count: number): T[] {
    if (count > items.length) {
      throw new RangeError(`Cannot sample ${count} of ${items.length} items`);
    }
    const pool = [...items];
    for (let i = 0; i < count; i += 1) {
      const j = i + this.int(pool.length - i);
      const temp = pool[i];
      pool[i] = pool[j];
      pool[j] = temp;
    }
    return pool.slice(0, count);
  }
}

let lastSeed: number | undefined;

/**
 * Seed for a new stream: nanosecond clock mixed with OS entropy. Never
 * returns the same value twice in a row within a process.
 */
export function createSeed(): number {
  const clock = Number(process.hrtime.bigint() & 0xffffffffn);
  let seed = (clock ^ randomBytes(4).readUInt32LE(0)) >>> 0;
  if (seed === lastSeed) {
    seed = (seed + 0x9e3779b9) >>> 0;
  }
  lastSeed = seed;
  return seed;
}

export function deriveSeed(base: number, index: number): number {
  return (base + Math.imul(index, 0x9e3779b9)) >>> 0;
}
