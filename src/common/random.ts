export interface RandomSource {
  /** Uniform float in [0, 1). */
  next(): number;
}

export const systemRandom: RandomSource = {
  next: () => Math.random(),
};

export function stableHash(input: string): number {
  let hash = 2166136261;
  for (let index = 0; index < input.length; index += 1) {
    hash ^= input.charCodeAt(index);
    hash = Math.imul(hash, 16777619);
  }
  return hash >>> 0;
}

// mulberry32
export function createSeededRandom(seed: string | number): RandomSource {
  let state = typeof seed === "number" ? seed >>> 0 : stableHash(seed);
  return {
    next: () => {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

export function uniform(random: RandomSource, min: number, max: number): number {
  if (max <= min) {
    return min;
  }
  return min + random.next() * (max - min);
}
