export type RngState = {
  seed: number;
};

// Simple LCG for deterministic placement and mock decisions.
export function createRng(seed: number): RngState {
  return { seed: seed >>> 0 };
}

export function nextFloat(rng: RngState): number {
  // LCG parameters (Numerical Recipes)
  rng.seed = (rng.seed * 1664525 + 1013904223) >>> 0;
  return rng.seed / 0x100000000;
}

/** Integer in [min, max], both inclusive. */
export function nextInt(rng: RngState, min: number, max: number): number {
  return min + Math.floor(nextFloat(rng) * (max - min + 1));
}

export function pick<T>(rng: RngState, items: readonly T[]): T | undefined {
  if (items.length === 0) return undefined;
  return items[nextInt(rng, 0, items.length - 1)];
}

/** Fisher–Yates shuffle into a new array. */
export function shuffle<T>(rng: RngState, items: readonly T[]): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = nextInt(rng, 0, i);
    const a = result[i];
    const b = result[j];
    if (a === undefined || b === undefined) continue;
    result[i] = b;
    result[j] = a;
  }
  return result;
}

/** Independent stream per consumer, so one agent's draws never shift another's. */
export function deriveSeed(seed: number, stream: number): number {
  let h = (seed ^ Math.imul(stream + 1, 0x9e3779b1)) >>> 0;
  h = Math.imul(h ^ (h >>> 16), 0x85ebca6b) >>> 0;
  h = Math.imul(h ^ (h >>> 13), 0xc2b2ae35) >>> 0;
  return (h ^ (h >>> 16)) >>> 0;
}

export function randomSeed(): number {
  return Math.floor(Math.random() * 0x100000000) >>> 0;
}
