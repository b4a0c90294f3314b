/**
 * Seeded random source and the distributions the bandits sample from.
 *
 * Every stochastic choice in the hot path goes through a RandomSource so a
 * routing decision is reproducible from (config, policy, budget, seed).
 */

export interface RandomSource {
  /** Uniform float in [0, 1) */
  next(): number;
}

function hashSeed(seed: string): number {
  // FNV-1a
  let hash = 0x811c9dc5;
  for (let i = 0; i < seed.length; i++) {
    hash ^= seed.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/**
 * mulberry32 generator seeded from a string or number.
 */
export function createRandom(seed: string | number): RandomSource {
  let state = typeof seed === 'number' ? seed >>> 0 : hashSeed(seed);

  return {
    next(): number {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

/**
 * Standard normal via Box-Muller.
 */
export function sampleNormal(random: RandomSource): number {
  // 1 - u keeps log() away from zero
  const u1 = 1 - random.next();
  const u2 = random.next();
  return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
}

/**
 * Gamma(shape, 1) via Marsaglia-Tsang; shapes below 1 use the boost
 * Gamma(a) = Gamma(a + 1) * U^(1/a).
 */
export function sampleGamma(shape: number, random: RandomSource): number {
  if (shape <= 0) {
    throw new RangeError(`Gamma shape must be positive, got ${shape}`);
  }
  if (shape < 1) {
    const u = 1 - random.next();
    return sampleGamma(shape + 1, random) * Math.pow(u, 1 / shape);
  }

  const d = shape - 1 / 3;
  const c = 1 / Math.sqrt(9 * d);

  for (;;) {
    let x: number;
    let v: number;
    do {
      x = sampleNormal(random);
      v = 1 + c * x;
    } while (v <= 0);

    v = v * v * v;
    const u = 1 - random.next();

    if (u < 1 - 0.0331 * x * x * x * x) return d * v;
    if (Math.log(u) < 0.5 * x * x + d * (1 - v + Math.log(v))) return d * v;
  }
}

export function sampleBeta(alpha: number, beta: number, random: RandomSource): number {
  const x = sampleGamma(alpha, random);
  const y = sampleGamma(beta, random);
  return x / (x + y);
}

/**
 * Pick an index with probability proportional to its weight.
 */
export function weightedIndex(weights: readonly number[], random: RandomSource): number {
  const total = weights.reduce((sum, w) => sum + w, 0);
  if (total <= 0) {
    return Math.floor(random.next() * weights.length);
  }
  let threshold = random.next() * total;
  for (let i = 0; i < weights.length; i++) {
    threshold -= weights[i];
    if (threshold < 0) return i;
  }
  return weights.length - 1;
}
