export type Rng = () => number;

/** mulberry32: small 32-bit PRNG, uniform in [0, 1). */
export function seededRng(seed: number): Rng {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

// Box-Muller; the spare deviate is dropped so each call consumes two uniforms.
export function normal(rng: Rng, mean: number, sd: number): number {
  let u = 0;
  while (u === 0) u = rng();
  const v = rng();
  return mean + sd * Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
}

// Knuth's multiplication method; fine for the small rates used here.
export function poisson(rng: Rng, lambda: number): number {
  const limit = Math.exp(-lambda);
  let k = 0;
  let p = 1;
  do {
    k++;
    p *= rng();
  } while (p > limit);
  return k - 1;
}

export function samples(count: number, draw: () => number): number[] {
  return Array.from({ length: count }, () => draw());
}

export function cumsum(values: readonly number[]): number[] {
  let acc = 0;
  return values.map((v) => (acc += v));
}

export function clip(values: readonly number[], min: number, max: number): number[] {
  return values.map((v) => Math.min(max, Math.max(min, v)));
}
