/** Source of uniform floats in [0, 1). */
export type Rng = () => number;

/** 32-bit FNV-1a hash of a string. */
export function hash32(str: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < str.length; i++) {
    h ^= str.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
    h >>>= 0;
  }
  return h >>> 0;
}

/** Mulberry32 PRNG. */
export function mulberry32(seed: number): Rng {
  let t = seed >>> 0;
  return function () {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

/** Seeded generator when a seed is given, Math.random otherwise. */
export function createRng(seed?: string): Rng {
  if (seed === undefined || seed === "") return Math.random;
  return mulberry32(hash32(seed));
}

/** Fisher-Yates. */
export function shuffleInPlace<T>(a: T[], rng: Rng): T[] {
  for (let i = a.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    [a[i], a[j]] = [a[j], a[i]];
  }
  return a;
}

/** Up to `limit` distinct elements in random order. */
export function sample<T>(items: readonly T[], limit: number, rng: Rng): T[] {
  if (limit <= 0 || items.length === 0) return [];
  return shuffleInPlace([...items], rng).slice(0, limit);
}
