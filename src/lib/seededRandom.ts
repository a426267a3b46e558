/**
 * Deterministic pseudo-random numbers for parameter selection.
 *
 * Every shot builds its own generator from a string key (location + shot index +
 * attempt), so shots never share generator state and re-running a location
 * reproduces the same batch.
 */

/** 32-bit FNV-1a hash. */
export function fnv1a(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

export interface Random {
  /** Uniform in [0, 1). */
  next(): number;
  /** Uniform in [min, max]. */
  range(min: number, max: number): number;
  pick<T>(items: readonly T[]): T;
}

/** mulberry32 */
export function createRandom(seed: number): Random {
  let state = seed >>> 0;

  const next = (): number => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };

  return {
    next,
    range: (min, max) => (max <= min ? min : min + (max - min) * next()),
    pick: <T>(items: readonly T[]): T => {
      if (items.length === 0) throw new RangeError('Cannot pick from an empty list');
      return items[Math.min(items.length - 1, Math.floor(next() * items.length))];
    },
  };
}

export function shotSeedKey(location: { lat: number; lng: number }, shotIndex: number, attempt: number): string {
  return `${location.lat.toFixed(6)},${location.lng.toFixed(6)}#${shotIndex}#${attempt}`;
}
