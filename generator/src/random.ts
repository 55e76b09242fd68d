import type { RandomSource } from "./types.js";

function fromUnitInterval(next: () => number): RandomSource {
  return {
    randint(low: number, high: number): number {
      return Math.floor(next() * (high - low + 1)) + low;
    },
  };
}

export function createAmbientRandom(): RandomSource {
  return fromUnitInterval(Math.random);
}

// mulberry32
export function createSeededRandom(seed: number): RandomSource {
  let state = seed | 0;
  return fromUnitInterval(() => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  });
}
