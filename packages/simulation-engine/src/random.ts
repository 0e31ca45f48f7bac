import { randomInt } from "node:crypto";

export interface RandomSource {
  readonly seed: number;
  /** Uniform float in [0, 1). */
  next(): number;
  /** Uniform integer in [0, length). */
  nextIndex(length: number): number;
}

/** Mulberry32: 32-bit state, fast, good enough for resampling. */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;

  const next = () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };

  return {
    seed,
    next,
    nextIndex: (length) => Math.floor(next() * length),
  };
}

export function randomSeed(): number {
  return randomInt(0, 2 ** 32);
}
