import type { RandomSource } from "./type";
import { RandomSourceError } from "./errors";
import { assert } from "./share";

const MODULUS = 4294967296;

export const defaultRandom: RandomSource = () => Math.random();

/**
 * Deterministic generator for reproducible shuffles.
 * A 32-bit linear congruential generator, so not suitable for anything
 * security related.
 */
export function seededRandom(seed: number): RandomSource {
  assert(
    Number.isFinite(seed),
    new RandomSourceError(seed, `Seed must be a finite number, got ${seed}`)
  );
  let state = ((Math.trunc(seed) % MODULUS) + MODULUS) % MODULUS;
  return () => {
    state = (state * 1664525 + 1013904223) % MODULUS;
    return state / MODULUS;
  };
}

// Fisher-Yates, in place.
export function shuffle<T>(items: T[], random: RandomSource = defaultRandom): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    let value = random();
    if (!(value >= 0 && value < 1)) {
      throw new RandomSourceError(value);
    }
    let j = Math.floor(value * (i + 1));
    let tmp = items[i];
    items[i] = items[j];
    items[j] = tmp;
  }
  return items;
}
