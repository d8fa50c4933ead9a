import { createRng, nextInt, type Rng } from './prng.js';
import type { Point } from './types.js';

export const RANDOM_POSITION_MAX_OFFSET_PX = 5;
export const RANDOM_DURATION_MAX_OFFSET_RATIO = 0.1;
export const MIN_GESTURE_DURATION_MS = 1;

/** Adds small, seeded variations to gesture positions and durations. */
export interface ActionRandomizer {
  position(point: Point): Point;
  duration(durationMs: number): number;
}

export const IDENTITY_RANDOMIZER: ActionRandomizer = {
  position: (point) => point,
  duration: (durationMs) => durationMs,
};

export function createActionRandomizer(seed: bigint): ActionRandomizer {
  let rng: Rng = createRng(seed);

  const draw = (min: number, max: number): number => {
    const [value, next] = nextInt(rng, min, max);
    rng = next;
    return value;
  };

  return {
    position: (point) => ({
      x: Math.max(0, point.x + draw(-RANDOM_POSITION_MAX_OFFSET_PX, RANDOM_POSITION_MAX_OFFSET_PX)),
      y: Math.max(0, point.y + draw(-RANDOM_POSITION_MAX_OFFSET_PX, RANDOM_POSITION_MAX_OFFSET_PX)),
    }),
    duration: (durationMs) => {
      const spread = Math.floor(durationMs * RANDOM_DURATION_MAX_OFFSET_RATIO);
      return Math.max(MIN_GESTURE_DURATION_MS, durationMs + draw(-spread, spread));
    },
  };
}
