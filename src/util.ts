import type { Vector2 } from './vector';

export type Random = () => number;

export type Bounds = {
  readonly width: number;
  readonly height: number;
};

/**
 * Maps `value` into `[0, max)`. Leaving one edge re-enters at the opposite one.
 */
export function wrap(value: number, max: number): number {
  const wrapped = ((value % max) + max) % max;
  // -1e-17 % 800 + 800 rounds up to exactly 800
  return wrapped >= max ? 0 : wrapped;
}

export function wrapPosition(position: Vector2, { width, height }: Bounds): Vector2 {
  return { x: wrap(position.x, width), y: wrap(position.y, height) };
}

// shortest signed delta across a toroidal axis, in [-span/2, span/2)
export function wrapDelta(delta: number, span: number): number {
  let remainder = (delta + span / 2) % span;
  if (remainder < 0) remainder += span;
  return remainder - span / 2;
}

export function toroidalDistance(a: Vector2, b: Vector2, { width, height }: Bounds): number {
  return Math.hypot(wrapDelta(a.x - b.x, width), wrapDelta(a.y - b.y, height));
}

export function degreesToRadians(degrees: number) {
  return (degrees * Math.PI) / 180;
}

// mulberry32
export function createRandom(seed: number): Random {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomBetween(random: Random, min: number, max: number): number {
  const low = Math.min(min, max);
  const high = Math.max(min, max);
  return random() * (high - low) + low;
}

export function randomIntInRange(random: Random, min: number, max: number) {
  const low = Math.ceil(Math.min(min, max));
  const high = Math.floor(Math.max(min, max));
  return Math.floor(random() * (high - low + 1)) + low;
}
