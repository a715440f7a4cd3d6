import { degreesToRadians } from './util';
import { fromAngle, scale, vec, type Vector2 } from './vector';

export type Segment = readonly [Vector2, Vector2];

export type Outline = {
  readonly verts: readonly Vector2[];
  readonly segs: readonly Segment[];
};

function closedLoop(verts: readonly Vector2[]): Segment[] {
  return verts.map((v, i): Segment => [v, verts[(i + 1) % verts.length] ?? v]);
}

// nose along +x so the outline rotates straight onto the ship's heading
export function makeShipGeometry(radius: number, isBoosting = false): Outline {
  const nose = vec(radius, 0);
  const rearTop = vec(-radius * 0.6, -radius * 0.5);
  const rearBot = vec(-radius * 0.6, radius * 0.5);
  const innerTop = vec(-radius * 0.45, -radius * 0.2);
  const innerBot = vec(-radius * 0.45, radius * 0.2);

  const segs: Segment[] = [
    [nose, rearTop],
    [nose, rearBot],
    [rearTop, innerTop],
    [rearBot, innerBot],
    [innerTop, innerBot],
  ];

  if (isBoosting) {
    const flameTip = vec(-radius * 0.95, 0);
    segs.push([innerTop, flameTip], [innerBot, flameTip]);
  }

  return { verts: [nose, rearBot, innerBot, innerTop, rearTop], segs };
}

// [degrees, fraction of radius] around the rim
const asteroidVariants: ReadonlyArray<ReadonlyArray<readonly [number, number]>> = [
  [
    [-170, 0.9],
    [-130, 0.8],
    [-95, 0.96],
    [-60, 0.55],
    [-30, 0.97],
    [10, 0.65],
    [45, 0.88],
    [100, 0.92],
    [150, 0.85],
  ],
  [
    [-165, 0.86],
    [-120, 0.94],
    [-80, 0.84],
    [-40, 0.95],
    [0, 0.8],
    [30, 0.6],
    [70, 0.92],
    [115, 0.4],
    [140, 0.9],
  ],
  [
    [-160, 0.92],
    [-115, 0.85],
    [-70, 0.97],
    [-45, 0.6],
    [-10, 0.94],
    [35, 0.87],
    [85, 0.95],
    [130, 0.88],
    [175, 0.45],
  ],
];

export function makeAsteroidGeometry(radius: number, variant: number): Outline {
  const rim = asteroidVariants[Math.abs(variant) % asteroidVariants.length] ?? [];
  const verts = rim.map(([deg, r]) => scale(fromAngle(degreesToRadians(deg)), r * radius));
  return { verts, segs: closedLoop(verts) };
}
