// Spark bursts left behind by destroyed asteroids and ships.
//
// Sparks are cosmetic: nothing collides with them, and they only read the session's
// random source when a burst is spawned. Each tick ages them by dt seconds
// and drops the expired ones.
import { add, fromAngle, scale, type Vector2 } from './vector';
import { randomBetween, wrapPosition, type Bounds, type Random } from './util';

export type Easing = 'linear' | 'easeOutQuad';

export type Spark = {
  readonly kind: 'spark';
  readonly position: Vector2;
  readonly velocity: Vector2; // px/s
  readonly angle: number;
  readonly spin: number; // rad/s
  readonly length: number; // px
  readonly life: number; // seconds remaining
  readonly maxLife: number;
  readonly easing: Easing;
};

export type Explosion = Spark;

export type SparkBurstOptions = {
  // Size of the thing that blew up, in px; scales spark count and length
  readonly magnitude: number;
  readonly duration?: number;
  readonly count?: number;
  readonly speedRange?: readonly [number, number];
  readonly spinRange?: readonly [number, number];
  readonly easing?: Easing;
};

function pickCountFromMagnitude(magnitude: number): number {
  return Math.max(8, Math.min(48, Math.floor(magnitude / 2)));
}

export function spawnSparkBurst(random: Random, origin: Vector2, options: SparkBurstOptions): Explosion[] {
  const duration = options.duration ?? 0.45;
  const count = options.count ?? pickCountFromMagnitude(options.magnitude);
  const [minSpeed, maxSpeed] = options.speedRange ?? [40, 160];
  const [minSpin, maxSpin] = options.spinRange ?? [-4, 4];
  const easing = options.easing ?? 'easeOutQuad';

  const sparks: Spark[] = [];
  for (let i = 0; i < count; i++) {
    const angle = random() * Math.PI * 2;
    // slight lifetime variation per spark
    const maxLife = duration * randomBetween(random, 0.9, 1.1);
    sparks.push({
      kind: 'spark',
      position: origin,
      velocity: fromAngle(angle, randomBetween(random, minSpeed, maxSpeed)),
      angle,
      spin: randomBetween(random, minSpin, maxSpin),
      length: randomBetween(random, 0.1, 0.4) * options.magnitude,
      life: maxLife,
      maxLife,
      easing,
    });
  }
  return sparks;
}

export function tickExplosions(explosions: readonly Explosion[], dt: number, bounds: Bounds): Explosion[] {
  const next: Explosion[] = [];
  for (const e of explosions) {
    const life = e.life - dt;
    if (life <= 0) continue;
    next.push({
      ...e,
      position: wrapPosition(add(e.position, scale(e.velocity, dt)), bounds),
      angle: e.angle + e.spin * dt,
      life,
    });
  }
  return next;
}

// 1 when fresh, 0 when expired
export function sparkAlpha(spark: Spark): number {
  const t = Math.min(Math.max(spark.life / spark.maxLife, 0), 1);
  if (spark.easing === 'linear') return t;
  return 1 - (1 - t) * (1 - t);
}
