import type { Asteroid, Bullet, Ship } from './state';
import { toroidalDistance, type Bounds } from './util';
import type { Vector2 } from './vector';

export type Collision =
  | { readonly kind: 'bullet-asteroid'; readonly bulletId: number; readonly asteroidId: number }
  | { readonly kind: 'ship-asteroid'; readonly shipId: number; readonly asteroidId: number };

type Circle = { readonly position: Vector2; readonly radius: number };

export function circlesOverlap(a: Circle, b: Circle, bounds: Bounds): boolean {
  return toroidalDistance(a.position, b.position, bounds) <= a.radius + b.radius;
}

const byId = <T extends { readonly id: number }>(a: T, b: T) => a.id - b.id;

/**
 * Pairwise circle test over alive entities, in ascending id order. A bullet takes the
 * first overlapping asteroid that no earlier bullet claimed this pass. The ship pairs
 * with every overlapping asteroid left unclaimed.
 */
export function findCollisions(
  asteroids: readonly Asteroid[],
  bullets: readonly Bullet[],
  ship: Ship | undefined,
  bounds: Bounds,
): Collision[] {
  const liveAsteroids = asteroids.filter((a) => a.alive).sort(byId);
  const liveBullets = bullets.filter((b) => b.alive).sort(byId);
  const claimed = new Set<number>();
  const collisions: Collision[] = [];

  for (const bullet of liveBullets) {
    for (const asteroid of liveAsteroids) {
      if (claimed.has(asteroid.id)) continue;
      if (circlesOverlap(bullet, asteroid, bounds)) {
        claimed.add(asteroid.id);
        collisions.push({ kind: 'bullet-asteroid', bulletId: bullet.id, asteroidId: asteroid.id });
        break; // a bullet hits at most one asteroid
      }
    }
  }

  if (ship?.alive) {
    for (const asteroid of liveAsteroids) {
      if (claimed.has(asteroid.id)) continue;
      if (circlesOverlap(ship, asteroid, bounds)) {
        collisions.push({ kind: 'ship-asteroid', shipId: ship.id, asteroidId: asteroid.id });
      }
    }
  }

  return collisions;
}
