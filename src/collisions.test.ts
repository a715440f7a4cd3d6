import { describe, expect, it } from 'vitest';
import { circlesOverlap, findCollisions } from './collisions';
import { Tier, type Asteroid, type Bullet, type Ship } from './state';
import type { Vector2 } from './vector';

const bounds = { width: 800, height: 600 };

function asteroid(id: number, position: Vector2, radius = 40, alive = true): Asteroid {
  return {
    kind: 'asteroid',
    id,
    tier: Tier.Large,
    position,
    velocity: { x: 0, y: 0 },
    heading: 0,
    radius,
    alive,
    spin: 0,
    variant: 0,
  };
}

function bullet(id: number, position: Vector2, alive = true): Bullet {
  return { kind: 'bullet', id, position, velocity: { x: 0, y: 0 }, heading: 0, radius: 2, alive, ttl: 10 };
}

function ship(position: Vector2, alive = true): Ship {
  return {
    kind: 'ship',
    id: 1,
    position,
    velocity: { x: 0, y: 0 },
    heading: 0,
    radius: 12,
    alive,
    lives: 3,
    invulnerableUntil: 0,
    fireCooldown: 0,
    thrusting: false,
    turning: 0,
  };
}

describe('circlesOverlap', () => {
  it('counts touching circles as overlapping', () => {
    expect(circlesOverlap(bullet(1, { x: 100, y: 100 }), asteroid(2, { x: 142, y: 100 }), bounds)).toBe(true);
    expect(circlesOverlap(bullet(1, { x: 100, y: 100 }), asteroid(2, { x: 142.5, y: 100 }), bounds)).toBe(false);
  });

  it('sees across the screen edge', () => {
    expect(circlesOverlap(bullet(1, { x: 798, y: 300 }), asteroid(2, { x: 2, y: 300 }, 10), bounds)).toBe(true);
    expect(circlesOverlap(bullet(1, { x: 400, y: 1 }), asteroid(2, { x: 400, y: 595 }, 10), bounds)).toBe(true);
  });
});

describe('findCollisions', () => {
  it('returns nothing for a clear field', () => {
    expect(findCollisions([asteroid(2, { x: 100, y: 100 })], [bullet(3, { x: 500, y: 500 })], undefined, bounds)).toEqual(
      [],
    );
  });

  it('resolves a bullet against the lowest-id asteroid it overlaps', () => {
    const asteroids = [asteroid(5, { x: 200, y: 200 }), asteroid(3, { x: 210, y: 200 })];
    expect(findCollisions(asteroids, [bullet(9, { x: 205, y: 200 })], undefined, bounds)).toEqual([
      { kind: 'bullet-asteroid', bulletId: 9, asteroidId: 3 },
    ]);
  });

  it('lets only the first bullet claim an asteroid', () => {
    const asteroids = [asteroid(2, { x: 200, y: 200 })];
    const bullets = [bullet(8, { x: 205, y: 200 }), bullet(4, { x: 195, y: 200 })];
    expect(findCollisions(asteroids, bullets, undefined, bounds)).toEqual([
      { kind: 'bullet-asteroid', bulletId: 4, asteroidId: 2 },
    ]);
  });

  it('gives a second bullet the next asteroid in line', () => {
    const asteroids = [asteroid(2, { x: 200, y: 200 }), asteroid(3, { x: 210, y: 200 })];
    const bullets = [bullet(4, { x: 205, y: 200 }), bullet(5, { x: 205, y: 201 })];
    expect(findCollisions(asteroids, bullets, undefined, bounds)).toEqual([
      { kind: 'bullet-asteroid', bulletId: 4, asteroidId: 2 },
      { kind: 'bullet-asteroid', bulletId: 5, asteroidId: 3 },
    ]);
  });

  it('pairs the ship with every unclaimed asteroid it touches', () => {
    const asteroids = [asteroid(2, { x: 400, y: 300 }), asteroid(3, { x: 420, y: 300 }), asteroid(4, { x: 40, y: 40 })];
    const bullets = [bullet(5, { x: 400, y: 300 })];
    expect(findCollisions(asteroids, bullets, ship({ x: 410, y: 300 }), bounds)).toEqual([
      { kind: 'bullet-asteroid', bulletId: 5, asteroidId: 2 },
      { kind: 'ship-asteroid', shipId: 1, asteroidId: 3 },
    ]);
  });

  it('ignores dead entities', () => {
    const bullets = [bullet(5, { x: 100, y: 100 }, false), bullet(6, { x: 400, y: 300 })];
    const deadShip = ship({ x: 400, y: 300 }, false);
    expect(findCollisions([asteroid(2, { x: 400, y: 300 }, 40, false)], bullets, deadShip, bounds)).toEqual([]);
    expect(findCollisions([asteroid(2, { x: 100, y: 100 })], bullets, undefined, bounds)).toEqual([]);
  });
});
