import { emptyStats, type Achievement, type SessionStats, type Unlock } from './achievements';
import type { Config } from './config';
import type { Explosion } from './explosions';
import { createRandom, type Random } from './util';
import type { Vector2 } from './vector';

export const GameState = { Playing: 'Playing', Paused: 'Paused', GameOver: 'GameOver' } as const;
export type GameState = (typeof GameState)[keyof typeof GameState];

export const Tier = { Large: 'Large', Medium: 'Medium', Small: 'Small' } as const;
export type Tier = (typeof Tier)[keyof typeof Tier];

export const tierScore: Record<Tier, number> = {
  [Tier.Large]: 20,
  [Tier.Medium]: 50,
  [Tier.Small]: 100,
};

export const childTier: Record<Tier, Tier | undefined> = {
  [Tier.Large]: Tier.Medium,
  [Tier.Medium]: Tier.Small,
  [Tier.Small]: undefined,
};

type Body = {
  readonly id: number;
  position: Vector2;
  velocity: Vector2;
  heading: number; // radians
  radius: number;
  alive: boolean;
};

export type Ship = Body & {
  readonly kind: 'ship';
  lives: number;
  invulnerableUntil: number; // tick
  fireCooldown: number; // ticks until the next shot is allowed
  thrusting: boolean;
  turning: -1 | 0 | 1;
};

export type Asteroid = Body & {
  readonly kind: 'asteroid';
  readonly tier: Tier;
  spin: number; // radians per second, cosmetic
  readonly variant: number;
};

export type Bullet = Body & {
  readonly kind: 'bullet';
  ttl: number; // ticks
};

export type Entity = Ship | Asteroid | Bullet;

/** One tick's sampled input, independent of the device that produced it. */
export type Intents = {
  readonly thrust: boolean;
  readonly rotateLeft: boolean;
  readonly rotateRight: boolean;
  readonly fire: boolean;
  readonly pause: boolean;
};

export const noIntents: Intents = {
  thrust: false,
  rotateLeft: false,
  rotateRight: false,
  fire: false,
  pause: false,
};

export type GameEvent =
  | { readonly type: 'bullet-fired'; readonly bulletId: number }
  | {
      readonly type: 'asteroid-destroyed';
      readonly asteroidId: number;
      readonly tier: Tier;
      readonly position: Vector2;
      readonly points: number;
    }
  | { readonly type: 'ship-destroyed'; readonly livesLeft: number; readonly position: Vector2 }
  | { readonly type: 'wave-started'; readonly wave: number; readonly asteroidCount: number }
  | { readonly type: 'game-over'; readonly score: number }
  | { readonly type: 'achievement-unlocked'; readonly achievement: Achievement };

export type Session = {
  readonly config: Config;
  readonly random: Random;
  state: GameState;
  tick: number;
  score: number;
  wave: number;
  nextId: number;
  ship: Ship;
  asteroids: Asteroid[];
  bullets: Bullet[];
  explosions: Explosion[];
  events: GameEvent[];
  stats: SessionStats;
  achievements: Unlock[];
};

export function allocateId(session: Session): number {
  return session.nextId++;
}

export function spawnPoint(config: Config): Vector2 {
  return { x: config.width / 2, y: config.height / 2 };
}

export function isInvulnerable(session: Session): boolean {
  return session.tick < session.ship.invulnerableUntil;
}

// a session with the ship in place and no wave spawned yet
export function emptySession(config: Config): Session {
  return {
    config,
    random: createRandom(config.seed),
    state: GameState.Playing,
    tick: 0,
    score: 0,
    wave: 0,
    nextId: 2,
    ship: {
      kind: 'ship',
      id: 1,
      position: spawnPoint(config),
      velocity: { x: 0, y: 0 },
      heading: -Math.PI / 2,
      radius: config.shipRadius,
      alive: true,
      lives: config.initialLives,
      invulnerableUntil: config.invulnerabilityTicks,
      fireCooldown: 0,
      thrusting: false,
      turning: 0,
    },
    asteroids: [],
    bullets: [],
    explosions: [],
    events: [],
    stats: emptyStats(),
    achievements: [],
  };
}
