import type { SessionStats, Unlock } from './achievements';
import type { Explosion } from './explosions';
import { isInvulnerable, type Entity, type GameState, type Session, type Tier } from './state';
import type { Vector2 } from './vector';

type EntityView = {
  readonly id: number;
  readonly position: Vector2;
  readonly heading: number;
  readonly radius: number;
};

export type ShipView = EntityView & {
  readonly kind: 'ship';
  readonly thrusting: boolean;
  readonly invulnerable: boolean;
};
export type AsteroidView = EntityView & { readonly kind: 'asteroid'; readonly tier: Tier; readonly variant: number };
export type BulletView = EntityView & { readonly kind: 'bullet' };
export type SnapshotEntity = ShipView | AsteroidView | BulletView;

export type Snapshot = {
  readonly width: number;
  readonly height: number;
  readonly tick: number;
  readonly score: number;
  readonly lives: number;
  readonly wave: number;
  readonly state: GameState;
  readonly highScore: number;
  readonly entities: readonly SnapshotEntity[];
  readonly explosions: readonly Explosion[];
  readonly stats: Readonly<SessionStats>;
  readonly achievements: readonly Unlock[];
};

function view(session: Session, entity: Entity): SnapshotEntity {
  const base = {
    id: entity.id,
    position: entity.position,
    heading: entity.heading,
    radius: entity.radius,
  };
  switch (entity.kind) {
    case 'ship':
      return { ...base, kind: 'ship', thrusting: entity.thrusting, invulnerable: isInvulnerable(session) };
    case 'asteroid':
      return { ...base, kind: 'asteroid', tier: entity.tier, variant: entity.variant };
    case 'bullet':
      return { ...base, kind: 'bullet' };
  }
}

/** Read-only copy of everything a renderer needs. Vectors are immutable, so sharing them is safe. */
export function snapshot(session: Session, highScore = 0): Snapshot {
  const alive: Entity[] = [session.ship, ...session.asteroids, ...session.bullets].filter((e) => e.alive);
  return {
    width: session.config.width,
    height: session.config.height,
    tick: session.tick,
    score: session.score,
    lives: Math.max(0, session.ship.lives),
    wave: session.wave,
    state: session.state,
    highScore: Math.max(highScore, session.score),
    entities: alive.map((entity) => view(session, entity)),
    explosions: session.explosions.slice(),
    stats: { ...session.stats },
    achievements: session.achievements.slice(),
  };
}
