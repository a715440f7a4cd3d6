import { recordKill, recordPlayTime, recordShipLost, recordWaveCleared } from './achievements';
import { findCollisions } from './collisions';
import { spawnSparkBurst, tickExplosions } from './explosions';
import { fireBullet, respawnShip, splitAsteroid, startNextWave } from './spawn';
import { GameState, isInvulnerable, tierScore, type Asteroid, type Intents, type Session } from './state';
import { wrapPosition } from './util';
import { add, clampLength, fromAngle, scale } from './vector';

const explosionDurationAsteroid = 0.4;
const explosionDurationShip = 0.6;

function steerShip(session: Session, intents: Intents, dt: number): void {
  const { ship, config } = session;
  if (!ship.alive) return;

  // left wins when both are held
  ship.turning = intents.rotateLeft ? -1 : intents.rotateRight ? 1 : 0;
  ship.heading += ship.turning * config.angularSpeed * dt;

  ship.thrusting = intents.thrust;
  if (ship.thrusting) {
    const boosted = add(ship.velocity, fromAngle(ship.heading, config.thrustAccel * dt));
    ship.velocity = clampLength(boosted, config.maxSpeed);
  }

  ship.position = wrapPosition(add(ship.position, scale(ship.velocity, dt)), config);
}

function moveBullets(session: Session, dt: number): void {
  for (const bullet of session.bullets) {
    bullet.position = wrapPosition(add(bullet.position, scale(bullet.velocity, dt)), session.config);
    bullet.ttl -= 1;
    if (bullet.ttl <= 0) bullet.alive = false;
  }
}

function moveAsteroids(session: Session, dt: number): void {
  for (const asteroid of session.asteroids) {
    asteroid.position = wrapPosition(add(asteroid.position, scale(asteroid.velocity, dt)), session.config);
    asteroid.heading += asteroid.spin * dt;
  }
}

function fire(session: Session, intents: Intents): void {
  const { ship, config } = session;
  ship.fireCooldown = Math.max(0, ship.fireCooldown - 1);
  if (!ship.alive || !intents.fire || ship.fireCooldown > 0) return;

  const bullet = fireBullet(session, ship);
  session.bullets.push(bullet);
  ship.fireCooldown = config.fireCooldownTicks;
  session.events.push({ type: 'bullet-fired', bulletId: bullet.id });

  const live = session.bullets.filter((b) => b.alive);
  const oldest = live[0];
  if (live.length > config.maxActiveBullets && oldest !== undefined) {
    oldest.alive = false;
  }
}

function loseLife(session: Session): void {
  const { ship } = session;
  ship.lives -= 1;
  recordShipLost(session);
  session.explosions = session.explosions.concat(
    spawnSparkBurst(session.random, ship.position, { magnitude: ship.radius * 4, duration: explosionDurationShip }),
  );
  session.events.push({ type: 'ship-destroyed', livesLeft: Math.max(0, ship.lives), position: ship.position });

  if (ship.lives < 0) {
    ship.alive = false;
    ship.thrusting = false;
    session.state = GameState.GameOver;
    session.events.push({ type: 'game-over', score: session.score });
    return;
  }
  respawnShip(session);
}

// returns the fragments of every asteroid shot this tick
function resolveCollisions(session: Session): Asteroid[] {
  const { ship, config } = session;
  const asteroids = new Map(session.asteroids.map((a) => [a.id, a]));
  const bullets = new Map(session.bullets.map((b) => [b.id, b]));
  const fragments: Asteroid[] = [];
  let shipHit = false;

  for (const collision of findCollisions(session.asteroids, session.bullets, ship, config)) {
    const asteroid = asteroids.get(collision.asteroidId);
    if (asteroid === undefined) continue;

    switch (collision.kind) {
      case 'bullet-asteroid': {
        const bullet = bullets.get(collision.bulletId);
        if (bullet !== undefined) bullet.alive = false;
        asteroid.alive = false;
        const points = tierScore[asteroid.tier];
        session.score += points;
        fragments.push(...splitAsteroid(session, asteroid));
        session.explosions = session.explosions.concat(
          spawnSparkBurst(session.random, asteroid.position, {
            magnitude: asteroid.radius,
            duration: explosionDurationAsteroid,
          }),
        );
        session.events.push({
          type: 'asteroid-destroyed',
          asteroidId: asteroid.id,
          tier: asteroid.tier,
          position: asteroid.position,
          points,
        });
        recordKill(session);
        break;
      }
      case 'ship-asteroid': {
        // one life per tick; the respawn grants invulnerability for the rest
        if (shipHit || isInvulnerable(session)) break;
        shipHit = true;
        loseLife(session);
        break;
      }
    }
  }

  return fragments;
}

/**
 * Advances the session by one tick of `dt` seconds, in place.
 *
 * A non-positive or non-finite `dt` is not a tick: the session is returned untouched.
 * Larger steps are clamped to `config.maxDt`. Only a Playing session moves.
 */
export function advance(session: Session, intents: Intents, dt: number): Session {
  if (!Number.isFinite(dt) || dt <= 0) return session;
  if (session.state !== GameState.Playing) return session;

  const step = Math.min(dt, session.config.maxDt);
  session.tick += 1;
  session.events = [];
  recordPlayTime(session, step);

  steerShip(session, intents, step);
  moveBullets(session, step);
  moveAsteroids(session, step);
  session.explosions = tickExplosions(session.explosions, step, session.config);
  fire(session, intents);

  const fragments = resolveCollisions(session);

  // the dead leave only once every pass over this tick is done
  session.bullets = session.bullets.filter((b) => b.alive);
  session.asteroids = session.asteroids.filter((a) => a.alive).concat(fragments);

  if (session.asteroids.length === 0 && session.state === GameState.Playing) {
    recordWaveCleared(session);
    startNextWave(session);
  }

  return session;
}
