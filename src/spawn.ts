import { asteroidSpeedMultiplier } from './config';
import {
  allocateId,
  childTier,
  spawnPoint,
  Tier,
  type Asteroid,
  type Bullet,
  type Session,
  type Ship,
} from './state';
import { degreesToRadians, randomBetween, randomIntInRange, wrapPosition, type Random } from './util';
import { add, fromAngle, length, rotate, scale, zero } from './vector';

const asteroidVariantCount = 3;
const maxAsteroidSpin = 1.5;
const splitAngleRange = [degreesToRadians(20), degreesToRadians(50)] as const;

function randomSpin(random: Random) {
  return randomBetween(random, -maxAsteroidSpin, maxAsteroidSpin);
}

export function respawnShip(session: Session): void {
  const ship = session.ship;
  ship.position = spawnPoint(session.config);
  ship.velocity = zero;
  ship.heading = -Math.PI / 2;
  ship.invulnerableUntil = session.tick + session.config.invulnerabilityTicks;
}

export function fireBullet(session: Session, ship: Ship): Bullet {
  const { config } = session;
  const forward = fromAngle(ship.heading);
  return {
    kind: 'bullet',
    id: allocateId(session),
    position: wrapPosition(add(ship.position, scale(forward, ship.radius)), config),
    velocity: add(ship.velocity, scale(forward, config.bulletSpeed)),
    heading: ship.heading,
    radius: config.bulletRadius,
    alive: true,
    ttl: config.bulletTtlTicks,
  };
}

/**
 * Two children one tier down, half the parent's radius, flung apart on either side
 * of the parent's course. Small asteroids leave nothing behind.
 */
export function splitAsteroid(session: Session, parent: Asteroid): Asteroid[] {
  const tier = childTier[parent.tier];
  if (tier === undefined) return [];

  const { random, config } = session;
  const parentSpeed = length(parent.velocity);
  // a resting parent still sends its children outwards
  const course =
    parentSpeed > 0 ? parent.velocity : fromAngle(random() * Math.PI * 2, config.asteroidSpeedMin || 1);
  const spread = randomBetween(random, splitAngleRange[0], splitAngleRange[1]);

  return [spread, -spread].map((angle): Asteroid => ({
    kind: 'asteroid',
    id: allocateId(session),
    tier,
    position: parent.position,
    velocity: scale(rotate(course, angle), config.splitSpeedFactor),
    heading: random() * Math.PI * 2,
    radius: parent.radius / 2,
    alive: true,
    spin: randomSpin(random),
    variant: randomIntInRange(random, 0, asteroidVariantCount - 1),
  }));
}

/**
 * Large asteroids on the wrapped screen edge (x = 0 or y = 0). Every edge point is at
 * least half the shorter screen side from the centre, and config validation keeps the
 * safe radius inside that.
 */
export function spawnWave(session: Session, count: number): Asteroid[] {
  const { random, config } = session;
  const speedFactor = asteroidSpeedMultiplier[config.difficulty];

  return Array.from({ length: count }, (): Asteroid => {
    const onVerticalEdge = random() < 0.5;
    const position = onVerticalEdge
      ? { x: 0, y: random() * config.height }
      : { x: random() * config.width, y: 0 };
    const direction = random() * Math.PI * 2;
    const speed = randomBetween(random, config.asteroidSpeedMin, config.asteroidSpeedMax) * speedFactor;
    return {
      kind: 'asteroid',
      id: allocateId(session),
      tier: Tier.Large,
      position: wrapPosition(position, config),
      velocity: fromAngle(direction, speed),
      heading: random() * Math.PI * 2,
      radius: config.largeAsteroidRadius,
      alive: true,
      spin: randomSpin(random),
      variant: randomIntInRange(random, 0, asteroidVariantCount - 1),
    };
  });
}

export function startNextWave(session: Session): void {
  session.wave += 1;
  const count = session.config.initialAsteroidCount + session.wave;
  session.asteroids = session.asteroids.concat(spawnWave(session, count));
  session.events.push({ type: 'wave-started', wave: session.wave, asteroidCount: count });
}
