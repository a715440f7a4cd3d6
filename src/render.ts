import { achievementTitle } from './achievements';
import { sparkAlpha, type Explosion } from './explosions';
import { makeAsteroidGeometry, makeShipGeometry, type Segment } from './shapes';
import type { AsteroidView, BulletView, ShipView, Snapshot } from './snapshot';
import { GameState } from './state';
import type { Vector2 } from './vector';

export type DrawContext = Pick<
  CanvasRenderingContext2D,
  | 'save'
  | 'restore'
  | 'translate'
  | 'rotate'
  | 'beginPath'
  | 'moveTo'
  | 'lineTo'
  | 'stroke'
  | 'fill'
  | 'arc'
  | 'fillRect'
  | 'strokeRect'
  | 'fillText'
  | 'lineWidth'
  | 'strokeStyle'
  | 'fillStyle'
  | 'globalAlpha'
  | 'font'
  | 'textAlign'
  | 'textBaseline'
>;

const hudLifeRadius = 8;
const flickerTicks = 6;
const achievementPopupSeconds = 3;

// extra copies for an outline that crosses an edge of the wrapped playfield
function wrapOffsets({ x, y }: Vector2, radius: number, width: number, height: number): Vector2[] {
  const xs = [0];
  if (x - radius < 0) xs.push(width);
  if (x + radius > width) xs.push(-width);
  const ys = [0];
  if (y - radius < 0) ys.push(height);
  if (y + radius > height) ys.push(-height);
  return xs.flatMap((dx) => ys.map((dy) => ({ x: dx, y: dy })));
}

function drawShape(ctx: DrawContext, segs: readonly Segment[], x: number, y: number, angle = 0) {
  ctx.save();
  ctx.translate(x, y);
  ctx.rotate(angle);
  ctx.beginPath();
  for (const [a, b] of segs) {
    ctx.moveTo(a.x, a.y);
    ctx.lineTo(b.x, b.y);
  }
  ctx.stroke();
  ctx.restore();
}

function drawWrapped(
  ctx: DrawContext,
  segs: readonly Segment[],
  entity: ShipView | AsteroidView,
  snap: Snapshot,
  scale: number,
) {
  const { position, radius, heading } = entity;
  for (const offset of wrapOffsets(position, radius, snap.width, snap.height)) {
    drawShape(ctx, segs, (position.x + offset.x) * scale, (position.y + offset.y) * scale, heading);
  }
}

function drawShip(ctx: DrawContext, ship: ShipView, snap: Snapshot, scale: number) {
  // flicker while invulnerable
  if (ship.invulnerable && Math.floor(snap.tick / flickerTicks) % 2 === 0) return;
  const { segs } = makeShipGeometry(ship.radius * scale, ship.thrusting);
  drawWrapped(ctx, segs, ship, snap, scale);
}

function drawAsteroid(ctx: DrawContext, asteroid: AsteroidView, snap: Snapshot, scale: number) {
  const { segs } = makeAsteroidGeometry(asteroid.radius * scale, asteroid.variant);
  drawWrapped(ctx, segs, asteroid, snap, scale);
}

function drawBullet(ctx: DrawContext, bullet: BulletView, scale: number) {
  ctx.beginPath();
  ctx.arc(bullet.position.x * scale, bullet.position.y * scale, Math.max(1, bullet.radius * scale), 0, Math.PI * 2);
  ctx.fill();
}

function drawExplosions(ctx: DrawContext, explosions: readonly Explosion[], scale: number) {
  for (const e of explosions) {
    const halfLength = (e.length * scale) / 2;
    const dx = Math.cos(e.angle) * halfLength;
    const dy = Math.sin(e.angle) * halfLength;
    const x = e.position.x * scale;
    const y = e.position.y * scale;

    ctx.save();
    ctx.globalAlpha = sparkAlpha(e);
    ctx.beginPath();
    ctx.moveTo(x - dx, y - dy);
    ctx.lineTo(x + dx, y + dy);
    ctx.stroke();
    ctx.restore();
  }
}

function drawHud(ctx: DrawContext, snap: Snapshot, scale: number) {
  const margin = 12 * scale;
  const lifePx = hudLifeRadius * scale;
  const { segs } = makeShipGeometry(lifePx);
  for (let i = 0; i < snap.lives; i++) {
    drawShape(ctx, segs, margin + lifePx + i * lifePx * 2.5, margin + lifePx, -Math.PI / 2);
  }

  ctx.save();
  ctx.font = `${16 * scale}px monospace`;
  ctx.textBaseline = 'top';
  ctx.textAlign = 'left';
  ctx.fillText(`${snap.score}`, margin, margin + lifePx * 3);
  ctx.textAlign = 'right';
  ctx.fillText(`WAVE ${snap.wave}`, snap.width * scale - margin, margin);
  ctx.fillText(`HI ${snap.highScore}`, snap.width * scale - margin, margin + 20 * scale);

  const latest = snap.achievements[snap.achievements.length - 1];
  if (latest !== undefined && snap.stats.timeSurvived - latest.at < achievementPopupSeconds) {
    ctx.textAlign = 'center';
    ctx.fillText(
      `ACHIEVEMENT: ${achievementTitle[latest.achievement].toUpperCase()}`,
      (snap.width * scale) / 2,
      margin,
    );
  }
  ctx.restore();
}

function drawOverlay(ctx: DrawContext, snap: Snapshot, scale: number) {
  const { asteroidsDestroyed, wavesCompleted } = snap.stats;
  const lines =
    snap.state === GameState.Paused
      ? ['PAUSED']
      : snap.state === GameState.GameOver
        ? ['GAME OVER', `SCORE ${snap.score}`, `ROCKS ${asteroidsDestroyed} WAVES ${wavesCompleted}`]
        : [];
  if (lines.length === 0) return;

  const cx = (snap.width * scale) / 2;
  const cy = (snap.height * scale) / 2;
  const lineHeight = 32 * scale;
  const boxW = 260 * scale;
  const boxH = lineHeight * lines.length + 24 * scale;

  ctx.save();
  ctx.strokeRect(cx - boxW / 2, cy - boxH / 2, boxW, boxH);
  ctx.font = `${24 * scale}px monospace`;
  ctx.textAlign = 'center';
  ctx.textBaseline = 'middle';
  lines.forEach((line, i) => {
    ctx.fillText(line, cx, cy + (i - (lines.length - 1) / 2) * lineHeight);
  });
  ctx.restore();
}

/** Draws one frame of `snap`, with `scale` canvas pixels per playfield unit. Read-only on the snapshot. */
export function drawFrame(ctx: DrawContext, snap: Snapshot, scale: number): void {
  ctx.save();
  ctx.fillStyle = 'black';
  ctx.fillRect(0, 0, snap.width * scale, snap.height * scale);

  ctx.lineWidth = Math.max(scale, 1);
  ctx.strokeStyle = 'white';
  ctx.fillStyle = 'white';

  for (const entity of snap.entities) {
    switch (entity.kind) {
      case 'ship':
        drawShip(ctx, entity, snap, scale);
        break;
      case 'asteroid':
        drawAsteroid(ctx, entity, snap, scale);
        break;
      case 'bullet':
        drawBullet(ctx, entity, scale);
        break;
    }
  }

  drawExplosions(ctx, snap.explosions, scale);
  drawHud(ctx, snap, scale);
  drawOverlay(ctx, snap, scale);
  ctx.restore();
}
