import { describe, expect, it, vi } from 'vitest';
import { Achievement } from './achievements';
import type { Spark } from './explosions';
import { drawFrame, type DrawContext } from './render';
import type { Snapshot } from './snapshot';
import { GameState } from './state';

function fakeContext(): DrawContext {
  return {
    save: vi.fn(),
    restore: vi.fn(),
    translate: vi.fn(),
    rotate: vi.fn(),
    beginPath: vi.fn(),
    moveTo: vi.fn(),
    lineTo: vi.fn(),
    stroke: vi.fn(),
    fill: vi.fn(),
    arc: vi.fn(),
    fillRect: vi.fn(),
    strokeRect: vi.fn(),
    fillText: vi.fn(),
    lineWidth: 1,
    strokeStyle: 'black',
    fillStyle: 'black',
    globalAlpha: 1,
    font: '10px sans-serif',
    textAlign: 'start',
    textBaseline: 'alphabetic',
  };
}

function frame(overrides: Partial<Snapshot> = {}): Snapshot {
  return {
    width: 800,
    height: 600,
    tick: 6,
    score: 120,
    lives: 2,
    wave: 3,
    state: GameState.Playing,
    highScore: 500,
    entities: [
      {
        id: 1,
        kind: 'ship',
        position: { x: 400, y: 300 },
        heading: 0,
        radius: 12,
        thrusting: false,
        invulnerable: false,
      },
      { id: 2, kind: 'asteroid', position: { x: 100, y: 100 }, heading: 0, radius: 40, tier: 'Large', variant: 1 },
      { id: 3, kind: 'bullet', position: { x: 300, y: 200 }, heading: 0, radius: 2 },
      { id: 4, kind: 'bullet', position: { x: 310, y: 200 }, heading: 0, radius: 2 },
    ],
    explosions: [],
    stats: { asteroidsDestroyed: 7, wavesCompleted: 2, timeSurvived: 30, perfectWave: true },
    achievements: [],
    ...overrides,
  };
}

describe('drawFrame', () => {
  it('strokes every outline and fills every bullet', () => {
    const ctx = fakeContext();
    drawFrame(ctx, frame(), 1);
    // ship + asteroid + two life icons
    expect(ctx.stroke).toHaveBeenCalledTimes(4);
    expect(ctx.arc).toHaveBeenCalledTimes(2);
    expect(ctx.arc).toHaveBeenCalledWith(300, 200, 2, 0, Math.PI * 2);
    expect(ctx.strokeRect).not.toHaveBeenCalled();
  });

  it('writes score, wave and high score', () => {
    const ctx = fakeContext();
    drawFrame(ctx, frame(), 1);
    expect(ctx.fillText).toHaveBeenCalledWith('120', 12, 36);
    expect(ctx.fillText).toHaveBeenCalledWith('WAVE 3', 788, 12);
    expect(ctx.fillText).toHaveBeenCalledWith('HI 500', 788, 32);
  });

  it('blinks an invulnerable ship', () => {
    const ship = {
      id: 1,
      kind: 'ship',
      position: { x: 400, y: 300 },
      heading: 0,
      radius: 12,
      thrusting: false,
      invulnerable: true,
    } as const;

    const hidden = fakeContext();
    drawFrame(hidden, frame({ tick: 0, entities: [ship] }), 1);
    expect(hidden.stroke).toHaveBeenCalledTimes(2);

    const shown = fakeContext();
    drawFrame(shown, frame({ tick: 6, entities: [ship] }), 1);
    expect(shown.stroke).toHaveBeenCalledTimes(3);
  });

  it('draws sparks faded by their remaining life', () => {
    const spark: Spark = {
      kind: 'spark',
      position: { x: 100, y: 100 },
      velocity: { x: 0, y: 0 },
      angle: 0,
      spin: 0,
      length: 10,
      life: 0.2,
      maxLife: 0.4,
      easing: 'linear',
    };
    const ctx = fakeContext();
    drawFrame(ctx, frame({ entities: [], lives: 0, explosions: [spark] }), 1);
    expect(ctx.stroke).toHaveBeenCalledTimes(1);
    expect(ctx.moveTo).toHaveBeenCalledWith(95, 100);
    expect(ctx.lineTo).toHaveBeenCalledWith(105, 100);
    expect(ctx.globalAlpha).toBe(0.5);
  });

  it('boxes a pause message', () => {
    const ctx = fakeContext();
    drawFrame(ctx, frame({ state: GameState.Paused }), 1);
    expect(ctx.strokeRect).toHaveBeenCalledWith(270, 272, 260, 56);
    expect(ctx.fillText).toHaveBeenCalledWith('PAUSED', 400, 300);
  });

  it('shows the final score and session stats on game over', () => {
    const ctx = fakeContext();
    drawFrame(ctx, frame({ state: GameState.GameOver }), 1);
    expect(ctx.strokeRect).toHaveBeenCalledWith(270, 240, 260, 120);
    expect(ctx.fillText).toHaveBeenCalledWith('GAME OVER', 400, 268);
    expect(ctx.fillText).toHaveBeenCalledWith('SCORE 120', 400, 300);
    expect(ctx.fillText).toHaveBeenCalledWith('ROCKS 7 WAVES 2', 400, 332);
  });

  it('announces the latest achievement for a few seconds', () => {
    const fresh = fakeContext();
    drawFrame(fresh, frame({ achievements: [{ achievement: Achievement.FirstKill, at: 28 }] }), 1);
    expect(fresh.fillText).toHaveBeenCalledWith('ACHIEVEMENT: FIRST KILL', 400, 12);

    const stale = fakeContext();
    drawFrame(stale, frame({ achievements: [{ achievement: Achievement.FirstKill, at: 27 }] }), 1);
    expect(stale.fillText).toHaveBeenCalledTimes(3);
  });

  it('draws an asteroid again across the edge it straddles', () => {
    const rock = { id: 2, kind: 'asteroid', heading: 0, radius: 40, tier: 'Large', variant: 0 } as const;

    const side = fakeContext();
    drawFrame(side, frame({ lives: 0, entities: [{ ...rock, position: { x: 5, y: 300 } }] }), 1);
    expect(side.translate).toHaveBeenCalledTimes(2);
    expect(side.translate).toHaveBeenCalledWith(5, 300);
    expect(side.translate).toHaveBeenCalledWith(805, 300);

    const corner = fakeContext();
    drawFrame(corner, frame({ lives: 0, entities: [{ ...rock, position: { x: 795, y: 595 } }] }), 1);
    expect(corner.translate).toHaveBeenCalledTimes(4);
    expect(corner.translate).toHaveBeenCalledWith(-5, 595);
    expect(corner.translate).toHaveBeenCalledWith(795, -5);
    expect(corner.translate).toHaveBeenCalledWith(-5, -5);
  });

  it('scales the playfield onto the canvas', () => {
    const ctx = fakeContext();
    drawFrame(ctx, frame(), 2);
    expect(ctx.fillRect).toHaveBeenCalledWith(0, 0, 1600, 1200);
    expect(ctx.arc).toHaveBeenCalledWith(600, 400, 4, 0, Math.PI * 2);
    expect(ctx.lineWidth).toBe(2);
  });
});
