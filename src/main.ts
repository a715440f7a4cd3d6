import { createGame } from './controller';
import { createKeyboardInput } from './input';
import { log } from './log';
import { drawFrame } from './render';
import { GameState } from './state';

const physicsHz = 120;
const physicsTick = 1 / physicsHz;
const maxFrameDelta = 0.1; // seconds; longer stalls are dropped, not replayed

function main() {
  const canvas = document.querySelector<HTMLCanvasElement>('#game');
  const ctx = canvas?.getContext('2d');
  if (!canvas || !ctx) {
    log.error('no #game canvas with a 2d context');
    return;
  }

  const game = createGame();
  const input = createKeyboardInput(window);

  // R restarts after game over
  window.addEventListener('keydown', (event) => {
    if (event.key.toLowerCase() === 'r' && game.state === GameState.GameOver) game.reset();
  });
  window.addEventListener('beforeunload', () => {
    game.quit();
    input.dispose();
  });

  let lastFrameTime = performance.now();
  let timeToProcessPhysics = 0;

  const frame = (now: number) => {
    const delta = Math.min(Math.max(0, now - lastFrameTime) / 1000, maxFrameDelta);
    lastFrameTime = now;
    if (game.closed) return;
    requestAnimationFrame(frame);

    timeToProcessPhysics += delta;
    while (timeToProcessPhysics >= physicsTick) {
      timeToProcessPhysics -= physicsTick;
      game.tick(input.sample(), physicsTick);
    }

    const rect = canvas.getBoundingClientRect();
    canvas.width = rect.width * devicePixelRatio;
    canvas.height = rect.height * devicePixelRatio;
    const snap = game.snapshot();
    const scale = Math.min(canvas.width / snap.width, canvas.height / snap.height);
    drawFrame(ctx, snap, scale);
  };

  requestAnimationFrame(frame);
}

main();
