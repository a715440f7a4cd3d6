import type { Intents } from './state';

type Held = 'thrust' | 'rotateLeft' | 'rotateRight' | 'fire';

const bindings: Record<string, Held | 'pause'> = {
  ArrowUp: 'thrust',
  w: 'thrust',
  W: 'thrust',
  ArrowLeft: 'rotateLeft',
  a: 'rotateLeft',
  A: 'rotateLeft',
  ArrowRight: 'rotateRight',
  d: 'rotateRight',
  D: 'rotateRight',
  ' ': 'fire',
  p: 'pause',
  P: 'pause',
  Escape: 'pause',
};

export type KeySource = Pick<EventTarget, 'addEventListener' | 'removeEventListener'>;

export type KeyboardInput = {
  sample: () => Intents;
  dispose: () => void;
};

function keyOf(event: Event): string | undefined {
  if (!('key' in event)) return undefined;
  return typeof event.key === 'string' ? event.key : undefined;
}

/**
 * Turns keydown/keyup events into one {@link Intents} snapshot per tick. Held keys
 * stay set while held. Pause reports once per press and clears when sampled.
 */
export function createKeyboardInput(target: KeySource): KeyboardInput {
  const heldKeys = new Set<string>();
  let pausePressed = false;
  let pauseDown = false;

  const onKeyDown = (event: Event) => {
    const key = keyOf(event);
    if (key === undefined) return;
    const action = bindings[key];
    if (action === undefined) return;
    if (action === 'pause') {
      // auto-repeat keydowns while held do not toggle again
      if (!pauseDown) pausePressed = true;
      pauseDown = true;
      return;
    }
    heldKeys.add(key);
  };

  const onKeyUp = (event: Event) => {
    const key = keyOf(event);
    if (key === undefined) return;
    if (bindings[key] === 'pause') pauseDown = false;
    heldKeys.delete(key);
  };

  // keyups that happen while the window is unfocused never arrive
  const onBlur = () => {
    heldKeys.clear();
    pauseDown = false;
  };

  target.addEventListener('keydown', onKeyDown);
  target.addEventListener('keyup', onKeyUp);
  target.addEventListener('blur', onBlur);

  return {
    sample: () => {
      const held = new Set<Held | 'pause'>();
      for (const key of heldKeys) {
        const action = bindings[key];
        if (action !== undefined) held.add(action);
      }
      const intents: Intents = {
        thrust: held.has('thrust'),
        rotateLeft: held.has('rotateLeft'),
        rotateRight: held.has('rotateRight'),
        fire: held.has('fire'),
        pause: pausePressed,
      };
      pausePressed = false;
      return intents;
    },
    dispose: () => {
      target.removeEventListener('keydown', onKeyDown);
      target.removeEventListener('keyup', onKeyUp);
      target.removeEventListener('blur', onBlur);
      heldKeys.clear();
    },
  };
}
