import { achievementTitle } from './achievements';
import { parseConfig, type ConfigInput } from './config';
import { log as rootLog, type Logger } from './log';
import { createSession } from './session';
import { advance } from './simulation';
import { snapshot, type Snapshot } from './snapshot';
import { GameState, type Intents, type Session } from './state';

const maxHighScores = 10;

export type GameOptions = {
  readonly config?: ConfigInput;
  readonly logger?: Logger;
};

export type Game = {
  readonly session: Session;
  readonly state: GameState;
  readonly closed: boolean;
  tick: (intents: Intents, dt: number) => void;
  reset: () => void;
  quit: () => void;
  snapshot: () => Snapshot;
  highScores: () => readonly number[];
};

export function createGame({ config: input = {}, logger = rootLog }: GameOptions = {}): Game {
  const config = parseConfig(input);
  let resets = 0;
  let closed = false;
  let session = createSession(config);
  let log = logger.child({ seed: config.seed });
  const scores: number[] = [];

  log.info({ wave: session.wave }, 'session started');

  const transition = (next: GameState) => {
    log.info({ from: session.state, to: next, tick: session.tick }, 'state changed');
    session.state = next;
  };

  const recordScore = (score: number) => {
    scores.push(score);
    scores.sort((a, b) => b - a);
    scores.length = Math.min(scores.length, maxHighScores);
  };

  const logEvents = () => {
    for (const event of session.events) {
      switch (event.type) {
        case 'wave-started':
          log.debug({ wave: event.wave, asteroids: event.asteroidCount }, 'wave started');
          break;
        case 'ship-destroyed':
          log.debug({ livesLeft: event.livesLeft, tick: session.tick }, 'ship destroyed');
          break;
        case 'game-over':
          log.info({ score: event.score, wave: session.wave, tick: session.tick, ...session.stats }, 'game over');
          break;
        case 'achievement-unlocked':
          log.info({ achievement: achievementTitle[event.achievement], tick: session.tick }, 'achievement unlocked');
          break;
        case 'bullet-fired':
        case 'asteroid-destroyed':
          break;
      }
    }
  };

  const tick = (intents: Intents, dt: number) => {
    if (closed) return;

    switch (session.state) {
      case GameState.Playing: {
        if (intents.pause) {
          transition(GameState.Paused);
          return;
        }
        const before = session.tick;
        // read the outcome from the result: `session.state` stays narrowed to Playing here
        const next = advance(session, intents, dt);
        if (next.tick === before) return;
        logEvents();
        if (next.state === GameState.GameOver) recordScore(next.score);
        return;
      }
      case GameState.Paused:
        if (intents.pause) transition(GameState.Playing);
        return;
      case GameState.GameOver:
        return;
    }
  };

  const reset = () => {
    if (closed) return;
    resets += 1;
    session = createSession({ ...config, seed: (config.seed + resets) >>> 0 });
    log = logger.child({ seed: session.config.seed });
    log.info({ wave: session.wave }, 'session started');
  };

  const quit = () => {
    if (closed) return;
    closed = true;
    session.asteroids = [];
    session.bullets = [];
    session.explosions = [];
    session.events = [];
    log.info({ score: session.score, tick: session.tick }, 'session closed');
  };

  return {
    get session() {
      return session;
    },
    get state() {
      return session.state;
    },
    get closed() {
      return closed;
    },
    tick,
    reset,
    quit,
    snapshot: () => snapshot(session, scores[0] ?? 0),
    highScores: () => scores.slice(),
  };
}
