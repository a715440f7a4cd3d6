import type { Session } from './state';

export const Achievement = {
  FirstKill: 'FirstKill',
  PerfectWave: 'PerfectWave',
  Survivor: 'Survivor',
} as const;
export type Achievement = (typeof Achievement)[keyof typeof Achievement];

export const achievementTitle: Record<Achievement, string> = {
  [Achievement.FirstKill]: 'First Kill',
  [Achievement.PerfectWave]: 'Perfect Wave',
  [Achievement.Survivor]: 'Survivor',
};

export type SessionStats = {
  asteroidsDestroyed: number;
  wavesCompleted: number;
  timeSurvived: number; // seconds of play
  perfectWave: boolean; // no life lost since the current wave started
};

export type Unlock = {
  readonly achievement: Achievement;
  readonly at: number; // stats.timeSurvived when earned
};

export function emptyStats(): SessionStats {
  return { asteroidsDestroyed: 0, wavesCompleted: 0, timeSurvived: 0, perfectWave: true };
}

function unlock(session: Session, achievement: Achievement): void {
  if (session.achievements.some((u) => u.achievement === achievement)) return;
  session.achievements.push({ achievement, at: session.stats.timeSurvived });
  session.events.push({ type: 'achievement-unlocked', achievement });
}

export function recordPlayTime(session: Session, dt: number): void {
  session.stats.timeSurvived += dt;
  if (session.stats.timeSurvived >= session.config.survivorSeconds) unlock(session, Achievement.Survivor);
}

export function recordKill(session: Session): void {
  session.stats.asteroidsDestroyed += 1;
  unlock(session, Achievement.FirstKill);
}

export function recordShipLost(session: Session): void {
  session.stats.perfectWave = false;
}

export function recordWaveCleared(session: Session): void {
  session.stats.wavesCompleted += 1;
  if (session.stats.perfectWave) unlock(session, Achievement.PerfectWave);
  session.stats.perfectWave = true;
}
