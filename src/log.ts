import { pino, type Logger } from 'pino';

export type { Logger };

const level = typeof process !== 'undefined' ? (process.env.LOG_LEVEL ?? 'info') : 'info';

export const log: Logger = pino({ name: 'asteroids', level });
