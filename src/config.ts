import { z } from 'zod';
import { InvalidConfigurationError } from './errors';

export const Difficulty = { Easy: 'easy', Normal: 'normal', Hard: 'hard' } as const;
export type Difficulty = (typeof Difficulty)[keyof typeof Difficulty];

export const asteroidSpeedMultiplier: Record<Difficulty, number> = {
  [Difficulty.Easy]: 0.7,
  [Difficulty.Normal]: 1,
  [Difficulty.Hard]: 1.3,
};

export const maxSeed = 2 ** 32 - 1;

const positive = z.number().finite().positive();
const count = z.number().int().positive();

export const configSchema = z
  .object({
    width: positive.default(800),
    height: positive.default(600),
    // mulberry32 keeps 32 bits of state
    seed: z.number().int().min(0).max(maxSeed).default(1),
    difficulty: z.nativeEnum(Difficulty).default(Difficulty.Normal),

    initialLives: z.number().int().nonnegative().default(3),
    initialAsteroidCount: count.default(3),

    shipRadius: positive.default(12),
    thrustAccel: positive.default(300),
    maxSpeed: positive.default(400),
    angularSpeed: positive.default(4.5),

    bulletSpeed: positive.default(500),
    bulletRadius: positive.default(2),
    bulletTtlTicks: count.default(60),
    fireCooldownTicks: z.number().int().nonnegative().default(15),
    maxActiveBullets: count.default(10),

    invulnerabilityTicks: z.number().int().nonnegative().default(180),
    safeSpawnRadius: z.number().finite().nonnegative().default(150),

    largeAsteroidRadius: positive.default(40),
    asteroidSpeedMin: z.number().finite().nonnegative().default(30),
    asteroidSpeedMax: z.number().finite().nonnegative().default(80),
    splitSpeedFactor: positive.default(1.2),

    maxDt: positive.default(0.05),
    survivorSeconds: positive.default(300),
  })
  .superRefine((config, ctx) => {
    if (config.asteroidSpeedMin > config.asteroidSpeedMax) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['asteroidSpeedMin'],
        message: 'must not exceed asteroidSpeedMax',
      });
    }
    // edge spawns sit at least half the short side away from the centre
    if (config.safeSpawnRadius + config.largeAsteroidRadius >= Math.min(config.width, config.height) / 2) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['safeSpawnRadius'],
        message: 'safeSpawnRadius + largeAsteroidRadius must be less than half the shorter screen side',
      });
    }
  });

export type Config = z.output<typeof configSchema>;
export type ConfigInput = z.input<typeof configSchema>;

export function parseConfig(input: ConfigInput = {}): Config {
  const result = configSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidConfigurationError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return result.data;
}
