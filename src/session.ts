import { parseConfig, type ConfigInput } from './config';
import { startNextWave } from './spawn';
import { emptySession, type Session } from './state';

/**
 * Validates the config and opens a session on wave 1 with the ship at the centre.
 * Throws {@link InvalidConfigurationError} for a config that cannot be played.
 */
export function createSession(input: ConfigInput = {}): Session {
  const session = emptySession(parseConfig(input));
  startNextWave(session);
  return session;
}
