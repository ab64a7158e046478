import { detectColor } from '../diff/render.js';
import { fileFixtureStore } from '../store/fixture-store.js';
import { logger } from '../utils/logger.js';
import { MODE_ENV_VAR, OVERWRITE_VALUE } from './defaults.js';
import type { AssertOptions, Mode } from './types.js';

let cachedMode: Mode | undefined;

/**
 * Derives the mode from an environment
 * @param env - Defaults to the process environment
 */
export function resolveMode(env: NodeJS.ProcessEnv = process.env): Mode {
  return env[MODE_ENV_VAR] === OVERWRITE_VALUE ? 'overwrite' : 'verify';
}

/**
 * The mode of this process, read from the environment on first use
 */
export function currentMode(): Mode {
  if (cachedMode === undefined) {
    cachedMode = resolveMode();
    logger.debug(`${MODE_ENV_VAR} resolved to ${cachedMode} mode`);
  }
  return cachedMode;
}

/**
 * Builds the options for a comparison: the process mode, the file-system
 * store and detected colour support, with any overrides applied on top
 */
export function resolveOptions(overrides: Partial<AssertOptions> = {}): AssertOptions {
  return {
    mode: overrides.mode ?? currentMode(),
    store: overrides.store ?? fileFixtureStore,
    colorEnabled: overrides.colorEnabled ?? detectColor()
  };
}
