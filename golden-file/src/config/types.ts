import type { FixtureStore } from '../store/types.js';

/**
 * `verify` compares against the fixture, `overwrite` regenerates it
 */
export type Mode = 'verify' | 'overwrite';

/**
 * Everything a comparison depends on besides its inputs
 */
export interface AssertOptions {
  /** Whether to compare or regenerate */
  mode: Mode;

  /** Where fixture content is read from and written to */
  store: FixtureStore;

  /** Whether the rendered diff carries colour codes */
  colorEnabled: boolean;
}
