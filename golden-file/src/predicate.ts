import { assertContents } from './assert-contents.js';
import type { AssertOptions } from './config/types.js';
import { detectStderrColor } from './diff/render.js';
import { ContentMismatchError } from './errors.js';
import { logger } from './utils/logger.js';

/**
 * Boolean check of text against a fixture, for assertion helpers that take a predicate
 */
export class FilePredicate {
  constructor(
    readonly path: string,
    private readonly throwOnMismatch: boolean,
    private readonly overrides: Partial<AssertOptions> = {}
  ) {}

  /**
   * Compares `actual` with the fixture; overwrite mode regenerates it and returns true
   * @returns false on mismatch, after logging the diff, unless the predicate throws instead
   */
  evaluate(actual: string): boolean {
    try {
      assertContents(this.path, actual, this.overrides);
      return true;
    } catch (error) {
      if (error instanceof ContentMismatchError && !this.throwOnMismatch) {
        logger.error(error.message);
        return false;
      }
      throw error;
    }
  }

  toString(): string {
    return `matches file ${this.path}`;
  }
}

/**
 * Predicate that holds when the text equals the fixture at `path`
 *
 * To accept changes to the file, run with `EXPECTORATE=overwrite`.
 */
export function eqFile(path: string, overrides: Partial<AssertOptions> = {}): FilePredicate {
  // Mismatches are logged to stderr
  return new FilePredicate(path, false, { colorEnabled: detectStderrColor(), ...overrides });
}

/**
 * Like `eqFile`, but a mismatch throws `ContentMismatchError` instead of returning false
 */
export function eqFileOrThrow(path: string, overrides: Partial<AssertOptions> = {}): FilePredicate {
  return new FilePredicate(path, true, overrides);
}
