import { resolveOptions } from './config/config.js';
import { OVERWRITE_HINT } from './config/defaults.js';
import type { AssertOptions } from './config/types.js';
import { diffLines, getDiffStats, hasChanges } from './diff/line-diff.js';
import { renderDiff } from './diff/render.js';
import type { DiffReport } from './diff/types.js';
import { ContentMismatchError } from './errors.js';
import { logger } from './utils/logger.js';

const LINE_ENDINGS_NOTE = '(contents differ only in line endings or trailing newline)';

/**
 * Builds the failure message for a mismatch
 * @param fixturePath - Fixture the actual text was compared against
 * @param report - Line diff of the fixture against the actual text
 * @param missing - The fixture did not exist
 * @param colorEnabled - Render the diff with colour codes
 */
export function formatMismatchMessage(
  fixturePath: string,
  report: DiffReport,
  missing: boolean,
  colorEnabled: boolean
): string {
  const stats = getDiffStats(report);
  const lines: string[] = [];

  if (missing) {
    lines.push(`Fixture not found: ${fixturePath} (+${stats.added})`);
  } else {
    lines.push(`Fixture mismatch: ${fixturePath} (-${stats.removed} +${stats.added})`);
  }

  if (report.length > 0) {
    lines.push(renderDiff(report, colorEnabled));
  }
  if (!missing && !hasChanges(report)) {
    lines.push(LINE_ENDINGS_NOTE);
  }

  lines.push('');
  lines.push(OVERWRITE_HINT);

  return lines.join('\n');
}

/**
 * Compares `actual` with the fixture at `fixturePath`, or regenerates the fixture in overwrite mode
 *
 * In verify mode the comparison is exact, trailing newline included. A missing
 * fixture counts as a mismatch against empty content and is never created.
 * @throws ContentMismatchError on mismatch in verify mode
 * @throws FixtureIoError when the fixture cannot be read or written
 */
export function assertContentsWith(fixturePath: string, actual: string, options: AssertOptions): void {
  const expected = options.store.load(fixturePath);

  if (options.mode === 'overwrite') {
    options.store.store(fixturePath, actual);
    return;
  }

  if (expected === actual) {
    logger.debug(`Fixture matches: ${fixturePath}`);
    return;
  }

  const missing = expected === null;
  const report = diffLines(expected ?? '', actual);
  const message = formatMismatchMessage(fixturePath, report, missing, options.colorEnabled);

  throw new ContentMismatchError(fixturePath, report, missing, message);
}

/**
 * Test-facing entry point: compares against the fixture using the mode from
 * `EXPECTORATE`, the file system and detected colour support
 * @param overrides - Replace any of the resolved options
 *
 * @example
 * assertContents('tests/output/report.txt', renderReport());
 */
export function assertContents(
  fixturePath: string,
  actual: string,
  overrides: Partial<AssertOptions> = {}
): void {
  assertContentsWith(fixturePath, actual, resolveOptions(overrides));
}
