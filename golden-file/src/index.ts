export { assertContents, assertContentsWith, formatMismatchMessage } from './assert-contents.js';
export { eqFile, eqFileOrThrow, FilePredicate } from './predicate.js';
export { currentMode, resolveMode, resolveOptions } from './config/config.js';
export { MODE_ENV_VAR, OVERWRITE_VALUE } from './config/defaults.js';
export type { AssertOptions, Mode } from './config/types.js';
export { diffLines, getDiffStats, hasChanges, splitLines } from './diff/line-diff.js';
export { detectColor, detectStderrColor, renderDiff } from './diff/render.js';
export type { DiffLine, DiffReport, DiffStats, DiffTag } from './diff/types.js';
export { fileFixtureStore, loadFixture, storeFixture, tempPathFor } from './store/fixture-store.js';
export { MemoryFixtureStore } from './store/memory-store.js';
export type { FixtureStore } from './store/types.js';
export { ContentMismatchError, FixtureIoError, isErrnoException } from './errors.js';
export type { FixtureOperation } from './errors.js';
export { logger } from './utils/logger.js';
