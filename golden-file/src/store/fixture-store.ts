import fs from 'fs';
import path from 'path';
import { threadId } from 'worker_threads';
import { FixtureIoError, isErrnoException } from '../errors.js';
import { logger } from '../utils/logger.js';
import type { FixtureStore } from './types.js';

const utf8 = new TextDecoder('utf-8', { fatal: true });

let tempCounter = 0;

/**
 * Temporary sibling for a write, unique per process, thread and call
 */
export function tempPathFor(fixturePath: string): string {
  tempCounter++;
  const suffix = `${process.pid}.${threadId}.${tempCounter}`;
  return path.join(path.dirname(fixturePath), `.${path.basename(fixturePath)}.${suffix}.tmp`);
}

/**
 * Reads a fixture as strict UTF-8
 * @returns The content, or null when the file does not exist
 * @throws FixtureIoError for any other failure, including invalid UTF-8
 */
export function loadFixture(fixturePath: string): string | null {
  let bytes: Buffer;
  try {
    bytes = fs.readFileSync(fixturePath);
  } catch (error) {
    if (isErrnoException(error, 'ENOENT')) {
      logger.debug(`Fixture not found: ${fixturePath}`);
      return null;
    }
    throw new FixtureIoError(fixturePath, 'read', error);
  }

  try {
    return utf8.decode(bytes);
  } catch (error) {
    throw new FixtureIoError(fixturePath, 'decode', error);
  }
}

/**
 * Replaces a fixture with new content
 *
 * Missing parent directories are created first. The content goes to a
 * temporary sibling that is then renamed over the fixture, so a failed
 * write never leaves a truncated fixture behind.
 * @throws FixtureIoError when directory creation or the write fails
 */
export function storeFixture(fixturePath: string, content: string): void {
  const dir = path.dirname(fixturePath);
  try {
    fs.mkdirSync(dir, { recursive: true });
  } catch (error) {
    throw new FixtureIoError(fixturePath, 'mkdir', error);
  }

  const tempPath = tempPathFor(fixturePath);
  try {
    fs.writeFileSync(tempPath, content, 'utf-8');
    fs.renameSync(tempPath, fixturePath);
  } catch (error) {
    removeTempFile(tempPath);
    throw new FixtureIoError(fixturePath, 'write', error);
  }

  logger.debug(`Wrote fixture: ${fixturePath}`);
}

function removeTempFile(tempPath: string): void {
  try {
    fs.rmSync(tempPath, { force: true });
  } catch (error) {
    logger.warn(`Could not remove temporary file ${tempPath}:`, error);
  }
}

/**
 * Fixture store backed by the local file system
 */
export const fileFixtureStore: FixtureStore = {
  load: loadFixture,
  store: storeFixture
};
