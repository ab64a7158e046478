import type { DiffReport } from './diff/types.js';

export type FixtureOperation = 'read' | 'decode' | 'mkdir' | 'write';

const OPERATION_VERBS: Record<FixtureOperation, string> = {
  read: 'read',
  decode: 'decode',
  mkdir: 'create the directory for',
  write: 'write'
};

/**
 * Narrows an unknown thrown value to a Node errno exception, optionally with a given code
 */
export function isErrnoException(error: unknown, code?: string): error is NodeJS.ErrnoException {
  if (!(error instanceof Error) || !('code' in error)) {
    return false;
  }
  return code === undefined || error.code === code;
}

/**
 * Thrown when the actual text does not match the fixture in verify mode
 */
export class ContentMismatchError extends Error {
  override readonly name = 'ContentMismatchError';

  constructor(
    readonly path: string,
    readonly report: DiffReport,
    /** The fixture file did not exist */
    readonly missing: boolean,
    message: string
  ) {
    super(message);
  }
}

/**
 * Thrown when reading or writing a fixture fails for any reason other than the file being absent
 */
export class FixtureIoError extends Error {
  override readonly name = 'FixtureIoError';

  constructor(
    readonly path: string,
    readonly operation: FixtureOperation,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Unable to ${OPERATION_VERBS[operation]} fixture ${path}: ${reason}`, { cause });
  }
}
