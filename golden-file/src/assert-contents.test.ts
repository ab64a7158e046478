import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { fileURLToPath } from 'url';
import { assertContents, assertContentsWith, formatMismatchMessage } from './assert-contents.js';
import type { AssertOptions } from './config/types.js';
import { ContentMismatchError, FixtureIoError } from './errors.js';
import { MemoryFixtureStore } from './store/memory-store.js';
import type { FixtureStore } from './store/types.js';

const HINT = 'Set EXPECTORATE=overwrite to accept these changes.';
const REPORT_FIXTURE = fileURLToPath(new URL('../fixtures/report.txt', import.meta.url));

function captureMismatch(fn: () => void): ContentMismatchError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ContentMismatchError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a ContentMismatchError');
}

function verify(store: FixtureStore): AssertOptions {
  return { mode: 'verify', store, colorEnabled: false };
}

function overwrite(store: FixtureStore): AssertOptions {
  return { mode: 'overwrite', store, colorEnabled: false };
}

describe('assertContentsWith', () => {
  describe('verify mode', () => {
    it('should pass silently on an exact match', () => {
      const store = new MemoryFixtureStore({ 'out.txt': 'a\nb\n' });

      expect(() => assertContentsWith('out.txt', 'a\nb\n', verify(store))).not.toThrow();
      expect(store.writes).toBe(0);
    });

    it('should report changed lines', () => {
      const store = new MemoryFixtureStore({ 'out.txt': 'a\nb\nc\n' });

      const error = captureMismatch(() => assertContentsWith('out.txt', 'a\nx\nc\n', verify(store)));

      expect(error.path).toBe('out.txt');
      expect(error.missing).toBe(false);
      expect(error.report).toEqual([
        { tag: 'unchanged', text: 'a' },
        { tag: 'removed', text: 'b' },
        { tag: 'added', text: 'x' },
        { tag: 'unchanged', text: 'c' }
      ]);
      expect(error.message).toBe(`Fixture mismatch: out.txt (-1 +1)\n a\n-b\n+x\n c\n\n${HINT}`);
    });

    it('should treat a missing fixture as empty and show every line as added', () => {
      const store = new MemoryFixtureStore();

      const error = captureMismatch(() => assertContentsWith('new.txt', 'one\ntwo\n', verify(store)));

      expect(error.missing).toBe(true);
      expect(error.report.every(line => line.tag === 'added')).toBe(true);
      expect(error.report.map(line => line.text)).toEqual(['one', 'two']);
      expect(error.message).toBe(`Fixture not found: new.txt (+2)\n+one\n+two\n\n${HINT}`);
    });

    it('should never create a missing fixture', () => {
      const store = new MemoryFixtureStore();

      captureMismatch(() => assertContentsWith('new.txt', 'content\n', verify(store)));

      expect(store.writes).toBe(0);
      expect(store.has('new.txt')).toBe(false);
    });

    it('should fail on a trailing newline difference', () => {
      const store = new MemoryFixtureStore({ 'out.txt': 'a\nb\n' });

      const error = captureMismatch(() => assertContentsWith('out.txt', 'a\nb', verify(store)));

      expect(error.message).toBe(
        `Fixture mismatch: out.txt (-0 +0)\n a\n b\n(contents differ only in line endings or trailing newline)\n\n${HINT}`
      );
    });

    it('should fail on a line ending difference', () => {
      const store = new MemoryFixtureStore({ 'out.txt': 'a\r\n' });

      expect(() => assertContentsWith('out.txt', 'a\n', verify(store))).toThrow(ContentMismatchError);
    });

    it('should colour the diff when enabled', () => {
      const store = new MemoryFixtureStore({ 'out.txt': 'old\n' });

      const error = captureMismatch(() =>
        assertContentsWith('out.txt', 'new\n', { mode: 'verify', store, colorEnabled: true })
      );

      expect(error.message).toBe(
        `Fixture mismatch: out.txt (-1 +1)\n\u001b[31m-old\u001b[39m\n\u001b[32m+new\u001b[39m\n\n${HINT}`
      );
    });
  });

  describe('overwrite mode', () => {
    it('should replace differing content without comparing', () => {
      const store = new MemoryFixtureStore({ 'out.txt': 'stale\ncontent\n' });

      expect(() => assertContentsWith('out.txt', 'fresh\n', overwrite(store))).not.toThrow();
      expect(store.get('out.txt')).toBe('fresh\n');
    });

    it('should write even when the content already matches', () => {
      const store = new MemoryFixtureStore({ 'out.txt': 'same\n' });

      assertContentsWith('out.txt', 'same\n', overwrite(store));

      expect(store.writes).toBe(1);
    });

    it('should create a missing fixture', () => {
      const store = new MemoryFixtureStore();

      assertContentsWith('new.txt', 'created\n', overwrite(store));

      expect(store.get('new.txt')).toBe('created\n');
    });

    it('should be idempotent', () => {
      const store = new MemoryFixtureStore();

      assertContentsWith('out.txt', 'value\n', overwrite(store));
      expect(store.get('out.txt')).toBe('value\n');

      assertContentsWith('out.txt', 'value\n', overwrite(store));
      expect(store.get('out.txt')).toBe('value\n');
      expect(store.writes).toBe(2);
    });

    it('should be followed by a passing verify run', () => {
      const store = new MemoryFixtureStore({ 'out.txt': 'before\n' });

      assertContentsWith('out.txt', 'after\nand more\n', overwrite(store));

      expect(() => assertContentsWith('out.txt', 'after\nand more\n', verify(store))).not.toThrow();
    });
  });

  it('should propagate load failures in either mode', () => {
    const failure = new FixtureIoError('out.txt', 'read', new Error('permission denied'));
    let writes = 0;
    const store: FixtureStore = {
      load: () => {
        throw failure;
      },
      store: () => {
        writes++;
      }
    };

    expect(() => assertContentsWith('out.txt', 'x', verify(store))).toThrow(failure);
    expect(() => assertContentsWith('out.txt', 'x', overwrite(store))).toThrow(failure);
    expect(writes).toBe(0);
  });
});

describe('formatMismatchMessage', () => {
  it('should report an empty fixture against empty output without a diff body', () => {
    expect(formatMismatchMessage('empty.txt', [], true, false)).toBe(`Fixture not found: empty.txt (+0)\n\n${HINT}`);
  });
});

describe('assertContents', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'golden-file-assert-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should match a committed fixture', () => {
    const actual = 'first line of the report\nsecond line of the report\n';

    expect(() => assertContents(REPORT_FIXTURE, actual, { mode: 'verify' })).not.toThrow();
  });

  it('should reject output that differs from a committed fixture', () => {
    const actual = 'first line of the report\nsecond line changed\n';

    const error = captureMismatch(() => assertContents(REPORT_FIXTURE, actual, { mode: 'verify', colorEnabled: false }));

    expect(error.report).toEqual([
      { tag: 'unchanged', text: 'first line of the report' },
      { tag: 'removed', text: 'second line of the report' },
      { tag: 'added', text: 'second line changed' }
    ]);
  });

  it('should create missing directories in overwrite mode', async () => {
    const fixturePath = path.join(tempDir, 'generated', 'output.txt');

    assertContents(fixturePath, 'generated\n', { mode: 'overwrite' });

    expect(await fs.readFile(fixturePath, 'utf-8')).toBe('generated\n');
    expect(() => assertContents(fixturePath, 'generated\n', { mode: 'verify' })).not.toThrow();
  });

  it('should not create directories in verify mode', async () => {
    const fixturePath = path.join(tempDir, 'generated', 'output.txt');

    const error = captureMismatch(() => assertContents(fixturePath, 'generated\n', { mode: 'verify', colorEnabled: false }));

    expect(error.missing).toBe(true);
    expect(await fs.readdir(tempDir)).toEqual([]);
  });
});
