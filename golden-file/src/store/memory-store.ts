import type { FixtureStore } from './types.js';

/**
 * In-memory fixture store for exercising comparison logic without touching the disk
 */
export class MemoryFixtureStore implements FixtureStore {
  private readonly files = new Map<string, string>();

  /** Number of `store` calls so far */
  writes = 0;

  constructor(initial: Record<string, string> = {}) {
    for (const [fixturePath, content] of Object.entries(initial)) {
      this.files.set(fixturePath, content);
    }
  }

  load(fixturePath: string): string | null {
    return this.files.get(fixturePath) ?? null;
  }

  store(fixturePath: string, content: string): void {
    this.writes++;
    this.files.set(fixturePath, content);
  }

  get(fixturePath: string): string | undefined {
    return this.files.get(fixturePath);
  }

  has(fixturePath: string): boolean {
    return this.files.has(fixturePath);
  }
}
