/**
 * Reads and writes fixture content. All file-system access of a comparison goes through here.
 */
export interface FixtureStore {
  /**
   * Reads the whole fixture
   * @returns The content, or null when no file exists at `path`
   */
  load(path: string): string | null;

  /**
   * Replaces the fixture with `content`, creating missing parent directories
   */
  store(path: string, content: string): void;
}
