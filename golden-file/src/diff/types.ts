/**
 * How a line relates the expected text to the actual text
 */
export type DiffTag = 'unchanged' | 'removed' | 'added';

/**
 * A single line of a diff report
 */
export interface DiffLine {
  /** `removed` lines exist only in the expected text, `added` only in the actual text */
  tag: DiffTag;

  /** Line text without its line terminator */
  text: string;
}

/**
 * Ordered line-level comparison of expected against actual text
 */
export type DiffReport = DiffLine[];

/**
 * Line counts per tag
 */
export interface DiffStats {
  unchanged: number;
  removed: number;
  added: number;
}
