import { diffArrays } from 'diff';
import type { DiffLine, DiffReport, DiffStats } from './types.js';

/**
 * Splits text into lines, treating CRLF as LF and ignoring a single trailing newline
 * @example
 * splitLines('a\r\nb\n') // ['a', 'b']
 * splitLines('') // []
 */
export function splitLines(text: string): string[] {
  const normalized = text.replace(/\r\n/g, '\n');
  if (normalized.length === 0) {
    return [];
  }

  const body = normalized.endsWith('\n') ? normalized.slice(0, -1) : normalized;
  return body.split('\n');
}

/**
 * Computes a minimal line-based edit script turning expected into actual
 * @param expected - Reference text (the fixture)
 * @param actual - Freshly computed text
 * @returns One record per line, removals ahead of additions within a changed hunk
 */
export function diffLines(expected: string, actual: string): DiffReport {
  const changes = diffArrays(splitLines(expected), splitLines(actual));
  const report: DiffReport = [];

  for (const change of changes) {
    const tag: DiffLine['tag'] = change.added ? 'added' : change.removed ? 'removed' : 'unchanged';
    for (const text of change.value) {
      report.push({ tag, text });
    }
  }

  return report;
}

/**
 * Counts the lines of a report per tag
 */
export function getDiffStats(report: DiffReport): DiffStats {
  const stats: DiffStats = { unchanged: 0, removed: 0, added: 0 };
  for (const line of report) {
    stats[line.tag]++;
  }
  return stats;
}

/**
 * Whether the report contains any removed or added line
 */
export function hasChanges(report: DiffReport): boolean {
  return report.some(line => line.tag !== 'unchanged');
}
