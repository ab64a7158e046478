import chalk, { Chalk, chalkStderr } from 'chalk';
import type { DiffLine, DiffReport, DiffTag } from './types.js';

const MARKERS: Record<DiffTag, string> = {
  unchanged: ' ',
  removed: '-',
  added: '+'
};

// Whether to colour at all is decided by the caller
const colors = new Chalk({ level: 1 });

/**
 * Default colour capability: whether chalk detected colour support on stdout
 */
export function detectColor(): boolean {
  return chalk.level > 0;
}

/**
 * Colour capability of stderr, for text that goes through `console.error`
 */
export function detectStderrColor(): boolean {
  return chalkStderr.level > 0;
}

function renderLine(line: DiffLine, colorEnabled: boolean): string {
  const text = `${MARKERS[line.tag]}${line.text}`;
  if (!colorEnabled) {
    return text;
  }

  switch (line.tag) {
    case 'removed':
      return colors.red(text);
    case 'added':
      return colors.green(text);
    case 'unchanged':
      return text;
  }
}

/**
 * Renders a diff report as unified-diff style text
 * @param report - Output of `diffLines`
 * @param colorEnabled - Colour removed lines red and added lines green
 * @returns One line per record, joined with `\n`
 *
 * @example
 * renderDiff([{ tag: 'unchanged', text: 'a' }, { tag: 'added', text: 'b' }], false)
 * // Returns: ' a\n+b'
 */
export function renderDiff(report: DiffReport, colorEnabled: boolean): string {
  return report.map(line => renderLine(line, colorEnabled)).join('\n');
}
