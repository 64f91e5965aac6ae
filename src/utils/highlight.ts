import type { Location, Position } from './types';
import chalk from 'chalk';

/**
 * Source excerpt around `location` with a caret line under it. A range that
 * stays on one line is underlined `^~~~`; otherwise only the start is marked.
 * `context` lines are shown on each side.
 */
export function highlightSnippet(input: string, location: Location, useColor = true, context = 1): string {
  const lines = input.split('\n');
  const { line: lineNum, column: colNum } = location.start;
  if (lineNum < 1 || lineNum > lines.length) return '';

  const c = new chalk.Instance({ level: useColor ? 1 : 0 });
  const first = Math.max(1, lineNum - context);
  const last = Math.min(lines.length, lineNum + context);
  const gutterWidth = String(last).length;
  const gutter = (n: number) => `${String(n).padStart(gutterWidth)}: `;

  const width = location.end.line === lineNum ? Math.max(1, location.end.column - colNum) : 1;
  const pointer = ' '.repeat(gutter(lineNum).length + colNum - 1) + '^' + '~'.repeat(width - 1);

  const resultLines: string[] = [];
  for (let n = first; n <= last; n++) {
    const text = lines[n - 1];
    if (n === lineNum) {
      resultLines.push(gutter(n) + c.redBright(text));
      resultLines.push(c.yellow(pointer));
    } else {
      resultLines.push(gutter(n) + text);
    }
  }
  return resultLines.join('\n');
}

/**
 * Get line and column information for a given offset
 */
export function getLocationFromOffset(input: string, offset: number): Position {
  const lines = input.substring(0, offset).split('\n');
  const line = lines.length;
  const column = lines[lines.length - 1].length + 1;

  return { line, column, offset };
}
