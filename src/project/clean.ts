/**
 * Drop every backslash and newline. Automaton text that was wrapped with shell
 * line continuations collapses back to a single line.
 */
export function stripLineContinuations(text: string): string {
  return text.replace(/[\\\n]/g, '');
}
