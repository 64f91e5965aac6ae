import type { WrapperStyle } from '../parser/ast';
import { parseAutomaton, type BuildOptions } from './builder';
import type { Alphabet, Automaton } from './model';

export interface EncodeOptions {
  /** `brace` gives `{...}`, `call` gives `Automaton(...);`. */
  wrapper?: WrapperStyle;
}

function encodeStates(states: readonly number[]): string {
  return `[${states.join(', ')}]`;
}

function encodeAlphabet(alphabet: Alphabet): string {
  return alphabet.type === 'sized' ? String(alphabet.size) : `"${alphabet.letters.join('')}"`;
}

/**
 * Canonical text for an automaton: single line, `", "` between items, sorted
 * duplicate-free state lists.
 */
export function reencode(automaton: Automaton, options: EncodeOptions = {}): string {
  const table = automaton.transitions
    .map((row) => `[${row.map(encodeStates).join(', ')}]`)
    .join(', ');
  const core = [
    `"${automaton.kind}"`,
    String(automaton.stateCount),
    encodeAlphabet(automaton.alphabet),
    `[${table}]`,
    encodeStates(automaton.initialStates),
    encodeStates(automaton.finalStates),
  ].join(', ');
  return options.wrapper === 'call' ? `Automaton(${core});` : `{${core}}`;
}

function sameStates(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((state, i) => state === b[i]);
}

function sameAlphabet(a: Alphabet, b: Alphabet): boolean {
  if (a.type === 'sized' && b.type === 'sized') return a.size === b.size;
  if (a.type === 'named' && b.type === 'named') return sameStrings(a.letters, b.letters);
  return false;
}

function sameStrings(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((letter, i) => letter === b[i]);
}

/**
 * Same kind, state count, alphabet variant and contents, transition sets, and
 * initial and final sets. State lists are normalized on construction, so
 * element-wise comparison is set comparison.
 */
export function structurallyEqual(a: Automaton, b: Automaton): boolean {
  return (
    a.kind === b.kind &&
    a.stateCount === b.stateCount &&
    sameAlphabet(a.alphabet, b.alphabet) &&
    a.transitions.length === b.transitions.length &&
    a.transitions.every((row, state) => {
      const other = b.transitions[state];
      return row.length === other.length && row.every((cell, letter) => sameStates(cell, other[letter]));
    }) &&
    sameStates(a.initialStates, b.initialStates) &&
    sameStates(a.finalStates, b.finalStates)
  );
}

export interface RoundTripReport {
  equal: boolean;
  canonical: string;
  reparsed: Automaton;
}

/** Encode, parse the encoding back, and compare with the original. */
export function verifyRoundTrip(automaton: Automaton, options: EncodeOptions & BuildOptions = {}): RoundTripReport {
  const canonical = reencode(automaton, options);
  const reparsed = parseAutomaton(canonical, { duplicates: options.duplicates, grammarSource: 'canonical encoding' });
  return { equal: structurallyEqual(automaton, reparsed), canonical, reparsed };
}

/** Round-trip check starting from source text. */
export function verifyEncoding(text: string, options: EncodeOptions & BuildOptions = {}): RoundTripReport {
  return verifyRoundTrip(parseAutomaton(text, { duplicates: options.duplicates }), options);
}
