import { EpsilonClosure } from './closure';
import { StateSet } from './state-set';

export type AutomatonKind = 'det' | 'nondet' | 'epsilon';

/** Letter reserved for epsilon moves in a named alphabet. */
export const EPSILON_MARKER = '@';

/** Letter index reserved for epsilon moves in a sized alphabet. */
export const SIZED_EPSILON_LETTER = 0;

export type Alphabet =
  | { readonly type: 'sized'; readonly size: number }
  | { readonly type: 'named'; readonly letters: readonly string[] };

export function alphabetSize(alphabet: Alphabet): number {
  return alphabet.type === 'sized' ? alphabet.size : alphabet.letters.length;
}

/**
 * The letter index that carries epsilon moves, or `undefined` when the kind has
 * none. A named alphabet without `@` has no epsilon letter; the builder rejects
 * that combination for epsilon automata.
 */
export function epsilonLetterOf(kind: AutomatonKind, alphabet: Alphabet): number | undefined {
  if (kind !== 'epsilon') return undefined;
  if (alphabet.type === 'sized') return SIZED_EPSILON_LETTER;
  const index = alphabet.letters.indexOf(EPSILON_MARKER);
  return index === -1 ? undefined : index;
}

export type TransitionTable = ReadonlyArray<ReadonlyArray<readonly number[]>>;

export interface AutomatonDefinition {
  kind: AutomatonKind;
  stateCount: number;
  alphabet: Alphabet;
  /** `transitions[state][letter]` lists destination states. */
  transitions: TransitionTable;
  initialStates: readonly number[];
  finalStates: readonly number[];
}

function normalizeStates(states: readonly number[]): readonly number[] {
  return Object.freeze(Array.from(new Set(states)).sort((a, b) => a - b));
}

function freezeAlphabet(alphabet: Alphabet): Alphabet {
  return alphabet.type === 'sized'
    ? Object.freeze({ type: 'sized', size: alphabet.size })
    : Object.freeze({ type: 'named', letters: Object.freeze([...alphabet.letters]) });
}

/**
 * An immutable finite automaton. Destination lists, initial and final states are
 * sorted and duplicate-free. The constructor trusts its definition;
 * `buildAutomaton` is the validating way in for parsed text.
 */
export class Automaton {
  readonly kind: AutomatonKind;
  readonly stateCount: number;
  readonly alphabet: Alphabet;
  readonly alphabetSize: number;
  readonly epsilonLetter: number | undefined;
  readonly transitions: TransitionTable;
  readonly initialStates: readonly number[];
  readonly finalStates: readonly number[];

  private readonly initialSet: StateSet;
  private readonly finalSet: StateSet;
  private readonly epsilonClosure: EpsilonClosure | undefined;

  constructor(definition: AutomatonDefinition) {
    this.kind = definition.kind;
    this.stateCount = definition.stateCount;
    this.alphabet = freezeAlphabet(definition.alphabet);
    this.alphabetSize = alphabetSize(this.alphabet);
    this.epsilonLetter = epsilonLetterOf(this.kind, this.alphabet);
    this.transitions = Object.freeze(
      definition.transitions.map((row) => Object.freeze(row.map((cell) => normalizeStates(cell))))
    );
    this.initialStates = normalizeStates(definition.initialStates);
    this.finalStates = normalizeStates(definition.finalStates);

    this.initialSet = StateSet.of(this.stateCount, this.initialStates);
    this.finalSet = StateSet.of(this.stateCount, this.finalStates);

    const epsilon = this.epsilonLetter;
    this.epsilonClosure = epsilon === undefined
      ? undefined
      : EpsilonClosure.compute(this.stateCount, (state) => this.transitions[state][epsilon]);
    this.epsilonClosure?.closeInPlace(this.initialSet);
  }

  destinations(state: number, letter: number): readonly number[] {
    return this.transitions[state][letter];
  }

  isFinal(state: number): boolean {
    return this.finalSet.has(state);
  }

  /** True for integer letter indices that input may consume. */
  isConsumable(symbol: number): boolean {
    return Number.isInteger(symbol) && symbol >= 0 && symbol < this.alphabetSize && symbol !== this.epsilonLetter;
  }

  /** A fresh active set holding the initial states, epsilon-closed where applicable. */
  initialActiveSet(): StateSet {
    return this.initialSet.clone();
  }

  intersectsFinal(states: StateSet): boolean {
    return states.intersects(this.finalSet);
  }

  /** Epsilon closure of `states`; a copy of `states` for kinds without epsilon moves. */
  closure(states: StateSet): StateSet {
    return this.epsilonClosure ? this.epsilonClosure.closure(states) : states.clone();
  }

  closeInPlace(states: StateSet): void {
    this.epsilonClosure?.closeInPlace(states);
  }

  /** Epsilon closure of one state, ascending. */
  closureOf(state: number): number[] {
    return this.epsilonClosure ? this.epsilonClosure.of(state) : [state];
  }

  /** Letter text for an index: the character for named alphabets, the index otherwise. */
  letterName(letter: number): string {
    return this.alphabet.type === 'named' ? this.alphabet.letters[letter] ?? String(letter) : String(letter);
  }
}
