import type { Location } from '../utils/types';

export type AutomatonErrorKind = 'syntax' | 'semantic' | 'runtime' | 'input' | 'config';

/**
 * Base class of every failure the engine reports. `kind` lets callers branch on
 * the failure category without `instanceof` chains.
 */
export abstract class AutomatonError extends Error {
  abstract readonly kind: AutomatonErrorKind;
}

export interface SyntaxErrorDetails {
  location: Location;
  expected: string[];
  found: string | null;
}

/** The text does not match the automaton grammar. */
export class AutomatonSyntaxError extends AutomatonError {
  readonly kind = 'syntax';
  readonly location: Location;
  readonly expected: string[];
  readonly found: string | null;

  constructor(message: string, details: SyntaxErrorDetails) {
    super(message);
    this.name = 'AutomatonSyntaxError';
    this.location = details.location;
    this.expected = details.expected;
    this.found = details.found;
  }
}

export type SemanticErrorCode =
  | 'STATE_COUNT_MISMATCH' // transition rows != declared state count
  | 'ALPHABET_SIZE_MISMATCH' // letter blocks != alphabet size
  | 'STATE_OUT_OF_RANGE' // index >= state count
  | 'NONDETERMINISTIC_CELL' // det cell with several destinations
  | 'MULTIPLE_INITIAL_STATES' // det automaton with several initial states
  | 'DUPLICATE_DESTINATION' // repeated destination under the reject policy
  | 'DUPLICATE_LETTER' // named alphabet repeats a letter
  | 'MISSING_EPSILON_LETTER' // epsilon automaton over letters without '@'
  | 'EMPTY_ALPHABET'; // sized alphabet of size 0

export interface SemanticErrorDetails {
  code: SemanticErrorCode;
  /** Path of the offending field, e.g. `transitions[2][0]` or `final`. */
  field: string;
  location?: Location;
}

/** The text parses but describes an impossible automaton. */
export class AutomatonSemanticError extends AutomatonError {
  readonly kind = 'semantic';
  readonly code: SemanticErrorCode;
  readonly field: string;
  readonly location?: Location;

  constructor(message: string, details: SemanticErrorDetails) {
    super(message);
    this.name = 'AutomatonSemanticError';
    this.code = details.code;
    this.field = details.field;
    this.location = details.location;
  }
}

/**
 * Execution was handed something that is not a letter index at all.
 * Integer indices outside the alphabet are not errors: they reject.
 */
export class AutomatonRuntimeError extends AutomatonError {
  readonly kind = 'runtime';
  readonly index: number;

  constructor(message: string, index: number) {
    super(message);
    this.name = 'AutomatonRuntimeError';
    this.index = index;
  }
}

/** An input word could not be mapped onto the automaton's alphabet. */
export class AutomatonInputError extends AutomatonError {
  readonly kind = 'input';
  readonly column: number;

  constructor(message: string, column: number) {
    super(message);
    this.name = 'AutomatonInputError';
    this.column = column;
  }
}

export class AutomatonConfigError extends AutomatonError {
  readonly kind = 'config';
  readonly problems: string[];

  constructor(source: string, problems: string[]) {
    super(`Invalid ${source}:\n${problems.map((problem) => `  - ${problem}`).join('\n')}`);
    this.name = 'AutomatonConfigError';
    this.problems = problems;
  }
}
