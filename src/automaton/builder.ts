import { parseAutomatonSource, type ParseSourceOptions } from '../parser/index';
import type { AlphabetNode, AutomatonSourceNode, NumArrayNode } from '../parser/ast';
import type { Location } from '../utils/types';
import { AutomatonSemanticError, type SemanticErrorCode } from './errors';
import {
  Automaton,
  EPSILON_MARKER,
  alphabetSize,
  type Alphabet,
  type AutomatonKind,
} from './model';

/**
 * What to do with a destination listed twice in one transition cell.
 * `collapse` treats the cell as a set; `reject` reports it.
 */
export type DuplicatePolicy = 'collapse' | 'reject';

export interface BuildOptions {
  duplicates?: DuplicatePolicy;
}

export interface ParseAutomatonOptions extends BuildOptions, ParseSourceOptions {}

function semanticError(code: SemanticErrorCode, field: string, message: string, location?: Location): AutomatonSemanticError {
  return new AutomatonSemanticError(message, { code, field, location });
}

function buildAlphabet(kind: AutomatonKind, node: AlphabetNode): Alphabet {
  if (node.type === 'SizedAlphabet') {
    if (node.size === 0) {
      throw semanticError('EMPTY_ALPHABET', 'alphabet', 'Alphabet size must be at least 1', node.location);
    }
    return { type: 'sized', size: node.size };
  }

  const letters = Array.from(node.letters);
  const seen = new Set<string>();
  for (const letter of letters) {
    if (seen.has(letter)) {
      throw semanticError('DUPLICATE_LETTER', 'alphabet', `Letter "${letter}" appears more than once in the alphabet`, node.location);
    }
    seen.add(letter);
  }
  if (kind === 'epsilon' && !seen.has(EPSILON_MARKER)) {
    throw semanticError(
      'MISSING_EPSILON_LETTER',
      'alphabet',
      `An epsilon automaton with named letters must reserve "${EPSILON_MARKER}" for epsilon moves`,
      node.location
    );
  }
  return { type: 'named', letters };
}

/** Read a state index array, checking every entry against the state count. */
function collectStates(
  node: NumArrayNode,
  stateCount: number,
  field: string,
  duplicates: DuplicatePolicy
): number[] {
  const states: number[] = [];
  const seen = new Set<number>();
  for (const item of node.items) {
    if (item.value >= stateCount) {
      throw semanticError(
        'STATE_OUT_OF_RANGE',
        field,
        `State ${item.value} in ${field} is out of range for an automaton with ${stateCount} states`,
        item.location
      );
    }
    if (seen.has(item.value)) {
      if (duplicates === 'reject') {
        throw semanticError('DUPLICATE_DESTINATION', field, `State ${item.value} is listed twice in ${field}`, item.location);
      }
      continue;
    }
    seen.add(item.value);
    states.push(item.value);
  }
  return states.sort((a, b) => a - b);
}

/**
 * Materialize a parse tree into an automaton, enforcing every invariant the
 * grammar cannot express. Pure: no I/O, no shared state.
 */
export function buildAutomaton(tree: AutomatonSourceNode, options: BuildOptions = {}): Automaton {
  const { core } = tree;
  const duplicates = options.duplicates ?? 'collapse';
  const kind = core.kind.value;
  const stateCount = core.stateCount.value;
  const alphabet = buildAlphabet(kind, core.alphabet);
  const letterCount = alphabetSize(alphabet);

  const rows = core.transitions.rows;
  if (rows.length !== stateCount) {
    throw semanticError(
      'STATE_COUNT_MISMATCH',
      'transitions',
      `Transition table has ${rows.length} state rows but the automaton declares ${stateCount} states`,
      core.transitions.location
    );
  }

  const transitions = rows.map((row, state) => {
    if (row.cells.length !== letterCount) {
      throw semanticError(
        'ALPHABET_SIZE_MISMATCH',
        `transitions[${state}]`,
        `State ${state} has ${row.cells.length} letter blocks but the alphabet has ${letterCount} letters`,
        row.location
      );
    }
    return row.cells.map((cell, letter) => {
      const field = `transitions[${state}][${letter}]`;
      const destinations = collectStates(cell, stateCount, field, duplicates);
      if (kind === 'det' && destinations.length > 1) {
        throw semanticError(
          'NONDETERMINISTIC_CELL',
          field,
          `Deterministic automaton has ${destinations.length} destinations from state ${state} on letter ${letter}`,
          cell.location
        );
      }
      return destinations;
    });
  });

  // Repeats in the initial and final lists carry no meaning under either policy.
  const initialStates = collectStates(core.initial, stateCount, 'initial', 'collapse');
  const finalStates = collectStates(core.final, stateCount, 'final', 'collapse');
  if (kind === 'det' && initialStates.length > 1) {
    throw semanticError(
      'MULTIPLE_INITIAL_STATES',
      'initial',
      `Deterministic automaton has ${initialStates.length} initial states`,
      core.initial.location
    );
  }

  return new Automaton({ kind, stateCount, alphabet, transitions, initialStates, finalStates });
}

/** Parse and build in one step. */
export function parseAutomaton(text: string, options: ParseAutomatonOptions = {}): Automaton {
  return buildAutomaton(parseAutomatonSource(text, { grammarSource: options.grammarSource }), options);
}
