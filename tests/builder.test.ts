// tests/builder.test.ts
import {
  AutomatonSemanticError,
  buildAutomaton,
  parseAutomaton,
  parseAutomatonSource,
  type ParseAutomatonOptions,
  type SemanticErrorCode,
} from '../src/index';

function semanticErrorOf(text: string, options: ParseAutomatonOptions = {}): AutomatonSemanticError {
  try {
    parseAutomaton(text, options);
  } catch (error: unknown) {
    if (error instanceof AutomatonSemanticError) return error;
    throw error;
  }
  throw new Error(`Expected a semantic error for ${text}`);
}

describe('buildAutomaton', () => {
  it('materializes scenario A', () => {
    const automaton = buildAutomaton(parseAutomatonSource('{"det", 2, 2, [[[1], []], [[], [1]]], [0], [1]}'));
    expect(automaton.kind).toBe('det');
    expect(automaton.stateCount).toBe(2);
    expect(automaton.alphabet).toEqual({ type: 'sized', size: 2 });
    expect(automaton.alphabetSize).toBe(2);
    expect(automaton.epsilonLetter).toBeUndefined();
    expect(automaton.transitions).toEqual([[[1], []], [[], [1]]]);
    expect(automaton.initialStates).toEqual([0]);
    expect(automaton.finalStates).toEqual([1]);
  });

  it('keeps named alphabets letter by letter', () => {
    const automaton = parseAutomaton('{"nondet", 1, "ab", [[[0], []]], [0], [0]}');
    expect(automaton.alphabet).toEqual({ type: 'named', letters: ['a', 'b'] });
    expect(automaton.letterName(1)).toBe('b');
  });

  it('collapses and sorts duplicate destinations by default', () => {
    const automaton = parseAutomaton('{"nondet", 3, 1, [[[2, 1, 2]], [[]], [[]]], [0, 0], [2, 2]}');
    expect(automaton.destinations(0, 0)).toEqual([1, 2]);
    expect(automaton.initialStates).toEqual([0]);
    expect(automaton.finalStates).toEqual([2]);
  });

  it('treats a repeated det destination as one destination', () => {
    const automaton = parseAutomaton('{"det", 2, 1, [[[1, 1]], [[]]], [0], [1]}');
    expect(automaton.destinations(0, 0)).toEqual([1]);
  });

  it('allows empty det cells', () => {
    expect(parseAutomaton('{"det", 1, 2, [[[0], []]], [0], [0]}').destinations(0, 1)).toEqual([]);
  });

  it('returns frozen data', () => {
    const automaton = parseAutomaton('{"det", 1, 1, [[[0]]], [0], [0]}');
    expect(Object.isFrozen(automaton.transitions)).toBe(true);
    expect(Object.isFrozen(automaton.transitions[0][0])).toBe(true);
    expect(Object.isFrozen(automaton.finalStates)).toBe(true);
  });

  it('uses letter 0 as epsilon for sized epsilon alphabets', () => {
    expect(parseAutomaton('{"epsilon", 2, 1, [[[1]], [[]]], [0], [1]}').epsilonLetter).toBe(0);
  });

  it('uses the position of @ as epsilon for named epsilon alphabets', () => {
    expect(parseAutomaton('{"epsilon", 1, "a@", [[[], []]], [0], [0]}').epsilonLetter).toBe(1);
  });

  it('treats @ as an ordinary letter outside epsilon automata', () => {
    expect(parseAutomaton('{"nondet", 1, "@a", [[[0], []]], [0], [0]}').epsilonLetter).toBeUndefined();
  });
});

describe('semantic errors', () => {
  const cases: Array<[string, string, SemanticErrorCode, string]> = [
    ['too few transition rows', '{"det", 3, 1, [[[1]], [[2]]], [0], [1]}', 'STATE_COUNT_MISMATCH', 'transitions'],
    ['too many transition rows', '{"det", 1, 1, [[[0]], [[0]]], [0], [0]}', 'STATE_COUNT_MISMATCH', 'transitions'],
    ['a short letter block', '{"nondet", 2, 2, [[[1], []], [[0]]], [0], [1]}', 'ALPHABET_SIZE_MISMATCH', 'transitions[1]'],
    ['a destination past the last state', '{"nondet", 2, 1, [[[2]], [[]]], [0], [1]}', 'STATE_OUT_OF_RANGE', 'transitions[0][0]'],
    ['an initial state past the last state', '{"nondet", 2, 1, [[[1]], [[]]], [3], [1]}', 'STATE_OUT_OF_RANGE', 'initial'],
    ['a final state past the last state', '{"nondet", 2, 1, [[[1]], [[]]], [0], [5]}', 'STATE_OUT_OF_RANGE', 'final'],
    ['a det cell with two destinations', '{"det", 3, 1, [[[1, 2]], [[]], [[]]], [0], [2]}', 'NONDETERMINISTIC_CELL', 'transitions[0][0]'],
    ['a det automaton with two initial states', '{"det", 2, 1, [[[1]], [[0]]], [0, 1], [1]}', 'MULTIPLE_INITIAL_STATES', 'initial'],
    ['a repeated letter', '{"nondet", 1, "aba", [[[], [], []]], [0], [0]}', 'DUPLICATE_LETTER', 'alphabet'],
    ['an epsilon automaton without @', '{"epsilon", 1, "ab", [[[], []]], [0], [0]}', 'MISSING_EPSILON_LETTER', 'alphabet'],
    ['an empty sized alphabet', '{"nondet", 1, 0, [[[]]], [0], [0]}', 'EMPTY_ALPHABET', 'alphabet'],
  ];

  it.each(cases)('reports %s', (_name, text, code, field) => {
    const error = semanticErrorOf(text);
    expect(error.kind).toBe('semantic');
    expect(error.code).toBe(code);
    expect(error.field).toBe(field);
  });

  it('rejects duplicate destinations under the reject policy', () => {
    const error = semanticErrorOf('{"nondet", 2, 1, [[[1, 1]], [[]]], [0], [1]}', { duplicates: 'reject' });
    expect(error.code).toBe('DUPLICATE_DESTINATION');
    expect(error.field).toBe('transitions[0][0]');
  });

  it('still collapses repeated initial states under the reject policy', () => {
    const automaton = parseAutomaton('{"nondet", 2, 1, [[[1]], [[]]], [0, 0], [1]}', { duplicates: 'reject' });
    expect(automaton.initialStates).toEqual([0]);
  });

  it('describes the mismatch in the message', () => {
    expect(semanticErrorOf('{"det", 3, 1, [[[1]], [[2]]], [0], [1]}').message).toBe(
      'Transition table has 2 state rows but the automaton declares 3 states'
    );
    expect(semanticErrorOf('{"det", 3, 1, [[[1, 2]], [[]], [[]]], [0], [2]}').message).toBe(
      'Deterministic automaton has 2 destinations from state 0 on letter 0'
    );
  });

  it('points at the offending index', () => {
    const error = semanticErrorOf('{"nondet", 2, 1, [[[2]], [[]]], [0], [1]}');
    expect(error.message).toBe('State 2 in transitions[0][0] is out of range for an automaton with 2 states');
    expect(error.location?.start).toEqual({ line: 1, column: 21, offset: 20 });
  });
});
