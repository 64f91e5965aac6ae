// tests/parser.test.ts
import { AutomatonSyntaxError, parseAutomatonSource } from '../src/index';

const SCENARIO_A = '{"det", 2, 2, [[[1], []], [[], [1]]], [0], [1]}';

function syntaxErrorOf(text: string): AutomatonSyntaxError {
  try {
    parseAutomatonSource(text);
  } catch (error: unknown) {
    if (error instanceof AutomatonSyntaxError) return error;
    throw error;
  }
  throw new Error(`Expected a syntax error for ${JSON.stringify(text)}`);
}

describe('parseAutomatonSource', () => {
  it('parses the brace form', () => {
    const tree = parseAutomatonSource(SCENARIO_A);
    expect(tree.wrapper).toBe('brace');
    expect(tree.trailingSemicolons).toBe(0);
    expect(tree.core.kind.value).toBe('det');
    expect(tree.core.stateCount.value).toBe(2);
    expect(tree.core.alphabet).toMatchObject({ type: 'SizedAlphabet', size: 2 });
    expect(tree.core.transitions.rows).toHaveLength(2);
    expect(tree.core.transitions.rows[0].cells.map((cell) => cell.items.map((item) => item.value))).toEqual([[1], []]);
    expect(tree.core.initial.items.map((item) => item.value)).toEqual([0]);
    expect(tree.core.final.items.map((item) => item.value)).toEqual([1]);
  });

  it('parses the call form with newlines and trailing semicolons', () => {
    const tree = parseAutomatonSource('Automaton("nondet", 3, "ab",\n  [[[1, 2], []], [[], []], [[], []]],\n  [0], [2]);;');
    expect(tree.wrapper).toBe('call');
    expect(tree.trailingSemicolons).toBe(2);
    expect(tree.core.alphabet).toMatchObject({ type: 'NamedAlphabet', letters: 'ab' });
  });

  it('allows surrounding whitespace', () => {
    expect(parseAutomatonSource(`\n  ${SCENARIO_A} \n`).core.kind.value).toBe('det');
  });

  it('records source locations on every node', () => {
    const tree = parseAutomatonSource(SCENARIO_A);
    const item = tree.core.transitions.rows[0].cells[0].items[0];
    expect(item.location.start).toEqual({ line: 1, column: 18, offset: 17 });
  });

  it('rejects tabs as whitespace', () => {
    const error = syntaxErrorOf('{"det",\t1, 1, [[[0]]], [0], [0]}');
    expect(error.kind).toBe('syntax');
    expect(error.expected).toEqual(['number']);
    expect(error.found).toBe('\t');
    expect(error.location.start.column).toBe(8);
    expect(error.message).toMatch(/ at input:1:8$/);
  });

  it('reports end of input as found null', () => {
    const error = syntaxErrorOf('{"det", 1, 1, [[[0]]], [0], [0]');
    expect(error.expected).toEqual(['"}"']);
    expect(error.found).toBeNull();
  });

  it('names the source in the message', () => {
    expect(() => parseAutomatonSource('{', { grammarSource: 'broken.aut' })).toThrow(/ at broken\.aut:1:2$/);
  });

  it('rejects a semicolon after the brace form', () => {
    expect(() => parseAutomatonSource(`${SCENARIO_A};`)).toThrow(AutomatonSyntaxError);
  });

  it('rejects backslashes', () => {
    expect(() => parseAutomatonSource('{"det", 1, 1, [[[0]]], [0], [0]}\\')).toThrow(AutomatonSyntaxError);
  });

  it('rejects a number split by a newline', () => {
    expect(() => parseAutomatonSource('{"det", 1\n0, 1, [[[0]]], [0], [0]}')).toThrow(AutomatonSyntaxError);
  });

  it('rejects unknown automaton types', () => {
    const error = syntaxErrorOf('{"dfa", 1, 1, [[[0]]], [0], [0]}');
    expect(error.expected).toEqual(['automaton type']);
    expect(error.location.start.column).toBe(2);
  });

  it('rejects an empty transition table', () => {
    expect(() => parseAutomatonSource('{"det", 0, 1, [], [], []}')).toThrow(AutomatonSyntaxError);
  });
});
