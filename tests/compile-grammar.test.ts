// tests/compile-grammar.test.ts
import { compileGrammar, getAutomatonGrammar, parseInput, ParserUtils } from '../src/index';

interface DigitsNode {
  type: 'Digits';
  value: string;
}

function isDigitsNode(value: unknown): value is DigitsNode {
  return typeof value === 'object' && value !== null && 'type' in value && value.type === 'Digits';
}

describe('compileGrammar', () => {
  it('should compile valid grammar and return a parser', () => {
    const grammar = `
      Start
        = digits:$[0-9]+ { return { type: 'Digits', value: digits }; }
    `;

    const parser = compileGrammar(grammar, isDigitsNode);
    expect(parser.parse('42')).toEqual({ type: 'Digits', value: '42' });
    expect(parser.options.allowedStartRules).toEqual(['Start']);
  });

  it('should wrap grammar errors', () => {
    expect(() => compileGrammar('Start = Missing', isDigitsNode)).toThrow(/^Grammar compilation failed:/);
  });

  it('should reject results of the wrong shape', () => {
    const parser = compileGrammar('Start = "x" { return 5; }', isDigitsNode);
    expect(() => parser.parse('x')).toThrow('Grammar produced a parse tree of an unexpected shape');
  });

  it('should compile the automaton grammar once', () => {
    expect(getAutomatonGrammar()).toBe(getAutomatonGrammar());
  });
});

describe('parseInput', () => {
  it('should return the tree on success', () => {
    const result = parseInput(getAutomatonGrammar(), '{"det", 1, 1, [[[0]]], [0], [0]}');
    expect(ParserUtils.isParseError(result)).toBe(false);
    if (!ParserUtils.isParseError(result)) {
      expect(result.result.core.kind.value).toBe('det');
    }
  });

  it('should return a ParseError instead of throwing', () => {
    const result = parseInput(getAutomatonGrammar(), '{');
    expect(ParserUtils.isParseError(result)).toBe(true);
    if (ParserUtils.isParseError(result)) {
      expect(result.expected).toEqual(['automaton type']);
      expect(result.found).toBeNull();
      expect(result.location?.start).toEqual({ line: 1, column: 2, offset: 1 });
      expect(result.input).toBe('{');
    }
  });
});
