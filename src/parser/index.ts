import type { ParserOptions } from 'peggy';
import { getAutomatonGrammar, type CompiledGrammar } from '../grammar/index';
import { AutomatonSyntaxError } from '../automaton/errors';
import { isPeggyError, toParseError } from '../utils/format';
import { getLocationFromOffset } from '../utils/highlight';
import { pointLocation, type Location } from '../utils/types';
import type { AutomatonSourceNode } from './ast';

export interface ParseResult<T> {
  success: true;
  result: T;
}

export interface ParseError {
  success: false;
  error: string;
  location?: Location;
  expected?: string[];
  found?: string | null;
  input?: string;
  snippet?: string;
}

export const ParserUtils = {
  isParseError<T>(result: ParseResult<T> | ParseError): result is ParseError {
    return !result.success;
  },
};

/**
 * Run a compiled grammar, turning peggy's thrown syntax errors into a
 * `ParseError` value. Anything else peggy throws is not a syntax problem and
 * propagates.
 */
export function parseInput<T>(
  grammar: CompiledGrammar<T>,
  input: string,
  options: ParserOptions = {}
): ParseResult<T> | ParseError {
  try {
    return { success: true, result: grammar.parse(input, options) };
  } catch (error: unknown) {
    if (!isPeggyError(error)) throw error;
    return toParseError(error, input);
  }
}

export interface ParseSourceOptions {
  /** Name shown in error messages, typically the file path. */
  grammarSource?: string;
}

/**
 * Parse automaton text into a located parse tree. Cross-field checks (state and
 * letter bounds) are left to the builder.
 */
export function parseAutomatonSource(text: string, options: ParseSourceOptions = {}): AutomatonSourceNode {
  const source = options.grammarSource ?? 'input';
  const result = parseInput(getAutomatonGrammar(), text, { grammarSource: source });
  if (!ParserUtils.isParseError(result)) {
    return result.result;
  }

  const location = result.location ?? pointLocation(getLocationFromOffset(text, 0));
  const { line, column } = location.start;
  throw new AutomatonSyntaxError(`${result.error} at ${source}:${line}:${column}`, {
    location,
    expected: result.expected ?? [],
    found: result.found ?? null,
  });
}

export type {
  AutomatonSourceNode,
  CoreNode,
  AlphabetNode,
  TransitionTableNode,
  LetterBlockNode,
  NumArrayNode,
  CountNode,
  KindNode,
  WrapperStyle,
} from './ast';
