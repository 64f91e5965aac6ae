import type { ParserBuildOptions, ParserOptions } from 'peggy';
import * as peggy from 'peggy';
import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { formatCompilationError, isPeggyError } from '../utils/format';
import { isAutomatonSourceNode, type AutomatonSourceNode } from '../parser/ast';

export interface CompiledGrammar<ASTNode = unknown> {
  parse: (input: string, options?: ParserOptions) => ASTNode;
  source: string;
  options: CompileOptions;
}

export interface CompileOptions {
  allowedStartRules?: string[];
  cache?: boolean;
  grammarSource?: string;
  trace?: boolean;
}

/**
 * Compile a peggy grammar into a parser whose results are checked by `isResult`
 * before they reach the caller.
 */
export function compileGrammar<ASTNode>(
  grammar: string,
  isResult: (value: unknown) => value is ASTNode,
  options: CompileOptions = {}
): CompiledGrammar<ASTNode> {
  const defaultOptions: CompileOptions = {
    allowedStartRules: ['Start'],
    cache: false,
    trace: false,
    ...options,
  };
  const buildOptions: ParserBuildOptions = { ...defaultOptions, output: 'parser' };

  let parser: peggy.Parser;
  try {
    parser = peggy.generate(grammar, buildOptions);
  } catch (error: unknown) {
    const formattedError = isPeggyError(error)
      ? formatCompilationError(error, grammar)
      : String(error);
    throw new Error(`Grammar compilation failed:\n${formattedError}`);
  }

  return {
    parse: (input, parseOptions) => {
      const result: unknown = parser.parse(input, parseOptions);
      if (!isResult(result)) {
        throw new Error('Grammar produced a parse tree of an unexpected shape');
      }
      return result;
    },
    source: grammar,
    options: defaultOptions,
  };
}

// The build copies nothing but compiled TypeScript, so dist/ falls back to src/.
const DEFAULT_GRAMMAR_PATHS = [
  path.join(__dirname, 'automaton.peg'),
  path.join(__dirname, '..', '..', 'src', 'grammar', 'automaton.peg'),
];

export function resolveGrammarPath(): string {
  for (const candidate of DEFAULT_GRAMMAR_PATHS) {
    if (existsSync(candidate)) return candidate;
  }
  throw new Error(`Automaton grammar not found. Looked in: ${DEFAULT_GRAMMAR_PATHS.join(', ')}`);
}

let automatonGrammar: CompiledGrammar<AutomatonSourceNode> | undefined;

/** The automaton text-encoding parser, compiled on first use. */
export function getAutomatonGrammar(): CompiledGrammar<AutomatonSourceNode> {
  if (!automatonGrammar) {
    const grammarPath = resolveGrammarPath();
    automatonGrammar = compileGrammar(readFileSync(grammarPath, 'utf-8'), isAutomatonSourceNode, {
      grammarSource: grammarPath,
    });
  }
  return automatonGrammar;
}
