// src/index.ts
// ============================================
// 🌐 Automata Engine Main API Surface (Public Entry)
// ============================================

// 🧠 Grammar Compilation
export {
  compileGrammar,
  getAutomatonGrammar,
  type CompiledGrammar,
  type CompileOptions,
} from './grammar/index';

// 📥 Parsing
export {
  parseInput,
  parseAutomatonSource,
  ParserUtils,
  type ParseResult,
  type ParseError,
  type ParseSourceOptions,
  type AutomatonSourceNode,
  type CoreNode,
  type AlphabetNode,
  type TransitionTableNode,
  type LetterBlockNode,
  type NumArrayNode,
  type CountNode,
  type KindNode,
  type WrapperStyle,
} from './parser/index';

// 🏗️ Model and Construction
export {
  Automaton,
  EPSILON_MARKER,
  SIZED_EPSILON_LETTER,
  alphabetSize,
  epsilonLetterOf,
  type Alphabet,
  type AutomatonKind,
  type AutomatonDefinition,
  type TransitionTable,
} from './automaton/model';
export {
  buildAutomaton,
  parseAutomaton,
  type BuildOptions,
  type DuplicatePolicy,
  type ParseAutomatonOptions,
} from './automaton/builder';
export { StateSet } from './automaton/state-set';
export { EpsilonClosure } from './automaton/closure';

// ▶️ Execution
export {
  accepts,
  run,
  createExecutor,
  AutomatonExecutor,
  type ExecutionStep,
  type ExecutionTrace,
} from './automaton/executor';
export { determinize, type DeterminizeOptions } from './automaton/determinize';
export { generateBufferAndStack, generateTwoStack } from './automaton/generators';

// 🔁 Encoding
export {
  reencode,
  structurallyEqual,
  verifyRoundTrip,
  verifyEncoding,
  type EncodeOptions,
  type RoundTripReport,
} from './automaton/encoder';

// 🔤 Input Words
export { encodeWord, tokenizeWord, type WordToken, type WordTokenType } from './lexer/index';

// 🚨 Errors
export {
  AutomatonError,
  AutomatonSyntaxError,
  AutomatonSemanticError,
  AutomatonRuntimeError,
  AutomatonInputError,
  AutomatonConfigError,
  type AutomatonErrorKind,
  type SemanticErrorCode,
} from './automaton/errors';

// 🛠️ Utilities
export * from './utils/index';
export { loadConfig, validateConfig, CONFIG_FILE, type AutomatonConfig } from './config/index';
export { stripLineContinuations } from './project/clean';
