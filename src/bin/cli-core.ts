import fs from 'node:fs/promises';
import path from 'node:path';
import fg from 'fast-glob';

import { parseAutomaton, type DuplicatePolicy } from '../automaton/builder';
import { determinize } from '../automaton/determinize';
import { reencode } from '../automaton/encoder';
import { AutomatonError, type AutomatonErrorKind } from '../automaton/errors';
import { createExecutor } from '../automaton/executor';
import { generateBufferAndStack, generateTwoStack } from '../automaton/generators';
import type { Automaton } from '../automaton/model';
import { DEFAULT_BENCHMARK_ITERATIONS, loadConfig, type AutomatonConfig } from '../config/index';
import { encodeWord } from '../lexer/index';
import type { WrapperStyle } from '../parser/ast';
import { stripLineContinuations } from '../project/clean';
import { formatAutomatonError } from '../utils/format';
import { createLogger, type LogSink, type Logger } from '../utils/log';

export const ExitCode = {
  Accepted: 0,
  Rejected: 1,
  SyntaxError: 2,
  SemanticError: 3,
  Failure: 4,
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

export interface CliIO {
  cwd: string;
  stdout: LogSink;
  stderr: LogSink;
  /** Terminal color support; `--no-color` and the config's `color` override it. */
  color?: boolean;
}

/** An automaton built in process instead of read from a file. */
interface GeneratedSource {
  label: string;
  build(): Automaton;
}

interface CLIConfig {
  patterns: string[];
  generators: GeneratedSource[];
  input?: string;
  output?: string;
  trace: boolean;
  encode: boolean;
  call: boolean;
  determinize: boolean;
  complete: boolean;
  clean: boolean;
  benchmark?: number | true;
  duplicates?: DuplicatePolicy;
  verbose: boolean;
  noColor: boolean;
  help: boolean;
}

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const HELP = `
automata - Finite automaton runner

USAGE:
  automata <file|glob>... [options]
  automata --bns <b> <s> | --two-stack <n1> <n2> [options]

SOURCES:
  --bns <b> <s>               Buffer of size b feeding a stack of depth s
  --two-stack <n1> <n2>       Two stacks of depths n1 and n2 in series

OPTIONS:
  --input <word>              Word to run: indices ("0,1 1") or letters ("abba")
  --trace                     Print the active states after every symbol
  --encode                    Print the canonical encoding
  --call                      Use the Automaton(...); form when printing
  --determinize               Print the subset-construction automaton
  --complete                  Give the determinized automaton a sink state
  --output <file>             Write --encode/--determinize output to a file
  --clean                     Strip backslashes and newlines before parsing
  --benchmark [n]             Time n acceptance runs (default 1000)
  --duplicates <policy>       collapse | reject repeated destinations
  --verbose, -v               Enable verbose output
  --no-color                  Disable colored output
  --help, -h                  Show this help

EXIT CODES:
  0 all accepted, 1 some rejected, 2 syntax error, 3 semantic error,
  4 I/O, usage, config, input or runtime error
`;

function readCount(value: string | undefined): number | undefined {
  return value !== undefined && /^[0-9]+$/.test(value) ? Number.parseInt(value, 10) : undefined;
}

function parseArgs(args: string[]): CLIConfig {
  const config: CLIConfig = {
    patterns: [],
    generators: [],
    trace: false,
    encode: false,
    call: false,
    determinize: false,
    complete: false,
    clean: false,
    verbose: false,
    noColor: false,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const nextArg = args[i + 1];

    switch (arg) {
      case '--input':
        if (nextArg === undefined) throw new UsageError('--input needs a word');
        config.input = nextArg;
        i++;
        break;
      case '--output':
        if (nextArg === undefined) throw new UsageError('--output needs a file');
        config.output = nextArg;
        i++;
        break;
      case '--bns':
      case '--two-stack': {
        const first = readCount(args[i + 1]);
        const second = readCount(args[i + 2]);
        if (first === undefined || second === undefined) {
          throw new UsageError(`${arg} needs two non-negative integer sizes`);
        }
        config.generators.push(
          arg === '--bns'
            ? { label: `bns(${first},${second})`, build: () => generateBufferAndStack(first, second) }
            : { label: `two-stack(${first},${second})`, build: () => generateTwoStack(first, second) }
        );
        i += 2;
        break;
      }
      case '--trace':
        config.trace = true;
        break;
      case '--encode':
        config.encode = true;
        break;
      case '--call':
        config.call = true;
        break;
      case '--determinize':
        config.determinize = true;
        break;
      case '--complete':
        config.complete = true;
        break;
      case '--clean':
        config.clean = true;
        break;
      case '--benchmark': {
        const iterations = readCount(nextArg);
        if (iterations !== undefined) {
          if (iterations === 0) throw new UsageError('--benchmark needs a positive iteration count');
          config.benchmark = iterations;
          i++;
        } else {
          config.benchmark = true;
        }
        break;
      }
      case '--duplicates':
        if (nextArg !== 'collapse' && nextArg !== 'reject') {
          throw new UsageError(`Invalid duplicate policy: ${nextArg ?? '(missing)'}. Valid policies: collapse, reject`);
        }
        config.duplicates = nextArg;
        i++;
        break;
      case '--verbose':
      case '-v':
        config.verbose = true;
        break;
      case '--no-color':
        config.noColor = true;
        break;
      case '--help':
      case '-h':
        config.help = true;
        break;
      default:
        if (arg.startsWith('-')) throw new UsageError(`Unknown option: ${arg}`);
        config.patterns.push(arg);
    }
  }

  if (config.output !== undefined && !config.encode && !config.determinize) {
    throw new UsageError('--output needs --encode or --determinize');
  }
  if (config.complete && !config.determinize) throw new UsageError('--complete needs --determinize');
  return config;
}

async function expandPatterns(patterns: string[], cwd: string): Promise<string[]> {
  const files: string[] = [];
  for (const pattern of patterns) {
    if (!fg.isDynamicPattern(pattern)) {
      files.push(pattern);
      continue;
    }
    const matches = await fg(pattern, { cwd, onlyFiles: true });
    if (matches.length === 0) throw new UsageError(`No files match ${pattern}`);
    files.push(...matches.sort());
  }
  return files;
}

function exitCodeFor(kind: AutomatonErrorKind): ExitCodeValue {
  switch (kind) {
    case 'syntax':
      return ExitCode.SyntaxError;
    case 'semantic':
      return ExitCode.SemanticError;
    default:
      return ExitCode.Failure;
  }
}

interface RunSettings {
  cli: CLIConfig;
  duplicates: DuplicatePolicy;
  wrapper: WrapperStyle;
  input: string;
  iterations?: number;
  color: boolean;
  /** Collects printed automata when they go to `--output` instead of stdout. */
  written?: string[];
}

function describeSize(automaton: Automaton): string {
  return `${automaton.stateCount} states, ${automaton.alphabetSize} letters`;
}

function emitAutomaton(automaton: Automaton, settings: RunSettings, log: Logger): void {
  const text = reencode(automaton, { wrapper: settings.wrapper });
  if (settings.written) settings.written.push(text);
  else log.print(text);
}

function formatStates(states: readonly number[]): string {
  return `{${states.join(', ')}}`;
}

function runWord(automaton: Automaton, word: number[], settings: RunSettings, log: Logger): boolean {
  const executor = createExecutor(automaton);
  let accepted: boolean;

  if (settings.cli.trace) {
    const trace = executor.run(word);
    let step = trace.next();
    while (!step.done) {
      const { index, symbol, states, accepting } = step.value;
      const letter = symbol === undefined ? 'start' : automaton.letterName(symbol);
      log.print(`  ${index}: ${letter} -> ${formatStates(states)}${accepting ? ' accepting' : ''}`);
      step = trace.next();
    }
    accepted = step.value;
  } else {
    accepted = executor.accepts(word);
  }

  if (settings.iterations !== undefined) {
    const iterations = settings.iterations;
    const start = performance.now();
    for (let i = 0; i < iterations; i++) executor.accepts(word);
    const totalTime = performance.now() - start;
    log.bench(
      `${iterations} runs in ${totalTime.toFixed(2)}ms, ` +
        `${(totalTime / iterations).toFixed(4)}ms per run, ` +
        `${((iterations / totalTime) * 1000).toFixed(2)} runs/second`
    );
  }

  return accepted;
}

/** Shared tail of every source: printing, the run and the verdict line. */
function runAutomaton(label: string, automaton: Automaton, settings: RunSettings, log: Logger): ExitCodeValue {
  const { cli } = settings;
  if (cli.encode) emitAutomaton(automaton, settings, log);
  if (cli.determinize) {
    const deterministic = determinize(automaton, { complete: cli.complete });
    log.debug(`Determinized automaton: ${describeSize(deterministic)}`);
    emitAutomaton(deterministic, settings, log);
  }

  const word = encodeWord(settings.input, automaton.alphabet);
  log.debug(`Input word: [${word.join(', ')}]`);

  const accepted = runWord(automaton, word, settings, log);
  log.print(`${label}: ${accepted ? 'accept' : 'reject'}`);
  return accepted ? ExitCode.Accepted : ExitCode.Rejected;
}

async function processFile(file: string, settings: RunSettings, io: CliIO, log: Logger): Promise<ExitCodeValue> {
  const filePath = path.resolve(io.cwd, file);
  log.debug(`Reading automaton from ${filePath}`);

  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error: unknown) {
    log.error(`Could not read ${file}: ${error instanceof Error ? error.message : String(error)}`);
    return ExitCode.Failure;
  }
  if (settings.cli.clean) text = stripLineContinuations(text);

  try {
    const automaton = parseAutomaton(text, { duplicates: settings.duplicates, grammarSource: file });
    log.debug(`Parsed ${automaton.kind} automaton: ${describeSize(automaton)}`);
    return runAutomaton(file, automaton, settings, log);
  } catch (error: unknown) {
    if (!(error instanceof AutomatonError)) throw error;
    log.report(formatAutomatonError(error, error.kind === 'input' ? undefined : text, settings.color));
    return exitCodeFor(error.kind);
  }
}

function processGenerated(source: GeneratedSource, settings: RunSettings, log: Logger): ExitCodeValue {
  const automaton = source.build();
  log.debug(`Generated ${automaton.kind} automaton ${source.label}: ${describeSize(automaton)}`);
  try {
    return runAutomaton(source.label, automaton, settings, log);
  } catch (error: unknown) {
    if (!(error instanceof AutomatonError)) throw error;
    log.report(formatAutomatonError(error, undefined, settings.color));
    return exitCodeFor(error.kind);
  }
}

async function writeOutput(file: string, lines: string[], io: CliIO, log: Logger): Promise<ExitCodeValue> {
  try {
    await fs.writeFile(path.resolve(io.cwd, file), lines.map((line) => `${line}\n`).join(''), 'utf-8');
  } catch (error: unknown) {
    log.error(`Could not write ${file}: ${error instanceof Error ? error.message : String(error)}`);
    return ExitCode.Failure;
  }
  log.debug(`Wrote ${lines.length} automata to ${file}`);
  return ExitCode.Accepted;
}

function resolveIterations(cli: CLIConfig, config: AutomatonConfig): number | undefined {
  if (cli.benchmark === undefined) return undefined;
  if (cli.benchmark === true) return config.benchmarkIterations ?? DEFAULT_BENCHMARK_ITERATIONS;
  return cli.benchmark;
}

/**
 * Run the command line against the given streams and return the process exit
 * code. The highest code across all files wins.
 */
export async function runCli(argv: string[], io: CliIO): Promise<number> {
  const fallbackLog = createLogger({ out: io.stdout, err: io.stderr, color: false });

  let cli: CLIConfig;
  let config: AutomatonConfig;
  try {
    cli = parseArgs(argv);
    config = loadConfig(io.cwd) ?? {};
  } catch (error: unknown) {
    if (error instanceof UsageError) {
      fallbackLog.error(error.message);
      return ExitCode.Failure;
    }
    if (error instanceof AutomatonError) {
      fallbackLog.report(formatAutomatonError(error));
      return ExitCode.Failure;
    }
    throw error;
  }

  const color = cli.noColor ? false : config.color ?? io.color ?? false;
  const log = createLogger({ out: io.stdout, err: io.stderr, color, verbose: cli.verbose });

  if (cli.help) {
    log.print(HELP);
    return ExitCode.Accepted;
  }
  if (cli.patterns.length === 0 && cli.generators.length === 0) {
    log.error('No automaton files given. Run automata --help for usage.');
    return ExitCode.Failure;
  }

  let files: string[];
  try {
    files = await expandPatterns(cli.patterns, io.cwd);
  } catch (error: unknown) {
    if (!(error instanceof UsageError)) throw error;
    log.error(error.message);
    return ExitCode.Failure;
  }

  const settings: RunSettings = {
    cli,
    duplicates: cli.duplicates ?? config.duplicates ?? 'collapse',
    wrapper: cli.call ? 'call' : config.wrapper ?? 'brace',
    input: cli.input ?? config.input ?? '',
    iterations: resolveIterations(cli, config),
    color,
    written: cli.output === undefined ? undefined : [],
  };

  let exitCode: number = ExitCode.Accepted;
  for (const file of files) {
    exitCode = Math.max(exitCode, await processFile(file, settings, io, log));
  }
  for (const source of cli.generators) {
    exitCode = Math.max(exitCode, processGenerated(source, settings, log));
  }
  if (cli.output !== undefined && settings.written) {
    exitCode = Math.max(exitCode, await writeOutput(cli.output, settings.written, io, log));
  }
  return exitCode;
}
