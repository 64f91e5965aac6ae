import type { Location } from './types';
import type { ParseError } from '../parser/index';
import { highlightSnippet } from './highlight';
import { createColors } from 'colorette';
import {
  AutomatonError,
  AutomatonSemanticError,
  AutomatonSyntaxError,
  type AutomatonErrorKind,
} from '../automaton/errors';

interface PeggyExpectation {
  type: string;
  text?: string;
  description?: string;
}

interface PeggyErrorShape {
  message: string;
  location?: unknown;
  expected?: unknown;
  found?: unknown;
}

// Type guard to check if an error is a Peggy-style error
export function isPeggyError(err: unknown): err is PeggyErrorShape {
  return (
    typeof err === 'object' &&
    err !== null &&
    'message' in err &&
    typeof err.message === 'string' &&
    ('location' in err || 'expected' in err || 'found' in err)
  );
}

function isExpectation(value: unknown): value is PeggyExpectation {
  return typeof value === 'object' && value !== null && 'type' in value && typeof value.type === 'string';
}

/**
 * Render one peggy expectation the way peggy's own messages do: literals quoted,
 * named rules by their display name.
 */
export function describeExpectation(expectation: PeggyExpectation): string {
  switch (expectation.type) {
    case 'literal':
      return JSON.stringify(expectation.text ?? '');
    case 'end':
      return 'end of input';
    case 'any':
      return 'any character';
    default:
      return expectation.description ?? expectation.type;
  }
}

function isValidLocation(loc: unknown): loc is Location {
  if (typeof loc !== 'object' || loc === null || !('start' in loc) || !('end' in loc)) {
    return false;
  }
  return isValidPosition(loc.start) && isValidPosition(loc.end);
}

function isValidPosition(position: unknown): boolean {
  return (
    typeof position === 'object' &&
    position !== null &&
    'line' in position && typeof position.line === 'number' &&
    'column' in position && typeof position.column === 'number' &&
    'offset' in position && typeof position.offset === 'number'
  );
}

// Safe wrapper for unknown errors with enhanced Peggy support
export function toParseError(err: unknown, input?: string): ParseError {
  if (isPeggyError(err)) {
    const expected = Array.isArray(err.expected)
      ? Array.from(new Set(err.expected.filter(isExpectation).map(describeExpectation)))
      : undefined;
    return {
      success: false,
      error: err.message,
      location: isValidLocation(err.location) ? err.location : undefined,
      expected,
      found: typeof err.found === 'string' ? err.found : null,
      input,
    };
  }

  if (err instanceof Error) {
    return { success: false, error: err.message, input };
  }

  return {
    success: false,
    error: typeof err === 'string' ? err : 'Unknown error',
    input,
  };
}

export function formatLocation(location: Location): string {
  const { start, end } = location;
  return (start.line === end.line && start.column === end.column)
    ? `Line ${start.line}, Col ${start.column}`
    : `Line ${start.line}, Col ${start.column} → Line ${end.line}, Col ${end.column}`;
}

export function formatError(error: ParseError, label = 'Parse Error'): string {
  return formatErrorWithColors(error, false, label);
}

export function formatErrorWithColors(error: ParseError, useColors: boolean = true, label = 'Parse Error'): string {
  const colors = createColors({ useColor: useColors });
  const parts: string[] = [`${colors.red(`❌ ${label}:`)} ${error.error || 'Unknown error'}`];

  if (error.location) {
    parts.push(`${colors.blue('↪ at')} ${formatLocation(error.location)}`);
  }

  if (error.expected && error.expected.length > 0) {
    parts.push(`${colors.yellow('Expected:')} ${error.expected.join(', ')}`);
  }

  if (error.found !== undefined) {
    parts.push(`${colors.yellow('Found:')} ${error.found === null ? 'end of input' : JSON.stringify(error.found)}`);
  }

  if (error.snippet) {
    parts.push(`\n${colors.dim('--- Snippet ---')}\n${error.snippet}`);
  } else if (error.input !== undefined && error.location) {
    const snippet = highlightSnippet(error.input, error.location, useColors);
    if (snippet) {
      parts.push(`\n${colors.dim('--- Snippet ---')}\n${snippet}`);
    }
  }

  return parts.join('\n');
}

export function formatAnyError(err: unknown, useColors: boolean = true): string {
  return formatErrorWithColors(toParseError(err), useColors, 'Error');
}

export function formatCompilationError(err: unknown, grammarSource?: string): string {
  return formatErrorWithColors(toParseError(err, grammarSource), false, 'Grammar Error');
}

const ERROR_LABELS: Record<AutomatonErrorKind, string> = {
  syntax: 'Syntax Error',
  semantic: 'Semantic Error',
  runtime: 'Runtime Error',
  input: 'Input Error',
  config: 'Config Error',
};

/**
 * Format any error the engine raises. `source` is the automaton text the error
 * came from; when given, located errors get a caret snippet.
 */
export function formatAutomatonError(err: unknown, source?: string, useColors: boolean = false): string {
  if (err instanceof AutomatonSyntaxError) {
    return formatErrorWithColors(
      {
        success: false,
        error: err.message,
        location: err.location,
        expected: err.expected,
        found: err.found,
        input: source,
      },
      useColors,
      ERROR_LABELS.syntax
    );
  }

  if (err instanceof AutomatonSemanticError) {
    return formatErrorWithColors(
      {
        success: false,
        error: `${err.message} (${err.code} in ${err.field})`,
        location: err.location,
        input: source,
      },
      useColors,
      ERROR_LABELS.semantic
    );
  }

  if (err instanceof AutomatonError) {
    return formatErrorWithColors({ success: false, error: err.message }, useColors, ERROR_LABELS[err.kind]);
  }

  return formatAnyError(err, useColors);
}
