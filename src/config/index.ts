import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';

import type { DuplicatePolicy } from '../automaton/builder';
import { AutomatonConfigError } from '../automaton/errors';
import type { WrapperStyle } from '../parser/ast';

export const CONFIG_FILE = 'automaton.config.json';

export type AutomatonConfig = {
  duplicates?: DuplicatePolicy;
  /** Default input word when `--input` is not given. */
  input?: string;
  benchmarkIterations?: number;
  color?: boolean;
  wrapper?: WrapperStyle;
};

export const DEFAULT_BENCHMARK_ITERATIONS = 1000;

export function loadConfig(cwd = process.cwd()): AutomatonConfig | null {
  const configPath = path.join(cwd, CONFIG_FILE);
  if (!existsSync(configPath)) return null;
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new AutomatonConfigError(CONFIG_FILE, [`not valid JSON (${reason})`]);
  }
  return validateConfig(raw);
}

const KNOWN_KEYS = new Set(['duplicates', 'input', 'benchmarkIterations', 'color', 'wrapper']);

/** Check a parsed config object, reporting every problem at once. */
export function validateConfig(raw: unknown): AutomatonConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new AutomatonConfigError(CONFIG_FILE, ['top level must be an object']);
  }

  const errors: string[] = [];
  const normalized: AutomatonConfig = {};
  const entries = new Map<string, unknown>(Object.entries(raw));

  for (const key of entries.keys()) {
    if (!KNOWN_KEYS.has(key)) errors.push(`unknown key "${key}"`);
  }

  const duplicates = entries.get('duplicates');
  if (duplicates !== undefined) {
    if (duplicates === 'collapse' || duplicates === 'reject') normalized.duplicates = duplicates;
    else errors.push('duplicates must be "collapse" or "reject"');
  }
  const input = entries.get('input');
  if (input !== undefined) {
    if (typeof input === 'string') normalized.input = input;
    else errors.push('input must be a string');
  }
  const iterations = entries.get('benchmarkIterations');
  if (iterations !== undefined) {
    if (typeof iterations === 'number' && Number.isInteger(iterations) && iterations > 0) {
      normalized.benchmarkIterations = iterations;
    } else {
      errors.push('benchmarkIterations must be a positive integer');
    }
  }
  const color = entries.get('color');
  if (color !== undefined) {
    if (typeof color === 'boolean') normalized.color = color;
    else errors.push('color must be a boolean');
  }
  const wrapper = entries.get('wrapper');
  if (wrapper !== undefined) {
    if (wrapper === 'brace' || wrapper === 'call') normalized.wrapper = wrapper;
    else errors.push('wrapper must be "brace" or "call"');
  }

  if (errors.length > 0) {
    throw new AutomatonConfigError(CONFIG_FILE, errors);
  }

  return normalized;
}
