import moo from 'moo';
import { AutomatonInputError } from '../automaton/errors';
import type { Alphabet } from '../automaton/model';

// Input words are the only thing tokenized here; automaton text goes through peggy.
export type WordTokenType = 'space' | 'comma' | 'index' | 'letters' | 'invalid';

export interface WordToken {
  type: WordTokenType;
  value: string;
  /** 1-based column of the first character. */
  col: number;
  line: number;
  offset: number;
}

const wordRules: moo.Rules = {
  space: { match: /\s+/, lineBreaks: true },
  comma: ',',
  index: /[0-9]+/,
  letters: /[a-zA-Z@]+/,
  invalid: moo.error,
};

function isWordTokenType(type: string | undefined): type is WordTokenType {
  return type === 'space' || type === 'comma' || type === 'index' || type === 'letters' || type === 'invalid';
}

/** Tokenize an input word. Unknown characters come back as a single `invalid` token. */
export function tokenizeWord(text: string): WordToken[] {
  const lexer = moo.compile(wordRules);
  lexer.reset(text);
  const tokens: WordToken[] = [];
  for (const token of lexer) {
    if (!isWordTokenType(token.type)) {
      throw new AutomatonInputError(`Unrecognized token "${token.text}"`, token.col);
    }
    tokens.push({ type: token.type, value: token.value, col: token.col, line: token.line, offset: token.offset });
  }
  return tokens;
}

function letterIndex(alphabet: Alphabet, letter: string, column: number): number {
  if (alphabet.type === 'sized') {
    throw new AutomatonInputError(
      `Letter "${letter}" at column ${column} needs a named alphabet; this automaton takes indices 0..${alphabet.size - 1}`,
      column
    );
  }
  const index = alphabet.letters.indexOf(letter);
  if (index === -1) {
    throw new AutomatonInputError(
      `Letter "${letter}" at column ${column} is not in the alphabet "${alphabet.letters.join('')}"`,
      column
    );
  }
  return index;
}

/**
 * Turn an input word into letter indices. Accepts decimal indices separated by
 * commas or whitespace, and runs of letters mapped through a named alphabet.
 * Indices are passed through unchecked; out-of-range ones reject at run time.
 */
export function encodeWord(text: string, alphabet: Alphabet): number[] {
  const word: number[] = [];
  for (const token of tokenizeWord(text)) {
    switch (token.type) {
      case 'space':
      case 'comma':
        break;
      case 'index':
        word.push(Number.parseInt(token.value, 10));
        break;
      case 'letters':
        Array.from(token.value).forEach((letter, i) => {
          word.push(letterIndex(alphabet, letter, token.col + i));
        });
        break;
      case 'invalid':
        throw new AutomatonInputError(
          `Unexpected character "${token.value.charAt(0)}" at column ${token.col} in input word`,
          token.col
        );
    }
  }
  return word;
}
