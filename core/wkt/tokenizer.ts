import { ParseErrorCode } from '../errors/types';
import { ParseResult, ok, fail } from './result';
import { Token, TokenKind } from './types';

/**
 * Patterns used by the WKT tokenizer
 * - WHITESPACE and RUN are sticky so they match at the scan position only
 * - A run is any text up to the next whitespace or punctuation character
 * - NUMBER is tried before WORD
 */
export const WKT_PATTERNS = {
  whitespace: /\s*/y,
  run: /[^\s()[\],]+/y,
  number: /^[-+]?(\d+(\.\d*)?|\.\d+)(e[-+]?\d+)?$/,
  word: /^[a-z]+$/,
  sridPrefix: /^srid=(\d+);/i
};

const PUNCTUATION: Partial<Record<string, Token>> = {
  '(': { kind: TokenKind.Begin },
  '[': { kind: TokenKind.Begin },
  ')': { kind: TokenKind.End },
  ']': { kind: TokenKind.End },
  ',': { kind: TokenKind.Comma }
};

/**
 * Strip a leading EWKT `SRID=<n>;` prefix
 */
export function extractSrid(text: string): { text: string; srid?: number } {
  const match = WKT_PATTERNS.sridPrefix.exec(text);
  if (!match) {
    return { text };
  }
  return {
    text: text.slice(match[0].length),
    srid: parseInt(match[1], 10)
  };
}

/**
 * Single-lookahead scanner over lower-cased WKT text
 */
export class WktTokenizer {
  private position = 0;

  constructor(private readonly input: string) {}

  /**
   * Scan the next token. Returns EndOfInput once the text is exhausted.
   */
  next(): ParseResult<Token> {
    WKT_PATTERNS.whitespace.lastIndex = this.position;
    WKT_PATTERNS.whitespace.exec(this.input);
    this.position = WKT_PATTERNS.whitespace.lastIndex;

    if (this.position >= this.input.length) {
      return ok({ kind: TokenKind.EndOfInput });
    }

    const punctuation = PUNCTUATION[this.input[this.position]];
    if (punctuation) {
      this.position++;
      return ok(punctuation);
    }

    WKT_PATTERNS.run.lastIndex = this.position;
    const match = WKT_PATTERNS.run.exec(this.input);
    // The run pattern matches any character that is neither whitespace nor punctuation
    const run = match ? match[0] : this.input[this.position];
    const start = this.position;
    this.position += run.length;

    if (WKT_PATTERNS.number.test(run)) {
      return ok({ kind: TokenKind.Number, value: parseFloat(run) });
    }
    if (WKT_PATTERNS.word.test(run)) {
      return ok({ kind: TokenKind.Word, text: run });
    }
    return fail(`Bad token: "${run}"`, ParseErrorCode.BAD_TOKEN, {
      token: run,
      position: start
    });
  }

  /**
   * Offset of the next unread character
   */
  getPosition(): number {
    return this.position;
  }
}
