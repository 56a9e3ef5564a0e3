import { ParseError, ParseErrorCode, ErrorDetails } from '../errors/types';

export interface ParseSuccess<T> {
  success: true;
  value: T;
}

export interface ParseFailure {
  success: false;
  error: ParseError;
}

/**
 * Outcome of every grammar step. The first failure is returned as-is by
 * each caller, so a parse aborts on the first violation.
 */
export type ParseResult<T> = ParseSuccess<T> | ParseFailure;

export function ok<T>(value: T): ParseSuccess<T> {
  return { success: true, value };
}

export function fail(
  message: string,
  code: ParseErrorCode,
  details?: ErrorDetails
): ParseFailure {
  return { success: false, error: new ParseError(message, code, details) };
}

