/**
 * Error details type
 */
export type ErrorDetails = Record<string, unknown>;

/**
 * Base error class for the WKT loader
 */
export class WktLoaderError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: ErrorDetails
  ) {
    super(message);
    this.name = 'WktLoaderError';
  }
}

/**
 * Conditions that abort a parse
 */
export enum ParseErrorCode {
  UNEXPECTED_TOKEN = 'UNEXPECTED_TOKEN',
  UNKNOWN_TYPE = 'UNKNOWN_TYPE',
  DIMENSION_MISMATCH = 'DIMENSION_MISMATCH',
  TOO_MANY_COORDINATES = 'TOO_MANY_COORDINATES',
  CAPABILITY_MISMATCH = 'CAPABILITY_MISMATCH',
  BAD_TOKEN = 'BAD_TOKEN',
  EXTRA_TOKENS = 'EXTRA_TOKENS'
}

/**
 * Error produced when WKT input cannot be parsed
 */
export class ParseError extends WktLoaderError {
  constructor(
    message: string,
    public readonly parseCode: ParseErrorCode,
    details?: ErrorDetails
  ) {
    super(message, parseCode, details);
    this.name = 'ParseError';
  }
}

