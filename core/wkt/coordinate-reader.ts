import { ParseErrorCode } from '../errors/types';
import { ParseContext } from './context';
import { ParseResult, ok, fail } from './result';
import { TokenKind, describeToken } from './types';

function readNumber<G>(context: ParseContext<G>): ParseResult<number> {
  const token = context.expect(TokenKind.Number);
  if (!token.success) return token;
  const advanced = context.advance();
  if (!advanced.success) return advanced;
  return ok(token.value.value);
}

function readDeclaredValue<G>(context: ParseContext<G>, axis: 'Z' | 'M'): ParseResult<number> {
  if (context.current.kind !== TokenKind.Number) {
    return fail(
      `Geometry calls for ${axis} coordinate but ${describeToken(context.current)} found.`,
      ParseErrorCode.DIMENSION_MISMATCH,
      { axis: axis.toLowerCase(), found: context.current.kind }
    );
  }
  return readNumber(context);
}

/**
 * Read one coordinate tuple and build a point from it.
 *
 * While the dimensions are still open, the number of values in this tuple
 * settles them for the rest of the parse: one extra value is Z, a second
 * is M. A lone extra value is never read as M. Once settled, every tuple
 * must carry exactly the declared values.
 */
export function readCoordinates<G>(context: ParseContext<G>): ParseResult<G> {
  const x = readNumber(context);
  if (!x.success) return x;
  const y = readNumber(context);
  if (!y.success) return y;

  let z: number | undefined;
  let m: number | undefined;

  if (context.expectZ === undefined) {
    const extra: number[] = [];
    while (context.current.kind === TokenKind.Number) {
      const value = readNumber(context);
      if (!value.success) return value;
      extra.push(value.value);
    }

    const unresolved = !context.hasFactory;
    const remaining = [...extra];
    context.expectZ = remaining.length > 0 && (unresolved || context.capabilities.supportsZ);
    if (context.expectZ) z = remaining.shift();
    context.expectM =
      context.expectZ && remaining.length > 0 && (unresolved || context.capabilities.supportsM);
    if (context.expectM) m = remaining.shift();

    if (remaining.length > 0) {
      return fail(
        `Found ${extra.length + 2} coordinates, which is too many for this factory.`,
        ParseErrorCode.TOO_MANY_COORDINATES,
        { count: extra.length + 2 }
      );
    }
  } else {
    if (context.expectZ) {
      const value = readDeclaredValue(context, 'Z');
      if (!value.success) return value;
      z = value.value;
    }
    if (context.expectM) {
      const value = readDeclaredValue(context, 'M');
      if (!value.success) return value;
      m = value.value;
    }
    if (context.current.kind === TokenKind.Number) {
      return fail(
        'Coordinate has more values than the dimensions already established for this geometry.',
        ParseErrorCode.DIMENSION_MISMATCH,
        { expectZ: context.expectZ, expectM: context.expectM }
      );
    }
  }

  const factory = context.resolveFactory();
  if (!factory.success) return factory;

  // Every axis the factory holds gets a value, 0 when the input carries none
  const { supportsZ, supportsM } = context.capabilities;
  return ok(
    factory.value.point(
      x.value,
      y.value,
      supportsZ ? (z ?? 0) : undefined,
      supportsM ? (m ?? 0) : undefined
    )
  );
}
