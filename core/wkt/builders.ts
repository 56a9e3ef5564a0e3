import { ParseContext } from './context';
import { readCoordinates } from './coordinate-reader';
import { ParseResult, ok } from './result';
import { TokenKind } from './types';

export type ElementParser<G, T = G> = (context: ParseContext<G>) => ParseResult<T>;

/**
 * Read `EMPTY` or a parenthesized, comma-separated list of elements.
 * Leaves the context on the token after `EMPTY` or the closing bracket.
 */
export function parseElements<G, T>(
  context: ParseContext<G>,
  parseElement: ElementParser<G, T>
): ParseResult<T[]> {
  const elements: T[] = [];

  if (!context.isWord('empty')) {
    const begin = context.consume(TokenKind.Begin);
    if (!begin.success) return begin;

    for (;;) {
      const element = parseElement(context);
      if (!element.success) return element;
      elements.push(element.value);

      if (context.current.kind === TokenKind.End) break;
      const comma = context.consume(TokenKind.Comma);
      if (!comma.success) return comma;
    }
  }

  const advanced = context.advance();
  if (!advanced.success) return advanced;
  return ok(elements);
}

/**
 * POINT body. A top-level or collection `POINT EMPTY` comes back as an
 * empty multi-point; inside a MULTIPOINT `EMPTY` is not accepted.
 */
export function parsePoint<G>(context: ParseContext<G>, convertEmpty = false): ParseResult<G> {
  let point: G;

  if (convertEmpty && context.isWord('empty')) {
    const factory = context.resolveFactory();
    if (!factory.success) return factory;
    point = factory.value.multiPoint([]);
  } else {
    const begin = context.consume(TokenKind.Begin);
    if (!begin.success) return begin;
    const coordinates = readCoordinates(context);
    if (!coordinates.success) return coordinates;
    const end = context.expect(TokenKind.End);
    if (!end.success) return end;
    point = coordinates.value;
  }

  const advanced = context.advance();
  if (!advanced.success) return advanced;
  return ok(point);
}

export function parseLineString<G>(context: ParseContext<G>): ParseResult<G> {
  const points = parseElements(context, readCoordinates);
  if (!points.success) return points;
  const factory = context.resolveFactory();
  if (!factory.success) return factory;
  return ok(factory.value.lineString(points.value));
}

/**
 * POLYGON body: the first ring is the outer boundary, the rest are holes
 */
export function parsePolygon<G>(context: ParseContext<G>): ParseResult<G> {
  const rings = parseElements(context, parseLineString);
  if (!rings.success) return rings;
  const factory = context.resolveFactory();
  if (!factory.success) return factory;

  const [outerRing, ...innerRings] = rings.value;
  if (outerRing === undefined) {
    return ok(factory.value.polygon(factory.value.linearRing([]), []));
  }
  return ok(factory.value.polygon(outerRing, innerRings));
}

/**
 * GEOMETRYCOLLECTION body. Members are full tagged geometries, read by
 * the dispatcher passed in.
 */
export function parseGeometryCollection<G>(
  context: ParseContext<G>,
  parseMember: ElementParser<G>
): ParseResult<G> {
  const geometries = parseElements(context, parseMember);
  if (!geometries.success) return geometries;
  const factory = context.resolveFactory();
  if (!factory.success) return factory;
  return ok(factory.value.collection(geometries.value));
}

/**
 * MULTIPOINT body. Members are `(x y)` or a bare `x y` tuple.
 */
export function parseMultiPoint<G>(context: ParseContext<G>): ParseResult<G> {
  const points = parseElements(context, member =>
    member.current.kind === TokenKind.Number ? readCoordinates(member) : parsePoint(member)
  );
  if (!points.success) return points;
  const factory = context.resolveFactory();
  if (!factory.success) return factory;
  return ok(factory.value.multiPoint(points.value));
}

export function parseMultiLineString<G>(context: ParseContext<G>): ParseResult<G> {
  const lineStrings = parseElements(context, parseLineString);
  if (!lineStrings.success) return lineStrings;
  const factory = context.resolveFactory();
  if (!factory.success) return factory;
  return ok(factory.value.multiLineString(lineStrings.value));
}

export function parseMultiPolygon<G>(context: ParseContext<G>): ParseResult<G> {
  const polygons = parseElements(context, parsePolygon);
  if (!polygons.success) return polygons;
  const factory = context.resolveFactory();
  if (!factory.success) return factory;
  return ok(factory.value.multiPolygon(polygons.value));
}
