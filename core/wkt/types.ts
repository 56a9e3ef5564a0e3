/**
 * Token kinds produced by the WKT tokenizer
 */
export enum TokenKind {
  Number = 'number',
  Word = 'word',
  Begin = 'begin',
  End = 'end',
  Comma = 'comma',
  EndOfInput = 'end-of-input'
}

export type Token =
  | { kind: TokenKind.Number; value: number }
  | { kind: TokenKind.Word; text: string }
  | { kind: TokenKind.Begin }
  | { kind: TokenKind.End }
  | { kind: TokenKind.Comma }
  | { kind: TokenKind.EndOfInput };

/**
 * Unknown (undefined), present (true) or absent (false)
 */
export type DimensionFlag = boolean | undefined;

/**
 * Coordinate axes a factory can represent beyond X and Y
 */
export interface FactoryCapabilities {
  supportsZ: boolean;
  supportsM: boolean;
}

/**
 * Builds concrete geometries. The parser never looks inside a geometry;
 * it only hands points and sub-geometries back to the factory.
 */
export interface GeometryFactory<G> {
  capabilities(): FactoryCapabilities;
  point(x: number, y: number, z?: number, m?: number): G;
  lineString(points: G[]): G;
  linearRing(points: G[]): G;
  polygon(outerRing: G, innerRings: G[]): G;
  multiPoint(points: G[]): G;
  multiLineString(lineStrings: G[]): G;
  multiPolygon(polygons: G[]): G;
  collection(geometries: G[]): G;
}

/**
 * What the input has declared by the time a factory is needed
 */
export interface FactoryRequest {
  srid?: number;
  supportZ: DimensionFlag;
  supportM: DimensionFlag;
}

/**
 * Picks a factory for a parse. Returning nothing falls back to the
 * parser's default factory.
 */
export type FactoryGenerator<G> = (
  request: FactoryRequest
) => GeometryFactory<G> | null | undefined;

/**
 * Keywords accepted as geometry type tags
 */
export type GeometryTypeTag =
  | 'point'
  | 'linestring'
  | 'polygon'
  | 'geometrycollection'
  | 'multipoint'
  | 'multilinestring'
  | 'multipolygon';

/**
 * Type guard to check if a keyword is a supported geometry type tag
 */
export function isGeometryTypeTag(keyword: string): keyword is GeometryTypeTag {
  return [
    'point',
    'linestring',
    'polygon',
    'geometrycollection',
    'multipoint',
    'multilinestring',
    'multipolygon'
  ].includes(keyword);
}

export function describeToken(token: Token): string {
  switch (token.kind) {
    case TokenKind.Number:
      return String(token.value);
    case TokenKind.Word:
      return `"${token.text}"`;
    case TokenKind.Begin:
      return '"("';
    case TokenKind.End:
      return '")"';
    case TokenKind.Comma:
      return '","';
    case TokenKind.EndOfInput:
      return 'end of input';
  }
}
