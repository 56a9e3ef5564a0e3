import { ParseErrorCode } from '../errors/types';
import {
  parseGeometryCollection,
  parseLineString,
  parseMultiLineString,
  parseMultiPoint,
  parseMultiPolygon,
  parsePoint,
  parsePolygon
} from './builders';
import { ParseContext } from './context';
import { ParseResult, ok, fail } from './result';
import { TokenKind, isGeometryTypeTag } from './types';

const EWKT_M_SUFFIX = /^(.+)m$/;
const WKT12_DIMENSION_MARKER = /^z?m?$/;

interface TypeTag {
  keyword: string;
  marker: string;
}

/**
 * Read the type keyword and any dimension marker: a fused EWKT `m`
 * (`pointm`), or a separate SFS 1.2 `z` / `m` / `zm` token.
 */
function readTypeTag<G>(context: ParseContext<G>): ParseResult<TypeTag> {
  const word = context.expect(TokenKind.Word);
  if (!word.success) return word;

  const { supportEwkt, supportWkt12 } = context.settings;
  const fused = supportEwkt ? EWKT_M_SUFFIX.exec(word.value.text) : null;
  const tag: TypeTag = fused
    ? { keyword: fused[1], marker: 'm' }
    : { keyword: word.value.text, marker: '' };

  const advanced = context.advance();
  if (!advanced.success) return advanced;

  const next = context.current;
  if (
    tag.marker === '' &&
    supportWkt12 &&
    next.kind === TokenKind.Word &&
    WKT12_DIMENSION_MARKER.test(next.text)
  ) {
    tag.marker = next.text;
    const skipped = context.advance();
    if (!skipped.success) return skipped;
  }

  return ok(tag);
}

/**
 * Commit the parse to the dimensions a tag declares, or check the tag
 * against the ones already committed to.
 */
function applyDimensions<G>(
  context: ParseContext<G>,
  marker: string,
  nested: boolean
): ParseResult<void> {
  const establishing = context.expectZ === undefined;
  const expectZ = marker.startsWith('z');
  const expectM = marker.endsWith('m');
  const scope = nested ? 'Surrounding collection' : 'Geometry';

  if (context.expectZ === undefined) {
    context.expectZ = expectZ;
  } else if (context.expectZ !== expectZ) {
    return fail(
      `${scope} ${context.expectZ ? 'has' : 'lacks'} Z but contained geometry ${expectZ ? 'has' : "doesn't"}.`,
      ParseErrorCode.DIMENSION_MISMATCH,
      { axis: 'z', established: context.expectZ, declared: expectZ }
    );
  }

  if (context.expectM === undefined) {
    context.expectM = expectM;
  } else if (context.expectM !== expectM) {
    return fail(
      `${scope} ${context.expectM ? 'has' : 'lacks'} M but contained geometry ${expectM ? 'has' : "doesn't"}.`,
      ParseErrorCode.DIMENSION_MISMATCH,
      { axis: 'm', established: context.expectM, declared: expectM }
    );
  }

  if (!establishing) {
    return ok(undefined);
  }
  if (context.hasFactory) {
    return context.checkCapabilities();
  }
  const factory = context.resolveFactory();
  if (!factory.success) return factory;
  return ok(undefined);
}

/**
 * Parse one tagged geometry: `<tag> [marker] (EMPTY | body)`.
 * Collections call back in here for each member with `nested` set.
 */
export function parseTaggedGeometry<G>(
  context: ParseContext<G>,
  nested = false
): ParseResult<G> {
  const tag = readTypeTag(context);
  if (!tag.success) return tag;
  const { keyword, marker } = tag.value;

  if (marker !== '' || context.settings.strictWkt11) {
    const dimensions = applyDimensions(context, marker, nested);
    if (!dimensions.success) return dimensions;
  }

  if (!isGeometryTypeTag(keyword)) {
    return fail(`Unknown type tag: "${keyword}".`, ParseErrorCode.UNKNOWN_TYPE, {
      keyword
    });
  }

  switch (keyword) {
    case 'point':
      return parsePoint(context, true);
    case 'linestring':
      return parseLineString(context);
    case 'polygon':
      return parsePolygon(context);
    case 'geometrycollection':
      return parseGeometryCollection(context, member => parseTaggedGeometry(member, true));
    case 'multipoint':
      return parseMultiPoint(context);
    case 'multilinestring':
      return parseMultiLineString(context);
    case 'multipolygon':
      return parseMultiPolygon(context);
  }
}
