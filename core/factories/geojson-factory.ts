import {
  Geometry,
  GeometryCollection,
  LineString,
  MultiLineString,
  MultiPoint,
  MultiPolygon,
  Point,
  Polygon,
  Position
} from 'geojson';
import { WktLoaderError } from '../errors/types';
import { FactoryCapabilities, FactoryRequest, GeometryFactory } from '../wkt/types';

export interface GeoJsonFactoryOptions {
  /** Keep Z values in positions */
  supportZ?: boolean;
  /** Keep M values in positions, after Z when both are kept */
  supportM?: boolean;
  /** Spatial reference the geometries belong to */
  srid?: number;
}

/**
 * Axis order of the positions a factory produces
 */
export type CoordinateLayout = 'XY' | 'XYZ' | 'XYM' | 'XYZM';

type GeometryType = Geometry['type'];
type GeometryOf<K extends GeometryType> = Extract<Geometry, { type: K }>;

function isGeometryType<K extends GeometryType>(geometry: Geometry, type: K): geometry is GeometryOf<K> {
  return geometry.type === type;
}

function ensureType<K extends GeometryType>(geometry: Geometry, type: K, role: string): GeometryOf<K> {
  if (isGeometryType(geometry, type)) {
    return geometry;
  }
  throw new WktLoaderError(
    `Invalid ${role}: expected ${type} but got ${geometry.type}`,
    'INVALID_GEOMETRY',
    { expected: type, actual: geometry.type, role }
  );
}

/**
 * Builds GeoJSON geometries from parsed WKT.
 *
 * GeoJSON has no linear ring or M axis of its own: rings are LineStrings,
 * and M values are appended to positions as described by `layout`.
 */
export class GeoJsonGeometryFactory implements GeometryFactory<Geometry> {
  readonly srid?: number;
  private readonly supportZ: boolean;
  private readonly supportM: boolean;

  constructor(options: GeoJsonFactoryOptions = {}) {
    this.supportZ = options.supportZ ?? false;
    this.supportM = options.supportM ?? false;
    this.srid = options.srid;
  }

  get layout(): CoordinateLayout {
    if (this.supportZ) {
      return this.supportM ? 'XYZM' : 'XYZ';
    }
    return this.supportM ? 'XYM' : 'XY';
  }

  capabilities(): FactoryCapabilities {
    return { supportsZ: this.supportZ, supportsM: this.supportM };
  }

  point(x: number, y: number, z?: number, m?: number): Point {
    const position: Position = [x, y];
    if (this.supportZ && z !== undefined) {
      position.push(z);
    }
    if (this.supportM && m !== undefined) {
      position.push(m);
    }
    return { type: 'Point', coordinates: position };
  }

  lineString(points: Geometry[]): LineString {
    return {
      type: 'LineString',
      coordinates: points.map(point => ensureType(point, 'Point', 'line string vertex').coordinates)
    };
  }

  linearRing(points: Geometry[]): LineString {
    return this.lineString(points);
  }

  polygon(outerRing: Geometry, innerRings: Geometry[]): Polygon {
    const outer = ensureType(outerRing, 'LineString', 'outer ring').coordinates;
    const inner = innerRings.map(ring => ensureType(ring, 'LineString', 'inner ring').coordinates);
    // An empty outer ring means an empty polygon
    return {
      type: 'Polygon',
      coordinates: outer.length === 0 && inner.length === 0 ? [] : [outer, ...inner]
    };
  }

  multiPoint(points: Geometry[]): MultiPoint {
    return {
      type: 'MultiPoint',
      coordinates: points.map(point => ensureType(point, 'Point', 'multi-point member').coordinates)
    };
  }

  multiLineString(lineStrings: Geometry[]): MultiLineString {
    return {
      type: 'MultiLineString',
      coordinates: lineStrings.map(
        line => ensureType(line, 'LineString', 'multi-line-string member').coordinates
      )
    };
  }

  multiPolygon(polygons: Geometry[]): MultiPolygon {
    return {
      type: 'MultiPolygon',
      coordinates: polygons.map(
        polygon => ensureType(polygon, 'Polygon', 'multi-polygon member').coordinates
      )
    };
  }

  collection(geometries: Geometry[]): GeometryCollection {
    return { type: 'GeometryCollection', geometries: [...geometries] };
  }
}

/**
 * Generator that builds a GeoJSON factory for the SRID and dimensions
 * the input declares. An axis that is still undecided is supported.
 */
export function createGeoJsonFactoryGenerator(): (request: FactoryRequest) => GeoJsonGeometryFactory {
  return request =>
    new GeoJsonGeometryFactory({
      srid: request.srid,
      supportZ: request.supportZ ?? true,
      supportM: request.supportM ?? true
    });
}
