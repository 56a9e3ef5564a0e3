import { WktLoaderError, ParseError } from '../../errors/types';
import { WktParser } from '../../wkt/parser';
import { parseWkt } from '../../../index';
import { GeoJsonGeometryFactory, createGeoJsonFactoryGenerator } from '../geojson-factory';

describe('GeoJsonGeometryFactory', () => {
  describe('positions', () => {
    it('should keep only X and Y by default', () => {
      const factory = new GeoJsonGeometryFactory();

      expect(factory.point(1, 2, 3, 4)).toEqual({ type: 'Point', coordinates: [1, 2] });
      expect(factory.layout).toBe('XY');
    });

    it('should append the axes it supports in Z, M order', () => {
      expect(new GeoJsonGeometryFactory({ supportZ: true }).point(1, 2, 3, 4).coordinates).toEqual([1, 2, 3]);
      expect(new GeoJsonGeometryFactory({ supportM: true }).point(1, 2, 3, 4).coordinates).toEqual([1, 2, 4]);
      expect(
        new GeoJsonGeometryFactory({ supportZ: true, supportM: true }).point(1, 2, 3, 4).coordinates
      ).toEqual([1, 2, 3, 4]);
    });

    it('should keep M after a zero Z on an XYZM factory', () => {
      const parser = new WktParser({
        supportWkt12: true,
        defaultFactory: new GeoJsonGeometryFactory({ supportZ: true, supportM: true })
      });

      expect(parser.parse('POINT M (1 2 3)')).toEqual({ type: 'Point', coordinates: [1, 2, 0, 3] });
      expect(parser.parse('POINT Z (1 2 3)')).toEqual({ type: 'Point', coordinates: [1, 2, 3, 0] });
    });
  });

  describe('member validation', () => {
    it('should reject a line string vertex that is not a point', () => {
      const factory = new GeoJsonGeometryFactory();

      expect(() => factory.lineString([factory.multiPoint([])])).toThrow(WktLoaderError);
      expect(() => factory.lineString([factory.multiPoint([])])).toThrow(
        'Invalid line string vertex: expected Point but got MultiPoint'
      );
    });

    it('should reject a polygon ring that is not a line string', () => {
      const factory = new GeoJsonGeometryFactory();

      expect(() => factory.polygon(factory.point(0, 0), [])).toThrow(
        'Invalid outer ring: expected LineString but got Point'
      );
    });
  });

  describe('with WktParser', () => {
    it('should parse a point', () => {
      expect(parseWkt('POINT (1 2)')).toEqual({ type: 'Point', coordinates: [1, 2] });
    });

    it('should reject Z values on the default 2D factory', () => {
      expect(() => parseWkt('POINT (1 2 3)')).toThrow(ParseError);
    });

    it('should parse a 3D line string', () => {
      const parser = new WktParser({ defaultFactory: new GeoJsonGeometryFactory({ supportZ: true }) });

      expect(parser.parse('LINESTRING (0 0 1, 1 1 2)')).toEqual({
        type: 'LineString',
        coordinates: [
          [0, 0, 1],
          [1, 1, 2]
        ]
      });
    });

    it('should parse a polygon with a hole', () => {
      expect(parseWkt('POLYGON((0 0,10 0,10 10,0 10,0 0),(2 2,2 4,4 4,4 2,2 2))')).toEqual({
        type: 'Polygon',
        coordinates: [
          [[0, 0], [10, 0], [10, 10], [0, 10], [0, 0]],
          [[2, 2], [2, 4], [4, 4], [4, 2], [2, 2]]
        ]
      });
    });

    it('should parse empty geometries', () => {
      expect(parseWkt('POINT EMPTY')).toEqual({ type: 'MultiPoint', coordinates: [] });
      expect(parseWkt('POLYGON EMPTY')).toEqual({ type: 'Polygon', coordinates: [] });
      expect(parseWkt('GEOMETRYCOLLECTION EMPTY')).toEqual({ type: 'GeometryCollection', geometries: [] });
    });

    it('should parse multi geometries', () => {
      expect(parseWkt('MULTIPOLYGON (((0 0, 1 0, 1 1, 0 0)))')).toEqual({
        type: 'MultiPolygon',
        coordinates: [[[[0, 0], [1, 0], [1, 1], [0, 0]]]]
      });
      expect(parseWkt('MULTILINESTRING ((0 0, 1 1), (2 2, 3 3))')).toEqual({
        type: 'MultiLineString',
        coordinates: [
          [[0, 0], [1, 1]],
          [[2, 2], [3, 3]]
        ]
      });
    });

    it('should parse a geometry collection', () => {
      expect(parseWkt('GEOMETRYCOLLECTION (POINT (1 2), LINESTRING (0 0, 1 1))')).toEqual({
        type: 'GeometryCollection',
        geometries: [
          { type: 'Point', coordinates: [1, 2] },
          { type: 'LineString', coordinates: [[0, 0], [1, 1]] }
        ]
      });
    });

    it('should parse EWKT through the generator', () => {
      const geometry = parseWkt('SRID=4326;POINTM (1 2 3)', {
        supportEwkt: true,
        factoryGenerator: createGeoJsonFactoryGenerator()
      });

      expect(geometry).toEqual({ type: 'Point', coordinates: [1, 2, 3] });
    });

    it('should keep the axis order after a leading EMPTY', () => {
      const geometry = parseWkt('GEOMETRYCOLLECTION (POINT EMPTY, POINT M (1 2 3))', {
        supportWkt12: true,
        factoryGenerator: createGeoJsonFactoryGenerator()
      });

      expect(geometry).toEqual({
        type: 'GeometryCollection',
        geometries: [
          { type: 'MultiPoint', coordinates: [] },
          { type: 'Point', coordinates: [1, 2, 0, 3] }
        ]
      });
    });
  });
});

describe('createGeoJsonFactoryGenerator', () => {
  it('should build a factory for the requested SRID and dimensions', () => {
    const factory = createGeoJsonFactoryGenerator()({ srid: 4326, supportZ: false, supportM: true });

    expect(factory.srid).toBe(4326);
    expect(factory.layout).toBe('XYM');
    expect(factory.capabilities()).toEqual({ supportsZ: false, supportsM: true });
  });

  it('should support axes that are still undecided', () => {
    const factory = createGeoJsonFactoryGenerator()({ supportZ: undefined, supportM: undefined });

    expect(factory.srid).toBeUndefined();
    expect(factory.layout).toBe('XYZM');
  });
});
