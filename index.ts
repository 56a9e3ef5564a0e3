import { Geometry } from 'geojson';
import { GeoJsonGeometryFactory } from './core/factories/geojson-factory';
import { WktParser } from './core/wkt/parser';
import { WktParserOptions } from './core/wkt/options';

export * from './core/wkt/types';
export * from './core/wkt/result';
export { WktParser } from './core/wkt/parser';
export type { WktParserOptions } from './core/wkt/options';
export { extractSrid } from './core/wkt/tokenizer';
export * from './core/errors/types';
export * from './core/factories/geojson-factory';
export { LogManager, LogLevel } from './core/logging/log-manager';
export type { LogEntry } from './core/logging/log-manager';
export { initializeLogger } from './core/logging/init';

/**
 * Parse WKT into a GeoJSON geometry. Without a default factory, a 2D
 * GeoJsonGeometryFactory is used.
 */
export function parseWkt(
  text: string,
  options: Partial<WktParserOptions<Geometry>> = {}
): Geometry {
  const parser = new WktParser<Geometry>({
    ...options,
    defaultFactory: options.defaultFactory ?? new GeoJsonGeometryFactory()
  });
  return parser.parse(text);
}
