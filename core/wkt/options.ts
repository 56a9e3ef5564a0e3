import { z } from 'zod';
import { WktLoaderError } from '../errors/types';
import { FactoryGenerator, GeometryFactory } from './types';

/**
 * Options recognized by WktParser
 */
export interface WktParserOptions<G> {
  /** Factory used when there is no generator, or the generator returns nothing */
  defaultFactory: GeometryFactory<G>;
  /** Picks a factory from the SRID and the dimensions declared by the input */
  factoryGenerator?: FactoryGenerator<G>;
  /** Accept the PostGIS `SRID=n;` prefix and fused M tags such as `POINTM` */
  supportEwkt?: boolean;
  /** Accept SFS 1.2 `Z`, `M` and `ZM` tokens after the type tag */
  supportWkt12?: boolean;
  /** Only X and Y are allowed. Ignored when either extension is enabled. */
  strictWkt11?: boolean;
  /** Do not fail on tokens left after a complete geometry */
  ignoreExtraTokens?: boolean;
}

/**
 * Settings a single parse runs with. Taken from the parser when the parse
 * starts and not changed until it ends.
 */
export interface ParseSettings<G> {
  defaultFactory: GeometryFactory<G>;
  factoryGenerator?: FactoryGenerator<G>;
  supportEwkt: boolean;
  supportWkt12: boolean;
  strictWkt11: boolean;
  ignoreExtraTokens: boolean;
}

const factorySchema = z
  .object({
    capabilities: z.function(),
    point: z.function(),
    lineString: z.function(),
    linearRing: z.function(),
    polygon: z.function(),
    multiPoint: z.function(),
    multiLineString: z.function(),
    multiPolygon: z.function(),
    collection: z.function()
  })
  .passthrough();

export const parserOptionsSchema = z.object({
  defaultFactory: factorySchema,
  factoryGenerator: z.function().optional(),
  supportEwkt: z.boolean().optional(),
  supportWkt12: z.boolean().optional(),
  strictWkt11: z.boolean().optional(),
  ignoreExtraTokens: z.boolean().optional()
});

/**
 * Reject option objects that do not match WktParserOptions at runtime
 */
export function validateParserOptions(options: unknown): void {
  const result = parserOptionsSchema.safeParse(options);
  if (!result.success) {
    const issues = result.error.issues.map(
      issue => `${issue.path.join('.') || 'options'}: ${issue.message}`
    );
    throw new WktLoaderError(
      `Invalid WKT parser options: ${issues.join('; ')}`,
      'INVALID_OPTIONS',
      { issues }
    );
  }
}

/**
 * Strict WKT 1.1 is meaningless once an extension is enabled
 */
export function resolveStrictWkt11(
  strictWkt11: boolean,
  supportEwkt: boolean,
  supportWkt12: boolean
): boolean {
  return strictWkt11 && !supportEwkt && !supportWkt12;
}
