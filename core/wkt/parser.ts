import { ParseErrorCode } from '../errors/types';
import { LogManager } from '../logging/log-manager';
import { ParseContext } from './context';
import { parseTaggedGeometry } from './dispatcher';
import {
  ParseSettings,
  WktParserOptions,
  resolveStrictWkt11,
  validateParserOptions
} from './options';
import { ParseResult, ok, fail } from './result';
import { extractSrid } from './tokenizer';
import { FactoryGenerator, GeometryFactory, TokenKind, describeToken } from './types';

const LOG_SOURCE = 'WktParser';

/**
 * Parses WKT, optionally with PostGIS EWKT or SFS 1.2 extensions, into
 * geometries built by a GeometryFactory.
 *
 * Options may be changed between calls to parse. Each call works on its
 * own ParseContext, so a parser can be shared and reused freely.
 */
export class WktParser<G> {
  private _defaultFactory: GeometryFactory<G>;
  private _factoryGenerator?: FactoryGenerator<G>;
  private _supportEwkt: boolean;
  private _supportWkt12: boolean;
  private _strictWkt11: boolean;
  private _ignoreExtraTokens: boolean;
  private readonly logger = LogManager.getInstance();

  constructor(options: WktParserOptions<G>) {
    validateParserOptions(options);
    this._defaultFactory = options.defaultFactory;
    this._factoryGenerator = options.factoryGenerator;
    this._supportEwkt = options.supportEwkt ?? false;
    this._supportWkt12 = options.supportWkt12 ?? false;
    this._strictWkt11 = options.strictWkt11 ?? false;
    this._ignoreExtraTokens = options.ignoreExtraTokens ?? false;
  }

  get defaultFactory(): GeometryFactory<G> {
    return this._defaultFactory;
  }

  set defaultFactory(factory: GeometryFactory<G>) {
    this._defaultFactory = factory;
  }

  get factoryGenerator(): FactoryGenerator<G> | undefined {
    return this._factoryGenerator;
  }

  set factoryGenerator(generator: FactoryGenerator<G> | undefined) {
    this._factoryGenerator = generator;
  }

  /**
   * Chainable form of the factoryGenerator setter
   */
  toGenerateFactory(generator: FactoryGenerator<G>): this {
    this._factoryGenerator = generator;
    return this;
  }

  get supportEwkt(): boolean {
    return this._supportEwkt;
  }

  set supportEwkt(value: boolean) {
    this._supportEwkt = value;
  }

  get supportWkt12(): boolean {
    return this._supportWkt12;
  }

  set supportWkt12(value: boolean) {
    this._supportWkt12 = value;
  }

  /**
   * Always false while EWKT or SFS 1.2 support is on
   */
  get strictWkt11(): boolean {
    return resolveStrictWkt11(this._strictWkt11, this._supportEwkt, this._supportWkt12);
  }

  set strictWkt11(value: boolean) {
    this._strictWkt11 = value;
  }

  get ignoreExtraTokens(): boolean {
    return this._ignoreExtraTokens;
  }

  set ignoreExtraTokens(value: boolean) {
    this._ignoreExtraTokens = value;
  }

  /**
   * Parse text into a geometry, throwing ParseError on the first problem
   */
  parse(text: string): G {
    const result = this.tryParse(text);
    if (!result.success) {
      throw result.error;
    }
    return result.value;
  }

  /**
   * Parse text into a geometry, returning the first problem as a failure
   */
  tryParse(text: string): ParseResult<G> {
    const settings = this.snapshot();
    const lowered = text.toLowerCase();
    const input: { text: string; srid?: number } = settings.supportEwkt
      ? extractSrid(lowered)
      : { text: lowered };
    const { srid } = input;
    const context = new ParseContext(settings, input.text, srid);

    this.logger.debug(LOG_SOURCE, 'Parsing WKT', {
      length: text.length,
      srid,
      supportEwkt: settings.supportEwkt,
      supportWkt12: settings.supportWkt12,
      strictWkt11: settings.strictWkt11
    });

    try {
      const result = this.parseDocument(context);
      if (!result.success) {
        this.logger.warn(LOG_SOURCE, 'WKT parse failed', {
          code: result.error.code,
          message: result.error.message
        });
      }
      return result;
    } finally {
      context.release();
    }
  }

  private parseDocument(context: ParseContext<G>): ParseResult<G> {
    const started = context.advance();
    if (!started.success) return started;

    const geometry = parseTaggedGeometry(context);
    if (!geometry.success) return geometry;

    const trailing = context.current;
    if (trailing.kind !== TokenKind.EndOfInput && !context.settings.ignoreExtraTokens) {
      return fail(
        `Extra tokens beginning with ${describeToken(trailing)}.`,
        ParseErrorCode.EXTRA_TOKENS,
        { token: trailing.kind }
      );
    }
    return ok(geometry.value);
  }

  private snapshot(): ParseSettings<G> {
    return {
      defaultFactory: this._defaultFactory,
      factoryGenerator: this._factoryGenerator,
      supportEwkt: this._supportEwkt,
      supportWkt12: this._supportWkt12,
      strictWkt11: this.strictWkt11,
      ignoreExtraTokens: this._ignoreExtraTokens
    };
  }
}
