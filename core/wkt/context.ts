import { ParseErrorCode } from '../errors/types';
import { LogManager } from '../logging/log-manager';
import { ParseSettings } from './options';
import { ParseResult, ok, fail } from './result';
import { WktTokenizer } from './tokenizer';
import {
  DimensionFlag,
  FactoryCapabilities,
  GeometryFactory,
  Token,
  TokenKind,
  describeToken
} from './types';

const LOG_SOURCE = 'WktParser';

/**
 * State of one parse: the token stream, the dimensions the input has
 * committed to and the factory negotiated for it. Created per call and
 * passed by reference through every grammar function.
 */
export class ParseContext<G> {
  private tokenizer: WktTokenizer | null;
  private token: Token = { kind: TokenKind.EndOfInput };
  private factory: GeometryFactory<G> | null = null;
  private factoryCapabilities: FactoryCapabilities = { supportsZ: false, supportsM: false };
  private readonly logger = LogManager.getInstance();

  expectZ: DimensionFlag = undefined;
  expectM: DimensionFlag = undefined;

  constructor(
    readonly settings: ParseSettings<G>,
    text: string,
    readonly srid?: number
  ) {
    this.tokenizer = new WktTokenizer(text);
    if (!settings.factoryGenerator) {
      this.adoptFactory(settings.defaultFactory);
    }
  }

  get current(): Token {
    return this.token;
  }

  get capabilities(): FactoryCapabilities {
    return this.factoryCapabilities;
  }

  get hasFactory(): boolean {
    return this.factory !== null;
  }

  /**
   * Move to the next token
   */
  advance(): ParseResult<Token> {
    if (!this.tokenizer) {
      return ok(this.token);
    }
    const result = this.tokenizer.next();
    if (result.success) {
      this.token = result.value;
    }
    return result;
  }

  /**
   * Drop the token stream. The context is unusable afterwards.
   */
  release(): void {
    this.tokenizer = null;
    this.token = { kind: TokenKind.EndOfInput };
  }

  isWord(text: string): boolean {
    return this.token.kind === TokenKind.Word && this.token.text === text;
  }

  /**
   * Fail unless the current token is of the given kind
   */
  expect<K extends TokenKind>(kind: K): ParseResult<Extract<Token, { kind: K }>> {
    const token = this.token;
    if (isKind(token, kind)) {
      return ok(token);
    }
    return fail(
      `${kind} expected but ${describeToken(token)} found.`,
      ParseErrorCode.UNEXPECTED_TOKEN,
      { expected: kind, found: token.kind, position: this.tokenizer?.getPosition() }
    );
  }

  /**
   * Expect a token of the given kind and move past it
   */
  consume(kind: TokenKind): ParseResult<Token> {
    const expected = this.expect(kind);
    if (!expected.success) return expected;
    return this.advance();
  }

  /**
   * Factory for this parse, negotiated on first use. A generator sees the
   * SRID and whatever the input has declared so far; its factory is kept
   * for every nested geometry.
   */
  resolveFactory(): ParseResult<GeometryFactory<G>> {
    if (this.factory) {
      return ok(this.factory);
    }

    const { factoryGenerator, defaultFactory } = this.settings;
    const generated = factoryGenerator?.({
      srid: this.srid,
      supportZ: this.expectZ,
      supportM: this.expectM
    });
    const factory = this.adoptFactory(generated ?? defaultFactory);

    this.logger.debug(LOG_SOURCE, 'Factory resolved', {
      srid: this.srid,
      expectZ: this.expectZ,
      expectM: this.expectM,
      generated: Boolean(generated),
      ...this.factoryCapabilities
    });

    if (this.expectZ !== undefined) {
      const checked = this.checkCapabilities();
      if (!checked.success) return checked;
    }
    return ok(factory);
  }

  /**
   * Fail when the input requires an axis the factory cannot hold
   */
  checkCapabilities(): ParseResult<void> {
    if (this.expectZ && !this.factoryCapabilities.supportsZ) {
      return fail(
        "Geometry calls for Z coordinate but factory doesn't support it.",
        ParseErrorCode.CAPABILITY_MISMATCH,
        { axis: 'z' }
      );
    }
    if (this.expectM && !this.factoryCapabilities.supportsM) {
      return fail(
        "Geometry calls for M coordinate but factory doesn't support it.",
        ParseErrorCode.CAPABILITY_MISMATCH,
        { axis: 'm' }
      );
    }
    return ok(undefined);
  }

  private adoptFactory(factory: GeometryFactory<G>): GeometryFactory<G> {
    const { supportsZ, supportsM } = factory.capabilities();
    this.factory = factory;
    this.factoryCapabilities = { supportsZ, supportsM };
    return factory;
  }
}

function isKind<K extends TokenKind>(
  token: Token,
  kind: K
): token is Extract<Token, { kind: K }> {
  return token.kind === kind;
}
