/**
 * Shared lexer for the length, edges, corners and color literals.
 *
 * Whitespace is skipped, so adjacency rules ("no space between a number and
 * its unit") are checked on token offsets instead.
 */
import { createToken, type IToken, Lexer, type TokenType } from "chevrotain";

export class LiteralError extends Error {
  constructor(message: string, readonly input: string) {
    super(`${message} in "${input}"`);
    this.name = "LiteralError";
  }
}

export const LitWS = createToken({ name: "LitWS", pattern: /\s+/, group: Lexer.SKIPPED });
export const Word = createToken({ name: "Word", pattern: /[A-Za-z_][A-Za-z0-9_]*/ });
export const Omit = createToken({ name: "Omit", pattern: /_/, longer_alt: Word });
export const Hex = createToken({ name: "Hex", pattern: /#[A-Za-z0-9]*/ });
export const Num = createToken({ name: "Num", pattern: /\d+(?:\.\d+)?(?:[eE][+-]?\d+)?/ });
export const PercentSign = createToken({ name: "PercentSign", pattern: /%/ });
export const At = createToken({ name: "At", pattern: /@/ });
export const Bang = createToken({ name: "Bang", pattern: /!/ });
export const Minus = createToken({ name: "Minus", pattern: /-/ });
export const LitLParen = createToken({ name: "LitLParen", pattern: /\(/ });
export const LitRParen = createToken({ name: "LitRParen", pattern: /\)/ });
export const LitComma = createToken({ name: "LitComma", pattern: /,/ });

const LiteralLexer = new Lexer([
  LitWS,
  Hex,
  Num,
  PercentSign,
  At,
  Bang,
  Minus,
  LitLParen,
  LitRParen,
  LitComma,
  Omit,
  Word,
]);

/** Cursor over the tokens of one literal. */
export class LiteralTokens {
  private index = 0;

  private constructor(
    readonly input: string,
    private readonly tokens: IToken[],
  ) {}

  static lex(input: string): LiteralTokens {
    const result = LiteralLexer.tokenize(input);
    const [first] = result.errors;
    if (first) {
      throw new LiteralError(`Unexpected character "${input.charAt(first.offset)}"`, input);
    }
    return new LiteralTokens(input, result.tokens);
  }

  peek(type?: TokenType): IToken | undefined {
    const token = this.tokens[this.index];
    if (!token || (type && token.tokenType !== type)) return undefined;
    return token;
  }

  next(): IToken | undefined {
    const token = this.tokens[this.index];
    if (token) this.index++;
    return token;
  }

  expect(type: TokenType, what: string): IToken {
    const token = this.peek(type);
    if (!token) throw this.error(`Expected ${what}`);
    this.index++;
    return token;
  }

  atEnd(): boolean {
    return this.index >= this.tokens.length;
  }

  error(message: string): LiteralError {
    const token = this.tokens[this.index];
    return new LiteralError(token ? `${message}, found "${token.image}"` : `${message} at end of input`, this.input);
  }
}

/** True when `b` starts right where `a` ends. */
export function adjacent(a: IToken, b: IToken): boolean {
  return a.startOffset + a.image.length === b.startOffset;
}
