/**
 * Chevrotain Lexer for Sprout sources.
 *
 * Splits source text into atoms for the token-tree builder. Anything inside a
 * component, argument or code block is host JavaScript, so the lexer only
 * needs to know enough about it to find delimiters. Literals that may hold
 * brackets (strings, templates, regular expressions) are kept whole, and every
 * operator the grammar does not care about collapses into one `Punct` token.
 */
import { type CustomPatternMatcherReturn, type IToken, createToken, Lexer } from "chevrotain";

// ── Whitespace & comments ──────────────────────────────────────────────────

export const Newline = createToken({
  name: "Newline",
  pattern: /\r?\n/,
  group: Lexer.SKIPPED,
});

export const WS = createToken({
  name: "WS",
  pattern: /[ \t\f\v]+/,
  group: Lexer.SKIPPED,
});

export const LineComment = createToken({
  name: "LineComment",
  pattern: /\/\/[^\r\n]*/,
  group: Lexer.SKIPPED,
});

export const BlockComment = createToken({
  name: "BlockComment",
  pattern: /\/\*[\s\S]*?\*\//,
  group: Lexer.SKIPPED,
  line_breaks: true,
});

// ── Identifiers (defined first, keywords reference them via longer_alt) ───────

export const Identifier = createToken({
  name: "Identifier",
  pattern: /[A-Za-z_$][\w$]*/,
});

// ── Flow keywords ──────────────────────────────────────────────────────────

export const IfKw       = createToken({ name: "IfKw",       pattern: /if/,       longer_alt: Identifier });
export const ElseKw     = createToken({ name: "ElseKw",     pattern: /else/,     longer_alt: Identifier });
export const ForKw      = createToken({ name: "ForKw",      pattern: /for/,      longer_alt: Identifier });
export const WhileKw    = createToken({ name: "WhileKw",    pattern: /while/,    longer_alt: Identifier });
export const BreakKw    = createToken({ name: "BreakKw",    pattern: /break/,    longer_alt: Identifier });
export const ContinueKw = createToken({ name: "ContinueKw", pattern: /continue/, longer_alt: Identifier });

// ── Delimiters & punctuation the grammar reads ─────────────────────────────

export const LParen    = createToken({ name: "LParen",    pattern: /\(/ });
export const RParen    = createToken({ name: "RParen",    pattern: /\)/ });
export const LSquare   = createToken({ name: "LSquare",   pattern: /\[/ });
export const RSquare   = createToken({ name: "RSquare",   pattern: /\]/ });
export const LCurly    = createToken({ name: "LCurly",    pattern: /\{/ });
export const RCurly    = createToken({ name: "RCurly",    pattern: /\}/ });
export const Semicolon = createToken({ name: "Semicolon", pattern: /;/ });
export const Comma     = createToken({ name: "Comma",     pattern: /,/ });
export const Dot       = createToken({ name: "Dot",       pattern: /\./ });
export const Greater   = createToken({ name: "Greater",   pattern: />/ });
export const Plus      = createToken({ name: "Plus",      pattern: /\+/ });

/**
 * Host operators. Longest alternatives come first so that `=>`, `>=`, `>>`,
 * `++`, `+=` and the spread `...` never split into grammar punctuation.
 */
export const Punct = createToken({
  name: "Punct",
  pattern: /\.\.\.|>>>=|>>>|>>=|<<=|\*\*=|&&=|\|\|=|\?\?=|===|!==|=>|>=|<=|==|!=|>>|<<|\+\+|--|\+=|-=|\*=|\/=|%=|&=|\|=|\^=|&&|\|\||\?\?|\?\.|\*\*|[-*/%=<!~?:&|^@#]/,
});

// ── Literals ───────────────────────────────────────────────────────────────

export const StringLiteral = createToken({
  name: "StringLiteral",
  pattern: /"(?:[^"\\\r\n]|\\.)*"|'(?:[^'\\\r\n]|\\.)*'/,
});

export const TemplateLiteral = createToken({
  name: "TemplateLiteral",
  pattern: { exec: matchTemplate },
  line_breaks: true,
  start_chars_hint: ["`"],
});

/**
 * A regular expression literal. A `/` only opens one where the previous
 * token cannot end an expression; after a name, a number or a closing
 * bracket it is division.
 */
export const RegexLiteral = createToken({
  name: "RegexLiteral",
  pattern: { exec: matchRegex },
  line_breaks: false,
  start_chars_hint: ["/"],
});

export const NumberLiteral = createToken({
  name: "NumberLiteral",
  pattern: /(?:0[xX][\da-fA-F_]+|0[bB][01_]+|0[oO][0-7_]+|(?:\d[\d_]*(?:\.[\d_]*)?|\.\d[\d_]*)(?:[eE][+-]?\d+)?)n?/,
});

// ── Token ordering ─────────────────────────────────────────────────────────

export const allTokens = [
  WS,
  Newline,
  LineComment,
  BlockComment,
  StringLiteral,
  TemplateLiteral,
  // Before Punct, which would take `/` as division
  RegexLiteral,
  LParen,
  RParen,
  LSquare,
  RSquare,
  LCurly,
  RCurly,
  Semicolon,
  Comma,
  // Numbers before Dot so `.5` stays a literal
  NumberLiteral,
  Punct,
  Dot,
  Greater,
  Plus,
  // Keywords before Identifier (longer_alt prevents prefix stealing)
  IfKw,
  ElseKw,
  ForKw,
  WhileKw,
  BreakKw,
  ContinueKw,
  Identifier,
];

export const SproutLexer = new Lexer(allTokens, {
  positionTracking: "full",
});

// ── Template and regex scanning ────────────────────────────────────────────

function matchTemplate(text: string, offset: number): CustomPatternMatcherReturn | null {
  if (text.charAt(offset) !== "`") return null;
  const end = scanTemplate(text, offset);
  return end === -1 ? null : [text.slice(offset, end)];
}

/**
 * `[start, end)` of every `${...}` body in a template literal's image,
 * nested templates included in their enclosing body.
 */
export function templateSubstitutions(image: string): Array<[number, number]> {
  const found: Array<[number, number]> = [];
  scanTemplate(image, 0, found);
  return found;
}

/** Index past the closing backtick of the template opening at `start`, or -1. */
function scanTemplate(text: string, start: number, substitutions?: Array<[number, number]>): number {
  let i = start + 1;
  while (i < text.length) {
    const ch = text.charAt(i);
    if (ch === "\\") {
      i += 2;
    } else if (ch === "`") {
      return i + 1;
    } else if (ch === "$" && text.charAt(i + 1) === "{") {
      const close = scanSubstitution(text, i + 2);
      if (close === -1) return -1;
      substitutions?.push([i + 2, close]);
      i = close + 1;
    } else {
      i++;
    }
  }
  return -1;
}

/** Index of the `}` that closes a substitution body starting at `start`, or -1. */
function scanSubstitution(text: string, start: number): number {
  let depth = 0;
  let i = start;
  while (i < text.length) {
    const ch = text.charAt(i);
    if (ch === "`") {
      i = scanTemplate(text, i);
      if (i === -1) return -1;
      continue;
    }
    if (ch === '"' || ch === "'") {
      i = skipString(text, i);
      continue;
    }
    if (ch === "{") depth++;
    else if (ch === "}") {
      if (depth === 0) return i;
      depth--;
    }
    i++;
  }
  return -1;
}

function skipString(text: string, start: number): number {
  const quote = text.charAt(start);
  let i = start + 1;
  while (i < text.length) {
    const ch = text.charAt(i);
    if (ch === "\\") i += 2;
    else if (ch === quote) return i + 1;
    else if (ch === "\n") return i;
    else i++;
  }
  return i;
}

/** Words after which `/` starts an operand rather than dividing. */
const OPERAND_KEYWORDS = new Set([
  "return", "typeof", "instanceof", "in", "of", "new", "delete", "void",
  "throw", "case", "do", "else", "yield", "await",
]);

const ENDS_EXPRESSION = new Set([
  "Identifier", "NumberLiteral", "StringLiteral", "TemplateLiteral", "RegexLiteral",
  "RParen", "RSquare", "RCurly",
]);

function regexAllowed(previous: IToken | undefined): boolean {
  if (!previous) return true;
  const name = previous.tokenType.name;
  if (name === "Identifier") return OPERAND_KEYWORDS.has(previous.image);
  if (name === "Punct") return previous.image !== "++" && previous.image !== "--";
  return !ENDS_EXPRESSION.has(name);
}

function matchRegex(text: string, offset: number, tokens: IToken[]): CustomPatternMatcherReturn | null {
  if (text.charAt(offset) !== "/") return null;
  const next = text.charAt(offset + 1);
  if (next === "/" || next === "*") return null;
  if (!regexAllowed(tokens[tokens.length - 1])) return null;
  let inClass = false;
  let i = offset + 1;
  while (i < text.length) {
    const ch = text.charAt(i);
    if (ch === "\n" || ch === "\r") return null;
    if (ch === "\\") {
      i += 2;
      continue;
    }
    if (inClass) {
      if (ch === "]") inClass = false;
    } else if (ch === "[") {
      inClass = true;
    } else if (ch === "/") {
      i++;
      while (/[A-Za-z]/.test(text.charAt(i))) i++;
      return [text.slice(offset, i)];
    }
    i++;
  }
  return null;
}
