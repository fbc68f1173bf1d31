/**
 * Token-tree builder: groups the flat lexer output into balanced `()`, `[]`
 * and `{}` groups. The grammar parser works on these trees only, so every
 * opaque host expression is a contiguous run of trees whose source text can
 * be sliced out verbatim.
 */
import type { IToken, TokenType } from "chevrotain";
import { type Span, type SproutDiagnostic, syntaxError } from "../diagnostics.js";
import {
  LCurly,
  LParen,
  LSquare,
  RCurly,
  RParen,
  RSquare,
  SproutLexer,
} from "./lexer.js";

export type Delimiter = "paren" | "bracket" | "brace";

export type Leaf = { kind: "leaf"; token: IToken; span: Span };

export type Group = {
  kind: "group";
  delimiter: Delimiter;
  /** Full extent including both delimiters */
  span: Span;
  /** Extent between the delimiters */
  inner: Span;
  children: TokenTree[];
  /**
   * True when this group, or any group inside it, never saw its closing
   * delimiter. The builder has already reported it.
   */
  broken: boolean;
};

export type TokenTree = Leaf | Group;

const OPENERS = new Map<TokenType, Delimiter>([
  [LParen, "paren"],
  [LSquare, "bracket"],
  [LCurly, "brace"],
]);

const CLOSERS = new Map<TokenType, Delimiter>([
  [RParen, "paren"],
  [RSquare, "bracket"],
  [RCurly, "brace"],
]);

export const DELIMITER_TEXT: Record<Delimiter, [string, string]> = {
  paren: ["(", ")"],
  bracket: ["[", "]"],
  brace: ["{", "}"],
};

/** Span of a single token, with an exclusive end. */
export function tokenSpan(token: IToken): Span {
  const line = token.startLine ?? 1;
  const column = token.startColumn ?? 1;
  const endOffset = token.endOffset ?? token.startOffset + token.image.length - 1;
  return {
    start: { line, column, offset: token.startOffset },
    end: {
      line: token.endLine ?? line,
      column: (token.endColumn ?? column + token.image.length - 1) + 1,
      offset: endOffset + 1,
    },
  };
}


type OpenFrame = {
  delimiter: Delimiter;
  open: IToken;
  children: TokenTree[];
  broken: boolean;
};

export type TokenTreeResult = {
  trees: TokenTree[];
  diagnostics: SproutDiagnostic[];
  /** Span just past the last character, for errors at end of input */
  eof: Span;
};

/** Lex `text` and build its token trees. */
export function buildTokenTrees(text: string): TokenTreeResult {
  const diagnostics: SproutDiagnostic[] = [];
  const lexResult = SproutLexer.tokenize(text);

  for (const e of lexResult.errors) {
    const line = e.line ?? 1;
    const column = e.column ?? 1;
    diagnostics.push(
      syntaxError(`Unexpected character "${text.slice(e.offset, e.offset + e.length)}"`, {
        start: { line, column, offset: e.offset },
        end: { line, column: column + e.length, offset: e.offset + e.length },
      }),
    );
  }

  const eof = endOfInput(text);
  const root: TokenTree[] = [];
  const stack: OpenFrame[] = [];
  const current = () => (stack.length > 0 ? stack[stack.length - 1].children : root);

  const closeFrame = (frame: OpenFrame, close: IToken | undefined) => {
    const openSpan = tokenSpan(frame.open);
    const end = close ? tokenSpan(close) : eof;
    const group: Group = {
      kind: "group",
      delimiter: frame.delimiter,
      span: { start: openSpan.start, end: end.end },
      inner: { start: openSpan.end, end: close ? end.start : eof.start },
      children: frame.children,
      broken: frame.broken || close === undefined,
    };
    if (!close) {
      const [opener] = DELIMITER_TEXT[frame.delimiter];
      diagnostics.push(syntaxError(`Unterminated "${opener}"`, openSpan));
    }
    current().push(group);
  };

  for (const token of lexResult.tokens) {
    const opens = OPENERS.get(token.tokenType);
    if (opens) {
      stack.push({ delimiter: opens, open: token, children: [], broken: false });
      continue;
    }

    const closes = CLOSERS.get(token.tokenType);
    if (closes) {
      const matchAt = findOpen(stack, closes);
      if (matchAt === -1) {
        diagnostics.push(syntaxError(`Unexpected "${token.image}"`, tokenSpan(token)));
        continue;
      }
      // Anything opened after the match is unterminated: fold it into the match.
      while (stack.length - 1 > matchAt) {
        const frame = stack.pop();
        if (!frame) break;
        closeFrame(frame, undefined);
        stack[stack.length - 1].broken = true;
      }
      const frame = stack.pop();
      if (frame) closeFrame(frame, token);
      continue;
    }

    current().push({ kind: "leaf", token, span: tokenSpan(token) });
  }

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;
    closeFrame(frame, undefined);
    if (stack.length > 0) stack[stack.length - 1].broken = true;
  }

  return { trees: root, diagnostics, eof };
}

function findOpen(stack: OpenFrame[], delimiter: Delimiter): number {
  for (let i = stack.length - 1; i >= 0; i--) {
    if (stack[i].delimiter === delimiter) return i;
  }
  return -1;
}

function endOfInput(text: string): Span {
  const lines = text.split(/\r?\n/);
  const line = lines.length;
  const column = lines[lines.length - 1].length + 1;
  const pos = { line, column, offset: text.length };
  return { start: pos, end: pos };
}
