/**
 * Compile-time diagnostics.
 *
 * Every problem the compiler detects is reported as a value, never thrown:
 * one erroring construct must not stop its siblings from compiling.
 */

/** 1-based line/column, 0-based offset. */
export type Position = { line: number; column: number; offset: number };

/** Source range; `end` is exclusive. */
export type Span = { start: Position; end: Position };

export const DiagnosticCategory = {
  /** Malformed grammar: unterminated group, missing parentheses, extension after a children group… */
  SYNTAX: "SyntaxError",
  /** The same name declared twice in one scope frame */
  DUPLICATE_BINDING: "DuplicateBinding",
  /** `name + (...)` where `name` has no visible binding inside the source */
  INSERTION_TARGET_NOT_LOCAL: "InsertionTargetNotLocal",
  /** A parent name that falls through to the host scope (warning, opt-in) */
  UNRESOLVED_REFERENCE: "UnresolvedReference",
} as const;

export type DiagnosticCategoryType =
  (typeof DiagnosticCategory)[keyof typeof DiagnosticCategory];

export type DiagnosticSeverity = "error" | "warning";

export type SproutDiagnostic = {
  category: DiagnosticCategoryType;
  severity: DiagnosticSeverity;
  message: string;
  span: Span;
};

export function syntaxError(message: string, span: Span): SproutDiagnostic {
  return { category: DiagnosticCategory.SYNTAX, severity: "error", message, span };
}

export function hasErrors(diagnostics: readonly SproutDiagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === "error");
}

/** Smallest span covering both arguments. */
export function joinSpans(a: Span, b: Span): Span {
  return {
    start: a.start.offset <= b.start.offset ? a.start : b.start,
    end: a.end.offset >= b.end.offset ? a.end : b.end,
  };
}

/** Re-base a span measured from the start of a fragment that begins at `origin`. */
export function shiftSpan(span: Span, origin: Position): Span {
  const shift = (p: Position): Position => ({
    line: origin.line + p.line - 1,
    column: p.line === 1 ? origin.column + p.column - 1 : p.column,
    offset: origin.offset + p.offset,
  });
  return { start: shift(span.start), end: shift(span.end) };
}

/** `file:line:col: category: message`, one line per diagnostic. */
export function formatDiagnostic(d: SproutDiagnostic, file = "<input>"): string {
  const where = `${file}:${d.span.start.line}:${d.span.start.column}`;
  const label = d.severity === "warning" ? "warning" : "error";
  return `${where}: ${label}[${d.category}]: ${d.message}`;
}

/** Sort by source position so multi-error reports read top to bottom. */
export function sortDiagnostics(diagnostics: readonly SproutDiagnostic[]): SproutDiagnostic[] {
  return [...diagnostics].sort((a, b) => a.span.start.offset - b.span.start.offset);
}
