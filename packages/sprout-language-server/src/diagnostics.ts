import { type Diagnostic, DiagnosticSeverity, type Range } from "vscode-languageserver/node.js";
import type { Span, SproutDiagnostic } from "sprout-dsl";

/** Sprout spans are 1-based; LSP ranges are 0-based. */
export function toRange(span: Span): Range {
  return {
    start: { line: span.start.line - 1, character: span.start.column - 1 },
    end: { line: span.end.line - 1, character: span.end.column - 1 },
  };
}

export function toLspDiagnostics(diagnostics: readonly SproutDiagnostic[]): Diagnostic[] {
  return diagnostics.map((d) => ({
    severity: d.severity === "error" ? DiagnosticSeverity.Error : DiagnosticSeverity.Warning,
    range: toRange(d.span),
    message: d.message,
    code: d.category,
    source: "sprout",
  }));
}
