/**
 * Language server helpers: diagnostic conversion and hover content.
 */
import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { DiagnosticSeverity, type Hover, MarkupKind } from "vscode-languageserver/node.js";
import { compilePartial } from "sprout-dsl";
import { toLspDiagnostics, toRange } from "../src/diagnostics.js";
import { hoverAt } from "../src/hover.js";

function hoverText(source: string, offset: number): string | undefined {
  const hover: Hover | null = hoverAt(compilePartial(source), offset);
  if (!hover) return undefined;
  const contents = hover.contents;
  assert.ok(typeof contents === "object" && "kind" in contents, "expected markup content");
  assert.equal(contents.kind, MarkupKind.Markdown);
  return contents.value;
}

describe("toRange", () => {
  it("converts to 0-based lines and characters", () => {
    assert.deepEqual(
      toRange({
        start: { line: 2, column: 5, offset: 20 },
        end: { line: 2, column: 9, offset: 24 },
      }),
      { start: { line: 1, character: 4 }, end: { line: 1, character: 8 } },
    );
  });
});

describe("toLspDiagnostics", () => {
  it("maps errors with their category as the code", () => {
    const { diagnostics } = compilePartial("commands a (); a ()");
    assert.deepEqual(toLspDiagnostics(diagnostics), [
      {
        severity: DiagnosticSeverity.Error,
        range: { start: { line: 0, character: 15 }, end: { line: 0, character: 16 } },
        message: '"a" is already declared in this scope (line 1)',
        code: "DuplicateBinding",
        source: "sprout",
      },
    ]);
  });

  it("maps warnings", () => {
    const { diagnostics } = compilePartial("commands\nroot > (A)", { warnOnExternalReferences: true });
    const [lsp] = toLspDiagnostics(diagnostics);
    assert.equal(lsp.severity, DiagnosticSeverity.Warning);
    assert.deepEqual(lsp.range, { start: { line: 1, character: 0 }, end: { line: 1, character: 4 } });
  });
});

describe("hoverAt", () => {
  it("describes the spawner", () => {
    assert.equal(hoverText("commands a (A)", 0), "**Spawner** `commands`");
  });

  it("describes a declaration", () => {
    assert.equal(
      hoverText("commands a (A)", 9),
      "**Entity** `a`\n\nDeclared on line 1 (top level)\n\n1 component · 0 extensions · 0 children groups",
    );
  });

  it("describes a nested declaration", () => {
    assert.equal(
      hoverText("commands (A).[ b (B, C).(f) ]", 15),
      "**Entity** `b`\n\nDeclared on line 1 (nesting depth 1)\n\n2 components · 1 extension · 0 children groups",
    );
  });

  it("describes a reference by its declaration", () => {
    assert.equal(
      hoverText("commands p ().[ (A) ]\np > (B)", 22),
      "**Entity** `p`\n\nDeclared on line 1\n\n0 components · 0 extensions · 1 children group",
    );
  });

  it("describes a reference inside a template substitution", () => {
    assert.equal(
      hoverText("commands p ();\n(B).[ (`${p}`) ]", 25),
      "**Entity** `p`\n\nDeclared on line 1\n\n0 components · 0 extensions · 0 children groups",
    );
  });

  it("describes an external name", () => {
    assert.equal(
      hoverText("commands (Label)", 10),
      "**External** `Label`\n\nNot declared in this source; supplied by the surrounding code",
    );
  });

  it("describes a name the generated code binds", () => {
    assert.equal(hoverText("commands (A).{ entity.go() }", 15), "**entity**\n\nCommands for the entity being built");
  });

  it("describes a failed insertion", () => {
    assert.equal(
      hoverText("commands a + (B)", 9),
      '**Error** `a`\n\nCannot insert into "a": no entity with that name is declared earlier in this or an enclosing scope',
    );
  });

  it("returns null away from any name", () => {
    assert.equal(hoverText("commands a (A)", 8), undefined);
  });
});
