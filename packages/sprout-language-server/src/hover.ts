import { type Hover, MarkupKind } from "vscode-languageserver/node.js";
import type {
  BindingSite,
  EntityNode,
  ImplicitName,
  PartialCompileResult,
  Reference,
  Span,
} from "sprout-dsl";
import { toRange } from "./diagnostics.js";

function contains(span: Span, offset: number): boolean {
  return span.start.offset <= offset && offset < span.end.offset;
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n !== 1 ? "s" : ""}`;
}

function entitySummary(node: EntityNode): string {
  const groups = node.children.length;
  return [
    plural(node.components.length, "component"),
    plural(node.extensions.length, "extension"),
    `${groups} children group${groups !== 1 ? "s" : ""}`,
  ].join(" · ");
}

function bindingMarkdown(site: BindingSite): string {
  const where = site.depth === 0 ? "top level" : `nesting depth ${site.depth}`;
  return `**Entity** \`${site.name}\`\n\nDeclared on line ${site.span.start.line} (${where})\n\n${entitySummary(site.node)}`;
}

function implicitMarkdown(name: ImplicitName): string {
  switch (name) {
    case "this":    return "**this**\n\nHandle of the entity being built";
    case "entity":  return "**entity**\n\nCommands for the entity being built";
    case "parent":  return "**parent**\n\nCommands for the entity that owns this children group";
    case "spawner": return "**spawner**\n\nThe spawner this source creates entities through";
  }
}

function referenceMarkdown(ref: Reference): string {
  const name = ref.ident.name;
  const resolution = ref.resolution;
  switch (resolution.kind) {
    case "resolved":
      return `**Entity** \`${name}\`\n\nDeclared on line ${resolution.site.span.start.line}\n\n${entitySummary(resolution.site.node)}`;
    case "external":
      return `**External** \`${name}\`\n\nNot declared in this source; supplied by the surrounding code`;
    case "implicit":
      return implicitMarkdown(resolution.name);
    case "error":
      return `**Error** \`${name}\`\n\n${resolution.diagnostic.message}`;
  }
}

/**
 * Hover for the name at `offset`: a declaration, a reference to one, or one
 * of the names the generated code binds.
 */
export function hoverAt(result: PartialCompileResult, offset: number): Hover | null {
  const program = result.program;
  if (!program) return null;

  if (program.spawner.kind === "name" && contains(program.spawner.ident.span, offset)) {
    return {
      contents: { kind: MarkupKind.Markdown, value: `**Spawner** \`${program.spawner.ident.name}\`` },
      range: toRange(program.spawner.ident.span),
    };
  }

  const resolved = result.resolved;
  if (!resolved) return null;

  const site = resolved.bindings.find((b) => contains(b.span, offset));
  if (site) {
    return {
      contents: { kind: MarkupKind.Markdown, value: bindingMarkdown(site) },
      range: toRange(site.span),
    };
  }

  const ref = resolved.references.find((r) => contains(r.ident.span, offset));
  if (ref) {
    return {
      contents: { kind: MarkupKind.Markdown, value: referenceMarkdown(ref) },
      range: toRange(ref.ident.span),
    };
  }

  return null;
}
