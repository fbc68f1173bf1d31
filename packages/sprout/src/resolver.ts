/**
 * Scope resolver.
 *
 * A depth-first, left-to-right walk in emission order over an explicit stack
 * of scope frames. Frames are pushed for every children group and every flow
 * body, so sibling groups never see each other's names.
 *
 * A name becomes visible only once its entity is fully lowered: the entity's
 * own components, extensions and children never see it, and nothing earlier
 * in the scope does either.
 */
import {
  DiagnosticCategory,
  type Span,
  type SproutDiagnostic,
} from "./diagnostics.js";
import type {
  EntityNode,
  FlowBody,
  Ident,
  IfFlow,
  Item,
  OpaqueExpr,
  SpawnProgram,
} from "./types.js";

/** Where a name was bound. */
export type BindingSite = {
  name: string;
  node: EntityNode;
  span: Span;
  /** 0 for the top level, +1 per enclosing children group or flow body */
  depth: number;
};

/** Names the generated code provides without a declaration. */
export type ImplicitName = "this" | "entity" | "parent" | "spawner";

export type Resolution =
  | { kind: "resolved"; site: BindingSite }
  /** Not bound in this source; left for the host scope to supply */
  | { kind: "external" }
  | { kind: "implicit"; name: ImplicitName }
  | { kind: "error"; diagnostic: SproutDiagnostic };

export type ReferenceRole = "parent" | "insertion" | "expression";

export type Reference = {
  ident: Ident;
  role: ReferenceRole;
  resolution: Resolution;
};

export type ResolvedProgram = {
  program: SpawnProgram;
  /** Every reference, in source order */
  references: Reference[];
  /** Every successful binding, in source order */
  bindings: BindingSite[];
  /** Items that must not generate code */
  invalid: Set<Item>;
  diagnostics: SproutDiagnostic[];
};

export type ResolveOptions = {
  /**
   * Report a parent name that is not bound in this source as an
   * `UnresolvedReference` warning. Such names are still accepted as
   * references to handles in the surrounding code.
   *
   * Default: false
   */
  warnOnExternalReferences?: boolean;
};

type WalkContext = {
  /** Inside an extension or children group: `this` and `entity` are bound */
  inEntity: boolean;
  /** Inside a children group: `parent` is bound */
  inChildren: boolean;
};

const TOP: WalkContext = { inEntity: false, inChildren: false };

export function resolveProgram(program: SpawnProgram, options: ResolveOptions = {}): ResolvedProgram {
  const resolver = new ScopeResolver(options);
  if (program.spawner.kind === "expr") resolver.expression(program.spawner.expr, TOP);
  resolver.items(program.items, TOP);
  return {
    program,
    references: resolver.references,
    bindings: resolver.bindings,
    invalid: resolver.invalid,
    diagnostics: resolver.diagnostics,
  };
}

class ScopeResolver {
  readonly references: Reference[] = [];
  readonly bindings: BindingSite[] = [];
  readonly invalid = new Set<Item>();
  readonly diagnostics: SproutDiagnostic[] = [];

  private readonly frames: Map<string, BindingSite>[] = [new Map()];

  constructor(private readonly options: ResolveOptions) {}

  // ── Frames ─────────────────────────────────────────────────────────────

  private lookup(name: string): BindingSite | undefined {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const site = this.frames[i].get(name);
      if (site) return site;
    }
    return undefined;
  }

  private scoped(body: () => void): void {
    this.frames.push(new Map());
    try {
      body();
    } finally {
      this.frames.pop();
    }
  }

  private declare(node: EntityNode, name: Ident): void {
    const frame = this.frames[this.frames.length - 1];
    const first = frame.get(name.name);
    if (first) {
      this.error(
        node,
        DiagnosticCategory.DUPLICATE_BINDING,
        `"${name.name}" is already declared in this scope (line ${first.span.start.line})`,
        name.span,
      );
      return;
    }
    const site: BindingSite = { name: name.name, node, span: name.span, depth: this.frames.length - 1 };
    frame.set(name.name, site);
    this.bindings.push(site);
  }

  private error(item: Item, category: SproutDiagnostic["category"], message: string, span: Span): SproutDiagnostic {
    const diagnostic: SproutDiagnostic = { category, severity: "error", message, span };
    this.diagnostics.push(diagnostic);
    this.invalid.add(item);
    return diagnostic;
  }

  // ── Walk ───────────────────────────────────────────────────────────────

  items(items: Item[], context: WalkContext): void {
    for (const item of items) {
      switch (item.kind) {
        case "entity":
          this.entity(item, context);
          break;
        case "code":
          this.expression(item.body, context);
          break;
        case "if":
          this.ifFlow(item, context);
          break;
        case "for":
        case "while":
          this.expression(item.head, context);
          this.body(item.body, context);
          break;
        case "break":
        case "continue":
          break;
      }
    }
  }

  private ifFlow(flow: IfFlow, context: WalkContext): void {
    this.expression(flow.condition, context);
    this.body(flow.body, context);
    if (flow.alternate?.kind === "if") this.ifFlow(flow.alternate, context);
    else if (flow.alternate) this.body(flow.alternate, context);
  }

  private body(body: FlowBody, context: WalkContext): void {
    this.scoped(() => this.items(body.items, context));
  }

  private entity(node: EntityNode, context: WalkContext): void {
    if (node.parent?.kind === "name") {
      this.parentName(node.parent.ident);
    } else if (node.parent?.kind === "expr") {
      this.expression(node.parent.expr, context);
    }

    if (node.insertion && node.name) this.insertionTarget(node, node.name);

    for (const component of node.components) this.expression(component, context);

    const inside: WalkContext = { inEntity: true, inChildren: context.inChildren };
    for (const extension of node.extensions) {
      if (extension.kind === "block") this.expression(extension.body, inside);
      else for (const arg of extension.args) this.expression(arg, inside);
    }

    for (const group of node.children) {
      this.scoped(() => this.items(group.items, { inEntity: true, inChildren: true }));
    }

    if (!node.insertion && node.name) this.declare(node, node.name);
  }

  private parentName(ident: Ident): void {
    const site = this.lookup(ident.name);
    if (site) {
      this.references.push({ ident, role: "parent", resolution: { kind: "resolved", site } });
      return;
    }
    this.references.push({ ident, role: "parent", resolution: { kind: "external" } });
    if (this.options.warnOnExternalReferences) {
      this.diagnostics.push({
        category: DiagnosticCategory.UNRESOLVED_REFERENCE,
        severity: "warning",
        message: `"${ident.name}" is not declared in this source; it is assumed to be a handle from the surrounding code`,
        span: ident.span,
      });
    }
  }

  private insertionTarget(node: EntityNode, ident: Ident): void {
    const site = this.lookup(ident.name);
    if (site) {
      this.references.push({ ident, role: "insertion", resolution: { kind: "resolved", site } });
      return;
    }
    const diagnostic = this.error(
      node,
      DiagnosticCategory.INSERTION_TARGET_NOT_LOCAL,
      `Cannot insert into "${ident.name}": no entity with that name is declared earlier in this or an enclosing scope`,
      ident.span,
    );
    this.references.push({ ident, role: "insertion", resolution: { kind: "error", diagnostic } });
  }

  expression(expr: OpaqueExpr, context: WalkContext): void {
    for (const ident of expr.identifiers) {
      this.references.push({ ident, role: "expression", resolution: this.tag(ident.name, context) });
    }
  }

  private tag(name: string, context: WalkContext): Resolution {
    if (name === "spawner") return { kind: "implicit", name };
    if ((name === "this" || name === "entity") && context.inEntity) return { kind: "implicit", name };
    if (name === "parent" && context.inChildren) return { kind: "implicit", name };
    const site = this.lookup(name);
    return site ? { kind: "resolved", site } : { kind: "external" };
  }
}
