/**
 * Code generator: lowers a resolved Sprout program to a JavaScript statement
 * block that drives a `Spawner`.
 *
 * Shape of the output:
 *
 *   {
 *     const spawner = commands;
 *     const __sproutWith = (entity, body) => { ... };
 *     {
 *       const a = __sproutWith(spawner.spawn(A), function (entity) {
 *         entity.setParent(p);
 *         entity.observe(cb);
 *         {
 *           const parent = entity;
 *           __sproutWith(parent.addChild(B), function (entity) {});
 *         }
 *       });
 *     }
 *   }
 *
 * Each entity's operations run inside its own body function, which receives
 * the live builder as `entity` and the entity's handle as `this`. Children
 * groups and flow bodies become nested blocks, so JavaScript's own block
 * scoping gives the same visibility as the resolver.
 */
import type { ResolvedProgram } from "./resolver.js";
import type {
  ChildGroup,
  EntityNode,
  Extension,
  FlowBody,
  IfFlow,
  Item,
  OpaqueExpr,
} from "./types.js";

export type GenerateOptions = {
  /** Method used by the `.(args)` shortcut. Default: "observe" */
  defaultMethod?: string;
  /** One level of indentation. Default: two spaces */
  indent?: string;
};

export const DEFAULT_METHOD = "observe";

const WITH_HELPER = "__sproutWith";
const TEMP_PREFIX = "__sprout";

// ── Writer ───────────────────────────────────────────────────────────────────

class CodeWriter {
  private readonly lines: string[] = [];
  private depth = 0;

  constructor(private readonly unit: string) {}

  line(text: string): void {
    this.lines.push(this.unit.repeat(this.depth) + text);
  }

  open(text: string): void {
    this.line(text);
    this.depth++;
  }

  close(text = "}"): void {
    this.depth--;
    this.line(text);
  }

  /** A line that closes one block and opens the next, as in `} else {`. */
  between(text: string): void {
    this.depth--;
    this.line(text);
    this.depth++;
  }

  /**
   * Host code copied in as written. Multi-line code is re-indented to the
   * current depth unless it contains a template literal, whose contents
   * must not change.
   */
  verbatim(text: string): void {
    const lines = text.split(/\r?\n/);
    if (text.includes("`")) {
      this.line(lines[0]);
      for (const raw of lines.slice(1)) this.lines.push(raw);
      return;
    }
    const rest = lines.slice(1).filter((l) => l.trim() !== "");
    const margin = Math.min(...rest.map((l) => l.length - l.trimStart().length));
    this.line(lines[0].trim());
    for (const raw of lines.slice(1)) {
      if (raw.trim() === "") this.lines.push("");
      else this.line(raw.slice(margin).trimEnd());
    }
  }

  toString(): string {
    return this.lines.join("\n");
  }
}

// ── Generator ────────────────────────────────────────────────────────────────

/**
 * Generate the statement block for a resolved program.
 *
 * Items the resolver marked invalid are left out whole; everything else is
 * emitted in source order.
 */
export function generate(resolved: ResolvedProgram, options: GenerateOptions = {}): string {
  const generator = new Generator(resolved.invalid, options.defaultMethod ?? DEFAULT_METHOD, options.indent ?? "  ");
  return generator.program(resolved);
}

/** Per-block bookkeeping for the nested-block rule of named declarations. */
type BlockState = {
  /** Statements already emitted directly in the current block */
  statements: number;
  /** Blocks opened for later declarations, closed when the scope ends */
  opened: number;
};

class Generator {
  private readonly w: CodeWriter;
  private temps = 0;

  constructor(
    private readonly invalid: ReadonlySet<Item>,
    private readonly defaultMethod: string,
    indent: string,
  ) {
    this.w = new CodeWriter(indent);
  }

  program(resolved: ResolvedProgram): string {
    const { spawner, items } = resolved.program;
    const source = spawner.kind === "name" ? spawner.ident.name : `(${spawner.expr.text.trim()})`;

    this.w.open("{");
    this.w.line(`const spawner = ${source};`);
    this.w.line(
      `const ${WITH_HELPER} = (entity, body) => { const handle = entity.id(); body.call(handle, entity); return handle; };`,
    );
    this.w.open("{");
    this.scope(items, "spawner", 0);
    this.w.close();
    this.w.close();
    return this.w.toString();
  }

  /**
   * Emit a list of items that share one scope frame. `owner` is the
   * expression items create through: `spawner` at top level, `parent`
   * inside a children group.
   */
  private scope(items: Item[], owner: "spawner" | "parent", statements: number): void {
    const state: BlockState = { statements, opened: 0 };
    for (const item of items) {
      if (this.invalid.has(item)) continue;
      this.item(item, owner, state);
    }
    for (let i = 0; i < state.opened; i++) this.w.close();
  }

  private item(item: Item, owner: "spawner" | "parent", state: BlockState): void {
    switch (item.kind) {
      case "entity":
        this.entity(item, owner, state);
        return;
      case "code":
        this.codeBlock(item.body);
        break;
      case "if":
        this.ifFlow(item, owner);
        break;
      case "for":
      case "while":
        this.w.open(`${item.kind} (${item.head.text.trim()}) {`);
        this.scope(item.body.items, owner, 0);
        this.w.close();
        break;
      case "break":
      case "continue":
        this.w.line(`${item.kind};`);
        break;
    }
    state.statements++;
  }

  private ifFlow(flow: IfFlow, owner: "spawner" | "parent"): void {
    this.w.open(`if (${flow.condition.text.trim()}) {`);
    this.scope(flow.body.items, owner, 0);
    let alternate: IfFlow | FlowBody | undefined = flow.alternate;
    while (alternate?.kind === "if") {
      this.w.between(`} else if (${alternate.condition.text.trim()}) {`);
      this.scope(alternate.body.items, owner, 0);
      alternate = alternate.alternate;
    }
    if (alternate) {
      this.w.between("} else {");
      this.scope(alternate.items, owner, 0);
    }
    this.w.close();
  }

  // ── Entities ─────────────────────────────────────────────────────────────

  private entity(node: EntityNode, owner: "spawner" | "parent", state: BlockState): void {
    const creation = node.insertion && node.name
      ? `spawner.entity(${node.name.name}).insert(${this.list(node.components)})`
      : owner === "spawner"
        ? `spawner.spawn(${this.list(node.components)})`
        : `parent.addChild(${this.list(node.components)})`;
    const call = `${WITH_HELPER}(${creation}, function (entity) {`;

    if (node.insertion || !node.name) {
      this.body(call, node, ");");
      state.statements++;
      return;
    }

    const name = node.name.name;
    if (mentionsName(node, name)) {
      // The initializer reads an outer `name`: evaluate it before the
      // declaration's scope begins.
      const temp = `${TEMP_PREFIX}${this.temps++}`;
      this.body(`const ${temp} = ${call}`, node, ");");
      this.w.open("{");
      this.w.line(`const ${name} = ${temp};`);
      state.opened++;
      state.statements = 1;
      return;
    }

    if (state.statements > 0) {
      // Everything before this point keeps seeing the outer `name`.
      this.w.open("{");
      state.opened++;
      state.statements = 0;
    }
    this.body(`const ${name} = ${call}`, node, ");");
    state.statements++;
  }

  /** `head` + the entity's operations + `}` + `tail` */
  private body(head: string, node: EntityNode, tail: string): void {
    const operations = countOperations(node);
    if (operations === 0) {
      this.w.line(`${head}}${tail}`);
      return;
    }

    this.w.open(head);
    if (node.parent?.kind === "name") {
      this.w.line(`entity.setParent(${node.parent.ident.name});`);
    } else if (node.parent?.kind === "expr") {
      this.w.line(`entity.setParent(${node.parent.expr.text.trim()});`);
    }

    let remaining = node.extensions.length + node.children.length;
    for (const extension of node.extensions) {
      remaining--;
      this.extension(extension, remaining > 0);
    }
    for (const group of node.children) this.children(group);
    this.w.close(`}${tail}`);
  }

  private extension(extension: Extension, moreFollow: boolean): void {
    if (extension.kind === "call") {
      const method = extension.method?.name ?? this.defaultMethod;
      this.w.line(`entity.${method}(${this.list(extension.args)});`);
      return;
    }
    // A block may keep the builder only when nothing else needs it afterwards.
    const builder = moreFollow ? "entity.reborrow()" : "entity";
    const text = extension.body.text.trim();
    if (isInline(text)) {
      this.w.line(`((entity) => {${text ? ` ${text} ` : ""}})(${builder});`);
      return;
    }
    this.w.open("((entity) => {");
    this.w.verbatim(text);
    this.w.close(`})(${builder});`);
  }

  private children(group: ChildGroup): void {
    this.w.open("{");
    this.w.line("const parent = entity;");
    this.scope(group.items, "parent", 0);
    this.w.close();
  }

  private codeBlock(body: OpaqueExpr): void {
    const text = body.text.trim();
    if (isInline(text)) {
      this.w.line(text ? `{ ${text} }` : "{}");
      return;
    }
    this.w.open("{");
    this.w.verbatim(text);
    this.w.close();
  }

  private list(exprs: OpaqueExpr[]): string {
    return exprs.map((e) => e.text.trim()).join(", ");
  }

}

function isInline(text: string): boolean {
  return !text.includes("\n") && !text.includes("//");
}

function countOperations(node: EntityNode): number {
  return (node.parent ? 1 : 0) + node.extensions.length + node.children.length;
}

/** True when any host expression inside `node` mentions `name`. */
function mentionsName(node: EntityNode, name: string): boolean {
  const inExpr = (e: OpaqueExpr) => e.identifiers.some((i) => i.name === name);
  const inItems = (items: Item[]): boolean => items.some((item) => {
    switch (item.kind) {
      case "entity":
        return mentionsName(item, name) || (item.insertion && item.name?.name === name);
      case "code":
        return inExpr(item.body);
      case "if":
        return inIf(item);
      case "for":
      case "while":
        return inExpr(item.head) || inItems(item.body.items);
      default:
        return false;
    }
  });
  const inIf = (flow: IfFlow): boolean =>
    inExpr(flow.condition) ||
    inItems(flow.body.items) ||
    (flow.alternate?.kind === "if" ? inIf(flow.alternate) : inItems(flow.alternate?.items ?? []));

  if (node.parent?.kind === "name" && node.parent.ident.name === name) return true;
  if (node.parent?.kind === "expr" && inExpr(node.parent.expr)) return true;
  if (node.components.some(inExpr)) return true;
  if (node.extensions.some((x) => (x.kind === "block" ? inExpr(x.body) : x.args.some(inExpr)))) return true;
  return node.children.some((group) => inItems(group.items));
}
