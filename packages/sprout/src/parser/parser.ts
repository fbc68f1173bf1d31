/**
 * Recursive-descent parser for Sprout sources.
 *
 * Works on the token trees from `buildTokenTrees`, never on raw text. Host
 * expressions are sliced out of the source verbatim; only the grammar's own
 * punctuation (`>`, `+`, `.`, `,`, `;`) and the group shapes are interpreted.
 *
 * Errors never abort the parse. A failing item is dropped, the cursor skips
 * to the next `;` at the same nesting level, and parsing carries on so that
 * independent mistakes are reported together.
 */
import type { TokenType } from "chevrotain";
import {
  type Span,
  type SproutDiagnostic,
  joinSpans,
  shiftSpan,
  syntaxError,
} from "../diagnostics.js";
import type {
  ChildGroup,
  EntityNode,
  Extension,
  FlowBody,
  Ident,
  IfFlow,
  Item,
  LoopFlow,
  OpaqueExpr,
  ParentRef,
  SpawnProgram,
  SpawnerRef,
} from "../types.js";
import {
  BreakKw,
  Comma,
  ContinueKw,
  Dot,
  ElseKw,
  ForKw,
  Greater,
  Identifier,
  IfKw,
  Plus,
  Punct,
  Semicolon,
  TemplateLiteral,
  WhileKw,
  templateSubstitutions,
} from "./lexer.js";
import {
  type Delimiter,
  type Group,
  type Leaf,
  type TokenTree,
  DELIMITER_TEXT,
  buildTokenTrees,
} from "./token-tree.js";

// ── Reserved names ─────────────────────────────────────────────────────────

const JS_RESERVED = new Set([
  "await", "break", "case", "catch", "class", "const", "continue", "debugger",
  "default", "delete", "do", "else", "enum", "export", "extends", "false",
  "finally", "for", "function", "if", "implements", "import", "in",
  "instanceof", "interface", "let", "new", "null", "package", "private",
  "protected", "public", "return", "static", "super", "switch", "throw",
  "true", "try", "typeof", "var", "void", "while", "with", "yield",
  "arguments", "eval",
]);

/** Names the generated code binds itself. */
const GENERATED_NAMES = new Set(["this", "entity", "parent", "spawner"]);

export const INTERNAL_PREFIX = "__sprout";

/** Why `name` cannot be declared, or undefined when it can. */
export function reservedReason(name: string): string | undefined {
  if (JS_RESERVED.has(name)) return "a reserved word";
  if (GENERATED_NAMES.has(name)) return "bound by the generated code";
  if (name.startsWith(INTERNAL_PREFIX)) return "reserved for compiler internals";
  return undefined;
}

// ── Result ─────────────────────────────────────────────────────────────────

export type SproutParseResult = {
  /** Absent only when the source does not start with a spawner */
  program?: SpawnProgram;
  diagnostics: SproutDiagnostic[];
};

/**
 * Parse a Sprout source into its AST.
 *
 * Always returns every item that parsed cleanly, together with the
 * diagnostics for the ones that did not.
 */
export function parseSprout(text: string): SproutParseResult {
  const { trees, diagnostics, eof } = buildTokenTrees(text);
  const parser = new SproutParser(text, diagnostics);
  const cursor = new Cursor(trees, eof);

  const spawner = parser.parseSpawner(cursor);
  if (!spawner) return { diagnostics };

  const items = parser.parseItems(cursor, { topLevel: true, inLoop: false });
  const start = spawner.kind === "name" ? spawner.ident.span.start : spawner.expr.span.start;
  return {
    program: { spawner, items, span: { start, end: eof.end } },
    diagnostics,
  };
}

// ── Cursor ─────────────────────────────────────────────────────────────────

/** Position in one level of the token tree. */
class Cursor {
  private index = 0;
  private last: Span | undefined;

  constructor(
    private readonly trees: TokenTree[],
    /** Where this level ends: the closing delimiter, or end of input */
    private readonly end: Span,
  ) {}

  peek(k = 0): TokenTree | undefined {
    return this.trees[this.index + k];
  }

  next(): TokenTree | undefined {
    const tree = this.trees[this.index];
    if (tree) {
      this.index++;
      this.last = tree.span;
    }
    return tree;
  }

  atEnd(): boolean {
    return this.index >= this.trees.length;
  }

  /** Span of the upcoming tree, or the end of this level. */
  here(): Span {
    return this.peek()?.span ?? { start: this.end.start, end: this.end.start };
  }

  /** Span of the most recently consumed tree. */
  previous(): Span {
    return this.last ?? this.here();
  }
}

function isLeaf(tree: TokenTree | undefined, type: TokenType): tree is Leaf {
  return tree?.kind === "leaf" && tree.token.tokenType === type;
}

function isGroup(tree: TokenTree | undefined, delimiter: Delimiter): tree is Group {
  return tree?.kind === "group" && tree.delimiter === delimiter;
}

function describeTree(tree: TokenTree | undefined): string {
  if (!tree) return "end of input";
  if (tree.kind === "group") return `"${DELIMITER_TEXT[tree.delimiter][0]}"`;
  return `"${tree.token.image}"`;
}

/**
 * Thrown inside one item; caught by the enclosing item list.
 * A failure without a diagnostic was already reported by the tree builder.
 */
class ParseFailure extends Error {
  constructor(readonly diagnostic?: SproutDiagnostic) {
    super(diagnostic?.message ?? "already reported");
  }
}

type ItemContext = {
  /** Parented entities are legal only outside children groups */
  topLevel: boolean;
  /** `break` / `continue` are legal only inside a loop body */
  inLoop: boolean;
};

// ═══════════════════════════════════════════════════════════════════════════
//  Grammar
// ═══════════════════════════════════════════════════════════════════════════

class SproutParser {
  constructor(
    private readonly text: string,
    private readonly diagnostics: SproutDiagnostic[],
  ) {}

  private failure(message: string, span: Span): ParseFailure {
    return new ParseFailure(syntaxError(message, span));
  }

  // ── Program head ───────────────────────────────────────────────────────

  /** `commands` or `[expr]` */
  parseSpawner(cursor: Cursor): SpawnerRef | undefined {
    const head = cursor.peek();
    if (isLeaf(head, Identifier)) {
      cursor.next();
      const ident = this.ident(head);
      if (ident.name === "spawner" || ident.name.startsWith(INTERNAL_PREFIX)) {
        this.diagnostics.push(
          syntaxError(`"${ident.name}" cannot name the spawner: it is bound by the generated code`, ident.span),
        );
        return undefined;
      }
      return { kind: "name", ident };
    }
    if (isGroup(head, "bracket")) {
      cursor.next();
      if (head.broken) return undefined;
      const expr = this.headExpr(head);
      if (!expr.text.trim()) {
        this.diagnostics.push(syntaxError("Expected a spawner expression inside \"[]\"", head.span));
        return undefined;
      }
      return { kind: "expr", expr };
    }
    // An unterminated group is already reported.
    if (!(head?.kind === "group" && head.broken)) {
      this.diagnostics.push(
        syntaxError(
          `Expected a spawner (an identifier or "[expression]") at the start of the source, found ${describeTree(head)}`,
          cursor.here(),
        ),
      );
    }
    return undefined;
  }

  // ── Item lists ─────────────────────────────────────────────────────────

  parseItems(cursor: Cursor, context: ItemContext): Item[] {
    const items: Item[] = [];
    while (!cursor.atEnd()) {
      if (isLeaf(cursor.peek(), Semicolon)) {
        cursor.next();
        continue;
      }
      try {
        items.push(this.parseItem(cursor, context));
      } catch (err) {
        if (!(err instanceof ParseFailure)) throw err;
        if (err.diagnostic) this.diagnostics.push(err.diagnostic);
        this.recover(cursor);
      }
    }
    return items;
  }

  /** Skip to just past the next `;` on this level. */
  private recover(cursor: Cursor): void {
    while (!cursor.atEnd()) {
      const tree = cursor.next();
      if (isLeaf(tree, Semicolon)) return;
    }
  }

  private parseItem(cursor: Cursor, context: ItemContext): Item {
    const head = cursor.peek();
    const second = cursor.peek(1);

    if (isLeaf(head, BreakKw) || isLeaf(head, ContinueKw)) {
      cursor.next();
      const kind = isLeaf(head, BreakKw) ? "break" : "continue";
      if (!context.inLoop) throw this.failure(`"${kind}" is only allowed inside a loop body`, head.span);
      return { kind, span: head.span };
    }
    if (isLeaf(head, IfKw)) return this.parseIf(cursor, context);
    if (isLeaf(head, ForKw) || isLeaf(head, WhileKw)) return this.parseLoop(cursor, context);

    if (isGroup(head, "brace")) {
      cursor.next();
      return { kind: "code", body: this.blockBody(head), span: head.span };
    }

    if (isLeaf(head, Plus) || (isGroup(head, "bracket") && isLeaf(second, Plus))) {
      throw this.failure("Insertion requires a target name before \"+\"", head.span);
    }

    // parent > ...
    if ((isLeaf(head, Identifier) || isGroup(head, "bracket")) && isLeaf(second, Greater)) {
      if (!context.topLevel) {
        throw this.failure("Parented entity is only allowed at top level", joinSpans(head.span, second.span));
      }
      return this.parseParented(cursor);
    }

    if (isLeaf(head, Identifier)) {
      if (isLeaf(second, Plus)) {
        cursor.next();
        cursor.next();
        return this.parseDefinition(cursor, head.span, {
          name: this.ident(head),
          insertion: true,
        });
      }
      if (isGroup(second, "paren")) {
        cursor.next();
        const name = this.declaredName(head);
        return this.parseDefinition(cursor, head.span, { name, insertion: false });
      }
      throw this.failure(`Expected "(" after "${head.token.image}", found ${describeTree(second)}`, second?.span ?? head.span);
    }

    if (isGroup(head, "paren")) {
      return this.parseDefinition(cursor, head.span, { insertion: false });
    }

    throw this.failure(`Unexpected ${describeTree(head)}: expected an entity, a code block or a flow statement`, cursor.here());
  }

  // ── Entities ───────────────────────────────────────────────────────────

  private parseParented(cursor: Cursor): EntityNode {
    const head = cursor.next();
    cursor.next(); // >
    let parent: ParentRef;
    if (isLeaf(head, Identifier)) {
      parent = { kind: "name", ident: this.checkedIdent(head, "a parent reference") };
    } else if (isGroup(head, "bracket")) {
      this.requireIntact(head);
      const expr = this.headExpr(head);
      if (!expr.text.trim()) throw this.failure("Expected a parent expression inside \"[]\"", head.span);
      parent = { kind: "expr", expr };
    } else {
      throw this.failure(`Unexpected ${describeTree(head)}`, cursor.previous());
    }

    const start = cursor.previous();
    const nameTree = cursor.peek();
    let name: Ident | undefined;
    if (isLeaf(nameTree, Identifier)) {
      cursor.next();
      name = this.declaredName(nameTree);
    } else if (isLeaf(nameTree, Plus)) {
      throw this.failure("Insertion cannot be combined with a parent", nameTree.span);
    }
    return this.parseDefinition(cursor, parent.kind === "name" ? parent.ident.span : parent.expr.span, {
      name,
      parent,
      insertion: false,
    }, start);
  }

  /**
   * definition := '(' components ')' ('.' extension)* ('.' '[' children ']')*
   */
  private parseDefinition(
    cursor: Cursor,
    start: Span,
    head: { name?: Ident; parent?: ParentRef; insertion: boolean },
    after?: Span,
  ): EntityNode {
    const list = cursor.next();
    if (!isGroup(list, "paren")) {
      throw this.failure(`Expected "(" to open the component list, found ${describeTree(list)}`, list?.span ?? after ?? start);
    }
    this.requireIntact(list);
    const components = this.parseList(list, "component");

    const extensions: Extension[] = [];
    const children: ChildGroup[] = [];

    while (isLeaf(cursor.peek(), Dot)) {
      const dot = cursor.next();
      const target = cursor.peek();
      const dotSpan = dot?.span ?? cursor.previous();

      if (isGroup(target, "bracket")) {
        cursor.next();
        this.requireIntact(target);
        const inner = new Cursor(target.children, target.inner);
        const items = this.parseItems(inner, { topLevel: false, inLoop: false });
        children.push({ items, span: target.span });
        continue;
      }

      const isExtension =
        (isLeaf(target, Identifier) && isGroup(cursor.peek(1), "paren")) ||
        isGroup(target, "paren") ||
        isGroup(target, "brace");
      if (!isExtension) {
        throw this.failure(
          `Expected a method call, "(", "{" or "[" after ".", found ${describeTree(target)}`,
          target?.span ?? dotSpan,
        );
      }
      if (children.length > 0) {
        throw this.failure("Extensions cannot be chained after a children group", joinSpans(dotSpan, cursor.here()));
      }
      extensions.push(this.parseExtension(cursor, dotSpan));
    }

    return {
      kind: "entity",
      name: head.name,
      parent: head.parent,
      insertion: head.insertion,
      components,
      extensions,
      children,
      span: joinSpans(start, cursor.previous()),
    };
  }

  private parseExtension(cursor: Cursor, dot: Span): Extension {
    const target = cursor.next();
    if (isGroup(target, "brace")) {
      this.requireIntact(target);
      return { kind: "block", body: this.blockBody(target), span: joinSpans(dot, target.span) };
    }
    if (isGroup(target, "paren")) {
      this.requireIntact(target);
      return { kind: "call", args: this.parseList(target, "argument"), span: joinSpans(dot, target.span) };
    }
    const args = cursor.next();
    if (!isLeaf(target, Identifier) || !isGroup(args, "paren")) {
      throw this.failure("Malformed extension", dot);
    }
    this.requireIntact(args);
    return {
      kind: "call",
      method: this.ident(target),
      args: this.parseList(args, "argument"),
      span: joinSpans(dot, args.span),
    };
  }

  // ── Flow ───────────────────────────────────────────────────────────────

  private parseIf(cursor: Cursor, context: ItemContext): IfFlow {
    const keyword = cursor.next();
    const start = keyword?.span ?? cursor.previous();
    const condition = this.flowHead(cursor, "if");
    const body = this.flowBody(cursor, "if", context);

    let alternate: IfFlow | FlowBody | undefined;
    if (isLeaf(cursor.peek(), ElseKw)) {
      cursor.next();
      alternate = isLeaf(cursor.peek(), IfKw)
        ? this.parseIf(cursor, context)
        : this.flowBody(cursor, "else", context);
    }
    return { kind: "if", condition, body, alternate, span: joinSpans(start, cursor.previous()) };
  }

  private parseLoop(cursor: Cursor, context: ItemContext): LoopFlow {
    const keyword = cursor.next();
    const kind = isLeaf(keyword, ForKw) ? "for" : "while";
    const start = keyword?.span ?? cursor.previous();
    const head = this.flowHead(cursor, kind);
    const body = this.flowBody(cursor, kind, { ...context, inLoop: true });
    return { kind, head, body, span: joinSpans(start, cursor.previous()) };
  }

  private flowHead(cursor: Cursor, keyword: string): OpaqueExpr {
    const group = cursor.next();
    if (!isGroup(group, "paren")) {
      throw this.failure(`Expected "(" after "${keyword}", found ${describeTree(group)}`, group?.span ?? cursor.previous());
    }
    this.requireIntact(group);
    const expr = this.headExpr(group);
    if (!expr.text.trim()) throw this.failure(`Expected a condition after "${keyword}"`, group.span);
    return expr;
  }

  private flowBody(cursor: Cursor, keyword: string, context: ItemContext): FlowBody {
    const group = cursor.next();
    if (!isGroup(group, "brace")) {
      throw this.failure(`Expected "{" to open the "${keyword}" body, found ${describeTree(group)}`, group?.span ?? cursor.previous());
    }
    this.requireIntact(group);
    const items = this.parseItems(new Cursor(group.children, group.inner), context);
    return { kind: "body", items, span: group.span };
  }

  // ── Opaque payloads ────────────────────────────────────────────────────

  /**
   * Split a `(...)` group on top-level commas. A single trailing comma is
   * accepted; any other empty element is a malformed list.
   */
  private parseList(group: Group, what: "component" | "argument"): OpaqueExpr[] {
    const elements: TokenTree[][] = [[]];
    const commas: Span[] = [];
    for (const tree of group.children) {
      if (isLeaf(tree, Comma)) {
        commas.push(tree.span);
        elements.push([]);
      } else {
        elements[elements.length - 1].push(tree);
      }
    }
    if (commas.length === 0 && elements[0].length === 0) return [];
    if (elements.length > 1 && elements[elements.length - 1].length === 0) elements.pop();

    return elements.map((trees, i) => {
      if (trees.length === 0) {
        const at = commas[i] ?? group.span;
        throw this.failure(`Malformed ${what} list: empty ${what}`, at);
      }
      return this.opaque(trees);
    });
  }

  private opaque(trees: TokenTree[]): OpaqueExpr {
    const span = joinSpans(trees[0].span, trees[trees.length - 1].span);
    return {
      text: this.text.slice(span.start.offset, span.end.offset),
      span,
      identifiers: this.collectIdentifiers(trees),
    };
  }

  /** The text between a group's delimiters. */
  private groupExpr(group: Group): OpaqueExpr {
    return {
      text: this.text.slice(group.inner.start.offset, group.inner.end.offset),
      span: group.inner,
      identifiers: this.collectIdentifiers(group.children),
    };
  }

  /**
   * A group's contents from its first token to its last. Comments around them
   * are dropped, since the text is emitted inline before a closing delimiter.
   */
  private headExpr(group: Group): OpaqueExpr {
    if (group.children.length === 0) return { text: "", span: group.inner, identifiers: [] };
    return this.opaque(group.children);
  }

  private blockBody(group: Group): OpaqueExpr {
    this.requireIntact(group);
    return this.groupExpr(group);
  }

  /** Identifiers that are neither keywords nor the right-hand side of a member access. */
  private collectIdentifiers(trees: TokenTree[]): Ident[] {
    const found: Ident[] = [];
    let memberAccess = false;
    const visit = (list: TokenTree[]) => {
      for (const tree of list) {
        if (tree.kind === "group") {
          memberAccess = false;
          visit(tree.children);
          memberAccess = false;
          continue;
        }
        if (isLeaf(tree, TemplateLiteral)) {
          found.push(...this.templateIdentifiers(tree));
        } else if (isLeaf(tree, Identifier) && !memberAccess && !JS_RESERVED.has(tree.token.image)) {
          found.push(this.ident(tree));
        }
        memberAccess = isLeaf(tree, Dot) || (isLeaf(tree, Punct) && tree.token.image === "?.");
      }
    };
    visit(trees);
    return found;
  }

  /**
   * Identifiers inside a template's `${...}` bodies. The literal text around
   * them is blanked out so the re-lexed positions line up with the template.
   */
  private templateIdentifiers(leaf: Leaf): Ident[] {
    const image = leaf.token.image;
    const substitutions = templateSubstitutions(image);
    if (substitutions.length === 0) return [];
    const chars: string[] = Array.from({ length: image.length }, (_, i) => {
      const ch = image.charAt(i);
      return ch === "\n" || ch === "\r" ? ch : " ";
    });
    for (const [start, end] of substitutions) {
      for (let i = start; i < end; i++) chars[i] = image.charAt(i);
    }
    const { trees } = buildTokenTrees(chars.join(""));
    return this.collectIdentifiers(trees).map((ident) => ({
      name: ident.name,
      span: shiftSpan(ident.span, leaf.span.start),
    }));
  }

  // ── Names ──────────────────────────────────────────────────────────────

  private ident(leaf: Leaf): Ident {
    return { name: leaf.token.image, span: leaf.span };
  }

  private declaredName(leaf: Leaf): Ident {
    return this.checkedIdent(leaf, "an entity name");
  }

  private checkedIdent(leaf: Leaf, label: string): Ident {
    const ident = this.ident(leaf);
    const reason = reservedReason(ident.name);
    if (reason) throw this.failure(`"${ident.name}" is ${reason} and cannot be used as ${label}`, ident.span);
    return ident;
  }

  private requireIntact(group: Group): void {
    if (group.broken) throw new ParseFailure();
  }
}
