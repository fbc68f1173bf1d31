import type { Span } from "./diagnostics.js";

/** An identifier written in the grammar (entity name, method, parent symbol). */
export type Ident = { name: string; span: Span };

/**
 * A verbatim slice of host JavaScript: a component, an argument, a code
 * block body, a flow condition or a `[expr]` reference.
 *
 * The compiler never parses these. `identifiers` lists the identifier
 * tokens that are not member accesses (`a.b` contributes only `a`), so the
 * resolver can tag the ones that name a binding made inside the source.
 */
export type OpaqueExpr = {
  text: string;
  span: Span;
  identifiers: Ident[];
};

/**
 * Parent of a parented entity:
 *   p > (...)        : a symbol, looked up in scope
 *   [expr] > (...)   : an external expression, never resolved
 */
export type ParentRef =
  | { kind: "name"; ident: Ident }
  | { kind: "expr"; expr: OpaqueExpr };

/**
 * A post-creation action on an entity.
 *
 *   .observe(cb)   : method call
 *   .(cb)          : method call with the default method (`method` absent)
 *   .{ ... }       : code block run with `this` and `entity` in scope
 */
export type Extension =
  | { kind: "call"; method?: Ident; args: OpaqueExpr[]; span: Span }
  | { kind: "block"; body: OpaqueExpr; span: Span };

export type ChildGroup = {
  items: Item[];
  span: Span;
};

/**
 * One spawn declaration.
 *
 * `insertion` marks `name + (...)`: the components go onto the entity already
 * bound to `name` and no new binding is made.
 */
export type EntityNode = {
  kind: "entity";
  name?: Ident;
  parent?: ParentRef;
  insertion: boolean;
  components: OpaqueExpr[];
  extensions: Extension[];
  children: ChildGroup[];
  span: Span;
};

/** `{ ... }` at item position, emitted verbatim where it stands. */
export type CodeItem = {
  kind: "code";
  body: OpaqueExpr;
  span: Span;
};

/** `if (cond) { ... } else if (...) { ... } else { ... }` */
export type IfFlow = {
  kind: "if";
  condition: OpaqueExpr;
  body: FlowBody;
  alternate?: IfFlow | FlowBody;
  span: Span;
};

/** `for (head) { ... }` and `while (cond) { ... }` */
export type LoopFlow = {
  kind: "for" | "while";
  head: OpaqueExpr;
  body: FlowBody;
  span: Span;
};

export type ControlItem = {
  kind: "break" | "continue";
  span: Span;
};

export type FlowBody = {
  kind: "body";
  items: Item[];
  span: Span;
};

export type Item = EntityNode | CodeItem | IfFlow | LoopFlow | ControlItem;

/** `commands` or `[expr]` at the head of a source. */
export type SpawnerRef =
  | { kind: "name"; ident: Ident }
  | { kind: "expr"; expr: OpaqueExpr };

export type SpawnProgram = {
  spawner: SpawnerRef;
  items: Item[];
  span: Span;
};
