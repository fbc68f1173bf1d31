/**
 * Compiles Sprout entity-tree sources into JavaScript that drives a
 * spawner.
 *
 *   import { compile, run, World } from "sprout-dsl";
 *
 *   const result = compile(`commands
 *     root (Node()).[
 *       (Text("hello"))
 *     ]`);
 *   if (result.code) run(result.code, { commands: new World(), Node, Text });
 */

export { compile, compilePartial, createCompiler } from "./compiler.js";
export type {
  CompileOptions,
  CompileResult,
  CompilerOptions,
  Logger,
  PartialCompileResult,
  SproutCompiler,
} from "./compiler.js";

export { parseSprout, reservedReason, buildTokenTrees, SproutLexer } from "./parser/index.js";
export type { SproutParseResult, TokenTree } from "./parser/index.js";

export { resolveProgram } from "./resolver.js";
export type {
  BindingSite,
  ImplicitName,
  Reference,
  ReferenceRole,
  Resolution,
  ResolveOptions,
  ResolvedProgram,
} from "./resolver.js";

export { generate, DEFAULT_METHOD } from "./codegen.js";
export type { GenerateOptions } from "./codegen.js";

export {
  DiagnosticCategory,
  formatDiagnostic,
  hasErrors,
  sortDiagnostics,
} from "./diagnostics.js";
export type {
  DiagnosticCategoryType,
  DiagnosticSeverity,
  Position,
  Span,
  SproutDiagnostic,
} from "./diagnostics.js";

export type {
  ChildGroup,
  CodeItem,
  ControlItem,
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
} from "./types.js";

export { World, run } from "./runtime/index.js";
export type {
  EntityCommands,
  EntityId,
  EntityRecord,
  Observer,
  Spawner,
  WorldOperation,
} from "./runtime/index.js";

export * from "./literals/index.js";
