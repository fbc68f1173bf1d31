/**
 * Parser tests: every construct of the grammar, and the recovery behaviour
 * that lets independent mistakes be reported together.
 */
import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { parseSprout } from "../src/parser/index.js";
import type { EntityNode, Item, SpawnProgram } from "../src/types.js";

function parseOk(text: string): SpawnProgram {
  const { program, diagnostics } = parseSprout(text);
  assert.deepEqual(diagnostics, []);
  assert.ok(program, "expected a program");
  return program;
}

function messages(text: string): string[] {
  return parseSprout(text).diagnostics.map((d) => d.message);
}

function entity(item: Item | undefined): EntityNode {
  assert.ok(item && item.kind === "entity", "expected an entity");
  return item;
}

describe("parser: spawner", () => {
  it("reads a named spawner", () => {
    const program = parseOk("commands a ()");
    assert.equal(program.spawner.kind, "name");
    assert.ok(program.spawner.kind === "name");
    assert.equal(program.spawner.ident.name, "commands");
    assert.equal(program.items.length, 1);
  });

  it("reads a spawner expression", () => {
    const program = parseOk("[world.commands] (A)");
    assert.ok(program.spawner.kind === "expr");
    assert.equal(program.spawner.expr.text, "world.commands");
  });

  it("accepts a source with no items", () => {
    assert.deepEqual(parseOk("commands").items, []);
  });

  it("requires a spawner", () => {
    const result = parseSprout("(A)");
    assert.equal(result.program, undefined);
    assert.deepEqual(result.diagnostics.map((d) => d.message), [
      'Expected a spawner (an identifier or "[expression]") at the start of the source, found "("',
    ]);
  });

  it("rejects a spawner named like a generated binding", () => {
    assert.deepEqual(messages("spawner a ()"), [
      '"spawner" cannot name the spawner: it is bound by the generated code',
    ]);
  });
});

describe("parser: entities", () => {
  it("splits components on top-level commas only", () => {
    const [item] = parseOk('commands (Name("x"), Size { w: 1 }, Pair(a, b),)').items;
    assert.deepEqual(entity(item).components.map((c) => c.text), ['Name("x")', "Size { w: 1 }", "Pair(a, b)"]);
  });

  it("reads a named entity with no components", () => {
    const node = entity(parseOk("commands a ()").items[0]);
    assert.equal(node.name?.name, "a");
    assert.equal(node.insertion, false);
    assert.deepEqual(node.components, []);
  });

  it("allows semicolons to be left out", () => {
    assert.equal(parseOk("commands a () b ()").items.length, 2);
  });

  it("reads a parented entity with a name", () => {
    const [, second] = parseOk("commands p (); p > c (A)").items;
    const node = entity(second);
    assert.ok(node.parent?.kind === "name");
    assert.equal(node.parent.ident.name, "p");
    assert.equal(node.name?.name, "c");
  });

  it("reads a parent expression", () => {
    const node = entity(parseOk("commands [root] > (A)").items[0]);
    assert.ok(node.parent?.kind === "expr");
    assert.equal(node.parent.expr.text, "root");
    assert.equal(node.name, undefined);
  });

  it("leaves comments out of a parent expression", () => {
    const node = entity(parseOk("commands [ roots[0] /* first */ ] > (A)").items[0]);
    assert.ok(node.parent?.kind === "expr");
    assert.equal(node.parent.expr.text, "roots[0]");
  });

  it("reads an insertion", () => {
    const node = entity(parseOk("commands a (); a + (B)").items[1]);
    assert.equal(node.insertion, true);
    assert.equal(node.name?.name, "a");
    assert.deepEqual(node.components.map((c) => c.text), ["B"]);
  });

  it("reads extensions and children groups in order", () => {
    const node = entity(parseOk("commands (A).observe(cb).(cb2).{ entity.x() }.[ (B) ].[ (C); (D) ]").items[0]);
    assert.equal(node.extensions.length, 3);

    const [call, shortcut, block] = node.extensions;
    assert.ok(call.kind === "call");
    assert.equal(call.method?.name, "observe");
    assert.deepEqual(call.args.map((a) => a.text), ["cb"]);

    assert.ok(shortcut.kind === "call");
    assert.equal(shortcut.method, undefined);
    assert.deepEqual(shortcut.args.map((a) => a.text), ["cb2"]);

    assert.ok(block.kind === "block");
    assert.equal(block.body.text, " entity.x() ");

    assert.deepEqual(node.children.map((g) => g.items.length), [1, 2]);
  });

  it("collects the identifiers an expression mentions", () => {
    const node = entity(parseOk("commands (Foo(a.b, c?.d), this.x, new Thing())").items[0]);
    assert.deepEqual(node.components.map((c) => c.identifiers.map((i) => i.name)), [
      ["Foo", "a", "c"],
      ["this"],
      ["Thing"],
    ]);
  });

  it("collects identifiers inside template substitutions", () => {
    const node = entity(parseOk("commands (`${a} and ${b.c} ${`${d}`}`)").items[0]);
    assert.deepEqual(node.components[0].identifiers.map((i) => i.name), ["a", "b", "d"]);
  });

  it("places a substituted identifier at its position in the source", () => {
    const node = entity(parseOk("commands (`x${a}`)").items[0]);
    const [ident] = node.components[0].identifiers;
    assert.deepEqual(ident.span, {
      start: { line: 1, column: 15, offset: 14 },
      end: { line: 1, column: 16, offset: 15 },
    });
  });

  it("keeps a regular expression inside a component", () => {
    const node = entity(parseOk("commands (Pattern(/[)]/), Size)").items[0]);
    assert.deepEqual(node.components.map((c) => c.text), ["Pattern(/[)]/)", "Size"]);
  });
});

describe("parser: flow", () => {
  it("reads a for loop with break inside a nested if", () => {
    const [loop] = parseOk("commands for (const i of xs) { (Item(i)); if (i > 2) { break } }").items;
    assert.ok(loop.kind === "for");
    assert.equal(loop.head.text, "const i of xs");
    assert.deepEqual(loop.body.items.map((i) => i.kind), ["entity", "if"]);
  });

  it("reads an if / else if / else chain", () => {
    const [flow] = parseOk("commands if (a) { (A) } else if (b) { (B) } else { (C) }").items;
    assert.ok(flow.kind === "if");
    assert.equal(flow.condition.text, "a");
    assert.ok(flow.alternate?.kind === "if");
    assert.equal(flow.alternate.condition.text, "b");
    assert.equal(flow.alternate.alternate?.kind, "body");
  });

  it("leaves comments out of a flow head", () => {
    const [loop] = parseOk("commands for (const x of xs // every x\n) { (x) }").items;
    assert.ok(loop.kind === "for");
    assert.equal(loop.head.text, "const x of xs");

    const [flow] = parseOk("commands if (/* all */ ready) { (A) }").items;
    assert.ok(flow.kind === "if");
    assert.equal(flow.condition.text, "ready");
  });

  it("rejects a flow head holding only a comment", () => {
    assert.deepEqual(messages("commands while (/* never */) { (A) }"), ['Expected a condition after "while"']);
  });

  it("reads a while loop with continue", () => {
    const [loop] = parseOk("commands while (more()) { continue }").items;
    assert.ok(loop.kind === "while");
    assert.deepEqual(loop.body.items.map((i) => i.kind), ["continue"]);
  });

  it("reads a code block", () => {
    const [code] = parseOk("commands { setup() }").items;
    assert.ok(code.kind === "code");
    assert.equal(code.body.text, " setup() ");
  });
});

describe("parser: errors", () => {
  it("rejects break outside a loop", () => {
    assert.deepEqual(messages("commands break"), ['"break" is only allowed inside a loop body']);
  });

  it("does not let a loop body reach into a children group", () => {
    assert.deepEqual(messages("commands for (;;) { (A).[ continue ] }"), [
      '"continue" is only allowed inside a loop body',
    ]);
  });

  it("rejects a parented entity inside a children group", () => {
    const result = parseSprout("commands p (); (A).[ p > (B) ]");
    assert.deepEqual(result.diagnostics.map((d) => d.message), ["Parented entity is only allowed at top level"]);
    assert.deepEqual(result.diagnostics[0].span.start, { line: 1, column: 22, offset: 21 });
    const node = entity(result.program?.items[1]);
    assert.equal(node.children[0].items.length, 0);
  });

  it("rejects an extension after a children group", () => {
    const result = parseSprout("commands (A).[ (B) ].observe(cb)");
    assert.deepEqual(result.diagnostics.map((d) => d.message), ["Extensions cannot be chained after a children group"]);
    assert.deepEqual(result.program?.items, []);
  });

  it("rejects a dot followed by a bare name", () => {
    assert.deepEqual(messages("commands (A).x"), [
      'Expected a method call, "(", "{" or "[" after ".", found "x"',
    ]);
  });

  it("rejects an empty component", () => {
    const result = parseSprout("commands (A,,B)");
    assert.deepEqual(result.diagnostics.map((d) => d.message), ["Malformed component list: empty component"]);
    assert.equal(result.diagnostics[0].span.start.column, 13);
  });

  it("rejects an empty argument", () => {
    assert.deepEqual(messages("commands (A).observe(,)"), ["Malformed argument list: empty argument"]);
  });

  it("rejects an insertion without a target", () => {
    assert.deepEqual(messages("commands + (B)"), ['Insertion requires a target name before "+"']);
  });

  it("rejects an insertion with a parent", () => {
    assert.deepEqual(messages("commands p > + (B)"), ["Insertion cannot be combined with a parent"]);
  });

  it("rejects reserved entity names", () => {
    assert.deepEqual(messages("commands class (A)"), ['"class" is a reserved word and cannot be used as an entity name']);
    assert.deepEqual(messages("commands entity (A)"), [
      '"entity" is bound by the generated code and cannot be used as an entity name',
    ]);
    assert.deepEqual(messages("commands __sproutTmp (A)"), [
      '"__sproutTmp" is reserved for compiler internals and cannot be used as an entity name',
    ]);
  });

  it("rejects a reserved parent name", () => {
    assert.deepEqual(messages("commands this > (A)"), [
      '"this" is bound by the generated code and cannot be used as a parent reference',
    ]);
  });

  it("reports an unterminated group once", () => {
    const result = parseSprout("commands a (A");
    assert.deepEqual(result.diagnostics.map((d) => d.message), ['Unterminated "("']);
    assert.deepEqual(result.program?.items, []);
  });

  it("recovers at the next semicolon and keeps going", () => {
    const result = parseSprout("commands a (A,,B); b (B); x.y; d (D)");
    assert.deepEqual(result.diagnostics.map((d) => d.message), [
      "Malformed component list: empty component",
      'Expected "(" after "x", found "."',
    ]);
    assert.deepEqual(result.program?.items.map((i) => entity(i).name?.name), ["b", "d"]);
  });
});
