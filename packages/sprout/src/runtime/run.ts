/**
 * Evaluate compiled Sprout code with the given host bindings in scope.
 *
 *   run(code, { commands: world, Button, label })
 *
 * Every key of `scope` becomes a parameter of the evaluated function, so
 * the compiled block sees it as a plain identifier.
 */
export function run(code: string, scope: Record<string, unknown> = {}): void {
  const names = Object.keys(scope);
  const body = new Function(...names, `"use strict";\n${code}`);
  Reflect.apply(body, undefined, names.map((name) => scope[name]));
}
