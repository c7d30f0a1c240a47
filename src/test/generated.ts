/**
 * Load generated source in-process so tests can call what it exports
 */

import ts from "typescript";
import * as z from "zod";

export type GeneratedModule = Record<string, unknown>;

type Callable = (...args: unknown[]) => unknown;

/**
 * Transpile generated TypeScript to CommonJS and evaluate it. The only
 * runtime import generated code makes is zod.
 */
export function loadGenerated(source: string): GeneratedModule {
  const { outputText } = ts.transpileModule(source, {
    compilerOptions: {
      module: ts.ModuleKind.CommonJS,
      target: ts.ScriptTarget.ES2022,
    },
  });

  const exports: GeneratedModule = {};
  const requireModule = (id: string): unknown => {
    if (id === "zod") return z;
    throw new Error(`Generated code imports unexpected module "${id}"`);
  };
  new Function("exports", "require", outputText)(exports, requireModule);
  return exports;
}

/**
 * Property `name` of a generated module or object
 */
export function member(target: unknown, name: string): unknown {
  if (typeof target !== "object" || target === null) {
    throw new Error(`Cannot read "${name}" from ${String(target)}`);
  }
  return Reflect.get(target, name);
}

/**
 * Function `name` of a generated module or object, bound to its owner
 */
export function fn(target: unknown, name: string): Callable {
  const value = member(target, name);
  if (typeof value !== "function") {
    throw new Error(`"${name}" is not a function`);
  }
  return (...args) => Reflect.apply(value, target, args);
}
