/** Engine lookup: the engine is an external module exporting `createEngine()`. */

import { isAbsolute, resolve as pathResolve } from "node:path";
import { pathToFileURL } from "node:url";
import { EngineLoadError, getErrorMessage } from "../errors.js";
import { isDebugEngine, missingEngineMethods, type DebugEngine, type EngineFactory } from "./base.js";

/** Relative and absolute paths load as files; anything else as a package name. */
export function resolveEngineSpecifier(specifier: string, cwd: string = process.cwd()): string {
  if (specifier.startsWith("file:")) return specifier;
  if (isAbsolute(specifier) || specifier.startsWith("./") || specifier.startsWith("../")) {
    return pathToFileURL(pathResolve(cwd, specifier)).href;
  }
  return specifier;
}

/**
 * Import `specifier` and return a factory producing checked engines. The
 * module must export a `createEngine` function; each engine it returns is
 * checked for the full facade before use.
 */
export async function loadEngineFactory(specifier: string, cwd?: string): Promise<EngineFactory> {
  const target = resolveEngineSpecifier(specifier, cwd);

  let mod: unknown;
  try {
    mod = await import(target);
  } catch (err) {
    throw new EngineLoadError(`Cannot load engine module ${specifier}: ${getErrorMessage(err)}`, { cause: err });
  }

  if (typeof mod !== "object" || mod === null) {
    throw new EngineLoadError(`Engine module ${specifier} has no exports`);
  }
  const create: unknown = Reflect.get(mod, "createEngine");
  if (typeof create !== "function") {
    throw new EngineLoadError(`Engine module ${specifier} does not export a createEngine function`);
  }

  return (): DebugEngine => {
    const engine: unknown = Reflect.apply(create, mod, []);
    if (!isDebugEngine(engine)) {
      const missing = missingEngineMethods(engine).join(", ");
      throw new EngineLoadError(`createEngine() from ${specifier} returned an incomplete engine (missing ${missing})`);
    }
    return engine;
  };
}
