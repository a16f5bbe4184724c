import test from "node:test";
import assert from "node:assert/strict";
import { fileURLToPath } from "node:url";
import { formatBreakpoint, formatLocation, isDebugEngine } from "../src/engine/base.js";
import { loadEngineFactory, resolveEngineSpecifier } from "../src/engine/registry.js";
import { EngineLoadError } from "../src/errors.js";
import { makeLocation } from "./helpers/fake-engine.js";

const FIXTURES = fileURLToPath(new URL("./fixtures/", import.meta.url));

test("resolveEngineSpecifier turns paths into file URLs and leaves package names", () => {
  assert.equal(resolveEngineSpecifier("./engine.js", "/srv/app"), "file:///srv/app/engine.js");
  assert.equal(resolveEngineSpecifier("../engine.js", "/srv/app"), "file:///srv/engine.js");
  assert.equal(resolveEngineSpecifier("/opt/engine.js", "/srv/app"), "file:///opt/engine.js");
  assert.equal(resolveEngineSpecifier("file:///opt/engine.js", "/srv/app"), "file:///opt/engine.js");
  assert.equal(resolveEngineSpecifier("some-engine", "/srv/app"), "some-engine");
});

test("loadEngineFactory returns a fresh engine per call", async () => {
  const createEngine = await loadEngineFactory("./engine-module.ts", FIXTURES);
  const first = createEngine();
  const second = createEngine();
  assert.ok(isDebugEngine(first));
  assert.notEqual(first, second);
});

test("loadEngineFactory rejects an engine missing facade methods", async () => {
  const createEngine = await loadEngineFactory("./incomplete-engine.ts", FIXTURES);
  assert.throws(
    () => createEngine(),
    (err: unknown) =>
      err instanceof EngineLoadError &&
      err.message ===
        "createEngine() from ./incomplete-engine.ts returned an incomplete engine (missing continue, " +
          "continueUntilAfter, step, setBreakpoint, clearBreakpoints, activeBreakpoints, breakpointLocations, " +
          "lookupValue, listVars, stackTrace, terminate)",
  );
});

test("loadEngineFactory rejects a module without createEngine", async () => {
  await assert.rejects(
    loadEngineFactory("./no-factory.ts", FIXTURES),
    (err: unknown) =>
      err instanceof EngineLoadError &&
      err.message === "Engine module ./no-factory.ts does not export a createEngine function",
  );
});

test("loadEngineFactory wraps import failures", async () => {
  await assert.rejects(
    loadEngineFactory("./does-not-exist.ts", FIXTURES),
    (err: unknown) => err instanceof EngineLoadError && err.message.startsWith("Cannot load engine module ./does-not-exist.ts: "),
  );
});

test("locations render compactly on one line and with ranges across lines", () => {
  assert.equal(formatLocation(makeLocation("f.jsonnet", 3, 5, 5)), "f.jsonnet:3:5");
  assert.equal(formatLocation(makeLocation("f.jsonnet", 3, 5, 9)), "f.jsonnet:3:5-9");
  assert.equal(
    formatLocation({ file: { name: "f.jsonnet", lines: [] }, begin: { line: 1, column: 2 }, end: { line: 4, column: 1 } }),
    "f.jsonnet:(1:2)-(4:1)",
  );
  assert.equal(formatBreakpoint({ file: "f.jsonnet", line: 10, column: 1 }), "f.jsonnet:10:1");
});
