import test from "node:test";
import assert from "node:assert/strict";
import { resolve as pathResolve } from "node:path";
import { fileURLToPath } from "node:url";
import type { StackFrame } from "../src/engine/base.js";
import { ProtocolError } from "../src/errors.js";
import { DapTestClient, pick } from "./helpers/dap-client.js";
import { FakeEngine, makeLocation, makeNode } from "./helpers/fake-engine.js";

const PROGRAM = fileURLToPath(new URL("./fixtures/program.jsonnet", import.meta.url));
const PROGRAM_SOURCE = "local x = 1;\n{\n  a: x + 1,\n}\n";

test("initialize sends the initialized event before its response", async () => {
  const client = new DapTestClient(new FakeEngine());
  const resp = await client.request("initialize", { adapterID: "test" });
  await client.close();

  assert.deepEqual(
    client.received.map((msg) => [msg.seq, msg.type]),
    [
      [1, "event"],
      [2, "response"],
    ],
  );
  assert.equal(resp.success, true);
  assert.equal(pick(resp, "body", "supportsTerminateRequest"), true);
  assert.equal(pick(resp, "body", "supportsBreakpointLocationsRequest"), true);
  assert.equal(pick(resp, "body", "supportsConfigurationDoneRequest"), false);
});

test("launch of a missing file fails with the open error and emits no events", async () => {
  const engine = new FakeEngine();
  const client = new DapTestClient(engine);
  const resp = await client.request("launch", { program: "does-not-exist.jsonnet" });
  await client.close();

  assert.equal(resp.success, false);
  assert.equal(resp.message, "launchFailed");
  assert.match(String(pick(resp, "body", "error", "format")), /^Failed to open file: ENOENT/);
  assert.deepEqual(client.events(), []);
  assert.deepEqual(engine.methods(), []);
});

test("launch hands the source to the engine and forwards the stop and exit", async () => {
  const engine = new FakeEngine();
  engine.reactions.push(
    [{ type: "stop", reason: "breakpoint", current: makeNode("Var", PROGRAM, 3, 6) }],
    [{ type: "exit", output: '{\n  "a": 2\n}' }],
  );
  const client = new DapTestClient(engine);

  const launched = await client.request("launch", { program: PROGRAM, jpaths: ["lib"] });
  assert.equal(launched.success, true);
  assert.deepEqual(engine.calls[0], { method: "launch", args: [PROGRAM, PROGRAM_SOURCE, ["lib"]] });

  const stopped = await client.waitForEvent("stopped");
  assert.deepEqual(stopped.body, { reason: "breakpoint", threadId: 1, allThreadsStopped: true });

  const continued = await client.request("continue", { threadId: 1 });
  assert.deepEqual(continued.body, { allThreadsContinued: true });
  await client.waitForEvent("terminated");
  await client.close();

  assert.deepEqual(
    client.events("output").map((msg) => msg.body),
    [{ category: "stdout", output: '{\n  "a": 2\n}\n' }],
  );
  assert.deepEqual(engine.methods(), ["launch", "continue"]);
});

test("a failed engine launch is reported and the engine is not terminated on close", async () => {
  const engine = new FakeEngine();
  engine.launchError = new Error("syntax error");
  const client = new DapTestClient(engine);
  const resp = await client.request("launch", { program: PROGRAM });
  await client.close();

  assert.equal(resp.message, "launchFailed");
  assert.equal(pick(resp, "body", "error", "format"), `Failed to launch ${PROGRAM}: syntax error`);
  assert.deepEqual(engine.methods(), ["launch"]);
});

test("closing the stream terminates an engine that is still evaluating", async () => {
  const engine = new FakeEngine();
  const client = new DapTestClient(engine);
  await client.request("launch", { program: PROGRAM });
  await client.close();
  assert.deepEqual(engine.methods(), ["launch", "terminate"]);
});

test("next runs until the current node has been evaluated", async () => {
  const engine = new FakeEngine();
  const node = makeNode("Binary", PROGRAM, 3, 6, 11);
  engine.reactions.push([{ type: "stop", reason: "step", current: node }]);
  const client = new DapTestClient(engine);
  await client.request("launch", { program: PROGRAM });
  await client.waitForEvent("stopped");

  const resp = await client.request("next", { threadId: 1 });
  assert.equal(resp.success, true);
  assert.deepEqual(engine.calls[1], { method: "continueUntilAfter", args: [node] });
  assert.equal(client.session.currentNode, null);

  await client.request("stepIn", { threadId: 1 });
  assert.equal(engine.calls[2]?.method, "step");
  await client.close();
});

test("exception stops carry the error text", async () => {
  const engine = new FakeEngine();
  const client = new DapTestClient(engine);
  engine.emit({
    type: "stop",
    reason: "exception",
    current: makeNode("Error", PROGRAM, 2, 1),
    error: new Error("division by zero"),
  });
  const stopped = await client.waitForEvent("stopped");
  await client.close();

  assert.deepEqual(stopped.body, {
    reason: "exception",
    threadId: 1,
    allThreadsStopped: true,
    text: "division by zero",
  });
});

test("an evaluation error at exit goes to stderr before terminated", async () => {
  const engine = new FakeEngine();
  const client = new DapTestClient(engine);
  engine.emit({ type: "exit", output: "", error: new Error("RUNTIME ERROR: boom") });
  await client.waitForEvent("terminated");
  await client.close();

  assert.deepEqual(
    client.events().map((msg) => [msg.event, msg.body]),
    [
      ["output", { category: "stderr", output: "RUNTIME ERROR: boom\n" }],
      ["terminated", undefined],
    ],
  );
});

test("setBreakpoints replaces the file's breakpoints and reports each one", async () => {
  const engine = new FakeEngine();
  engine.illegalLines.add(5);
  const client = new DapTestClient(engine);
  const args = {
    source: { path: "/work/f.jsonnet" },
    breakpoints: [{ line: 3 }, { line: 5 }, { line: 7, column: 4 }],
  };
  const source = { name: "f.jsonnet", path: "/work/f.jsonnet" };
  const expected = {
    breakpoints: [
      { verified: true, line: 3, column: 1, source },
      { verified: false, line: 5, message: "no breakpoint location at /work/f.jsonnet:5" },
      { verified: true, line: 7, column: 4, source },
    ],
  };

  const first = await client.request("setBreakpoints", args);
  const second = await client.request("setBreakpoints", args);
  await client.close();

  assert.deepEqual(first.body, expected);
  assert.deepEqual(second.body, expected);
  assert.equal(engine.calls[0]?.method, "clearBreakpoints");
  assert.deepEqual(await engine.activeBreakpoints(), [
    { file: "/work/f.jsonnet", line: 3, column: 1 },
    { file: "/work/f.jsonnet", line: 7, column: 4 },
  ]);
});

test("setBreakpoints with an empty list on a file without breakpoints succeeds", async () => {
  const engine = new FakeEngine();
  const client = new DapTestClient(engine);
  const resp = await client.request("setBreakpoints", { source: { path: "/work/empty.jsonnet" }, breakpoints: [] });
  await client.close();

  assert.equal(resp.success, true);
  assert.deepEqual(resp.body, { breakpoints: [] });
  assert.deepEqual(engine.calls, [{ method: "clearBreakpoints", args: ["/work/empty.jsonnet"] }]);
});

test("breakpointLocations returns the locations starting in the requested lines", async () => {
  const engine = new FakeEngine();
  const file = "/work/f.jsonnet";
  engine.locations = [
    makeLocation(file, 1, 1),
    makeLocation(file, 3, 5, 9),
    makeLocation(file, 4, 2),
    makeLocation(file, 8, 1),
    makeLocation("/work/other.jsonnet", 3, 1),
  ];
  const client = new DapTestClient(engine);
  const range = await client.request("breakpointLocations", { source: { path: file }, line: 3, endLine: 4 });
  const single = await client.request("breakpointLocations", { source: { path: file }, line: 8 });
  await client.close();

  assert.deepEqual(range.body, {
    breakpoints: [
      { line: 3, column: 5, endLine: 3, endColumn: 9 },
      { line: 4, column: 2, endLine: 4, endColumn: 3 },
    ],
  });
  assert.deepEqual(single.body, { breakpoints: [{ line: 8, column: 1, endLine: 8, endColumn: 2 }] });
});

test("breakpointLocations reports engine failures", async () => {
  const engine = new FakeEngine();
  engine.locationsError = new Error("file not loaded");
  const client = new DapTestClient(engine);
  const resp = await client.request("breakpointLocations", { source: { path: "/work/f.jsonnet" }, line: 1 });
  await client.close();

  assert.equal(resp.message, "breakpointFailed");
  assert.equal(pick(resp, "body", "error", "format"), "file not loaded");
});

test("a launch after the program exits forwards the new run's events", async () => {
  const engine = new FakeEngine();
  engine.reactions.push(
    [{ type: "exit", output: "1" }],
    [{ type: "stop", reason: "breakpoint", current: makeNode("Var", PROGRAM, 3, 6) }],
  );
  const client = new DapTestClient(engine);

  await client.request("launch", { program: PROGRAM });
  await client.waitForEvent("terminated");
  const relaunched = await client.request("launch", { program: PROGRAM });
  const stopped = await client.waitForEvent("stopped");
  await client.close();

  assert.equal(relaunched.success, true);
  assert.deepEqual(stopped.body, { reason: "breakpoint", threadId: 1, allThreadsStopped: true });
  assert.deepEqual(engine.methods(), ["launch", "launch", "terminate"]);
});

class SlowTraceEngine extends FakeEngine {
  async stackTrace(): Promise<StackFrame[]> {
    await new Promise((resolve) => setTimeout(resolve, 20));
    return super.stackTrace();
  }
}

test("a request still being handled at end of input is answered before close", async () => {
  const engine = new SlowTraceEngine();
  const client = new DapTestClient(engine);
  const seq = client.send("stackTrace", { threadId: 1 });
  await client.close();

  assert.deepEqual(
    client.responses().map((msg) => [msg.request_seq, msg.command, msg.success, msg.body]),
    [[seq, "stackTrace", true, { stackFrames: [], totalFrames: 0 }]],
  );
});

test("stackTrace lists the innermost frame first and pages", async () => {
  const engine = new FakeEngine();
  engine.frames = [
    { name: "/abs/path/main.jsonnet", location: makeLocation("main.jsonnet", 1, 1) },
    { name: "fieldA", location: makeLocation("lib.libsonnet", 4, 3, 10) },
    { name: "anonymous" },
  ];
  const client = new DapTestClient(engine);
  const full = await client.request("stackTrace", { threadId: 1 });
  const page = await client.request("stackTrace", { threadId: 1, startFrame: 1, levels: 1 });
  await client.close();

  const fieldA = {
    id: 1,
    name: "fieldA",
    source: { name: "lib.libsonnet", path: pathResolve("lib.libsonnet") },
    line: 4,
    column: 3,
    endLine: 4,
    endColumn: 10,
  };
  assert.deepEqual(full.body, {
    stackFrames: [
      { id: 2, name: "anonymous", line: 0, column: 0 },
      fieldA,
      {
        id: 0,
        name: "main.jsonnet",
        source: { name: "main.jsonnet", path: pathResolve("main.jsonnet") },
        line: 1,
        column: 1,
        endLine: 1,
        endColumn: 2,
      },
    ],
    totalFrames: 3,
  });
  assert.deepEqual(page.body, { stackFrames: [fieldA], totalFrames: 3 });
});

test("scopes and threads describe the single evaluation", async () => {
  const client = new DapTestClient(new FakeEngine());
  const scopes = await client.request("scopes", { frameId: 0 });
  const threads = await client.request("threads");
  await client.close();

  assert.deepEqual(scopes.body, { scopes: [{ name: "Local", variablesReference: 1000, expensive: false }] });
  assert.deepEqual(threads.body, { threads: [{ id: 1, name: "main" }] });
});

test("variables lists visible names plus self", async () => {
  const engine = new FakeEngine();
  engine.vars = { x: "1", y: '"two"' };
  const client = new DapTestClient(engine);
  const local = await client.request("variables", { variablesReference: 1000 });
  const other = await client.request("variables", { variablesReference: 7 });
  await client.close();

  assert.deepEqual(local.body, {
    variables: [
      { name: "x", value: "1", evaluateName: "x", variablesReference: 0 },
      { name: "y", value: '"two"', evaluateName: "y", variablesReference: 0 },
      { name: "self", value: "", evaluateName: "self", variablesReference: 0 },
    ],
  });
  assert.deepEqual(other.body, { variables: [] });
});

test("evaluate looks up a variable", async () => {
  const engine = new FakeEngine();
  engine.vars = { x: "1" };
  const client = new DapTestClient(engine);
  const found = await client.request("evaluate", { expression: "x", context: "watch" });
  const missing = await client.request("evaluate", { expression: "nope" });
  await client.close();

  assert.deepEqual(found.body, { result: "1", type: "string", variablesReference: 0 });
  assert.equal(missing.success, false);
  assert.equal(missing.message, "evaluateFailed");
  assert.equal(pick(missing, "body", "error", "format"), "Failed to look up variable: unknown variable nope");
});

test("unsupported commands fail without touching the engine", async () => {
  const engine = new FakeEngine();
  const client = new DapTestClient(engine);
  const resp = await client.request("setExpression", { expression: "x", value: "2" });
  await client.close();

  assert.equal(resp.success, false);
  assert.equal(resp.message, "unsupported");
  assert.equal(pick(resp, "body", "error", "format"), "SetExpressionRequest is not yet supported");
  assert.deepEqual(engine.calls, []);
});

test("bad arguments are answered and the session keeps serving", async () => {
  const client = new DapTestClient(new FakeEngine());
  const bad = await client.request("evaluate");
  const threads = await client.request("threads");
  await client.close();

  assert.equal(bad.message, "invalidArguments");
  assert.equal(pick(bad, "body", "error", "format"), "Invalid evaluate arguments: arguments: Required");
  assert.equal(threads.success, true);
});

test("concurrent requests each get their own response", async () => {
  const engine = new FakeEngine();
  engine.vars = { x: "1" };
  const client = new DapTestClient(engine);
  const sent = [
    client.send("threads"),
    client.send("scopes", { frameId: 0 }),
    client.send("evaluate", { expression: "x" }),
    client.send("variables", { variablesReference: 1000 }),
    client.send("stackTrace", { threadId: 1 }),
  ];
  const responses = await Promise.all(sent.map((seq) => client.waitForResponse(seq)));
  await client.close();

  assert.deepEqual(
    responses.map((resp) => [resp.request_seq, resp.command]),
    [
      [1, "threads"],
      [2, "scopes"],
      [3, "evaluate"],
      [4, "variables"],
      [5, "stackTrace"],
    ],
  );
  assert.equal(client.responses().length, 5);
});

test("an unknown command closes the session without further responses", async () => {
  const client = new DapTestClient(new FakeEngine());
  await client.request("initialize");
  client.send("frobnicate");

  await assert.rejects(client.done, ProtocolError);
  assert.equal(client.received.length, 2);
  assert.equal(client.output.destroyed, true);
});

test("a frame without Content-Length is fatal", async () => {
  const client = new DapTestClient(new FakeEngine());
  client.input.write(Buffer.from('Content-Type: json\r\n\r\n{"seq":1}'));

  await assert.rejects(client.done, (err: unknown) => err instanceof ProtocolError);
  assert.deepEqual(client.received, []);
});
