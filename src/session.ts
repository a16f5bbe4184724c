/** DAP session: one engine, one output writer, one handler per request. */

import { readFile } from "node:fs/promises";
import { basename, resolve as pathResolve } from "node:path";
import type { Readable, Writable } from "node:stream";
import type { Logger } from "pino";
import type { DebugProtocol } from "@vscode/debugprotocol";
import type {
  DebugEngine,
  EvalNode,
  ExitEvent,
  SourceLocation,
  StackFrame as EngineFrame,
  StopEvent,
} from "./engine/base.js";
import type {
  Breakpoint,
  BreakpointLocation,
  Capabilities,
  OutgoingMessage,
  Scope,
  StackFrame,
  Thread,
  Variable,
} from "./dap-types.js";
import { LOCAL_SCOPE_REFERENCE, MAIN_THREAD_ID } from "./dap-types.js";
import { getErrorMessage, ProtocolError } from "./errors.js";
import { pumpEngineEvents, type EngineEventSink, type PumpResult } from "./event-dispatcher.js";
import { createLogger } from "./logger.js";
import { newErrorResponse, newEvent, newResponse, unsupportedResponse } from "./messages.js";
import { OutputWriter } from "./output-writer.js";
import {
  decodeRequest,
  type DecodeResult,
  type Request,
  type RequestOf,
  type UnsupportedCommand,
} from "./protocol.js";
import { readMessages } from "./wire.js";

const baseLog = createLogger("session");
let sessionCounter = 0;

export const CAPABILITIES: Capabilities = {
  supportsConfigurationDoneRequest: false,
  supportsFunctionBreakpoints: false,
  supportsConditionalBreakpoints: false,
  supportsHitConditionalBreakpoints: false,
  supportsEvaluateForHovers: false,
  exceptionBreakpointFilters: [],
  supportsStepBack: false,
  supportsSetVariable: false,
  supportsRestartFrame: false,
  supportsGotoTargetsRequest: false,
  supportsStepInTargetsRequest: false,
  supportsCompletionsRequest: false,
  supportsModulesRequest: false,
  supportsRestartRequest: false,
  supportsExceptionOptions: false,
  supportsValueFormattingOptions: false,
  supportsExceptionInfoRequest: false,
  supportTerminateDebuggee: false,
  supportsDelayedStackTraceLoading: false,
  supportsLoadedSourcesRequest: false,
  supportsLogPoints: false,
  supportsTerminateThreadsRequest: false,
  supportsSetExpression: false,
  supportsTerminateRequest: true,
  supportsDataBreakpoints: false,
  supportsReadMemoryRequest: false,
  supportsDisassembleRequest: false,
  supportsCancelRequest: false,
  supportsBreakpointLocationsRequest: true,
};

export interface DapSessionOptions {
  engine: DebugEngine;
  input: Readable;
  output: Writable;
  /** End `output` once the session has drained. Off for process stdout. */
  endOutput?: boolean;
}

/**
 * Reads requests from `input` and answers them on `output`. Every request
 * gets its own handler promise; the read loop never waits for one. Engine
 * events are forwarded as they arrive, through the same output writer.
 *
 * The engine facade is shared by all handlers without locking; it must
 * tolerate concurrent calls. Control requests (continue, next, stepIn) are
 * expected only while the engine is stopped, and the session does not
 * enforce that.
 */
export class DapSession implements EngineEventSink {
  readonly id: number;
  private readonly engine: DebugEngine;
  private readonly input: Readable;
  private readonly output: Writable;
  private readonly endOutput: boolean;
  private readonly writer: OutputWriter;
  private readonly inFlight = new Set<Promise<void>>();
  private readonly stop = new AbortController();
  private readonly log: Logger;
  private current: EvalNode | null = null;
  private launched = false;
  private exited = false;
  private events: Promise<PumpResult> | null = null;

  constructor(opts: DapSessionOptions) {
    this.id = ++sessionCounter;
    this.engine = opts.engine;
    this.input = opts.input;
    this.output = opts.output;
    this.endOutput = opts.endOutput ?? true;
    this.writer = new OutputWriter(opts.output);
    this.log = baseLog.child({ session: this.id });
  }

  /** The node the engine last stopped on; null while running or before launch. */
  get currentNode(): EvalNode | null {
    return this.current;
  }

  /**
   * Serve until end of stream, then drain. Rejects with `ProtocolError`
   * after tearing the session down if the client sends something that
   * cannot be decoded.
   */
  async run(): Promise<void> {
    // A client may launch again after an exit, so pump until the stream ends.
    this.events = pumpEngineEvents(this.engine, this, this.stop.signal, { untilExit: false }).catch((err: unknown) => {
      this.log.error({ err }, "event dispatch failed");
      return "ended" as const;
    });

    try {
      for await (const raw of readMessages(this.input)) {
        this.dispatch(decodeRequest(raw));
      }
      this.log.debug("no more data to read");
    } catch (err) {
      if (err instanceof ProtocolError) {
        await this.teardown(err);
        throw err;
      }
      this.log.debug({ err: getErrorMessage(err) }, "transport closed");
    }

    await this.shutdown();
  }

  // --- Dispatch ---

  private dispatch(decoded: DecodeResult): void {
    if (!decoded.ok) {
      const { envelope, error } = decoded;
      this.log.debug({ seq: envelope.seq, command: envelope.command, error }, "received request with invalid arguments");
      this.send(newErrorResponse(envelope, "invalidArguments", `Invalid ${envelope.command} arguments: ${error}`));
      return;
    }

    const { request } = decoded;
    this.log.debug({ seq: request.seq, command: request.command, arguments: request.arguments }, "received request");

    const task: Promise<void> = this.handle(request)
      .catch((err: unknown) => {
        this.log.error({ err, command: request.command }, "request handler failed");
        this.send(newErrorResponse(request, "engineFailed", getErrorMessage(err)));
      })
      .finally(() => this.inFlight.delete(task));
    this.inFlight.add(task);
  }

  private async handle(request: Request): Promise<void> {
    switch (request.command) {
      case "initialize":
        return this.onInitialize(request);
      case "launch":
        return this.onLaunch(request);
      case "disconnect":
        return this.onDisconnect(request);
      case "terminate":
        return this.onTerminate(request);
      case "setBreakpoints":
        return this.onSetBreakpoints(request);
      case "setExceptionBreakpoints":
        return this.onSetExceptionBreakpoints(request);
      case "breakpointLocations":
        return this.onBreakpointLocations(request);
      case "continue":
        return this.onContinue(request);
      case "next":
        return this.onNext(request);
      case "stepIn":
        return this.onStepIn(request);
      case "stackTrace":
        return this.onStackTrace(request);
      case "scopes":
        return this.onScopes(request);
      case "variables":
        return this.onVariables(request);
      case "threads":
        return this.onThreads(request);
      case "evaluate":
        return this.onEvaluate(request);
      default:
        return this.onUnsupported(request);
    }
  }

  private send(message: OutgoingMessage): void {
    this.writer.enqueue(message);
  }

  // --- Request handlers ---

  private onUnsupported(request: RequestOf<UnsupportedCommand>): void {
    this.send(unsupportedResponse(request));
  }

  private onInitialize(request: RequestOf<"initialize">): void {
    // Configuration requests are accepted at any time, so the client may
    // start sending them right away.
    this.send(newEvent("initialized"));
    this.send(newResponse(request, CAPABILITIES));
  }

  private async onLaunch(request: RequestOf<"launch">): Promise<void> {
    const { program, jpaths } = request.arguments;

    let source: string;
    try {
      source = await readFile(program, "utf-8");
    } catch (err) {
      this.send(newErrorResponse(request, "launchFailed", `Failed to open file: ${getErrorMessage(err)}`));
      return;
    }

    const exited = this.exited;
    // Reset first: the new run's exit may be dispatched before launch returns.
    this.exited = false;
    try {
      await this.engine.launch(program, source, jpaths);
    } catch (err) {
      this.exited = exited;
      this.send(newErrorResponse(request, "launchFailed", `Failed to launch ${program}: ${getErrorMessage(err)}`));
      return;
    }
    this.launched = true;
    this.log.debug({ file: program, jpaths }, "started debugging");
    this.send(newResponse(request));
  }

  private onDisconnect(request: RequestOf<"disconnect">): void {
    this.send(newResponse(request));
  }

  private async onTerminate(request: RequestOf<"terminate">): Promise<void> {
    await this.engine.terminate();
    this.send(newResponse(request));
  }

  private async onSetBreakpoints(request: RequestOf<"setBreakpoints">): Promise<void> {
    const { source, breakpoints: requested } = request.arguments;
    const file = source.path;

    await this.engine.clearBreakpoints(file);
    const breakpoints: Breakpoint[] = [];
    for (const bp of requested) {
      try {
        const target = await this.engine.setBreakpoint(file, bp.line, bp.column);
        const resolved: Breakpoint = { verified: true, line: target.line, source: { name: basename(file), path: file } };
        if (target.column > 0) resolved.column = target.column;
        breakpoints.push(resolved);
      } catch (err) {
        this.log.error({ err: getErrorMessage(err), file, line: bp.line }, "failed to set breakpoint");
        breakpoints.push({ verified: false, line: bp.line, message: getErrorMessage(err) });
      }
    }
    this.send(newResponse(request, { breakpoints }));
  }

  private onSetExceptionBreakpoints(request: RequestOf<"setExceptionBreakpoints">): void {
    this.send(newResponse(request));
  }

  private async onBreakpointLocations(request: RequestOf<"breakpointLocations">): Promise<void> {
    const { source, line, endLine = line } = request.arguments;
    let locations: SourceLocation[];
    try {
      locations = await this.engine.breakpointLocations(source.path);
    } catch (err) {
      this.send(newErrorResponse(request, "breakpointFailed", getErrorMessage(err)));
      return;
    }

    const breakpoints: BreakpointLocation[] = locations
      .filter((loc) => loc.begin.line >= line && loc.begin.line <= endLine)
      .map((loc) => ({
        line: loc.begin.line,
        column: loc.begin.column,
        endLine: loc.end.line,
        endColumn: loc.end.column,
      }));
    this.send(newResponse(request, { breakpoints }));
  }

  private async onContinue(request: RequestOf<"continue">): Promise<void> {
    this.current = null;
    await this.engine.continue();
    this.send(newResponse(request, { allThreadsContinued: true }));
  }

  private async onNext(request: RequestOf<"next">): Promise<void> {
    const node = this.current;
    this.current = null;
    await this.engine.continueUntilAfter(node);
    this.send(newResponse(request));
  }

  private async onStepIn(request: RequestOf<"stepIn">): Promise<void> {
    this.current = null;
    await this.engine.step();
    this.send(newResponse(request));
  }

  private async onStackTrace(request: RequestOf<"stackTrace">): Promise<void> {
    const trace = await this.engine.stackTrace();

    // The engine lists the innermost frame last; DAP wants it first.
    const frames: StackFrame[] = [];
    trace.forEach((frame, index) => frames.unshift(toDapFrame(frame, index)));

    const start = request.arguments?.startFrame ?? 0;
    const levels = request.arguments?.levels;
    const page = levels ? frames.slice(start, start + levels) : frames.slice(start);
    this.send(newResponse(request, { stackFrames: page, totalFrames: frames.length }));
  }

  private onScopes(request: RequestOf<"scopes">): void {
    const scopes: Scope[] = [{ name: "Local", variablesReference: LOCAL_SCOPE_REFERENCE, expensive: false }];
    this.send(newResponse(request, { scopes }));
  }

  private async onVariables(request: RequestOf<"variables">): Promise<void> {
    if (request.arguments.variablesReference !== LOCAL_SCOPE_REFERENCE) {
      this.send(newResponse(request, { variables: [] }));
      return;
    }

    const names = [...(await this.engine.listVars())];
    if (!names.includes("self")) names.push("self");

    const variables: Variable[] = [];
    for (const name of names) {
      if (this.stop.signal.aborted) {
        this.send(newErrorResponse(request, "engineFailed", "Session is shutting down"));
        return;
      }
      let value = "";
      try {
        value = await this.engine.lookupValue(name);
      } catch (err) {
        this.log.warn({ variable: name, err: getErrorMessage(err) }, "failed to get value for variable listing");
      }
      variables.push({ name, value, evaluateName: name, variablesReference: 0 });
    }
    this.send(newResponse(request, { variables }));
  }

  private onThreads(request: RequestOf<"threads">): void {
    const threads: Thread[] = [{ id: MAIN_THREAD_ID, name: "main" }];
    this.send(newResponse(request, { threads }));
  }

  private async onEvaluate(request: RequestOf<"evaluate">): Promise<void> {
    let result: string;
    try {
      result = await this.engine.lookupValue(request.arguments.expression);
    } catch (err) {
      this.send(newErrorResponse(request, "evaluateFailed", `Failed to look up variable: ${getErrorMessage(err)}`));
      return;
    }
    this.send(newResponse(request, { result, type: "string", variablesReference: 0 }));
  }

  // --- Engine events ---

  onStop(event: StopEvent): void {
    this.current = event.current;
    const body: DebugProtocol.StoppedEvent["body"] = {
      reason: event.reason,
      threadId: MAIN_THREAD_ID,
      allThreadsStopped: true,
    };
    if (event.reason === "exception" && event.error) body.text = event.error.message;
    this.send(newEvent("stopped", body));
  }

  onExit(event: ExitEvent): void {
    this.current = null;
    this.exited = true;
    if (event.output) {
      this.send(newEvent("output", { category: "stdout", output: withNewline(event.output) }));
    }
    if (event.error) {
      this.send(newEvent("output", { category: "stderr", output: withNewline(event.error.message) }));
    }
    this.send(newEvent("terminated"));
  }

  // --- Lifecycle ---

  /** End of stream: stop, wait for every handler, drain output, close. */
  private async shutdown(): Promise<void> {
    this.stop.abort();
    await Promise.allSettled([...this.inFlight]);
    await this.events;
    await this.releaseEngine();
    await this.writer.close();
    if (this.endOutput && !this.output.writableEnded) this.output.end();
    this.log.debug("session closed");
  }

  /** Undecodable input: drop pending output and close the transport at once. */
  private async teardown(err: ProtocolError): Promise<void> {
    this.log.error({ err: err.message }, "protocol error; closing session");
    this.stop.abort();
    await this.writer.abort();
    this.output.destroy();
    if (this.input !== this.output) this.input.destroy();
    await Promise.allSettled([...this.inFlight]);
    await this.events;
    await this.releaseEngine();
  }

  private async releaseEngine(): Promise<void> {
    if (!this.launched || this.exited) return;
    try {
      await this.engine.terminate();
    } catch (err) {
      this.log.warn({ err: getErrorMessage(err) }, "failed to terminate engine");
    }
  }
}

function toDapFrame(frame: EngineFrame, id: number): StackFrame {
  const name = frame.name.startsWith("/") ? basename(frame.name) : frame.name;
  const loc = frame.location;
  if (!loc) return { id, name, line: 0, column: 0 };
  return {
    id,
    name,
    source: { name: loc.file.name, path: pathResolve(loc.file.name) },
    line: loc.begin.line,
    column: loc.begin.column,
    endLine: loc.end.line,
    endColumn: loc.end.column,
  };
}

function withNewline(text: string): string {
  return text.endsWith("\n") ? text : `${text}\n`;
}
