/** Evaluation engine facade: the black box the bridge drives. */

export interface Position {
  /** 1-based */
  line: number;
  /** 1-based */
  column: number;
}

export interface SourceFile {
  /** Diagnostic file name as the engine reports it. */
  name: string;
  /** Source lines without trailing newlines. */
  lines: readonly string[];
}

export interface SourceLocation {
  file: SourceFile;
  begin: Position;
  end: Position;
}

/** The AST node the engine is suspended on. */
export interface EvalNode {
  /** Node type name, shown in the REPL prompt. */
  kind: string;
  location?: SourceLocation;
}

export interface BreakpointTarget {
  file: string;
  line: number;
  column: number;
}

export interface StackFrame {
  name: string;
  location?: SourceLocation;
}

export type StopReason = "breakpoint" | "step" | "exception";

export interface StopEvent {
  type: "stop";
  reason: StopReason;
  current: EvalNode;
  lastEvaluation?: string;
  error?: Error;
  /** Set when reason is "breakpoint". */
  breakpoint?: BreakpointTarget;
}

export interface ExitEvent {
  type: "exit";
  output: string;
  error?: Error;
}

export type EngineEvent = StopEvent | ExitEvent;

/**
 * Control and inspection operations of an evaluation engine.
 *
 * Implementations must tolerate concurrent calls: the DAP session issues
 * calls from independent request handlers and does not serialize them.
 * Control operations resolve once the command is accepted; the resulting
 * suspension or exit is reported through `events()`.
 */
export interface DebugEngine {
  launch(sourceName: string, sourceText: string, searchPaths: string[]): Promise<void>;
  continue(): Promise<void>;
  /** Run until evaluation of `node` completes. */
  continueUntilAfter(node: EvalNode | null): Promise<void>;
  step(): Promise<void>;

  /** Resolves to the engine's breakpoint target, rejects if the location is not a legal target. */
  setBreakpoint(file: string, line: number, column?: number): Promise<BreakpointTarget>;
  clearBreakpoints(file: string): Promise<void>;
  activeBreakpoints(): Promise<BreakpointTarget[]>;
  breakpointLocations(file: string): Promise<SourceLocation[]>;

  lookupValue(name: string): Promise<string>;
  listVars(): Promise<string[]>;
  /** Innermost frame last. */
  stackTrace(): Promise<StackFrame[]>;
  terminate(): Promise<void>;

  events(): AsyncIterable<EngineEvent>;
}

export type EngineFactory = () => DebugEngine;

const ENGINE_METHODS = [
  "launch",
  "continue",
  "continueUntilAfter",
  "step",
  "setBreakpoint",
  "clearBreakpoints",
  "activeBreakpoints",
  "breakpointLocations",
  "lookupValue",
  "listVars",
  "stackTrace",
  "terminate",
  "events",
] as const;

/** Names of the facade methods `value` lacks. Empty when it is a usable engine. */
export function missingEngineMethods(value: unknown): string[] {
  if (typeof value !== "object" || value === null) return [...ENGINE_METHODS];
  return ENGINE_METHODS.filter((name) => typeof Reflect.get(value, name) !== "function");
}

export function isDebugEngine(value: unknown): value is DebugEngine {
  return missingEngineMethods(value).length === 0;
}

export function formatBreakpoint(bp: BreakpointTarget): string {
  return `${bp.file}:${bp.line}:${bp.column}`;
}

export function formatPosition(pos: Position): string {
  return `${pos.line}:${pos.column}`;
}

/** `file:line:col-col` on one line, `file:(line:col)-(line:col)` across lines. */
export function formatLocation(loc: SourceLocation): string {
  const { begin, end } = loc;
  if (begin.line === end.line) {
    if (begin.column === end.column) return `${loc.file.name}:${formatPosition(begin)}`;
    return `${loc.file.name}:${formatPosition(begin)}-${end.column}`;
  }
  return `${loc.file.name}:(${formatPosition(begin)})-(${formatPosition(end)})`;
}
