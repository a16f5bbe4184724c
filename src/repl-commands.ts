/** REPL command grammar. One line of input becomes one `ReplCommand`. */

export type ReplCommand =
  | { kind: "empty" }
  | { kind: "listBreakpoints" }
  | { kind: "setBreakpoint"; file: string; line: number; column?: number }
  | { kind: "next" }
  | { kind: "step" }
  | { kind: "list" }
  | { kind: "breakpointLocations" }
  | { kind: "print"; name: string }
  | { kind: "trace" }
  | { kind: "last" }
  | { kind: "vars" }
  | { kind: "clear"; file: string }
  | { kind: "continue" }
  | { kind: "quit" }
  | { kind: "help" }
  | { kind: "invalid"; message: string }
  | { kind: "unknown"; input: string };

export const REPL_HELP = `Commands:
  b, break [file:line[:col]]   list breakpoints, or add one
  n, next                      run until the current node is evaluated
  s                            step to the next node
  c                            start evaluation, or continue
  l                            show source around the current node
  lb, lbs                      list possible breakpoint locations
  p [name]                     print a variable (default: self)
  trace                        show the evaluation stack
  last                         show the last evaluation result
  vars                         list visible variables
  clear <file>                 remove every breakpoint in a file
  q                            quit
  h, help                      this message`;

export function parseReplCommand(input: string): ReplCommand {
  const parts = input.trim().split(/\s+/);
  const [head = "", arg] = parts;

  switch (head) {
    case "":
      return { kind: "empty" };
    case "b":
    case "break":
      return arg === undefined ? { kind: "listBreakpoints" } : parseBreakpointSpec(arg);
    case "n":
    case "next":
      return { kind: "next" };
    case "s":
      return { kind: "step" };
    case "l":
      return { kind: "list" };
    case "lb":
    case "lbs":
      return { kind: "breakpointLocations" };
    case "p":
      return { kind: "print", name: arg ?? "self" };
    case "trace":
      return { kind: "trace" };
    case "last":
      return { kind: "last" };
    case "vars":
      return { kind: "vars" };
    case "clear":
      return arg === undefined ? { kind: "invalid", message: "Must specify a file to clear" } : { kind: "clear", file: arg };
    case "c":
      return { kind: "continue" };
    case "q":
      return { kind: "quit" };
    case "h":
    case "help":
      return { kind: "help" };
    default:
      return { kind: "unknown", input: input.trim() };
  }
}

/** `file:line` or `file:line:col`. */
export function parseBreakpointSpec(spec: string): ReplCommand {
  const [file = "", lineText, columnText] = spec.split(":");
  if (lineText === undefined) {
    return { kind: "invalid", message: "Must specify file and line separated by `:`" };
  }

  const line = parseInteger(lineText);
  if (line === null) {
    return { kind: "invalid", message: `Invalid line number: ${JSON.stringify(lineText)}` };
  }
  if (columnText === undefined) {
    return { kind: "setBreakpoint", file, line };
  }

  const column = parseInteger(columnText);
  if (column === null) {
    return { kind: "invalid", message: `Invalid column number: ${JSON.stringify(columnText)}` };
  }
  return { kind: "setBreakpoint", file, line, column };
}

function parseInteger(text: string): number | null {
  return /^[+-]?\d+$/.test(text) ? Number.parseInt(text, 10) : null;
}
