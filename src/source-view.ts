/** Terminal rendering of source context, files and stack traces. */

import type { ChalkInstance } from "chalk";
import type { SourceLocation, StackFrame } from "./engine/base.js";
import { formatPosition } from "./engine/base.js";

/** Lines of context shown on each side of the current node. */
export const CONTEXT_LINES = 3;

function gutter(chalk: ChalkInstance, lineNo: number): string {
  return chalk.gray(`${String(lineNo).padStart(2)}| `);
}

/**
 * The lines around `loc` with the node's span highlighted. `lines` is the
 * file content without trailing newlines; line numbers are 1-based.
 */
export function renderContext(chalk: ChalkInstance, loc: SourceLocation, lines: readonly string[]): string {
  const { begin, end } = loc;
  const lineAt = (n: number): string => lines[n - 1] ?? "";
  const out: string[] = [];

  for (let i = begin.line - CONTEXT_LINES; i < begin.line; i++) {
    if (i < 1) continue;
    out.push(gutter(chalk, i) + lineAt(i));
  }

  const first = lineAt(begin.line);
  if (begin.line === end.line) {
    out.push(
      gutter(chalk, begin.line) +
        first.slice(0, begin.column - 1) +
        chalk.blue(first.slice(begin.column - 1, end.column - 1)) +
        first.slice(end.column - 1),
    );
  } else {
    out.push(gutter(chalk, begin.line) + first.slice(0, begin.column - 1) + chalk.blue(first.slice(begin.column - 1)));
    for (let i = begin.line + 1; i < end.line; i++) {
      out.push(gutter(chalk, i) + chalk.blue(lineAt(i)));
    }
    const last = lineAt(end.line);
    out.push(gutter(chalk, end.line) + chalk.blue(last.slice(0, end.column - 1)) + last.slice(end.column - 1));
  }

  for (let i = end.line + 1; i <= end.line + CONTEXT_LINES && i <= lines.length; i++) {
    out.push(gutter(chalk, i) + lineAt(i));
  }

  return out.join("\n");
}

export function renderFile(chalk: ChalkInstance, name: string, source: string): string {
  const out = [`File: ${chalk.blue(name)}`];
  source.split("\n").forEach((line, i) => out.push(gutter(chalk, i + 1) + line));
  return out.join("\n");
}

/** Innermost frame first. `frames` comes from the engine innermost-last. */
export function renderTrace(chalk: ChalkInstance, frames: readonly StackFrame[]): string {
  return [...frames]
    .reverse()
    .map((frame) => {
      const loc = frame.location;
      if (!loc) return `- ${frame.name}`;
      return `- ${frame.name}\t\t\t${chalk.gray(`${loc.file.name}:${formatPosition(loc.begin)}`)}`;
    })
    .join("\n");
}
