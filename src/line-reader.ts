/** Line input for the REPL: readline with completion and a history file. */

import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { createInterface, type CompleterResult, type Interface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import { getErrorMessage } from "./errors.js";
import { createLogger } from "./logger.js";

const log = createLogger("line-reader");

const HISTORY_SIZE = 1000;

/** Completion candidates for the line typed so far. */
export type Completer = (line: string) => Promise<string[]>;

export interface LineReader {
  /** Resolves with the next line, or null once input has ended or was interrupted. */
  prompt(text: string): Promise<string | null>;
  setCompleter(completer: Completer | null): void;
  close(): Promise<void>;
}

export interface TerminalLineReaderOptions {
  input?: Readable;
  output?: Writable;
  /** Read at startup, rewritten on close. */
  historyFile?: string;
}

export class TerminalLineReader implements LineReader {
  private readonly rl: Interface;
  private readonly historyFile: string | undefined;
  private readonly history: string[];
  private completer: Completer | null = null;
  private closed = false;

  constructor(opts: TerminalLineReaderOptions = {}) {
    this.historyFile = opts.historyFile;
    this.history = this.historyFile ? loadHistory(this.historyFile) : [];

    const output = opts.output ?? process.stdout;
    this.rl = createInterface({
      input: opts.input ?? process.stdin,
      output,
      terminal: "isTTY" in output && output.isTTY === true,
      // readline keeps history newest first
      history: [...this.history].reverse(),
      historySize: HISTORY_SIZE,
      completer: (line: string, callback: (err: Error | null, result: CompleterResult) => void) => {
        this.complete(line).then(
          (hits) => callback(null, [hits, line]),
          (err: unknown) => {
            log.warn({ err: getErrorMessage(err) }, "completion failed");
            callback(null, [[], line]);
          },
        );
      },
    });

    // Ctrl-C ends the session, as end of input does.
    this.rl.on("SIGINT", () => this.rl.close());
    this.rl.on("close", () => {
      this.closed = true;
    });
  }

  prompt(text: string): Promise<string | null> {
    if (this.closed) return Promise.resolve(null);
    return new Promise((resolve) => {
      const onClose = (): void => resolve(null);
      this.rl.once("close", onClose);
      this.rl.question(text, (answer) => {
        this.rl.off("close", onClose);
        if (answer.trim()) this.history.push(answer);
        resolve(answer);
      });
    });
  }

  setCompleter(completer: Completer | null): void {
    this.completer = completer;
  }

  async close(): Promise<void> {
    if (!this.closed) this.rl.close();
    if (this.historyFile) saveHistory(this.historyFile, this.history);
  }

  private async complete(line: string): Promise<string[]> {
    return this.completer ? this.completer(line) : [];
  }
}

function loadHistory(file: string): string[] {
  if (!existsSync(file)) return [];
  try {
    return readFileSync(file, "utf-8")
      .split("\n")
      .filter((line) => line.trim() !== "");
  } catch (err) {
    log.warn({ file, err: getErrorMessage(err) }, "could not read history");
    return [];
  }
}

function saveHistory(file: string, entries: string[]): void {
  try {
    writeFileSync(file, entries.slice(-HISTORY_SIZE).join("\n") + "\n");
  } catch (err) {
    log.warn({ file, err: getErrorMessage(err) }, "could not write history");
  }
}
