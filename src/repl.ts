/** Interactive debugger loop over a local terminal. */

import { EventEmitter } from "node:events";
import type { Writable } from "node:stream";
import { Chalk, type ChalkInstance } from "chalk";
import {
  formatBreakpoint,
  formatLocation,
  formatPosition,
  type DebugEngine,
  type EvalNode,
  type ExitEvent,
  type SourceLocation,
  type StopEvent,
} from "./engine/base.js";
import { getErrorMessage } from "./errors.js";
import { pumpEngineEvents, type EngineEventSink } from "./event-dispatcher.js";
import type { LineReader } from "./line-reader.js";
import { createLogger } from "./logger.js";
import { parseReplCommand, REPL_HELP, type ReplCommand } from "./repl-commands.js";
import { renderContext, renderFile, renderTrace } from "./source-view.js";

const log = createLogger("repl");

export type ReplState = "awaitingLaunch" | "running" | "stopped" | "terminated";

export interface ReplOptions {
  engine: DebugEngine;
  /** Name the program is launched under, and the file `lb` and `l` refer to. */
  filename: string;
  source: string;
  jpaths: string[];
  reader: LineReader;
  output?: Writable;
  /** Force colour on or off; by default chalk decides from the terminal. */
  color?: boolean;
}

/** What the prompt loop does after a command. */
type Outcome = "stay" | "resume" | "quit";

interface Suspension {
  current: EvalNode;
  lastEvaluation?: string;
  error?: Error;
}

/**
 * Alternates strictly between the prompt and the engine: a control command
 * (`c`, `n`, `s`) hands control to the engine, and the prompt only comes
 * back when the next stop event arrives. Emits `state` with each
 * `ReplState` it enters.
 */
export class ReplDebugger extends EventEmitter implements EngineEventSink {
  private readonly engine: DebugEngine;
  private readonly filename: string;
  private readonly source: string;
  private readonly jpaths: string[];
  private readonly reader: LineReader;
  private readonly output: Writable;
  private readonly chalk: ChalkInstance;
  private replState: ReplState = "awaitingLaunch";
  private suspension: Suspension | null = null;
  private launched = false;
  private readonly stop = new AbortController();

  constructor(opts: ReplOptions) {
    super();
    this.engine = opts.engine;
    this.filename = opts.filename;
    this.source = opts.source;
    this.jpaths = opts.jpaths;
    this.reader = opts.reader;
    this.output = opts.output ?? process.stdout;
    this.chalk = opts.color === undefined ? new Chalk() : new Chalk({ level: opts.color ? 1 : 0 });
  }

  get state(): ReplState {
    return this.replState;
  }

  /** Run until the engine exits or the user quits. */
  async run(): Promise<void> {
    this.emit("state", this.replState);
    this.reader.setCompleter((line) => this.completeBreakpoint(line));

    const events = pumpEngineEvents(this.engine, this, this.stop.signal);
    try {
      const outcome = await this.promptLoop();
      // Nothing was launched, so no exit event will ever come.
      if (outcome === "quit" && !this.launched) this.stop.abort();
      await events;
    } finally {
      this.stop.abort();
      await this.reader.close();
    }
    this.setState("terminated");
  }

  // --- Engine events ---

  async onStop(event: StopEvent): Promise<void> {
    this.suspension = { current: event.current, lastEvaluation: event.lastEvaluation, error: event.error };
    this.setState("stopped");

    switch (event.reason) {
      case "breakpoint": {
        const target = event.breakpoint ? this.chalk.underline(formatBreakpoint(event.breakpoint)) : "";
        this.print(`${this.chalk.bold("Hit breakpoint: ")}${target}`);
        break;
      }
      case "exception":
        this.print(
          `${this.chalk.red("Encountered error during evaluation")}: ${event.error ? event.error.message : "unknown error"}`,
        );
        break;
      case "step":
        break;
    }
    this.printContext(event.current);

    await this.promptLoop();
  }

  onExit(event: ExitEvent): void {
    this.suspension = null;
    if (event.output) this.print(event.output.replace(/\n$/, ""));
    if (event.error) this.print(`Error during evaluation: ${event.error.message}`);
    this.setState("terminated");
  }

  // --- Prompt ---

  private async promptLoop(): Promise<Outcome> {
    while (true) {
      const input = await this.reader.prompt(this.promptText());
      if (input === null) {
        await this.quit();
        return "quit";
      }

      const command = parseReplCommand(input);
      log.debug({ command: command.kind }, "repl command");
      let outcome: Outcome;
      try {
        outcome = await this.execute(command);
      } catch (err) {
        log.warn({ command: command.kind, err: getErrorMessage(err) }, "engine call failed");
        this.print(getErrorMessage(err));
        continue;
      }
      if (outcome !== "stay") return outcome;
    }
  }

  private promptText(): string {
    const current = this.suspension?.current;
    const marker = this.suspension?.error ? this.chalk.red("! ") : "";
    if (!current) return `${marker}> `;
    const where = current.location ? `${formatLocation(current.location)} ` : "";
    return `${marker}${where}[${current.kind}]> `;
  }

  private async execute(command: ReplCommand): Promise<Outcome> {
    switch (command.kind) {
      case "empty":
        return "stay";

      case "listBreakpoints":
        for (const bp of await this.engine.activeBreakpoints()) this.print(`- ${formatBreakpoint(bp)}`);
        return "stay";

      case "setBreakpoint":
        try {
          const target = await this.engine.setBreakpoint(command.file, command.line, command.column);
          this.print(`Adding breakpoint at ${formatBreakpoint(target)}`);
        } catch (err) {
          this.print(getErrorMessage(err));
        }
        return "stay";

      case "next": {
        const current = this.suspension?.current;
        if (!current) return this.notStarted();
        return this.resume(() => this.engine.continueUntilAfter(current));
      }

      case "step":
        if (!this.suspension) return this.notStarted();
        return this.resume(() => this.engine.step());

      case "continue":
        if (!this.launched) {
          this.launched = true;
          return this.resume(() => this.engine.launch(this.filename, this.source, this.jpaths), () => {
            this.launched = false;
          });
        }
        return this.resume(() => this.engine.continue());

      case "list":
        if (this.suspension) this.printContext(this.suspension.current);
        else this.print(renderFile(this.chalk, this.filename, this.source));
        return "stay";

      case "breakpointLocations":
        try {
          for (const loc of await this.engine.breakpointLocations(this.filename)) {
            this.print(`- ${loc.file.name}:${formatPosition(loc.begin)}`);
          }
        } catch (err) {
          log.warn({ err: getErrorMessage(err) }, "unable to list breakpoint locations");
          this.print(getErrorMessage(err));
        }
        return "stay";

      case "print":
        try {
          this.print(await this.engine.lookupValue(command.name));
        } catch (err) {
          this.print(getErrorMessage(err));
        }
        return "stay";

      case "trace":
        this.print(renderTrace(this.chalk, await this.engine.stackTrace()));
        return "stay";

      case "last":
        if (this.suspension?.lastEvaluation === undefined) {
          this.print("No last evaluation");
        } else {
          this.print(`Last evaluation: ${this.chalk.magenta(this.suspension.lastEvaluation)}`);
        }
        return "stay";

      case "vars":
        this.print("Variables:");
        for (const name of await this.engine.listVars()) this.print(`- ${name}`);
        return "stay";

      case "clear":
        await this.engine.clearBreakpoints(command.file);
        return "stay";

      case "quit":
        await this.quit();
        return "quit";

      case "help":
        this.print(REPL_HELP);
        return "stay";

      case "invalid":
        this.print(command.message);
        return "stay";

      case "unknown":
        this.print(`Unknown command: ${command.input}`);
        return "stay";
    }
  }

  /**
   * Hand control to the engine. If the engine refuses, stay at the prompt
   * in the state we were in.
   */
  private async resume(control: () => Promise<void>, onFailure?: () => void): Promise<Outcome> {
    const previous = this.replState;
    const suspension = this.suspension;
    this.suspension = null;
    this.setState("running");
    try {
      await control();
    } catch (err) {
      onFailure?.();
      this.suspension = suspension;
      this.setState(previous);
      this.print(getErrorMessage(err));
      return "stay";
    }
    return "resume";
  }

  private async quit(): Promise<void> {
    this.setState("terminated");
    try {
      await this.engine.terminate();
    } catch (err) {
      // The engine will not report an exit; stop waiting for one.
      log.warn({ err: getErrorMessage(err) }, "failed to terminate engine");
      this.print(getErrorMessage(err));
      this.stop.abort();
    }
  }

  private notStarted(): Outcome {
    this.print("Evaluation has not started; use `c` to launch it");
    return "stay";
  }

  private async completeBreakpoint(line: string): Promise<string[]> {
    const [head = "", partial] = line.split(" ");
    if ((head !== "b" && head !== "break") || partial === undefined) return [];

    const locations = await this.engine.breakpointLocations(this.filename);
    return locations
      .map((loc) => `${loc.file.name}:${formatPosition(loc.begin)}`)
      .filter((spec) => spec.startsWith(partial))
      .map((spec) => `${head} ${spec}`);
  }

  // --- Output ---

  private printContext(node: EvalNode): void {
    if (!node.location) {
      this.print(`(no source location for ${node.kind})`);
      return;
    }
    this.print(renderContext(this.chalk, node.location, this.linesOf(node.location)));
  }

  private linesOf(loc: SourceLocation): readonly string[] {
    if (loc.file.lines.length > 0) return loc.file.lines;
    return loc.file.name === this.filename ? this.source.split("\n") : [];
  }

  private print(text: string): void {
    this.output.write(`${text}\n`);
  }

  private setState(state: ReplState): void {
    if (this.replState === state) return;
    this.replState = state;
    this.emit("state", state);
  }
}
