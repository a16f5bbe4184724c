/** Command-line parsing and input loading. */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { DEFAULT_DAP_PORT } from "./server.js";
import { getErrorCode, getErrorMessage, UsageError } from "./errors.js";
import { LOG_LEVELS } from "./logger.js";

export const VERSION = "0.1.0";

export const USAGE = `evaldbg version ${VERSION}

evaldbg {<option>} { <filename> }

Available options:
  -h / --help                This message
  -v / --version             Print version
  -e / --exec                Treat filename as code
  -J / --jpath <dir>         Specify an additional library search dir
  -d / --dap                 Start a debug-adapter-protocol server
  -s / --stdin               With -d, use stdin/stdout instead of TCP
  -p / --port <port>         TCP port of the DAP server (default ${DEFAULT_DAP_PORT})
  -l / --log-level <level>   Set the log level. Allowed values: ${LOG_LEVELS.join(",")}
  --engine <module>          Module exporting createEngine() (or EVALDBG_ENGINE)

In all cases:
  Multichar options are expanded e.g. -abc becomes -a -b -c.
  The -- option suppresses option processing for subsequent arguments.
  Note that since filenames and programs can begin with -, it is
  advised to use -- if the argument is unknown, e.g. evaldbg -- "$FILENAME".`;

export const Config = z
  .object({
    input: z.string().optional(),
    filenameIsCode: z.boolean(),
    jpaths: z.array(z.string().min(1)),
    mode: z.enum(["repl", "dap-tcp", "dap-stdio"]),
    port: z.number().int().min(0).max(65535),
    logLevel: z.enum(LOG_LEVELS),
    engine: z.string().min(1).optional(),
  })
  .refine((cfg) => cfg.mode !== "repl" || cfg.input !== undefined, {
    message: "the REPL needs an input",
    path: ["input"],
  });

export type Config = z.infer<typeof Config>;

export type ParseOutcome = { kind: "run"; config: Config } | { kind: "usage" } | { kind: "version" };

export type Env = Record<string, string | undefined>;

/** Expand `-abc` into `-a -b -c`, up to the first `--`. */
export function expandShortFlags(args: readonly string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";
    if (arg === "--") {
      out.push(...args.slice(i));
      break;
    }
    if (arg.length > 2 && arg.startsWith("-") && arg[1] !== "-") {
      for (const flag of arg.slice(1)) out.push(`-${flag}`);
    } else {
      out.push(arg);
    }
  }
  return out;
}

/**
 * Parse `argv` (without the node and script entries). `env` supplies
 * EVALDBG_ENGINE, EVALDBG_LOG_LEVEL and EVALDBG_PORT defaults; flags win.
 */
export function parseArgs(argv: readonly string[], env: Env = process.env): ParseOutcome {
  const args = expandShortFlags(argv);
  const positional: string[] = [];
  const jpaths: string[] = [];
  let filenameIsCode = false;
  let dap = false;
  let stdin = false;
  let port: string | undefined = env.EVALDBG_PORT;
  let logLevel: string | undefined = env.EVALDBG_LOG_LEVEL;
  let engine: string | undefined = env.EVALDBG_ENGINE || undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";
    const value = (): string => {
      i++;
      const next = args[i];
      if (next === undefined) throw new UsageError(`Expected a value after ${arg}`);
      return next;
    };

    switch (arg) {
      case "-h":
      case "--help":
        return { kind: "usage" };
      case "-v":
      case "--version":
        return { kind: "version" };
      case "-e":
      case "--exec":
        filenameIsCode = true;
        break;
      case "-s":
      case "--stdin":
        stdin = true;
        break;
      case "-d":
      case "--dap":
        dap = true;
        break;
      case "-J":
      case "--jpath": {
        const dir = value();
        if (!dir) throw new UsageError("-J argument was empty string");
        jpaths.push(dir);
        break;
      }
      case "-p":
      case "--port":
        port = value();
        break;
      case "-l":
      case "--log-level":
        logLevel = value();
        if (!logLevel) throw new UsageError("no log level specified");
        break;
      case "--engine":
        engine = value();
        break;
      case "--":
        positional.push(...args.slice(i + 1));
        i = args.length;
        break;
      default:
        if (arg.length > 1 && arg.startsWith("-")) throw new UsageError(`unrecognized argument: ${arg}`);
        positional.push(arg);
    }
  }

  if (logLevel !== undefined && !LOG_LEVELS.some((level) => level === logLevel)) {
    throw new UsageError(`invalid log level ${logLevel}. Allowed: ${LOG_LEVELS.join(",")}`);
  }

  let mode: Config["mode"] = "repl";
  if (dap) {
    mode = stdin ? "dap-stdio" : "dap-tcp";
  } else if (positional.length === 0) {
    throw new UsageError(`must give ${filenameIsCode ? "code" : "filename"}`);
  }
  if (positional.length > 1) {
    throw new UsageError(`only one input may be given, got ${positional.length}`);
  }

  const parsed = Config.safeParse({
    input: positional[0],
    filenameIsCode,
    jpaths,
    mode,
    port: port === undefined ? DEFAULT_DAP_PORT : parsePort(port),
    logLevel: logLevel ?? "error",
    engine,
  });
  if (!parsed.success) {
    throw new UsageError(parsed.error.issues.map((issue) => issue.message).join("; "));
  }
  return { kind: "run", config: parsed.data };
}

function parsePort(text: string): number {
  if (!/^\d+$/.test(text)) throw new UsageError(`invalid port ${JSON.stringify(text)}`);
  return Number.parseInt(text, 10);
}

export interface ProgramInput {
  /** Name the engine reports the program under. */
  filename: string;
  source: string;
}

/**
 * Load the program text: the argument itself for `-e` (named `<cmdline>`),
 * standard input for `-` (named `<stdin>`), otherwise the named file.
 */
export async function readInput(
  input: string,
  filenameIsCode: boolean,
  stdin: NodeJS.ReadableStream = process.stdin,
): Promise<ProgramInput> {
  if (filenameIsCode) return { filename: "<cmdline>", source: input };
  if (input === "-") return { filename: "<stdin>", source: await readAll(stdin) };

  try {
    return { filename: input, source: await readFile(input, "utf-8") };
  } catch (err) {
    const op = getErrorCode(err) === "EISDIR" ? "Reading" : "Opening";
    throw new Error(`${op} input file: ${input}: ${getErrorMessage(err)}`, { cause: err });
  }
}

async function readAll(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString("utf-8");
}
