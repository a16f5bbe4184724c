#!/usr/bin/env node
/** CLI entry point: REPL on a local program, or a DAP server for editors. */

import { dirname } from "node:path";
import { parseArgs, readInput, USAGE, VERSION, type Config } from "./config.js";
import type { EngineFactory } from "./engine/base.js";
import { loadEngineFactory } from "./engine/registry.js";
import { EngineLoadError, getErrorMessage, ProtocolError, UsageError } from "./errors.js";
import { TerminalLineReader } from "./line-reader.js";
import { createLogger, setLogLevel } from "./logger.js";
import { ReplDebugger } from "./repl.js";
import { DapServer, serveStdio } from "./server.js";
import { HISTORY_FILE } from "./util/paths.js";

const log = createLogger("cli");

async function loadEngine(config: Config): Promise<EngineFactory> {
  if (!config.engine) {
    throw new EngineLoadError("No evaluation engine configured. Pass --engine <module> or set EVALDBG_ENGINE.");
  }
  return loadEngineFactory(config.engine);
}

async function runRepl(config: Config, createEngine: EngineFactory): Promise<void> {
  const { filename, source } = await readInput(config.input ?? "-", config.filenameIsCode);
  const jpaths = config.filenameIsCode ? config.jpaths : [...config.jpaths, dirname(filename)];

  const reader = new TerminalLineReader({ historyFile: HISTORY_FILE });
  const repl = new ReplDebugger({ engine: createEngine(), filename, source, jpaths, reader });
  repl.on("state", (state) => log.debug({ state }, "repl state"));
  await repl.run();
}

async function runDapServer(config: Config, createEngine: EngineFactory): Promise<void> {
  const server = new DapServer(createEngine);
  await server.listen(config.port);

  await new Promise<void>((resolve) => {
    const stop = (): void => resolve();
    process.once("SIGINT", stop);
    process.once("SIGTERM", stop);
  });
  log.info("shutting down");
  await server.close();
}

async function main(): Promise<void> {
  const outcome = parseArgs(process.argv.slice(2));
  switch (outcome.kind) {
    case "usage":
      console.log(USAGE);
      return;
    case "version":
      console.log(`evaldbg version ${VERSION}`);
      return;
    case "run":
      break;
  }

  const { config } = outcome;
  setLogLevel(config.logLevel);
  const createEngine = await loadEngine(config);

  switch (config.mode) {
    case "repl":
      return runRepl(config, createEngine);
    case "dap-tcp":
      return runDapServer(config, createEngine);
    case "dap-stdio":
      return serveStdio(createEngine);
  }
}

main().catch((err: unknown) => {
  if (err instanceof UsageError) {
    process.stderr.write(`ERROR: ${err.message}\n\n${USAGE}\n`);
  } else if (err instanceof ProtocolError) {
    log.error({ err: err.message }, "dap session terminated");
  } else {
    process.stderr.write(`${getErrorMessage(err)}\n`);
  }
  process.exit(1);
});
