/** Library entry: embed the DAP bridge or the REPL with your own engine. */

export * from "./engine/base.js";
export { loadEngineFactory, resolveEngineSpecifier } from "./engine/registry.js";
export { EngineLoadError, ProtocolError, UsageError, getErrorMessage } from "./errors.js";
export { createLogger, setLogLevel, LOG_LEVELS, type LogLevel } from "./logger.js";
export { FrameDecoder, encodeMessage, readMessages } from "./wire.js";
export { decodeRequest, UNSUPPORTED_COMMANDS, type Request, type Command } from "./protocol.js";
export { ErrorCodes, type ErrorKind } from "./messages.js";
export { OutputWriter } from "./output-writer.js";
export { pumpEngineEvents, type EngineEventSink, type PumpOptions, type PumpResult } from "./event-dispatcher.js";
export { DapSession, CAPABILITIES, type DapSessionOptions } from "./session.js";
export { DapServer, serveStdio, DEFAULT_DAP_PORT } from "./server.js";
export { ReplDebugger, type ReplOptions, type ReplState } from "./repl.js";
export { TerminalLineReader, type LineReader, type Completer } from "./line-reader.js";
export { parseReplCommand, type ReplCommand } from "./repl-commands.js";
export { parseArgs, readInput, type Config, type ParseOutcome } from "./config.js";
