/** Inbound DAP requests: a closed tagged union over `command`. */

import { z } from "zod";
import { ProtocolError } from "./errors.js";

function request<C extends string, A extends z.ZodTypeAny>(command: C, args: A) {
  return z.object({
    seq: z.number().int(),
    type: z.literal("request"),
    command: z.literal(command),
    arguments: args,
  });
}

const Source = z
  .object({
    name: z.string().optional(),
    path: z.string(),
  })
  .passthrough();

const ThreadArgs = z.object({ threadId: z.number().int().optional() }).passthrough().optional();

// --- Commands backed by the engine ---

export const InitializeRequest = request(
  "initialize",
  z
    .object({
      adapterID: z.string().optional(),
      clientID: z.string().optional(),
      linesStartAt1: z.boolean().optional(),
      columnsStartAt1: z.boolean().optional(),
    })
    .passthrough()
    .optional(),
);

export const LaunchRequest = request(
  "launch",
  z
    .object({
      program: z.string().min(1),
      jpaths: z.array(z.string()).default([]),
    })
    .passthrough(),
);

export const DisconnectRequest = request(
  "disconnect",
  z
    .object({
      restart: z.boolean().optional(),
      terminateDebuggee: z.boolean().optional(),
    })
    .passthrough()
    .optional(),
);

export const TerminateRequest = request("terminate", z.object({}).passthrough().optional());

export const SetBreakpointsRequest = request(
  "setBreakpoints",
  z
    .object({
      source: Source,
      breakpoints: z
        .array(
          z
            .object({
              line: z.number().int().positive(),
              column: z.number().int().positive().optional(),
            })
            .passthrough(),
        )
        .default([]),
    })
    .passthrough(),
);

export const SetExceptionBreakpointsRequest = request(
  "setExceptionBreakpoints",
  z.object({ filters: z.array(z.string()).default([]) }).passthrough().optional(),
);

export const BreakpointLocationsRequest = request(
  "breakpointLocations",
  z
    .object({
      source: Source,
      line: z.number().int().positive(),
      endLine: z.number().int().positive().optional(),
    })
    .passthrough(),
);

export const ContinueRequest = request("continue", ThreadArgs);
export const NextRequest = request("next", ThreadArgs);
export const StepInRequest = request("stepIn", ThreadArgs);

export const StackTraceRequest = request(
  "stackTrace",
  z
    .object({
      threadId: z.number().int().optional(),
      startFrame: z.number().int().nonnegative().optional(),
      levels: z.number().int().nonnegative().optional(),
    })
    .passthrough()
    .optional(),
);

export const ScopesRequest = request("scopes", z.object({ frameId: z.number().int() }).passthrough());

export const VariablesRequest = request(
  "variables",
  z.object({ variablesReference: z.number().int() }).passthrough(),
);

export const ThreadsRequest = request("threads", z.unknown().optional());

export const EvaluateRequest = request(
  "evaluate",
  z
    .object({
      expression: z.string(),
      frameId: z.number().int().optional(),
      context: z.string().optional(),
    })
    .passthrough(),
);

// --- Standard commands the bridge acknowledges but does not implement ---

export const UNSUPPORTED_COMMANDS = [
  "attach",
  "restart",
  "setFunctionBreakpoints",
  "configurationDone",
  "stepOut",
  "stepBack",
  "reverseContinue",
  "restartFrame",
  "goto",
  "pause",
  "setVariable",
  "setExpression",
  "source",
  "terminateThreads",
  "stepInTargets",
  "gotoTargets",
  "completions",
  "exceptionInfo",
  "loadedSources",
  "dataBreakpointInfo",
  "setDataBreakpoints",
  "readMemory",
  "disassemble",
  "cancel",
  "modules",
] as const;

export type UnsupportedCommand = (typeof UNSUPPORTED_COMMANDS)[number];

export const UnsupportedRequest = z.object({
  seq: z.number().int(),
  type: z.literal("request"),
  command: z.enum(UNSUPPORTED_COMMANDS),
  arguments: z.unknown().optional(),
});

export const Request = z.discriminatedUnion("command", [
  InitializeRequest,
  LaunchRequest,
  DisconnectRequest,
  TerminateRequest,
  SetBreakpointsRequest,
  SetExceptionBreakpointsRequest,
  BreakpointLocationsRequest,
  ContinueRequest,
  NextRequest,
  StepInRequest,
  StackTraceRequest,
  ScopesRequest,
  VariablesRequest,
  ThreadsRequest,
  EvaluateRequest,
  UnsupportedRequest,
]);

export type Request = z.infer<typeof Request>;
export type Command = Request["command"];
export type RequestOf<C extends Command> = Extract<Request, { command: C }>;

const RequestEnvelope = z.object({
  seq: z.number().int(),
  type: z.literal("request"),
  command: z.string(),
});

export type RequestEnvelope = z.infer<typeof RequestEnvelope>;

export type DecodeResult =
  | { ok: true; request: Request }
  | { ok: false; envelope: RequestEnvelope; error: string };

export function isKnownCommand(command: string): boolean {
  return Request.optionsMap.has(command);
}

/**
 * Decode one inbound message. Throws `ProtocolError` when the message is not
 * a request or names a command outside the closed set; a known command with
 * bad arguments decodes to `{ ok: false }` so it can still be answered.
 */
export function decodeRequest(raw: unknown): DecodeResult {
  const envelope = RequestEnvelope.safeParse(raw);
  if (!envelope.success) {
    throw new ProtocolError(`Malformed request: ${formatIssues(envelope.error)}`);
  }
  if (!isKnownCommand(envelope.data.command)) {
    throw new ProtocolError(`Unknown request command: ${envelope.data.command}`);
  }

  const parsed = Request.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, envelope: envelope.data, error: formatIssues(parsed.error) };
  }
  return { ok: true, request: parsed.data };
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
