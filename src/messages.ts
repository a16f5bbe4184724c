/** Builders for outbound DAP responses and events. */

import type { DebugProtocol } from "@vscode/debugprotocol";

/**
 * Stable `message` keys of failed responses, with their error ids. Tooling
 * matches on the key; the human-readable text is in `body.error.format`.
 */
export const ErrorCodes = {
  unsupported: 1000,
  invalidArguments: 1001,
  launchFailed: 1002,
  evaluateFailed: 1003,
  breakpointFailed: 1004,
  engineFailed: 1005,
} as const;

export type ErrorKind = keyof typeof ErrorCodes;

export interface RequestRef {
  seq: number;
  command: string;
}

export function newEvent(event: string, body?: object): Omit<DebugProtocol.Event, "seq"> {
  const message: Omit<DebugProtocol.Event, "seq"> = { type: "event", event };
  if (body !== undefined) message.body = body;
  return message;
}

export function newResponse(request: RequestRef, body?: object): Omit<DebugProtocol.Response, "seq"> {
  const message: Omit<DebugProtocol.Response, "seq"> = {
    type: "response",
    request_seq: request.seq,
    command: request.command,
    success: true,
  };
  if (body !== undefined) message.body = body;
  return message;
}

export function newErrorResponse(
  request: RequestRef,
  kind: ErrorKind,
  format: string,
): Omit<DebugProtocol.ErrorResponse, "seq"> {
  return {
    type: "response",
    request_seq: request.seq,
    command: request.command,
    success: false,
    message: kind,
    body: {
      error: { id: ErrorCodes[kind], format, showUser: kind !== "unsupported" },
    },
  };
}

export function unsupportedResponse(request: RequestRef): Omit<DebugProtocol.ErrorResponse, "seq"> {
  const name = request.command.charAt(0).toUpperCase() + request.command.slice(1);
  return newErrorResponse(request, "unsupported", `${name}Request is not yet supported`);
}
