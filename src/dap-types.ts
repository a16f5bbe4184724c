/** DAP (Debug Adapter Protocol) message types used by the bridge. */

import type { DebugProtocol } from "@vscode/debugprotocol";

export type DAPResponse = DebugProtocol.Response;
export type DAPEvent = DebugProtocol.Event;

/** Outbound message before the Output Writer stamps its `seq`. */
export type OutgoingMessage = Omit<DAPResponse, "seq"> | Omit<DAPEvent, "seq">;

export type Capabilities = DebugProtocol.Capabilities;
export type StackFrame = DebugProtocol.StackFrame;
export type Variable = DebugProtocol.Variable;
export type Scope = DebugProtocol.Scope;
export type Breakpoint = DebugProtocol.Breakpoint;
export type BreakpointLocation = DebugProtocol.BreakpointLocation;
export type Thread = DebugProtocol.Thread;

/** The engine runs a single evaluation; DAP still wants a thread for it. */
export const MAIN_THREAD_ID = 1;
/** Variables reference of the only scope. */
export const LOCAL_SCOPE_REFERENCE = 1000;
