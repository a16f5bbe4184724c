/** Error types shared by the session, the REPL and the CLI. */

/**
 * The inbound byte stream cannot be trusted any more: bad framing, bad JSON,
 * or a request kind the bridge does not know. Fatal to the session.
 */
export class ProtocolError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProtocolError";
  }
}

/** Bad command-line arguments. The CLI prints usage and exits 1. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

/** The configured engine module could not be loaded or does not export an engine. */
export class EngineLoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EngineLoadError";
  }
}

export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}

/** `code` of a Node.js system error (ENOENT, ECONNRESET, ...), if any. */
export function getErrorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
