/** DAP transports: a TCP listener with one session per connection, or stdio. */

import { createServer, type Server, type Socket } from "node:net";
import type { EngineFactory } from "./engine/base.js";
import { getErrorMessage, ProtocolError } from "./errors.js";
import { createLogger } from "./logger.js";
import { DapSession } from "./session.js";

const log = createLogger("server");

export const DEFAULT_DAP_PORT = 54321;

export class DapServer {
  private server: Server | null = null;
  private readonly sessions = new Set<Promise<void>>();
  private readonly connections = new Set<Socket>();

  constructor(private readonly createEngine: EngineFactory) {}

  /** Start listening; resolves with the bound port. */
  listen(port: number = DEFAULT_DAP_PORT, host?: string): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = createServer((conn) => this.handleConnection(conn));
      server.once("error", reject);
      server.listen(port, host, () => {
        server.off("error", reject);
        server.on("error", (err) => log.error({ err: getErrorMessage(err) }, "connection failed"));
        this.server = server;
        const addr = server.address();
        const bound = addr && typeof addr === "object" ? addr.port : port;
        log.info({ addr: `${host ?? "*"}:${bound}` }, "started server");
        resolve(bound);
      });
    });
  }

  private handleConnection(conn: Socket): void {
    const remote = `${conn.remoteAddress ?? "?"}:${conn.remotePort ?? "?"}`;
    log.info({ remote }, "accepted connection");
    this.connections.add(conn);

    // Socket errors (ECONNRESET and friends) end the read loop like an EOF.
    conn.on("error", (err) => log.debug({ remote, err: getErrorMessage(err) }, "connection error"));

    const session = new DapSession({ engine: this.createEngine(), input: conn, output: conn });
    const done: Promise<void> = session
      .run()
      .then(() => log.debug({ remote }, "closing connection"))
      .catch((err: unknown) => {
        const level = err instanceof ProtocolError ? "error" : "warn";
        log[level]({ remote, err: getErrorMessage(err) }, "session ended abnormally");
      })
      .finally(() => {
        this.connections.delete(conn);
        this.sessions.delete(done);
        conn.destroy();
      });
    this.sessions.add(done);
  }

  /** Stop accepting, drop every open connection and wait for their sessions to finish. */
  async close(): Promise<void> {
    const server = this.server;
    this.server = null;
    // server.close() calls back only after every connection has ended.
    const closed = server ? new Promise<void>((resolve) => server.close(() => resolve())) : Promise.resolve();
    for (const conn of this.connections) conn.destroy();
    await Promise.allSettled([...this.sessions]);
    await closed;
  }
}

/** Serve a single session over this process's stdin/stdout. */
export async function serveStdio(createEngine: EngineFactory): Promise<void> {
  log.info("starting DAP using STDIN/STDOUT as communication protocol");
  const session = new DapSession({
    engine: createEngine(),
    input: process.stdin,
    output: process.stdout,
    endOutput: false,
  });
  await session.run();
}
