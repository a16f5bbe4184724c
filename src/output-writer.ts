/** Single serialization point for everything a session sends. */

import type { Writable } from "node:stream";
import type { OutgoingMessage } from "./dap-types.js";
import { getErrorMessage } from "./errors.js";
import { createLogger } from "./logger.js";
import { AsyncQueue } from "./util/async-queue.js";
import { encodeMessage } from "./wire.js";

const log = createLogger("output");

/**
 * Any number of producers call `enqueue`; one worker writes the messages to
 * the transport in enqueue order, one whole frame at a time, waiting for
 * each write to flush before taking the next. `seq` is stamped at write
 * time, so sequence numbers follow the byte stream.
 */
export class OutputWriter {
  private queue = new AsyncQueue<OutgoingMessage>();
  private nextSeq = 1;
  private broken = false;
  private aborted = false;
  private readonly worker: Promise<void>;

  constructor(private readonly transport: Writable) {
    this.worker = this.run();
  }

  /** Returns false, and drops the message, once the writer is closed. */
  enqueue(message: OutgoingMessage): boolean {
    const accepted = this.queue.push(message);
    if (!accepted && this.aborted) {
      log.debug({ message: describe(message) }, "session aborted; message dropped");
    } else if (!accepted) {
      log.warn({ message: describe(message) }, "message enqueued after writer closed; dropped");
    }
    return accepted;
  }

  /** Stop accepting messages; resolves once everything already queued is written. */
  async close(): Promise<void> {
    this.queue.close();
    await this.worker;
  }

  /** Stop accepting messages and discard the backlog. */
  async abort(): Promise<void> {
    this.aborted = true;
    const dropped = this.queue.clear();
    if (dropped.length) log.debug({ dropped: dropped.length }, "discarded queued messages");
    this.queue.close();
    await this.worker;
  }

  private async run(): Promise<void> {
    for await (const message of this.queue) {
      if (this.broken) continue;
      const framed = { ...message, seq: this.nextSeq++ };
      try {
        await this.write(encodeMessage(framed));
        log.debug({ message: framed }, "message sent");
      } catch (err) {
        // The peer went away; the session notices end of stream on its own.
        this.broken = true;
        log.debug({ err: getErrorMessage(err) }, "transport write failed; discarding output");
      }
    }
  }

  private write(frame: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.transport.destroyed || this.transport.writableEnded) {
        reject(new Error("transport closed"));
        return;
      }
      this.transport.write(frame, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }
}

function describe(message: OutgoingMessage): string {
  return "event" in message ? `event ${message.event}` : `response ${message.command}#${message.request_seq}`;
}
