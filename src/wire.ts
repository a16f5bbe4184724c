/** DAP wire framing: `Content-Length: N\r\n\r\n<N bytes of JSON>`. */

import type { Readable } from "node:stream";
import { ProtocolError } from "./errors.js";

const HEADER_DELIMITER = "\r\n\r\n";

/** Incremental decoder; feed it chunks, get back whole parsed messages. */
export class FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);

  push(chunk: Buffer): unknown[] {
    this.buffer = this.buffer.length ? Buffer.concat([this.buffer, chunk]) : chunk;
    const messages: unknown[] = [];

    while (true) {
      const headerEnd = this.buffer.indexOf(HEADER_DELIMITER);
      if (headerEnd === -1) break;

      const header = this.buffer.subarray(0, headerEnd).toString("ascii");
      const contentLength = parseContentLength(header);

      const bodyStart = headerEnd + HEADER_DELIMITER.length;
      const bodyEnd = bodyStart + contentLength;
      if (this.buffer.length < bodyEnd) break;

      const body = this.buffer.subarray(bodyStart, bodyEnd).toString("utf-8");
      this.buffer = this.buffer.subarray(bodyEnd);

      try {
        messages.push(JSON.parse(body));
      } catch (err) {
        throw new ProtocolError(`Malformed message body: ${body.slice(0, 80)}`, { cause: err });
      }
    }

    return messages;
  }
}

function parseContentLength(header: string): number {
  for (const line of header.split("\r\n")) {
    const sep = line.indexOf(":");
    if (sep === -1) continue;
    if (line.slice(0, sep).trim().toLowerCase() !== "content-length") continue;

    const value = line.slice(sep + 1).trim();
    const length = Number.parseInt(value, 10);
    if (!/^\d+$/.test(value) || length <= 0) {
      throw new ProtocolError(`Invalid Content-Length header: ${line}`);
    }
    return length;
  }
  throw new ProtocolError(`Missing Content-Length header: ${JSON.stringify(header)}`);
}

/**
 * Yield each decoded message from `input` until end of stream. A message cut
 * short by the end of the stream is discarded, as for a closed connection.
 */
export async function* readMessages(input: Readable): AsyncGenerator<unknown> {
  const decoder = new FrameDecoder();
  for await (const chunk of input) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), "utf-8");
    yield* decoder.push(buf);
  }
}

export function encodeMessage(message: object): Buffer {
  const body = Buffer.from(JSON.stringify(message), "utf-8");
  const header = Buffer.from(`Content-Length: ${body.length}${HEADER_DELIMITER}`, "ascii");
  return Buffer.concat([header, body]);
}
