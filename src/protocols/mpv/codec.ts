/**
 * Codec for mpv's JSON IPC: one JSON object per line, UTF-8, `\n` terminated.
 */

import { type } from "arktype";
import {
  EventFrameSchema,
  ResponseFrameSchema,
  type Call,
  type CommandFrame,
  type Frame,
} from "./types.js";

export function toCommandFrame(call: Call): CommandFrame {
  return {
    command: [call.method, ...call.args],
    async: call.async,
    request_id: call.id,
  };
}

export function encodeCommand(call: Call): string {
  return JSON.stringify(toCommandFrame(call)) + "\n";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Classify one line. Returns null for lines that are blank or not JSON at all;
 * those are noise and get dropped by the reader.
 */
export function decodeFrame(line: string): Frame | null {
  const trimmed = line.trim();
  if (!trimmed) return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed) as unknown;
  } catch {
    return null;
  }

  if (!isRecord(parsed)) {
    return { kind: "invalid", reason: "frame is not a JSON object" };
  }

  if ("event" in parsed) {
    const out = EventFrameSchema(parsed);
    if (out instanceof type.errors) {
      return { kind: "invalid", reason: `event frame: ${out.summary}` };
    }
    return {
      kind: "event",
      event: { name: out.event, id: out.id, fields: parsed },
    };
  }

  if ("request_id" in parsed) {
    const out = ResponseFrameSchema(parsed);
    if (out instanceof type.errors) {
      const id = parsed.request_id;
      return {
        kind: "invalid",
        requestId: typeof id === "number" && Number.isInteger(id) ? id : undefined,
        reason: `response frame: ${out.summary}`,
      };
    }
    return {
      kind: "response",
      response: { requestId: out.request_id, error: out.error, data: out.data },
    };
  }

  return { kind: "invalid", reason: "frame has neither event nor request_id" };
}

/**
 * Accumulates raw bytes and yields complete lines. Splitting happens on the
 * byte level so multi-byte characters straddling chunks decode intact.
 */
export class LineBuffer {
  private buffer: Buffer = Buffer.alloc(0);

  push(chunk: Buffer | string): string[] {
    const bytes = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
    this.buffer = this.buffer.length ? Buffer.concat([this.buffer, bytes]) : bytes;
    const lines: string[] = [];
    for (;;) {
      const newlineIndex = this.buffer.indexOf(0x0a);
      if (newlineIndex === -1) break;
      lines.push(this.buffer.subarray(0, newlineIndex).toString("utf8"));
      this.buffer = this.buffer.subarray(newlineIndex + 1);
    }
    return lines;
  }

  get pending(): number {
    return this.buffer.length;
  }
}
