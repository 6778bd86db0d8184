import { createConnection, type Socket } from "node:net";
import type { Readable, Writable } from "node:stream";
import { ConnectionError, errorMessage } from "../shared/errors.js";
import { log } from "../shared/logging.js";

/**
 * A connected byte stream to mpv. The connection is its only reader and its
 * only writer; `close` must make a pending read on `input` end or fail.
 */
export interface Transport {
  readonly input: AsyncIterable<Buffer | string>;
  write(data: string): Promise<void>;
  close(): void;
}

function writeTo(output: Writable, data: string): Promise<void> {
  return new Promise((resolve, reject) => {
    output.write(data, "utf8", (err) => {
      if (err) reject(err);
      else resolve();
    });
  });
}

/** Wrap an already connected socket or named pipe. */
export function socketTransport(socket: Socket): Transport {
  // Errors also reach the reader through `input`; this keeps them from
  // surfacing as an unhandled 'error' event.
  socket.on("error", (err) => {
    log.debug({ err }, "ipc socket error");
  });
  return {
    input: socket,
    write: (data) => writeTo(socket, data),
    close() {
      socket.destroy();
    },
  };
}

/** Wrap a pair of streams, e.g. a child's stdout/stdin or in-memory pipes. */
export function streamTransport(input: Readable, output: Writable): Transport {
  return {
    input,
    write: (data) => writeTo(output, data),
    close() {
      input.destroy();
      output.destroy();
    },
  };
}

/**
 * Dial a unix domain socket, or a named pipe on Windows; `node:net` takes both
 * as a path. Fails with ConnectionError on refusal or when `timeoutMs` passes.
 */
export function openTransport(path: string, timeoutMs: number): Promise<Transport> {
  return new Promise((resolve, reject) => {
    const socket = createConnection({ path });
    const timer = setTimeout(() => {
      socket.destroy();
      reject(new ConnectionError(`ipc: timed out connecting to ${path} after ${timeoutMs}ms`));
    }, timeoutMs);

    socket.once("connect", () => {
      clearTimeout(timer);
      socket.removeAllListeners("error");
      resolve(socketTransport(socket));
    });
    socket.once("error", (err) => {
      clearTimeout(timer);
      socket.destroy();
      reject(new ConnectionError(`ipc: failed to connect to ${path}: ${errorMessage(err)}`, { cause: err }));
    });
  });
}
