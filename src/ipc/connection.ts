import {
  CancelledError,
  ClosedError,
  ProtocolError,
  TransportError,
  errorMessage,
  type CancelReason,
} from "../shared/errors.js";
import { childLogger, type Logger } from "../shared/logging.js";
import { createDeferred } from "../shared/deferred.js";
import { decodeFrame, encodeCommand, LineBuffer } from "../protocols/mpv/codec.js";
import type { Call, CommandResponse } from "../protocols/mpv/types.js";
import { EventHub, type DispatchMode, type EventCallback, type Subscription } from "./event-hub.js";
import { PendingCall, PendingTable } from "./pending.js";
import { AsyncQueue } from "./queue.js";
import type { Transport } from "./transport.js";

export type ConnectionState = "open" | "closing" | "closed";

export interface RequestOptions {
  /** Sets mpv's `async` flag on the command. */
  async?: boolean;
  signal?: AbortSignal;
  /** Cancel the request if no reply arrived within this many milliseconds. */
  timeoutMs?: number;
}

export interface AsyncRequest {
  readonly id: number;
  /** Rejects with CancelledError, ClosedError, TransportError or ProtocolError. */
  readonly response: Promise<CommandResponse>;
  cancel(): void;
}

export interface IpcConnectionOptions {
  /** Shown in logs, usually the socket path. */
  endpoint?: string;
  eventBufferSize?: number;
}

/**
 * Multiplexes calls and events over one mpv IPC stream.
 *
 * A single writer loop owns the write side and a single reader loop owns the
 * read side. Replies are matched to callers by request id only, so mpv may
 * answer in any order. Events go to an {@link EventHub} and are dropped when it
 * cannot take them, so a slow subscriber never delays replies.
 */
export class IpcConnection {
  private nextId = 1;
  private currentState: ConnectionState = "open";
  private readFailure: TransportError | undefined;
  private readonly pending = new PendingTable();
  private readonly outgoing = new AsyncQueue<PendingCall>();
  private readonly hub: EventHub;
  private readonly logger: Logger;
  private readonly writerDone: Promise<void>;
  private readonly readerDone: Promise<void>;
  private readonly markClosed: () => void;
  /** Resolves once the connection reached `closed`. */
  readonly closed: Promise<void>;

  constructor(
    private readonly transport: Transport,
    options: IpcConnectionOptions = {},
  ) {
    this.logger = childLogger({ component: "ipc", endpoint: options.endpoint ?? "stream" });
    this.hub = new EventHub({ logger: this.logger, bufferSize: options.eventBufferSize });
    const closed = createDeferred<void>();
    this.closed = closed.promise;
    this.markClosed = () => closed.resolve();
    this.writerDone = this.writeLoop();
    this.readerDone = this.readLoop();
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  /** Number of calls written and still waiting for a reply. */
  get inFlight(): number {
    return this.pending.size;
  }

  /**
   * Queue a call and return a handle to its reply. Throws ClosedError once
   * the connection is closing, and CancelledError if `signal` already aborted.
   */
  requestAsync(method: string, args: readonly unknown[] = [], options: RequestOptions = {}): AsyncRequest {
    if (this.currentState !== "open") throw new ClosedError();
    if (options.signal?.aborted) throw new CancelledError("aborted", { cause: options.signal.reason });

    const call: Call = { id: this.nextId++, method, args: [...args], async: options.async ?? false };
    const entry = new PendingCall(call, encodeCommand(call));
    const cancel = (reason: CancelReason): void => {
      if (!entry.reject(new CancelledError(reason))) return;
      this.outgoing.remove(entry);
      this.pending.take(entry.id);
      this.logger.debug({ requestId: entry.id, reason }, "request cancelled");
    };

    const { signal, timeoutMs } = options;
    if (signal) {
      const onAbort = (): void => cancel("aborted");
      signal.addEventListener("abort", onAbort, { once: true });
      entry.onSettled(() => signal.removeEventListener("abort", onAbort));
    }
    if (timeoutMs !== undefined) {
      const timer = setTimeout(() => cancel("timeout"), timeoutMs);
      entry.onSettled(() => clearTimeout(timer));
    }

    this.outgoing.offer(entry);
    return { id: call.id, response: entry.response, cancel: () => cancel("aborted") };
  }

  /** Send a call and wait for mpv's reply, successful or not. */
  async request(method: string, args: readonly unknown[] = [], options: RequestOptions = {}): Promise<CommandResponse> {
    return this.requestAsync(method, args, options).response;
  }

  /** Events dropped so far because subscribers could not keep up. */
  get droppedEvents(): number {
    return this.hub.dropped;
  }

  subscribe(callback: EventCallback, mode: DispatchMode = "concurrent"): Subscription {
    return this.hub.subscribe(callback, mode);
  }

  /**
   * Stop accepting calls, stop both loops, then fail whatever is still
   * pending with ClosedError. Later calls return immediately.
   */
  async close(): Promise<void> {
    if (this.currentState !== "open") return;
    this.currentState = "closing";
    this.logger.debug("closing connection");

    for (const entry of this.outgoing.clear()) {
      entry.reject(new ClosedError());
    }
    this.outgoing.close();
    this.transport.close();
    await Promise.all([this.writerDone, this.readerDone]);

    // Both loops have stopped, so nothing can be inserted behind the drain.
    const cause = this.readFailure;
    const drained = this.pending.drain(() => new ClosedError({ cause }));
    if (drained > 0) this.logger.debug({ drained }, "pending requests closed");
    this.hub.close();
    this.currentState = "closed";
    this.markClosed();
  }

  private async writeLoop(): Promise<void> {
    for (;;) {
      const entry = await this.outgoing.take();
      if (!entry) break;
      if (entry.settled) continue;
      if (this.currentState !== "open") {
        entry.reject(new ClosedError());
        continue;
      }
      if (!this.pending.insert(entry)) {
        entry.reject(new ProtocolError(`ipc: duplicate request id ${entry.id}`));
        continue;
      }
      try {
        await this.transport.write(entry.line);
        this.logger.trace({ requestId: entry.id, method: entry.call.method }, "request written");
      } catch (err) {
        this.pending.take(entry.id);
        entry.reject(new TransportError(`ipc: write failed: ${errorMessage(err)}`, { cause: err }));
      }
    }
    this.logger.debug("writer loop stopped");
  }

  private async readLoop(): Promise<void> {
    const lines = new LineBuffer();
    try {
      for await (const chunk of this.transport.input) {
        for (const line of lines.push(chunk)) this.route(line);
      }
      if (this.currentState === "open") {
        this.readFailure = new TransportError("ipc: connection closed by mpv");
      }
    } catch (err) {
      if (this.currentState === "open") {
        this.readFailure = new TransportError(`ipc: read failed: ${errorMessage(err)}`, { cause: err });
      }
    }
    this.logger.debug("reader loop stopped");

    if (this.currentState === "open") {
      this.logger.warn({ err: this.readFailure }, "connection lost");
      this.close().catch((err: unknown) => {
        this.logger.error({ err }, "failed to close connection");
      });
    }
  }

  private route(line: string): void {
    const frame = decodeFrame(line);
    if (!frame) {
      this.logger.debug({ line }, "dropping non-JSON line");
      return;
    }

    switch (frame.kind) {
      case "response": {
        const entry = this.pending.take(frame.response.requestId);
        if (!entry) {
          this.logger.debug({ requestId: frame.response.requestId }, "reply for unknown request dropped");
          return;
        }
        entry.resolve(frame.response);
        return;
      }
      case "event":
        this.hub.offer(frame.event);
        return;
      case "invalid": {
        this.logger.warn({ requestId: frame.requestId, reason: frame.reason }, "invalid frame");
        if (frame.requestId === undefined) return;
        this.pending.take(frame.requestId)?.reject(new ProtocolError(`ipc: ${frame.reason}`));
        return;
      }
    }
  }
}
