import type { IpcError } from "../shared/errors.js";
import { createDeferred, type Deferred } from "../shared/deferred.js";
import { log } from "../shared/logging.js";
import type { Call, CommandResponse } from "../protocols/mpv/types.js";

/**
 * One call waiting for its outcome. Settles exactly once: the first of
 * resolve/reject wins and every later attempt returns false.
 */
export class PendingCall {
  readonly response: Promise<CommandResponse>;
  private readonly deferred: Deferred<CommandResponse>;
  private done = false;
  private cleanups: (() => void)[] = [];

  constructor(
    readonly call: Call,
    /** The encoded frame, newline included. */
    readonly line: string,
  ) {
    this.deferred = createDeferred<CommandResponse>();
    this.response = this.deferred.promise;
    // Async callers may drop a request they cancelled without awaiting it.
    this.response.catch((err: unknown) => {
      log.trace({ err, requestId: call.id }, "request rejected");
    });
  }

  get id(): number {
    return this.call.id;
  }

  get settled(): boolean {
    return this.done;
  }

  /** Run `fn` once this call settles (immediately if it already has). */
  onSettled(fn: () => void): void {
    if (this.done) fn();
    else this.cleanups.push(fn);
  }

  resolve(response: CommandResponse): boolean {
    if (!this.finish()) return false;
    this.deferred.resolve(response);
    return true;
  }

  reject(error: IpcError): boolean {
    if (!this.finish()) return false;
    this.deferred.reject(error);
    return true;
  }

  private finish(): boolean {
    if (this.done) return false;
    this.done = true;
    const cleanups = this.cleanups;
    this.cleanups = [];
    for (const fn of cleanups) fn();
    return true;
  }
}

/** Calls that have been handed to the transport and await a reply, by request id. */
export class PendingTable {
  private readonly entries = new Map<number, PendingCall>();

  /** Register `entry`; false if its id is already taken. */
  insert(entry: PendingCall): boolean {
    if (this.entries.has(entry.id)) return false;
    this.entries.set(entry.id, entry);
    return true;
  }

  /** Look up and remove in one step. */
  take(id: number): PendingCall | undefined {
    const entry = this.entries.get(id);
    if (entry) this.entries.delete(id);
    return entry;
  }

  has(id: number): boolean {
    return this.entries.has(id);
  }

  /** Remove every entry and reject each one with `reason()`. Returns how many were rejected. */
  drain(reason: () => IpcError): number {
    const entries = [...this.entries.values()];
    this.entries.clear();
    let rejected = 0;
    for (const entry of entries) {
      if (entry.reject(reason())) rejected++;
    }
    return rejected;
  }

  get size(): number {
    return this.entries.size;
  }
}
