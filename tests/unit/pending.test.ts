import { describe, it, expect } from "vitest";
import { PendingCall, PendingTable } from "../../src/ipc/pending.js";
import { encodeCommand } from "../../src/protocols/mpv/codec.js";
import type { Call } from "../../src/protocols/mpv/types.js";
import { CancelledError, ClosedError } from "../../src/shared/errors.js";

function pendingCall(id: number): PendingCall {
  const call: Call = { id, method: "get_property", args: ["pause"], async: false };
  return new PendingCall(call, encodeCommand(call));
}

describe("PendingCall", () => {
  it("settles once; later attempts report false", async () => {
    const entry = pendingCall(1);
    expect(entry.resolve({ requestId: 1, error: "success", data: true })).toBe(true);
    expect(entry.reject(new CancelledError("aborted"))).toBe(false);
    expect(entry.resolve({ requestId: 1, error: "success", data: false })).toBe(false);

    await expect(entry.response).resolves.toEqual({ requestId: 1, error: "success", data: true });
    expect(entry.settled).toBe(true);
  });

  it("runs settle hooks once, or immediately when already settled", () => {
    const entry = pendingCall(1);
    const calls: string[] = [];
    entry.onSettled(() => calls.push("before"));
    entry.reject(new ClosedError());
    entry.reject(new ClosedError());
    entry.onSettled(() => calls.push("after"));

    expect(calls).toEqual(["before", "after"]);
  });
});

describe("PendingTable", () => {
  it("inserts only when the id is free", () => {
    const table = new PendingTable();
    expect(table.insert(pendingCall(1))).toBe(true);
    expect(table.insert(pendingCall(1))).toBe(false);
    expect(table.size).toBe(1);
  });

  it("takes an entry out exactly once", () => {
    const table = new PendingTable();
    const entry = pendingCall(4);
    table.insert(entry);

    expect(table.take(4)).toBe(entry);
    expect(table.take(4)).toBeUndefined();
    expect(table.has(4)).toBe(false);
  });

  it("drains every entry with a fresh error each", async () => {
    const table = new PendingTable();
    const entries = [pendingCall(1), pendingCall(2), pendingCall(3)];
    for (const entry of entries) table.insert(entry);
    entries[1].resolve({ requestId: 2, error: "success", data: null });

    expect(table.drain(() => new ClosedError())).toBe(2);
    expect(table.size).toBe(0);
    await expect(entries[0].response).rejects.toBeInstanceOf(ClosedError);
    await expect(entries[1].response).resolves.toMatchObject({ requestId: 2 });
    await expect(entries[2].response).rejects.toBeInstanceOf(ClosedError);
  });
});
