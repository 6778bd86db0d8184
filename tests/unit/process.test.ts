import { describe, it, expect, vi } from "vitest";
import { spawn } from "node:child_process";
import { MpvProcess, buildMpvArgs, connectWithRetry } from "../../src/process.js";
import { ConnectionError, ProcessError } from "../../src/shared/errors.js";

vi.mock("node:child_process", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:child_process")>();
  return { ...actual, spawn: vi.fn(actual.spawn) };
});

describe("buildMpvArgs", () => {
  it("puts the IPC flags before the caller's arguments", () => {
    expect(buildMpvArgs("/tmp/mpvsocket-1", ["--no-video", "--volume=20"])).toEqual([
      "--input-ipc-server=/tmp/mpvsocket-1",
      "--idle",
      "--no-video",
      "--volume=20",
    ]);
  });

  it("works without extra arguments", () => {
    expect(buildMpvArgs("/tmp/mpvsocket")).toEqual(["--input-ipc-server=/tmp/mpvsocket", "--idle"]);
  });
});

describe("connectWithRetry", () => {
  it("returns as soon as a connection succeeds", async () => {
    const connect = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new ConnectionError("ipc: refused"))
      .mockRejectedValueOnce(new ConnectionError("ipc: refused"))
      .mockResolvedValue("connected");

    await expect(connectWithRetry(connect, { retries: 5, delayMs: 1 })).resolves.toBe("connected");
    expect(connect).toHaveBeenCalledTimes(3);
  });

  it("gives up after the last retry with the last error", async () => {
    const connect = vi.fn<() => Promise<string>>().mockRejectedValue(new ConnectionError("ipc: refused"));

    await expect(connectWithRetry(connect, { retries: 2, delayMs: 1 })).rejects.toThrow("ipc: refused");
    expect(connect).toHaveBeenCalledTimes(3);
  });

  it("stops early when shouldRetry says so", async () => {
    const connect = vi.fn<() => Promise<string>>().mockRejectedValue(new ConnectionError("ipc: refused"));

    await expect(
      connectWithRetry(connect, { retries: 5, delayMs: 1, shouldRetry: () => false })
    ).rejects.toBeInstanceOf(ConnectionError);
    expect(connect).toHaveBeenCalledTimes(1);
  });
});

describe("MpvProcess", () => {
  it("uses the default socket and no extra arguments", () => {
    const mpv = new MpvProcess({ path: "mpv-test" });
    expect(mpv.path).toBe("mpv-test");
    expect(mpv.args).toEqual([]);
    expect(mpv.running).toBe(false);
  });

  it("fails wait() before start", async () => {
    await expect(new MpvProcess().wait()).rejects.toBeInstanceOf(ProcessError);
  });

  it("fails to start a missing executable", async () => {
    const mpv = new MpvProcess({ path: "/nonexistent/mpvctl-test-binary" });

    await expect(mpv.start()).rejects.toBeInstanceOf(ProcessError);
    expect(mpv.running).toBe(false);
    await expect(mpv.close()).resolves.toBeUndefined();
  });

  it("spawns once when started concurrently", async () => {
    vi.mocked(spawn).mockClear();
    // Node rejects mpv's flags and exits, which is enough to count spawns.
    const mpv = new MpvProcess({ path: process.execPath });

    await Promise.all([mpv.start(), mpv.start()]);

    expect(spawn).toHaveBeenCalledTimes(1);
    expect(vi.mocked(spawn).mock.calls[0]?.[0]).toBe(process.execPath);
    await mpv.close();
  });
});
