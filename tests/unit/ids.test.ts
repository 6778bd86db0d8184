import { describe, it, expect } from "vitest";
import {
  defaultSocketPath,
  incrementingPidSocketPath,
  incrementingSocketPath,
  randomSocketPath,
} from "../../src/shared/ids.js";

describe("socket paths", () => {
  it("uses a named pipe on Windows and /tmp elsewhere", () => {
    expect(defaultSocketPath("linux")).toBe("/tmp/mpvsocket");
    expect(defaultSocketPath("darwin")).toBe("/tmp/mpvsocket");
    expect(defaultSocketPath("win32")).toBe("\\\\.\\pipe\\mpvsocket");
  });

  it("counts upwards", () => {
    const first = incrementingSocketPath();
    const second = incrementingSocketPath();
    const n = Number(first.slice(first.lastIndexOf("-") + 1));

    expect(first).toBe(`${defaultSocketPath()}-${n}`);
    expect(second).toBe(`${defaultSocketPath()}-${n + 1}`);
  });

  it("includes the pid", () => {
    expect(incrementingPidSocketPath()).toMatch(new RegExp(`-${process.pid}-\\d+$`));
  });

  it("appends 16 hex characters", () => {
    const a = randomSocketPath();
    expect(a.slice(defaultSocketPath().length)).toMatch(/^-[0-9a-f]{16}$/);
    expect(randomSocketPath()).not.toBe(a);
  });
});
