import { describe, it, expect } from "vitest";
import { parseLoadMode, parseSeekFlags } from "../../src/cli/commands/playback.js";
import { parseTimeoutFlag, parseValue } from "../../src/cli/utils.js";

describe("parseValue", () => {
  it("parses JSON values", () => {
    expect(parseValue("42")).toBe(42);
    expect(parseValue("true")).toBe(true);
    expect(parseValue('{"a":[1]}')).toEqual({ a: [1] });
  });

  it("keeps anything else as a string", () => {
    expect(parseValue("a.mkv")).toBe("a.mkv");
    expect(parseValue("")).toBe("");
  });
});

describe("parseTimeoutFlag", () => {
  it("accepts positive integers", () => {
    expect(parseTimeoutFlag("250")).toBe(250);
    expect(parseTimeoutFlag(undefined)).toBeUndefined();
  });

  it("rejects anything else", () => {
    expect(() => parseTimeoutFlag("0")).toThrow("invalid --timeout: 0");
    expect(() => parseTimeoutFlag("1.5")).toThrow("invalid --timeout: 1.5");
    expect(() => parseTimeoutFlag("soon")).toThrow("invalid --timeout: soon");
  });
});

describe("parseSeekFlags", () => {
  it("accepts known flags", () => {
    expect(parseSeekFlags(["relative", "exact"])).toEqual(["relative", "exact"]);
    expect(parseSeekFlags([])).toEqual([]);
  });

  it("rejects unknown flags", () => {
    expect(() => parseSeekFlags(["sideways"])).toThrow(/^invalid seek flag: sideways/);
  });
});

describe("parseLoadMode", () => {
  it("accepts mpv's loadfile modes", () => {
    expect(parseLoadMode("append-play")).toBe("append-play");
  });

  it("rejects unknown modes", () => {
    expect(() => parseLoadMode("insert")).toThrow(
      "invalid load mode: insert (expected replace, append, append-play)"
    );
  });
});
