import { describe, it, expect } from "vitest";
import { decodeFrame, encodeCommand, LineBuffer } from "../../src/protocols/mpv/codec.js";

describe("encodeCommand", () => {
  it("puts the method in front of the arguments and ends with a newline", () => {
    expect(encodeCommand({ id: 7, method: "get_property", args: ["pause"], async: false })).toBe(
      '{"command":["get_property","pause"],"async":false,"request_id":7}\n'
    );
  });

  it("keeps argument types", () => {
    expect(encodeCommand({ id: 2, method: "seek", args: [10.5, "relative+exact"], async: true })).toBe(
      '{"command":["seek",10.5,"relative+exact"],"async":true,"request_id":2}\n'
    );
  });
});

describe("decodeFrame", () => {
  it("decodes a successful response", () => {
    expect(decodeFrame('{"request_id":7,"error":"success","data":false}')).toEqual({
      kind: "response",
      response: { requestId: 7, error: "success", data: false },
    });
  });

  it("decodes a failed response without data", () => {
    expect(decodeFrame('{"request_id":3,"error":"property not found"}')).toEqual({
      kind: "response",
      response: { requestId: 3, error: "property not found", data: undefined },
    });
  });

  it("decodes an event, keeping every field", () => {
    expect(decodeFrame('{"event":"property-change","id":1,"name":"pause","data":true}')).toEqual({
      kind: "event",
      event: {
        name: "property-change",
        id: 1,
        fields: { event: "property-change", id: 1, name: "pause", data: true },
      },
    });
  });

  it("classifies by event before request_id", () => {
    expect(decodeFrame('{"event":"end-file","request_id":0}')).toMatchObject({
      kind: "event",
      event: { name: "end-file" },
    });
  });

  it("returns null for blank lines and non-JSON", () => {
    expect(decodeFrame("")).toBeNull();
    expect(decodeFrame("   ")).toBeNull();
    expect(decodeFrame("{not json")).toBeNull();
  });

  it("flags a response with the wrong shape and keeps its id", () => {
    expect(decodeFrame('{"request_id":5,"error":42}')).toMatchObject({ kind: "invalid", requestId: 5 });
  });

  it("flags JSON that is neither an event nor a response", () => {
    expect(decodeFrame("[1,2]")).toEqual({ kind: "invalid", reason: "frame is not a JSON object" });
    expect(decodeFrame('{"data":1}')).toEqual({
      kind: "invalid",
      reason: "frame has neither event nor request_id",
    });
  });

  it("reads back the id of an encoded call from a success reply", () => {
    const line = encodeCommand({ id: 12, method: "get_property", args: ["volume"], async: false });
    const sent = JSON.parse(line) as { request_id: number };
    const frame = decodeFrame(JSON.stringify({ request_id: sent.request_id, error: "success", data: 100 }));

    expect(frame).toEqual({ kind: "response", response: { requestId: 12, error: "success", data: 100 } });
  });
});

describe("LineBuffer", () => {
  it("returns only complete lines", () => {
    const buffer = new LineBuffer();
    expect(buffer.push('{"a":1}\n{"b"')).toEqual(['{"a":1}']);
    expect(buffer.pending).toBe(4);
    expect(buffer.push(":2}\n")).toEqual(['{"b":2}']);
    expect(buffer.pending).toBe(0);
  });

  it("joins a multi-byte character split across chunks", () => {
    const bytes = Buffer.from('{"t":"é"}\n', "utf8");
    const split = bytes.indexOf(0xa9);
    const buffer = new LineBuffer();

    expect(buffer.push(bytes.subarray(0, split))).toEqual([]);
    expect(buffer.push(bytes.subarray(split))).toEqual(['{"t":"é"}']);
  });
});
