import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createServer, type Server, type Socket } from "node:net";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { openClient, type MpvClient } from "../../src/client.js";
import { openTransport } from "../../src/ipc/transport.js";
import { LineBuffer } from "../../src/protocols/mpv/codec.js";
import { ConnectionError } from "../../src/shared/errors.js";

/** A unix socket server that answers get_property like mpv does. */
function listen(socketPath: string, sockets: Set<Socket>): Promise<Server> {
  const server = createServer((socket) => {
    sockets.add(socket);
    socket.on("close", () => sockets.delete(socket));
    const lines = new LineBuffer();
    socket.on("data", (chunk: Buffer) => {
      for (const line of lines.push(chunk)) {
        const frame = JSON.parse(line) as { command: unknown[]; request_id: number };
        const data = frame.command[0] === "get_property" ? `value of ${String(frame.command[1])}` : null;
        socket.write(JSON.stringify({ data, request_id: frame.request_id, error: "success" }) + "\n");
      }
    });
  });
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(socketPath, () => resolve(server));
  });
}

describe("unix socket transport", () => {
  let dir: string;
  let socketPath: string;
  let server: Server;
  const sockets = new Set<Socket>();
  let client: MpvClient | undefined;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "mpvctl-ipc-"));
    socketPath = path.join(dir, "mpv.sock");
    server = await listen(socketPath, sockets);
  });

  afterEach(async () => {
    await client?.close();
    client = undefined;
    for (const socket of sockets) socket.destroy();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await rm(dir, { recursive: true, force: true });
  });

  it("talks to a listening socket", async () => {
    client = await openClient({ socketPath, dialTimeoutMs: 1000 });

    await expect(client.getProperty("volume")).resolves.toBe("value of volume");
    expect(client.state).toBe("open");
  });

  it("closes the client when the server hangs up", async () => {
    client = await openClient({ socketPath, dialTimeoutMs: 1000 });
    await client.getProperty("pause");

    for (const socket of sockets) socket.end();

    await client.closed;
    expect(client.state).toBe("closed");
  });

  it("fails with ConnectionError when nothing listens", async () => {
    await expect(openTransport(path.join(dir, "missing.sock"), 1000)).rejects.toBeInstanceOf(ConnectionError);
  });
});
