import net from "node:net";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { WebSocket } from "ws";

import type { StreamMessage } from "@lifegrid/protocol";
import { Universe } from "@lifegrid/universe";

import { startServer, type LifegridServer } from "../src/server.js";
import { LifegridSession } from "../src/session.js";

class MessageReader {
  private readonly buffered: StreamMessage[] = [];
  private readonly waiters: Array<(message: StreamMessage) => void> = [];

  constructor(readonly client: WebSocket) {
    client.on("message", (data) => {
      const message = JSON.parse(data.toString()) as StreamMessage;
      const waiter = this.waiters.shift();
      if (waiter) {
        waiter(message);
        return;
      }
      this.buffered.push(message);
    });
  }

  next(): Promise<StreamMessage> {
    const message = this.buffered.shift();
    if (message) {
      return Promise.resolve(message);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }
}

describe("startServer", () => {
  let session: LifegridSession;
  let server: LifegridServer | undefined;
  const clients: WebSocket[] = [];

  function url(): string {
    if (!server) {
      throw new Error("server is closed");
    }
    return server.url;
  }

  function connect(path = "/stream"): WebSocket {
    const client = new WebSocket(`${url().replace(/^http/, "ws")}${path}`);
    clients.push(client);
    return client;
  }

  beforeEach(async () => {
    const universe = new Universe({ width: 20, height: 20 });
    universe.clear();
    session = new LifegridSession(universe, { tickIntervalMs: 100 });
    server = await startServer(session, 0);
  });

  afterEach(async () => {
    for (const client of clients.splice(0)) {
      client.terminate();
    }
    if (server) {
      await server.close();
      server = undefined;
    }
    session.close();
    vi.restoreAllMocks();
  });

  it("reports health as JSON", async () => {
    session.step(3);
    const response = await fetch(`${url()}/health`);

    expect(response.headers.get("content-type")).toBe("application/json; charset=utf-8");
    expect(await response.json()).toEqual({ ok: true, status: "paused", generation: 3 });
  });

  it("serves the fallback page on other paths", async () => {
    const response = await fetch(`${url()}/anything`);

    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toBe("text/html; charset=utf-8");
    expect(await response.text()).toContain("<h1>Lifegrid Runner Is Live</h1>");
  });

  it("refuses upgrades outside /stream", async () => {
    const client = connect("/elsewhere");
    const failure = await new Promise<Error>((resolve) => {
      client.once("error", resolve);
    });

    expect(failure).toBeInstanceOf(Error);
  });

  it("sends a frame snapshot on connect", async () => {
    const reader = new MessageReader(connect());

    expect(await reader.next()).toMatchObject({
      type: "frame",
      status: "paused",
      frame: { v: 1, generation: 0, width: 20, height: 20, population: 0 }
    });
  });

  it("broadcasts frames to every client", async () => {
    const a = new MessageReader(connect());
    const b = new MessageReader(connect());
    await a.next();
    await b.next();

    a.client.send(JSON.stringify({ v: 1, type: "tick", steps: 2 }));
    const [fromA, fromB] = await Promise.all([a.next(), b.next()]);
    expect(fromA).toMatchObject({ type: "frame", frame: { generation: 2 } });
    expect(fromB).toMatchObject({ type: "frame", frame: { generation: 2 } });

    session.step();
    expect(await b.next()).toMatchObject({ type: "frame", frame: { generation: 3 } });
  });

  it("replies with errors to the sending client only", async () => {
    const a = new MessageReader(connect());
    const b = new MessageReader(connect());
    await a.next();
    await b.next();

    a.client.send(JSON.stringify({ v: 1, type: "glider", row: 0, col: 0 }));
    expect(await a.next()).toEqual({
      type: "error",
      errors: ["pattern at (0, 0) needs a margin of 2 inside a 20x20 grid"]
    });

    a.client.send("{not json");
    expect(await a.next()).toEqual({ type: "error", errors: ["message must be valid JSON"] });

    a.client.send(JSON.stringify({ v: 1, type: "toggle", row: 1, col: 1 }));
    expect(await b.next()).toMatchObject({ type: "frame", frame: { population: 1 } });
  });

  it("drops a client that sends an invalid frame and keeps serving", async () => {
    const errorLog = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const port = Number(new URL(url()).port);
    const socket = net.connect(port, "localhost");
    socket.on("error", () => undefined);

    const handshake = new Promise<string>((resolve) => {
      socket.once("data", (chunk) => resolve(chunk.toString("latin1")));
    });
    socket.write(
      [
        "GET /stream HTTP/1.1",
        "Host: localhost",
        "Upgrade: websocket",
        "Connection: Upgrade",
        "Sec-WebSocket-Key: dGhlIHNhbXBsZSBub25jZQ==",
        "Sec-WebSocket-Version: 13",
        "",
        ""
      ].join("\r\n")
    );
    expect(await handshake).toContain("101 Switching Protocols");

    const closed = new Promise<void>((resolve) => {
      socket.once("close", () => resolve());
    });
    socket.write(Buffer.from([0x83, 0x00]));
    await closed;

    expect(errorLog).toHaveBeenCalledWith(expect.stringContaining("invalid opcode 3"));
    const response = await fetch(`${url()}/health`);
    expect(await response.json()).toEqual({ ok: true, status: "paused", generation: 0 });
  });

  it("disconnects clients and stops listening on close", async () => {
    const reader = new MessageReader(connect());
    await reader.next();
    const healthUrl = `${url()}/health`;
    const disconnected = new Promise<void>((resolve) => {
      reader.client.once("close", () => resolve());
    });

    await server?.close();
    server = undefined;
    await disconnected;

    await expect(fetch(healthUrl)).rejects.toThrow();
  });
});
