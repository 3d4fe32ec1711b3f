import http from "node:http";

import type { CommandValidationResult, StreamMessage } from "@lifegrid/protocol";
import { validateUniverseCommand } from "@lifegrid/protocol";
import { WebSocketServer, type WebSocket } from "ws";

import type { LifegridSession } from "./session.js";

export interface LifegridServer {
  url: string;
  close: () => Promise<void>;
}

export function parseClientMessage(raw: string): CommandValidationResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    return { ok: false, errors: ["message must be valid JSON"] };
  }
  return validateUniverseCommand(parsed);
}

function send(client: WebSocket, message: StreamMessage): void {
  if (client.readyState !== client.OPEN) {
    return;
  }
  try {
    client.send(JSON.stringify(message));
  } catch (error) {
    client.terminate();
  }
}

function broadcast(clients: Set<WebSocket>, message: StreamMessage): void {
  for (const client of clients) {
    send(client, message);
  }
}

function serveFallback(res: http.ServerResponse): void {
  const html = `<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <title>Lifegrid Runner</title>
  </head>
  <body>
    <main style="font-family: system-ui, sans-serif; padding: 2rem; max-width: 48rem; margin: 0 auto;">
      <h1>Lifegrid Runner Is Live</h1>
      <p>Frames stream over a WebSocket at <code>/stream</code>.</p>
      <p>Send JSON commands such as <code>{"v":1,"type":"play"}</code> on the same socket.</p>
    </main>
  </body>
</html>`;

  res.writeHead(200, { "content-type": "text/html; charset=utf-8", "cache-control": "no-store" });
  res.end(html);
}

/** Applies one raw client message. Returns the error reply owed to the sender, if any. */
export function handleClientMessage(session: LifegridSession, raw: string): StreamMessage | undefined {
  const result = parseClientMessage(raw);
  if (!result.ok || !result.value) {
    return { type: "error", errors: result.errors };
  }

  try {
    session.apply(result.value);
    return undefined;
  } catch (error) {
    return { type: "error", errors: [error instanceof Error ? error.message : "Command failed"] };
  }
}

export async function startServer(session: LifegridSession, port: number): Promise<LifegridServer> {
  const clients = new Set<WebSocket>();

  const server = http.createServer((req, res) => {
    const urlPath = (req.url ?? "/").split("?")[0] ?? "/";

    if (urlPath === "/health") {
      res.writeHead(200, { "content-type": "application/json; charset=utf-8" });
      res.end(JSON.stringify({ ok: true, status: session.getStatus(), generation: session.getGeneration() }));
      return;
    }

    serveFallback(res);
  });

  const wss = new WebSocketServer({ noServer: true });

  server.on("upgrade", (req, socket, head) => {
    const urlPath = (req.url ?? "").split("?")[0] ?? "";
    if (urlPath !== "/stream") {
      socket.destroy();
      return;
    }
    wss.handleUpgrade(req, socket, head, (ws) => {
      wss.emit("connection", ws, req);
    });
  });

  wss.on("connection", (ws: WebSocket) => {
    clients.add(ws);
    send(ws, { type: "frame", frame: session.getFrame(), status: session.getStatus() });

    ws.on("message", (data) => {
      const reply = handleClientMessage(session, data.toString());
      if (reply) {
        send(ws, reply);
      }
    });
    ws.on("close", () => {
      clients.delete(ws);
    });
    // ws emits "error" on protocol violations; drop the client instead of the process
    ws.on("error", (error) => {
      console.error(`Stream client error: ${error.message}`);
      clients.delete(ws);
      ws.terminate();
    });
  });

  wss.on("error", (error) => {
    console.error(`Stream server error: ${error.message}`);
  });

  const unsubscribe = session.subscribe((message) => {
    broadcast(clients, message);
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => {
      server.off("error", reject);
      resolve();
    });
  });

  const address = server.address();
  const boundPort = typeof address === "object" && address !== null ? address.port : port;

  return {
    url: `http://localhost:${boundPort}`,
    close: async () => {
      unsubscribe();
      for (const client of clients) {
        client.terminate();
      }
      wss.close();
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
    }
  };
}
