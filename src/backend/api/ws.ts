import type { FastifyInstance } from "fastify";
import type { WebSocket } from "@fastify/websocket";
import { z } from "zod";
import { logger } from "../logger.js";

const log = logger.child({ module: "ws" });

// ---------------------------------------------------------------------------
// Connected clients registry
// Used by other modules to broadcast events (readiness progress) without
// creating circular imports.
// ---------------------------------------------------------------------------
const clients = new Set<WebSocket>();

export function broadcast(payload: unknown): void {
  const message = JSON.stringify(payload);
  for (const ws of clients) {
    if (ws.readyState === 1 /* OPEN */) {
      ws.send(message);
    }
  }
}

const ClientMessage = z.object({ type: z.string() });

// ---------------------------------------------------------------------------
// Route
// ---------------------------------------------------------------------------
export async function registerWsRoutes(app: FastifyInstance) {
  app.get("/ws", { websocket: true }, (socket) => {
    clients.add(socket);

    socket.send(
      JSON.stringify({ type: "connected", timestamp: Date.now() })
    );

    socket.on("message", (raw) => {
      // Clients can send ping to keep connection alive
      let parsed: unknown;
      try {
        parsed = JSON.parse(raw.toString());
      } catch (err) {
        log.debug({ err }, "Ignoring malformed client message");
        return;
      }

      const msg = ClientMessage.safeParse(parsed);
      if (msg.success && msg.data.type === "ping") {
        socket.send(JSON.stringify({ type: "pong", timestamp: Date.now() }));
      }
    });

    socket.on("close", () => {
      clients.delete(socket);
    });

    socket.on("error", (err) => {
      log.debug({ err }, "WebSocket client error");
      clients.delete(socket);
    });
  });
}
