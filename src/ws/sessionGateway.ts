import type { IncomingMessage, Server as HttpServer } from "node:http";
import type { Duplex } from "node:stream";
import { URL } from "node:url";
import { WebSocketServer, type WebSocket } from "ws";
import { z } from "zod";
import { errorMessage } from "../api/types.js";
import { parseMessage } from "../api/validation.js";
import type { AppConfig } from "../config.js";
import type { Logger } from "../logging/logger.js";
import { assertValidSessionId, type SessionRegistry } from "../sessions/sessionRegistry.js";
import type { SessionEvent, SessionInfo } from "../sessions/types.js";

export const SESSIONS_WS_PATH = "/ws/sessions";

const clientMessageSchema = z.discriminatedUnion("type", [z.object({ type: z.literal("ping") })]);

type ServerMessage =
  | { type: "ready"; sessions: SessionInfo[] }
  | SessionEvent
  | { type: "error"; message: string }
  | { type: "pong" };

function send(ws: WebSocket, payload: ServerMessage, logger: Logger, wsBackpressureBytes: number): void {
  if (ws.readyState !== ws.OPEN) {
    return;
  }

  if (ws.bufferedAmount > wsBackpressureBytes) {
    logger.warn("ws.backpressure_close", {
      bufferedAmount: ws.bufferedAmount,
      threshold: wsBackpressureBytes,
    });
    ws.close(1009, "client-too-slow");
    return;
  }

  ws.send(JSON.stringify(payload));
}

/** `null` follows every session; otherwise only events for that one. */
function parseConnection(req: IncomingMessage): { sessionId: string | null } {
  const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
  const sessionId = url.searchParams.get("sessionId");

  if (sessionId === null || sessionId === "") {
    return { sessionId: null };
  }

  assertValidSessionId(sessionId);
  return { sessionId };
}

function eventSessionId(event: SessionEvent): string {
  return event.type === "state" ? event.session.sessionId : event.sessionId;
}

export class SessionGateway {
  private readonly wss: WebSocketServer;

  constructor(
    server: HttpServer,
    private readonly config: AppConfig,
    private readonly logger: Logger,
    private readonly sessions: SessionRegistry,
  ) {
    this.wss = new WebSocketServer({
      noServer: true,
      maxPayload: config.maxWsMessageBytes,
    });

    this.wss.on("connection", (ws, req) => {
      this.handleConnection(ws, req);
    });

    server.on("upgrade", (req, socket, head) => {
      this.handleUpgrade(req, socket, head);
    });
  }

  close(): void {
    for (const client of this.wss.clients) {
      client.close(1001, "server-shutdown");
    }
    this.wss.close();
  }

  private handleUpgrade(req: IncomingMessage, socket: Duplex, head: Buffer): void {
    if (!req.url?.startsWith(SESSIONS_WS_PATH)) {
      socket.destroy();
      return;
    }

    this.wss.handleUpgrade(req, socket, head, (ws) => {
      this.wss.emit("connection", ws, req);
    });
  }

  private handleConnection(ws: WebSocket, req: IncomingMessage): void {
    const threshold = this.config.wsBackpressureBytes;
    let filter: string | null;

    try {
      filter = parseConnection(req).sessionId;
    } catch (error) {
      send(ws, { type: "error", message: errorMessage(error) }, this.logger, threshold);
      ws.close(1008, "invalid-connection");
      return;
    }

    let snapshot: SessionInfo[];
    try {
      snapshot = filter === null ? this.sessions.list() : [this.sessions.get(filter)];
    } catch (error) {
      send(ws, { type: "error", message: errorMessage(error) }, this.logger, threshold);
      ws.close(1008, "session-unavailable");
      return;
    }

    const unsubscribe = this.sessions.subscribe((event) => {
      if (filter !== null && eventSessionId(event) !== filter) {
        return;
      }

      send(ws, event, this.logger, threshold);

      if (filter !== null && event.type === "removed") {
        ws.close(1000, "session-removed");
      }
    });

    this.logger.info("ws.connect", {
      sessionId: filter ?? "*",
      remoteAddress: req.socket.remoteAddress,
    });

    send(ws, { type: "ready", sessions: snapshot }, this.logger, threshold);

    let alive = true;
    ws.on("pong", () => {
      alive = true;
    });

    const heartbeat = setInterval(() => {
      if (!alive) {
        ws.terminate();
        return;
      }

      alive = false;
      ws.ping();
    }, 15_000);

    ws.on("message", (raw) => {
      try {
        const message = parseMessage(raw.toString(), clientMessageSchema);
        if (message.type === "ping") {
          send(ws, { type: "pong" }, this.logger, threshold);
        }
      } catch (error) {
        send(ws, { type: "error", message: errorMessage(error) }, this.logger, threshold);
      }
    });

    ws.on("close", () => {
      clearInterval(heartbeat);
      unsubscribe();
      this.logger.info("ws.disconnect", {
        sessionId: filter ?? "*",
      });
    });

    ws.on("error", (error) => {
      this.logger.warn("ws.error", {
        sessionId: filter ?? "*",
        message: error.message,
      });
    });
  }
}
