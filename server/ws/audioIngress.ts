import type { IncomingMessage, Server } from "node:http";
import { WebSocketServer, type RawData, type WebSocket } from "ws";
import { log } from "../logger";
import type { SessionRegistry } from "../sessions/sessionRegistry";

const AUDIO_INGRESS_PATH = "/ws/audio";

export function streamPathFor(sessionId: string): string {
  return `${AUDIO_INGRESS_PATH}?sessionId=${encodeURIComponent(sessionId)}`;
}

export function rawToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  return Buffer.from(data).toString("utf8");
}

export function sessionIdFromRequest(req: Pick<IncomingMessage, "url">): string | null {
  const url = new URL(req.url ?? "/", "http://localhost");
  return url.searchParams.get("sessionId");
}

/**
 * Audio ingress for meeting bots. Each socket is bound to the connector of
 * the session named in its query string.
 */
export function setupAudioWebSocket(server: Server, registry: SessionRegistry): WebSocketServer {
  const wss = new WebSocketServer({
    server,
    path: AUDIO_INGRESS_PATH,
  });

  log(`Audio WebSocket server initialized at ${AUDIO_INGRESS_PATH}`, "ws");

  wss.on("connection", (ws: WebSocket, req: IncomingMessage) => {
    const sessionId = sessionIdFromRequest(req);
    const session = sessionId ? registry.get(sessionId) : undefined;
    if (!session) {
      log(`[Audio] Rejected stream for unknown session ${sessionId ?? "(none)"}`, "ws", "warn");
      ws.close(4404, "unknown session");
      return;
    }

    log(`[Audio] Stream connected for session ${session.id} from ${req.socket.remoteAddress ?? "unknown"}`, "ws");
    const handle = session.connector.openStream(ws);

    ws.on("message", (data: RawData) => {
      handle.receive(rawToString(data));
    });

    ws.on("close", () => {
      handle.closed();
    });

    ws.on("error", (error: Error) => {
      log(`[Audio] Socket error for session ${session.id}: ${error.message}`, "ws", "error");
    });
  });

  return wss;
}
