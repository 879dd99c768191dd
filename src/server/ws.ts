import { WebSocketServer, WebSocket } from "ws";
import { Encoder } from "msgpackr";
import { NETWORK } from "../config.js";
import type { GameDataRepository } from "../data/repository.js";
import { GameConfigError } from "../errors.js";
import { GameSession, type SessionEvent } from "../session.js";
import type { GameConfig, ServerToClientMessage } from "../types.js";
import { parseClientMessage, type ClientToServerMessage } from "../validation.js";

type ServerDeps = { port: number; repository: GameDataRepository };

type Connection = {
  ws: WebSocket;
  isAlive: boolean;
  session: GameSession | null;
  unsubscribe: (() => void) | null;
  lastInputSec: number;
  budget: number;
};

export function createWSServer({ port, repository }: ServerDeps) {
  const wss = new WebSocketServer({ port, perMessageDeflate: false, maxPayload: NETWORK.maxMessageSizeBytes });
  const connections = new Map<WebSocket, Connection>();
  const encoder = new Encoder();

  function send(ws: WebSocket, msg: ServerToClientMessage) {
    if (ws.readyState !== WebSocket.OPEN) return;
    try {
      ws.send(encoder.encode(msg));
    } catch (err) {
      console.warn(`[WS] Failed to send ${msg.type}:`, err);
    }
  }

  function forward(conn: Connection, session: GameSession, event: SessionEvent) {
    if (event.type === "state") {
      send(conn.ws, { type: "state", snapshot: session.toPublicSnapshot(event.snapshot) });
      return;
    }
    send(conn.ws, {
      type: "gameOver",
      gameId: event.record.id,
      finalScore: event.record.finalScore,
      reason: event.record.gameOverReason,
      isPersonalBest: event.isPersonalBest,
    });
  }

  // token bucket per connection
  function allowInput(conn: Connection): boolean {
    const nowSec = Date.now() / 1000;
    if (conn.lastInputSec === 0) conn.lastInputSec = nowSec;
    const elapsed = Math.max(0, nowSec - conn.lastInputSec);
    conn.lastInputSec = nowSec;
    conn.budget = Math.min(NETWORK.inputRateLimitPerSec, conn.budget + elapsed * NETWORK.inputRateLimitPerSec);
    if (conn.budget < 1) return false;
    conn.budget -= 1;
    return true;
  }

  function startSession(conn: Connection, name: string | undefined, config: Partial<GameConfig>) {
    let session: GameSession;
    try {
      session = new GameSession({ config, playerName: name, repository });
    } catch (err) {
      const message = err instanceof GameConfigError ? err.message : "Could not start game";
      if (!(err instanceof GameConfigError)) console.error("[WS] Session start failed:", err);
      send(conn.ws, { type: "error", message });
      return;
    }
    conn.session = session;
    conn.unsubscribe = session.subscribe((event) => forward(conn, session, event));
    send(conn.ws, { type: "welcome", id: session.id, config: session.config });
    send(conn.ws, { type: "state", snapshot: session.toPublicSnapshot() });
    session.start();
  }

  function handleHello(conn: Connection, msg: Extract<ClientToServerMessage, { type: "hello" }>) {
    if (conn.session) return;
    repository
      .getGameConfig()
      .then((saved) => {
        if (connections.has(conn.ws) && !conn.session) startSession(conn, msg.name, { ...saved, ...msg.config });
      })
      .catch((err: unknown) => {
        console.error("[WS] Failed to load saved config:", err);
        if (connections.has(conn.ws) && !conn.session) startSession(conn, msg.name, msg.config ?? {});
      });
  }

  function handleConfig(conn: Connection, session: GameSession, partial: Partial<GameConfig>) {
    let config: GameConfig;
    try {
      config = session.updateConfig(partial);
    } catch (err) {
      if (!(err instanceof GameConfigError)) throw err;
      send(conn.ws, { type: "error", message: err.message });
      return;
    }
    send(conn.ws, { type: "welcome", id: session.id, config });
    repository.saveGameConfig(config).catch((err: unknown) => {
      console.error("[WS] Failed to save config:", err);
    });
  }

  function handleMessage(conn: Connection, msg: ClientToServerMessage) {
    if (msg.type === "hello") {
      handleHello(conn, msg);
      return;
    }
    const session = conn.session;
    if (!session) return;

    switch (msg.type) {
      case "direction":
        if (allowInput(conn)) session.changeDirection(msg.direction);
        break;
      case "pause":
        session.pause();
        break;
      case "resume":
        session.resume();
        break;
      case "reset":
        session.reset();
        break;
      case "config":
        handleConfig(conn, session, msg.config);
        break;
    }
  }

  function dispose(conn: Connection) {
    conn.unsubscribe?.();
    conn.session?.stop();
    conn.unsubscribe = null;
    conn.session = null;
  }

  wss.on("connection", (ws) => {
    const conn: Connection = {
      ws,
      isAlive: true,
      session: null,
      unsubscribe: null,
      lastInputSec: 0,
      budget: NETWORK.inputRateLimitPerSec,
    };
    connections.set(ws, conn);
    ws.on("pong", () => {
      conn.isAlive = true;
    });

    ws.on("message", (data) => {
      const msg = parseClientMessage(String(data));
      if (!msg) return;
      try {
        handleMessage(conn, msg);
      } catch (err) {
        console.error(`[WS] Failed to handle ${msg.type}:`, err);
        send(ws, { type: "error", message: "Internal error" });
      }
    });

    ws.on("close", () => {
      dispose(conn);
      connections.delete(ws);
    });
  });

  const heartbeat = setInterval(() => {
    for (const conn of connections.values()) {
      if (!conn.isAlive) {
        conn.ws.terminate();
        continue;
      }
      conn.isAlive = false;
      try {
        conn.ws.ping();
      } catch (err) {
        console.warn("[WS] Ping failed:", err);
      }
    }
  }, NETWORK.heartbeatIntervalMs);

  console.log(`[WS] Listening on :${port}`);

  function close() {
    clearInterval(heartbeat);
    for (const conn of connections.values()) {
      dispose(conn);
      conn.ws.close();
    }
    connections.clear();
    wss.close();
  }

  return { close };
}
