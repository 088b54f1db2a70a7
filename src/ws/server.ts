/**
 * Authenticated WebSocket fan-out for stored quotes.
 * Clients connect to /ws, authenticate with the REST API key, then
 * subscribe to channels: quotes, status.
 */
import { timingSafeEqual } from "node:crypto";
import type { Server as HttpServer } from "node:http";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import { config } from "../config.js";
import { logWs } from "../logging.js";

const HEARTBEAT_INTERVAL_MS = 30_000;

const CHANNELS = ["quotes", "status"] as const;
type ChannelName = (typeof CHANNELS)[number];

interface AuthMessage { type: "auth"; apiKey: string }
interface SubscribeMessage { type: "subscribe"; channel: string }
type ClientMessage = AuthMessage | SubscribeMessage;

interface ClientState {
  isAlive: boolean;
  isAuthenticated: boolean;
  channels: Set<ChannelName>;
}

// Module-level server reference (set by initWebSocket, used by wsBroadcast)
let wss: WebSocketServer | null = null;
let heartbeat: ReturnType<typeof setInterval> | null = null;
const clients = new Map<WebSocket, ClientState>();

function isChannel(value: string): value is ChannelName {
  return CHANNELS.some((c) => c === value);
}

function parseMessage(raw: RawData): ClientMessage | null {
  try {
    const parsed: unknown = JSON.parse(raw.toString());
    if (!parsed || typeof parsed !== "object") return null;
    if (!("type" in parsed)) return null;
    if (parsed.type === "auth" && "apiKey" in parsed && typeof parsed.apiKey === "string") {
      return { type: "auth", apiKey: parsed.apiKey };
    }
    if (parsed.type === "subscribe" && "channel" in parsed && typeof parsed.channel === "string") {
      return { type: "subscribe", channel: parsed.channel };
    }
    return null;
  } catch {
    return null;
  }
}

function isApiKeyValid(provided: string): boolean {
  const expected = config.rest.apiKey;
  if (!expected) return true; // No key configured = open access (matches REST behavior)
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Send `{ channel, data }` to every authenticated client subscribed to the
 * channel. No-op before initWebSocket().
 */
export function wsBroadcast(channel: ChannelName, data: unknown): void {
  if (!wss) return;
  const payload = JSON.stringify({ channel, data });
  for (const [client, state] of clients) {
    if (!state.channels.has(channel) || client.readyState !== WebSocket.OPEN) continue;
    client.send(payload);
  }
}

export function getClientCount(): number {
  return clients.size;
}

export function initWebSocket(httpServer: HttpServer): void {
  if (wss) closeWebSocket();
  const server = new WebSocketServer({ server: httpServer, path: "/ws" });
  wss = server;

  server.on("connection", (socket: WebSocket) => {
    const state: ClientState = { isAlive: true, isAuthenticated: false, channels: new Set() };
    clients.set(socket, state);

    socket.on("pong", () => { state.isAlive = true; });

    socket.on("message", (rawData: RawData) => {
      const message = parseMessage(rawData);
      if (!message) {
        socket.close(1008, "Invalid message");
        return;
      }

      // First message must be auth
      if (!state.isAuthenticated) {
        if (message.type !== "auth") {
          socket.close(1008, "Authentication required");
          return;
        }
        if (!isApiKeyValid(message.apiKey)) {
          socket.close(1008, "Invalid API key");
          return;
        }
        state.isAuthenticated = true;
        state.channels.add("status");
        socket.send(JSON.stringify({ type: "auth", ok: true }));
        return;
      }

      if (message.type !== "subscribe") return;
      if (!isChannel(message.channel)) {
        socket.close(1008, "Invalid channel");
        return;
      }
      state.channels.add(message.channel);
      socket.send(JSON.stringify({ type: "subscribed", channel: message.channel }));
    });

    socket.on("close", () => { clients.delete(socket); });
    socket.on("error", (err: Error) => { logWs.warn({ err }, "WebSocket client error"); });
  });

  // Heartbeat: terminate stale clients
  heartbeat = setInterval(() => {
    for (const [client, state] of clients) {
      if (!state.isAlive) {
        clients.delete(client);
        client.terminate();
        continue;
      }
      state.isAlive = false;
      client.ping();
    }
  }, HEARTBEAT_INTERVAL_MS);
  heartbeat.unref();

  logWs.info({ path: "/ws" }, "WebSocket server initialized");
}

/** Stop the heartbeat, drop every client and detach from the HTTP server. */
export function closeWebSocket(): void {
  if (heartbeat) {
    clearInterval(heartbeat);
    heartbeat = null;
  }
  for (const client of clients.keys()) client.terminate();
  clients.clear();
  if (wss) {
    wss.close();
    wss = null;
    logWs.info("WebSocket server closed");
  }
}
