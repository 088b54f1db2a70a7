import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { Server as HttpServer } from "node:http";
import request from "supertest";
import WebSocket from "ws";
import { config } from "../../config.js";
import { MarketDataManager } from "../../market-data/manager.js";
import { createQuote } from "../../mock/quote.js";
import { startRestServer } from "../../rest/server.js";
import { buildEnvelope, serializeEnvelope } from "../../stream/protocol.js";
import { closeWebSocket, getClientCount, wsBroadcast } from "../server.js";

interface Received {
  messages: unknown[];
  closed: Promise<{ code: number; reason: string }>;
}

function connect(port: number): Promise<{ socket: WebSocket; received: Received }> {
  return new Promise((resolve, reject) => {
    const socket = new WebSocket(`ws://127.0.0.1:${port}/ws`);
    const messages: unknown[] = [];
    socket.on("message", (data) => messages.push(JSON.parse(data.toString())));
    const closed = new Promise<{ code: number; reason: string }>((res) => {
      socket.on("close", (code, reason) => res({ code, reason: reason.toString() }));
    });
    socket.once("open", () => resolve({ socket, received: { messages, closed } }));
    socket.once("error", reject);
  });
}

function waitFor(predicate: () => boolean, timeoutMs = 2000): Promise<void> {
  return new Promise((resolve, reject) => {
    const started = Date.now();
    const poll = (): void => {
      if (predicate()) resolve();
      else if (Date.now() - started > timeoutMs) reject(new Error(`condition not met within ${timeoutMs}ms`));
      else setTimeout(poll, 10);
    };
    poll();
  });
}

describe("WebSocket fan-out", () => {
  let manager: MarketDataManager;
  let server: HttpServer;
  let port: number;
  const sockets: WebSocket[] = [];

  async function open(): Promise<{ socket: WebSocket; received: Received }> {
    const conn = await connect(port);
    sockets.push(conn.socket);
    return conn;
  }

  beforeEach(async () => {
    config.rest.apiKey = "test-secret";
    manager = new MarketDataManager(":memory:", { mode: "mock" });
    server = startRestServer(manager, 0);
    await new Promise<void>((resolve) => server.once("listening", () => resolve()));
    const address = server.address();
    if (!address || typeof address === "string") throw new Error("server has no TCP address");
    port = address.port;
  });

  afterEach(async () => {
    for (const socket of sockets.splice(0)) socket.terminate();
    closeWebSocket();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await manager.close();
    config.rest.apiKey = "";
  });

  it("closes a connection whose first message is not auth", async () => {
    const { socket, received } = await open();
    socket.send(JSON.stringify({ type: "subscribe", channel: "quotes" }));
    expect(await received.closed).toEqual({ code: 1008, reason: "Authentication required" });
  });

  it("closes a connection with the wrong key", async () => {
    const { socket, received } = await open();
    socket.send(JSON.stringify({ type: "auth", apiKey: "wrong-secret" }));
    expect(await received.closed).toEqual({ code: 1008, reason: "Invalid API key" });
  });

  it("closes a connection that sends garbage", async () => {
    const { socket, received } = await open();
    socket.send("not json");
    expect(await received.closed).toEqual({ code: 1008, reason: "Invalid message" });
  });

  it("authenticates, subscribes and receives stored quotes", async () => {
    const { socket, received } = await open();
    socket.send(JSON.stringify({ type: "auth", apiKey: "test-secret" }));
    await waitFor(() => received.messages.length >= 1);
    expect(received.messages[0]).toEqual({ type: "auth", ok: true });

    socket.send(JSON.stringify({ type: "subscribe", channel: "quotes" }));
    await waitFor(() => received.messages.length >= 2);
    expect(received.messages[1]).toEqual({ type: "subscribed", channel: "quotes" });

    const quote = createQuote({
      symbol: "AAPL",
      last: 175,
      bid: 174.95,
      ask: 175.05,
      volume: 10,
      high: 175,
      low: 175,
      netChange: 0,
      netChangePercent: 0,
      timestamp: 99,
    });
    manager.processRawMessage(serializeEnvelope(buildEnvelope([quote])));

    await waitFor(() => received.messages.length >= 3);
    expect(received.messages[2]).toEqual({ channel: "quotes", data: { ...quote } });
  });

  it("rejects an unknown channel", async () => {
    const { socket, received } = await open();
    socket.send(JSON.stringify({ type: "auth", apiKey: "test-secret" }));
    await waitFor(() => received.messages.length >= 1);
    socket.send(JSON.stringify({ type: "subscribe", channel: "orders" }));
    expect(await received.closed).toEqual({ code: 1008, reason: "Invalid channel" });
  });

  it("sends status broadcasts only to authenticated clients", async () => {
    const authed = await open();
    const anonymous = await open();
    authed.socket.send(JSON.stringify({ type: "auth", apiKey: "test-secret" }));
    await waitFor(() => authed.received.messages.length >= 1);
    expect(getClientCount()).toBe(2);

    wsBroadcast("status", { streaming: false });
    await waitFor(() => authed.received.messages.length >= 2);
    expect(authed.received.messages[1]).toEqual({ channel: "status", data: { streaming: false } });
    expect(anonymous.received.messages).toEqual([]);
  });

  it("publishes stream control changes on the status channel", async () => {
    const { socket, received } = await open();
    socket.send(JSON.stringify({ type: "auth", apiKey: "test-secret" }));
    await waitFor(() => received.messages.length >= 1);

    const res = await request(server)
      .put("/api/stream/interval")
      .set("X-API-Key", "test-secret")
      .send({ seconds: 2 });
    expect(res.status).toBe(200);

    await waitFor(() => received.messages.length >= 2);
    expect(received.messages[1]).toEqual({
      channel: "status",
      data: { mode: "mock", streaming: false, symbols: [], intervalSec: 2 },
    });
  });
});
