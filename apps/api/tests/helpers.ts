import { once } from "node:events";
import pino from "pino";
import WebSocket, { WebSocketServer, type RawData } from "ws";
import { rawDataToText } from "../src/acs/messageReader.js";

export const silentLogger = pino({ level: "silent" });

export async function waitUntil(predicate: () => boolean, timeoutMs = 3000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) throw new Error("Timed out waiting for condition");
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

export interface TestServer {
  server: WebSocketServer;
  port: number;
}

export async function startServer(): Promise<TestServer> {
  const server = new WebSocketServer({ host: "127.0.0.1", port: 0 });
  await once(server, "listening");
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("Expected a TCP address");
  return { server, port: address.port };
}

export async function stopServer({ server }: TestServer): Promise<void> {
  for (const client of server.clients) client.terminate();
  await new Promise<void>((resolve) => server.close(() => resolve()));
}

export function collect(socket: WebSocket): string[] {
  const messages: string[] = [];
  socket.on("message", (data: RawData) => {
    messages.push(rawDataToText(data));
  });
  return messages;
}

export function acceptNext(server: WebSocketServer): Promise<{ socket: WebSocket; messages: string[] }> {
  return new Promise((resolve) => {
    server.once("connection", (socket: WebSocket) => {
      resolve({ socket, messages: collect(socket) });
    });
  });
}

export function pcm(length: number): Buffer {
  const data = Buffer.alloc(length);
  for (let i = 0; i < length; i++) data[i] = i % 251;
  return data;
}

// Settles only when the request's signal aborts
export function hangingFetch(_url: string, init: RequestInit): Promise<Response> {
  return new Promise((_resolve, reject) => {
    init.signal?.addEventListener("abort", () => reject(init.signal?.reason), { once: true });
  });
}
