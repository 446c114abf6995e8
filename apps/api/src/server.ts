import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import websocket from "@fastify/websocket";
import type { AudioPacerOptions } from "./acs/audioPacer.js";
import type { MediaRelaySession } from "./acs/mediaRelaySession.js";
import type { ChatBridge } from "./chat/chatBridge.js";
import type { Env } from "./config/env.js";
import chatEventRoutes from "./routes/chatEvents.js";
import mediaRoutes from "./routes/media.js";
import type { Logger } from "./utils/logger.js";

export interface ServerDependencies {
  config: Env;
  logger: Logger;
  chatBridge: ChatBridge;
  pacer?: AudioPacerOptions;
}

export async function buildServer({ config, logger, chatBridge, pacer }: ServerDependencies): Promise<FastifyInstance> {
  const fastify = Fastify({ logger });
  const sessions = new Set<MediaRelaySession>();

  await fastify.register(cors, {
    origin: config.CORS_ORIGIN ?? true,
  });

  await fastify.register(websocket);

  fastify.setErrorHandler((error, request, reply) => {
    request.log.error({ err: error, path: request.url, method: request.method }, "Unhandled error");
    const statusCode = error.statusCode ?? 500;
    return reply.code(statusCode).send({
      error: statusCode >= 500 ? "Internal server error" : "Bad request",
      message: error.message,
    });
  });

  // Root route - API information
  fastify.get("/", async () => {
    return {
      name: "Call Bridge API",
      version: "1.0.0",
      status: "running",
      timestamp: new Date().toISOString(),
      endpoints: {
        health: "/health",
        chatEvents: "/api/chatEvents",
        websocket: "/ws",
      },
    };
  });

  // Health check
  fastify.get("/health", async () => {
    return { status: "ok", timestamp: new Date().toISOString(), activeSessions: sessions.size };
  });

  await fastify.register(mediaRoutes, {
    sessions,
    pacer,
    voiceRag: {
      url: config.VOICERAG_URL,
      instructions: config.VOICERAG_INSTRUCTIONS,
      connectTimeoutMs: config.VOICERAG_CONNECT_TIMEOUT_MS,
    },
  });
  await fastify.register(chatEventRoutes, { prefix: "/api", chatBridge });

  return fastify;
}
