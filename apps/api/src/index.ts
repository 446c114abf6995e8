import { CommunicationIdentityClient } from "@azure/communication-identity";
import dotenv from "dotenv";
import { ChatBridge } from "./chat/chatBridge.js";
import {
  AcsChatThreadSender,
  LoggingChatThreadSender,
  ensureBotId,
  type ChatThreadSender,
} from "./chat/chatThreadSender.js";
import { MessageDedupStore } from "./chat/dedupStore.js";
import { KnowledgeBaseClient } from "./chat/knowledgeBaseClient.js";
import { loadConfig, type Env } from "./config/env.js";
import { buildServer } from "./server.js";
import { ConfigError } from "./utils/errors.js";
import { createLogger, logger } from "./utils/logger.js";

// Load environment variables
dotenv.config();

function readConfig(): Env {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.fatal({ issues: error.issues }, "❌ Environment validation failed");
      process.exit(1);
    }
    throw error;
  }
}

const config = readConfig();

logger.level = config.LOG_LEVEL;

let botId = config.ACS_BOT_ID;
let sender: ChatThreadSender;
if (config.ACS_CONNECTION_STRING) {
  const senderLogger = createLogger({ service: "ChatThreadSender" });
  botId = await ensureBotId(botId, new CommunicationIdentityClient(config.ACS_CONNECTION_STRING), senderLogger);
  sender = botId
    ? new AcsChatThreadSender(config.ACS_CONNECTION_STRING, botId, senderLogger)
    : new LoggingChatThreadSender(senderLogger);
} else {
  logger.warn("ACS_CONNECTION_STRING not set; chat replies will only be logged");
  sender = new LoggingChatThreadSender(createLogger({ service: "ChatThreadSender" }));
}

const knowledgeBase = new KnowledgeBaseClient(config.VOICERAG_REST_URL, config.KNOWLEDGE_BASE_TIMEOUT_MS);

const chatBridge = new ChatBridge({
  botId: botId ?? "",
  store: new MessageDedupStore(),
  knowledgeBase,
  sender,
  logger: createLogger({ service: "ChatBridge" }),
});

const fastify = await buildServer({ config, logger, chatBridge });

const start = async () => {
  try {
    await fastify.listen({ port: config.PORT, host: config.HOST });
    logger.info(
      { voiceRag: config.VOICERAG_URL, knowledgeBase: knowledgeBase.url },
      `🚀 Server listening on http://${config.HOST}:${config.PORT}`
    );
    logger.info(`📡 Media WebSocket endpoint: ws://${config.HOST}:${config.PORT}/ws`);
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
};

// Graceful shutdown
const shutdown = async (signal: string) => {
  logger.info({ signal }, "Shutting down");
  await fastify.close();
  process.exit(0);
};

process.on("SIGINT", () => {
  void shutdown("SIGINT");
});

process.on("SIGTERM", () => {
  void shutdown("SIGTERM");
});

await start();
