import type { ChatOutcome } from "@callbridge/shared";
import type { ChatThreadSender } from "./chatThreadSender.js";
import type { MessageDedupStore } from "./dedupStore.js";
import type { KnowledgeBase } from "./knowledgeBaseClient.js";
import type { Logger } from "../utils/logger.js";

export const EMPTY_ANSWER_REPLY = "I received an empty response from the knowledge base.";
export const BACKEND_FAILURE_REPLY =
  "Sorry, I'm having trouble connecting to my knowledge base right now.";

export interface ChatBridgeOptions {
  botId: string;
  store: MessageDedupStore;
  knowledgeBase: KnowledgeBase;
  sender: ChatThreadSender;
  logger: Logger;
}

/**
 * Answers chat messages from the knowledge base, at most once per message
 * id. Event Grid may notify the same message more than once.
 */
export class ChatBridge {
  constructor(private readonly options: ChatBridgeOptions) {
    options.store.evictExpired();
  }

  /** Never rejects; the outcome says what happened to the message. */
  async handle(threadId: string, messageId: string, senderId: string, text: string): Promise<ChatOutcome> {
    const { botId, store, knowledgeBase, sender, logger } = this.options;
    const log = logger.child({ threadId, messageId, senderId });

    log.info("📨 Chat message event");

    if (!text) {
      log.info("⏭️ Skipping empty message");
      return "skipped";
    }

    // Our own replies come back through the same event subscription
    if (botId && senderId === botId) {
      log.info("⏭️ Skipping bot's own message");
      return "skipped";
    }

    if (!store.claim(messageId)) {
      log.warn("⚠️ Ignoring duplicate message");
      return "duplicate";
    }

    log.info({ text }, "💬 Processing message");

    let reply: string;
    let outcome: ChatOutcome;
    try {
      const answer = await knowledgeBase.query(text);
      reply = answer || EMPTY_ANSWER_REPLY;
      outcome = "answered";
    } catch (error) {
      log.error({ err: error }, "❌ Knowledge base query failed");
      reply = BACKEND_FAILURE_REPLY;
      outcome = "fallback";
    }

    try {
      await sender.sendMessage(threadId, reply);
      log.info({ outcome }, "✅ Responded to chat message");
      return outcome;
    } catch (error) {
      log.error({ err: error }, "❌ Failed to send chat reply");
      return "failed";
    }
  }
}
