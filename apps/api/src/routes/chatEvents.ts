import { FastifyPluginAsync } from "fastify";
import {
  ChatMessageReceivedDataSchema,
  EventGridBatchSchema,
  SubscriptionValidationDataSchema,
} from "@callbridge/shared";
import type { ChatBridge } from "../chat/chatBridge.js";

export const SUBSCRIPTION_VALIDATION_EVENT = "Microsoft.EventGrid.SubscriptionValidationEvent";
export const CHAT_MESSAGE_RECEIVED_EVENT = "Microsoft.Communication.ChatMessageReceived";

export interface ChatEventRoutesOptions {
  chatBridge: ChatBridge;
}

const chatEventRoutes: FastifyPluginAsync<ChatEventRoutesOptions> = async (fastify, { chatBridge }) => {
  // Event Grid webhook for ACS chat events
  fastify.post("/chatEvents", async (request, reply) => {
    const batch = EventGridBatchSchema.safeParse(request.body);
    if (!batch.success) {
      return reply.code(400).send({ error: "Invalid Event Grid payload" });
    }

    for (const event of batch.data) {
      if (event.eventType === SUBSCRIPTION_VALIDATION_EVENT) {
        const data = SubscriptionValidationDataSchema.safeParse(event.data);
        if (data.success) {
          fastify.log.info("Event Grid subscription validation");
          return { validationResponse: data.data.validationCode };
        }
        continue;
      }

      if (event.eventType !== CHAT_MESSAGE_RECEIVED_EVENT) continue;

      const data = ChatMessageReceivedDataSchema.safeParse(event.data);
      if (!data.success) {
        fastify.log.warn({ eventId: event.id }, "Malformed ChatMessageReceived event");
        continue;
      }

      const threadId = data.data.threadId ?? "";
      const messageId = data.data.messageId ?? "";
      const senderId = data.data.senderCommunicationIdentifier?.rawId ?? "";
      const messageBody = data.data.messageBody ?? "";

      fastify.log.info({ threadId, messageId, senderId }, "🔔 Event Grid: MessageReceived");

      if (!messageBody || !threadId) {
        fastify.log.info("⏭️ Skipping empty message or invalid thread");
        continue;
      }

      await chatBridge.handle(threadId, messageId, senderId, messageBody);
    }

    return { received: true };
  });
};

export default chatEventRoutes;
