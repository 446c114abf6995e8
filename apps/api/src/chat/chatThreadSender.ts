import { ChatClient } from "@azure/communication-chat";
import { AzureCommunicationTokenCredential, parseConnectionString } from "@azure/communication-common";
import { CommunicationIdentityClient } from "@azure/communication-identity";
import type { Logger } from "../utils/logger.js";

export interface ChatThreadSender {
  sendMessage(threadId: string, content: string): Promise<void>;
}

/**
 * Posts replies into Azure Communication Services chat threads as the bot
 * user. The chat client is built on first use; its token credential
 * refreshes itself through the identity client.
 */
export class AcsChatThreadSender implements ChatThreadSender {
  private chatClient: ChatClient | null = null;

  constructor(
    private readonly connectionString: string,
    private readonly botId: string,
    private readonly logger: Logger
  ) {}

  async sendMessage(threadId: string, content: string): Promise<void> {
    const client = this.ensureChatClient();
    await client.getChatThreadClient(threadId).sendMessage({ content });
  }

  private ensureChatClient(): ChatClient {
    if (this.chatClient) return this.chatClient;

    const { endpoint } = parseConnectionString(this.connectionString);
    const identityClient = new CommunicationIdentityClient(this.connectionString);
    const credential = new AzureCommunicationTokenCredential({
      tokenRefresher: async () => {
        const { token } = await identityClient.getToken({ communicationUserId: this.botId }, ["chat"]);
        return token;
      },
      refreshProactively: true,
    });

    this.chatClient = new ChatClient(endpoint, credential);
    this.logger.info({ botId: this.botId }, "✅ ChatClient initialized");
    return this.chatClient;
  }
}

export interface BotIdentityClient {
  createUser(): Promise<{ communicationUserId: string }>;
}

/**
 * Returns the configured bot id, or creates a new ACS user to act as the bot.
 * Resolves undefined when no id is configured and creating one fails.
 */
export async function ensureBotId(
  configured: string | undefined,
  identityClient: BotIdentityClient,
  logger: Logger
): Promise<string | undefined> {
  if (configured) return configured;

  try {
    const { communicationUserId } = await identityClient.createUser();
    logger.info({ botId: communicationUserId }, "🆕 Created new bot id");
    logger.warn(`Add this to your .env file: ACS_BOT_ID=${communicationUserId}`);
    return communicationUserId;
  } catch (error) {
    logger.warn({ err: error }, "⚠️ Could not auto-generate bot id");
    return undefined;
  }
}

/** Stand-in used when no ACS connection is configured: replies only reach the log. */
export class LoggingChatThreadSender implements ChatThreadSender {
  constructor(private readonly logger: Logger) {}

  async sendMessage(threadId: string, content: string): Promise<void> {
    this.logger.warn({ threadId, content }, "ACS chat not configured; reply not delivered");
  }
}
