import { describe, expect, it, vi } from "vitest";
import { ensureBotId, type BotIdentityClient } from "../src/chat/chatThreadSender.js";
import { silentLogger } from "./helpers.js";

describe("ensureBotId", () => {
  it("keeps a configured bot id without creating a user", async () => {
    const createUser = vi.fn<BotIdentityClient["createUser"]>();

    await expect(ensureBotId("8:acs:bot", { createUser }, silentLogger)).resolves.toBe("8:acs:bot");
    expect(createUser).not.toHaveBeenCalled();
  });

  it("creates a user when no bot id is configured", async () => {
    const createUser = vi
      .fn<BotIdentityClient["createUser"]>()
      .mockResolvedValue({ communicationUserId: "8:acs:new-bot" });

    await expect(ensureBotId(undefined, { createUser }, silentLogger)).resolves.toBe("8:acs:new-bot");
    expect(createUser).toHaveBeenCalledTimes(1);
  });

  it("resolves undefined when the user cannot be created", async () => {
    const createUser = vi
      .fn<BotIdentityClient["createUser"]>()
      .mockRejectedValue(new Error("401 Unauthorized"));

    await expect(ensureBotId("", { createUser }, silentLogger)).resolves.toBeUndefined();
  });
});
