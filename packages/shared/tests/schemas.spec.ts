import { describe, expect, it } from "vitest";
import {
  ChatMessageReceivedDataSchema,
  EventGridBatchSchema,
  KnowledgeBaseQuerySchema,
  StreamingPacketSchema,
} from "../src/index.js";

describe("shared schemas", () => {
  it("accepts both spellings of a streaming packet", () => {
    expect(StreamingPacketSchema.safeParse({ kind: "AudioData", audioData: { data: "AQID" } }).success).toBe(true);
    expect(StreamingPacketSchema.safeParse({ Kind: "AudioData", AudioData: "AQID" }).success).toBe(true);
    expect(StreamingPacketSchema.safeParse({ kind: "AudioData", audioData: 7 }).success).toBe(false);
  });

  it("keeps unknown Event Grid fields", () => {
    const parsed = EventGridBatchSchema.parse([
      { eventType: "Microsoft.Communication.ChatMessageReceived", data: {}, topic: "acs" },
    ]);

    expect(parsed[0]).toEqual({
      eventType: "Microsoft.Communication.ChatMessageReceived",
      data: {},
      topic: "acs",
    });
  });

  it("allows a chat message event with fields missing", () => {
    expect(ChatMessageReceivedDataSchema.parse({ messageBody: "hi" })).toEqual({ messageBody: "hi" });
  });

  it("requires a question for the knowledge base", () => {
    expect(KnowledgeBaseQuerySchema.safeParse({ question: "" }).success).toBe(false);
    expect(KnowledgeBaseQuerySchema.parse({ question: "What is the answer?" })).toEqual({
      question: "What is the answer?",
    });
  });
});
