import { z } from "zod";

// Media streaming packets (telephony side)

// The platform has shipped both the nested `{ data }` object and a bare base64 string.
export const AudioDataNodeSchema = z.union([
  z.string(),
  z.object({ data: z.string().nullish() }).passthrough(),
]);

export const StreamingPacketSchema = z
  .object({
    kind: z.string().optional(),
    Kind: z.string().optional(),
    audioData: AudioDataNodeSchema.nullish(),
    AudioData: AudioDataNodeSchema.nullish(),
  })
  .passthrough();

// Realtime events (AI side)

export const RealtimeEventBaseSchema = z.object({ type: z.string() }).passthrough();

export const AudioDeltaEventSchema = z.object({
  type: z.literal("response.audio.delta"),
  delta: z.string(),
});

export const TranscriptDeltaEventSchema = z.object({
  type: z.literal("response.audio_transcript.delta"),
  delta: z.string(),
});

// Event Grid (chat notifications)

export const EventGridEventSchema = z
  .object({
    id: z.string().optional(),
    eventType: z.string(),
    subject: z.string().optional(),
    data: z.unknown(),
  })
  .passthrough();

export const EventGridBatchSchema = z.array(EventGridEventSchema);

export const SubscriptionValidationDataSchema = z.object({
  validationCode: z.string(),
});

export const ChatMessageReceivedDataSchema = z
  .object({
    threadId: z.string().nullish(),
    messageId: z.string().nullish(),
    messageBody: z.string().nullish(),
    senderCommunicationIdentifier: z
      .object({ rawId: z.string().nullish() })
      .passthrough()
      .nullish(),
  })
  .passthrough();

// Knowledge-base REST contract

export const KnowledgeBaseQuerySchema = z.object({
  question: z.string().min(1),
});

export const KnowledgeBaseAnswerSchema = z
  .object({
    answer: z.string().nullish(),
  })
  .passthrough();
