import {
  AudioDeltaEventSchema,
  RealtimeEventBaseSchema,
  TranscriptDeltaEventSchema,
} from "@callbridge/shared";
import type {
  RealtimeClientEvent,
  RealtimeServerEvent,
  SessionUpdateEvent,
} from "@callbridge/shared";
import type { Logger } from "../utils/logger.js";

export function buildSessionUpdate(instructions: string): SessionUpdateEvent {
  return {
    type: "session.update",
    session: {
      modalities: ["text", "audio"],
      instructions,
      tool_choice: "auto",
      input_audio_format: "pcm16",
      output_audio_format: "pcm16",
    },
  };
}

export function serializeRealtimeEvent(event: RealtimeClientEvent): string {
  switch (event.type) {
    case "session.update":
      return JSON.stringify({ type: event.type, session: event.session });
    case "input_audio_buffer.append":
      return JSON.stringify({ type: event.type, audio: event.audio.toString("base64") });
  }
}

/**
 * Decodes a server event by its `type` discriminator. Unknown types and
 * payloads that do not match the expected shape come back as `other`.
 */
export function parseRealtimeEvent(text: string, logger?: Logger): RealtimeServerEvent {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    logger?.warn({ err: error }, "Failed to parse VoiceRag message");
    return { type: "other", raw: text };
  }

  const base = RealtimeEventBaseSchema.safeParse(json);
  if (!base.success) {
    logger?.debug("VoiceRag message without a type");
    return { type: "other", raw: text };
  }

  switch (base.data.type) {
    case "response.audio.delta": {
      const event = AudioDeltaEventSchema.safeParse(json);
      if (!event.success) break;
      return { type: "response.audio.delta", audio: Buffer.from(event.data.delta, "base64") };
    }
    case "response.audio_transcript.delta": {
      const event = TranscriptDeltaEventSchema.safeParse(json);
      if (!event.success) break;
      return { type: "response.audio_transcript.delta", text: event.data.delta };
    }
    case "error":
      return { type: "error", raw: text };
  }

  return { type: "other", eventType: base.data.type, raw: text };
}
