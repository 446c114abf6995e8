import { StreamingPacketSchema } from "@callbridge/shared";
import type { OutboundEnvelope, StreamingEnvelope } from "@callbridge/shared";
import type { z } from "zod";
import type { Logger } from "../utils/logger.js";

type AudioDataNode = z.infer<typeof StreamingPacketSchema>["audioData"];

function audioPayload(node: AudioDataNode): string {
  if (typeof node === "string") return node;
  return node?.data ?? "";
}

/**
 * Decodes one media streaming packet. Never throws: anything that is not
 * recognisable JSON comes back as `Other` so the receive loop can drop it.
 */
export function parseStreamingData(text: string, logger?: Logger): StreamingEnvelope {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    logger?.debug({ err: error }, "Dropping malformed media packet");
    return { kind: "Other", raw: text };
  }

  const packet = StreamingPacketSchema.safeParse(json);
  if (!packet.success) {
    logger?.debug({ issues: packet.error.issues }, "Dropping media packet with unexpected schema");
    return { kind: "Other", raw: text };
  }

  const kind = packet.data.kind ?? packet.data.Kind;
  switch (kind) {
    case "AudioData": {
      const data = Buffer.from(audioPayload(packet.data.audioData ?? packet.data.AudioData), "base64");
      return { kind: "AudioData", data, silent: data.length === 0 };
    }
    case "StopAudio":
      return { kind: "StopAudio" };
    case "KeepAlive":
      return { kind: "KeepAlive" };
    default:
      return { kind: "Other", raw: text };
  }
}

export function serializeStreamingData(envelope: OutboundEnvelope): string {
  if (envelope.kind === "StopAudio") {
    return JSON.stringify({ kind: "StopAudio" });
  }
  return JSON.stringify({
    kind: "AudioData",
    audioData: {
      data: envelope.data.toString("base64"),
    },
  });
}

export function audioDataEnvelope(data: Buffer): OutboundEnvelope {
  return { kind: "AudioData", data, silent: data.length === 0 };
}
