import type WebSocket from "ws";
import type { StreamingEnvelope } from "@callbridge/shared";
import type { AudioFrameSink } from "./audioPacer.js";
import { MessageReader, isOpen } from "./messageReader.js";
import { audioDataEnvelope, parseStreamingData, serializeStreamingData } from "./streamingData.js";
import type { LegOutcome } from "./types.js";
import { errorMessage } from "../utils/errors.js";
import type { Logger } from "../utils/logger.js";

export interface AudioInput {
  sendAudio(frame: Buffer): void;
}

/**
 * Inbound leg: the media streaming WebSocket accepted from the telephony
 * platform. Caller audio goes to the AI side; paced frames come back in
 * through `sendAudio`.
 */
export class MediaStreamTransport implements AudioFrameSink {
  private readonly reader: MessageReader;
  private _framesForwarded = 0;

  constructor(
    private readonly socket: WebSocket,
    private readonly signal: AbortSignal,
    private readonly logger: Logger
  ) {
    // Attached synchronously: the platform starts streaming right after the upgrade.
    this.reader = new MessageReader(socket, signal);
    socket.on("error", (error: Error) => {
      this.logger.debug({ err: error }, "Media WebSocket error");
    });
  }

  get framesForwarded(): number {
    return this._framesForwarded;
  }

  async run(input: AudioInput): Promise<LegOutcome> {
    try {
      for await (const message of this.reader) {
        const envelope = parseStreamingData(message, this.logger);
        if (this.handleMessage(envelope, input) === "stop") {
          this.logger.info("StopAudio received from media stream");
          return { leg: "telephony", reason: "stopped" };
        }
      }

      if (this.signal.aborted) return { leg: "telephony", reason: "cancelled" };
      this.logger.info("Media WebSocket closed by client");
      return { leg: "telephony", reason: "peer-closed" };
    } catch (error) {
      if (this.signal.aborted) return { leg: "telephony", reason: "cancelled" };
      this.logger.error({ err: error }, "Exception in media WebSocket receiver");
      return {
        leg: "telephony",
        reason: "failed",
        error: error instanceof Error ? error : new Error(errorMessage(error)),
      };
    } finally {
      this.reader.dispose();
    }
  }

  private handleMessage(envelope: StreamingEnvelope, input: AudioInput): "continue" | "stop" {
    switch (envelope.kind) {
      case "AudioData":
        // Silence is not forwarded
        if (envelope.silent) break;
        input.sendAudio(envelope.data);
        this._framesForwarded++;
        break;

      case "StopAudio":
        return "stop";

      case "KeepAlive":
        break;

      case "Other":
        this.logger.trace({ packet: envelope.raw.slice(0, 80) }, "Ignoring media packet");
        break;
    }
    return "continue";
  }

  /** Sends one paced frame back into the call; a no-op once the socket has left the open state. */
  sendAudio(frame: Buffer) {
    if (!isOpen(this.socket)) return;

    this.socket.send(serializeStreamingData(audioDataEnvelope(frame)), (error) => {
      if (error) {
        this.logger.warn({ err: error }, "Failed to send audio to media stream");
      }
    });
  }

  close() {
    this.reader.dispose();
    if (isOpen(this.socket)) {
      this.socket.close(1000, "Stream completed");
    }
  }
}
