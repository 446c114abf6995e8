import WebSocket from "ws";
import type { RealtimeClientEvent, RealtimeServerEvent } from "@callbridge/shared";
import { AudioPacer, type AudioFrameSink, type AudioPacerOptions } from "./audioPacer.js";
import { MessageReader, isOpen } from "./messageReader.js";
import { buildSessionUpdate, parseRealtimeEvent, serializeRealtimeEvent } from "./realtimeEvents.js";
import type { LegOutcome } from "./types.js";
import { VoiceRagConnectError, errorMessage } from "../utils/errors.js";
import type { Logger } from "../utils/logger.js";

export interface VoiceRagObserver {
  transcript?(text: string): void;
  upstreamError?(raw: string): void;
}

export interface VoiceRagTransportOptions {
  url: string;
  instructions: string;
  connectTimeoutMs: number;
  logger: Logger;
  pacer?: AudioPacerOptions;
  observer?: VoiceRagObserver;
}

/**
 * Outbound leg: owns the WebSocket to the VoiceRag realtime endpoint and
 * plays the audio it produces into the call through the pacer.
 */
export class VoiceRagTransport {
  private socket: WebSocket | null = null;
  private readonly pacer: AudioPacer;
  private readonly logger: Logger;
  private _framesPlayed = 0;

  constructor(playback: AudioFrameSink, private readonly options: VoiceRagTransportOptions) {
    this.pacer = new AudioPacer(playback, options.pacer);
    this.logger = options.logger;
  }

  get framesPlayed(): number {
    return this._framesPlayed;
  }

  /**
   * Connects, configures the session and runs the receive loop until the
   * peer closes, the signal aborts or something fails. Never rejects.
   */
  async run(signal: AbortSignal): Promise<LegOutcome> {
    let reader: MessageReader | null = null;

    try {
      this.logger.info({ url: this.options.url }, "Connecting to VoiceRag...");
      const socket = new WebSocket(this.options.url);
      this.socket = socket;
      socket.on("error", (error: Error) => {
        this.logger.debug({ err: error }, "VoiceRag WebSocket error");
      });
      reader = new MessageReader(socket, signal);

      await this.waitForOpen(socket, signal);
      this.logger.info({ url: this.options.url }, "✅ Connected to VoiceRag");
      this.send(buildSessionUpdate(this.options.instructions));

      for await (const message of reader) {
        await this.handleMessage(parseRealtimeEvent(message, this.logger), signal);
      }

      if (signal.aborted) return { leg: "voice", reason: "cancelled" };
      this.logger.info("VoiceRag WebSocket closed by peer");
      return { leg: "voice", reason: "peer-closed" };
    } catch (error) {
      if (signal.aborted) return { leg: "voice", reason: "cancelled" };
      this.logger.error({ err: error }, "❌ VoiceRag WebSocket error");
      return {
        leg: "voice",
        reason: "failed",
        error: error instanceof Error ? error : new Error(errorMessage(error)),
      };
    } finally {
      reader?.dispose();
    }
  }

  private async handleMessage(event: RealtimeServerEvent, signal: AbortSignal) {
    switch (event.type) {
      case "response.audio.delta":
        this._framesPlayed += await this.pacer.play(event.audio, signal);
        break;

      case "response.audio_transcript.delta":
        this.logger.info({ transcript: event.text }, "🤖 Bot transcript");
        this.options.observer?.transcript?.(event.text);
        break;

      case "error":
        this.logger.error({ event: event.raw }, "❌ VoiceRag error event");
        this.options.observer?.upstreamError?.(event.raw);
        break;

      case "other":
        this.logger.debug({ eventType: event.eventType }, "Ignoring VoiceRag event");
        break;
    }
  }

  /** Appends caller audio to the input buffer; a no-op unless the socket is open. */
  sendAudio(frame: Buffer) {
    this.send({ type: "input_audio_buffer.append", audio: frame });
  }

  close() {
    const socket = this.socket;
    if (!socket) return;

    if (socket.readyState === WebSocket.OPEN) {
      socket.close(1000, "Session ended");
    } else if (socket.readyState === WebSocket.CONNECTING) {
      socket.terminate();
    }
  }

  private send(event: RealtimeClientEvent) {
    if (!isOpen(this.socket)) return;

    this.socket.send(serializeRealtimeEvent(event), (error) => {
      if (error) {
        this.logger.warn({ err: error, type: event.type }, "Failed to send to VoiceRag");
      }
    });
  }

  private waitForOpen(socket: WebSocket, signal: AbortSignal): Promise<void> {
    const url = this.options.url;

    return new Promise<void>((resolve, reject) => {
      const timeout = setTimeout(() => {
        cleanup();
        reject(new VoiceRagConnectError(url, { cause: new Error("Connection timeout") }));
      }, this.options.connectTimeoutMs);

      const openHandler = () => {
        cleanup();
        resolve();
      };

      const errorHandler = (error: Error) => {
        cleanup();
        reject(new VoiceRagConnectError(url, { cause: error }));
      };

      const closeHandler = () => {
        cleanup();
        reject(new VoiceRagConnectError(url, { cause: new Error("Closed during handshake") }));
      };

      const abortHandler = () => {
        cleanup();
        reject(new VoiceRagConnectError(url, { cause: signal.reason }));
      };

      const cleanup = () => {
        clearTimeout(timeout);
        socket.off("open", openHandler);
        socket.off("error", errorHandler);
        socket.off("close", closeHandler);
        signal.removeEventListener("abort", abortHandler);
      };

      if (signal.aborted) {
        abortHandler();
        return;
      }

      socket.on("open", openHandler);
      socket.on("error", errorHandler);
      socket.on("close", closeHandler);
      signal.addEventListener("abort", abortHandler, { once: true });
    });
  }
}
