import { randomUUID } from "node:crypto";
import type WebSocket from "ws";
import type { CallState, CloseReason } from "@callbridge/shared";
import type { AudioPacerOptions } from "./audioPacer.js";
import { MediaStreamTransport } from "./mediaStreamTransport.js";
import type { LegOutcome, SessionObserver, SessionSummary } from "./types.js";
import { VoiceRagTransport } from "./voiceRagTransport.js";
import { createLogger, type Logger } from "../utils/logger.js";

export interface VoiceRagSettings {
  url: string;
  instructions: string;
  connectTimeoutMs: number;
}

export interface MediaRelaySessionOptions {
  voiceRag: VoiceRagSettings;
  logger: Logger;
  pacer?: AudioPacerOptions;
  observer?: SessionObserver;
}

function closeReasonFor(outcome: LegOutcome): CloseReason {
  if (outcome.reason === "cancelled") return "shutdown";
  if (outcome.leg === "telephony") {
    if (outcome.reason === "stopped") return "stop-audio";
    return outcome.reason === "failed" ? "telephony-failed" : "telephony-closed";
  }
  return outcome.reason === "failed" ? "voice-failed" : "voice-closed";
}

/**
 * One call: the accepted media WebSocket bridged to its own VoiceRag
 * connection. Both legs share one AbortController; whichever leg ends
 * first takes the other one down with it.
 */
export class MediaRelaySession {
  readonly id: string = randomUUID();

  private state: CallState = "connecting";
  private readonly controller = new AbortController();
  private readonly logger: Logger;
  private readonly telephony: MediaStreamTransport;
  private readonly voice: VoiceRagTransport;
  private readonly startedAt = Date.now();
  private readonly transcript: string[] = [];
  private legs: Promise<LegOutcome>[] = [];
  private closing: Promise<void> | null = null;
  private closeReason: CloseReason = "shutdown";

  constructor(socket: WebSocket, private readonly options: MediaRelaySessionOptions) {
    this.logger = createLogger({ service: "MediaRelaySession", sessionId: this.id }, options.logger);
    this.telephony = new MediaStreamTransport(socket, this.controller.signal, this.logger);
    this.voice = new VoiceRagTransport(this.telephony, {
      ...options.voiceRag,
      logger: this.logger,
      pacer: options.pacer,
      observer: {
        transcript: (text) => {
          this.transcript.push(text);
          options.observer?.transcript?.(this.id, text);
        },
        upstreamError: (raw) => options.observer?.upstreamError?.(this.id, raw),
      },
    });
  }

  getState(): CallState {
    return this.state;
  }

  /**
   * Runs both legs until the session is closed. Resolves with a summary
   * once both sockets are released; never rejects.
   */
  async run(): Promise<SessionSummary> {
    if (this.state !== "connecting") {
      await this.close();
      return this.summary();
    }

    this.setState("streaming");
    this.legs = [this.telephony.run(this.voice), this.voice.run(this.controller.signal)];

    const first = await Promise.race(this.legs);
    await this.close(closeReasonFor(first));
    return this.summary();
  }

  /** Idempotent: every caller gets the same shutdown. */
  close(reason: CloseReason = "shutdown"): Promise<void> {
    if (!this.closing) {
      this.closeReason = reason;
      this.closing = this.shutdown();
    }
    return this.closing;
  }

  private async shutdown() {
    this.setState("closing");
    this.controller.abort();

    const outcomes = await Promise.all(this.legs);
    for (const outcome of outcomes) {
      if (outcome.error) {
        this.logger.warn({ leg: outcome.leg, err: outcome.error }, "Leg ended with an error");
      }
    }

    this.telephony.close();
    this.voice.close();
    this.setState("closed");

    this.logger.info(
      { reason: this.closeReason, durationMs: Date.now() - this.startedAt },
      "Media relay session closed"
    );
  }

  private setState(state: CallState) {
    this.state = state;
    this.logger.debug({ state }, "Session state changed");
    this.options.observer?.stateChange?.(this.id, state);
  }

  private summary(): SessionSummary {
    return {
      id: this.id,
      reason: this.closeReason,
      durationMs: Date.now() - this.startedAt,
      framesForwarded: this.telephony.framesForwarded,
      framesPlayed: this.voice.framesPlayed,
      transcript: this.transcript.join(""),
    };
  }
}
