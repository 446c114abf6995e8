import type { CallState, CloseReason, LegName } from "@callbridge/shared";

export type LegEnd = "peer-closed" | "stopped" | "cancelled" | "failed";

export interface LegOutcome {
  leg: LegName;
  reason: LegEnd;
  error?: Error;
}

export interface SessionObserver {
  stateChange?(sessionId: string, state: CallState): void;
  transcript?(sessionId: string, text: string): void;
  upstreamError?(sessionId: string, raw: string): void;
}

export interface SessionSummary {
  id: string;
  reason: CloseReason;
  durationMs: number;
  framesForwarded: number;
  framesPlayed: number;
  transcript: string;
}
