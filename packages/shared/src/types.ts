// Shared TypeScript types

export type CallState = "connecting" | "streaming" | "closing" | "closed";

export type LegName = "telephony" | "voice";

export type CloseReason =
  | "telephony-closed"
  | "stop-audio"
  | "voice-closed"
  | "voice-failed"
  | "telephony-failed"
  | "shutdown";

// Telephony envelopes

export interface AudioDataEnvelope {
  kind: "AudioData";
  data: Buffer;
  silent: boolean;
}

export interface StopAudioEnvelope {
  kind: "StopAudio";
}

export interface KeepAliveEnvelope {
  kind: "KeepAlive";
}

export interface OtherEnvelope {
  kind: "Other";
  raw: string;
}

export type StreamingEnvelope =
  | AudioDataEnvelope
  | StopAudioEnvelope
  | KeepAliveEnvelope
  | OtherEnvelope;

export type OutboundEnvelope = AudioDataEnvelope | StopAudioEnvelope;

// Realtime events

export type AudioFormat = "pcm16";

export type Modality = "text" | "audio";

export interface SessionConfig {
  modalities: Modality[];
  instructions: string;
  tool_choice: "auto";
  input_audio_format: AudioFormat;
  output_audio_format: AudioFormat;
}

export interface SessionUpdateEvent {
  type: "session.update";
  session: SessionConfig;
}

export interface InputAudioAppendEvent {
  type: "input_audio_buffer.append";
  audio: Buffer;
}

export type RealtimeClientEvent = SessionUpdateEvent | InputAudioAppendEvent;

export interface AudioDeltaEvent {
  type: "response.audio.delta";
  audio: Buffer;
}

export interface TranscriptDeltaEvent {
  type: "response.audio_transcript.delta";
  text: string;
}

export interface RealtimeErrorEvent {
  type: "error";
  raw: string;
}

export interface OtherRealtimeEvent {
  type: "other";
  eventType?: string;
  raw: string;
}

export type RealtimeServerEvent =
  | AudioDeltaEvent
  | TranscriptDeltaEvent
  | RealtimeErrorEvent
  | OtherRealtimeEvent;

// Chat bridge

export type ChatOutcome = "skipped" | "duplicate" | "answered" | "fallback" | "failed";

export interface ChatMessage {
  threadId: string;
  messageId: string;
  senderId: string;
  text: string;
}
