import { setTimeout as sleep } from "node:timers/promises";

export const SAMPLE_RATE = 24000;
export const FRAME_SECONDS = 0.02;
export const BYTES_PER_SAMPLE = 2;

// 24000 * 0.02 * 2 = 960 bytes of PCM16 mono per 20 ms frame
export const FRAME_BYTES = SAMPLE_RATE * FRAME_SECONDS * BYTES_PER_SAMPLE;

// Must stay below the 20 ms frame length or playback underruns on the media side.
export const PACING_DELAY_MS = 18;

export interface AudioFrameSink {
  sendAudio(frame: Buffer): void;
}

export type Delay = (ms: number, signal: AbortSignal) => Promise<void>;

const abortableDelay: Delay = async (ms, signal) => {
  await sleep(ms, undefined, { signal });
};

export function chunkAudio(payload: Buffer, frameBytes: number = FRAME_BYTES): Buffer[] {
  const frames: Buffer[] = [];
  for (let offset = 0; offset < payload.length; offset += frameBytes) {
    frames.push(payload.subarray(offset, Math.min(offset + frameBytes, payload.length)));
  }
  return frames;
}

export interface AudioPacerOptions {
  frameBytes?: number;
  delayMs?: number;
  delay?: Delay;
}

/**
 * Slices bursts from the AI endpoint into fixed frames and feeds them to the
 * sink at (slightly faster than) real time.
 */
export class AudioPacer {
  private readonly frameBytes: number;
  private readonly delayMs: number;
  private readonly delay: Delay;

  constructor(private readonly sink: AudioFrameSink, options: AudioPacerOptions = {}) {
    this.frameBytes = options.frameBytes ?? FRAME_BYTES;
    this.delayMs = options.delayMs ?? PACING_DELAY_MS;
    this.delay = options.delay ?? abortableDelay;
  }

  /**
   * Plays one burst and resolves with the number of frames sent. Once the
   * signal aborts the rest of the burst is dropped.
   */
  async play(payload: Buffer, signal: AbortSignal): Promise<number> {
    let sent = 0;
    for (const frame of chunkAudio(payload, this.frameBytes)) {
      if (signal.aborted) break;
      this.sink.sendAudio(frame);
      sent++;
      try {
        await this.delay(this.delayMs, signal);
      } catch (error) {
        if (signal.aborted) break;
        throw error;
      }
    }
    return sent;
  }
}
