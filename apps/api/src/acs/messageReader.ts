import WebSocket, { type RawData } from "ws";

/** Joins the fragments ws hands over for one logical message and decodes them as UTF-8. */
export function rawDataToText(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}

/**
 * Buffers the messages of one socket and hands them out as an async
 * iterable. Listeners are attached in the constructor so nothing that
 * arrives between the upgrade and the first read is lost.
 *
 * Iteration ends when the peer closes or the signal aborts, and throws when
 * the socket emits an error.
 */
export class MessageReader implements AsyncIterable<string> {
  private readonly queue: string[] = [];
  private ended = false;
  private failure: Error | null = null;
  private wake: (() => void) | null = null;

  constructor(private readonly socket: WebSocket, private readonly signal: AbortSignal) {
    socket.on("message", this.onMessage);
    socket.on("close", this.onClose);
    socket.on("error", this.onError);
    signal.addEventListener("abort", this.notify, { once: true });
    if (socket.readyState === WebSocket.CLOSED) this.ended = true;
  }

  get peerClosed(): boolean {
    return this.ended;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<string> {
    try {
      while (!this.signal.aborted) {
        if (this.failure) throw this.failure;

        const next = this.queue.shift();
        if (next !== undefined) {
          yield next;
          continue;
        }

        if (this.ended) return;
        await new Promise<void>((resolve) => {
          this.wake = resolve;
        });
      }
    } finally {
      this.dispose();
    }
  }

  dispose() {
    this.socket.off("message", this.onMessage);
    this.socket.off("close", this.onClose);
    this.socket.off("error", this.onError);
    this.signal.removeEventListener("abort", this.notify);
    this.notify();
  }

  private readonly notify = () => {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  };

  private readonly onMessage = (data: RawData, isBinary: boolean) => {
    if (isBinary) return;
    this.queue.push(rawDataToText(data));
    this.notify();
  };

  private readonly onClose = () => {
    this.ended = true;
    this.notify();
  };

  private readonly onError = (error: Error) => {
    this.failure = error;
    this.notify();
  };
}

export function isOpen(socket: WebSocket | null): socket is WebSocket {
  return socket !== null && socket.readyState === WebSocket.OPEN;
}
