export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`);
    this.name = "ConfigError";
  }
}

export class VoiceRagConnectError extends Error {
  constructor(readonly url: string, options?: { cause?: unknown }) {
    super(`Could not connect to VoiceRag at ${url}`, options);
    this.name = "VoiceRagConnectError";
  }
}

/** Thrown by the knowledge-base client; `status` is absent for network failures and timeouts. */
export class KnowledgeBaseError extends Error {
  constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "KnowledgeBaseError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
