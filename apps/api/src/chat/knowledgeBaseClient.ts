import { KnowledgeBaseAnswerSchema, KnowledgeBaseQuerySchema } from "@callbridge/shared";
import { KnowledgeBaseError, errorMessage } from "../utils/errors.js";

export interface KnowledgeBase {
  /** Resolves with the answer text, or null when the backend answered without one. */
  query(question: string): Promise<string | null>;
}

/** REST client for the VoiceRag backend: `POST <base>/query` with `{ question }`. */
export class KnowledgeBaseClient implements KnowledgeBase {
  private readonly queryUrl: string;

  constructor(baseUrl: string, private readonly timeoutMs: number = 30000) {
    const base = baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
    this.queryUrl = new URL("query", base).toString();
  }

  get url(): string {
    return this.queryUrl;
  }

  async query(question: string): Promise<string | null> {
    const request = KnowledgeBaseQuerySchema.safeParse({ question });
    if (!request.success) {
      throw new KnowledgeBaseError("Knowledge base question must not be empty");
    }

    let response: Response;
    try {
      response = await fetch(this.queryUrl, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(request.data),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new KnowledgeBaseError(`Knowledge base request failed: ${errorMessage(error)}`, undefined, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new KnowledgeBaseError(`Knowledge base returned ${response.status}`, response.status);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new KnowledgeBaseError("Knowledge base returned invalid JSON", response.status, { cause: error });
    }

    const parsed = KnowledgeBaseAnswerSchema.safeParse(body);
    if (!parsed.success) {
      throw new KnowledgeBaseError("Knowledge base returned an unexpected body", response.status);
    }
    return parsed.data.answer ?? null;
  }
}
