import { afterEach, describe, expect, it, vi } from "vitest";
import { KnowledgeBaseClient } from "../src/chat/knowledgeBaseClient.js";
import { KnowledgeBaseError } from "../src/utils/errors.js";
import { hangingFetch } from "./helpers.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("KnowledgeBaseClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it.each([
    ["http://localhost:8765", "http://localhost:8765/query"],
    ["http://localhost:8765/", "http://localhost:8765/query"],
    ["https://kb.example.test/rag", "https://kb.example.test/rag/query"],
  ])("resolves the query endpoint under %s", (base, expected) => {
    expect(new KnowledgeBaseClient(base).url).toBe(expected);
  });

  it("posts the question and returns the answer", async () => {
    const fetchMock = vi.fn().mockResolvedValue(jsonResponse({ answer: "42" }));
    vi.stubGlobal("fetch", fetchMock);

    const answer = await new KnowledgeBaseClient("http://localhost:8765/").query("What is the answer?");

    expect(answer).toBe("42");
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://localhost:8765/query");
    expect(init.method).toBe("POST");
    expect(init.headers).toEqual({ "Content-Type": "application/json" });
    expect(init.body).toBe('{"question":"What is the answer?"}');
    expect(init.signal).toBeInstanceOf(AbortSignal);
  });

  it("returns null when the body has no answer", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(jsonResponse({})));

    await expect(new KnowledgeBaseClient("http://kb").query("hi")).resolves.toBeNull();
  });

  it("fails with the status on a non-success response", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(jsonResponse({ error: "down" }, 503)));

    const error = await new KnowledgeBaseClient("http://kb").query("hi").catch((err: unknown) => err);

    expect(error).toBeInstanceOf(KnowledgeBaseError);
    expect(error).toMatchObject({ status: 503, message: "Knowledge base returned 503" });
  });

  it("fails without a status on a network error", async () => {
    vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new TypeError("fetch failed")));

    const error = await new KnowledgeBaseClient("http://kb").query("hi").catch((err: unknown) => err);

    expect(error).toBeInstanceOf(KnowledgeBaseError);
    expect(error).toMatchObject({
      status: undefined,
      message: "Knowledge base request failed: fetch failed",
    });
  });

  it("fails on a body that is not JSON", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response("<html>", { status: 200 })));

    await expect(new KnowledgeBaseClient("http://kb").query("hi")).rejects.toThrow(
      "Knowledge base returned invalid JSON"
    );
  });

  it("fails on an answer that is not a string", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(jsonResponse({ answer: 42 })));

    await expect(new KnowledgeBaseClient("http://kb").query("hi")).rejects.toThrow(
      "Knowledge base returned an unexpected body"
    );
  });

  it("refuses an empty question without calling the backend", async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);

    await expect(new KnowledgeBaseClient("http://kb").query("")).rejects.toBeInstanceOf(KnowledgeBaseError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("gives up when the backend does not answer within the timeout", async () => {
    vi.stubGlobal("fetch", hangingFetch);

    const error = await new KnowledgeBaseClient("http://kb", 50).query("hi").catch((err: unknown) => err);

    expect(error).toBeInstanceOf(KnowledgeBaseError);
    expect(error).toMatchObject({ status: undefined });
  });
});
