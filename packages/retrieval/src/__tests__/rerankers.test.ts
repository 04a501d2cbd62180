/**
 * Reranker Tests
 *
 * Degradation policy, score normalization and the request shape of each
 * hosted backend.
 */

import { ConfigurationError, err, type FetchFn, isErr, isOk, ok } from "@ragline/ai-core";
import { describe, expect, it, vi } from "vitest";
import {
  BaseReranker,
  type BaseRerankerOptions,
  type ScoreOutcome,
} from "../rerankers/baseReranker";
import { CohereReranker, JinaColbertReranker, JinaReranker } from "../rerankers/hostedRerankers";
import { OpenAIReranker, OpenRouterReranker, parseRankings } from "../rerankers/llmReranker";
import { lexicalLogit, LocalReranker } from "../rerankers/localReranker";
import { classifyFailure, normalizeByMax, sigmoid } from "../rerankers/scoring";
import { createSearchResult, type SearchResult } from "../types";

function docs(...contents: string[]): SearchResult[] {
  return contents.map((content, index) =>
    createSearchResult(`d${index + 1}`, content, 1 - index * 0.1)
  );
}

class ScriptedReranker extends BaseReranker {
  readonly name = "scripted";

  constructor(
    private readonly scorer: (documents: readonly SearchResult[]) => Promise<ScoreOutcome>,
    options: BaseRerankerOptions = {}
  ) {
    super("scripted-reranker", options);
  }

  protected scoreDocuments(_query: string, documents: readonly SearchResult[]) {
    return this.scorer(documents);
  }
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("scoring helpers", () => {
  it("squashes logits with the logistic function", () => {
    expect(sigmoid(0)).toBe(0.5);
    expect(sigmoid(2)).toBeCloseTo(1 / (1 + Math.exp(-2)), 12);
  });

  it("normalizes by the batch maximum only above 1", () => {
    expect(normalizeByMax([12, 6, 0])).toEqual([1, 0.5, 0]);
    expect(normalizeByMax([0.4, 0.2])).toEqual([0.4, 0.2]);
  });

  it("classifies thrown errors", () => {
    expect(classifyFailure(new Error("Jina API error (401): denied")).kind).toBe("auth_failed");
    expect(classifyFailure(new Error("Cohere API error (503): busy")).kind).toBe("http_error");
    expect(classifyFailure(new SyntaxError("Unexpected token")).kind).toBe("malformed_response");
    expect(classifyFailure(new TypeError("fetch failed")).kind).toBe("transport_error");
    const abort = new Error("aborted");
    abort.name = "AbortError";
    expect(classifyFailure(abort).kind).toBe("timeout");
    expect(classifyFailure("boom")).toEqual({ kind: "unknown", message: "boom" });
  });
});

describe("BaseReranker degradation", () => {
  it("returns [] for empty input without counting a request", async () => {
    const reranker = new ScriptedReranker(async () => ok([]));
    expect(await reranker.rerank("q", [])).toEqual([]);
    expect(reranker.getStats().totalRequests).toBe(0);
  });

  it("sorts by score and applies topN on success", async () => {
    const reranker = new ScriptedReranker(async () => ok([0.1, 0.9, 0.5]));
    const results = await reranker.rerank("q", docs("a", "b", "c"), 2);

    expect(results.map((r) => [r.id, r.score])).toEqual([
      ["d2", 0.9],
      ["d3", 0.5],
    ]);
  });

  it("clamps scores into [0, 1] and keeps ties in input order", async () => {
    const reranker = new ScriptedReranker(async () => ok([1.7, -0.2, 1]));
    const results = await reranker.rerank("q", docs("a", "b", "c"));

    expect(results.map((r) => [r.id, r.score])).toEqual([
      ["d1", 1],
      ["d3", 1],
      ["d2", 0],
    ]);
  });

  it("returns the original list when scoring times out", async () => {
    const reranker = new ScriptedReranker(() => new Promise<ScoreOutcome>(() => {}), {
      timeoutMs: 10,
    });
    const input = docs("a", "b");

    const outcome = await reranker.rerankWithOutcome("q", input);
    expect(isErr(outcome) && outcome.error).toEqual({
      kind: "timeout",
      message: "timed out after 10ms",
      reranker: "scripted",
    });
    expect(await reranker.rerank("q", input)).toEqual(input);
  });

  it("returns the original list when scoring throws", async () => {
    const reranker = new ScriptedReranker(async () => {
      throw new Error("model crashed");
    });
    const input = docs("a", "b", "c");

    const outcome = await reranker.rerankWithOutcome("q", input);
    expect(isErr(outcome) && outcome.error.kind).toBe("unknown");
    expect(await reranker.rerank("q", input, 1)).toEqual(input);
  });

  it("treats a misaligned score list as malformed", async () => {
    const reranker = new ScriptedReranker(async () => ok([0.5]));
    const outcome = await reranker.rerankWithOutcome("q", docs("a", "b"));

    expect(isErr(outcome) && outcome.error).toEqual({
      kind: "malformed_response",
      message: "expected 2 scores, got 1",
      reranker: "scripted",
    });
  });

  it("scores at most maxDocuments and keeps the tail with score 0", async () => {
    const scorer = vi.fn(async (documents: readonly SearchResult[]) =>
      ok(documents.map((_, index) => [0.5, 0.6, 0.7][index] ?? 0))
    );
    const reranker = new ScriptedReranker(scorer, { maxDocuments: 3 });
    const input = docs("a", "b", "c", "d", "e");

    const results = await reranker.rerank("q", input);

    expect(scorer.mock.calls[0]?.[0]).toHaveLength(3);
    expect(results.map((r) => r.id)).toEqual(["d3", "d2", "d1", "d4", "d5"]);
    expect(results.map((r) => r.score)).toEqual([0.7, 0.6, 0.5, 0, 0]);
    expect(await reranker.rerank("q", input, 4)).toHaveLength(4);

    const failing = new ScriptedReranker(
      async (): Promise<ScoreOutcome> =>
        err({ kind: "http_error", message: "503", reranker: "scripted" }),
      { maxDocuments: 3 }
    );
    expect(await failing.rerank("q", input)).toEqual(input);
  });

  it("tracks success and failure counts", async () => {
    let calls = 0;
    const reranker = new ScriptedReranker(
      async () => {
        calls++;
        if (calls === 2) {
          throw new Error("flaky");
        }
        return ok([0.3]);
      },
      { timeoutMs: 5000, maxDocuments: 20 }
    );

    await reranker.rerank("q", docs("a"));
    await reranker.rerank("q", docs("a"));
    await reranker.rerank("q", docs("a"));

    expect(reranker.getStats()).toEqual({
      reranker: "scripted",
      totalRequests: 3,
      successfulRequests: 2,
      failedRequests: 1,
      successRate: 66.67,
      config: { timeoutMs: 5000, maxDocuments: 20 },
    });
  });
});

describe("LocalReranker", () => {
  it("scores term overlap with a verbatim bonus", () => {
    expect(lexicalLogit("apple pie", "Apple pie recipe")).toBe(5);
    expect(lexicalLogit("apple pie", "apple crumble")).toBe(0);
    expect(lexicalLogit("apple pie", "car repair")).toBe(-3);
    expect(lexicalLogit("?", "anything")).toBe(-3);
  });

  it("reorders by sigmoid of the cross-encoder logits", async () => {
    const reranker = new LocalReranker();
    const results = await reranker.rerank("apple pie", docs("car repair", "apple pie recipe"));

    expect(results.map((r) => r.id)).toEqual(["d2", "d1"]);
    expect(results[0]?.score).toBeCloseTo(sigmoid(5), 12);
    expect(results[1]?.score).toBeCloseTo(sigmoid(-3), 12);
    expect(reranker.supportsCaching()).toBe(true);
  });

  it("loads a pluggable model once", async () => {
    const load = vi.fn(async () => {});
    const reranker = new LocalReranker({
      model: { name: "stub", load, predict: async (pairs) => pairs.map(() => 0) },
    });

    await reranker.initialize();
    await reranker.rerank("q", docs("a"));

    expect(load).toHaveBeenCalledTimes(1);
    expect(reranker.getStats().config).toEqual({
      timeoutMs: 30000,
      modelName: "stub",
    });
  });

  it("returns every candidate when no topN is given", async () => {
    const input = Array.from({ length: 60 }, (_, index) =>
      createSearchResult(`d${index}`, index % 2 === 0 ? "rag pipeline" : "weather", 0.5)
    );

    const results = await new LocalReranker().rerank("rag", input);

    expect(results).toHaveLength(60);
    expect(new Set(results.map((r) => r.id)).size).toBe(60);
    expect(results[0]?.id).toBe("d0");
    expect(results[59]?.id).toBe("d59");
  });
});

describe("hosted rerankers", () => {
  it("requires an API key", () => {
    expect(() => new JinaReranker({ apiKey: "" })).toThrow(ConfigurationError);
    expect(() => new CohereReranker({ apiKey: "" })).toThrow("Cohere API key is required");
  });

  it("posts to the Jina rerank endpoint and maps scores back by index", async () => {
    const fetchMock = vi.fn<FetchFn>().mockResolvedValue(
      jsonResponse({
        results: [
          { index: 1, relevance_score: 0.9 },
          { index: 0, relevance_score: 0.2 },
        ],
      })
    );
    const reranker = new JinaReranker({ apiKey: "test-secret", fetch: fetchMock });

    const results = await reranker.rerank("query", docs("first", "second"));

    expect(results.map((r) => [r.id, r.score])).toEqual([
      ["d2", 0.9],
      ["d1", 0.2],
    ]);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("https://api.jina.ai/v1/rerank");
    expect(init?.headers).toMatchObject({ Authorization: "Bearer test-secret" });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "jina-reranker-v2-base-multilingual",
      query: "query",
      documents: ["first", "second"],
      top_n: 2,
    });
  });

  it("scales ColBERT scores by the batch maximum", async () => {
    const fetchMock = vi.fn<FetchFn>().mockResolvedValue(
      jsonResponse({
        results: [
          { index: 0, relevance_score: 12 },
          { index: 1, relevance_score: 6 },
        ],
      })
    );
    const reranker = new JinaColbertReranker({ apiKey: "test-secret", fetch: fetchMock });

    const results = await reranker.rerank("query", docs("first", "second"));

    expect(results.map((r) => r.score)).toEqual([1, 0.5]);
    expect(JSON.parse(String(fetchMock.mock.calls[0]?.[1]?.body))).toMatchObject({
      model: "jina-colbert-v2",
    });
  });

  it("uses the Cohere v2 endpoint", async () => {
    const fetchMock = vi.fn<FetchFn>().mockResolvedValue(
      jsonResponse({ results: [{ index: 0, relevance_score: 0.4 }] })
    );
    const reranker = new CohereReranker({ apiKey: "test-secret", fetch: fetchMock });

    await reranker.rerank("query", docs("only"));

    expect(fetchMock.mock.calls[0]?.[0]).toBe("https://api.cohere.com/v2/rerank");
  });

  it("scores documents missing from the response as 0", async () => {
    const fetchMock = vi.fn<FetchFn>().mockResolvedValue(
      jsonResponse({ results: [{ index: 1, relevance_score: 0.7 }] })
    );
    const reranker = new JinaReranker({ apiKey: "test-secret", fetch: fetchMock });

    const results = await reranker.rerank("query", docs("first", "second"));
    expect(results.map((r) => [r.id, r.score])).toEqual([
      ["d2", 0.7],
      ["d1", 0],
    ]);
  });

  it("degrades on HTTP 500 and returns the input unchanged", async () => {
    const fetchMock = vi.fn<FetchFn>().mockResolvedValue(new Response("oops", { status: 500 }));
    const reranker = new JinaReranker({ apiKey: "test-secret", fetch: fetchMock });
    const input = docs("first", "second");

    const outcome = await reranker.rerankWithOutcome("query", input);
    expect(isErr(outcome) && outcome.error).toEqual({
      kind: "http_error",
      message: "Jina API error (500): oops",
      reranker: "jina",
    });
    expect(reranker.getStats().failedRequests).toBe(1);
  });

  it("degrades on an out-of-range index", async () => {
    const fetchMock = vi.fn<FetchFn>().mockResolvedValue(
      jsonResponse({ results: [{ index: 5, relevance_score: 0.7 }] })
    );
    const reranker = new CohereReranker({ apiKey: "test-secret", fetch: fetchMock });
    const input = docs("first");

    const outcome = await reranker.rerankWithOutcome("query", input);
    expect(isErr(outcome) && outcome.error.message).toBe("result index 5 out of range");
  });

  it("degrades on a response without results", async () => {
    const fetchMock = vi.fn<FetchFn>().mockResolvedValue(jsonResponse({ data: [] }));
    const reranker = new CohereReranker({ apiKey: "test-secret", fetch: fetchMock });
    const input = docs("first", "second");

    expect(await reranker.rerank("query", input)).toEqual(input);
  });
});

describe("parseRankings", () => {
  const payload = '{"rankings": [{"index": 0, "score": 0.4}]}';

  it("reads bare, fenced and embedded JSON", () => {
    expect(parseRankings(payload)).toEqual([{ index: 0, score: 0.4 }]);
    expect(parseRankings(`\`\`\`json\n${payload}\n\`\`\``)).toEqual([{ index: 0, score: 0.4 }]);
    expect(parseRankings(`Here is the ranking: ${payload} Hope it helps.`)).toEqual([
      { index: 0, score: 0.4 },
    ]);
  });

  it("returns null when no rankings object is present", () => {
    expect(parseRankings("I cannot rank these.")).toBeNull();
    expect(parseRankings('{"results": []}')).toBeNull();
  });
});

describe("LLM rerankers", () => {
  function completion(content: string): Response {
    return jsonResponse({
      model: "judge",
      choices: [{ index: 0, message: { role: "assistant", content }, finish_reason: "stop" }],
      usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
    });
  }

  it("requires an API key", () => {
    expect(() => new OpenRouterReranker({ apiKey: "" })).toThrow("OpenRouter API key is required");
  });

  it("defaults to the flash-lite model through OpenRouter", () => {
    const reranker = new OpenRouterReranker({ apiKey: "test-secret" });
    expect(reranker.model).toBe("google/gemini-2.5-flash-lite");
    expect(reranker.supportsCaching()).toBe(false);
  });

  it("reorders by the judge's rankings", async () => {
    const fetchMock = vi.fn<FetchFn>().mockResolvedValue(
      completion(
        '{"rankings": [{"index": 1, "score": 0.95}, {"index": 0, "score": 0.85}, {"index": 2, "score": 0.70}]}'
      )
    );
    const reranker = new OpenRouterReranker({ apiKey: "test-secret", fetch: fetchMock });
    const input = [
      createSearchResult("1", "doc one", 0.8),
      createSearchResult("2", "doc two", 0.6),
      createSearchResult("3", "doc three", 0.4),
    ];

    const results = await reranker.rerank("test query", input);

    expect(results.map((r) => [r.id, r.score])).toEqual([
      ["2", 0.95],
      ["1", 0.85],
      ["3", 0.7],
    ]);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("https://openrouter.ai/api/v1/chat/completions");
    expect(JSON.parse(String(init?.body))).toMatchObject({
      model: "google/gemini-2.5-flash-lite",
      temperature: 0,
      response_format: { type: "json_object" },
    });
  });

  it("divides scores on a 0-10 scale by 10", async () => {
    const fetchMock = vi.fn<FetchFn>().mockResolvedValue(
      completion('{"rankings": [{"index": 0, "score": 8}, {"index": 1, "score": 3}]}')
    );
    const reranker = new OpenAIReranker({ apiKey: "test-secret", fetch: fetchMock });

    const results = await reranker.rerank("q", docs("a", "b"));
    expect(results.map((r) => r.score)).toEqual([0.8, 0.3]);
    expect(reranker.getStats().config).toMatchObject({ model: "gpt-4o-mini", provider: "openai" });
  });

  it("degrades when the reply holds no rankings", async () => {
    const fetchMock = vi.fn<FetchFn>().mockResolvedValue(completion("Sorry, I can't help."));
    const reranker = new OpenAIReranker({ apiKey: "test-secret", fetch: fetchMock });
    const input = docs("a", "b");

    const outcome = await reranker.rerankWithOutcome("q", input);
    expect(isOk(outcome)).toBe(false);
    expect(isErr(outcome) && outcome.error.kind).toBe("malformed_response");
    expect(await reranker.rerank("q", input)).toEqual(input);
  });

  it("stops scoring after close", async () => {
    const fetchMock = vi.fn<FetchFn>();
    const reranker = new OpenAIReranker({ apiKey: "test-secret", fetch: fetchMock });
    const input = docs("a");

    await reranker.close();
    expect(await reranker.rerank("q", input)).toEqual(input);
    expect(fetchMock).not.toHaveBeenCalled();

    await reranker.initialize();
    fetchMock.mockResolvedValue(completion('{"rankings": [{"index": 0, "score": 0.6}]}'));
    expect((await reranker.rerank("q", input))[0]?.score).toBe(0.6);
  });
});
