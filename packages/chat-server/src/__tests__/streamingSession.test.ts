import { noopLogger } from "@ragline/ai-core";
import { beforeEach, describe, expect, it } from "vitest";
import type { GenerationPipeline, PipelineEvent } from "../ai/ragPipeline";
import { ConnectionRegistry } from "../connectionRegistry";
import type { SourceDocument } from "../protocol/schemas";
import { StreamingSession } from "../streamingSession";
import { chunkEvents, clientFrame, MockTransport, scriptedPipeline } from "./mockTransport";

const SOURCE: SourceDocument = {
  id: "d1",
  content: "RAG는 검색 증강 생성입니다.",
  score: 0.9,
  metadata: { lang: "ko" },
};

function successEvents(chunks: readonly string[]): PipelineEvent[] {
  return [
    {
      event: "metadata",
      data: {
        sessionId: "s1",
        searchResults: 1,
        rankedResults: 1,
        rerankingApplied: false,
        keywordFusion: false,
      },
    },
    ...chunkEvents(chunks),
    {
      event: "done",
      data: {
        sessionId: "s1",
        totalChunks: chunks.length,
        processingTimeMs: 12,
        tokensUsed: 40,
        sources: [SOURCE],
      },
    },
  ];
}

describe("StreamingSession", () => {
  let registry: ConnectionRegistry;
  let transport: MockTransport;
  let pipeline: GenerationPipeline | null;

  const openSession = (sessionId = "s1", handle = transport) => {
    const session = new StreamingSession({
      sessionId,
      handle,
      registry,
      getPipeline: () => pipeline,
      logger: noopLogger,
    });
    session.open();
    return session;
  };

  beforeEach(() => {
    registry = new ConnectionRegistry({ logger: noopLogger });
    transport = new MockTransport();
    pipeline = scriptedPipeline(successEvents(["안녕", "하세요", "!"]));
  });

  describe("lifecycle", () => {
    it("registers on open and waits for a message", () => {
      const session = openSession();

      expect(session.state).toBe("AWAITING_MESSAGE");
      expect(registry.get("s1")).toBe(transport);
    });

    it("deregisters on close and ignores further frames", async () => {
      const session = openSession();
      session.close();
      session.close();

      await session.handleRaw(clientFrame());

      expect(session.state).toBe("CLOSED");
      expect(registry.isConnected("s1")).toBe(false);
      expect(transport.sent).toEqual([]);
    });

    it("ignores frames before open", async () => {
      const session = new StreamingSession({
        sessionId: "s1",
        handle: transport,
        registry,
        getPipeline: () => pipeline,
        logger: noopLogger,
      });

      await session.handleRaw(clientFrame());

      expect(session.state).toBe("IDLE");
      expect(transport.sent).toEqual([]);
    });
  });

  describe("successful turn", () => {
    it("streams start, indexed tokens, sources and end", async () => {
      const session = openSession();

      await session.handleRaw(clientFrame());

      expect(transport.types()).toEqual([
        "stream_start",
        "stream_token",
        "stream_token",
        "stream_token",
        "stream_sources",
        "stream_end",
      ]);
      const events = transport.events();
      const tokens = events.flatMap((event) => (event.type === "stream_token" ? [event] : []));
      expect(tokens.map((token) => token.index)).toEqual([0, 1, 2]);
      expect(tokens.map((token) => token.token).join("")).toBe("안녕하세요!");
      expect(session.state).toBe("AWAITING_MESSAGE");
    });

    it("fills the start, sources and end payloads", async () => {
      const session = openSession();

      await session.handleRaw(clientFrame());

      const [start, , , , sources, end] = transport.events();
      expect(start).toMatchObject({ type: "stream_start", message_id: "m1", session_id: "s1" });
      expect(start?.type === "stream_start" && Number.isNaN(Date.parse(start.timestamp))).toBe(
        false
      );
      expect(sources).toEqual({ type: "stream_sources", message_id: "m1", sources: [SOURCE] });
      expect(end).toMatchObject({ type: "stream_end", message_id: "m1", total_tokens: 3 });
      expect(end?.type === "stream_end" && Number.isInteger(end.processing_time_ms)).toBe(true);
    });

    it("sends empty sources when the pipeline reports none", async () => {
      pipeline = scriptedPipeline(chunkEvents(["only"]));
      const session = openSession();

      await session.handleRaw(clientFrame());

      expect(transport.events()[2]).toEqual({
        type: "stream_sources",
        message_id: "m1",
        sources: [],
      });
    });

    it("restarts token indices at zero on the next turn", async () => {
      const session = openSession();

      await session.handleRaw(clientFrame({ message_id: "m1" }));
      await session.handleRaw(clientFrame({ message_id: "m2" }));

      const secondTurn = transport
        .events()
        .flatMap((event) =>
          event.type === "stream_token" && event.message_id === "m2" ? [event.index] : []
        );
      expect(secondTurn).toEqual([0, 1, 2]);
    });

    it("runs queued turns one after another", async () => {
      pipeline = scriptedPipeline(successEvents(["a", "b"]), { delayMs: 5 });
      const session = openSession();

      const first = session.handleRaw(clientFrame({ message_id: "m1" }));
      const second = session.handleRaw(clientFrame({ message_id: "m2" }));
      await Promise.all([first, second]);

      expect(transport.events().map((event) => `${event.type}:${event.message_id}`)).toEqual([
        "stream_start:m1",
        "stream_token:m1",
        "stream_token:m1",
        "stream_sources:m1",
        "stream_end:m1",
        "stream_start:m2",
        "stream_token:m2",
        "stream_token:m2",
        "stream_sources:m2",
        "stream_end:m2",
      ]);
    });
  });

  describe("rejected messages", () => {
    it("answers an empty content with a single validation error", async () => {
      const session = openSession();

      await session.handleRaw(
        '{"type":"message","message_id":"m1","content":"","session_id":"s1"}'
      );

      expect(transport.events()).toEqual([
        {
          type: "stream_error",
          message_id: "m1",
          error_code: "WS-002-VALIDATION_ERROR",
          message: "The message format is invalid.",
          solutions: [
            "Check the type, message_id, content and session_id fields.",
            "content must be between 1 and 10000 characters.",
          ],
        },
      ]);
      expect(session.state).toBe("AWAITING_MESSAGE");
    });

    it("rejects content over 10000 characters", async () => {
      const session = openSession();

      await session.handleRaw(clientFrame({ content: "x".repeat(10_001) }));

      expect(transport.events()).toHaveLength(1);
      expect(transport.events()[0]).toMatchObject({ error_code: "WS-002-VALIDATION_ERROR" });
    });

    it("answers malformed JSON with an unknown message id", async () => {
      const session = openSession();

      await session.handleRaw("{not json");

      expect(transport.events()).toEqual([
        {
          type: "stream_error",
          message_id: "unknown",
          error_code: "WS-001-INVALID_JSON",
          message: "The message is not valid JSON.",
          solutions: ["Send the message as valid JSON."],
        },
      ]);
      expect(session.state).toBe("AWAITING_MESSAGE");
    });

    it("uses unknown when a message id is not a string", async () => {
      const session = openSession();

      await session.handleRaw(clientFrame({ message_id: 42 }));

      expect(transport.events()[0]).toMatchObject({
        message_id: "unknown",
        error_code: "WS-002-VALIDATION_ERROR",
      });
    });

    it("reports a missing pipeline as not initialized", async () => {
      pipeline = null;
      const session = openSession();

      await session.handleRaw(clientFrame());

      expect(transport.events()).toEqual([
        {
          type: "stream_error",
          message_id: "m1",
          error_code: "WS-003-SERVICE_NOT_INITIALIZED",
          message: "The chat service is not initialized.",
          solutions: ["Contact the server administrator."],
        },
      ]);
      expect(session.state).toBe("AWAITING_MESSAGE");
    });

    it("picks up a pipeline wired after connect", async () => {
      pipeline = null;
      const session = openSession();
      await session.handleRaw(clientFrame({ message_id: "m1" }));

      pipeline = scriptedPipeline(chunkEvents(["ok"]));
      await session.handleRaw(clientFrame({ message_id: "m2" }));

      expect(transport.types()).toEqual([
        "stream_error",
        "stream_start",
        "stream_token",
        "stream_sources",
        "stream_end",
      ]);
    });
  });

  describe("failing turn", () => {
    it("forwards a pipeline error and sends no end", async () => {
      pipeline = scriptedPipeline([
        ...chunkEvents(["부분 응답"]),
        {
          event: "error",
          errorCode: "GEN-001-GENERATION_FAILED",
          message: "Answer generation failed: rate limited",
          solutions: ["Check the LLM provider status and API key."],
        },
        ...chunkEvents(["never sent"]),
      ]);
      const session = openSession();

      await session.handleRaw(clientFrame());

      expect(transport.types()).toEqual(["stream_start", "stream_token", "stream_error"]);
      expect(transport.events()[2]).toEqual({
        type: "stream_error",
        message_id: "m1",
        error_code: "GEN-001-GENERATION_FAILED",
        message: "Answer generation failed: rate limited",
        solutions: ["Check the LLM provider status and API key."],
      });
      expect(session.state).toBe("AWAITING_MESSAGE");
    });

    it("fills in a default code and solutions", async () => {
      pipeline = scriptedPipeline([{ event: "error" }]);
      const session = openSession();

      await session.handleRaw(clientFrame());

      expect(transport.events()[1]).toEqual({
        type: "stream_error",
        message_id: "m1",
        error_code: "GEN-999",
        message: "An error occurred while streaming the answer.",
        solutions: ["Please try again shortly."],
      });
    });

    it("turns a thrown pipeline error into an internal error", async () => {
      pipeline = scriptedPipeline(chunkEvents(["a", "b"]), { throwAfter: 1 });
      const session = openSession();

      await session.handleRaw(clientFrame());

      expect(transport.types()).toEqual(["stream_start", "stream_token", "stream_error"]);
      expect(transport.events()[2]).toEqual({
        type: "stream_error",
        message_id: "m1",
        error_code: "WS-999-INTERNAL_ERROR",
        message: "An error occurred while streaming the answer.",
        solutions: [
          "Please try again shortly.",
          "Contact the administrator if the problem persists.",
        ],
      });
      expect(session.state).toBe("AWAITING_MESSAGE");
      expect(session.getStats()).toEqual({ turns: 1, completedTurns: 0, failedTurns: 1 });
    });
  });

  describe("transport loss", () => {
    it("stops emitting and closes after a failed send", async () => {
      transport.failAfter = 2;
      const session = openSession();

      await session.handleRaw(clientFrame());

      expect(transport.types()).toEqual(["stream_start", "stream_token"]);
      expect(session.state).toBe("CLOSED");
      expect(registry.isConnected("s1")).toBe(false);

      await session.handleRaw(clientFrame({ message_id: "m2" }));
      expect(transport.sent).toHaveLength(2);
    });

    it("stops when a newer connection takes over the session id", async () => {
      const first = openSession();
      const newer = new MockTransport();
      openSession("s1", newer);

      await first.handleRaw(clientFrame());

      expect(first.state).toBe("CLOSED");
      expect(transport.sent).toEqual([]);
      expect(newer.sent).toEqual([]);
      expect(registry.get("s1")).toBe(newer);
    });
  });
});
