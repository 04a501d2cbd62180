/**
 * Streaming Session
 *
 * Drives one WebSocket connection. Each inbound frame is one turn:
 * parse, validate, then stream `start, token*, sources, end` (or `error`)
 * back through the ConnectionRegistry. Turns of one session never overlap.
 *
 * States:
 *   IDLE -> CONNECTED -> AWAITING_MESSAGE -> STREAMING -> AWAITING_MESSAGE
 *                                                      \-> ERROR_SENT -> AWAITING_MESSAGE
 *   any -> CLOSED (transport gone or a send failed)
 */

import { createModuleLogger, LifecycleError, type Logger } from "@ragline/ai-core";
import type { GenerationPipeline } from "./ai/ragPipeline";
import type { ConnectionRegistry, TransportHandle } from "./connectionRegistry";
import {
  type ClientMessage,
  ClientMessageSchema,
  createErrorEvent,
  DEFAULT_ERROR_SOLUTIONS,
  DEFAULT_PIPELINE_ERROR_CODE,
  type SourceDocument,
  type StreamEvent,
  WS_ERROR_CODES,
  type WsErrorCode,
} from "./protocol/schemas";

export type SessionState =
  | "IDLE"
  | "CONNECTED"
  | "AWAITING_MESSAGE"
  | "STREAMING"
  | "ERROR_SENT"
  | "CLOSED";

const TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  IDLE: ["CONNECTED", "CLOSED"],
  CONNECTED: ["AWAITING_MESSAGE", "CLOSED"],
  AWAITING_MESSAGE: ["STREAMING", "CLOSED"],
  STREAMING: ["AWAITING_MESSAGE", "ERROR_SENT", "CLOSED"],
  ERROR_SENT: ["AWAITING_MESSAGE", "CLOSED"],
  CLOSED: [],
};

export interface StreamingSessionOptions {
  sessionId: string;
  handle: TransportHandle;
  registry: ConnectionRegistry;
  /** Read at every turn, so a pipeline wired after connect is picked up */
  getPipeline: () => GenerationPipeline | null;
  logger?: Logger;
}

export interface SessionStats {
  turns: number;
  completedTurns: number;
  failedTurns: number;
}

export class StreamingSession {
  readonly sessionId: string;

  private readonly handle: TransportHandle;
  private readonly registry: ConnectionRegistry;
  private readonly getPipeline: () => GenerationPipeline | null;
  private readonly logger: Logger;
  private readonly abortController = new AbortController();
  private currentState: SessionState = "IDLE";
  private queue: Promise<void> = Promise.resolve();
  private readonly stats: SessionStats = { turns: 0, completedTurns: 0, failedTurns: 0 };

  constructor(options: StreamingSessionOptions) {
    this.sessionId = options.sessionId;
    this.handle = options.handle;
    this.registry = options.registry;
    this.getPipeline = options.getPipeline;
    this.logger = createModuleLogger("streaming-session", options.logger).child({
      sessionId: options.sessionId,
    });
  }

  get state(): SessionState {
    return this.currentState;
  }

  getStats(): SessionStats {
    return { ...this.stats };
  }

  /** Register the transport and start waiting for messages */
  open(): void {
    this.transition("CONNECTED");
    this.registry.connect(this.sessionId, this.handle);
    this.transition("AWAITING_MESSAGE");
  }

  /**
   * Queue one inbound frame. The returned promise settles when that turn is
   * done and never rejects.
   */
  handleRaw(raw: string): Promise<void> {
    this.queue = this.queue.then(() => this.runTurn(raw));
    return this.queue;
  }

  /** Transport went away. Idempotent. */
  close(reason = "transport closed"): void {
    if (this.currentState === "CLOSED") {
      return;
    }
    this.currentState = "CLOSED";
    this.abortController.abort();
    this.registry.disconnect(this.sessionId, this.handle);
    this.logger.info("Session closed", { reason });
  }

  // ==========================================================================
  // Turn handling
  // ==========================================================================

  private async runTurn(raw: string): Promise<void> {
    if (this.currentState !== "AWAITING_MESSAGE") {
      this.logger.debug("Frame ignored", { state: this.currentState });
      return;
    }
    this.stats.turns++;
    try {
      await this.processMessage(raw);
    } catch (error) {
      // Only reachable outside streamTurn, which handles its own failures.
      this.logger.error("Turn failed", error);
      this.stats.failedTurns++;
      await this.emit(createErrorEvent("unknown", "WS-999-INTERNAL_ERROR"));
    } finally {
      if (this.state !== "CLOSED" && this.state !== "AWAITING_MESSAGE") {
        this.transition("AWAITING_MESSAGE");
      }
    }
  }

  private async processMessage(raw: string): Promise<void> {
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      this.logger.warn("Invalid JSON frame", { error: String(error) });
      await this.rejectMessage("unknown", "WS-001-INVALID_JSON");
      return;
    }

    const messageId = messageIdOf(data);
    const parsed = ClientMessageSchema.safeParse(data);
    if (!parsed.success) {
      this.logger.warn("Message validation failed", {
        messageId,
        issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      });
      await this.rejectMessage(messageId, "WS-002-VALIDATION_ERROR");
      return;
    }

    const pipeline = this.getPipeline();
    if (!pipeline) {
      this.logger.error("Generation pipeline not initialized", undefined, { messageId });
      await this.rejectMessage(parsed.data.message_id, "WS-003-SERVICE_NOT_INITIALIZED");
      return;
    }

    await this.streamTurn(parsed.data, pipeline);
  }

  /** Error before streaming started; the session stays in AWAITING_MESSAGE */
  private async rejectMessage(messageId: string, code: WsErrorCode): Promise<void> {
    this.stats.failedTurns++;
    await this.emit(createErrorEvent(messageId, code));
  }

  private async streamTurn(message: ClientMessage, pipeline: GenerationPipeline): Promise<void> {
    const messageId = message.message_id;
    const startTime = performance.now();
    let tokenIndex = 0;
    let sources: SourceDocument[] = [];

    this.transition("STREAMING");
    try {
      const started = await this.emit({
        type: "stream_start",
        message_id: messageId,
        session_id: this.sessionId,
        timestamp: new Date().toISOString(),
      });
      if (!started) {
        return;
      }
      this.logger.debug("Streaming started", { messageId });

      for await (const event of pipeline.stream(message.content, this.sessionId, {
        signal: this.abortController.signal,
      })) {
        switch (event.event) {
          case "metadata":
            this.logger.debug("Pipeline metadata", { messageId, ...event.data });
            break;
          case "chunk": {
            const sent = await this.emit({
              type: "stream_token",
              message_id: messageId,
              token: event.data,
              index: tokenIndex,
            });
            if (!sent) {
              return;
            }
            tokenIndex++;
            break;
          }
          case "done":
            sources = event.data.sources;
            break;
          case "error":
            await this.emitTurnError({
              type: "stream_error",
              message_id: messageId,
              error_code: event.errorCode ?? DEFAULT_PIPELINE_ERROR_CODE,
              message: event.message ?? WS_ERROR_CODES["WS-999-INTERNAL_ERROR"].message,
              solutions:
                event.solutions && event.solutions.length > 0
                  ? event.solutions
                  : DEFAULT_ERROR_SOLUTIONS,
            });
            return;
        }
      }

      if (!(await this.emit({ type: "stream_sources", message_id: messageId, sources }))) {
        return;
      }

      const processingTimeMs = Math.round(performance.now() - startTime);
      const ended = await this.emit({
        type: "stream_end",
        message_id: messageId,
        total_tokens: tokenIndex,
        processing_time_ms: processingTimeMs,
      });
      if (!ended) {
        return;
      }

      this.stats.completedTurns++;
      this.logger.info("Streaming completed", {
        messageId,
        totalTokens: tokenIndex,
        processingTimeMs,
      });
    } catch (error) {
      if (this.currentState === "CLOSED") {
        this.logger.info("Transport closed during streaming", { messageId });
        return;
      }
      this.logger.error("Streaming failed", error, { messageId });
      await this.emitTurnError(createErrorEvent(messageId, "WS-999-INTERNAL_ERROR"));
    }
  }

  private async emitTurnError(event: StreamEvent): Promise<void> {
    this.stats.failedTurns++;
    if (await this.emit(event)) {
      this.transition("ERROR_SENT");
    }
  }

  /**
   * Deliver one event. Returns false once the session is closed, has been
   * replaced by a newer connection, or the send failed.
   */
  private async emit(event: StreamEvent): Promise<boolean> {
    if (this.currentState === "CLOSED") {
      return false;
    }
    if (this.registry.get(this.sessionId) !== this.handle) {
      this.close("superseded by a newer connection");
      return false;
    }
    const sent = await this.registry.send(this.sessionId, event);
    if (!sent) {
      this.close("send failed");
    }
    return sent;
  }

  private transition(next: SessionState): void {
    if (!TRANSITIONS[this.currentState].includes(next)) {
      throw new LifecycleError(`Invalid session transition ${this.currentState} -> ${next}`, {
        context: { sessionId: this.sessionId },
      });
    }
    this.currentState = next;
  }
}

function messageIdOf(data: unknown): string {
  if (
    typeof data === "object" &&
    data !== null &&
    "message_id" in data &&
    typeof data.message_id === "string"
  ) {
    return data.message_id;
  }
  return "unknown";
}
