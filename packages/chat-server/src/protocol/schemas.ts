/**
 * Chat Stream Protocol
 *
 * Inbound client messages are validated with zod; outbound frames are a
 * tagged union on `type`, one JSON object per WebSocket frame.
 */

import { z } from "zod";

// ============================================================================
// Inbound
// ============================================================================

export const MAX_CONTENT_LENGTH = 10_000;

export const ClientMessageSchema = z.object({
  type: z.literal("message").default("message"),
  message_id: z.string().min(1),
  content: z.string().min(1).max(MAX_CONTENT_LENGTH),
  session_id: z.string().min(1),
});

export type ClientMessage = z.infer<typeof ClientMessageSchema>;

// ============================================================================
// Outbound
// ============================================================================

export interface StreamStartEvent {
  type: "stream_start";
  message_id: string;
  session_id: string;
  /** ISO-8601 */
  timestamp: string;
}

export interface StreamTokenEvent {
  type: "stream_token";
  message_id: string;
  token: string;
  index: number;
}

export interface StreamSourcesEvent {
  type: "stream_sources";
  message_id: string;
  sources: SourceDocument[];
}

export interface StreamEndEvent {
  type: "stream_end";
  message_id: string;
  total_tokens: number;
  processing_time_ms: number;
}

export interface StreamErrorEvent {
  type: "stream_error";
  message_id: string;
  error_code: string;
  message: string;
  solutions: string[];
}

export type StreamEvent =
  | StreamStartEvent
  | StreamTokenEvent
  | StreamSourcesEvent
  | StreamEndEvent
  | StreamErrorEvent;

export type StreamEventType = StreamEvent["type"];

/** Source passage attached to an answer */
export interface SourceDocument {
  id: string;
  content: string;
  score: number;
  metadata: Record<string, unknown>;
}

// ============================================================================
// Error codes
// ============================================================================

export type WsErrorCode =
  | "WS-001-INVALID_JSON"
  | "WS-002-VALIDATION_ERROR"
  | "WS-003-SERVICE_NOT_INITIALIZED"
  | "WS-999-INTERNAL_ERROR";

export const WS_ERROR_CODES: Record<WsErrorCode, { message: string; solutions: string[] }> = {
  "WS-001-INVALID_JSON": {
    message: "The message is not valid JSON.",
    solutions: ["Send the message as valid JSON."],
  },
  "WS-002-VALIDATION_ERROR": {
    message: "The message format is invalid.",
    solutions: [
      "Check the type, message_id, content and session_id fields.",
      `content must be between 1 and ${MAX_CONTENT_LENGTH} characters.`,
    ],
  },
  "WS-003-SERVICE_NOT_INITIALIZED": {
    message: "The chat service is not initialized.",
    solutions: ["Contact the server administrator."],
  },
  "WS-999-INTERNAL_ERROR": {
    message: "An error occurred while streaming the answer.",
    solutions: ["Please try again shortly.", "Contact the administrator if the problem persists."],
  },
};

/** Code used when a pipeline error event carries none */
export const DEFAULT_PIPELINE_ERROR_CODE = "GEN-999";

export const DEFAULT_ERROR_SOLUTIONS = ["Please try again shortly."];

export function createErrorEvent(
  messageId: string,
  code: WsErrorCode
): StreamErrorEvent {
  const entry = WS_ERROR_CODES[code];
  return {
    type: "stream_error",
    message_id: messageId,
    error_code: code,
    message: entry.message,
    solutions: [...entry.solutions],
  };
}
