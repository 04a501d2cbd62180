import { DegradableError, type DegradedReasonKind } from "@ragline/ai-core";

/** Logistic squash of a real-valued logit into (0, 1) */
export function sigmoid(x: number): number {
  return 1 / (1 + Math.exp(-x));
}

export function clamp01(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}

/**
 * Bring scores into [0, 1] by the batch maximum when any exceeds 1.
 * Ordering is preserved; already-normalized batches are returned as-is.
 */
export function normalizeByMax(scores: readonly number[]): number[] {
  const max = Math.max(0, ...scores);
  if (max <= 1) {
    return scores.map(clamp01);
  }
  return scores.map((score) => clamp01(score / max));
}

/**
 * Map a thrown value onto a degradation reason.
 */
export function classifyFailure(error: unknown): { kind: DegradedReasonKind; message: string } {
  if (error instanceof DegradableError) {
    return { kind: error.reason, message: error.message };
  }
  if (!(error instanceof Error)) {
    return { kind: "unknown", message: String(error) };
  }
  if (error.name === "TimeoutError" || error.name === "AbortError") {
    return { kind: "timeout", message: error.message };
  }
  const status = /API error \((\d{3})\)/.exec(error.message)?.[1];
  if (status === "401" || status === "403") {
    return { kind: "auth_failed", message: error.message };
  }
  if (status) {
    return { kind: "http_error", message: error.message };
  }
  if (error instanceof SyntaxError) {
    return { kind: "malformed_response", message: error.message };
  }
  if (error instanceof TypeError) {
    return { kind: "transport_error", message: error.message };
  }
  return { kind: "unknown", message: error.message };
}
