import type { GenerationPipeline, PipelineEvent } from "../ai/ragPipeline";
import type { TransportHandle } from "../connectionRegistry";
import type { StreamEvent } from "../protocol/schemas";

/**
 * In-memory transport. Sends fail once it is closed or after `failAfter`
 * frames, like a socket whose peer went away.
 */
export class MockTransport implements TransportHandle {
  readonly sent: string[] = [];
  closed = false;
  closeCode: number | undefined;
  failAfter = Number.POSITIVE_INFINITY;

  async send(data: string): Promise<void> {
    if (this.closed || this.sent.length >= this.failAfter) {
      throw new Error("WebSocket is not open");
    }
    this.sent.push(data);
  }

  close(code?: number): void {
    this.closed = true;
    this.closeCode = code;
  }

  events(): StreamEvent[] {
    return this.sent.map((frame): StreamEvent => JSON.parse(frame));
  }

  types(): string[] {
    return this.events().map((event) => event.type);
  }
}

export function scriptedPipeline(
  events: readonly PipelineEvent[],
  options: { delayMs?: number; throwAfter?: number } = {}
): GenerationPipeline {
  return {
    async *stream() {
      for (const [index, event] of events.entries()) {
        if (options.throwAfter !== undefined && index === options.throwAfter) {
          throw new Error("pipeline exploded");
        }
        if (options.delayMs) {
          await new Promise((resolve) => setTimeout(resolve, options.delayMs));
        }
        yield event;
      }
    },
  };
}

export function chunkEvents(chunks: readonly string[]): PipelineEvent[] {
  return chunks.map((data, chunkIndex) => ({ event: "chunk", data, chunkIndex }));
}

export function clientFrame(fields: Record<string, unknown> = {}): string {
  return JSON.stringify({
    type: "message",
    message_id: "m1",
    content: "RAG란 무엇인가요?",
    session_id: "s1",
    ...fields,
  });
}
