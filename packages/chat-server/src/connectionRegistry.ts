/**
 * Connection Registry
 *
 * Tracks one transport handle per session id. Constructed once by the
 * server and injected into every StreamingSession.
 */

import { createModuleLogger, type Logger, toErrorMessage } from "@ragline/ai-core";
import type { StreamEvent } from "./protocol/schemas";

/** Transport-agnostic view of an open connection */
export interface TransportHandle {
  /** Resolves once the frame is handed to the transport; rejects when the peer is gone */
  send(data: string): Promise<void>;
  close(code?: number, reason?: string): void;
}

export interface BroadcastResult {
  success: number;
  failed: number;
}

export interface ConnectionRegistryOptions {
  logger?: Logger;
}

export class ConnectionRegistry {
  private readonly connections = new Map<string, TransportHandle>();
  private readonly logger: Logger;

  constructor(options: ConnectionRegistryOptions = {}) {
    this.logger = createModuleLogger("connection-registry", options.logger);
  }

  /**
   * Register a handle. An existing handle for the same session is replaced
   * and left open; its owner is expected to close it.
   */
  connect(sessionId: string, handle: TransportHandle): void {
    if (this.connections.has(sessionId)) {
      this.logger.info("Session reconnected", { sessionId, action: "reconnect" });
    }
    this.connections.set(sessionId, handle);
    this.logger.info("Session connected", {
      sessionId,
      totalConnections: this.connections.size,
    });
  }

  /**
   * Remove a session. No-op when it is not registered, or when `handle` is
   * given and a newer handle has replaced it.
   */
  disconnect(sessionId: string, handle?: TransportHandle): void {
    const current = this.connections.get(sessionId);
    if (!current || (handle && current !== handle)) {
      return;
    }
    this.connections.delete(sessionId);
    this.logger.info("Session disconnected", {
      sessionId,
      totalConnections: this.connections.size,
    });
  }

  isConnected(sessionId: string): boolean {
    return this.connections.has(sessionId);
  }

  get(sessionId: string): TransportHandle | undefined {
    return this.connections.get(sessionId);
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  sessionIds(): string[] {
    return Array.from(this.connections.keys());
  }

  /**
   * Send one event. A missing session or a failed send returns false, and a
   * failed send also deregisters the session.
   */
  async send(sessionId: string, event: StreamEvent): Promise<boolean> {
    const handle = this.connections.get(sessionId);
    if (!handle) {
      this.logger.warn("Send to unknown session", { sessionId, eventType: event.type });
      return false;
    }

    try {
      await handle.send(JSON.stringify(event));
      return true;
    } catch (error) {
      this.logger.warn("Send failed, dropping session", {
        sessionId,
        eventType: event.type,
        error: toErrorMessage(error),
      });
      this.disconnect(sessionId, handle);
      return false;
    }
  }

  async broadcast(event: StreamEvent): Promise<BroadcastResult> {
    const outcomes = await Promise.all(
      this.sessionIds().map((sessionId) => this.send(sessionId, event))
    );
    const success = outcomes.filter(Boolean).length;
    return { success, failed: outcomes.length - success };
  }

  /** Close every handle and forget it */
  closeAll(code = 1001, reason = "Server shutdown"): void {
    for (const [sessionId, handle] of this.connections) {
      try {
        handle.close(code, reason);
      } catch (error) {
        this.logger.warn("Close failed", { sessionId, error: toErrorMessage(error) });
      }
    }
    this.connections.clear();
  }
}
