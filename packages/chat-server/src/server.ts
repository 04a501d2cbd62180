/**
 * RAG Stream Server
 *
 * HTTP server with a WebSocket endpoint for streamed RAG answers.
 * Clients connect to `${wsPath}?session_id=...`; every text frame is one
 * chat turn handled by a StreamingSession.
 */

import {
  createServer,
  type Server as HttpServer,
  type IncomingMessage,
  type ServerResponse,
} from "node:http";
import type { Duplex } from "node:stream";
import { createModuleLogger, type Logger } from "@ragline/ai-core";
import { type RawData, type WebSocket, WebSocketServer } from "ws";
import type { GenerationPipeline } from "./ai/ragPipeline";
import { ConnectionRegistry, type TransportHandle } from "./connectionRegistry";
import { StreamingSession } from "./streamingSession";

export interface RagStreamServerConfig {
  /** 0 picks a free port */
  port: number;
  host?: string;
  /** WebSocket endpoint path (default: "/chat-ws") */
  wsPath?: string;
  registry?: ConnectionRegistry;
  pipeline?: GenerationPipeline | null;
  logger?: Logger;
}

export type RetrieverHealth = "healthy" | "unhealthy" | "not_configured";

export interface HealthReport {
  ok: boolean;
  status: "healthy" | "degraded";
  connections: number;
  retriever: RetrieverHealth;
}

export class RagStreamServer {
  readonly registry: ConnectionRegistry;

  private readonly config: Required<Pick<RagStreamServerConfig, "port" | "host" | "wsPath">>;
  private readonly logger: Logger;
  private pipeline: GenerationPipeline | null;
  protected httpServer: HttpServer | null = null;
  private wss: WebSocketServer | null = null;
  private readonly sessions = new Map<WebSocket, StreamingSession>();

  constructor(config: RagStreamServerConfig) {
    this.config = {
      port: config.port,
      host: config.host ?? "0.0.0.0",
      wsPath: config.wsPath ?? "/chat-ws",
    };
    this.logger = createModuleLogger("rag-stream-server", config.logger);
    this.registry = config.registry ?? new ConnectionRegistry({ logger: this.logger });
    this.pipeline = config.pipeline ?? null;
  }

  /**
   * Wire (or unwire, with null) the generation backend. Open sessions pick
   * it up on their next turn.
   */
  setPipeline(pipeline: GenerationPipeline | null): void {
    this.pipeline = pipeline;
    if (pipeline) {
      this.logger.info("Generation pipeline attached");
    } else {
      this.logger.debug("Generation pipeline detached");
    }
  }

  /** Bound port; differs from the configured one when that was 0 */
  get port(): number {
    const address = this.httpServer?.address();
    return address && typeof address === "object" ? address.port : this.config.port;
  }

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      try {
        const httpServer = createServer((req, res) => {
          void this.handleHttpRequest(req, res);
        });
        this.httpServer = httpServer;

        this.wss = new WebSocketServer({ noServer: true });
        this.wss.on("error", (error) => {
          this.logger.error("WebSocket server error", error);
        });

        httpServer.on("upgrade", (request, socket, head) => {
          this.handleUpgrade(request, socket, head);
        });

        httpServer.once("error", reject);
        httpServer.listen(this.config.port, this.config.host, () => {
          httpServer.off("error", reject);
          httpServer.on("error", (error) => {
            this.logger.error("HTTP server error", error);
          });
          this.logger.info("Listening", {
            host: this.config.host,
            port: this.port,
            wsPath: this.config.wsPath,
          });
          resolve();
        });
      } catch (error) {
        reject(error);
      }
    });
  }

  async shutdown(): Promise<void> {
    this.logger.info("Shutting down");

    for (const [ws, session] of this.sessions) {
      session.close("server shutdown");
      ws.close(1001, "Server shutdown");
    }
    this.sessions.clear();
    this.registry.closeAll(1001, "Server shutdown");

    if (this.wss) {
      const wss = this.wss;
      await new Promise<void>((resolve) => {
        wss.close(() => resolve());
      });
      this.wss = null;
    }

    if (this.httpServer) {
      const httpServer = this.httpServer;
      await new Promise<void>((resolve, reject) => {
        httpServer.close((error) => (error ? reject(error) : resolve()));
      });
      this.httpServer = null;
    }

    this.logger.info("Shutdown complete");
  }

  async getHealth(): Promise<HealthReport> {
    const retriever = await this.probeRetriever();
    const healthy = this.pipeline !== null && retriever !== "unhealthy";
    return {
      ok: healthy,
      status: healthy ? "healthy" : "degraded",
      connections: this.registry.connectionCount,
      retriever,
    };
  }

  // ==========================================================================
  // WebSocket
  // ==========================================================================

  /** Path and session_id are checked before the handshake */
  private handleUpgrade(request: IncomingMessage, socket: Duplex, head: Buffer): void {
    const url = new URL(request.url ?? "/", "http://localhost");
    if (url.pathname !== this.config.wsPath) {
      rejectUpgrade(socket, 404, "Not Found");
      return;
    }
    const sessionId = url.searchParams.get("session_id");
    if (!sessionId) {
      this.logger.warn("Upgrade without session_id rejected");
      rejectUpgrade(socket, 400, "Bad Request");
      return;
    }

    const wss = this.wss;
    if (!wss) {
      rejectUpgrade(socket, 503, "Service Unavailable");
      return;
    }
    wss.handleUpgrade(request, socket, head, (ws) => {
      this.handleConnection(ws, sessionId);
    });
  }

  private handleConnection(ws: WebSocket, sessionId: string): void {
    const session = new StreamingSession({
      sessionId,
      handle: createTransport(ws),
      registry: this.registry,
      getPipeline: () => this.pipeline,
      logger: this.logger,
    });
    this.sessions.set(ws, session);
    session.open();

    ws.on("message", (data: RawData, isBinary: boolean) => {
      if (isBinary) {
        this.logger.debug("Binary frame ignored", { sessionId });
        return;
      }
      void session.handleRaw(rawDataToString(data));
    });

    ws.on("close", () => {
      session.close();
      this.sessions.delete(ws);
    });

    ws.on("error", (error) => {
      this.logger.error("WebSocket error", error, { sessionId });
    });
  }

  // ==========================================================================
  // HTTP
  // ==========================================================================

  private async handleHttpRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? "/", "http://localhost");
    try {
      if (req.method === "GET" && url.pathname === "/health") {
        const health = await this.getHealth();
        this.sendJson(res, health.ok ? 200 : 503, health);
        return;
      }
      this.sendJson(res, 404, { ok: false, error: "Not found" });
    } catch (error) {
      this.logger.error("HTTP request failed", error, { path: url.pathname });
      this.sendJson(res, 500, { ok: false, error: "Internal server error" });
    }
  }

  private async probeRetriever(): Promise<RetrieverHealth> {
    if (!this.pipeline?.healthCheck) {
      return "not_configured";
    }
    return (await this.pipeline.healthCheck()) ? "healthy" : "unhealthy";
  }

  private sendJson(res: ServerResponse, status: number, payload: unknown): void {
    res.writeHead(status, { "Content-Type": "application/json" });
    res.end(JSON.stringify(payload));
  }
}

export function createTransport(ws: WebSocket): TransportHandle {
  return {
    send: (data) =>
      new Promise<void>((resolve, reject) => {
        if (ws.readyState !== ws.OPEN) {
          reject(new Error("WebSocket is not open"));
          return;
        }
        ws.send(data, (error) => (error ? reject(error) : resolve()));
      }),
    close: (code, reason) => {
      ws.close(code, reason);
    },
  };
}

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString("utf8");
  }
  return data.toString("utf8");
}

function rejectUpgrade(socket: Duplex, status: number, statusText: string): void {
  socket.write(`HTTP/1.1 ${status} ${statusText}\r\nConnection: close\r\n\r\n`);
  socket.destroy();
}
