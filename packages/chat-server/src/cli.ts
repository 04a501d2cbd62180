/**
 * ragline chat server
 *
 * Start command: OPENAI_API_KEY=... npm start
 */

import { createLogger, isRagError } from "@ragline/ai-core";
import { createRuntime, type Runtime } from "./bootstrap";
import { loadServerConfig } from "./config";
import { RagStreamServer } from "./server";

const logger = createLogger({ module: "cli" });

async function main(): Promise<{ server: RagStreamServer; runtime: Runtime }> {
  const config = loadServerConfig(process.env);
  const rootLogger = createLogger({ level: config.logLevel });

  const server = new RagStreamServer({ ...config.server, logger: rootLogger });
  const runtime = await createRuntime(config, { env: process.env, logger: rootLogger });
  server.setPipeline(runtime.pipeline);
  await server.start();

  logger.info("Started", {
    port: server.port,
    wsPath: config.server.wsPath,
    backend: config.vectorStore.backend,
    llm: config.llm.provider,
    reranker: runtime.reranker?.name ?? "none",
  });
  return { server, runtime };
}

main()
  .then(({ server, runtime }) => {
    const stop = (signal: string) => {
      logger.info(`Received ${signal}`);
      Promise.all([server.shutdown(), runtime.close()])
        .then(() => process.exit(0))
        .catch((error) => {
          logger.error("Shutdown failed", error);
          process.exit(1);
        });
    };
    process.once("SIGINT", () => stop("SIGINT"));
    process.once("SIGTERM", () => stop("SIGTERM"));
  })
  .catch((error) => {
    logger.error("Failed to start", error, isRagError(error) ? { solutions: error.solutions } : {});
    process.exit(1);
  });
