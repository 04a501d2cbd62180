import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

const root = fileURLToPath(new URL(".", import.meta.url));

// Workspace packages resolve to their sources so tests need no build
const aliases = [
  { find: "@ragline/ai-core", replacement: `${root}packages/ai-core/src/index.ts` },
  { find: "@ragline/retrieval", replacement: `${root}packages/retrieval/src/index.ts` },
  { find: "@ragline/chat-server", replacement: `${root}packages/chat-server/src/index.ts` },
];

export default defineConfig({
  resolve: {
    alias: aliases,
  },
  test: {
    environment: "node",
    include: ["packages/*/src/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**", "**/coverage/**"],
  },
});
