/**
 * Gemini Provider
 *
 * Google Gemini through its OpenAI-compatible endpoint.
 */

import { OpenAIProvider } from "./openaiProvider";
import type { ProviderConfig } from "./types";

export class GeminiProvider extends OpenAIProvider {
  override readonly name: string = "gemini";
  override readonly defaultEmbeddingModel: string = "text-embedding-004";

  constructor(config: ProviderConfig) {
    super({
      ...config,
      baseUrl: config.baseUrl || "https://generativelanguage.googleapis.com/v1beta/openai",
      defaultModel: config.defaultModel || "gemini-2.5-flash-lite",
    });
  }

  protected override get apiLabel(): string {
    return "Gemini";
  }
}
