import type { LLMProvider } from "@ragline/ai-core";
import type { Embedder } from "@ragline/retrieval";

/**
 * Query embedder backed by an LLM provider's embedding endpoint.
 */
export class ProviderEmbedder implements Embedder {
  constructor(
    private readonly provider: LLMProvider,
    private readonly options: { model?: string; dimensions?: number } = {}
  ) {}

  async embedQuery(text: string): Promise<number[]> {
    const response = await this.provider.embed({
      texts: [text],
      model: this.options.model,
      dimensions: this.options.dimensions,
    });
    const [vector] = response.embeddings;
    if (!vector) {
      throw new Error(`${this.provider.name} returned no embedding`);
    }
    return vector;
  }
}
