/**
 * OpenRouter Provider
 *
 * OpenRouter speaks the OpenAI wire format and routes to many upstream models.
 */

import { OpenAIProvider } from "./openaiProvider";
import type { ProviderConfig } from "./types";

export interface OpenRouterConfig extends ProviderConfig {
  /** Sent as HTTP-Referer for OpenRouter attribution */
  siteUrl?: string;
  /** Sent as X-Title */
  appName?: string;
}

export class OpenRouterProvider extends OpenAIProvider {
  override readonly name: string = "openrouter";

  private readonly siteUrl: string | undefined;
  private readonly appName: string;

  constructor(config: OpenRouterConfig) {
    super({
      ...config,
      baseUrl: config.baseUrl || "https://openrouter.ai/api/v1",
      defaultModel: config.defaultModel || "google/gemini-2.5-flash-lite",
    });
    this.siteUrl = config.siteUrl;
    this.appName = config.appName ?? "ragline";
  }

  protected override get apiLabel(): string {
    return "OpenRouter";
  }

  protected override getHeaders(): Record<string, string> {
    const headers = { ...super.getHeaders(), "X-Title": this.appName };
    return this.siteUrl ? { ...headers, "HTTP-Referer": this.siteUrl } : headers;
  }
}
