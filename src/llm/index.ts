/**
 * Client for the chat completion model used by the extraction step.
 * Wraps the configured provider and applies the configured sampling defaults.
 */

import type { LlmConfig } from "../config.js";
import { ConfigurationError } from "../errors.js";
import { AzureOpenAIProvider } from "./providers/azure-openai.js";
import type { ChatRequestOptions, ChatResponse, LLMProvider } from "./types.js";

/**
 * Builds the Azure OpenAI provider, failing before any request when credentials are absent.
 */
function createProvider(config: LlmConfig): LLMProvider {
  if (!config.endpoint || !config.apiKey) {
    throw new ConfigurationError("Missing AZURE_OPENAI_ENDPOINT or AOAI_API_KEY");
  }
  return new AzureOpenAIProvider(
    config.endpoint,
    config.deployment,
    config.apiKey,
    config.apiVersion,
  );
}

export class LLMClient {
  private provider: LLMProvider;

  constructor(
    private config: LlmConfig,
    provider?: LLMProvider,
  ) {
    this.provider = provider ?? createProvider(config);
  }

  get model(): string {
    return this.config.deployment;
  }

  get maxInputChars(): number {
    return this.config.maxInputChars;
  }

  async chat(
    systemPrompt: string,
    userPrompt: string,
    options?: ChatRequestOptions,
  ): Promise<ChatResponse> {
    return this.provider.text(systemPrompt, userPrompt, {
      temperature: this.config.temperature,
      ...options,
    });
  }
}

// Re-export types
export type {
  ChatMessage,
  ChatResponse,
  ChatRequestOptions,
  LLMProvider,
} from "./types.js";
