/**
 * LLM Provider Types
 *
 * Abstractions for OpenAI-compatible chat completion providers (Azure OpenAI).
 */

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface ChatRequestOptions {
  temperature?: number;
  maxTokens?: number;
  /** Ask the provider for a JSON object; omitted for the unstructured retry */
  responseFormat?: {
    type: "json_object";
  };
}

/** Assistant text of the first choice, with token usage when reported */
export interface ChatResponse {
  content: string;
  model: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
}

export interface LLMProvider {
  name: string;

  text(
    systemPrompt: string,
    userPrompt: string,
    options?: ChatRequestOptions,
  ): Promise<ChatResponse>;
}
