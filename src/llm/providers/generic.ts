/**
 * OpenAI-compatible chat completions provider.
 *
 * Subclasses adjust the endpoint, the auth header or the request body.
 */

import { z } from "zod";
import type {
  LLMProvider,
  ChatMessage,
  ChatRequestOptions,
  ChatResponse,
} from "../types.js";

const chatCompletionSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }),
      }),
    )
    .default([]),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .optional(),
});

export class GenericProvider implements LLMProvider {
  name = "generic";

  constructor(
    protected endpoint: string,
    protected defaultModel: string,
    protected apiKey: string,
  ) {}

  async text(
    systemPrompt: string,
    userPrompt: string,
    options?: ChatRequestOptions,
  ): Promise<ChatResponse> {
    const messages: ChatMessage[] = [
      { role: "system", content: systemPrompt },
      { role: "user", content: userPrompt },
    ];
    return this._chat(messages, options);
  }

  protected _getRequestUrl(): string {
    return this.endpoint;
  }

  protected _getRequestBody(
    messages: ChatMessage[],
    options?: ChatRequestOptions,
  ): Record<string, unknown> {
    const requestBody: Record<string, unknown> = {
      model: this.defaultModel,
      messages,
      temperature: options?.temperature ?? 0.1,
      max_tokens: options?.maxTokens ?? 4096,
    };

    // Add response_format for structured outputs if provided
    if (options?.responseFormat) {
      requestBody.response_format = options.responseFormat;
    }

    return requestBody;
  }

  protected _getRequestHeaders(): Record<string, string> {
    const requestHeaders: Record<string, string> = {
      "Content-Type": "application/json",
    };

    if (this.apiKey) {
      requestHeaders["Authorization"] = `Bearer ${this.apiKey}`;
    }

    return requestHeaders;
  }

  protected async _chat(
    messages: ChatMessage[],
    options?: ChatRequestOptions,
  ): Promise<ChatResponse> {
    const response = await fetch(this._getRequestUrl(), {
      method: "POST",
      headers: this._getRequestHeaders(),
      body: JSON.stringify(this._getRequestBody(messages, options)),
    });

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`${this.name} API error (${response.status}): ${error}`);
    }

    const data = chatCompletionSchema.parse(await response.json());

    return {
      content: data.choices[0]?.message.content ?? "",
      model: data.model ?? this.defaultModel,
      usage: data.usage
        ? {
            promptTokens: data.usage.prompt_tokens,
            completionTokens: data.usage.completion_tokens,
            totalTokens: data.usage.total_tokens,
          }
        : undefined,
    };
  }
}
